import fs from "node:fs";
import path from "node:path";
import { ConfigError } from "../core/errors";
import { isRecordSource } from "../types";
import { AppConfig, ConfigOverrides } from "./types";

type Env = Record<string, string | undefined>;

const DEFAULT_CONFIG: AppConfig = {
  source: "s3",
  userAgent: "tlc-trip-mirror/0.1",
  ignoreHttpsErrors: false,
  logLevel: "info",
  requestTimeoutMs: 20_000,
  downloadTimeoutMs: 600_000,
  datasetFormat: "parquet",
  webPageUrl: "https://www.nyc.gov/site/tlc/about/tlc-trip-record-data.page",
  webFileCssSelector: "a[href*='trip-data']",
  cloudfrontBaseUrl: "https://d37ci6vzurychx.cloudfront.net/trip-data",
  s3BaseUrl: "s3://nyc-tlc/trip data",
  s3Bucket: "nyc-tlc",
  s3Prefix: "trip data/",
  aws: {
    region: "us-east-1",
    accessKeyId: undefined,
    secretAccessKey: undefined,
    requestTimeoutMs: 6_000,
    connectTimeoutMs: 3_000,
  },
  downloadChunkSize: 1_048_576,
  transferThreads: 8,
  syncConcurrency: 0,
  webMetadataConcurrency: 1,
  zoneUrls: [
    "https://d37ci6vzurychx.cloudfront.net/misc/taxi_zone_lookup.csv",
    "https://d37ci6vzurychx.cloudfront.net/misc/taxi_zones.zip",
  ],
  firstRecordYear: 2009,
  outputDirs: {
    tripsData: "data/trips-data",
    metadata: "data/trips-metadata",
    zonesData: "data/zones-data",
    manifests: "data/manifests",
  },
};

function isPlainObject(value: unknown): value is object {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isConfigOverrides(value: unknown): value is ConfigOverrides {
  return isPlainObject(value);
}

function readConfigFile(configPath?: string): ConfigOverrides {
  if (!configPath) {
    return {};
  }

  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw new ConfigError([`config file not found: ${absolutePath}`]);
  }

  const raw = fs.readFileSync(absolutePath, "utf-8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new ConfigError([`config file is not valid JSON: ${absolutePath}`]);
  }
  if (!isConfigOverrides(parsed)) {
    throw new ConfigError([`config file must contain a JSON object: ${absolutePath}`]);
  }
  return parsed;
}

function toInt(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function toBool(value: string | undefined, fallback: boolean): boolean {
  if (!value) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes") {
    return true;
  }
  if (normalized === "0" || normalized === "false" || normalized === "no") {
    return false;
  }
  return fallback;
}

function toLogLevel(value: string | undefined, fallback: AppConfig["logLevel"]): AppConfig["logLevel"] {
  if (value === "debug" || value === "info" || value === "warn" || value === "error") {
    return value;
  }
  return fallback;
}

function isPositiveInt(value: unknown): boolean {
  return typeof value === "number" && Number.isInteger(value) && value > 0;
}

function isHttpUrl(value: unknown): boolean {
  if (typeof value !== "string") {
    return false;
  }
  try {
    const url = new URL(value);
    return url.protocol === "http:" || url.protocol === "https:";
  } catch {
    return false;
  }
}

const STRING_KEYS = ["userAgent", "s3BaseUrl", "s3Prefix"] as const;

/** `priorIssues` carries shape problems found before the merge. */
export function validateConfig(config: AppConfig, priorIssues: readonly string[] = []): AppConfig {
  const issues = [...priorIssues];

  if (!isRecordSource(config.source)) {
    issues.push(`source must be "web" or "s3", got ${JSON.stringify(config.source)}`);
  }
  for (const key of STRING_KEYS) {
    if (typeof config[key] !== "string") {
      issues.push(`${key} must be a string`);
    }
  }
  if (typeof config.ignoreHttpsErrors !== "boolean") {
    issues.push("ignoreHttpsErrors must be true or false");
  }
  if (!["debug", "info", "warn", "error"].includes(config.logLevel)) {
    issues.push(`logLevel must be one of debug, info, warn, error`);
  }
  for (const key of ["requestTimeoutMs", "downloadTimeoutMs", "downloadChunkSize", "transferThreads", "webMetadataConcurrency"] as const) {
    if (!isPositiveInt(config[key])) {
      issues.push(`${key} must be a positive integer`);
    }
  }
  if (!Number.isInteger(config.syncConcurrency) || config.syncConcurrency < 0) {
    issues.push("syncConcurrency must be 0 (auto) or a positive integer");
  }
  if (!isPositiveInt(config.aws.requestTimeoutMs) || !isPositiveInt(config.aws.connectTimeoutMs)) {
    issues.push("aws timeouts must be positive integers");
  }
  if (typeof config.aws.region !== "string" || !config.aws.region) {
    issues.push("aws.region must be a non-empty string");
  }
  for (const key of ["accessKeyId", "secretAccessKey"] as const) {
    const value = config.aws[key];
    if (value !== undefined && typeof value !== "string") {
      issues.push(`aws.${key} must be a string`);
    }
  }
  for (const key of ["webPageUrl", "cloudfrontBaseUrl"] as const) {
    if (!isHttpUrl(config[key])) {
      issues.push(`${key} must be an http(s) URL`);
    }
  }
  if (!Array.isArray(config.zoneUrls) || !config.zoneUrls.every(isHttpUrl)) {
    issues.push("zoneUrls must be a list of http(s) URLs");
  }
  if (typeof config.s3Bucket !== "string" || !config.s3Bucket) {
    issues.push("s3Bucket must be a non-empty string");
  }
  if (typeof config.datasetFormat !== "string" || !config.datasetFormat || config.datasetFormat.includes(".")) {
    issues.push("datasetFormat must be a bare file extension");
  }
  if (typeof config.webFileCssSelector !== "string" || !config.webFileCssSelector.trim()) {
    issues.push("webFileCssSelector must be a non-empty CSS selector");
  }
  if (!Number.isInteger(config.firstRecordYear)) {
    issues.push("firstRecordYear must be an integer");
  }
  for (const [name, dir] of Object.entries(config.outputDirs)) {
    if (typeof dir !== "string" || !dir) {
      issues.push(`outputDirs.${name} must be a non-empty path`);
    }
  }

  if (issues.length > 0) {
    throw new ConfigError(issues);
  }
  return config;
}

export function loadConfig(configPath?: string, env: Env = process.env): AppConfig {
  const fileConfig = readConfigFile(configPath);
  const shapeIssues: string[] = [];
  for (const key of ["aws", "outputDirs"] as const) {
    if (fileConfig[key] !== undefined && !isPlainObject(fileConfig[key])) {
      shapeIssues.push(`${key} must be a JSON object`);
    }
  }

  const merged: AppConfig = {
    ...DEFAULT_CONFIG,
    ...fileConfig,
    aws: {
      ...DEFAULT_CONFIG.aws,
      ...(isPlainObject(fileConfig.aws) ? fileConfig.aws : {}),
    },
    outputDirs: {
      ...DEFAULT_CONFIG.outputDirs,
      ...(isPlainObject(fileConfig.outputDirs) ? fileConfig.outputDirs : {}),
    },
  };

  return validateConfig({
    ...merged,
    source: env.SOURCE === "web" || env.SOURCE === "s3" ? env.SOURCE : merged.source,
    userAgent: env.USER_AGENT ?? merged.userAgent,
    ignoreHttpsErrors: toBool(env.IGNORE_HTTPS_ERRORS, merged.ignoreHttpsErrors),
    logLevel: toLogLevel(env.LOG_LEVEL, merged.logLevel),
    requestTimeoutMs: toInt(env.REQUEST_TIMEOUT_MS, merged.requestTimeoutMs),
    downloadTimeoutMs: toInt(env.DOWNLOAD_TIMEOUT_MS, merged.downloadTimeoutMs),
    datasetFormat: env.DATASET_FORMAT ?? merged.datasetFormat,
    webPageUrl: env.WEB_PAGE_URL ?? merged.webPageUrl,
    cloudfrontBaseUrl: env.CLOUDFRONT_BASE_URL ?? merged.cloudfrontBaseUrl,
    s3Bucket: env.S3_BUCKET ?? merged.s3Bucket,
    s3Prefix: env.S3_PREFIX ?? merged.s3Prefix,
    downloadChunkSize: toInt(env.DOWNLOAD_CHUNK_SIZE, merged.downloadChunkSize),
    transferThreads: toInt(env.TRANSFER_THREADS, merged.transferThreads),
    syncConcurrency: toInt(env.SYNC_CONCURRENCY, merged.syncConcurrency),
    aws: {
      region: env.AWS_REGION || merged.aws.region,
      accessKeyId: env.AWS_ACCESS_KEY_ID ?? merged.aws.accessKeyId,
      secretAccessKey: env.AWS_SECRET_ACCESS_KEY ?? merged.aws.secretAccessKey,
      requestTimeoutMs: toInt(env.AWS_REQUEST_TIMEOUT_MS, merged.aws.requestTimeoutMs),
      connectTimeoutMs: toInt(env.AWS_CONNECT_TIMEOUT_MS, merged.aws.connectTimeoutMs),
    },
    outputDirs: {
      tripsData: env.OUTPUT_TRIPS_DATA_DIR ?? merged.outputDirs.tripsData,
      metadata: env.OUTPUT_METADATA_DIR ?? merged.outputDirs.metadata,
      zonesData: env.OUTPUT_ZONES_DATA_DIR ?? merged.outputDirs.zonesData,
      manifests: env.OUTPUT_MANIFESTS_DIR ?? merged.outputDirs.manifests,
    },
  }, shapeIssues);
}

export { DEFAULT_CONFIG };
