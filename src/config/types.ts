import { RecordSource } from "../types";

export interface OutputDirs {
  tripsData: string;
  metadata: string;
  zonesData: string;
  manifests: string;
}

export interface AwsSettings {
  region: string;
  accessKeyId?: string;
  secretAccessKey?: string;
  requestTimeoutMs: number;
  connectTimeoutMs: number;
}

export interface AppConfig {
  source: RecordSource;
  userAgent: string;
  ignoreHttpsErrors: boolean;
  logLevel: "debug" | "info" | "warn" | "error";
  requestTimeoutMs: number;
  downloadTimeoutMs: number;
  datasetFormat: string;
  webPageUrl: string;
  webFileCssSelector: string;
  cloudfrontBaseUrl: string;
  s3BaseUrl: string;
  s3Bucket: string;
  s3Prefix: string;
  aws: AwsSettings;
  downloadChunkSize: number;
  transferThreads: number;
  /** 0 means one slot per available CPU. */
  syncConcurrency: number;
  webMetadataConcurrency: number;
  zoneUrls: string[];
  firstRecordYear: number;
  outputDirs: OutputDirs;
}

export type ConfigOverrides = Partial<Omit<AppConfig, "outputDirs" | "aws">> & {
  outputDirs?: Partial<OutputDirs>;
  aws?: Partial<AwsSettings>;
};
