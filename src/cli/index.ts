import { AppConfig, loadConfig } from "../config";
import { CommandContext, runMetadata, runSync, runZones } from "../core/commands";
import { ConfigError, describeError } from "../core/errors";
import { FetchFn } from "../core/fetch";
import { createRunId, Logger, MetricsRegistry } from "../observability";
import { createSink, Sink } from "../sink";
import { ObjectStoreClient } from "../sources";
import { isRecordSource, isRecordType, RECORD_MONTHS, RecordSource, RecordType, SyncReport } from "../types";

export type CommandName = "sync" | "metadata" | "zones";

export interface ParsedCliArgs {
  command: CommandName;
  source?: RecordSource;
  recordType: RecordType;
  year?: number;
  months: number[];
  concurrency?: number;
  ignoreHttpsErrors: boolean;
  configPath?: string;
}

export interface CliUsageError {
  error: string;
}

export interface CliDependencies {
  env?: Record<string, string | undefined>;
  fetchFn?: FetchFn;
  objectStore?: ObjectStoreClient;
  now?: () => Date;
}

const HELP_TEXT = `
Usage:
  trip-mirror <command> [options]

Commands:
  sync       Download missing or stale trip files
  metadata   Write a CSV of per-file metadata without downloading payloads
  zones      Download missing or stale taxi zone files
  help       Show this help

Options:
  -s, --source <web|s3>        Remote source (default from config: s3)
  -t, --record-type <type>     fhv, fhvhv, green or yellow (default: yellow)
  -y, --year <n>               Trip year (default: current year)
  -m, --months <n>...          One or more months; repeatable
                               (default: 1 for sync, 1-12 for metadata)
  --concurrency <n>            Files processed in parallel (default: one per CPU)
  --config <path>              Optional path to a JSON config file
  --ignore-https-errors        Ignore TLS certificate errors
  -h, --help                   Show this help
`;

export const EXIT_OK = 0;
export const EXIT_FAILURES = 1;
export const EXIT_USAGE = 2;

function parseCommand(raw: string | undefined): CommandName | undefined {
  if (raw === "sync" || raw === "metadata" || raw === "zones") {
    return raw;
  }
  return undefined;
}

function optionValue(argv: readonly string[], flags: readonly string[]): string | undefined {
  for (let i = argv.length - 1; i >= 0; i -= 1) {
    if (flags.includes(argv[i])) {
      return argv[i + 1];
    }
  }
  return undefined;
}

/** `-m 1 -m 2` and `--months 1 2` both yield ["1", "2"]. */
function optionValues(argv: readonly string[], flags: readonly string[]): string[] {
  const values: string[] = [];
  for (let i = 0; i < argv.length; i += 1) {
    if (!flags.includes(argv[i])) {
      continue;
    }
    let j = i + 1;
    while (j < argv.length && !argv[j].startsWith("-")) {
      values.push(argv[j]);
      j += 1;
    }
  }
  return values;
}

function parseInteger(raw: string): number | undefined {
  return /^-?\d+$/.test(raw.trim()) ? Number.parseInt(raw, 10) : undefined;
}

export function parseCliArgs(argv: string[]): ParsedCliArgs | CliUsageError | "help" {
  if (argv.includes("-h") || argv.includes("--help")) {
    return "help";
  }

  if (argv.length === 0 || argv[0] === "help") {
    return "help";
  }
  const command = parseCommand(argv[0]);
  if (!command) {
    return { error: `unknown command "${argv[0]}"; expected sync, metadata or zones` };
  }

  const sourceRaw = optionValue(argv, ["-s", "--source"]);
  if (sourceRaw !== undefined && !isRecordSource(sourceRaw)) {
    return { error: `--source must be "web" or "s3", got "${sourceRaw}"` };
  }

  const recordTypeRaw = optionValue(argv, ["-t", "--record-type"]) ?? "yellow";
  if (!isRecordType(recordTypeRaw)) {
    return { error: `--record-type must be one of fhv, fhvhv, green, yellow; got "${recordTypeRaw}"` };
  }

  const yearRaw = optionValue(argv, ["-y", "--year"]);
  const year = yearRaw === undefined ? undefined : parseInteger(yearRaw);
  if (yearRaw !== undefined && year === undefined) {
    return { error: `--year must be an integer, got "${yearRaw}"` };
  }

  const monthsRaw = optionValues(argv, ["-m", "--months"]);
  const months: number[] = [];
  for (const raw of monthsRaw) {
    const month = parseInteger(raw);
    if (month === undefined || month < 1 || month > 12) {
      return { error: `--months values must be integers between 1 and 12, got "${raw}"` };
    }
    months.push(month);
  }

  const concurrencyRaw = optionValue(argv, ["--concurrency"]);
  const concurrency = concurrencyRaw === undefined ? undefined : parseInteger(concurrencyRaw);
  if (concurrencyRaw !== undefined && (concurrency === undefined || concurrency < 1)) {
    return { error: `--concurrency must be a positive integer, got "${concurrencyRaw}"` };
  }

  const defaultMonths = command === "metadata" ? [...RECORD_MONTHS] : [RECORD_MONTHS[0]];
  return {
    command,
    source: sourceRaw,
    recordType: recordTypeRaw,
    year,
    months: months.length > 0 ? [...new Set(months)] : defaultMonths,
    concurrency,
    ignoreHttpsErrors: argv.includes("--ignore-https-errors"),
    configPath: optionValue(argv, ["--config"]),
  };
}

export function resolveYear(year: number | undefined, config: AppConfig, now: Date): number | CliUsageError {
  const currentYear = now.getFullYear();
  const resolved = year ?? currentYear;
  if (resolved < config.firstRecordYear || resolved > currentYear) {
    return { error: `--year must be between ${config.firstRecordYear} and ${currentYear}, got ${resolved}` };
  }
  return resolved;
}

function exitCodeFor(report: SyncReport): number {
  return report.counts.failed > 0 ? EXIT_FAILURES : EXIT_OK;
}

export async function runCli(argv: string[], deps: CliDependencies = {}): Promise<number> {
  const parsed = parseCliArgs(argv);
  if (parsed === "help") {
    console.log(getHelpText());
    return EXIT_OK;
  }
  if ("error" in parsed) {
    console.error(`error: ${parsed.error}`);
    return EXIT_USAGE;
  }

  const env = deps.env ?? process.env;
  const now = deps.now ?? (() => new Date());
  const runId = createRunId();
  let config: AppConfig;
  let year: number;
  let sink: Sink;
  try {
    config = loadConfig(parsed.configPath, env);
    if (parsed.ignoreHttpsErrors) {
      config = {
        ...config,
        ignoreHttpsErrors: true,
      };
    }

    const resolvedYear = resolveYear(parsed.year, config, now());
    if (typeof resolvedYear !== "number") {
      console.error(`error: ${resolvedYear.error}`);
      return EXIT_USAGE;
    }
    year = resolvedYear;
    sink = createSink(config, runId, env.SINK_TYPE);
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`error: ${error.message}`);
      return EXIT_USAGE;
    }
    throw error;
  }

  const metrics = new MetricsRegistry();
  const logger = new Logger({ component: "cli", runId }, { minLevel: config.logLevel });
  const context: CommandContext = {
    runId,
    config,
    logger,
    metrics,
    sink,
    fetchFn: deps.fetchFn,
    objectStore: deps.objectStore,
    now,
  };
  const tripArgs = {
    source: parsed.source ?? config.source,
    criteria: { recordType: parsed.recordType, year, months: new Set(parsed.months) },
    concurrency: parsed.concurrency,
  };

  logger.info("command_start", {
    command: parsed.command,
    source: tripArgs.source,
    recordType: parsed.recordType,
    year,
    months: parsed.months,
    concurrency: parsed.concurrency,
    ignoreHttpsErrors: config.ignoreHttpsErrors,
  });

  try {
    let exitCode = EXIT_OK;
    switch (parsed.command) {
      case "sync": {
        const { report } = await runSync({ ...context, logger: logger.child("sync") }, tripArgs);
        exitCode = exitCodeFor(report);
        break;
      }
      case "metadata": {
        const { harvest } = await runMetadata({ ...context, logger: logger.child("metadata") }, tripArgs);
        exitCode = harvest.failures.length > 0 ? EXIT_FAILURES : EXIT_OK;
        break;
      }
      case "zones": {
        const report = await runZones({ ...context, logger: logger.child("zones") }, parsed.concurrency);
        exitCode = exitCodeFor(report);
        break;
      }
    }

    logger.info("command_complete", { command: parsed.command, exitCode });
    return exitCode;
  } catch (error) {
    logger.error("command_failed", { command: parsed.command, error: describeError(error) });
    return EXIT_FAILURES;
  } finally {
    metrics.printSummary();
  }
}

export function getHelpText(): string {
  return HELP_TEXT.trim();
}
