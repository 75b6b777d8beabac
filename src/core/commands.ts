import { AppConfig } from "../config";
import { discoverFragments, SourceDescriptor } from "../discovery";
import { createFragment } from "../discovery/fragment";
import { FragmentSelection, selectFragments } from "../filter";
import { harvestMetadata, MetadataHarvest, metadataFileName, writeMetadataCsv } from "../metadata";
import { Logger, MetricsRegistry } from "../observability";
import { RemoteInfoProber } from "../probe/remoteInfo";
import { Sink } from "../sink";
import { AwsS3ObjectStoreClient, FragmentSource, ObjectStoreClient, S3FragmentSource, WebFragmentSource } from "../sources";
import { syncFragments } from "../sync";
import { RecordSource, SelectionCriteria, SyncReport } from "../types";
import { resolveConcurrency } from "./concurrency";
import { FetchFn, HttpSettings } from "./fetch";

export interface CommandContext {
  runId: string;
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  sink: Sink;
  fetchFn?: FetchFn;
  objectStore?: ObjectStoreClient;
  now?: () => Date;
}

export interface TripCommandArgs {
  source: RecordSource;
  criteria: SelectionCriteria;
  concurrency?: number;
}

export interface TripSyncResult {
  report: SyncReport;
  selection: FragmentSelection;
}

export interface MetadataResult {
  filePath: string;
  harvest: MetadataHarvest;
  selection: FragmentSelection;
}

type Purpose = "sync" | "metadata";

function httpSettings(config: AppConfig): HttpSettings {
  return { userAgent: config.userAgent, ignoreHttpsErrors: config.ignoreHttpsErrors };
}

function getObjectStore(ctx: CommandContext): ObjectStoreClient {
  ctx.objectStore ??= AwsS3ObjectStoreClient.fromSettings(ctx.config.aws);
  return ctx.objectStore;
}

export function createFragmentSource(ctx: CommandContext, source: RecordSource): FragmentSource {
  if (source === "s3") {
    return new S3FragmentSource({ objectStore: getObjectStore(ctx), bucket: ctx.config.s3Bucket });
  }

  const prober = new RemoteInfoProber({
    http: httpSettings(ctx.config),
    timeoutMs: ctx.config.requestTimeoutMs,
    logger: ctx.logger.child("probe"),
    metrics: ctx.metrics,
    fetchFn: ctx.fetchFn,
  });
  return new WebFragmentSource({
    prober,
    http: httpSettings(ctx.config),
    requestTimeoutMs: ctx.config.requestTimeoutMs,
    downloadTimeoutMs: ctx.config.downloadTimeoutMs,
    fetchFn: ctx.fetchFn,
  });
}

/**
 * Trip files are mirrored from templated CloudFront URLs on the web source, while metadata
 * is harvested from the links published on the trip record page.
 */
export function describeSource(config: AppConfig, args: TripCommandArgs, purpose: Purpose): SourceDescriptor {
  if (args.source === "s3") {
    return { kind: "s3", bucket: config.s3Bucket, prefix: config.s3Prefix, format: config.datasetFormat };
  }
  if (purpose === "sync") {
    return {
      kind: "web_template",
      baseUrl: config.cloudfrontBaseUrl,
      recordType: args.criteria.recordType,
      year: args.criteria.year,
      months: args.criteria.months,
    };
  }
  return {
    kind: "web_page",
    pageUrl: config.webPageUrl,
    selector: config.webFileCssSelector,
    format: config.datasetFormat,
  };
}

async function discoverSelection(ctx: CommandContext, args: TripCommandArgs, purpose: Purpose): Promise<FragmentSelection> {
  const descriptor = describeSource(ctx.config, args, purpose);
  const fragments = await discoverFragments(descriptor, {
    http: httpSettings(ctx.config),
    timeoutMs: ctx.config.requestTimeoutMs,
    logger: ctx.logger.child("discovery"),
    metrics: ctx.metrics,
    fetchFn: ctx.fetchFn,
    objectStore: descriptor.kind === "s3" ? getObjectStore(ctx) : undefined,
  });

  const selection = selectFragments(fragments, args.criteria);
  for (const { fragment, error } of selection.unparsed) {
    ctx.logger.warn("fragment_name_unparsed", { fragment: fragment.path, error: error.message });
  }
  ctx.metrics.incrementCounter("fragments_selected", selection.selected.length);
  ctx.metrics.incrementCounter("fragments_unparsed", selection.unparsed.length);
  ctx.logger.info("fragments_selected", {
    discovered: fragments.length,
    selected: selection.selected.length,
    rejected: selection.rejected.length,
    unparsed: selection.unparsed.length,
  });
  return selection;
}

export async function runSync(ctx: CommandContext, args: TripCommandArgs): Promise<TripSyncResult> {
  ctx.logger.info("sync_command_start", {
    source: args.source,
    recordType: args.criteria.recordType,
    year: args.criteria.year,
    months: [...args.criteria.months],
  });

  const selection = await discoverSelection(ctx, args, "sync");
  const report = await syncFragments(
    selection.selected,
    {
      localRoot: ctx.config.outputDirs.tripsData,
      concurrency: args.concurrency ?? ctx.config.syncConcurrency,
      chunkSize: ctx.config.downloadChunkSize,
      transferThreads: ctx.config.transferThreads,
    },
    {
      source: createFragmentSource(ctx, args.source),
      logger: ctx.logger.child("sync"),
      metrics: ctx.metrics,
    },
  );
  await ctx.sink.publishSyncOutcomes(report.outcomes);

  ctx.logger.info("sync_command_complete", { ...report.counts, unparsed: selection.unparsed.length });
  return { report, selection };
}

export async function runMetadata(ctx: CommandContext, args: TripCommandArgs): Promise<MetadataResult> {
  ctx.logger.info("metadata_command_start", {
    source: args.source,
    recordType: args.criteria.recordType,
    year: args.criteria.year,
  });

  const selection = await discoverSelection(ctx, args, "metadata");
  const concurrency =
    args.concurrency ?? (args.source === "web" ? ctx.config.webMetadataConcurrency : resolveConcurrency(ctx.config.syncConcurrency));
  const harvest = await harvestMetadata(selection.selected, concurrency, {
    source: createFragmentSource(ctx, args.source),
    logger: ctx.logger.child("metadata"),
    metrics: ctx.metrics,
    s3BaseUrl: ctx.config.s3BaseUrl,
    cloudfrontBaseUrl: ctx.config.cloudfrontBaseUrl,
  });

  const now = ctx.now?.() ?? new Date();
  const fileName = metadataFileName(now, args.source, args.criteria.recordType, args.criteria.year);
  const filePath = await writeMetadataCsv(ctx.config.outputDirs.metadata, fileName, harvest.rows);

  ctx.logger.info("metadata_command_complete", {
    path: filePath,
    rows: harvest.rows.length,
    failed: harvest.failures.length,
  });
  return { filePath, harvest, selection };
}

/** Zone lookup files carry no trip naming, so they skip selection and go straight to sync. */
export async function runZones(ctx: CommandContext, concurrency?: number): Promise<SyncReport> {
  ctx.logger.info("zones_command_start", { urls: ctx.config.zoneUrls.length });

  const fragments = ctx.config.zoneUrls.map((url) => createFragment(url, "web"));
  const report = await syncFragments(
    fragments,
    {
      localRoot: ctx.config.outputDirs.zonesData,
      concurrency: concurrency ?? ctx.config.syncConcurrency,
      chunkSize: ctx.config.downloadChunkSize,
      transferThreads: ctx.config.transferThreads,
    },
    {
      source: createFragmentSource(ctx, "web"),
      logger: ctx.logger.child("zones"),
      metrics: ctx.metrics,
    },
  );
  await ctx.sink.publishSyncOutcomes(report.outcomes);

  ctx.logger.info("zones_command_complete", { ...report.counts });
  return report;
}
