import { processWithConcurrency } from "../core/concurrency";
import { describeError, MetadataError } from "../core/errors";
import { parseTripFileName } from "../discovery/fragment";
import { Logger, MetricsRegistry } from "../observability";
import { FragmentSource } from "../sources/types";
import { Fragment, TripFileMetadata } from "../types";
import { readParquetFooter } from "./parquetFooter";

export interface MetadataHarvestDeps {
  source: FragmentSource;
  logger: Logger;
  metrics?: MetricsRegistry;
  s3BaseUrl: string;
  cloudfrontBaseUrl: string;
}

export interface MetadataFailure {
  fragment: Fragment;
  error: { name: string; message: string };
}

export interface MetadataHarvest {
  rows: TripFileMetadata[];
  failures: MetadataFailure[];
}

function joinUrl(base: string, name: string): string {
  return `${base.endsWith("/") ? base.slice(0, -1) : base}/${name}`;
}

export async function harvestFragmentMetadata(fragment: Fragment, deps: MetadataHarvestDeps): Promise<TripFileMetadata> {
  const identity = parseTripFileName(fragment.name);
  const info = await deps.source.stat(fragment);
  if (info.size === undefined) {
    throw new MetadataError(`Size of ${fragment.path} is unknown; cannot locate the Parquet footer`);
  }

  const footer = await readParquetFooter(
    (offset, length) => deps.source.readRange(fragment, offset, length),
    info.size,
    fragment.path,
  );

  return {
    file_name: fragment.name,
    file_s3_url: joinUrl(deps.s3BaseUrl, fragment.name),
    file_cloudfront_url: joinUrl(deps.cloudfrontBaseUrl, fragment.name),
    file_record_type: identity.recordType,
    file_year: identity.year,
    file_month: identity.month,
    file_modification_time: info.modifiedAt ? info.modifiedAt.toISOString() : "",
    file_num_rows: footer.numRows,
    file_num_columns: footer.columnNames.length,
    file_column_names: footer.columnNames.join(","),
    file_size_bytes: info.size,
    file_size_mbs: info.size / 1024 ** 2,
    file_size_gbs: info.size / 1024 ** 3,
    file_metadata_source: fragment.backend,
  };
}

/** Rows keep the order of `fragments`; failures are collected rather than thrown. */
export async function harvestMetadata(
  fragments: readonly Fragment[],
  concurrency: number,
  deps: MetadataHarvestDeps,
): Promise<MetadataHarvest> {
  const results: Array<TripFileMetadata | undefined> = new Array(fragments.length).fill(undefined);
  const failures: MetadataFailure[] = [];

  await processWithConcurrency(fragments, concurrency, async (fragment, index) => {
    const stopTimer = deps.metrics?.startTimer("metadata_ms");
    try {
      results[index] = await harvestFragmentMetadata(fragment, deps);
      deps.metrics?.incrementCounter("metadata_ok");
      deps.logger.info("metadata_file_ok", { fragment: fragment.path });
    } catch (error) {
      deps.metrics?.incrementCounter("metadata_failed");
      deps.logger.error("metadata_file_failed", { fragment: fragment.path, error: describeError(error) });
      failures.push({
        fragment,
        error: error instanceof Error ? { name: error.name, message: error.message } : { name: "Error", message: String(error) },
      });
    } finally {
      stopTimer?.();
    }
  });

  const rows = results.filter((row): row is TripFileMetadata => row !== undefined);
  return { rows, failures };
}
