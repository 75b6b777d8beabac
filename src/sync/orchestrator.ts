import fs from "node:fs";
import path from "node:path";
import { processWithConcurrency, resolveConcurrency } from "../core/concurrency";
import { describeError, TransferError } from "../core/errors";
import { Logger, MetricsRegistry } from "../observability";
import { FragmentSource } from "../sources/types";
import { Fragment, SyncDecision, SyncOutcome, SyncReport, SyncStatus } from "../types";

export interface SyncOptions {
  localRoot: string;
  /** Fragments in flight at once; 0 or undefined means one per CPU. */
  concurrency?: number;
  chunkSize: number;
  transferThreads: number;
}

export interface SyncDeps {
  source: FragmentSource;
  logger: Logger;
  metrics?: MetricsRegistry;
}

export interface LocalFileState {
  exists: boolean;
  modifiedAt?: Date;
}

const STATUS_COUNTERS = {
  skipped: "files_skipped",
  downloaded: "files_downloaded",
  updated: "files_updated",
  failed: "files_failed",
} as const;

/**
 * Missing files are created. An existing file is refreshed only when both timestamps are
 * known and the remote one is strictly newer; unknown freshness never triggers a transfer.
 */
export function decideSync(local: LocalFileState, remoteModifiedAt?: Date): SyncDecision {
  if (!local.exists) {
    return "create";
  }
  if (local.modifiedAt && remoteModifiedAt && remoteModifiedAt.getTime() > local.modifiedAt.getTime()) {
    return "update";
  }
  return "skip";
}

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export async function readLocalFileState(filePath: string): Promise<LocalFileState> {
  try {
    const stats = await fs.promises.stat(filePath);
    return { exists: true, modifiedAt: stats.mtime };
  } catch (error) {
    if (isMissingFileError(error)) {
      return { exists: false };
    }
    throw error;
  }
}

function toOutcomeError(error: unknown): { name: string; message: string } {
  if (error instanceof Error) {
    return { name: error.name, message: error.message };
  }
  return { name: "Error", message: String(error) };
}

/** Copies into `<destination>.part` and renames, so a destination is never half-written. */
async function transfer(
  fragment: Fragment,
  destination: string,
  knownSize: number | undefined,
  options: SyncOptions,
  deps: SyncDeps,
): Promise<number> {
  const tempPath = `${destination}.part`;
  const stopTimer = deps.metrics?.startTimer("transfer_ms");

  try {
    const bytes = await deps.source.copyTo(fragment, tempPath, {
      chunkSize: options.chunkSize,
      threads: options.transferThreads,
      knownSize,
    });
    await fs.promises.rename(tempPath, destination);
    return bytes;
  } catch (error) {
    await fs.promises.rm(tempPath, { force: true });
    if (error instanceof TransferError) {
      throw error;
    }
    throw new TransferError(fragment.path, "Transfer failed", error);
  } finally {
    stopTimer?.();
  }
}

export async function syncFragment(fragment: Fragment, options: SyncOptions, deps: SyncDeps): Promise<SyncOutcome> {
  const destination = path.resolve(options.localRoot, fragment.name);
  const fields = { fragment: fragment.path, destination };

  try {
    if (!fragment.name) {
      throw new TransferError(fragment.path, "Fragment has no file name");
    }
    await fs.promises.mkdir(path.dirname(destination), { recursive: true });

    const remote = await deps.source.stat(fragment);
    const local = await readLocalFileState(destination);
    const decision = decideSync(local, remote.modifiedAt);

    if (decision === "skip") {
      const reason = local.modifiedAt && remote.modifiedAt ? "up_to_date" : "freshness_unknown";
      deps.logger.info("sync_file_skipped", { ...fields, reason });
      return { status: "skipped", fragment, destination, reason };
    }

    deps.logger.info(decision === "create" ? "sync_file_missing_downloading" : "sync_file_stale_updating", {
      ...fields,
      remoteModifiedAt: remote.modifiedAt?.toISOString(),
      localModifiedAt: local.modifiedAt?.toISOString(),
    });
    const bytes = await transfer(fragment, destination, remote.size, options, deps);
    deps.logger.info("sync_file_transferred", { ...fields, bytes });

    return decision === "create"
      ? { status: "downloaded", fragment, destination, bytes }
      : { status: "updated", fragment, destination, bytes };
  } catch (error) {
    deps.logger.error("sync_file_failed", { ...fields, error: describeError(error) });
    return { status: "failed", fragment, destination, error: toOutcomeError(error) };
  }
}

export function summarizeOutcomes(outcomes: readonly SyncOutcome[]): Record<SyncStatus, number> {
  const counts: Record<SyncStatus, number> = { skipped: 0, downloaded: 0, updated: 0, failed: 0 };
  for (const outcome of outcomes) {
    counts[outcome.status] += 1;
  }
  return counts;
}

/**
 * Syncs every fragment on a bounded pool. A failing fragment becomes a `failed` outcome and
 * never stops its siblings. Two fragments that map to the same local file are not both
 * transferred: every one after the first fails.
 */
export async function syncFragments(
  fragments: readonly Fragment[],
  options: SyncOptions,
  deps: SyncDeps,
): Promise<SyncReport> {
  const outcomes: SyncOutcome[] = [];
  const claimed = new Set<string>();
  const runnable: Fragment[] = [];

  for (const fragment of fragments) {
    const destination = path.resolve(options.localRoot, fragment.name);
    if (claimed.has(destination)) {
      deps.logger.error("sync_duplicate_destination", { fragment: fragment.path, destination });
      outcomes.push({
        status: "failed",
        fragment,
        destination,
        error: { name: "TransferError", message: `Another fragment already targets ${destination}` },
      });
      continue;
    }
    claimed.add(destination);
    runnable.push(fragment);
  }

  const concurrency = resolveConcurrency(options.concurrency);
  deps.logger.info("sync_start", { fragments: runnable.length, concurrency, localRoot: options.localRoot });

  await processWithConcurrency(runnable, concurrency, async (fragment) => {
    outcomes.push(await syncFragment(fragment, options, deps));
  });

  for (const outcome of outcomes) {
    deps.metrics?.incrementCounter(STATUS_COUNTERS[outcome.status]);
  }

  const counts = summarizeOutcomes(outcomes);
  deps.logger.info("sync_complete", { ...counts });
  return { outcomes, counts };
}
