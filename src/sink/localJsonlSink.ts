import fs from "node:fs";
import path from "node:path";
import { SyncOutcome } from "../types";
import { Sink } from "./types";

export function serializeOutcome(outcome: SyncOutcome, runId: string, recordedAt: string): Record<string, unknown> {
  const base = {
    runId,
    recordedAt,
    status: outcome.status,
    path: outcome.fragment.path,
    name: outcome.fragment.name,
    backend: outcome.fragment.backend,
    destination: outcome.destination,
  };

  switch (outcome.status) {
    case "skipped":
      return { ...base, reason: outcome.reason };
    case "downloaded":
    case "updated":
      return { ...base, bytes: outcome.bytes };
    case "failed":
      return { ...base, error: outcome.error };
  }
}

export class LocalJsonlSink implements Sink {
  private readonly outcomesPath: string;
  private readonly runId: string;

  constructor(manifestsDir: string, runId: string) {
    const absoluteDir = path.resolve(manifestsDir);
    fs.mkdirSync(absoluteDir, { recursive: true });
    this.outcomesPath = path.join(absoluteDir, "sync-outcomes.jsonl");
    this.runId = runId;
  }

  async publishSyncOutcomes(outcomes: readonly SyncOutcome[]): Promise<void> {
    const recordedAt = new Date().toISOString();
    await this.appendLines(outcomes.map((outcome) => serializeOutcome(outcome, this.runId, recordedAt)));
  }

  private async appendLines(records: unknown[]): Promise<void> {
    if (records.length === 0) {
      return;
    }

    const content = records.map((record) => JSON.stringify(record)).join("\n") + "\n";
    await fs.promises.appendFile(this.outcomesPath, content, "utf-8");
  }
}
