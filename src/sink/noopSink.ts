import { SyncOutcome } from "../types";
import { Sink } from "./types";

export class NoopSink implements Sink {
  async publishSyncOutcomes(_outcomes: readonly SyncOutcome[]): Promise<void> {
    return;
  }
}
