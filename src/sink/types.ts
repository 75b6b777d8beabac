import { SyncOutcome } from "../types";

export interface Sink {
  publishSyncOutcomes(outcomes: readonly SyncOutcome[]): Promise<void>;
}
