import { AppConfig } from "../config";
import { ConfigError } from "../core/errors";
import { LocalJsonlSink } from "./localJsonlSink";
import { NoopSink } from "./noopSink";
import { Sink } from "./types";

export function createSink(config: AppConfig, runId: string, sinkTypeRaw: string | undefined): Sink {
  const sinkType = (sinkTypeRaw ?? "local_jsonl").toLowerCase();

  switch (sinkType) {
    case "local_jsonl":
      return new LocalJsonlSink(config.outputDirs.manifests, runId);
    case "none":
      return new NoopSink();
    default:
      throw new ConfigError([`unsupported sink type: ${sinkType}`]);
  }
}

export { LocalJsonlSink, serializeOutcome } from "./localJsonlSink";
export { NoopSink } from "./noopSink";
export * from "./types";
