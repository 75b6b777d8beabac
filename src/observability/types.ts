export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogFields {
  url?: string;
  path?: string;
  fragment?: string;
  destination?: string;
  error?: string;
  [key: string]: unknown;
}

export type MetricCounterName =
  | "fragments_discovered"
  | "fragments_selected"
  | "fragments_unparsed"
  | "probe_get_fallbacks"
  | "files_downloaded"
  | "files_updated"
  | "files_skipped"
  | "files_failed"
  | "metadata_ok"
  | "metadata_failed";

export type MetricTimerName = "discovery_ms" | "probe_ms" | "transfer_ms" | "metadata_ms";
