export const RECORD_SOURCES = ["web", "s3"] as const;
export type RecordSource = (typeof RECORD_SOURCES)[number];

export const RECORD_TYPES = ["fhv", "fhvhv", "green", "yellow"] as const;
export type RecordType = (typeof RECORD_TYPES)[number];

export const RECORD_MONTHS = [1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12] as const;

export function isRecordSource(value: unknown): value is RecordSource {
  return RECORD_SOURCES.some((source) => source === value);
}

export function isRecordType(value: unknown): value is RecordType {
  return RECORD_TYPES.some((recordType) => recordType === value);
}

export type FragmentBackend = RecordSource;

/** Size and modification time reported by a listing, when the backend returns them. */
export interface ListingInfo {
  size?: number;
  modifiedAt?: Date;
  etag?: string;
}

/** A remote file handle: an object key for s3, an absolute URL for web. */
export interface Fragment {
  path: string;
  name: string;
  backend: FragmentBackend;
  partitions: Record<string, string>;
  listing?: ListingInfo;
}

export interface TripFileIdentity {
  recordType: string;
  year: number;
  month: number;
  extension: string;
}

export interface ChecksumHints {
  etag?: string;
  contentMd5?: string;
  digest?: string;
}

export interface RemoteFileInfo {
  url?: string;
  resolvedUrl?: string;
  /** Absent when the server gave no reliable length. */
  size?: number;
  mimeType?: string;
  modifiedAt?: Date;
  checksums: ChecksumHints;
}

export interface SelectionCriteria {
  recordType: RecordType;
  year: number;
  months: ReadonlySet<number>;
}

export type SyncDecision = "skip" | "create" | "update";

interface OutcomeBase {
  fragment: Fragment;
  destination: string;
}

export type SyncOutcome =
  | (OutcomeBase & { status: "skipped"; reason: "up_to_date" | "freshness_unknown" })
  | (OutcomeBase & { status: "downloaded"; bytes: number })
  | (OutcomeBase & { status: "updated"; bytes: number })
  | (OutcomeBase & { status: "failed"; error: { name: string; message: string } });

export type SyncStatus = SyncOutcome["status"];

export interface SyncReport {
  outcomes: SyncOutcome[];
  counts: Record<SyncStatus, number>;
}

export interface TripFileMetadata {
  file_name: string;
  file_s3_url: string;
  file_cloudfront_url: string;
  file_record_type: string;
  file_year: number;
  file_month: number;
  file_modification_time: string;
  file_num_rows: number;
  file_num_columns: number;
  file_column_names: string;
  file_size_bytes: number;
  file_size_mbs: number;
  file_size_gbs: number;
  file_metadata_source: FragmentBackend;
}

export const METADATA_COLUMNS: ReadonlyArray<keyof TripFileMetadata> = [
  "file_name",
  "file_s3_url",
  "file_cloudfront_url",
  "file_record_type",
  "file_year",
  "file_month",
  "file_modification_time",
  "file_num_rows",
  "file_num_columns",
  "file_column_names",
  "file_size_bytes",
  "file_size_mbs",
  "file_size_gbs",
  "file_metadata_source",
];
