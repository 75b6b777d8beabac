import { ParseError } from "../core/errors";
import { Fragment, FragmentBackend, ListingInfo, TripFileIdentity } from "../types";

const HIVE_SEGMENT = /^([^=/]+)=([^/]*)$/;

function isAbsoluteUrl(value: string): boolean {
  return /^https?:\/\//i.test(value);
}

/** Object keys are taken literally; only URL paths are percent-decoded. */
function pathSegments(fragmentPath: string): string[] {
  if (!isAbsoluteUrl(fragmentPath)) {
    return fragmentPath.split("/").filter((segment) => segment.length > 0);
  }
  return new URL(fragmentPath).pathname
    .split("/")
    .filter((segment) => segment.length > 0)
    .map((segment) => {
      try {
        return decodeURIComponent(segment);
      } catch {
        return segment;
      }
    });
}

export function fragmentBasename(fragmentPath: string): string {
  const segments = pathSegments(fragmentPath);
  return segments[segments.length - 1] ?? "";
}

export function fileExtension(name: string): string {
  const dot = name.lastIndexOf(".");
  return dot <= 0 ? "" : name.slice(dot + 1).toLowerCase();
}

/** `a/recordType=yellow/year=2023/file.parquet` -> `{ recordType: "yellow", year: "2023" }` */
export function parseHivePartitions(fragmentPath: string): Record<string, string> {
  const partitions: Record<string, string> = {};
  const segments = pathSegments(fragmentPath);
  for (const segment of segments.slice(0, -1)) {
    const match = HIVE_SEGMENT.exec(segment);
    if (match) {
      partitions[match[1]] = match[2];
    }
  }
  return partitions;
}

export function createFragment(fragmentPath: string, backend: FragmentBackend, listing?: ListingInfo): Fragment {
  return {
    path: fragmentPath,
    name: fragmentBasename(fragmentPath),
    backend,
    partitions: parseHivePartitions(fragmentPath),
    listing,
  };
}

/**
 * Parses `{type}_tripdata_{year}-{month}.{ext}`; `_`, `.` and `-` all separate tokens.
 * The extension is whatever follows the month, so `csv.gz` stays whole.
 */
export function parseTripFileName(name: string): TripFileIdentity {
  const tokens = name.split(/[_.-]/);
  if (tokens.length < 5) {
    throw new ParseError(name, `expected at least 5 tokens, found ${tokens.length}`);
  }

  const [recordType, marker, yearToken, monthToken] = tokens;
  const extensionStart = recordType.length + marker.length + yearToken.length + monthToken.length + 4;
  const extension = name.slice(extensionStart);
  if (!recordType) {
    throw new ParseError(name, "record type is empty");
  }
  if (marker !== "tripdata") {
    throw new ParseError(name, `expected "tripdata", found "${marker}"`);
  }
  if (!/^\d{4}$/.test(yearToken)) {
    throw new ParseError(name, `year "${yearToken}" is not a 4-digit number`);
  }
  if (!/^\d{1,2}$/.test(monthToken)) {
    throw new ParseError(name, `month "${monthToken}" is not a number`);
  }
  const month = Number.parseInt(monthToken, 10);
  if (month < 1 || month > 12) {
    throw new ParseError(name, `month ${month} is out of range`);
  }
  if (!extension) {
    throw new ParseError(name, "extension is empty");
  }

  return {
    recordType,
    year: Number.parseInt(yearToken, 10),
    month,
    extension,
  };
}

export function buildTripFileUrl(baseUrl: string, recordType: string, year: number, month: number): string {
  const trimmed = baseUrl.endsWith("/") ? baseUrl.slice(0, -1) : baseUrl;
  return `${trimmed}/${recordType}_tripdata_${year}-${String(month).padStart(2, "0")}.parquet`;
}
