import fs from "node:fs";
import path from "node:path";
import Papa from "papaparse";
import { METADATA_COLUMNS, RecordSource, TripFileMetadata } from "../types";

export function formatMetadataCsv(rows: readonly TripFileMetadata[]): string {
  const csv = Papa.unparse(
    {
      fields: [...METADATA_COLUMNS],
      data: rows.map((row) => METADATA_COLUMNS.map((column) => row[column])),
    },
    { newline: "\n" },
  );
  return `${csv}\n`;
}

function isoDate(date: Date): string {
  const month = String(date.getMonth() + 1).padStart(2, "0");
  const day = String(date.getDate()).padStart(2, "0");
  return `${date.getFullYear()}-${month}-${day}`;
}

export function metadataFileName(date: Date, source: RecordSource, recordType: string, year: number): string {
  return `${isoDate(date)}_${source}_${recordType}_tripmetadata_${year}.csv`;
}

export async function writeMetadataCsv(directory: string, fileName: string, rows: readonly TripFileMetadata[]): Promise<string> {
  const absoluteDir = path.resolve(directory);
  await fs.promises.mkdir(absoluteDir, { recursive: true });
  const filePath = path.join(absoluteDir, fileName);
  await fs.promises.writeFile(filePath, formatMetadataCsv(rows), "utf-8");
  return filePath;
}
