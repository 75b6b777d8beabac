import { ParquetEnvelopeReader, ParquetSchemaElement } from "parquetjs-lite";
import { describeError, MetadataError } from "../core/errors";

export interface ParquetFooterSummary {
  numRows: number;
  columnNames: string[];
}

// "PAR1" magic at both ends plus the 4-byte footer length.
const MIN_PARQUET_SIZE = 12;

function subtreeSize(elements: readonly ParquetSchemaElement[], start: number): number {
  let size = 1;
  const children = elements[start]?.num_children ?? 0;
  for (let child = 0; child < children; child += 1) {
    size += subtreeSize(elements, start + size);
  }
  return size;
}

/** Names of the root's direct children; nested group members are skipped. */
export function topLevelColumnNames(schema: readonly ParquetSchemaElement[]): string[] {
  if (schema.length === 0) {
    return [];
  }

  const names: string[] = [];
  const rootChildren = schema[0].num_children ?? 0;
  let index = 1;
  for (let child = 0; child < rootChildren && index < schema.length; child += 1) {
    names.push(schema[index].name);
    index += subtreeSize(schema, index);
  }
  return names;
}

/**
 * Reads only the trailer and the footer of a Parquet file through `read`, which must return
 * exactly `length` bytes starting at `offset`.
 */
export async function readParquetFooter(
  read: (offset: number, length: number) => Promise<Buffer>,
  fileSize: number,
  label: string,
): Promise<ParquetFooterSummary> {
  if (fileSize < MIN_PARQUET_SIZE) {
    throw new MetadataError(`${label} is too small to be a Parquet file (${fileSize} bytes)`);
  }

  const reader = new ParquetEnvelopeReader(read, () => undefined, fileSize);
  try {
    const metadata = await reader.readFooter();
    return {
      numRows: Number(metadata.num_rows),
      columnNames: topLevelColumnNames(metadata.schema),
    };
  } catch (error) {
    throw new MetadataError(`Cannot read Parquet footer of ${label}: ${describeError(error)}`, { cause: error });
  }
}
