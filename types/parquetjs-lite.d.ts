declare module "parquetjs-lite" {
  export type Int64Like = number | { valueOf(): number };

  export interface ParquetSchemaElement {
    name: string;
    num_children?: number | null;
  }

  export interface ParquetFileMetaData {
    version: number;
    num_rows: Int64Like;
    schema: ParquetSchemaElement[];
    created_by?: string | null;
  }

  export class ParquetEnvelopeReader {
    constructor(
      readFn: (offset: number, length: number) => Promise<Buffer>,
      closeFn: () => unknown,
      fileSize: number,
    );
    readHeader(): Promise<void>;
    readFooter(): Promise<ParquetFileMetaData>;
    close(): unknown;
  }

  export type ParquetFieldType = "UTF8" | "INT32" | "INT64" | "DOUBLE" | "FLOAT" | "BOOLEAN" | "TIMESTAMP_MILLIS";

  export interface ParquetFieldDefinition {
    type: ParquetFieldType;
    optional?: boolean;
  }

  export class ParquetSchema {
    constructor(fields: Record<string, ParquetFieldDefinition>);
  }

  export class ParquetWriter {
    static openFile(schema: ParquetSchema, path: string): Promise<ParquetWriter>;
    appendRow(row: Record<string, unknown>): Promise<void>;
    close(): Promise<void>;
  }
}
