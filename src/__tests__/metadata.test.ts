import fs from "node:fs";
import path from "node:path";
import { ParquetSchema, ParquetWriter } from "parquetjs-lite";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { MetadataError } from "../core/errors";
import { createFragment } from "../discovery/fragment";
import {
  formatMetadataCsv,
  harvestFragmentMetadata,
  harvestMetadata,
  metadataFileName,
  readParquetFooter,
  topLevelColumnNames,
  writeMetadataCsv,
} from "../metadata";
import { createSilentLogger, MetricsRegistry } from "../observability";
import { FragmentSource } from "../sources/types";
import { Fragment, RemoteFileInfo, TripFileMetadata } from "../types";
import { makeTempDir, removeDir } from "./helpers";

const S3_BASE = "s3://test-bucket/trip data";
const CDN_BASE = "https://cdn.example.test/trip-data";

/** Serves one local file under every fragment whose name is in `files`. */
class LocalFileSource implements FragmentSource {
  readonly backend = "s3" as const;
  readonly files = new Map<string, { data: Buffer; modifiedAt?: Date; hideSize?: boolean }>();

  async stat(fragment: Fragment): Promise<RemoteFileInfo> {
    const file = this.lookup(fragment);
    return {
      size: file.hideSize ? undefined : file.data.length,
      modifiedAt: file.modifiedAt,
      checksums: {},
    };
  }

  async copyTo(): Promise<number> {
    throw new Error("not used");
  }

  async readRange(fragment: Fragment, offset: number, length: number): Promise<Buffer> {
    return this.lookup(fragment).data.subarray(offset, offset + length);
  }

  private lookup(fragment: Fragment) {
    const file = this.files.get(fragment.name);
    if (!file) {
      throw new Error(`no such file ${fragment.name}`);
    }
    return file;
  }
}

let dir: string;
let parquetBytes: Buffer;

beforeAll(async () => {
  dir = makeTempDir();
  const filePath = path.join(dir, "fixture.parquet");
  const schema = new ParquetSchema({
    vendor_id: { type: "UTF8" },
    fare_amount: { type: "DOUBLE" },
    passenger_count: { type: "INT64", optional: true },
  });
  const writer = await ParquetWriter.openFile(schema, filePath);
  await writer.appendRow({ vendor_id: "A", fare_amount: 12.5, passenger_count: 1 });
  await writer.appendRow({ vendor_id: "B", fare_amount: 7.25 });
  await writer.appendRow({ vendor_id: "C", fare_amount: 30, passenger_count: 3 });
  await writer.close();
  parquetBytes = fs.readFileSync(filePath);
});

afterAll(() => {
  removeDir(dir);
});

function readFromBuffer(data: Buffer) {
  return async (offset: number, length: number) => data.subarray(offset, offset + length);
}

describe("topLevelColumnNames", () => {
  it("skips the members of nested groups", () => {
    expect(
      topLevelColumnNames([
        { name: "root", num_children: 3 },
        { name: "a" },
        { name: "g", num_children: 2 },
        { name: "x" },
        { name: "inner", num_children: 1 },
        { name: "y" },
        { name: "b" },
      ]),
    ).toEqual(["a", "g", "b"]);
    expect(topLevelColumnNames([])).toEqual([]);
  });
});

describe("readParquetFooter", () => {
  it("reads the row count and columns from the footer", async () => {
    const footer = await readParquetFooter(readFromBuffer(parquetBytes), parquetBytes.length, "fixture");
    expect(footer).toEqual({ numRows: 3, columnNames: ["vendor_id", "fare_amount", "passenger_count"] });
  });

  it("rejects files too small to hold a footer", async () => {
    await expect(readParquetFooter(readFromBuffer(Buffer.from("PAR1")), 4, "tiny")).rejects.toThrow(
      "tiny is too small to be a Parquet file (4 bytes)",
    );
  });

  it("rejects data without the Parquet trailer", async () => {
    const data = Buffer.from("this is certainly not a parquet file");
    await expect(readParquetFooter(readFromBuffer(data), data.length, "text")).rejects.toBeInstanceOf(MetadataError);
  });
});

describe("harvestMetadata", () => {
  const modifiedAt = new Date("2023-04-01T00:00:00Z");

  function makeSource(): LocalFileSource {
    const source = new LocalFileSource();
    source.files.set("yellow_tripdata_2023-03.parquet", { data: parquetBytes, modifiedAt });
    source.files.set("yellow_tripdata_2023-04.parquet", { data: parquetBytes });
    source.files.set("yellow_tripdata_2023-05.parquet", { data: parquetBytes, hideSize: true });
    return source;
  }

  function deps(source: FragmentSource, metrics = new MetricsRegistry()) {
    return { source, logger: createSilentLogger(), metrics, s3BaseUrl: S3_BASE, cloudfrontBaseUrl: `${CDN_BASE}/` };
  }

  it("builds a row from the footer and the remote info", async () => {
    const row = await harvestFragmentMetadata(createFragment("trip data/yellow_tripdata_2023-03.parquet", "s3"), deps(makeSource()));

    expect(row).toEqual({
      file_name: "yellow_tripdata_2023-03.parquet",
      file_s3_url: `${S3_BASE}/yellow_tripdata_2023-03.parquet`,
      file_cloudfront_url: `${CDN_BASE}/yellow_tripdata_2023-03.parquet`,
      file_record_type: "yellow",
      file_year: 2023,
      file_month: 3,
      file_modification_time: "2023-04-01T00:00:00.000Z",
      file_num_rows: 3,
      file_num_columns: 3,
      file_column_names: "vendor_id,fare_amount,passenger_count",
      file_size_bytes: parquetBytes.length,
      file_size_mbs: parquetBytes.length / 1024 ** 2,
      file_size_gbs: parquetBytes.length / 1024 ** 3,
      file_metadata_source: "s3",
    });
  });

  it("keeps discovery order and collects failures", async () => {
    const metrics = new MetricsRegistry();
    const fragments = [
      createFragment("trip data/yellow_tripdata_2023-04.parquet", "s3"),
      createFragment("trip data/yellow_tripdata_2023-05.parquet", "s3"),
      createFragment("trip data/yellow_tripdata_2023-03.parquet", "s3"),
      createFragment("trip data/taxi_zone_lookup.csv", "s3"),
    ];

    const harvest = await harvestMetadata(fragments, 2, deps(makeSource(), metrics));

    expect(harvest.rows.map((row) => [row.file_month, row.file_modification_time])).toEqual([
      [4, ""],
      [3, "2023-04-01T00:00:00.000Z"],
    ]);
    expect(harvest.failures.map((failure) => [failure.fragment.name, failure.error.name])).toEqual(
      expect.arrayContaining([
        ["yellow_tripdata_2023-05.parquet", "MetadataError"],
        ["taxi_zone_lookup.csv", "ParseError"],
      ]),
    );
    expect(harvest.failures).toHaveLength(2);
    expect(metrics.getCounter("metadata_ok")).toBe(2);
    expect(metrics.getCounter("metadata_failed")).toBe(2);
  });
});

describe("metadata CSV", () => {
  const row: TripFileMetadata = {
    file_name: "yellow_tripdata_2023-03.parquet",
    file_s3_url: `${S3_BASE}/yellow_tripdata_2023-03.parquet`,
    file_cloudfront_url: `${CDN_BASE}/yellow_tripdata_2023-03.parquet`,
    file_record_type: "yellow",
    file_year: 2023,
    file_month: 3,
    file_modification_time: "2023-04-01T00:00:00.000Z",
    file_num_rows: 42,
    file_num_columns: 2,
    file_column_names: "vendor_id,fare",
    file_size_bytes: 524_288,
    file_size_mbs: 0.5,
    file_size_gbs: 0.00048828125,
    file_metadata_source: "s3",
  };

  const expected = [
    "file_name,file_s3_url,file_cloudfront_url,file_record_type,file_year,file_month,file_modification_time," +
      "file_num_rows,file_num_columns,file_column_names,file_size_bytes,file_size_mbs,file_size_gbs,file_metadata_source",
    `yellow_tripdata_2023-03.parquet,${S3_BASE}/yellow_tripdata_2023-03.parquet,${CDN_BASE}/yellow_tripdata_2023-03.parquet,` +
      'yellow,2023,3,2023-04-01T00:00:00.000Z,42,2,"vendor_id,fare",524288,0.5,0.00048828125,s3',
    "",
  ].join("\n");

  it("writes a header and quotes the column list", () => {
    expect(formatMetadataCsv([row])).toBe(expected);
  });

  it("names the file after the day, source, type and year", () => {
    expect(metadataFileName(new Date(2024, 0, 5, 12), "web", "yellow", 2023)).toBe(
      "2024-01-05_web_yellow_tripmetadata_2023.csv",
    );
  });

  it("creates the directory and writes the file", async () => {
    const target = path.join(dir, "nested", "metadata");
    const filePath = await writeMetadataCsv(target, "out.csv", [row]);

    expect(filePath).toBe(path.join(path.resolve(target), "out.csv"));
    expect(fs.readFileSync(filePath, "utf-8")).toBe(expected);
  });
});
