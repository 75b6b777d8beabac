import fs from "node:fs";
import { processWithConcurrency } from "../core/concurrency";
import { NotFoundError, TransferError } from "../core/errors";
import { Fragment, RemoteFileInfo } from "../types";
import { ObjectStoreClient } from "./objectStore";
import { CopyOptions, FragmentSource } from "./types";

export interface S3FragmentSourceDeps {
  objectStore: ObjectStoreClient;
  bucket: string;
}

export function splitRanges(size: number, chunkSize: number): Array<[number, number]> {
  const ranges: Array<[number, number]> = [];
  for (let start = 0; start < size; start += chunkSize) {
    ranges.push([start, Math.min(start + chunkSize, size) - 1]);
  }
  return ranges;
}

export class S3FragmentSource implements FragmentSource {
  readonly backend = "s3" as const;
  private readonly deps: S3FragmentSourceDeps;

  constructor(deps: S3FragmentSourceDeps) {
    this.deps = deps;
  }

  private objectUrl(fragment: Fragment): string {
    return `s3://${this.deps.bucket}/${fragment.path}`;
  }

  /** Uses the listing when it already carries size and modification time. */
  async stat(fragment: Fragment): Promise<RemoteFileInfo> {
    const listing = fragment.listing;
    if (listing?.size !== undefined && listing.modifiedAt) {
      return {
        url: this.objectUrl(fragment),
        resolvedUrl: this.objectUrl(fragment),
        size: listing.size,
        modifiedAt: listing.modifiedAt,
        checksums: listing.etag ? { etag: listing.etag } : {},
      };
    }

    try {
      const head = await this.deps.objectStore.headObject(this.deps.bucket, fragment.path);
      return {
        url: this.objectUrl(fragment),
        resolvedUrl: this.objectUrl(fragment),
        size: head.size,
        mimeType: head.contentType,
        modifiedAt: head.lastModified,
        checksums: head.etag ? { etag: head.etag } : {},
      };
    } catch (error) {
      throw new NotFoundError(this.objectUrl(fragment), error);
    }
  }

  /** Fetches `chunkSize` ranges on `threads` workers and writes each at its offset. */
  async copyTo(fragment: Fragment, destination: string, options: CopyOptions): Promise<number> {
    const size = options.knownSize ?? (await this.stat(fragment)).size;
    if (size === undefined) {
      throw new TransferError(this.objectUrl(fragment), "Object size is unknown");
    }

    const handle = await fs.promises.open(destination, "w");
    try {
      await processWithConcurrency(splitRanges(size, options.chunkSize), options.threads, async ([start, end]) => {
        const bytes = await this.deps.objectStore.getObjectRange(this.deps.bucket, fragment.path, start, end);
        if (bytes.length !== end - start + 1) {
          throw new TransferError(
            this.objectUrl(fragment),
            `Range ${start}-${end} returned ${bytes.length} bytes`,
          );
        }
        await handle.write(bytes, 0, bytes.length, start);
      });
    } finally {
      await handle.close();
    }
    return size;
  }

  async readRange(fragment: Fragment, offset: number, length: number): Promise<Buffer> {
    const bytes = await this.deps.objectStore.getObjectRange(this.deps.bucket, fragment.path, offset, offset + length - 1);
    return Buffer.from(bytes);
  }
}
