import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { Headers, Response } from "undici";
import { FetchFn } from "../core/fetch";
import { ObjectHead, ObjectListingPage, ObjectStoreClient, ObjectSummary } from "../sources/objectStore";

export interface RecordedRequest {
  url: string;
  method: string;
  headers: Headers;
}

/** A fetch stand-in that answers from `handler` and records every request it sees. */
export function createFetchStub(handler: (request: RecordedRequest) => Response | Promise<Response>): {
  fetchFn: FetchFn;
  requests: RecordedRequest[];
} {
  const requests: RecordedRequest[] = [];
  const fetchFn: FetchFn = async (input, init) => {
    const url = typeof input === "string" ? input : input instanceof URL ? input.toString() : input.url;
    const request = { url, method: init?.method ?? "GET", headers: new Headers(init?.headers) };
    requests.push(request);
    return handler(request);
  };
  return { fetchFn, requests };
}

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "trip-mirror-"));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

interface StoredObject {
  body: Buffer;
  lastModified: Date;
}

/** In-memory bucket with paged listings; `pageSize` objects per page. */
export class MemoryObjectStore implements ObjectStoreClient {
  readonly objects = new Map<string, StoredObject>();
  readonly rangeRequests: Array<[string, number, number]> = [];
  headRequests = 0;
  private readonly pageSize: number;

  constructor(pageSize = 1000) {
    this.pageSize = pageSize;
  }

  put(key: string, body: string | Buffer, lastModified = new Date("2024-03-01T00:00:00Z")): void {
    this.objects.set(key, { body: Buffer.isBuffer(body) ? body : Buffer.from(body), lastModified });
  }

  async listObjects(_bucket: string, prefix: string, continuationToken?: string): Promise<ObjectListingPage> {
    const keys = [...this.objects.keys()].filter((key) => key.startsWith(prefix)).sort();
    const start = continuationToken ? Number.parseInt(continuationToken, 10) : 0;
    const objects: ObjectSummary[] = keys.slice(start, start + this.pageSize).map((key) => {
      const stored = this.get(key);
      return { key, size: stored.body.length, lastModified: stored.lastModified, etag: `"etag-${key.length}"` };
    });
    const next = start + this.pageSize;
    return { objects, nextToken: next < keys.length ? String(next) : undefined };
  }

  async headObject(_bucket: string, key: string): Promise<ObjectHead> {
    this.headRequests += 1;
    const stored = this.get(key);
    return { size: stored.body.length, lastModified: stored.lastModified, contentType: "application/octet-stream" };
  }

  async getObjectRange(_bucket: string, key: string, start: number, end: number): Promise<Uint8Array> {
    this.rangeRequests.push([key, start, end]);
    return this.get(key).body.subarray(start, end + 1);
  }

  private get(key: string): StoredObject {
    const stored = this.objects.get(key);
    if (!stored) {
      throw new Error(`NoSuchKey: ${key}`);
    }
    return stored;
  }
}
