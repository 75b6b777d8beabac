import fs from "node:fs";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { fetch } from "undici";
import { TransferError } from "../core/errors";
import { discardBody, FetchFn, fetchWithTimeout, HttpSettings } from "../core/fetch";
import { RemoteInfoProber } from "../probe/remoteInfo";
import { Fragment, RemoteFileInfo } from "../types";
import { CopyOptions, FragmentSource } from "./types";

export interface WebFragmentSourceDeps {
  prober: RemoteInfoProber;
  http: HttpSettings;
  requestTimeoutMs: number;
  downloadTimeoutMs: number;
  fetchFn?: FetchFn;
}

export class WebFragmentSource implements FragmentSource {
  readonly backend = "web" as const;
  private readonly deps: WebFragmentSourceDeps;
  private readonly fetchFn: FetchFn;

  constructor(deps: WebFragmentSourceDeps) {
    this.deps = deps;
    this.fetchFn = deps.fetchFn ?? fetch;
  }

  stat(fragment: Fragment): Promise<RemoteFileInfo> {
    return this.deps.prober.probe(fragment.path);
  }

  async copyTo(fragment: Fragment, destination: string, options: CopyOptions): Promise<number> {
    const url = fragment.path;
    const response = await fetchWithTimeout(
      this.fetchFn,
      url,
      { method: "GET", headers: { "accept-encoding": "identity" } },
      this.deps.http,
      this.deps.downloadTimeoutMs,
    );

    if (!response.ok) {
      await discardBody(response);
      throw new TransferError(url, `HTTP ${response.status} while downloading`);
    }

    const writable = fs.createWriteStream(destination, { flags: "w", highWaterMark: options.chunkSize });
    if (!response.body) {
      await pipeline(Readable.from([]), writable);
      return 0;
    }

    let bytes = 0;
    await pipeline(
      Readable.fromWeb(response.body, { highWaterMark: options.chunkSize }),
      async function* (source: AsyncIterable<Buffer>) {
        for await (const chunk of source) {
          bytes += chunk.length;
          yield chunk;
        }
      },
      writable,
    );
    return bytes;
  }

  async readRange(fragment: Fragment, offset: number, length: number): Promise<Buffer> {
    const url = fragment.path;
    const response = await fetchWithTimeout(
      this.fetchFn,
      url,
      { method: "GET", headers: { "accept-encoding": "identity", range: `bytes=${offset}-${offset + length - 1}` } },
      this.deps.http,
      this.deps.requestTimeoutMs,
    );

    if (response.status !== 206) {
      await discardBody(response);
      throw new TransferError(url, `Expected 206 for a range request, got HTTP ${response.status}`);
    }

    const body = Buffer.from(await response.arrayBuffer());
    return body.length > length ? body.subarray(0, length) : body;
  }
}
