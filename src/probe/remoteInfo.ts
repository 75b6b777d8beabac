import { fetch } from "undici";
import type { Response } from "undici";
import { describeError, NotFoundError } from "../core/errors";
import { discardBody, FetchFn, fetchWithTimeout, HttpSettings } from "../core/fetch";
import { Logger, MetricsRegistry } from "../observability";
import { ChecksumHints, RemoteFileInfo } from "../types";

export type ProbeMethod = "HEAD" | "GET";

/** Outcome of one probe request. A failed attempt is a value, not an exception. */
export type ProbeAttempt =
  | { ok: true; method: ProbeMethod; info: RemoteFileInfo }
  | { ok: false; method: ProbeMethod; error: unknown };

export interface HeaderReader {
  get(name: string): string | null;
}

export interface RemoteInfoProberDeps {
  http: HttpSettings;
  timeoutMs: number;
  logger: Logger;
  metrics?: MetricsRegistry;
  fetchFn?: FetchFn;
}

const CHECKSUM_HEADERS: ReadonlyArray<[keyof ChecksumHints, string]> = [
  ["etag", "etag"],
  ["contentMd5", "content-md5"],
  ["digest", "digest"],
];

function parseByteCount(value: string): number | undefined {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    return undefined;
  }
  return Number.parseInt(trimmed, 10);
}

/**
 * Content-Length counts encoded bytes, so it is only a file size when the response is not
 * content-encoded. Content-Range is consulted only when no length header came back.
 */
export function inferSize(headers: HeaderReader): number | undefined {
  const contentLength = headers.get("content-length");
  if (contentLength !== null) {
    const encoding = (headers.get("content-encoding") ?? "").trim().toLowerCase();
    if (encoding === "" || encoding === "identity") {
      return parseByteCount(contentLength);
    }
    return undefined;
  }

  const contentRange = headers.get("content-range");
  if (contentRange !== null) {
    const total = contentRange.split("/")[1];
    return total === undefined ? undefined : parseByteCount(total);
  }

  return undefined;
}

export function parseLastModified(value: string | null): Date | undefined {
  if (!value) {
    return undefined;
  }
  const parsed = new Date(value);
  return Number.isNaN(parsed.getTime()) ? undefined : parsed;
}

export function parseMimeType(value: string | null): string | undefined {
  if (!value) {
    return undefined;
  }
  const mimeType = value.split(";")[0].trim();
  return mimeType || undefined;
}

export function extractRemoteInfo(headers: HeaderReader, requestedUrl: string, responseUrl?: string): RemoteFileInfo {
  const checksums: ChecksumHints = {};
  for (const [field, header] of CHECKSUM_HEADERS) {
    const value = headers.get(header);
    if (value) {
      checksums[field] = value;
    }
  }

  return {
    url: requestedUrl,
    resolvedUrl: responseUrl || requestedUrl,
    size: inferSize(headers),
    mimeType: parseMimeType(headers.get("content-type")),
    modifiedAt: parseLastModified(headers.get("last-modified")),
    checksums,
  };
}

/** Later defined fields win; checksum hints are unioned. */
export function mergeRemoteInfo(first: RemoteFileInfo, second: RemoteFileInfo): RemoteFileInfo {
  return {
    url: second.url ?? first.url,
    resolvedUrl: second.resolvedUrl ?? first.resolvedUrl,
    size: second.size ?? first.size,
    mimeType: second.mimeType ?? first.mimeType,
    modifiedAt: second.modifiedAt ?? first.modifiedAt,
    checksums: { ...first.checksums, ...second.checksums },
  };
}

export class RemoteInfoProber {
  private readonly deps: RemoteInfoProberDeps;
  private readonly fetchFn: FetchFn;

  constructor(deps: RemoteInfoProberDeps) {
    this.deps = deps;
    this.fetchFn = deps.fetchFn ?? fetch;
  }

  /**
   * HEAD first; GET only when HEAD failed or gave no size. Throws NotFoundError when the
   * GET fails as well.
   */
  async probe(url: string): Promise<RemoteFileInfo> {
    const stopTimer = this.deps.metrics?.startTimer("probe_ms");
    try {
      const head = await this.attempt(url, "HEAD");
      if (head.ok && head.info.size !== undefined) {
        return head.info;
      }

      this.deps.logger.debug("probe_head_insufficient", {
        url,
        error: head.ok ? "no reliable size" : describeError(head.error),
      });
      this.deps.metrics?.incrementCounter("probe_get_fallbacks");

      const get = await this.attempt(url, "GET");
      if (!get.ok) {
        throw new NotFoundError(url, get.error);
      }
      return head.ok ? mergeRemoteInfo(head.info, get.info) : get.info;
    } finally {
      stopTimer?.();
    }
  }

  async attempt(url: string, method: ProbeMethod): Promise<ProbeAttempt> {
    let response: Response;
    try {
      response = await fetchWithTimeout(
        this.fetchFn,
        url,
        { method, headers: { "accept-encoding": "identity" } },
        this.deps.http,
        this.deps.timeoutMs,
      );
    } catch (error) {
      return { ok: false, method, error };
    }

    try {
      if (!response.ok) {
        return { ok: false, method, error: new Error(`HTTP ${response.status} on ${method}`) };
      }
      return { ok: true, method, info: extractRemoteInfo(response.headers, url, response.url) };
    } finally {
      await this.release(response, url);
    }
  }

  private async release(response: Response, url: string): Promise<void> {
    try {
      await discardBody(response);
    } catch (error) {
      this.deps.logger.debug("probe_body_release_failed", { url, error: describeError(error) });
    }
  }
}
