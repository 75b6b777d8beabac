import { ReadableStream } from "node:stream/web";
import { Headers, Response } from "undici";
import { describe, expect, it } from "vitest";
import { NotFoundError } from "../core/errors";
import { createSilentLogger, MetricsRegistry } from "../observability";
import { extractRemoteInfo, inferSize, mergeRemoteInfo, RemoteInfoProber } from "../probe/remoteInfo";
import { FetchFn } from "../core/fetch";
import { createFetchStub } from "./helpers";

const URL_UNDER_TEST = "https://files.example.test/trip-data/yellow_tripdata_2023-01.parquet";

function makeProber(fetchFn: FetchFn, metrics = new MetricsRegistry()): RemoteInfoProber {
  return new RemoteInfoProber({
    http: { userAgent: "test-agent", ignoreHttpsErrors: false },
    timeoutMs: 1_000,
    logger: createSilentLogger(),
    metrics,
    fetchFn,
  });
}

describe("inferSize", () => {
  it("uses Content-Length when the response is not encoded", () => {
    expect(inferSize(new Headers({ "content-length": "100" }))).toBe(100);
    expect(inferSize(new Headers({ "content-length": "100", "content-encoding": "identity" }))).toBe(100);
  });

  it("gives no size for an encoded Content-Length", () => {
    expect(inferSize(new Headers({ "content-length": "100", "content-encoding": "gzip" }))).toBeUndefined();
  });

  it("falls back to the Content-Range total", () => {
    expect(inferSize(new Headers({ "content-range": "bytes 0-0/500" }))).toBe(500);
  });

  it("ignores Content-Range when Content-Length is present", () => {
    expect(
      inferSize(new Headers({ "content-length": "10", "content-encoding": "br", "content-range": "bytes 0-9/500" })),
    ).toBeUndefined();
  });

  it("rejects unknown or malformed totals", () => {
    expect(inferSize(new Headers({ "content-range": "bytes 0-0/*" }))).toBeUndefined();
    expect(inferSize(new Headers({ "content-length": "abc" }))).toBeUndefined();
    expect(inferSize(new Headers())).toBeUndefined();
  });
});

describe("extractRemoteInfo", () => {
  it("reads type, modification time and checksum hints", () => {
    const info = extractRemoteInfo(
      new Headers({
        "content-length": "42",
        "content-type": "application/octet-stream; charset=binary",
        "last-modified": "Wed, 01 Mar 2023 10:00:00 GMT",
        etag: '"abc"',
        "content-md5": "bWQ1",
      }),
      URL_UNDER_TEST,
    );

    expect(info).toEqual({
      url: URL_UNDER_TEST,
      resolvedUrl: URL_UNDER_TEST,
      size: 42,
      mimeType: "application/octet-stream",
      modifiedAt: new Date("2023-03-01T10:00:00Z"),
      checksums: { etag: '"abc"', contentMd5: "bWQ1" },
    });
  });

  it("drops an unparseable Last-Modified", () => {
    const info = extractRemoteInfo(new Headers({ "last-modified": "yesterday-ish" }), URL_UNDER_TEST);
    expect(info.modifiedAt).toBeUndefined();
  });
});

describe("mergeRemoteInfo", () => {
  it("lets defined fields of the second win and unions checksums", () => {
    const merged = mergeRemoteInfo(
      { url: "a", size: undefined, mimeType: "text/plain", checksums: { etag: "e1" } },
      { url: "b", size: 7, mimeType: undefined, checksums: { digest: "d1" } },
    );
    expect(merged).toEqual({
      url: "b",
      resolvedUrl: undefined,
      size: 7,
      mimeType: "text/plain",
      modifiedAt: undefined,
      checksums: { etag: "e1", digest: "d1" },
    });
  });
});

describe("RemoteInfoProber", () => {
  it("stops after HEAD when it reports a size", async () => {
    const { fetchFn, requests } = createFetchStub(
      () => new Response(null, { status: 200, headers: { "content-length": "1234" } }),
    );

    const info = await makeProber(fetchFn).probe(URL_UNDER_TEST);

    expect(info.size).toBe(1234);
    expect(requests.map((request) => request.method)).toEqual(["HEAD"]);
    expect(requests[0].headers.get("accept-encoding")).toBe("identity");
    expect(requests[0].headers.get("user-agent")).toBe("test-agent");
  });

  it("falls back to GET when HEAD gives no size and merges both answers", async () => {
    const metrics = new MetricsRegistry();
    const { fetchFn, requests } = createFetchStub((request) => {
      if (request.method === "HEAD") {
        return new Response(null, {
          status: 200,
          headers: { "last-modified": "Wed, 01 Mar 2023 10:00:00 GMT", etag: '"head-etag"' },
        });
      }
      return new Response("hello", {
        status: 200,
        headers: { "content-length": "5", "content-type": "application/octet-stream" },
      });
    });

    const info = await makeProber(fetchFn, metrics).probe(URL_UNDER_TEST);

    expect(requests.map((request) => request.method)).toEqual(["HEAD", "GET"]);
    expect(info.size).toBe(5);
    expect(info.mimeType).toBe("application/octet-stream");
    expect(info.modifiedAt).toEqual(new Date("2023-03-01T10:00:00Z"));
    expect(info.checksums).toEqual({ etag: '"head-etag"' });
    expect(metrics.getCounter("probe_get_fallbacks")).toBe(1);
  });

  it("uses GET alone when HEAD throws", async () => {
    const { fetchFn } = createFetchStub((request) => {
      if (request.method === "HEAD") {
        throw new TypeError("fetch failed");
      }
      return new Response("abc", { status: 200, headers: { "content-length": "3" } });
    });

    const info = await makeProber(fetchFn).probe(URL_UNDER_TEST);
    expect(info.size).toBe(3);
  });

  it("falls back to GET when HEAD is rejected by the server", async () => {
    const { fetchFn, requests } = createFetchStub((request) =>
      request.method === "HEAD"
        ? new Response(null, { status: 405 })
        : new Response("abcd", { status: 200, headers: { "content-length": "4" } }),
    );

    const info = await makeProber(fetchFn).probe(URL_UNDER_TEST);
    expect(requests).toHaveLength(2);
    expect(info.size).toBe(4);
  });

  it("throws NotFoundError when both attempts fail", async () => {
    const { fetchFn } = createFetchStub(() => new Response(null, { status: 404 }));

    const probe = makeProber(fetchFn).probe(URL_UNDER_TEST);
    await expect(probe).rejects.toBeInstanceOf(NotFoundError);
    await expect(probe).rejects.toThrow(`Remote file not found: ${URL_UNDER_TEST} (HTTP 404 on GET)`);
  });

  it("returns GET info without a size when neither attempt reports one", async () => {
    const { fetchFn } = createFetchStub(
      () => new Response(null, { status: 200, headers: { "content-length": "99", "content-encoding": "gzip" } }),
    );

    const info = await makeProber(fetchFn).probe(URL_UNDER_TEST);
    expect(info.size).toBeUndefined();
  });

  it("releases the GET body without reading it", async () => {
    let cancelled = false;
    const { fetchFn } = createFetchStub((request) => {
      if (request.method === "HEAD") {
        return new Response(null, { status: 200 });
      }
      const body = new ReadableStream<Uint8Array>({
        pull(controller) {
          controller.enqueue(new Uint8Array(1024));
        },
        cancel() {
          cancelled = true;
        },
      });
      return new Response(body, { status: 200, headers: { "content-length": "1000000" } });
    });

    const info = await makeProber(fetchFn).probe(URL_UNDER_TEST);
    expect(info.size).toBe(1_000_000);
    expect(cancelled).toBe(true);
  });
});
