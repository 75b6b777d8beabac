import { Agent, fetch } from "undici";
import type { Response } from "undici";

export type FetchFn = typeof fetch;

let insecureAgent: Agent | undefined;

function getInsecureAgent(): Agent {
  if (!insecureAgent) {
    insecureAgent = new Agent({
      connect: {
        rejectUnauthorized: false,
      },
    });
  }
  return insecureAgent;
}

export function getFetchDispatcher(ignoreHttpsErrors: boolean): Agent | undefined {
  if (!ignoreHttpsErrors) {
    return undefined;
  }
  return getInsecureAgent();
}

export interface HttpRequest {
  method: "GET" | "HEAD";
  headers?: Record<string, string>;
}

export interface HttpSettings {
  userAgent: string;
  ignoreHttpsErrors: boolean;
}

/**
 * Issues a request whose headers must arrive within `timeoutMs`. The body, if any, is
 * left to the caller and is not covered by the timeout.
 */
export async function fetchWithTimeout(
  fetchFn: FetchFn,
  url: string,
  request: HttpRequest,
  settings: HttpSettings,
  timeoutMs: number,
): Promise<Response> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);

  try {
    return await fetchFn(url, {
      method: request.method,
      redirect: "follow",
      headers: {
        "user-agent": settings.userAgent,
        ...(request.headers ?? {}),
      },
      dispatcher: getFetchDispatcher(settings.ignoreHttpsErrors),
      signal: controller.signal,
    });
  } finally {
    clearTimeout(timeout);
  }
}

/** Releases the connection behind a response whose body will not be read. */
export async function discardBody(response: Response): Promise<void> {
  if (response.body && !response.bodyUsed) {
    await response.body.cancel();
  }
}
