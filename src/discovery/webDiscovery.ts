import { fetch } from "undici";
import { describeError, DiscoveryError } from "../core/errors";
import { FetchFn, fetchWithTimeout, HttpSettings } from "../core/fetch";
import { extractFileLinksFromHtml } from "../crawl";
import { Logger } from "../observability";
import { Fragment, RecordType } from "../types";
import { buildTripFileUrl, createFragment, fileExtension } from "./fragment";

export interface WebPageSourceDescriptor {
  kind: "web_page";
  pageUrl: string;
  selector: string;
  format: string;
}

export interface WebTemplateSourceDescriptor {
  kind: "web_template";
  baseUrl: string;
  recordType: RecordType;
  year: number;
  months: Iterable<number>;
}

export interface WebDiscoveryDeps {
  http: HttpSettings;
  timeoutMs: number;
  logger: Logger;
  fetchFn?: FetchFn;
}

async function fetchHtml(url: string, deps: WebDiscoveryDeps): Promise<string> {
  const response = await fetchWithTimeout(
    deps.fetchFn ?? fetch,
    url,
    { method: "GET", headers: { accept: "text/html,application/xhtml+xml" } },
    deps.http,
    deps.timeoutMs,
  );

  if (!response.ok) {
    await response.body?.cancel();
    throw new Error(`HTTP ${response.status} while fetching ${url}`);
  }

  return response.text();
}

export async function discoverWebPageFragments(
  descriptor: WebPageSourceDescriptor,
  deps: WebDiscoveryDeps,
): Promise<Fragment[]> {
  deps.logger.info("discovery_web_page_request", { url: descriptor.pageUrl });

  let html: string;
  try {
    html = await fetchHtml(descriptor.pageUrl, deps);
  } catch (error) {
    throw new DiscoveryError(`Failed to fetch ${descriptor.pageUrl}: ${describeError(error)}`, { cause: error });
  }

  const format = descriptor.format.toLowerCase();
  const links = extractFileLinksFromHtml(html, descriptor.pageUrl, descriptor.selector);
  const fragments = links
    .map((url) => createFragment(url, "web"))
    .filter((fragment) => fileExtension(fragment.name) === format);

  deps.logger.info("discovery_web_page_parsed", {
    url: descriptor.pageUrl,
    links: links.length,
    fragments: fragments.length,
  });
  return fragments;
}

/** One URL per requested month; nothing is fetched until the fragments are probed. */
export function discoverWebTemplateFragments(descriptor: WebTemplateSourceDescriptor): Fragment[] {
  const months = [...new Set(descriptor.months)].sort((a, b) => a - b);
  return months.map((month) =>
    createFragment(buildTripFileUrl(descriptor.baseUrl, descriptor.recordType, descriptor.year, month), "web"),
  );
}
