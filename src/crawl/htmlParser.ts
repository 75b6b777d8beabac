import { load } from "cheerio";

function normalizeUrl(baseUrl: string, href: string): string | undefined {
  try {
    return new URL(href, baseUrl).toString();
  } catch {
    return undefined;
  }
}

/**
 * Returns the trimmed, absolute hrefs of every anchor matching `selector`, in document
 * order and without duplicates.
 */
export function extractFileLinksFromHtml(html: string, pageUrl: string, selector: string): string[] {
  const $ = load(html);
  const links: string[] = [];
  const seen = new Set<string>();

  $(selector).each((_, element) => {
    const href = $(element).attr("href")?.trim();
    if (!href) {
      return;
    }

    const normalizedUrl = normalizeUrl(pageUrl, href);
    if (!normalizedUrl || seen.has(normalizedUrl)) {
      return;
    }

    seen.add(normalizedUrl);
    links.push(normalizedUrl);
  });

  return links;
}
