import { AxiosInstance } from "axios";
import { XMLParser, XMLValidator } from "fast-xml-parser";
import { fetchSitemapXml } from "./core/sitemap-fetcher";
import { getErrorMessage } from "./core/utils";
import { SitemapDocument } from "./types";

const xmlParser = new XMLParser({
  ignoreAttributes: true,
  removeNSPrefix: true,
  parseTagValue: false,
  isArray: (name) => name === "sitemap" || name === "url",
});

export class SitemapParseError extends Error {
  constructor(
    readonly url: string,
    readonly reason: string
  ) {
    super(`Failed to parse sitemap XML at ${url}: ${reason}`);
    this.name = "SitemapParseError";
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Collect the non-empty <loc> values of the given entry elements.
 * An empty root (<urlset/>) parses to a string, hence the record check.
 */
function collectLocs(root: unknown, entryName: string): string[] {
  if (!isRecord(root)) return [];
  const value = root[entryName];
  const entries: unknown[] = Array.isArray(value) ? value : [value];

  const locs: string[] = [];
  for (const entry of entries) {
    if (!isRecord(entry)) continue;
    const loc = entry.loc;
    if (typeof loc === "string" && loc !== "") locs.push(loc);
  }
  return locs;
}

/**
 * Decode a sitemap document into one of its two shapes.
 * Only <loc> values are read; every other element is ignored.
 * @param xml - Raw XML text
 */
export function parseSitemapDocument(xml: string): SitemapDocument {
  const text = xml.replace(/^\uFEFF/, "").trim();
  const verdict = XMLValidator.validate(text);
  if (verdict !== true) {
    return {
      kind: "unrecognized",
      reason: `${verdict.err.msg} (line ${verdict.err.line})`,
    };
  }

  const parsed: unknown = xmlParser.parse(text);
  if (!isRecord(parsed)) {
    return { kind: "unrecognized", reason: "Empty document" };
  }

  // Processing instructions such as <?xml ...?> show up as "?xml"
  const rootName = Object.keys(parsed).find((key) => !key.startsWith("?"));

  if (rootName === "sitemapindex") {
    return { kind: "index", locs: collectLocs(parsed.sitemapindex, "sitemap") };
  }
  if (rootName === "urlset") {
    return { kind: "urlset", locs: collectLocs(parsed.urlset, "url") };
  }
  return {
    kind: "unrecognized",
    reason: rootName
      ? `Unexpected root element <${rootName}>`
      : "No root element",
  };
}

/**
 * Fetch a sitemap referenced by an index and return its page URLs.
 * A child that is itself an index yields no pages: only one level of
 * index is followed.
 */
async function parseChildSitemap(
  sitemapUrl: string,
  http: AxiosInstance
): Promise<string[]> {
  const xml = await fetchSitemapXml(sitemapUrl, http);
  const doc = parseSitemapDocument(xml);
  switch (doc.kind) {
    case "urlset":
      return doc.locs;
    case "index":
      return [];
    case "unrecognized":
      throw new SitemapParseError(sitemapUrl, doc.reason);
  }
}

/**
 * Fetch and parse a sitemap URL, returning all page URLs found.
 * Handles both sitemap index files and standard URL sitemaps.
 * A child sitemap that fails is skipped with a warning; failure of the
 * root sitemap rejects.
 * @param sitemapUrl - The URL of the sitemap or sitemap index
 * @param http - Configured axios instance
 * @returns Page URLs in document order, duplicates included
 */
export async function resolveAllPageUrls(
  sitemapUrl: string,
  http: AxiosInstance
): Promise<string[]> {
  console.log(`   Fetching: ${sitemapUrl}`);

  const xml = await fetchSitemapXml(sitemapUrl, http);
  const doc = parseSitemapDocument(xml);

  if (doc.kind === "unrecognized") {
    throw new SitemapParseError(sitemapUrl, doc.reason);
  }
  if (doc.kind === "urlset") {
    return doc.locs;
  }

  console.log(`   Found sitemap index with ${doc.locs.length} child sitemap(s)`);

  const allUrls: string[] = [];
  for (const childUrl of doc.locs) {
    try {
      const urls = await parseChildSitemap(childUrl, http);
      console.log(`   Extracted ${urls.length} URLs from ${childUrl}`);
      allUrls.push(...urls);
    } catch (err) {
      console.warn(
        `   Warning: Skipping sitemap ${childUrl}: ${getErrorMessage(err)}`
      );
    }
  }
  return allUrls;
}

/**
 * Filter URLs by a regex pattern.
 * @param urls - Array of URL strings
 * @param pattern - RegExp to match against URLs
 * @returns Filtered URL array
 */
export function filterUrls(urls: string[], pattern: RegExp): string[] {
  return urls.filter((url) => pattern.test(url));
}
