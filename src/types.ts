/** CLI configuration parsed from command-line arguments */
export interface CrawlConfig {
  sitemapUrl: string;
  filter: RegExp | null;
  concurrency: number;
  /** Per-request timeout in milliseconds */
  timeout: number;
  outputDir: string;
  saveFiles: boolean;
}

/** Outcome of fetching a single page URL */
export interface PageResult {
  url: string;
  /** 0 when no HTTP response was received */
  status_code: number;
  content_length: number;
  mime_type: string;
  error?: string;
}

/** All page results of one run, in the order the URLs were scheduled */
export interface RunReport {
  results: PageResult[];
  successful: number;
  failed: number;
}

/**
 * A decoded sitemap document. The root element decides the shape;
 * anything else (malformed XML, unknown root) is "unrecognized".
 */
export type SitemapDocument =
  | { kind: "index"; locs: string[] }
  | { kind: "urlset"; locs: string[] }
  | { kind: "unrecognized"; reason: string };
