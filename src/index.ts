#!/usr/bin/env node
import * as fs from "fs";
import * as path from "path";
import * as readline from "readline";
import { CrawlConfig, PageResult } from "./types";
import { resolveAllPageUrls, filterUrls } from "./sitemap-parser";
import { crawlPages } from "./core/crawler";
import { exportResults } from "./exporter";
import { createHttpClient, formatDuration, getErrorMessage } from "./core/utils";

const DEFAULT_THREADS = 10;
const DEFAULT_TIMEOUT_SECONDS = 30;
const DEFAULT_OUTPUT_DIR = "output";

// Node timers cap out at 2^31-1 ms
const MAX_TIMEOUT_SECONDS = 2_147_483;

const VALUE_OPTIONS = new Set(["threads", "output", "timeout", "filter"]);

const USAGE = `Usage: sitemap-fetch <sitemapUrl> [options]

Options:
  --threads <n>        Max concurrent page requests (default: ${DEFAULT_THREADS})
  --output <dir>       Output directory (default: ${DEFAULT_OUTPUT_DIR})
  --save-files         Save each page body into the output directory
  --timeout <seconds>  Deadline for each request, body included
                       (default: ${DEFAULT_TIMEOUT_SECONDS}, max: ${MAX_TIMEOUT_SECONDS})
  --filter <regex>     Only fetch page URLs matching the pattern
  -h, --help           Show this help`;

/** Raised for malformed command lines; the CLI prints usage and exits 1. */
export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

export type ParsedArgs = Partial<CrawlConfig> & { help: boolean };

function parsePositiveInt(name: string, value: string): number {
  if (!/^\d+$/.test(value) || parseInt(value, 10) < 1) {
    throw new CliUsageError(`--${name} expects a positive integer, got "${value}"`);
  }
  return parseInt(value, 10);
}

function parseBoolean(name: string, value: string | undefined): boolean {
  if (value === undefined || value === "true") return true;
  if (value === "false") return false;
  throw new CliUsageError(`--${name} expects true or false, got "${value}"`);
}

function parsePattern(value: string): RegExp {
  try {
    return new RegExp(value);
  } catch (err) {
    throw new CliUsageError(`--filter is not a valid pattern: ${getErrorMessage(err)}`);
  }
}

/**
 * Parse CLI arguments into a partial CrawlConfig.
 * Options take their value either as `--name=value` or as the next argument.
 * `--timeout` is given in seconds and returned in milliseconds.
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const opts: Record<string, string> = {};
  const parsed: ParsedArgs = { help: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "-h" || arg === "--help") {
      parsed.help = true;
      continue;
    }

    if (arg.startsWith("--")) {
      const eqIdx = arg.indexOf("=");
      const key = eqIdx === -1 ? arg.slice(2) : arg.slice(2, eqIdx);
      const inline = eqIdx === -1 ? undefined : arg.slice(eqIdx + 1);

      if (key === "save-files") {
        parsed.saveFiles = parseBoolean(key, inline);
        continue;
      }
      if (!VALUE_OPTIONS.has(key)) {
        throw new CliUsageError(`Unknown option --${key}`);
      }

      const value = inline ?? argv[++i];
      if (value === undefined) {
        throw new CliUsageError(`Missing value for --${key}`);
      }
      opts[key] = value;
      continue;
    }

    if (parsed.sitemapUrl !== undefined) {
      throw new CliUsageError(`Unexpected argument "${arg}"`);
    }
    parsed.sitemapUrl = arg;
  }

  if (opts.threads !== undefined) {
    parsed.concurrency = parsePositiveInt("threads", opts.threads);
  }
  if (opts.timeout !== undefined) {
    const seconds = parsePositiveInt("timeout", opts.timeout);
    if (seconds > MAX_TIMEOUT_SECONDS) {
      throw new CliUsageError(
        `--timeout must be at most ${MAX_TIMEOUT_SECONDS} seconds, got ${seconds}`
      );
    }
    parsed.timeout = seconds * 1000;
  }
  if (opts.output !== undefined) parsed.outputDir = opts.output;
  if (opts.filter !== undefined) parsed.filter = parsePattern(opts.filter);

  return parsed;
}

/**
 * Prompt the user interactively for a sitemap URL via stdin.
 */
function promptForUrl(): Promise<string> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });
  return new Promise((resolve) => {
    rl.question("Enter sitemap URL: ", (answer) => {
      rl.close();
      resolve(answer.trim());
    });
  });
}

function writeReport(results: PageResult[], outputDir: string): string | null {
  try {
    return exportResults(results, outputDir);
  } catch (err) {
    console.error(`\n   Error: Could not write results to ${outputDir}`);
    console.error(`   ${getErrorMessage(err)}`);
    return null;
  }
}

/**
 * Run the whole pipeline for one command line.
 * @param argv - Arguments after the executable and script name
 * @returns Process exit code
 */
export async function runCli(argv: string[]): Promise<number> {
  let args: ParsedArgs;
  try {
    args = parseArgs(argv);
  } catch (err) {
    if (!(err instanceof CliUsageError)) throw err;
    console.error(`Error: ${err.message}\n`);
    console.error(USAGE);
    return 1;
  }

  if (args.help) {
    console.log(USAGE);
    return 0;
  }

  const sitemapUrl =
    args.sitemapUrl ?? (process.stdin.isTTY ? await promptForUrl() : "");
  if (!sitemapUrl) {
    console.error("Error: No sitemap URL provided.\n");
    console.error(USAGE);
    return 1;
  }

  const config: CrawlConfig = {
    sitemapUrl,
    filter: args.filter ?? null,
    concurrency: args.concurrency ?? DEFAULT_THREADS,
    timeout: args.timeout ?? DEFAULT_TIMEOUT_SECONDS * 1000,
    outputDir: path.resolve(args.outputDir ?? DEFAULT_OUTPUT_DIR),
    saveFiles: args.saveFiles ?? false,
  };

  console.log("Sitemap Page Fetcher v1.0\n");

  try {
    fs.mkdirSync(config.outputDir, { recursive: true });
  } catch (err) {
    console.error(`Error: Could not create output directory ${config.outputDir}`);
    console.error(`   ${getErrorMessage(err)}`);
    return 1;
  }

  const http = createHttpClient(config.timeout);

  // ── Step 1: Discover URLs ─────────────────────────────────────────
  console.log(`Step 1: Parsing sitemap ${config.sitemapUrl}...`);
  let urls: string[];
  try {
    urls = await resolveAllPageUrls(config.sitemapUrl, http);
  } catch (err) {
    console.error(`\n   Error: Could not read sitemap at ${config.sitemapUrl}`);
    console.error(`   ${getErrorMessage(err)}`);
    return 1;
  }

  if (urls.length === 0) {
    console.error(`\n   Error: No page URLs found in ${config.sitemapUrl}`);
    return 1;
  }
  console.log(`   Found ${urls.length} URLs`);

  if (config.filter) {
    urls = filterUrls(urls, config.filter);
    console.log(`   After filter (${config.filter.source}): ${urls.length} URLs`);
  }

  if (urls.length === 0) {
    if (writeReport([], config.outputDir) === null) return 1;
    console.log("\nNothing to crawl. Exiting.");
    return 0;
  }

  // ── Step 2: Fetch pages ───────────────────────────────────────────
  console.log(
    `\nStep 2: Fetching ${urls.length} pages (concurrency: ${config.concurrency})...`
  );
  const startTime = Date.now();

  const report = await crawlPages(
    urls,
    http,
    {
      concurrency: config.concurrency,
      outputDir: config.outputDir,
      saveFiles: config.saveFiles,
    },
    (completed, total, url, result) => {
      const icon = result.error === undefined ? "+" : "x";
      const status = result.status_code || "ERR";
      console.log(`   [${completed}/${total}]  ${icon} ${status} ${url}`);
    }
  );

  const elapsed = Date.now() - startTime;

  // ── Step 3: Export ────────────────────────────────────────────────
  console.log("\nStep 3: Exporting...");
  const resultsPath = writeReport(report.results, config.outputDir);
  if (resultsPath === null) return 1;

  console.log(`   Results saved to: ${resultsPath}`);
  console.log(`\nDone in ${formatDuration(elapsed)}`);
  console.log(`   Processed ${report.results.length} URLs`);
  console.log(`   Successful: ${report.successful}, Failed: ${report.failed}`);
  return 0;
}

if (require.main === module) {
  runCli(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      console.error(`Fatal: ${getErrorMessage(err)}`);
      process.exitCode = 1;
    }
  );
}
