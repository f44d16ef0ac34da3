import * as fs from "fs";
import * as path from "path";
import { Readable } from "stream";
import { AxiosInstance, AxiosResponse } from "axios";
import { PageResult, RunReport } from "../types";
import { NameRegistry } from "./name-registry";
import { getErrorMessage, requestDeadline, runWithConcurrency } from "./utils";

export interface FetchPageOptions {
  outputDir: string;
  saveFiles: boolean;
  registry: NameRegistry;
}

export interface CrawlPagesOptions {
  concurrency: number;
  outputDir: string;
  saveFiles: boolean;
}

/**
 * Read the content-type header; multi-valued headers are joined.
 */
function readContentType(response: AxiosResponse): string {
  const raw: unknown = response.headers["content-type"];
  if (typeof raw === "string") return raw;
  if (Array.isArray(raw)) return raw.join(", ");
  return "unknown";
}

/**
 * Buffer a response stream fully in memory. The stream is destroyed when
 * the deadline passes, failing the read.
 */
async function readBody(
  stream: Readable,
  deadline: AbortSignal | undefined
): Promise<Buffer> {
  const onDeadline = () => stream.destroy(new Error("Request timed out"));
  if (deadline?.aborted) onDeadline();
  deadline?.addEventListener("abort", onDeadline, { once: true });

  const chunks: Buffer[] = [];
  try {
    for await (const chunk of stream) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
    }
  } finally {
    deadline?.removeEventListener("abort", onDeadline);
  }
  return Buffer.concat(chunks);
}

/**
 * Fetch a single page and record the outcome. Never rejects: request,
 * body and save failures all end up in the result's `error`. The client's
 * timeout bounds the whole exchange, headers and body together.
 * @param url - The page URL
 * @param http - Configured axios instance
 * @param options - Output directory, whether to save, the run's registry
 */
export async function fetchPage(
  url: string,
  http: AxiosInstance,
  options: FetchPageOptions
): Promise<PageResult> {
  const deadline = requestDeadline(http);
  let response: AxiosResponse<Readable>;
  try {
    response = await http.get<Readable>(url, {
      responseType: "stream",
      validateStatus: () => true,
      signal: deadline,
    });
  } catch (err) {
    const reason = deadline?.aborted ? "Request timed out" : getErrorMessage(err);
    return {
      url,
      status_code: 0,
      content_length: 0,
      mime_type: "unknown",
      error: `Request failed: ${reason}`,
    };
  }

  const status_code = response.status;
  const mime_type = readContentType(response);

  let body: Buffer;
  try {
    body = await readBody(response.data, deadline);
  } catch (err) {
    const reason = deadline?.aborted ? "Request timed out" : getErrorMessage(err);
    return {
      url,
      status_code,
      content_length: 0,
      mime_type,
      error: `Failed to read response body: ${reason}`,
    };
  }

  const result: PageResult = {
    url,
    status_code,
    content_length: body.length,
    mime_type,
  };

  if (options.saveFiles) {
    const filename = options.registry.claim(url);
    try {
      await fs.promises.writeFile(path.join(options.outputDir, filename), body);
    } catch (err) {
      return { ...result, error: `Failed to save file: ${getErrorMessage(err)}` };
    }
  }

  return result;
}

/**
 * Count successes (no error) and failures of a finished run.
 * @param results - Page results in scheduling order
 */
export function summarizeResults(results: PageResult[]): RunReport {
  const successful = results.filter((r) => r.error === undefined).length;
  return { results, successful, failed: results.length - successful };
}

/**
 * Fetch every URL with at most `concurrency` requests in flight.
 * One filename registry is shared by all fetches of the run.
 * @param urls - Page URLs, in the order results should be reported
 * @param http - Configured axios instance
 * @param options - Concurrency cap and persistence settings
 * @param onItemDone - Progress callback, once per finished page
 */
export async function crawlPages(
  urls: string[],
  http: AxiosInstance,
  options: CrawlPagesOptions,
  onItemDone?: (
    completed: number,
    total: number,
    url: string,
    result: PageResult
  ) => void
): Promise<RunReport> {
  const registry = new NameRegistry();
  const results = await runWithConcurrency(
    urls,
    options.concurrency,
    (url) =>
      fetchPage(url, http, {
        outputDir: options.outputDir,
        saveFiles: options.saveFiles,
        registry,
      }),
    onItemDone
  );
  return summarizeResults(results);
}
