import axios, { AxiosError, AxiosInstance } from "axios";
import pLimit from "p-limit";

const USER_AGENTS = [
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/131.0.0.0 Safari/537.36",
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 14_5) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/18.0 Safari/605.1.15",
  "Mozilla/5.0 (X11; Linux x86_64; rv:133.0) Gecko/20100101 Firefox/133.0",
];

/**
 * Pick a random User-Agent string from the rotation pool.
 */
function randomUA(): string {
  return USER_AGENTS[Math.floor(Math.random() * USER_AGENTS.length)];
}

/**
 * Create a configured axios instance with realistic browser headers.
 * The timeout applies to every request made through the instance,
 * sitemaps and pages alike.
 * @param timeout - Request timeout in milliseconds
 */
export function createHttpClient(timeout: number): AxiosInstance {
  const client = axios.create({
    timeout,
    headers: {
      Accept:
        "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
      "Accept-Language": "en-US,en;q=0.9",
      "Accept-Encoding": "gzip, deflate, br",
    },
    maxRedirects: 5,
  });

  // Rotate User-Agent on every request
  client.interceptors.request.use((config) => {
    config.headers["User-Agent"] = randomUA();
    return config;
  });

  return client;
}

/**
 * Run an async processor over every item with at most `concurrency`
 * processors in flight. A task is created for every item up front and
 * waits at the gate for a free slot; nothing is cancelled when an item
 * fails, and the call resolves only once every item has finished.
 * @param items - Array of items to process
 * @param concurrency - Max items in flight at any instant
 * @param processor - Async function to run on each item
 * @param onItemDone - Callback after each item completes, in completion order
 * @returns Array of results in input order
 */
export async function runWithConcurrency<T, R>(
  items: T[],
  concurrency: number,
  processor: (item: T) => Promise<R>,
  onItemDone?: (completed: number, total: number, item: T, result: R) => void
): Promise<R[]> {
  const limit = pLimit(concurrency);
  let completed = 0;

  return Promise.all(
    items.map((item) =>
      limit(async () => {
        const result = await processor(item);
        completed++;
        onItemDone?.(completed, items.length, item, result);
        return result;
      })
    )
  );
}

/**
 * Extract a human-readable error message from an unknown error.
 * @param err - The caught error
 */
export function getErrorMessage(err: unknown): string {
  if (err instanceof AxiosError) {
    if (err.code === "ECONNABORTED" || err.code === "ETIMEDOUT")
      return "Request timed out";
    if (err.code === "ENOTFOUND")
      return `DNS lookup failed: ${err.config?.url ?? "unknown host"}`;
    if (err.code === "ERR_TLS_CERT_ALTNAME_INVALID")
      return "SSL certificate error";
    if (err.code === "ECONNRESET") return "Connection reset by server";
    if (err.code === "ECONNREFUSED") return "Connection refused";
    if (err.response)
      return `HTTP ${err.response.status}: ${err.response.statusText}`;
    return err.message;
  }
  if (hasMessage(err)) return err.message;
  return String(err);
}

/**
 * Structural check: errors raised by Node internals may come from another
 * realm (as under Jest), where `instanceof Error` is false.
 */
function hasMessage(err: unknown): err is { message: string } {
  return (
    typeof err === "object" &&
    err !== null &&
    "message" in err &&
    typeof err.message === "string"
  );
}

/**
 * Deadline covering a whole request, body included, taken from the
 * client's configured timeout. The client's own `timeout` only fires when
 * the socket goes idle, so a slowly dripping body would never hit it.
 * @param http - Configured axios instance
 */
export function requestDeadline(http: AxiosInstance): AbortSignal | undefined {
  const timeout = http.defaults.timeout;
  return timeout ? AbortSignal.timeout(timeout) : undefined;
}

/**
 * Format a duration in milliseconds to a human-readable string like "2m 30s".
 * @param ms - Duration in milliseconds
 */
export function formatDuration(ms: number): string {
  const totalSeconds = Math.floor(ms / 1000);
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  if (minutes === 0) return `${seconds}s`;
  return `${minutes}m ${seconds}s`;
}
