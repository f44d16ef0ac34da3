import { AxiosInstance, AxiosResponse } from "axios";
import { getErrorMessage, requestDeadline } from "./utils";

/** Why a sitemap could not be retrieved */
export type SitemapFetchFailure =
  | { kind: "status"; status: number }
  | { kind: "transport"; cause: string };

export class SitemapFetchError extends Error {
  constructor(
    readonly url: string,
    readonly failure: SitemapFetchFailure
  ) {
    super(
      failure.kind === "status"
        ? `Failed to fetch sitemap ${url}: HTTP ${failure.status}`
        : `Failed to fetch sitemap ${url}: ${failure.cause}`
    );
    this.name = "SitemapFetchError";
  }
}

/**
 * Fetch raw XML content from a sitemap URL. Single attempt: a non-2xx
 * status, a transport error or running past the client's timeout rejects
 * with a SitemapFetchError.
 * @param url - The sitemap URL
 * @param http - Configured axios instance
 * @returns The XML string
 */
export async function fetchSitemapXml(
  url: string,
  http: AxiosInstance
): Promise<string> {
  const signal = requestDeadline(http);
  let response: AxiosResponse<string>;
  try {
    response = await http.get<string>(url, {
      headers: { Accept: "application/xml, text/xml, */*" },
      responseType: "text",
      validateStatus: () => true,
      signal,
    });
  } catch (err) {
    throw new SitemapFetchError(url, {
      kind: "transport",
      cause: signal?.aborted ? "Request timed out" : getErrorMessage(err),
    });
  }

  if (response.status < 200 || response.status >= 300) {
    throw new SitemapFetchError(url, { kind: "status", status: response.status });
  }
  return typeof response.data === "string"
    ? response.data
    : String(response.data);
}
