import * as fs from "fs";
import * as path from "path";
import { PageResult } from "./types";

export const RESULTS_FILENAME = "results.json";

/**
 * Fix the key order of a report entry; `error` is left out when absent.
 */
function toReportEntry(result: PageResult): PageResult {
  const entry: PageResult = {
    url: result.url,
    status_code: result.status_code,
    content_length: result.content_length,
    mime_type: result.mime_type,
  };
  if (result.error !== undefined) entry.error = result.error;
  return entry;
}

/**
 * Write all page results to results.json inside the output directory,
 * pretty-printed, in the order given.
 * @param results - Page results in scheduling order
 * @param outputDir - Target directory (created if needed)
 * @returns Path to the written file
 */
export function exportResults(
  results: PageResult[],
  outputDir: string
): string {
  fs.mkdirSync(outputDir, { recursive: true });
  const filePath = path.join(outputDir, RESULTS_FILENAME);
  fs.writeFileSync(
    filePath,
    JSON.stringify(results.map(toReportEntry), null, 2) + "\n",
    "utf-8"
  );
  return filePath;
}
