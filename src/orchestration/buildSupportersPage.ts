/**
 * Supporters page build — fetch, extract, check, render, write
 *
 * Steps run strictly in sequence. Any failure (fetch error, too few
 * records) aborts before the output file is touched, so a broken run
 * never replaces the last good page.
 */

import type { BuildConfig, BuildResult } from "@/types";
import { SUPPORTERS_DIRECTORY } from "@/constants";
import * as logger from "@/logger";
import {
  extractSupporters,
  fetchSupportersPage,
  summarizeMissingIndustry,
} from "@/supporters";
import { renderSupportersPage } from "@/render";
import { writeOutputFile } from "@/output/writeOutputFile";
import { ExtractionGuardError } from "./extractionGuardError";

export async function buildSupportersPage(
  config: BuildConfig,
): Promise<BuildResult> {
  const log = logger.withContext({ sourceUrl: config.sourceUrl });

  const html = await fetchSupportersPage(config.sourceUrl);
  const records = extractSupporters(html, { baseUrl: config.baseUrl });

  const missing = summarizeMissingIndustry(
    records,
    SUPPORTERS_DIRECTORY.GUARD.MISSING_INDUSTRY_PREVIEW,
  );
  log.info("Supporters extracted", {
    entries: records.length,
    missingIndustry: missing.count,
  });
  if (missing.count > 0) {
    log.warn("Supporters without industry", {
      count: missing.count,
      first: missing.preview,
    });
  }

  if (records.length < config.minEntries) {
    throw new ExtractionGuardError(records.length, config.minEntries);
  }

  writeOutputFile(config.outputFile, renderSupportersPage(records));

  log.info("Supporters page written", {
    outputFile: config.outputFile,
    entries: records.length,
  });

  return {
    outputFile: config.outputFile,
    entryCount: records.length,
    missingIndustry: missing.count,
  };
}
