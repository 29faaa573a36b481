/**
 * Entrypoint — builds the supporters page once, then exits
 *
 * Usage:
 *   npm start
 *   OUTPUT_FILE=public/index.html npm start
 *
 * Configuration is read from the environment (a .env file is loaded if
 * present); see .env.example. Exits with code 1 on any failure, including
 * a run that extracted fewer than MIN_ENTRIES supporters.
 */

import "dotenv/config";
import { loadBuildConfig } from "@/config";
import { buildSupportersPage } from "@/orchestration";
import * as logger from "@/logger";

async function main(): Promise<void> {
  const config = loadBuildConfig();

  logger.info("Starting supporters page build", {
    sourceUrl: config.sourceUrl,
    outputFile: config.outputFile,
    minEntries: config.minEntries,
  });

  const result = await buildSupportersPage(config);

  logger.info("Build finished", {
    outputFile: result.outputFile,
    entries: result.entryCount,
    missingIndustry: result.missingIndustry,
  });
}

main().catch((error: unknown) => {
  logger.error("Build failed with fatal error", {
    error: logger.describeError(error),
    name: error instanceof Error ? error.name : undefined,
    stack: error instanceof Error ? error.stack : undefined,
  });
  process.exit(1);
});
