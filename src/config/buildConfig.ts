/**
 * Build configuration from environment variables
 *
 * Environment variables (all optional):
 *   - SUPPORTERS_SOURCE_URL: Page listing the supporters
 *   - SUPPORTERS_BASE_URL: Base URL for relative logo sources
 *   - OUTPUT_FILE: Output path (relative paths resolve against cwd)
 *   - MIN_ENTRIES: Minimum record count before anything is written
 */

import { resolve } from "path";
import type { BuildConfig } from "@/types";
import { SUPPORTERS_DIRECTORY } from "@/constants";
import { ConfigError } from "./configError";

function readVariable(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function parseHttpUrl(name: string, value: string): string {
  let url: URL;
  try {
    url = new URL(value);
  } catch {
    throw new ConfigError(name, `not a valid URL: "${value}"`);
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new ConfigError(name, `expected an http(s) URL, got "${value}"`);
  }
  return value;
}

function parsePositiveInteger(name: string, value: string): number {
  if (!/^\d+$/.test(value) || Number(value) < 1) {
    throw new ConfigError(name, `expected a positive integer, got "${value}"`);
  }
  return Number(value);
}

/**
 * Read and validate the build configuration
 *
 * @param env - Environment to read (defaults to process.env)
 * @param cwd - Directory relative output paths resolve against
 * @throws {ConfigError} On malformed URLs or a non-positive MIN_ENTRIES
 */
export function loadBuildConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): BuildConfig {
  const sourceUrl = parseHttpUrl(
    "SUPPORTERS_SOURCE_URL",
    readVariable(env, "SUPPORTERS_SOURCE_URL") ?? SUPPORTERS_DIRECTORY.SOURCE_URL,
  );
  const baseUrl = parseHttpUrl(
    "SUPPORTERS_BASE_URL",
    readVariable(env, "SUPPORTERS_BASE_URL") ?? SUPPORTERS_DIRECTORY.BASE_URL,
  );
  const outputFile = resolve(
    cwd,
    readVariable(env, "OUTPUT_FILE") ?? SUPPORTERS_DIRECTORY.OUTPUT_FILE,
  );
  const minEntriesRaw = readVariable(env, "MIN_ENTRIES");
  const minEntries =
    minEntriesRaw === undefined
      ? SUPPORTERS_DIRECTORY.GUARD.MIN_ENTRIES
      : parsePositiveInteger("MIN_ENTRIES", minEntriesRaw);

  return { sourceUrl, baseUrl, outputFile, minEntries };
}
