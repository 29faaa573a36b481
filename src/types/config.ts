/**
 * Build configuration type definitions
 */

export type BuildConfig = {
  /** Page listing the supporters */
  sourceUrl: string;
  /** Base URL for resolving relative logo sources */
  baseUrl: string;
  /** Absolute path of the rendered document */
  outputFile: string;
  /** Minimum number of records a run must extract before writing */
  minEntries: number;
};

/**
 * Summary of a successful build
 */
export type BuildResult = {
  outputFile: string;
  entryCount: number;
  missingIndustry: number;
};
