/**
 * Supporter directory configuration constants
 *
 * Source page, extraction heuristics and the run guard.
 */

export const SUPPORTERS_DIRECTORY = {
  SOURCE_URL: "https://www.initiativeoesterreich2040.at/unsere-unterstuetzer",
  BASE_URL: "https://www.initiativeoesterreich2040.at",

  /**
   * Output path, relative to the working directory
   */
  OUTPUT_FILE: "dist/index.html",

  FETCH: {
    USER_AGENT: "Mozilla/5.0 (supporter-scraper; +github-actions)",
    TIMEOUT_MS: 30_000,
  },

  EXTRACTION: {
    /**
     * Element starting each entry; entries are never nested
     */
    ANCHOR_TAG: "h3",

    /**
     * Label of the field stored as industry ("Branche: Bau")
     */
    FIELD_LABEL: "Branche",

    /**
     * Headings shaped like entries that are not supporters
     * (compared against the uppercased heading text)
     */
    SKIP_TITLES: [
      "KONTAKTIEREN SIE UNS WENN SIE UNTERSTÜTZER WERDEN WOLLEN",
      "ÜBER INITIATIVE ÖSTERREICH 2040",
    ],
  },

  GUARD: {
    /**
     * Fewer records than this means the page layout changed; abort the run
     */
    MIN_ENTRIES: 10,

    /**
     * Number of names listed when reporting records without industry
     */
    MISSING_INDUSTRY_PREVIEW: 10,
  },
} as const;
