/**
 * Supporter directory type definitions
 */

/**
 * One supporter/partner recovered from the listing page
 *
 * Built once during extraction and never mutated afterwards.
 */
export type SupporterRecord = {
  /** Display name, trimmed, non-breaking spaces replaced */
  readonly name: string;
  /** Value of the labeled field ("Branche: ...") when present */
  readonly industry?: string;
  /** First external http(s) link of the entry */
  readonly link?: string;
  /** Absolute logo URL */
  readonly logo?: string;
  /** Ordering key derived from name (see normalizeSortKey) */
  readonly sortKey: string;
};

/**
 * Knobs for the heading-based extractor
 */
export type ExtractionOptions = {
  /** Base URL relative logo sources are resolved against */
  baseUrl: string;
  /** Uppercased heading texts that never denote a supporter */
  skipTitles: ReadonlySet<string>;
  /** Label of the field captured as industry (case-insensitive) */
  fieldLabel: string;
};

/**
 * Outcome of inspecting one anchor heading
 *
 * - accepted: produced a record (may still be dropped as a duplicate)
 * - empty-name: heading carries no text
 * - skipped-title: heading text is on the skip list
 * - no-evidence: no logo, no labeled field and no external link nearby
 */
export type HeadingStatus =
  | "accepted"
  | "empty-name"
  | "skipped-title"
  | "no-evidence";

export type HeadingCandidate = {
  /** Position of the heading in the flattened node list */
  position: number;
  name: string;
  status: HeadingStatus;
  industry?: string;
  link?: string;
  logo?: string;
};

/**
 * Records lacking the industry field, reported for operator visibility
 */
export type MissingIndustrySummary = {
  count: number;
  /** First names, capped by the preview size */
  preview: string[];
};
