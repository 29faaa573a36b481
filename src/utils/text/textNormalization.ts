/**
 * Text normalization utilities for scraped markup
 *
 * All helpers are pure and deterministic. The sort key folding is
 * intentionally narrow (four German characters) rather than a full
 * Unicode diacritic strip, so "é" keeps ordering after "z".
 */

import {
  NON_BREAKING_SPACE_PATTERN,
  SORT_KEY_FOLDING,
  WHITESPACE_RUN_PATTERN,
} from "@/constants/textNormalization";

/**
 * Replace non-breaking spaces with regular spaces
 */
export function replaceNonBreakingSpaces(text: string): string {
  return text.replace(NON_BREAKING_SPACE_PATTERN, " ");
}

/**
 * Collapse whitespace runs to a single space and trim
 *
 * @example
 * collapseWhitespace("  Bau \n und  Holz ") // "Bau und Holz"
 */
export function collapseWhitespace(text: string): string {
  return text.replace(WHITESPACE_RUN_PATTERN, " ").trim();
}

/**
 * Clean one text node: trim, then replace non-breaking spaces
 *
 * Returns an empty string for whitespace-only input.
 */
export function cleanTextFragment(text: string): string {
  return replaceNonBreakingSpaces(text.trim());
}

/**
 * Derive the ordering key of a supporter name
 *
 * Steps: trim, lowercase, fold ä/ö/ü/ß, collapse whitespace.
 * The display name is never replaced by this key.
 *
 * @example
 * normalizeSortKey("Müller GmbH")  // "mueller gmbh"
 * normalizeSortKey("Groß & Söhne") // "gross & soehne"
 */
export function normalizeSortKey(name: string): string {
  let key = name.trim().toLowerCase();
  for (const [from, to] of SORT_KEY_FOLDING) {
    key = key.split(from).join(to);
  }
  return key.replace(WHITESPACE_RUN_PATTERN, " ");
}

/**
 * Escape a string for literal use inside a RegExp
 */
export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
