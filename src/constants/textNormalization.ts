/**
 * Text normalization constants
 */

/**
 * Character folding applied to sort keys so names order by their
 * transliterated spelling (Müller sorts as "mueller")
 */
export const SORT_KEY_FOLDING: ReadonlyArray<readonly [string, string]> = [
  ["ä", "ae"],
  ["ö", "oe"],
  ["ü", "ue"],
  ["ß", "ss"],
];

export const WHITESPACE_RUN_PATTERN = /\s+/g;

export const NON_BREAKING_SPACE_PATTERN = /\u00a0/g;
