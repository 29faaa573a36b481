/**
 * Record assembly, deduplication and ordering
 */

import type { SupporterRecord } from "@/types";
import { normalizeSortKey } from "@/utils/text/textNormalization";

export type SupporterFields = Pick<
  SupporterRecord,
  "name" | "industry" | "link" | "logo"
>;

export function createSupporterRecord(fields: SupporterFields): SupporterRecord {
  return {
    name: fields.name,
    industry: fields.industry,
    link: fields.link,
    logo: fields.logo,
    sortKey: normalizeSortKey(fields.name),
  };
}

function identityKey(record: SupporterRecord): string {
  return JSON.stringify([record.name, record.link ?? null, record.logo ?? null]);
}

/**
 * Keep the first record per (name, link, logo), preserving order
 *
 * A later duplicate with different industry text is dropped.
 */
export function dedupeSupporters(
  records: readonly SupporterRecord[],
): SupporterRecord[] {
  const seen = new Set<string>();
  const unique: SupporterRecord[] = [];

  for (const record of records) {
    const key = identityKey(record);
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);
    unique.push(record);
  }

  return unique;
}

/**
 * Order strings by Unicode code point (no locale collation)
 *
 * Differs from `<` on UTF-16 code units when an astral character meets one
 * in U+E000–U+FFFF.
 */
export function compareCodePoints(a: string, b: string): number {
  const left = Array.from(a);
  const right = Array.from(b);
  const length = Math.min(left.length, right.length);

  for (let i = 0; i < length; i++) {
    const diff = (left[i].codePointAt(0) ?? 0) - (right[i].codePointAt(0) ?? 0);
    if (diff !== 0) {
      return diff < 0 ? -1 : 1;
    }
  }

  return Math.sign(left.length - right.length);
}

export function compareSupporters(a: SupporterRecord, b: SupporterRecord): number {
  return compareCodePoints(a.sortKey, b.sortKey);
}

/**
 * Stable ascending sort by sort key; returns a new array
 */
export function sortSupporters(
  records: readonly SupporterRecord[],
): SupporterRecord[] {
  return [...records].sort(compareSupporters);
}
