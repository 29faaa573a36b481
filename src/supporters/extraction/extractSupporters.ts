/**
 * Supporter extraction from the heading-delimited listing page
 *
 * Page convention the heuristic relies on:
 * - every entry starts with an anchor heading (h3); entries never nest
 * - the logo sits above its heading
 * - the labeled field ("Branche: ...") and the website follow the heading
 *
 * Everything between one heading and the next belongs to the first one.
 * Lookups move an index through the flattened document, bounded by the
 * neighboring headings, so nothing leaks into a different entry.
 */

import type {
  ExtractionOptions,
  HeadingCandidate,
  SupporterRecord,
} from "@/types";
import { SUPPORTERS_DIRECTORY } from "@/constants";
import * as logger from "@/logger";
import {
  cleanTextFragment,
  replaceNonBreakingSpaces,
} from "@/utils/text/textNormalization";
import { isText } from "domhandler";
import type { AnyNode } from "domhandler";
import {
  flattenDocument,
  isElementNamed,
  readElementText,
} from "./documentNodes";
import type { FlatDocument } from "./documentNodes";
import { parseLabeledField } from "./labeledField";
import {
  createSupporterRecord,
  dedupeSupporters,
  sortSupporters,
} from "./supporterList";

const { ANCHOR_TAG, FIELD_LABEL, SKIP_TITLES } = SUPPORTERS_DIRECTORY.EXTRACTION;

export const DEFAULT_EXTRACTION_OPTIONS: ExtractionOptions = {
  baseUrl: SUPPORTERS_DIRECTORY.BASE_URL,
  skipTitles: new Set<string>(SKIP_TITLES),
  fieldLabel: FIELD_LABEL,
};

function resolveOptions(options: Partial<ExtractionOptions>): ExtractionOptions {
  const merged = { ...DEFAULT_EXTRACTION_OPTIONS, ...options };
  return {
    ...merged,
    skipTitles: new Set(
      Array.from(merged.skipTitles, (title) => title.trim().toUpperCase()),
    ),
  };
}

function isExternalHref(href: string): boolean {
  return href.startsWith("http://") || href.startsWith("https://");
}

function resolveUrl(src: string, baseUrl: string): string | undefined {
  try {
    return new URL(src, baseUrl).toString();
  } catch {
    logger.debug("Ignoring unresolvable image source", { src, baseUrl });
    return undefined;
  }
}

/**
 * Walk backward from the heading to the previous heading and return the
 * first image source met, as an absolute URL
 */
function findLogoBefore(
  flat: FlatDocument,
  ordinal: number,
  baseUrl: string,
): string | undefined {
  const position = flat.anchorPositions[ordinal];
  const stop = ordinal > 0 ? flat.anchorPositions[ordinal - 1] : -1;

  for (let index = position - 1; index > stop; index--) {
    const node = flat.nodes[index];
    if (!isElementNamed(node, "img")) {
      continue;
    }
    const src = node.attribs.src;
    if (!src) {
      continue;
    }
    const logo = resolveUrl(src, baseUrl);
    if (logo) {
      return logo;
    }
  }

  return undefined;
}

/**
 * Walk forward over [start, end): first external link wins, every
 * non-empty text node is collected in order
 */
function scanRegion(
  nodes: readonly AnyNode[],
  start: number,
  end: number,
): { link?: string; texts: string[] } {
  let link: string | undefined;
  const texts: string[] = [];

  for (let index = start; index < end; index++) {
    const node = nodes[index];

    if (link === undefined && isElementNamed(node, "a")) {
      const href = (node.attribs.href ?? "").trim();
      if (isExternalHref(href)) {
        link = href;
      }
    }

    if (isText(node)) {
      const text = cleanTextFragment(node.data);
      if (text) {
        texts.push(text);
      }
    }
  }

  return { link, texts };
}

/**
 * Inspect every anchor heading and report what was found for it
 *
 * Headings with an empty name, a skip-listed title, or no supporting
 * evidence (logo, labeled field, external link) are kept in the result
 * with a status explaining why they do not become records.
 *
 * @param html - Raw page markup
 * @param options - Overrides for base URL, skip titles and field label
 * @returns One candidate per heading, in document order
 */
export function scanSupporterCandidates(
  html: string,
  options: Partial<ExtractionOptions> = {},
): HeadingCandidate[] {
  const { baseUrl, skipTitles, fieldLabel } = resolveOptions(options);
  const flat = flattenDocument(html, ANCHOR_TAG);
  const candidates: HeadingCandidate[] = [];

  flat.anchorPositions.forEach((position, ordinal) => {
    const heading = flat.nodes[position];
    const name = isElementNamed(heading, ANCHOR_TAG)
      ? replaceNonBreakingSpaces(readElementText(heading)).trim()
      : "";

    if (!name) {
      candidates.push({ position, name, status: "empty-name" });
      return;
    }
    if (skipTitles.has(name.toUpperCase())) {
      candidates.push({ position, name, status: "skipped-title" });
      return;
    }

    const regionEnd = flat.anchorPositions[ordinal + 1] ?? flat.nodes.length;
    const logo = findLogoBefore(flat, ordinal, baseUrl);
    const { link, texts } = scanRegion(flat.nodes, position + 1, regionEnd);
    const industry = parseLabeledField(texts.join(" "), fieldLabel);

    if (!logo && !industry && !link) {
      candidates.push({ position, name, status: "no-evidence" });
      return;
    }

    candidates.push({ position, name, status: "accepted", industry, link, logo });
  });

  return candidates;
}

/**
 * Extract supporter records from the listing page
 *
 * Accepted headings become records, duplicates by (name, link, logo) are
 * collapsed keeping the first, and the result is ordered by sort key.
 * Extracting the same markup twice yields the same sequence.
 *
 * @param html - Raw page markup
 * @param options - Overrides for base URL, skip titles and field label
 */
export function extractSupporters(
  html: string,
  options: Partial<ExtractionOptions> = {},
): SupporterRecord[] {
  const candidates = scanSupporterCandidates(html, options);
  const records = candidates
    .filter((candidate) => candidate.status === "accepted")
    .map((candidate) => createSupporterRecord(candidate));
  const unique = dedupeSupporters(records);

  logger.debug("Supporter extraction finished", {
    headings: candidates.length,
    accepted: records.length,
    duplicates: records.length - unique.length,
  });

  return sortSupporters(unique);
}
