/**
 * Supporters page renderer
 *
 * Produces one self-contained HTML document (inline styles and scripts)
 * from the ordered records. Every record value is HTML-escaped; missing
 * optional fields render as empty.
 */

import type { RenderOptions, SupporterRecord } from "@/types";
import { SUPPORTERS_DIRECTORY, SUPPORTERS_PAGE } from "@/constants";
import { escapeHtml } from "@/utils/html/escapeHtml";
import {
  PAGE_STYLES,
  heightScript,
  searchScript,
  timestampScript,
} from "./pageAssets";

export const DEFAULT_RENDER_OPTIONS: RenderOptions = {
  title: SUPPORTERS_PAGE.TITLE,
  lang: SUPPORTERS_PAGE.LANG,
  fieldLabel: SUPPORTERS_DIRECTORY.EXTRACTION.FIELD_LABEL,
  heightMessageType: SUPPORTERS_PAGE.HEIGHT_MESSAGE_TYPE,
  timestampLocale: SUPPORTERS_PAGE.TIMESTAMP_LOCALE,
  searchPlaceholder: SUPPORTERS_PAGE.SEARCH_PLACEHOLDER,
};

/**
 * Lowercased text the inline search matches against
 */
function searchText(record: SupporterRecord): string {
  return `${record.name} ${record.industry ?? ""}`.trim().toLowerCase();
}

/**
 * Render one card: logo, name and the labeled industry line
 */
export function renderSupporterCard(
  record: SupporterRecord,
  fieldLabel: string,
): string {
  const href = record.link ?? SUPPORTERS_PAGE.FALLBACK_LINK;
  const logo = record.logo
    ? `<img src="${escapeHtml(record.logo)}" alt="${escapeHtml(record.name)}" loading="lazy" decoding="async">`
    : "";
  const meta = record.industry
    ? `${escapeHtml(fieldLabel)}: ${escapeHtml(record.industry)}`
    : "";

  return [
    `<a class="card" href="${escapeHtml(href)}" target="_blank" rel="noopener" data-search="${escapeHtml(searchText(record))}">`,
    `  <div class="logoWrap">${logo}</div>`,
    `  <div class="name">${escapeHtml(record.name)}</div>`,
    `  <div class="meta">${meta}</div>`,
    `</a>`,
  ].join("\n");
}

/**
 * Render the complete document
 *
 * Same records and options give byte-identical output; the visible
 * timestamp is filled in by the browser.
 *
 * @param records - Records in display order
 * @param options - Overrides for title, language, labels and embed settings
 */
export function renderSupportersPage(
  records: readonly SupporterRecord[],
  options: Partial<RenderOptions> = {},
): string {
  const opts: RenderOptions = { ...DEFAULT_RENDER_OPTIONS, ...options };
  const count = records.length;
  const cards = records
    .map((record) => renderSupporterCard(record, opts.fieldLabel))
    .join("\n");

  return `<!doctype html>
<html lang="${escapeHtml(opts.lang)}">
<head>
<meta charset="utf-8">
<meta name="viewport" content="width=device-width,initial-scale=1">
<title>${escapeHtml(opts.title)}</title>
<meta name="robots" content="noindex,nofollow">
<style>
${PAGE_STYLES}
</style>
</head>
<body>

<div class="toolbar">
<input id="search" type="search" placeholder="${escapeHtml(opts.searchPlaceholder)}" aria-label="${escapeHtml(opts.searchPlaceholder)}" autocomplete="off">
<span class="count"><span id="visibleCount">${count}</span> / ${count}</span>
</div>

<div class="grid" id="grid">
${cards}
</div>

<p class="empty" id="empty" hidden>${escapeHtml(SUPPORTERS_PAGE.EMPTY_RESULT_TEXT)}</p>

<footer>
Stand: <span id="ts"></span> · Partner: <strong>${count}</strong>
</footer>

<script>
${timestampScript(opts.timestampLocale)}
</script>

<script>
${searchScript()}
</script>

<script>
${heightScript(opts.heightMessageType)}
</script>

</body>
</html>
`;
}
