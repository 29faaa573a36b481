/**
 * Rendered page constants
 */

export const SUPPORTERS_PAGE = {
  TITLE: "Unterstützer – alphabetisch",
  LANG: "de",
  /**
   * The embedding site resizes its iframe on messages of this type
   */
  HEIGHT_MESSAGE_TYPE: "ioe2040_iframe_height",
  TIMESTAMP_LOCALE: "de-AT",
  SEARCH_PLACEHOLDER: "Suche nach Name oder Branche",
  /**
   * Card href when the entry has no external link
   */
  FALLBACK_LINK: "#",
  EMPTY_RESULT_TEXT: "Keine Treffer.",
} as const;
