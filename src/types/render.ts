/**
 * Renderer type definitions
 */

export type RenderOptions = {
  /** Document <title> */
  title: string;
  /** <html lang> attribute */
  lang: string;
  /** Label shown before the industry value on each card */
  fieldLabel: string;
  /** postMessage type the embedding page listens for */
  heightMessageType: string;
  /** Locale for the client-side "last updated" timestamp */
  timestampLocale: string;
  /** Placeholder of the inline search field */
  searchPlaceholder: string;
};
