import {
  collapseWhitespace,
  escapeRegExp,
} from "@/utils/text/textNormalization";

/**
 * Find "<label>: <value>" in free text and return the value
 *
 * The value runs until an embedded URL (" http://" / " https://") or the
 * end of the text, so a website printed after the field is not swallowed.
 * Matching is case-insensitive; an empty value counts as absent.
 *
 * @example
 * parseLabeledField("Acme Branche: Bau https://acme.example", "Branche") // "Bau"
 */
export function parseLabeledField(
  text: string,
  label: string,
): string | undefined {
  const pattern = new RegExp(
    `\\b${escapeRegExp(label)}\\s*:\\s*(.+?)(?=\\shttps?:\\/\\/|$)`,
    "i",
  );
  const match = pattern.exec(collapseWhitespace(text));
  const value = match?.[1]?.trim();
  return value ? value : undefined;
}
