import type { MissingIndustrySummary, SupporterRecord } from "@/types";

/**
 * Count records without an industry and list the first few names
 *
 * @param records - Final record list
 * @param previewSize - Maximum number of names in the preview
 */
export function summarizeMissingIndustry(
  records: readonly SupporterRecord[],
  previewSize: number,
): MissingIndustrySummary {
  const missing = records
    .filter((record) => !record.industry)
    .map((record) => record.name);

  return {
    count: missing.length,
    preview: missing.slice(0, previewSize),
  };
}
