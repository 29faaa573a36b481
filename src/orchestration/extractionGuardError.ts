/**
 * Raised when a run extracts fewer records than the configured minimum
 *
 * Signals that the source page layout probably changed; the run aborts
 * before any output is written.
 */
export class ExtractionGuardError extends Error {
  public readonly entryCount: number;
  public readonly minEntries: number;

  constructor(entryCount: number, minEntries: number) {
    super(
      `Extraction looks wrong: ${entryCount} supporters found, at least ${minEntries} required`,
    );
    this.name = "ExtractionGuardError";
    this.entryCount = entryCount;
    this.minEntries = minEntries;
  }
}
