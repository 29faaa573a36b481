export {
  extractSupporters,
  scanSupporterCandidates,
  DEFAULT_EXTRACTION_OPTIONS,
} from "./extractSupporters";
export { parseLabeledField } from "./labeledField";
export {
  createSupporterRecord,
  dedupeSupporters,
  sortSupporters,
  compareSupporters,
  compareCodePoints,
} from "./supporterList";
export type { SupporterFields } from "./supporterList";
