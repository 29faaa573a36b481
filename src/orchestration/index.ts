export { buildSupportersPage } from "./buildSupportersPage";
export { ExtractionGuardError } from "./extractionGuardError";
