/**
 * Supporters module
 *
 * Fetches the public supporter listing and turns it into ordered records.
 * Rendering and writing the output live in @/render and @/output.
 */

export { fetchSupportersPage } from "./fetchSupportersPage";
export { summarizeMissingIndustry } from "./diagnostics";
export * from "./extraction";
