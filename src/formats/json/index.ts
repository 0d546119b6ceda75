/**
 * JSON Format Module
 *
 * Re-exports for the JSON summary report.
 */

export { deserializeSummary, serializeSummary, toSummaryJSON } from "./morphs.js";
export type { HistogramJSON, JSONWriteOptions, SummaryJSON } from "./types.js";
export { HistogramJSONSchema, SummaryJSONSchema } from "./types.js";
