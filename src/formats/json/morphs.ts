/**
 * Summary report serialization
 *
 * The mean/median sentinel for "no different-chromosome pairs" is JSON
 * null, which no numeric value can be confused with.
 */

import { type } from "arktype";
import type { SummaryReport } from "../../types.js";
import type { JSONWriteOptions, SummaryJSON } from "./types.js";
import { SummaryJSONSchema } from "./types.js";

/**
 * Map a report onto its wire shape, in output key order
 */
export function toSummaryJSON(report: SummaryReport): SummaryJSON {
  return {
    inversion: report.inversion,
    insertion: report.insertion,
    deletion: report.deletion,
    n_interchrom: report.sameChromosome,
    n_intrachrom: report.differentChromosome,
    "mean intrachromasomal sv length": report.meanLength,
    "median intrachromasomal sv length": report.medianLength,
    histogram: {
      min_val: report.histogram.minValue,
      bin_width: report.histogram.binWidth,
      bin_counts: [...report.histogram.binCounts],
    },
  };
}

export function serializeSummary(report: SummaryReport, options: JSONWriteOptions = {}): string {
  const data = toSummaryJSON(report);
  return options.pretty === false ? JSON.stringify(data) : JSON.stringify(data, null, 2);
}

export const deserializeSummary = type("string.json.parse").pipe(SummaryJSONSchema);
