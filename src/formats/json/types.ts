/**
 * JSON report type definitions
 *
 * Wire shape of the summary report. Key names and order are fixed: the
 * report is read by scripts that predate this library.
 */

import { type } from "arktype";

/**
 * Options for writing the JSON report
 */
export interface JSONWriteOptions {
  /**
   * Pretty-print JSON with two-space indentation (default: true)
   */
  pretty?: boolean;
}

export const HistogramJSONSchema = type({
  min_val: "number.integer",
  bin_width: "number.integer >= 0",
  bin_counts: "number.integer[]",
});

export const SummaryJSONSchema = type({
  inversion: "number.integer >= 0",
  insertion: "number.integer >= 0",
  deletion: "number.integer >= 0",
  n_interchrom: "number.integer >= 0",
  n_intrachrom: "number.integer >= 0",
  "mean intrachromasomal sv length": "number.integer | null",
  "median intrachromasomal sv length": "number.integer | null",
  histogram: HistogramJSONSchema,
});

export type HistogramJSON = typeof HistogramJSONSchema.infer;
export type SummaryJSON = typeof SummaryJSONSchema.infer;
