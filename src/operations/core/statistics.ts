/**
 * Batch statistics over a finished distance sample
 *
 * All results are integers: distances are base-pair counts, so averages
 * truncate toward zero rather than producing fractional positions.
 */

import type { HistogramData } from "../../types.js";

export const DEFAULT_BIN_COUNT = 10;

/**
 * Truncating mean, or null when there is nothing to divide by
 */
export function calculateMean(total: number, count: number): number | null {
  if (count <= 0) return null;
  return Math.trunc(total / count);
}

/**
 * Median of a sample; the input array is left untouched
 *
 * Even-sized samples average the two middle values with truncation.
 * An empty sample has no median and yields null.
 */
export function calculateMedian(sample: readonly number[]): number | null {
  if (sample.length === 0) return null;

  const sorted = [...sample].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);

  if (sorted.length % 2 === 1) {
    return sorted[mid] ?? null;
  }

  const lower = sorted[mid - 1];
  const upper = sorted[mid];
  if (lower === undefined || upper === undefined) return null;
  return Math.trunc((lower + upper) / 2);
}

/**
 * Build a fixed-bin histogram
 *
 * binWidth = trunc((max - min) / binCount). A zero width (one distinct
 * value, or a range narrower than the bin count) leaves every bin at zero.
 * Values whose index reaches past the last bin are counted in the last bin,
 * so whenever binning happens the counts add up to the sample size.
 */
export function buildHistogram(
  sample: readonly number[],
  binCount: number = DEFAULT_BIN_COUNT
): HistogramData {
  const bins = Math.max(binCount, 0);
  const binCounts = new Array<number>(bins).fill(0);

  if (sample.length === 0 || binCount <= 0) {
    return { binCount: bins, minValue: 0, maxValue: 0, binWidth: 0, binCounts };
  }

  // Math.min(...sample) overflows the call stack on large samples
  let minValue = Number.POSITIVE_INFINITY;
  let maxValue = Number.NEGATIVE_INFINITY;
  for (const value of sample) {
    if (value < minValue) minValue = value;
    if (value > maxValue) maxValue = value;
  }

  const binWidth = Math.trunc((maxValue - minValue) / binCount);
  if (binWidth === 0) {
    return { binCount: bins, minValue, maxValue, binWidth, binCounts };
  }

  for (const value of sample) {
    const index = Math.min(Math.floor((value - minValue) / binWidth), binCount - 1);
    binCounts[index] = (binCounts[index] ?? 0) + 1;
  }

  return { binCount: bins, minValue, maxValue, binWidth, binCounts };
}
