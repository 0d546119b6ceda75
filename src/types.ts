/**
 * Core type definitions for paired-interval (BEDPE) summarization
 *
 * Records are produced by the BEDPE reader and never mutated afterwards.
 * The tally is the only mutable structure and is owned by a single
 * summarization call.
 */

import { type } from "arktype";

// =============================================================================
// BEDPE RECORDS
// =============================================================================

/**
 * One BEDPE record: two linked genomic locations
 *
 * Column layout: chrom1 start1 end1 chrom2 start2 end2 [name score strand1 strand2 ...]
 */
export interface PairedInterval {
  readonly chrom1: string;
  readonly start1: number;
  readonly end1: number;
  readonly chrom2: string;
  readonly start2: number;
  readonly end2: number;
  readonly name?: string;
  /** Kept as text: BEDPE scores are frequently "." */
  readonly score?: string;
  /** Strand text as written; only "+" and "-" drive insertion/deletion calls */
  readonly strand1?: string;
  readonly strand2?: string;
  /** Columns past the tenth, untouched */
  readonly extraFields: readonly string[];
  /** Original line number for error reporting */
  readonly lineNumber?: number;
}

/**
 * Outcome of reading one line of BEDPE input
 */
export type BedpeLine =
  | { readonly status: "valid"; readonly record: PairedInterval; readonly lineNumber: number }
  | { readonly status: "header"; readonly lineNumber: number }
  | { readonly status: "blank"; readonly lineNumber: number }
  | {
      readonly status: "invalid";
      readonly lineNumber: number;
      readonly reason: string;
      /** Column that failed, when one column is to blame */
      readonly field?: string;
      /** chrom1 of the failing line, when the line got that far */
      readonly chromosome?: string;
    };

export type BedpeLineStatus = BedpeLine["status"];

/**
 * Structural-variant call derived from the strand pair
 */
export type StrandClass = "inversion" | "deletion" | "insertion" | "unclassified";

// =============================================================================
// ACCUMULATION AND REPORT
// =============================================================================

/**
 * Running counters for one summarization pass.
 *
 * `sameChromosome + differentChromosome` always equals the number of valid
 * records observed, and the three SV counters never exceed `differentChromosome`.
 */
export interface RunningTally {
  /** Pairs on one chromosome; reported under the `n_interchrom` key */
  sameChromosome: number;
  /** Pairs spanning two chromosomes; reported under the `n_intrachrom` key */
  differentChromosome: number;
  inversion: number;
  insertion: number;
  deletion: number;
  totalDistance: number;
  /** One |start2 - start1| per different-chromosome pair */
  readonly distances: number[];
}

/**
 * Fixed-bin histogram over a finished distance sample
 */
export interface HistogramData {
  readonly binCount: number;
  readonly minValue: number;
  readonly maxValue: number;
  /** trunc((max - min) / binCount); zero means nothing was binned */
  readonly binWidth: number;
  readonly binCounts: readonly number[];
}

export interface SummaryReport {
  readonly inversion: number;
  readonly insertion: number;
  readonly deletion: number;
  readonly sameChromosome: number;
  readonly differentChromosome: number;
  /** null when no different-chromosome pairs were seen */
  readonly meanLength: number | null;
  /** null for an empty distance sample */
  readonly medianLength: number | null;
  readonly histogram: HistogramData;
}

// =============================================================================
// OPTIONS
// =============================================================================

export type WarningHandler = (warning: string, lineNumber?: number) => void;

/**
 * BEDPE parser configuration options
 */
export interface BedpeParserOptions {
  /** Maximum line length before the line is reported invalid */
  maxLineLength?: number;
}

/**
 * Summarization options
 */
export interface SummaryOptions {
  /** Number of histogram bins (default: 10) */
  binCount?: number;
  /** Called when reading stops early at an invalid line */
  onWarning?: WarningHandler;
}

/**
 * Compression formats accepted on input
 */
export type CompressionFormat = "gzip" | "none";

/**
 * Compression detection result
 */
export interface CompressionDetection {
  readonly format: CompressionFormat;
  /** Magic bytes that led to detection */
  readonly magicBytes?: Uint8Array;
  readonly detectionMethod: "magic-bytes";
}

export type FilePath = string & { readonly __brand: "FilePath" };

export interface FileReaderOptions {
  /** Read buffer size in bytes */
  bufferSize?: number;
  /** Refuse files larger than this many bytes */
  maxFileSize?: number;
  /** Decompress input whose leading bytes are gzip */
  autoDecompress?: boolean;
}

export interface FileMetadata {
  readonly path: FilePath;
  readonly size: number;
  readonly lastModified: Date;
  readonly extension: string;
}

export interface LineProcessingResult {
  readonly lines: string[];
  readonly remainder: string;
}

// =============================================================================
// VALIDATION SCHEMAS
// =============================================================================

/**
 * BEDPE record schema with coordinate checks
 *
 * A start of -1 marks an unknown location, as written by many SV callers.
 */
export const PairedIntervalSchema = type({
  chrom1: "string>0",
  start1: "number>=-1",
  end1: "number>=-1",
  chrom2: "string>0",
  start2: "number>=-1",
  end2: "number>=-1",
  "name?": "string",
  "score?": "string",
  "strand1?": "string",
  "strand2?": "string",
  extraFields: "string[]",
  "lineNumber?": "number>0",
}).pipe((record) => {
  for (const coordinate of [record.start1, record.end1, record.start2, record.end2]) {
    if (!Number.isInteger(coordinate)) {
      throw new Error(`Coordinate ${coordinate} is not an integer`);
    }
  }
  if (record.end1 < record.start1) {
    throw new Error(`end1 (${record.end1}) must be >= start1 (${record.start1})`);
  }
  if (record.end2 < record.start2) {
    throw new Error(`end2 (${record.end2}) must be >= start2 (${record.start2})`);
  }
  return record;
});

export const SummaryOptionsSchema = type({
  "binCount?": "number.integer",
  "onWarning?": "unknown",
});

/** maxLineLength cannot exceed the 10MB a stream reader holds for one line */
export const BedpeParserOptionsSchema = type({
  "maxLineLength?": "0 < number <= 10485760",
});

/**
 * File path validation schema
 * Normalizes separators and rejects characters no genomics path should contain
 */
export const FilePathSchema = type("string>0").pipe((path: string): FilePath => {
  if (path.includes("\0")) {
    throw new Error("File paths cannot contain null characters");
  }

  const invalidChars = /[<>"|*?]/;
  if (invalidChars.test(path)) {
    throw new Error("File path contains invalid characters");
  }

  const normalized = path.replace(/[\\/]+/g, "/");
  return normalized as FilePath;
});

/**
 * File reader options validation schema
 */
export const FileReaderOptionsSchema = type({
  "bufferSize?": "number>=1024",
  "maxFileSize?": "number>=0",
  "autoDecompress?": "boolean",
});
