/**
 * bedpe-summary - structural-variant summaries of BEDPE files
 *
 * Reads paired-end BED records, calls each inter-chromosomal pair as an
 * inversion, insertion or deletion from its strands, and reports counts plus
 * distance statistics as JSON.
 */

// Compression infrastructure
export { autoDecompress, CompressionDetector, GzipDecompressor, peekStream } from "./compression/index.js";
// Error types
export {
  BedpeError,
  BedpeSummaryError,
  BufferError,
  CompressionError,
  FileError,
  ParseError,
  StreamError,
  ValidationError,
} from "./errors.js";
// BEDPE format
export { BedpeFormat, BedpeParser, isHeaderLine, parseCoordinate } from "./formats/bedpe.js";
// JSON report
export {
  deserializeSummary,
  type HistogramJSON,
  HistogramJSONSchema,
  type JSONWriteOptions,
  type SummaryJSON,
  SummaryJSONSchema,
  serializeSummary,
  toSummaryJSON,
} from "./formats/json/index.js";
// File I/O infrastructure
export { FileReader, openInput, STDIN_PATHS } from "./io/file-reader.js";
export { getPlatform } from "./io/runtime.js";
export { StreamUtils } from "./io/stream-utils.js";
// Statistics
export {
  buildHistogram,
  calculateMean,
  calculateMedian,
  DEFAULT_BIN_COUNT,
} from "./operations/core/statistics.js";
// Summary
export {
  BedpeSummary,
  classifyStrands,
  createTally,
  observe,
  summarize,
  summarizeFile,
  summarizeLines,
  summarizeRecords,
  summarizeStream,
} from "./operations/summary.js";
// Core types
export type {
  BedpeLine,
  BedpeLineStatus,
  BedpeParserOptions,
  CompressionDetection,
  CompressionFormat,
  FileMetadata,
  FilePath,
  FileReaderOptions,
  HistogramData,
  LineProcessingResult,
  PairedInterval,
  RunningTally,
  StrandClass,
  SummaryOptions,
  SummaryReport,
  WarningHandler,
} from "./types.js";
// Validation schemas
export {
  BedpeParserOptionsSchema,
  FilePathSchema,
  FileReaderOptionsSchema,
  PairedIntervalSchema,
  SummaryOptionsSchema,
} from "./types.js";
