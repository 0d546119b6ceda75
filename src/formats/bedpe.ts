/**
 * BEDPE format reader
 *
 * Paired-end BED: two intervals per line, tab separated.
 *
 *   chrom1 start1 end1 chrom2 start2 end2 [name score strand1 strand2 extra...]
 *
 * The reader classifies every input line instead of throwing, so callers
 * decide what an invalid line means. `parseString` and `parseFile` wrap it
 * for callers that only want records and treat bad lines as errors.
 */

import { type } from "arktype";
import { BedpeError, ValidationError } from "../errors.js";
import { readLines, splitLines } from "../io/stream-utils.js";
import type { BedpeLine, BedpeParserOptions, PairedInterval } from "../types.js";
import { BedpeParserOptionsSchema, PairedIntervalSchema } from "../types.js";

const MIN_BEDPE_FIELDS = 6;
const HEADER_PREFIXES = ["#", "track", "browser"] as const;

const COLUMN_NAMES = ["chrom1", "start1", "end1", "chrom2", "start2", "end2"] as const;

/**
 * Check whether a line is a header, comment, track or browser line
 */
export function isHeaderLine(line: string): boolean {
  return HEADER_PREFIXES.some((prefix) => line.startsWith(prefix));
}

/**
 * Parse one coordinate column; "-1" is allowed for unknown positions
 */
export function parseCoordinate(value: string): number | null {
  if (!/^-?\d+$/.test(value)) return null;
  const coordinate = Number.parseInt(value, 10);
  return Number.isSafeInteger(coordinate) ? coordinate : null;
}

type LineOutcome =
  | { readonly ok: true; readonly record: PairedInterval }
  | {
      readonly ok: false;
      readonly reason: string;
      readonly field?: string;
      readonly chromosome?: string;
    };

/**
 * Streaming BEDPE reader
 */
export class BedpeParser {
  private readonly options: Required<BedpeParserOptions>;

  constructor(options: BedpeParserOptions = {}) {
    const validation = BedpeParserOptionsSchema(options);
    if (validation instanceof type.errors) {
      throw new ValidationError(`Invalid BEDPE parser options: ${validation.summary}`);
    }

    this.options = {
      maxLineLength: 1_000_000,
      ...options,
    };
  }

  /**
   * Classify every line of the input, in order
   *
   * Line numbers are 1-based and count every physical line.
   */
  async *lines(source: AsyncIterable<string> | Iterable<string>): AsyncIterable<BedpeLine> {
    let lineNumber = 0;
    for await (const line of source) {
      lineNumber++;
      yield this.classifyLine(line, lineNumber);
    }
  }

  /**
   * Classify the lines of a byte stream
   */
  readStream(stream: ReadableStream<Uint8Array>): AsyncIterable<BedpeLine> {
    return this.lines(readLines(stream));
  }

  /**
   * Classify the lines of an in-memory string
   */
  readString(data: string): AsyncIterable<BedpeLine> {
    return this.lines(splitLines(data));
  }

  /**
   * Parse records from a string, throwing on the first invalid line
   *
   * @throws {BedpeError} On a malformed line
   */
  async *parseString(data: string): AsyncIterable<PairedInterval> {
    yield* this.strictRecords(this.readString(data));
  }

  /**
   * Parse records from a file, throwing on the first invalid line
   *
   * @throws {FileError} If the file cannot be opened
   * @throws {BedpeError} On a malformed line
   */
  async *parseFile(filePath: string): AsyncIterable<PairedInterval> {
    const { createStream } = await import("../io/file-reader.js");
    const stream = await createStream(filePath);
    yield* this.strictRecords(this.readStream(stream));
  }

  /**
   * Classify a single line
   */
  classifyLine(line: string, lineNumber: number): BedpeLine {
    if (line.length > this.options.maxLineLength) {
      return {
        status: "invalid",
        lineNumber,
        reason: `Line too long (${line.length} > ${this.options.maxLineLength})`,
      };
    }

    const trimmed = line.trim();
    if (!trimmed) return { status: "blank", lineNumber };
    if (isHeaderLine(trimmed)) return { status: "header", lineNumber };

    const outcome = this.parseLine(trimmed, lineNumber);
    if (outcome.ok) {
      return { status: "valid", record: outcome.record, lineNumber };
    }

    const { reason, field, chromosome } = outcome;
    return {
      status: "invalid",
      lineNumber,
      reason,
      ...(field !== undefined && { field }),
      ...(chromosome !== undefined && { chromosome }),
    };
  }

  private async *strictRecords(lines: AsyncIterable<BedpeLine>): AsyncIterable<PairedInterval> {
    for await (const line of lines) {
      if (line.status === "valid") {
        yield line.record;
      } else if (line.status === "invalid") {
        throw new BedpeError(line.reason, line.chromosome, line.field, line.lineNumber);
      }
    }
  }

  private parseLine(line: string, lineNumber: number): LineOutcome {
    const fields = line.split("\t").map((field) => field.trim());

    if (fields.length < MIN_BEDPE_FIELDS) {
      return {
        ok: false,
        reason: `BEDPE format requires at least ${MIN_BEDPE_FIELDS} fields, got ${fields.length}`,
      };
    }

    const coordinates: number[] = [];
    for (const index of [1, 2, 4, 5]) {
      const raw = fields[index] ?? "";
      const coordinate = parseCoordinate(raw);
      if (coordinate === null) {
        const field = COLUMN_NAMES[index] ?? `column ${index + 1}`;
        return {
          ok: false,
          reason: `Invalid ${field}: '${raw}' is not a valid integer`,
          field,
          chromosome: fields[0] ?? "",
        };
      }
      coordinates.push(coordinate);
    }

    const [start1 = 0, end1 = 0, start2 = 0, end2 = 0] = coordinates;
    const [name, score, strand1, strand2] = [6, 7, 8, 9].map((index) => presentField(fields[index]));
    const candidate = {
      chrom1: fields[0] ?? "",
      start1,
      end1,
      chrom2: fields[3] ?? "",
      start2,
      end2,
      ...(name !== undefined && { name }),
      ...(score !== undefined && { score }),
      ...(strand1 !== undefined && { strand1 }),
      ...(strand2 !== undefined && { strand2 }),
      extraFields: fields.slice(10),
      lineNumber,
    };

    try {
      const validation = PairedIntervalSchema(candidate);
      if (validation instanceof type.errors) {
        return { ok: false, reason: `Invalid BEDPE record: ${validation.summary}` };
      }
      return { ok: true, record: validation };
    } catch (error) {
      return {
        ok: false,
        reason: `Invalid BEDPE record: ${error instanceof Error ? error.message : String(error)}`,
      };
    }
  }
}

function presentField(value: string | undefined): string | undefined {
  return value === undefined || value === "" ? undefined : value;
}

export const BedpeFormat = {
  isHeaderLine,
  parseCoordinate,
} as const;
