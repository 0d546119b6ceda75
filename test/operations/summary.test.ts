/**
 * Tests for BEDPE summarization
 *
 * Strand classification, chromosome-pair counting, distance statistics and
 * the early-stop rules for malformed input.
 */

import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { gzipSync } from "node:zlib";
import { afterAll, afterEach, beforeAll, describe, expect, test, vi } from "vitest";
import { ValidationError } from "../../src/errors.js";
import { BedpeParser } from "../../src/formats/bedpe.js";
import {
  classifyStrands,
  createTally,
  observe,
  summarize,
  summarizeFile,
  summarizeLines,
  summarizeRecords,
  summarizeStream,
} from "../../src/operations/summary.js";
import type { PairedInterval } from "../../src/types.js";
import { streamOf } from "../utils/streams.js";

function pair(
  chrom1: string,
  start1: number,
  chrom2: string,
  start2: number,
  strand1?: string,
  strand2?: string
): PairedInterval {
  return {
    chrom1,
    start1,
    end1: start1 + 10,
    chrom2,
    start2,
    end2: start2 + 10,
    ...(strand1 !== undefined && { strand1 }),
    ...(strand2 !== undefined && { strand2 }),
    extraFields: [],
  };
}

const THREE_CALLS = [
  "chrA\t100\t110\tchrA\t300\t310\t.\t.\t+\t+",
  "chrA\t50\t60\tchrB\t200\t210\t.\t.\t+\t-",
  "chrA\t10\t20\tchrB\t90\t100\t.\t.\t-\t+",
  "",
].join("\n");

const silent = { onWarning: (): void => {} };

describe("classifyStrands", () => {
  test("should call equal strands an inversion", () => {
    expect(classifyStrands("+", "+")).toBe("inversion");
    expect(classifyStrands("-", "-")).toBe("inversion");
  });

  test("should call +/- a deletion and -/+ an insertion", () => {
    expect(classifyStrands("+", "-")).toBe("deletion");
    expect(classifyStrands("-", "+")).toBe("insertion");
  });

  test("should leave other strand pairs unclassified", () => {
    expect(classifyStrands(".", "+")).toBe("unclassified");
    expect(classifyStrands("+", undefined)).toBe("unclassified");
    expect(classifyStrands(undefined, undefined)).toBe("unclassified");
  });
});

describe("observe", () => {
  test("should count same-chromosome pairs without a distance or SV call", () => {
    const tally = createTally();
    observe(pair("chr1", 100, "chr1", 5000, "+", "+"), tally);

    expect(tally.sameChromosome).toBe(1);
    expect(tally.differentChromosome).toBe(0);
    expect(tally.inversion).toBe(0);
    expect(tally.distances).toEqual([]);
  });

  test("should record the absolute start distance of a different-chromosome pair", () => {
    const tally = createTally();
    observe(pair("chr1", 900, "chr2", 100, "-", "+"), tally);

    expect(tally.differentChromosome).toBe(1);
    expect(tally.distances).toEqual([800]);
    expect(tally.totalDistance).toBe(800);
    expect(tally.insertion).toBe(1);
  });

  test("should count a different-chromosome pair without strands but not classify it", () => {
    const tally = createTally();
    observe(pair("chr1", 1, "chr2", 11), tally);

    expect(tally.differentChromosome).toBe(1);
    expect(tally.inversion + tally.insertion + tally.deletion).toBe(0);
  });
});

describe("summarizeRecords", () => {
  test("should report the three-call example", () => {
    const report = summarizeRecords([
      pair("chrA", 100, "chrA", 300, "+", "+"),
      pair("chrA", 50, "chrB", 200, "+", "-"),
      pair("chrA", 10, "chrB", 90, "-", "+"),
    ]);

    expect(report).toEqual({
      inversion: 0,
      insertion: 1,
      deletion: 1,
      sameChromosome: 1,
      differentChromosome: 2,
      meanLength: 115,
      medianLength: 115,
      histogram: {
        binCount: 10,
        minValue: 80,
        maxValue: 150,
        binWidth: 7,
        binCounts: [1, 0, 0, 0, 0, 0, 0, 0, 0, 1],
      },
    });
  });

  test("should report a single equal-strand pair as one inversion with empty bins", () => {
    const report = summarizeRecords([pair("chr1", 1000, "chr2", 4000, "+", "+")]);

    expect(report.inversion).toBe(1);
    expect(report.insertion).toBe(0);
    expect(report.deletion).toBe(0);
    expect(report.meanLength).toBe(3000);
    expect(report.medianLength).toBe(3000);
    expect(report.histogram.minValue).toBe(3000);
    expect(report.histogram.binWidth).toBe(0);
    expect(report.histogram.binCounts).toEqual([0, 0, 0, 0, 0, 0, 0, 0, 0, 0]);
  });

  test("should report null mean and median without different-chromosome pairs", () => {
    const report = summarizeRecords([pair("chr1", 1, "chr1", 2, "+", "-")]);

    expect(report.sameChromosome).toBe(1);
    expect(report.meanLength).toBeNull();
    expect(report.medianLength).toBeNull();
    expect(report.histogram.minValue).toBe(0);
  });

  test("should honour a custom bin count", () => {
    const report = summarizeRecords(
      [pair("a", 0, "b", 0), pair("a", 0, "b", 3), pair("a", 0, "b", 7), pair("a", 0, "b", 8)],
      { binCount: 4 }
    );

    expect(report.histogram.binCounts).toEqual([1, 1, 0, 2]);
  });

  test("should keep the counting invariants over mixed input", () => {
    const records = [
      pair("chr1", 5, "chr1", 50, "+", "+"),
      pair("chr1", 5, "chr2", 50, "+", "+"),
      pair("chr1", 5, "chr3", 500, "+", "-"),
      pair("chr2", 700, "chr3", 5, "-", "+"),
      pair("chr4", 1, "chr5", 2, ".", "."),
      pair("chr4", 1, "chr5", 2),
      pair("chrX", 1, "chrX", 2),
    ];
    const report = summarizeRecords(records);

    expect(report.sameChromosome + report.differentChromosome).toBe(records.length);
    expect(report.inversion + report.insertion + report.deletion).toBeLessThanOrEqual(
      report.differentChromosome
    );
    expect(report.histogram.binCounts.reduce((sum, count) => sum + count, 0)).toBe(
      report.differentChromosome
    );
  });

  test("should not depend on record order", () => {
    const records = [
      pair("chr1", 0, "chr2", 500, "+", "-"),
      pair("chr1", 0, "chr3", 20, "-", "+"),
      pair("chr2", 300, "chr4", 0, "+", "+"),
      pair("chr5", 7, "chr5", 9),
      pair("chr1", 1000, "chr6", 10, "-", "-"),
    ];
    const forward = summarizeRecords(records);

    expect(forward.medianLength).toBe(400);
    expect(summarizeRecords([...records].reverse())).toEqual(forward);
    expect(summarizeRecords([...records.slice(2), ...records.slice(0, 2)])).toEqual(forward);
  });

  test("should reject a non-integer bin count", () => {
    expect(() => summarizeRecords([], { binCount: 2.5 })).toThrow(ValidationError);
  });
});

describe("summarize", () => {
  test("should turn an empty tally into an all-zero report", () => {
    expect(summarize(createTally())).toEqual({
      inversion: 0,
      insertion: 0,
      deletion: 0,
      sameChromosome: 0,
      differentChromosome: 0,
      meanLength: null,
      medianLength: null,
      histogram: {
        binCount: 10,
        minValue: 0,
        maxValue: 0,
        binWidth: 0,
        binCounts: [0, 0, 0, 0, 0, 0, 0, 0, 0, 0],
      },
    });
  });
});

describe("summarizeLines", () => {
  const parser = new BedpeParser();

  test("should summarize parsed text", async () => {
    const report = await summarizeLines(parser.readString(THREE_CALLS), silent);

    expect(report?.sameChromosome).toBe(1);
    expect(report?.differentChromosome).toBe(2);
    expect(report?.meanLength).toBe(115);
    expect(report?.medianLength).toBe(115);
  });

  test("should return null for empty input", async () => {
    expect(await summarizeLines(parser.readString(""), silent)).toBeNull();
  });

  test("should return null and warn when the first line is invalid", async () => {
    const onWarning = vi.fn();
    const report = await summarizeLines(parser.readString("not bedpe\nchr1\t1\t2\tchr2\t3\t4\n"), {
      onWarning,
    });

    expect(report).toBeNull();
    expect(onWarning).toHaveBeenCalledWith(
      "Stopped reading: BEDPE format requires at least 6 fields, got 1",
      1
    );
  });

  test("should stop at a later invalid line and report what came before", async () => {
    const onWarning = vi.fn();
    const text = [
      "chr1\t10\t20\tchr2\t110\t120\t.\t.\t+\t-",
      "chr1\tten\t20\tchr2\t110\t120",
      "chr1\t10\t20\tchr3\t510\t520\t.\t.\t-\t+",
    ].join("\n");

    const report = await summarizeLines(parser.readString(text), { onWarning });

    expect(report?.differentChromosome).toBe(1);
    expect(report?.deletion).toBe(1);
    expect(report?.insertion).toBe(0);
    expect(onWarning).toHaveBeenCalledTimes(1);
    expect(onWarning).toHaveBeenCalledWith("Stopped reading: Invalid start1: 'ten' is not a valid integer", 2);
  });

  test("should stop at an over-long line and report the records before it", async () => {
    const onWarning = vi.fn();
    const text = `chr1\t10\t20\tchr2\t110\t120\t.\t.\t+\t-\n${"x".repeat(1_000_001)}\n`;

    const report = await summarizeLines(parser.readString(text), { onWarning });

    expect(report?.differentChromosome).toBe(1);
    expect(report?.deletion).toBe(1);
    expect(onWarning).toHaveBeenCalledWith("Stopped reading: Line too long (1000001 > 1000000)", 2);
  });

  test("should report zeros when no line is a valid record", async () => {
    const report = await summarizeLines(parser.readString("#chrom1\tstart1\n\ngarbage\n"), silent);

    expect(report).toEqual(summarize(createTally()));
  });

  test("should skip headers and blank lines between records", async () => {
    const report = await summarizeLines(
      parser.readString("#header\nchr1\t0\t1\tchr2\t40\t41\n\ntrack x\nchr1\t0\t1\tchr2\t60\t61\n"),
      silent
    );

    expect(report?.differentChromosome).toBe(2);
    expect(report?.medianLength).toBe(50);
  });

  describe("default warning handler", () => {
    afterEach(() => {
      vi.restoreAllMocks();
    });

    test("should write to console.warn", async () => {
      const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

      await summarizeLines(parser.readString("chr1\t1\t2\tchr2\t3\t4\nbroken\n"));

      expect(warn).toHaveBeenCalledWith(
        "BEDPE Warning (line 2): Stopped reading: BEDPE format requires at least 6 fields, got 1"
      );
    });
  });
});

describe("summarizeStream", () => {
  test("should produce the same report however the bytes are chunked", async () => {
    const whole = await summarizeStream(streamOf(THREE_CALLS, 4096), silent);
    const tiny = await summarizeStream(streamOf(THREE_CALLS, 1), silent);

    expect(tiny).toEqual(whole);
    expect(whole?.deletion).toBe(1);
  });

  test("should stop at an over-long line arriving in many chunks", async () => {
    const text = `${THREE_CALLS}${"x".repeat(1_000_001)}\nchr1\t1\t2\tchr2\t3\t4\t.\t.\t+\t+\n`;
    const report = await summarizeStream(streamOf(text, 65_536), silent);

    expect(report?.differentChromosome).toBe(2);
    expect(report?.inversion).toBe(0);
  });

  test("should detect gzip delivered one byte at a time", async () => {
    const report = await summarizeStream(streamOf(gzipSync(THREE_CALLS), 1), silent);

    expect(report?.deletion).toBe(1);
    expect(report?.insertion).toBe(1);
    expect(report?.meanLength).toBe(115);
  });
});

describe("summarizeFile", () => {
  let dir: string;

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), "bedpe-summary-"));
    writeFileSync(join(dir, "calls.bedpe"), THREE_CALLS);
    writeFileSync(join(dir, "calls.bedpe.gz"), gzipSync(THREE_CALLS));
    writeFileSync(join(dir, "empty.bedpe"), "");
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  test("should give identical reports for plain and gzipped input", async () => {
    const plain = await summarizeFile(join(dir, "calls.bedpe"), silent);
    const gzipped = await summarizeFile(join(dir, "calls.bedpe.gz"), silent);

    expect(plain?.meanLength).toBe(115);
    expect(gzipped).toEqual(plain);
  });

  test("should return null for an empty file", async () => {
    expect(await summarizeFile(join(dir, "empty.bedpe"), silent)).toBeNull();
  });
});
