#!/usr/bin/env node
// Command-line entry point: summarise one BEDPE file (or standard input) as JSON.

import { realpathSync } from "node:fs";
import type { Readable } from "node:stream";
import { pathToFileURL } from "node:url";
import { parseArgs } from "node:util";
import { BedpeSummaryError } from "./errors.js";
import { serializeSummary } from "./formats/json/index.js";
import { openInput } from "./io/file-reader.js";
import { summarizeStream } from "./operations/summary.js";

export const PROGRAM_NAME = "bedpesummary";
export const VERSION = "1.0.0";

/** Anything text can be written to; process.stdout and process.stderr qualify. */
export interface TextSink {
  write(chunk: string): unknown;
}

export interface CliIO {
  stdout: TextSink;
  stderr: TextSink;
  /** Source for "-i stdin"; defaults to process.stdin */
  stdin?: Readable;
}

/** CLI argument definitions for node:util parseArgs. */
const argConfig = {
  options: {
    input: { type: "string" as const, short: "i", default: "stdin" },
    help: { type: "boolean" as const, short: "h", default: false },
  },
  strict: true,
  allowPositionals: false,
} as const;

export function usage(): string {
  return `
Tool:    ${PROGRAM_NAME}
Version: ${VERSION}
Summary: Summarises a BEDPE file.

Usage:   ${PROGRAM_NAME} [OPTIONS] -i <bedpe>

Options:
  -i, --input <path>   BEDPE file, plain or gzipped (default: stdin; "-" also reads stdin)
  -h, --help           Print this help and exit
`;
}

/**
 * Run the CLI and return the process exit code
 *
 * Nothing is written to stdout unless a report was produced.
 */
export async function runCli(
  argv: readonly string[],
  io: CliIO = { stdout: process.stdout, stderr: process.stderr }
): Promise<number> {
  let input: string;
  let help: boolean;
  try {
    const { values } = parseArgs({ ...argConfig, args: [...argv] });
    input = values.input ?? "stdin";
    help = values.help ?? false;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    io.stderr.write(`\n*****ERROR: ${message} *****\n`);
    io.stderr.write(usage());
    return 1;
  }

  if (help) {
    io.stderr.write(usage());
    return 0;
  }

  try {
    const stream = await openInput(input, {}, io.stdin);
    const report = await summarizeStream(stream, {
      onWarning: (warning, lineNumber) => {
        io.stderr.write(`BEDPE Warning (line ${lineNumber}): ${warning}\n`);
      },
    });

    if (report !== null) {
      io.stdout.write(`${serializeSummary(report)}\n`);
    }
    return 0;
  } catch (error) {
    if (error instanceof BedpeSummaryError) {
      io.stderr.write(`${error.toString()}\n`);
      return 1;
    }
    throw error;
  }
}

function isMainModule(): boolean {
  const invokedPath = process.argv[1];
  if (invokedPath === undefined) return false;
  try {
    return import.meta.url === pathToFileURL(realpathSync(invokedPath)).href;
  } catch {
    // argv[1] is not a file on disk (e.g. node -e)
    return false;
  }
}

if (isMainModule()) {
  runCli(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      process.stderr.write(`${error instanceof Error ? (error.stack ?? error.message) : String(error)}\n`);
      process.exitCode = 1;
    }
  );
}
