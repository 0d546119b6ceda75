/**
 * File and standard-input reading for BEDPE data
 *
 * Files are streamed through Effect's platform FileSystem service; standard
 * input is adapted from Node's process stream. Both can be transparently
 * gunzipped.
 */

import { Readable } from "node:stream";
import { FileSystem } from "@effect/platform";
import { type } from "arktype";
import { Effect, Option, Stream } from "effect";
import { autoDecompress } from "../compression/index.js";
import { FileError } from "../errors.js";
import type { FileMetadata, FilePath, FileReaderOptions } from "../types.js";
import { FilePathSchema, FileReaderOptionsSchema } from "../types.js";
import { getPlatform } from "./runtime.js";

const DEFAULT_OPTIONS: Required<FileReaderOptions> = {
  bufferSize: 65536,
  maxFileSize: 10_000_000_000, // 10GB
  autoDecompress: true,
};

/** Input paths that mean "read standard input" */
export const STDIN_PATHS: readonly string[] = ["stdin", "-"];

/**
 * Check if a path names an existing regular file
 *
 * @throws {FileError} If path validation fails
 */
export async function exists(path: string): Promise<boolean> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const pathExists = yield* fs.exists(validatedPath);
    if (!pathExists) return false;

    const info = yield* fs.stat(validatedPath);
    return info.type === "File";
  });

  try {
    return await Effect.runPromise(program.pipe(Effect.provide(getPlatform())));
  } catch (error) {
    throw FileError.fromSystemError("stat", validatedPath, error);
  }
}

/**
 * Get file metadata
 *
 * @throws {FileError} If file cannot be accessed
 */
export async function getMetadata(path: string): Promise<FileMetadata> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const info = yield* fs.stat(validatedPath);

    const dot = validatedPath.lastIndexOf(".");
    return {
      path: validatedPath,
      size: Number(info.size),
      lastModified: Option.getOrElse(info.mtime, () => new Date(0)),
      extension: dot === -1 ? "" : validatedPath.substring(dot),
    };
  });

  try {
    return await Effect.runPromise(program.pipe(Effect.provide(getPlatform())));
  } catch (error) {
    throw FileError.fromSystemError("stat", validatedPath, error);
  }
}

/**
 * Create a streaming reader for a file
 *
 * @throws {FileError} If the file is missing, too large, or cannot be opened
 * @example
 * ```typescript
 * const stream = await createStream('calls.bedpe.gz');
 * for await (const line of readLines(stream)) {
 *   // already decompressed
 * }
 * ```
 */
export async function createStream(
  path: string,
  options: FileReaderOptions = {}
): Promise<ReadableStream<Uint8Array>> {
  const validatedPath = validatePath(path);
  const mergedOptions = mergeOptions(options);

  if (!(await exists(validatedPath))) {
    throw new FileError(
      "File does not exist or is not accessible",
      validatedPath,
      "open",
      undefined,
      "Check that the file path is correct and the file exists"
    );
  }

  const metadata = await getMetadata(validatedPath);
  if (metadata.size > mergedOptions.maxFileSize) {
    throw new FileError(
      `File size ${metadata.size} exceeds maximum ${mergedOptions.maxFileSize}`,
      validatedPath,
      "read"
    );
  }

  try {
    const stream = await createBaseStream(validatedPath, mergedOptions);
    return mergedOptions.autoDecompress ? await autoDecompress(stream) : stream;
  } catch (error) {
    throw FileError.fromSystemError("read", validatedPath, error);
  }
}

/**
 * Create a stream over standard input (or another Node readable)
 */
export async function createStdinStream(
  options: FileReaderOptions = {},
  source: Readable = process.stdin
): Promise<ReadableStream<Uint8Array>> {
  const mergedOptions = mergeOptions(options);
  const stream: ReadableStream<Uint8Array> = Readable.toWeb(source);
  return mergedOptions.autoDecompress ? autoDecompress(stream) : stream;
}

/**
 * Open the input named on the command line: a file, or standard input
 * for "stdin" and "-"
 */
export async function openInput(
  path: string,
  options: FileReaderOptions = {},
  stdin?: Readable
): Promise<ReadableStream<Uint8Array>> {
  if (STDIN_PATHS.includes(path)) {
    return createStdinStream(options, stdin);
  }
  return createStream(path, options);
}

export const FileReader = {
  exists,
  getMetadata,
  createStream,
  createStdinStream,
  openInput,
} as const;

// =============================================================================
// PRIVATE HELPER FUNCTIONS
// =============================================================================

async function createBaseStream(
  validatedPath: FilePath,
  mergedOptions: Required<FileReaderOptions>
): Promise<ReadableStream<Uint8Array>> {
  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const effectStream = fs.stream(validatedPath, {
      bufferSize: mergedOptions.bufferSize,
    });
    return Stream.toReadableStream(effectStream);
  });

  return Effect.runPromise(program.pipe(Effect.provide(getPlatform())));
}

/**
 * Validate file path using ArkType and return branded type
 */
function validatePath(path: string): FilePath {
  let validationResult: ReturnType<typeof FilePathSchema>;
  try {
    validationResult = FilePathSchema(path);
  } catch (error) {
    throw new FileError(
      `Invalid file path: ${error instanceof Error ? error.message : String(error)}`,
      path,
      "stat"
    );
  }
  if (validationResult instanceof type.errors) {
    throw new FileError(`Invalid file path: ${validationResult.summary}`, path, "stat");
  }
  return validationResult;
}

function mergeOptions(options: FileReaderOptions): Required<FileReaderOptions> {
  const merged = { ...DEFAULT_OPTIONS, ...options };

  const validationResult = FileReaderOptionsSchema(merged);
  if (validationResult instanceof type.errors) {
    throw new FileError(`Invalid file reader options: ${validationResult.summary}`, "", "read");
  }

  return merged;
}
