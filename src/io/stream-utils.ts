/**
 * Stream processing utilities for line-oriented text input
 *
 * Turns byte streams into complete lines regardless of where chunk
 * boundaries fall. Complete lines are passed on whatever their length;
 * judging them is the parser's job. Only an unterminated line that
 * outgrows MAX_BUFFER_SIZE stops reading.
 */

import { BufferError, CompressionError, StreamError } from "../errors.js";
import type { LineProcessingResult } from "../types.js";

/** Longest unterminated line held while waiting for its newline (10MB) */
export const MAX_BUFFER_SIZE = 10_485_760;

/**
 * Convert ReadableStream<Uint8Array> to async iterable of lines
 *
 * Line endings are stripped. A trailing fragment without a newline is
 * yielded unless it is whitespace only. Stopping iteration early cancels
 * the stream.
 *
 * @throws {StreamError} If the underlying stream fails
 * @throws {BufferError} If an unterminated line outgrows MAX_BUFFER_SIZE
 * @example
 * ```typescript
 * const stream = await createStream('/data/calls.bedpe');
 * for await (const line of readLines(stream)) {
 *   console.log(line.split('\t')[0]);
 * }
 * ```
 */
export async function* readLines(stream: ReadableStream<Uint8Array>): AsyncIterable<string> {
  const reader = stream.getReader();
  const decoder = new TextDecoder("utf-8");
  let buffer = "";
  let totalBytesProcessed = 0;
  let settled = false;

  try {
    while (true) {
      const { done, value } = await reader.read();

      if (done) {
        settled = true;
        yield* splitLines(buffer + decoder.decode());
        break;
      }

      const text = decoder.decode(value, { stream: true });
      buffer += text;
      totalBytesProcessed += value.length;

      // No line ending in this chunk: only the remainder grew
      if (!/[\r\n]/.test(text)) {
        checkRemainder(buffer);
        continue;
      }

      const result = processBuffer(buffer);
      buffer = result.remainder;

      for (const line of result.lines) {
        yield line;
      }
    }
  } catch (error) {
    settled = true;
    if (error instanceof BufferError || error instanceof CompressionError) {
      throw error;
    }
    throw new StreamError(
      `Line reading failed: ${error instanceof Error ? error.message : String(error)}`,
      "read",
      totalBytesProcessed
    );
  } finally {
    // Consumer stopped early: let the source know nothing more will be read
    if (!settled) await reader.cancel();
    reader.releaseLock();
  }
}

/**
 * Process text buffer to extract complete lines
 *
 * Handles \n, \r\n and lone \r endings. A \r at the very end of the buffer
 * stays in the remainder since its \n may arrive with the next chunk.
 *
 * @throws {BufferError} If the unterminated remainder exceeds MAX_BUFFER_SIZE
 */
export function processBuffer(buffer: string): LineProcessingResult {
  const lines: string[] = [];
  let lineStart = 0;

  for (let position = 0; position < buffer.length; position++) {
    const char = buffer[position];

    if (char === "\n") {
      const lineEnd = position > lineStart && buffer[position - 1] === "\r" ? position - 1 : position;
      lines.push(buffer.slice(lineStart, lineEnd));
      lineStart = position + 1;
    } else if (char === "\r" && position + 1 < buffer.length && buffer[position + 1] !== "\n") {
      lines.push(buffer.slice(lineStart, position));
      lineStart = position + 1;
    }
  }

  const remainder = buffer.slice(lineStart);
  checkRemainder(remainder);

  return { lines, remainder };
}

function checkRemainder(remainder: string): void {
  if (remainder.length > MAX_BUFFER_SIZE) {
    throw new BufferError(
      `Buffer overflow: unterminated line of ${remainder.length} characters exceeds maximum ${MAX_BUFFER_SIZE}`,
      remainder.length,
      "overflow",
      "This might indicate a file without proper line endings"
    );
  }
}

/**
 * Split an in-memory string into lines, dropping a final blank line
 */
export function* splitLines(data: string): Iterable<string> {
  const { lines, remainder } = processBuffer(data);
  yield* lines;
  if (remainder.trim()) {
    yield remainder.endsWith("\r") ? remainder.slice(0, -1) : remainder;
  }
}

export const StreamUtils = {
  readLines,
  processBuffer,
  splitLines,
} as const;
