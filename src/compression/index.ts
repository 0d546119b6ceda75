/**
 * Compression module for BEDPE input
 *
 * @example Transparent decompression of a stream of unknown format
 * ```typescript
 * import { autoDecompress } from './compression';
 *
 * const plain = await autoDecompress(rawStream);
 * ```
 */

export { CompressionDetector } from "./detector.js";
export { GzipDecompressor } from "./gzip.js";

import { CompressionDetector } from "./detector.js";
import { wrapStream } from "./gzip.js";

const GZIP_MAGIC_LENGTH = 2;

export type { CompressionDetection, CompressionFormat } from "../types.js";

export { CompressionError } from "../errors.js";

/**
 * Read the start of a stream without losing it
 *
 * Chunks are read until at least `minBytes` have arrived or the stream
 * ends, since pipes may deliver the first byte on its own.
 *
 * @returns The bytes read (undefined for an empty stream) and a stream that
 * replays them before the rest of the data
 */
export async function peekStream(
  stream: ReadableStream<Uint8Array>,
  minBytes = GZIP_MAGIC_LENGTH
): Promise<{ head: Uint8Array | undefined; stream: ReadableStream<Uint8Array> }> {
  const reader = stream.getReader();
  const chunks: Uint8Array[] = [];
  let length = 0;

  while (length < minBytes) {
    const { done, value } = await reader.read();
    if (done) break;
    chunks.push(value);
    length += value.length;
  }

  const head = chunks.length === 0 ? undefined : concatChunks(chunks, length);

  const replay = new ReadableStream<Uint8Array>({
    start(controller): void {
      if (head !== undefined) controller.enqueue(head);
    },
    async pull(controller): Promise<void> {
      const { done, value } = await reader.read();
      if (done) {
        controller.close();
        return;
      }
      controller.enqueue(value);
    },
    cancel(reason): Promise<void> {
      return reader.cancel(reason);
    },
  });

  return { head, stream: replay };
}

function concatChunks(chunks: readonly Uint8Array[], length: number): Uint8Array {
  const [first] = chunks;
  if (chunks.length === 1 && first !== undefined) return first;

  const joined = new Uint8Array(length);
  let offset = 0;
  for (const chunk of chunks) {
    joined.set(chunk, offset);
    offset += chunk.length;
  }
  return joined;
}

/**
 * Decompress a stream when its leading bytes are gzip
 */
export async function autoDecompress(
  stream: ReadableStream<Uint8Array>
): Promise<ReadableStream<Uint8Array>> {
  const peeked = await peekStream(stream);
  if (peeked.head === undefined || peeked.head.length === 0) {
    return peeked.stream;
  }

  const detection = CompressionDetector.fromMagicBytes(peeked.head);
  return detection.format === "gzip" ? wrapStream(peeked.stream) : peeked.stream;
}
