/**
 * Gzip decompression for BEDPE input
 *
 * Buffer and streaming decompression on top of Node's zlib.
 */

import { promisify } from "node:util";
import { createGunzip, gunzip } from "node:zlib";
import { CompressionError } from "../errors.js";
import { CompressionDetector } from "./detector.js";

const gunzipAsync = promisify(gunzip);

/**
 * Decompress an entire gzip buffer in memory
 *
 * @throws {CompressionError} If the data is empty, not gzip, or corrupt
 * @example
 * ```typescript
 * const compressed = await fs.readFile('calls.bedpe.gz');
 * const text = new TextDecoder().decode(await decompress(compressed));
 * ```
 */
export async function decompress(compressed: Uint8Array): Promise<Uint8Array> {
  if (compressed.length === 0) {
    throw new CompressionError("Compressed data must not be empty", "gzip", "decompress");
  }
  if (CompressionDetector.fromMagicBytes(compressed).format !== "gzip") {
    throw new CompressionError(
      "Invalid gzip magic bytes - file may not be gzip compressed",
      "gzip",
      "decompress",
      0
    );
  }

  try {
    const result = await gunzipAsync(compressed);
    return new Uint8Array(result.buffer, result.byteOffset, result.byteLength);
  } catch (err) {
    throw CompressionError.fromSystemError("gzip", "decompress", err, compressed.length);
  }
}

/**
 * Create gzip decompression transform stream
 *
 * Output chunks are forwarded as zlib produces them; flush resolves once
 * zlib has drained, so truncated input surfaces as a stream error.
 */
export function createStream(): TransformStream<Uint8Array, Uint8Array> {
  const gunzipStream = createGunzip();
  let bytesProcessed = 0;
  let failure: CompressionError | undefined;

  return new TransformStream<Uint8Array, Uint8Array>({
    start(controller): void {
      gunzipStream.on("data", (chunk: Buffer) => {
        try {
          controller.enqueue(new Uint8Array(chunk.buffer, chunk.byteOffset, chunk.byteLength));
        } catch {
          // Readable side was cancelled; stop inflating
          gunzipStream.destroy();
        }
      });
      gunzipStream.on("error", (error: unknown) => {
        failure = CompressionError.fromSystemError("gzip", "stream", error, bytesProcessed);
        controller.error(failure);
      });
    },
    transform(chunk): void {
      bytesProcessed += chunk.length;
      gunzipStream.write(chunk);
    },
    flush(): Promise<void> {
      return new Promise<void>((resolve, reject) => {
        if (failure !== undefined) {
          reject(failure);
          return;
        }
        gunzipStream.once("end", () => resolve());
        gunzipStream.once("error", () => reject(failure));
        gunzipStream.end();
      });
    },
  });
}

/**
 * Wrap compressed readable stream with gzip decompression
 *
 * @example
 * ```typescript
 * const compressed = await FileReader.createStream('calls.bedpe.gz', { autoDecompress: false });
 * for await (const line of readLines(wrapStream(compressed))) {
 *   console.log(line);
 * }
 * ```
 */
export function wrapStream(input: ReadableStream<Uint8Array>): ReadableStream<Uint8Array> {
  return input.pipeThrough(createStream());
}

export const GzipDecompressor = {
  decompress,
  createStream,
  wrapStream,
} as const;
