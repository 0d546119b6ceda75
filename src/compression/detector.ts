/**
 * Compression format detection for BEDPE input
 *
 * Detection is by gzip magic bytes only, so a mislabelled ".gz" file of
 * plain text is read as text and gzip on standard input is still found.
 */

import { CompressionError } from "../errors.js";
import type { CompressionDetection } from "../types.js";

const GZIP_MAGIC_FIRST_BYTE = 0x1f;
const GZIP_MAGIC_SECOND_BYTE = 0x8b;

const GZIP_MAGIC_BYTES = new Uint8Array([GZIP_MAGIC_FIRST_BYTE, GZIP_MAGIC_SECOND_BYTE]);

/**
 * @example
 * ```typescript
 * CompressionDetector.fromMagicBytes(new Uint8Array([0x1f, 0x8b, 0x08])).format; // 'gzip'
 * ```
 */
export class CompressionDetector {
  /**
   * Detect compression format from the first bytes of the data
   */
  static fromMagicBytes(bytes: Uint8Array): CompressionDetection {
    if (bytes.length === 0) {
      throw new CompressionError("Bytes array must not be empty", "none", "detect");
    }

    const matches =
      bytes.length >= GZIP_MAGIC_BYTES.length &&
      GZIP_MAGIC_BYTES.every((byte, index) => bytes[index] === byte);

    if (matches) {
      return {
        format: "gzip",
        magicBytes: bytes.slice(0, GZIP_MAGIC_BYTES.length),
        detectionMethod: "magic-bytes",
      };
    }

    return { format: "none", detectionMethod: "magic-bytes" };
  }
}
