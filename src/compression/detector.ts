/**
 * Compression format detection for variant files
 *
 * VCF files travel either as plain text or gzip/BGZF compressed (BGZF is a
 * series of concatenated gzip members, so it decodes with a plain gunzip).
 */

import type { CompressionFormat } from '../types';
import { CompressionError } from '../errors';

const GZIP_MAGIC_FIRST_BYTE = 0x1f;
const GZIP_MAGIC_SECOND_BYTE = 0x8b;

const GZIP_EXTENSIONS = ['.gz', '.bgz', '.gzip'] as const;

/**
 * Detection result with the evidence it was based on
 */
export interface CompressionDetection {
  readonly format: CompressionFormat;
  readonly detectionMethod: 'extension' | 'magic-bytes';
}

/**
 * Compression format detector
 *
 * @example Detection from file extension
 * ```typescript
 * const format = CompressionDetector.fromExtension('/data/calls.vcf.gz');
 * console.log(format); // 'gzip'
 * ```
 *
 * @example Detection from magic bytes
 * ```typescript
 * const detection = CompressionDetector.fromMagicBytes(new Uint8Array([0x1f, 0x8b, 0x08]));
 * console.log(detection.format); // 'gzip'
 * ```
 */
export class CompressionDetector {
  /**
   * Detect compression format from file extension
   *
   * @throws {CompressionError} If the path is empty
   */
  static fromExtension(filePath: string): CompressionFormat {
    if (filePath.length === 0) {
      throw new CompressionError('File path must not be empty', 'none', 'detect');
    }

    const normalizedPath = filePath.toLowerCase().replace(/\\/g, '/');
    for (const ext of GZIP_EXTENSIONS) {
      if (normalizedPath.endsWith(ext)) {
        return 'gzip';
      }
    }
    return 'none';
  }

  /**
   * Detect compression format from the leading bytes of a file
   *
   * @throws {CompressionError} If no bytes are given
   */
  static fromMagicBytes(bytes: Uint8Array): CompressionDetection {
    if (bytes.length === 0) {
      throw new CompressionError('Bytes array must not be empty', 'none', 'detect');
    }

    const isGzip =
      bytes.length >= 2 && bytes[0] === GZIP_MAGIC_FIRST_BYTE && bytes[1] === GZIP_MAGIC_SECOND_BYTE;

    return {
      format: isGzip ? 'gzip' : 'none',
      detectionMethod: 'magic-bytes',
    };
  }
}
