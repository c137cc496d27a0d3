/**
 * Compression support for variant files
 *
 * @example Auto-detection and streaming decompression
 * ```typescript
 * import { CompressionDetector, GzipDecompressor } from './compression';
 *
 * if (CompressionDetector.fromExtension('calls.vcf.gz') === 'gzip') {
 *   const plain = GzipDecompressor.wrapStream(compressedStream);
 * }
 * ```
 */

export { CompressionDetector, type CompressionDetection } from './detector';
export { GzipDecompressor, type DecompressorOptions } from './gzip';
export { CompressionError } from '../errors';

import { CompressionError } from '../errors';
import type { CompressionFormat } from '../types';
import { GzipDecompressor } from './gzip';

/**
 * Return the decompressor for a detected format
 *
 * @throws {CompressionError} For uncompressed data
 */
export function createDecompressor(format: CompressionFormat): typeof GzipDecompressor {
  switch (format) {
    case 'gzip':
      return GzipDecompressor;
    case 'none':
      throw new CompressionError('No decompression needed for uncompressed data', 'none', 'detect');
  }
}
