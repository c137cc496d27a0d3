/**
 * Streaming gzip decompression
 *
 * Wraps the web-standard DecompressionStream so compressed VCF files can be
 * fed through the same line reader as plain ones.
 */

import { DecompressionStream } from 'node:stream/web';
import { CompressionError } from '../errors';

/**
 * Options for streaming decompression
 */
export interface DecompressorOptions {
  /** Abort the decompression mid-stream */
  readonly signal?: AbortSignal;
}

/**
 * Pipe a compressed byte stream through a gunzip transform
 *
 * @param input Stream of gzip (or BGZF) compressed bytes
 * @returns Stream of decompressed bytes
 * @throws {CompressionError} If the transform cannot be created
 *
 * @example
 * ```typescript
 * const compressed = await createStream('calls.vcf.gz', { autoDecompress: false });
 * for await (const line of readLines(GzipDecompressor.wrapStream(compressed))) {
 *   console.log(line);
 * }
 * ```
 */
export function wrapStream(
  input: ReadableStream<Uint8Array>,
  options: DecompressorOptions = {}
): ReadableStream<Uint8Array> {
  if (options.signal?.aborted === true) {
    throw new CompressionError('Decompression aborted before start', 'gzip', 'stream');
  }

  try {
    const decompressed: ReadableStream<Uint8Array> = input.pipeThrough(
      new DecompressionStream('gzip'),
      options.signal !== undefined ? { signal: options.signal } : {}
    );
    return decompressed;
  } catch (err) {
    throw CompressionError.fromSystemError('gzip', 'stream', err);
  }
}

export const GzipDecompressor = {
  wrapStream,
} as const;
