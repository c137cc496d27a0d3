/**
 * vcf-decode - streaming decoder for VCF variant call files
 *
 * Turns VCF text into typed records: header declarations drive INFO value
 * conversion, per-allele INFO values are partitioned by ALT allele, and
 * annotation fields from VEP and snpEff decode into structured sub-records.
 */

// Compression infrastructure
export {
  type CompressionDetection,
  CompressionDetector,
  createDecompressor,
  type DecompressorOptions,
  GzipDecompressor,
} from './compression';
// Error types
export {
  AlleleCountMismatchError,
  BufferError,
  CompressionError,
  FileError,
  MalformedHeaderError,
  ParseError,
  RecordDecodeError,
  StreamError,
  UnknownFieldConversionError,
  ValidationError,
  VcfError,
} from './errors';
// Parser base
export { AbstractParser, type BaseParserDefaults } from './formats/abstract-parser';
// VCF format
export * from './formats/vcf';
// File I/O infrastructure
export { createStream, exists, FileReader, getSize } from './io/file-reader';
export { getPlatform, runWithPlatform } from './io/runtime';
export { processBuffer, readLines, splitLines, StreamUtils } from './io/stream-utils';
// Core types
export type {
  CompressionFormat,
  FilePath,
  FileReaderOptions,
  FileValidationResult,
  LineProcessingResult,
  ParserOptions,
} from './types';
export { FilePathSchema, FileReaderOptionsSchema } from './types';
