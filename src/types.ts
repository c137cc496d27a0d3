/**
 * Core type definitions shared across parsers and the I/O layer
 *
 * Format-specific types live beside their parser (see `formats/vcf/types.ts`);
 * this module holds parser options, file reading options and their ArkType
 * validation schemas.
 */

import { type } from "arktype";

/**
 * Parser configuration options
 */
export interface ParserOptions {
  /** Maximum line length before the line is rejected */
  maxLineLength?: number;
  /** Whether to attach source line numbers to parsed records */
  trackLineNumbers?: boolean;
  /** AbortController signal for cancelling parsing operations */
  signal?: AbortSignal;
  /** Custom warning handler */
  onWarning?: (warning: string, lineNumber?: number) => void;
}

/**
 * Compression formats recognised when opening files
 */
export type CompressionFormat = "gzip" | "none";

/**
 * Branded type for validated file paths
 * Ensures file paths have been validated before use in I/O operations
 */
export type FilePath = string & {
  readonly __brand: "FilePath";
};

/**
 * File reading configuration options with sensible defaults
 */
export interface FileReaderOptions {
  /** Buffer size for streaming reads (default: 64KB) */
  readonly bufferSize?: number;
  /** Text encoding for file content; "binary" decodes as Latin-1 (default: 'utf8') */
  readonly encoding?: "utf8" | "binary";
  /** Maximum file size to prevent runaway reads (default: 10GB) */
  readonly maxFileSize?: number;
  /** Whether to gunzip `.gz`/`.bgz` files on the fly (default: true) */
  readonly autoDecompress?: boolean;
}

/**
 * Line processing result for streaming text files
 * Handles incomplete lines and buffer management
 */
export interface LineProcessingResult {
  /** Complete lines extracted from buffer */
  readonly lines: string[];
  /** Incomplete line remainder to carry forward */
  readonly remainder: string;
}

/**
 * File validation result
 */
export interface FileValidationResult {
  readonly isValid: boolean;
  readonly size?: number;
  readonly error?: string;
}

// Validation schemas for file I/O types using ArkType

/**
 * File path validation schema
 * Normalizes separators and rejects null bytes and directory traversal
 */
export const FilePathSchema = type("string>0").pipe((path: string): FilePath => {
  if (path.includes("\0")) {
    throw new Error("File paths cannot contain null characters");
  }

  if (/[<>"|*?]/.test(path)) {
    throw new Error("File path contains invalid characters");
  }

  const normalized = path.replace(/[\\/]+/g, "/");

  if (normalized.split("/").includes("..")) {
    throw new Error("Directory traversal not allowed in file paths");
  }

  return normalized as FilePath;
});

/**
 * File reader options validation schema
 */
export const FileReaderOptionsSchema = type({
  "bufferSize?": "1024<=number<=1048576",
  "encoding?": '"utf8"|"binary"',
  "maxFileSize?": "number>=0",
  "autoDecompress?": "boolean",
});
