/**
 * File reading utilities built on Effect Platform
 *
 * Opens VCF files as web ReadableStreams, validating paths and options with
 * ArkType and gunzipping compressed input on the fly.
 */

import { FileSystem } from "@effect/platform";
import { type } from "arktype";
import { Effect, Stream } from "effect";
import { CompressionDetector, createDecompressor } from "../compression";
import { FileError } from "../errors";
import type { FilePath, FileReaderOptions, FileValidationResult } from "../types";
import { FilePathSchema, FileReaderOptionsSchema } from "../types";
import { runWithPlatform } from "./runtime";

// Module-level constants for default options
const DEFAULT_OPTIONS: Required<FileReaderOptions> = {
  bufferSize: 65536,
  encoding: "utf8",
  maxFileSize: 10_737_418_240, // 10GB
  autoDecompress: true,
};

/**
 * Validate file accessibility and constraints
 */
async function validateFile(
  path: FilePath,
  options: Required<FileReaderOptions>
): Promise<FileValidationResult> {
  if (!(await exists(path))) {
    return {
      isValid: false,
      error: "File does not exist or is not accessible",
    };
  }

  const size = await getSize(path);
  if (size > options.maxFileSize) {
    return {
      isValid: false,
      size,
      error: `File size ${size} exceeds maximum ${options.maxFileSize}`,
    };
  }

  return { isValid: true, size };
}

/**
 * Create base file stream using Effect Platform
 */
function createBaseStream(
  validatedPath: FilePath,
  mergedOptions: Required<FileReaderOptions>
): Promise<ReadableStream<Uint8Array>> {
  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const effectStream = fs.stream(validatedPath, {
      chunkSize: mergedOptions.bufferSize,
    });
    return Stream.toReadableStream(effectStream);
  });

  return runWithPlatform(program);
}

/**
 * Apply decompression to stream if the extension calls for it
 */
function applyDecompression(
  stream: ReadableStream<Uint8Array>,
  filePath: FilePath
): ReadableStream<Uint8Array> {
  const compressionFormat = CompressionDetector.fromExtension(filePath);
  if (compressionFormat === "none") {
    return stream;
  }
  return createDecompressor(compressionFormat).wrapStream(stream);
}

/**
 * Check if a file exists and is a regular file
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
    return await runWithPlatform(program);
  } catch (error) {
    throw FileError.fromSystemError("stat", validatedPath, error);
  }
}

/**
 * Get file size in bytes
 *
 * @throws {FileError} If file cannot be accessed or doesn't exist
 */
export async function getSize(path: string): Promise<number> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const info = yield* fs.stat(validatedPath);
    return Number(info.size);
  });

  try {
    return await runWithPlatform(program);
  } catch (error) {
    throw FileError.fromSystemError("stat", validatedPath, error);
  }
}

/**
 * Create a streaming reader for a file
 *
 * @param path File path to read
 * @param options Reading options
 * @returns Promise resolving to ReadableStream of (decompressed) file data
 * @throws {FileError} If file cannot be opened or read
 *
 * @example
 * ```typescript
 * const stream = await createStream("cohort.vcf.gz");
 * for await (const line of readLines(stream)) {
 *   console.log(line);
 * }
 * ```
 */
export async function createStream(
  path: string,
  options: FileReaderOptions = {}
): Promise<ReadableStream<Uint8Array>> {
  const validatedPath = validatePath(path);
  const mergedOptions = mergeOptions(options);

  const validation = await validateFile(validatedPath, mergedOptions);
  if (!validation.isValid) {
    throw new FileError(validation.error ?? "File validation failed", validatedPath, "open");
  }

  const startTime = Date.now();
  try {
    const stream = await createBaseStream(validatedPath, mergedOptions);
    return mergedOptions.autoDecompress ? applyDecompression(stream, validatedPath) : stream;
  } catch (error) {
    const elapsed = Date.now() - startTime;
    const enhanced = FileError.fromSystemError("open", validatedPath, error);
    enhanced.message += ` (failed after ${elapsed}ms, bufferSize: ${mergedOptions.bufferSize})`;
    throw enhanced;
  }
}

export const FileReader = {
  exists,
  getSize,
  createStream,
} as const;

// =============================================================================
// PRIVATE HELPER FUNCTIONS
// =============================================================================

/**
 * Validate file path using ArkType and return branded type
 */
function validatePath(path: string): FilePath {
  try {
    const validationResult = FilePathSchema(path);
    if (validationResult instanceof type.errors) {
      throw new FileError(`Invalid file path: ${validationResult.summary}`, path, "stat");
    }
    return validationResult;
  } catch (error) {
    if (error instanceof FileError) throw error;
    throw new FileError(
      `Invalid file path: ${error instanceof Error ? error.message : String(error)}`,
      path,
      "stat"
    );
  }
}

/**
 * Merge user options with defaults
 */
export function mergeOptions(options: FileReaderOptions): Required<FileReaderOptions> {
  const merged = { ...DEFAULT_OPTIONS, ...options };

  const validationResult = FileReaderOptionsSchema(merged);
  if (validationResult instanceof type.errors) {
    throw new FileError(`Invalid file reader options: ${validationResult.summary}`, "", "read");
  }

  return merged;
}
