/**
 * Stream processing utilities for line-oriented text
 *
 * Turns byte streams into lines with proper buffering across chunk
 * boundaries, mixed line endings and bounded line length.
 */

import { BufferError, StreamError } from "../errors";
import type { LineProcessingResult } from "../types";

// Constants for stream processing
const MAX_LINE_LENGTH = 33_554_432; // 32MB; wide multi-sample VCF rows get long
const MAX_BUFFER_SIZE = 67_108_864; // 64MB

/**
 * Convert ReadableStream<Uint8Array> to async iterable of lines
 *
 * Every line is yielded, blank ones included, so callers can count source
 * lines. The reader is released when iteration ends for any reason; a
 * consumer that stops early also cancels the underlying stream.
 *
 * @param stream Stream of binary data to process
 * @param encoding Text encoding; "binary" decodes bytes as Latin-1
 * @yields Complete lines of text without their terminators
 * @throws {StreamError} If stream processing fails
 * @throws {BufferError} If a line is too long or the buffer overflows
 * @example Line-by-line processing
 * ```typescript
 * const stream = await createStream('/path/to/calls.vcf');
 * for await (const line of readLines(stream)) {
 *   if (line.startsWith('#CHROM')) {
 *     console.log('Found column header:', line);
 *   }
 * }
 * ```
 */
export async function* readLines(
  stream: ReadableStream<Uint8Array>,
  encoding: "utf8" | "binary" = "utf8"
): AsyncGenerator<string, void, undefined> {
  const reader = stream.getReader();
  const decoder = new TextDecoder(encoding === "binary" ? "latin1" : "utf-8");
  let buffer = "";
  let totalBytesProcessed = 0;
  let drained = false;
  let streamFailed = false;

  try {
    while (true) {
      const { done, value } = await reader.read().catch((error: unknown) => {
        streamFailed = true;
        throw error;
      });

      if (done) {
        drained = true;
        buffer += decoder.decode();
        const last = buffer.endsWith("\r") ? buffer.slice(0, -1) : buffer;
        if (last.trim()) {
          yield last;
        }
        break;
      }

      buffer += decoder.decode(value, { stream: true });
      totalBytesProcessed += value.length;

      const result = processBuffer(buffer);
      buffer = result.remainder;

      for (const line of result.lines) {
        yield line;
      }

      if (buffer.length > MAX_BUFFER_SIZE) {
        throw new BufferError(
          `Buffer overflow: ${buffer.length} bytes exceeds maximum ${MAX_BUFFER_SIZE}`,
          buffer.length,
          "overflow"
        );
      }
    }
  } catch (error) {
    if (error instanceof BufferError) {
      throw error;
    }
    throw new StreamError(
      `Line reading failed: ${error instanceof Error ? error.message : String(error)}`,
      "read",
      totalBytesProcessed
    );
  } finally {
    if (!drained && !streamFailed) {
      await reader.cancel();
    }
    reader.releaseLock();
  }
}

/**
 * Process text buffer to extract complete lines
 *
 * Handles different line ending styles (\n, \r\n, \r) and preserves
 * incomplete lines for the next processing cycle. A trailing lone \r stays
 * in the remainder until the next chunk shows whether \n follows.
 *
 * @param buffer Text buffer to process
 * @returns Object with complete lines and remainder
 * @throws {BufferError} If a single line exceeds maximum length
 */
export function processBuffer(buffer: string): LineProcessingResult {
  const lines: string[] = [];
  let remainder = "";
  let lineStart = 0;

  for (let currentPosition = 0; currentPosition < buffer.length; currentPosition++) {
    const char = buffer[currentPosition];

    if (char === "\n") {
      let lineEnd = currentPosition;
      if (currentPosition > 0 && buffer[currentPosition - 1] === "\r") {
        lineEnd = currentPosition - 1;
      }
      lines.push(checkLength(buffer.slice(lineStart, lineEnd)));
      lineStart = currentPosition + 1;
    } else if (
      char === "\r" &&
      currentPosition + 1 < buffer.length &&
      buffer[currentPosition + 1] !== "\n"
    ) {
      // Mac classic line ending (\r not followed by \n)
      lines.push(checkLength(buffer.slice(lineStart, currentPosition)));
      lineStart = currentPosition + 1;
    }
  }

  if (lineStart < buffer.length) {
    remainder = buffer.slice(lineStart);

    if (remainder.length > MAX_LINE_LENGTH) {
      throw new BufferError(
        `Incomplete line too long: ${remainder.length} characters exceeds maximum ${MAX_LINE_LENGTH}`,
        remainder.length,
        "overflow",
        "This might indicate a file without proper line endings"
      );
    }
  }

  return { lines, remainder };
}

/**
 * Split an in-memory document into lines
 *
 * Same line ending rules as {@link processBuffer}; a final terminator does
 * not produce a trailing empty line.
 */
export function splitLines(text: string): string[] {
  const { lines, remainder } = processBuffer(text);
  const last = remainder.endsWith("\r") ? remainder.slice(0, -1) : remainder;
  if (last.length > 0) {
    lines.push(last);
  }
  return lines;
}

function checkLength(line: string): string {
  if (line.length > MAX_LINE_LENGTH) {
    throw new BufferError(
      `Line too long: ${line.length} characters exceeds maximum ${MAX_LINE_LENGTH}`,
      line.length,
      "overflow",
      `Line starts with: ${line.slice(0, 100)}...`
    );
  }
  return line;
}

export const StreamUtils = {
  readLines,
  processBuffer,
  splitLines,
} as const;
