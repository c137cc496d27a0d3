/**
 * Error handling for variant data decoding
 *
 * Every error raised by this library derives from {@link VcfError}, which
 * carries a machine-readable code plus the line number and context needed to
 * locate the offending input.
 */

/**
 * Base error class for all vcf-decode errors
 */
export class VcfError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly lineNumber?: number,
    public readonly context?: string
  ) {
    super(message);
    this.name = "VcfError";
  }

  /**
   * Create a user-friendly error message with context
   */
  override toString(): string {
    let msg = `${this.name}: ${this.message}`;
    if (this.lineNumber !== undefined) {
      msg += ` (line ${this.lineNumber})`;
    }
    if (this.context !== undefined && this.context !== "") {
      msg += `\nContext: ${this.context}`;
    }
    return msg;
  }
}

/**
 * Validation errors for malformed options or arguments
 */
export class ValidationError extends VcfError {
  constructor(message: string, lineNumber?: number, context?: string) {
    super(message, "VALIDATION_ERROR", lineNumber, context);
    this.name = "ValidationError";
  }
}

/**
 * Parsing errors for format-specific issues
 */
export class ParseError extends VcfError {
  constructor(
    message: string,
    public readonly format: string,
    lineNumber?: number,
    context?: string
  ) {
    super(message, "PARSE_ERROR", lineNumber, context);
    this.name = "ParseError";
  }
}

/**
 * Header block errors: a meta line without `=`, a structured declaration
 * without an ID, or a data line before the `#CHROM` line. No partial header
 * is usable after one of these.
 */
export class MalformedHeaderError extends ParseError {
  constructor(message: string, lineNumber?: number, context?: string) {
    super(message, "VCF", lineNumber, context);
    this.name = "MalformedHeaderError";
  }
}

/**
 * Per-allele INFO value whose element count differs from the ALT allele count
 */
export class AlleleCountMismatchError extends ParseError {
  constructor(
    public readonly key: string,
    public readonly expected: number,
    public readonly actual: number,
    lineNumber?: number
  ) {
    super(
      `Number of allele values for ${key} (${actual}) does not match number of alleles (${expected})`,
      "VCF",
      lineNumber,
      `INFO key: ${key}`
    );
    this.name = "AlleleCountMismatchError";
  }
}

/**
 * Declared INFO type the fallback converter does not know.
 *
 * Never thrown: the key decodes as a plain string and this error is only
 * reported through the parser's warning callback.
 */
export class UnknownFieldConversionError extends VcfError {
  constructor(
    public readonly fieldId: string,
    public readonly declaredType: string,
    public readonly declaredNumber: string
  ) {
    super(
      `No converter for INFO field ${fieldId} (Type=${declaredType}, Number=${declaredNumber}); decoding as string`,
      "UNKNOWN_FIELD_CONVERSION"
    );
    this.name = "UnknownFieldConversionError";
  }
}

/**
 * Umbrella error for any failure while decoding a single data line
 */
export class RecordDecodeError extends ParseError {
  constructor(
    message: string,
    lineNumber: number,
    public readonly line: string,
    cause?: unknown
  ) {
    super(message, "VCF", lineNumber, `Line content: ${truncateLine(line)}`);
    this.name = "RecordDecodeError";
    this.cause = cause;
  }

  /**
   * Wrap whatever the decoder threw, keeping the original as `cause`
   */
  static fromCause(cause: unknown, lineNumber: number, line: string): RecordDecodeError {
    if (cause instanceof RecordDecodeError) {
      return cause;
    }
    const detail = cause instanceof Error ? cause.message : String(cause);
    return new RecordDecodeError(
      `Line ${lineNumber} failed to decode: ${detail}`,
      lineNumber,
      line,
      cause
    );
  }
}

function truncateLine(line: string): string {
  return line.length > 200 ? `${line.slice(0, 200)}...` : line;
}

/**
 * Compression/decompression errors with detailed context
 */
export class CompressionError extends VcfError {
  constructor(
    message: string,
    public readonly format: "gzip" | "none",
    public readonly operation: "detect" | "decompress" | "stream",
    public readonly bytesProcessed?: number,
    context?: string
  ) {
    super(message, "COMPRESSION_ERROR", undefined, context);
    this.name = "CompressionError";
  }

  static fromSystemError(
    format: CompressionError["format"],
    operation: CompressionError["operation"],
    systemError: unknown,
    bytesProcessed?: number
  ): CompressionError {
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    const msg = errorMessage.toLowerCase();
    let suggestion = "";
    if (msg.includes("magic") || msg.includes("header") || msg.includes("incorrect")) {
      suggestion = `. File may be corrupted or not actually ${format} compressed`;
    } else if (msg.includes("truncated") || msg.includes("unexpected end")) {
      suggestion = ". File appears to be truncated or incomplete";
    }

    return new CompressionError(
      `${operation} operation failed for ${format}: ${errorMessage}${suggestion}`,
      format,
      operation,
      bytesProcessed,
      `System error: ${errorMessage}`
    );
  }
}

/**
 * File I/O errors with cross-platform support and detailed context
 */
export class FileError extends VcfError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly operation: "read" | "stat" | "open" | "close",
    public readonly systemError?: unknown,
    context?: string
  ) {
    super(message, "FILE_ERROR", undefined, context);
    this.name = "FileError";
  }

  /**
   * Create file error with system error context
   */
  static fromSystemError(
    operation: FileError["operation"],
    filePath: string,
    systemError: unknown
  ): FileError {
    if (systemError instanceof FileError) {
      return systemError;
    }
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    const suggestion = FileError.getSuggestionForSystemError(errorMessage);

    return new FileError(
      `${operation} operation failed: ${errorMessage}${suggestion !== undefined ? `. ${suggestion}` : ""}`,
      filePath,
      operation,
      systemError,
      `System error: ${errorMessage}`
    );
  }

  private static getSuggestionForSystemError(errorMessage: string): string | undefined {
    const msg = errorMessage.toLowerCase();

    if (msg.includes("enoent") || msg.includes("no such file")) {
      return "Check that the file path is correct and the file exists";
    }
    if (msg.includes("eacces") || msg.includes("permission denied")) {
      return "Check file permissions or run with appropriate privileges";
    }
    if (msg.includes("eisdir") || msg.includes("is a directory")) {
      return "Path points to a directory, not a file";
    }
    if (msg.includes("emfile") || msg.includes("too many open files")) {
      return "Close unused file handles or increase system limits";
    }

    return undefined;
  }
}

/**
 * Stream processing errors for I/O operations
 */
export class StreamError extends VcfError {
  constructor(
    message: string,
    public readonly streamType: "read" | "transform",
    public readonly bytesProcessed?: number,
    context?: string
  ) {
    super(message, "STREAM_ERROR", undefined, context);
    this.name = "StreamError";
  }
}

/**
 * Buffer management errors for streaming operations
 */
export class BufferError extends VcfError {
  constructor(
    message: string,
    public readonly bufferSize: number,
    public readonly operation: "overflow",
    context?: string
  ) {
    super(message, "BUFFER_ERROR", undefined, context);
    this.name = "BufferError";
  }
}
