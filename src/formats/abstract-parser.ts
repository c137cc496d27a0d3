/**
 * Abstract base parser with shared option merging and interrupt handling
 *
 * Provides consistent AbortSignal support and diagnostic callbacks without
 * imposing parsing implementation details on the concrete format.
 */

import { ParseError } from "../errors";
import type { FileReaderOptions, ParserOptions } from "../types";

/**
 * Defaults every parser resolves regardless of format
 */
export type BaseParserDefaults = Required<
  Pick<ParserOptions, "maxLineLength" | "trackLineNumbers" | "onWarning">
>;

/**
 * Abstract parser base class
 *
 * @template T - The record type this parser produces
 * @template TOptions - Options accepted from callers
 * @template TDefaults - Format defaults merged under the caller's options
 */
export abstract class AbstractParser<
  T,
  TOptions extends ParserOptions = ParserOptions,
  TDefaults extends Partial<TOptions> = Partial<TOptions>,
> {
  protected readonly options: BaseParserDefaults & TDefaults & TOptions;
  private readonly interruptHandler: InterruptHandler;

  constructor(options: TOptions) {
    const baseDefaults: BaseParserDefaults = {
      maxLineLength: 1_000_000,
      trackLineNumbers: true,
      onWarning: (warning: string, lineNumber?: number): void => {
        console.warn(`${this.getFormatName()} Warning (line ${lineNumber}): ${warning}`);
      },
    };

    // Merge in order: base -> format-specific -> user options
    this.options = { ...baseDefaults, ...this.getDefaultOptions(), ...options };
    this.interruptHandler = new InterruptHandler(this.options.signal);
  }

  /**
   * Get format-specific default options
   */
  protected abstract getDefaultOptions(): TDefaults;

  // ============================================================================
  // SHARED INTERRUPT HANDLING
  // ============================================================================

  /**
   * Check if parsing operation should be aborted
   * Call this in parsing loops so an AbortSignal stops iteration promptly
   */
  protected checkAborted(): void {
    this.interruptHandler.checkAborted();
  }

  /**
   * Check abortion with format context in the message
   */
  protected throwIfAborted(context: string): void {
    this.interruptHandler.throwIfAborted(`${this.getFormatName()} ${context}`);
  }

  // ============================================================================
  // ABSTRACT METHODS
  // ============================================================================

  /**
   * Parse records from an in-memory document
   */
  abstract parseString(data: string): AsyncIterable<T>;

  /**
   * Parse records from a file, decompressing by extension
   */
  abstract parseFile(filePath: string, options?: FileReaderOptions): AsyncIterable<T>;

  /**
   * Parse records from a byte stream
   */
  abstract parse(stream: ReadableStream<Uint8Array>): AsyncIterable<T>;

  /**
   * Format identifier used in errors and warnings (e.g. "VCF")
   */
  protected abstract getFormatName(): string;
}

/**
 * Interrupt handler utility for AbortSignal integration
 */
class InterruptHandler {
  constructor(private readonly signal?: AbortSignal) {}

  /**
   * @throws {ParseError} If operation was aborted
   */
  checkAborted(): void {
    if (this.signal?.aborted === true) {
      throw new ParseError("Operation was aborted", "ABORTED");
    }
  }

  /**
   * @throws {ParseError} If operation was aborted
   */
  throwIfAborted(context: string): void {
    if (this.signal?.aborted === true) {
      throw new ParseError(`Operation aborted during ${context}`, "ABORTED");
    }
  }
}
