/**
 * Single-pass record iteration over an opened VCF source
 *
 * @module vcf/reader
 */

import { ParseError, RecordDecodeError, StreamError } from "../../errors";
import type { VcfRecordDecoder } from "./decoder";
import type { VcfHeader } from "./header";
import {
  type PlainMetaValue,
  type RawVcfRecord,
  ReaderState,
  type RecordIterationOptions,
  type VcfRecord,
} from "./types";

/**
 * Resolved parser settings a reader iterates with
 */
export interface ReaderSettings {
  readonly strict: boolean;
  readonly maxLineLength: number;
  readonly trackLineNumbers: boolean;
  readonly onRecordError: (error: RecordDecodeError) => void;
  /** Throws when the parser's AbortSignal has fired */
  readonly checkAborted: () => void;
}

/**
 * An open VCF decode session
 *
 * The header has already been read when a reader exists. Records can be
 * iterated once; the underlying source is released when iteration finishes,
 * stops early or fails, and by {@link VcfReader.close}.
 *
 * @example
 * ```typescript
 * const reader = await new VcfParser().openFile("calls.vcf.gz");
 * console.log(reader.getSamples());
 * for await (const record of reader.records({ strict: false })) {
 *   console.log(record.chrom, record.pos);
 * }
 * ```
 */
export class VcfReader implements AsyncIterable<VcfRecord> {
  private state = ReaderState.SEEKING_DATA_START;

  constructor(
    readonly header: VcfHeader,
    private readonly lines: AsyncIterator<string, unknown, undefined>,
    private readonly decoder: VcfRecordDecoder,
    private readonly settings: ReaderSettings,
    private lineNumber: number
  ) {}

  /** Column names from the column header line */
  getHeader(): string[] {
    return [...this.header.columns];
  }

  /** Meta categories, collapsed to bare values for single declarations */
  getMeta(): Record<string, PlainMetaValue> {
    return this.header.plainMeta();
  }

  getSamples(): string[] {
    return [...this.header.samples];
  }

  /**
   * Iterate decoded records
   *
   * @throws {StreamError} If records were already requested or the reader is closed
   */
  records(
    options: RecordIterationOptions & { readonly includeRaw: true }
  ): AsyncGenerator<RawVcfRecord, void, undefined>;
  records(
    options?: RecordIterationOptions & { readonly includeRaw?: false }
  ): AsyncGenerator<VcfRecord, void, undefined>;
  records(
    options: RecordIterationOptions = {}
  ): AsyncGenerator<VcfRecord | RawVcfRecord, void, undefined> {
    if (this.state === ReaderState.CLOSED) {
      throw new StreamError("VCF reader is closed", "read");
    }
    if (this.state === ReaderState.EMITTING) {
      throw new StreamError("VCF records can only be iterated once per reader", "read");
    }
    this.state = ReaderState.EMITTING;
    return this.emit(options.strict ?? this.settings.strict, options.includeRaw === true);
  }

  [Symbol.asyncIterator](): AsyncIterator<VcfRecord> {
    return this.records();
  }

  /**
   * Release the underlying source; safe to call more than once
   */
  async close(): Promise<void> {
    if (this.state === ReaderState.CLOSED) {
      return;
    }
    this.state = ReaderState.CLOSED;
    await this.lines.return?.();
  }

  private async *emit(
    strict: boolean,
    includeRaw: boolean
  ): AsyncGenerator<VcfRecord | RawVcfRecord, void, undefined> {
    try {
      while (true) {
        this.settings.checkAborted();
        const next = await this.lines.next();
        if (next.done === true) break;

        this.lineNumber++;
        const line = next.value;
        if (line.trim() === "") continue;

        let record: VcfRecord;
        try {
          record = this.decode(line);
        } catch (error) {
          const failure = RecordDecodeError.fromCause(error, this.lineNumber, line);
          if (strict) {
            throw failure;
          }
          this.settings.onRecordError(failure);
          continue;
        }

        yield includeRaw ? { line, record } : record;
      }
    } finally {
      await this.close();
    }
  }

  private decode(line: string): VcfRecord {
    if (line.length > this.settings.maxLineLength) {
      throw new ParseError(
        `Line length ${line.length} exceeds maximum ${this.settings.maxLineLength}`,
        "VCF",
        this.lineNumber
      );
    }
    return this.decoder.decodeLine(
      line,
      this.settings.trackLineNumbers ? this.lineNumber : undefined
    );
  }
}
