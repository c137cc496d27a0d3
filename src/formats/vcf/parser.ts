/**
 * VCF parser: opens a source, reads its header and hands out a reader
 *
 * @module vcf/parser
 */

import { type } from "arktype";
import { ValidationError, type RecordDecodeError } from "../../errors";
import { createStream } from "../../io/file-reader";
import { readLines, splitLines } from "../../io/stream-utils";
import type { FileReaderOptions } from "../../types";
import { AbstractParser } from "../abstract-parser";
import { VcfRecordDecoder } from "./decoder";
import { type VcfHeader, VcfHeaderParser } from "./header";
import { CsvAlleleInfoProcessor, NativeInfoProcessor } from "./processors";
import { VcfReader } from "./reader";
import type {
  InfoProcessor,
  InfoProcessorConstructor,
  ProcessorContext,
  VcfParserOptions,
  VcfRecord,
} from "./types";

/**
 * Format defaults merged under caller options
 */
interface VcfParserDefaults {
  maxLineLength: number;
  strict: boolean;
  infoProcessors: readonly InfoProcessorConstructor[];
}

/**
 * ArkType validation for VCF parser options
 */
const VcfParserOptionsSchema = type({
  "maxLineLength?": "number>0",
  "trackLineNumbers?": "boolean",
  "strict?": "boolean",
  "infoProcessors?": "unknown[]",
}).narrow((options, ctx) => {
  if (options.infoProcessors?.some((processor) => typeof processor !== "function") === true) {
    return ctx.reject({
      expected: "InfoProcessor classes",
      path: ["infoProcessors"],
      message: "infoProcessors must list processor classes, not instances",
    });
  }
  return true;
});

function toLineIterator(
  lines: Iterable<string> | AsyncIterable<string>
): AsyncGenerator<string, void, undefined> {
  return (async function* () {
    yield* lines;
  })();
}

/**
 * Streaming VCF parser
 *
 * Extra INFO processors run after the built-in per-allele CSV processor, in
 * the order given; keys nobody claims are decoded from their header
 * declaration.
 *
 * @example Iterate a compressed file
 * ```typescript
 * const parser = new VcfParser({ infoProcessors: [VepInfoProcessor] });
 * for await (const record of parser.parseFile("annotated.vcf.gz")) {
 *   console.log(record.info.ALL);
 * }
 * ```
 *
 * @example Keep going past bad lines
 * ```typescript
 * const parser = new VcfParser({
 *   strict: false,
 *   onRecordError: (error) => skipped.push(error.lineNumber),
 * });
 * ```
 */
export class VcfParser extends AbstractParser<VcfRecord, VcfParserOptions, VcfParserDefaults> {
  constructor(options: VcfParserOptions = {}) {
    const validationResult = VcfParserOptionsSchema(options);
    if (validationResult instanceof type.errors) {
      throw new ValidationError(`Invalid VCF parser options: ${validationResult.summary}`);
    }
    super(options);
  }

  protected override getDefaultOptions(): VcfParserDefaults {
    return {
      maxLineLength: 16_777_216,
      strict: true,
      infoProcessors: [],
    };
  }

  protected override getFormatName(): string {
    return "VCF";
  }

  // ===========================================================================
  // SESSION OPENERS
  // ===========================================================================

  /**
   * Open an in-memory VCF document
   *
   * @throws {MalformedHeaderError} If the header is invalid
   */
  openString(data: string): Promise<VcfReader> {
    return this.openLines(splitLines(data));
  }

  /**
   * Open a stream of VCF bytes
   *
   * The stream is cancelled if the header cannot be read.
   *
   * @param encoding "binary" decodes as Latin-1
   */
  async openStream(
    stream: ReadableStream<Uint8Array>,
    encoding: "utf8" | "binary" = "utf8"
  ): Promise<VcfReader> {
    try {
      return await this.openLines(readLines(stream, encoding));
    } catch (error) {
      // A line reader that never started leaves the stream unlocked and open
      if (!stream.locked) {
        await stream.cancel();
      }
      throw error;
    }
  }

  /**
   * Open a VCF file, gunzipping `.gz`/`.bgz` files
   *
   * @throws {FileError} If the file cannot be opened
   */
  async openFile(filePath: string, options: FileReaderOptions = {}): Promise<VcfReader> {
    if (filePath.length === 0) {
      throw new ValidationError("filePath cannot be empty");
    }
    const stream = await createStream(filePath, options);
    return this.openStream(stream, options.encoding ?? "utf8");
  }

  /**
   * Open any line source; the header is read before this resolves
   *
   * The source is released if the header cannot be read.
   *
   * @throws {MalformedHeaderError} If the header is invalid
   */
  async openLines(lines: Iterable<string> | AsyncIterable<string>): Promise<VcfReader> {
    const iterator = toLineIterator(lines);
    const headerParser = new VcfHeaderParser(this.options.onWarning);

    try {
      while (!headerParser.isComplete) {
        this.throwIfAborted("header parsing");
        const next = await iterator.next();
        if (next.done === true) break;
        headerParser.feed(next.value);
      }

      const header = headerParser.finish();
      return new VcfReader(
        header,
        iterator,
        this.createDecoder(header),
        {
          strict: this.options.strict,
          maxLineLength: this.options.maxLineLength,
          trackLineNumbers: this.options.trackLineNumbers,
          onRecordError:
            this.options.onRecordError ?? ((error) => this.reportSkippedRecord(error)),
          checkAborted: () => this.checkAborted(),
        },
        headerParser.linesConsumed
      );
    } catch (error) {
      await iterator.return();
      throw error;
    }
  }

  /**
   * Build the decoder for a header: CSV allele processor, then the
   * configured processors, with the header-driven processor as fallback
   */
  createDecoder(header: VcfHeader): VcfRecordDecoder {
    const context: ProcessorContext = { onWarning: this.options.onWarning };
    const processors: InfoProcessor[] = [
      new CsvAlleleInfoProcessor(),
      ...this.options.infoProcessors.map((Processor) => new Processor(header, context)),
    ];
    return new VcfRecordDecoder(header, processors, new NativeInfoProcessor(header, context));
  }

  // ===========================================================================
  // RECORD STREAMS
  // ===========================================================================

  /**
   * Parse records from an in-memory document
   */
  override async *parseString(data: string): AsyncIterable<VcfRecord> {
    const reader = await this.openString(data);
    yield* reader.records();
  }

  /**
   * Parse records from a file
   */
  override async *parseFile(
    filePath: string,
    options?: FileReaderOptions
  ): AsyncIterable<VcfRecord> {
    const reader = await this.openFile(filePath, options);
    yield* reader.records();
  }

  /**
   * Parse records from a byte stream
   */
  override async *parse(stream: ReadableStream<Uint8Array>): AsyncIterable<VcfRecord> {
    const reader = await this.openStream(stream);
    yield* reader.records();
  }

  /**
   * Default permissive-mode report: one warning naming the line and its text
   */
  private reportSkippedRecord(error: RecordDecodeError): void {
    const cause = error.cause instanceof Error ? error.cause.message : error.message;
    this.options.onWarning(`Skipped record: ${cause} | ${error.line}`, error.lineNumber);
  }
}
