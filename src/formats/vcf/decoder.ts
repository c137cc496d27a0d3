/**
 * Data line decoding
 *
 * @module vcf/decoder
 */

import { ParseError } from "../../errors";
import { coerceNumber, setEntry, splitAndConvert } from "./coercion";
import {
  ALL_ALLELES,
  type InfoMap,
  type InfoProcessor,
  type RawInfoValue,
  type SampleValue,
  type VcfHeaderModel,
  type VcfRecord,
} from "./types";

const MISSING_INFO = ".";

const decodeSampleValue = splitAndConvert(coerceNumber, { unwrapSingle: true });

/**
 * Decodes data lines against one header and processor chain
 *
 * Holds no per-record state; a decoder may be shared by any number of
 * iterations over input with the same header.
 *
 * @example
 * ```typescript
 * const decoder = new VcfRecordDecoder(header, [new CsvAlleleInfoProcessor()], new NativeInfoProcessor(header));
 * const record = decoder.decodeLine("20\t14370\trs6054257\tG\tA\t29\tPASS\tDP=14");
 * record.info.ALL.DP; // 14
 * ```
 */
export class VcfRecordDecoder {
  constructor(
    private readonly header: VcfHeaderModel,
    private readonly processors: readonly InfoProcessor[],
    private readonly fallback: InfoProcessor
  ) {}

  /**
   * Decode one data line
   *
   * Fields beyond the last column are ignored.
   *
   * @throws {ParseError} When the line has fewer fields than the header has
   * columns or a processor rejects a value; no partial record is returned
   */
  decodeLine(line: string, lineNumber?: number): VcfRecord {
    const values = line.split("\t");
    const columns = this.header.columns;
    if (values.length < columns.length) {
      throw new ParseError(
        `Expected ${columns.length} tab-separated fields, found ${values.length}`,
        "VCF",
        lineNumber
      );
    }

    const fields = new Map<string, string>();
    columns.forEach((column, index) => fields.set(column, values[index]));

    const required = (column: string): string => {
      const value = fields.get(column);
      if (value === undefined) {
        throw new ParseError(`Column header has no ${column} column`, "VCF", lineNumber);
      }
      return value;
    };

    const alt = required("ALT").split(",");

    return {
      chrom: required("CHROM"),
      pos: coerceNumber(required("POS")),
      id: required("ID"),
      ref: required("REF"),
      alt,
      qual: coerceNumber(required("QUAL")),
      filter: required("FILTER"),
      info: this.decodeInfo(required("INFO"), alt),
      samples: this.decodeSamples(fields),
      ...(lineNumber !== undefined && { lineNumber }),
    };
  }

  /**
   * Run the processor chain over a raw INFO column
   */
  decodeInfo(text: string, alleles: readonly string[]): InfoMap {
    const info: InfoMap = {};
    for (const allele of alleles) {
      setEntry(info, allele, {});
    }
    setEntry(info, ALL_ALLELES, {});

    if (text === MISSING_INFO) {
      return info;
    }

    for (const token of text.split(";")) {
      if (token === "") continue;
      const equals = token.indexOf("=");
      const key = equals === -1 ? token : token.slice(0, equals);
      const value: RawInfoValue = equals === -1 ? true : token.slice(equals + 1);
      this.dispatch(key, value, info, alleles);
    }
    return info;
  }

  private dispatch(
    key: string,
    value: RawInfoValue,
    info: InfoMap,
    alleles: readonly string[]
  ): void {
    let processed = false;
    for (const processor of this.processors) {
      if (processor.accepts(key, value, processed)) {
        processor.process(key, value, info, alleles, processed);
        processed = true;
      }
    }
    if (!processed) {
      this.fallback.process(key, value, info, alleles, processed);
    }
  }

  private decodeSamples(
    fields: ReadonlyMap<string, string>
  ): Record<string, Record<string, SampleValue>> {
    const format = fields.get("FORMAT");
    if (format === undefined) {
      return {};
    }

    const keys = format.split(":");
    const samples: Record<string, Record<string, SampleValue>> = {};
    for (const name of this.header.samples) {
      const pieces = (fields.get(name) ?? "").split(":");
      const decoded: Record<string, SampleValue> = {};
      // Trailing FORMAT keys without a value are left out
      const width = Math.min(keys.length, pieces.length);
      for (let i = 0; i < width; i++) {
        setEntry(decoded, keys[i], decodeSampleValue(pieces[i]));
      }
      setEntry(samples, name, decoded);
    }
    return samples;
  }
}
