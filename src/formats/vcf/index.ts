/**
 * VCF (Variant Call Format) module exports
 *
 * @example Basic VCF parsing
 * ```typescript
 * import { VcfParser } from './formats/vcf';
 *
 * const parser = new VcfParser();
 * for await (const record of parser.parseString(vcfData)) {
 *   console.log(`${record.chrom}:${record.pos} ${record.ref}>${record.alt.join(",")}`);
 * }
 * ```
 *
 * @example Annotation processors and raw lines
 * ```typescript
 * import { SnpEffInfoProcessor, VcfParser, VepInfoProcessor } from './formats/vcf';
 *
 * const parser = new VcfParser({ infoProcessors: [VepInfoProcessor, SnpEffInfoProcessor] });
 * const reader = await parser.openFile('annotated.vcf.gz');
 * for await (const { line, record } of reader.records({ includeRaw: true })) {
 *   console.log(line, record.info);
 * }
 * ```
 *
 * @module vcf
 */

export {
  coerceNumber,
  type Converter,
  dotToNone,
  flattenCardinal,
  MISSING_VALUE,
  parseSafeInteger,
  setEntry,
  type SplitOptions,
  splitAndConvert,
  splitMax,
  splitToCardinal,
  toCardinal,
} from "./coercion";
export { VcfRecordDecoder } from "./decoder";
export {
  FIXED_COLUMNS,
  formatFieldNumber,
  type HeaderWarningHandler,
  parseBracketedAttributes,
  parseFieldNumber,
  parseHeader,
  VcfHeader,
  VcfHeaderParser,
} from "./header";
export { VcfParser } from "./parser";
export {
  AnnotationInfoProcessor,
  buildFieldConverter,
  CsvAlleleInfoProcessor,
  NativeInfoProcessor,
  parseMinorAlleleFrequency,
  SnpEffInfoProcessor,
  splitEffect,
  VepInfoProcessor,
} from "./processors";
export { type ReaderSettings, VcfReader } from "./reader";
export {
  ALL_ALLELES,
  type AnnotationEntry,
  type AnnotationFieldValue,
  type Cardinal,
  type FieldCategory,
  type FieldMeta,
  type FieldNumber,
  HeaderParsingState,
  type InfoBucket,
  type InfoMap,
  type InfoProcessor,
  type InfoProcessorConstructor,
  type InfoValue,
  type MetaAttributes,
  type MetaValue,
  type PlainMetaValue,
  type ProcessorContext,
  type RawInfoValue,
  type RawVcfRecord,
  ReaderState,
  type RecordIterationOptions,
  type SampleValue,
  type Scalar,
  type VcfHeaderModel,
  type VcfParserOptions,
  type VcfRecord,
} from "./types";
export { countVcfRecords, detectVcfFormat, VcfUtils } from "./utils";
