/**
 * Core VCF type definitions
 *
 * Header model, decoded record shape, processor contracts and parser options.
 * Kept free of runtime code so every VCF module can import from here without
 * cycles.
 *
 * @module vcf/types
 */

import type { RecordDecodeError } from "../../errors";
import type { ParserOptions } from "../../types";

// =============================================================================
// CARDINALITY
// =============================================================================

/**
 * One value or a list of values
 *
 * VCF text spells "one value" and "list of one" identically; this union keeps
 * the distinction explicit at the boundaries where the format collapses
 * singletons (header categories, `Number=1` fields, sample values).
 *
 * @public
 */
export type Cardinal<T> =
  | { readonly kind: "scalar"; readonly value: T }
  | { readonly kind: "list"; readonly values: readonly T[] };

// =============================================================================
// HEADER MODEL
// =============================================================================

/** Structured meta categories parsed with the bracketed key/value extractor */
export type FieldCategory = "INFO" | "FILTER" | "FORMAT";

/** Ordered `key=value` pairs of a `<...>` declaration */
export type MetaAttributes = Readonly<Record<string, string>>;

/** Raw text for free-form categories, extracted attributes for structured ones */
export type MetaValue = string | MetaAttributes;

/**
 * Declared arity of a field
 *
 * `count` for a literal integer, `per-allele` for `A`, `other` for `G`, `R`,
 * `.` or a missing Number attribute (token `""`).
 */
export type FieldNumber =
  | { readonly kind: "count"; readonly count: number }
  | { readonly kind: "per-allele" }
  | { readonly kind: "other"; readonly token: string };

/**
 * One declared INFO/FILTER/FORMAT entry
 *
 * @public
 */
export interface FieldMeta {
  /** Field key (unique per category) */
  readonly id: string;
  /** Declared type token (`Integer`, `Float`, `Flag`, `String`, ...), `""` when absent */
  readonly type: string;
  readonly number: FieldNumber;
  readonly description: string;
  /** Every extracted attribute verbatim, ID included */
  readonly attributes: MetaAttributes;
}

/** Collapsed plain view of one meta category */
export type PlainMetaValue = MetaValue | MetaValue[];

/**
 * Header parser states
 */
export enum HeaderParsingState {
  IN_META, // Reading ##KEY=VALUE lines
  IN_DATA, // Column header seen; remaining lines are records
}

/**
 * Reader session states
 */
export enum ReaderState {
  SEEKING_DATA_START, // Header lines still being consumed
  EMITTING, // Decoding data lines
  CLOSED, // Source released
}

// =============================================================================
// DECODED VALUES
// =============================================================================

/** Single decoded value; `null` is the missing-value sentinel */
export type Scalar = string | number | boolean | null;

/** Value of one sub-field of an annotation sub-record */
export type AnnotationFieldValue = string | number | string[] | number[] | Record<string, number>;

/** One decoded annotation sub-record (e.g. one CSQ or EFF transcript entry) */
export type AnnotationEntry = Record<string, AnnotationFieldValue>;

/** Decoded INFO value as stored in an allele bucket */
export type InfoValue = Scalar | Scalar[] | AnnotationEntry[];

/** INFO values of one bucket, keyed by INFO key */
export type InfoBucket = Record<string, InfoValue>;

/**
 * INFO values partitioned by allele: one bucket per ALT allele plus `ALL`
 * for whole-record values
 */
export type InfoMap = Record<string, InfoBucket>;

/** Reserved bucket for whole-record INFO values */
export const ALL_ALLELES = "ALL";

/** Decoded FORMAT value of one sample */
export type SampleValue = number | string | (number | string)[];

/**
 * One decoded VCF data line
 *
 * @public
 */
export interface VcfRecord {
  readonly chrom: string;
  /** 1-based position; left as text when it does not parse as a number */
  readonly pos: number | string;
  readonly id: string;
  readonly ref: string;
  readonly alt: string[];
  readonly qual: number | string;
  readonly filter: string;
  readonly info: InfoMap;
  readonly samples: Record<string, Record<string, SampleValue>>;
  /** Source line number, when line tracking is enabled */
  readonly lineNumber?: number;
}

/**
 * Decoded record paired with the text it came from
 */
export interface RawVcfRecord {
  readonly line: string;
  readonly record: VcfRecord;
}

// =============================================================================
// INFO PROCESSORS
// =============================================================================

/** Raw INFO value: the text after `=`, or `true` for a bare flag */
export type RawInfoValue = string | true;

/**
 * Pluggable INFO decoder
 *
 * Chain members are asked `accepts` in registration order; every processor
 * that accepts a key processes it, and later processors see
 * `processed === true`.
 *
 * @public
 */
export interface InfoProcessor {
  accepts(key: string, value: RawInfoValue, processed: boolean): boolean;
  process(
    key: string,
    value: RawInfoValue,
    info: InfoMap,
    alleles: readonly string[],
    processed: boolean
  ): void;
}

/**
 * Diagnostics a processor may report while it is being built
 */
export interface ProcessorContext {
  readonly onWarning: (warning: string, lineNumber?: number) => void;
}

/**
 * Processor class registered with the parser; constructed once per header
 */
export type InfoProcessorConstructor = new (
  header: VcfHeaderModel,
  context: ProcessorContext
) => InfoProcessor;

/**
 * Read-only header surface needed by processors and the decoder
 */
export interface VcfHeaderModel {
  readonly columns: readonly string[];
  readonly samples: readonly string[];
  fields(category: FieldCategory): readonly FieldMeta[];
  field(category: FieldCategory, id: string): FieldMeta | undefined;
}

// =============================================================================
// PARSER OPTIONS
// =============================================================================

/**
 * VCF parser configuration options
 *
 * @public
 */
export interface VcfParserOptions extends ParserOptions {
  /** Extra INFO processors, run after the built-in per-allele CSV processor */
  infoProcessors?: readonly InfoProcessorConstructor[];
  /** Abort iteration on the first undecodable line (default: true) */
  strict?: boolean;
  /** Receives each skipped line in permissive mode (default: forwards to onWarning) */
  onRecordError?: (error: RecordDecodeError) => void;
}

/**
 * Per-iteration options for {@link VcfParserOptions}-configured readers
 */
export interface RecordIterationOptions {
  /** Overrides the parser's `strict` setting for this pass */
  readonly strict?: boolean;
  /** Yield `{ line, record }` pairs instead of bare records */
  readonly includeRaw?: boolean;
}
