/**
 * VCF header model and incremental header parser
 *
 * Meta lines (`##KEY=VALUE`) accumulate per category until the column header
 * line (`#CHROM ...`) ends the header. INFO, FILTER and FORMAT declarations
 * are parsed into {@link FieldMeta}; every other category keeps its raw text.
 *
 * @module vcf/header
 */

import { MalformedHeaderError } from "../../errors";
import { flattenCardinal, parseSafeInteger, setEntry, toCardinal } from "./coercion";
import {
  type Cardinal,
  type FieldCategory,
  type FieldMeta,
  type FieldNumber,
  HeaderParsingState,
  type MetaAttributes,
  type MetaValue,
  type PlainMetaValue,
  type VcfHeaderModel,
} from "./types";

/** The fixed columns preceding sample columns */
export const FIXED_COLUMNS = [
  "CHROM",
  "POS",
  "ID",
  "REF",
  "ALT",
  "QUAL",
  "FILTER",
  "INFO",
  "FORMAT",
] as const;

const FIXED_COLUMN_SET: ReadonlySet<string> = new Set<string>(FIXED_COLUMNS);

const STRUCTURED_CATEGORIES: ReadonlySet<string> = new Set<string>(["INFO", "FILTER", "FORMAT"]);

function isFieldCategory(key: string): key is FieldCategory {
  return STRUCTURED_CATEGORIES.has(key);
}

// =============================================================================
// BRACKETED KEY/VALUE EXTRACTION
// =============================================================================

/**
 * Extract `key=value` pairs from a `<...>` declaration
 *
 * Unquoted values end at `,` or `>`. Quoted values end at the closing quote
 * and may contain commas; the quotes are dropped. Keys are trimmed.
 *
 * @example
 * ```typescript
 * parseBracketedAttributes('<ID=DP,Number=1,Type=Integer,Description="Depth, total">');
 * // { ID: "DP", Number: "1", Type: "Integer", Description: "Depth, total" }
 * ```
 */
export function parseBracketedAttributes(value: string): Record<string, string> {
  const attributes: Record<string, string> = {};
  const text = value.trimStart().startsWith("<") ? value.trimStart().slice(1) : value;
  let position = 0;

  while (position < text.length) {
    while (position < text.length && (text[position] === "," || text[position] === " ")) {
      position++;
    }
    if (position >= text.length || text[position] === ">") break;

    const equals = text.indexOf("=", position);
    if (equals === -1) break;

    const key = text.slice(position, equals).trim();
    let cursor = equals + 1;
    let fieldValue: string;

    if (text[cursor] === '"') {
      const closing = text.indexOf('"', cursor + 1);
      const end = closing === -1 ? text.length : closing;
      fieldValue = text.slice(cursor + 1, end);
      cursor = end + 1;
      while (cursor < text.length && text[cursor] !== "," && text[cursor] !== ">") {
        cursor++;
      }
    } else {
      const start = cursor;
      while (cursor < text.length && text[cursor] !== "," && text[cursor] !== ">") {
        cursor++;
      }
      fieldValue = text.slice(start, cursor);
    }

    if (key !== "") {
      setEntry(attributes, key, fieldValue);
    }
    if (text[cursor] === ">") break;
    position = cursor + 1;
  }

  return attributes;
}

/**
 * Interpret a declared Number token
 */
export function parseFieldNumber(token: string | undefined): FieldNumber {
  if (token === undefined) {
    return { kind: "other", token: "" };
  }
  const count = parseSafeInteger(token);
  if (count !== undefined) {
    return { kind: "count", count };
  }
  if (token === "A") {
    return { kind: "per-allele" };
  }
  return { kind: "other", token };
}

/**
 * Render a Number back to its header token
 */
export function formatFieldNumber(number: FieldNumber): string {
  switch (number.kind) {
    case "count":
      return String(number.count);
    case "per-allele":
      return "A";
    case "other":
      return number.token;
  }
}

function attribute(attributes: MetaAttributes, key: string): string | undefined {
  return Object.hasOwn(attributes, key) ? attributes[key] : undefined;
}

function toFieldMeta(
  category: FieldCategory,
  attributes: MetaAttributes,
  lineNumber: number,
  line: string
): FieldMeta {
  const id = attribute(attributes, "ID");
  if (id === undefined || id === "") {
    throw new MalformedHeaderError(`${category} declaration has no ID`, lineNumber, line);
  }
  return {
    id,
    type: attribute(attributes, "Type") ?? "",
    number: parseFieldNumber(attribute(attributes, "Number")),
    description: attribute(attributes, "Description") ?? "",
    attributes,
  };
}

// =============================================================================
// HEADER MODEL
// =============================================================================

/**
 * Parsed VCF header; immutable once built
 *
 * @public
 */
export class VcfHeader implements VcfHeaderModel {
  /** Every meta category, collapsed to a scalar when declared once */
  readonly meta: ReadonlyMap<string, Cardinal<MetaValue>>;
  /** Column names from the column header line, marker removed */
  readonly columns: readonly string[];
  /** Sample columns in file order */
  readonly samples: readonly string[];

  private readonly fieldsByCategory: ReadonlyMap<FieldCategory, readonly FieldMeta[]>;
  private readonly fieldIndex: ReadonlyMap<FieldCategory, ReadonlyMap<string, FieldMeta>>;

  constructor(
    meta: ReadonlyMap<string, Cardinal<MetaValue>>,
    columns: readonly string[],
    fieldsByCategory: ReadonlyMap<FieldCategory, readonly FieldMeta[]>
  ) {
    this.meta = meta;
    this.columns = columns;
    this.samples = columns.filter((column) => !FIXED_COLUMN_SET.has(column));
    this.fieldsByCategory = fieldsByCategory;

    const index = new Map<FieldCategory, ReadonlyMap<string, FieldMeta>>();
    for (const [category, fields] of fieldsByCategory) {
      index.set(category, new Map(fields.map((field) => [field.id, field])));
    }
    this.fieldIndex = index;
  }

  /**
   * Declared fields of a category in source order; never collapsed
   */
  fields(category: FieldCategory): readonly FieldMeta[] {
    return this.fieldsByCategory.get(category) ?? [];
  }

  field(category: FieldCategory, id: string): FieldMeta | undefined {
    return this.fieldIndex.get(category)?.get(id);
  }

  /**
   * Meta categories as plain values: the bare value for single declarations,
   * an array otherwise
   */
  plainMeta(): Record<string, PlainMetaValue> {
    const plain: Record<string, PlainMetaValue> = {};
    for (const [key, value] of this.meta) {
      setEntry(plain, key, flattenCardinal(value));
    }
    return plain;
  }
}

// =============================================================================
// HEADER PARSER
// =============================================================================

/**
 * Reports header problems that do not stop parsing
 */
export type HeaderWarningHandler = (warning: string, lineNumber?: number) => void;

/**
 * Incremental header parser
 *
 * Feed lines one at a time; `feed` returns true once the column header line
 * has been consumed, after which further lines are ignored. A repeated
 * INFO/FILTER/FORMAT ID is reported through the warning handler; the first
 * declaration stays in effect.
 *
 * @example
 * ```typescript
 * const parser = new VcfHeaderParser();
 * for (const line of lines) {
 *   if (parser.feed(line)) break;
 * }
 * const header = parser.finish();
 * ```
 */
export class VcfHeaderParser {
  private state = HeaderParsingState.IN_META;
  private readonly rawMeta = new Map<string, MetaValue[]>();
  private readonly fieldsByCategory = new Map<FieldCategory, FieldMeta[]>();
  private columns: string[] | undefined;
  private lineNumber = 0;

  constructor(private readonly onWarning: HeaderWarningHandler = () => {}) {}

  /** Number of lines consumed so far, blank ones included */
  get linesConsumed(): number {
    return this.lineNumber;
  }

  get isComplete(): boolean {
    return this.state === HeaderParsingState.IN_DATA;
  }

  /**
   * Consume one header line
   *
   * @throws {MalformedHeaderError} For a meta line without `=`, a structured
   * declaration without an ID, or a data line before the column header
   */
  feed(line: string): boolean {
    if (this.state === HeaderParsingState.IN_DATA) {
      return true;
    }
    this.lineNumber++;

    if (line.trim() === "") {
      return false;
    }

    if (line.startsWith("##")) {
      this.addMetaLine(line);
      return false;
    }

    if (line.startsWith("#")) {
      this.columns = line.slice(1).split("\t");
      this.state = HeaderParsingState.IN_DATA;
      return true;
    }

    throw new MalformedHeaderError(
      "Data line found before the #CHROM column header",
      this.lineNumber,
      line
    );
  }

  /**
   * Build the header
   *
   * @throws {MalformedHeaderError} If no column header line was fed
   */
  finish(): VcfHeader {
    if (this.columns === undefined) {
      throw new MalformedHeaderError(
        "Input ended before the #CHROM column header line",
        this.lineNumber
      );
    }

    const meta = new Map<string, Cardinal<MetaValue>>();
    for (const [key, values] of this.rawMeta) {
      meta.set(key, toCardinal(values));
    }
    return new VcfHeader(meta, this.columns, this.fieldsByCategory);
  }

  private addMetaLine(line: string): void {
    const body = line.slice(2);
    const equals = body.indexOf("=");
    if (equals === -1) {
      throw new MalformedHeaderError("Meta line has no '=' separator", this.lineNumber, line);
    }

    const key = body.slice(0, equals);
    const value = body.slice(equals + 1);
    const values = this.rawMeta.get(key) ?? [];
    this.rawMeta.set(key, values);

    if (!isFieldCategory(key)) {
      values.push(value);
      return;
    }

    const attributes = parseBracketedAttributes(value);
    const field = toFieldMeta(key, attributes, this.lineNumber, line);
    values.push(attributes);
    const declared = this.fieldsByCategory.get(key) ?? [];
    if (declared.some((existing) => existing.id === field.id)) {
      this.onWarning(
        `Duplicate ${key} declaration for ID ${field.id}; keeping the first`,
        this.lineNumber
      );
      return;
    }
    declared.push(field);
    this.fieldsByCategory.set(key, declared);
  }
}

/**
 * Parse a complete header from lines; data lines after the column header are
 * ignored
 *
 * @throws {MalformedHeaderError} On any header violation
 */
export function parseHeader(lines: Iterable<string>, onWarning?: HeaderWarningHandler): VcfHeader {
  const parser = new VcfHeaderParser(onWarning);
  for (const line of lines) {
    if (parser.feed(line)) break;
  }
  return parser.finish();
}
