/**
 * String to typed value conversion shared by the header, INFO processors and
 * sample decoding
 *
 * @module vcf/coercion
 */

import type { Cardinal } from "./types";

/** Converts one text token to a typed value */
export type Converter<T> = (text: string) => T;

/**
 * Options for comma splitting
 */
export interface SplitOptions {
  /** Maximum number of splits; negative means unlimited (default: -1) */
  readonly limit?: number;
  /** Return the sole element instead of a one-element list (default: false) */
  readonly unwrapSingle?: boolean;
}

const INTEGER_PATTERN = /^\s*[+-]?\d+\s*$/;
const FLOAT_PATTERN = /^\s*[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?\s*$/;

/** Literal marking a missing value */
export const MISSING_VALUE = ".";

/**
 * Parse decimal integer text; undefined when it is not an integer or lies
 * outside the safe integer range
 */
export function parseSafeInteger(text: string): number | undefined {
  if (!INTEGER_PATTERN.test(text)) {
    return undefined;
  }
  const value = Number.parseInt(text, 10);
  return Number.isSafeInteger(value) ? value : undefined;
}

/**
 * Parse as integer, then as floating point, else return the text unchanged
 *
 * Integers beyond 2^53 stay text so no digits are lost.
 *
 * @example
 * ```typescript
 * coerceNumber("14370"); // 14370
 * coerceNumber("29.5");  // 29.5
 * coerceNumber("rs123"); // "rs123"
 * ```
 */
export function coerceNumber(text: string): number | string {
  if (INTEGER_PATTERN.test(text)) {
    return parseSafeInteger(text) ?? text;
  }
  if (FLOAT_PATTERN.test(text)) {
    return Number.parseFloat(text);
  }
  return text;
}

/**
 * Set `key` as an own enumerable property, `__proto__` included
 */
export function setEntry<V>(target: Record<string, V>, key: string, value: V): void {
  Object.defineProperty(target, key, {
    value,
    enumerable: true,
    writable: true,
    configurable: true,
  });
}

/**
 * Wrap a converter so the missing-value literal becomes `null`
 */
export function dotToNone<T>(convert: Converter<T>): Converter<T | null> {
  return (text) => (text === MISSING_VALUE ? null : convert(text));
}

/**
 * Split with a maximum split count
 *
 * At most `limit + 1` pieces are returned and the last one keeps the
 * unsplit remainder. A negative limit splits everywhere.
 *
 * @example
 * ```typescript
 * splitMax("a,b,c", ",", 1); // ["a", "b,c"]
 * ```
 */
export function splitMax(text: string, separator: string, limit = -1): string[] {
  if (limit < 0) {
    return text.split(separator);
  }

  const pieces: string[] = [];
  let rest = text;
  while (pieces.length < limit) {
    const index = rest.indexOf(separator);
    if (index === -1) break;
    pieces.push(rest.slice(0, index));
    rest = rest.slice(index + separator.length);
  }
  pieces.push(rest);
  return pieces;
}

/**
 * Collapse a list to a scalar when it holds exactly one element
 */
export function toCardinal<T>(values: readonly T[]): Cardinal<T> {
  if (values.length === 1) {
    return { kind: "scalar", value: values[0] };
  }
  return { kind: "list", values };
}

/**
 * Split on `,`, convert each piece and tag the result's cardinality
 */
export function splitToCardinal<T>(
  text: string,
  convert: Converter<T>,
  options: SplitOptions = {}
): Cardinal<T> {
  const values = splitMax(text, ",", options.limit ?? -1).map((piece) => convert(piece));
  return options.unwrapSingle === true ? toCardinal(values) : { kind: "list", values };
}

/**
 * Plain representation of a tagged value: the bare value or an array
 */
export function flattenCardinal<T>(cardinal: Cardinal<T>): T | T[] {
  return cardinal.kind === "scalar" ? cardinal.value : [...cardinal.values];
}

/**
 * Build a converter that splits on `,` and converts each piece
 *
 * With `unwrapSingle` a single piece is returned bare, which is how
 * `Number=1` fields come out scalar.
 *
 * @example
 * ```typescript
 * const decode = splitAndConvert(coerceNumber, { unwrapSingle: true });
 * decode("51,51"); // [51, 51]
 * decode("48");    // 48
 * ```
 */
export function splitAndConvert<T>(
  convert: Converter<T>,
  options: SplitOptions & { readonly unwrapSingle: true }
): Converter<T | T[]>;
export function splitAndConvert<T>(
  convert: Converter<T>,
  options?: SplitOptions & { readonly unwrapSingle?: false }
): Converter<T[]>;
export function splitAndConvert<T>(
  convert: Converter<T>,
  options: SplitOptions = {}
): Converter<T | T[]> {
  return (text) => flattenCardinal(splitToCardinal(text, convert, options));
}
