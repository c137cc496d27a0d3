/**
 * Helpers shared by INFO processors
 *
 * @module vcf/processors/buckets
 */

import { ParseError } from "../../../errors";
import { parseSafeInteger, setEntry } from "../coercion";
import { ALL_ALLELES, type InfoBucket, type InfoMap } from "../types";

/**
 * Bucket for an allele (or `ALL`), created on first use
 */
export function alleleBucket(info: InfoMap, allele: string): InfoBucket {
  const existing = Object.hasOwn(info, allele) ? info[allele] : undefined;
  if (existing !== undefined) {
    return existing;
  }
  const bucket: InfoBucket = {};
  setEntry(info, allele, bucket);
  return bucket;
}

/**
 * Bucket for whole-record values
 */
export function wholeRecordBucket(info: InfoMap): InfoBucket {
  return alleleBucket(info, ALL_ALLELES);
}

/**
 * Parse an integer sub-field, failing the record when it does not parse
 *
 * @throws {ParseError} If the text is not an integer
 */
export function parseRequiredInteger(text: string, field: string): number {
  const value = parseSafeInteger(text);
  if (value === undefined) {
    throw new ParseError(`Expected an integer for ${field}, got '${text}'`, "VCF");
  }
  return value;
}
