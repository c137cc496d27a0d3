/**
 * Header-driven fallback INFO processor
 *
 * @module vcf/processors/native
 */

import { UnknownFieldConversionError } from "../../../errors";
import {
  type Converter,
  coerceNumber,
  dotToNone,
  parseSafeInteger,
  setEntry,
  splitAndConvert,
} from "../coercion";
import { formatFieldNumber } from "../header";
import type {
  FieldMeta,
  InfoMap,
  InfoProcessor,
  InfoValue,
  ProcessorContext,
  RawInfoValue,
  Scalar,
  VcfHeaderModel,
} from "../types";
import { wholeRecordBucket } from "./buckets";

const asString: Converter<Scalar> = (text) => text;

function asInteger(text: string): number | string {
  return parseSafeInteger(text) ?? text;
}

function asFloat(text: string): number | string {
  return coerceNumber(text);
}

function asFlag(text: string): boolean {
  return text.length > 0;
}

/** Declared Type token to scalar converter */
const TYPE_CONVERTERS: ReadonlyMap<string, Converter<Scalar>> = new Map<string, Converter<Scalar>>([
  ["Integer", asInteger],
  ["Float", asFloat],
  ["Double", asFloat],
  ["Number", asFloat],
  ["Flag", asFlag],
  ["String", asString],
  ["Character", asString],
]);

/**
 * Build the converter for one declared INFO field
 *
 * @returns The converter and whether the Type token was recognised
 */
export function buildFieldConverter(field: FieldMeta): {
  convert: Converter<InfoValue>;
  known: boolean;
} {
  const typed = TYPE_CONVERTERS.get(field.type);
  const scalar = dotToNone(typed ?? asString);

  let convert: Converter<InfoValue>;
  switch (field.number.kind) {
    case "count":
      convert = splitAndConvert(scalar, { limit: field.number.count, unwrapSingle: true });
      break;
    case "per-allele":
      // Aligned to ALT order but stored under ALL, unlike the CSV processor
      convert = splitAndConvert(scalar);
      break;
    case "other":
      convert = field.type === "Integer" ? splitAndConvert(scalar, { unwrapSingle: true }) : scalar;
      break;
  }

  return { convert, known: typed !== undefined };
}

/**
 * Fallback processor run for every key no chain processor claimed
 *
 * Converts by the key's INFO declaration and stores the result under `ALL`.
 * Undeclared keys pass through as raw text. Converters are built once per
 * declared key; unrecognised Type tokens are reported through `onWarning`
 * and decode as strings.
 */
export class NativeInfoProcessor implements InfoProcessor {
  private readonly converters = new Map<string, Converter<InfoValue>>();

  constructor(header: VcfHeaderModel, context?: ProcessorContext) {
    for (const field of header.fields("INFO")) {
      const { convert, known } = buildFieldConverter(field);
      this.converters.set(field.id, convert);
      if (!known) {
        const warning = new UnknownFieldConversionError(
          field.id,
          field.type,
          formatFieldNumber(field.number)
        );
        context?.onWarning(warning.message);
      }
    }
  }

  accepts(): boolean {
    return true;
  }

  process(key: string, value: RawInfoValue, info: InfoMap): void {
    const bucket = wholeRecordBucket(info);
    if (value === true) {
      setEntry<InfoValue>(bucket, key, true);
      return;
    }
    const convert = this.converters.get(key);
    setEntry(bucket, key, convert === undefined ? value : convert(value));
  }
}
