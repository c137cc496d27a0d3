/**
 * Ensembl VEP consequence annotations (`CSQ`)
 *
 * @module vcf/processors/vep
 */

import { coerceNumber, type Converter } from "../coercion";
import type { AnnotationFieldValue, VcfHeaderModel } from "../types";
import { AnnotationInfoProcessor } from "./annotation";
import { parseRequiredInteger } from "./buckets";

const LAYOUT_MARKER = "Format: ";

/**
 * Parse an `&`-separated list of `allele:frequency` pairs
 *
 * Pairs whose frequency is not a number are dropped.
 *
 * @example
 * ```typescript
 * parseMinorAlleleFrequency("T:0.25&C:0.01"); // { T: 0.25, C: 0.01 }
 * ```
 */
export function parseMinorAlleleFrequency(text: string): Record<string, number> {
  const frequencies: Record<string, number> = {};
  for (const group of text.split("&")) {
    const parts = group.split(":");
    for (let i = 0; i + 1 < parts.length; i += 2) {
      const frequency = coerceNumber(parts[i + 1]);
      if (typeof frequency === "number") {
        frequencies[parts[i]] = frequency;
      }
    }
  }
  return frequencies;
}

function integerField(name: string): Converter<number> {
  return (text) => parseRequiredInteger(text, name);
}

const splitAmpersand: Converter<string[]> = (text) => text.split("&");

const MAF_FIELDS = [
  "AA_MAF",
  "AFR_MAF",
  "AMR_MAF",
  "ASN_MAF",
  "EA_MAF",
  "EUR_MAF",
  "EAS_MAF",
  "SAS_MAF",
  "GMAF",
] as const;

const VEP_CONVERTERS: ReadonlyMap<string, Converter<AnnotationFieldValue>> = new Map<
  string,
  Converter<AnnotationFieldValue>
>([
  ...MAF_FIELDS.map((name): [string, Converter<AnnotationFieldValue>] => [
    name,
    parseMinorAlleleFrequency,
  ]),
  ["ALLELE_NUM", integerField("ALLELE_NUM")],
  ["DISTANCE", integerField("DISTANCE")],
  ["STRAND", integerField("STRAND")],
  ["Consequence", splitAmpersand],
  ["Existing_variation", splitAmpersand],
  ["PUBMED", (text) => text.split("&").map((id) => parseRequiredInteger(id, "PUBMED"))],
]);

/**
 * Decodes VEP `CSQ` annotations, bucketed by `ALLELE_NUM`
 *
 * Needs VEP run with `--allele_number` for records with several ALT alleles.
 *
 * @example
 * ```typescript
 * const parser = new VcfParser({ infoProcessors: [VepInfoProcessor] });
 * ```
 */
export class VepInfoProcessor extends AnnotationInfoProcessor {
  static readonly FIELD = "CSQ";

  constructor(header: VcfHeaderModel) {
    super(header, VepInfoProcessor.FIELD, "ALLELE_NUM", VEP_CONVERTERS);
  }

  protected parseLayout(description: string): string[] {
    const start = description.indexOf(LAYOUT_MARKER);
    if (start === -1) {
      return [];
    }
    return description.slice(start + LAYOUT_MARKER.length).split("|");
  }
}
