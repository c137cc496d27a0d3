/**
 * snpEff effect annotations (`EFF`)
 *
 * @module vcf/processors/snpeff
 */

import type { Converter } from "../coercion";
import type { AnnotationFieldValue, VcfHeaderModel } from "../types";
import { AnnotationInfoProcessor } from "./annotation";
import { parseRequiredInteger } from "./buckets";

const LAYOUT_MARKER = "Format: '";
const OPTIONAL_TRAILER = "[ | ERRORS | WARNINGS ]";

/**
 * Flatten snpEff's `Effect ( Impact | ... )` notation into a list
 *
 * @example
 * ```typescript
 * splitEffect("NON_SYNONYMOUS_CODING(MODERATE|MISSENSE|Gct/Act|A12T|190|GENE1|protein_coding|CODING|T0001|1|1)");
 * // ["NON_SYNONYMOUS_CODING", "MODERATE", "MISSENSE", ..., "1"]
 * ```
 */
export function splitEffect(text: string): string[] {
  return text
    .replaceAll("(", "|")
    .replaceAll(")", "")
    .replaceAll(OPTIONAL_TRAILER, "")
    .replaceAll("'", "")
    .split("|")
    .map((piece) => piece.trim());
}

function integerField(name: string): Converter<number> {
  return (text) => parseRequiredInteger(text, name);
}

const SNPEFF_CONVERTERS: ReadonlyMap<string, Converter<AnnotationFieldValue>> = new Map([
  ["Genotype_Number", integerField("Genotype_Number")],
  ["Exon_Rank", integerField("Exon_Rank")],
  ["Amino_Acid_length", integerField("Amino_Acid_length")],
]);

/**
 * Decodes snpEff `EFF` annotations, bucketed by `Genotype_Number`
 */
export class SnpEffInfoProcessor extends AnnotationInfoProcessor {
  static readonly FIELD = "EFF";

  constructor(header: VcfHeaderModel) {
    super(header, SnpEffInfoProcessor.FIELD, "Genotype_Number", SNPEFF_CONVERTERS);
  }

  protected parseLayout(description: string): string[] {
    const start = description.indexOf(LAYOUT_MARKER);
    if (start === -1) {
      return [];
    }
    return [...splitEffect(description.slice(start + LAYOUT_MARKER.length)), "ERRORS"];
  }

  protected override splitSubRecord(subRecord: string): string[] {
    return splitEffect(subRecord);
  }
}
