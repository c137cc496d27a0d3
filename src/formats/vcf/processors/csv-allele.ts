/**
 * Per-allele comma separated numeric INFO values
 *
 * @module vcf/processors/csv-allele
 */

import { AlleleCountMismatchError } from "../../../errors";
import { coerceNumber, setEntry } from "../coercion";
import type { InfoMap, InfoProcessor, InfoValue, RawInfoValue } from "../types";
import { alleleBucket } from "./buckets";

/**
 * Splits allele count/frequency keys into one number per ALT allele
 *
 * Always registered first. A value whose element count differs from the
 * number of ALT alleles fails the record.
 *
 * @example
 * ```typescript
 * // ALT=A,T  INFO=AC=3,1
 * // info.A.AC === 3, info.T.AC === 1
 * ```
 */
export class CsvAlleleInfoProcessor implements InfoProcessor {
  static readonly FIELDS: ReadonlySet<string> = new Set(["AC", "AF", "MLEAC", "MLEAF"]);

  accepts(key: string): boolean {
    return CsvAlleleInfoProcessor.FIELDS.has(key);
  }

  process(key: string, value: RawInfoValue, info: InfoMap, alleles: readonly string[]): void {
    // A bare flag carries no values
    const alleleValues = value === true ? [] : value.split(",");
    if (alleleValues.length !== alleles.length) {
      throw new AlleleCountMismatchError(key, alleles.length, alleleValues.length);
    }

    alleles.forEach((allele, index) => {
      setEntry<InfoValue>(alleleBucket(info, allele), key, coerceNumber(alleleValues[index]));
    });
  }
}
