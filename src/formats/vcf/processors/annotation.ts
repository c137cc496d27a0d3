/**
 * Shared base for pipe-delimited annotation INFO fields (VEP CSQ, snpEff EFF)
 *
 * @module vcf/processors/annotation
 */

import { ParseError } from "../../../errors";
import { type Converter, setEntry } from "../coercion";
import type {
  AnnotationEntry,
  AnnotationFieldValue,
  InfoMap,
  InfoValue,
  InfoProcessor,
  RawInfoValue,
  VcfHeaderModel,
} from "../types";
import { alleleBucket } from "./buckets";

/**
 * Decodes one annotation key into per-allele lists of sub-records
 *
 * The sub-field layout comes from the key's INFO Description. When the key
 * is undeclared or its Description has no layout the processor declines the
 * key and the fallback processor handles it.
 *
 * Sub-records are bucketed by their 1-based allele index field. With a single
 * ALT allele every sub-record goes to that allele and the index is not read.
 */
export abstract class AnnotationInfoProcessor implements InfoProcessor {
  /** Sub-field names in order; empty when the header declares no layout */
  readonly layout: readonly string[];

  protected constructor(
    header: VcfHeaderModel,
    readonly field: string,
    private readonly indexField: string,
    private readonly converters: ReadonlyMap<string, Converter<AnnotationFieldValue>>
  ) {
    const declaration = header.field("INFO", field);
    this.layout = declaration === undefined ? [] : this.parseLayout(declaration.description);
  }

  /**
   * Extract the sub-field layout from a Description; empty when absent
   */
  protected abstract parseLayout(description: string): string[];

  /**
   * Split one sub-record into its raw sub-field values
   */
  protected splitSubRecord(subRecord: string): string[] {
    return subRecord.split("|");
  }

  accepts(key: string): boolean {
    return key === this.field && this.layout.length > 0;
  }

  process(key: string, value: RawInfoValue, info: InfoMap, alleles: readonly string[]): void {
    const entries = value === true ? [] : value.split(",").map((entry) => this.decodeEntry(entry));

    if (alleles.length === 1) {
      setEntry<InfoValue>(alleleBucket(info, alleles[0]), key, entries);
      return;
    }

    const perAllele: AnnotationEntry[][] = alleles.map(() => []);
    for (const entry of entries) {
      const index = entry[this.indexField];
      if (typeof index !== "number") {
        throw new ParseError(
          `${key} sub-record has no ${this.indexField} to assign it to an allele`,
          "VCF"
        );
      }
      // Out-of-range indices match no allele
      perAllele[index - 1]?.push(entry);
    }

    alleles.forEach((allele, position) => {
      setEntry<InfoValue>(alleleBucket(info, allele), key, perAllele[position]);
    });
  }

  /**
   * Zip one sub-record with the layout, skipping empty sub-fields
   */
  decodeEntry(subRecord: string): AnnotationEntry {
    const entry: AnnotationEntry = {};
    const values = this.splitSubRecord(subRecord);
    const width = Math.min(values.length, this.layout.length);

    for (let i = 0; i < width; i++) {
      const name = this.layout[i];
      const text = values[i];
      if (text === "") continue;
      const convert = this.converters.get(name);
      setEntry(entry, name, convert === undefined ? text : convert(text));
    }
    return entry;
  }
}
