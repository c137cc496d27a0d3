/**
 * Tests for INFO processors
 */

import { describe, expect, test, vi } from "vitest";
import { AlleleCountMismatchError, ParseError } from "../../../src/errors";
import { parseHeader } from "../../../src/formats/vcf/header";
import {
  CsvAlleleInfoProcessor,
  NativeInfoProcessor,
  parseMinorAlleleFrequency,
  SnpEffInfoProcessor,
  splitEffect,
  VepInfoProcessor,
} from "../../../src/formats/vcf/processors";
import type { InfoMap, InfoProcessor } from "../../../src/formats/vcf/types";
import { COLUMNS, SNPEFF_DECLARATION, VEP_DECLARATION } from "./fixtures";

function headerWith(...declarations: string[]) {
  return parseHeader([...declarations, COLUMNS.join("\t")]);
}

function run(processor: InfoProcessor, key: string, value: string | true, alleles: string[]) {
  const info: InfoMap = { ALL: {} };
  for (const allele of alleles) info[allele] = {};
  processor.process(key, value, info, alleles, false);
  return info;
}

describe("CsvAlleleInfoProcessor", () => {
  const processor = new CsvAlleleInfoProcessor();

  test("claims only allele count and frequency keys", () => {
    expect(processor.accepts("AC")).toBe(true);
    expect(processor.accepts("MLEAF")).toBe(true);
    expect(processor.accepts("DP")).toBe(false);
  });

  test("assigns one value per ALT allele", () => {
    const info = run(processor, "AC", "3,1", ["A", "T"]);
    expect(info).toEqual({ ALL: {}, A: { AC: 3 }, T: { AC: 1 } });
  });

  test("keeps non-numeric values as text", () => {
    const info = run(processor, "AF", "0.5,x", ["A", "T"]);
    expect(info.A.AF).toBe(0.5);
    expect(info.T.AF).toBe("x");
  });

  test("fails when the value count differs from the allele count", () => {
    expect(() => run(processor, "AC", "1,2", ["A"])).toThrow(AlleleCountMismatchError);
    expect(() => run(processor, "AC", "1,2", ["A"])).toThrow(
      "Number of allele values for AC (2) does not match number of alleles (1)"
    );
  });

  test("treats a bare flag as carrying no values", () => {
    expect(() => run(processor, "AC", true, ["A"])).toThrow(AlleleCountMismatchError);
  });
});

describe("NativeInfoProcessor", () => {
  const header = headerWith(
    '##INFO=<ID=DP,Number=1,Type=Integer,Description="Depth">',
    '##INFO=<ID=AF,Number=A,Type=Float,Description="Frequency">',
    '##INFO=<ID=DB,Number=0,Type=Flag,Description="Known">',
    '##INFO=<ID=NOTE,Number=.,Type=String,Description="Free text">',
    '##INFO=<ID=LEN,Number=.,Type=Integer,Description="Lengths">',
    '##INFO=<ID=PAIR,Number=2,Type=Integer,Description="Pair">'
  );
  const processor = new NativeInfoProcessor(header);

  function decode(key: string, value: string | true) {
    return run(processor, key, value, ["A"]).ALL[key];
  }

  test("accepts every key", () => {
    expect(processor.accepts()).toBe(true);
  });

  test("unwraps Number=1 integers", () => {
    expect(decode("DP", "14")).toBe(14);
  });

  test("maps the missing literal to null", () => {
    expect(decode("DP", ".")).toBeNull();
  });

  test("leaves the remainder unsplit past the declared count", () => {
    expect(decode("DP", "1,2,3")).toEqual([1, "2,3"]);
    expect(decode("PAIR", "1,2,3")).toEqual([1, 2, 3]);
  });

  test("keeps an unparsable integer as text", () => {
    expect(decode("DP", "abc")).toBe("abc");
  });

  test("stores Number=A values under ALL as a list", () => {
    const info = run(processor, "AF", "0.1,0.2", ["A", "T"]);
    expect(info.ALL.AF).toEqual([0.1, 0.2]);
    expect(info.A).toEqual({});
  });

  test("decodes flags", () => {
    expect(decode("DB", true)).toBe(true);
    expect(decode("DB", "yes")).toBe(true);
  });

  test("leaves unbounded strings whole", () => {
    expect(decode("NOTE", "a,b")).toBe("a,b");
  });

  test("splits unbounded integers", () => {
    expect(decode("LEN", "1,2")).toEqual([1, 2]);
    expect(decode("LEN", "7")).toBe(7);
  });

  test("passes undeclared keys through as text", () => {
    expect(decode("XX", "foo,bar")).toBe("foo,bar");
    expect(decode("YY", true)).toBe(true);
  });

  test("warns once per field with an unknown type and decodes it as text", () => {
    const onWarning = vi.fn();
    const custom = new NativeInfoProcessor(
      headerWith('##INFO=<ID=ZZ,Number=1,Type=Blob,Description="Opaque">'),
      { onWarning }
    );
    expect(onWarning).toHaveBeenCalledTimes(1);
    expect(onWarning).toHaveBeenCalledWith(
      "No converter for INFO field ZZ (Type=Blob, Number=1); decoding as string"
    );
    expect(run(custom, "ZZ", "abc", ["A"]).ALL.ZZ).toBe("abc");
  });
});

describe("VepInfoProcessor", () => {
  const first =
    "A|missense_variant&splice_region_variant|MODERATE|GENE1|1||1|A:0.12|111&222|rs1&COSM2";
  const second = "G|intron_variant|MODIFIER|GENE1|2|15|-1|||";

  test("reads the layout from the declaration", () => {
    const processor = new VepInfoProcessor(headerWith(VEP_DECLARATION));
    expect(processor.layout).toEqual([
      "Allele",
      "Consequence",
      "IMPACT",
      "SYMBOL",
      "ALLELE_NUM",
      "DISTANCE",
      "STRAND",
      "AFR_MAF",
      "PUBMED",
      "Existing_variation",
    ]);
    expect(processor.accepts("CSQ")).toBe(true);
    expect(processor.accepts("EFF")).toBe(false);
  });

  test("declines the key without a declared layout", () => {
    const bare = new VepInfoProcessor(
      headerWith('##INFO=<ID=CSQ,Number=.,Type=String,Description="Consequences">')
    );
    expect(bare.accepts("CSQ")).toBe(false);
    expect(new VepInfoProcessor(headerWith()).accepts("CSQ")).toBe(false);
  });

  test("buckets sub-records by allele number", () => {
    const processor = new VepInfoProcessor(headerWith(VEP_DECLARATION));
    const info = run(processor, "CSQ", `${first},${second}`, ["A", "G"]);

    expect(info.A.CSQ).toEqual([
      {
        Allele: "A",
        Consequence: ["missense_variant", "splice_region_variant"],
        IMPACT: "MODERATE",
        SYMBOL: "GENE1",
        ALLELE_NUM: 1,
        STRAND: 1,
        AFR_MAF: { A: 0.12 },
        PUBMED: [111, 222],
        Existing_variation: ["rs1", "COSM2"],
      },
    ]);
    expect(info.G.CSQ).toEqual([
      {
        Allele: "G",
        Consequence: ["intron_variant"],
        IMPACT: "MODIFIER",
        SYMBOL: "GENE1",
        ALLELE_NUM: 2,
        DISTANCE: 15,
        STRAND: -1,
      },
    ]);
    expect(info.ALL).toEqual({});
  });

  test("gives every sub-record to a single allele", () => {
    const processor = new VepInfoProcessor(headerWith(VEP_DECLARATION));
    const info = run(processor, "CSQ", `${first},${second}`, ["A"]);
    expect(info.A.CSQ).toHaveLength(2);
  });

  test("requires an allele number with several alleles", () => {
    const processor = new VepInfoProcessor(headerWith(VEP_DECLARATION));
    expect(() => run(processor, "CSQ", "A|stop_gained|HIGH|GENE1", ["A", "G"])).toThrow(
      "CSQ sub-record has no ALLELE_NUM to assign it to an allele"
    );
  });

  test("fails on a malformed integer sub-field", () => {
    const processor = new VepInfoProcessor(headerWith(VEP_DECLARATION));
    expect(() => run(processor, "CSQ", "A|stop_gained|HIGH|GENE1|one", ["A"])).toThrow(
      ParseError
    );
  });

  test("parses minor allele frequency pairs", () => {
    expect(parseMinorAlleleFrequency("T:0.25&C:0.01")).toEqual({ T: 0.25, C: 0.01 });
    expect(parseMinorAlleleFrequency("T:0.25&C:abc")).toEqual({ T: 0.25 });
  });
});

describe("SnpEffInfoProcessor", () => {
  const coding =
    "NON_SYNONYMOUS_CODING(MODERATE|MISSENSE|Gct/Act|A12T|190|GENE1|protein_coding|CODING|TX0001|2|1)";
  const intron = "INTRON(MODIFIER|||||GENE1|protein_coding|CODING|TX0002||2)";

  test("reads the layout from the declaration", () => {
    const processor = new SnpEffInfoProcessor(headerWith(SNPEFF_DECLARATION));
    expect(processor.layout).toEqual([
      "Effect",
      "Effect_Impact",
      "Functional_Class",
      "Codon_Change",
      "Amino_Acid_Change",
      "Amino_Acid_length",
      "Gene_Name",
      "Transcript_BioType",
      "Gene_Coding",
      "Transcript_ID",
      "Exon_Rank",
      "Genotype_Number",
      "ERRORS",
    ]);
  });

  test("splits the effect notation", () => {
    expect(splitEffect("INTRON(MODIFIER|x)")).toEqual(["INTRON", "MODIFIER", "x"]);
  });

  test("buckets effects by genotype number", () => {
    const processor = new SnpEffInfoProcessor(headerWith(SNPEFF_DECLARATION));
    const info = run(processor, "EFF", `${coding},${intron}`, ["T", "G"]);

    expect(info.T.EFF).toEqual([
      {
        Effect: "NON_SYNONYMOUS_CODING",
        Effect_Impact: "MODERATE",
        Functional_Class: "MISSENSE",
        Codon_Change: "Gct/Act",
        Amino_Acid_Change: "A12T",
        Amino_Acid_length: 190,
        Gene_Name: "GENE1",
        Transcript_BioType: "protein_coding",
        Gene_Coding: "CODING",
        Transcript_ID: "TX0001",
        Exon_Rank: 2,
        Genotype_Number: 1,
      },
    ]);
    expect(info.G.EFF).toEqual([
      {
        Effect: "INTRON",
        Effect_Impact: "MODIFIER",
        Gene_Name: "GENE1",
        Transcript_BioType: "protein_coding",
        Gene_Coding: "CODING",
        Transcript_ID: "TX0002",
        Genotype_Number: 2,
      },
    ]);
  });

  test("drops sub-records whose genotype number matches no allele", () => {
    const processor = new SnpEffInfoProcessor(headerWith(SNPEFF_DECLARATION));
    const stray = "INTRON(MODIFIER|||||GENE1|protein_coding|CODING|TX0003||5)";
    const info = run(processor, "EFF", `${coding},${stray}`, ["T", "G"]);
    expect(info.T.EFF).toHaveLength(1);
    expect(info.G.EFF).toEqual([]);
  });
});
