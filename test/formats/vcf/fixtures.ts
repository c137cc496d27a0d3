/**
 * Shared VCF test documents
 */

export const COLUMNS = ["#CHROM", "POS", "ID", "REF", "ALT", "QUAL", "FILTER", "INFO"];

export const SAMPLE_HEADER = [
  "##fileformat=VCFv4.1",
  "##source=unit-test",
  '##INFO=<ID=NS,Number=1,Type=Integer,Description="Number of samples with data">',
  '##INFO=<ID=DP,Number=1,Type=Integer,Description="Combined depth">',
  '##INFO=<ID=AF,Number=A,Type=Float,Description="Allele frequency">',
  '##INFO=<ID=AA,Number=1,Type=String,Description="Ancestral allele">',
  '##INFO=<ID=DB,Number=0,Type=Flag,Description="Known site, listed in a local catalogue">',
  '##INFO=<ID=H2,Number=0,Type=Flag,Description="Second panel membership">',
  '##FILTER=<ID=q10,Description="Quality below 10">',
  '##FILTER=<ID=s50,Description="Less than half of samples have data">',
  '##FORMAT=<ID=GT,Number=1,Type=String,Description="Genotype">',
  '##FORMAT=<ID=GQ,Number=1,Type=Integer,Description="Genotype quality">',
  '##FORMAT=<ID=DP,Number=1,Type=Integer,Description="Read depth">',
  '##FORMAT=<ID=HQ,Number=2,Type=Integer,Description="Haplotype quality">',
  [...COLUMNS, "FORMAT", "S1", "S2", "S3"].join("\t"),
];

export const SAMPLE_LINE = [
  "7",
  "1200",
  "rs0001",
  "C",
  "T",
  "31.5",
  "PASS",
  "NS=3;DP=22;AF=0.25;DB;H2",
  "GT:GQ:DP:HQ",
  "0|0:40:7:30,31",
  "0|1:38:9:28,.",
  "1/1:12:6:.,.",
].join("\t");

export const VEP_DECLARATION =
  '##INFO=<ID=CSQ,Number=.,Type=String,Description="Consequence annotations from Ensembl VEP. Format: Allele|Consequence|IMPACT|SYMBOL|ALLELE_NUM|DISTANCE|STRAND|AFR_MAF|PUBMED|Existing_variation">';

export const SNPEFF_DECLARATION =
  "##INFO=<ID=EFF,Number=.,Type=String,Description=\"Predicted effects for this variant.Format: 'Effect ( Effect_Impact | Functional_Class | Codon_Change | Amino_Acid_Change| Amino_Acid_length | Gene_Name | Transcript_BioType | Gene_Coding | Transcript_ID | Exon_Rank  | Genotype_Number [ | ERRORS | WARNINGS ] )' \">";

/**
 * Tab-join the fields of one data line
 */
export function row(...fields: string[]): string {
  return fields.join("\t");
}

/**
 * Join lines into a newline-terminated document
 */
export function vcf(...lines: string[]): string {
  return `${lines.join("\n")}\n`;
}
