/**
 * INFO processors
 *
 * @module vcf/processors
 */

export { AnnotationInfoProcessor } from "./annotation";
export { alleleBucket, parseRequiredInteger, wholeRecordBucket } from "./buckets";
export { CsvAlleleInfoProcessor } from "./csv-allele";
export { buildFieldConverter, NativeInfoProcessor } from "./native";
export { SnpEffInfoProcessor, splitEffect } from "./snpeff";
export { parseMinorAlleleFrequency, VepInfoProcessor } from "./vep";
