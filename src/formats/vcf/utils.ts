/**
 * VCF format utilities
 *
 * @module vcf/utils
 */

import { splitLines } from "../../io/stream-utils";

/**
 * Detect if string contains VCF data
 *
 * True when the first non-blank line is a `##fileformat=VCF` declaration or a
 * `#CHROM` column header.
 *
 * @example
 * ```typescript
 * if (detectVcfFormat(fileContent)) {
 *   const parser = new VcfParser();
 *   // ... parse VCF data
 * }
 * ```
 *
 * @public
 */
function detectVcfFormat(data: string): boolean {
  const firstLine = splitLines(data.trimStart())[0];
  if (firstLine === undefined) return false;
  return firstLine.startsWith("##fileformat=VCF") || firstLine.startsWith("#CHROM");
}

/**
 * Count data lines without decoding them
 *
 * @returns Number of non-blank lines not starting with `#`
 *
 * @public
 */
function countVcfRecords(data: string): number {
  return splitLines(data).filter((line) => line.trim() !== "" && !line.startsWith("#")).length;
}

export { countVcfRecords, detectVcfFormat };

export const VcfUtils = {
  detectVcfFormat,
  countVcfRecords,
} as const;
