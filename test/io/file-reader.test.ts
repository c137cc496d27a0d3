/**
 * Tests for file reading infrastructure
 */

import { mkdirSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { gzipSync } from "node:zlib";
import { afterAll, beforeAll, describe, expect, test } from "vitest";
import { FileError } from "../../src/errors";
import {
  createStream,
  exists,
  FileReader,
  getSize,
  mergeOptions,
} from "../../src/io/file-reader";
import { readLines } from "../../src/io/stream-utils";
import { collect } from "../utils/async";

const FIXTURES_DIR = join(process.cwd(), "test", "io", "fixtures");
const CONTENT = "##fileformat=VCFv4.2\n#CHROM\tPOS\tID\tREF\tALT\tQUAL\tFILTER\tINFO\n";
const TEST_FILES = {
  plain: join(FIXTURES_DIR, "header.vcf"),
  gzip: join(FIXTURES_DIR, "header.vcf.gz"),
  nonexistent: join(FIXTURES_DIR, "nonexistent.vcf"),
  directory: join(FIXTURES_DIR, "test-directory"),
};

beforeAll(() => {
  mkdirSync(TEST_FILES.directory, { recursive: true });
  writeFileSync(TEST_FILES.plain, CONTENT);
  writeFileSync(TEST_FILES.gzip, gzipSync(CONTENT));
});

afterAll(() => {
  rmSync(FIXTURES_DIR, { recursive: true, force: true });
});

describe("FileReader", () => {
  describe("exists", () => {
    test("should return true for a regular file", async () => {
      expect(await exists(TEST_FILES.plain)).toBe(true);
    });

    test("should return false for a missing file", async () => {
      expect(await exists(TEST_FILES.nonexistent)).toBe(false);
    });

    test("should return false for a directory", async () => {
      expect(await exists(TEST_FILES.directory)).toBe(false);
    });

    test("should reject directory traversal", async () => {
      await expect(exists("../outside.vcf")).rejects.toThrow(FileError);
      await expect(exists("../outside.vcf")).rejects.toThrow("Invalid file path");
    });
  });

  describe("getSize", () => {
    test("should return the size in bytes", async () => {
      expect(await getSize(TEST_FILES.plain)).toBe(Buffer.byteLength(CONTENT));
    });

    test("should fail for a missing file", async () => {
      await expect(getSize(TEST_FILES.nonexistent)).rejects.toThrow(FileError);
    });
  });

  describe("createStream", () => {
    test("should stream a plain file", async () => {
      const lines = await collect(readLines(await createStream(TEST_FILES.plain)));
      expect(lines).toEqual(["##fileformat=VCFv4.2", "#CHROM\tPOS\tID\tREF\tALT\tQUAL\tFILTER\tINFO"]);
    });

    test("should gunzip a .gz file", async () => {
      const lines = await collect(readLines(await createStream(TEST_FILES.gzip)));
      expect(lines[0]).toBe("##fileformat=VCFv4.2");
    });

    test("should leave compressed bytes alone when asked", async () => {
      const stream = await createStream(TEST_FILES.gzip, { autoDecompress: false });
      const reader = stream.getReader();
      const { value } = await reader.read();
      await reader.cancel();
      expect(Array.from(value ?? []).slice(0, 2)).toEqual([0x1f, 0x8b]);
    });

    test("should reject a missing file", async () => {
      await expect(createStream(TEST_FILES.nonexistent)).rejects.toThrow(
        "File does not exist or is not accessible"
      );
    });

    test("should reject files over the size limit", async () => {
      await expect(createStream(TEST_FILES.plain, { maxFileSize: 8 })).rejects.toThrow(
        `File size ${Buffer.byteLength(CONTENT)} exceeds maximum 8`
      );
    });

    test("should reject invalid options", async () => {
      await expect(createStream(TEST_FILES.plain, { bufferSize: 10 })).rejects.toThrow(
        "Invalid file reader options"
      );
    });
  });

  describe("mergeOptions", () => {
    test("should fill in defaults", () => {
      expect(mergeOptions({ encoding: "binary" })).toEqual({
        bufferSize: 65536,
        encoding: "binary",
        maxFileSize: 10_737_418_240,
        autoDecompress: true,
      });
    });
  });

  test("should expose the namespace", () => {
    expect(FileReader.createStream).toBe(createStream);
    expect(FileReader.exists).toBe(exists);
  });
});
