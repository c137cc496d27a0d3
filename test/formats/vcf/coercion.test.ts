/**
 * Tests for VCF value coercion helpers
 */

import { describe, expect, test, vi } from "vitest";
import {
  coerceNumber,
  dotToNone,
  flattenCardinal,
  parseSafeInteger,
  setEntry,
  splitAndConvert,
  splitMax,
  splitToCardinal,
  toCardinal,
} from "../../../src/formats/vcf/coercion";

describe("coerceNumber", () => {
  test("parses integers before floats", () => {
    expect(coerceNumber("14370")).toBe(14370);
    expect(coerceNumber("-3")).toBe(-3);
    expect(coerceNumber(" 7 ")).toBe(7);
  });

  test("parses floating point forms", () => {
    expect(coerceNumber("29.5")).toBe(29.5);
    expect(coerceNumber(".5")).toBe(0.5);
    expect(coerceNumber("1e3")).toBe(1000);
  });

  test("leaves everything else as text", () => {
    expect(coerceNumber("rs123")).toBe("rs123");
    expect(coerceNumber("0|1")).toBe("0|1");
    expect(coerceNumber("")).toBe("");
    expect(coerceNumber("nan")).toBe("nan");
    expect(coerceNumber(".")).toBe(".");
  });

  test("keeps integers beyond the safe range as text", () => {
    expect(coerceNumber("9007199254740991")).toBe(9007199254740991);
    expect(coerceNumber("9007199254740993")).toBe("9007199254740993");
    expect(coerceNumber("-9007199254740993")).toBe("-9007199254740993");
  });
});

describe("parseSafeInteger", () => {
  test("parses integer text within the safe range", () => {
    expect(parseSafeInteger("12")).toBe(12);
    expect(parseSafeInteger("-4")).toBe(-4);
  });

  test("returns undefined for other text and unsafe integers", () => {
    expect(parseSafeInteger("x")).toBeUndefined();
    expect(parseSafeInteger("1.5")).toBeUndefined();
    expect(parseSafeInteger("9007199254740993")).toBeUndefined();
  });
});

describe("setEntry", () => {
  test("stores __proto__ as an own key", () => {
    const target: Record<string, number> = {};
    setEntry(target, "__proto__", 1);
    setEntry(target, "DP", 2);

    expect(Object.keys(target)).toEqual(["__proto__", "DP"]);
    expect(Object.getOwnPropertyDescriptor(target, "__proto__")?.value).toBe(1);
    expect(Object.getPrototypeOf(target)).toBe(Object.prototype);
  });
});

describe("dotToNone", () => {
  test("maps the missing literal to null without calling the converter", () => {
    const convert = vi.fn((text: string) => text.length);
    const wrapped = dotToNone(convert);

    expect(wrapped(".")).toBeNull();
    expect(convert).not.toHaveBeenCalled();
    expect(wrapped("abc")).toBe(3);
    expect(convert).toHaveBeenCalledWith("abc");
  });
});

describe("splitMax", () => {
  test("keeps the remainder in the last piece", () => {
    expect(splitMax("a,b,c", ",", 1)).toEqual(["a", "b,c"]);
    expect(splitMax("a,b,c", ",", 0)).toEqual(["a,b,c"]);
    expect(splitMax("a,b,c", ",", 5)).toEqual(["a", "b", "c"]);
  });

  test("splits everywhere with a negative limit", () => {
    expect(splitMax("a,b,c", ",")).toEqual(["a", "b", "c"]);
    expect(splitMax("a,,", ",", -1)).toEqual(["a", "", ""]);
  });
});

describe("cardinality", () => {
  test("collapses exactly one element", () => {
    expect(toCardinal(["x"])).toEqual({ kind: "scalar", value: "x" });
    expect(toCardinal(["x", "y"])).toEqual({ kind: "list", values: ["x", "y"] });
    expect(toCardinal([])).toEqual({ kind: "list", values: [] });
  });

  test("splitToCardinal only collapses when asked", () => {
    expect(splitToCardinal("4", coerceNumber)).toEqual({ kind: "list", values: [4] });
    expect(splitToCardinal("4", coerceNumber, { unwrapSingle: true })).toEqual({
      kind: "scalar",
      value: 4,
    });
  });

  test("flattenCardinal returns a bare value or a copy of the list", () => {
    const values = [1, 2];
    const flat = flattenCardinal({ kind: "list", values });
    expect(flat).toEqual([1, 2]);
    expect(flat).not.toBe(values);
    expect(flattenCardinal({ kind: "scalar", value: "v" })).toBe("v");
  });
});

describe("splitAndConvert", () => {
  test("unwraps a single value", () => {
    const decode = splitAndConvert(coerceNumber, { unwrapSingle: true });
    expect(decode("48")).toBe(48);
    expect(decode("51,51")).toEqual([51, 51]);
    expect(decode(".,.")).toEqual([".", "."]);
  });

  test("always returns a list without unwrapSingle", () => {
    const decode = splitAndConvert(coerceNumber);
    expect(decode("48")).toEqual([48]);
  });

  test("honours the split limit", () => {
    const decode = splitAndConvert(coerceNumber, { limit: 1, unwrapSingle: true });
    expect(decode("1,2,3")).toEqual([1, "2,3"]);
  });
});
