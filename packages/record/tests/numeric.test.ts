import { describe, it, expect } from "vitest";
import {
  MAX_U32,
  MAX_U64,
  checkedAddU32,
  checkedAddU64,
  formatU32,
  formatU64,
  parseCount,
  parseU32,
  parseU64,
  saturatingAddU32,
  saturatingAddU64,
  saturatingMulU64,
} from "../src/numeric.js";

describe("formatting", () => {
  it("formats u32 and u64 in decimal", () => {
    expect(formatU32(0)).toBe("0");
    expect(formatU32(MAX_U32)).toBe("4294967295");
    expect(formatU64(MAX_U64)).toBe("18446744073709551615");
  });

  it("throws outside the type", () => {
    expect(() => formatU32(-1)).toThrow(RangeError);
    expect(() => formatU32(MAX_U32 + 1)).toThrow(RangeError);
    expect(() => formatU32(0.5)).toThrow(RangeError);
    expect(() => formatU64(-1n)).toThrow(RangeError);
    expect(() => formatU64(MAX_U64 + 1n)).toThrow(RangeError);
  });
});

describe("parsing", () => {
  it("parses in-range values", () => {
    expect(parseU32("4294967295")).toBe(MAX_U32);
    expect(parseU64("18446744073709551615")).toBe(MAX_U64);
    expect(parseU64("100000000")).toBe(100_000_000n);
  });

  it("rejects overflow", () => {
    expect(parseU32("4294967296")).toBeUndefined();
    expect(parseU64("18446744073709551616")).toBeUndefined();
  });

  it("rejects empty, signed and non-digit text", () => {
    for (const text of ["", "-1", "+1", "1.0", "12a", " 1"]) {
      expect(parseU32(text)).toBeUndefined();
      expect(parseU64(text)).toBeUndefined();
    }
  });

  it("parseCount caps at 255", () => {
    expect(parseCount("255")).toBe(255);
    expect(parseCount("256")).toBeUndefined();
  });
});

describe("arithmetic", () => {
  it("checkedAddU64 reports overflow", () => {
    expect(checkedAddU64(1n, 2n)).toBe(3n);
    expect(checkedAddU64(MAX_U64, 0n)).toBe(MAX_U64);
    expect(checkedAddU64(MAX_U64, 1n)).toBeUndefined();
  });

  it("saturating operations clamp at the maximum", () => {
    expect(saturatingAddU64(MAX_U64, 5n)).toBe(MAX_U64);
    expect(saturatingMulU64(MAX_U64 / 100n, 4n)).toBe((MAX_U64 / 100n) * 4n);
    expect(saturatingMulU64(MAX_U64, 2n)).toBe(MAX_U64);
    expect(saturatingAddU32(MAX_U32, 1)).toBe(MAX_U32);
  });

  it("checkedAddU32 reports overflow", () => {
    expect(checkedAddU32(MAX_U32 - 1, 1)).toBe(MAX_U32);
    expect(checkedAddU32(MAX_U32, 1)).toBeUndefined();
  });
});
