/**
 * Golden test vectors — amounts (7-decimal stroops) and prices (n/d).
 */

import { describe, it, expect } from "vitest";
import {
  ConstructionError,
  formatAmount,
  parseAmount,
  priceFromString,
  priceToString,
} from "../../src/index.js";

describe("parseAmount", () => {
  it("scales by 10^7", () => {
    expect(parseAmount("1")).toBe(10_000_000n);
    expect(parseAmount("12.3456789")).toBe(123_456_789n);
    expect(parseAmount("0.0000001")).toBe(1n);
    expect(parseAmount("100.5")).toBe(1_005_000_000n);
  });

  it("largest int64 amount", () => {
    expect(parseAmount("922337203685.4775807")).toBe(2n ** 63n - 1n);
    expect(() => parseAmount("922337203685.4775808")).toThrow(ConstructionError);
  });

  it("rejects more than 7 decimals", () => {
    expect(() => parseAmount("1.00000001")).toThrow(ConstructionError);
  });

  it("rejects negatives and junk", () => {
    expect(() => parseAmount("-1")).toThrow("must not be negative");
    expect(() => parseAmount("1e5")).toThrow(ConstructionError);
    expect(() => parseAmount("")).toThrow(ConstructionError);
    expect(() => parseAmount(".5")).toThrow(ConstructionError);
  });

  it("zero only when allowed", () => {
    expect(() => parseAmount("0")).toThrow("must be positive");
    expect(parseAmount("0.0", { allowZero: true })).toBe(0n);
  });
});

describe("formatAmount", () => {
  it("always prints 7 decimals", () => {
    expect(formatAmount(10_000_000n)).toBe("1.0000000");
    expect(formatAmount(123_456_789n)).toBe("12.3456789");
    expect(formatAmount(1n)).toBe("0.0000001");
    expect(formatAmount(-5n)).toBe("-0.0000005");
  });

  it("inverts parseAmount", () => {
    expect(parseAmount(formatAmount(987_654_321n))).toBe(987_654_321n);
  });
});

describe("priceFromString", () => {
  it("exact simple fractions", () => {
    expect(priceFromString("1.25")).toEqual({ n: 5, d: 4 });
    expect(priceFromString("0.5")).toEqual({ n: 1, d: 2 });
    expect(priceFromString("0.1")).toEqual({ n: 1, d: 10 });
    expect(priceFromString("3")).toEqual({ n: 3, d: 1 });
  });

  it("largest int32 price", () => {
    expect(priceFromString("2147483647")).toEqual({ n: 2147483647, d: 1 });
  });

  it("approximates when the exact fraction does not fit", () => {
    // 1/3 to 10 places: convergents of 0.3333333333 are 1/3, then
    // 3333333333/10000000000 which overflows int32
    expect(priceFromString("0.3333333333")).toEqual({ n: 1, d: 3 });
  });

  it("refuses zero, too-large and malformed values", () => {
    expect(() => priceFromString("0")).toThrow(ConstructionError);
    expect(() => priceFromString("2147483648")).toThrow(ConstructionError);
    expect(() => priceFromString("-1")).toThrow(ConstructionError);
    expect(() => priceFromString("1/2")).toThrow(ConstructionError);
  });
});

describe("priceToString", () => {
  it("renders up to 7 decimals", () => {
    expect(priceToString({ n: 5, d: 4 })).toBe("1.25");
    expect(priceToString({ n: 3, d: 1 })).toBe("3");
    expect(priceToString({ n: 1, d: 3 })).toBe("0.3333333");
  });
});
