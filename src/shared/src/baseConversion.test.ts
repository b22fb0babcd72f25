import { describe, expect, it } from "vitest";

import {
  baseToDecimal,
  convertBase,
  decimalToBase,
  detectBase,
  isValid,
  normalizeNumber,
  parseDetected,
  validate,
} from "./baseConversion.js";
import { EmptyInput, InvalidBase, InvalidDigit, MalformedSign, UnsupportedOperation } from "./errors.js";

const ALL_BASES = Array.from({ length: 35 }, (_, i) => i + 2);

describe("baseToDecimal", () => {
  it("parses well-known values", () => {
    expect(baseToDecimal("FF", 16)).toBe(255n);
    expect(baseToDecimal("1010", 2)).toBe(10n);
    expect(baseToDecimal("777", 8)).toBe(511n);
    expect(baseToDecimal("ZZ", 36)).toBe(1295n);
  });

  it("accepts lowercase digits and an explicit plus sign", () => {
    expect(baseToDecimal("ff", 16)).toBe(255n);
    expect(baseToDecimal("+zz", 36)).toBe(1295n);
  });

  it("applies a leading minus", () => {
    expect(baseToDecimal("-1A", 16)).toBe(-26n);
  });

  it("strips a prefix that names the base", () => {
    expect(baseToDecimal("0x1f", 16)).toBe(31n);
    expect(baseToDecimal("-0b101", 2)).toBe(-5n);
    expect(baseToDecimal("0O17", 8)).toBe(15n);
  });

  it("reads a foreign prefix as digits", () => {
    expect(baseToDecimal("0b1", 16)).toBe(177n);
  });

  it("goes beyond the safe integer range", () => {
    expect(baseToDecimal("10000000000000000", 16)).toBe(2n ** 64n);
  });

  it("rejects digits outside the base", () => {
    expect(() => baseToDecimal("102", 2)).toThrow(InvalidDigit);
  });
});

describe("decimalToBase", () => {
  it("emits a single zero for zero in every base", () => {
    for (const b of ALL_BASES) {
      expect(decimalToBase(0n, b)).toBe("0");
    }
  });

  it("writes uppercase digits and re-attaches the sign", () => {
    expect(decimalToBase(255n, 16)).toBe("FF");
    expect(decimalToBase(-255, 16)).toBe("-FF");
    expect(decimalToBase(1295, 36)).toBe("ZZ");
    expect(decimalToBase(2n ** 64n, 16)).toBe("10000000000000000");
  });

  it("refuses numbers that are not safe integers", () => {
    expect(() => decimalToBase(1.5, 10)).toThrow(UnsupportedOperation);
    expect(() => decimalToBase(Number.MAX_SAFE_INTEGER + 1, 10)).toThrow(UnsupportedOperation);
  });

  it("refuses bases outside 2..36", () => {
    expect(() => decimalToBase(10n, 1)).toThrow(InvalidBase);
    expect(() => decimalToBase(10n, 37)).toThrow(InvalidBase);
  });

  it("round-trips through every base", () => {
    const samples = [0n, 1n, 2n, 35n, 36n, 255n, 1295n, 65535n, 999_999n];
    for (const b of ALL_BASES) {
      for (const v of samples) {
        const text = decimalToBase(v, b);
        expect(baseToDecimal(text, b)).toBe(v);
        expect(decimalToBase(baseToDecimal(text, b), b)).toBe(text);
      }
    }
  });
});

describe("convertBase", () => {
  it("converts between arbitrary bases", () => {
    expect(convertBase("-1A", 16, 10)).toBe("-26");
    expect(convertBase("1010", 2, 16)).toBe("A");
    expect(convertBase("255", 10, 2)).toBe("11111111");
  });

  it("checks the target base", () => {
    expect(() => convertBase("1", 10, 40)).toThrow(InvalidBase);
  });
});

describe("validate", () => {
  it("accepts valid digits and rejects out-of-range ones", () => {
    expect(() => validate("F", 16)).not.toThrow();
    expect(() => validate("G", 16)).toThrow(InvalidDigit);
  });

  it("reports the offending digit and its position", () => {
    try {
      validate(" -0x1G ", 16);
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(InvalidDigit);
      if (e instanceof InvalidDigit) {
        expect(e.digit).toBe("G");
        expect(e.position).toBe(4);
        expect(e.code).toBe("InvalidDigit");
      }
    }
  });

  it("treats inner whitespace as an invalid digit", () => {
    expect(() => validate("1 0", 10)).toThrow(InvalidDigit);
  });

  it("rejects empty input", () => {
    expect(() => validate("", 10)).toThrow(EmptyInput);
    expect(() => validate("   ", 10)).toThrow(EmptyInput);
    expect(() => validate("-", 10)).toThrow(EmptyInput);
    expect(() => validate("0x", 16)).toThrow(EmptyInput);
  });

  it("rejects repeated or misplaced signs", () => {
    expect(() => validate("--1", 10)).toThrow(MalformedSign);
    expect(() => validate("+-1", 10)).toThrow(MalformedSign);
    expect(() => validate("1-2", 10)).toThrow(MalformedSign);
    expect(() => validate("12+", 10)).toThrow(MalformedSign);
  });

  it("checks the base before the input", () => {
    expect(() => validate("", 1)).toThrow(InvalidBase);
    expect(() => validate("1", 2.5)).toThrow(InvalidBase);
  });

  it("has a non-throwing form", () => {
    expect(isValid("777", 8)).toBe(true);
    expect(isValid("778", 8)).toBe(false);
  });
});

describe("normalizeNumber", () => {
  it("canonicalises sign, case, prefix and leading zeros", () => {
    expect(normalizeNumber("+007", 8)).toBe("7");
    expect(normalizeNumber("-00ff", 16)).toBe("-FF");
    expect(normalizeNumber("0x00a", 16)).toBe("A");
    expect(normalizeNumber("-0", 10)).toBe("0");
  });
});

describe("detectBase", () => {
  it("recognises radix prefixes in any case", () => {
    expect(detectBase("0x1F")).toBe(16);
    expect(detectBase("0X1f")).toBe(16);
    expect(detectBase("0b101")).toBe(2);
    expect(detectBase("0B101")).toBe(2);
    expect(detectBase("0o17")).toBe(8);
    expect(detectBase("-0o17")).toBe(8);
  });

  it("falls back to decimal without a prefix", () => {
    expect(detectBase("1010")).toBe(10);
    expect(detectBase("FF")).toBe(10);
  });

  it("parses with the detected base", () => {
    expect(parseDetected("0x1F")).toEqual({ base: 16, value: 31n });
    expect(parseDetected("-0b11")).toEqual({ base: 2, value: -3n });
    expect(() => parseDetected("FF")).toThrow(InvalidDigit);
  });
});
