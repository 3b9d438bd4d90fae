/**
 * Tests for exact rational arithmetic.
 *
 * Covers:
 * - Normalization on construction
 * - Arithmetic and comparison
 * - Integer conversion (floor, properFraction, round in both modes)
 * - Text parsing and formatting
 */

import { describe, it, expect } from "vitest";
import {
  rational,
  fromInteger,
  add,
  subtract,
  multiply,
  negate,
  absRational,
  compare,
  equals,
  isInteger,
  floor,
  properFraction,
  round,
  parseRational,
  formatRational,
} from "../src/rational.js";
import { RationalError } from "../src/types.js";

// ─── rational ────────────────────────────────────────────────────────────

describe("rational", () => {
  it("reduces to lowest terms", () => {
    expect(rational(2n, 4n)).toEqual({ numerator: 1n, denominator: 2n });
  });

  it("moves the sign to the numerator", () => {
    expect(rational(3n, -6n)).toEqual({ numerator: -1n, denominator: 2n });
    expect(rational(-3n, -6n)).toEqual({ numerator: 1n, denominator: 2n });
  });

  it("normalizes zero to 0/1", () => {
    expect(rational(0n, 7n)).toEqual({ numerator: 0n, denominator: 1n });
  });

  it("defaults the denominator to one", () => {
    expect(rational(5n)).toEqual({ numerator: 5n, denominator: 1n });
  });

  it("rejects a zero denominator", () => {
    expect(() => rational(1n, 0n)).toThrow(RationalError);
    try {
      rational(1n, 0n);
    } catch (e) {
      expect((e as RationalError).code).toBe("ZERO_DENOMINATOR");
    }
  });
});

// ─── Arithmetic ──────────────────────────────────────────────────────────

describe("arithmetic", () => {
  it("subtracts rates exactly", () => {
    expect(subtract(rational(3n, 40n), rational(1n, 20n))).toEqual(rational(1n, 40n));
  });

  it("adds with different denominators", () => {
    expect(add(rational(1n, 3n), rational(1n, 6n))).toEqual(rational(1n, 2n));
  });

  it("multiplies an integer notional by a rate", () => {
    expect(multiply(fromInteger(1_000_000n), rational(1n, 40n))).toEqual(fromInteger(25_000n));
  });

  it("keeps precision that binary floating point would lose", () => {
    const sum = add(rational(1n, 10n), rational(2n, 10n));
    expect(equals(sum, rational(3n, 10n))).toBe(true);
  });

  it("negates and takes absolute values", () => {
    expect(negate(rational(1n, 2n))).toEqual({ numerator: -1n, denominator: 2n });
    expect(absRational(rational(-1n, 2n))).toEqual({ numerator: 1n, denominator: 2n });
  });
});

// ─── Comparison ──────────────────────────────────────────────────────────

describe("compare", () => {
  it("orders by value, not by representation", () => {
    expect(compare(rational(1n, 3n), rational(1n, 2n))).toBe(-1);
    expect(compare(rational(2n, 3n), rational(1n, 2n))).toBe(1);
    expect(compare(rational(2n, 4n), rational(1n, 2n))).toBe(0);
  });

  it("handles negatives", () => {
    expect(compare(rational(-1n, 2n), rational(-1n, 3n))).toBe(-1);
  });
});

describe("isInteger", () => {
  it("detects whole numbers", () => {
    expect(isInteger(rational(4n, 2n))).toBe(true);
    expect(isInteger(rational(3n, 2n))).toBe(false);
  });
});

// ─── Integer Conversion ──────────────────────────────────────────────────

describe("floor", () => {
  it("rounds toward negative infinity", () => {
    expect(floor(rational(7n, 2n))).toBe(3n);
    expect(floor(rational(-7n, 2n))).toBe(-4n);
    expect(floor(rational(-4n, 2n))).toBe(-2n);
  });
});

describe("properFraction", () => {
  it("truncates toward zero and keeps the sign on the fraction", () => {
    expect(properFraction(rational(7n, 2n))).toEqual({ whole: 3n, fraction: rational(1n, 2n) });
    expect(properFraction(rational(-7n, 2n))).toEqual({ whole: -3n, fraction: rational(-1n, 2n) });
  });
});

describe("round", () => {
  it("rounds to the nearest integer when not a tie", () => {
    expect(round(rational(7n, 3n))).toBe(2n);
    expect(round(rational(8n, 3n))).toBe(3n);
    expect(round(rational(-8n, 3n))).toBe(-3n);
  });

  it("defaults to half-even", () => {
    expect(round(rational(5n, 2n))).toBe(2n);
    expect(round(rational(7n, 2n))).toBe(4n);
    expect(round(rational(-5n, 2n))).toBe(-2n);
    expect(round(rational(1n, 2n))).toBe(0n);
  });

  it("rounds ties away from zero when asked", () => {
    expect(round(rational(5n, 2n), "half-away-from-zero")).toBe(3n);
    expect(round(rational(-5n, 2n), "half-away-from-zero")).toBe(-3n);
    expect(round(rational(1n, 2n), "half-away-from-zero")).toBe(1n);
  });

  it("returns integers unchanged in both modes", () => {
    expect(round(fromInteger(1_025_000n), "half-even")).toBe(1_025_000n);
    expect(round(fromInteger(-4n), "half-away-from-zero")).toBe(-4n);
  });
});

// ─── Text ────────────────────────────────────────────────────────────────

describe("parseRational", () => {
  it("parses fractions", () => {
    expect(parseRational("3/40")).toEqual(rational(3n, 40n));
    expect(parseRational("-6/4")).toEqual(rational(-3n, 2n));
  });

  it("parses decimals exactly", () => {
    expect(parseRational("0.075")).toEqual(rational(3n, 40n));
    expect(parseRational("-1.5")).toEqual(rational(-3n, 2n));
  });

  it("parses integers", () => {
    expect(parseRational("42")).toEqual(fromInteger(42n));
  });

  it("rejects malformed text", () => {
    expect(() => parseRational("abc")).toThrow(RationalError);
    expect(() => parseRational("1/2/3")).toThrow(RationalError);
    expect(() => parseRational("")).toThrow(RationalError);
  });

  it("rejects a zero denominator", () => {
    expect(() => parseRational("1/0")).toThrow("zero denominator");
  });
});

describe("formatRational", () => {
  it("formats fractions and integers", () => {
    expect(formatRational(rational(3n, 40n))).toBe("3/40");
    expect(formatRational(rational(-6n, 3n))).toBe("-2");
  });
});
