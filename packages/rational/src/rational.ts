/**
 * @swapline/rational — Exact rational arithmetic.
 *
 * All arithmetic uses bigint numerator/denominator pairs.
 *
 * Rules:
 * - No floating-point operations
 * - Every result is normalized (denominator > 0, lowest terms)
 * - Rounding to integers uses an explicit, pinned mode
 * - Zero runtime dependencies
 */

import type { Rational } from "@swapline/types";
import {
  DEFAULT_ROUNDING_MODE,
  RationalError,
  type ProperFraction,
  type RoundingMode,
} from "./types.js";

// ─── Internal Helpers ────────────────────────────────────────────────────

function abs(n: bigint): bigint {
  return n < 0n ? -n : n;
}

function gcd(a: bigint, b: bigint): bigint {
  let x = abs(a);
  let y = abs(b);
  while (y !== 0n) {
    [x, y] = [y, x % y];
  }
  return x;
}

const HALF: Rational = { numerator: 1n, denominator: 2n };

// ─── Construction ────────────────────────────────────────────────────────

/**
 * Build a normalized rational from a numerator and denominator.
 *
 * rational(2n, 4n)  → 1/2
 * rational(3n, -6n) → -1/2
 * rational(0n, 7n)  → 0/1
 */
export function rational(numerator: bigint, denominator: bigint = 1n): Rational {
  if (denominator === 0n) {
    throw new RationalError(
      "ZERO_DENOMINATOR",
      `Rational with numerator ${numerator.toString()} has a zero denominator`,
    );
  }

  const sign = denominator < 0n ? -1n : 1n;
  const divisor = gcd(numerator, denominator);

  return {
    numerator: (sign * numerator) / divisor,
    denominator: (sign * denominator) / divisor,
  };
}

/**
 * Lift an integer amount into a rational with denominator 1.
 */
export function fromInteger(n: bigint): Rational {
  return { numerator: n, denominator: 1n };
}

// ─── Arithmetic ──────────────────────────────────────────────────────────

export function add(a: Rational, b: Rational): Rational {
  return rational(
    a.numerator * b.denominator + b.numerator * a.denominator,
    a.denominator * b.denominator,
  );
}

export function subtract(a: Rational, b: Rational): Rational {
  return rational(
    a.numerator * b.denominator - b.numerator * a.denominator,
    a.denominator * b.denominator,
  );
}

export function multiply(a: Rational, b: Rational): Rational {
  return rational(a.numerator * b.numerator, a.denominator * b.denominator);
}

export function negate(a: Rational): Rational {
  return { numerator: -a.numerator, denominator: a.denominator };
}

export function absRational(a: Rational): Rational {
  return { numerator: abs(a.numerator), denominator: a.denominator };
}

// ─── Comparison ──────────────────────────────────────────────────────────

/**
 * Compare two rationals. Returns -1, 0, or 1.
 */
export function compare(a: Rational, b: Rational): -1 | 0 | 1 {
  // Denominators are positive, so cross-multiplication preserves order.
  const left = a.numerator * b.denominator;
  const right = b.numerator * a.denominator;
  if (left < right) return -1;
  if (left > right) return 1;
  return 0;
}

export function equals(a: Rational, b: Rational): boolean {
  return a.numerator === b.numerator && a.denominator === b.denominator;
}

export function isInteger(a: Rational): boolean {
  return a.denominator === 1n;
}

// ─── Integer Conversion ──────────────────────────────────────────────────

/**
 * Largest integer not greater than the value.
 */
export function floor(a: Rational): bigint {
  const q = a.numerator / a.denominator;
  return a.numerator % a.denominator !== 0n && a.numerator < 0n ? q - 1n : q;
}

/**
 * Split into whole and fractional parts, truncating toward zero.
 *
 * 7/2  → { whole: 3,  fraction: 1/2 }
 * -7/2 → { whole: -3, fraction: -1/2 }
 */
export function properFraction(a: Rational): ProperFraction {
  return {
    whole: a.numerator / a.denominator,
    fraction: rational(a.numerator % a.denominator, a.denominator),
  };
}

/**
 * Round to the nearest integer. Exact halves follow `mode`.
 *
 * round(5/2, "half-even")           → 2
 * round(7/2, "half-even")           → 4
 * round(5/2, "half-away-from-zero") → 3
 * round(-5/2, "half-away-from-zero") → -3
 */
export function round(a: Rational, mode: RoundingMode = DEFAULT_ROUNDING_MODE): bigint {
  const { whole, fraction } = properFraction(a);
  const away = fraction.numerator < 0n ? whole - 1n : whole + 1n;
  const flag = compare(absRational(fraction), HALF);

  if (flag < 0) return whole;
  if (flag > 0) return away;

  switch (mode) {
    case "half-even":
      return whole % 2n === 0n ? whole : away;
    case "half-away-from-zero":
      return away;
  }
}

// ─── Text ────────────────────────────────────────────────────────────────

const FRACTION_PATTERN = /^(-?\d+)\s*\/\s*(\d+)$/;
const DECIMAL_PATTERN = /^(-?)(\d+)(?:\.(\d+))?$/;

/**
 * Parse a rational from text.
 *
 * "3/40"  → 3/40
 * "0.075" → 3/40
 * "-2"    → -2/1
 */
export function parseRational(text: string): Rational {
  const trimmed = text.trim();

  const fraction = FRACTION_PATTERN.exec(trimmed);
  if (fraction) {
    return rational(BigInt(fraction[1] ?? "0"), BigInt(fraction[2] ?? "1"));
  }

  const decimal = DECIMAL_PATTERN.exec(trimmed);
  if (decimal) {
    const negative = decimal[1] === "-";
    const intPart = decimal[2] ?? "0";
    const fracPart = decimal[3] ?? "";
    const magnitude = BigInt(intPart + fracPart);
    return rational(negative ? -magnitude : magnitude, 10n ** BigInt(fracPart.length));
  }

  throw new RationalError("INVALID_RATIONAL", `Invalid rational: "${text}"`);
}

/**
 * Render as "n/d", or just "n" for integers.
 */
export function formatRational(a: Rational): string {
  return isInteger(a)
    ? a.numerator.toString()
    : `${a.numerator.toString()}/${a.denominator.toString()}`;
}
