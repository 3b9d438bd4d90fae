/**
 * @swapline/rational domain types.
 */

import type { Rational } from "@swapline/types";

// ─── Rounding ────────────────────────────────────────────────────────────

/**
 * How a rational with a fractional part of exactly one half is rounded
 * to an integer. Other fractions always round to the nearest integer.
 *
 * - "half-even": ties go to the even neighbour (2.5 → 2, 3.5 → 4)
 * - "half-away-from-zero": ties go away from zero (2.5 → 3, -2.5 → -3)
 */
export type RoundingMode = "half-even" | "half-away-from-zero";

export const DEFAULT_ROUNDING_MODE: RoundingMode = "half-even";

/**
 * Integer and fractional parts of a rational, both truncated toward zero.
 * `whole + fraction` equals the original value and `fraction` carries its sign.
 */
export interface ProperFraction {
  readonly whole: bigint;
  readonly fraction: Rational;
}

// ─── Errors ──────────────────────────────────────────────────────────────

export type RationalErrorCode =
  | "ZERO_DENOMINATOR"
  | "INVALID_RATIONAL";

/**
 * Structured error from rational arithmetic.
 * Always thrown — never returns error codes silently.
 */
export class RationalError extends Error {
  public readonly code: RationalErrorCode;

  constructor(code: RationalErrorCode, message: string) {
    super(message);
    this.name = "RationalError";
    this.code = code;
  }
}
