/**
 * @swapline/settlement domain types.
 *
 * Figures computed while deciding a settlement, the options that pin
 * its arithmetic, and the error raised on hard failures.
 */

import type { Logger } from "pino";
import type { Observation, Rational, SignatureVerifier } from "@swapline/types";
import type { RoundingMode } from "@swapline/rational";

// =============================================================================
// Clamp
// =============================================================================

/**
 * Which payout clamp settlement applies.
 *
 * - "literal": `min(0, max(2 * margin, x))`, the formula the contract was
 *   written with. For any non-negative margin it evaluates to 0.
 * - "bounded": `max(0, min(2 * margin, x))`, keeping payouts within the
 *   collateral at stake.
 */
export type ClampMode = "literal" | "bounded";

export const DEFAULT_CLAMP_MODE: ClampMode = "literal";

// =============================================================================
// Computed Figures
// =============================================================================

export interface Payments {
  readonly fixedPayment: bigint;
  readonly floatPayment: bigint;
}

export interface Remainders {
  /** Upper bound on the payout to the fixed-leg party */
  readonly fixedRemainder: bigint;
  /** Upper bound on the payout to the floating-leg party */
  readonly floatRemainder: bigint;
}

export interface SettlementFigures extends Payments, Remainders {
  /** The oracle-observed floating rate */
  readonly rate: Rational;
}

/**
 * Full account of one settlement evaluation.
 */
export interface SettlementReport extends SettlementFigures {
  readonly inputsMatched: boolean;
  readonly outputsMatched: boolean;
  readonly accepted: boolean;
}

// =============================================================================
// Options
// =============================================================================

export interface ArithmeticOptions {
  readonly rounding: RoundingMode;
  readonly clamp: ClampMode;
}

export interface SettlementValidatorOptions extends Partial<ArithmeticOptions> {
  /** Verifier for oracle observations. Defaults to ed25519. */
  readonly verifier?: SignatureVerifier<Observation<Rational>>;
  /** Defaults to a silent logger. */
  readonly logger?: Logger;
}

// =============================================================================
// Errors
// =============================================================================

export type SettlementErrorCode =
  | "SIGNATURE_INVALID"
  | "WRONG_SLOT"
  | "INPUT_CARDINALITY"
  | "OUTPUT_CARDINALITY";

/**
 * Hard failure of a settlement evaluation.
 *
 * Raised when the observation cannot be authenticated, was taken at the
 * wrong slot, or the transaction does not have exactly two inputs and
 * two outputs. No verdict is produced. A well-formed transaction that
 * merely fails the pairing checks is rejected with `false` instead.
 */
export class SettlementError extends Error {
  public readonly code: SettlementErrorCode;

  constructor(code: SettlementErrorCode, message: string) {
    super(message);
    this.name = "SettlementError";
    this.code = code;
  }
}
