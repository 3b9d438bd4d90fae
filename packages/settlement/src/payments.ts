/**
 * Payment Arithmetic
 *
 * Turns an observed rate into leg payments and payout caps.
 *
 * Rules:
 * - Rates and interest stay exact rationals until the single `round`
 * - Rounding mode is explicit (see `ArithmeticOptions`)
 * - Payouts are capped by the configured clamp
 */

import type { Rational, SwapTerms } from "@swapline/types";
import { add, fromInteger, multiply, round, subtract } from "@swapline/rational";
import type { RoundingMode } from "@swapline/rational";
import type { ArithmeticOptions, ClampMode, Payments, Remainders, SettlementFigures } from "./types.js";

function minBigInt(a: bigint, b: bigint): bigint {
  return a < b ? a : b;
}

function maxBigInt(a: bigint, b: bigint): bigint {
  return a > b ? a : b;
}

// ─── Payments ────────────────────────────────────────────────────────────

/**
 * Compute both leg payments from the observed rate.
 *
 *   rateDelta = rate - fixedRate
 *   delta     = notional * rateDelta
 *   payment   = round(notional + delta)
 *
 * Both legs use the same formula, so `fixedPayment === floatPayment`
 * always holds and the payment terms cancel in the remainders.
 */
export function computePayments(
  terms: Pick<SwapTerms, "notionalAmount" | "fixedRate">,
  rate: Rational,
  rounding: RoundingMode,
): Payments {
  const rateDelta = subtract(rate, terms.fixedRate);
  const notional = fromInteger(terms.notionalAmount);
  const delta = multiply(notional, rateDelta);

  return {
    fixedPayment: round(add(notional, delta), rounding),
    floatPayment: round(add(notional, delta), rounding),
  };
}

// ─── Clamp ───────────────────────────────────────────────────────────────

/**
 * Cap a payout against the total collateral at stake (`2 * margin`).
 *
 * literal: min(0, max(2 * margin, x))
 * bounded: max(0, min(2 * margin, x))
 */
export function clamp(x: bigint, margin: bigint, mode: ClampMode): bigint {
  const stake = 2n * margin;
  switch (mode) {
    case "literal":
      return minBigInt(0n, maxBigInt(stake, x));
    case "bounded":
      return maxBigInt(0n, minBigInt(stake, x));
  }
}

/**
 * A party's position before clamping: its margin, less what it pays,
 * plus what it receives.
 */
export function netPosition(margin: bigint, paid: bigint, received: bigint): bigint {
  return margin - paid + received;
}

export function computeRemainders(margin: bigint, payments: Payments, mode: ClampMode): Remainders {
  return {
    fixedRemainder: clamp(netPosition(margin, payments.fixedPayment, payments.floatPayment), margin, mode),
    floatRemainder: clamp(netPosition(margin, payments.floatPayment, payments.fixedPayment), margin, mode),
  };
}

/**
 * Every figure settlement derives from the terms and the observed rate.
 */
export function computeSettlement(
  terms: Pick<SwapTerms, "notionalAmount" | "fixedRate" | "margin">,
  rate: Rational,
  options: ArithmeticOptions,
): SettlementFigures {
  const payments = computePayments(terms, rate, options.rounding);
  return {
    rate,
    ...payments,
    ...computeRemainders(terms.margin, payments, options.clamp),
  };
}
