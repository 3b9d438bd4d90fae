/**
 * Transaction Shape Matching
 *
 * Checks that a settlement transaction spends both margins and pays
 * both parties. Either party may appear first, so every check accepts
 * both orderings of the pair.
 */

import type {
  Identity,
  PartyIdentities,
  TransactionInputView,
  TransactionOutputView,
} from "@swapline/types";
import { SettlementError, type Remainders } from "./types.js";

export type Pair<T> = readonly [T, T];

type Predicate<T> = (item: T) => boolean;

/**
 * Require exactly two elements.
 *
 * @throws {SettlementError} with the given code on any other count
 */
export function requirePair<T>(
  items: readonly T[],
  code: "INPUT_CARDINALITY" | "OUTPUT_CARDINALITY",
): Pair<T> {
  const [first, second] = items;
  if (items.length !== 2 || first === undefined || second === undefined) {
    const what = code === "INPUT_CARDINALITY" ? "inputs" : "outputs";
    throw new SettlementError(
      code,
      `settlement requires exactly 2 ${what}, got ${String(items.length)}`,
    );
  }
  return [first, second];
}

/**
 * True if `p` holds for one element and `q` for the other, in either order.
 */
export function matchesEitherOrder<T>(pair: Pair<T>, p: Predicate<T>, q: Predicate<T>): boolean {
  const [a, b] = pair;
  return (p(a) && q(b)) || (p(b) && q(a));
}

// ─── Inputs ──────────────────────────────────────────────────────────────

/**
 * Predicate for one party's margin deposit: authorized by the party and
 * carrying exactly the margin.
 */
export function isMarginOf(party: Identity, margin: bigint): Predicate<TransactionInputView> {
  return (input) => input.isSignedBy(party) && input.amount === margin;
}

/**
 * The inputs must be the fixed leg's margin and the floating leg's margin.
 */
export function checkInputs(
  parties: PartyIdentities,
  margin: bigint,
  inputs: Pair<TransactionInputView>,
): boolean {
  return matchesEitherOrder(
    inputs,
    isMarginOf(parties.fixedLegParty, margin),
    isMarginOf(parties.floatingLegParty, margin),
  );
}

// ─── Outputs ─────────────────────────────────────────────────────────────

/**
 * Predicate for one party's payout: paid to the party and no more than
 * its remainder. Paying less is tolerated.
 */
export function isPayoutTo(party: Identity, remainder: bigint): Predicate<TransactionOutputView> {
  return (output) => output.destination() === party && output.amount <= remainder;
}

/**
 * The outputs must be the fixed leg's payout and the floating leg's payout.
 */
export function checkOutputs(
  parties: PartyIdentities,
  remainders: Remainders,
  outputs: Pair<TransactionOutputView>,
): boolean {
  return matchesEitherOrder(
    outputs,
    isPayoutTo(parties.fixedLegParty, remainders.fixedRemainder),
    isPayoutTo(parties.floatingLegParty, remainders.floatRemainder),
  );
}
