/**
 * Runtime Type Guards
 *
 * Narrowing functions for swap domain types.
 * These enable safe runtime validation at system boundaries
 * (decoded oracle data, host-supplied contract records).
 */

import type { Rational, Value } from "./financial.js";
import type { PartyIdentities, SwapTerms } from "./swap.js";
import type { Observation, SignedObservation } from "./oracle.js";

const HEX = /^[0-9a-f]*$/;

function isHex(value: unknown): value is string {
  return typeof value === "string" && value.length > 0 && value.length % 2 === 0 && HEX.test(value);
}

function isSlot(value: unknown): value is number {
  return typeof value === "number" && Number.isSafeInteger(value) && value >= 0;
}

// =============================================================================
// Financial guards
// =============================================================================

/**
 * True for a normalized rational: positive denominator, lowest terms.
 */
export function isRational(value: unknown): value is Rational {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  if (typeof v.numerator !== "bigint" || typeof v.denominator !== "bigint") return false;
  if (v.denominator <= 0n) return false;

  let a = v.numerator < 0n ? -v.numerator : v.numerator;
  let b = v.denominator;
  while (b !== 0n) {
    [a, b] = [b, a % b];
  }
  return a === 1n;
}

export function isValue(value: unknown): value is Value {
  if (value === null || typeof value !== "object" || Array.isArray(value)) return false;
  return Object.values(value).every((amount) => typeof amount === "bigint");
}

// =============================================================================
// Contract guards
// =============================================================================

export function isSwapTerms(value: unknown): value is SwapTerms {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.notionalAmount === "bigint" &&
    v.notionalAmount >= 0n &&
    isSlot(v.observationSlot) &&
    isRational(v.fixedRate) &&
    isRational(v.floatingRate) &&
    typeof v.margin === "bigint" &&
    v.margin >= 0n &&
    isHex(v.oraclePublicKey) &&
    v.oraclePublicKey.length === 64
  );
}

export function isPartyIdentities(value: unknown): value is PartyIdentities {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isHex(v.fixedLegParty) &&
    isHex(v.floatingLegParty) &&
    v.fixedLegParty !== v.floatingLegParty
  );
}

// =============================================================================
// Oracle guards
// =============================================================================

export function isObservation(value: unknown): value is Observation<Rational> {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return isRational(v.value) && isSlot(v.slot);
}

export function isSignedObservation(value: unknown): value is SignedObservation {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isHex(v.signature) &&
    isHex(v.messageHash) &&
    typeof v.data === "string"
  );
}
