/**
 * Oracle observation gate: authenticate, then check the slot.
 */

import type { Observation, Rational, SignatureVerifier, SignedObservation, SwapTerms } from "@swapline/types";
import { SettlementError } from "./types.js";

/**
 * Authenticate a signed observation against the contract's oracle key
 * and return the observed rate.
 *
 * The observed slot must equal `terms.observationSlot` exactly. There is
 * no check that the slot is later than contract start: the oracle's own
 * slot stamp is trusted.
 *
 * @throws {SettlementError} SIGNATURE_INVALID or WRONG_SLOT
 */
export function verifyObservation(
  verifier: SignatureVerifier<Observation<Rational>>,
  terms: SwapTerms,
  signed: SignedObservation,
): Rational {
  const result = verifier.verify(terms.oraclePublicKey, signed);
  if (!result.ok) {
    throw new SettlementError(
      "SIGNATURE_INVALID",
      `signature check failed: ${result.error.kind}: ${result.error.message}`,
    );
  }

  const { value, slot } = result.payload;
  if (slot !== terms.observationSlot) {
    throw new SettlementError(
      "WRONG_SLOT",
      `wrong slot: observed at ${String(slot)}, contract requires ${String(terms.observationSlot)}`,
    );
  }

  return value;
}
