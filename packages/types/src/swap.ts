/**
 * Swap Contract Types
 *
 * Parameters and ownership of a two-party interest-rate swap.
 *
 * Rules:
 * - Terms are fixed when the contract is created and never mutated
 * - Party identities may be reassigned by a position transfer,
 *   which happens outside settlement
 */

import type { Rational } from "./financial.js";

/**
 * Logical ledger time. Compared by exact equality only.
 */
export type Slot = number;

/**
 * Opaque party identity (hex public-key hash).
 */
export type Identity = string;

/**
 * Hex-encoded 32-byte ed25519 public key.
 */
export type PublicKey = string;

/**
 * Immutable contract parameters of an interest-rate swap.
 */
export interface SwapTerms {
  /** Principal on which interest is computed. Never itself transferred. */
  readonly notionalAmount: bigint;

  /** Slot at which the floating rate must be observed by the oracle */
  readonly observationSlot: Slot;

  /** Interest rate agreed at the start of the contract */
  readonly fixedRate: Rational;

  /**
   * Contractual placeholder for the floating rate.
   * Settlement uses the oracle-observed rate, not this field.
   */
  readonly floatingRate: Rational;

  /** Collateral each party posts, in the smallest denomination */
  readonly margin: bigint;

  /** Key the oracle must have signed the rate observation with */
  readonly oraclePublicKey: PublicKey;
}

/**
 * Who receives which leg's payout.
 */
export interface PartyIdentities {
  readonly fixedLegParty: Identity;
  readonly floatingLegParty: Identity;
}
