/**
 * Shared fixtures for settlement tests.
 *
 * Keys come from fixed placeholder seeds so every run sees the same
 * identities and signatures.
 */

import type { Identity, Observation, PartyIdentities, Rational, SignedObservation, SwapTerms, Value } from "@swapline/types";
import { rational } from "@swapline/rational";
import { generateOracleKeyPair, pubKeyHash, signObservation } from "@swapline/oracle";
import { createTransactionView, type Address, type LedgerTransaction } from "../src/transaction-view.js";

export const ORACLE = generateOracleKeyPair(new Uint8Array(32).fill(9));
export const IMPOSTOR = generateOracleKeyPair(new Uint8Array(32).fill(8));

export const FIXED_PARTY: Identity = pubKeyHash(generateOracleKeyPair(new Uint8Array(32).fill(1)).publicKey);
export const FLOATING_PARTY: Identity = pubKeyHash(generateOracleKeyPair(new Uint8Array(32).fill(2)).publicKey);
export const STRANGER: Identity = pubKeyHash(generateOracleKeyPair(new Uint8Array(32).fill(3)).publicKey);

export const MARGIN = 100_000n;
export const SLOT = 42;

export const TERMS: SwapTerms = {
  notionalAmount: 1_000_000n,
  observationSlot: SLOT,
  fixedRate: rational(1n, 20n),
  floatingRate: rational(3n, 40n),
  margin: MARGIN,
  oraclePublicKey: ORACLE.publicKey,
};

export const PARTIES: PartyIdentities = {
  fixedLegParty: FIXED_PARTY,
  floatingLegParty: FLOATING_PARTY,
};

export const OBSERVED_RATE: Rational = rational(3n, 40n);

export function observe(value: Rational = OBSERVED_RATE, slot: number = SLOT): SignedObservation {
  const observation: Observation<Rational> = { value, slot };
  return signObservation(ORACLE.secretKey, observation);
}

export function lovelace(amount: bigint): Value {
  return { lovelace: amount };
}

export function payTo(party: Identity, amount: bigint): { value: Value; address: Address } {
  return { value: lovelace(amount), address: { kind: "pubkey", hash: party } };
}

/**
 * A settlement transaction spending both margins and paying each party.
 */
export function settlementTx(
  fixedPayout: bigint,
  floatPayout: bigint,
  overrides: Partial<LedgerTransaction> = {},
): LedgerTransaction {
  return {
    inputs: [{ value: lovelace(MARGIN) }, { value: lovelace(MARGIN) }],
    outputs: [payTo(FIXED_PARTY, fixedPayout), payTo(FLOATING_PARTY, floatPayout)],
    signatories: [FIXED_PARTY, FLOATING_PARTY],
    ...overrides,
  };
}

export function view(tx: LedgerTransaction) {
  return createTransactionView(tx);
}

export function reversed<T>(items: readonly T[]): T[] {
  return [...items].reverse();
}
