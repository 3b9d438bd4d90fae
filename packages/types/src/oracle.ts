/**
 * Oracle Types
 *
 * Signed observations of a real-world value at a logical time,
 * and the capability that authenticates them.
 */

import type { PublicKey, Slot } from "./swap.js";

/**
 * A value observed by the oracle at a specific slot.
 */
export interface Observation<T> {
  readonly value: T;
  readonly slot: Slot;
}

/**
 * An observation as published by the oracle.
 *
 * `data` is the canonical encoding of the observation, `messageHash`
 * its SHA-256 digest, and `signature` the oracle's ed25519 signature
 * over the digest bytes. All byte fields are lowercase hex.
 */
export interface SignedObservation {
  readonly signature: string;
  readonly messageHash: string;
  readonly data: string;
}

export type VerificationErrorKind =
  | "SIGNATURE_MISMATCH"
  | "HASH_MISMATCH"
  | "DECODING_FAILED";

export interface VerificationError {
  readonly kind: VerificationErrorKind;
  readonly message: string;
}

export type VerificationResult<T> =
  | { readonly ok: true; readonly payload: T }
  | { readonly ok: false; readonly error: VerificationError };

/**
 * Authenticates a signed message and extracts its payload.
 * Implementations return failures as values and never throw for bad input.
 */
export interface SignatureVerifier<T> {
  verify(publicKey: PublicKey, signed: SignedObservation): VerificationResult<T>;
}
