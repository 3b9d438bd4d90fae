/**
 * Oracle Signature Verifier
 *
 * Authenticates a signed observation and extracts the observed rate.
 *
 * Verification steps:
 * 1. Check the signature over the message hash under the given public key
 * 2. Check that the data hashes to the signed message hash
 * 3. Decode the data as an observation
 *
 * Failures are returned as values; nothing here throws for bad input.
 */

import nacl from "tweetnacl";
import type {
  Observation,
  PublicKey,
  Rational,
  SignatureVerifier,
  SignedObservation,
  VerificationErrorKind,
  VerificationResult,
} from "@swapline/types";
import { decodeObservation, hashObservationData } from "./encoding.js";
import { OracleError } from "./types.js";

const HEX = /^[0-9a-f]*$/;

function hexBytes(hex: string, length: number): Uint8Array | null {
  if (hex.length !== length * 2 || !HEX.test(hex)) return null;
  return Buffer.from(hex, "hex");
}

function failure<T>(kind: VerificationErrorKind, message: string): VerificationResult<T> {
  return { ok: false, error: { kind, message } };
}

export class Ed25519SignatureVerifier implements SignatureVerifier<Observation<Rational>> {
  verify(publicKey: PublicKey, signed: SignedObservation): VerificationResult<Observation<Rational>> {
    const key = hexBytes(publicKey, nacl.sign.publicKeyLength);
    if (!key) {
      return failure("SIGNATURE_MISMATCH", "Public key is not a 32-byte hex string");
    }

    const signature = hexBytes(signed.signature, nacl.sign.signatureLength);
    if (!signature) {
      return failure("SIGNATURE_MISMATCH", "Signature is not a 64-byte hex string");
    }

    const message = hexBytes(signed.messageHash, 32);
    if (!message) {
      return failure("SIGNATURE_MISMATCH", "Message hash is not a 32-byte hex string");
    }

    if (!nacl.sign.detached.verify(message, signature, key)) {
      return failure("SIGNATURE_MISMATCH", "Signature does not verify under the oracle key");
    }

    if (hashObservationData(signed.data) !== signed.messageHash) {
      return failure("HASH_MISMATCH", "Observation data does not match the signed message hash");
    }

    try {
      return { ok: true, payload: decodeObservation(signed.data) };
    } catch (error) {
      if (error instanceof OracleError) {
        return failure("DECODING_FAILED", error.message);
      }
      throw error;
    }
  }
}
