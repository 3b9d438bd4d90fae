/**
 * Observation Signing
 *
 * The oracle side of the protocol: key generation and ed25519 signing
 * of encoded observations. Settlement itself only ever verifies.
 *
 * Design:
 * - Canonical observation encoding (see encoding.ts)
 * - SHA-256 message hash over the encoded bytes
 * - ed25519 detached signature over the hash bytes
 */

import { createHash } from "node:crypto";
import nacl from "tweetnacl";
import type { Identity, Observation, PublicKey, Rational, SignedObservation } from "@swapline/types";
import { encodeObservation, hashObservationData } from "./encoding.js";
import { OracleError, type OracleKeyPair } from "./types.js";

/** Length in bytes of a public-key hash identity. */
export const PUB_KEY_HASH_BYTES = 28;

/**
 * Generate an oracle key pair, deterministically when a 32-byte seed is given.
 *
 * @throws {OracleError} INVALID_KEY if the seed is not 32 bytes
 */
export function generateOracleKeyPair(seed?: Uint8Array): OracleKeyPair {
  if (seed !== undefined && seed.length !== nacl.sign.seedLength) {
    throw new OracleError(
      "INVALID_KEY",
      `Seed must be ${String(nacl.sign.seedLength)} bytes, got ${String(seed.length)}`,
    );
  }

  const keyPair = seed === undefined ? nacl.sign.keyPair() : nacl.sign.keyPair.fromSeed(seed);
  return {
    publicKey: Buffer.from(keyPair.publicKey).toString("hex"),
    secretKey: keyPair.secretKey,
  };
}

/**
 * Sign an observation with the oracle's secret key.
 *
 * @throws {OracleError} INVALID_KEY if the secret key is not 64 bytes
 */
export function signObservation(
  secretKey: Uint8Array,
  observation: Observation<Rational>,
): SignedObservation {
  if (secretKey.length !== nacl.sign.secretKeyLength) {
    throw new OracleError(
      "INVALID_KEY",
      `Secret key must be ${String(nacl.sign.secretKeyLength)} bytes, got ${String(secretKey.length)}`,
    );
  }

  const data = encodeObservation(observation);
  const messageHash = hashObservationData(data);
  const signature = nacl.sign.detached(Buffer.from(messageHash, "hex"), secretKey);

  return {
    signature: Buffer.from(signature).toString("hex"),
    messageHash,
    data,
  };
}

/**
 * Derive the identity handle of a public key: the first 28 bytes of its
 * SHA-256 digest, hex-encoded.
 */
export function pubKeyHash(publicKey: PublicKey): Identity {
  return createHash("sha256")
    .update(Buffer.from(publicKey, "hex"))
    .digest("hex")
    .slice(0, PUB_KEY_HASH_BYTES * 2);
}
