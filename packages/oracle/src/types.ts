/**
 * @swapline/oracle domain types.
 */

import type { PublicKey } from "@swapline/types";

/**
 * An oracle signing key pair.
 * The secret key is the 64-byte ed25519 secret (seed followed by public key).
 */
export interface OracleKeyPair {
  readonly publicKey: PublicKey;
  readonly secretKey: Uint8Array;
}

export type OracleErrorCode =
  | "DECODING_FAILED"
  | "INVALID_KEY";

/**
 * Structured error from oracle encoding and signing.
 * The verifier reports failures as values instead; see `VerificationResult`.
 */
export class OracleError extends Error {
  public readonly code: OracleErrorCode;

  constructor(code: OracleErrorCode, message: string) {
    super(message);
    this.name = "OracleError";
    this.code = code;
  }
}
