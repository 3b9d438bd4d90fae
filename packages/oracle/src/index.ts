/**
 * @swapline/oracle — Signed rate observations.
 *
 * Canonical encoding, ed25519 signing (the oracle's side) and the
 * `SignatureVerifier` that settlement uses to authenticate an observation.
 */

export { encodeObservation, decodeObservation, hashObservationData } from "./encoding.js";
export {
  generateOracleKeyPair,
  signObservation,
  pubKeyHash,
  PUB_KEY_HASH_BYTES,
} from "./signing.js";
export { Ed25519SignatureVerifier } from "./verifier.js";

export type { OracleKeyPair, OracleErrorCode } from "./types.js";
export { OracleError } from "./types.js";
