/**
 * @swapline/types — Shared domain types for the swap settlement stack.
 *
 * These types are used across all Swapline packages:
 * - Exact financial primitives (Rational, Value)
 * - Swap contract terms and party identities
 * - Oracle observations and the verifier capability
 * - Read-only transaction views
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in types — meaning lives in consuming code
 */

// Financial types
export type { Rational, AssetId, Value } from "./financial.js";
export { BASE_ASSET } from "./financial.js";

// Contract types
export type {
  Slot,
  Identity,
  PublicKey,
  SwapTerms,
  PartyIdentities,
} from "./swap.js";

// Oracle types
export type {
  Observation,
  SignedObservation,
  SignatureVerifier,
  VerificationError,
  VerificationErrorKind,
  VerificationResult,
} from "./oracle.js";

// Transaction types
export type {
  TransactionInputView,
  TransactionOutputView,
  TransactionView,
} from "./transaction.js";

// Runtime type guards
export {
  isRational,
  isValue,
  isSwapTerms,
  isPartyIdentities,
  isObservation,
  isSignedObservation,
} from "./guards.js";
