/**
 * @swapline/settlement — Settlement rule for interest-rate swaps.
 *
 * Given the contract terms, the party identities, an oracle-signed rate
 * observation and a read-only view of the proposed transaction, decide
 * whether the transaction closes out the swap.
 *
 * Design rules:
 * - Pure and deterministic: no I/O, no state between evaluations
 * - Exact rational arithmetic, one pinned rounding step
 * - Fail-closed: malformed observations and transactions throw
 */

// Core validator
export { SettlementValidator, evaluateSettlement } from "./validator.js";

// Steps
export { verifyObservation } from "./observation.js";
export {
  computePayments,
  clamp,
  netPosition,
  computeRemainders,
  computeSettlement,
} from "./payments.js";
export {
  requirePair,
  matchesEitherOrder,
  isMarginOf,
  checkInputs,
  isPayoutTo,
  checkOutputs,
} from "./matching.js";
export type { Pair } from "./matching.js";

// Host adapters
export { createTransactionView, baseAmount } from "./transaction-view.js";
export type {
  Address,
  LedgerInput,
  LedgerOutput,
  LedgerTransaction,
} from "./transaction-view.js";

// Configuration and logging
export {
  SettlementConfigSchema,
  loadConfig,
  arithmeticOptionsFromConfig,
} from "./config.js";
export type { SettlementConfig } from "./config.js";
export { createSettlementLogger, silentLogger } from "./logger.js";

// Types
export type {
  ClampMode,
  Payments,
  Remainders,
  SettlementFigures,
  SettlementReport,
  ArithmeticOptions,
  SettlementValidatorOptions,
  SettlementErrorCode,
} from "./types.js";

export { SettlementError, DEFAULT_CLAMP_MODE } from "./types.js";
