/**
 * Transaction View Types
 *
 * Read-only view of a settlement transaction, supplied by the host ledger.
 * Identity checks are capabilities on each input and output so the
 * settlement rule never needs to know how identities are represented.
 */

import type { Identity } from "./swap.js";

/**
 * A spent funding source.
 */
export interface TransactionInputView {
  /** Base-currency amount carried by the input */
  readonly amount: bigint;

  /** Whether spending this input was authorized by `identity` */
  isSignedBy(identity: Identity): boolean;
}

/**
 * A payment destination.
 */
export interface TransactionOutputView {
  /** Base-currency amount paid by the output */
  readonly amount: bigint;

  /** Identity the output pays to, or undefined for script-locked outputs */
  destination(): Identity | undefined;
}

export interface TransactionView {
  readonly inputs: readonly TransactionInputView[];
  readonly outputs: readonly TransactionOutputView[];
}
