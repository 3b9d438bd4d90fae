/**
 * In-memory TransactionView over a ledger-shaped transaction.
 *
 * Hosts that already hold a decoded transaction can build the view the
 * settlement rule consumes without writing their own adapter. Spending
 * authority is per transaction: every input counts as signed by each
 * identity in `signatories`.
 */

import type {
  Identity,
  TransactionInputView,
  TransactionOutputView,
  TransactionView,
  Value,
} from "@swapline/types";
import { BASE_ASSET } from "@swapline/types";

export type Address =
  | { readonly kind: "pubkey"; readonly hash: Identity }
  | { readonly kind: "script"; readonly hash: string };

export interface LedgerInput {
  readonly value: Value;
}

export interface LedgerOutput {
  readonly value: Value;
  readonly address: Address;
}

export interface LedgerTransaction {
  readonly inputs: readonly LedgerInput[];
  readonly outputs: readonly LedgerOutput[];
  readonly signatories: readonly Identity[];
}

/**
 * Base-currency component of a value. Other assets are ignored.
 */
export function baseAmount(value: Value): bigint {
  return value[BASE_ASSET] ?? 0n;
}

export function createTransactionView(tx: LedgerTransaction): TransactionView {
  const signatories = new Set(tx.signatories);

  const inputs: TransactionInputView[] = tx.inputs.map((input) => ({
    amount: baseAmount(input.value),
    isSignedBy: (identity: Identity) => signatories.has(identity),
  }));

  const outputs: TransactionOutputView[] = tx.outputs.map((output) => ({
    amount: baseAmount(output.value),
    destination: () => (output.address.kind === "pubkey" ? output.address.hash : undefined),
  }));

  return { inputs, outputs };
}
