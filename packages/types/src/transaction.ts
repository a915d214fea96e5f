/**
 * Transaction types.
 *
 * A closed tagged union: one case per kind, sharing a common header.
 * Once posted, everything except `note`, `category` and the lifecycle
 * fields is fixed. Voided is terminal.
 */

import type { Money } from "./money.js";

export type TransactionKind =
  | "income"
  | "expense"
  | "refund"
  | "transfer_wallet"
  | "transfer_flow";

export const TRANSACTION_KINDS: readonly TransactionKind[] = [
  "income",
  "expense",
  "refund",
  "transfer_wallet",
  "transfer_flow",
];

export type TransactionState = "posted" | "voided";

// =============================================================================
// Legs
// =============================================================================

export type LegTarget =
  | { readonly kind: "wallet"; readonly id: string }
  | { readonly kind: "flow"; readonly id: string };

/**
 * One signed balance change. Posting applies `delta`, voiding applies `-delta`.
 */
export interface Leg {
  readonly target: LegTarget;
  /** Signed integer minor units */
  readonly delta: string;
}

// =============================================================================
// Records
// =============================================================================

interface TransactionHeader {
  readonly id: string;
  readonly vaultId: string;
  /** Always positive */
  readonly amount: Money;
  readonly occurredAt: string;
  readonly recordedAt: string;
  readonly createdBy: string;
  readonly note?: string | undefined;
  /** Display name of the category; absent means uncategorized */
  readonly category?: string | undefined;
  readonly categoryId?: string | undefined;
  readonly state: TransactionState;
  readonly voidedAt?: string | undefined;
  readonly voidedBy?: string | undefined;
  readonly legs: readonly Leg[];
}

export interface IncomeTransaction extends TransactionHeader {
  readonly kind: "income";
  readonly walletId: string;
  readonly flowId?: string | undefined;
}

export interface ExpenseTransaction extends TransactionHeader {
  readonly kind: "expense";
  readonly walletId: string;
  readonly flowId?: string | undefined;
}

export interface RefundTransaction extends TransactionHeader {
  readonly kind: "refund";
  /** The transaction this refund partially or fully reverses */
  readonly refundOf: string;
}

export interface WalletTransferTransaction extends TransactionHeader {
  readonly kind: "transfer_wallet";
  readonly fromWalletId: string;
  readonly toWalletId: string;
}

export interface FlowTransferTransaction extends TransactionHeader {
  readonly kind: "transfer_flow";
  readonly fromFlowId: string;
  readonly toFlowId: string;
}

export type TransactionRecord =
  | IncomeTransaction
  | ExpenseTransaction
  | RefundTransaction
  | WalletTransferTransaction
  | FlowTransferTransaction;

/** Kinds that move value between two holders of the same type. */
export type TransferKind = "transfer_wallet" | "transfer_flow";
