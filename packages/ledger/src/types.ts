/**
 * @coffer/ledger — Ledger-specific types and the structured error.
 *
 * Rules:
 * - All types are readonly
 * - Fail-closed: invalid input throws, never silently succeeds
 * - Errors carry a code plus the entity/field they concern
 */

import type {
  Money,
  Period,
  TransactionKind,
  TransactionRecord,
} from "@coffer/types";

// ─── Movement Specs ──────────────────────────────────────────────────────

/**
 * What a new transaction touches, before it has legs.
 * One case per transaction kind.
 */
export type MovementSpec =
  | {
      readonly kind: "income";
      readonly walletId: string;
      readonly flowId?: string | undefined;
    }
  | {
      readonly kind: "expense";
      readonly walletId: string;
      readonly flowId?: string | undefined;
    }
  | { readonly kind: "refund"; readonly original: TransactionRecord }
  | {
      readonly kind: "transfer_wallet";
      readonly fromWalletId: string;
      readonly toWalletId: string;
    }
  | {
      readonly kind: "transfer_flow";
      readonly fromFlowId: string;
      readonly toFlowId: string;
    };

// ─── Query Types ─────────────────────────────────────────────────────────

/**
 * Filter criteria for listing a vault's transactions.
 * `from` is inclusive, `to` exclusive.
 */
export interface TransactionFilter {
  readonly from?: string | undefined;
  readonly to?: string | undefined;
  readonly kinds?: readonly TransactionKind[] | undefined;
  readonly walletId?: string | undefined;
  readonly flowId?: string | undefined;
  /** Defaults to false */
  readonly includeVoided?: boolean | undefined;
  /** Defaults to true; false drops transfers even when `kinds` lists them */
  readonly includeTransfers?: boolean | undefined;
}

// ─── Statistics ──────────────────────────────────────────────────────────

export interface HolderStatistics {
  readonly id: string;
  readonly name: string;
  readonly archived: boolean;
  /** Current running balance, independent of the period */
  readonly balance: Money;
  readonly inflow: Money;
  readonly outflow: Money;
  readonly net: Money;
  readonly transactionCount: number;
}

export interface VaultTotals {
  readonly income: Money;
  readonly expenses: Money;
  readonly refunds: Money;
  /** Sum of wallet deltas in the period */
  readonly net: Money;
  /** Sum of current wallet balances */
  readonly balance: Money;
}

export interface VaultStatistics {
  readonly vaultId: string;
  readonly currency: string;
  readonly period: Period;
  readonly totals: VaultTotals;
  readonly wallets: readonly HolderStatistics[];
  readonly flows: readonly HolderStatistics[];
  readonly transactionCount: number;
}

// ─── Balance Drift ───────────────────────────────────────────────────────

/**
 * A holder whose stored balance disagrees with its posted history.
 */
export interface BalanceDrift {
  readonly target: "wallet" | "flow";
  readonly id: string;
  readonly stored: string;
  readonly computed: string;
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger operations. */
export type LedgerErrorCode =
  | "NOT_FOUND"
  | "UNAUTHORIZED"
  | "INVALID_AMOUNT"
  | "INVALID_STATE"
  | "ALREADY_VOIDED"
  | "IMMUTABLE"
  | "SAME_WALLET"
  | "SAME_FLOW"
  | "CURRENCY_MISMATCH"
  | "STORE_FAILURE"
  | "INVALID_INPUT"
  | "ALREADY_EXISTS";

export type LedgerEntity =
  | "vault"
  | "wallet"
  | "flow"
  | "transaction"
  | "member"
  | "category"
  | "currency";

/** Which entity and field an error is about. */
export interface LedgerErrorContext {
  readonly entity?: LedgerEntity | undefined;
  readonly id?: string | undefined;
  readonly field?: string | undefined;
}

/**
 * Structured error from the ledger.
 * Every failure surfaces as a thrown LedgerError.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;
  public readonly context: LedgerErrorContext;

  constructor(
    code: LedgerErrorCode,
    message: string,
    context: LedgerErrorContext = {},
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "LedgerError";
    this.code = code;
    this.context = context;
  }
}
