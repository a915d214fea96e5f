/**
 * @coffer/engine — Command inputs and engine options.
 */

import type { Logger } from "pino";
import type {
  CurrencyCode,
  FlowMembershipRole,
  Money,
  MembershipRole,
} from "@coffer/types";
import type { LedgerStore } from "@coffer/store";
import type { FlowCapInput } from "@coffer/vault";

// =============================================================================
// Options
// =============================================================================

/**
 * What happens to a vault's contents on deletion.
 *
 * - `reject`: deletion fails while any transaction exists
 * - `cascade`: wallets, flows and transactions go with the vault
 */
export type VaultDeletePolicy = "reject" | "cascade";

export interface LedgerEngineOptions {
  readonly store: LedgerStore;
  readonly logger?: Logger | undefined;
  /** Clock; defaults to `new Date()` */
  readonly now?: (() => Date) | undefined;
  /** Id factory; defaults to `randomUUID` */
  readonly generateId?: (() => string) | undefined;
  /** Currency for vaults created without one. Default: EUR */
  readonly defaultCurrency?: CurrencyCode | undefined;
  /** Default: reject */
  readonly vaultDeletePolicy?: VaultDeletePolicy | undefined;
  /** Re-plans after a version conflict. Default: 3 */
  readonly maxConflictRetries?: number | undefined;
}

// =============================================================================
// Vault commands
// =============================================================================

export interface CreateVaultInput {
  readonly name?: string | undefined;
  readonly currency?: CurrencyCode | undefined;
}

export interface UpdateHolderInput {
  readonly name?: string | undefined;
  /** Only `true` is meaningful; archiving is one-way */
  readonly archived?: boolean | undefined;
}

export interface UpdateFlowInput extends UpdateHolderInput {
  /** A new cap, or `null` to lift it */
  readonly cap?: FlowCapInput | null | undefined;
}

export interface UpdateCategoryInput {
  readonly name?: string | undefined;
  /** `false` restores an archived category */
  readonly archived?: boolean | undefined;
}

export interface SetMemberInput {
  readonly vaultId: string;
  readonly username: string;
  readonly role: MembershipRole;
}

export interface SetFlowMemberInput {
  readonly vaultId: string;
  readonly flowId: string;
  readonly username: string;
  readonly role: FlowMembershipRole;
}

// =============================================================================
// Transaction commands
// =============================================================================

/** Free-text metadata accepted on every new transaction. */
export interface TransactionMetadataInput {
  readonly note?: string | undefined;
  readonly category?: string | undefined;
  /** ISO 8601; defaults to now */
  readonly occurredAt?: string | undefined;
}

export interface RecordIncomeInput extends TransactionMetadataInput {
  readonly vaultId: string;
  readonly walletId: string;
  readonly flowId?: string | undefined;
  readonly amount: Money;
}

export type RecordExpenseInput = RecordIncomeInput;

export interface RecordRefundInput extends TransactionMetadataInput {
  /** The transaction being refunded */
  readonly transactionId: string;
  readonly amount: Money;
}

export interface TransferWalletInput extends TransactionMetadataInput {
  readonly vaultId: string;
  readonly fromWalletId: string;
  readonly toWalletId: string;
  readonly amount: Money;
}

export interface TransferFlowInput extends TransactionMetadataInput {
  readonly vaultId: string;
  readonly fromFlowId: string;
  readonly toFlowId: string;
  readonly amount: Money;
}

/**
 * Fields a caller asked to change. Only `note` and `category` are
 * editable; anything else is rejected.
 */
export type TransactionFieldPatch = Readonly<Record<string, unknown>>;

// =============================================================================
// Limits
// =============================================================================

export const MAX_NOTE_LENGTH = 500;
export const MAX_CATEGORY_LENGTH = 64;

export const EDITABLE_TRANSACTION_FIELDS: readonly string[] = ["note", "category"];

export const PROTECTED_TRANSACTION_FIELDS: readonly string[] = [
  "id",
  "amount",
  "kind",
  "walletId",
  "flowId",
  "fromWalletId",
  "toWalletId",
  "fromFlowId",
  "toFlowId",
  "refundOf",
  "occurredAt",
  "recordedAt",
  "createdBy",
  "state",
  "voidedAt",
  "voidedBy",
  "vaultId",
  "legs",
];
