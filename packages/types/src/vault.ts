/**
 * Vault aggregate types.
 *
 * A vault is the sharing boundary: it owns wallets, cash flows,
 * transactions and the membership list. Records here are plain
 * immutable values; only the engine's commit path produces new ones.
 */

import type { CurrencyCode, Money } from "./money.js";

// =============================================================================
// Membership
// =============================================================================

/** Vault-level roles. Exactly one owner per vault. */
export type MembershipRole = "owner" | "editor" | "viewer";

/** Roles a flow-scoped grant may carry. */
export type FlowMembershipRole = "editor" | "viewer";

export interface VaultMembership {
  readonly username: string;
  readonly role: MembershipRole;
  readonly addedAt: string;
}

/**
 * Narrower grant limited to one cash flow within a vault.
 */
export interface FlowMembership {
  readonly flowId: string;
  readonly username: string;
  readonly role: FlowMembershipRole;
  readonly addedAt: string;
}

// =============================================================================
// Vault
// =============================================================================

export interface VaultRecord {
  readonly id: string;
  readonly name: string;
  readonly ownerId: string;
  /** Every amount in the vault uses this currency */
  readonly currency: CurrencyCode;
  readonly createdAt: string;
  readonly members: readonly VaultMembership[];
  readonly flowMembers: readonly FlowMembership[];
}

// =============================================================================
// Balance holders
// =============================================================================

export interface WalletRecord {
  readonly id: string;
  readonly vaultId: string;
  readonly name: string;
  /** Running balance, changed only by committed transaction legs */
  readonly balance: Money;
  readonly archived: boolean;
  readonly createdAt: string;
}

/** Marker for flows the system creates and protects. */
export type SystemFlowKind = "unallocated";

/**
 * Upper bound on a cash flow.
 *
 * - `net`: the balance may not rise above `limit`
 * - `income`: the sum of everything ever credited to the flow, regardless
 *   of what was spent, may not rise above `limit`
 */
export type FlowCap =
  | { readonly mode: "net"; readonly limit: Money }
  | { readonly mode: "income"; readonly limit: Money; readonly incomeTotal: Money };

export interface CashFlowRecord {
  readonly id: string;
  readonly vaultId: string;
  readonly name: string;
  readonly balance: Money;
  readonly archived: boolean;
  readonly system?: SystemFlowKind | undefined;
  /** Absent means unlimited */
  readonly cap?: FlowCap | undefined;
  readonly createdAt: string;
}

// =============================================================================
// Categories
// =============================================================================

/**
 * A named category in a vault's registry. Names and aliases are unique
 * per vault, compared case-insensitively.
 */
export interface CategoryRecord {
  readonly id: string;
  readonly vaultId: string;
  readonly name: string;
  /** Alternative spellings that resolve to this category */
  readonly aliases: readonly string[];
  readonly archived: boolean;
  readonly createdAt: string;
}

/**
 * A vault with its balance holders, as loaded from the store.
 * `version` increases by one on every committed change.
 */
export interface VaultState {
  readonly vault: VaultRecord;
  readonly wallets: readonly WalletRecord[];
  readonly flows: readonly CashFlowRecord[];
  readonly version: number;
}
