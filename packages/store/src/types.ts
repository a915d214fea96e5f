/**
 * @coffer/store — Core types.
 *
 * Defines the persistence contract the ledger engine depends on.
 *
 * Design principles:
 * - One commit changes one vault, atomically: all changes persist or none do
 * - Every commit bumps the vault's version by exactly one
 * - Concurrency control via expected version (optimistic locking)
 * - Transactions are never physically removed while their vault exists
 */

import type {
  CashFlowRecord,
  CategoryRecord,
  TransactionRecord,
  VaultRecord,
  VaultState,
  WalletRecord,
} from "@coffer/types";

// =============================================================================
// Snapshots
// =============================================================================

/**
 * A vault with its holders, category registry and full transaction
 * history, read at one version. Never reflects a partially applied commit.
 */
export interface VaultSnapshot extends VaultState {
  readonly categories: readonly CategoryRecord[];
  readonly transactions: readonly TransactionRecord[];
}

// =============================================================================
// Commits
// =============================================================================

/**
 * Expected version for optimistic concurrency control.
 *
 * - A number: the vault must be at exactly this version
 * - "none": the vault must not exist (creation)
 */
export type ExpectedVersion = number | "none";

export type StoreChange =
  | { readonly type: "put-vault"; readonly vault: VaultRecord }
  | { readonly type: "put-wallet"; readonly wallet: WalletRecord }
  | { readonly type: "put-flow"; readonly flow: CashFlowRecord }
  | { readonly type: "put-category"; readonly category: CategoryRecord }
  | { readonly type: "put-transaction"; readonly transaction: TransactionRecord };

export interface VaultCommit {
  readonly vaultId: string;
  readonly expectedVersion: ExpectedVersion;
  readonly changes: readonly StoreChange[];
}

export interface CommitResult {
  readonly vaultId: string;
  /** Vault version after the commit */
  readonly version: number;
  /** Position of the commit in the store-wide log (1-based) */
  readonly sequence: number;
}

/**
 * One entry of the store-wide log, as persisted and hashed.
 */
export type LogEntry =
  | {
      readonly type: "commit";
      readonly sequence: number;
      readonly vaultId: string;
      readonly version: number;
      readonly changes: readonly StoreChange[];
      readonly committedAt: string;
    }
  | {
      readonly type: "delete";
      readonly sequence: number;
      readonly vaultId: string;
      readonly version: number;
      readonly committedAt: string;
    };

export type HashedLogEntry = LogEntry & {
  readonly hash: string;
  readonly previousHash: string;
};

// =============================================================================
// Integrity
// =============================================================================

export interface IntegrityError {
  readonly sequence: number;
  readonly reason: string;
}

export interface StoreIntegrityResult {
  readonly valid: boolean;
  readonly lastVerifiedSequence: number;
  readonly errors: readonly IntegrityError[];
}

// =============================================================================
// Store Interface
// =============================================================================

/**
 * Durable store for vault aggregates.
 *
 * Invariants:
 * - `commit` is all-or-nothing; a failed commit leaves every read unchanged
 * - Vault versions are contiguous (1, 2, 3, ...) with no gaps
 * - Reads never observe a half-applied commit
 */
export interface LedgerStore {
  /**
   * Persist a freshly provisioned vault at version 1.
   *
   * @throws StoreError ALREADY_EXISTS if the id is taken
   */
  createVault(state: VaultState): Promise<CommitResult>;

  /**
   * Load a vault with its transactions, or undefined if unknown.
   */
  loadVault(vaultId: string): Promise<VaultSnapshot | undefined>;

  /** Vaults owned by `ownerId`. */
  findVaultsByOwner(ownerId: string): Promise<readonly VaultRecord[]>;

  /** Vaults where `username` holds any membership, vault-level or flow-scoped. */
  findVaultsForUser(username: string): Promise<readonly VaultRecord[]>;

  findTransaction(transactionId: string): Promise<TransactionRecord | undefined>;

  /**
   * Apply a set of changes to one vault.
   *
   * @throws StoreError CONCURRENCY_CONFLICT if the vault moved past `expectedVersion`
   * @throws StoreError NOT_FOUND if the vault does not exist
   * @throws StoreError INVALID_COMMIT if a change belongs to another vault
   */
  commit(commit: VaultCommit): Promise<CommitResult>;

  /**
   * Remove a vault with everything it owns.
   */
  deleteVault(vaultId: string, expectedVersion: number): Promise<void>;

  /** Recompute the hash chain over the store-wide log. */
  verifyIntegrity(): Promise<StoreIntegrityResult>;
}

// =============================================================================
// Errors
// =============================================================================

/**
 * Error codes for LedgerStore operations.
 */
export type StoreErrorCode =
  | "CONCURRENCY_CONFLICT"
  | "NOT_FOUND"
  | "ALREADY_EXISTS"
  | "INVALID_COMMIT"
  | "IO_FAILURE"
  | "CORRUPT";

/**
 * Error thrown by LedgerStore operations.
 */
export class StoreError extends Error {
  constructor(
    public readonly code: StoreErrorCode,
    message: string,
    public readonly vaultId?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "StoreError";
  }
}
