/**
 * @coffer/store — In-memory vault table shared by both store backends.
 *
 * Holds the materialized state and turns commits into log entries.
 * Backends validate an entry, persist it, and only then apply it, so a
 * failed write leaves the table untouched.
 */

import type {
  CashFlowRecord,
  CategoryRecord,
  TransactionRecord,
  VaultRecord,
  VaultState,
  WalletRecord,
} from "@coffer/types";
import type {
  LogEntry,
  StoreChange,
  VaultCommit,
  VaultSnapshot,
} from "./types.js";
import { StoreError } from "./types.js";

interface VaultRow {
  vault: VaultRecord;
  readonly wallets: Map<string, WalletRecord>;
  readonly flows: Map<string, CashFlowRecord>;
  readonly categories: Map<string, CategoryRecord>;
  readonly transactions: Map<string, TransactionRecord>;
  version: number;
}

/**
 * Changes that put a freshly provisioned vault in place.
 */
export function creationChanges(state: VaultState): readonly StoreChange[] {
  return [
    { type: "put-vault", vault: state.vault },
    ...state.wallets.map((wallet): StoreChange => ({ type: "put-wallet", wallet })),
    ...state.flows.map((flow): StoreChange => ({ type: "put-flow", flow })),
  ];
}

export class VaultTable {
  private readonly _vaults = new Map<string, VaultRow>();

  /** transactionId → vaultId */
  private readonly _transactionIndex = new Map<string, string>();

  /** Last applied log sequence */
  private _sequence = 0;

  get sequence(): number {
    return this._sequence;
  }

  // ─── Reads ──────────────────────────────────────────────────────────

  snapshot(vaultId: string): VaultSnapshot | undefined {
    const row = this._vaults.get(vaultId);
    if (row === undefined) return undefined;
    return {
      vault: row.vault,
      wallets: [...row.wallets.values()],
      flows: [...row.flows.values()],
      categories: [...row.categories.values()],
      transactions: [...row.transactions.values()],
      version: row.version,
    };
  }

  vaults(): readonly VaultRecord[] {
    return [...this._vaults.values()].map((row) => row.vault);
  }

  transaction(transactionId: string): TransactionRecord | undefined {
    const vaultId = this._transactionIndex.get(transactionId);
    if (vaultId === undefined) return undefined;
    return this._vaults.get(vaultId)?.transactions.get(transactionId);
  }

  // ─── Entry construction ─────────────────────────────────────────────

  /**
   * Validate a commit against current state and build its log entry.
   * Does not change the table.
   */
  prepareCommit(commit: VaultCommit, committedAt: string): LogEntry {
    const row = this._vaults.get(commit.vaultId);

    if (commit.expectedVersion === "none") {
      if (row !== undefined) {
        throw new StoreError(
          "ALREADY_EXISTS",
          `Vault "${commit.vaultId}" already exists`,
          commit.vaultId,
        );
      }
      if (!commit.changes.some((c) => c.type === "put-vault")) {
        throw new StoreError(
          "INVALID_COMMIT",
          "Creating a vault requires a put-vault change",
          commit.vaultId,
        );
      }
    } else {
      if (row === undefined) {
        throw new StoreError("NOT_FOUND", `Vault "${commit.vaultId}" not found`, commit.vaultId);
      }
      if (row.version !== commit.expectedVersion) {
        throw new StoreError(
          "CONCURRENCY_CONFLICT",
          `Vault "${commit.vaultId}" is at version ${String(row.version)}, expected ${String(commit.expectedVersion)}`,
          commit.vaultId,
        );
      }
    }

    if (commit.changes.length === 0) {
      throw new StoreError("INVALID_COMMIT", "Cannot commit zero changes", commit.vaultId);
    }
    for (const change of commit.changes) {
      this._validateChange(commit.vaultId, change);
    }

    return {
      type: "commit",
      sequence: this._sequence + 1,
      vaultId: commit.vaultId,
      version: (row?.version ?? 0) + 1,
      changes: commit.changes,
      committedAt,
    };
  }

  prepareDelete(vaultId: string, expectedVersion: number, committedAt: string): LogEntry {
    const row = this._vaults.get(vaultId);
    if (row === undefined) {
      throw new StoreError("NOT_FOUND", `Vault "${vaultId}" not found`, vaultId);
    }
    if (row.version !== expectedVersion) {
      throw new StoreError(
        "CONCURRENCY_CONFLICT",
        `Vault "${vaultId}" is at version ${String(row.version)}, expected ${String(expectedVersion)}`,
        vaultId,
      );
    }
    return {
      type: "delete",
      sequence: this._sequence + 1,
      vaultId,
      version: row.version + 1,
      committedAt,
    };
  }

  // ─── Apply ──────────────────────────────────────────────────────────

  /**
   * Apply a log entry. Entries must arrive in sequence order with
   * contiguous vault versions; anything else means the log is corrupt.
   */
  apply(entry: LogEntry): void {
    if (entry.sequence !== this._sequence + 1) {
      throw new StoreError(
        "CORRUPT",
        `Log entry ${String(entry.sequence)} follows ${String(this._sequence)}`,
        entry.vaultId,
      );
    }

    const row = this._vaults.get(entry.vaultId);
    const currentVersion = row?.version ?? 0;
    if (entry.version !== currentVersion + 1) {
      throw new StoreError(
        "CORRUPT",
        `Vault "${entry.vaultId}" jumps from version ${String(currentVersion)} to ${String(entry.version)}`,
        entry.vaultId,
      );
    }

    if (entry.type === "delete") {
      if (row !== undefined) {
        for (const id of row.transactions.keys()) this._transactionIndex.delete(id);
        this._vaults.delete(entry.vaultId);
      }
      this._sequence = entry.sequence;
      return;
    }

    let target = row;
    if (target === undefined) {
      const vaultChange = entry.changes.find((c) => c.type === "put-vault");
      if (vaultChange === undefined || vaultChange.type !== "put-vault") {
        throw new StoreError("CORRUPT", `Vault "${entry.vaultId}" created without a record`, entry.vaultId);
      }
      target = {
        vault: vaultChange.vault,
        wallets: new Map(),
        flows: new Map(),
        categories: new Map(),
        transactions: new Map(),
        version: 0,
      };
      this._vaults.set(entry.vaultId, target);
    }

    for (const change of entry.changes) {
      switch (change.type) {
        case "put-vault":
          target.vault = change.vault;
          break;
        case "put-wallet":
          target.wallets.set(change.wallet.id, change.wallet);
          break;
        case "put-flow":
          target.flows.set(change.flow.id, change.flow);
          break;
        case "put-category":
          target.categories.set(change.category.id, change.category);
          break;
        case "put-transaction":
          target.transactions.set(change.transaction.id, change.transaction);
          this._transactionIndex.set(change.transaction.id, entry.vaultId);
          break;
      }
    }

    target.version = entry.version;
    this._sequence = entry.sequence;
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _validateChange(vaultId: string, change: StoreChange): void {
    const owner = ((): string => {
      switch (change.type) {
        case "put-vault":
          return change.vault.id;
        case "put-wallet":
          return change.wallet.vaultId;
        case "put-flow":
          return change.flow.vaultId;
        case "put-category":
          return change.category.vaultId;
        case "put-transaction":
          return change.transaction.vaultId;
      }
    })();

    if (owner !== vaultId) {
      throw new StoreError(
        "INVALID_COMMIT",
        `${change.type} targets vault "${owner}" inside a commit for "${vaultId}"`,
        vaultId,
      );
    }

    if (change.type === "put-transaction") {
      const indexed = this._transactionIndex.get(change.transaction.id);
      if (indexed !== undefined && indexed !== vaultId) {
        throw new StoreError(
          "INVALID_COMMIT",
          `Transaction "${change.transaction.id}" belongs to vault "${indexed}"`,
          vaultId,
        );
      }
    }
  }
}
