/**
 * @coffer/store — In-memory LedgerStore implementation.
 *
 * Used in tests and for the `memory` store driver.
 *
 * Properties:
 * - Commits are validated in full before any state changes
 * - Every commit is hash-chained into an in-memory log
 * - Not durable: state is lost when the process exits
 */

import type { TransactionRecord, VaultRecord, VaultState } from "@coffer/types";
import type {
  CommitResult,
  HashedLogEntry,
  LedgerStore,
  LogEntry,
  StoreIntegrityResult,
  VaultCommit,
  VaultSnapshot,
} from "./types.js";
import { GENESIS_HASH, chainEntry, verifyHashChain } from "./hash-chain.js";
import { VaultTable, creationChanges } from "./vault-table.js";
import { isMemberOf } from "./membership-index.js";

export interface InMemoryLedgerStoreOptions {
  /** Clock for `committedAt`; defaults to the system clock */
  readonly now?: (() => string) | undefined;
}

export class InMemoryLedgerStore implements LedgerStore {
  protected readonly _table = new VaultTable();
  private readonly _log: HashedLogEntry[] = [];
  private readonly _now: () => string;

  constructor(options: InMemoryLedgerStoreOptions = {}) {
    this._now = options.now ?? (() => new Date().toISOString());
  }

  // ─── Writes ─────────────────────────────────────────────────────────

  async createVault(state: VaultState): Promise<CommitResult> {
    return this.commit({
      vaultId: state.vault.id,
      expectedVersion: "none",
      changes: creationChanges(state),
    });
  }

  async commit(commit: VaultCommit): Promise<CommitResult> {
    const entry = this._table.prepareCommit(commit, this._now());
    this._append(entry);
    return { vaultId: entry.vaultId, version: entry.version, sequence: entry.sequence };
  }

  async deleteVault(vaultId: string, expectedVersion: number): Promise<void> {
    this._append(this._table.prepareDelete(vaultId, expectedVersion, this._now()));
  }

  // ─── Reads ──────────────────────────────────────────────────────────

  async loadVault(vaultId: string): Promise<VaultSnapshot | undefined> {
    return this._table.snapshot(vaultId);
  }

  async findVaultsByOwner(ownerId: string): Promise<readonly VaultRecord[]> {
    return this._table.vaults().filter((v) => v.ownerId === ownerId);
  }

  async findVaultsForUser(username: string): Promise<readonly VaultRecord[]> {
    return this._table.vaults().filter((v) => isMemberOf(v, username));
  }

  async findTransaction(transactionId: string): Promise<TransactionRecord | undefined> {
    return this._table.transaction(transactionId);
  }

  async verifyIntegrity(): Promise<StoreIntegrityResult> {
    return verifyHashChain(this._log);
  }

  /** Hash-chained log, oldest first. */
  get log(): readonly HashedLogEntry[] {
    return this._log;
  }

  // ─── Internal ───────────────────────────────────────────────────────

  /**
   * Persist then apply. Subclasses override `_persist` to add durability.
   */
  protected _append(entry: LogEntry): void {
    const previousHash = this._log[this._log.length - 1]?.hash ?? GENESIS_HASH;
    const hashed = chainEntry(entry, previousHash);
    this._persist(hashed);
    this._table.apply(hashed);
    this._log.push(hashed);
  }

  protected _persist(_entry: HashedLogEntry): void {
    // Memory only.
  }

  /**
   * Replay an entry that is already persisted.
   */
  protected _restore(entry: HashedLogEntry): void {
    this._table.apply(entry);
    this._log.push(entry);
  }
}
