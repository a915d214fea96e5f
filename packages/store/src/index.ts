/**
 * @coffer/store — Durable storage for vault aggregates.
 *
 * Two backends behind one interface:
 * - InMemoryLedgerStore for tests and ephemeral deployments
 * - JsonlLedgerStore for a single-file durable log
 *
 * Both hash-chain every commit (RFC 8785 + SHA-256).
 */

// Types
export type {
  VaultSnapshot,
  ExpectedVersion,
  StoreChange,
  VaultCommit,
  CommitResult,
  LogEntry,
  HashedLogEntry,
  IntegrityError,
  StoreIntegrityResult,
  LedgerStore,
  StoreErrorCode,
} from "./types.js";
export { StoreError } from "./types.js";

// Implementations
export { InMemoryLedgerStore } from "./in-memory-store.js";
export type { InMemoryLedgerStoreOptions } from "./in-memory-store.js";
export { JsonlLedgerStore } from "./jsonl-store.js";
export type { JsonlLedgerStoreOptions, JsonlLoadReport } from "./jsonl-store.js";

// Hash chain
export { GENESIS_HASH, computeEntryHash, chainEntry, verifyHashChain } from "./hash-chain.js";

// Helpers
export { creationChanges } from "./vault-table.js";
export { isHashedLogEntry, isStoreChange } from "./records.js";
