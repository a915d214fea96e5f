/**
 * Shared setup for engine tests.
 *
 * Ids come from a counter, so a fresh vault created by alice is always
 * `id-1` with wallet `id-2` (Cash) and flow `id-3` (Unallocated).
 */

import type { Money } from "@coffer/types";
import { LedgerError } from "@coffer/ledger";
import { InMemoryLedgerStore, StoreError } from "@coffer/store";
import type { CommitResult, VaultCommit } from "@coffer/store";
import { LedgerEngine } from "../src/engine.js";
import type { LedgerEngineOptions } from "../src/types.js";

export const NOW = "2026-02-01T10:00:00.000Z";

export const VAULT = "id-1";
export const CASH = "id-2";
export const UNALLOCATED = "id-3";

export function usd(minor: string): Money {
  return { minor, currency: "USD" };
}

export function sequentialIds(prefix = "id"): () => string {
  let n = 0;
  return () => {
    n++;
    return `${prefix}-${String(n)}`;
  };
}

export function createEngine(
  store: InMemoryLedgerStore = new InMemoryLedgerStore({ now: () => NOW }),
  options: Partial<LedgerEngineOptions> = {},
): { engine: LedgerEngine; store: InMemoryLedgerStore } {
  const engine = new LedgerEngine({
    store,
    now: () => new Date(NOW),
    generateId: sequentialIds(),
    defaultCurrency: "USD",
    ...options,
  });
  return { engine, store };
}

/**
 * Resolve to the LedgerError code a promise rejects with.
 */
export async function errorCode(promise: Promise<unknown>): Promise<string | undefined> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof LedgerError) return err.code;
    throw err;
  }
  return undefined;
}

export async function balances(
  engine: LedgerEngine,
  vaultId = VAULT,
): Promise<Record<string, string>> {
  const view = await engine.getVault("alice", vaultId);
  const out: Record<string, string> = {};
  for (const w of view.wallets) out[w.id] = w.balance.minor;
  for (const f of view.flows) out[f.id] = f.balance.minor;
  return out;
}

// =============================================================================
// Misbehaving stores
// =============================================================================

/**
 * Fails every commit while `failing` is set.
 */
export class FailingStore extends InMemoryLedgerStore {
  failing = false;

  override async commit(commit: VaultCommit): Promise<CommitResult> {
    if (this.failing) {
      throw new StoreError("IO_FAILURE", "disk full", commit.vaultId);
    }
    return super.commit(commit);
  }
}

/**
 * Lets another writer move the vault forward just before the next
 * `conflicts` commits, so each of them hits a version conflict.
 */
export class RacingStore extends InMemoryLedgerStore {
  conflicts = 0;
  interleaved = 0;

  override async commit(commit: VaultCommit): Promise<CommitResult> {
    if (this.conflicts > 0 && commit.expectedVersion !== "none") {
      this.conflicts--;
      const snapshot = await this.loadVault(commit.vaultId);
      if (snapshot !== undefined) {
        await super.commit({
          vaultId: commit.vaultId,
          expectedVersion: snapshot.version,
          changes: [{ type: "put-vault", vault: snapshot.vault }],
        });
        this.interleaved++;
      }
    }
    return super.commit(commit);
  }
}
