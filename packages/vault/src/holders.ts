/**
 * Wallet and cash flow management.
 *
 * Holders are created with a zero balance, can be renamed and archived,
 * and are never deleted while the vault exists. Balances are not
 * touched here; only committed transaction legs change them.
 */

import type {
  CashFlowRecord,
  FlowCap,
  TransactionRecord,
  VaultState,
  WalletRecord,
} from "@coffer/types";
import {
  LedgerError,
  assertPositive,
  capExceeded,
  compareMoney,
  computeIncomeTotal,
  toMoney,
  zeroMoney,
} from "@coffer/ledger";
import type { FlowCapInput } from "./types.js";
import { assertNameAvailable, normalizeName } from "./names.js";

// =============================================================================
// Lookup
// =============================================================================

export function requireWallet(state: VaultState, walletId: string): WalletRecord {
  const wallet = state.wallets.find((w) => w.id === walletId);
  if (wallet === undefined) {
    throw new LedgerError("NOT_FOUND", `Wallet not found: ${walletId}`, {
      entity: "wallet",
      id: walletId,
    });
  }
  return wallet;
}

export function requireFlow(state: VaultState, flowId: string): CashFlowRecord {
  const flow = state.flows.find((f) => f.id === flowId);
  if (flow === undefined) {
    throw new LedgerError("NOT_FOUND", `Cash flow not found: ${flowId}`, {
      entity: "flow",
      id: flowId,
    });
  }
  return flow;
}

/**
 * Archived holders keep their history but take no new transactions.
 */
export function assertActive(holder: WalletRecord | CashFlowRecord, entity: "wallet" | "flow"): void {
  if (holder.archived) {
    throw new LedgerError("INVALID_STATE", `${entity} ${holder.id} is archived`, {
      entity,
      id: holder.id,
      field: "archived",
    });
  }
}

function activeNames<T extends WalletRecord | CashFlowRecord>(
  holders: readonly T[],
  exceptId?: string,
): readonly T[] {
  return holders.filter((h) => !h.archived && h.id !== exceptId);
}

function assertNotSystem(flow: CashFlowRecord): void {
  if (flow.system !== undefined) {
    throw new LedgerError("INVALID_STATE", `Flow ${flow.id} is managed by the system`, {
      entity: "flow",
      id: flow.id,
    });
  }
}

// =============================================================================
// Wallets
// =============================================================================

export function createWallet(
  state: VaultState,
  input: { readonly id: string; readonly name: string; readonly now: string },
): WalletRecord {
  const name = normalizeName(input.name, "wallet");
  assertNameAvailable(name, activeNames(state.wallets), "wallet");
  return {
    id: input.id,
    vaultId: state.vault.id,
    name,
    balance: zeroMoney(state.vault.currency),
    archived: false,
    createdAt: input.now,
  };
}

export function renameWallet(state: VaultState, walletId: string, rawName: string): WalletRecord {
  const wallet = requireWallet(state, walletId);
  const name = normalizeName(rawName, "wallet");
  assertNameAvailable(name, activeNames(state.wallets, walletId), "wallet");
  return { ...wallet, name };
}

export function archiveWallet(state: VaultState, walletId: string): WalletRecord {
  const wallet = requireWallet(state, walletId);
  assertActive(wallet, "wallet");
  const remaining = activeNames(state.wallets, walletId);
  if (remaining.length === 0) {
    throw new LedgerError("INVALID_STATE", "A vault needs at least one active wallet", {
      entity: "wallet",
      id: walletId,
    });
  }
  return { ...wallet, archived: true };
}

// =============================================================================
// Cash flows
// =============================================================================

export function createFlow(
  state: VaultState,
  input: {
    readonly id: string;
    readonly name: string;
    readonly now: string;
    readonly cap?: FlowCapInput | undefined;
  },
): CashFlowRecord {
  const name = normalizeName(input.name, "flow");
  assertNameAvailable(name, activeNames(state.flows), "flow");
  const flow: CashFlowRecord = {
    id: input.id,
    vaultId: state.vault.id,
    name,
    balance: zeroMoney(state.vault.currency),
    archived: false,
    createdAt: input.now,
  };
  return input.cap === undefined ? flow : setFlowCap(state, flow, input.cap, []);
}

/**
 * Set, change or (with `null`) remove a flow's cap. The current figure
 * must already fit under a new limit.
 *
 * @throws LedgerError INVALID_STATE for the Unallocated flow
 * @throws LedgerError INVALID_AMOUNT for a non-positive limit or one already exceeded
 * @throws LedgerError CURRENCY_MISMATCH if the limit is not in the vault currency
 */
export function setFlowCap(
  state: VaultState,
  flow: CashFlowRecord,
  input: FlowCapInput | null,
  transactions: readonly TransactionRecord[],
): CashFlowRecord {
  assertNotSystem(flow);
  if (input === null) return { ...flow, cap: undefined };

  assertPositive(input.limit);
  if (input.limit.currency !== state.vault.currency) {
    throw new LedgerError(
      "CURRENCY_MISMATCH",
      `Vault ${state.vault.id} uses ${state.vault.currency}, got ${input.limit.currency}`,
      { entity: "flow", id: flow.id, field: "cap" },
    );
  }

  const cap: FlowCap =
    input.mode === "net"
      ? { mode: "net", limit: input.limit }
      : {
          mode: "income",
          limit: input.limit,
          incomeTotal: toMoney(computeIncomeTotal(flow.id, transactions), state.vault.currency),
        };
  const current = cap.mode === "net" ? flow.balance : cap.incomeTotal;
  if (compareMoney(current, cap.limit) > 0) {
    throw capExceeded(flow, cap.limit);
  }
  return { ...flow, cap };
}

export function renameFlow(state: VaultState, flowId: string, rawName: string): CashFlowRecord {
  const flow = requireFlow(state, flowId);
  assertNotSystem(flow);
  const name = normalizeName(rawName, "flow");
  assertNameAvailable(name, activeNames(state.flows, flowId), "flow");
  return { ...flow, name };
}

export function archiveFlow(state: VaultState, flowId: string): CashFlowRecord {
  const flow = requireFlow(state, flowId);
  assertNotSystem(flow);
  assertActive(flow, "flow");
  return { ...flow, archived: true };
}
