/**
 * Shared builders for ledger tests.
 */

import type {
  CashFlowRecord,
  Leg,
  TransactionRecord,
  VaultState,
  WalletRecord,
} from "@coffer/types";
import type { MovementSpec } from "../src/types.js";
import { planLegs } from "../src/legs.js";

export const CURRENCY = "USD";

export function wallet(id: string, balance = "0", name = id): WalletRecord {
  return {
    id,
    vaultId: "v-1",
    name,
    balance: { minor: balance, currency: CURRENCY },
    archived: false,
    createdAt: "2026-01-01T00:00:00.000Z",
  };
}

export function flow(id: string, balance = "0", name = id): CashFlowRecord {
  return {
    id,
    vaultId: "v-1",
    name,
    balance: { minor: balance, currency: CURRENCY },
    archived: false,
    createdAt: "2026-01-01T00:00:00.000Z",
  };
}

export function vaultState(
  wallets: readonly WalletRecord[],
  flows: readonly CashFlowRecord[],
): VaultState {
  return {
    vault: {
      id: "v-1",
      name: "Household",
      ownerId: "alice",
      currency: CURRENCY,
      createdAt: "2026-01-01T00:00:00.000Z",
      members: [{ username: "alice", role: "owner", addedAt: "2026-01-01T00:00:00.000Z" }],
      flowMembers: [],
    },
    wallets,
    flows,
    version: 1,
  };
}

/**
 * Build a posted transaction with legs planned from `spec`.
 */
export function tx(
  id: string,
  spec: MovementSpec,
  amount: bigint,
  occurredAt = "2026-03-01T12:00:00.000Z",
): TransactionRecord {
  const legs: readonly Leg[] = planLegs(spec, amount);
  const header = {
    id,
    vaultId: "v-1",
    amount: { minor: amount.toString(), currency: CURRENCY },
    occurredAt,
    recordedAt: occurredAt,
    createdBy: "alice",
    state: "posted" as const,
    legs,
  };

  switch (spec.kind) {
    case "income":
      return { ...header, kind: "income", walletId: spec.walletId, flowId: spec.flowId };
    case "expense":
      return { ...header, kind: "expense", walletId: spec.walletId, flowId: spec.flowId };
    case "refund":
      return { ...header, kind: "refund", refundOf: spec.original.id };
    case "transfer_wallet":
      return { ...header, kind: "transfer_wallet", fromWalletId: spec.fromWalletId, toWalletId: spec.toWalletId };
    case "transfer_flow":
      return { ...header, kind: "transfer_flow", fromFlowId: spec.fromFlowId, toFlowId: spec.toFlowId };
  }
}

export function voided(record: TransactionRecord): TransactionRecord {
  return { ...record, state: "voided", voidedAt: "2026-03-02T00:00:00.000Z", voidedBy: "alice" };
}
