/**
 * Shared builders for store tests.
 */

import type { CategoryRecord, TransactionRecord, VaultState, WalletRecord } from "@coffer/types";

export const NOW = "2026-02-01T10:00:00.000Z";

export function fixedClock(): () => string {
  return () => NOW;
}

export function vaultState(id = "v-1", ownerId = "alice"): VaultState {
  return {
    vault: {
      id,
      name: "Household",
      ownerId,
      currency: "EUR",
      createdAt: NOW,
      members: [{ username: ownerId, role: "owner", addedAt: NOW }],
      flowMembers: [],
    },
    wallets: [
      {
        id: `${id}-cash`,
        vaultId: id,
        name: "Cash",
        balance: { minor: "0", currency: "EUR" },
        archived: false,
        createdAt: NOW,
      },
    ],
    flows: [
      {
        id: `${id}-unallocated`,
        vaultId: id,
        name: "Unallocated",
        balance: { minor: "0", currency: "EUR" },
        archived: false,
        system: "unallocated",
        createdAt: NOW,
      },
    ],
    version: 0,
  };
}

export function income(id: string, vaultId: string, walletId: string, minor: string): TransactionRecord {
  return {
    id,
    kind: "income",
    vaultId,
    walletId,
    amount: { minor, currency: "EUR" },
    occurredAt: NOW,
    recordedAt: NOW,
    createdBy: "alice",
    state: "posted",
    legs: [{ target: { kind: "wallet", id: walletId }, delta: minor }],
  };
}

export function withBalance(wallet: WalletRecord, minor: string): WalletRecord {
  return { ...wallet, balance: { minor, currency: wallet.balance.currency } };
}

export function category(id: string, vaultId: string, name: string): CategoryRecord {
  return { id, vaultId, name, aliases: [], archived: false, createdAt: NOW };
}
