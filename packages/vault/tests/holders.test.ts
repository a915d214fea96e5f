/**
 * Tests for wallet and cash flow management.
 */

import { describe, it, expect } from "vitest";
import type { TransactionRecord, VaultState } from "@coffer/types";
import { LedgerError } from "@coffer/ledger";
import {
  archiveFlow,
  archiveWallet,
  assertActive,
  createFlow,
  createWallet,
  renameFlow,
  renameWallet,
  requireFlow,
  setFlowCap,
  requireWallet,
} from "../src/holders.js";
import { NOW, freshVault } from "./fixtures.js";

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    if (err instanceof LedgerError) return err.code;
    throw err;
  }
  return undefined;
}

function withWallet(state: VaultState, id: string, name: string): VaultState {
  return { ...state, wallets: [...state.wallets, createWallet(state, { id, name, now: NOW })] };
}

describe("wallets", () => {
  it("creates a wallet at zero in the vault currency", () => {
    const wallet = createWallet(freshVault(), { id: "w-bank", name: " Bank ", now: NOW });
    expect(wallet).toEqual({
      id: "w-bank",
      vaultId: "id-1",
      name: "Bank",
      balance: { minor: "0", currency: "EUR" },
      archived: false,
      createdAt: NOW,
    });
  });

  it("rejects a duplicate name, ignoring case", () => {
    expect(codeOf(() => createWallet(freshVault(), { id: "w-x", name: "cash", now: NOW }))).toBe(
      "ALREADY_EXISTS",
    );
  });

  it("rejects an empty name", () => {
    expect(codeOf(() => createWallet(freshVault(), { id: "w-x", name: "   ", now: NOW }))).toBe(
      "INVALID_INPUT",
    );
  });

  it("renames, allowing the wallet's own name", () => {
    const state = freshVault();
    expect(renameWallet(state, "id-2", "CASH").name).toBe("CASH");
  });

  it("archives while another wallet stays active", () => {
    const state = withWallet(freshVault(), "w-bank", "Bank");
    expect(archiveWallet(state, "w-bank").archived).toBe(true);
  });

  it("keeps at least one active wallet", () => {
    expect(codeOf(() => archiveWallet(freshVault(), "id-2"))).toBe("INVALID_STATE");
  });

  it("frees an archived wallet's name", () => {
    const state = withWallet(freshVault(), "w-bank", "Bank");
    const archived = archiveWallet(state, "w-bank");
    const next = { ...state, wallets: state.wallets.map((w) => (w.id === "w-bank" ? archived : w)) };
    expect(createWallet(next, { id: "w-bank-2", name: "Bank", now: NOW }).name).toBe("Bank");
  });

  it("reports unknown wallets as NOT_FOUND", () => {
    expect(codeOf(() => requireWallet(freshVault(), "nope"))).toBe("NOT_FOUND");
  });
});

describe("cash flows", () => {
  it("creates a flow without the system marker", () => {
    const flow = createFlow(freshVault(), { id: "f-food", name: "Groceries", now: NOW });
    expect(flow.system).toBeUndefined();
    expect(flow.balance).toEqual({ minor: "0", currency: "EUR" });
  });

  it("protects the Unallocated flow", () => {
    const state = freshVault();
    expect(codeOf(() => renameFlow(state, "id-3", "Spare"))).toBe("INVALID_STATE");
    expect(codeOf(() => archiveFlow(state, "id-3"))).toBe("INVALID_STATE");
  });

  it("archives a regular flow once", () => {
    const state = freshVault();
    const flow = createFlow(state, { id: "f-food", name: "Groceries", now: NOW });
    const next = { ...state, flows: [...state.flows, flow] };
    const archived = archiveFlow(next, "f-food");
    expect(archived.archived).toBe(true);
    expect(codeOf(() => assertActive(archived, "flow"))).toBe("INVALID_STATE");
    const after = { ...next, flows: next.flows.map((f) => (f.id === "f-food" ? archived : f)) };
    expect(codeOf(() => archiveFlow(after, "f-food"))).toBe("INVALID_STATE");
  });

  it("reports unknown flows as NOT_FOUND", () => {
    expect(codeOf(() => requireFlow(freshVault(), "nope"))).toBe("NOT_FOUND");
  });
});

describe("flow caps", () => {
  const eur = (minor: string) => ({ minor, currency: "EUR" });

  function creditTo(flowId: string, minor: string): TransactionRecord {
    return {
      id: `t-${minor}`,
      kind: "income",
      vaultId: "id-1",
      walletId: "id-2",
      flowId,
      amount: eur(minor),
      occurredAt: NOW,
      recordedAt: NOW,
      createdBy: "alice",
      state: "posted",
      legs: [
        { target: { kind: "wallet", id: "id-2" }, delta: minor },
        { target: { kind: "flow", id: flowId }, delta: minor },
      ],
    };
  }

  it("creates a flow with a net cap", () => {
    const flow = createFlow(freshVault(), {
      id: "f-trip",
      name: "Trip",
      now: NOW,
      cap: { mode: "net", limit: eur("50000") },
    });
    expect(flow.cap).toEqual({ mode: "net", limit: eur("50000") });
  });

  it("starts an income cap from the flow's posted credits", () => {
    const state = freshVault();
    const flow = createFlow(state, { id: "f-trip", name: "Trip", now: NOW });
    const capped = setFlowCap(state, flow, { mode: "income", limit: eur("50000") }, [
      creditTo("f-trip", "1200"),
      creditTo("id-3", "900"),
    ]);
    expect(capped.cap).toEqual({ mode: "income", limit: eur("50000"), incomeTotal: eur("1200") });
  });

  it("rejects a limit the flow already exceeds", () => {
    const state = freshVault();
    const flow = { ...createFlow(state, { id: "f-trip", name: "Trip", now: NOW }), balance: eur("700") };
    expect(codeOf(() => setFlowCap(state, flow, { mode: "net", limit: eur("500") }, []))).toBe(
      "INVALID_AMOUNT",
    );
  });

  it("validates the limit", () => {
    const state = freshVault();
    const flow = createFlow(state, { id: "f-trip", name: "Trip", now: NOW });
    expect(codeOf(() => setFlowCap(state, flow, { mode: "net", limit: eur("0") }, []))).toBe(
      "INVALID_AMOUNT",
    );
    expect(
      codeOf(() => setFlowCap(state, flow, { mode: "net", limit: { minor: "100", currency: "USD" } }, [])),
    ).toBe("CURRENCY_MISMATCH");
  });

  it("removes a cap with null", () => {
    const state = freshVault();
    const flow = createFlow(state, {
      id: "f-trip",
      name: "Trip",
      now: NOW,
      cap: { mode: "net", limit: eur("500") },
    });
    expect(setFlowCap(state, flow, null, []).cap).toBeUndefined();
  });

  it("never caps the Unallocated flow", () => {
    const state = freshVault();
    const unallocated = requireFlow(state, "id-3");
    expect(codeOf(() => setFlowCap(state, unallocated, { mode: "net", limit: eur("500") }, []))).toBe(
      "INVALID_STATE",
    );
  });
});
