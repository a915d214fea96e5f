/**
 * Tests for the statistics aggregator.
 */

import { describe, it, expect } from "vitest";
import { computeStatistics } from "../src/statistics.js";
import { flow, tx, vaultState, voided, wallet } from "./fixtures.js";

const state = vaultState(
  [wallet("w-1", "7000", "Cash"), wallet("w-2", "500", "Bank")],
  [flow("f-1", "9500", "Salary"), flow("f-2", "-2500", "Groceries")],
);

const income = tx("t-1", { kind: "income", walletId: "w-1", flowId: "f-1" }, 10000n, "2026-03-01T00:00:00.000Z");
const expense = tx("t-2", { kind: "expense", walletId: "w-1", flowId: "f-2" }, 2500n, "2026-03-02T00:00:00.000Z");
const voidedExpense = voided(tx("t-3", { kind: "expense", walletId: "w-1", flowId: "f-2" }, 2500n, "2026-03-03T00:00:00.000Z"));
const transfer = tx("t-4", { kind: "transfer_wallet", fromWalletId: "w-1", toWalletId: "w-2" }, 500n, "2026-04-01T00:00:00.000Z");
const refund = tx("t-5", { kind: "refund", original: income }, 500n, "2026-04-02T00:00:00.000Z");
const history = [income, expense, voidedExpense, transfer, refund];

describe("computeStatistics", () => {
  it("counts only posted transactions in totals", () => {
    const stats = computeStatistics(state, [expense, voidedExpense]);
    expect(stats.totals.expenses).toEqual({ minor: "2500", currency: "USD" });
    expect(stats.transactionCount).toBe(1);
  });

  it("rolls up vault totals", () => {
    const stats = computeStatistics(state, history);
    expect(stats.totals).toEqual({
      income: { minor: "10000", currency: "USD" },
      expenses: { minor: "2500", currency: "USD" },
      refunds: { minor: "500", currency: "USD" },
      net: { minor: "7000", currency: "USD" },
      balance: { minor: "7500", currency: "USD" },
    });
    expect(stats.transactionCount).toBe(4);
  });

  it("reports per-wallet inflow and outflow", () => {
    const stats = computeStatistics(state, history);
    const cash = stats.wallets.find((w) => w.id === "w-1");
    expect(cash).toEqual({
      id: "w-1",
      name: "Cash",
      archived: false,
      balance: { minor: "7000", currency: "USD" },
      inflow: { minor: "10000", currency: "USD" },
      outflow: { minor: "3500", currency: "USD" },
      net: { minor: "6500", currency: "USD" },
      transactionCount: 4,
    });
  });

  it("reports per-flow totals", () => {
    const stats = computeStatistics(state, history);
    expect(stats.flows.map((f) => [f.id, f.net.minor, f.transactionCount])).toEqual([
      ["f-1", "9500", 2],
      ["f-2", "-2500", 1],
    ]);
  });

  it("restricts to a period", () => {
    const stats = computeStatistics(state, history, {
      from: "2026-04-01T00:00:00.000Z",
      to: "2026-05-01T00:00:00.000Z",
    });
    expect(stats.period).toEqual({ from: "2026-04-01T00:00:00.000Z", to: "2026-05-01T00:00:00.000Z" });
    expect(stats.totals.income.minor).toBe("0");
    expect(stats.totals.refunds.minor).toBe("500");
    expect(stats.transactionCount).toBe(2);
    expect(stats.wallets.find((w) => w.id === "w-2")?.inflow.minor).toBe("500");
  });

  it("nets nothing for a view without wallets", () => {
    const flowView = { ...state, wallets: [], flows: [flow("f-2", "-2500", "Groceries")] };
    const stats = computeStatistics(flowView, [expense]);
    expect(stats.totals.expenses).toEqual({ minor: "2500", currency: "USD" });
    expect(stats.totals.net).toEqual({ minor: "0", currency: "USD" });
    expect(stats.totals.balance).toEqual({ minor: "0", currency: "USD" });
  });

  it("lists holders with no activity at zero", () => {
    const stats = computeStatistics(state, []);
    expect(stats.wallets.map((w) => w.transactionCount)).toEqual([0, 0]);
    expect(stats.totals.net.minor).toBe("0");
  });
});
