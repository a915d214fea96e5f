/**
 * Tests for incremental balance maintenance and drift detection.
 */

import { describe, it, expect } from "vitest";
import { applyLegs, computeBalances, findBalanceDrift } from "../src/balance-calculator.js";
import { planLegs, reverseLegs } from "../src/legs.js";
import { LedgerError } from "../src/types.js";
import { flow, tx, vaultState, voided, wallet } from "./fixtures.js";

describe("applyLegs", () => {
  const state = vaultState([wallet("w-1", "1000"), wallet("w-2")], [flow("f-1", "-50")]);

  it("returns only changed holders with new balances", () => {
    const applied = applyLegs(state, planLegs({ kind: "expense", walletId: "w-1", flowId: "f-1" }, 200n));
    expect(applied.wallets.map((w) => [w.id, w.balance.minor])).toEqual([["w-1", "800"]]);
    expect(applied.flows.map((f) => [f.id, f.balance.minor])).toEqual([["f-1", "-250"]]);
  });

  it("does not mutate the input state", () => {
    applyLegs(state, planLegs({ kind: "income", walletId: "w-2" }, 5n));
    expect(state.wallets[1]?.balance.minor).toBe("0");
  });

  it("nets several legs on the same holder", () => {
    const applied = applyLegs(state, [
      { target: { kind: "wallet", id: "w-1" }, delta: "10" },
      { target: { kind: "wallet", id: "w-1" }, delta: "-4" },
    ]);
    expect(applied.wallets[0]?.balance.minor).toBe("1006");
  });

  it("posting then reversing restores balances", () => {
    const legs = planLegs({ kind: "transfer_wallet", fromWalletId: "w-1", toWalletId: "w-2" }, 300n);
    const posted = applyLegs(state, legs);
    const afterPost = vaultState(
      state.wallets.map((w) => posted.wallets.find((p) => p.id === w.id) ?? w),
      state.flows,
    );
    const reverted = applyLegs(afterPost, reverseLegs(legs));
    expect(reverted.wallets.map((w) => w.balance.minor)).toEqual(["1000", "0"]);
  });

  it("fails with NOT_FOUND for an unknown holder", () => {
    expect(() => applyLegs(state, planLegs({ kind: "income", walletId: "w-404" }, 1n))).toThrow(
      LedgerError,
    );
  });
});

describe("computeBalances", () => {
  it("ignores voided transactions", () => {
    const income = tx("t-1", { kind: "income", walletId: "w-1" }, 10000n);
    const expense = voided(tx("t-2", { kind: "expense", walletId: "w-1" }, 2500n));
    expect(computeBalances([income, expense]).get("wallet::w-1")).toBe(10000n);
  });
});

describe("findBalanceDrift", () => {
  const history = [
    tx("t-1", { kind: "income", walletId: "w-1", flowId: "f-1" }, 900n),
    tx("t-2", { kind: "transfer_wallet", fromWalletId: "w-1", toWalletId: "w-2" }, 100n),
  ];

  it("reports nothing when balances match history", () => {
    const state = vaultState([wallet("w-1", "800"), wallet("w-2", "100")], [flow("f-1", "900")]);
    expect(findBalanceDrift(state, history)).toEqual([]);
  });

  it("reports holders that disagree", () => {
    const state = vaultState([wallet("w-1", "800"), wallet("w-2", "0")], [flow("f-1", "900")]);
    expect(findBalanceDrift(state, history)).toEqual([
      { target: "wallet", id: "w-2", stored: "0", computed: "100" },
    ]);
  });
});
