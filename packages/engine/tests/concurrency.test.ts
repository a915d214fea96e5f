/**
 * Tests for the engine's commit path under failure and contention.
 *
 * Verifies:
 * - A failed commit leaves balances untouched and surfaces STORE_FAILURE
 * - Version conflicts are re-planned up to the retry limit
 * - Concurrent commands on one vault are serialized
 */

import { describe, it, expect } from "vitest";
import pino from "pino";
import { LedgerError } from "@coffer/ledger";
import { StoreError } from "@coffer/store";
import {
  CASH,
  FailingStore,
  NOW,
  RacingStore,
  VAULT,
  balances,
  createEngine,
  errorCode,
  usd,
} from "./fixtures.js";

describe("store failures", () => {
  it("leaves balances unchanged when a transfer cannot be committed", async () => {
    const store = new FailingStore({ now: () => NOW });
    const { engine } = createEngine(store);
    await engine.createVault("alice");
    const savings = await engine.createWallet("alice", VAULT, "Savings");
    await engine.recordIncome("alice", { vaultId: VAULT, walletId: CASH, amount: usd("1000") });

    store.failing = true;
    let failure: unknown;
    try {
      await engine.transferWallet("alice", {
        vaultId: VAULT,
        fromWalletId: CASH,
        toWalletId: savings.id,
        amount: usd("400"),
      });
    } catch (err) {
      failure = err;
    }
    store.failing = false;

    expect(failure).toBeInstanceOf(LedgerError);
    if (failure instanceof LedgerError) {
      expect(failure.code).toBe("STORE_FAILURE");
      expect(failure.cause).toBeInstanceOf(StoreError);
    }
    expect(await balances(engine)).toMatchObject({ [CASH]: "1000", [savings.id]: "0" });
    expect(await engine.listTransactions("alice", VAULT)).toHaveLength(1);
  });

  it("passes domain errors through untouched", async () => {
    const store = new FailingStore({ now: () => NOW });
    const { engine } = createEngine(store);
    await engine.createVault("alice");
    store.failing = true;

    expect(await errorCode(engine.recordIncome("alice", { vaultId: VAULT, walletId: CASH, amount: usd("0") }))).toBe(
      "INVALID_AMOUNT",
    );
  });
});

describe("version conflicts", () => {
  it("re-plans from fresh state and commits once", async () => {
    const store = new RacingStore({ now: () => NOW });
    const lines: string[] = [];
    const logger = pino({ level: "warn" }, { write: (line: string) => lines.push(line) });
    const { engine } = createEngine(store, { logger });
    await engine.createVault("alice");

    store.conflicts = 2;
    await engine.recordIncome("alice", { vaultId: VAULT, walletId: CASH, amount: usd("100") });

    expect(store.interleaved).toBe(2);
    expect(await engine.listTransactions("alice", VAULT)).toHaveLength(1);
    expect(await balances(engine)).toMatchObject({ [CASH]: "100" });
    expect((await engine.getVault("alice", VAULT)).version).toBe(4);

    const warnings = lines.map((line): unknown => JSON.parse(line));
    expect(warnings).toHaveLength(2);
    expect(warnings[0]).toMatchObject({ level: 40, msg: "version conflict, re-planning", attempt: 1 });
  });

  it("gives up after the retry limit", async () => {
    const store = new RacingStore({ now: () => NOW });
    const { engine } = createEngine(store, { maxConflictRetries: 3 });
    await engine.createVault("alice");

    store.conflicts = 4;
    expect(
      await errorCode(engine.recordIncome("alice", { vaultId: VAULT, walletId: CASH, amount: usd("100") })),
    ).toBe("STORE_FAILURE");
    expect(store.interleaved).toBe(4);
    expect(await balances(engine)).toMatchObject({ [CASH]: "0" });
  });
});

describe("serialization", () => {
  it("applies concurrent transfers one at a time", async () => {
    const { engine, store } = createEngine();
    await engine.createVault("alice");
    const savings = await engine.createWallet("alice", VAULT, "Savings");
    await engine.recordIncome("alice", { vaultId: VAULT, walletId: CASH, amount: usd("1000") });

    await Promise.all(
      Array.from({ length: 10 }, () =>
        engine.transferWallet("alice", {
          vaultId: VAULT,
          fromWalletId: CASH,
          toWalletId: savings.id,
          amount: usd("100"),
        }),
      ),
    );

    expect(await balances(engine)).toMatchObject({ [CASH]: "0", [savings.id]: "1000" });
    expect((await engine.getVault("alice", VAULT)).version).toBe(13);
    expect((await store.verifyIntegrity()).valid).toBe(true);
    expect(await engine.auditVault("alice", VAULT)).toEqual([]);
  });

  it("allows only as many concurrent refunds as the remainder covers", async () => {
    const { engine } = createEngine();
    await engine.createVault("alice");
    const original = await engine.recordIncome("alice", { vaultId: VAULT, walletId: CASH, amount: usd("300") });

    const results = await Promise.allSettled(
      Array.from({ length: 5 }, () =>
        engine.recordRefund("alice", { transactionId: original.id, amount: usd("100") }),
      ),
    );

    expect(results.filter((r) => r.status === "fulfilled")).toHaveLength(3);
    expect(results.filter((r) => r.status === "rejected")).toHaveLength(2);
    expect(await balances(engine)).toMatchObject({ [CASH]: "0" });
  });
});
