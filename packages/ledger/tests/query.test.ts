/**
 * Tests for transaction filtering and ordering.
 */

import { describe, it, expect } from "vitest";
import { filterTransactions, inWindow, transactionSortKey } from "../src/query.js";
import { LedgerError } from "../src/types.js";
import { tx, voided } from "./fixtures.js";

const salary = tx("t-1", { kind: "income", walletId: "w-1", flowId: "f-1" }, 10000n, "2026-03-01T09:00:00.000Z");
const groceries = tx("t-2", { kind: "expense", walletId: "w-1", flowId: "f-2" }, 2500n, "2026-03-05T18:30:00.000Z");
const move = tx("t-3", { kind: "transfer_wallet", fromWalletId: "w-1", toWalletId: "w-2" }, 100n, "2026-03-10T00:00:00.000Z");
const cancelled = voided(tx("t-4", { kind: "expense", walletId: "w-2" }, 50n, "2026-03-12T00:00:00.000Z"));
const all = [salary, groceries, move, cancelled];

const ids = (list: readonly { id: string }[]): string[] => list.map((t) => t.id);

describe("filterTransactions", () => {
  it("excludes voided and orders newest first by default", () => {
    expect(ids(filterTransactions(all))).toEqual(["t-3", "t-2", "t-1"]);
  });

  it("includes voided on request", () => {
    expect(ids(filterTransactions(all, { includeVoided: true }))).toEqual(["t-4", "t-3", "t-2", "t-1"]);
  });

  it("drops transfers when asked", () => {
    expect(ids(filterTransactions(all, { includeTransfers: false }))).toEqual(["t-2", "t-1"]);
  });

  it("applies a kind allow-list", () => {
    expect(ids(filterTransactions(all, { kinds: ["income"] }))).toEqual(["t-1"]);
    expect(ids(filterTransactions(all, { kinds: ["transfer_wallet"] }))).toEqual(["t-3"]);
  });

  it("treats from as inclusive and to as exclusive", () => {
    const window = { from: "2026-03-05T18:30:00.000Z", to: "2026-03-10T00:00:00.000Z" };
    expect(ids(filterTransactions(all, window))).toEqual(["t-2"]);
  });

  it("filters by wallet and by flow", () => {
    expect(ids(filterTransactions(all, { walletId: "w-2", includeVoided: true }))).toEqual(["t-4", "t-3"]);
    expect(ids(filterTransactions(all, { flowId: "f-1" }))).toEqual(["t-1"]);
  });

  it("rejects an empty or inverted window", () => {
    expect(() =>
      filterTransactions(all, { from: "2026-03-02T00:00:00.000Z", to: "2026-03-02T00:00:00.000Z" }),
    ).toThrow(LedgerError);
    expect(() => filterTransactions(all, { from: "yesterday" })).toThrow(/Invalid from timestamp/);
  });

  it("breaks timestamp ties by id", () => {
    const a = tx("t-a", { kind: "income", walletId: "w-1" }, 1n, "2026-04-01T00:00:00.000Z");
    const b = tx("t-b", { kind: "income", walletId: "w-1" }, 1n, "2026-04-01T00:00:00.000Z");
    expect(ids(filterTransactions([a, b]))).toEqual(["t-b", "t-a"]);
  });
});

describe("inWindow", () => {
  it("treats open bounds as unbounded", () => {
    expect(inWindow("1999-01-01T00:00:00.000Z", {})).toBe(true);
    expect(inWindow("2026-01-01T00:00:00.000Z", { to: "2026-01-01T00:00:00.000Z" })).toBe(false);
  });
});

describe("transactionSortKey", () => {
  it("joins timestamp and id", () => {
    expect(transactionSortKey(salary)).toBe("2026-03-01T09:00:00.000Z|t-1");
  });
});
