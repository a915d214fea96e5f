/**
 * Tests for minor-unit money arithmetic.
 */

import { describe, it, expect } from "vitest";
import type { Money } from "@coffer/types";
import {
  parseMinor,
  formatMinor,
  validateMoney,
  assertPositive,
  assertSameCurrency,
  addMoney,
  subtractMoney,
  applyDelta,
  sumMoney,
  isPositive,
  zeroMoney,
  compareMoney,
} from "../src/money-math.js";
import { LedgerError } from "../src/types.js";

// ─── Helpers ─────────────────────────────────────────────────────────────

function money(minor: string, currency = "EUR"): Money {
  return { minor, currency };
}

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    if (err instanceof LedgerError) return err.code;
    throw err;
  }
  return undefined;
}

// ─── parseMinor / formatMinor ────────────────────────────────────────────

describe("parseMinor", () => {
  it("parses positive and negative integers", () => {
    expect(parseMinor("1250")).toBe(1250n);
    expect(parseMinor("-300")).toBe(-300n);
    expect(parseMinor("0")).toBe(0n);
  });

  it("handles values beyond Number.MAX_SAFE_INTEGER", () => {
    expect(parseMinor("90071992547409930")).toBe(90071992547409930n);
  });

  it("rejects decimal strings", () => {
    expect(codeOf(() => parseMinor("12.50"))).toBe("INVALID_AMOUNT");
  });

  it("rejects whitespace and empty input", () => {
    expect(codeOf(() => parseMinor(" 1"))).toBe("INVALID_AMOUNT");
    expect(codeOf(() => parseMinor(""))).toBe("INVALID_AMOUNT");
  });
});

describe("formatMinor", () => {
  it("formats bigint as integer string", () => {
    expect(formatMinor(-42n)).toBe("-42");
    expect(formatMinor(0n)).toBe("0");
  });
});

// ─── Validation ──────────────────────────────────────────────────────────

describe("validateMoney", () => {
  it("accepts well-formed money", () => {
    expect(() => validateMoney(money("100"))).not.toThrow();
  });

  it("rejects an empty currency", () => {
    expect(codeOf(() => validateMoney(money("100", "")))).toBe("INVALID_AMOUNT");
  });
});

describe("assertPositive", () => {
  it("returns the value of a positive amount", () => {
    expect(assertPositive(money("2500"))).toBe(2500n);
  });

  it("rejects zero and negative amounts", () => {
    expect(codeOf(() => assertPositive(money("0")))).toBe("INVALID_AMOUNT");
    expect(codeOf(() => assertPositive(money("-1")))).toBe("INVALID_AMOUNT");
  });

  it("points at the amount field", () => {
    try {
      assertPositive(money("0"));
    } catch (err) {
      expect(err).toBeInstanceOf(LedgerError);
      if (err instanceof LedgerError) {
        expect(err.context.field).toBe("amount");
      }
    }
  });
});

describe("assertSameCurrency", () => {
  it("rejects different currencies", () => {
    expect(codeOf(() => assertSameCurrency(money("1", "EUR"), money("1", "USD")))).toBe(
      "CURRENCY_MISMATCH",
    );
  });
});

// ─── Arithmetic ──────────────────────────────────────────────────────────

describe("arithmetic", () => {
  it("adds and subtracts", () => {
    expect(addMoney(money("100"), money("250"))).toEqual(money("350"));
    expect(subtractMoney(money("100"), money("250"))).toEqual(money("-150"));
  });

  it("rejects cross-currency addition", () => {
    expect(codeOf(() => addMoney(money("1", "EUR"), money("1", "GBP")))).toBe("CURRENCY_MISMATCH");
  });

  it("applies signed deltas", () => {
    expect(applyDelta(money("7500"), -2500n)).toEqual(money("5000"));
  });

  it("sums a list, with zero for empty input", () => {
    expect(sumMoney([money("1"), money("2"), money("-5")], "EUR")).toEqual(money("-2"));
    expect(sumMoney([], "JPY")).toEqual(money("0", "JPY"));
  });

  it("rejects summing a foreign currency", () => {
    expect(codeOf(() => sumMoney([money("1", "USD")], "EUR"))).toBe("CURRENCY_MISMATCH");
  });
});

// ─── Predicates ──────────────────────────────────────────────────────────

describe("predicates", () => {
  it("classifies sign", () => {
    expect(isPositive(money("1"))).toBe(true);
    expect(isPositive(zeroMoney("EUR"))).toBe(false);
    expect(isPositive(money("-1"))).toBe(false);
  });

  it("compares", () => {
    expect(compareMoney(money("1"), money("2"))).toBe(-1);
    expect(compareMoney(money("2"), money("2"))).toBe(0);
    expect(compareMoney(money("3"), money("2"))).toBe(1);
  });
});
