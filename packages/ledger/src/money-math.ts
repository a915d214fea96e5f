/**
 * @coffer/ledger — Deterministic monetary arithmetic.
 *
 * Money carries integer minor units as a string; all arithmetic
 * converts to bigint and back.
 *
 * Rules:
 * - No floating-point operations
 * - Currency must match for all binary operations
 * - Amounts must be canonical integer strings
 */

import type { CurrencyCode, Money } from "@coffer/types";
import { isMinorUnits } from "@coffer/types";
import { LedgerError } from "./types.js";

// ─── Conversion ──────────────────────────────────────────────────────────

/**
 * Parse a minor-unit string into a bigint.
 *
 * "1250" → 1250n, "-300" → -300n
 */
export function parseMinor(minor: string): bigint {
  if (!isMinorUnits(minor)) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Invalid minor-unit amount: "${String(minor)}"`,
      { field: "amount" },
    );
  }
  return BigInt(minor);
}

/**
 * Convert a bigint back to a minor-unit string.
 */
export function formatMinor(value: bigint): string {
  return value.toString();
}

export function toMoney(value: bigint, currency: CurrencyCode): Money {
  return { minor: formatMinor(value), currency };
}

export function moneyValue(money: Money): bigint {
  return parseMinor(money.minor);
}

// ─── Validation ──────────────────────────────────────────────────────────

/**
 * Validate that a Money object is well-formed.
 */
export function validateMoney(money: Money): void {
  if (typeof money.currency !== "string" || money.currency.trim() === "") {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Money currency must be a non-empty string, got: "${String(money.currency)}"`,
      { field: "currency" },
    );
  }
  parseMinor(money.minor);
}

/**
 * Validate a transaction amount: well-formed and strictly positive.
 */
export function assertPositive(money: Money): bigint {
  validateMoney(money);
  if (!isPositive(money)) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Amount must be positive, got ${money.minor}`,
      { field: "amount" },
    );
  }
  return moneyValue(money);
}

/**
 * Assert two Money values share a currency.
 */
export function assertSameCurrency(a: Money, b: Money): void {
  if (a.currency !== b.currency) {
    throw new LedgerError(
      "CURRENCY_MISMATCH",
      `Cannot operate on different currencies: "${a.currency}" vs "${b.currency}"`,
      { entity: "currency", field: "currency" },
    );
  }
}

// ─── Arithmetic ──────────────────────────────────────────────────────────

export function addMoney(a: Money, b: Money): Money {
  assertSameCurrency(a, b);
  return toMoney(moneyValue(a) + moneyValue(b), a.currency);
}

export function subtractMoney(a: Money, b: Money): Money {
  assertSameCurrency(a, b);
  return toMoney(moneyValue(a) - moneyValue(b), a.currency);
}

/**
 * Add a signed minor-unit delta to a Money value.
 */
export function applyDelta(money: Money, delta: bigint): Money {
  return toMoney(moneyValue(money) + delta, money.currency);
}

/**
 * Sum a list of Money values. Empty input yields zero in `currency`.
 */
export function sumMoney(values: readonly Money[], currency: CurrencyCode): Money {
  let total = 0n;
  for (const value of values) {
    if (value.currency !== currency) {
      throw new LedgerError(
        "CURRENCY_MISMATCH",
        `Cannot sum "${value.currency}" into "${currency}"`,
        { entity: "currency", field: "currency" },
      );
    }
    total += moneyValue(value);
  }
  return toMoney(total, currency);
}

// ─── Predicates ──────────────────────────────────────────────────────────

export function isPositive(money: Money): boolean {
  return moneyValue(money) > 0n;
}

export function zeroMoney(currency: CurrencyCode): Money {
  return { minor: "0", currency };
}

/**
 * Compare two Money values. Returns -1, 0, or 1.
 */
export function compareMoney(a: Money, b: Money): -1 | 0 | 1 {
  assertSameCurrency(a, b);
  const va = moneyValue(a);
  const vb = moneyValue(b);
  if (va < vb) return -1;
  if (va > vb) return 1;
  return 0;
}
