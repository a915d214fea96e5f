/**
 * Monetary primitives.
 *
 * Rules:
 * - Amounts are integer minor units carried as base-10 strings
 * - Currency is always explicit and travels with the amount
 * - Arithmetic happens elsewhere (bigint), never on JS numbers
 */

/**
 * ISO 4217 currency code (e.g. "EUR", "USD", "JPY").
 */
export type CurrencyCode = string;

/**
 * A signed amount in the currency's smallest unit.
 *
 * `{ minor: "1250", currency: "EUR" }` is 12.50 EUR.
 */
export interface Money {
  /** Integer minor units, optional leading "-" */
  readonly minor: string;
  readonly currency: CurrencyCode;
}

/**
 * Currency metadata: how many minor units make one major unit.
 */
export interface CurrencyInfo {
  readonly code: CurrencyCode;
  /** Number of fraction digits (EUR = 2, JPY = 0) */
  readonly exponent: number;
  readonly name: string;
}

/**
 * Half-open time window `[from, to)`. Either bound may be open.
 */
export interface Period {
  readonly from?: string | undefined;
  readonly to?: string | undefined;
}
