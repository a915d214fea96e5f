/**
 * @coffer/ledger — Currency table and major-unit conversion.
 *
 * The table lives in currencies.json. Conversion between a
 * human-entered major amount ("12,50") and minor units (1250n)
 * is exact and rejects extra fraction digits.
 */

import type { CurrencyCode, CurrencyInfo } from "@coffer/types";
import currencyTable from "./currencies.json" with { type: "json" };
import { LedgerError } from "./types.js";

const CURRENCIES: ReadonlyMap<CurrencyCode, CurrencyInfo> = new Map(
  currencyTable.map((entry) => [entry.code, entry]),
);

const MAJOR_PATTERN = /^([+-])?(\d+)(?:[.,](\d+))?$/;

export function isSupportedCurrency(code: string): boolean {
  return CURRENCIES.has(code);
}

export function listCurrencies(): readonly CurrencyInfo[] {
  return [...CURRENCIES.values()];
}

/**
 * Look up a currency, failing with INVALID_INPUT for unknown codes.
 */
export function getCurrency(code: CurrencyCode): CurrencyInfo {
  const info = CURRENCIES.get(code);
  if (info === undefined) {
    throw new LedgerError("INVALID_INPUT", `Unsupported currency: "${code}"`, {
      entity: "currency",
      id: code,
      field: "currency",
    });
  }
  return info;
}

/**
 * Parse a major-unit amount into minor units.
 *
 * "12,50" EUR → 1250n
 * "-3" EUR → -300n
 * "1.005" EUR → INVALID_AMOUNT
 */
export function parseMajor(input: string, code: CurrencyCode): bigint {
  const { exponent } = getCurrency(code);
  const match = MAJOR_PATTERN.exec(input.trim());
  if (match === null) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount: "${input}"`, {
      field: "amount",
    });
  }

  const sign = match[1] === "-" ? -1n : 1n;
  const whole = match[2] ?? "0";
  const fraction = match[3] ?? "";

  if (fraction.length > exponent) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Amount "${input}" has ${String(fraction.length)} decimal places, but ${code} allows ${String(exponent)}`,
      { field: "amount" },
    );
  }

  return sign * BigInt(whole + fraction.padEnd(exponent, "0"));
}

/**
 * Format minor units as a major-unit string with "." separator.
 *
 * 1250n EUR → "12.50", -5n EUR → "-0.05", 300n JPY → "300"
 */
export function formatMajor(minor: bigint, code: CurrencyCode): string {
  const { exponent } = getCurrency(code);
  if (exponent === 0) {
    return minor.toString();
  }

  const negative = minor < 0n;
  const abs = negative ? -minor : minor;
  const digits = abs.toString().padStart(exponent + 1, "0");
  const result = `${digits.slice(0, digits.length - exponent)}.${digits.slice(digits.length - exponent)}`;

  return negative ? `-${result}` : result;
}
