/**
 * @coffer/ledger — Refund accounting.
 *
 * The refundable remainder of a transaction is its amount minus the
 * amounts of posted refunds that reference it. Voiding a refund gives
 * its amount back to the remainder.
 */

import type { Money, RefundTransaction, TransactionRecord } from "@coffer/types";
import { LedgerError } from "./types.js";
import { moneyValue, subtractMoney, sumMoney } from "./money-math.js";

/**
 * Posted refunds that reference `originalId`.
 */
export function postedRefundsOf(
  originalId: string,
  transactions: readonly TransactionRecord[],
): readonly RefundTransaction[] {
  return transactions.filter(
    (tx): tx is RefundTransaction =>
      tx.kind === "refund" && tx.refundOf === originalId && tx.state === "posted",
  );
}

/**
 * Sum of the posted refunds of `original`.
 */
export function refundedAmount(
  original: TransactionRecord,
  transactions: readonly TransactionRecord[],
): Money {
  return sumMoney(
    postedRefundsOf(original.id, transactions).map((refund) => refund.amount),
    original.amount.currency,
  );
}

/**
 * Minor units of `original` that may still be refunded.
 */
export function refundRemainder(
  original: TransactionRecord,
  transactions: readonly TransactionRecord[],
): bigint {
  return moneyValue(subtractMoney(original.amount, refundedAmount(original, transactions)));
}

/**
 * Validate a refund of `amount` against `original`.
 *
 * @throws LedgerError INVALID_STATE if the original is voided or is itself a refund
 * @throws LedgerError INVALID_AMOUNT if `amount` exceeds the remainder
 */
export function assertRefundable(
  original: TransactionRecord,
  amount: bigint,
  transactions: readonly TransactionRecord[],
): void {
  if (original.state !== "posted") {
    throw new LedgerError(
      "INVALID_STATE",
      `Transaction ${original.id} is voided and cannot be refunded`,
      { entity: "transaction", id: original.id, field: "state" },
    );
  }
  if (original.kind === "refund") {
    throw new LedgerError(
      "INVALID_STATE",
      `Transaction ${original.id} is a refund and cannot be refunded`,
      { entity: "transaction", id: original.id, field: "kind" },
    );
  }

  const remainder = refundRemainder(original, transactions);
  if (amount > remainder) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Refund of ${amount.toString()} exceeds refundable remainder ${remainder.toString()} of ${original.id}`,
      { entity: "transaction", id: original.id, field: "amount" },
    );
  }
}
