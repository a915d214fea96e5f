/**
 * @coffer/ledger — Transaction queries.
 *
 * Filtering and ordering of a vault's transactions. Results are
 * newest first: `occurredAt` descending, then id descending.
 */

import type { TransactionKind, TransactionRecord } from "@coffer/types";
import type { TransactionFilter } from "./types.js";
import { LedgerError } from "./types.js";
import { touches } from "./legs.js";

const TRANSFER_KINDS: ReadonlySet<TransactionKind> = new Set([
  "transfer_wallet",
  "transfer_flow",
]);

/**
 * Sort key giving a total order over transactions.
 */
export function transactionSortKey(tx: TransactionRecord): string {
  return `${tx.occurredAt}|${tx.id}`;
}

/**
 * Validate a filter's window.
 */
export function validateFilter(filter: TransactionFilter): void {
  for (const field of ["from", "to"] as const) {
    const value = filter[field];
    if (value !== undefined && Number.isNaN(Date.parse(value))) {
      throw new LedgerError("INVALID_INPUT", `Invalid ${field} timestamp: "${value}"`, {
        field,
      });
    }
  }
  if (
    filter.from !== undefined &&
    filter.to !== undefined &&
    Date.parse(filter.from) >= Date.parse(filter.to)
  ) {
    throw new LedgerError("INVALID_INPUT", "`from` must be earlier than `to`", {
      field: "from",
    });
  }
}

/**
 * Whether `at` falls inside the half-open window `[from, to)`.
 */
export function inWindow(
  at: string,
  window: { readonly from?: string | undefined; readonly to?: string | undefined },
): boolean {
  const t = Date.parse(at);
  if (window.from !== undefined && t < Date.parse(window.from)) return false;
  if (window.to !== undefined && t >= Date.parse(window.to)) return false;
  return true;
}

/**
 * Apply a filter and order the result newest first.
 */
export function filterTransactions(
  transactions: readonly TransactionRecord[],
  filter: TransactionFilter = {},
): readonly TransactionRecord[] {
  validateFilter(filter);

  const includeVoided = filter.includeVoided ?? false;
  const includeTransfers = filter.includeTransfers ?? true;
  const kinds = filter.kinds !== undefined ? new Set(filter.kinds) : undefined;

  const result = transactions.filter((tx) => {
    if (!includeVoided && tx.state === "voided") return false;
    if (kinds !== undefined && !kinds.has(tx.kind)) return false;
    if (!includeTransfers && TRANSFER_KINDS.has(tx.kind)) return false;
    if (filter.walletId !== undefined && !touches(tx.legs, { kind: "wallet", id: filter.walletId })) {
      return false;
    }
    if (filter.flowId !== undefined && !touches(tx.legs, { kind: "flow", id: filter.flowId })) {
      return false;
    }
    return inWindow(tx.occurredAt, filter);
  });

  return result.sort((a, b) => {
    const ka = transactionSortKey(a);
    const kb = transactionSortKey(b);
    if (ka < kb) return 1;
    if (ka > kb) return -1;
    return 0;
  });
}
