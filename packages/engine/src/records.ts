/**
 * Assembly of transaction records from a planned movement.
 */

import type { Leg, Money, TransactionRecord } from "@coffer/types";
import type { MovementSpec } from "@coffer/ledger";

export interface TransactionHeaderInput {
  readonly id: string;
  readonly vaultId: string;
  readonly amount: Money;
  readonly occurredAt: string;
  readonly recordedAt: string;
  readonly createdBy: string;
  readonly note?: string | undefined;
  readonly category?: string | undefined;
  readonly categoryId?: string | undefined;
  readonly legs: readonly Leg[];
}

/** A category as a transaction carries it. */
export interface CategoryRef {
  readonly id: string;
  readonly name: string;
}

/**
 * Build the posted record for a movement. One case per kind.
 */
export function buildTransaction(
  spec: MovementSpec,
  header: TransactionHeaderInput,
): TransactionRecord {
  const base = { ...header, state: "posted" as const };

  switch (spec.kind) {
    case "income":
      return { ...base, kind: "income", walletId: spec.walletId, flowId: spec.flowId };
    case "expense":
      return { ...base, kind: "expense", walletId: spec.walletId, flowId: spec.flowId };
    case "refund":
      return { ...base, kind: "refund", refundOf: spec.original.id };
    case "transfer_wallet":
      return {
        ...base,
        kind: "transfer_wallet",
        fromWalletId: spec.fromWalletId,
        toWalletId: spec.toWalletId,
      };
    case "transfer_flow":
      return {
        ...base,
        kind: "transfer_flow",
        fromFlowId: spec.fromFlowId,
        toFlowId: spec.toFlowId,
      };
  }
}

/**
 * Apply a metadata change; `null` clears, `undefined` keeps.
 */
export function withMetadata(
  record: TransactionRecord,
  change: {
    readonly note?: string | null | undefined;
    readonly category?: CategoryRef | null | undefined;
  },
): TransactionRecord {
  const note = change.note === undefined ? record.note : (change.note ?? undefined);
  if (change.category === undefined) return { ...record, note };
  return {
    ...record,
    note,
    category: change.category?.name,
    categoryId: change.category?.id,
  };
}
