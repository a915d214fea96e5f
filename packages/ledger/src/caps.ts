/**
 * @coffer/ledger — Cash flow caps.
 *
 * A capped flow rejects any movement that would raise its capped figure
 * above the limit: the balance for `net` caps, the running sum of
 * credits for `income` caps. Movements that lower the figure always pass.
 */

import type { CashFlowRecord, Leg, Money, TransactionRecord } from "@coffer/types";
import { LedgerError } from "./types.js";
import {
  addMoney,
  compareMoney,
  isPositive,
  moneyValue,
  parseMinor,
  subtractMoney,
  toMoney,
} from "./money-math.js";
import { formatMajor } from "./currency.js";

/** Whether the legs are being posted or reversed by a void. */
export type CapDirection = "post" | "void";

function flowDelta(legs: readonly Leg[], flowId: string): bigint {
  let total = 0n;
  for (const l of legs) {
    if (l.target.kind === "flow" && l.target.id === flowId) total += parseMinor(l.delta);
  }
  return total;
}

/**
 * What `legs` credit to one flow, ignoring debits.
 */
export function incomeContribution(legs: readonly Leg[], flowId: string): bigint {
  let total = 0n;
  for (const l of legs) {
    if (l.target.kind !== "flow" || l.target.id !== flowId) continue;
    const delta = parseMinor(l.delta);
    if (delta > 0n) total += delta;
  }
  return total;
}

/**
 * Everything posted transactions have credited to a flow.
 */
export function computeIncomeTotal(
  flowId: string,
  transactions: readonly TransactionRecord[],
): bigint {
  let total = 0n;
  for (const tx of transactions) {
    if (tx.state === "posted") total += incomeContribution(tx.legs, flowId);
  }
  return total;
}

export function capExceeded(flow: CashFlowRecord, limit: Money): LedgerError {
  return new LedgerError(
    "INVALID_AMOUNT",
    `Cash flow "${flow.name}" would exceed its cap of ${formatMajor(moneyValue(limit), limit.currency)} ${limit.currency}`,
    { entity: "flow", id: flow.id, field: "cap" },
  );
}

/**
 * Check the caps of flows a movement changed and advance income totals.
 *
 * `flows` carry their balances after the movement; `legs` are the
 * transaction's own legs, not their reversal.
 *
 * @throws LedgerError INVALID_AMOUNT naming the first flow pushed over its cap
 */
export function enforceFlowCaps(
  flows: readonly CashFlowRecord[],
  legs: readonly Leg[],
  direction: CapDirection,
): readonly CashFlowRecord[] {
  return flows.map((flow): CashFlowRecord => {
    const cap = flow.cap;
    if (cap === undefined) return flow;

    switch (cap.mode) {
      case "net": {
        const delta = flowDelta(legs, flow.id);
        const raised = direction === "post" ? delta > 0n : delta < 0n;
        if (raised && compareMoney(flow.balance, cap.limit) > 0) {
          throw capExceeded(flow, cap.limit);
        }
        return flow;
      }
      case "income": {
        const contribution = toMoney(incomeContribution(legs, flow.id), cap.incomeTotal.currency);
        if (direction === "void") {
          return { ...flow, cap: { ...cap, incomeTotal: subtractMoney(cap.incomeTotal, contribution) } };
        }
        const incomeTotal = addMoney(cap.incomeTotal, contribution);
        if (isPositive(contribution) && compareMoney(incomeTotal, cap.limit) > 0) {
          throw capExceeded(flow, cap.limit);
        }
        return { ...flow, cap: { ...cap, incomeTotal } };
      }
    }
  });
}
