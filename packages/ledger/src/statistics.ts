/**
 * @coffer/ledger — Statistics aggregation.
 *
 * Read-only roll-up of posted transactions per wallet, per flow and
 * for the vault as a whole. Voided transactions contribute nothing.
 */

import type {
  CashFlowRecord,
  Period,
  TransactionRecord,
  VaultState,
  WalletRecord,
} from "@coffer/types";
import type { HolderStatistics, VaultStatistics } from "./types.js";
import { moneyValue, parseMinor, sumMoney, toMoney } from "./money-math.js";
import { inWindow, validateFilter } from "./query.js";

interface HolderAccumulator {
  inflow: bigint;
  outflow: bigint;
  count: number;
}

function accumulatorKey(kind: "wallet" | "flow", id: string): string {
  return `${kind}::${id}`;
}

/**
 * Aggregate a vault's posted transactions whose `occurredAt` lies in
 * `[period.from, period.to)`.
 *
 * `totals.net` counts legs on the wallets in `state` only, so a view
 * without wallets nets to zero.
 */
export function computeStatistics(
  state: VaultState,
  transactions: readonly TransactionRecord[],
  period: Period = {},
): VaultStatistics {
  validateFilter(period);
  const currency = state.vault.currency;

  const visibleWallets = new Set(state.wallets.map((w) => w.id));
  const holders = new Map<string, HolderAccumulator>();
  let income = 0n;
  let expenses = 0n;
  let refunds = 0n;
  let net = 0n;
  let transactionCount = 0;

  for (const tx of transactions) {
    if (tx.state !== "posted" || !inWindow(tx.occurredAt, period)) continue;
    transactionCount++;

    switch (tx.kind) {
      case "income":
        income += moneyValue(tx.amount);
        break;
      case "expense":
        expenses += moneyValue(tx.amount);
        break;
      case "refund":
        refunds += moneyValue(tx.amount);
        break;
      case "transfer_wallet":
      case "transfer_flow":
        break;
    }

    const touched = new Set<string>();
    for (const l of tx.legs) {
      const key = accumulatorKey(l.target.kind, l.target.id);
      let acc = holders.get(key);
      if (acc === undefined) {
        acc = { inflow: 0n, outflow: 0n, count: 0 };
        holders.set(key, acc);
      }

      const delta = parseMinor(l.delta);
      if (delta >= 0n) {
        acc.inflow += delta;
      } else {
        acc.outflow -= delta;
      }
      if (!touched.has(key)) {
        acc.count++;
        touched.add(key);
      }
      if (l.target.kind === "wallet" && visibleWallets.has(l.target.id)) {
        net += delta;
      }
    }
  }

  const summarize = (
    kind: "wallet" | "flow",
    holder: WalletRecord | CashFlowRecord,
  ): HolderStatistics => {
    const acc = holders.get(accumulatorKey(kind, holder.id)) ?? {
      inflow: 0n,
      outflow: 0n,
      count: 0,
    };
    return {
      id: holder.id,
      name: holder.name,
      archived: holder.archived,
      balance: holder.balance,
      inflow: toMoney(acc.inflow, currency),
      outflow: toMoney(acc.outflow, currency),
      net: toMoney(acc.inflow - acc.outflow, currency),
      transactionCount: acc.count,
    };
  };

  const balance = sumMoney(
    state.wallets.map((w) => w.balance),
    currency,
  );

  return {
    vaultId: state.vault.id,
    currency,
    period: { from: period.from, to: period.to },
    totals: {
      income: toMoney(income, currency),
      expenses: toMoney(expenses, currency),
      refunds: toMoney(refunds, currency),
      net: toMoney(net, currency),
      balance,
    },
    wallets: state.wallets.map((w) => summarize("wallet", w)),
    flows: state.flows.map((f) => summarize("flow", f)),
    transactionCount,
  };
}
