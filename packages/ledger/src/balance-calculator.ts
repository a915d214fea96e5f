/**
 * @coffer/ledger — Balance maintenance.
 *
 * Balances are maintained incrementally: each commit applies its
 * legs once, each void applies the reversed legs once. The full-history
 * recomputation here exists to check that invariant, not to serve reads.
 *
 * Rules:
 * - Balances are bigint arithmetic over minor units
 * - Only posted transactions contribute to computed balances
 * - Applying legs never mutates its inputs
 */

import type {
  CashFlowRecord,
  Leg,
  TransactionRecord,
  VaultState,
  WalletRecord,
} from "@coffer/types";
import type { BalanceDrift } from "./types.js";
import { LedgerError } from "./types.js";
import { applyDelta, formatMinor, moneyValue, parseMinor } from "./money-math.js";

/**
 * Key for grouping deltas by holder.
 */
function holderKey(kind: "wallet" | "flow", id: string): string {
  return `${kind}::${id}`;
}

/**
 * The wallets and flows a set of legs changed, with their new balances.
 */
export interface AppliedLegs {
  readonly wallets: readonly WalletRecord[];
  readonly flows: readonly CashFlowRecord[];
}

/**
 * Apply legs to the holders of a vault.
 *
 * Returns only the holders whose balance changed. Fails with NOT_FOUND
 * if a leg targets a holder the vault does not have.
 */
export function applyLegs(
  state: Pick<VaultState, "wallets" | "flows">,
  legs: readonly Leg[],
): AppliedLegs {
  const deltas = new Map<string, bigint>();
  for (const l of legs) {
    const key = holderKey(l.target.kind, l.target.id);
    deltas.set(key, (deltas.get(key) ?? 0n) + parseMinor(l.delta));
  }

  const wallets: WalletRecord[] = [];
  const flows: CashFlowRecord[] = [];
  const seen = new Set<string>();

  for (const w of state.wallets) {
    const key = holderKey("wallet", w.id);
    const delta = deltas.get(key);
    if (delta === undefined) continue;
    seen.add(key);
    wallets.push({ ...w, balance: applyDelta(w.balance, delta) });
  }

  for (const f of state.flows) {
    const key = holderKey("flow", f.id);
    const delta = deltas.get(key);
    if (delta === undefined) continue;
    seen.add(key);
    flows.push({ ...f, balance: applyDelta(f.balance, delta) });
  }

  for (const l of legs) {
    if (!seen.has(holderKey(l.target.kind, l.target.id))) {
      throw new LedgerError(
        "NOT_FOUND",
        `Unknown ${l.target.kind}: ${l.target.id}`,
        { entity: l.target.kind, id: l.target.id },
      );
    }
  }

  return { wallets, flows };
}

/**
 * Recompute every holder's balance from posted history.
 */
export function computeBalances(
  transactions: readonly TransactionRecord[],
): ReadonlyMap<string, bigint> {
  const balances = new Map<string, bigint>();
  for (const tx of transactions) {
    if (tx.state !== "posted") continue;
    for (const l of tx.legs) {
      const key = holderKey(l.target.kind, l.target.id);
      balances.set(key, (balances.get(key) ?? 0n) + parseMinor(l.delta));
    }
  }
  return balances;
}

/**
 * Compare stored balances against posted history.
 * An empty result means every holder's balance equals the sum of
 * its posted legs.
 */
export function findBalanceDrift(
  state: Pick<VaultState, "wallets" | "flows">,
  transactions: readonly TransactionRecord[],
): readonly BalanceDrift[] {
  const computed = computeBalances(transactions);
  const drift: BalanceDrift[] = [];

  const check = (target: "wallet" | "flow", id: string, stored: bigint): void => {
    const expected = computed.get(holderKey(target, id)) ?? 0n;
    if (expected !== stored) {
      drift.push({
        target,
        id,
        stored: formatMinor(stored),
        computed: formatMinor(expected),
      });
    }
  };

  for (const w of state.wallets) check("wallet", w.id, moneyValue(w.balance));
  for (const f of state.flows) check("flow", f.id, moneyValue(f.balance));

  return drift;
}
