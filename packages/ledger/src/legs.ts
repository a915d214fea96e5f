/**
 * @coffer/ledger — Delta planning.
 *
 * Turns a movement into the signed legs it applies. Pure: no I/O,
 * no clock. Posting applies each leg's delta once; voiding applies
 * the reversed legs once.
 *
 * Rules:
 * - Amounts are strictly positive
 * - Transfers never have the same source and destination
 * - A refund mirrors the original's legs, scaled to the refund amount
 */

import type { Leg, LegTarget } from "@coffer/types";
import type { MovementSpec } from "./types.js";
import { LedgerError } from "./types.js";
import { formatMinor, parseMinor } from "./money-math.js";

// ─── Helpers ─────────────────────────────────────────────────────────────

function wallet(id: string): LegTarget {
  return { kind: "wallet", id };
}

function flow(id: string): LegTarget {
  return { kind: "flow", id };
}

function leg(target: LegTarget, delta: bigint): Leg {
  return { target, delta: formatMinor(delta) };
}

function assertNever(value: never): never {
  throw new LedgerError("INVALID_INPUT", `Unhandled movement: ${JSON.stringify(value)}`);
}

// ─── Planning ────────────────────────────────────────────────────────────

/**
 * Compute the legs a movement of `amount` minor units applies.
 */
export function planLegs(spec: MovementSpec, amount: bigint): readonly Leg[] {
  if (amount <= 0n) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Amount must be positive, got ${formatMinor(amount)}`,
      { field: "amount" },
    );
  }

  switch (spec.kind) {
    case "income":
      return spec.flowId === undefined
        ? [leg(wallet(spec.walletId), amount)]
        : [leg(wallet(spec.walletId), amount), leg(flow(spec.flowId), amount)];

    case "expense":
      return spec.flowId === undefined
        ? [leg(wallet(spec.walletId), -amount)]
        : [leg(wallet(spec.walletId), -amount), leg(flow(spec.flowId), -amount)];

    case "transfer_wallet":
      if (spec.fromWalletId === spec.toWalletId) {
        throw new LedgerError(
          "SAME_WALLET",
          `Cannot transfer from wallet ${spec.fromWalletId} to itself`,
          { entity: "wallet", id: spec.fromWalletId, field: "toWalletId" },
        );
      }
      return [leg(wallet(spec.fromWalletId), -amount), leg(wallet(spec.toWalletId), amount)];

    case "transfer_flow":
      if (spec.fromFlowId === spec.toFlowId) {
        throw new LedgerError(
          "SAME_FLOW",
          `Cannot transfer from flow ${spec.fromFlowId} to itself`,
          { entity: "flow", id: spec.fromFlowId, field: "toFlowId" },
        );
      }
      return [leg(flow(spec.fromFlowId), -amount), leg(flow(spec.toFlowId), amount)];

    case "refund":
      return spec.original.legs.map((original) => {
        const delta = parseMinor(original.delta);
        return leg(original.target, delta < 0n ? amount : -amount);
      });

    default:
      return assertNever(spec);
  }
}

/**
 * The legs that undo `legs` when applied.
 */
export function reverseLegs(legs: readonly Leg[]): readonly Leg[] {
  return legs.map((l) => leg(l.target, -parseMinor(l.delta)));
}

/**
 * Whether any leg touches the given holder.
 */
export function touches(legs: readonly Leg[], target: LegTarget): boolean {
  return legs.some((l) => l.target.kind === target.kind && l.target.id === target.id);
}

/**
 * Flow ids touched by a set of legs.
 */
export function flowIdsOf(legs: readonly Leg[]): readonly string[] {
  return legs.filter((l) => l.target.kind === "flow").map((l) => l.target.id);
}

/**
 * Wallet ids touched by a set of legs.
 */
export function walletIdsOf(legs: readonly Leg[]): readonly string[] {
  return legs.filter((l) => l.target.kind === "wallet").map((l) => l.target.id);
}
