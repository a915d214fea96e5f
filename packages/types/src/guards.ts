/**
 * Runtime Type Guards
 *
 * Narrowing functions for the ledger's domain types, used where
 * values cross a boundary (request bodies, lines read from disk).
 */

import type { Money } from "./money.js";
import type {
  CategoryRecord,
  FlowCap,
  FlowMembershipRole,
  MembershipRole,
} from "./vault.js";
import type {
  Leg,
  LegTarget,
  TransactionKind,
  TransactionRecord,
  TransactionState,
} from "./transaction.js";
import { TRANSACTION_KINDS } from "./transaction.js";

const INTEGER_PATTERN = /^-?(0|[1-9]\d*)$/;
const CURRENCY_PATTERN = /^[A-Z]{3}$/;

// =============================================================================
// Money
// =============================================================================

export function isMinorUnits(value: unknown): value is string {
  return typeof value === "string" && INTEGER_PATTERN.test(value) && value !== "-0";
}

export function isCurrencyCode(value: unknown): value is string {
  return typeof value === "string" && CURRENCY_PATTERN.test(value);
}

export function isMoney(value: unknown): value is Money {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return isMinorUnits(v.minor) && isCurrencyCode(v.currency);
}

// =============================================================================
// Membership
// =============================================================================

const ROLES = new Set<string>(["owner", "editor", "viewer"]);
const FLOW_ROLES = new Set<string>(["editor", "viewer"]);

export function isMembershipRole(value: unknown): value is MembershipRole {
  return typeof value === "string" && ROLES.has(value);
}

export function isFlowMembershipRole(value: unknown): value is FlowMembershipRole {
  return typeof value === "string" && FLOW_ROLES.has(value);
}

// =============================================================================
// Cash flows and categories
// =============================================================================

export function isFlowCap(value: unknown): value is FlowCap {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  if (v.mode === "net") return isMoney(v.limit);
  return v.mode === "income" && isMoney(v.limit) && isMoney(v.incomeTotal);
}

export function isCategoryRecord(value: unknown): value is CategoryRecord {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.id === "string" &&
    typeof v.vaultId === "string" &&
    typeof v.name === "string" &&
    Array.isArray(v.aliases) &&
    v.aliases.every((alias) => typeof alias === "string") &&
    typeof v.archived === "boolean" &&
    typeof v.createdAt === "string"
  );
}

// =============================================================================
// Transactions
// =============================================================================

const KINDS = new Set<string>(TRANSACTION_KINDS);

export function isTransactionKind(value: unknown): value is TransactionKind {
  return typeof value === "string" && KINDS.has(value);
}

export function isTransactionState(value: unknown): value is TransactionState {
  return value === "posted" || value === "voided";
}

export function isLegTarget(value: unknown): value is LegTarget {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    (v.kind === "wallet" || v.kind === "flow") &&
    typeof v.id === "string" &&
    v.id.length > 0
  );
}

export function isLeg(value: unknown): value is Leg {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return isLegTarget(v.target) && isMinorUnits(v.delta);
}

/**
 * Structural check of a stored transaction, including the
 * kind-specific reference fields.
 */
export function isTransactionRecord(value: unknown): value is TransactionRecord {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  const headerOk =
    typeof v.id === "string" &&
    typeof v.vaultId === "string" &&
    isMoney(v.amount) &&
    typeof v.occurredAt === "string" &&
    typeof v.recordedAt === "string" &&
    typeof v.createdBy === "string" &&
    isTransactionState(v.state) &&
    Array.isArray(v.legs) &&
    v.legs.every(isLeg);
  if (!headerOk) return false;

  switch (v.kind) {
    case "income":
    case "expense":
      return typeof v.walletId === "string" && (v.flowId === undefined || typeof v.flowId === "string");
    case "refund":
      return typeof v.refundOf === "string";
    case "transfer_wallet":
      return typeof v.fromWalletId === "string" && typeof v.toWalletId === "string";
    case "transfer_flow":
      return typeof v.fromFlowId === "string" && typeof v.toFlowId === "string";
    default:
      return false;
  }
}
