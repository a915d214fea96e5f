/**
 * Structural checks for log entries read back from disk.
 */

import { isCategoryRecord, isFlowCap, isMoney, isTransactionRecord } from "@coffer/types";
import type { HashedLogEntry, StoreChange } from "./types.js";

function isObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object";
}

function isHolder(value: unknown): boolean {
  return (
    isObject(value) &&
    typeof value.id === "string" &&
    typeof value.vaultId === "string" &&
    typeof value.name === "string" &&
    isMoney(value.balance) &&
    typeof value.archived === "boolean"
  );
}

function isFlow(value: unknown): boolean {
  return isHolder(value) && isObject(value) && (value.cap === undefined || isFlowCap(value.cap));
}

function isVault(value: unknown): boolean {
  return (
    isObject(value) &&
    typeof value.id === "string" &&
    typeof value.ownerId === "string" &&
    typeof value.currency === "string" &&
    Array.isArray(value.members) &&
    Array.isArray(value.flowMembers)
  );
}

export function isStoreChange(value: unknown): value is StoreChange {
  if (!isObject(value)) return false;
  switch (value.type) {
    case "put-vault":
      return isVault(value.vault);
    case "put-wallet":
      return isHolder(value.wallet);
    case "put-flow":
      return isFlow(value.flow);
    case "put-category":
      return isCategoryRecord(value.category);
    case "put-transaction":
      return isTransactionRecord(value.transaction);
    default:
      return false;
  }
}

export function isHashedLogEntry(value: unknown): value is HashedLogEntry {
  if (!isObject(value)) return false;
  const headerOk =
    typeof value.sequence === "number" &&
    typeof value.vaultId === "string" &&
    typeof value.version === "number" &&
    typeof value.committedAt === "string" &&
    typeof value.hash === "string" &&
    typeof value.previousHash === "string";
  if (!headerOk) return false;

  if (value.type === "delete") return true;
  return (
    value.type === "commit" &&
    Array.isArray(value.changes) &&
    value.changes.every(isStoreChange)
  );
}
