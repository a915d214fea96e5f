/**
 * Transaction metadata: normalization of free text and timestamps,
 * and validation of update patches.
 */

import { LedgerError } from "@coffer/ledger";
import type { TransactionFieldPatch } from "./types.js";
import {
  EDITABLE_TRANSACTION_FIELDS,
  MAX_CATEGORY_LENGTH,
  MAX_NOTE_LENGTH,
  PROTECTED_TRANSACTION_FIELDS,
} from "./types.js";

/**
 * Trim optional text; empty becomes undefined.
 */
export function normalizeText(
  value: string | undefined,
  field: "note" | "category",
): string | undefined {
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  if (trimmed.length === 0) return undefined;

  const max = field === "note" ? MAX_NOTE_LENGTH : MAX_CATEGORY_LENGTH;
  if (trimmed.length > max) {
    throw new LedgerError(
      "INVALID_INPUT",
      `${field} must be at most ${String(max)} characters`,
      { entity: "transaction", field },
    );
  }
  return trimmed;
}

/**
 * Parse an ISO timestamp into canonical `toISOString` form.
 */
export function normalizeTimestamp(value: string | undefined, fallback: Date): string {
  if (value === undefined) return fallback.toISOString();
  const parsed = new Date(value);
  if (Number.isNaN(parsed.getTime())) {
    throw new LedgerError("INVALID_INPUT", `Invalid timestamp: "${value}"`, {
      entity: "transaction",
      field: "occurredAt",
    });
  }
  return parsed.toISOString();
}

export interface MetadataChange {
  /** undefined: leave as is; null: clear */
  readonly note?: string | null | undefined;
  readonly category?: string | null | undefined;
}

/**
 * Check a patch against the editable/protected field lists.
 *
 * @throws LedgerError IMMUTABLE for a protected field
 * @throws LedgerError INVALID_INPUT for unknown fields, wrong types or an empty patch
 */
export function parseFieldPatch(patch: TransactionFieldPatch, transactionId: string): MetadataChange {
  const keys = Object.keys(patch);
  if (keys.length === 0) {
    throw new LedgerError("INVALID_INPUT", "Nothing to update", {
      entity: "transaction",
      id: transactionId,
    });
  }

  for (const key of keys) {
    if (PROTECTED_TRANSACTION_FIELDS.includes(key)) {
      throw new LedgerError("IMMUTABLE", `Field "${key}" cannot be changed after posting`, {
        entity: "transaction",
        id: transactionId,
        field: key,
      });
    }
    if (!EDITABLE_TRANSACTION_FIELDS.includes(key)) {
      throw new LedgerError("INVALID_INPUT", `Unknown field "${key}"`, {
        entity: "transaction",
        id: transactionId,
        field: key,
      });
    }
  }

  const read = (field: "note" | "category"): string | null | undefined => {
    if (!(field in patch)) return undefined;
    const value = patch[field];
    if (value === null) return null;
    if (typeof value !== "string") {
      throw new LedgerError("INVALID_INPUT", `Field "${field}" must be a string or null`, {
        entity: "transaction",
        id: transactionId,
        field,
      });
    }
    return normalizeText(value, field) ?? null;
  };

  return { note: read("note"), category: read("category") };
}
