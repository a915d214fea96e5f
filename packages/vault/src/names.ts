/**
 * Name and username normalization shared by vaults, wallets and flows.
 */

import { LedgerError } from "@coffer/ledger";
import type { LedgerEntity } from "@coffer/ledger";
import { MAX_NAME_LENGTH, MAX_USERNAME_LENGTH } from "./types.js";

const USERNAME_PATTERN = /^[A-Za-z0-9_.@-]+$/;

/**
 * Trim a display name and check its length.
 */
export function normalizeName(raw: string, entity: LedgerEntity): string {
  const name = raw.trim();
  if (name.length === 0 || name.length > MAX_NAME_LENGTH) {
    throw new LedgerError(
      "INVALID_INPUT",
      `${entity} name must be 1-${String(MAX_NAME_LENGTH)} characters`,
      { entity, field: "name" },
    );
  }
  return name;
}

export function normalizeUsername(raw: string): string {
  const username = raw.trim();
  if (
    username.length === 0 ||
    username.length > MAX_USERNAME_LENGTH ||
    !USERNAME_PATTERN.test(username)
  ) {
    throw new LedgerError("INVALID_INPUT", `Invalid username: "${raw}"`, {
      entity: "member",
      field: "username",
    });
  }
  return username;
}

/**
 * Fail with ALREADY_EXISTS if `name` collides, case-insensitively,
 * with one of `taken`.
 */
export function assertNameAvailable(
  name: string,
  taken: readonly { readonly id: string; readonly name: string }[],
  entity: LedgerEntity,
): void {
  const folded = name.toLocaleLowerCase();
  const clash = taken.find((t) => t.name.toLocaleLowerCase() === folded);
  if (clash !== undefined) {
    throw new LedgerError("ALREADY_EXISTS", `A ${entity} named "${name}" already exists`, {
      entity,
      id: clash.id,
      field: "name",
    });
  }
}
