/**
 * Shared builders for vault tests.
 */

import type { VaultState } from "@coffer/types";
import { provisionVault } from "../src/provision.js";

export const NOW = "2026-02-01T10:00:00.000Z";

/**
 * Deterministic id factory: "id-1", "id-2", ...
 */
export function sequentialIds(prefix = "id"): () => string {
  let n = 0;
  return () => {
    n++;
    return `${prefix}-${String(n)}`;
  };
}

/**
 * A provisioned vault: id-1 vault, id-2 Cash wallet, id-3 Unallocated flow.
 */
export function freshVault(owner = "alice"): VaultState {
  return provisionVault({
    owner,
    name: "Household",
    currency: "EUR",
    now: NOW,
    generateId: sequentialIds(),
  });
}
