/**
 * Vault provisioning.
 *
 * A new vault starts with its owner as the only member, one wallet
 * ("Cash") and the protected "Unallocated" flow. Balances are zero.
 */

import type { VaultRecord, VaultState } from "@coffer/types";
import { getCurrency, zeroMoney } from "@coffer/ledger";
import type { ProvisionInput } from "./types.js";
import {
  DEFAULT_VAULT_NAME,
  DEFAULT_WALLET_NAME,
  UNALLOCATED_FLOW_NAME,
} from "./types.js";
import { assertNameAvailable, normalizeName, normalizeUsername } from "./names.js";

/**
 * Build the initial state of a vault. `ownedVaults` are the owner's
 * existing vaults; names must be unique among them.
 */
export function provisionVault(
  input: ProvisionInput,
  ownedVaults: readonly VaultRecord[] = [],
): VaultState {
  const owner = normalizeUsername(input.owner);
  const name = normalizeName(input.name ?? DEFAULT_VAULT_NAME, "vault");
  const { code: currency } = getCurrency(input.currency);
  assertNameAvailable(name, ownedVaults, "vault");

  const vaultId = input.generateId();

  return {
    vault: {
      id: vaultId,
      name,
      ownerId: owner,
      currency,
      createdAt: input.now,
      members: [{ username: owner, role: "owner", addedAt: input.now }],
      flowMembers: [],
    },
    wallets: [
      {
        id: input.generateId(),
        vaultId,
        name: DEFAULT_WALLET_NAME,
        balance: zeroMoney(currency),
        archived: false,
        createdAt: input.now,
      },
    ],
    flows: [
      {
        id: input.generateId(),
        vaultId,
        name: UNALLOCATED_FLOW_NAME,
        balance: zeroMoney(currency),
        archived: false,
        system: "unallocated",
        createdAt: input.now,
      },
    ],
    version: 0,
  };
}
