/**
 * @coffer/vault — Access and provisioning types.
 */

import type {
  CategoryRecord,
  CurrencyCode,
  FlowMembershipRole,
  MembershipRole,
  Money,
} from "@coffer/types";

// =============================================================================
// Access
// =============================================================================

/**
 * What an operation needs from its caller.
 *
 * - `read-vault`: any membership, vault-level or flow-scoped
 * - `write-vault`: owner or editor at vault level
 * - `manage-vault`: owner only (membership, deletion, holders)
 * - `read-flow`: vault member, or a flow-scoped grant on that flow
 * - `write-flows`: vault writer, or editor on every listed flow
 */
export type AccessRequirement =
  | { readonly action: "read-vault" }
  | { readonly action: "write-vault" }
  | { readonly action: "manage-vault" }
  | { readonly action: "read-flow"; readonly flowId: string }
  | { readonly action: "write-flows"; readonly flowIds: readonly string[] };

/**
 * What the caller is allowed to do, as resolved from membership.
 */
export type Capability =
  | {
      readonly scope: "vault";
      readonly username: string;
      readonly role: MembershipRole;
      readonly canWrite: boolean;
      readonly canManage: boolean;
    }
  | {
      readonly scope: "flow";
      readonly username: string;
      /** flowId → role for every flow the caller holds a grant on */
      readonly flows: ReadonlyMap<string, FlowMembershipRole>;
    };

export type AccessDecision =
  | { readonly granted: true; readonly capability: Capability }
  | { readonly granted: false; readonly reason: string };

// =============================================================================
// Provisioning
// =============================================================================

export interface ProvisionInput {
  readonly owner: string;
  readonly name?: string | undefined;
  readonly currency: CurrencyCode;
  readonly now: string;
  /** Id factory, injected so tests are deterministic */
  readonly generateId: () => string;
}

// =============================================================================
// Cash flow caps
// =============================================================================

/**
 * A requested cap. Income caps start from what posted transactions
 * have already credited to the flow.
 */
export interface FlowCapInput {
  readonly mode: "net" | "income";
  readonly limit: Money;
}

// =============================================================================
// Categories
// =============================================================================

/**
 * Outcome of resolving a transaction's category text.
 */
export type CategorySelection =
  | { readonly kind: "none" }
  | { readonly kind: "existing"; readonly category: CategoryRecord }
  | { readonly kind: "created"; readonly category: CategoryRecord };

export const UNCATEGORIZED_CATEGORY_NAME = "Uncategorized";

export const DEFAULT_VAULT_NAME = "Personal";
export const DEFAULT_WALLET_NAME = "Cash";
export const UNALLOCATED_FLOW_NAME = "Unallocated";

export const MAX_NAME_LENGTH = 100;
export const MAX_USERNAME_LENGTH = 64;
