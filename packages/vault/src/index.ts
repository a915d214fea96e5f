/**
 * @coffer/vault — Vault provisioning, holders, membership and access.
 *
 * Pure functions over immutable vault state. The engine commits
 * whatever these return.
 */

// Types
export type {
  AccessRequirement,
  Capability,
  AccessDecision,
  ProvisionInput,
  FlowCapInput,
  CategorySelection,
} from "./types.js";
export {
  DEFAULT_VAULT_NAME,
  DEFAULT_WALLET_NAME,
  UNALLOCATED_FLOW_NAME,
  UNCATEGORIZED_CATEGORY_NAME,
  MAX_NAME_LENGTH,
  MAX_USERNAME_LENGTH,
} from "./types.js";

// Access
export { resolveCapability, authorize, requireAccess, canSeeFlow } from "./access.js";

// Names
export { normalizeName, normalizeUsername, assertNameAvailable } from "./names.js";

// Provisioning
export { provisionVault } from "./provision.js";

// Holders
export {
  requireWallet,
  requireFlow,
  assertActive,
  createWallet,
  renameWallet,
  archiveWallet,
  createFlow,
  setFlowCap,
  renameFlow,
  archiveFlow,
} from "./holders.js";

// Categories
export {
  categoryKey,
  levenshtein,
  findSimilarCategory,
  requireCategory,
  createCategory,
  updateCategory,
  addCategoryAlias,
  removeCategoryAlias,
  resolveCategory,
} from "./categories.js";

// Membership
export { addMember, removeMember, addFlowMember, removeFlowMember } from "./membership.js";
