/**
 * @coffer/engine — Authorized, atomic commands over a vault store.
 */

export type {
  VaultDeletePolicy,
  LedgerEngineOptions,
  CreateVaultInput,
  UpdateHolderInput,
  UpdateFlowInput,
  UpdateCategoryInput,
  SetMemberInput,
  SetFlowMemberInput,
  TransactionMetadataInput,
  RecordIncomeInput,
  RecordExpenseInput,
  RecordRefundInput,
  TransferWalletInput,
  TransferFlowInput,
  TransactionFieldPatch,
} from "./types.js";
export {
  MAX_NOTE_LENGTH,
  MAX_CATEGORY_LENGTH,
  EDITABLE_TRANSACTION_FIELDS,
  PROTECTED_TRANSACTION_FIELDS,
} from "./types.js";

export type { VaultView, RefundSummary } from "./engine.js";
export { LedgerEngine } from "./engine.js";

export { KeyedLock } from "./keyed-lock.js";

export type { MetadataChange } from "./metadata.js";
export { normalizeText, normalizeTimestamp, parseFieldPatch } from "./metadata.js";
