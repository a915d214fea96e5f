/**
 * Type barrel — re-exports all public types from @coffer/node.
 */

// DTOs
export {
  AmountSchema,
  TransactionKindSchema,
  CreateVaultSchema,
  CreateHolderSchema,
  UpdateHolderSchema,
  SetMemberSchema,
  SetFlowMemberSchema,
  RecordMovementSchema,
  TransferWalletSchema,
  TransferFlowSchema,
  RefundSchema,
  UpdateTransactionSchema,
  PeriodQuerySchema,
  ListTransactionsQuerySchema,
} from "./dto.js";
export type {
  AmountDto,
  CreateVaultDto,
  CreateHolderDto,
  UpdateHolderDto,
  SetMemberDto,
  SetFlowMemberDto,
  RecordMovementDto,
  TransferWalletDto,
  TransferFlowDto,
  RefundDto,
  UpdateTransactionDto,
  PeriodQuery,
  ListTransactionsQuery,
} from "./dto.js";

// Error
export { createErrorEnvelope, RequestValidationError } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope, ValidationIssue } from "./error.js";

// Pagination
export { encodeCursor, decodeCursor, paginate } from "./pagination.js";
export type {
  PaginationQuery,
  PaginationMeta,
  PaginatedResponse,
  SortDirection,
} from "./pagination.js";

// Auth
export type { AuthContext, ApiKeyRecord } from "./auth.js";

// App env
export type { AppEnv } from "./api-contract.js";
