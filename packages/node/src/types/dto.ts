/**
 * Request DTOs with Zod validation schemas.
 *
 * Each DTO has a Zod schema and a derived TypeScript type.
 * Route handlers use these for body/query validation; business rules
 * (positive amounts, name uniqueness, protected fields) stay in the engine.
 */

import { z } from "zod";

// =============================================================================
// Shared Schemas
// =============================================================================

const CurrencySchema = z.string().regex(/^[A-Z]{3}$/, "Expected an ISO 4217 code");

/**
 * An amount either in minor units ("1250") or major units ("12.50").
 */
export const AmountSchema = z.union([
  z.object({ minor: z.string().min(1).max(40), currency: CurrencySchema }).strict(),
  z.object({ major: z.string().min(1).max(40), currency: CurrencySchema }).strict(),
]);

export type AmountDto = z.infer<typeof AmountSchema>;

const NameSchema = z.string().min(1).max(100);
const IdSchema = z.string().min(1).max(128);

const MetadataFields = {
  note: z.string().max(1000).optional(),
  category: z.string().max(200).optional(),
  occurredAt: z.string().min(1).optional(),
};

export const TransactionKindSchema = z.enum([
  "income",
  "expense",
  "refund",
  "transfer_wallet",
  "transfer_flow",
]);

// =============================================================================
// Vault DTOs
// =============================================================================

export const CreateVaultSchema = z.object({
  name: NameSchema.optional(),
  currency: CurrencySchema.optional(),
});

export type CreateVaultDto = z.infer<typeof CreateVaultSchema>;

export const CreateHolderSchema = z.object({
  name: NameSchema,
});

export type CreateHolderDto = z.infer<typeof CreateHolderSchema>;

export const UpdateHolderSchema = z
  .object({
    name: NameSchema.optional(),
    archived: z.literal(true).optional(),
  })
  .refine((body) => body.name !== undefined || body.archived !== undefined, {
    message: "Provide name and/or archived",
  });

export type UpdateHolderDto = z.infer<typeof UpdateHolderSchema>;

export const FlowCapSchema = z.object({
  mode: z.enum(["net", "income"]),
  limit: AmountSchema,
});

export type FlowCapDto = z.infer<typeof FlowCapSchema>;

export const CreateFlowSchema = CreateHolderSchema.extend({
  cap: FlowCapSchema.optional(),
});

export type CreateFlowDto = z.infer<typeof CreateFlowSchema>;

/** `cap: null` lifts the cap. */
export const UpdateFlowSchema = z
  .object({
    name: NameSchema.optional(),
    archived: z.literal(true).optional(),
    cap: FlowCapSchema.nullable().optional(),
  })
  .refine(
    (body) => body.name !== undefined || body.archived !== undefined || body.cap !== undefined,
    { message: "Provide name, archived and/or cap" },
  );

export type UpdateFlowDto = z.infer<typeof UpdateFlowSchema>;

export const SetMemberSchema = z.object({
  role: z.enum(["editor", "viewer"]),
});

export type SetMemberDto = z.infer<typeof SetMemberSchema>;

export const SetFlowMemberSchema = z.object({
  role: z.enum(["editor", "viewer"]),
});

export type SetFlowMemberDto = z.infer<typeof SetFlowMemberSchema>;

// =============================================================================
// Category DTOs
// =============================================================================

export const CreateCategorySchema = z.object({
  name: NameSchema,
});

export type CreateCategoryDto = z.infer<typeof CreateCategorySchema>;

export const UpdateCategorySchema = z
  .object({
    name: NameSchema.optional(),
    archived: z.boolean().optional(),
  })
  .refine((body) => body.name !== undefined || body.archived !== undefined, {
    message: "Provide name and/or archived",
  });

export type UpdateCategoryDto = z.infer<typeof UpdateCategorySchema>;

export const CategoryAliasSchema = z.object({
  alias: NameSchema,
});

export type CategoryAliasDto = z.infer<typeof CategoryAliasSchema>;

// =============================================================================
// Transaction DTOs
// =============================================================================

export const RecordMovementSchema = z.object({
  walletId: IdSchema,
  flowId: IdSchema.optional(),
  amount: AmountSchema,
  ...MetadataFields,
});

export type RecordMovementDto = z.infer<typeof RecordMovementSchema>;

export const TransferWalletSchema = z.object({
  fromWalletId: IdSchema,
  toWalletId: IdSchema,
  amount: AmountSchema,
  ...MetadataFields,
});

export type TransferWalletDto = z.infer<typeof TransferWalletSchema>;

export const TransferFlowSchema = z.object({
  fromFlowId: IdSchema,
  toFlowId: IdSchema,
  amount: AmountSchema,
  ...MetadataFields,
});

export type TransferFlowDto = z.infer<typeof TransferFlowSchema>;

export const RefundSchema = z.object({
  amount: AmountSchema,
  ...MetadataFields,
});

export type RefundDto = z.infer<typeof RefundSchema>;

/**
 * Field names are checked by the engine so protected fields are
 * reported as IMMUTABLE rather than as a schema failure.
 */
export const UpdateTransactionSchema = z.record(z.string(), z.unknown());

export type UpdateTransactionDto = z.infer<typeof UpdateTransactionSchema>;

// =============================================================================
// Query DTOs
// =============================================================================

const BooleanQuery = z
  .enum(["true", "false"])
  .transform((value) => value === "true");

export const PeriodQuerySchema = z.object({
  from: z.string().min(1).optional(),
  to: z.string().min(1).optional(),
});

export type PeriodQuery = z.infer<typeof PeriodQuerySchema>;

export const ListCategoriesQuerySchema = z.object({
  includeArchived: BooleanQuery.optional(),
});

export type ListCategoriesQuery = z.infer<typeof ListCategoriesQuerySchema>;

export const ListTransactionsQuerySchema = PeriodQuerySchema.extend({
  kinds: z
    .string()
    .transform((raw) => raw.split(",").map((k) => k.trim()).filter((k) => k !== ""))
    .pipe(z.array(TransactionKindSchema))
    .optional(),
  walletId: IdSchema.optional(),
  flowId: IdSchema.optional(),
  includeVoided: BooleanQuery.optional(),
  includeTransfers: BooleanQuery.optional(),
  cursor: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(200).default(50),
});

export type ListTransactionsQuery = z.infer<typeof ListTransactionsQuerySchema>;
