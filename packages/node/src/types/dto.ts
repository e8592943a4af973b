/**
 * Request DTOs with Zod validation schemas.
 *
 * Bodies carry raw user text: amounts like "1 200,50", dates as
 * "dd/mm/yyyy". Parsing into domain values happens in @cardflow/ledger,
 * so these schemas only check shape.
 */

import { z } from "zod";

// =============================================================================
// Shared Schemas
// =============================================================================

/** Amount text; JSON numbers are accepted and stringified. */
export const AmountTextSchema = z
  .union([z.string(), z.number()])
  .transform((value) => String(value));

export const IdParamSchema = z.coerce.number().int().positive();

export const PageQuerySchema = z.object({
  page: z.coerce.number().int().optional(),
  pageSize: z.coerce.number().int().optional(),
});

export const RangeQuerySchema = z.object({
  start: z.string().optional(),
  end: z.string().optional(),
});

// =============================================================================
// Card DTOs
// =============================================================================

export const CardBodySchema = z.object({
  name: z.string().trim().min(1, "Card name is required"),
  bank: z.string().optional(),
  cardNumber: z.string().optional(),
  pin: z.string().optional(),
  status: z.enum(["active", "broken", "hold"]).optional(),
  groupName: z.string().optional(),
  notes: z.string().optional(),
});

export type CardBodyDto = z.infer<typeof CardBodySchema>;

export const CardPatchSchema = CardBodySchema.partial();

export type CardPatchDto = z.infer<typeof CardPatchSchema>;

export const CardListQuerySchema = RangeQuerySchema.extend({
  bank: z.string().optional(),
  group: z.string().optional(),
});

export const TimelineQuerySchema = RangeQuerySchema.extend({
  kind: z.enum(["transaction", "withdrawal"]).optional(),
  q: z.string().optional(),
});

export const BalanceQuerySchema = z.object({
  date: z.string().optional(),
});

// =============================================================================
// Client DTOs
// =============================================================================

export const ClientBodySchema = z.object({
  name: z.string().trim().min(1, "Client name is required"),
  status: z.enum(["active", "blocked", "hold"]).optional(),
  notes: z.string().optional(),
});

export type ClientBodyDto = z.infer<typeof ClientBodySchema>;

export const ClientPatchSchema = ClientBodySchema.partial();

export const ClientListQuerySchema = PageQuerySchema.extend({
  q: z.string().optional(),
});

export const SearchQuerySchema = z.object({
  q: z.string().default(""),
});

// =============================================================================
// Group & Bank DTOs
// =============================================================================

export const GroupBodySchema = z.object({
  name: z.string().trim().min(1, "Group name is required"),
});

export const BankColorBodySchema = z.object({
  color: z.string().regex(/^#[0-9a-fA-F]{6}$/, "Color must look like #1a2b3c"),
});

// =============================================================================
// Transaction DTOs
// =============================================================================

export const TransactionBodySchema = z.object({
  cardId: z.number().int().nullish(),
  clientId: z.number().int().nullish(),
  amount: AmountTextSchema.nullish(),
  secondaryAmount: AmountTextSchema.nullish(),
  timestamp: z.string().nullish(),
  /** Timestamp text the edit form showed */
  renderedTimestamp: z.string().nullish(),
  notes: z.string().nullish(),
});

export type TransactionBodyDto = z.infer<typeof TransactionBodySchema>;

export const TransactionListQuerySchema = PageQuerySchema.merge(RangeQuerySchema).extend({
  cardId: z.coerce.number().int().optional(),
  clientId: z.coerce.number().int().optional(),
});

// =============================================================================
// Withdrawal DTOs
// =============================================================================

export const WithdrawalBodySchema = z.object({
  cardId: z.number().int().nullish(),
  date: z.string().nullish(),
  fullyWithdrawn: z.boolean().nullish(),
  withdrawnAmount: AmountTextSchema.nullish(),
  commission: AmountTextSchema.nullish(),
  timestamp: z.string().nullish(),
  note: z.string().nullish(),
});

export type WithdrawalBodyDto = z.infer<typeof WithdrawalBodySchema>;

export const SheetQuerySchema = PageQuerySchema.extend({
  date: z.string().optional(),
  bank: z.string().optional(),
  q: z.string().optional(),
});
