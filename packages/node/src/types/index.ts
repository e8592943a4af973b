/**
 * Type barrel: re-exports all public types from @cardflow/node.
 */

// DTOs
export {
  AmountTextSchema,
  IdParamSchema,
  PageQuerySchema,
  RangeQuerySchema,
  CardBodySchema,
  CardPatchSchema,
  CardListQuerySchema,
  TimelineQuerySchema,
  BalanceQuerySchema,
  ClientBodySchema,
  ClientPatchSchema,
  ClientListQuerySchema,
  SearchQuerySchema,
  GroupBodySchema,
  BankColorBodySchema,
  TransactionBodySchema,
  TransactionListQuerySchema,
  WithdrawalBodySchema,
  SheetQuerySchema,
} from "./dto.js";
export type {
  CardBodyDto,
  CardPatchDto,
  ClientBodyDto,
  TransactionBodyDto,
  WithdrawalBodyDto,
} from "./dto.js";

// Error
export { ApiError, createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorStatus, ErrorDetail, ErrorEnvelope } from "./error.js";

// Pagination
export { toPaginatedResponse } from "./pagination.js";
export type { PaginationMeta, PaginatedResponse } from "./pagination.js";

// Auth
export { ROLE_PERMISSIONS, hasPermission } from "./auth.js";
export type { Role, Permission, AuthContext, ApiKeyRecord } from "./auth.js";

// App env
export type { AppEnv } from "./api-contract.js";
