/**
 * @cardflow/ledger: Card balance and reconciliation engine.
 *
 * Pure TypeScript, no runtime dependencies beyond @cardflow/types.
 * Computes what should be on a card on any day, what a withdrawal
 * actually drained, and what carries forward.
 *
 * Design rules:
 * - All types are readonly
 * - All monetary arithmetic uses bigint (no floating point)
 * - One reference zone decides every calendar-day boundary
 * - Fail-closed: invalid input throws, never silently succeeds
 */

// Balance engine
export {
  BalanceEngine,
  BalanceContext,
  effectiveWithdrawn,
  dedupeByDate,
} from "./balance-engine.js";
export type { BalanceEngineOptions, ShouldHaveLookup } from "./balance-engine.js";

// Calendar
export {
  UTC_ZONE,
  parseUtcOffset,
  addDays,
  compareDays,
  dayStart,
  endOfDay,
  dayOf,
  dayWindow,
  rangeWindow,
  today,
  parseUserDate,
  formatUserDate,
  parseUserTimestamp,
  formatUserTimestamp,
} from "./calendar.js";
export type { ReferenceZone } from "./calendar.js";

// Money arithmetic
export {
  AMOUNT_DECIMALS,
  RATE_DECIMALS,
  parseAmount,
  formatAmount,
  normalizeAmount,
  zeroAmount,
  sumAmounts,
  floorAtZero,
  computeRate,
  parseUserAmount,
  formatSpaced,
} from "./money-math.js";

// Input contracts
export { validateWithdrawalForm } from "./withdrawal-input.js";
export type { WithdrawalForm, WithdrawalUpsert } from "./withdrawal-input.js";
export { validateTransactionForm, resolveEditedTimestamp } from "./transaction-input.js";
export type {
  TransactionForm,
  TransactionDraft,
  TimestampResolution,
} from "./transaction-input.js";

// Types
export type {
  TransactionQuery,
  WithdrawalQuery,
  LedgerReader,
  DayBalance,
  RangeTotals,
  LedgerErrorCode,
  FieldError,
  ValidationResult,
} from "./types.js";

export { LedgerError, InputValidationError, assertValid } from "./types.js";
