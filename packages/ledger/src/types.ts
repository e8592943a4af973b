/**
 * @cardflow/ledger: Types for the balance engine.
 *
 * Rules:
 * - All types are readonly
 * - Fail-closed: invalid input throws, never silently succeeds
 * - Arithmetic edge cases (zero divisor, negative remainder) are not errors
 */

import type {
  Amount,
  CalendarDay,
  Card,
  Client,
  Instant,
  Transaction,
  Withdrawal,
} from "@cardflow/types";

// ─── Reader Contract ─────────────────────────────────────────────────────

/**
 * Filter for transaction queries. Instants bound a half-open window
 * `[from, to)`.
 */
export interface TransactionQuery {
  readonly cardId?: number | undefined;
  readonly clientId?: number | undefined;
  readonly from?: Instant | undefined;
  readonly to?: Instant | undefined;
  /** Order by event timestamp. Default: "asc". */
  readonly order?: "asc" | "desc" | undefined;
}

/**
 * Filter for withdrawal queries. Days bound a half-open window `[from, to)`.
 */
export interface WithdrawalQuery {
  readonly cardId?: number | undefined;
  readonly from?: CalendarDay | undefined;
  readonly to?: CalendarDay | undefined;
}

/**
 * Read side of the ledger store consumed by the engine and builders.
 *
 * Implementations return records in no particular order unless stated;
 * the engine never assumes one row per (card, date).
 */
export interface LedgerReader {
  listTransactions(query: TransactionQuery): readonly Transaction[];
  sumTransactionAmounts(query: TransactionQuery): Amount;
  listWithdrawals(query: WithdrawalQuery): readonly Withdrawal[];
  getCard(id: number): Card | undefined;
  getClient(id: number): Client | undefined;
}

// ─── Engine Results ──────────────────────────────────────────────────────

/**
 * Balance position of one card on one day.
 */
export interface DayBalance {
  readonly cardId: number;
  readonly day: CalendarDay;
  /** Carried in from all activity strictly before the day */
  readonly carried: Amount;
  /** Received during the day */
  readonly received: Amount;
  /** carried + received */
  readonly shouldHave: Amount;
}

/**
 * Non-carry-aware totals over a day range.
 * balance = received - withdrawn - commission (may be negative).
 */
export interface RangeTotals {
  readonly received: Amount;
  readonly withdrawn: Amount;
  readonly commission: Amount;
  readonly balance: Amount;
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger operations. */
export type LedgerErrorCode =
  | "INVALID_AMOUNT"
  | "INVALID_DATE"
  | "INVALID_TIMESTAMP"
  | "INVALID_OFFSET"
  | "VALIDATION_FAILED";

/**
 * Structured error from the ledger engine.
 * Always thrown; never returns error codes silently.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}

/** A message tied to one input field. */
export interface FieldError {
  readonly field: string;
  readonly message: string;
}

/**
 * Thrown when a request struct fails validation.
 * Carries every field-level problem found, not only the first.
 */
export class InputValidationError extends LedgerError {
  public readonly fieldErrors: readonly FieldError[];

  constructor(fieldErrors: readonly FieldError[]) {
    super(
      "VALIDATION_FAILED",
      fieldErrors.map((e) => `${e.field}: ${e.message}`).join("; "),
    );
    this.name = "InputValidationError";
    this.fieldErrors = fieldErrors;
  }
}

/** Outcome of a pure validation function. */
export type ValidationResult<T> =
  | { readonly valid: true; readonly value: T }
  | { readonly valid: false; readonly errors: readonly FieldError[] };

/**
 * Unwrap a validation result, throwing InputValidationError on failure.
 */
export function assertValid<T>(result: ValidationResult<T>): T {
  if (!result.valid) {
    throw new InputValidationError(result.errors);
  }
  return result.value;
}
