/**
 * Financial Types
 *
 * Money movements recorded against a card: incoming transactions
 * (credits) and cash withdrawals (debits).
 *
 * Rules:
 * - All amounts are strings to avoid floating-point errors
 * - Amounts carry exactly two decimal places ("1000.00")
 * - Instants are ISO 8601 UTC strings; calendar days are "YYYY-MM-DD"
 *   in the configured reference timezone
 */

/**
 * A decimal amount in the primary (balance) currency, two decimal places.
 * Example: "1250.00", "-40.50".
 */
export type Amount = string;

/**
 * A calendar day in the reference timezone, formatted "YYYY-MM-DD".
 */
export type CalendarDay = string;

/**
 * An absolute point in time, ISO 8601 in UTC ("2026-01-06T07:00:00.000Z").
 */
export type Instant = string;

/**
 * Money received on a card on behalf of a client.
 */
export interface Transaction {
  readonly id: number;

  /** When the record was added (informational only) */
  readonly createdAt: Instant;

  /** When the payment happened; the time axis of every balance computation */
  readonly timestamp: Instant;

  readonly cardId: number;
  readonly clientId: number;

  /** Amount in the primary currency */
  readonly amount: Amount;

  /** Amount in the secondary (reference) currency */
  readonly secondaryAmount: Amount;

  /**
   * amount / secondaryAmount with six decimal places.
   * Derived on every save; null when secondaryAmount is zero.
   */
  readonly rate: string | null;

  readonly notes: string;
}

/**
 * One cash-withdrawal event against a card for a calendar day.
 *
 * Logically there is one record per (cardId, date). Duplicates may exist
 * transiently and are collapsed to the most recent before aggregation.
 */
export interface Withdrawal {
  readonly id: number;

  /** The day this withdrawal applies to */
  readonly date: CalendarDay;

  /** Precise moment of the withdrawal, when known */
  readonly timestamp: Instant | null;

  readonly cardId: number;

  /**
   * When true the stored withdrawnAmount is ignored: the effective amount
   * is the card's whole should-have amount for the day.
   */
  readonly fullyWithdrawn: boolean;

  /** Stored amount; meaningful only when not fully withdrawn */
  readonly withdrawnAmount: Amount | null;

  /** Fee taken on withdrawal, non-negative */
  readonly commission: Amount;

  readonly note: string;
}

/**
 * Half-open or inclusive day range, depending on the consumer.
 * Either end may be omitted.
 */
export interface DayRange {
  readonly start?: CalendarDay | undefined;
  readonly end?: CalendarDay | undefined;
}
