/**
 * @cardflow/ledger: Withdrawal save contract.
 *
 * Turns raw operator input into the fields of an upsert keyed on
 * (cardId, date). Pure: nothing is written here.
 */

import type { Amount, CalendarDay, Instant } from "@cardflow/types";
import type { FieldError, ValidationResult } from "./types.js";
import { LedgerError } from "./types.js";
import type { ReferenceZone } from "./calendar.js";
import { parseUserDate, parseUserTimestamp } from "./calendar.js";
import { parseUserAmount, zeroAmount } from "./money-math.js";

/** Raw input as submitted. Amounts are user text ("1 200,50"). */
export interface WithdrawalForm {
  readonly cardId?: number | null | undefined;
  readonly date?: string | null | undefined;
  readonly fullyWithdrawn?: boolean | null | undefined;
  readonly withdrawnAmount?: string | null | undefined;
  readonly commission?: string | null | undefined;
  readonly timestamp?: string | null | undefined;
  readonly note?: string | null | undefined;
}

/**
 * Validated upsert fields.
 *
 * withdrawnAmount is always null when fullyWithdrawn is set.
 * timestamp and note are undefined when the input left them out, in which
 * case an existing row keeps its values.
 */
export interface WithdrawalUpsert {
  readonly cardId: number;
  readonly date: CalendarDay;
  readonly fullyWithdrawn: boolean;
  readonly withdrawnAmount: Amount | null;
  readonly commission: Amount;
  readonly timestamp: Instant | undefined;
  readonly note: string | undefined;
}

function amountField(
  field: string,
  raw: string | null | undefined,
  errors: FieldError[],
): Amount | null {
  if (raw === null || raw === undefined) {
    return null;
  }
  try {
    const amount = parseUserAmount(raw);
    if (amount !== null && amount.startsWith("-")) {
      errors.push({ field, message: "Must not be negative" });
      return null;
    }
    return amount;
  } catch (err) {
    if (err instanceof LedgerError) {
      errors.push({ field, message: err.message });
      return null;
    }
    throw err;
  }
}

/**
 * Validate a withdrawal save.
 *
 * - cardId and date are required
 * - fullyWithdrawn defaults to false and is always set explicitly
 * - a full withdrawal discards any submitted amount
 * - a blank amount is stored as null, a blank commission as "0.00"
 */
export function validateWithdrawalForm(
  form: WithdrawalForm,
  zone: ReferenceZone,
): ValidationResult<WithdrawalUpsert> {
  const errors: FieldError[] = [];

  const cardId = form.cardId;
  if (cardId === null || cardId === undefined) {
    errors.push({ field: "cardId", message: "Card is required" });
  } else if (!Number.isInteger(cardId) || cardId <= 0) {
    errors.push({ field: "cardId", message: "Card id must be a positive integer" });
  }

  let date: CalendarDay | null = null;
  const rawDate = form.date?.trim() ?? "";
  if (rawDate === "") {
    errors.push({ field: "date", message: "Date is required" });
  } else {
    date = parseUserDate(rawDate);
    if (date === null) {
      errors.push({ field: "date", message: `Enter a valid date: "${rawDate}"` });
    }
  }

  const fullyWithdrawn = form.fullyWithdrawn ?? false;

  const submitted = amountField("withdrawnAmount", form.withdrawnAmount, errors);
  const withdrawnAmount = fullyWithdrawn ? null : submitted;
  const commission = amountField("commission", form.commission, errors) ?? zeroAmount();

  let timestamp: Instant | undefined;
  const rawTimestamp = form.timestamp?.trim() ?? "";
  if (rawTimestamp !== "") {
    const parsed = parseUserTimestamp(rawTimestamp, zone);
    if (parsed === null) {
      errors.push({ field: "timestamp", message: `Enter a valid date and time: "${rawTimestamp}"` });
    } else {
      timestamp = parsed;
    }
  }

  if (errors.length > 0 || date === null || cardId === null || cardId === undefined) {
    return { valid: false, errors };
  }

  return {
    valid: true,
    value: {
      cardId,
      date,
      fullyWithdrawn,
      withdrawnAmount,
      commission,
      timestamp,
      note: form.note === null || form.note === undefined ? undefined : form.note.trim(),
    },
  };
}
