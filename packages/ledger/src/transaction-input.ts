/**
 * @cardflow/ledger: Transaction save contract.
 *
 * Validates a transaction form and resolves its event timestamp.
 * The rate is never taken from input; the store derives it on save.
 */

import type { Amount, Instant } from "@cardflow/types";
import type { FieldError, ValidationResult } from "./types.js";
import { LedgerError } from "./types.js";
import type { ReferenceZone } from "./calendar.js";
import { parseUserTimestamp } from "./calendar.js";
import { parseUserAmount, zeroAmount } from "./money-math.js";

export interface TransactionForm {
  readonly cardId?: number | null | undefined;
  readonly clientId?: number | null | undefined;
  readonly amount?: string | null | undefined;
  readonly secondaryAmount?: string | null | undefined;
  /** Timestamp text as submitted */
  readonly timestamp?: string | null | undefined;
  /** Timestamp text the edit form showed when it was opened */
  readonly renderedTimestamp?: string | null | undefined;
  /** Stored instant behind renderedTimestamp */
  readonly originalTimestamp?: Instant | null | undefined;
  readonly notes?: string | null | undefined;
}

export interface TransactionDraft {
  readonly cardId: number;
  readonly clientId: number;
  readonly amount: Amount;
  readonly secondaryAmount: Amount;
  readonly timestamp: Instant;
  readonly notes: string;
}

/** Outcome of the timestamp dirty check. */
export type TimestampResolution =
  | { readonly ok: true; readonly instant: Instant; readonly changed: boolean }
  | { readonly ok: false; readonly message: string };

/**
 * Resolve an edited timestamp field.
 *
 * When the submitted text equals the text originally rendered, the stored
 * instant is returned unchanged, byte for byte. Otherwise the text is
 * parsed in the reference zone. Blank text falls back to the original
 * instant, or to `now` on a new record.
 */
export function resolveEditedTimestamp(
  text: string | null | undefined,
  rendered: string | null | undefined,
  original: Instant | null | undefined,
  zone: ReferenceZone,
  now: Date = new Date(),
): TimestampResolution {
  const submitted = text?.trim() ?? "";
  const hasOriginal = original !== null && original !== undefined;

  if (hasOriginal && (submitted === "" || submitted === (rendered?.trim() ?? null))) {
    return { ok: true, instant: original, changed: false };
  }

  if (submitted === "") {
    return { ok: true, instant: now.toISOString(), changed: true };
  }

  const parsed = parseUserTimestamp(submitted, zone);
  if (parsed === null) {
    return { ok: false, message: `Enter a valid date and time: "${submitted}"` };
  }
  return { ok: true, instant: parsed, changed: parsed !== original };
}

function requireId(field: string, value: number | null | undefined, label: string, errors: FieldError[]): number | null {
  if (value === null || value === undefined) {
    errors.push({ field, message: `${label} is required` });
    return null;
  }
  if (!Number.isInteger(value) || value <= 0) {
    errors.push({ field, message: `${label} id must be a positive integer` });
    return null;
  }
  return value;
}

function parseField(field: string, raw: string | null | undefined, errors: FieldError[]): Amount | null {
  try {
    return parseUserAmount(raw ?? "");
  } catch (err) {
    if (err instanceof LedgerError) {
      errors.push({ field, message: err.message });
      return null;
    }
    throw err;
  }
}

/**
 * Validate a transaction form.
 *
 * amount is required; a blank secondary amount is stored as "0.00",
 * which leaves the rate null.
 */
export function validateTransactionForm(
  form: TransactionForm,
  zone: ReferenceZone,
  now: Date = new Date(),
): ValidationResult<TransactionDraft> {
  const errors: FieldError[] = [];

  const cardId = requireId("cardId", form.cardId, "Card", errors);
  const clientId = requireId("clientId", form.clientId, "Client", errors);

  const amount = parseField("amount", form.amount, errors);
  if (amount === null && !errors.some((e) => e.field === "amount")) {
    errors.push({ field: "amount", message: "Amount is required" });
  }
  const secondaryAmount = parseField("secondaryAmount", form.secondaryAmount, errors) ?? zeroAmount();

  const resolution = resolveEditedTimestamp(
    form.timestamp,
    form.renderedTimestamp,
    form.originalTimestamp,
    zone,
    now,
  );
  if (!resolution.ok) {
    errors.push({ field: "timestamp", message: resolution.message });
  }

  if (errors.length > 0 || cardId === null || clientId === null || amount === null || !resolution.ok) {
    return { valid: false, errors };
  }

  return {
    valid: true,
    value: {
      cardId,
      clientId,
      amount,
      secondaryAmount,
      timestamp: resolution.instant,
      notes: form.notes?.trim() ?? "",
    },
  };
}
