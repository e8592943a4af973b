/**
 * @cardflow/ledger: Deterministic monetary arithmetic.
 *
 * All arithmetic uses bigint internally for precision.
 * Amounts are two-place decimal strings; rates carry six places.
 *
 * Rules:
 * - No floating-point operations
 * - Stored amounts are always normalized ("1000" → "1000.00")
 * - User input may use "," or "." as the decimal separator and
 *   spaces as thousands separators
 */

import type { Amount } from "@cardflow/types";
import { LedgerError } from "./types.js";

export const AMOUNT_DECIMALS = 2;
export const RATE_DECIMALS = 6;

const ZERO: Amount = "0.00";

// ─── Scaling ─────────────────────────────────────────────────────────────

/**
 * Parse a decimal string amount into a bigint scaled by decimals.
 *
 * "100.50" with decimals=2 → 10050n
 * "100" with decimals=2 → 10000n
 * "-50.25" with decimals=2 → -5025n
 */
export function parseAmount(amount: string, decimals: number = AMOUNT_DECIMALS): bigint {
  const trimmed = amount.trim();

  if (!/^-?\d+(\.\d+)?$/.test(trimmed)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount format: "${trimmed}"`);
  }

  const negative = trimmed.startsWith("-");
  const abs = negative ? trimmed.slice(1) : trimmed;
  const [intPart = "0", fracPart = ""] = abs.split(".");

  if (fracPart.length > decimals) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Amount "${trimmed}" has ${String(fracPart.length)} decimal places, at most ${String(decimals)} allowed`,
    );
  }

  const value = BigInt(intPart + fracPart.padEnd(decimals, "0"));
  return negative ? -value : value;
}

/**
 * Convert a scaled bigint back to a decimal string.
 *
 * 10050n with decimals=2 → "100.50"
 * -5025n with decimals=2 → "-50.25"
 */
export function formatAmount(scaled: bigint, decimals: number = AMOUNT_DECIMALS): string {
  if (decimals === 0) {
    return scaled.toString();
  }

  const negative = scaled < 0n;
  const abs = negative ? -scaled : scaled;
  const str = abs.toString().padStart(decimals + 1, "0");
  const result = `${str.slice(0, str.length - decimals)}.${str.slice(str.length - decimals)}`;

  return negative ? `-${result}` : result;
}

// ─── Amount Operations ───────────────────────────────────────────────────

/** Normalize any valid decimal string to a two-place Amount. */
export function normalizeAmount(amount: string): Amount {
  return formatAmount(parseAmount(amount));
}

export function zeroAmount(): Amount {
  return ZERO;
}

export function sumAmounts(amounts: Iterable<Amount>): Amount {
  let total = 0n;
  for (const amount of amounts) {
    total += parseAmount(amount);
  }
  return formatAmount(total);
}

/** Clamp a negative minor-unit value to zero. */
export function floorAtZero(minor: bigint): bigint {
  return minor < 0n ? 0n : minor;
}

// ─── Rate ────────────────────────────────────────────────────────────────

/**
 * primary / secondary with six decimal places, rounded half away from zero.
 * Returns null when the secondary amount is zero.
 *
 * computeRate("1000.00", "12.50") → "80.000000"
 */
export function computeRate(primary: Amount, secondary: Amount): string | null {
  const p = parseAmount(primary);
  const s = parseAmount(secondary);
  if (s === 0n) {
    return null;
  }

  const negative = (p < 0n) !== (s < 0n);
  const absP = p < 0n ? -p : p;
  const absS = s < 0n ? -s : s;
  const scale = 10n ** BigInt(RATE_DECIMALS);

  // Both operands share the same scale, so it cancels out of the quotient.
  const rounded = (absP * scale * 2n + absS) / (absS * 2n);
  return formatAmount(negative && rounded !== 0n ? -rounded : rounded, RATE_DECIMALS);
}

// ─── User Input ──────────────────────────────────────────────────────────

const SPACES = /\s/g;

/**
 * Parse a user-typed amount.
 *
 * Accepts "1 234,50", "1234.5", "-20". Blank input yields null.
 * Throws LedgerError("INVALID_AMOUNT") for anything else, including
 * more than two decimal places or both separators at once.
 */
export function parseUserAmount(raw: string): Amount | null {
  const compact = raw.replace(SPACES, "");
  if (compact === "") {
    return null;
  }

  if (compact.includes(",") && compact.includes(".")) {
    throw new LedgerError("INVALID_AMOUNT", `Enter a number: "${raw.trim()}"`);
  }

  const dotted = compact.replace(",", ".");
  if (!/^-?\d+(\.\d{1,2})?$/.test(dotted)) {
    throw new LedgerError("INVALID_AMOUNT", `Enter a number: "${raw.trim()}"`);
  }

  return normalizeAmount(dotted);
}

// ─── Display ─────────────────────────────────────────────────────────────

/**
 * Display form of a decimal: truncated to two places, trailing zeros
 * hidden, thousands separated by spaces.
 *
 * "1234567.50" → "1 234 567.5"
 * "80.123456" → "80.12"
 */
export function formatSpaced(value: string): string {
  const trimmed = value.trim();
  if (!/^-?\d+(\.\d+)?$/.test(trimmed)) {
    return trimmed;
  }

  const negative = trimmed.startsWith("-");
  const abs = negative ? trimmed.slice(1) : trimmed;
  const [rawInt = "0", rawFrac = ""] = abs.split(".");
  const intPart = rawInt.replace(/^0+(?=\d)/, "");
  const fracPart = rawFrac.slice(0, AMOUNT_DECIMALS).replace(/0+$/, "");

  if (/^0*$/.test(intPart) && fracPart === "") {
    return "0";
  }

  const groups: string[] = [];
  for (let end = intPart.length; end > 0; end -= 3) {
    groups.unshift(intPart.slice(Math.max(0, end - 3), end));
  }

  const body = fracPart === "" ? groups.join(" ") : `${groups.join(" ")}.${fracPart}`;
  return negative ? `-${body}` : body;
}
