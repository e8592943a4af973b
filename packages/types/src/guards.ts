/**
 * Runtime Type Guards
 *
 * Narrowing functions for cardflow domain types.
 * Used at system boundaries (persisted state, API inputs).
 */

import type { Amount, CalendarDay, Instant, Transaction, Withdrawal } from "./financial.js";
import type {
  BankColor,
  Card,
  CardGroup,
  CardStatus,
  Client,
  ClientStatus,
  Operator,
  OperatorRole,
} from "./registry.js";

const CARD_STATUSES = new Set<string>(["active", "broken", "hold"]);
const CLIENT_STATUSES = new Set<string>(["active", "blocked", "hold"]);
const OPERATOR_ROLES = new Set<string>(["admin", "operator", "viewer"]);

const DAY_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const AMOUNT_PATTERN = /^-?\d+\.\d{2}$/;
const RATE_PATTERN = /^-?\d+\.\d{6}$/;
const COLOR_PATTERN = /^#[0-9a-fA-F]{6}$/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object";
}

function isId(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value > 0;
}

// =============================================================================
// Primitive guards
// =============================================================================

export function isCalendarDay(value: unknown): value is CalendarDay {
  if (typeof value !== "string") return false;
  const match = DAY_PATTERN.exec(value);
  if (match === null) return false;
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const date = new Date(Date.UTC(year, month - 1, day));
  return (
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day
  );
}

export function isInstant(value: unknown): value is Instant {
  return typeof value === "string" && value.length > 0 && Number.isFinite(Date.parse(value));
}

/** Normalized two-place amount ("12.50"). */
export function isAmount(value: unknown): value is Amount {
  return typeof value === "string" && AMOUNT_PATTERN.test(value);
}

export function isCardStatus(value: unknown): value is CardStatus {
  return typeof value === "string" && CARD_STATUSES.has(value);
}

export function isClientStatus(value: unknown): value is ClientStatus {
  return typeof value === "string" && CLIENT_STATUSES.has(value);
}

export function isOperatorRole(value: unknown): value is OperatorRole {
  return typeof value === "string" && OPERATOR_ROLES.has(value);
}

export function isBankColorValue(value: unknown): value is string {
  return typeof value === "string" && COLOR_PATTERN.test(value);
}

// =============================================================================
// Entity guards
// =============================================================================

export function isCard(value: unknown): value is Card {
  if (!isRecord(value)) return false;
  return (
    isId(value.id) &&
    typeof value.name === "string" &&
    value.name.length > 0 &&
    typeof value.bank === "string" &&
    typeof value.cardNumber === "string" &&
    typeof value.pin === "string" &&
    isCardStatus(value.status) &&
    (value.groupId === null || isId(value.groupId)) &&
    typeof value.notes === "string"
  );
}

export function isClient(value: unknown): value is Client {
  if (!isRecord(value)) return false;
  return (
    isId(value.id) &&
    typeof value.name === "string" &&
    value.name.length > 0 &&
    isClientStatus(value.status) &&
    typeof value.notes === "string"
  );
}

export function isCardGroup(value: unknown): value is CardGroup {
  if (!isRecord(value)) return false;
  return isId(value.id) && typeof value.name === "string" && value.name.length > 0;
}

export function isBankColor(value: unknown): value is BankColor {
  if (!isRecord(value)) return false;
  return typeof value.bank === "string" && value.bank.length > 0 && isBankColorValue(value.color);
}

export function isTransaction(value: unknown): value is Transaction {
  if (!isRecord(value)) return false;
  return (
    isId(value.id) &&
    isInstant(value.createdAt) &&
    isInstant(value.timestamp) &&
    isId(value.cardId) &&
    isId(value.clientId) &&
    isAmount(value.amount) &&
    isAmount(value.secondaryAmount) &&
    (value.rate === null || (typeof value.rate === "string" && RATE_PATTERN.test(value.rate))) &&
    typeof value.notes === "string"
  );
}

export function isWithdrawal(value: unknown): value is Withdrawal {
  if (!isRecord(value)) return false;
  return (
    isId(value.id) &&
    isCalendarDay(value.date) &&
    (value.timestamp === null || isInstant(value.timestamp)) &&
    isId(value.cardId) &&
    typeof value.fullyWithdrawn === "boolean" &&
    (value.withdrawnAmount === null || isAmount(value.withdrawnAmount)) &&
    isAmount(value.commission) &&
    typeof value.note === "string"
  );
}

export function isOperator(value: unknown): value is Operator {
  if (!isRecord(value)) return false;
  return (
    isId(value.id) &&
    typeof value.name === "string" &&
    value.name.length > 0 &&
    isOperatorRole(value.role) &&
    typeof value.keyHash === "string" &&
    value.keyHash.length > 0 &&
    isInstant(value.createdAt)
  );
}
