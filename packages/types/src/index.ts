/**
 * @cardflow/types: Shared domain types for the cardflow stack.
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in types; meaning lives in consuming code
 */

// Financial types
export type {
  Amount,
  CalendarDay,
  Instant,
  Transaction,
  Withdrawal,
  DayRange,
} from "./financial.js";

// Registry types
export type {
  Card,
  CardStatus,
  Client,
  ClientStatus,
  CardGroup,
  BankColor,
  Operator,
  OperatorRole,
} from "./registry.js";

// Runtime guards
export {
  isCalendarDay,
  isInstant,
  isAmount,
  isCardStatus,
  isClientStatus,
  isOperatorRole,
  isBankColorValue,
  isCard,
  isClient,
  isCardGroup,
  isBankColor,
  isTransaction,
  isWithdrawal,
  isOperator,
} from "./guards.js";
