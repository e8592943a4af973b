/**
 * @cardflow/store: Core types.
 *
 * The ledger store is the persistence collaborator behind the balance
 * engine: cards, clients, groups, bank colors, transactions, withdrawals
 * and provisioned operators.
 *
 * Design principles:
 * - Every mutating call is atomic: it either fully applies or leaves the
 *   state untouched
 * - Records are immutable values; updates replace them
 * - Ids are positive integers assigned in increasing order per kind
 * - Referential rules are enforced here, not by callers
 */

import type {
  BankColor,
  Card,
  CardGroup,
  CardStatus,
  Client,
  ClientStatus,
  Operator,
  OperatorRole,
  Transaction,
  Withdrawal,
} from "@cardflow/types";
import type { LedgerReader, TransactionDraft, WithdrawalUpsert } from "@cardflow/ledger";

// =============================================================================
// Inputs
// =============================================================================

/**
 * Card fields for create and update. Omitted fields take their defaults
 * on create and keep their stored value on update.
 */
export interface CardInput {
  readonly name: string;
  readonly bank?: string | undefined;
  readonly cardNumber?: string | undefined;
  readonly pin?: string | undefined;
  readonly status?: CardStatus | undefined;
  /**
   * Group by name: an existing group matches case-insensitively,
   * otherwise one is created. A blank name clears the group.
   */
  readonly groupName?: string | undefined;
  readonly notes?: string | undefined;
}

export interface ClientInput {
  readonly name: string;
  readonly status?: ClientStatus | undefined;
  readonly notes?: string | undefined;
}

export interface OperatorInput {
  readonly name: string;
  readonly role: OperatorRole;
  /** SHA-256 hex of the API key */
  readonly keyHash: string;
}

/** Result of a get-or-create call. */
export interface Ensured<T> {
  readonly record: T;
  readonly created: boolean;
}

export const DEFAULT_BANK_COLOR = "#000000";

// =============================================================================
// Persisted State
// =============================================================================

/** Next id per record kind. */
export interface IdCounters {
  readonly card: number;
  readonly client: number;
  readonly group: number;
  readonly transaction: number;
  readonly withdrawal: number;
  readonly operator: number;
}

/**
 * Complete store contents. Arrays are ordered by id; bank colors by bank.
 * This is what FileLedgerStore writes and what snapshot/restore exchange.
 */
export interface StoreState {
  readonly version: 1;
  readonly nextIds: IdCounters;
  readonly cards: readonly Card[];
  readonly clients: readonly Client[];
  readonly groups: readonly CardGroup[];
  readonly bankColors: readonly BankColor[];
  readonly transactions: readonly Transaction[];
  readonly withdrawals: readonly Withdrawal[];
  readonly operators: readonly Operator[];
}

// =============================================================================
// Store Interface
// =============================================================================

/**
 * Ledger store.
 *
 * Extends the engine's read contract with entity management and the
 * withdrawal upsert. All methods are synchronous.
 */
export interface LedgerStore extends LedgerReader {
  // ─── Cards ────────────────────────────────────────────────────────────

  /** All cards ordered by name, then id. */
  listCards(): readonly Card[];

  /** Throws CARD_NOT_FOUND. */
  requireCard(id: number): Card;

  /** Throws DUPLICATE_CARD when the (name, bank, cardNumber) triple exists. */
  createCard(input: CardInput): Card;

  /** Returns the card with the input's identity triple, creating it if absent. */
  getOrCreateCard(input: CardInput): Ensured<Card>;

  updateCard(id: number, input: Partial<CardInput>): Card;

  /**
   * Delete a card and its withdrawals. Refused with CARD_HAS_TRANSACTIONS
   * while any transaction references the card.
   *
   * @returns Number of withdrawal rows removed with the card
   */
  deleteCard(id: number): number;

  // ─── Clients ──────────────────────────────────────────────────────────

  /** All clients ordered by name. */
  listClients(): readonly Client[];

  /** Case-insensitive substring match on name, ordered by name. */
  searchClients(query: string): readonly Client[];

  requireClient(id: number): Client;
  createClient(input: ClientInput): Client;
  getOrCreateClient(name: string): Ensured<Client>;
  updateClient(id: number, input: Partial<ClientInput>): Client;

  /** Refused with CLIENT_HAS_TRANSACTIONS while referenced. */
  deleteClient(id: number): void;

  // ─── Groups ───────────────────────────────────────────────────────────

  listGroups(): readonly CardGroup[];
  getGroup(id: number): CardGroup | undefined;

  /** Case-insensitive match on name, otherwise create. */
  getOrCreateGroup(name: string): Ensured<CardGroup>;

  /** Throws DUPLICATE_GROUP when another group has the name. */
  renameGroup(id: number, name: string): CardGroup;

  /**
   * Delete a group; member cards are unlinked, not deleted.
   *
   * @returns Number of cards unlinked
   */
  deleteGroup(id: number): number;

  // ─── Banks ────────────────────────────────────────────────────────────

  /** Distinct non-empty bank names across cards, sorted. */
  listBankNames(): readonly string[];

  /** The bank's color, or DEFAULT_BANK_COLOR. */
  bankColor(bank: string): string;

  setBankColor(bank: string, color: string): BankColor;

  // ─── Transactions ─────────────────────────────────────────────────────

  getTransaction(id: number): Transaction | undefined;

  /** Derives the rate; card and client must exist. */
  createTransaction(draft: TransactionDraft): Transaction;

  updateTransaction(id: number, draft: TransactionDraft): Transaction;
  deleteTransaction(id: number): void;

  // ─── Withdrawals ──────────────────────────────────────────────────────

  /**
   * Upsert keyed on (cardId, date). Updates the latest existing row, or
   * creates one, and removes any stale duplicates for the key.
   */
  upsertWithdrawal(upsert: WithdrawalUpsert): Withdrawal;

  // ─── Operators ────────────────────────────────────────────────────────

  listOperators(): readonly Operator[];
  findOperatorByName(name: string): Operator | undefined;
  findOperatorByKeyHash(keyHash: string): Operator | undefined;
  createOperator(input: OperatorInput): Operator;

  // ─── Unit of Work ─────────────────────────────────────────────────────

  /**
   * Run `fn` atomically. Any throw restores the state as it was before
   * the call. Nested calls join the outermost unit.
   */
  transaction<T>(fn: () => T): T;

  /** Copy of the complete state. */
  snapshot(): StoreState;

  /** SHA-256 of the canonical JSON of the current state. */
  stateHash(): string;

  /** True when persisted state matches memory (always true in memory). */
  verify(): boolean;
}

// =============================================================================
// Errors
// =============================================================================

export type StoreErrorCode =
  | "CARD_NOT_FOUND"
  | "CLIENT_NOT_FOUND"
  | "GROUP_NOT_FOUND"
  | "TRANSACTION_NOT_FOUND"
  | "DUPLICATE_CARD"
  | "DUPLICATE_CLIENT"
  | "DUPLICATE_GROUP"
  | "DUPLICATE_OPERATOR"
  | "CARD_HAS_TRANSACTIONS"
  | "CLIENT_HAS_TRANSACTIONS"
  | "CORRUPT_STATE"
  | "STALE_STATE"
  | "INVALID_RECORD";

/**
 * Error thrown by ledger store operations.
 */
export class StoreError extends Error {
  public readonly code: StoreErrorCode;

  constructor(code: StoreErrorCode, message: string) {
    super(message);
    this.name = "StoreError";
    this.code = code;
  }
}
