/**
 * @cardflow/store: In-memory LedgerStore implementation.
 *
 * Keeps every record kind in a Map keyed by id. Suitable for:
 * - Unit and integration tests
 * - Short-lived processes
 * - The base of FileLedgerStore, which persists after each commit
 *
 * Properties:
 * - O(1) lookup by id
 * - O(n) filtered reads (where n = records of that kind)
 * - Atomic mutations via snapshot and restore
 */

import type {
  Amount,
  BankColor,
  Card,
  CardGroup,
  Client,
  Operator,
  Transaction,
  Withdrawal,
} from "@cardflow/types";
import { isBankColorValue, isCalendarDay, isInstant } from "@cardflow/types";
import type {
  TransactionDraft,
  TransactionQuery,
  WithdrawalQuery,
  WithdrawalUpsert,
} from "@cardflow/ledger";
import { computeRate, dedupeByDate, normalizeAmount, parseAmount, sumAmounts } from "@cardflow/ledger";
import type {
  CardInput,
  ClientInput,
  Ensured,
  IdCounters,
  LedgerStore,
  OperatorInput,
  StoreState,
} from "./types.js";
import { DEFAULT_BANK_COLOR, StoreError } from "./types.js";
import { computeStateHash, emptyState } from "./state.js";

type Counters = { -readonly [K in keyof IdCounters]: number };

const KEY_HASH_PATTERN = /^[0-9a-f]{64}$/;

function byName<T extends { readonly name: string; readonly id: number }>(a: T, b: T): number {
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return a.id - b.id;
}

function byId<T extends { readonly id: number }>(a: T, b: T): number {
  return a.id - b.id;
}

function sameText(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

export interface InMemoryLedgerStoreOptions {
  /** Starting contents. Default: empty. */
  readonly initialState?: StoreState | undefined;
  /** Clock for createdAt stamps. Default: system time. */
  readonly now?: (() => Date) | undefined;
}

/**
 * In-memory ledger store.
 */
export class InMemoryLedgerStore implements LedgerStore {
  private readonly _cards = new Map<number, Card>();
  private readonly _clients = new Map<number, Client>();
  private readonly _groups = new Map<number, CardGroup>();
  private readonly _bankColors = new Map<string, BankColor>();
  private readonly _transactions = new Map<number, Transaction>();
  private readonly _withdrawals = new Map<number, Withdrawal>();
  private readonly _operators = new Map<number, Operator>();
  private _nextIds: Counters = { ...emptyState().nextIds };

  /** Depth of nested transaction() calls */
  private _depth = 0;

  protected readonly now: () => Date;

  constructor(options: InMemoryLedgerStoreOptions = {}) {
    this.now = options.now ?? (() => new Date());
    this.restore(options.initialState ?? emptyState());
  }

  // ===========================================================================
  // Reader
  // ===========================================================================

  getCard(id: number): Card | undefined {
    return this._cards.get(id);
  }

  getClient(id: number): Client | undefined {
    return this._clients.get(id);
  }

  listTransactions(query: TransactionQuery): readonly Transaction[] {
    const from = query.from !== undefined ? Date.parse(query.from) : Number.NEGATIVE_INFINITY;
    const to = query.to !== undefined ? Date.parse(query.to) : Number.POSITIVE_INFINITY;

    const rows: Transaction[] = [];
    for (const tx of this._transactions.values()) {
      if (query.cardId !== undefined && tx.cardId !== query.cardId) continue;
      if (query.clientId !== undefined && tx.clientId !== query.clientId) continue;
      const at = Date.parse(tx.timestamp);
      if (at < from || at >= to) continue;
      rows.push(tx);
    }

    rows.sort((a, b) => Date.parse(a.timestamp) - Date.parse(b.timestamp) || a.id - b.id);
    return query.order === "desc" ? rows.reverse() : rows;
  }

  sumTransactionAmounts(query: TransactionQuery): Amount {
    return sumAmounts(this.listTransactions(query).map((tx) => tx.amount));
  }

  listWithdrawals(query: WithdrawalQuery): readonly Withdrawal[] {
    const rows: Withdrawal[] = [];
    for (const record of this._withdrawals.values()) {
      if (query.cardId !== undefined && record.cardId !== query.cardId) continue;
      if (query.from !== undefined && record.date < query.from) continue;
      if (query.to !== undefined && record.date >= query.to) continue;
      rows.push(record);
    }
    return rows.sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : a.id - b.id));
  }

  // ===========================================================================
  // Cards
  // ===========================================================================

  listCards(): readonly Card[] {
    return [...this._cards.values()].sort(byName);
  }

  requireCard(id: number): Card {
    const card = this._cards.get(id);
    if (card === undefined) {
      throw new StoreError("CARD_NOT_FOUND", `Card ${String(id)} not found`);
    }
    return card;
  }

  createCard(input: CardInput): Card {
    return this.transaction(() => {
      const card = this.resolveCard(this.takeId("card"), input, undefined);
      this._cards.set(card.id, card);
      return card;
    });
  }

  getOrCreateCard(input: CardInput): Ensured<Card> {
    return this.transaction(() => {
      const existing = this.findCardByIdentity(
        input.name.trim(),
        (input.bank ?? "").trim(),
        (input.cardNumber ?? "").trim(),
      );
      if (existing !== undefined) {
        return { record: existing, created: false };
      }
      return { record: this.createCard(input), created: true };
    });
  }

  updateCard(id: number, input: Partial<CardInput>): Card {
    return this.transaction(() => {
      const card = this.resolveCard(id, input, this.requireCard(id));
      this._cards.set(id, card);
      return card;
    });
  }

  deleteCard(id: number): number {
    return this.transaction(() => {
      const card = this.requireCard(id);
      for (const tx of this._transactions.values()) {
        if (tx.cardId === id) {
          throw new StoreError(
            "CARD_HAS_TRANSACTIONS",
            `Cannot delete card "${card.name}" with existing transactions. Delete them first.`,
          );
        }
      }

      let removed = 0;
      for (const record of [...this._withdrawals.values()]) {
        if (record.cardId === id) {
          this._withdrawals.delete(record.id);
          removed++;
        }
      }
      this._cards.delete(id);
      return removed;
    });
  }

  // ===========================================================================
  // Clients
  // ===========================================================================

  listClients(): readonly Client[] {
    return [...this._clients.values()].sort(byName);
  }

  searchClients(query: string): readonly Client[] {
    const needle = query.trim().toLowerCase();
    return this.listClients().filter((c) => c.name.toLowerCase().includes(needle));
  }

  requireClient(id: number): Client {
    const client = this._clients.get(id);
    if (client === undefined) {
      throw new StoreError("CLIENT_NOT_FOUND", `Client ${String(id)} not found`);
    }
    return client;
  }

  createClient(input: ClientInput): Client {
    return this.transaction(() => {
      const client = this.resolveClient(this.takeId("client"), input, undefined);
      this._clients.set(client.id, client);
      return client;
    });
  }

  getOrCreateClient(name: string): Ensured<Client> {
    return this.transaction(() => {
      const trimmed = name.trim();
      const existing = this.findClientByName(trimmed);
      if (existing !== undefined) {
        return { record: existing, created: false };
      }
      return { record: this.createClient({ name: trimmed }), created: true };
    });
  }

  updateClient(id: number, input: Partial<ClientInput>): Client {
    return this.transaction(() => {
      const client = this.resolveClient(id, input, this.requireClient(id));
      this._clients.set(id, client);
      return client;
    });
  }

  deleteClient(id: number): void {
    this.transaction(() => {
      const client = this.requireClient(id);
      for (const tx of this._transactions.values()) {
        if (tx.clientId === id) {
          throw new StoreError(
            "CLIENT_HAS_TRANSACTIONS",
            `Cannot delete client "${client.name}" with existing transactions.`,
          );
        }
      }
      this._clients.delete(id);
    });
  }

  // ===========================================================================
  // Groups
  // ===========================================================================

  listGroups(): readonly CardGroup[] {
    return [...this._groups.values()].sort(byName);
  }

  getGroup(id: number): CardGroup | undefined {
    return this._groups.get(id);
  }

  getOrCreateGroup(name: string): Ensured<CardGroup> {
    return this.transaction(() => {
      const trimmed = this.requireName(name, "Group");
      const existing = this.findGroupByName(trimmed);
      if (existing !== undefined) {
        return { record: existing, created: false };
      }
      const group: CardGroup = { id: this.takeId("group"), name: trimmed };
      this._groups.set(group.id, group);
      return { record: group, created: true };
    });
  }

  renameGroup(id: number, name: string): CardGroup {
    return this.transaction(() => {
      this.requireGroup(id);
      const trimmed = this.requireName(name, "Group");
      const clash = this.findGroupByName(trimmed);
      if (clash !== undefined && clash.id !== id) {
        throw new StoreError("DUPLICATE_GROUP", `Group "${trimmed}" already exists`);
      }
      const group: CardGroup = { id, name: trimmed };
      this._groups.set(id, group);
      return group;
    });
  }

  deleteGroup(id: number): number {
    return this.transaction(() => {
      this.requireGroup(id);
      let unlinked = 0;
      for (const card of [...this._cards.values()]) {
        if (card.groupId === id) {
          this._cards.set(card.id, { ...card, groupId: null });
          unlinked++;
        }
      }
      this._groups.delete(id);
      return unlinked;
    });
  }

  // ===========================================================================
  // Banks
  // ===========================================================================

  listBankNames(): readonly string[] {
    const names = new Set<string>();
    for (const card of this._cards.values()) {
      if (card.bank !== "") {
        names.add(card.bank);
      }
    }
    return [...names].sort();
  }

  bankColor(bank: string): string {
    return this._bankColors.get(bank.trim())?.color ?? DEFAULT_BANK_COLOR;
  }

  setBankColor(bank: string, color: string): BankColor {
    return this.transaction(() => {
      const name = this.requireName(bank, "Bank");
      if (!isBankColorValue(color)) {
        throw new StoreError("INVALID_RECORD", `Color must be #RRGGBB, got "${color}"`);
      }
      const entry: BankColor = { bank: name, color: color.toLowerCase() };
      this._bankColors.set(name, entry);
      return entry;
    });
  }

  // ===========================================================================
  // Transactions
  // ===========================================================================

  getTransaction(id: number): Transaction | undefined {
    return this._transactions.get(id);
  }

  createTransaction(draft: TransactionDraft): Transaction {
    return this.transaction(() => {
      const tx = this.resolveTransaction(
        this.takeId("transaction"),
        this.now().toISOString(),
        draft,
      );
      this._transactions.set(tx.id, tx);
      return tx;
    });
  }

  updateTransaction(id: number, draft: TransactionDraft): Transaction {
    return this.transaction(() => {
      const existing = this._transactions.get(id);
      if (existing === undefined) {
        throw new StoreError("TRANSACTION_NOT_FOUND", `Transaction ${String(id)} not found`);
      }
      const tx = this.resolveTransaction(id, existing.createdAt, draft);
      this._transactions.set(id, tx);
      return tx;
    });
  }

  deleteTransaction(id: number): void {
    this.transaction(() => {
      if (!this._transactions.delete(id)) {
        throw new StoreError("TRANSACTION_NOT_FOUND", `Transaction ${String(id)} not found`);
      }
    });
  }

  // ===========================================================================
  // Withdrawals
  // ===========================================================================

  upsertWithdrawal(upsert: WithdrawalUpsert): Withdrawal {
    return this.transaction(() => {
      this.requireCard(upsert.cardId);
      if (!isCalendarDay(upsert.date)) {
        throw new StoreError("INVALID_RECORD", `Invalid withdrawal date "${upsert.date}"`);
      }
      if (upsert.timestamp !== undefined && !isInstant(upsert.timestamp)) {
        throw new StoreError("INVALID_RECORD", `Invalid withdrawal timestamp "${upsert.timestamp}"`);
      }
      const commission = normalizeAmount(upsert.commission);
      if (parseAmount(commission) < 0n) {
        throw new StoreError("INVALID_RECORD", "Commission must not be negative");
      }

      const rows = this.listWithdrawals({ cardId: upsert.cardId, from: upsert.date })
        .filter((w) => w.date === upsert.date);
      const latest = dedupeByDate(rows)[0];

      const record: Withdrawal = {
        id: latest?.id ?? this.takeId("withdrawal"),
        date: upsert.date,
        timestamp:
          upsert.timestamp !== undefined
            ? new Date(Date.parse(upsert.timestamp)).toISOString()
            : (latest?.timestamp ?? null),
        cardId: upsert.cardId,
        fullyWithdrawn: upsert.fullyWithdrawn,
        withdrawnAmount:
          upsert.fullyWithdrawn || upsert.withdrawnAmount === null
            ? null
            : normalizeAmount(upsert.withdrawnAmount),
        commission,
        note: upsert.note ?? latest?.note ?? "",
      };

      for (const stale of rows) {
        if (stale.id !== record.id) {
          this._withdrawals.delete(stale.id);
        }
      }
      this._withdrawals.set(record.id, record);
      return record;
    });
  }

  // ===========================================================================
  // Operators
  // ===========================================================================

  listOperators(): readonly Operator[] {
    return [...this._operators.values()].sort(byId);
  }

  findOperatorByName(name: string): Operator | undefined {
    const trimmed = name.trim();
    for (const operator of this._operators.values()) {
      if (operator.name === trimmed) return operator;
    }
    return undefined;
  }

  findOperatorByKeyHash(keyHash: string): Operator | undefined {
    for (const operator of this._operators.values()) {
      if (operator.keyHash === keyHash) return operator;
    }
    return undefined;
  }

  createOperator(input: OperatorInput): Operator {
    return this.transaction(() => {
      const name = this.requireName(input.name, "Operator");
      if (this.findOperatorByName(name) !== undefined) {
        throw new StoreError("DUPLICATE_OPERATOR", `Operator "${name}" already exists`);
      }
      if (!KEY_HASH_PATTERN.test(input.keyHash)) {
        throw new StoreError("INVALID_RECORD", "Operator key hash must be SHA-256 hex");
      }
      const operator: Operator = {
        id: this.takeId("operator"),
        name,
        role: input.role,
        keyHash: input.keyHash,
        createdAt: this.now().toISOString(),
      };
      this._operators.set(operator.id, operator);
      return operator;
    });
  }

  // ===========================================================================
  // Unit of Work
  // ===========================================================================

  transaction<T>(fn: () => T): T {
    if (this._depth > 0) {
      return fn();
    }

    const before = this.snapshot();
    try {
      const result = this.runNested(fn);
      this.commit();
      return result;
    } catch (err) {
      this.restore(before);
      throw err;
    }
  }

  snapshot(): StoreState {
    return {
      version: 1,
      nextIds: { ...this._nextIds },
      cards: [...this._cards.values()].sort(byId),
      clients: [...this._clients.values()].sort(byId),
      groups: [...this._groups.values()].sort(byId),
      bankColors: [...this._bankColors.values()].sort((a, b) => (a.bank < b.bank ? -1 : a.bank > b.bank ? 1 : 0)),
      transactions: [...this._transactions.values()].sort(byId),
      withdrawals: [...this._withdrawals.values()].sort(byId),
      operators: [...this._operators.values()].sort(byId),
    };
  }

  stateHash(): string {
    return computeStateHash(this.snapshot());
  }

  verify(): boolean {
    return true;
  }

  /**
   * Called once after every outermost successful mutation.
   * A throw rolls the mutation back.
   */
  protected commit(): void {
    // Nothing to persist in memory.
  }

  // ─── Internal ─────────────────────────────────────────────────────────

  protected restore(state: StoreState): void {
    this._nextIds = { ...state.nextIds };
    fill(this._cards, state.cards);
    fill(this._clients, state.clients);
    fill(this._groups, state.groups);
    fill(this._transactions, state.transactions);
    fill(this._withdrawals, state.withdrawals);
    fill(this._operators, state.operators);
    this._bankColors.clear();
    for (const entry of state.bankColors) {
      this._bankColors.set(entry.bank, entry);
    }
  }

  private runNested<T>(fn: () => T): T {
    this._depth++;
    try {
      return fn();
    } finally {
      this._depth--;
    }
  }

  private takeId(kind: keyof IdCounters): number {
    const id = this._nextIds[kind];
    this._nextIds[kind] = id + 1;
    return id;
  }

  private requireName(raw: string, label: string): string {
    const name = raw.trim();
    if (name === "") {
      throw new StoreError("INVALID_RECORD", `${label} name is required`);
    }
    return name;
  }

  private requireGroup(id: number): CardGroup {
    const group = this._groups.get(id);
    if (group === undefined) {
      throw new StoreError("GROUP_NOT_FOUND", `Group ${String(id)} not found`);
    }
    return group;
  }

  private findCardByIdentity(name: string, bank: string, cardNumber: string): Card | undefined {
    for (const card of this._cards.values()) {
      if (card.name === name && card.bank === bank && card.cardNumber === cardNumber) {
        return card;
      }
    }
    return undefined;
  }

  private findClientByName(name: string): Client | undefined {
    for (const client of this._clients.values()) {
      if (client.name === name) return client;
    }
    return undefined;
  }

  private findGroupByName(name: string): CardGroup | undefined {
    for (const group of this._groups.values()) {
      if (sameText(group.name, name)) return group;
    }
    return undefined;
  }

  private resolveCard(id: number, input: Partial<CardInput>, base: Card | undefined): Card {
    const name = this.requireName(input.name ?? base?.name ?? "", "Card");
    const bank = (input.bank ?? base?.bank ?? "").trim();
    const cardNumber = (input.cardNumber ?? base?.cardNumber ?? "").trim();

    const clash = this.findCardByIdentity(name, bank, cardNumber);
    if (clash !== undefined && clash.id !== id) {
      throw new StoreError(
        "DUPLICATE_CARD",
        `Card "${name}" with bank "${bank}" and number "${cardNumber}" already exists`,
      );
    }

    let groupId = base?.groupId ?? null;
    if (input.groupName !== undefined) {
      groupId = input.groupName.trim() === "" ? null : this.getOrCreateGroup(input.groupName).record.id;
    }

    return {
      id,
      name,
      bank,
      cardNumber,
      pin: (input.pin ?? base?.pin ?? "").trim(),
      status: input.status ?? base?.status ?? "active",
      groupId,
      notes: input.notes ?? base?.notes ?? "",
    };
  }

  private resolveClient(id: number, input: Partial<ClientInput>, base: Client | undefined): Client {
    const name = this.requireName(input.name ?? base?.name ?? "", "Client");
    const clash = this.findClientByName(name);
    if (clash !== undefined && clash.id !== id) {
      throw new StoreError("DUPLICATE_CLIENT", `Client "${name}" already exists`);
    }
    return {
      id,
      name,
      status: input.status ?? base?.status ?? "active",
      notes: input.notes ?? base?.notes ?? "",
    };
  }

  private resolveTransaction(id: number, createdAt: string, draft: TransactionDraft): Transaction {
    this.requireCard(draft.cardId);
    this.requireClient(draft.clientId);
    if (!isInstant(draft.timestamp)) {
      throw new StoreError("INVALID_RECORD", `Invalid transaction timestamp "${draft.timestamp}"`);
    }

    const amount = normalizeAmount(draft.amount);
    const secondaryAmount = normalizeAmount(draft.secondaryAmount);
    return {
      id,
      createdAt,
      timestamp: new Date(Date.parse(draft.timestamp)).toISOString(),
      cardId: draft.cardId,
      clientId: draft.clientId,
      amount,
      secondaryAmount,
      rate: computeRate(amount, secondaryAmount),
      notes: draft.notes,
    };
  }
}

function fill<T extends { readonly id: number }>(map: Map<number, T>, records: readonly T[]): void {
  map.clear();
  for (const record of records) {
    map.set(record.id, record);
  }
}
