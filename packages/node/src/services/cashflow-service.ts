/**
 * CashflowService: Composition root for the domain packages.
 *
 * Route handlers and CLI commands delegate to this service; they never
 * call the store or the builders directly. The service owns raw-input
 * handling (user dates, forms), logs every mutation and runs multi-step
 * writes inside one store transaction.
 */

import type { Logger } from "pino";
import type {
  CalendarDay,
  Card,
  CardGroup,
  Client,
  DayRange,
  Operator,
  Transaction,
  Withdrawal,
} from "@cardflow/types";
import type {
  DayBalance,
  RangeTotals,
  ReferenceZone,
  TransactionForm,
  WithdrawalForm,
} from "@cardflow/ledger";
import {
  BalanceEngine,
  InputValidationError,
  assertValid,
  formatUserTimestamp,
  parseUserDate,
  rangeWindow,
  today,
  validateTransactionForm,
  validateWithdrawalForm,
} from "@cardflow/ledger";
import type { CardInput, ClientInput, Ensured, LedgerStore } from "@cardflow/store";
import { StoreError, hashApiKey } from "@cardflow/store";
import type {
  CardTotalsReport,
  DailySheet,
  Page,
  PageRequest,
  PaymentSummaryRow,
  ReportOptions,
  Timeline,
  TimelineEventKind,
} from "@cardflow/reports";
import {
  DEFAULT_PAGE_SIZE,
  buildDailySheet,
  buildTimeline,
  cardLabel,
  cardTotals,
  paginate,
  paymentsSummary,
} from "@cardflow/reports";

// =============================================================================
// Configuration
// =============================================================================

export interface CashflowServiceConfig {
  readonly store: LedgerStore;
  /** Reference zone for every calendar-day boundary */
  readonly zone: ReferenceZone;
  /** Default page size for paged listings */
  readonly pageSize?: number | undefined;
  readonly primaryCurrency?: string | undefined;
  readonly secondaryCurrency?: string | undefined;
  /** Mutation log; silent when omitted */
  readonly logger?: Logger | undefined;
  readonly now?: (() => Date) | undefined;
}

// =============================================================================
// Query & View Types
// =============================================================================

/** Raw day-range query; each bound is "dd/mm/yyyy" or "yyyy-mm-dd". */
export interface RangeQuery {
  readonly start?: string | undefined;
  readonly end?: string | undefined;
}

export interface CardListQuery extends RangeQuery {
  readonly bank?: string | undefined;
  readonly group?: string | undefined;
}

export interface TimelineQuery extends RangeQuery {
  readonly kind?: TimelineEventKind | undefined;
  readonly q?: string | undefined;
}

export interface SheetQuery extends PageRequest {
  /** Default: today in the reference zone */
  readonly date?: string | undefined;
  readonly bank?: string | undefined;
  readonly q?: string | undefined;
}

export interface TransactionListQuery extends RangeQuery, PageRequest {
  readonly cardId?: number | undefined;
  readonly clientId?: number | undefined;
}

export interface CardView extends Card {
  readonly label: string;
  readonly groupName: string | null;
}

export interface TransactionView extends Transaction {
  readonly cardLabel: string;
  readonly clientName: string;
  /** Event time as the edit form shows it, in the reference zone */
  readonly renderedTimestamp: string;
}

export interface BankView {
  readonly name: string;
  readonly color: string;
}

export interface ReadinessReport {
  readonly ready: boolean;
  readonly stateHash: string;
}

// =============================================================================
// Service
// =============================================================================

export class CashflowService {
  readonly store: LedgerStore;
  readonly zone: ReferenceZone;
  readonly pageSize: number;
  readonly currencies: { readonly primary: string; readonly secondary: string };

  private readonly _logger: Logger | undefined;
  private readonly _now: () => Date;

  constructor(config: CashflowServiceConfig) {
    this.store = config.store;
    this.zone = config.zone;
    this.pageSize = config.pageSize ?? DEFAULT_PAGE_SIZE;
    this.currencies = {
      primary: config.primaryCurrency ?? "RUB",
      secondary: config.secondaryCurrency ?? "USD",
    };
    this._logger = config.logger;
    this._now = config.now ?? (() => new Date());
  }

  // ─── Cards ─────────────────────────────────────────────────────────

  listCards(query: CardListQuery = {}): CardTotalsReport {
    return cardTotals(this.reportOptions(), {
      range: this.parseRange(query),
      bank: query.bank,
      group: query.group,
    });
  }

  getCard(id: number): CardView {
    return this.toCardView(this.store.requireCard(id));
  }

  createCard(input: CardInput): CardView {
    const card = this.store.createCard(input);
    this._logger?.info({ cardId: card.id }, "Card created");
    return this.toCardView(card);
  }

  updateCard(id: number, input: Partial<CardInput>): CardView {
    const card = this.store.updateCard(id, input);
    this._logger?.info({ cardId: id }, "Card updated");
    return this.toCardView(card);
  }

  deleteCard(id: number): { readonly withdrawalsRemoved: number } {
    const withdrawalsRemoved = this.store.deleteCard(id);
    this._logger?.info({ cardId: id, withdrawalsRemoved }, "Card deleted");
    return { withdrawalsRemoved };
  }

  cardTimeline(id: number, query: TimelineQuery = {}): Timeline {
    this.store.requireCard(id);
    return buildTimeline(this.reportOptions(), id, this.parseRange(query), {
      kind: query.kind,
      query: query.q,
    });
  }

  /** Carried, received and should-have for one day (default today). */
  cardBalance(id: number, date?: string): DayBalance {
    this.store.requireCard(id);
    const day = this.parseDay("date", date) ?? this.today();
    return this.engine().dayBalance(id, day);
  }

  cardRangeTotals(id: number, query: RangeQuery = {}): RangeTotals {
    this.store.requireCard(id);
    return this.engine().rangeTotals(id, this.parseRange(query));
  }

  // ─── Clients ───────────────────────────────────────────────────────

  listClients(query: PageRequest & { readonly q?: string | undefined } = {}): Page<Client> {
    const q = query.q?.trim() ?? "";
    const clients = q === "" ? this.store.listClients() : this.store.searchClients(q);
    return paginate(clients, query, this.pageSize);
  }

  /** Name search for pickers; blank queries find nothing. */
  searchClients(q: string): readonly Client[] {
    return q.trim() === "" ? [] : this.store.searchClients(q);
  }

  getClient(id: number): Client {
    return this.store.requireClient(id);
  }

  createClient(input: ClientInput): Client {
    const client = this.store.createClient(input);
    this._logger?.info({ clientId: client.id }, "Client created");
    return client;
  }

  updateClient(id: number, input: Partial<ClientInput>): Client {
    const client = this.store.updateClient(id, input);
    this._logger?.info({ clientId: id }, "Client updated");
    return client;
  }

  deleteClient(id: number): void {
    this.store.deleteClient(id);
    this._logger?.info({ clientId: id }, "Client deleted");
  }

  // ─── Groups ────────────────────────────────────────────────────────

  listGroups(): readonly CardGroup[] {
    return this.store.listGroups();
  }

  createGroup(name: string): Ensured<CardGroup> {
    const result = this.store.getOrCreateGroup(name);
    if (result.created) {
      this._logger?.info({ groupId: result.record.id }, "Group created");
    }
    return result;
  }

  renameGroup(id: number, name: string): CardGroup {
    const group = this.store.renameGroup(id, name);
    this._logger?.info({ groupId: id }, "Group renamed");
    return group;
  }

  deleteGroup(id: number): { readonly cardsUnlinked: number } {
    const cardsUnlinked = this.store.deleteGroup(id);
    this._logger?.info({ groupId: id, cardsUnlinked }, "Group deleted");
    return { cardsUnlinked };
  }

  // ─── Banks ─────────────────────────────────────────────────────────

  listBanks(): readonly BankView[] {
    return this.store.listBankNames().map((name) => ({ name, color: this.store.bankColor(name) }));
  }

  setBankColor(bank: string, color: string): BankView {
    const entry = this.store.setBankColor(bank, color);
    this._logger?.info({ bank: entry.bank, color: entry.color }, "Bank color set");
    return { name: entry.bank, color: entry.color };
  }

  // ─── Transactions ──────────────────────────────────────────────────

  listTransactions(query: TransactionListQuery = {}): Page<TransactionView> {
    const window = rangeWindow(this.parseRange(query), this.zone);
    const rows = this.store.listTransactions({
      cardId: query.cardId,
      clientId: query.clientId,
      from: window.from,
      to: window.to,
      order: "desc",
    });
    const page = paginate(rows, query, this.pageSize);
    return { ...page, items: page.items.map((tx) => this.toTransactionView(tx)) };
  }

  getTransaction(id: number): TransactionView {
    return this.toTransactionView(this.requireTransaction(id));
  }

  createTransaction(form: TransactionForm): TransactionView {
    const draft = assertValid(
      validateTransactionForm({ ...form, renderedTimestamp: null, originalTimestamp: null }, this.zone, this._now()),
    );
    const tx = this.store.createTransaction(draft);
    this._logger?.info({ transactionId: tx.id, cardId: tx.cardId, amount: tx.amount }, "Transaction created");
    return this.toTransactionView(tx);
  }

  /**
   * Update a transaction. When the submitted timestamp text equals the
   * text the form rendered, the stored instant is kept as is.
   */
  updateTransaction(id: number, form: TransactionForm): TransactionView {
    return this.store.transaction(() => {
      const existing = this.requireTransaction(id);
      const draft = assertValid(
        validateTransactionForm(
          {
            ...form,
            renderedTimestamp: form.renderedTimestamp ?? formatUserTimestamp(existing.timestamp, this.zone),
            originalTimestamp: form.originalTimestamp ?? existing.timestamp,
          },
          this.zone,
          this._now(),
        ),
      );
      const tx = this.store.updateTransaction(id, draft);
      this._logger?.info({ transactionId: id, amount: tx.amount }, "Transaction updated");
      return this.toTransactionView(tx);
    });
  }

  deleteTransaction(id: number): void {
    this.store.deleteTransaction(id);
    this._logger?.info({ transactionId: id }, "Transaction deleted");
  }

  // ─── Withdrawals ───────────────────────────────────────────────────

  dailySheet(query: SheetQuery = {}): DailySheet {
    const day = this.parseDay("date", query.date) ?? this.today();
    return buildDailySheet(this.reportOptions(), day, {
      bank: query.bank,
      query: query.q,
      page: query.page,
      pageSize: query.pageSize ?? this.pageSize,
    });
  }

  /**
   * Upsert the withdrawal for (card, date). Nothing is written when any
   * field is invalid.
   */
  saveWithdrawal(form: WithdrawalForm): Withdrawal {
    const upsert = assertValid(validateWithdrawalForm(form, this.zone));
    const record = this.store.upsertWithdrawal(upsert);
    this._logger?.info(
      {
        withdrawalId: record.id,
        cardId: record.cardId,
        date: record.date,
        fullyWithdrawn: record.fullyWithdrawn,
      },
      "Withdrawal saved",
    );
    return record;
  }

  // ─── Reports ───────────────────────────────────────────────────────

  paymentsSummary(query: RangeQuery = {}): PaymentSummaryRow[] {
    return paymentsSummary(this.reportOptions(), this.parseRange(query));
  }

  // ─── Operators ─────────────────────────────────────────────────────

  /**
   * Create the named admin operator unless it already exists.
   * Running it again changes nothing, even with another key.
   */
  provisionAdmin(name: string, apiKey: string): Ensured<Operator> {
    if (apiKey.trim() === "") {
      throw new InputValidationError([{ field: "apiKey", message: "API key is required" }]);
    }
    return this.store.transaction(() => {
      const existing = this.store.findOperatorByName(name);
      if (existing !== undefined) {
        this._logger?.info({ operator: existing.name }, "Admin already provisioned");
        return { record: existing, created: false };
      }
      const operator = this.store.createOperator({ name, role: "admin", keyHash: hashApiKey(apiKey) });
      this._logger?.info({ operator: operator.name }, "Admin provisioned");
      return { record: operator, created: true };
    });
  }

  findOperatorByKey(apiKey: string): Operator | undefined {
    return this.store.findOperatorByKeyHash(hashApiKey(apiKey));
  }

  hasOperators(): boolean {
    return this.store.listOperators().length > 0;
  }

  // ─── Health ────────────────────────────────────────────────────────

  readiness(): ReadinessReport {
    return { ready: this.store.verify(), stateHash: this.store.stateHash() };
  }

  // ─── Internal ──────────────────────────────────────────────────────

  private reportOptions(): ReportOptions {
    return { source: this.store, zone: this.zone };
  }

  private engine(): BalanceEngine {
    return new BalanceEngine({ reader: this.store, zone: this.zone });
  }

  private today(): CalendarDay {
    return today(this.zone, this._now());
  }

  private parseDay(field: string, raw: string | undefined): CalendarDay | undefined {
    const value = raw?.trim() ?? "";
    if (value === "") {
      return undefined;
    }
    const day = parseUserDate(value);
    if (day === null) {
      throw new InputValidationError([{ field, message: `Enter a valid date: "${value}"` }]);
    }
    return day;
  }

  private parseRange(query: RangeQuery): DayRange {
    const errors: { field: string; message: string }[] = [];
    const read = (field: "start" | "end"): CalendarDay | undefined => {
      try {
        return this.parseDay(field, query[field]);
      } catch (err) {
        if (err instanceof InputValidationError) {
          errors.push(...err.fieldErrors);
          return undefined;
        }
        throw err;
      }
    };
    const range = { start: read("start"), end: read("end") };
    if (errors.length > 0) {
      throw new InputValidationError(errors);
    }
    return range;
  }

  private requireTransaction(id: number): Transaction {
    const tx = this.store.getTransaction(id);
    if (tx === undefined) {
      throw new StoreError("TRANSACTION_NOT_FOUND", `Transaction ${String(id)} not found`);
    }
    return tx;
  }

  private toCardView(card: Card): CardView {
    const groupName = card.groupId !== null ? (this.store.getGroup(card.groupId)?.name ?? null) : null;
    return { ...card, label: cardLabel(card), groupName };
  }

  private toTransactionView(tx: Transaction): TransactionView {
    const card = this.store.getCard(tx.cardId);
    return {
      ...tx,
      cardLabel: card !== undefined ? cardLabel(card) : "",
      clientName: this.store.getClient(tx.clientId)?.name ?? "",
      renderedTimestamp: formatUserTimestamp(tx.timestamp, this.zone),
    };
  }
}
