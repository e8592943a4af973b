/**
 * @cardflow/reports: Event timeline for one card.
 *
 * Merges the card's transactions (credits) and deduplicated withdrawals
 * (debits) into one chronological stream with a running balance.
 *
 * Ordering:
 * - By event time; a withdrawal without a timestamp sits at local
 *   23:59:59 of its date
 * - Ties: transactions before withdrawals, then by record id
 *
 * The running balance is always walked over the full, unfiltered stream.
 * Kind and text filters only choose which stamped events are returned.
 */

import type { Amount, CalendarDay, DayRange, Instant, Transaction, Withdrawal } from "@cardflow/types";
import {
  BalanceEngine,
  dayOf,
  endOfDay,
  formatAmount,
  parseAmount,
  rangeWindow,
  zeroAmount,
} from "@cardflow/ledger";
import type { ReportOptions } from "./types.js";

// =============================================================================
// Types
// =============================================================================

export type TimelineEventKind = "transaction" | "withdrawal";

interface TimelineEventBase {
  readonly kind: TimelineEventKind;
  /** Position on the time axis */
  readonly at: Instant;
  /** Local calendar day of `at` */
  readonly day: CalendarDay;
  /** Signed effect on the balance */
  readonly delta: Amount;
  /** Running balance after this event */
  readonly balanceAfter: Amount;
}

export interface TransactionEvent extends TimelineEventBase {
  readonly kind: "transaction";
  readonly transaction: Transaction;
  readonly clientName: string;
}

export interface WithdrawalEvent extends TimelineEventBase {
  readonly kind: "withdrawal";
  readonly withdrawal: Withdrawal;
  /** Effective withdrawn amount (full withdrawals resolved) */
  readonly withdrawn: Amount;
  readonly commission: Amount;
}

export type TimelineEvent = TransactionEvent | WithdrawalEvent;

export interface TimelineFilters {
  readonly kind?: TimelineEventKind | undefined;
  /** Case-insensitive substring of client name or note */
  readonly query?: string | undefined;
}

export interface Timeline {
  readonly cardId: number;
  readonly range: DayRange;
  /** Carried balance at the range start; zero without a start */
  readonly openingBalance: Amount;
  /** Running balance after the last event of the unfiltered stream */
  readonly closingBalance: Amount;
  /** Most recent first, after filtering */
  readonly events: readonly TimelineEvent[];
}

// =============================================================================
// Builder
// =============================================================================

type PendingEvent =
  | {
      readonly kind: "transaction";
      readonly at: Instant;
      readonly ms: number;
      readonly delta: bigint;
      readonly transaction: Transaction;
    }
  | {
      readonly kind: "withdrawal";
      readonly at: Instant;
      readonly ms: number;
      readonly delta: bigint;
      readonly withdrawal: Withdrawal;
      readonly withdrawn: bigint;
      readonly commission: bigint;
    };

function recordId(event: PendingEvent): number {
  return event.kind === "transaction" ? event.transaction.id : event.withdrawal.id;
}

function compareEvents(a: PendingEvent, b: PendingEvent): number {
  if (a.ms !== b.ms) {
    return a.ms - b.ms;
  }
  if (a.kind !== b.kind) {
    return a.kind === "transaction" ? -1 : 1;
  }
  return recordId(a) - recordId(b);
}

/**
 * Build the timeline of one card over an optional inclusive day range.
 */
export function buildTimeline(
  options: ReportOptions,
  cardId: number,
  range: DayRange = {},
  filters: TimelineFilters = {},
): Timeline {
  const { source, zone } = options;
  const engine = new BalanceEngine({ reader: source, zone });
  const ctx = engine.createContext();

  const pending: PendingEvent[] = [];

  const window = rangeWindow(range, zone);
  for (const transaction of source.listTransactions({ cardId, from: window.from, to: window.to })) {
    pending.push({
      kind: "transaction",
      at: transaction.timestamp,
      ms: Date.parse(transaction.timestamp),
      delta: parseAmount(transaction.amount),
      transaction,
    });
  }

  for (const withdrawal of engine.withdrawalsInRange(cardId, range)) {
    const withdrawn = parseAmount(engine.effectiveWithdrawn(withdrawal, ctx));
    const commission = parseAmount(withdrawal.commission);
    if (withdrawn === 0n && commission === 0n) {
      continue;
    }
    const at = withdrawal.timestamp ?? endOfDay(withdrawal.date, zone);
    pending.push({
      kind: "withdrawal",
      at,
      ms: Date.parse(at),
      delta: -(withdrawn + commission),
      withdrawal,
      withdrawn,
      commission,
    });
  }

  pending.sort(compareEvents);

  const opening = range.start !== undefined ? engine.carriedBalance(cardId, range.start, ctx) : zeroAmount();
  let running = parseAmount(opening);
  const clientNames = new Map<number, string>();
  const stamped: TimelineEvent[] = [];

  for (const event of pending) {
    running += event.delta;
    const base = {
      at: event.at,
      day: dayOf(event.at, zone),
      delta: formatAmount(event.delta),
      balanceAfter: formatAmount(running),
    };

    if (event.kind === "transaction") {
      const clientId = event.transaction.clientId;
      let clientName = clientNames.get(clientId);
      if (clientName === undefined) {
        clientName = source.getClient(clientId)?.name ?? "";
        clientNames.set(clientId, clientName);
      }
      stamped.push({ ...base, kind: "transaction", transaction: event.transaction, clientName });
    } else {
      stamped.push({
        ...base,
        kind: "withdrawal",
        withdrawal: event.withdrawal,
        withdrawn: formatAmount(event.withdrawn),
        commission: formatAmount(event.commission),
      });
    }
  }

  return {
    cardId,
    range,
    openingBalance: opening,
    closingBalance: formatAmount(running),
    events: stamped.reverse().filter((event) => matchesFilters(event, filters)),
  };
}

function matchesFilters(event: TimelineEvent, filters: TimelineFilters): boolean {
  if (filters.kind !== undefined && event.kind !== filters.kind) {
    return false;
  }
  const needle = (filters.query ?? "").trim().toLowerCase();
  if (needle === "") {
    return true;
  }
  const haystack =
    event.kind === "transaction"
      ? [event.clientName, event.transaction.notes]
      : [event.withdrawal.note];
  return haystack.some((text) => text.toLowerCase().includes(needle));
}
