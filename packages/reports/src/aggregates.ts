/**
 * @cardflow/reports: Listing aggregates.
 *
 * cardTotals: every card with its non-carry-aware range totals.
 * paymentsSummary: receipts grouped by (day, client).
 */

import type { Amount, CalendarDay, Card, DayRange } from "@cardflow/types";
import type { RangeTotals } from "@cardflow/ledger";
import { BalanceEngine, dayOf, formatAmount, parseAmount, rangeWindow } from "@cardflow/ledger";
import type { ReportOptions } from "./types.js";
import { cardLabel } from "./card-label.js";

// =============================================================================
// Card totals
// =============================================================================

export interface CardTotalsFilters {
  readonly range?: DayRange | undefined;
  /** Case-insensitive substring of the bank name */
  readonly bank?: string | undefined;
  /** Case-insensitive substring of the group name */
  readonly group?: string | undefined;
}

export interface CardTotalsRow {
  readonly card: Card;
  readonly label: string;
  readonly groupName: string | null;
  readonly totals: RangeTotals;
}

export interface CardTotalsReport {
  readonly rows: readonly CardTotalsRow[];
  readonly overall: RangeTotals;
}

export function cardTotals(options: ReportOptions, filters: CardTotalsFilters = {}): CardTotalsReport {
  const { source, zone } = options;
  const engine = new BalanceEngine({ reader: source, zone });
  const ctx = engine.createContext();

  const bankNeedle = (filters.bank ?? "").trim().toLowerCase();
  const groupNeedle = (filters.group ?? "").trim().toLowerCase();

  const rows: CardTotalsRow[] = [];
  const overall = { received: 0n, withdrawn: 0n, commission: 0n, balance: 0n };

  for (const card of source.listCards()) {
    if (bankNeedle !== "" && !card.bank.toLowerCase().includes(bankNeedle)) {
      continue;
    }
    const groupName = card.groupId !== null ? (source.getGroup(card.groupId)?.name ?? null) : null;
    if (groupNeedle !== "" && (groupName === null || !groupName.toLowerCase().includes(groupNeedle))) {
      continue;
    }

    const totals = engine.rangeTotals(card.id, filters.range, ctx);
    overall.received += parseAmount(totals.received);
    overall.withdrawn += parseAmount(totals.withdrawn);
    overall.commission += parseAmount(totals.commission);
    overall.balance += parseAmount(totals.balance);

    rows.push({ card, label: cardLabel(card), groupName, totals });
  }

  return {
    rows,
    overall: {
      received: formatAmount(overall.received),
      withdrawn: formatAmount(overall.withdrawn),
      commission: formatAmount(overall.commission),
      balance: formatAmount(overall.balance),
    },
  };
}

// =============================================================================
// Payments summary
// =============================================================================

export interface PaymentSummaryRow {
  readonly day: CalendarDay;
  readonly clientId: number;
  readonly clientName: string;
  /** Sum of primary amounts */
  readonly amount: Amount;
  /** Sum of secondary amounts */
  readonly secondaryAmount: Amount;
}

/**
 * Receipts in an inclusive day range grouped by (local day, client).
 * Sorted by day, then client name, both descending.
 */
export function paymentsSummary(options: ReportOptions, range: DayRange = {}): PaymentSummaryRow[] {
  const { source, zone } = options;
  const window = rangeWindow(range, zone);

  const groups = new Map<string, { day: CalendarDay; clientId: number; amount: bigint; secondary: bigint }>();
  for (const tx of source.listTransactions({ from: window.from, to: window.to })) {
    const day = dayOf(tx.timestamp, zone);
    const key = `${day}|${String(tx.clientId)}`;
    let group = groups.get(key);
    if (group === undefined) {
      group = { day, clientId: tx.clientId, amount: 0n, secondary: 0n };
      groups.set(key, group);
    }
    group.amount += parseAmount(tx.amount);
    group.secondary += parseAmount(tx.secondaryAmount);
  }

  const rows: PaymentSummaryRow[] = [...groups.values()].map((group) => ({
    day: group.day,
    clientId: group.clientId,
    clientName: source.getClient(group.clientId)?.name ?? "",
    amount: formatAmount(group.amount),
    secondaryAmount: formatAmount(group.secondary),
  }));

  return rows.sort((a, b) => {
    if (a.day !== b.day) return a.day < b.day ? 1 : -1;
    if (a.clientName !== b.clientName) return a.clientName < b.clientName ? 1 : -1;
    return b.clientId - a.clientId;
  });
}
