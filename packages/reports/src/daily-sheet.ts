/**
 * @cardflow/reports: Daily withdrawal sheet.
 *
 * The operator worksheet for one calendar day: one row per active card
 * that should hold money that day, with what was already withdrawn and
 * what remains.
 *
 * Building a sheet never writes; a card without a withdrawal row shows
 * zero withdrawn until one is saved.
 */

import type { Amount, CalendarDay, Withdrawal } from "@cardflow/types";
import { BalanceEngine, floorAtZero, formatAmount, parseAmount } from "@cardflow/ledger";
import type { Page, PageRequest, ReportOptions } from "./types.js";
import { cardLabel } from "./card-label.js";
import { paginate } from "./paging.js";

// =============================================================================
// Types
// =============================================================================

export interface SheetRow {
  readonly cardId: number;
  readonly label: string;
  /** Trimmed bank name; empty when unknown */
  readonly bank: string;
  readonly bankColor: string;
  readonly pin: string;
  readonly shouldHave: Amount;
  /** The deduplicated row for (card, day), if one was saved */
  readonly withdrawal: Withdrawal | null;
  /** Effective withdrawn amount */
  readonly withdrawn: Amount;
  readonly commission: Amount;
  /** max(0, shouldHave - withdrawn - commission) */
  readonly remaining: Amount;
}

export interface SheetTotals {
  readonly shouldHave: Amount;
  readonly withdrawn: Amount;
  readonly commission: Amount;
  readonly remaining: Amount;
}

export interface SheetFilters extends PageRequest {
  /** Exact case-insensitive bank match, else substring */
  readonly bank?: string | undefined;
  /** Case-insensitive substring of label, bank or PIN */
  readonly query?: string | undefined;
}

export interface DailySheet {
  readonly day: CalendarDay;
  /** Rows on the requested page */
  readonly rows: readonly SheetRow[];
  /** Column sums of `rows` (the visible page only) */
  readonly totals: SheetTotals;
  /** Distinct banks across the unfiltered sheet, sorted */
  readonly banks: readonly string[];
  /** Bank of the first matched row, or the filter as typed */
  readonly selectedBank: string | null;
  readonly page: Omit<Page<SheetRow>, "items">;
}

// =============================================================================
// Builder
// =============================================================================

export function buildDailySheet(
  options: ReportOptions,
  day: CalendarDay,
  filters: SheetFilters = {},
): DailySheet {
  const { source, zone } = options;
  const engine = new BalanceEngine({ reader: source, zone });
  const ctx = engine.createContext();

  const all: SheetRow[] = [];
  for (const card of source.listCards()) {
    if (card.status !== "active") {
      continue;
    }

    const should = parseAmount(engine.shouldHave(card.id, day, ctx));
    if (should <= 0n) {
      continue;
    }

    const withdrawal = engine.withdrawalFor(card.id, day) ?? null;
    const withdrawn = withdrawal !== null ? parseAmount(engine.effectiveWithdrawn(withdrawal, ctx)) : 0n;
    const commission = withdrawal !== null ? parseAmount(withdrawal.commission) : 0n;
    const remaining = floorAtZero(should - withdrawn - commission);
    const bank = card.bank.trim();

    all.push({
      cardId: card.id,
      label: cardLabel(card),
      bank,
      bankColor: source.bankColor(bank),
      pin: card.pin,
      shouldHave: formatAmount(should),
      withdrawal,
      withdrawn: formatAmount(withdrawn),
      commission: formatAmount(commission),
      remaining: formatAmount(remaining),
    });
  }

  all.sort((a, b) => (a.label < b.label ? -1 : a.label > b.label ? 1 : a.cardId - b.cardId));

  const banks = [...new Set(all.map((row) => row.bank).filter((bank) => bank !== ""))].sort();

  let rows: SheetRow[] = all;
  let selectedBank: string | null = null;

  const bankFilter = (filters.bank ?? "").trim();
  if (bankFilter !== "") {
    rows = filterByBank(rows, bankFilter);
    selectedBank = rows[0]?.bank ?? bankFilter;
  }

  const needle = (filters.query ?? "").trim().toLowerCase();
  if (needle !== "") {
    rows = rows.filter((row) =>
      [row.label, row.bank, row.pin].some((text) => text.toLowerCase().includes(needle)),
    );
  }

  const { items, ...page } = paginate(rows, filters);
  return {
    day,
    rows: items,
    totals: sumRows(items),
    banks,
    selectedBank,
    page,
  };
}

function filterByBank(rows: SheetRow[], filter: string): SheetRow[] {
  const lower = filter.toLowerCase();
  const exact = rows.filter((row) => row.bank.toLowerCase() === lower);
  if (exact.length > 0) {
    return exact;
  }
  return rows.filter((row) => row.bank.toLowerCase().includes(lower));
}

/** Column-wise sums of a set of sheet rows. */
function sumRows(rows: readonly SheetRow[]): SheetTotals {
  let shouldHave = 0n;
  let withdrawn = 0n;
  let commission = 0n;
  let remaining = 0n;
  for (const row of rows) {
    shouldHave += parseAmount(row.shouldHave);
    withdrawn += parseAmount(row.withdrawn);
    commission += parseAmount(row.commission);
    remaining += parseAmount(row.remaining);
  }
  return {
    shouldHave: formatAmount(shouldHave),
    withdrawn: formatAmount(withdrawn),
    commission: formatAmount(commission),
    remaining: formatAmount(remaining),
  };
}
