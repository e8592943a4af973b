/**
 * @cardflow/reports: Builders over the balance engine.
 *
 * - buildTimeline: one card's credits and debits with a running balance
 * - buildDailySheet: the withdrawal worksheet for one day
 * - cardTotals, paymentsSummary: listing aggregates
 *
 * Every builder is read-only and scopes one balance memo to one call.
 */

export { buildTimeline } from "./timeline.js";
export type {
  Timeline,
  TimelineEvent,
  TimelineEventKind,
  TimelineFilters,
  TransactionEvent,
  WithdrawalEvent,
} from "./timeline.js";

export { buildDailySheet } from "./daily-sheet.js";
export type { DailySheet, SheetFilters, SheetRow, SheetTotals } from "./daily-sheet.js";

export { cardTotals, paymentsSummary } from "./aggregates.js";
export type {
  CardTotalsFilters,
  CardTotalsReport,
  CardTotalsRow,
  PaymentSummaryRow,
} from "./aggregates.js";

export { cardLabel, cardLast4 } from "./card-label.js";
export { paginate, DEFAULT_PAGE_SIZE } from "./paging.js";

export type { Page, PageRequest, ReportOptions, ReportSource } from "./types.js";
