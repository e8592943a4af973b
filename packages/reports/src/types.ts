/**
 * @cardflow/reports: Shared report types.
 */

import type { Card, CardGroup } from "@cardflow/types";
import type { LedgerReader, ReferenceZone } from "@cardflow/ledger";

/**
 * What the builders read. A LedgerStore satisfies it as is.
 */
export interface ReportSource extends LedgerReader {
  /** All cards ordered by name */
  listCards(): readonly Card[];
  getGroup(id: number): CardGroup | undefined;
  /** Display color for a bank; a default when none is set */
  bankColor(bank: string): string;
}

export interface ReportOptions {
  readonly source: ReportSource;
  /** Reference zone for every calendar-day boundary */
  readonly zone: ReferenceZone;
}

// ─── Paging ──────────────────────────────────────────────────────────────

export interface PageRequest {
  /** 1-based. Out-of-range pages clamp to the nearest valid page. */
  readonly page?: number | undefined;
  readonly pageSize?: number | undefined;
}

export interface Page<T> {
  readonly items: readonly T[];
  readonly page: number;
  readonly pageSize: number;
  readonly totalItems: number;
  readonly totalPages: number;
}
