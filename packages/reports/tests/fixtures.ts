/**
 * Shared setup for report tests: an in-memory store in zone +03:00.
 */

import { InMemoryLedgerStore } from "@cardflow/store";
import type { WithdrawalUpsert } from "@cardflow/ledger";
import { parseUtcOffset } from "@cardflow/ledger";
import type { ReportOptions } from "../src/types.js";

export const ZONE = parseUtcOffset("+03:00");

export function createStore(): InMemoryLedgerStore {
  return new InMemoryLedgerStore({ now: () => new Date("2026-01-10T00:00:00.000Z") });
}

export function reportOptions(store: InMemoryLedgerStore): ReportOptions {
  return { source: store, zone: ZONE };
}

/** 10:00 local (+03:00) on `day`. */
export function at10(day: string): string {
  return `${day}T07:00:00.000Z`;
}

export function receive(
  store: InMemoryLedgerStore,
  cardId: number,
  clientId: number,
  timestamp: string,
  amount: string,
  secondaryAmount = "0.00",
  notes = "",
): void {
  store.createTransaction({ cardId, clientId, amount, secondaryAmount, timestamp, notes });
}

export function withdraw(
  store: InMemoryLedgerStore,
  fields: Partial<WithdrawalUpsert> & Pick<WithdrawalUpsert, "cardId" | "date">,
): void {
  store.upsertWithdrawal({
    fullyWithdrawn: false,
    withdrawnAmount: null,
    commission: "0.00",
    timestamp: undefined,
    note: undefined,
    ...fields,
  });
}
