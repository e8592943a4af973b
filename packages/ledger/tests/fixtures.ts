/**
 * Array-backed LedgerReader for engine tests.
 */

import type { Amount, CalendarDay, Card, Client, Instant, Transaction, Withdrawal } from "@cardflow/types";
import type { LedgerReader, TransactionQuery, WithdrawalQuery } from "../src/types.js";
import { sumAmounts } from "../src/money-math.js";
import { parseUtcOffset } from "../src/calendar.js";

export const ZONE = parseUtcOffset("+03:00");

export interface WithdrawalSeed {
  readonly cardId?: number;
  readonly date: CalendarDay;
  readonly timestamp?: Instant | null;
  readonly fullyWithdrawn?: boolean;
  readonly withdrawnAmount?: Amount | null;
  readonly commission?: Amount;
}

export class FixtureReader implements LedgerReader {
  readonly transactions: Transaction[] = [];
  readonly withdrawals: Withdrawal[] = [];
  private _nextId = 1;

  addTransaction(timestamp: Instant, amount: Amount, cardId = 1, clientId = 1): Transaction {
    const tx: Transaction = {
      id: this._nextId++,
      createdAt: timestamp,
      timestamp,
      cardId,
      clientId,
      amount,
      secondaryAmount: "0.00",
      rate: null,
      notes: "",
    };
    this.transactions.push(tx);
    return tx;
  }

  addWithdrawal(seed: WithdrawalSeed): Withdrawal {
    const record: Withdrawal = {
      id: this._nextId++,
      date: seed.date,
      timestamp: seed.timestamp ?? null,
      cardId: seed.cardId ?? 1,
      fullyWithdrawn: seed.fullyWithdrawn ?? false,
      withdrawnAmount: seed.withdrawnAmount ?? null,
      commission: seed.commission ?? "0.00",
      note: "",
    };
    this.withdrawals.push(record);
    return record;
  }

  listTransactions(query: TransactionQuery): readonly Transaction[] {
    const from = query.from !== undefined ? Date.parse(query.from) : Number.NEGATIVE_INFINITY;
    const to = query.to !== undefined ? Date.parse(query.to) : Number.POSITIVE_INFINITY;
    const rows = this.transactions.filter((tx) => {
      const at = Date.parse(tx.timestamp);
      return (
        (query.cardId === undefined || tx.cardId === query.cardId) &&
        (query.clientId === undefined || tx.clientId === query.clientId) &&
        at >= from &&
        at < to
      );
    });
    rows.sort((a, b) => Date.parse(a.timestamp) - Date.parse(b.timestamp) || a.id - b.id);
    return query.order === "desc" ? rows.reverse() : rows;
  }

  sumTransactionAmounts(query: TransactionQuery): Amount {
    return sumAmounts(this.listTransactions(query).map((tx) => tx.amount));
  }

  listWithdrawals(query: WithdrawalQuery): readonly Withdrawal[] {
    return this.withdrawals.filter(
      (w) =>
        (query.cardId === undefined || w.cardId === query.cardId) &&
        (query.from === undefined || w.date >= query.from) &&
        (query.to === undefined || w.date < query.to),
    );
  }

  getCard(_id: number): Card | undefined {
    return undefined;
  }

  getClient(_id: number): Client | undefined {
    return undefined;
  }
}
