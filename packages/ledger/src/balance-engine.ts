/**
 * @cardflow/ledger: Balance engine.
 *
 * Computes, for any card and any calendar day, how much money should be
 * on the card, how much a withdrawal record actually drained, and what
 * carries forward.
 *
 * Carry policy (reset on full withdrawal):
 * - Nothing is carried until the first withdrawal row for the card
 * - Each withdrawal day leaves max(0, shouldHave - withdrawn - commission)
 *   behind; a full withdrawal drains shouldHave, so it leaves zero
 * - Receipts on days after a withdrawal row add to what it left behind
 *
 * The walk visits withdrawal days in increasing date order and fills the
 * memo as it goes, since each day's should-have depends on every earlier
 * withdrawal day.
 *
 * All amounts are computed in bigint minor units and returned as
 * two-place strings.
 */

import type { Amount, CalendarDay, DayRange, Withdrawal } from "@cardflow/types";
import type { DayBalance, LedgerReader, RangeTotals } from "./types.js";
import { addDays, compareDays, dayStart, dayWindow, rangeWindow } from "./calendar.js";
import type { ReferenceZone } from "./calendar.js";
import { floorAtZero, formatAmount, normalizeAmount, parseAmount, zeroAmount } from "./money-math.js";

/** Should-have lookup used to resolve full withdrawals. */
export type ShouldHaveLookup = (cardId: number, day: CalendarDay) => Amount;

// =============================================================================
// Record-level primitives
// =============================================================================

/**
 * Amount a withdrawal record drained from its card.
 *
 * Full withdrawals ignore the stored amount and take the whole
 * should-have for (card, date); otherwise the stored amount, or zero.
 */
export function effectiveWithdrawn(record: Withdrawal, shouldHave: ShouldHaveLookup): Amount {
  if (record.fullyWithdrawn) {
    return shouldHave(record.cardId, record.date);
  }
  return record.withdrawnAmount !== null ? normalizeAmount(record.withdrawnAmount) : zeroAmount();
}

function timestampMs(record: Withdrawal): number {
  return record.timestamp !== null ? Date.parse(record.timestamp) : Number.NEGATIVE_INFINITY;
}

function isNewer(candidate: Withdrawal, current: Withdrawal): boolean {
  const a = timestampMs(candidate);
  const b = timestampMs(current);
  if (a !== b) {
    return a > b;
  }
  return candidate.id > current.id;
}

/**
 * Collapse rows sharing (cardId, date) to the latest by timestamp,
 * then id. Rows without a timestamp lose to any timestamped row.
 *
 * Returned in chronological order (date, then cardId).
 */
export function dedupeByDate(withdrawals: readonly Withdrawal[]): Withdrawal[] {
  const latest = new Map<string, Withdrawal>();

  for (const record of withdrawals) {
    const key = `${String(record.cardId)}|${record.date}`;
    const current = latest.get(key);
    if (current === undefined || isNewer(record, current)) {
      latest.set(key, record);
    }
  }

  return [...latest.values()].sort(
    (a, b) => compareDays(a.date, b.date) || a.cardId - b.cardId,
  );
}

// =============================================================================
// Memoization context
// =============================================================================

/**
 * Memo of per-(card, day) results for one computation.
 *
 * Create one per sheet build or aggregation and drop it afterwards;
 * entries are not invalidated when the store changes.
 */
export class BalanceContext {
  private readonly _carried = new Map<string, Amount>();
  private readonly _shouldHave = new Map<string, Amount>();

  private static key(cardId: number, day: CalendarDay): string {
    return `${String(cardId)}|${day}`;
  }

  carried(cardId: number, day: CalendarDay, compute: () => Amount): Amount {
    return BalanceContext.memo(this._carried, BalanceContext.key(cardId, day), compute);
  }

  shouldHave(cardId: number, day: CalendarDay, compute: () => Amount): Amount {
    return BalanceContext.memo(this._shouldHave, BalanceContext.key(cardId, day), compute);
  }

  /** Number of memoized should-have entries. */
  get size(): number {
    return this._shouldHave.size;
  }

  private static memo(map: Map<string, Amount>, key: string, compute: () => Amount): Amount {
    const hit = map.get(key);
    if (hit !== undefined) {
      return hit;
    }
    const value = compute();
    map.set(key, value);
    return value;
  }
}

// =============================================================================
// Engine
// =============================================================================

export interface BalanceEngineOptions {
  readonly reader: LedgerReader;
  readonly zone: ReferenceZone;
}

/**
 * Card balance queries over a LedgerReader.
 *
 * Every method that may recurse through full withdrawals accepts an
 * optional BalanceContext; omit it for a one-off query.
 */
export class BalanceEngine {
  readonly zone: ReferenceZone;
  private readonly _reader: LedgerReader;

  constructor(options: BalanceEngineOptions) {
    this._reader = options.reader;
    this.zone = options.zone;
  }

  createContext(): BalanceContext {
    return new BalanceContext();
  }

  /**
   * Sum of transaction amounts on the card during the local day.
   */
  receivedOnDay(cardId: number, day: CalendarDay): Amount {
    const window = dayWindow(day, this.zone);
    return normalizeAmount(
      this._reader.sumTransactionAmounts({ cardId, from: window.from, to: window.to }),
    );
  }

  /**
   * Balance carried into `day` from everything strictly before it.
   */
  carriedBalance(
    cardId: number,
    day: CalendarDay,
    ctx: BalanceContext = new BalanceContext(),
  ): Amount {
    return ctx.carried(cardId, day, () => this.computeCarried(cardId, day, ctx));
  }

  /**
   * carriedBalance + receivedOnDay: what should be on the card at the
   * end of `day`.
   */
  shouldHave(
    cardId: number,
    day: CalendarDay,
    ctx: BalanceContext = new BalanceContext(),
  ): Amount {
    return ctx.shouldHave(cardId, day, () =>
      formatAmount(
        parseAmount(this.carriedBalance(cardId, day, ctx)) +
          parseAmount(this.receivedOnDay(cardId, day)),
      ),
    );
  }

  dayBalance(
    cardId: number,
    day: CalendarDay,
    ctx: BalanceContext = new BalanceContext(),
  ): DayBalance {
    const carried = this.carriedBalance(cardId, day, ctx);
    const received = this.receivedOnDay(cardId, day);
    return {
      cardId,
      day,
      carried,
      received,
      shouldHave: this.shouldHave(cardId, day, ctx),
    };
  }

  /**
   * Effective amount of a withdrawal record, resolving full withdrawals
   * through this engine's should-have.
   */
  effectiveWithdrawn(record: Withdrawal, ctx: BalanceContext = new BalanceContext()): Amount {
    return effectiveWithdrawn(record, (cardId, day) => this.shouldHave(cardId, day, ctx));
  }

  /**
   * The single logical withdrawal for (card, day), if any row exists.
   */
  withdrawalFor(cardId: number, day: CalendarDay): Withdrawal | undefined {
    const rows = dedupeByDate(
      this._reader.listWithdrawals({ cardId, from: day, to: addDays(day, 1) }),
    );
    return rows[0];
  }

  /**
   * Deduplicated withdrawals for the card within an inclusive day range.
   */
  withdrawalsInRange(cardId: number, range: DayRange = {}): Withdrawal[] {
    return dedupeByDate(
      this._reader.listWithdrawals({
        cardId,
        from: range.start,
        to: range.end !== undefined ? addDays(range.end, 1) : undefined,
      }),
    );
  }

  /**
   * Received, withdrawn and commission totals over an inclusive day range.
   * Not carry-aware: with no start these are all-time totals.
   */
  rangeTotals(
    cardId: number,
    range: DayRange = {},
    ctx: BalanceContext = new BalanceContext(),
  ): RangeTotals {
    const window = rangeWindow(range, this.zone);
    const received = parseAmount(
      this._reader.sumTransactionAmounts({ cardId, from: window.from, to: window.to }),
    );

    let withdrawn = 0n;
    let commission = 0n;
    for (const record of this.withdrawalsInRange(cardId, range)) {
      withdrawn += parseAmount(this.effectiveWithdrawn(record, ctx));
      commission += parseAmount(record.commission);
    }

    return {
      received: formatAmount(received),
      withdrawn: formatAmount(withdrawn),
      commission: formatAmount(commission),
      balance: formatAmount(received - withdrawn - commission),
    };
  }

  // ─── Private ──────────────────────────────────────────────────────────

  private computeCarried(cardId: number, day: CalendarDay, ctx: BalanceContext): Amount {
    const prior = dedupeByDate(this._reader.listWithdrawals({ cardId, to: day }));

    let carry = 0n;
    let previous: CalendarDay | undefined;
    for (const record of prior) {
      const carriedIn =
        previous === undefined
          ? 0n
          : carry + this.receivedBetween(cardId, addDays(previous, 1), record.date);
      ctx.carried(cardId, record.date, () => formatAmount(carriedIn));

      const should = parseAmount(this.shouldHave(cardId, record.date, ctx));
      const drained = record.fullyWithdrawn ? should : parseAmount(record.withdrawnAmount ?? "0");
      carry = floorAtZero(should - drained - parseAmount(record.commission));
      previous = record.date;
    }

    if (previous === undefined) {
      return zeroAmount();
    }
    return formatAmount(carry + this.receivedBetween(cardId, addDays(previous, 1), day));
  }

  /** Receipts over the half-open day range [start, end). */
  private receivedBetween(cardId: number, start: CalendarDay, end: CalendarDay): bigint {
    if (compareDays(start, end) >= 0) {
      return 0n;
    }
    return parseAmount(
      this._reader.sumTransactionAmounts({
        cardId,
        from: dayStart(start, this.zone),
        to: dayStart(end, this.zone),
      }),
    );
  }
}
