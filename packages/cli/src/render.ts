/**
 * @cardflow/cli: Terminal rendering.
 *
 * Amounts are shown with formatSpaced ("1 000.5"); days and instants in
 * the reference zone's user formats.
 */

import type { ChalkInstance } from "chalk";
import type { DayBalance, ReferenceZone } from "@cardflow/ledger";
import { formatSpaced, formatUserDate, formatUserTimestamp } from "@cardflow/ledger";
import type { DailySheet, SheetTotals, Timeline } from "@cardflow/reports";

export interface Printer {
  readonly out: (line: string) => void;
  readonly err: (line: string) => void;
  readonly chalk: ChalkInstance;
}

// ─── Status lines ────────────────────────────────────────────────────

export function ok(p: Printer, msg: string): void {
  p.out(p.chalk.green("✓ ") + msg);
}

export function warn(p: Printer, msg: string): void {
  p.err(p.chalk.yellow("! ") + p.chalk.yellow(msg));
}

export function fail(p: Printer, msg: string): void {
  p.err(p.chalk.red("✗ ") + msg);
}

// ─── Reports ─────────────────────────────────────────────────────────

function amounts(p: Printer, t: SheetTotals): string {
  return [
    `should ${formatSpaced(t.shouldHave)}`,
    `withdrawn ${formatSpaced(t.withdrawn)}`,
    `commission ${formatSpaced(t.commission)}`,
    p.chalk.bold(`left ${formatSpaced(t.remaining)}`),
  ].join("  ");
}

export function printSheet(p: Printer, sheet: DailySheet): void {
  const count = sheet.page.totalItems;
  p.out(p.chalk.bold(`Daily sheet for ${formatUserDate(sheet.day)}`) + ` (${String(count)} ${count === 1 ? "card" : "cards"})`);
  if (sheet.selectedBank !== null) {
    p.out(`Bank: ${sheet.selectedBank}`);
  }
  if (sheet.rows.length === 0) {
    p.out(p.chalk.gray("  No cards to withdraw"));
    return;
  }

  for (const row of sheet.rows) {
    p.out(`  ${row.label}  ${amounts(p, row)}`);
  }
  p.out(`  Total  ${amounts(p, sheet.totals)}`);
  if (sheet.page.totalPages > 1) {
    p.out(p.chalk.gray(`Page ${String(sheet.page.page)}/${String(sheet.page.totalPages)}`));
  }
}

export function printTimeline(p: Printer, label: string, timeline: Timeline, zone: ReferenceZone): void {
  p.out(
    `${p.chalk.bold(label)}  opening ${formatSpaced(timeline.openingBalance)}  closing ${formatSpaced(timeline.closingBalance)}`,
  );
  if (timeline.events.length === 0) {
    p.out(p.chalk.gray("  No events"));
    return;
  }

  for (const event of timeline.events) {
    const when = formatUserTimestamp(event.at, zone);
    const balance = `balance ${formatSpaced(event.balanceAfter)}`;
    if (event.kind === "transaction") {
      const who = event.clientName !== "" ? event.clientName : "unknown client";
      const amount = event.delta.startsWith("-") ? formatSpaced(event.delta) : `+${formatSpaced(event.delta)}`;
      p.out(`  ${when}  ${p.chalk.green(amount)}  ${who}  ${balance}`);
    } else {
      const what = event.withdrawal.fullyWithdrawn ? "withdrawal (full)" : "withdrawal";
      p.out(`  ${when}  ${p.chalk.red(formatSpaced(event.delta))}  ${what}  ${balance}`);
    }
  }
}

export function printBalance(p: Printer, label: string, balance: DayBalance): void {
  p.out(`${p.chalk.bold(label)}  ${formatUserDate(balance.day)}`);
  p.out(`  ${"carried".padEnd(12)}${formatSpaced(balance.carried)}`);
  p.out(`  ${"received".padEnd(12)}${formatSpaced(balance.received)}`);
  p.out(`  ${"should have".padEnd(12)}${p.chalk.bold(formatSpaced(balance.shouldHave))}`);
}
