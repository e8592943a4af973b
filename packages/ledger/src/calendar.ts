/**
 * @cardflow/ledger: Calendar days in the reference timezone.
 *
 * Transactions are stored as absolute instants; withdrawals are stored
 * against calendar days. Both sides meet only through the one reference
 * zone configured for the deployment, a fixed UTC offset. Every day
 * boundary in the engine goes through this module.
 */

import type { CalendarDay, DayRange, Instant } from "@cardflow/types";
import { isCalendarDay } from "@cardflow/types";
import { LedgerError } from "./types.js";

const MINUTE_MS = 60_000;
const DAY_MS = 86_400_000;

/**
 * A fixed UTC offset. offsetMinutes is added to UTC to get local time
 * (+03:00 → 180).
 */
export interface ReferenceZone {
  readonly offsetMinutes: number;
  /** Canonical "+HH:MM" form */
  readonly label: string;
}

export const UTC_ZONE: ReferenceZone = { offsetMinutes: 0, label: "+00:00" };

/**
 * Parse "+03:00", "-0530", "Z" or "UTC" into a ReferenceZone.
 */
export function parseUtcOffset(raw: string): ReferenceZone {
  const value = raw.trim();
  if (value === "Z" || value.toUpperCase() === "UTC") {
    return UTC_ZONE;
  }

  const match = /^([+-])(\d{2}):?(\d{2})$/.exec(value);
  if (match === null) {
    throw new LedgerError("INVALID_OFFSET", `Invalid UTC offset: "${value}"`);
  }

  const [, sign = "+", hh = "00", mm = "00"] = match;
  const hours = Number(hh);
  const minutes = Number(mm);
  if (hours > 14 || minutes > 59) {
    throw new LedgerError("INVALID_OFFSET", `UTC offset out of range: "${value}"`);
  }

  const total = hours * 60 + minutes;
  return {
    offsetMinutes: sign === "-" && total !== 0 ? -total : total,
    label: `${total === 0 ? "+" : sign}${hh}:${mm}`,
  };
}

// ─── Day Arithmetic ──────────────────────────────────────────────────────

function dayToUtcMs(day: CalendarDay): number {
  if (!isCalendarDay(day)) {
    throw new LedgerError("INVALID_DATE", `Invalid calendar day: "${day}"`);
  }
  return Date.UTC(Number(day.slice(0, 4)), Number(day.slice(5, 7)) - 1, Number(day.slice(8, 10)));
}

function utcMsToDay(ms: number): CalendarDay {
  return new Date(ms).toISOString().slice(0, 10);
}

export function addDays(day: CalendarDay, days: number): CalendarDay {
  return utcMsToDay(dayToUtcMs(day) + days * DAY_MS);
}

export function compareDays(a: CalendarDay, b: CalendarDay): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

// ─── Zone Conversions ────────────────────────────────────────────────────

/** The instant local midnight starts `day`. */
export function dayStart(day: CalendarDay, zone: ReferenceZone): Instant {
  return new Date(dayToUtcMs(day) - zone.offsetMinutes * MINUTE_MS).toISOString();
}

/** Local 23:59:59 of `day`. */
export function endOfDay(day: CalendarDay, zone: ReferenceZone): Instant {
  return new Date(dayToUtcMs(day) - zone.offsetMinutes * MINUTE_MS + DAY_MS - 1000).toISOString();
}

/** The local calendar day an instant falls on. */
export function dayOf(instant: Instant, zone: ReferenceZone): CalendarDay {
  const ms = Date.parse(instant);
  if (!Number.isFinite(ms)) {
    throw new LedgerError("INVALID_TIMESTAMP", `Invalid instant: "${instant}"`);
  }
  return utcMsToDay(ms + zone.offsetMinutes * MINUTE_MS);
}

/** Half-open 24h window `[from, to)` covering one local day. */
export function dayWindow(
  day: CalendarDay,
  zone: ReferenceZone,
): { readonly from: Instant; readonly to: Instant } {
  return { from: dayStart(day, zone), to: dayStart(addDays(day, 1), zone) };
}

/**
 * Instant window for an inclusive day range. Either bound may be open.
 */
export function rangeWindow(
  range: DayRange,
  zone: ReferenceZone,
): { readonly from: Instant | undefined; readonly to: Instant | undefined } {
  return {
    from: range.start !== undefined ? dayStart(range.start, zone) : undefined,
    to: range.end !== undefined ? dayStart(addDays(range.end, 1), zone) : undefined,
  };
}

export function today(zone: ReferenceZone, now: Date = new Date()): CalendarDay {
  return dayOf(now.toISOString(), zone);
}

// ─── User Formats ────────────────────────────────────────────────────────

/**
 * Parse "dd/mm/yyyy" or "yyyy-mm-dd". Returns null for blank or
 * unparseable input.
 */
export function parseUserDate(raw: string): CalendarDay | null {
  const value = raw.trim();
  if (value === "") {
    return null;
  }

  const dmy = /^(\d{2})\/(\d{2})\/(\d{4})$/.exec(value);
  const candidate = dmy !== null ? `${dmy[3] ?? ""}-${dmy[2] ?? ""}-${dmy[1] ?? ""}` : value;

  return isCalendarDay(candidate) ? candidate : null;
}

export function formatUserDate(day: CalendarDay): string {
  return `${day.slice(8, 10)}/${day.slice(5, 7)}/${day.slice(0, 4)}`;
}

const LOCAL_DMY = /^(\d{2})\/(\d{2})\/(\d{4}) (\d{2}):(\d{2})$/;
const LOCAL_ISO = /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2})$/;
const ABSOLUTE_ISO = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:\d{2})$/;

/**
 * Parse a user timestamp.
 *
 * "dd/mm/yyyy HH:MM", "yyyy-mm-ddTHH:MM" and "yyyy-mm-dd HH:MM" are read
 * as wall-clock time in the reference zone. An ISO 8601 string with an
 * explicit offset is taken as-is. Returns null when nothing matches.
 */
export function parseUserTimestamp(raw: string, zone: ReferenceZone): Instant | null {
  const value = raw.trim();

  if (ABSOLUTE_ISO.test(value)) {
    const ms = Date.parse(value);
    return Number.isFinite(ms) ? new Date(ms).toISOString() : null;
  }

  let day: string;
  let hh: string;
  let mm: string;

  const dmy = LOCAL_DMY.exec(value);
  const iso = LOCAL_ISO.exec(value);
  if (dmy !== null) {
    day = `${dmy[3] ?? ""}-${dmy[2] ?? ""}-${dmy[1] ?? ""}`;
    hh = dmy[4] ?? "";
    mm = dmy[5] ?? "";
  } else if (iso !== null) {
    day = `${iso[1] ?? ""}-${iso[2] ?? ""}-${iso[3] ?? ""}`;
    hh = iso[4] ?? "";
    mm = iso[5] ?? "";
  } else {
    return null;
  }

  const hours = Number(hh);
  const minutes = Number(mm);
  if (!isCalendarDay(day) || hours > 23 || minutes > 59) {
    return null;
  }

  const ms = Date.parse(dayStart(day, zone)) + (hours * 60 + minutes) * MINUTE_MS;
  return new Date(ms).toISOString();
}

/** "dd/mm/yyyy HH:MM" in the reference zone. */
export function formatUserTimestamp(instant: Instant, zone: ReferenceZone): string {
  const ms = Date.parse(instant);
  if (!Number.isFinite(ms)) {
    throw new LedgerError("INVALID_TIMESTAMP", `Invalid instant: "${instant}"`);
  }
  const local = new Date(ms + zone.offsetMinutes * MINUTE_MS).toISOString();
  return `${formatUserDate(local.slice(0, 10))} ${local.slice(11, 16)}`;
}
