import { getUserContext } from "../context/user-context.js";
import { toDayNumber } from "../plan/dates.js";

const MS_PER_MINUTE = 60_000;
const MS_PER_DAY = 86_400_000;

export interface ZonedParts {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

const formatterCache = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string): Intl.DateTimeFormat {
  let fmt = formatterCache.get(timeZone);
  if (!fmt) {
    fmt = new Intl.DateTimeFormat("en-US", {
      timeZone,
      hourCycle: "h23",
      year: "numeric",
      month: "2-digit",
      day: "2-digit",
      hour: "2-digit",
      minute: "2-digit",
      second: "2-digit",
    });
    formatterCache.set(timeZone, fmt);
  }
  return fmt;
}

export function isValidTimeZone(timeZone: string): boolean {
  try {
    formatterFor(timeZone);
    return true;
  } catch {
    return false;
  }
}

/** Wall-clock fields of `instant` as seen in `timeZone`. Throws RangeError for unknown zones. */
export function zonedParts(instant: Date, timeZone: string): ZonedParts {
  const values: Record<string, number> = {};
  for (const part of formatterFor(timeZone).formatToParts(instant)) {
    if (part.type !== "literal") values[part.type] = Number(part.value);
  }
  return {
    year: values.year,
    month: values.month,
    day: values.day,
    hour: values.hour,
    minute: values.minute,
    second: values.second,
  };
}

/** Offset of `timeZone` from UTC at `epochMs`, in milliseconds (east positive). */
function offsetAt(epochMs: number, timeZone: string): number {
  const floored = Math.floor(epochMs / 1000) * 1000;
  const p = zonedParts(new Date(floored), timeZone);
  return Date.UTC(p.year, p.month - 1, p.day, p.hour, p.minute, p.second) - floored;
}

/**
 * UTC instant at which the wall clock in `timeZone` reads `isoDate hour:minute`.
 * Ambiguous times (clocks going back) pick the earlier instant; times inside a
 * gap (clocks going forward) are shifted forward by the gap length.
 */
export function zonedTimeToUtc(isoDate: string, hour: number, minute: number, timeZone: string): Date {
  const wall = toDayNumber(isoDate) * MS_PER_DAY + (hour * 60 + minute) * MS_PER_MINUTE;
  const before = offsetAt(wall - MS_PER_DAY, timeZone);
  const after = offsetAt(wall + MS_PER_DAY, timeZone);

  const matches = [...new Set([before, after])]
    .map(offset => wall - offset)
    .filter(t => {
      const p = zonedParts(new Date(t), timeZone);
      return Date.UTC(p.year, p.month - 1, p.day, p.hour, p.minute) === wall;
    });

  if (matches.length > 0) {
    return new Date(Math.min(...matches));
  }
  return new Date(wall - before);
}

/**
 * Calendar date (YYYY-MM-DD) of `now` in `timeZone`.
 * Falls back to UTC when the zone is unknown.
 */
export function formatDateInTimezone(now: Date, timeZone: string): string {
  const toIso = (p: ZonedParts) =>
    `${String(p.year).padStart(4, "0")}-${String(p.month).padStart(2, "0")}-${String(p.day).padStart(2, "0")}`;

  try {
    return toIso(zonedParts(now, timeZone));
  } catch (err) {
    console.warn(
      `[formatDateInTimezone] Invalid timezone "${timeZone}", falling back to UTC:`,
      err instanceof Error ? err.message : err,
    );
    return toIso(zonedParts(now, "UTC"));
  }
}

/** Today's date in the timezone of the user making the current request. */
export function getUserCurrentDate(now: Date = new Date()): string {
  return formatDateInTimezone(now, getUserContext().timezone);
}
