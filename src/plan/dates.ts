import { ValidationError } from "./errors.js";

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const MS_PER_DAY = 86_400_000;

/**
 * Converts a calendar date (YYYY-MM-DD) into a day number since the Unix epoch.
 * Works on UTC midnights so daylight-saving shifts never change a difference.
 */
export function toDayNumber(isoDate: string): number {
  const match = ISO_DATE.exec(isoDate);
  if (!match) {
    throw new ValidationError(`Invalid date "${isoDate}", expected YYYY-MM-DD`);
  }
  const [, y, m, d] = match;
  // setUTCFullYear, unlike Date.UTC, keeps years 0-99 as written
  const check = new Date(0);
  check.setUTCFullYear(Number(y), Number(m) - 1, Number(d));
  const ms = check.getTime();
  if (check.getUTCMonth() !== Number(m) - 1 || check.getUTCDate() !== Number(d)) {
    throw new ValidationError(`Invalid date "${isoDate}", no such calendar day`);
  }
  return Math.floor(ms / MS_PER_DAY);
}

export function fromDayNumber(day: number): string {
  return new Date(day * MS_PER_DAY).toISOString().slice(0, 10);
}

export function isIsoDate(value: string): boolean {
  try {
    toDayNumber(value);
    return true;
  } catch {
    return false;
  }
}

/** Signed number of whole days from `from` to `to`. */
export function diffDays(from: string, to: string): number {
  return toDayNumber(to) - toDayNumber(from);
}

export function addDays(isoDate: string, days: number): string {
  return fromDayNumber(toDayNumber(isoDate) + days);
}

/** ISO weekday of a calendar date: 1 = Monday … 7 = Sunday. */
export function isoWeekday(isoDate: string): number {
  // Day 0 (1970-01-01) was a Thursday.
  const dow = (((toDayNumber(isoDate) + 3) % 7) + 7) % 7;
  return dow + 1;
}

export function assertIsoDate(value: string): void {
  toDayNumber(value);
}
