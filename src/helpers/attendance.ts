import { addDays, diffDays, isoWeekday } from "../plan/dates.js";
import type { CycleDayPreview } from "../plan/daily-plan-assembler.js";
import type { DayType } from "../plan/types.js";
import type { DayStatus } from "../db/types.js";

export type AttendanceStatus = DayStatus | "missed" | "pending";

export interface AttendanceDay {
  date: string;
  day_type: DayType;
  workout_key: string;
  status: AttendanceStatus;
}

export interface WeekStats {
  week_start: string;
  week_end: string;
  train_done: number;
  rest_done: number;
  skipped: number;
  missed: number;
  train_remaining: number;
  days: AttendanceDay[];
}

/** Monday of the ISO week containing `date`. */
export function weekStart(date: string): string {
  return addDays(date, 1 - isoWeekday(date));
}

/**
 * Combines the planned days of a week with what the user logged.
 * Past days with no log count as missed; today and later are pending.
 * A logged day keeps the day type recorded when it was marked.
 */
export function computeWeekStats(
  today: string,
  planned: CycleDayPreview[],
  logs: Array<{ date: string; status: DayStatus; day_type: DayType }>,
): WeekStats {
  const byDate = new Map(logs.map(l => [l.date, l]));
  const stats: WeekStats = {
    week_start: planned[0]?.date ?? weekStart(today),
    week_end: planned[planned.length - 1]?.date ?? addDays(weekStart(today), 6),
    train_done: 0,
    rest_done: 0,
    skipped: 0,
    missed: 0,
    train_remaining: 0,
    days: [],
  };

  for (const day of planned) {
    const log = byDate.get(day.date);
    let status: AttendanceStatus;
    let dayType = day.day_type;
    if (log) {
      status = log.status;
      dayType = log.day_type;
      if (log.status === "skipped") stats.skipped++;
      else if (log.day_type === "train") stats.train_done++;
      else stats.rest_done++;
    } else if (diffDays(day.date, today) > 0) {
      status = "missed";
      stats.missed++;
    } else {
      status = "pending";
      if (day.day_type === "train") stats.train_remaining++;
    }
    stats.days.push({ date: day.date, day_type: dayType, workout_key: day.workout_key, status });
  }

  return stats;
}
