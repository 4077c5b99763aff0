import { z } from "zod";
import { addDays, isoWeekday } from "../plan/dates.js";
import { formatDateInTimezone, zonedTimeToUtc } from "./date-helpers.js";

export const DAILY_REMINDER_KINDS = ["water", "motivation", "sleep", "workout"] as const;
export const REPORT_KINDS = ["daily_report", "weekly_report"] as const;
export const REMINDER_KINDS = [...DAILY_REMINDER_KINDS, ...REPORT_KINDS] as const;
export type ReminderKind = (typeof REMINDER_KINDS)[number];

export const WEEKDAYS = ["mon", "tue", "wed", "thu", "fri", "sat", "sun"] as const;
export type Weekday = (typeof WEEKDAYS)[number];

export interface ReminderSchedule {
  time: string | null;
  enabled: boolean;
  /** Only weekly schedules carry a day. */
  day?: Weekday;
}

export type ReminderSettings = Record<ReminderKind, ReminderSchedule>;

export const REMINDER_TEXT: Record<(typeof DAILY_REMINDER_KINDS)[number], string> = {
  water: "Time to drink some water.",
  motivation: "Stay on course, the goal is getting closer.",
  sleep: "Sleep and recovery matter today.",
  workout: "Time to train. Check today's plan.",
};

const REPORT_DEFAULTS: Record<(typeof REPORT_KINDS)[number], ReminderSchedule> = {
  daily_report: { time: "23:00", enabled: true },
  weekly_report: { time: "20:00", enabled: true, day: "sun" },
};

export function isReminderKind(value: string): value is ReminderKind {
  return (REMINDER_KINDS as readonly string[]).includes(value);
}

export function isWeekday(value: string): value is Weekday {
  return (WEEKDAYS as readonly string[]).includes(value);
}

/** Parses "HH:MM" (24h). Returns null for anything out of range. */
export function parseTime(value: string): { hour: number; minute: number } | null {
  const match = /^(\d{1,2}):(\d{1,2})$/.exec(value.trim());
  if (!match) return null;
  const hour = Number(match[1]);
  const minute = Number(match[2]);
  if (hour > 23 || minute > 59) return null;
  return { hour, minute };
}

const storedScheduleSchema = z.union([
  z.string(),
  z.object({
    time: z.string().nullable().optional(),
    enabled: z.boolean().optional(),
    day: z.string().optional(),
  }),
]);

/**
 * Normalizes stored reminder settings. Accepts the short form `"10:00"` as
 * well as `{ time, enabled, day }`; report kinds fall back to their defaults
 * field by field, other kinds default to disabled.
 */
export function normalizeReminders(raw: unknown): ReminderSettings {
  const source: Record<string, unknown> =
    raw && typeof raw === "object" && !Array.isArray(raw) ? { ...raw } : {};

  const read = (kind: ReminderKind): ReminderSchedule | null => {
    const parsed = storedScheduleSchema.safeParse(source[kind]);
    if (!parsed.success) return null;
    if (typeof parsed.data === "string") return { time: parsed.data, enabled: true };
    const day = parsed.data.day?.toLowerCase();
    return {
      time: parsed.data.time ?? null,
      enabled: parsed.data.enabled ?? true,
      ...(day && isWeekday(day) ? { day } : {}),
    };
  };

  const daily = (kind: (typeof DAILY_REMINDER_KINDS)[number]): ReminderSchedule =>
    read(kind) ?? { time: null, enabled: false };

  const report = (kind: (typeof REPORT_KINDS)[number]): ReminderSchedule => {
    const base = REPORT_DEFAULTS[kind];
    const stored = read(kind);
    return {
      time: stored?.time ?? base.time,
      enabled: stored?.enabled ?? base.enabled,
      ...(base.day ? { day: stored?.day ?? base.day } : {}),
    };
  };

  return {
    water: daily("water"),
    motivation: daily("motivation"),
    sleep: daily("sleep"),
    workout: daily("workout"),
    daily_report: report("daily_report"),
    weekly_report: report("weekly_report"),
  };
}

/**
 * Next instant strictly after `now` at which the wall clock in `timeZone`
 * reads the scheduled time (on the scheduled weekday, for weekly schedules).
 * Returns null for disabled or unparseable schedules.
 */
export function nextTriggerAt(schedule: ReminderSchedule, timeZone: string, now: Date): Date | null {
  if (!schedule.enabled || !schedule.time) return null;
  const time = parseTime(schedule.time);
  if (!time) return null;

  const localToday = formatDateInTimezone(now, timeZone);
  const weekday = schedule.day ? WEEKDAYS.indexOf(schedule.day) + 1 : null;

  for (let offset = 0; offset <= 7; offset++) {
    const date = addDays(localToday, offset);
    if (weekday !== null && isoWeekday(date) !== weekday) continue;
    const at = zonedTimeToUtc(date, time.hour, time.minute, timeZone);
    if (at.getTime() > now.getTime()) return at;
  }
  return null;
}
