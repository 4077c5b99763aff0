import pool from "../db/connection.js";
import type { UserSettingsRow } from "../db/types.js";
import { assertIsoDate } from "../plan/dates.js";
import type { CycleStartSource } from "../plan/daily-plan-assembler.js";
import { ValidationError } from "../plan/errors.js";
import { isValidTimeZone } from "./date-helpers.js";
import { normalizeReminders } from "./reminder-schedule.js";
import type { ReminderKind, ReminderSchedule, ReminderSettings } from "./reminder-schedule.js";

export interface UserSettings {
  cycle_start: string | null;
  timezone: string | null;
  reminders: ReminderSettings;
}

export async function getSettings(userId: number): Promise<UserSettings> {
  const { rows } = await pool.query<UserSettingsRow>(
    "SELECT cycle_start, timezone, reminders FROM user_settings WHERE user_id = $1",
    [userId]
  );
  const row = rows[0];
  return {
    cycle_start: row?.cycle_start ?? null,
    timezone: row?.timezone ?? null,
    reminders: normalizeReminders(row?.reminders ?? {}),
  };
}

export async function getCycleStart(userId: number): Promise<string | null> {
  const { rows } = await pool.query<Pick<UserSettingsRow, "cycle_start">>(
    "SELECT cycle_start FROM user_settings WHERE user_id = $1",
    [userId]
  );
  return rows[0]?.cycle_start ?? null;
}

export const pgCycleStarts: CycleStartSource = { getCycleStart };

export async function setCycleStart(userId: number, date: string): Promise<string> {
  assertIsoDate(date);
  const { rows } = await pool.query<Pick<UserSettingsRow, "cycle_start">>(
    `INSERT INTO user_settings (user_id, cycle_start, updated_at)
     VALUES ($1, $2, NOW())
     ON CONFLICT (user_id)
     DO UPDATE SET cycle_start = EXCLUDED.cycle_start, updated_at = NOW()
     RETURNING cycle_start`,
    [userId, date]
  );
  return rows[0].cycle_start ?? date;
}

export async function setTimezone(userId: number, timezone: string): Promise<string> {
  if (!isValidTimeZone(timezone)) {
    throw new ValidationError(`Unknown time zone "${timezone}"`);
  }
  await pool.query(
    `INSERT INTO user_settings (user_id, timezone, updated_at)
     VALUES ($1, $2, NOW())
     ON CONFLICT (user_id)
     DO UPDATE SET timezone = EXCLUDED.timezone, updated_at = NOW()`,
    [userId, timezone]
  );
  return timezone;
}

/** Replaces one reminder entry, leaving the others untouched. */
export async function setReminder(
  userId: number,
  kind: ReminderKind,
  schedule: ReminderSchedule,
): Promise<ReminderSettings> {
  const { rows } = await pool.query<Pick<UserSettingsRow, "reminders">>(
    `INSERT INTO user_settings (user_id, reminders, updated_at)
     VALUES ($1, jsonb_build_object($2::text, $3::jsonb), NOW())
     ON CONFLICT (user_id)
     DO UPDATE SET reminders = user_settings.reminders || EXCLUDED.reminders, updated_at = NOW()
     RETURNING reminders`,
    [userId, kind, JSON.stringify(schedule)]
  );
  return normalizeReminders(rows[0].reminders);
}

export interface ScheduledUser {
  id: number;
  timezone: string | null;
}

export async function listUsersForScheduling(): Promise<ScheduledUser[]> {
  const { rows } = await pool.query<ScheduledUser>(
    `SELECT u.id, s.timezone FROM users u
     LEFT JOIN user_settings s ON s.user_id = u.id
     ORDER BY u.id`
  );
  return rows;
}
