/**
 * Database row types for cycle-coach.
 * These interfaces match the database schema and provide type safety for query results.
 * DATE columns arrive as YYYY-MM-DD strings (see db/connection.ts).
 */

import type { DayType } from "../plan/types.js";

// ─── User Tables ───────────────────────────────────────────────────────────

export interface UserRow {
  id: number;
  external_id: string;
  display_name: string | null;
  created_at: Date;
  last_login: Date | null;
}

export interface AuthTokenRow {
  token: string;
  user_id: number;
  expires_at: Date;
}

export interface UserSettingsRow {
  user_id: number;
  cycle_start: string | null;
  timezone: string | null;
  reminders: Record<string, unknown>;
  updated_at: Date;
}

// ─── Plan Tables ───────────────────────────────────────────────────────────

export interface PlanVersionRow {
  id: number;
  version_number: number;
  definition: unknown;
  source: string;
  created_by: number | null;
  created_at: Date;
}

// ─── Progression Tables ────────────────────────────────────────────────────

export interface ProgressionOverrideRow {
  user_id: number;
  exercise_name: string;
  delta_text: string;
  applied_at: Date;
}

export interface AutoprogRuleRow {
  id: number;
  user_id: number;
  workout_key: string;
  exercise_name: string;
  delta_text: string;
  interval_days: number;
  last_applied_date: string | null;
  created_at: Date;
  updated_at: Date;
}

// ─── Tracking Tables ───────────────────────────────────────────────────────

export type DayStatus = "done" | "skipped";

export interface DayLogRow {
  user_id: number;
  date: string;
  status: DayStatus;
  day_type: DayType;
  workout_key: string | null;
  note: string | null;
  updated_at: Date;
}

export interface BodyMeasurementRow {
  id: number;
  user_id: number;
  measured_on: string;
  /** NUMERIC columns come back as strings from pg. */
  weight: string | null;
  waist: string | null;
  belly: string | null;
  biceps: string | null;
  chest: string | null;
  note: string | null;
  created_at: Date;
}

export interface MedLogRow {
  id: number;
  user_id: number;
  taken_on: string;
  name: string;
  amount_mg: string | null;
  amount_ml: string | null;
  note: string | null;
  created_at: Date;
}
