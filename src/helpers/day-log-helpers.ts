import pool from "../db/connection.js";
import type { DayLogRow, DayStatus } from "../db/types.js";
import type { DayPlanView } from "../plan/types.js";

/**
 * Records the outcome of a day. The day type and workout key are copied from
 * the view resolved at marking time so later plan syncs do not rewrite history.
 */
export async function markDay(
  userId: number,
  view: Pick<DayPlanView, "date" | "day_type" | "workout_key">,
  status: DayStatus,
  note?: string,
): Promise<DayLogRow> {
  const { rows } = await pool.query<DayLogRow>(
    `INSERT INTO day_logs (user_id, date, status, day_type, workout_key, note, updated_at)
     VALUES ($1, $2, $3, $4, $5, $6, NOW())
     ON CONFLICT (user_id, date)
     DO UPDATE SET status = EXCLUDED.status,
       day_type = EXCLUDED.day_type,
       workout_key = EXCLUDED.workout_key,
       note = COALESCE(EXCLUDED.note, day_logs.note),
       updated_at = NOW()
     RETURNING *`,
    [userId, view.date, status, view.day_type, view.day_type === "train" ? view.workout_key : null, note ?? null]
  );
  return rows[0];
}

export async function getDayLogs(userId: number, from: string, to: string): Promise<DayLogRow[]> {
  const { rows } = await pool.query<DayLogRow>(
    `SELECT * FROM day_logs
     WHERE user_id = $1 AND date BETWEEN $2 AND $3
     ORDER BY date`,
    [userId, from, to]
  );
  return rows;
}
