import { z } from "zod";
import pool from "../db/connection.js";
import type { MedLogRow } from "../db/types.js";
import { ValidationError } from "../plan/errors.js";

export const medLogSchema = z.object({
  name: z.string().trim().min(1, "name is required").max(100),
  amount_mg: z.number().nonnegative().max(100_000).optional(),
  amount_ml: z.number().nonnegative().max(1_000).optional(),
  note: z.string().max(500).optional(),
});

export type MedLogValues = z.infer<typeof medLogSchema>;

export interface MedLogEntry {
  id: number;
  taken_on: string;
  name: string;
  amount_mg: number | null;
  amount_ml: number | null;
  note: string | null;
}

function toEntry(row: MedLogRow): MedLogEntry {
  return {
    id: row.id,
    taken_on: row.taken_on,
    name: row.name,
    amount_mg: row.amount_mg === null ? null : Number(row.amount_mg),
    amount_ml: row.amount_ml === null ? null : Number(row.amount_ml),
    note: row.note,
  };
}

export async function logMedication(userId: number, date: string, values: unknown): Promise<MedLogEntry> {
  const parsed = medLogSchema.safeParse(values);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join(".")}: ${i.message}`);
    throw new ValidationError("Invalid med log entry", issues);
  }
  const v = parsed.data;
  const { rows } = await pool.query<MedLogRow>(
    `INSERT INTO med_logs (user_id, taken_on, name, amount_mg, amount_ml, note)
     VALUES ($1, $2, $3, $4, $5, $6)
     RETURNING *`,
    [userId, date, v.name, v.amount_mg ?? null, v.amount_ml ?? null, v.note ?? null]
  );
  return toEntry(rows[0]);
}

/** Newest first; `name` matches case-insensitively. */
export async function getMedLogs(userId: number, limit = 20, name?: string): Promise<MedLogEntry[]> {
  const params: Array<number | string> = [userId, limit];
  let filter = "";
  if (name) {
    params.push(name.trim());
    filter = " AND LOWER(name) = LOWER($3)";
  }
  const { rows } = await pool.query<MedLogRow>(
    `SELECT * FROM med_logs WHERE user_id = $1${filter}
     ORDER BY taken_on DESC, id DESC LIMIT $2`,
    params
  );
  return rows.map(toEntry);
}
