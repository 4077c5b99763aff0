import { z } from "zod";
import pool from "../db/connection.js";
import type { BodyMeasurementRow } from "../db/types.js";
import { ValidationError } from "../plan/errors.js";

export const MEASUREMENT_FIELDS = ["weight", "waist", "belly", "biceps", "chest"] as const;
export type MeasurementField = (typeof MEASUREMENT_FIELDS)[number];

export const measurementValuesSchema = z.object({
  weight: z.number().positive().max(500).optional(),
  waist: z.number().positive().max(300).optional(),
  belly: z.number().positive().max(300).optional(),
  biceps: z.number().positive().max(150).optional(),
  chest: z.number().positive().max(300).optional(),
  note: z.string().max(500).optional(),
});

export type MeasurementValues = z.infer<typeof measurementValuesSchema>;

export interface BodyMeasurement {
  id: number;
  measured_on: string;
  weight: number | null;
  waist: number | null;
  belly: number | null;
  biceps: number | null;
  chest: number | null;
  note: string | null;
}

export function toMeasurement(row: BodyMeasurementRow): BodyMeasurement {
  const num = (value: string | null) => (value === null ? null : Number(value));
  return {
    id: row.id,
    measured_on: row.measured_on,
    weight: num(row.weight),
    waist: num(row.waist),
    belly: num(row.belly),
    biceps: num(row.biceps),
    chest: num(row.chest),
    note: row.note,
  };
}

function parseValues(values: unknown, requireMeasurement: boolean): MeasurementValues {
  const parsed = measurementValuesSchema.safeParse(values);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join(".")}: ${i.message}`);
    throw new ValidationError("Invalid measurement", issues);
  }
  const hasValue = MEASUREMENT_FIELDS.some(f => parsed.data[f] !== undefined);
  if (requireMeasurement && !hasValue) {
    throw new ValidationError("At least one measurement is required (weight, waist, belly, biceps, chest)");
  }
  return parsed.data;
}

export async function logMeasurement(userId: number, date: string, values: unknown): Promise<BodyMeasurement> {
  const v = parseValues(values, true);
  const { rows } = await pool.query<BodyMeasurementRow>(
    `INSERT INTO body_measurements (user_id, measured_on, weight, waist, belly, biceps, chest, note)
     VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
     RETURNING *`,
    [userId, date, v.weight ?? null, v.waist ?? null, v.belly ?? null, v.biceps ?? null, v.chest ?? null, v.note ?? null]
  );
  return toMeasurement(rows[0]);
}

export async function getMeasurements(userId: number, limit = 20): Promise<BodyMeasurement[]> {
  const { rows } = await pool.query<BodyMeasurementRow>(
    `SELECT * FROM body_measurements WHERE user_id = $1
     ORDER BY measured_on DESC, id DESC LIMIT $2`,
    [userId, limit]
  );
  return rows.map(toMeasurement);
}

/** The entry logged just before `entry` in (measured_on, id) order, if any. */
export async function getMeasurementBefore(
  userId: number,
  entry: Pick<BodyMeasurement, "id" | "measured_on">,
): Promise<BodyMeasurement | null> {
  const { rows } = await pool.query<BodyMeasurementRow>(
    `SELECT * FROM body_measurements
     WHERE user_id = $1 AND (measured_on, id) < ($2::date, $3)
     ORDER BY measured_on DESC, id DESC LIMIT 1`,
    [userId, entry.measured_on, entry.id]
  );
  return rows[0] ? toMeasurement(rows[0]) : null;
}

/** Patches the most recent entry; fields left out keep their value. */
export async function updateLatestMeasurement(userId: number, values: unknown): Promise<BodyMeasurement | null> {
  const v = parseValues(values, false);
  const fields = [...MEASUREMENT_FIELDS, "note"] as const;
  const provided = fields.flatMap(field => {
    const value = v[field];
    return value === undefined ? [] : [{ field, value }];
  });
  if (provided.length === 0) {
    throw new ValidationError("Nothing to update");
  }

  const params: Array<number | string> = [userId];
  const sets = provided.map(({ field, value }) => {
    params.push(value);
    return `${field} = $${params.length}`;
  });

  const { rows } = await pool.query<BodyMeasurementRow>(
    `UPDATE body_measurements SET ${sets.join(", ")}
     WHERE id = (
       SELECT id FROM body_measurements WHERE user_id = $1
       ORDER BY measured_on DESC, id DESC LIMIT 1
     )
     RETURNING *`,
    params
  );
  return rows[0] ? toMeasurement(rows[0]) : null;
}

/** Change of each field between two entries (newer minus older), rounded to 0.01. */
export function measurementChange(
  newer: BodyMeasurement,
  older: BodyMeasurement,
): Partial<Record<MeasurementField, number>> {
  const change: Partial<Record<MeasurementField, number>> = {};
  for (const field of MEASUREMENT_FIELDS) {
    const a = newer[field];
    const b = older[field];
    if (a !== null && b !== null) {
      change[field] = Math.round((a - b) * 100) / 100;
    }
  }
  return change;
}
