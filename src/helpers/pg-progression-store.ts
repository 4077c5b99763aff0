import type { Pool, PoolClient } from "pg";
import pool from "../db/connection.js";
import type { AutoprogRuleRow, ProgressionOverrideRow } from "../db/types.js";
import type { ProgressionStore, ProgressionTx, RuleInput } from "../plan/progression-store.js";
import type { AutoprogRule, ProgressionOverride } from "../plan/types.js";

/** First key of the two-key advisory lock; the second key is the user id. */
export const PROGRESSION_LOCK_NAMESPACE = 7301;

const RULE_COLUMNS =
  "id, workout_key, exercise_name, delta_text, interval_days, last_applied_date, created_at";

type RuleColumns = Pick<
  AutoprogRuleRow,
  "id" | "workout_key" | "exercise_name" | "delta_text" | "interval_days" | "last_applied_date" | "created_at"
>;

function toRule(row: RuleColumns): AutoprogRule {
  return {
    id: row.id,
    workout_key: row.workout_key,
    exercise_name: row.exercise_name,
    delta_text: row.delta_text,
    interval_days: Number(row.interval_days),
    last_applied_date: row.last_applied_date,
    created_at: new Date(row.created_at),
  };
}

function toOverride(row: Pick<ProgressionOverrideRow, "exercise_name" | "delta_text" | "applied_at">): ProgressionOverride {
  return {
    exercise_name: row.exercise_name,
    delta_text: row.delta_text,
    applied_at: new Date(row.applied_at),
  };
}

class PgProgressionTx implements ProgressionTx {
  constructor(
    private readonly client: PoolClient,
    private readonly userId: number,
  ) {}

  async upsertOverride(exerciseName: string, deltaText: string, appliedAt: Date): Promise<ProgressionOverride> {
    const { rows } = await this.client.query<ProgressionOverrideRow>(
      `INSERT INTO progression_overrides (user_id, exercise_name, delta_text, applied_at)
       VALUES ($1, $2, $3, $4)
       ON CONFLICT (user_id, exercise_name)
       DO UPDATE SET delta_text = EXCLUDED.delta_text, applied_at = EXCLUDED.applied_at
       RETURNING exercise_name, delta_text, applied_at`,
      [this.userId, exerciseName, deltaText, appliedAt]
    );
    return toOverride(rows[0]);
  }

  async getOverrides(exerciseNames?: string[]): Promise<ProgressionOverride[]> {
    if (exerciseNames) {
      const { rows } = await this.client.query<ProgressionOverrideRow>(
        `SELECT exercise_name, delta_text, applied_at FROM progression_overrides
         WHERE user_id = $1 AND exercise_name = ANY($2::text[])`,
        [this.userId, exerciseNames]
      );
      return rows.map(toOverride);
    }
    const { rows } = await this.client.query<ProgressionOverrideRow>(
      `SELECT exercise_name, delta_text, applied_at FROM progression_overrides
       WHERE user_id = $1 ORDER BY exercise_name`,
      [this.userId]
    );
    return rows.map(toOverride);
  }

  async listRules(): Promise<AutoprogRule[]> {
    const { rows } = await this.client.query<RuleColumns>(
      `SELECT ${RULE_COLUMNS} FROM autoprog_rules WHERE user_id = $1 ORDER BY created_at, id`,
      [this.userId]
    );
    return rows.map(toRule);
  }

  async getRule(ruleId: number): Promise<AutoprogRule | null> {
    const { rows } = await this.client.query<RuleColumns>(
      `SELECT ${RULE_COLUMNS} FROM autoprog_rules WHERE id = $1 AND user_id = $2 FOR UPDATE`,
      [ruleId, this.userId]
    );
    return rows[0] ? toRule(rows[0]) : null;
  }

  async upsertRule(input: RuleInput): Promise<AutoprogRule> {
    const { rows } = await this.client.query<RuleColumns>(
      `INSERT INTO autoprog_rules (user_id, workout_key, exercise_name, delta_text, interval_days)
       VALUES ($1, $2, $3, $4, $5)
       ON CONFLICT (user_id, workout_key, exercise_name)
       DO UPDATE SET delta_text = EXCLUDED.delta_text,
         interval_days = EXCLUDED.interval_days,
         updated_at = NOW()
       RETURNING ${RULE_COLUMNS}`,
      [this.userId, input.workout_key, input.exercise_name, input.delta_text, input.interval_days]
    );
    return toRule(rows[0]);
  }

  async deleteRule(workoutKey: string, exerciseName: string): Promise<boolean> {
    const { rowCount } = await this.client.query(
      "DELETE FROM autoprog_rules WHERE user_id = $1 AND workout_key = $2 AND exercise_name = $3",
      [this.userId, workoutKey, exerciseName]
    );
    return (rowCount ?? 0) > 0;
  }

  async markRuleApplied(ruleId: number, appliedDate: string): Promise<void> {
    await this.client.query(
      `UPDATE autoprog_rules SET last_applied_date = $1, updated_at = NOW()
       WHERE id = $2 AND user_id = $3`,
      [appliedDate, ruleId, this.userId]
    );
  }
}

/**
 * Postgres-backed ProgressionStore. Each transaction takes a transaction-scoped
 * advisory lock on the user, so a manual override and a scheduled rule
 * application for the same user run one after the other.
 */
export class PgProgressionStore implements ProgressionStore {
  constructor(private readonly db: Pool = pool) {}

  async transaction<T>(userId: number, fn: (tx: ProgressionTx) => Promise<T>): Promise<T> {
    const client = await this.db.connect();
    try {
      await client.query("BEGIN");
      await client.query("SELECT pg_advisory_xact_lock($1::int, $2::int)", [PROGRESSION_LOCK_NAMESPACE, userId]);
      const result = await fn(new PgProgressionTx(client, userId));
      await client.query("COMMIT");
      return result;
    } catch (err) {
      await client.query("ROLLBACK");
      throw err;
    } finally {
      client.release();
    }
  }
}
