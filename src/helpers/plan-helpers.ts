import fs from "node:fs/promises";
import pool from "../db/connection.js";
import type { PlanVersionRow } from "../db/types.js";
import type { PlanSnapshot, PlanStore } from "../plan/plan-store.js";

/** Serializes plan syncs across processes. */
const PLAN_SYNC_LOCK = 7302;

export async function getLatestPlanVersion(): Promise<PlanVersionRow | null> {
  const { rows } = await pool.query<PlanVersionRow>(
    `SELECT id, version_number, definition, source, created_by, created_at
     FROM plan_versions ORDER BY version_number DESC LIMIT 1`
  );
  return rows[0] || null;
}

export async function listPlanVersions(limit = 10) {
  const { rows } = await pool.query<Pick<PlanVersionRow, "version_number" | "source" | "created_by" | "created_at">>(
    `SELECT version_number, source, created_by, created_at
     FROM plan_versions ORDER BY version_number DESC LIMIT $1`,
    [limit]
  );
  return rows;
}

/**
 * Validates a definition, stores it as the next plan version and only then
 * activates it in `store`. Any failure (validation or write) rolls back and
 * leaves the active snapshot untouched.
 */
export async function savePlanVersion(
  store: PlanStore,
  definition: unknown,
  source: string,
  createdBy: number | null,
): Promise<PlanSnapshot> {
  const client = await pool.connect();
  try {
    await client.query("BEGIN");
    await client.query("SELECT pg_advisory_xact_lock($1)", [PLAN_SYNC_LOCK]);

    const { rows: [latest] } = await client.query<{ max: number | null }>(
      "SELECT MAX(version_number) AS max FROM plan_versions"
    );
    const snapshot = store.prepare(definition, (latest?.max ?? 0) + 1);

    await client.query(
      `INSERT INTO plan_versions (version_number, definition, source, created_by)
       VALUES ($1, $2::jsonb, $3, $4)`,
      [snapshot.version, JSON.stringify(snapshot.toDefinition()), source, createdBy]
    );

    await client.query("COMMIT");
    store.activate(snapshot);
    return snapshot;
  } catch (err) {
    await client.query("ROLLBACK");
    throw err;
  } finally {
    client.release();
  }
}

/**
 * Brings `store` up to the newest stored version (another instance may have
 * synced). Returns true when a newer version was activated.
 */
export async function refreshPlanFromDatabase(store: PlanStore): Promise<boolean> {
  const latest = await getLatestPlanVersion();
  if (!latest) return false;
  if (store.isLoaded() && store.current().version >= latest.version_number) return false;
  store.load(latest.definition, latest.version_number);
  console.log(`[plan] Activated plan v${latest.version_number} (${latest.source})`);
  return true;
}

/**
 * Start-up: newest stored version, else the JSON seed file when configured.
 * A server without any plan still starts; plan reads answer "plan unavailable".
 */
export async function loadInitialPlan(store: PlanStore, seedPath?: string): Promise<void> {
  if (await refreshPlanFromDatabase(store)) return;
  if (!seedPath) {
    console.warn("[plan] No stored plan and no PLAN_SEED_PATH; waiting for a sync");
    return;
  }
  const raw: unknown = JSON.parse(await fs.readFile(seedPath, "utf-8"));
  const snapshot = await savePlanVersion(store, raw, "seed", null);
  console.log(`[plan] Seeded plan v${snapshot.version} from ${seedPath}`);
}
