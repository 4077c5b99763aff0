import fs from "fs";
import path from "path";
import { fileURLToPath } from "url";
import pool from "./connection.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

/**
 * SQL files live beside the sources; a compiled build in dist/ looks them up
 * back in src/.
 */
function findMigrationsDir(): string {
  const candidates = [
    path.join(__dirname, "migrations"),
    path.resolve(__dirname, "../../../src/db/migrations"),
  ];
  const found = candidates.find(dir => fs.existsSync(dir));
  if (!found) {
    throw new Error(`Migrations directory not found (looked in ${candidates.join(", ")})`);
  }
  return found;
}

export async function runMigrations(): Promise<void> {
  const client = await pool.connect();
  try {
    await client.query(`
      CREATE TABLE IF NOT EXISTS _migrations (
        id SERIAL PRIMARY KEY,
        name TEXT NOT NULL UNIQUE,
        applied_at TIMESTAMPTZ DEFAULT NOW()
      )
    `);

    const migrationsDir = findMigrationsDir();
    const files = fs.readdirSync(migrationsDir).filter(f => f.endsWith(".sql")).sort();

    const { rows: applied } = await client.query<{ name: string }>("SELECT name FROM _migrations");
    const appliedSet = new Set(applied.map(r => r.name));

    for (const file of files) {
      if (appliedSet.has(file)) continue;

      const sql = fs.readFileSync(path.join(migrationsDir, file), "utf-8");
      console.log(`[migrations] Applying ${file}`);

      await client.query("BEGIN");
      try {
        await client.query(sql);
        await client.query("INSERT INTO _migrations (name) VALUES ($1)", [file]);
        await client.query("COMMIT");
        console.log(`[migrations]   ✓ ${file}`);
      } catch (err) {
        await client.query("ROLLBACK");
        console.error(`[migrations]   ✗ ${file}:`, err);
        throw err;
      }
    }
  } finally {
    client.release();
  }
}
