import pool from "./connection.js";
import { runMigrations } from "./run-migrations.js";

async function migrate() {
  try {
    await runMigrations();
    console.log("[migrations] Complete.");
  } finally {
    await pool.end();
  }
}

migrate().catch((err) => {
  console.error("[migrations] Failed:", err);
  process.exit(1);
});
