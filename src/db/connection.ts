import pg from "pg";
import { loadConfig } from "../config.js";

const { DATABASE_URL } = loadConfig();

// DATE columns come back as plain YYYY-MM-DD strings instead of local-midnight Dates
pg.types.setTypeParser(pg.types.builtins.DATE, (value: string) => value);

const pool = new pg.Pool({
  connectionString: DATABASE_URL,
  ssl: DATABASE_URL.includes("localhost")
    ? false
    : { rejectUnauthorized: true },
  max: 10,
});

export default pool;
