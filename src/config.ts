import "dotenv/config";
import { z } from "zod";
import { isValidTimeZone } from "./helpers/date-helpers.js";
import { parseTime } from "./helpers/reminder-schedule.js";

const idList = z
  .string()
  .optional()
  .transform(value =>
    (value ?? "")
      .split(",")
      .map(s => s.trim())
      .filter(Boolean)
      .map(Number),
  )
  .refine(ids => ids.every(id => Number.isInteger(id) && id > 0), "must be a comma-separated list of user ids");

const configSchema = z.object({
  DATABASE_URL: z.string().min(1, "DATABASE_URL environment variable is required"),
  PORT: z.coerce.number().int().positive().default(3001),
  NODE_ENV: z.string().optional(),
  TZ_DEFAULT: z
    .string()
    .default("Europe/Moscow")
    .refine(isValidTimeZone, "must be an IANA time zone"),
  AUTOPROG_RUN_TIME: z
    .string()
    .default("06:00")
    .refine(value => parseTime(value) !== null, "must be HH:MM"),
  ADMIN_USER_IDS: idList,
  ALLOWED_ORIGINS: z.string().optional(),
  DEV_USER_ID: z.coerce.number().int().positive().optional(),
  SHEET_ID: z.string().optional(),
  SHEET_GID_PLAN: z.string().optional(),
  SHEET_GID_MACROS: z.string().optional(),
  SHEET_GID_CYCLE: z.string().optional(),
  PLAN_SEED_PATH: z.string().optional(),
});

export type AppConfig = z.infer<typeof configSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = configSchema.safeParse(env);
  if (!parsed.success) {
    const errors = parsed.error.issues.map(i => `${i.path.join(".")}: ${i.message}`);
    throw new Error(`Invalid configuration: ${errors.join(", ")}`);
  }
  return parsed.data;
}

export function isProduction(config: AppConfig): boolean {
  return config.NODE_ENV === "production";
}
