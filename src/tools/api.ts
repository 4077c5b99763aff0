/**
 * Unified API Tool: single tool that exposes all data operations.
 * The LLM reads the API spec and calls endpoints programmatically.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { AppServices } from "../app-services.js";
import { toolResponse, safeHandler, APP_CONTEXT } from "../helpers/tool-response.js";
import { API_SPEC } from "../api/spec.js";
import * as handlers from "../api/handlers.js";
import { ValidationError } from "../plan/errors.js";

type Body = Record<string, unknown>;

function str(body: Body, key: string): string | undefined {
  const value = body[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value === "string") return value;
  if (typeof value === "number") return String(value);
  throw new ValidationError(`${key} must be a string`);
}

function num(body: Body, key: string): number | undefined {
  const value = body[key];
  if (value === undefined || value === null || value === "") return undefined;
  const n = typeof value === "number" ? value : Number(value);
  if (typeof value === "boolean" || !Number.isFinite(n)) {
    throw new ValidationError(`${key} must be a number`);
  }
  return n;
}

function bool(body: Body, key: string): boolean | undefined {
  const value = body[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value === "boolean") return value;
  if (value === "true" || value === "false") return value === "true";
  throw new ValidationError(`${key} must be true or false`);
}

/**
 * Route an API request to the appropriate handler.
 */
export async function routeRequest(
  services: AppServices,
  method: string,
  path: string,
  body: Body = {},
): Promise<object> {
  const normalizedMethod = method.toUpperCase();
  const normalizedPath = path.toLowerCase().replace(/\/+$/, ""); // Remove trailing slashes
  const route = `${normalizedMethod} ${normalizedPath}`;

  switch (route) {
    // ========================================================================
    // CONTEXT
    // ========================================================================
    case "GET /context":
      return handlers.getContext(services);

    // ========================================================================
    // DAILY PLAN & CYCLE
    // ========================================================================
    case "GET /today":
      return handlers.getToday(services, { date: str(body, "date") });
    case "GET /cycle":
      return handlers.getCycle(services, { from: str(body, "from"), days: num(body, "days") });
    case "PUT /cycle/start":
      return handlers.setCycleStart(services, { date: str(body, "date") });
    case "PUT /timezone":
      return handlers.setTimezone(services, { timezone: str(body, "timezone") });
    case "GET /plan":
      return handlers.getPlan(services);

    // ========================================================================
    // PROGRESSION
    // ========================================================================
    case "GET /progression":
      return handlers.listOverrides(services);
    case "POST /progression":
      return handlers.setProgressOverride(services, {
        exercise_name: str(body, "exercise_name"),
        delta_text: str(body, "delta_text"),
      });

    // ========================================================================
    // AUTOPROGRESSION
    // ========================================================================
    case "GET /autoprog":
      return handlers.listAutoprogRules(services, { date: str(body, "date") });
    case "POST /autoprog":
      return handlers.setAutoprogRule(services, {
        workout_key: str(body, "workout_key"),
        exercise_name: str(body, "exercise_name"),
        delta_text: str(body, "delta_text"),
        interval_days: num(body, "interval_days"),
      });
    case "DELETE /autoprog":
      return handlers.deleteAutoprogRule(services, {
        workout_key: str(body, "workout_key"),
        exercise_name: str(body, "exercise_name"),
      });
    case "POST /autoprog/run":
      return handlers.runAutoprog(services, { date: str(body, "date") });

    // ========================================================================
    // DAY LOG
    // ========================================================================
    case "POST /days":
      return handlers.markDay(services, {
        date: str(body, "date"),
        status: str(body, "status"),
        note: str(body, "note"),
      });
    case "GET /days/week":
      return handlers.getWeekStats(services, { date: str(body, "date") });

    // ========================================================================
    // REMINDERS
    // ========================================================================
    case "GET /reminders":
      return handlers.getReminders(services);
    case "PUT /reminders":
      return handlers.updateReminder(services, {
        kind: str(body, "kind"),
        time: str(body, "time"),
        day: str(body, "day"),
        enabled: bool(body, "enabled"),
      });

    // ========================================================================
    // MEASUREMENTS
    // ========================================================================
    case "POST /measurements":
      return handlers.logMeasurement(services, body);
    case "GET /measurements":
      return handlers.getMeasurements(services, { limit: num(body, "limit") });
    case "GET /measurements/latest":
      return handlers.getLatestMeasurement(services);
    case "PATCH /measurements/latest":
      return handlers.updateLatestMeasurement(services, body);

    // ========================================================================
    // MED LOG
    // ========================================================================
    case "POST /medlog":
      return handlers.logMed(services, {
        date: str(body, "date"),
        name: str(body, "name"),
        amount_mg: num(body, "amount_mg"),
        amount_ml: num(body, "amount_ml"),
        note: str(body, "note"),
      });
    case "GET /medlog":
      return handlers.getMedLog(services, { limit: num(body, "limit"), name: str(body, "name") });

    // ========================================================================
    // PLAN (admin)
    // ========================================================================
    case "POST /plan/sync":
      return handlers.syncPlan(services, body);
    case "GET /plan/versions":
      return handlers.getPlanHistory(services);
  }

  throw new ValidationError(`Unknown endpoint: ${route}`);
}

export function registerApiTool(server: McpServer, services: AppServices) {
  // Register the API spec as a resource
  server.resource(
    "api-spec",
    "text://cycle-coach/api-spec",
    {
      description: "Full API documentation for the cycle-coach api tool",
      mimeType: "text/plain",
    },
    async () => ({
      contents: [{ uri: "text://cycle-coach/api-spec", text: API_SPEC, mimeType: "text/plain" }],
    })
  );

  server.registerTool(
    "api",
    {
      description: `${APP_CONTEXT}Unified API for the training cycle. Call with { method, path, body? }

══════════════════════════════════════════════════════════════
MANDATORY FIRST CALL
══════════════════════════════════════════════════════════════
GET /context → { plan, cycle_start, today, required_action }
Follow required_action: "sync_plan" | "set_cycle_start" | null

══════════════════════════════════════════════════════════════
DAILY PLAN
══════════════════════════════════════════════════════════════
GET /today → { day_type, macros, workout?, warning? }   Body: { date? }
GET /cycle → { days }   Body: { from?, days? (1-42) }
PUT /cycle/start → { cycle_start }   Body: { date }
PUT /timezone → { timezone }   Body: { timezone }
GET /plan → { version, cycle_order, workouts, macros }

══════════════════════════════════════════════════════════════
PROGRESSION
══════════════════════════════════════════════════════════════
User says "add 2 reps to squats", "bench +2.5 kg"
→ POST /progression { exercise_name, delta_text }
GET /progression → { overrides }

Automatic progression every N days:
POST /autoprog { workout_key, exercise_name, delta_text, interval_days? }
GET /autoprog → { rules (with state: due | idle | applied) }
DELETE /autoprog { workout_key, exercise_name }
POST /autoprog/run → { applied, skipped, failed }

══════════════════════════════════════════════════════════════
DAY LOG, REMINDERS, MEASUREMENTS, MED LOG
══════════════════════════════════════════════════════════════
POST /days { date?, status: "done"|"skipped", note? }
GET /days/week → { train_done, rest_done, skipped, missed, train_remaining, days }
GET /reminders · PUT /reminders { kind, time?, day?, enabled? }
POST /measurements { weight?, waist?, belly?, biceps?, chest?, note? }
GET /measurements · GET /measurements/latest · PATCH /measurements/latest
POST /medlog { name, amount_mg?, amount_ml?, note?, date? } · GET /medlog { limit?, name? }

══════════════════════════════════════════════════════════════
ADMIN
══════════════════════════════════════════════════════════════
POST /plan/sync { sheet? } → rebuilds the plan from the spreadsheet
GET /plan/versions

Full reference: resource text://cycle-coach/api-spec`,
      inputSchema: {
        method: z.enum(["GET", "POST", "PUT", "PATCH", "DELETE"]).describe("HTTP method"),
        path: z.string().describe("API endpoint path (e.g., '/context', '/today', '/autoprog')"),
        body: z.record(z.string(), z.unknown()).optional().describe("Request body for POST/PUT/PATCH, or query parameters for GET"),
      },
      annotations: {
        readOnlyHint: false,
        destructiveHint: true, // DELETE /autoprog
        openWorldHint: false,
      },
    },
    safeHandler("api", async ({ method, path, body }) => {
      const result = await routeRequest(services, method, path, body ?? {});
      return toolResponse(result);
    })
  );
}
