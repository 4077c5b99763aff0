/**
 * API Handlers: business logic for the unified api tool and the focused tools.
 * Each handler corresponds to an API endpoint and runs for the user in context.
 */

import { z } from "zod";
import { isAdmin } from "../app-services.js";
import type { AppServices } from "../app-services.js";
import { getUserContext, getUserId } from "../context/user-context.js";
import { computeWeekStats, weekStart } from "../helpers/attendance.js";
import { getUserCurrentDate } from "../helpers/date-helpers.js";
import { getDayLogs, markDay as storeDayLog } from "../helpers/day-log-helpers.js";
import {
  getMeasurementBefore,
  getMeasurements as fetchMeasurements,
  logMeasurement as storeMeasurement,
  measurementChange,
  updateLatestMeasurement as patchLatestMeasurement,
} from "../helpers/measurement-helpers.js";
import { getMedLogs, logMedication } from "../helpers/med-log-helpers.js";
import { listPlanVersions, savePlanVersion } from "../helpers/plan-helpers.js";
import {
  isReminderKind,
  isWeekday,
  nextTriggerAt,
  parseTime,
  REMINDER_KINDS,
  WEEKDAYS,
} from "../helpers/reminder-schedule.js";
import type { ReminderSchedule } from "../helpers/reminder-schedule.js";
import { getSettings, setCycleStart as storeCycleStart, setReminder, setTimezone as storeTimezone } from "../helpers/settings-helpers.js";
import { extractSheetId, fetchPlanTables } from "../helpers/sheet-sync.js";
import { ruleState } from "../plan/autoprogression-engine.js";
import type { RuleInputParams } from "../plan/autoprogression-engine.js";
import { addDays, assertIsoDate } from "../plan/dates.js";
import { ValidationError } from "../plan/errors.js";
import { buildPlanFromRows } from "../plan/plan-schema.js";
import type { SheetRow } from "../plan/plan-schema.js";

/** Resolves "today"/"tomorrow"/"yesterday" or an ISO date against the user's calendar. */
export function resolveDateParam(value: string | undefined, now: Date = new Date()): string {
  const today = getUserCurrentDate(now);
  if (!value) return today;
  const normalized = value.trim().toLowerCase();
  if (normalized === "today") return today;
  if (normalized === "tomorrow") return addDays(today, 1);
  if (normalized === "yesterday") return addDays(today, -1);
  assertIsoDate(normalized);
  return normalized;
}

// ============================================================================
// CONTEXT
// ============================================================================

export async function getContext(services: AppServices) {
  const { userId, timezone } = getUserContext();
  const settings = await getSettings(userId);
  const planLoaded = services.plans.isLoaded();
  const today = getUserCurrentDate(services.clock.now());

  let todaySummary: { date: string; day_type: string; workout_key: string; title: string | null } | null = null;
  if (planLoaded && settings.cycle_start) {
    const view = await services.assembler.assemble(userId, today);
    todaySummary = {
      date: view.date,
      day_type: view.day_type,
      workout_key: view.workout_key,
      title: view.workout?.title ?? null,
    };
  }

  let required_action: "sync_plan" | "set_cycle_start" | null = null;
  let suggestion: string | null = null;
  if (!planLoaded) {
    required_action = "sync_plan";
    suggestion = isAdmin(services, userId)
      ? "No plan is loaded. Offer to sync the plan from the spreadsheet."
      : "No plan is loaded yet. Ask the user to wait for the coach to publish it.";
  } else if (!settings.cycle_start) {
    required_action = "set_cycle_start";
    suggestion = "Ask the user which date their cycle started (or 'today').";
  } else if (todaySummary?.day_type === "train") {
    suggestion = `Today is a training day: ${todaySummary.title ?? todaySummary.workout_key}.`;
  } else {
    suggestion = "Today is a rest day.";
  }

  return {
    plan: {
      loaded: planLoaded,
      version: planLoaded ? services.plans.current().version : null,
    },
    cycle_start: settings.cycle_start,
    timezone,
    today: todaySummary,
    is_admin: isAdmin(services, userId),
    required_action,
    suggestion,
  };
}

// ============================================================================
// DAILY PLAN & CYCLE
// ============================================================================

export async function getToday(services: AppServices, params: { date?: string }) {
  const date = resolveDateParam(params.date, services.clock.now());
  return services.assembler.assemble(getUserId(), date);
}

export async function getCycle(services: AppServices, params: { from?: string; days?: number }) {
  const userId = getUserId();
  const days = params.days ?? 7;
  if (!Number.isInteger(days) || days < 1 || days > 42) {
    throw new ValidationError("days must be between 1 and 42");
  }
  const from = resolveDateParam(params.from, services.clock.now());
  const snapshot = services.plans.current();
  const settings = await getSettings(userId);
  return {
    plan_version: snapshot.version,
    cycle_start: settings.cycle_start,
    cycle_order: snapshot.cycleOrder,
    days: await services.assembler.preview(userId, from, days),
  };
}

export async function setCycleStart(services: AppServices, params: { date?: string }) {
  if (!params.date) throw new ValidationError("date is required");
  const date = resolveDateParam(params.date, services.clock.now());
  const cycleStart = await storeCycleStart(getUserId(), date);
  return { cycle_start: cycleStart };
}

export async function setTimezone(_services: AppServices, params: { timezone?: string }) {
  if (!params.timezone) throw new ValidationError("timezone is required");
  return { timezone: await storeTimezone(getUserId(), params.timezone.trim()) };
}

export async function getPlan(services: AppServices) {
  const snapshot = services.plans.current();
  return {
    version: snapshot.version,
    cycle_order: snapshot.cycleOrder,
    workouts: snapshot.workoutKeys().map(key => ({
      workout_key: key,
      title: snapshot.getDayContent(key)?.title ?? key,
    })),
    macros: {
      train: snapshot.getMacros("train"),
      rest: snapshot.getMacros("rest"),
    },
  };
}

// ============================================================================
// PROGRESSION
// ============================================================================

export async function listOverrides(services: AppServices) {
  return { overrides: await services.ledger.listOverrides(getUserId()) };
}

export async function setProgressOverride(
  services: AppServices,
  params: { exercise_name?: string; delta_text?: string },
) {
  const override = await services.ledger.setOverride(
    getUserId(),
    params.exercise_name ?? "",
    params.delta_text ?? "",
  );
  return { override };
}

// ============================================================================
// AUTOPROGRESSION
// ============================================================================

export async function listAutoprogRules(services: AppServices, params: { date?: string } = {}) {
  const today = resolveDateParam(params.date, services.clock.now());
  const rules = await services.engine.listRules(getUserId());
  return {
    today,
    rules: rules.map(rule => ({ ...rule, state: ruleState(rule, today) })),
  };
}

export async function setAutoprogRule(services: AppServices, params: Partial<RuleInputParams>) {
  const workoutKey = params.workout_key?.trim();
  if (workoutKey && services.plans.isLoaded()) {
    const keys = services.plans.current().workoutKeys();
    if (!keys.includes(workoutKey)) {
      throw new ValidationError(`Unknown workout_key "${workoutKey}"`, [`available: ${keys.join(", ")}`]);
    }
  }
  const rule = await services.engine.createRule(getUserId(), {
    workout_key: params.workout_key ?? "",
    exercise_name: params.exercise_name ?? "",
    delta_text: params.delta_text ?? "",
    ...(params.interval_days !== undefined ? { interval_days: params.interval_days } : {}),
  });
  return { rule };
}

export async function deleteAutoprogRule(
  services: AppServices,
  params: { workout_key?: string; exercise_name?: string },
) {
  if (!params.workout_key || !params.exercise_name) {
    throw new ValidationError("workout_key and exercise_name are required");
  }
  const deleted = await services.engine.deleteRule(getUserId(), params.workout_key, params.exercise_name);
  return { deleted };
}

/** Manual run for the current user; the daily trigger does the same for everyone. */
export async function runAutoprog(services: AppServices, params: { date?: string } = {}) {
  const today = resolveDateParam(params.date, services.clock.now());
  return services.engine.runOnce(getUserId(), today);
}

// ============================================================================
// DAY LOG
// ============================================================================

export async function markDay(
  services: AppServices,
  params: { date?: string; status?: string; note?: string },
) {
  if (params.status !== "done" && params.status !== "skipped") {
    throw new ValidationError('status must be "done" or "skipped"');
  }
  const userId = getUserId();
  const date = resolveDateParam(params.date, services.clock.now());
  const view = await services.assembler.assemble(userId, date);
  const log = await storeDayLog(userId, view, params.status, params.note);
  return { logged: log };
}

export async function getWeekStats(services: AppServices, params: { date?: string } = {}) {
  const userId = getUserId();
  const today = resolveDateParam(params.date, services.clock.now());
  const monday = weekStart(today);
  const planned = await services.assembler.preview(userId, monday, 7);
  const logs = await getDayLogs(userId, monday, addDays(monday, 6));
  return computeWeekStats(today, planned, logs);
}

// ============================================================================
// REMINDERS
// ============================================================================

export async function getReminders(services: AppServices) {
  const { userId, timezone } = getUserContext();
  const { reminders } = await getSettings(userId);
  const now = services.clock.now();
  return {
    timezone,
    reminders: REMINDER_KINDS.map(kind => ({
      kind,
      ...reminders[kind],
      next_trigger_at: nextTriggerAt(reminders[kind], timezone, now)?.toISOString() ?? null,
    })),
  };
}

export async function updateReminder(
  services: AppServices,
  params: { kind?: string; time?: string; day?: string; enabled?: boolean },
) {
  const { userId, timezone } = getUserContext();
  const kind = params.kind?.trim().toLowerCase() ?? "";
  if (!isReminderKind(kind)) {
    throw new ValidationError(`kind must be one of: ${REMINDER_KINDS.join(", ")}`);
  }

  let schedule: ReminderSchedule;
  if (params.enabled === false) {
    schedule = { time: null, enabled: false };
  } else {
    const time = params.time?.trim() ?? "";
    if (!parseTime(time)) {
      throw new ValidationError("time must be HH:MM, for example 10:00");
    }
    schedule = { time, enabled: true };
    if (kind === "weekly_report") {
      const day = (params.day ?? "sun").trim().toLowerCase();
      if (!isWeekday(day)) {
        throw new ValidationError(`day must be one of: ${WEEKDAYS.join(", ")}`);
      }
      schedule.day = day;
    }
  }

  const reminders = await setReminder(userId, kind, schedule);
  const next = nextTriggerAt(reminders[kind], timezone, services.clock.now());
  return { kind, ...reminders[kind], next_trigger_at: next?.toISOString() ?? null };
}

// ============================================================================
// BODY MEASUREMENTS
// ============================================================================

export async function logMeasurement(services: AppServices, params: Record<string, unknown>) {
  const userId = getUserId();
  const date = resolveDateParam(typeof params.date === "string" ? params.date : undefined, services.clock.now());
  const { date: _date, ...values } = params;
  const logged = await storeMeasurement(userId, date, values);
  const previous = await getMeasurementBefore(userId, logged);
  return {
    logged,
    ...(previous ? { previous, change: measurementChange(logged, previous) } : {}),
  };
}

export async function getMeasurements(_services: AppServices, params: { limit?: number } = {}) {
  const limit = params.limit ?? 20;
  if (!Number.isInteger(limit) || limit < 1 || limit > 200) {
    throw new ValidationError("limit must be between 1 and 200");
  }
  return { measurements: await fetchMeasurements(getUserId(), limit) };
}

export async function getLatestMeasurement(_services: AppServices) {
  const [latest, previous] = await fetchMeasurements(getUserId(), 2);
  if (!latest) return { latest: null };
  return {
    latest,
    ...(previous ? { previous, change: measurementChange(latest, previous) } : {}),
  };
}

export async function updateLatestMeasurement(_services: AppServices, params: Record<string, unknown>) {
  const updated = await patchLatestMeasurement(getUserId(), params);
  if (!updated) {
    throw new ValidationError("No measurements logged yet");
  }
  return { updated };
}

// ============================================================================
// MED LOG
// ============================================================================

export async function logMed(services: AppServices, params: Record<string, unknown>) {
  const date = resolveDateParam(typeof params.date === "string" ? params.date : undefined, services.clock.now());
  const { date: _date, ...values } = params;
  return { logged: await logMedication(getUserId(), date, values) };
}

export async function getMedLog(_services: AppServices, params: { limit?: number; name?: string } = {}) {
  const limit = params.limit ?? 20;
  if (!Number.isInteger(limit) || limit < 1 || limit > 200) {
    throw new ValidationError("limit must be between 1 and 200");
  }
  return { entries: await getMedLogs(getUserId(), limit, params.name) };
}

// ============================================================================
// PLAN SYNC (admin)
// ============================================================================

const sheetRowsSchema = z.array(z.record(z.string(), z.union([z.string(), z.number()]).transform(String)));

const syncParamsSchema = z.object({
  sheet: z.string().optional(),
  plan_rows: sheetRowsSchema.optional(),
  macro_rows: sheetRowsSchema.optional(),
  cycle_rows: sheetRowsSchema.optional(),
});

export type SyncPlanParams = z.input<typeof syncParamsSchema>;

/**
 * Rebuilds the plan from the three spreadsheet tabs (or rows passed inline),
 * stores it as a new version and activates it. Nothing changes on failure.
 */
export async function syncPlan(
  services: AppServices,
  params: SyncPlanParams | Record<string, unknown>,
  fetchImpl: typeof fetch = fetch,
) {
  const userId = getUserId();
  if (!isAdmin(services, userId)) {
    throw new ValidationError("Only admins can sync the plan");
  }

  const parsed = syncParamsSchema.safeParse(params);
  if (!parsed.success) {
    throw new ValidationError(
      "Invalid sync request",
      parsed.error.issues.map(i => `${i.path.join(".")}: ${i.message}`),
    );
  }
  const body = parsed.data;

  let planRows: SheetRow[];
  let macroRows: SheetRow[];
  let cycleRows: SheetRow[];
  let source: string;

  if (body.plan_rows || body.macro_rows || body.cycle_rows) {
    if (!body.plan_rows || !body.macro_rows || !body.cycle_rows) {
      throw new ValidationError("plan_rows, macro_rows and cycle_rows must be passed together");
    }
    planRows = body.plan_rows;
    macroRows = body.macro_rows;
    cycleRows = body.cycle_rows;
    source = "inline";
  } else {
    const { SHEET_ID, SHEET_GID_PLAN, SHEET_GID_MACROS, SHEET_GID_CYCLE } = services.config;
    const sheetId = body.sheet ? extractSheetId(body.sheet) : SHEET_ID ?? null;
    if (!sheetId) {
      throw new ValidationError("No spreadsheet configured; pass sheet (URL or id)");
    }
    if (!SHEET_GID_PLAN || !SHEET_GID_MACROS || !SHEET_GID_CYCLE) {
      throw new ValidationError("SHEET_GID_PLAN, SHEET_GID_MACROS and SHEET_GID_CYCLE must be configured");
    }
    const tables = await fetchPlanTables(
      { sheetId, gidPlan: SHEET_GID_PLAN, gidMacros: SHEET_GID_MACROS, gidCycle: SHEET_GID_CYCLE },
      fetchImpl,
    );
    ({ planRows, macroRows, cycleRows } = tables);
    source = `sheet:${sheetId}`;
  }

  const definition = buildPlanFromRows(planRows, macroRows, cycleRows);
  const snapshot = await savePlanVersion(services.plans, definition, source, userId);
  console.log(`[sync_plan] User ${userId} activated plan v${snapshot.version} from ${source}`);

  return {
    version: snapshot.version,
    cycle_length: snapshot.cycleLength,
    workouts: snapshot.workoutKeys().length,
    source,
  };
}

export async function getPlanHistory(services: AppServices) {
  if (!isAdmin(services, getUserId())) {
    throw new ValidationError("Only admins can list plan versions");
  }
  return { versions: await listPlanVersions() };
}
