import { z } from "zod";
import { ValidationError } from "./errors.js";
import { DAY_TYPES, LEVELS } from "./types.js";
import type { DayContent, DayType, Level, PlanDefinition } from "./types.js";

export const exerciseEntrySchema = z.object({
  name: z.string().trim().min(1),
  sets: z.number().int().nonnegative(),
  reps: z.union([z.string(), z.number()]),
  weight: z.string().optional(),
});

export const dayContentSchema = z.object({
  title: z.string().trim().min(1),
  levels: z.object({
    easy: z.array(exerciseEntrySchema),
    medium: z.array(exerciseEntrySchema),
    hard: z.array(exerciseEntrySchema),
  }),
});

const macroValuesSchema = z.object({
  kcal: z.number().int().nonnegative(),
  protein: z.number().int().nonnegative(),
  fat: z.number().int().nonnegative(),
  carbs: z.number().int().nonnegative(),
});

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// Workout keys are opaque text ("__proto__" included), so the workouts map is
// checked entry by entry below rather than by z.record.
export const planDefinitionSchema = z.object({
  cycle_order: z.array(z.string().trim().min(1)),
  workouts: z.custom<Record<string, unknown>>(isPlainObject, "Expected an object keyed by workout_key"),
  macros: z.object({
    train: macroValuesSchema.optional(),
    rest: macroValuesSchema.optional(),
  }),
});

function formatIssues(error: z.ZodError, prefix: (string | number)[] = []): string[] {
  return error.issues.map(i => `${[...prefix, ...i.path].join(".") || "(root)"}: ${i.message}`);
}

/**
 * Validates the shape of an already-joined plan. Presence rules (non-empty
 * cycle, both macro targets) are checked by PlanStore.load, since those are
 * configuration problems rather than malformed input.
 */
export function parsePlanDefinition(input: unknown): PlanDefinition {
  const parsed = planDefinitionSchema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError("Invalid plan definition", formatIssues(parsed.error));
  }

  const issues: string[] = [];
  const workouts = new Map<string, DayContent>();
  for (const [key, value] of Object.entries(parsed.data.workouts)) {
    const day = dayContentSchema.safeParse(value);
    if (day.success) {
      workouts.set(key, day.data);
    } else {
      issues.push(...formatIssues(day.error, ["workouts", key]));
    }
  }
  if (issues.length > 0) {
    throw new ValidationError("Invalid plan definition", issues);
  }

  return { ...parsed.data, workouts: Object.fromEntries(workouts) };
}

// ─── Spreadsheet rows ──────────────────────────────────────────────────────

export type SheetRow = Record<string, string | undefined>;

function clean(value: string | undefined): string {
  return value == null ? "" : String(value).trim();
}

function isBlankRow(row: SheetRow): boolean {
  return Object.values(row).every(v => clean(v) === "");
}

function isLevel(value: string): value is Level {
  return (LEVELS as readonly string[]).includes(value);
}

function isDayType(value: string): value is DayType {
  return (DAY_TYPES as readonly string[]).includes(value);
}

function parseWholeNumber(value: string): number | null {
  return /^\d+$/.test(value) ? Number(value) : null;
}

/**
 * Joins the PLAN, MACROS and CYCLE tables of a sync into a PlanDefinition.
 * Row numbers in issues are 1-based data rows (the header is not counted).
 * Any issue rejects the whole sync.
 */
export function buildPlanFromRows(
  planRows: SheetRow[],
  macroRows: SheetRow[],
  cycleRows: SheetRow[],
): PlanDefinition {
  const issues: string[] = [];
  const workouts = new Map<string, DayContent>();

  planRows.forEach((row, idx) => {
    if (isBlankRow(row)) return;
    const at = `PLAN row ${idx + 1}`;
    const workoutKey = clean(row.workout_key);
    const level = clean(row.level).toLowerCase();
    const name = clean(row.name);
    const title = clean(row.title);
    const setsText = clean(row.sets);
    const repsText = clean(row.reps);
    const weight = clean(row.weight);

    if (!workoutKey) issues.push(`${at}: workout_key is required`);
    if (!name) issues.push(`${at}: name is required`);
    if (!level) {
      issues.push(`${at}: level is required`);
    } else if (!isLevel(level)) {
      issues.push(`${at}: unknown level "${level}" (expected ${LEVELS.join(", ")})`);
    }
    const sets = setsText === "" ? 0 : parseWholeNumber(setsText);
    if (sets === null) issues.push(`${at}: sets must be a whole number, got "${setsText}"`);

    if (!workoutKey || !name || !isLevel(level) || sets === null) return;

    const day = workouts.get(workoutKey) ?? {
      title: workoutKey,
      levels: { easy: [], medium: [], hard: [] },
    };
    if (title) day.title = title;
    const reps = parseWholeNumber(repsText);
    day.levels[level].push({
      name,
      sets,
      reps: reps ?? repsText,
      ...(weight ? { weight } : {}),
    });
    workouts.set(workoutKey, day);
  });

  const macros: PlanDefinition["macros"] = {};
  macroRows.forEach((row, idx) => {
    if (isBlankRow(row)) return;
    const at = `MACROS row ${idx + 1}`;
    const dayType = clean(row.day_type).toLowerCase();
    if (!isDayType(dayType)) {
      issues.push(`${at}: unknown day_type "${dayType}" (expected train, rest)`);
      return;
    }
    const values: Record<"kcal" | "protein" | "fat" | "carbs", number> = { kcal: 0, protein: 0, fat: 0, carbs: 0 };
    let rowOk = true;
    for (const field of ["kcal", "protein", "fat", "carbs"] as const) {
      const text = clean(row[field]);
      const n = parseWholeNumber(text);
      if (n === null) {
        issues.push(`${at}: ${field} must be a whole number, got "${text}"`);
        rowOk = false;
      } else {
        values[field] = n;
      }
    }
    if (rowOk) macros[dayType] = values;
  });

  const cycleOrder: string[] = [];
  cycleRows.forEach((row, idx) => {
    if (isBlankRow(row)) return;
    const key = clean(row.workout_key);
    if (!key) {
      issues.push(`CYCLE row ${idx + 1}: workout_key is required`);
      return;
    }
    cycleOrder.push(key);
  });

  if (issues.length > 0) {
    throw new ValidationError("Plan sync rejected", issues);
  }

  return { cycle_order: cycleOrder, workouts: Object.fromEntries(workouts), macros };
}
