/**
 * Domain types for the cycle plan.
 * Field names follow the stored JSON shape (snake_case) so snapshots,
 * plan_versions rows and tool responses share one vocabulary.
 */

export const LEVELS = ["easy", "medium", "hard"] as const;
export type Level = (typeof LEVELS)[number];

export const DAY_TYPES = ["train", "rest"] as const;
export type DayType = (typeof DAY_TYPES)[number];

/** Reserved workout key for rest days inside cycle_order. */
export const REST_KEY = "rest";

export interface ExerciseEntry {
  name: string;
  sets: number;
  reps: string | number;
  weight?: string;
}

export interface DayContent {
  title: string;
  levels: Record<Level, ExerciseEntry[]>;
}

export interface MacroTarget {
  day_type: DayType;
  kcal: number;
  protein: number;
  fat: number;
  carbs: number;
}

/** Raw plan as produced by a sync or a seed file, before validation. */
export interface PlanDefinition {
  cycle_order: string[];
  workouts: Record<string, DayContent>;
  macros: Partial<Record<DayType, Omit<MacroTarget, "day_type">>>;
}

export interface ProgressionOverride {
  exercise_name: string;
  delta_text: string;
  applied_at: Date;
}

export interface AutoprogRule {
  id: number;
  workout_key: string;
  exercise_name: string;
  delta_text: string;
  interval_days: number;
  /** ISO date (YYYY-MM-DD) of the last application, null if never applied. */
  last_applied_date: string | null;
  created_at: Date;
}

export type RuleState = "idle" | "due" | "applied";

export interface OverlaidExercise {
  entry: ExerciseEntry;
  override: string | null;
}

export interface DayPlanWarning {
  code: "missing_workout_content";
  workout_key: string;
  message: string;
}

export interface DayPlanView {
  date: string;
  plan_version: number;
  position: number;
  workout_key: string;
  day_type: DayType;
  macros: MacroTarget;
  workout?: {
    title: string;
    levels: Record<Level, OverlaidExercise[]>;
  };
  warning?: DayPlanWarning;
}
