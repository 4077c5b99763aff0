import { resolveCycleDay } from "./cycle-resolver.js";
import { addDays, assertIsoDate } from "./dates.js";
import { ConfigurationError } from "./errors.js";
import { overlayEntries } from "./progression-ledger.js";
import type { ProgressionLedger } from "./progression-ledger.js";
import type { PlanStore } from "./plan-store.js";
import { LEVELS } from "./types.js";
import type { DayPlanView, DayType, Level, OverlaidExercise } from "./types.js";

export interface CycleStartSource {
  getCycleStart(userId: number): Promise<string | null>;
}

export interface CycleDayPreview {
  date: string;
  position: number;
  workout_key: string;
  day_type: DayType;
  title: string | null;
}

export interface DailyPlanAssemblerDeps {
  plans: PlanStore;
  ledger: ProgressionLedger;
  cycleStarts: CycleStartSource;
}

/**
 * The single read path for "the plan for date X". Resolves the cycle day
 * against the snapshot active at read time, so past dates follow the current
 * cycle definition rather than the one active when they happened.
 */
export class DailyPlanAssembler {
  constructor(private readonly deps: DailyPlanAssemblerDeps) {}

  private async requireCycleStart(userId: number): Promise<string> {
    const start = await this.deps.cycleStarts.getCycleStart(userId);
    if (!start) {
      throw new ConfigurationError("Cycle start date is not set");
    }
    return start;
  }

  async assemble(userId: number, date: string): Promise<DayPlanView> {
    assertIsoDate(date);
    const snapshot = this.deps.plans.current();
    const start = await this.requireCycleStart(userId);
    const day = resolveCycleDay(start, date, snapshot);

    const base = {
      date,
      plan_version: snapshot.version,
      position: day.position,
      workout_key: day.workoutKey,
    };

    if (day.contentMissing) {
      console.warn(`[assemble] Workout "${day.workoutKey}" has no content in plan v${snapshot.version}, serving a rest day`);
      return {
        ...base,
        day_type: "rest",
        macros: snapshot.getMacros("rest"),
        warning: {
          code: "missing_workout_content",
          workout_key: day.workoutKey,
          message: `No workout content for "${day.workoutKey}", treated as a rest day`,
        },
      };
    }

    const content = day.dayType === "train" ? snapshot.getDayContent(day.workoutKey) : undefined;
    if (!content) {
      return { ...base, day_type: "rest", macros: snapshot.getMacros("rest") };
    }

    const macros = snapshot.getMacros("train");
    const overrides = await this.deps.ledger.loadFor(
      userId,
      LEVELS.flatMap(level => content.levels[level]),
    );
    const levels: Record<Level, OverlaidExercise[]> = {
      easy: overlayEntries(content.levels.easy, overrides),
      medium: overlayEntries(content.levels.medium, overrides),
      hard: overlayEntries(content.levels.hard, overrides),
    };

    return {
      ...base,
      day_type: "train",
      macros,
      workout: { title: content.title, levels },
    };
  }

  /** Next `days` dates starting at `from`, without overrides. */
  async preview(userId: number, from: string, days: number): Promise<CycleDayPreview[]> {
    const snapshot = this.deps.plans.current();
    const start = await this.requireCycleStart(userId);
    const out: CycleDayPreview[] = [];
    for (let i = 0; i < days; i++) {
      const date = addDays(from, i);
      const day = resolveCycleDay(start, date, snapshot);
      out.push({
        date,
        position: day.position,
        workout_key: day.workoutKey,
        day_type: day.dayType,
        title: day.dayType === "train" ? snapshot.getDayContent(day.workoutKey)?.title ?? null : null,
      });
    }
    return out;
  }
}
