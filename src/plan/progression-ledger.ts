import { systemClock } from "./clock.js";
import type { Clock } from "./clock.js";
import { ValidationError } from "./errors.js";
import type { ProgressionStore } from "./progression-store.js";
import type { ExerciseEntry, OverlaidExercise, ProgressionOverride } from "./types.js";

/**
 * Per-exercise overrides layered on top of base plan content at read time.
 * Keyed by exact exercise name; the latest write wins and no history is kept.
 */
export class ProgressionLedger {
  constructor(
    private readonly store: ProgressionStore,
    private readonly clock: Clock = systemClock,
  ) {}

  async setOverride(userId: number, exerciseName: string, deltaText: string): Promise<ProgressionOverride> {
    const name = exerciseName.trim();
    const delta = deltaText.trim();
    if (!name) throw new ValidationError("exercise_name is required");
    if (!delta) throw new ValidationError("delta_text is required");

    return this.store.transaction(userId, tx => tx.upsertOverride(name, delta, this.clock.now()));
  }

  async getOverride(userId: number, exerciseName: string): Promise<string | undefined> {
    const rows = await this.store.transaction(userId, tx => tx.getOverrides([exerciseName]));
    return rows.find(r => r.exercise_name === exerciseName)?.delta_text;
  }

  async listOverrides(userId: number): Promise<ProgressionOverride[]> {
    return this.store.transaction(userId, tx => tx.getOverrides());
  }

  /** Loads the overrides for every distinct name in `entries` in one read. */
  async loadFor(userId: number, entries: readonly ExerciseEntry[]): Promise<Map<string, string>> {
    const names = [...new Set(entries.map(e => e.name))];
    if (names.length === 0) return new Map();
    const rows = await this.store.transaction(userId, tx => tx.getOverrides(names));
    return new Map(rows.map(r => [r.exercise_name, r.delta_text]));
  }

  async overlay(userId: number, entries: readonly ExerciseEntry[]): Promise<OverlaidExercise[]> {
    return overlayEntries(entries, await this.loadFor(userId, entries));
  }
}

/** Attaches overrides by exact, case-sensitive name match. */
export function overlayEntries(
  entries: readonly ExerciseEntry[],
  overrides: ReadonlyMap<string, string>,
): OverlaidExercise[] {
  return entries.map(entry => ({ entry, override: overrides.get(entry.name) ?? null }));
}
