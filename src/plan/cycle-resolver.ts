import { diffDays } from "./dates.js";
import { ConfigurationError } from "./errors.js";
import type { PlanSnapshot } from "./plan-store.js";
import type { DayType } from "./types.js";

export interface ResolvedCycleDay {
  position: number;
  workoutKey: string;
  dayType: DayType;
  /** True when the key is not the rest key but has no DayContent. */
  contentMissing: boolean;
}

/**
 * Maps a calendar date onto a zero-based cycle position.
 * The cycle is periodic in both directions: dates before the start wrap
 * backwards, so the result is always in [0, cycleLength).
 */
export function resolveCyclePosition(startDate: string, targetDate: string, cycleLength: number): number {
  if (!Number.isInteger(cycleLength) || cycleLength <= 0) {
    throw new ConfigurationError("Cycle is empty");
  }
  const diff = diffDays(startDate, targetDate);
  return ((diff % cycleLength) + cycleLength) % cycleLength;
}

/**
 * Resolves position, workout key and day type for a date against a snapshot.
 * Pure: everything it needs comes in as arguments.
 */
export function resolveCycleDay(startDate: string, targetDate: string, snapshot: PlanSnapshot): ResolvedCycleDay {
  const position = resolveCyclePosition(startDate, targetDate, snapshot.cycleLength);
  const workoutKey = snapshot.cycleOrder[position];

  if (snapshot.isRestKey(workoutKey)) {
    return { position, workoutKey, dayType: "rest", contentMissing: false };
  }
  if (!snapshot.getDayContent(workoutKey)) {
    return { position, workoutKey, dayType: "rest", contentMissing: true };
  }
  return { position, workoutKey, dayType: "train", contentMissing: false };
}
