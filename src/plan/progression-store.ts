import type { AutoprogRule, ProgressionOverride } from "./types.js";

export interface RuleInput {
  workout_key: string;
  exercise_name: string;
  delta_text: string;
  interval_days: number;
}

/**
 * Operations available inside one per-user transaction.
 * Everything done through a single ProgressionTx commits or rolls back together.
 */
export interface ProgressionTx {
  upsertOverride(exerciseName: string, deltaText: string, appliedAt: Date): Promise<ProgressionOverride>;
  getOverrides(exerciseNames?: string[]): Promise<ProgressionOverride[]>;
  listRules(): Promise<AutoprogRule[]>;
  getRule(ruleId: number): Promise<AutoprogRule | null>;
  upsertRule(input: RuleInput): Promise<AutoprogRule>;
  deleteRule(workoutKey: string, exerciseName: string): Promise<boolean>;
  markRuleApplied(ruleId: number, appliedDate: string): Promise<void>;
}

/**
 * Persistence seam for the ledger and the engine. `transaction` must
 * serialize callers for the same user (single writer per user) and roll
 * back everything when `fn` throws.
 */
export interface ProgressionStore {
  transaction<T>(userId: number, fn: (tx: ProgressionTx) => Promise<T>): Promise<T>;
}
