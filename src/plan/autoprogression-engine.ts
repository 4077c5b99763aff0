import { z } from "zod";
import { systemClock } from "./clock.js";
import type { Clock } from "./clock.js";
import { assertIsoDate, diffDays, isIsoDate } from "./dates.js";
import { ValidationError } from "./errors.js";
import type { ProgressionStore, RuleInput } from "./progression-store.js";
import type { AutoprogRule, RuleState } from "./types.js";

export const DEFAULT_INTERVAL_DAYS = 7;

export const ruleInputSchema = z.object({
  workout_key: z.string().trim().min(1, "workout_key is required"),
  exercise_name: z.string().trim().min(1, "exercise_name is required"),
  delta_text: z.string().trim().min(1, "delta_text is required"),
  interval_days: z.number().int().min(1).max(365).default(DEFAULT_INTERVAL_DAYS),
});

export type RuleInputParams = z.input<typeof ruleInputSchema>;

export interface RuleOutcome {
  rule_id: number;
  workout_key: string;
  exercise_name: string;
  delta_text: string;
}

export interface RunReport {
  today: string;
  applied: RuleOutcome[];
  /** Rules that were due at listing time but already applied by a concurrent run. */
  skipped: RuleOutcome[];
  failed: Array<RuleOutcome & { error: string }>;
}

/**
 * State of a rule on `today`. A rule applied on `today` stays "applied" for
 * the rest of that day whatever its interval, which is what makes repeated
 * runs on the same day a no-op.
 */
export function ruleState(rule: Pick<AutoprogRule, "interval_days" | "last_applied_date">, today: string): RuleState {
  const last = rule.last_applied_date;
  if (last === null || !isIsoDate(last)) return "due";
  const elapsed = diffDays(last, today);
  if (elapsed === 0) return "applied";
  return elapsed >= rule.interval_days ? "due" : "idle";
}

export function isDue(rule: Pick<AutoprogRule, "interval_days" | "last_applied_date">, today: string): boolean {
  return ruleState(rule, today) === "due";
}

function outcome(rule: AutoprogRule): RuleOutcome {
  return {
    rule_id: rule.id,
    workout_key: rule.workout_key,
    exercise_name: rule.exercise_name,
    delta_text: rule.delta_text,
  };
}

/**
 * Applies autoprogression rules by writing overrides into the ledger.
 * Never reads the wall clock for "today": the trigger passes it in.
 * The clock is only used for the override timestamp.
 */
export class AutoprogressionEngine {
  constructor(
    private readonly store: ProgressionStore,
    private readonly clock: Clock = systemClock,
  ) {}

  async createRule(userId: number, params: RuleInputParams): Promise<AutoprogRule> {
    const parsed = ruleInputSchema.safeParse(params);
    if (!parsed.success) {
      const issues = parsed.error.issues.map(i => `${i.path.join(".")}: ${i.message}`);
      throw new ValidationError("Invalid autoprogression rule", issues);
    }
    const input: RuleInput = parsed.data;
    return this.store.transaction(userId, tx => tx.upsertRule(input));
  }

  async deleteRule(userId: number, workoutKey: string, exerciseName: string): Promise<boolean> {
    return this.store.transaction(userId, tx => tx.deleteRule(workoutKey.trim(), exerciseName.trim()));
  }

  /** Rules in creation order. */
  async listRules(userId: number): Promise<AutoprogRule[]> {
    const rules = await this.store.transaction(userId, tx => tx.listRules());
    return sortByCreation(rules);
  }

  /**
   * Applies every rule due on `today`. Each rule is applied in its own
   * transaction that re-checks due-ness under the user's lock, so an
   * at-least-once trigger never double-applies. Rules are processed in
   * creation order: when two rules target the same exercise, the later one's
   * delta is what remains in the ledger.
   */
  async runOnce(userId: number, today: string): Promise<RunReport> {
    assertIsoDate(today);

    const report: RunReport = { today, applied: [], skipped: [], failed: [] };
    const candidates = (await this.listRules(userId)).filter(rule => isDue(rule, today));

    for (const candidate of candidates) {
      try {
        const applied = await this.store.transaction(userId, async tx => {
          const fresh = await tx.getRule(candidate.id);
          if (!fresh || !isDue(fresh, today)) return null;
          await tx.upsertOverride(fresh.exercise_name, fresh.delta_text, this.clock.now());
          await tx.markRuleApplied(fresh.id, today);
          return fresh;
        });
        if (applied) {
          report.applied.push(outcome(applied));
        } else {
          report.skipped.push(outcome(candidate));
        }
      } catch (err) {
        report.failed.push({
          ...outcome(candidate),
          error: err instanceof Error ? err.message : String(err),
        });
      }
    }

    return report;
  }
}

function sortByCreation(rules: AutoprogRule[]): AutoprogRule[] {
  return [...rules].sort((a, b) => a.created_at.getTime() - b.created_at.getTime() || a.id - b.id);
}
