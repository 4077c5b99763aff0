import type { Clock } from "../clock.js";
import type { ProgressionStore, ProgressionTx, RuleInput } from "../progression-store.js";
import type { AutoprogRule, ProgressionOverride } from "../types.js";

interface UserState {
  overrides: Map<string, ProgressionOverride>;
  rules: AutoprogRule[];
}

function cloneState(state: UserState): UserState {
  return {
    overrides: new Map([...state.overrides].map(([k, v]) => [k, { ...v }])),
    rules: state.rules.map(r => ({ ...r })),
  };
}

/**
 * In-process ProgressionStore. Transactions for one user run one at a time
 * and roll back to a copy of the user's state when the callback throws.
 */
export class InMemoryProgressionStore implements ProgressionStore {
  private readonly users = new Map<number, UserState>();
  private readonly queues = new Map<number, Promise<unknown>>();
  private nextRuleId = 1;
  private createdTick = 0;

  /** Makes the next `markRuleApplied` calls throw, once per entry. */
  failMarkApplied: number[] = [];
  transactions = 0;

  state(userId: number): UserState {
    let state = this.users.get(userId);
    if (!state) {
      state = { overrides: new Map(), rules: [] };
      this.users.set(userId, state);
    }
    return state;
  }

  async transaction<T>(userId: number, fn: (tx: ProgressionTx) => Promise<T>): Promise<T> {
    const previous = this.queues.get(userId) ?? Promise.resolve();
    const run = previous.catch(() => undefined).then(async () => {
      this.transactions++;
      const before = cloneState(this.state(userId));
      try {
        return await fn(this.txFor(userId));
      } catch (err) {
        this.users.set(userId, before);
        throw err;
      }
    });
    this.queues.set(userId, run);
    return run;
  }

  private txFor(userId: number): ProgressionTx {
    const self = this;
    const state = () => self.state(userId);
    return {
      async upsertOverride(exerciseName, deltaText, appliedAt) {
        const row = { exercise_name: exerciseName, delta_text: deltaText, applied_at: appliedAt };
        state().overrides.set(exerciseName, row);
        return { ...row };
      },
      async getOverrides(exerciseNames) {
        const all = [...state().overrides.values()];
        const rows = exerciseNames ? all.filter(o => exerciseNames.includes(o.exercise_name)) : all;
        return rows.map(o => ({ ...o })).sort((a, b) => a.exercise_name.localeCompare(b.exercise_name));
      },
      async listRules() {
        return state().rules.map(r => ({ ...r }));
      },
      async getRule(ruleId) {
        const rule = state().rules.find(r => r.id === ruleId);
        return rule ? { ...rule } : null;
      },
      async upsertRule(input: RuleInput) {
        const rules = state().rules;
        const existing = rules.find(
          r => r.workout_key === input.workout_key && r.exercise_name === input.exercise_name
        );
        if (existing) {
          existing.delta_text = input.delta_text;
          existing.interval_days = input.interval_days;
          return { ...existing };
        }
        const rule: AutoprogRule = {
          id: self.nextRuleId++,
          ...input,
          last_applied_date: null,
          created_at: new Date(Date.UTC(2024, 0, 1) + self.createdTick++ * 1000),
        };
        rules.push(rule);
        return { ...rule };
      },
      async deleteRule(workoutKey, exerciseName) {
        const rules = state().rules;
        const idx = rules.findIndex(r => r.workout_key === workoutKey && r.exercise_name === exerciseName);
        if (idx === -1) return false;
        rules.splice(idx, 1);
        return true;
      },
      async markRuleApplied(ruleId, appliedDate) {
        const failIdx = self.failMarkApplied.indexOf(ruleId);
        if (failIdx !== -1) {
          self.failMarkApplied.splice(failIdx, 1);
          throw new Error(`write failed for rule ${ruleId}`);
        }
        const rule = state().rules.find(r => r.id === ruleId);
        if (rule) rule.last_applied_date = appliedDate;
      },
    };
  }
}

export class FixedClock implements Clock {
  constructor(private current: Date) {}

  now(): Date {
    return new Date(this.current.getTime());
  }

  set(instant: Date): void {
    this.current = instant;
  }
}

export const samplePlan = {
  cycle_order: ["A", "rest", "B"],
  workouts: {
    A: {
      title: "Legs",
      levels: {
        easy: [{ name: "Squat", sets: 3, reps: 10 }],
        medium: [{ name: "Squat", sets: 4, reps: 10, weight: "40 kg" }],
        hard: [
          { name: "Squat", sets: 5, reps: 8, weight: "60 kg" },
          { name: "Lunge", sets: 3, reps: "12 each leg" },
        ],
      },
    },
    B: {
      title: "Push",
      levels: {
        easy: [{ name: "Push-up", sets: 3, reps: "max" }],
        medium: [{ name: "Bench press", sets: 4, reps: 8, weight: "35 kg" }],
        hard: [{ name: "Bench press", sets: 5, reps: 6, weight: "50 kg" }],
      },
    },
  },
  macros: {
    train: { kcal: 2200, protein: 150, fat: 70, carbs: 240 },
    rest: { kcal: 1900, protein: 140, fat: 70, carbs: 180 },
  },
};
