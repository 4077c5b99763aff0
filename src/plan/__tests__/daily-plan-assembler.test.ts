import { describe, it, expect, beforeEach, vi } from "vitest";
import { DailyPlanAssembler } from "../daily-plan-assembler.js";
import { ConfigurationError } from "../errors.js";
import { PlanStore } from "../plan-store.js";
import { ProgressionLedger } from "../progression-ledger.js";
import { FixedClock, InMemoryProgressionStore, samplePlan } from "./fakes.js";

describe("DailyPlanAssembler", () => {
  let plans: PlanStore;
  let ledger: ProgressionLedger;
  let starts: Map<number, string>;
  let assembler: DailyPlanAssembler;

  beforeEach(() => {
    plans = new PlanStore();
    plans.load(samplePlan);
    ledger = new ProgressionLedger(new InMemoryProgressionStore(), new FixedClock(new Date("2024-01-01T00:00:00Z")));
    starts = new Map([[1, "2024-01-01"]]);
    assembler = new DailyPlanAssembler({
      plans,
      ledger,
      cycleStarts: { getCycleStart: async userId => starts.get(userId) ?? null },
    });
  });

  it("serves a training day with overrides on every level", async () => {
    await ledger.setOverride(1, "Squat", "+2 reps");
    const view = await assembler.assemble(1, "2024-01-01");

    expect(view).toMatchObject({
      date: "2024-01-01",
      plan_version: 1,
      position: 0,
      workout_key: "A",
      day_type: "train",
      macros: { day_type: "train", kcal: 2200, protein: 150, fat: 70, carbs: 240 },
    });
    expect(view.workout?.title).toBe("Legs");
    expect(view.workout?.levels.easy).toEqual([{ entry: { name: "Squat", sets: 3, reps: 10 }, override: "+2 reps" }]);
    expect(view.workout?.levels.hard.map(e => e.override)).toEqual(["+2 reps", null]);
    expect(view.warning).toBeUndefined();
  });

  it("serves a rest day with rest macros and no workout", async () => {
    const view = await assembler.assemble(1, "2024-01-02");
    expect(view).toEqual({
      date: "2024-01-02",
      plan_version: 1,
      position: 1,
      workout_key: "rest",
      day_type: "rest",
      macros: { day_type: "rest", kcal: 1900, protein: 140, fat: 70, carbs: 180 },
    });
  });

  it("treats a key without content as rest and warns", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    plans.load({ ...samplePlan, cycle_order: ["A", "Z"] });

    const view = await assembler.assemble(1, "2024-01-02");
    expect(view.day_type).toBe("rest");
    expect(view.workout).toBeUndefined();
    expect(view.warning).toEqual({
      code: "missing_workout_content",
      workout_key: "Z",
      message: 'No workout content for "Z", treated as a rest day',
    });
    expect(warn).toHaveBeenCalledTimes(1);
    warn.mockRestore();
  });

  it("resolves past dates against the plan active at read time", async () => {
    expect((await assembler.assemble(1, "2024-01-03")).workout_key).toBe("B");
    plans.load({ ...samplePlan, cycle_order: ["B", "A"] });
    const view = await assembler.assemble(1, "2024-01-03");
    expect(view.plan_version).toBe(2);
    expect(view.workout_key).toBe("B");
    expect(view.position).toBe(0);
    expect((await assembler.assemble(1, "2024-01-02")).workout_key).toBe("A");
  });

  it("handles dates before the cycle start", async () => {
    const view = await assembler.assemble(1, "2023-12-31");
    expect(view.position).toBe(2);
    expect(view.workout_key).toBe("B");
  });

  it("requires a cycle start", async () => {
    await expect(assembler.assemble(2, "2024-01-01")).rejects.toBeInstanceOf(ConfigurationError);
    await expect(assembler.assemble(2, "2024-01-01")).rejects.toThrow("Cycle start date is not set");
  });

  it("rejects malformed dates", async () => {
    await expect(assembler.assemble(1, "01/02/2024")).rejects.toThrow('Invalid date "01/02/2024"');
  });

  it("previews upcoming days", async () => {
    const days = await assembler.preview(1, "2024-01-01", 4);
    expect(days).toEqual([
      { date: "2024-01-01", position: 0, workout_key: "A", day_type: "train", title: "Legs" },
      { date: "2024-01-02", position: 1, workout_key: "rest", day_type: "rest", title: null },
      { date: "2024-01-03", position: 2, workout_key: "B", day_type: "train", title: "Push" },
      { date: "2024-01-04", position: 0, workout_key: "A", day_type: "train", title: "Legs" },
    ]);
  });
});
