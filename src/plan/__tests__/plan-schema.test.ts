import { describe, it, expect } from "vitest";
import { ValidationError } from "../errors.js";
import { buildPlanFromRows, parsePlanDefinition } from "../plan-schema.js";
import { PlanSnapshot } from "../plan-store.js";

const macroRows = [
  { day_type: "train", kcal: "2200", protein: "150", fat: "70", carbs: "240" },
  { day_type: "rest", kcal: "1900", protein: "140", fat: "70", carbs: "180" },
];

function rejection(fn: () => unknown): ValidationError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ValidationError) return err;
    throw err;
  }
  throw new Error("expected a ValidationError");
}

describe("buildPlanFromRows", () => {
  it("joins the three tables into a plan definition", () => {
    const plan = buildPlanFromRows(
      [
        { workout_key: "A", title: "Legs", level: "easy", name: "Squat", sets: "3", reps: "10", weight: "" },
        { workout_key: "A", title: "", level: "Hard", name: "Squat", sets: "5", reps: "6-8", weight: "60 kg" },
        { workout_key: "", title: "", level: "", name: "", sets: "", reps: "", weight: "" },
        { workout_key: "B", title: "", level: "medium", name: "Plank", sets: "", reps: "45 s" },
      ],
      macroRows,
      [{ workout_key: "A" }, { workout_key: "rest" }, { workout_key: "B" }],
    );

    expect(plan.cycle_order).toEqual(["A", "rest", "B"]);
    expect(plan.workouts.A).toEqual({
      title: "Legs",
      levels: {
        easy: [{ name: "Squat", sets: 3, reps: 10 }],
        medium: [],
        hard: [{ name: "Squat", sets: 5, reps: "6-8", weight: "60 kg" }],
      },
    });
    expect(plan.workouts.B.title).toBe("B");
    expect(plan.workouts.B.levels.medium).toEqual([{ name: "Plank", sets: 0, reps: "45 s" }]);
    expect(plan.macros.rest).toEqual({ kcal: 1900, protein: 140, fat: 70, carbs: 180 });
  });

  it("lets the last non-empty title win", () => {
    const plan = buildPlanFromRows(
      [
        { workout_key: "A", title: "Legs", level: "easy", name: "Squat", sets: "3", reps: "10" },
        { workout_key: "A", title: "Lower body", level: "easy", name: "Lunge", sets: "3", reps: "10" },
        { workout_key: "A", title: "", level: "easy", name: "Bridge", sets: "3", reps: "10" },
      ],
      macroRows,
      [{ workout_key: "A" }],
    );
    expect(plan.workouts.A.title).toBe("Lower body");
  });

  it("collects every issue and rejects the whole sync", () => {
    const err = rejection(() =>
      buildPlanFromRows(
        [
          { workout_key: "A", level: "expert", name: "Squat", sets: "3", reps: "10" },
          { workout_key: "A", level: "easy", name: "", sets: "three", reps: "10" },
        ],
        [{ day_type: "refeed", kcal: "1", protein: "1", fat: "1", carbs: "1" }, { day_type: "train", kcal: "lots", protein: "1", fat: "1", carbs: "1" }],
        [{ workout_key: "" , note: "x" }],
      )
    );
    expect(err.issues).toEqual([
      'PLAN row 1: unknown level "expert" (expected easy, medium, hard)',
      "PLAN row 2: name is required",
      'PLAN row 2: sets must be a whole number, got "three"',
      'MACROS row 1: unknown day_type "refeed" (expected train, rest)',
      'MACROS row 2: kcal must be a whole number, got "lots"',
      "CYCLE row 1: workout_key is required",
    ]);
    expect(err.message.startsWith("Plan sync rejected: ")).toBe(true);
  });

  it("keeps __proto__ and constructor as ordinary workout keys", () => {
    const plan = buildPlanFromRows(
      [
        { workout_key: "__proto__", title: "Odd", level: "easy", name: "Squat", sets: "3", reps: "10" },
        { workout_key: "constructor", title: "C", level: "hard", name: "Row", sets: "4", reps: "8" },
      ],
      macroRows,
      [{ workout_key: "__proto__" }, { workout_key: "constructor" }],
    );

    expect(Object.keys(plan.workouts)).toEqual(["__proto__", "constructor"]);
    expect(Object.getOwnPropertyDescriptor(plan.workouts, "__proto__")?.value).toEqual({
      title: "Odd",
      levels: { easy: [{ name: "Squat", sets: 3, reps: 10 }], medium: [], hard: [] },
    });
    expect(Object.prototype).not.toHaveProperty("title");
    expect(Object).not.toHaveProperty("title");

    const stored: unknown = JSON.parse(JSON.stringify(plan));
    const snapshot = PlanSnapshot.fromDefinition(1, stored);
    expect(snapshot.getDayContent("__proto__")?.title).toBe("Odd");
    expect(snapshot.getDayContent("constructor")?.levels.hard).toEqual([{ name: "Row", sets: 4, reps: 8 }]);
    expect(snapshot.workoutKeys()).toEqual(["__proto__", "constructor"]);
  });
});

describe("parsePlanDefinition", () => {
  it("reports workout problems by key", () => {
    const err = rejection(() =>
      parsePlanDefinition({
        cycle_order: ["A"],
        workouts: { A: { title: "", levels: { easy: [], medium: [], hard: [] } } },
        macros: {},
      })
    );
    expect(err.issues).toEqual(["workouts.A.title: String must contain at least 1 character(s)"]);
  });

  it("rejects a workouts value that is not an object", () => {
    const err = rejection(() => parsePlanDefinition({ cycle_order: ["A"], workouts: [], macros: {} }));
    expect(err.issues).toEqual(["workouts: Expected an object keyed by workout_key"]);
  });
});
