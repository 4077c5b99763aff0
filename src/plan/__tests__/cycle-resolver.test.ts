import { describe, it, expect } from "vitest";
import { resolveCycleDay, resolveCyclePosition } from "../cycle-resolver.js";
import { ConfigurationError } from "../errors.js";
import { PlanSnapshot } from "../plan-store.js";
import { samplePlan } from "./fakes.js";

describe("resolveCyclePosition", () => {
  it("returns 0 on the start date", () => {
    expect(resolveCyclePosition("2024-01-01", "2024-01-01", 3)).toBe(0);
  });

  it("wraps forward after one full cycle", () => {
    expect(resolveCyclePosition("2024-01-01", "2024-01-04", 3)).toBe(0);
    expect(resolveCyclePosition("2024-01-01", "2024-01-05", 3)).toBe(1);
  });

  it("wraps backwards for dates before the start", () => {
    expect(resolveCyclePosition("2024-01-01", "2023-12-31", 3)).toBe(2);
    expect(resolveCyclePosition("2024-01-01", "2023-12-29", 3)).toBe(0);
  });

  it("is periodic over long spans", () => {
    for (const offset of [0, 7, 30, 365, 1000]) {
      const a = resolveCyclePosition("2024-01-01", addDaysIso("2024-01-10", offset), 7);
      const b = resolveCyclePosition("2024-01-01", addDaysIso("2024-01-10", offset + 7), 7);
      expect(a).toBe(b);
    }
  });

  it("crosses a leap day", () => {
    // 2024-02-28 → 2024-03-01 is 2 days in a leap year
    expect(resolveCyclePosition("2024-02-28", "2024-03-01", 5)).toBe(2);
  });

  it("throws ConfigurationError for an empty cycle", () => {
    expect(() => resolveCyclePosition("2024-01-01", "2024-01-02", 0)).toThrow(ConfigurationError);
    expect(() => resolveCyclePosition("2024-01-01", "2024-01-02", 0)).toThrow("Cycle is empty");
  });
});

describe("resolveCycleDay", () => {
  const snapshot = PlanSnapshot.fromDefinition(1, samplePlan);

  it("maps the three-day cycle onto consecutive dates", () => {
    const days = ["2024-01-01", "2024-01-02", "2024-01-03", "2024-01-04"].map(d =>
      resolveCycleDay("2024-01-01", d, snapshot)
    );
    expect(days.map(d => [d.position, d.workoutKey, d.dayType])).toEqual([
      [0, "A", "train"],
      [1, "rest", "rest"],
      [2, "B", "train"],
      [0, "A", "train"],
    ]);
    expect(days.every(d => !d.contentMissing)).toBe(true);
  });

  it("flags a non-rest key without content", () => {
    const broken = PlanSnapshot.fromDefinition(2, { ...samplePlan, cycle_order: ["A", "Z"] });
    expect(resolveCycleDay("2024-01-01", "2024-01-02", broken)).toEqual({
      position: 1,
      workoutKey: "Z",
      dayType: "rest",
      contentMissing: true,
    });
  });
});

function addDaysIso(date: string, days: number): string {
  const d = new Date(`${date}T00:00:00Z`);
  d.setUTCDate(d.getUTCDate() + days);
  return d.toISOString().slice(0, 10);
}
