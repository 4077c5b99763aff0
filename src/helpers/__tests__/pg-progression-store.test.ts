import { describe, it, expect, vi, beforeEach } from "vitest";

const { mockClientQuery, mockRelease, mockConnect } = vi.hoisted(() => {
  const mockClientQuery = vi.fn();
  const mockRelease = vi.fn();
  const mockConnect = vi.fn(async () => ({ query: mockClientQuery, release: mockRelease }));
  return { mockClientQuery, mockRelease, mockConnect };
});

vi.mock("../../db/connection.js", () => ({
  default: { query: vi.fn(), connect: mockConnect },
}));

import { PgProgressionStore, PROGRESSION_LOCK_NAMESPACE } from "../pg-progression-store.js";

function sqlCalls(): string[] {
  return mockClientQuery.mock.calls.map(call => String(call[0]).replace(/\s+/g, " ").trim());
}

describe("PgProgressionStore", () => {
  beforeEach(() => {
    mockClientQuery.mockReset();
    mockRelease.mockReset();
    mockConnect.mockClear();
    mockClientQuery.mockResolvedValue({ rows: [], rowCount: 0 });
  });

  it("wraps work in a transaction holding the user's advisory lock", async () => {
    const store = new PgProgressionStore();
    const result = await store.transaction(42, async () => "done");

    expect(result).toBe("done");
    expect(sqlCalls()).toEqual([
      "BEGIN",
      "SELECT pg_advisory_xact_lock($1::int, $2::int)",
      "COMMIT",
    ]);
    expect(mockClientQuery.mock.calls[1][1]).toEqual([PROGRESSION_LOCK_NAMESPACE, 42]);
    expect(mockRelease).toHaveBeenCalledTimes(1);
  });

  it("rolls back and releases when the callback throws", async () => {
    const store = new PgProgressionStore();
    await expect(
      store.transaction(1, async () => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");

    expect(sqlCalls().at(-1)).toBe("ROLLBACK");
    expect(sqlCalls()).not.toContain("COMMIT");
    expect(mockRelease).toHaveBeenCalledTimes(1);
  });

  it("maps rule rows and scopes queries to the user", async () => {
    const store = new PgProgressionStore();
    mockClientQuery
      .mockResolvedValueOnce({ rows: [] }) // BEGIN
      .mockResolvedValueOnce({ rows: [] }) // lock
      .mockResolvedValueOnce({
        rows: [{
          id: 3,
          workout_key: "A",
          exercise_name: "Squat",
          delta_text: "+1 rep",
          interval_days: 7,
          last_applied_date: "2024-01-01",
          created_at: "2024-01-01T10:00:00.000Z",
        }],
      });

    const rules = await store.transaction(5, tx => tx.listRules());
    expect(rules).toEqual([{
      id: 3,
      workout_key: "A",
      exercise_name: "Squat",
      delta_text: "+1 rep",
      interval_days: 7,
      last_applied_date: "2024-01-01",
      created_at: new Date("2024-01-01T10:00:00.000Z"),
    }]);
    expect(sqlCalls()[2]).toContain("ORDER BY created_at, id");
    expect(mockClientQuery.mock.calls[2][1]).toEqual([5]);
  });

  it("upserts overrides on the exercise name", async () => {
    const store = new PgProgressionStore();
    const appliedAt = new Date("2024-01-02T06:00:00Z");
    mockClientQuery
      .mockResolvedValueOnce({ rows: [] })
      .mockResolvedValueOnce({ rows: [] })
      .mockResolvedValueOnce({ rows: [{ exercise_name: "Squat", delta_text: "+2 reps", applied_at: appliedAt }] });

    const override = await store.transaction(5, tx => tx.upsertOverride("Squat", "+2 reps", appliedAt));
    expect(override).toEqual({ exercise_name: "Squat", delta_text: "+2 reps", applied_at: appliedAt });
    expect(sqlCalls()[2]).toContain("ON CONFLICT (user_id, exercise_name)");
    expect(mockClientQuery.mock.calls[2][1]).toEqual([5, "Squat", "+2 reps", appliedAt]);
  });

  it("reports whether a rule was deleted", async () => {
    const store = new PgProgressionStore();
    mockClientQuery
      .mockResolvedValueOnce({ rows: [] })
      .mockResolvedValueOnce({ rows: [] })
      .mockResolvedValueOnce({ rows: [], rowCount: 1 });
    expect(await store.transaction(5, tx => tx.deleteRule("A", "Squat"))).toBe(true);
  });
});
