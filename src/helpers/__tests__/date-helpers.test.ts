import { describe, it, expect, vi } from "vitest";
import { runWithUser } from "../../context/user-context.js";
import {
  formatDateInTimezone,
  getUserCurrentDate,
  isValidTimeZone,
  zonedParts,
  zonedTimeToUtc,
} from "../date-helpers.js";

describe("date-helpers", () => {
  it("validates time zone names", () => {
    expect(isValidTimeZone("Europe/Moscow")).toBe(true);
    expect(isValidTimeZone("Mars/Olympus_Mons")).toBe(false);
  });

  it("reads wall-clock parts in a zone", () => {
    expect(zonedParts(new Date("2024-01-01T22:30:15Z"), "Europe/Moscow")).toEqual({
      year: 2024, month: 1, day: 2, hour: 1, minute: 30, second: 15,
    });
  });

  it("converts a wall-clock time to UTC", () => {
    expect(zonedTimeToUtc("2024-07-01", 6, 0, "Europe/Moscow").toISOString()).toBe("2024-07-01T03:00:00.000Z");
    expect(zonedTimeToUtc("2024-07-01", 6, 0, "America/New_York").toISOString()).toBe("2024-07-01T10:00:00.000Z");
    expect(zonedTimeToUtc("2024-01-15", 6, 0, "America/New_York").toISOString()).toBe("2024-01-15T11:00:00.000Z");
  });

  it("formats the calendar date in a zone", () => {
    const instant = new Date("2024-01-01T22:00:00Z");
    expect(formatDateInTimezone(instant, "Europe/Moscow")).toBe("2024-01-02");
    expect(formatDateInTimezone(instant, "America/New_York")).toBe("2024-01-01");
  });

  it("falls back to UTC for an unknown zone", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    expect(formatDateInTimezone(new Date("2024-01-01T22:00:00Z"), "Nowhere/Else")).toBe("2024-01-01");
    expect(warn).toHaveBeenCalledTimes(1);
    warn.mockRestore();
  });

  it("uses the time zone of the current user", () => {
    const today = runWithUser({ userId: 1, timezone: "Asia/Tokyo" }, () =>
      getUserCurrentDate(new Date("2024-01-01T16:00:00Z"))
    );
    expect(today).toBe("2024-01-02");
  });

  it("throws outside of a user context", () => {
    expect(() => getUserCurrentDate()).toThrow("getUserContext() called outside of auth context");
  });
});
