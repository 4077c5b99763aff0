import { describe, it, expect } from "vitest";
import { addDays, diffDays, fromDayNumber, isIsoDate, isoWeekday, toDayNumber } from "../dates.js";
import { ValidationError } from "../errors.js";

describe("dates", () => {
  it("converts between ISO dates and day numbers", () => {
    expect(toDayNumber("1970-01-01")).toBe(0);
    expect(toDayNumber("1970-01-02")).toBe(1);
    expect(fromDayNumber(19723)).toBe("2024-01-01");
    expect(toDayNumber("2024-01-01")).toBe(19723);
  });

  it("rejects malformed and impossible dates", () => {
    expect(() => toDayNumber("2024-1-1")).toThrow(ValidationError);
    expect(() => toDayNumber("2023-02-29")).toThrow('Invalid date "2023-02-29", no such calendar day');
    expect(isIsoDate("2024-02-29")).toBe(true);
    expect(isIsoDate("tomorrow")).toBe(false);
  });

  it("keeps years below 100 as written", () => {
    expect(fromDayNumber(toDayNumber("0050-01-01"))).toBe("0050-01-01");
    expect(diffDays("0050-01-01", "0051-01-01")).toBe(365);
    expect(addDays("0099-12-31", 1)).toBe("0100-01-01");
  });

  it("computes signed differences and offsets", () => {
    expect(diffDays("2024-01-01", "2024-01-08")).toBe(7);
    expect(diffDays("2024-01-08", "2024-01-01")).toBe(-7);
    expect(addDays("2024-02-28", 1)).toBe("2024-02-29");
    expect(addDays("2024-01-01", -1)).toBe("2023-12-31");
  });

  it("returns ISO weekdays", () => {
    expect(isoWeekday("2024-01-01")).toBe(1); // Monday
    expect(isoWeekday("2024-01-07")).toBe(7); // Sunday
    expect(isoWeekday("1969-12-31")).toBe(3); // Wednesday
  });
});
