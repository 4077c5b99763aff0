import { describe, it, expect } from "vitest";
import { loadConfig, isProduction } from "../config.js";

const base = { DATABASE_URL: "postgres://localhost/test" };

describe("loadConfig", () => {
  it("applies defaults", () => {
    const config = loadConfig(base);
    expect(config).toMatchObject({
      PORT: 3001,
      TZ_DEFAULT: "Europe/Moscow",
      AUTOPROG_RUN_TIME: "06:00",
      ADMIN_USER_IDS: [],
    });
    expect(isProduction(config)).toBe(false);
  });

  it("parses admin ids and numbers", () => {
    const config = loadConfig({ ...base, ADMIN_USER_IDS: "1, 4,", PORT: "8080", DEV_USER_ID: "2" });
    expect(config.ADMIN_USER_IDS).toEqual([1, 4]);
    expect(config.PORT).toBe(8080);
    expect(config.DEV_USER_ID).toBe(2);
  });

  it("requires a database url", () => {
    expect(() => loadConfig({})).toThrow("Invalid configuration: DATABASE_URL:");
  });

  it("rejects an unknown zone and a malformed run time", () => {
    expect(() => loadConfig({ ...base, TZ_DEFAULT: "Mars/Olympus" })).toThrow(
      "Invalid configuration: TZ_DEFAULT: must be an IANA time zone"
    );
    expect(() => loadConfig({ ...base, AUTOPROG_RUN_TIME: "6am" })).toThrow(
      "Invalid configuration: AUTOPROG_RUN_TIME: must be HH:MM"
    );
  });
});
