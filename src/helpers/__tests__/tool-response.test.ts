import { describe, it, expect, vi } from "vitest";
import { ConfigurationError, ValidationError } from "../../plan/errors.js";
import { classifyError, safeHandler, toolResponse } from "../tool-response.js";

function pgError(message: string, code: string): Error {
  return Object.assign(new Error(message), { code });
}

describe("toolResponse", () => {
  it("serializes data into a text block", () => {
    expect(toolResponse({ ok: true })).toEqual({ content: [{ type: "text", text: '{"ok":true}' }] });
    expect(toolResponse({ error: "x" }, true)).toEqual({
      content: [{ type: "text", text: '{"error":"x"}' }],
      isError: true,
    });
  });
});

describe("classifyError", () => {
  it("maps plan errors", () => {
    expect(classifyError(new ConfigurationError("No plan has been loaded yet"))).toEqual({
      error: "plan_unavailable",
      message: "No plan has been loaded yet",
      retryable: false,
    });
    expect(classifyError(new ValidationError("Plan sync rejected", ["CYCLE row 1: workout_key is required"]))).toEqual({
      error: "validation_failed",
      message: "Plan sync rejected: CYCLE row 1: workout_key is required",
      retryable: false,
      issues: ["CYCLE row 1: workout_key is required"],
    });
  });

  it("maps postgres and transport errors", () => {
    expect(classifyError(pgError("duplicate key", "23505")).error).toBe("conflict");
    expect(classifyError(pgError("fk", "23503")).error).toBe("not_found");
    expect(classifyError(pgError("null value", "23502")).error).toBe("validation_failed");
    expect(classifyError(new Error("Query read timeout"))).toMatchObject({ error: "timeout", retryable: true });
    expect(classifyError(new Error("connect ECONNREFUSED 127.0.0.1:5432"))).toMatchObject({ error: "unavailable", retryable: true });
    expect(classifyError("boom")).toMatchObject({ error: "internal_error", retryable: true });
  });
});

describe("safeHandler", () => {
  it("passes results through", async () => {
    const handler = safeHandler("t", async (params: { n: number }) => toolResponse({ n: params.n * 2 }));
    expect(await handler({ n: 2 })).toEqual({ content: [{ type: "text", text: '{"n":4}' }] });
  });

  it("turns validation errors into structured responses without logging", async () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const handler = safeHandler("t", async () => {
      throw new ValidationError("bad", ["a", "b"]);
    });
    const result = await handler({});
    expect(result.isError).toBe(true);
    expect(JSON.parse(result.content[0].text)).toEqual({
      error: "validation_failed",
      message: "bad: a; b",
      retryable: false,
      issues: ["a", "b"],
    });
    expect(error).not.toHaveBeenCalled();
    error.mockRestore();
  });

  it("logs unexpected errors and hides their message", async () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const handler = safeHandler("get_today", async () => {
      throw new Error("secret internals");
    });
    const result = await handler({});
    expect(JSON.parse(result.content[0].text)).toEqual({
      error: "internal_error",
      message: "Something went wrong. Please try again.",
      retryable: true,
    });
    expect(error).toHaveBeenCalledTimes(1);
    expect(error.mock.calls[0][0]).toBe("[get_today] Unhandled error:");
    error.mockRestore();
  });
});
