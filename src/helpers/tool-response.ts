import { ConfigurationError, ValidationError } from "../plan/errors.js";

/**
 * Standard prefix injected into every tool description so the LLM
 * always has app context regardless of which tool it reads first.
 */
export const APP_CONTEXT = `[Cycle Coach: personal workout and nutrition plan on a repeating cycle.
MANDATORY: Call get_context BEFORE responding to the user's FIRST message. Follow its required_action.
Dates are calendar dates (YYYY-MM-DD) in the user's time zone. Progression deltas are free text such as "+2 reps" or "+2.5 kg".]

`;

export interface ToolResult {
  [key: string]: unknown;
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
}

/**
 * Build tool responses: full JSON in content (model needs to see errors).
 */
export function toolResponse(data: object, isError?: boolean): ToolResult {
  return {
    content: [{ type: "text" as const, text: JSON.stringify(data) }],
    ...(isError ? { isError: true } : {}),
  };
}

interface ErrorClassification {
  error: string;
  message: string;
  retryable: boolean;
  issues?: string[];
}

function errorCode(err: Error): string | undefined {
  const code: unknown = Reflect.get(err, "code");
  return typeof code === "string" ? code : undefined;
}

/**
 * Classifies an error and returns a user-friendly message.
 * Helps users understand whether to retry, fix their input, or report a bug.
 */
export function classifyError(err: unknown): ErrorClassification {
  if (err instanceof ConfigurationError) {
    return { error: "plan_unavailable", message: err.message, retryable: false };
  }
  if (err instanceof ValidationError) {
    return { error: "validation_failed", message: err.message, retryable: false, issues: err.issues };
  }
  if (!(err instanceof Error)) {
    return { error: "internal_error", message: "An unexpected error occurred. Please try again.", retryable: true };
  }

  const msg = err.message.toLowerCase();
  const code = errorCode(err);

  // Database errors
  if (code === "23505") {
    return { error: "conflict", message: "A duplicate entry already exists.", retryable: false };
  }
  if (code === "23503") {
    return { error: "not_found", message: "Referenced record not found.", retryable: false };
  }
  if (code === "23502") {
    return { error: "validation_failed", message: "Required field is missing.", retryable: false };
  }
  if (msg.includes("timeout") || msg.includes("timed out")) {
    return { error: "timeout", message: "The operation timed out. Please try again.", retryable: true };
  }
  if (msg.includes("connection") || msg.includes("econnrefused") || msg.includes("enotfound")) {
    return { error: "unavailable", message: "Connection error. Please try again in a moment.", retryable: true };
  }

  return { error: "internal_error", message: "Something went wrong. Please try again.", retryable: true };
}

/**
 * Wraps a tool handler with try/catch error handling.
 * Plan errors become structured error responses; anything else is logged with
 * its stack and reported with a generic, classified message.
 */
export function safeHandler<T>(
  toolName: string,
  handler: (params: T) => Promise<ToolResult>
): (params: T) => Promise<ToolResult> {
  return async (params: T) => {
    try {
      return await handler(params);
    } catch (err) {
      if (!(err instanceof ConfigurationError) && !(err instanceof ValidationError)) {
        console.error(`[${toolName}] Unhandled error:`, err instanceof Error ? err.stack : err);
      }
      const { error, message, retryable, issues } = classifyError(err);
      return toolResponse({ error, message, retryable, ...(issues && issues.length > 0 ? { issues } : {}) }, true);
    }
  };
}
