/**
 * Error taxonomy for the plan core.
 *
 * ConfigurationError means the plan cannot be served for a date (empty cycle,
 * missing macro target, missing cycle start). ValidationError rejects a whole
 * sync or rule-creation call. A missing workout content is not an error: the
 * assembler reports it as a warning on the day view.
 */

export class PlanError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PlanError";
  }
}

export class ConfigurationError extends PlanError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class ValidationError extends PlanError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "ValidationError";
    this.issues = issues;
  }
}
