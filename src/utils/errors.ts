import { ZodError } from "zod";

/**
 * Error kinds raised by the planner.
 *
 * - SchemaError: malformed base or overlay document. Fatal at startup.
 * - ValidationError: a user value or arithmetic argument is out of range.
 *   Input State recovers from it by substituting the default.
 * - LoadError: a saved plan document could not be loaded. The current
 *   Input State is kept.
 */

export class PlannerError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = new.target.name;
    this.issues = issues;
  }
}

export class SchemaError extends PlannerError {}

export class ValidationError extends PlannerError {
  readonly field?: string;

  constructor(message: string, field?: string, issues: string[] = []) {
    super(message, issues);
    this.field = field;
  }
}

export class LoadError extends PlannerError {}

/**
 * Flatten zod issues into "path: message" strings
 */
export function formatZodIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
