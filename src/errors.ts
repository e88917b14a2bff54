import type { ScheduleViolation } from "./engine/validation.types.js";

export type RosterErrorCode = "CONFIGURATION" | "INPUT_INTEGRITY" | "CONSTRAINT_VIOLATION";

/**
 * Base class for errors raised by the roster engine.
 *
 * Coverage gaps are never thrown; they are returned with the schedule.
 *
 * @category Errors
 */
export class RosterError extends Error {
  public readonly code: RosterErrorCode;

  constructor(message: string, code: RosterErrorCode) {
    super(message);
    this.name = "RosterError";
    this.code = code;
  }
}

/**
 * Missing or invalid configuration, including an invalid role order.
 *
 * @category Errors
 */
export class ConfigurationError extends RosterError {
  public readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[] = []) {
    super(issues.length > 0 ? `${message}\n  - ${issues.join("\n  - ")}` : message, "CONFIGURATION");
    this.name = "ConfigurationError";
    this.issues = issues;
  }
}

/**
 * Inputs that cannot produce a meaningful schedule (no shifts for the week,
 * no employees, inconsistent records).
 *
 * @category Errors
 */
export class InputIntegrityError extends RosterError {
  constructor(message: string) {
    super(message, "INPUT_INTEGRITY");
    this.name = "InputIntegrityError";
  }
}

/**
 * Raised when the final validation pass finds a hard-constraint violation.
 * The per-slot checker should have prevented it, so this signals a defect.
 *
 * @category Errors
 */
export class ConstraintViolationError extends RosterError {
  public readonly violations: readonly ScheduleViolation[];

  constructor(violations: readonly ScheduleViolation[]) {
    const first = violations[0]?.message ?? "unknown violation";
    const more = violations.length > 1 ? ` (and ${violations.length - 1} more)` : "";
    super(`Schedule failed final validation: ${first}${more}`, "CONSTRAINT_VIOLATION");
    this.name = "ConstraintViolationError";
    this.violations = violations;
  }
}
