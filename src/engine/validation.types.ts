import type { Role, TimeOfDay } from "../types.js";

// =============================================================================
// Candidate rejections
// =============================================================================

/**
 * Hard rule that excluded a candidate from a slot.
 */
export type RejectionReason = "role_mismatch" | "operating_hours" | "overlap" | "hours_cap";

export interface CandidateRejection {
  readonly employeeId: string;
  readonly reason: RejectionReason;
  readonly message: string;
}

// =============================================================================
// Coverage gaps - schedule still produced
// =============================================================================

/**
 * A slot that no employee could fill after the widened fallback scan.
 */
export interface CoverageGap {
  /** Deterministic id: `gap:${day}:${role}:${slotIndex}`. */
  readonly id: string;
  readonly role: Role;
  readonly day: string;
  readonly slotIndex: number;
  readonly startTime: TimeOfDay;
  readonly endTime: TimeOfDay;
  readonly shiftType: string;
  /** Why each considered employee was turned down; empty when the pool was empty. */
  readonly rejections: readonly CandidateRejection[];
  readonly message: string;
}

// =============================================================================
// Violations - found by the final validation pass
// =============================================================================

export type ViolationRule =
  | "unknown_employee"
  | "role_mismatch"
  | "operating_hours"
  | "overlap"
  | "role_hours_cap"
  | "total_hours_cap";

export interface ScheduleViolation {
  /** Deterministic id: `${rule}:${employeeId}:${subject}`. */
  readonly id: string;
  readonly rule: ViolationRule;
  readonly employeeId: string;
  readonly assignmentIds: readonly string[];
  readonly message: string;
}
