/**
 * Core roster types: roles, employees, day slots and assignments.
 *
 * @packageDocumentation
 */

import * as z from "zod";

// ============================================================================
// Time Primitives
// ============================================================================

/**
 * Day of the week identifier.
 */
export type DayOfWeek =
  | "monday"
  | "tuesday"
  | "wednesday"
  | "thursday"
  | "friday"
  | "saturday"
  | "sunday";

/**
 * Zod schema for {@link DayOfWeek}.
 */
export const DayOfWeekSchema = z.union([
  z.literal("monday"),
  z.literal("tuesday"),
  z.literal("wednesday"),
  z.literal("thursday"),
  z.literal("friday"),
  z.literal("saturday"),
  z.literal("sunday"),
]);

/**
 * Time of day in 24-hour format.
 *
 * @example
 * ```typescript
 * const opening: TimeOfDay = { hours: 7, minutes: 0 };
 * const prepEnd: TimeOfDay = { hours: 13, minutes: 30 };
 * ```
 */
export interface TimeOfDay {
  hours: number;
  minutes: number;
}

/**
 * Weekday or weekend. Drives requirement and time-window resolution.
 */
export type DayType = "weekday" | "weekend";

/**
 * A concrete window on one calendar day, in minutes from local midnight.
 *
 * Windows are derived from configuration and never cross midnight.
 */
export interface TimeWindow {
  /** Calendar date (YYYY-MM-DD). */
  day: string;
  startMinutes: number;
  endMinutes: number;
}

// ============================================================================
// Roles
// ============================================================================

/**
 * All café roles, in default scheduling order.
 */
export const ROLES = ["MANAGER", "SANDWICH", "BARISTA", "WAITER"] as const;

export const RoleSchema = z.enum(ROLES);

/**
 * A café role. Determines eligibility, operating envelope and hour cap.
 */
export type Role = z.infer<typeof RoleSchema>;

/**
 * Roles that share one front-of-house cohort pool.
 */
export const COHORT_ROLES = ["BARISTA", "WAITER"] as const satisfies readonly Role[];

export type CohortRole = (typeof COHORT_ROLES)[number];

export function isCohortRole(role: Role): role is CohortRole {
  return role === "BARISTA" || role === "WAITER";
}

// ============================================================================
// Employees and Shifts
// ============================================================================

const SkillScoreSchema = z.number().min(0).max(10);

export const SkillsSchema = z.object({
  coffee: SkillScoreSchema.optional(),
  sandwich: SkillScoreSchema.optional(),
  customerService: SkillScoreSchema.optional(),
  speed: SkillScoreSchema.optional(),
});

/**
 * Scalar skill ratings on a 0-10 scale. Missing skills count as zero.
 */
export type Skills = z.infer<typeof SkillsSchema>;

export type SkillName = keyof Skills;

export const SKILL_NAMES = [
  "coffee",
  "sandwich",
  "customerService",
  "speed",
] as const satisfies readonly SkillName[];

export const EmployeeSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  primaryRole: RoleSchema,
  skills: SkillsSchema.default({}),
});

/**
 * A team member. Read-only for the duration of a scheduling run.
 *
 * @example
 * ```typescript
 * const ben: Employee = {
 *   id: "1006",
 *   name: "Ben Park",
 *   primaryRole: "BARISTA",
 *   skills: { coffee: 4, speed: 4, customerService: 4 },
 * };
 * ```
 */
export type Employee = z.output<typeof EmployeeSchema>;

export const ShiftSchema = z.object({
  id: z.string().min(1),
  date: z.iso.date(),
  weekId: z.string().regex(/^\d{4}-W\d{2}$/),
});

/**
 * One café-operating day within the target week.
 *
 * The engine never invents shifts; it assigns employees to windows on the
 * days it is given.
 */
export type Shift = z.infer<typeof ShiftSchema>;

// ============================================================================
// Output
// ============================================================================

/**
 * One employee working one window in one role.
 */
export interface Assignment {
  /** Deterministic id: `${day}:${role}:${slotIndex}`. */
  id: string;
  shiftId: string;
  employeeId: string;
  role: Role;
  /** Calendar date (YYYY-MM-DD). */
  day: string;
  startTime: TimeOfDay;
  endTime: TimeOfDay;
  /** Start instant, ISO-8601 with the café time zone offset. */
  startsAt: string;
  /** End instant, ISO-8601 with the café time zone offset. */
  endsAt: string;
  hours: number;
  /** Window pattern label, e.g. `weekday_single` or `weekend_staggered`. */
  shiftType: string;
  dayType: DayType;
}

/**
 * Read-only inputs for one scheduling run.
 */
export interface RosterInput {
  employees: readonly Employee[];
  shifts: readonly Shift[];
}

export const RosterInputSchema = z.object({
  employees: z.array(EmployeeSchema),
  shifts: z.array(ShiftSchema),
});

/**
 * Roster input as callers write it, before skills are defaulted.
 */
export type RosterInputData = z.input<typeof RosterInputSchema>;
