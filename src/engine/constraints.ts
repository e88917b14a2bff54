import type { SchedulerConfig } from "../config.js";
import {
  formatTimeOfDay,
  minutesToTimeOfDay,
  parseTimeOfDay,
  timeOfDayToMinutes,
} from "../datetime.utils.js";
import { ConfigurationError } from "../errors.js";
import { isCohortRole, type DayType, type Employee, type Role, type TimeWindow } from "../types.js";
import type { RunningLoad } from "./running-load.js";
import { dayTypeOf } from "./timeplan.js";
import type { RejectionReason } from "./validation.types.js";

export type EligibilityResult =
  | { eligible: true }
  | { eligible: false; reason: RejectionReason; message: string };

const ELIGIBLE: EligibilityResult = { eligible: true };

function reject(reason: RejectionReason, message: string): EligibilityResult {
  return { eligible: false, reason, message };
}

export function formatWindow(window: TimeWindow): string {
  return `${window.day} ${formatTimeOfDay(minutesToTimeOfDay(window.startMinutes))}-${formatTimeOfDay(
    minutesToTimeOfDay(window.endMinutes),
  )}`;
}

/**
 * Roles an employee may be assigned to.
 *
 * The primary role always; with `sharedCohortPool`, BARISTA and WAITER
 * employees may also cover the other cohort role.
 */
export function allowedRoles(employee: Employee, config: SchedulerConfig): readonly Role[] {
  if (config.sharedCohortPool && isCohortRole(employee.primaryRole)) {
    return employee.primaryRole === "BARISTA" ? ["BARISTA", "WAITER"] : ["WAITER", "BARISTA"];
  }
  return [employee.primaryRole];
}

/**
 * Operating envelope for a role on a day type, in minutes from midnight.
 *
 * @throws {ConfigurationError} if either bound is not an `"HH:MM"` time
 */
export function operatingEnvelope(
  role: Role,
  dayType: DayType,
  config: SchedulerConfig,
): { startMinutes: number; endMinutes: number } {
  const envelope = config.operatingHours[role][dayType];
  const start = parseTimeOfDay(envelope.start);
  const end = parseTimeOfDay(envelope.end);
  if (!start || !end) {
    throw new ConfigurationError(
      `Invalid operating hours ${envelope.start}-${envelope.end} in operatingHours.${role}.${dayType}`,
    );
  }
  return { startMinutes: timeOfDayToMinutes(start), endMinutes: timeOfDayToMinutes(end) };
}

/**
 * Effective cap in minutes for a role on a day type. Weekday windows are
 * held to the role cap minus `reserveHoursForWeekend`.
 */
export function effectiveCapMinutes(role: Role, dayType: DayType, config: SchedulerConfig): number {
  const reserve = dayType === "weekday" ? (config.reserveHoursForWeekend[role] ?? 0) : 0;
  const roleCap = (config.hoursCaps[role] - reserve) * 60;
  return config.globalHardCap === undefined
    ? roleCap
    : Math.min(roleCap, config.globalHardCap * 60);
}

export function windowsOverlap(a: TimeWindow, b: TimeWindow): boolean {
  return a.day === b.day && a.startMinutes < b.endMinutes && b.startMinutes < a.endMinutes;
}

/**
 * Checks the hard rules for placing an employee in a window, in order:
 * role, operating hours, overlap, hours cap. Reports the first failure.
 *
 * @example
 * ```typescript
 * const result = checkEligibility(ben, "BARISTA", window, load, config);
 * if (!result.eligible) console.log(result.reason); // "overlap"
 * ```
 */
export function checkEligibility(
  employee: Employee,
  role: Role,
  window: TimeWindow,
  load: RunningLoad,
  config: SchedulerConfig,
): EligibilityResult {
  if (!allowedRoles(employee, config).includes(role)) {
    return reject("role_mismatch", `${employee.id} (${employee.primaryRole}) may not work ${role}`);
  }

  const dayType = dayTypeOf(window.day, config);
  const envelope = operatingEnvelope(role, dayType, config);
  if (window.startMinutes < envelope.startMinutes || window.endMinutes > envelope.endMinutes) {
    return reject(
      "operating_hours",
      `${formatWindow(window)} is outside ${role} operating hours for a ${dayType}`,
    );
  }

  const clash = load.windowsOn(employee.id, window.day).find((c) => windowsOverlap(c.window, window));
  if (clash) {
    return reject(
      "overlap",
      `${employee.id} already works ${clash.role} ${formatWindow(clash.window)}`,
    );
  }

  const projected = load.minutesOf(employee.id) + (window.endMinutes - window.startMinutes);
  const cap = effectiveCapMinutes(role, dayType, config);
  if (projected > cap) {
    return reject(
      "hours_cap",
      `${employee.id} would reach ${projected / 60}h, above the ${cap / 60}h cap for ${role}`,
    );
  }

  return ELIGIBLE;
}

export function isEligible(
  employee: Employee,
  role: Role,
  window: TimeWindow,
  load: RunningLoad,
  config: SchedulerConfig,
): boolean {
  return checkEligibility(employee, role, window, load, config).eligible;
}
