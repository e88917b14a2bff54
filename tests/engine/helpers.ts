import { DEFAULT_CONFIG, type SchedulerConfig } from "../../src/config.js";
import { parseTimeOfDay, timeOfDayToMinutes, toZonedIsoString } from "../../src/datetime.utils.js";
import { planDays } from "../../src/engine/orchestrator.js";
import type { SchedulerContext } from "../../src/engine/schedulers/index.js";
import { dayTypeOf } from "../../src/engine/timeplan.js";
import { silentLogger, type Logger } from "../../src/logger.js";
import { SAMPLE_WEEK_ID, sampleEmployees, weekShifts } from "../../src/testing/index.js";
import type { Assignment, Employee, Role, TimeOfDay, TimeWindow } from "../../src/types.js";

export const MONDAY = "2025-11-24";
export const TUESDAY = "2025-11-25";
export const SATURDAY = "2025-11-29";
export const SUNDAY = "2025-11-30";

export function time(value: string): TimeOfDay {
  const parsed = parseTimeOfDay(value);
  if (!parsed) throw new Error(`Invalid test time "${value}"`);
  return parsed;
}

export function window(day: string, start: string, end: string): TimeWindow {
  return {
    day,
    startMinutes: timeOfDayToMinutes(time(start)),
    endMinutes: timeOfDayToMinutes(time(end)),
  };
}

/**
 * Hand-built assignment for validation tests.
 */
export function makeAssignment(
  employeeId: string,
  role: Role,
  day: string,
  start: string,
  end: string,
  slotIndex = 0,
): Assignment {
  const w = window(day, start, end);
  return {
    id: `${day}:${role}:${slotIndex}`,
    shiftId: `shift-${day}`,
    employeeId,
    role,
    day,
    startTime: time(start),
    endTime: time(end),
    startsAt: toZonedIsoString(day, w.startMinutes, DEFAULT_CONFIG.timezone),
    endsAt: toZonedIsoString(day, w.endMinutes, DEFAULT_CONFIG.timezone),
    hours: (w.endMinutes - w.startMinutes) / 60,
    shiftType: `${dayTypeOf(day, DEFAULT_CONFIG)}_single`,
    dayType: dayTypeOf(day, DEFAULT_CONFIG),
  };
}

export function makeContext(
  options: { config?: SchedulerConfig; employees?: readonly Employee[]; logger?: Logger } = {},
): SchedulerContext {
  const config = options.config ?? DEFAULT_CONFIG;
  return {
    config,
    employees: options.employees ?? sampleEmployees(),
    days: planDays(weekShifts(SAMPLE_WEEK_ID), config),
    logger: options.logger ?? silentLogger,
  };
}
