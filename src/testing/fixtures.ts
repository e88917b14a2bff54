import { weekDates } from "../datetime.utils.js";
import type { LogFields, Logger, LogLevel } from "../logger.js";
import type { Employee, Role, Shift, Skills } from "../types.js";

export const SAMPLE_WEEK_ID = "2025-W48";

export function makeEmployee(
  id: string,
  primaryRole: Role,
  skills: Skills = {},
  name = `Employee ${id}`,
): Employee {
  return { id, name, primaryRole, skills };
}

/**
 * Two employees per role: managers 1001-1002, waiters 1003-1004,
 * baristas 1005-1006, sandwich hands 1007-1008.
 */
export function sampleEmployees(): Employee[] {
  return [
    makeEmployee("1001", "MANAGER", {}, "Max Hayes"),
    makeEmployee("1002", "MANAGER", {}, "Mia Stone"),
    makeEmployee("1003", "WAITER", { customerService: 5, speed: 3 }, "Wendy Ng"),
    makeEmployee("1004", "WAITER", { customerService: 4, speed: 4 }, "Will Brown"),
    makeEmployee("1005", "BARISTA", { coffee: 3, speed: 3, customerService: 3 }, "Bella Tran"),
    makeEmployee("1006", "BARISTA", { coffee: 4, speed: 4, customerService: 4 }, "Ben Park"),
    makeEmployee("1007", "SANDWICH", { sandwich: 5, speed: 3 }, "Sam Lee"),
    makeEmployee("1008", "SANDWICH", { sandwich: 4, speed: 4 }, "Sara Khan"),
  ];
}

/**
 * One shift per day of the week, ids counting up from `firstId`.
 */
export function weekShifts(weekId: string = SAMPLE_WEEK_ID, firstId = 100000): Shift[] {
  return weekDates(weekId).map((date, i) => ({ id: String(firstId + i), date, weekId }));
}

export interface RecordedEvent {
  level: LogLevel;
  fields: LogFields;
}

/**
 * Logger that keeps every event in memory.
 */
export function createRecordingLogger(): Logger & { events: RecordedEvent[] } {
  const events: RecordedEvent[] = [];
  return {
    events,
    info: (fields) => events.push({ level: "info", fields }),
    warn: (fields) => events.push({ level: "warn", fields }),
    error: (fields) => events.push({ level: "error", fields }),
  };
}
