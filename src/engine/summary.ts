import type { Role } from "../types.js";
import type { Schedule } from "./orchestrator.js";
import { compareIds } from "./scoring.js";

export interface ScheduleSummary {
  weekId: string;
  totalAssignments: number;
  totalHours: number;
  hoursByEmployee: Record<string, number>;
  /** Assignment counts per date and role, dates ascending. */
  countsByDay: Record<string, Record<Role, number>>;
  gapCount: number;
  gapsByRole: Record<Role, number>;
}

function zeroByRole(): Record<Role, number> {
  return { MANAGER: 0, SANDWICH: 0, BARISTA: 0, WAITER: 0 };
}

/**
 * Aggregates a schedule for reporting. Data only; rendering is up to the caller.
 */
export function summarizeSchedule(schedule: Schedule): ScheduleSummary {
  const hours = new Map<string, number>();
  const counts = new Map<string, Record<Role, number>>();
  let totalHours = 0;

  for (const assignment of schedule.assignments) {
    hours.set(assignment.employeeId, (hours.get(assignment.employeeId) ?? 0) + assignment.hours);
    totalHours += assignment.hours;
    const day = counts.get(assignment.day) ?? zeroByRole();
    day[assignment.role] += 1;
    counts.set(assignment.day, day);
  }

  const gapsByRole = zeroByRole();
  for (const gap of schedule.gaps) {
    gapsByRole[gap.role] += 1;
    if (!counts.has(gap.day)) counts.set(gap.day, zeroByRole());
  }

  return {
    weekId: schedule.weekId,
    totalAssignments: schedule.assignments.length,
    totalHours,
    hoursByEmployee: Object.fromEntries([...hours.entries()].toSorted(([a], [b]) => compareIds(a, b))),
    countsByDay: Object.fromEntries([...counts.entries()].toSorted(([a], [b]) => a.localeCompare(b))),
    gapCount: schedule.gaps.length,
    gapsByRole,
  };
}
