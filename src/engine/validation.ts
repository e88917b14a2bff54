import type { SchedulerConfig } from "../config.js";
import { timeOfDayToMinutes } from "../datetime.utils.js";
import { ROLES, type Assignment, type Employee, type Role, type TimeWindow } from "../types.js";
import { allowedRoles, formatWindow, operatingEnvelope, windowsOverlap } from "./constraints.js";
import { compareIds } from "./scoring.js";
import { dayTypeOf } from "./timeplan.js";
import type { ScheduleViolation, ViolationRule } from "./validation.types.js";

function windowOf(assignment: Assignment): TimeWindow {
  return {
    day: assignment.day,
    startMinutes: timeOfDayToMinutes(assignment.startTime),
    endMinutes: timeOfDayToMinutes(assignment.endTime),
  };
}

function violation(
  rule: ViolationRule,
  employeeId: string,
  subject: string,
  assignmentIds: readonly string[],
  message: string,
): ScheduleViolation {
  return { id: `${rule}:${employeeId}:${subject}`, rule, employeeId, assignmentIds, message };
}

/**
 * Re-checks a merged set of assignments against every hard rule.
 *
 * Hours are judged on the employee's full week: hours in each role must stay
 * within that role's cap, and total hours within the highest cap among the
 * roles worked and within `globalHardCap`.
 *
 * @returns violations in a stable order; empty when the schedule is valid
 */
export function validateSchedule(
  assignments: readonly Assignment[],
  employees: readonly Employee[],
  config: SchedulerConfig,
): ScheduleViolation[] {
  const violations: ScheduleViolation[] = [];
  const employeesById = new Map(employees.map((e) => [e.id, e]));
  const byEmployee = new Map<string, Assignment[]>();

  for (const assignment of assignments) {
    const employee = employeesById.get(assignment.employeeId);
    if (!employee) {
      violations.push(
        violation(
          "unknown_employee",
          assignment.employeeId,
          assignment.id,
          [assignment.id],
          `Assignment ${assignment.id} references unknown employee ${assignment.employeeId}`,
        ),
      );
      continue;
    }

    const list = byEmployee.get(employee.id) ?? [];
    list.push(assignment);
    byEmployee.set(employee.id, list);

    if (!allowedRoles(employee, config).includes(assignment.role)) {
      violations.push(
        violation(
          "role_mismatch",
          employee.id,
          assignment.id,
          [assignment.id],
          `${employee.id} (${employee.primaryRole}) is assigned ${assignment.role} in ${assignment.id}`,
        ),
      );
    }

    const window = windowOf(assignment);
    const dayType = dayTypeOf(assignment.day, config);
    const envelope = operatingEnvelope(assignment.role, dayType, config);
    if (window.startMinutes < envelope.startMinutes || window.endMinutes > envelope.endMinutes) {
      violations.push(
        violation(
          "operating_hours",
          employee.id,
          assignment.id,
          [assignment.id],
          `${assignment.id} (${formatWindow(window)}) is outside ${assignment.role} operating hours`,
        ),
      );
    }
  }

  for (const employeeId of [...byEmployee.keys()].toSorted(compareIds)) {
    const list = byEmployee.get(employeeId) ?? [];

    for (let i = 0; i < list.length; i++) {
      for (let j = i + 1; j < list.length; j++) {
        const a = list[i];
        const b = list[j];
        if (windowsOverlap(windowOf(a), windowOf(b))) {
          violations.push(
            violation(
              "overlap",
              employeeId,
              `${a.id}+${b.id}`,
              [a.id, b.id],
              `${employeeId} has overlapping assignments ${a.id} and ${b.id}`,
            ),
          );
        }
      }
    }

    const minutesByRole = new Map<Role, number>();
    for (const assignment of list) {
      const w = windowOf(assignment);
      minutesByRole.set(
        assignment.role,
        (minutesByRole.get(assignment.role) ?? 0) + (w.endMinutes - w.startMinutes),
      );
    }

    let totalMinutes = 0;
    let highestCap = 0;
    for (const role of ROLES) {
      const minutes = minutesByRole.get(role);
      if (minutes === undefined) continue;
      totalMinutes += minutes;
      const cap = config.hoursCaps[role];
      highestCap = Math.max(highestCap, cap);
      if (minutes > cap * 60) {
        const roleIds = list.filter((a) => a.role === role).map((a) => a.id);
        violations.push(
          violation(
            "role_hours_cap",
            employeeId,
            role,
            roleIds,
            `${employeeId} works ${minutes / 60}h as ${role}, above the ${cap}h cap`,
          ),
        );
      }
    }

    const ids = list.map((a) => a.id);
    if (totalMinutes > highestCap * 60) {
      violations.push(
        violation(
          "total_hours_cap",
          employeeId,
          "role",
          ids,
          `${employeeId} works ${totalMinutes / 60}h in total, above the ${highestCap}h cap`,
        ),
      );
    }
    if (config.globalHardCap !== undefined && totalMinutes > config.globalHardCap * 60) {
      violations.push(
        violation(
          "total_hours_cap",
          employeeId,
          "global",
          ids,
          `${employeeId} works ${totalMinutes / 60}h in total, above the global ${config.globalHardCap}h cap`,
        ),
      );
    }
  }

  return violations;
}
