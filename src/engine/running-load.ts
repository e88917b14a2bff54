import { timeOfDayToMinutes } from "../datetime.utils.js";
import type { Assignment, Role, TimeWindow } from "../types.js";

export interface CommittedWindow {
  readonly window: TimeWindow;
  readonly role: Role;
}

interface EmployeeLoad {
  windows: CommittedWindow[];
  minutes: number;
  days: Set<string>;
}

function windowMinutes(window: TimeWindow): number {
  return window.endMinutes - window.startMinutes;
}

/**
 * Per-employee committed windows and hours for one scheduling run.
 *
 * The orchestrator owns the authoritative instance. Each role pass works on
 * a {@link RunningLoad.clone | clone} and the orchestrator merges its
 * assignments back once the pass finishes.
 */
export class RunningLoad {
  #loads = new Map<string, EmployeeLoad>();

  #entry(employeeId: string): EmployeeLoad {
    let entry = this.#loads.get(employeeId);
    if (!entry) {
      entry = { windows: [], minutes: 0, days: new Set() };
      this.#loads.set(employeeId, entry);
    }
    return entry;
  }

  /** Books a window for an employee in a role. */
  commit(employeeId: string, role: Role, window: TimeWindow): void {
    const entry = this.#entry(employeeId);
    const minutes = windowMinutes(window);
    entry.windows.push({ window, role });
    entry.minutes += minutes;
    entry.days.add(window.day);
  }

  commitAssignment(assignment: Assignment): void {
    this.commit(assignment.employeeId, assignment.role, {
      day: assignment.day,
      startMinutes: timeOfDayToMinutes(assignment.startTime),
      endMinutes: timeOfDayToMinutes(assignment.endTime),
    });
  }

  merge(assignments: readonly Assignment[]): void {
    for (const assignment of assignments) {
      this.commitAssignment(assignment);
    }
  }

  minutesOf(employeeId: string): number {
    return this.#loads.get(employeeId)?.minutes ?? 0;
  }

  hoursOf(employeeId: string): number {
    return this.minutesOf(employeeId) / 60;
  }

  daysAssigned(employeeId: string): number {
    return this.#loads.get(employeeId)?.days.size ?? 0;
  }

  windowsOn(employeeId: string, day: string): readonly CommittedWindow[] {
    return this.#loads.get(employeeId)?.windows.filter((c) => c.window.day === day) ?? [];
  }

  clone(): RunningLoad {
    const copy = new RunningLoad();
    for (const [employeeId, entry] of this.#loads) {
      copy.#loads.set(employeeId, {
        windows: [...entry.windows],
        minutes: entry.minutes,
        days: new Set(entry.days),
      });
    }
    return copy;
  }
}
