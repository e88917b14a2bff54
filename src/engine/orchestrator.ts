import {
  DEFAULT_CONFIG,
  formatIssue,
  parseSchedulerConfig,
  type SchedulerConfig,
  type SchedulerConfigInput,
} from "../config.js";
import { parseWeekId, weekDates } from "../datetime.utils.js";
import { ConfigurationError, ConstraintViolationError, InputIntegrityError } from "../errors.js";
import { createConsoleLogger, type Logger } from "../logger.js";
import {
  ROLES,
  RoleSchema,
  RosterInputSchema,
  type Assignment,
  type Employee,
  type Role,
  type RosterInput,
  type RosterInputData,
  type Shift,
} from "../types.js";
import { RunningLoad } from "./running-load.js";
import { createDefaultSchedulers, type DayPlan, type RoleScheduler } from "./schedulers/index.js";
import { compareIds } from "./scoring.js";
import { dayTypeOf } from "./timeplan.js";
import { validateSchedule } from "./validation.js";
import type { CoverageGap } from "./validation.types.js";

/**
 * All assignments for one week plus the slots that could not be filled.
 */
export interface Schedule {
  weekId: string;
  /** In production order: role order, then day, then slot. */
  assignments: Assignment[];
  gaps: CoverageGap[];
}

export interface OrchestratorOptions {
  /** Order role passes run in. Must name every role exactly once. */
  roleOrder?: readonly string[];
  /** One scheduler per role; defaults to {@link createDefaultSchedulers}. */
  schedulers?: readonly RoleScheduler[];
  logger?: Logger;
}

export const DEFAULT_ROLE_ORDER: readonly Role[] = ROLES;

/**
 * Checks a caller-supplied role order: every known role exactly once.
 *
 * @throws {ConfigurationError} naming unknown, duplicate and missing roles
 */
export function validateRoleOrder(order: readonly string[]): Role[] {
  const issues: string[] = [];
  const roles: Role[] = [];
  const seen = new Set<string>();

  for (const name of order) {
    const parsed = RoleSchema.safeParse(name);
    if (!parsed.success) {
      issues.push(`Unknown role "${name}"`);
      continue;
    }
    if (seen.has(parsed.data)) {
      issues.push(`Duplicate role "${name}"`);
      continue;
    }
    seen.add(parsed.data);
    roles.push(parsed.data);
  }
  for (const role of ROLES) {
    if (!seen.has(role)) issues.push(`Missing role "${role}"`);
  }

  if (issues.length > 0) {
    throw new ConfigurationError("Invalid role order", issues);
  }
  return roles;
}

function assertUniqueIds(records: readonly { id: string }[], label: string): void {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const { id } of records) {
    if (seen.has(id)) duplicates.add(id);
    seen.add(id);
  }
  if (duplicates.size > 0) {
    throw new InputIntegrityError(`Duplicate ${label} id(s): ${[...duplicates].join(", ")}`);
  }
}

/**
 * Groups a week's shifts into operating days, dates ascending.
 */
export function planDays(shifts: readonly Shift[], config: SchedulerConfig): DayPlan[] {
  const byDate = new Map<string, string[]>();
  for (const shift of shifts) {
    const ids = byDate.get(shift.date) ?? [];
    ids.push(shift.id);
    byDate.set(shift.date, ids);
  }
  return [...byDate.keys()].toSorted().map((day) => ({
    day,
    dayType: dayTypeOf(day, config),
    shiftIds: (byDate.get(day) ?? []).toSorted(compareIds),
  }));
}

/**
 * Runs one role pass after another and merges them into a single
 * conflict-free weekly schedule.
 *
 * @example
 * ```typescript
 * const orchestrator = new Orchestrator({
 *   roleOrder: ["SANDWICH", "MANAGER", "BARISTA", "WAITER"],
 * });
 * const schedule = orchestrator.buildSchedule({ employees, shifts }, "2025-W48", config);
 * console.log(schedule.gaps.length);
 * ```
 */
export class Orchestrator {
  readonly #roleOrder: Role[];
  readonly #schedulers: Map<Role, RoleScheduler>;
  readonly #logger: Logger;

  constructor(options: OrchestratorOptions = {}) {
    this.#roleOrder = validateRoleOrder(options.roleOrder ?? DEFAULT_ROLE_ORDER);
    this.#logger = options.logger ?? createConsoleLogger();

    this.#schedulers = new Map();
    for (const scheduler of options.schedulers ?? createDefaultSchedulers()) {
      if (this.#schedulers.has(scheduler.role)) {
        throw new ConfigurationError(`More than one scheduler registered for ${scheduler.role}`);
      }
      this.#schedulers.set(scheduler.role, scheduler);
    }
    const missing = this.#roleOrder.filter((role) => !this.#schedulers.has(role));
    if (missing.length > 0) {
      throw new ConfigurationError(`No scheduler registered for ${missing.join(", ")}`);
    }
  }

  get roleOrder(): readonly Role[] {
    return this.#roleOrder;
  }

  /**
   * Builds the schedule for one ISO week.
   *
   * @throws {ConfigurationError} for a malformed week id
   * @throws {InputIntegrityError} when the inputs cannot produce a schedule
   * @throws {ConstraintViolationError} if the merged schedule breaks a hard rule
   */
  buildSchedule(
    input: RosterInput,
    weekId: string,
    config: SchedulerConfig = DEFAULT_CONFIG,
  ): Schedule {
    if (!parseWeekId(weekId)) {
      throw new ConfigurationError(`Invalid week id "${weekId}", expected YYYY-Www`);
    }

    const employees = this.#checkEmployees(input.employees);
    const shifts = this.#checkShifts(input.shifts, weekId);
    const days = planDays(shifts, config);

    this.#logger.info({
      event: "schedule_started",
      week_id: weekId,
      employees: employees.length,
      days: days.length,
      role_order: this.#roleOrder.join(","),
    });

    const load = new RunningLoad();
    const assignments: Assignment[] = [];
    const gaps: CoverageGap[] = [];
    const context = { config, employees, days, logger: this.#logger };

    for (const role of this.#roleOrder) {
      const scheduler = this.#schedulers.get(role);
      if (!scheduler) {
        throw new ConfigurationError(`No scheduler registered for ${role}`);
      }
      const result = scheduler.makeSchedule(load, weekId, context);
      load.merge(result.assignments);
      assignments.push(...result.assignments);
      gaps.push(...result.gaps);

      this.#logger.info({
        event: "role_scheduled",
        week_id: weekId,
        role,
        assignments: result.assignments.length,
        gaps: result.gaps.length,
      });
      for (const gap of result.gaps) {
        this.#logger.warn({
          event: "coverage_gap",
          week_id: weekId,
          role,
          day: gap.day,
          slot_index: gap.slotIndex,
          message: gap.message,
        });
      }
    }

    const violations = validateSchedule(assignments, employees, config);
    if (violations.length > 0) {
      this.#logger.error({
        event: "schedule_invalid",
        week_id: weekId,
        violations: violations.map((v) => v.id),
      });
      throw new ConstraintViolationError(violations);
    }

    this.#logger.info({
      event: "schedule_built",
      week_id: weekId,
      assignments: assignments.length,
      gaps: gaps.length,
    });
    return { weekId, assignments, gaps };
  }

  #checkEmployees(employees: readonly Employee[]): readonly Employee[] {
    if (employees.length === 0) {
      throw new InputIntegrityError("Cannot schedule without employees");
    }
    assertUniqueIds(employees, "employee");
    return employees;
  }

  #checkShifts(shifts: readonly Shift[], weekId: string): Shift[] {
    const inWeek = shifts.filter((shift) => shift.weekId === weekId);
    if (inWeek.length === 0) {
      throw new InputIntegrityError(`No shifts found for week ${weekId}`);
    }
    assertUniqueIds(inWeek, "shift");

    const dates = new Set(weekDates(weekId));
    const outside = inWeek.filter((shift) => !dates.has(shift.date));
    if (outside.length > 0) {
      throw new InputIntegrityError(
        `Shift(s) ${outside.map((s) => `${s.id} (${s.date})`).join(", ")} fall outside week ${weekId}`,
      );
    }
    return inWeek;
  }
}

/**
 * Validates employees and shifts against their schemas and fills skill
 * defaults.
 *
 * @throws {InputIntegrityError} listing every invalid field
 */
export function parseRosterInput(raw: unknown): RosterInput {
  const result = RosterInputSchema.safeParse(raw);
  if (!result.success) {
    const lines = result.error.issues.map((issue) => `  - ${formatIssue(issue)}`);
    throw new InputIntegrityError(["Invalid roster input", ...lines].join("\n"));
  }
  return result.data;
}

/**
 * Parses the configuration and the roster input, then builds one week in a
 * single call.
 */
export function buildWeekSchedule(
  input: RosterInput | RosterInputData,
  weekId: string,
  config: SchedulerConfigInput = {},
  options: OrchestratorOptions = {},
): Schedule {
  const parsedConfig = parseSchedulerConfig(config);
  return new Orchestrator(options).buildSchedule(parseRosterInput(input), weekId, parsedConfig);
}
