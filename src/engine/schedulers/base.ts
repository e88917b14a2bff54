import type { SchedulerConfig } from "../../config.js";
import { minutesToTimeOfDay, toZonedIsoString } from "../../datetime.utils.js";
import { InputIntegrityError } from "../../errors.js";
import type { Logger } from "../../logger.js";
import type { Assignment, DayType, Employee, Role } from "../../types.js";
import { allowedRoles, checkEligibility } from "../constraints.js";
import type { RunningLoad } from "../running-load.js";
import { compareIds, rankCandidates, scoreCandidate, type RankedCandidate } from "../scoring.js";
import {
  defaultShiftWindow,
  resolveRequirements,
  resolveTimeWindows,
  slotWindows,
  type SlotPlan,
} from "../timeplan.js";
import type { CandidateRejection, CoverageGap } from "../validation.types.js";

/**
 * One operating day of the target week.
 */
export interface DayPlan {
  /** Calendar date (YYYY-MM-DD). */
  day: string;
  dayType: DayType;
  /** Shift ids on this date; slots are spread over them round-robin. */
  shiftIds: readonly string[];
}

export interface SchedulerContext {
  config: SchedulerConfig;
  employees: readonly Employee[];
  /** Days of the week in date order. */
  days: readonly DayPlan[];
  logger: Logger;
}

export interface RoleScheduleResult {
  role: Role;
  assignments: Assignment[];
  gaps: CoverageGap[];
}

/**
 * Produces one role's assignments for a week.
 *
 * Implementations never mutate `state`; the orchestrator merges the returned
 * assignments into its own load once the pass is done.
 */
export interface RoleScheduler {
  readonly role: Role;
  makeSchedule(state: RunningLoad, weekId: string, context: SchedulerContext): RoleScheduleResult;
}

type SlotOutcome =
  | { filled: true; employee: Employee }
  | { filled: false; rejections: CandidateRejection[] };

/**
 * Greedy role pass with a single widened fallback scan per slot.
 *
 * For each slot the role's own cohort is ranked by full score. When nobody
 * in it passes the hard rules, every employee allowed the role is tried,
 * fewest days assigned first, without the fairness term. A slot that stays
 * empty becomes a {@link CoverageGap}. On weekend days an enabled
 * `weekendFallback` then retries one gap on the default shift and enforces
 * its `minRequired` floor.
 */
export abstract class BaseRoleScheduler implements RoleScheduler {
  abstract readonly role: Role;

  makeSchedule(state: RunningLoad, weekId: string, context: SchedulerContext): RoleScheduleResult {
    const { config, employees, logger } = context;
    const load = state.clone();
    const cohort = employees.filter((e) => e.primaryRole === this.role);
    const pool = employees.filter((e) => allowedRoles(e, config).includes(this.role));

    const plan = this.orderDays(context.days, config).map((day) => ({
      day,
      slots: this.planSlots(day, config),
    }));

    const requiredSlots = plan.reduce((sum, p) => sum + p.slots.length, 0);
    if (pool.length === 0 && requiredSlots > 0) {
      if (config.emptyPoolPolicy === "error") {
        throw new InputIntegrityError(
          `No employee may work ${this.role} in ${weekId} but ${requiredSlots} slot(s) require it`,
        );
      }
      logger.warn({ event: "empty_role_pool", week_id: weekId, role: this.role, slots: requiredSlots });
    }

    const assignments: Assignment[] = [];
    const gaps: CoverageGap[] = [];

    for (const { day, slots } of plan) {
      const dayGaps: CoverageGap[] = [];
      for (const slot of slots) {
        const outcome = this.fillSlot(slot, load, cohort, pool, config);
        if (outcome.filled) {
          load.commit(outcome.employee.id, this.role, slot.window);
          assignments.push(this.toAssignment(outcome.employee, day, slot, config));
        } else {
          dayGaps.push(this.toGap(day, slot, outcome.rejections));
        }
      }

      if (day.dayType === "weekend" && dayGaps.length > 0) {
        const rescued = this.weekendFallback(day, dayGaps, load, cohort, pool, context);
        if (rescued) {
          assignments.push(rescued);
          logger.info({
            event: "weekend_fallback_filled",
            week_id: weekId,
            role: this.role,
            day: day.day,
            employee_id: rescued.employeeId,
          });
        }
        this.enforceWeekendFloor(day, slots.length - dayGaps.length, config);
      }
      gaps.push(...dayGaps);
    }

    return { role: this.role, assignments, gaps };
  }

  /**
   * Offers the first unfilled weekend slot once more on the default shift,
   * when `weekendFallback[role]` enables it. A filled slot's gap is removed
   * from `dayGaps`.
   */
  protected weekendFallback(
    day: DayPlan,
    dayGaps: CoverageGap[],
    load: RunningLoad,
    cohort: readonly Employee[],
    pool: readonly Employee[],
    context: SchedulerContext,
  ): Assignment | undefined {
    const { config } = context;
    const fallback = config.weekendFallback[this.role];
    const [first] = dayGaps;
    if (!fallback.enabled || !fallback.allowSingleFullShift || !first) return undefined;

    const slot: SlotPlan = {
      slotIndex: first.slotIndex,
      window: defaultShiftWindow(day.day, config).window,
      shiftType: "weekend_fallback_single",
    };
    const outcome = this.fillSlot(slot, load, cohort, pool, config);
    if (!outcome.filled) return undefined;

    load.commit(outcome.employee.id, this.role, slot.window);
    dayGaps.shift();
    return this.toAssignment(outcome.employee, day, slot, config);
  }

  /**
   * @throws {InputIntegrityError} if an enabled weekend fallback still leaves
   * the day below `minRequired`
   */
  protected enforceWeekendFloor(day: DayPlan, filled: number, config: SchedulerConfig): void {
    const fallback = config.weekendFallback[this.role];
    if (fallback.enabled && filled < fallback.minRequired) {
      throw new InputIntegrityError(
        `Coverage impossible on ${day.day} for ${this.role} even after weekend fallback`,
      );
    }
  }

  /**
   * Date order, or busy days first when `scheduleBusyDaysFirst` is set.
   */
  protected orderDays(days: readonly DayPlan[], config: SchedulerConfig): DayPlan[] {
    if (!config.scheduleBusyDaysFirst) return [...days];
    return [
      ...days.filter((d) => d.dayType === "weekend"),
      ...days.filter((d) => d.dayType === "weekday"),
    ];
  }

  protected planSlots(day: DayPlan, config: SchedulerConfig): SlotPlan[] {
    const headcount = resolveRequirements(day.day, day.dayType, config)[this.role];
    if (headcount === 0) return [];
    const windows = resolveTimeWindows(this.role, day.day, day.dayType, config);
    return slotWindows(windows, headcount, day.dayType);
  }

  protected fillSlot(
    slot: SlotPlan,
    load: RunningLoad,
    cohort: readonly Employee[],
    pool: readonly Employee[],
    config: SchedulerConfig,
  ): SlotOutcome {
    const eligibleCohort = cohort.filter(
      (e) => checkEligibility(e, this.role, slot.window, load, config).eligible,
    );
    if (eligibleCohort.length > 0) {
      const ranked = rankCandidates(
        eligibleCohort.map((employee) => ({
          employee,
          score: scoreCandidate(employee, this.role, slot.window, load, cohort, config),
        })),
      );
      return { filled: true, employee: ranked[0].employee };
    }

    const rejections: CandidateRejection[] = [];
    const fallback: RankedCandidate[] = [];
    for (const employee of pool) {
      const result = checkEligibility(employee, this.role, slot.window, load, config);
      if (result.eligible) {
        fallback.push({
          employee,
          score: scoreCandidate(employee, this.role, slot.window, load, cohort, config, {
            includeFairness: false,
          }),
        });
      } else {
        rejections.push({ employeeId: employee.id, reason: result.reason, message: result.message });
      }
    }

    const [best] = fallback.toSorted(
      (a, b) =>
        load.daysAssigned(a.employee.id) - load.daysAssigned(b.employee.id) ||
        b.score.total - a.score.total ||
        compareIds(a.employee.id, b.employee.id),
    );
    if (best) return { filled: true, employee: best.employee };
    return { filled: false, rejections };
  }

  protected toAssignment(
    employee: Employee,
    day: DayPlan,
    slot: SlotPlan,
    config: SchedulerConfig,
  ): Assignment {
    const { startMinutes, endMinutes } = slot.window;
    return {
      id: `${day.day}:${this.role}:${slot.slotIndex}`,
      shiftId: day.shiftIds[slot.slotIndex % day.shiftIds.length],
      employeeId: employee.id,
      role: this.role,
      day: day.day,
      startTime: minutesToTimeOfDay(startMinutes),
      endTime: minutesToTimeOfDay(endMinutes),
      startsAt: toZonedIsoString(day.day, startMinutes, config.timezone),
      endsAt: toZonedIsoString(day.day, endMinutes, config.timezone),
      hours: (endMinutes - startMinutes) / 60,
      shiftType: slot.shiftType,
      dayType: day.dayType,
    };
  }

  protected toGap(day: DayPlan, slot: SlotPlan, rejections: CandidateRejection[]): CoverageGap {
    const detail =
      rejections.length === 0
        ? `no employee may work ${this.role}`
        : `${rejections.length} candidate(s) rejected`;
    return {
      id: `gap:${day.day}:${this.role}:${slot.slotIndex}`,
      role: this.role,
      day: day.day,
      slotIndex: slot.slotIndex,
      startTime: minutesToTimeOfDay(slot.window.startMinutes),
      endTime: minutesToTimeOfDay(slot.window.endMinutes),
      shiftType: slot.shiftType,
      rejections,
      message: `${this.role} slot ${slot.slotIndex} on ${day.day} left unfilled: ${detail}`,
    };
  }
}
