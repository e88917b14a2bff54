/**
 * Weekly shift scheduling for a café.
 *
 * Assigns employees to MANAGER, SANDWICH, BARISTA and WAITER windows for one
 * ISO week. Hard rules (role, operating hours, no double-booking, weekly
 * hour caps) are never broken; within them candidates are ranked by skill
 * fit, fairness and distance from their target hours.
 *
 * @remarks
 * ## Core Concepts
 *
 * **Role passes**: each role has a {@link RoleScheduler}. The
 * {@link Orchestrator} runs them one after another in a configurable role
 * order, so earlier roles get first pick of people who could work several.
 *
 * **Time plan**: the windows a role works on a day come from configuration:
 * a date override, the role's weekday or weekend windows, the role default,
 * then the global default shift. Weekend cohort roles use two staggered
 * windows, each filled as its own slot.
 *
 * **Gaps**: a slot nobody can fill is recorded as a {@link CoverageGap} on
 * the schedule. Only configuration and input problems throw.
 *
 * @example Build a week
 * ```typescript
 * import { buildWeekSchedule, summarizeSchedule } from "cafe-roster";
 *
 * const schedule = buildWeekSchedule({ employees, shifts }, "2025-W48", {
 *   timezone: "Australia/Sydney",
 *   weekendRequirements: { BARISTA: 3 },
 * });
 * const summary = summarizeSchedule(schedule);
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// Domain types
// ============================================================================

export type {
  Assignment,
  CohortRole,
  DayOfWeek,
  DayType,
  Employee,
  Role,
  RosterInput,
  RosterInputData,
  Shift,
  SkillName,
  Skills,
  TimeOfDay,
  TimeWindow,
} from "./types.js";

export {
  COHORT_ROLES,
  DayOfWeekSchema,
  EmployeeSchema,
  ROLES,
  RoleSchema,
  RosterInputSchema,
  SKILL_NAMES,
  ShiftSchema,
  SkillsSchema,
  isCohortRole,
} from "./types.js";

// ============================================================================
// Configuration
// ============================================================================

export {
  DEFAULT_CONFIG,
  DayOverrideSchema,
  RoleWindowSetSchema,
  SchedulerConfigSchema,
  SkillWeightsSchema,
  WindowSpecSchema,
  loadSchedulerConfig,
  parseSchedulerConfig,
} from "./config.js";

export type {
  DayOverride,
  OperatingEnvelope,
  RoleWindowSet,
  SchedulerConfig,
  SchedulerConfigInput,
  SkillWeights,
  TargetBand,
  WeekendFallback,
  WindowSpec,
} from "./config.js";

// ============================================================================
// Errors
// ============================================================================

export {
  ConfigurationError,
  ConstraintViolationError,
  InputIntegrityError,
  RosterError,
} from "./errors.js";

export type { RosterErrorCode } from "./errors.js";

// ============================================================================
// Logging
// ============================================================================

export { createConsoleLogger, formatLogLine, silentLogger } from "./logger.js";

export type { LogFields, LogLevel, Logger } from "./logger.js";

// ============================================================================
// Date helpers
// ============================================================================

export {
  formatTimeOfDay,
  parseTimeOfDay,
  parseWeekId,
  toDayOfWeek,
  toZonedIsoString,
  weekDates,
  weekIdOf,
} from "./datetime.utils.js";

// ============================================================================
// Time plan
// ============================================================================

export {
  dayTypeOf,
  resolveRequirements,
  resolveTimeWindows,
  slotWindows,
} from "./engine/timeplan.js";

export type { ResolvedWindow, SlotPlan } from "./engine/timeplan.js";

// ============================================================================
// Constraints and scoring
// ============================================================================

export {
  allowedRoles,
  checkEligibility,
  effectiveCapMinutes,
  isEligible,
  operatingEnvelope,
  windowsOverlap,
} from "./engine/constraints.js";

export type { EligibilityResult } from "./engine/constraints.js";

export { RunningLoad } from "./engine/running-load.js";

export type { CommittedWindow } from "./engine/running-load.js";

export {
  compareIds,
  fairnessPenalty,
  hoursDeviationPenalty,
  median,
  populationStd,
  rankCandidates,
  scoreCandidate,
  skillFit,
} from "./engine/scoring.js";

export type { CandidateScore, RankedCandidate, ScoreOptions } from "./engine/scoring.js";

// ============================================================================
// Role schedulers
// ============================================================================

export {
  BaseRoleScheduler,
  CohortScheduler,
  ManagerScheduler,
  SandwichScheduler,
  createDefaultSchedulers,
} from "./engine/schedulers/index.js";

export type {
  DayPlan,
  RoleScheduleResult,
  RoleScheduler,
  SchedulerContext,
} from "./engine/schedulers/index.js";

// ============================================================================
// Orchestration
// ============================================================================

export {
  DEFAULT_ROLE_ORDER,
  Orchestrator,
  buildWeekSchedule,
  parseRosterInput,
  planDays,
  validateRoleOrder,
} from "./engine/orchestrator.js";

export type { OrchestratorOptions, Schedule } from "./engine/orchestrator.js";

// ============================================================================
// Validation and reporting
// ============================================================================

export { validateSchedule } from "./engine/validation.js";

export type {
  CandidateRejection,
  CoverageGap,
  RejectionReason,
  ScheduleViolation,
  ViolationRule,
} from "./engine/validation.types.js";

export { summarizeSchedule } from "./engine/summary.js";

export type { ScheduleSummary } from "./engine/summary.js";
