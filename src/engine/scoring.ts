import type { SchedulerConfig, SkillWeights, TargetBand } from "../config.js";
import type { Employee, Role, TimeWindow } from "../types.js";
import type { RunningLoad } from "./running-load.js";

/**
 * Soft score of one candidate for one slot. Higher is better.
 */
export interface CandidateScore {
  skillFit: number;
  fairnessPenalty: number;
  hoursDeviationPenalty: number;
  /** `skillFit - fairnessPenalty - hoursDeviationPenalty` */
  total: number;
}

export interface RankedCandidate {
  employee: Employee;
  score: CandidateScore;
}

export interface ScoreOptions {
  /** Drop the fairness term, as the widened fallback scan does. */
  includeFairness?: boolean;
}

export function skillFit(employee: Employee, weights: SkillWeights): number {
  const { skills } = employee;
  return (
    weights.base +
    weights.coffee * (skills.coffee ?? 0) +
    weights.sandwich * (skills.sandwich ?? 0) +
    weights.customerService * (skills.customerService ?? 0) +
    weights.speed * (skills.speed ?? 0)
  );
}

export function median(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const sorted = values.toSorted((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
}

export function populationStd(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const mean = values.reduce((sum, v) => sum + v, 0) / values.length;
  const variance = values.reduce((sum, v) => sum + (v - mean) ** 2, 0) / values.length;
  return Math.sqrt(variance);
}

/**
 * Penalises hours above the cohort median, in standard deviations.
 * Zero for a cohort of one, a cohort with equal hours, or hours at or below
 * the median.
 */
export function fairnessPenalty(
  hours: number,
  cohortHours: readonly number[],
  perStd: number,
): number {
  if (cohortHours.length <= 1) return 0;
  const std = populationStd(cohortHours);
  if (std === 0) return 0;
  return Math.max(0, (hours - median(cohortHours)) / std) * perStd;
}

/**
 * Distance of projected hours from the middle of the target band, priced
 * per hour below or above it.
 */
export function hoursDeviationPenalty(
  projectedHours: number,
  band: TargetBand,
  weights: { perHourBelowTarget: number; perHourAboveTarget: number },
): number {
  const midpoint = (band.min + band.max) / 2;
  if (projectedHours < midpoint) return (midpoint - projectedHours) * weights.perHourBelowTarget;
  return (projectedHours - midpoint) * weights.perHourAboveTarget;
}

/**
 * Scores a candidate for a window. Only meaningful for candidates that
 * already passed the hard rules.
 *
 * @param cohort - employees whose hours set the fairness baseline
 */
export function scoreCandidate(
  employee: Employee,
  role: Role,
  window: TimeWindow,
  load: RunningLoad,
  cohort: readonly Employee[],
  config: SchedulerConfig,
  options: ScoreOptions = {},
): CandidateScore {
  const { weights } = config;
  const hours = load.hoursOf(employee.id);
  const projected = hours + (window.endMinutes - window.startMinutes) / 60;

  const fit = skillFit(employee, weights.skills[role]);
  const fairness =
    options.includeFairness === false
      ? 0
      : fairnessPenalty(
          hours,
          cohort.map((member) => load.hoursOf(member.id)),
          weights.fairnessPenaltyPerStd,
        );
  const deviation = hoursDeviationPenalty(projected, config.targetHours[role], weights);

  return {
    skillFit: fit,
    fairnessPenalty: fairness,
    hoursDeviationPenalty: deviation,
    total: fit - fairness - deviation,
  };
}

/**
 * Numeric-aware id comparison, so "9" sorts before "10". Ids the collator
 * treats as equal ("01" and "1") fall back to code-unit order.
 */
export function compareIds(a: string, b: string): number {
  const byCollation = a.localeCompare(b, "en", { numeric: true });
  if (byCollation !== 0) return byCollation;
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * Highest total first; ties broken by employee id ascending.
 */
export function rankCandidates(candidates: readonly RankedCandidate[]): RankedCandidate[] {
  return candidates.toSorted(
    (a, b) => b.score.total - a.score.total || compareIds(a.employee.id, b.employee.id),
  );
}
