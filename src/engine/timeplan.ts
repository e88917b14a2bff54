import type { SchedulerConfig, WindowSpec } from "../config.js";
import { parseTimeOfDay, timeOfDayToMinutes, toDayOfWeek } from "../datetime.utils.js";
import { ConfigurationError } from "../errors.js";
import { ROLES, type DayType, type Role, type TimeWindow } from "../types.js";

/**
 * A window resolved for a role on one day, with its configured label.
 */
export interface ResolvedWindow {
  window: TimeWindow;
  label?: string;
}

/**
 * The window one slot of a role's headcount is filled in.
 */
export interface SlotPlan {
  slotIndex: number;
  window: TimeWindow;
  shiftType: string;
}

export function dayTypeOf(day: string, config: SchedulerConfig): DayType {
  return config.busyDays.includes(toDayOfWeek(day)) ? "weekend" : "weekday";
}

function toMinutes(value: string, context: string): number {
  const time = parseTimeOfDay(value);
  if (!time) {
    throw new ConfigurationError(`Invalid time "${value}" in ${context}`);
  }
  return timeOfDayToMinutes(time);
}

function specToWindow(spec: WindowSpec, day: string, context: string): ResolvedWindow {
  const startMinutes = toMinutes(spec.start, context);
  const endMinutes = toMinutes(spec.end, context);
  if (endMinutes <= startMinutes) {
    throw new ConfigurationError(
      `Window ${spec.start}-${spec.end} in ${context} must end after it starts`,
    );
  }
  return { window: { day, startMinutes, endMinutes }, label: spec.label };
}

/**
 * Resolves the windows to fill for a role on a day.
 *
 * First match wins:
 * 1. `overrides[day].windows[role]`
 * 2. `roleTimeWindows[role][dayType]`
 * 3. `roleTimeWindows[role].default`
 * 4. `defaultShift`
 *
 * @throws {ConfigurationError} if a resolved window does not end after it starts
 */
export function resolveTimeWindows(
  role: Role,
  day: string,
  dayType: DayType,
  config: SchedulerConfig,
): ResolvedWindow[] {
  const overridden = config.overrides[day]?.windows?.[role];
  if (overridden) {
    return overridden.map((spec) => specToWindow(spec, day, `overrides.${day}.windows.${role}`));
  }

  const roleWindows = config.roleTimeWindows[role];
  const byDayType = roleWindows?.[dayType];
  if (byDayType) {
    return byDayType.map((spec) => specToWindow(spec, day, `roleTimeWindows.${role}.${dayType}`));
  }
  if (roleWindows?.default) {
    return roleWindows.default.map((spec) =>
      specToWindow(spec, day, `roleTimeWindows.${role}.default`),
    );
  }

  return [defaultShiftWindow(day, config)];
}

/**
 * The configured default shift on a day. Weekend fallback slots use it.
 */
export function defaultShiftWindow(day: string, config: SchedulerConfig): ResolvedWindow {
  const { start, end } = config.defaultShift;
  return specToWindow({ start, end }, day, "defaultShift");
}

/**
 * Headcount per role for a day: defaults, then weekend values, then the
 * date's overrides.
 */
export function resolveRequirements(
  day: string,
  dayType: DayType,
  config: SchedulerConfig,
): Record<Role, number> {
  const requirements = { ...config.defaultRequirements };
  const layers = [
    dayType === "weekend" ? config.weekendRequirements : undefined,
    config.overrides[day]?.requirements,
  ];
  for (const layer of layers) {
    if (!layer) continue;
    for (const role of ROLES) {
      const count = layer[role];
      if (count !== undefined) requirements[role] = count;
    }
  }
  return requirements;
}

/**
 * Spreads a headcount over resolved windows; slot `i` uses window
 * `i mod windows.length`.
 *
 * The shift type is the window's label, else `${dayType}_single` when the
 * slots use one window and `${dayType}_staggered` when they use several.
 */
export function slotWindows(
  windows: readonly ResolvedWindow[],
  headcount: number,
  dayType: DayType,
): SlotPlan[] {
  if (headcount <= 0) return [];
  if (windows.length === 0) {
    throw new ConfigurationError("Cannot plan slots without at least one window");
  }

  const pattern = Math.min(headcount, windows.length) > 1 ? "staggered" : "single";
  return Array.from({ length: headcount }, (_, slotIndex) => {
    const resolved = windows[slotIndex % windows.length];
    return {
      slotIndex,
      window: resolved.window,
      shiftType: resolved.label ?? `${dayType}_${pattern}`,
    };
  });
}
