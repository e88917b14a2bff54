import {
  addDays,
  format,
  getDay,
  getISOWeek,
  getISOWeekYear,
  getISOWeeksInYear,
  parseISO,
  setISOWeek,
  startOfISOWeek,
} from "date-fns";
import { formatInTimeZone, fromZonedTime } from "date-fns-tz";
import type { DayOfWeek, TimeOfDay } from "./types.js";

// Indexed by date-fns getDay(), which starts on Sunday
const DAY_NAMES = [
  "sunday",
  "monday",
  "tuesday",
  "wednesday",
  "thursday",
  "friday",
  "saturday",
] as const satisfies readonly DayOfWeek[];

const WEEK_ID_PATTERN = /^(\d{4})-W(\d{2})$/;
const TIME_PATTERN = /^([01]\d|2[0-3]):([0-5]\d)$/;

/**
 * Day of week for a calendar date string (YYYY-MM-DD).
 */
export function toDayOfWeek(day: string): DayOfWeek {
  return DAY_NAMES[getDay(parseISO(day))];
}

/**
 * Parses an ISO week id (`YYYY-Www`).
 *
 * Returns `null` for a malformed id or a week number the ISO year does not have.
 */
export function parseWeekId(weekId: string): { year: number; week: number } | null {
  const match = WEEK_ID_PATTERN.exec(weekId);
  if (!match) return null;
  const year = Number(match[1]);
  const week = Number(match[2]);
  // January 4th always falls in ISO week 1
  const anchor = new Date(year, 0, 4);
  if (week < 1 || week > getISOWeeksInYear(anchor)) return null;
  return { year, week };
}

/**
 * The seven dates (Monday to Sunday) of an ISO week.
 *
 * @example
 * ```typescript
 * weekDates("2025-W48");
 * // ["2025-11-24", ..., "2025-11-30"]
 * ```
 */
export function weekDates(weekId: string): string[] {
  const parsed = parseWeekId(weekId);
  if (!parsed) {
    throw new RangeError(`Invalid ISO week id "${weekId}"`);
  }
  const monday = startOfISOWeek(setISOWeek(new Date(parsed.year, 0, 4), parsed.week));
  return Array.from({ length: 7 }, (_, offset) => formatDateString(addDays(monday, offset)));
}

/**
 * ISO week id (`YYYY-Www`) containing a calendar date.
 */
export function weekIdOf(day: string): string {
  const date = parseISO(day);
  return `${getISOWeekYear(date)}-W${String(getISOWeek(date)).padStart(2, "0")}`;
}

/**
 * Formats a date as YYYY-MM-DD string
 */
export function formatDateString(date: Date): string {
  return format(date, "yyyy-MM-dd");
}

export function timeOfDayToMinutes(time: TimeOfDay): number {
  return time.hours * 60 + time.minutes;
}

export function minutesToTimeOfDay(minutes: number): TimeOfDay {
  return { hours: Math.floor(minutes / 60), minutes: minutes % 60 };
}

/**
 * Parses an `"HH:MM"` string. Returns `null` when malformed.
 */
export function parseTimeOfDay(value: string): TimeOfDay | null {
  const match = TIME_PATTERN.exec(value);
  if (!match) return null;
  return { hours: Number(match[1]), minutes: Number(match[2]) };
}

export function formatTimeOfDay(time: TimeOfDay): string {
  return `${String(time.hours).padStart(2, "0")}:${String(time.minutes).padStart(2, "0")}`;
}

/**
 * Renders a wall-clock time on a date as an ISO-8601 instant with the
 * offset that applies in `timeZone` on that date.
 *
 * @example
 * ```typescript
 * toZonedIsoString("2025-11-24", 7 * 60, "Australia/Sydney");
 * // "2025-11-24T07:00:00+11:00"
 * ```
 */
export function toZonedIsoString(day: string, minutes: number, timeZone: string): string {
  const local = `${day}T${formatTimeOfDay(minutesToTimeOfDay(minutes))}:00`;
  return formatInTimeZone(fromZonedTime(local, timeZone), timeZone, "yyyy-MM-dd'T'HH:mm:ssXXX");
}
