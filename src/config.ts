import { readFile } from "node:fs/promises";
import * as z from "zod";
import { parseTimeOfDay, timeOfDayToMinutes } from "./datetime.utils.js";
import { ConfigurationError } from "./errors.js";
import { DayOfWeekSchema, ROLES, RoleSchema } from "./types.js";

// ============================================================================
// Building Blocks
// ============================================================================

const TimeStringSchema = z.string().refine((value) => parseTimeOfDay(value) !== null, {
  message: 'Expected a 24-hour "HH:MM" time',
});

function minutesOf(value: string): number {
  const time = parseTimeOfDay(value);
  return time ? timeOfDayToMinutes(time) : Number.NaN;
}

function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone });
    return true;
  } catch (error) {
    if (error instanceof RangeError) return false;
    throw error;
  }
}

/**
 * One configured window, `"HH:MM"` to `"HH:MM"` on the same day.
 * `label` replaces the derived shift type on assignments that use it.
 */
export const WindowSpecSchema = z
  .object({
    start: TimeStringSchema,
    end: TimeStringSchema,
    label: z.string().min(1).optional(),
  })
  .refine((w) => minutesOf(w.start) < minutesOf(w.end), {
    message: "Window end must be after its start",
  });

export type WindowSpec = z.infer<typeof WindowSpecSchema>;

const WindowListSchema = z.array(WindowSpecSchema).min(1);

export const RoleWindowSetSchema = z.object({
  weekday: WindowListSchema.optional(),
  weekend: WindowListSchema.optional(),
  default: WindowListSchema.optional(),
});

export type RoleWindowSet = z.infer<typeof RoleWindowSetSchema>;

/**
 * A role's window set layered over its built-in windows. A day type the
 * caller leaves out keeps the built-in windows, unless the set names a
 * `default` for every day type.
 */
function roleWindowsFor(builtIn: { weekday: WindowSpec[]; weekend: WindowSpec[] }) {
  return RoleWindowSetSchema.prefault({}).transform(
    (set): RoleWindowSet =>
      set.default
        ? set
        : {
            ...set,
            weekday: set.weekday ?? builtIn.weekday,
            weekend: set.weekend ?? builtIn.weekend,
          },
  );
}

const COHORT_WINDOWS = {
  weekday: [{ start: "07:00", end: "15:00" }],
  weekend: [
    { start: "07:00", end: "12:00" },
    { start: "11:00", end: "15:00" },
  ],
};

const EnvelopeSchema = z
  .object({ start: TimeStringSchema, end: TimeStringSchema })
  .refine((e) => minutesOf(e.start) < minutesOf(e.end), {
    message: "Operating hours must end after they start",
  });

export type OperatingEnvelope = z.infer<typeof EnvelopeSchema>;

function envelopesFor(weekday: [string, string], weekend: [string, string]) {
  return z.object({ weekday: EnvelopeSchema, weekend: EnvelopeSchema }).prefault({
    weekday: { start: weekday[0], end: weekday[1] },
    weekend: { start: weekend[0], end: weekend[1] },
  });
}

const HeadcountSchema = z.number().int().min(0);

/**
 * Second chance for a weekend role that came up short: one default-shift
 * slot, then a hard floor on the day's headcount.
 */
const WeekendFallbackSchema = z.object({
  enabled: z.boolean().default(false),
  /** Fewest filled slots the day may end with; below it the build fails. */
  minRequired: HeadcountSchema.default(1),
  /** Offer a single default-shift slot before checking the floor. */
  allowSingleFullShift: z.boolean().default(false),
});

export type WeekendFallback = z.infer<typeof WeekendFallbackSchema>;

const PartialRequirementsSchema = z.partialRecord(RoleSchema, HeadcountSchema);

export const DayOverrideSchema = z.object({
  requirements: PartialRequirementsSchema.optional(),
  windows: z.partialRecord(RoleSchema, WindowListSchema).optional(),
});

export type DayOverride = z.infer<typeof DayOverrideSchema>;

const TargetBandSchema = z
  .object({ min: z.number().min(0), max: z.number().min(0) })
  .refine((band) => band.min <= band.max, {
    message: "Target hours min must not exceed max",
  });

export type TargetBand = z.infer<typeof TargetBandSchema>;

export const SkillWeightsSchema = z.object({
  base: z.number().default(0),
  coffee: z.number().default(0),
  sandwich: z.number().default(0),
  customerService: z.number().default(0),
  speed: z.number().default(0),
});

export type SkillWeights = z.infer<typeof SkillWeightsSchema>;

// ============================================================================
// Scheduler Config
// ============================================================================

const CapSchema = z.number().positive();

export const SchedulerConfigSchema = z
  .object({
    /** IANA zone used to render assignment instants. */
    timezone: z
      .string()
      .min(1)
      .refine(isValidTimeZone, { message: "Unknown IANA time zone" })
      .default("Australia/Sydney"),
    defaultShift: z
      .object({
        start: TimeStringSchema.default("07:00"),
        end: TimeStringSchema.default("15:00"),
        durationHours: z.number().positive().default(8),
      })
      .refine((s) => minutesOf(s.start) < minutesOf(s.end), {
        message: "Default shift must end after it starts",
      })
      .refine((s) => (minutesOf(s.end) - minutesOf(s.start)) / 60 === s.durationHours, {
        message: "Default shift durationHours must equal the length of start to end",
      })
      .prefault({}),
    defaultRequirements: z
      .object({
        MANAGER: HeadcountSchema.default(1),
        SANDWICH: HeadcountSchema.default(1),
        BARISTA: HeadcountSchema.default(1),
        WAITER: HeadcountSchema.default(1),
      })
      .prefault({}),
    weekendRequirements: z
      .object({
        MANAGER: HeadcountSchema.default(2),
        SANDWICH: HeadcountSchema.default(1),
        BARISTA: HeadcountSchema.default(2),
        WAITER: HeadcountSchema.default(2),
      })
      .prefault({}),
    /** Per-date requirement and window overrides, keyed by YYYY-MM-DD. */
    overrides: z.record(z.iso.date(), DayOverrideSchema).default({}),
    hoursCaps: z
      .object({
        MANAGER: CapSchema.default(40),
        SANDWICH: CapSchema.default(36),
        BARISTA: CapSchema.default(40),
        WAITER: CapSchema.default(40),
      })
      .prefault({}),
    globalHardCap: CapSchema.optional(),
    targetHours: z
      .object({
        MANAGER: TargetBandSchema.prefault({ min: 38, max: 40 }),
        SANDWICH: TargetBandSchema.prefault({ min: 16, max: 32 }),
        BARISTA: TargetBandSchema.prefault({ min: 16, max: 32 }),
        WAITER: TargetBandSchema.prefault({ min: 16, max: 32 }),
      })
      .prefault({}),
    /** Hours held back from weekday scheduling so weekend slots stay fillable. */
    reserveHoursForWeekend: z.partialRecord(RoleSchema, z.number().min(0)).default({}),
    weights: z
      .object({
        skills: z
          .object({
            MANAGER: SkillWeightsSchema.prefault({ base: 1 }),
            SANDWICH: SkillWeightsSchema.prefault({ sandwich: 1, speed: 0.5 }),
            BARISTA: SkillWeightsSchema.prefault({ coffee: 1, speed: 0.5, customerService: 0.5 }),
            WAITER: SkillWeightsSchema.prefault({ customerService: 0.5, speed: 0.5 }),
          })
          .prefault({}),
        fairnessPenaltyPerStd: z.number().min(0).default(1),
        perHourBelowTarget: z.number().min(0).default(0.1),
        perHourAboveTarget: z.number().min(0).default(0.5),
      })
      .prefault({}),
    roleTimeWindows: z
      .object({
        MANAGER: RoleWindowSetSchema.optional(),
        SANDWICH: roleWindowsFor({
          weekday: [{ start: "05:00", end: "12:00" }],
          weekend: [
            { start: "05:00", end: "13:30" },
            { start: "06:00", end: "13:30" },
          ],
        }),
        BARISTA: roleWindowsFor(COHORT_WINDOWS),
        WAITER: roleWindowsFor(COHORT_WINDOWS),
      })
      .prefault({}),
    operatingHours: z
      .object({
        MANAGER: envelopesFor(["07:00", "15:00"], ["07:00", "15:00"]),
        SANDWICH: envelopesFor(["05:00", "12:00"], ["05:00", "13:30"]),
        BARISTA: envelopesFor(["07:00", "15:00"], ["07:00", "15:00"]),
        WAITER: envelopesFor(["07:00", "15:00"], ["07:00", "15:00"]),
      })
      .prefault({}),
    busyDays: z.array(DayOfWeekSchema).default(["saturday", "sunday"]),
    scheduleBusyDaysFirst: z.boolean().default(false),
    /** Lets BARISTA and WAITER employees cover each other's role. */
    sharedCohortPool: z.boolean().default(true),
    /** What a role pass does when nobody may work the role at all. */
    emptyPoolPolicy: z.enum(["gap", "error"]).default("gap"),
    weekendFallback: z
      .object({
        MANAGER: WeekendFallbackSchema.prefault({}),
        SANDWICH: WeekendFallbackSchema.prefault({}),
        BARISTA: WeekendFallbackSchema.prefault({}),
        WAITER: WeekendFallbackSchema.prefault({}),
      })
      .prefault({}),
  })
  .superRefine((config, ctx) => {
    for (const role of ROLES) {
      const reserve = config.reserveHoursForWeekend[role];
      if (reserve !== undefined && reserve >= config.hoursCaps[role]) {
        ctx.addIssue({
          code: "custom",
          path: ["reserveHoursForWeekend", role],
          message: `Reserved weekend hours for ${role} must be below its hours cap`,
        });
      }
    }
  });

/**
 * Fully-resolved scheduler configuration.
 *
 * @category Configuration
 */
export type SchedulerConfig = z.output<typeof SchedulerConfigSchema>;

/**
 * Configuration as written by callers; every option is optional.
 *
 * @category Configuration
 */
export type SchedulerConfigInput = z.input<typeof SchedulerConfigSchema>;

/**
 * Renders a zod issue as `path: message`.
 */
export function formatIssue(issue: z.core.$ZodIssue): string {
  const path = issue.path.map(String).join(".");
  return path ? `${path}: ${issue.message}` : issue.message;
}

/**
 * Validates raw configuration and fills defaults.
 *
 * @throws {ConfigurationError} listing every invalid option
 *
 * @example
 * ```typescript
 * const config = parseSchedulerConfig({
 *   weekendRequirements: { BARISTA: 3 },
 *   overrides: { "2025-11-29": { requirements: { WAITER: 3 } } },
 * });
 * ```
 *
 * @category Configuration
 */
export function parseSchedulerConfig(raw: unknown): SchedulerConfig {
  const result = SchedulerConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ConfigurationError("Invalid scheduler configuration", result.error.issues.map(formatIssue));
  }
  return result.data;
}

/**
 * Reads and validates a JSON configuration file.
 *
 * @category Configuration
 */
export async function loadSchedulerConfig(path: string | URL): Promise<SchedulerConfig> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (error) {
    throw new ConfigurationError(`Cannot read config file ${String(path)}`, [
      error instanceof Error ? error.message : String(error),
    ]);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigurationError(`Config file ${String(path)} is not valid JSON`, [
      error instanceof Error ? error.message : String(error),
    ]);
  }
  return parseSchedulerConfig(raw);
}

export const DEFAULT_CONFIG: SchedulerConfig = parseSchedulerConfig({});

