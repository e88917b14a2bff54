import { describe, expect, it } from "vitest";
import { DEFAULT_CONFIG, parseSchedulerConfig } from "../../src/config.js";
import {
  Orchestrator,
  buildWeekSchedule,
  validateRoleOrder,
} from "../../src/engine/orchestrator.js";
import {
  createDefaultSchedulers,
  type RoleScheduler,
} from "../../src/engine/schedulers/index.js";
import { validateSchedule } from "../../src/engine/validation.js";
import {
  ConfigurationError,
  ConstraintViolationError,
  InputIntegrityError,
} from "../../src/errors.js";
import { silentLogger } from "../../src/logger.js";
import {
  SAMPLE_WEEK_ID,
  createRecordingLogger,
  makeEmployee,
  sampleEmployees,
  weekShifts,
} from "../../src/testing/index.js";
import { MONDAY, makeAssignment } from "./helpers.js";

function sampleInput() {
  return { employees: sampleEmployees(), shifts: weekShifts() };
}

function configurationIssues(fn: () => unknown): readonly string[] {
  try {
    fn();
  } catch (error) {
    if (error instanceof ConfigurationError) return error.issues;
    throw error;
  }
  throw new Error("expected a ConfigurationError");
}

describe("validateRoleOrder", () => {
  it("should accept every role once in any order", () => {
    expect(validateRoleOrder(["WAITER", "BARISTA", "SANDWICH", "MANAGER"])).toEqual([
      "WAITER",
      "BARISTA",
      "SANDWICH",
      "MANAGER",
    ]);
  });

  it("should name unknown, duplicate and missing roles", () => {
    expect(
      configurationIssues(() => validateRoleOrder(["MANAGER", "MANAGER", "BARISTA", "CHEF"])),
    ).toEqual([
      'Duplicate role "MANAGER"',
      'Unknown role "CHEF"',
      'Missing role "SANDWICH"',
      'Missing role "WAITER"',
    ]);
  });
});

describe("Orchestrator", () => {
  describe("construction", () => {
    it("should default to the standard role order", () => {
      const orchestrator = new Orchestrator({ logger: silentLogger });
      expect(orchestrator.roleOrder).toEqual(["MANAGER", "SANDWICH", "BARISTA", "WAITER"]);
    });

    it("should reject an invalid role order", () => {
      expect(() => new Orchestrator({ roleOrder: ["MANAGER"], logger: silentLogger })).toThrow(
        ConfigurationError,
      );
    });

    it("should reject two schedulers for one role", () => {
      const schedulers = [...createDefaultSchedulers(), ...createDefaultSchedulers().slice(0, 1)];
      expect(() => new Orchestrator({ schedulers, logger: silentLogger })).toThrow(
        "More than one scheduler registered for MANAGER",
      );
    });

    it("should reject a role without a scheduler", () => {
      const schedulers = createDefaultSchedulers().filter((s) => s.role !== "WAITER");
      expect(() => new Orchestrator({ schedulers, logger: silentLogger })).toThrow(
        "No scheduler registered for WAITER",
      );
    });
  });

  describe("buildSchedule", () => {
    it("should cover the whole sample week without gaps", () => {
      const schedule = new Orchestrator({ logger: silentLogger }).buildSchedule(
        sampleInput(),
        SAMPLE_WEEK_ID,
      );

      expect(schedule.weekId).toBe(SAMPLE_WEEK_ID);
      expect(schedule.assignments).toHaveLength(34);
      expect(schedule.gaps).toEqual([]);
      expect(validateSchedule(schedule.assignments, sampleEmployees(), DEFAULT_CONFIG)).toEqual([]);
    });

    it("should emit assignments in role order", () => {
      const schedule = new Orchestrator({ logger: silentLogger }).buildSchedule(
        sampleInput(),
        SAMPLE_WEEK_ID,
      );
      const roles = schedule.assignments.map((a) => a.role);

      expect(roles.slice(0, 9).every((r) => r === "MANAGER")).toBe(true);
      expect(roles.slice(9, 16).every((r) => r === "SANDWICH")).toBe(true);
      expect(roles.slice(16, 25).every((r) => r === "BARISTA")).toBe(true);
      expect(roles.slice(25).every((r) => r === "WAITER")).toBe(true);
    });

    it("should follow a custom role order", () => {
      const schedule = new Orchestrator({
        roleOrder: ["SANDWICH", "MANAGER", "BARISTA", "WAITER"],
        logger: silentLogger,
      }).buildSchedule(sampleInput(), SAMPLE_WEEK_ID);

      expect(schedule.assignments).toHaveLength(34);
      expect(schedule.gaps).toEqual([]);
      expect(schedule.assignments[0]).toMatchObject({
        id: `${MONDAY}:SANDWICH:0`,
        employeeId: "1007",
      });
    });

    it("should be deterministic", () => {
      const orchestrator = new Orchestrator({ logger: silentLogger });
      const first = orchestrator.buildSchedule(sampleInput(), SAMPLE_WEEK_ID);
      const second = orchestrator.buildSchedule(sampleInput(), SAMPLE_WEEK_ID);
      expect(second).toEqual(first);
    });

    it("should not let a cohort member work both cohort roles at once", () => {
      const employees = sampleEmployees().filter((e) => e.primaryRole !== "WAITER");
      const schedule = new Orchestrator({ logger: silentLogger }).buildSchedule(
        { employees, shifts: weekShifts() },
        SAMPLE_WEEK_ID,
      );

      const monday = schedule.assignments.filter(
        (a) => a.day === MONDAY && (a.role === "BARISTA" || a.role === "WAITER"),
      );
      expect(monday.map((a) => [a.role, a.employeeId])).toEqual([
        ["BARISTA", "1006"],
        ["WAITER", "1005"],
      ]);
      expect(validateSchedule(schedule.assignments, employees, DEFAULT_CONFIG)).toEqual([]);
    });

    it("should record gaps and keep going when a role has no pool", () => {
      const logger = createRecordingLogger();
      const employees = sampleEmployees().filter((e) => e.primaryRole !== "SANDWICH");
      const schedule = new Orchestrator({ logger }).buildSchedule(
        { employees, shifts: weekShifts() },
        SAMPLE_WEEK_ID,
      );

      expect(schedule.assignments).toHaveLength(27);
      expect(schedule.gaps).toHaveLength(7);
      expect(schedule.gaps.every((g) => g.role === "SANDWICH")).toBe(true);

      const warnings = logger.events.filter((e) => e.level === "warn").map((e) => e.fields.event);
      expect(warnings).toEqual(["empty_role_pool", ...Array<string>(7).fill("coverage_gap")]);
    });

    it("should throw for an empty pool under the error policy", () => {
      const employees = sampleEmployees().filter((e) => e.primaryRole !== "SANDWICH");
      const config = parseSchedulerConfig({ emptyPoolPolicy: "error" });

      expect(() =>
        new Orchestrator({ logger: silentLogger }).buildSchedule(
          { employees, shifts: weekShifts() },
          SAMPLE_WEEK_ID,
          config,
        ),
      ).toThrow(InputIntegrityError);
    });

    it("should log the run", () => {
      const logger = createRecordingLogger();
      new Orchestrator({ logger }).buildSchedule(sampleInput(), SAMPLE_WEEK_ID);

      expect(logger.events[0]).toEqual({
        level: "info",
        fields: {
          event: "schedule_started",
          week_id: SAMPLE_WEEK_ID,
          employees: 8,
          days: 7,
          role_order: "MANAGER,SANDWICH,BARISTA,WAITER",
        },
      });
      expect(logger.events[1]).toEqual({
        level: "info",
        fields: {
          event: "role_scheduled",
          week_id: SAMPLE_WEEK_ID,
          role: "MANAGER",
          assignments: 9,
          gaps: 0,
        },
      });
      expect(logger.events.map((e) => e.fields.event)).toEqual([
        "schedule_started",
        "role_scheduled",
        "role_scheduled",
        "role_scheduled",
        "role_scheduled",
        "schedule_built",
      ]);
      expect(logger.events[5].fields).toEqual({
        event: "schedule_built",
        week_id: SAMPLE_WEEK_ID,
        assignments: 34,
        gaps: 0,
      });
    });

    describe("input checks", () => {
      const orchestrator = new Orchestrator({ logger: silentLogger });

      it("should reject a malformed week id", () => {
        expect(() => orchestrator.buildSchedule(sampleInput(), "2025-48")).toThrow(
          'Invalid week id "2025-48", expected YYYY-Www',
        );
        expect(() => orchestrator.buildSchedule(sampleInput(), "2025-W54")).toThrow(
          ConfigurationError,
        );
      });

      it("should reject a week without shifts", () => {
        expect(() =>
          orchestrator.buildSchedule(
            { employees: sampleEmployees(), shifts: weekShifts("2025-W49") },
            SAMPLE_WEEK_ID,
          ),
        ).toThrow("No shifts found for week 2025-W48");
      });

      it("should reject shifts dated outside their week", () => {
        const shifts = [...weekShifts(), { id: "1", date: "2025-12-01", weekId: SAMPLE_WEEK_ID }];
        expect(() =>
          orchestrator.buildSchedule({ employees: sampleEmployees(), shifts }, SAMPLE_WEEK_ID),
        ).toThrow("Shift(s) 1 (2025-12-01) fall outside week 2025-W48");
      });

      it("should reject duplicate shift ids", () => {
        const shifts = [...weekShifts(), ...weekShifts().slice(0, 1)];
        expect(() =>
          orchestrator.buildSchedule({ employees: sampleEmployees(), shifts }, SAMPLE_WEEK_ID),
        ).toThrow("Duplicate shift id(s): 100000");
      });

      it("should reject an empty roster", () => {
        expect(() =>
          orchestrator.buildSchedule({ employees: [], shifts: weekShifts() }, SAMPLE_WEEK_ID),
        ).toThrow(new InputIntegrityError("Cannot schedule without employees"));
      });

      it("should reject duplicate employee ids", () => {
        const employees = [...sampleEmployees(), makeEmployee("1001", "WAITER")];
        expect(() =>
          orchestrator.buildSchedule({ employees, shifts: weekShifts() }, SAMPLE_WEEK_ID),
        ).toThrow("Duplicate employee id(s): 1001");
      });
    });

    it("should refuse to return a schedule that breaks a hard rule", () => {
      const logger = createRecordingLogger();
      const rogue: RoleScheduler = {
        role: "MANAGER",
        makeSchedule: () => ({
          role: "MANAGER",
          assignments: [makeAssignment("9999", "MANAGER", MONDAY, "07:00", "15:00")],
          gaps: [],
        }),
      };
      const schedulers = [
        rogue,
        ...createDefaultSchedulers().filter((s) => s.role !== "MANAGER"),
      ];

      expect(() =>
        new Orchestrator({ schedulers, logger }).buildSchedule(sampleInput(), SAMPLE_WEEK_ID),
      ).toThrow(
        new ConstraintViolationError([
          {
            id: "unknown_employee:9999:2025-11-24:MANAGER:0",
            rule: "unknown_employee",
            employeeId: "9999",
            assignmentIds: ["2025-11-24:MANAGER:0"],
            message: "Assignment 2025-11-24:MANAGER:0 references unknown employee 9999",
          },
        ]),
      );
      expect(logger.events.at(-1)).toEqual({
        level: "error",
        fields: {
          event: "schedule_invalid",
          week_id: SAMPLE_WEEK_ID,
          violations: ["unknown_employee:9999:2025-11-24:MANAGER:0"],
        },
      });
    });
  });
});

describe("buildWeekSchedule", () => {
  it("should parse raw configuration before building", () => {
    const schedule = buildWeekSchedule(
      sampleInput(),
      SAMPLE_WEEK_ID,
      { weekendRequirements: { MANAGER: 1, BARISTA: 1, WAITER: 1 } },
      { logger: silentLogger },
    );

    expect(schedule.assignments).toHaveLength(28);
    expect(schedule.gaps).toEqual([]);
  });

  it("should keep default weekend headcounts for roles left out of the config", () => {
    const schedule = buildWeekSchedule(
      sampleInput(),
      SAMPLE_WEEK_ID,
      { weekendRequirements: { BARISTA: 3 } },
      { logger: silentLogger },
    );
    const saturday = (role: string) =>
      schedule.assignments.filter((a) => a.day === "2025-11-29" && a.role === role);

    expect(saturday("MANAGER").map((a) => a.employeeId)).toEqual(["1002", "1001"]);
    expect(saturday("SANDWICH")).toHaveLength(1);
    expect(saturday("BARISTA")).toHaveLength(3);
  });

  it("should default missing skills", () => {
    const employees = sampleEmployees().map(({ id, name, primaryRole, skills }) =>
      primaryRole === "MANAGER" ? { id, name, primaryRole } : { id, name, primaryRole, skills },
    );

    const schedule = buildWeekSchedule({ employees, shifts: weekShifts() }, SAMPLE_WEEK_ID, {}, {
      logger: silentLogger,
    });
    expect(schedule).toEqual(
      buildWeekSchedule(sampleInput(), SAMPLE_WEEK_ID, {}, { logger: silentLogger }),
    );
  });

  it("should reject employees and shifts that fail their schemas", () => {
    const employees = sampleEmployees();
    const input = {
      employees: [{ ...employees[0], skills: { coffee: 11 } }, ...employees.slice(1)],
      shifts: [{ ...weekShifts()[0], date: "24/11/2025" }, ...weekShifts().slice(1)],
    };

    let caught: unknown;
    try {
      buildWeekSchedule(input, SAMPLE_WEEK_ID, {}, { logger: silentLogger });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(InputIntegrityError);
    const lines = caught instanceof Error ? caught.message.split("\n") : [];
    expect(lines[0]).toBe("Invalid roster input");
    expect(lines.slice(1).map((line) => line.split(":")[0])).toEqual([
      "  - employees.0.skills.coffee",
      "  - shifts.0.date",
    ]);
  });

  it("should surface configuration errors", () => {
    expect(() =>
      buildWeekSchedule(sampleInput(), SAMPLE_WEEK_ID, { timezone: "Nowhere/Atlantis" }, {
        logger: silentLogger,
      }),
    ).toThrow(ConfigurationError);
  });
});
