import type { RoleScheduler } from "./base.js";
import { CohortScheduler } from "./cohort.js";
import { ManagerScheduler } from "./manager.js";
import { SandwichScheduler } from "./sandwich.js";

export {
  BaseRoleScheduler,
  type DayPlan,
  type RoleScheduleResult,
  type RoleScheduler,
  type SchedulerContext,
} from "./base.js";
export { CohortScheduler } from "./cohort.js";
export { ManagerScheduler } from "./manager.js";
export { SandwichScheduler } from "./sandwich.js";

/**
 * One scheduler per role.
 */
export function createDefaultSchedulers(): RoleScheduler[] {
  return [
    new ManagerScheduler(),
    new SandwichScheduler(),
    new CohortScheduler("BARISTA"),
    new CohortScheduler("WAITER"),
  ];
}
