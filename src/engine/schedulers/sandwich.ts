import { BaseRoleScheduler } from "./base.js";

/**
 * Fills the early sandwich-prep window each day from SANDWICH employees.
 * The weekend window runs later than the weekday one.
 */
export class SandwichScheduler extends BaseRoleScheduler {
  readonly role = "SANDWICH" as const;
}
