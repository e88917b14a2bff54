import { BaseRoleScheduler } from "./base.js";

/**
 * Fills MANAGER slots from MANAGER employees: one per weekday and two per
 * weekend day under the default requirements.
 */
export class ManagerScheduler extends BaseRoleScheduler {
  readonly role = "MANAGER" as const;
}
