import { ConfigurationError } from "../../errors.js";
import { isCohortRole, type CohortRole, type Role } from "../../types.js";
import { BaseRoleScheduler } from "./base.js";

/**
 * Front-of-house scheduler for BARISTA or WAITER.
 *
 * Weekdays use one full window; weekends use two staggered windows, each
 * filled as an independent slot.
 *
 * @example
 * ```typescript
 * const baristas = new CohortScheduler("BARISTA");
 * ```
 */
export class CohortScheduler extends BaseRoleScheduler {
  readonly role: CohortRole;

  constructor(role: Role) {
    super();
    if (!isCohortRole(role)) {
      throw new ConfigurationError(`CohortScheduler only handles BARISTA and WAITER, got ${role}`);
    }
    this.role = role;
  }
}
