/**
 * Plan Leases: single-owner lock per plan id
 *
 * A plan is driven by exactly one flow at a time. The lease also owns the
 * plan's AbortController, so stopping a plan is a lookup by id.
 *
 * Lifecycle:
 *   acquire() → called when the runner starts
 *   release() → called when the runner finishes (success, fail or abort)
 */

import { ValidationError } from "../../../errors.js";
import { createComponentLogger } from "../../../logging.js";

const log = createComponentLogger("plan-lease");

export interface PlanLease {
  planId: string;
  /** Aborted by abort() or by the caller's own signal */
  signal: AbortSignal;
  release(): void;
}

export class PlanLeaseRegistry {
  private readonly leases = new Map<string, AbortController>();

  acquire(planId: string, external?: AbortSignal): PlanLease {
    if (this.leases.has(planId)) {
      throw new ValidationError(`Plan ${planId} is already being executed`);
    }

    const controller = new AbortController();
    const forward = () => controller.abort(external?.reason);
    if (external?.aborted) {
      controller.abort(external.reason);
    } else {
      external?.addEventListener("abort", forward, { once: true });
    }
    this.leases.set(planId, controller);

    let released = false;
    return {
      planId,
      signal: controller.signal,
      release: () => {
        if (released) return;
        released = true;
        external?.removeEventListener("abort", forward);
        this.leases.delete(planId);
      },
    };
  }

  isHeld(planId: string): boolean {
    return this.leases.has(planId);
  }

  /** Returns false if no flow currently owns the plan. */
  abort(planId: string, reason = "Aborted by request"): boolean {
    const controller = this.leases.get(planId);
    if (!controller) return false;
    controller.abort(new Error(reason));
    log.info("Plan abort requested", { planId, reason });
    return true;
  }

  get size(): number {
    return this.leases.size;
  }
}
