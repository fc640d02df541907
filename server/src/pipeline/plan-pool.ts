/**
 * Plan Worker Pool
 *
 * Runs plans in parallel up to a fixed limit; extra submissions wait in
 * FIFO order. Each plan is still driven by exactly one flow.
 */

import { createComponentLogger } from "../logging.js";
import { ConcurrencyLimiter } from "./concurrency.js";
import type { FinalizedOutcome, Plan } from "./planner/types.js";

const log = createComponentLogger("plan-pool");

export type PlanExecutor = (plan: Plan) => Promise<FinalizedOutcome>;

export class PlanWorkerPool {
  private readonly limiter: ConcurrencyLimiter;
  private readonly execute: PlanExecutor;

  constructor(maxConcurrent: number, execute: PlanExecutor) {
    this.limiter = new ConcurrencyLimiter(maxConcurrent);
    this.execute = execute;
  }

  submit(plan: Plan): Promise<FinalizedOutcome> {
    log.debug("Plan submitted", {
      planId: plan.id,
      active: this.limiter.activeCount,
      queued: this.limiter.queuedCount,
    });
    return this.limiter.run(() => this.execute(plan));
  }

  get activeCount(): number {
    return this.limiter.activeCount;
  }

  get queuedCount(): number {
    return this.limiter.queuedCount;
  }

  /** Wait for every submitted plan. Resolves false on timeout. */
  async drain(timeoutMs = 30_000): Promise<boolean> {
    const idle = await this.limiter.onIdle(timeoutMs);
    if (!idle) {
      log.warn("Plan pool drain timed out", { active: this.limiter.activeCount, queued: this.limiter.queuedCount });
    }
    return idle;
  }
}
