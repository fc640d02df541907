/**
 * Background Work Queue
 *
 * Bounded fire-and-forget execution for work tools hand off (indexing,
 * notifications). A failure is logged as a BackgroundTaskError and
 * counted; it never reaches the plan that enqueued it.
 */

import { createPlanLogger, createComponentLogger } from "../logging.js";
import { BackgroundTaskError, errorMessage } from "../errors.js";
import { ConcurrencyLimiter } from "./concurrency.js";
import type { BackgroundScheduler } from "../tools/types.js";

const log = createComponentLogger("background");

export interface BackgroundQueueStats {
  active: number;
  queued: number;
  completed: number;
  failed: number;
  rejected: number;
}

export class BackgroundWorkQueue implements BackgroundScheduler {
  private readonly limiter: ConcurrencyLimiter;
  private accepting = true;
  private completed = 0;
  private failed = 0;
  private rejected = 0;

  constructor(maxConcurrent: number) {
    this.limiter = new ConcurrencyLimiter(maxConcurrent);
  }

  enqueue(label: string, correlationId: string, work: () => Promise<void>): boolean {
    const jobLog = createPlanLogger("background", correlationId);

    if (!this.accepting) {
      this.rejected++;
      jobLog.warn("Background work rejected after shutdown", { label });
      return false;
    }

    jobLog.debug("Background work queued", { label, queued: this.limiter.queuedCount });

    // Counters settle inside the slot, so drain() observes them
    void this.limiter.run(async () => {
      try {
        await work();
        this.completed++;
        jobLog.debug("Background work done", { label });
      } catch (error) {
        this.failed++;
        const failure = new BackgroundTaskError(label, errorMessage(error), { cause: error });
        jobLog.error("Background work failed", failure, { label });
      }
    });
    return true;
  }

  /** Wait for running and queued work. Resolves false on timeout. */
  async drain(timeoutMs = 30_000): Promise<boolean> {
    const idle = await this.limiter.onIdle(timeoutMs);
    if (!idle) {
      log.warn("Background drain timed out", { remaining: this.limiter.activeCount + this.limiter.queuedCount });
    }
    return idle;
  }

  /** Stop accepting work, then drain. */
  async shutdown(timeoutMs = 30_000): Promise<boolean> {
    this.accepting = false;
    const drained = await this.drain(timeoutMs);
    log.info("Background queue shut down", { ...this.stats(), drained });
    return drained;
  }

  stats(): BackgroundQueueStats {
    return {
      active: this.limiter.activeCount,
      queued: this.limiter.queuedCount,
      completed: this.completed,
      failed: this.failed,
      rejected: this.rejected,
    };
  }
}
