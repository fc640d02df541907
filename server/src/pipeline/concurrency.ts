/**
 * Concurrency Limiter
 *
 * FIFO admission with a fixed number of slots. A finished job hands its
 * slot straight to the next waiter, so queued work starts in submit order.
 */

import { ValidationError } from "../errors.js";

export class ConcurrencyLimiter {
  private active = 0;
  private readonly waiting: Array<() => void> = [];
  private idleWaiters: Array<() => void> = [];

  constructor(private readonly maxConcurrent: number) {
    if (!Number.isInteger(maxConcurrent) || maxConcurrent < 1) {
      throw new ValidationError(`maxConcurrent must be a positive integer (got ${maxConcurrent})`);
    }
  }

  get activeCount(): number {
    return this.active;
  }

  get queuedCount(): number {
    return this.waiting.length;
  }

  async run<T>(job: () => Promise<T>): Promise<T> {
    if (this.active < this.maxConcurrent) {
      this.active++;
    } else {
      // Slot is transferred by release(); `active` already counts it
      await new Promise<void>(resolve => this.waiting.push(resolve));
    }

    try {
      return await job();
    } finally {
      this.release();
    }
  }

  private release(): void {
    const next = this.waiting.shift();
    if (next) {
      next();
      return;
    }
    this.active--;
    if (this.active === 0) {
      const waiters = this.idleWaiters;
      this.idleWaiters = [];
      for (const resolve of waiters) resolve();
    }
  }

  /**
   * Resolves true once nothing is running or queued, false if `timeoutMs`
   * passes first.
   */
  onIdle(timeoutMs: number): Promise<boolean> {
    if (this.active === 0) return Promise.resolve(true);

    return new Promise<boolean>(resolve => {
      const timer = setTimeout(() => {
        this.idleWaiters = this.idleWaiters.filter(w => w !== onIdle);
        resolve(false);
      }, timeoutMs);
      const onIdle = () => {
        clearTimeout(timer);
        resolve(true);
      };
      this.idleWaiters.push(onIdle);
    });
  }
}
