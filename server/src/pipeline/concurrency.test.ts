/**
 * Concurrency Tests
 *
 * Covers the limiter shared by the plan pool and the background queue:
 * - Slot limit and FIFO admission
 * - Slots freed on failure
 * - Idle detection with timeout
 * - Background queue counters and shutdown
 */

import { describe, it, expect } from "vitest";
import { ConcurrencyLimiter } from "./concurrency.js";
import { BackgroundWorkQueue } from "./background-queue.js";
import { PlanWorkerPool } from "./plan-pool.js";
import { ValidationError } from "../errors.js";
import { makePlan } from "../testing/index.js";
import type { FinalizedOutcome } from "./planner/types.js";

interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
}

function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>(r => { resolve = r; });
  return { promise, resolve };
}

const flush = () => new Promise<void>(resolve => setTimeout(resolve, 0));

// ============================================
// LIMITER
// ============================================

describe("ConcurrencyLimiter", () => {
  it("rejects a non-positive limit", () => {
    expect(() => new ConcurrencyLimiter(0)).toThrow(ValidationError);
  });

  it("never runs more than the limit and admits waiters in order", async () => {
    const limiter = new ConcurrencyLimiter(2);
    const gates = [deferred<void>(), deferred<void>(), deferred<void>(), deferred<void>()];
    const started: number[] = [];

    const runs = gates.map((gate, i) => limiter.run(async () => {
      started.push(i);
      await gate.promise;
      return i;
    }));

    expect(started).toEqual([0, 1]);
    expect(limiter.activeCount).toBe(2);
    expect(limiter.queuedCount).toBe(2);

    gates[1].resolve();
    await flush();
    expect(started).toEqual([0, 1, 2]);
    expect(limiter.activeCount).toBe(2);

    gates[0].resolve();
    gates[2].resolve();
    gates[3].resolve();
    expect(await Promise.all(runs)).toEqual([0, 1, 2, 3]);
    expect(started).toEqual([0, 1, 2, 3]);
    expect(limiter.activeCount).toBe(0);
  });

  it("frees the slot when a job throws", async () => {
    const limiter = new ConcurrencyLimiter(1);
    await expect(limiter.run(async () => { throw new Error("boom"); })).rejects.toThrow("boom");
    expect(await limiter.run(async () => "next")).toBe("next");
    expect(limiter.activeCount).toBe(0);
  });

  it("reports idle immediately, or false after the timeout", async () => {
    const limiter = new ConcurrencyLimiter(1);
    expect(await limiter.onIdle(10)).toBe(true);

    const gate = deferred<void>();
    const running = limiter.run(() => gate.promise);
    expect(await limiter.onIdle(10)).toBe(false);

    const idle = limiter.onIdle(1_000);
    gate.resolve();
    await running;
    expect(await idle).toBe(true);
  });
});

// ============================================
// BACKGROUND QUEUE
// ============================================

describe("BackgroundWorkQueue", () => {
  it("counts completed and failed work without surfacing errors", async () => {
    const queue = new BackgroundWorkQueue(2);
    const done: string[] = [];

    expect(queue.enqueue("index", "corr-1", async () => { done.push("index"); })).toBe(true);
    expect(queue.enqueue("notify", "corr-1", async () => { throw new Error("smtp down"); })).toBe(true);

    expect(await queue.drain(1_000)).toBe(true);
    expect(done).toEqual(["index"]);
    expect(queue.stats()).toEqual({ active: 0, queued: 0, completed: 1, failed: 1, rejected: 0 });
  });

  it("rejects work after shutdown", async () => {
    const queue = new BackgroundWorkQueue(1);
    expect(await queue.shutdown(1_000)).toBe(true);
    expect(queue.enqueue("late", "corr-2", async () => {})).toBe(false);
    expect(queue.stats().rejected).toBe(1);
  });
});

// ============================================
// PLAN POOL
// ============================================

describe("PlanWorkerPool", () => {
  it("queues plans beyond the limit", async () => {
    const gate = deferred<void>();
    const executed: string[] = [];
    const pool = new PlanWorkerPool(1, async plan => {
      executed.push(plan.id);
      await gate.promise;
      const outcome: FinalizedOutcome = {
        planId: plan.id,
        correlationId: plan.correlationId,
        outcome: "COMPLETED",
        answer: "ok",
        message: "Answer: ok",
      };
      return outcome;
    });

    const first = pool.submit(makePlan({ id: "p1" }));
    const second = pool.submit(makePlan({ id: "p2" }));
    expect(executed).toEqual(["p1"]);
    expect(pool.queuedCount).toBe(1);

    gate.resolve();
    expect((await first).planId).toBe("p1");
    expect((await second).planId).toBe("p2");
    expect(await pool.drain(1_000)).toBe(true);
  });
});
