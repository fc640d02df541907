/**
 * Plan Runner: the single driving flow for one plan
 *
 * Loop per planning round:
 *   1. Dispatch every PENDING step in order (failures stay on the step)
 *   2. Compact history if the prompt context is over budget
 *   3. Ask the planner what is still missing; nothing missing → COMPLETED
 *   4. Tool reasoning turns requirements into new PENDING steps
 *
 * Planning errors and an exhausted round budget mark the plan FAILED.
 * Either way the plan is finalized before the lease is released, and
 * the repository sees every mutation.
 */

import { createPlanLogger } from "../../../logging.js";
import { errorMessage } from "../../../errors.js";
import { transitionPlan } from "../plan.js";
import { dispatchStep } from "./step-dispatcher.js";
import { checkAndCompact, estimatePlanTokens, SAFETY_MARGIN } from "../consolidation/context-compaction.js";
import { planRequirements } from "../planning/plan-requirements.js";
import { reasonToolSteps } from "../planning/tool-reasoning.js";
import { finalizePlan } from "../finalizer/finalize.js";
import type { ILogger } from "@planloom/shared/logging";
import type { LlmGateway } from "../../../llm/gateway.js";
import type { ToolRegistry } from "../../../tools/registry.js";
import type { BackgroundScheduler } from "../../../tools/types.js";
import type { PlanRepository } from "../../../db/plan-repository.js";
import type { PlanLeaseRegistry } from "./plan-lease.js";
import type { FinalizedOutcome, Plan, PlanStatus } from "../types.js";

/** Compaction passes per planning round */
export const MAX_COMPACTION_PASSES = 3;

export interface PlanRunnerDeps {
  gateway: LlmGateway;
  registry: ToolRegistry;
  repository: PlanRepository;
  background: BackgroundScheduler;
  leases: PlanLeaseRegistry;
  maxPlanningRounds: number;
  maxContextTokens: number;
}

export interface RunOptions {
  signal?: AbortSignal;
}

/** A plan that arrives FINALIZED only has its recorded reason to go on. */
function outcomeOf(reached: PlanStatus, plan: Plan): FinalizedOutcome["outcome"] {
  if (reached === "FINALIZED") return plan.failureReason !== undefined ? "FAILED" : "COMPLETED";
  return reached === "FAILED" ? "FAILED" : "COMPLETED";
}

function abortReason(signal: AbortSignal): string {
  const reason: unknown = signal.reason;
  return `Aborted: ${reason instanceof Error ? reason.message : String(reason ?? "stopped")}`;
}

export class PlanRunner {
  private readonly deps: PlanRunnerDeps;

  constructor(deps: PlanRunnerDeps) {
    this.deps = deps;
  }

  /**
   * Drive `plan` to FINALIZED. Throws ValidationError if another flow owns
   * the plan; finalizer errors propagate after the plan has been saved.
   */
  async run(plan: Plan, options: RunOptions = {}): Promise<FinalizedOutcome> {
    const lease = this.deps.leases.acquire(plan.id, options.signal);
    const log = createPlanLogger("runner", plan.correlationId, plan.id);

    try {
      log.info("Plan started", { status: plan.status, steps: plan.steps.length, quick: plan.quick });

      if (plan.status === "RUNNING") {
        await this.drive(plan, lease.signal, log);
      }

      const outcome = outcomeOf(plan.status, plan);
      let message: string;
      try {
        message = await finalizePlan(this.deps.gateway, plan);
      } finally {
        await this.persist(plan);
      }

      log.info("Plan finished", {
        outcome,
        steps: plan.steps.length,
      });

      return {
        planId: plan.id,
        correlationId: plan.correlationId,
        outcome,
        failureReason: plan.failureReason,
        answer: plan.finalAnswer ?? "",
        message,
      };
    } finally {
      lease.release();
    }
  }

  // ============================================
  // PLANNING LOOP
  // ============================================

  private async drive(plan: Plan, signal: AbortSignal, log: ILogger): Promise<void> {
    const { gateway, registry, maxPlanningRounds } = this.deps;
    let rounds = 0;

    while (true) {
      try {
        await this.executePending(plan, signal, log);

        if (signal.aborted) {
          await this.fail(plan, abortReason(signal), log);
          return;
        }
        if (rounds >= maxPlanningRounds) {
          await this.fail(plan, `Planning did not finish within ${maxPlanningRounds} rounds`, log);
          return;
        }
        rounds++;

        await this.compactContext(plan, signal, log);

        const requirements = await planRequirements(gateway, registry, plan, signal);
        if (requirements.length === 0) {
          transitionPlan(plan, "COMPLETED");
          await this.persist(plan);
          log.info("Planner reported completion", { rounds, steps: plan.steps.length });
          return;
        }

        await reasonToolSteps(gateway, registry, plan, requirements, signal);
        await this.persist(plan);
      } catch (error) {
        const reason = signal.aborted ? abortReason(signal) : errorMessage(error);
        log.error("Planning round failed", error, { round: rounds });
        await this.fail(plan, reason, log);
        return;
      }
    }
  }

  /** Compacts until the plan fits, nothing more can merge, or the pass limit is hit. */
  private async compactContext(plan: Plan, signal: AbortSignal, log: ILogger): Promise<void> {
    const { gateway, maxContextTokens } = this.deps;

    for (let pass = 0; pass < MAX_COMPACTION_PASSES; pass++) {
      const compaction = await checkAndCompact(gateway, plan, maxContextTokens, signal);
      if (!compaction.needsCompaction) return;
      if (compaction.applied.length === 0) {
        log.warn("Plan context over budget and nothing could be compacted", {
          estimatedTokens: compaction.estimatedTokens,
          maxContextTokens,
          cannotCompact: compaction.cannotCompact,
          steps: plan.steps.length,
        });
        return;
      }
      await this.persist(plan);
    }

    const estimatedTokens = estimatePlanTokens(plan);
    if (estimatedTokens > Math.floor(maxContextTokens * SAFETY_MARGIN)) {
      log.warn("Plan context still over budget after compaction", {
        estimatedTokens,
        maxContextTokens,
        passes: MAX_COMPACTION_PASSES,
        steps: plan.steps.length,
      });
    }
  }

  private async executePending(plan: Plan, signal: AbortSignal, log: ILogger): Promise<void> {
    const ctx = {
      correlationId: plan.correlationId,
      quick: plan.quick,
      backgroundMode: plan.backgroundMode,
      log,
      background: this.deps.background,
      signal,
    };

    // Steps are kept in order, so the first PENDING one is always next
    for (let step = plan.steps.find(s => s.status === "PENDING"); step; step = plan.steps.find(s => s.status === "PENDING")) {
      if (signal.aborted) return;
      await dispatchStep(this.deps.registry, plan, step, ctx);
      await this.persist(plan);
    }
  }

  private async fail(plan: Plan, reason: string, log: ILogger): Promise<void> {
    transitionPlan(plan, "FAILED", reason);
    log.warn("Plan failed", { reason });
    await this.persist(plan);
  }

  private async persist(plan: Plan): Promise<void> {
    await this.deps.repository.save(plan);
  }
}
