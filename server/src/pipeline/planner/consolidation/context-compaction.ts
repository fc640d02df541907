/**
 * Context Compaction
 *
 * Keeps planning prompts inside the model's budget. When the rendered plan
 * grows past 90% of the budget the LLM picks ranges of finished steps to
 * merge, and each range goes through Step Consolidation.
 */

import { z } from "zod";
import { createPlanLogger } from "../../../logging.js";
import { consolidateSteps } from "./consolidate-steps.js";
import { isTerminalStep } from "../plan.js";
import { renderPlanForEstimate, formatStepHeading, truncate } from "../planning/plan-context.js";
import type { LlmGateway } from "../../../llm/gateway.js";
import type { Plan } from "../types.js";

export const MIN_STEPS_FOR_COMPACTION = 3;
export const SAFETY_MARGIN = 0.9;

const compactionReplySchema = z.object({
  compactionRanges: z.array(z.object({
    fromStep: z.number(),
    toStep: z.number(),
    summary: z.string(),
  })).default([]),
});

export interface CompactionRange {
  fromStep: number;
  toStep: number;
  summary: string;
}

export interface CompactionOutcome {
  needsCompaction: boolean;
  /** Over budget but too few steps to merge */
  cannotCompact: boolean;
  estimatedTokens: number;
  /** Ranges that were applied, highest first */
  applied: CompactionRange[];
  skipped: number;
}

/** Rough token estimate: four characters per token. */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

export function estimatePlanTokens(plan: Plan): number {
  return estimateTokens(renderPlanForEstimate(plan));
}

function renderStepHistory(plan: Plan): string {
  return plan.steps.map(step => {
    const result = step.toolResult;
    const output = result
      ? `${result.summary}${result.content ? `\n${truncate(result.content, 400)}` : ""}`
      : "(not run yet)";
    return `${formatStepHeading(step)} [${step.status}]\n${output}`;
  }).join("\n\n");
}

/**
 * Apply ranges highest-first so earlier indices stay valid. Ranges that fail
 * validation or include unfinished steps are skipped.
 */
export function applyCompactionRanges(
  plan: Plan,
  ranges: readonly CompactionRange[],
): { applied: CompactionRange[]; skipped: CompactionRange[] } {
  const log = createPlanLogger("compaction", plan.correlationId, plan.id);
  const applied: CompactionRange[] = [];
  const skipped: CompactionRange[] = [];

  const ordered = [...ranges].sort((a, b) => b.fromStep - a.fromStep);
  for (const range of ordered) {
    const covered = plan.steps.slice(Math.max(range.fromStep, 0), range.toStep + 1);
    if (covered.some(step => !isTerminalStep(step))) {
      log.warn("Skipping compaction range over unfinished steps", { ...range });
      skipped.push(range);
      continue;
    }

    const result = consolidateSteps(plan, range.fromStep, range.toStep, range.summary);
    if (!result.ok) {
      log.warn("Skipping invalid compaction range", { ...range, reason: result.error.message });
      skipped.push(range);
      continue;
    }
    applied.push(range);
  }

  return { applied, skipped };
}

export async function checkAndCompact(
  gateway: LlmGateway,
  plan: Plan,
  maxContextTokens: number,
  signal?: AbortSignal,
): Promise<CompactionOutcome> {
  const log = createPlanLogger("compaction", plan.correlationId, plan.id);
  const estimatedTokens = estimatePlanTokens(plan);
  const threshold = Math.floor(maxContextTokens * SAFETY_MARGIN);

  if (estimatedTokens <= threshold) {
    return { needsCompaction: false, cannotCompact: false, estimatedTokens, applied: [], skipped: 0 };
  }

  if (plan.steps.length <= MIN_STEPS_FOR_COMPACTION) {
    log.warn("Context over budget but too few steps to compact", {
      estimatedTokens,
      threshold,
      steps: plan.steps.length,
    });
    return { needsCompaction: true, cannotCompact: true, estimatedTokens, applied: [], skipped: 0 };
  }

  const { result } = await gateway.callLlm({
    promptType: "CONTEXT_COMPACTION",
    responseSchema: compactionReplySchema,
    correlationId: plan.correlationId,
    quick: plan.quick,
    backgroundMode: plan.backgroundMode,
    mappingValue: {
      "Task": plan.normalizedInstruction || plan.taskInstruction,
      "Step History": renderStepHistory(plan),
      "Token Budget": String(threshold),
      "Estimated Tokens": String(estimatedTokens),
    },
    signal,
  });

  const { applied, skipped } = applyCompactionRanges(plan, result.compactionRanges);
  log.info("Context compacted", {
    before: estimatedTokens,
    after: estimatePlanTokens(plan),
    applied: applied.length,
    skipped: skipped.length,
    steps: plan.steps.length,
  });

  return { needsCompaction: true, cannotCompact: false, estimatedTokens, applied, skipped: skipped.length };
}
