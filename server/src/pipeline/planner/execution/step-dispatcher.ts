/**
 * Step Dispatcher
 *
 * Runs one PENDING step through the registry and records the outcome.
 * Tool failures end the step, never the plan.
 */

import { ToolExecutionError } from "../../../errors.js";
import { transitionStep } from "../plan.js";
import { buildCompletedTranscript } from "../planning/plan-context.js";
import type { ToolRegistry } from "../../../tools/registry.js";
import type { ToolExecutionContext, ToolResult } from "../../../tools/types.js";
import type { Plan, PlanStep } from "../types.js";

export async function dispatchStep(
  registry: ToolRegistry,
  plan: Plan,
  step: PlanStep,
  ctx: ToolExecutionContext,
): Promise<ToolResult> {
  transitionStep(plan, step, "RUNNING");
  ctx.log.debug("Dispatching step", { order: step.order, tool: step.stepToolName });

  const startedAt = Date.now();
  const result = await registry.execute(
    step.stepToolName,
    plan,
    {
      instruction: step.stepInstruction,
      parameters: step.parameters ?? {},
      stepContext: buildCompletedTranscript(plan),
    },
    ctx,
  );
  const durationMs = Date.now() - startedAt;

  if (result.success) {
    transitionStep(plan, step, "DONE", result);
    ctx.log.info("Step done", { order: step.order, tool: step.stepToolName, durationMs, summary: result.summary });
  } else {
    transitionStep(plan, step, "FAILED", result);
    const failure = new ToolExecutionError(step.stepToolName, result.errorMessage ?? result.summary);
    ctx.log.warn("Step failed", { order: step.order, tool: step.stepToolName, durationMs, error: failure });
  }

  return result;
}
