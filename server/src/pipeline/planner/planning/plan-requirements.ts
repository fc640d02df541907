/**
 * Planner Phase 1: Requirements
 *
 * Describes WHAT still needs to happen for the task, without choosing
 * tools. An empty list is the only completion signal.
 */

import { z } from "zod";
import { createPlanLogger } from "../../../logging.js";
import { generateCapabilitySummary } from "../../../tools/catalog.js";
import { buildPlanContext, formatChecklist, formatWorkspace } from "./plan-context.js";
import type { LlmGateway } from "../../../llm/gateway.js";
import type { ToolRegistry } from "../../../tools/registry.js";
import type { Plan, Requirement } from "../types.js";

const requirementsReplySchema = z.object({
  requirements: z.array(z.object({
    // A blank entry is malformed output, not a shorter list
    description: z.string().trim().min(1),
  })),
});

export async function planRequirements(
  gateway: LlmGateway,
  registry: ToolRegistry,
  plan: Plan,
  signal?: AbortSignal,
): Promise<Requirement[]> {
  const log = createPlanLogger("planner", plan.correlationId, plan.id);

  const { result } = await gateway.callLlm({
    promptType: "PLANNING_REQUIREMENTS",
    responseSchema: requirementsReplySchema,
    correlationId: plan.correlationId,
    quick: plan.quick,
    backgroundMode: plan.backgroundMode,
    mappingValue: {
      "Task": plan.taskInstruction,
      "Normalized Task": plan.normalizedInstruction,
      "Workspace": formatWorkspace(plan.workspace),
      "Question Checklist": formatChecklist(plan.questionChecklist),
      "Tool Summary": generateCapabilitySummary(registry.describeTools()),
      "Plan Context": buildPlanContext(plan),
    },
    signal,
  });

  const requirements = result.requirements.map(r => ({ description: r.description }));

  log.info("Requirements generated", {
    count: requirements.length,
    steps: plan.steps.length,
  });

  return requirements;
}
