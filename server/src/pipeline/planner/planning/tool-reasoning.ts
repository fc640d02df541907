/**
 * Planner Phase 2: Tool Reasoning
 *
 * Maps each requirement to one registered tool and appends the resulting
 * PENDING steps. The batch is all-or-nothing: one bad selection and no
 * step is appended.
 */

import { z } from "zod";
import { createPlanLogger } from "../../../logging.js";
import { ReasoningError, ValidationError } from "../../../errors.js";
import { generateToolCatalog } from "../../../tools/catalog.js";
import { appendPendingSteps, type NewStep } from "../plan.js";
import { buildProgressSummary } from "./plan-context.js";
import type { LlmGateway } from "../../../llm/gateway.js";
import type { ToolRegistry } from "../../../tools/registry.js";
import type { Plan, PlanStep, Requirement } from "../types.js";

const parameterValue = z.union([z.string(), z.number(), z.boolean()]).transform(v => String(v));

const selectionsReplySchema = z.object({
  selections: z.array(z.object({
    toolName: z.string(),
    reasoning: z.string().default(""),
    parameters: z.record(parameterValue).default({}),
  })),
});

/**
 * Step instruction: the requirement, then one "key: value" line per parameter.
 */
export function buildStepInstruction(description: string, parameters: Record<string, string>): string {
  const lines = Object.entries(parameters).map(([key, value]) => `${key}: ${value}`);
  return lines.length > 0 ? `${description}\n${lines.join("\n")}` : description;
}

export async function reasonToolSteps(
  gateway: LlmGateway,
  registry: ToolRegistry,
  plan: Plan,
  requirements: readonly Requirement[],
  signal?: AbortSignal,
): Promise<PlanStep[]> {
  if (requirements.length === 0) return [];

  const log = createPlanLogger("tool-reasoning", plan.correlationId, plan.id);

  const { result } = await gateway.callLlm({
    promptType: "TOOL_REASONING",
    responseSchema: selectionsReplySchema,
    correlationId: plan.correlationId,
    quick: plan.quick,
    backgroundMode: plan.backgroundMode,
    mappingValue: {
      "Task": plan.normalizedInstruction || plan.taskInstruction,
      "Requirements": requirements.map((r, i) => `${i + 1}. ${r.description}`).join("\n"),
      "Tool Catalog": generateToolCatalog(registry.describeTools()),
      "Progress Summary": buildProgressSummary(plan),
    },
    signal,
  });

  const selections = result.selections;
  if (selections.length !== requirements.length) {
    throw new ReasoningError(
      `Tool reasoning returned ${selections.length} selections for ${requirements.length} requirements`,
    );
  }

  const newSteps: NewStep[] = [];
  const unresolved: string[] = [];
  selections.forEach((selection, index) => {
    const resolved = registry.resolveToolName(selection.toolName);
    if (!resolved.ok) {
      unresolved.push(`#${index + 1}: ${resolved.error.message}`);
      return;
    }
    log.debug("Tool selected", {
      requirement: index + 1,
      tool: resolved.tool.name,
      reasoning: selection.reasoning,
    });
    newSteps.push({
      toolName: resolved.tool.name,
      instruction: buildStepInstruction(requirements[index].description, selection.parameters),
      parameters: selection.parameters,
    });
  });

  if (unresolved.length > 0) {
    log.warn("Tool reasoning rejected", { unresolved });
    throw new ValidationError(`Tool reasoning selected unusable tools: ${unresolved.join("; ")}`);
  }

  const appended = appendPendingSteps(plan, newSteps);
  log.info("Steps appended", {
    count: appended.length,
    orders: appended.map(s => s.order),
  });
  return appended;
}
