/**
 * Seeds a fresh plan with KNOWLEDGE_SEARCH steps for the intake's
 * initial queries, so the first planning round already sees what
 * stored knowledge says.
 */

import { appendPendingSteps } from "../plan.js";
import { buildStepInstruction } from "../planning/tool-reasoning.js";
import type { ToolRegistry } from "../../../tools/registry.js";
import type { Plan, PlanStep } from "../types.js";

export function seedKnowledgeSteps(plan: Plan, registry: ToolRegistry): PlanStep[] {
  if (!registry.has("KNOWLEDGE_SEARCH") || plan.initialKnowledgeQueries.length === 0) {
    return [];
  }
  return appendPendingSteps(plan, plan.initialKnowledgeQueries.map(query => {
    const parameters = { query };
    return {
      toolName: "KNOWLEDGE_SEARCH" as const,
      instruction: buildStepInstruction("Search stored knowledge", parameters),
      parameters,
    };
  }));
}
