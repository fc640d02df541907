/**
 * ANALYSIS_REASONING: built-in legacy tool
 *
 * Lets the plan reason over what earlier steps gathered without touching
 * the outside world. Backed by the LLM gateway.
 */

import { z } from "zod";
import { toolSuccess } from "../tool-result.js";
import type { LegacyTool } from "../types.js";
import type { LlmGateway } from "../../llm/gateway.js";

const analysisReplySchema = z.object({
  summary: z.string().min(1),
  content: z.string(),
});

export function createAnalysisReasoningTool(gateway: LlmGateway): LegacyTool {
  return {
    kind: "legacy",
    name: "ANALYSIS_REASONING",
    category: "reasoning",
    description: "Reason over results gathered so far: compare, summarize, decide or draft text. Uses no external systems.",
    descriptionObject: { focus: "what to analyze or decide" },

    async execute(plan, taskDescription, stepContext, ctx) {
      const { result } = await gateway.callLlm({
        promptType: "ANALYSIS_REASONING",
        responseSchema: analysisReplySchema,
        correlationId: ctx.correlationId,
        quick: ctx.quick,
        backgroundMode: ctx.backgroundMode,
        mappingValue: {
          "Task": plan.normalizedInstruction || plan.taskInstruction,
          "Instruction": taskDescription,
          "Step Context": stepContext || "(nothing gathered yet)",
        },
        signal: ctx.signal,
      });
      return toolSuccess("ANALYSIS_REASONING", result.summary, result.content);
    },
  };
}
