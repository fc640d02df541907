/**
 * Zod schema for stored plan documents. Rows are validated on read so a
 * hand-edited or older document fails loudly instead of leaking bad shapes.
 */

import { z } from "zod";
import { TOOL_IDENTIFIERS } from "../tools/types.js";
import { PLAN_STATUSES, STEP_STATUSES, type Plan } from "../pipeline/planner/types.js";

const toolResultSchema = z.object({
  success: z.boolean(),
  toolName: z.string(),
  summary: z.string(),
  content: z.string(),
  errorMessage: z.string().optional(),
});

const planStepSchema = z.object({
  id: z.string(),
  order: z.number().int(),
  stepToolName: z.enum(TOOL_IDENTIFIERS),
  stepInstruction: z.string(),
  parameters: z.record(z.string()).optional(),
  status: z.enum(STEP_STATUSES),
  toolResult: toolResultSchema.optional(),
});

export const planSchema = z.object({
  id: z.string(),
  correlationId: z.string(),
  taskInstruction: z.string(),
  normalizedInstruction: z.string(),
  originalLanguage: z.string(),
  quick: z.boolean(),
  backgroundMode: z.boolean(),
  workspace: z.object({
    clientName: z.string(),
    clientDescription: z.string().optional(),
    projectName: z.string().optional(),
    projectDescription: z.string().optional(),
  }),
  questionChecklist: z.array(z.string()),
  initialKnowledgeQueries: z.array(z.string()),
  steps: z.array(planStepSchema),
  finalAnswer: z.string().optional(),
  status: z.enum(PLAN_STATUSES),
  failureReason: z.string().optional(),
  createdAt: z.string(),
  updatedAt: z.string(),
}) satisfies z.ZodType<Plan, z.ZodTypeDef, unknown>;

export function parsePlanDocument(json: string): Plan {
  return planSchema.parse(JSON.parse(json));
}
