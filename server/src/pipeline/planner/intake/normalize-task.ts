/**
 * Task Intake: Normalization
 *
 * Detects the task's language, restates it in English and extracts the
 * questions the final answer must cover plus a few knowledge queries to
 * seed the plan with.
 */

import { z } from "zod";
import { createPlanLogger } from "../../../logging.js";
import { ValidationError } from "../../../errors.js";
import { formatWorkspace } from "../planning/plan-context.js";
import type { LlmGateway } from "../../../llm/gateway.js";
import type { TaskInput, TaskIntake } from "../types.js";

/** Seed queries kept from intake */
const MAX_INITIAL_QUERIES = 3;

const intakeReplySchema = z.object({
  originalLanguage: z.string().default("English"),
  normalizedInstruction: z.string().default(""),
  questionChecklist: z.array(z.string()).default([]),
  initialKnowledgeQueries: z.array(z.string()).default([]),
});

function cleanList(items: string[]): string[] {
  return items.map(i => i.trim()).filter(i => i !== "");
}

export async function normalizeTask(
  gateway: LlmGateway,
  input: TaskInput,
  correlationId: string,
  signal?: AbortSignal,
): Promise<TaskIntake> {
  const instruction = input.instruction.trim();
  if (instruction === "") {
    throw new ValidationError("Task instruction is blank");
  }

  const log = createPlanLogger("intake", correlationId);

  const { result } = await gateway.callLlm({
    promptType: "TASK_NORMALIZATION",
    responseSchema: intakeReplySchema,
    correlationId,
    quick: input.quick ?? false,
    backgroundMode: input.backgroundMode ?? false,
    mappingValue: {
      "Task": instruction,
      "Workspace": formatWorkspace(input.workspace ?? { clientName: "default" }),
    },
    signal,
  });

  const normalized = result.normalizedInstruction.trim();
  const intake: TaskIntake = {
    originalLanguage: result.originalLanguage.trim() || "English",
    // Blank restatement falls back to the task as submitted
    normalizedInstruction: normalized || instruction,
    questionChecklist: cleanList(result.questionChecklist),
    initialKnowledgeQueries: cleanList(result.initialKnowledgeQueries).slice(0, MAX_INITIAL_QUERIES),
  };

  log.info("Task normalized", {
    originalLanguage: intake.originalLanguage,
    questions: intake.questionChecklist.length,
    seedQueries: intake.initialKnowledgeQueries.length,
  });

  return intake;
}
