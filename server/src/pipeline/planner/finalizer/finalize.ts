/**
 * Finalizer
 *
 * Produces the user-facing answer once a plan has stopped (COMPLETED or
 * FAILED), moves it to FINALIZED and renders the Question/Answer message.
 * Idempotent: a plan that already has an answer is never sent to the LLM
 * again.
 */

import { z } from "zod";
import { createPlanLogger } from "../../../logging.js";
import { completedSteps, failedSteps, transitionPlan } from "../plan.js";
import {
  buildCompletedTranscript,
  buildFailedTranscript,
  formatChecklist,
  formatWorkspace,
} from "../planning/plan-context.js";
import type { LlmGateway } from "../../../llm/gateway.js";
import type { Plan } from "../types.js";

const answerReplySchema = z.object({
  answer: z.string(),
});

/**
 * "Question: <instruction>" (omitted when the instruction is blank), then "Answer: <answer>".
 */
export function renderFinalMessage(plan: Plan, answer: string): string {
  const question = plan.taskInstruction.trim();
  const lines: string[] = [];
  if (question !== "") lines.push(`Question: ${question}`);
  lines.push(`Answer: ${answer}`);
  return lines.join("\n");
}

/**
 * Used when the model replies with nothing: says what the plan did.
 */
export function fallbackAnswer(plan: Plan): string {
  const done = completedSteps(plan);
  const failed = failedSteps(plan);

  if (plan.steps.length === 0) {
    return plan.failureReason
      ? `No answer could be produced: ${plan.failureReason}`
      : "No answer could be produced: no steps were executed for this task.";
  }

  const parts = [`No final answer could be composed. ${done.length} of ${plan.steps.length} steps completed.`];
  const lastDone = done[done.length - 1];
  if (lastDone?.toolResult) {
    parts.push(`Last result: ${lastDone.toolResult.summary}.`);
  }
  if (failed.length > 0) {
    const reasons = failed.map(s => s.toolResult?.errorMessage ?? s.toolResult?.summary ?? "unknown error");
    parts.push(`Failures: ${reasons.join("; ")}.`);
  }
  if (plan.failureReason) {
    parts.push(`Plan stopped: ${plan.failureReason}.`);
  }
  return parts.join(" ");
}

export async function finalizePlan(
  gateway: LlmGateway,
  plan: Plan,
  signal?: AbortSignal,
): Promise<string> {
  if (plan.finalAnswer !== undefined) {
    return renderFinalMessage(plan, plan.finalAnswer);
  }

  const log = createPlanLogger("finalizer", plan.correlationId, plan.id);

  const { result } = await gateway.callLlm({
    promptType: "FINALIZER_ANSWER",
    responseSchema: answerReplySchema,
    correlationId: plan.correlationId,
    quick: plan.quick,
    backgroundMode: plan.backgroundMode,
    outputLanguage: plan.originalLanguage || undefined,
    mappingValue: {
      "Task": plan.taskInstruction,
      "Normalized Task": plan.normalizedInstruction,
      "Workspace": formatWorkspace(plan.workspace),
      "Question Checklist": formatChecklist(plan.questionChecklist),
      "Completed Steps": buildCompletedTranscript(plan),
      "Failed Steps": buildFailedTranscript(plan),
    },
    signal,
  });

  let answer = result.answer.trim();
  if (answer === "") {
    log.warn("Finalizer returned a blank answer, using step history");
    answer = fallbackAnswer(plan);
  }

  // A plan still RUNNING here was stopped from outside the runner
  if (plan.status === "RUNNING") {
    transitionPlan(plan, "COMPLETED");
  }
  plan.finalAnswer = answer;
  transitionPlan(plan, "FINALIZED");

  log.info("Plan finalized", { answerChars: answer.length, steps: plan.steps.length });
  return renderFinalMessage(plan, answer);
}
