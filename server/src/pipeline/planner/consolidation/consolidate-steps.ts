/**
 * Step Consolidation
 *
 * Replaces a closed range of steps with one DONE summary step. Used by
 * context compaction to keep prompt history bounded. No LLM call: the
 * caller supplies the summary text.
 */

import { nanoid } from "nanoid";
import { ValidationError } from "../../../errors.js";
import { toolSuccess } from "../../../tools/tool-result.js";
import { renumberSteps } from "../plan.js";
import type { Plan, PlanStep } from "../types.js";

export const CONSOLIDATED_PREFIX = "CONSOLIDATED: ";

export type ConsolidationResult =
  | { ok: true; step: PlanStep }
  | { ok: false; error: ValidationError };

function reject(message: string): ConsolidationResult {
  return { ok: false, error: new ValidationError(message) };
}

/**
 * Collapse steps [from, to] (inclusive) into a single DONE step at `from`.
 * Invalid input leaves the plan untouched.
 */
export function consolidateSteps(
  plan: Plan,
  from: number,
  to: number,
  summaryText: string,
): ConsolidationResult {
  if (plan.status === "FINALIZED") {
    return reject(`Plan ${plan.id} is FINALIZED and cannot be modified`);
  }
  if (!Number.isInteger(from) || !Number.isInteger(to)) {
    return reject(`Consolidation bounds must be integers (got ${from}..${to})`);
  }
  if (from < 0) {
    return reject(`Consolidation start ${from} is negative`);
  }
  if (to < from) {
    return reject(`Consolidation end ${to} is before start ${from}`);
  }
  if (to >= plan.steps.length) {
    return reject(`Consolidation end ${to} is out of range (plan has ${plan.steps.length} steps)`);
  }
  const summary = summaryText.trim();
  if (summary === "") {
    return reject("Consolidation summary is blank");
  }

  const count = to - from + 1;
  const consolidated: PlanStep = {
    id: nanoid(),
    order: from,
    stepToolName: "CONSOLIDATE_STEPS",
    stepInstruction: CONSOLIDATED_PREFIX + summary,
    status: "DONE",
    toolResult: toolSuccess("CONSOLIDATE_STEPS", `Consolidated ${count} steps`, summary),
  };

  plan.steps.splice(from, count, consolidated);
  renumberSteps(plan);
  plan.updatedAt = new Date().toISOString();

  return { ok: true, step: consolidated };
}
