/**
 * Plan: construction, step bookkeeping and state transitions
 *
 * Every mutation of a Plan goes through here so the invariants hold in
 * one place: step orders are always 0..n-1, transitions follow the state
 * machines and a FINALIZED plan is never touched again.
 */

import { nanoid } from "nanoid";
import { ValidationError } from "../../errors.js";
import type { ToolIdentifier, ToolResult } from "../../tools/types.js";
import type { Plan, PlanStatus, PlanStep, StepStatus, TaskInput, TaskIntake } from "./types.js";

// ============================================
// TRANSITION TABLES
// ============================================

const PLAN_TRANSITIONS: Record<PlanStatus, readonly PlanStatus[]> = {
  RUNNING: ["COMPLETED", "FAILED"],
  COMPLETED: ["FINALIZED"],
  FAILED: ["FINALIZED"],
  FINALIZED: [],
};

const STEP_TRANSITIONS: Record<StepStatus, readonly StepStatus[]> = {
  PENDING: ["RUNNING"],
  RUNNING: ["DONE", "FAILED"],
  DONE: [],
  FAILED: [],
};

export function isTerminalStep(step: PlanStep): boolean {
  return step.status === "DONE" || step.status === "FAILED";
}

// ============================================
// CONSTRUCTION
// ============================================

export function createPlan(input: TaskInput, intake: TaskIntake, now: Date = new Date()): Plan {
  const timestamp = now.toISOString();
  return {
    id: nanoid(),
    correlationId: input.correlationId ?? nanoid(),
    taskInstruction: input.instruction,
    normalizedInstruction: intake.normalizedInstruction,
    originalLanguage: intake.originalLanguage,
    quick: input.quick ?? false,
    backgroundMode: input.backgroundMode ?? false,
    workspace: input.workspace ?? { clientName: "default" },
    questionChecklist: [...intake.questionChecklist],
    initialKnowledgeQueries: [...intake.initialKnowledgeQueries],
    steps: [],
    status: "RUNNING",
    createdAt: timestamp,
    updatedAt: timestamp,
  };
}

// ============================================
// GUARDS
// ============================================

/** Throws unless the plan may still be mutated. */
export function assertMutable(plan: Plan): void {
  if (plan.status === "FINALIZED") {
    throw new ValidationError(`Plan ${plan.id} is FINALIZED and cannot be modified`);
  }
}

function touch(plan: Plan): void {
  plan.updatedAt = new Date().toISOString();
}

/** Reassigns orders 0..n-1 in array position. */
export function renumberSteps(plan: Plan): void {
  plan.steps.forEach((step, index) => {
    step.order = index;
  });
}

// ============================================
// STEP MUTATIONS
// ============================================

export interface NewStep {
  toolName: ToolIdentifier;
  instruction: string;
  parameters?: Record<string, string>;
}

/** Appends PENDING steps after the current last step. */
export function appendPendingSteps(plan: Plan, newSteps: readonly NewStep[]): PlanStep[] {
  assertMutable(plan);
  const base = plan.steps.length;
  const created = newSteps.map((s, index): PlanStep => ({
    id: nanoid(),
    order: base + index,
    stepToolName: s.toolName,
    stepInstruction: s.instruction,
    parameters: s.parameters,
    status: "PENDING",
  }));
  plan.steps.push(...created);
  touch(plan);
  return created;
}

export function transitionStep(plan: Plan, step: PlanStep, next: StepStatus, result?: ToolResult): void {
  assertMutable(plan);
  if (!STEP_TRANSITIONS[step.status].includes(next)) {
    throw new ValidationError(`Illegal step transition ${step.status} → ${next} (step ${step.order})`);
  }
  step.status = next;
  if (result) step.toolResult = result;
  touch(plan);
}

// ============================================
// PLAN MUTATIONS
// ============================================

export function transitionPlan(plan: Plan, next: PlanStatus, failureReason?: string): void {
  if (!PLAN_TRANSITIONS[plan.status].includes(next)) {
    throw new ValidationError(`Illegal plan transition ${plan.status} → ${next}`);
  }
  plan.status = next;
  if (next === "FAILED" && failureReason) plan.failureReason = failureReason;
  touch(plan);
}

export function pendingSteps(plan: Plan): PlanStep[] {
  return plan.steps.filter(s => s.status === "PENDING");
}

export function completedSteps(plan: Plan): PlanStep[] {
  return plan.steps.filter(s => s.status === "DONE");
}

export function failedSteps(plan: Plan): PlanStep[] {
  return plan.steps.filter(s => s.status === "FAILED");
}
