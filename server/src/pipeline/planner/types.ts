/**
 * Planner: Types
 *
 * Data structures for the plan execution engine. A Plan is the ordered list
 * of tool invocations for one task; the planner grows it round by round and
 * the runner drives every step to a terminal state.
 */

import type { ToolIdentifier, ToolResult } from "../../tools/types.js";

// ============================================
// STATUSES
// ============================================

export const PLAN_STATUSES = ["RUNNING", "COMPLETED", "FAILED", "FINALIZED"] as const;
export type PlanStatus = typeof PLAN_STATUSES[number];

export const STEP_STATUSES = ["PENDING", "RUNNING", "DONE", "FAILED"] as const;
export type StepStatus = typeof STEP_STATUSES[number];

// ============================================
// PLAN STEP
// ============================================

export interface PlanStep {
  id: string;
  /** Zero-based position; always equals the index in `plan.steps` */
  order: number;
  stepToolName: ToolIdentifier;
  /** Free text for the tool (requirement description plus parameter lines) */
  stepInstruction: string;
  /** Parameters chosen during tool reasoning */
  parameters?: Record<string, string>;
  status: StepStatus;
  toolResult?: ToolResult;
}

// ============================================
// PLAN
// ============================================

export interface WorkspaceScope {
  clientName: string;
  clientDescription?: string;
  projectName?: string;
  projectDescription?: string;
}

export interface Plan {
  id: string;
  /** Trace key threaded through every LLM call, tool call and log line */
  correlationId: string;
  /** The task exactly as submitted */
  taskInstruction: string;
  /** English restatement produced by intake */
  normalizedInstruction: string;
  originalLanguage: string;
  quick: boolean;
  backgroundMode: boolean;
  workspace: WorkspaceScope;
  questionChecklist: string[];
  initialKnowledgeQueries: string[];
  steps: PlanStep[];
  finalAnswer?: string;
  status: PlanStatus;
  failureReason?: string;
  createdAt: string;
  updatedAt: string;
}

// ============================================
// PHASE I/O
// ============================================

/** Output of the planner: WHAT still needs doing, in order. */
export interface Requirement {
  description: string;
}

/** Output of tool reasoning: one per requirement, positional. */
export interface ToolSelection {
  toolName: string;
  reasoning: string;
  parameters: Record<string, string>;
}

/** Submitted task before intake. */
export interface TaskInput {
  instruction: string;
  quick?: boolean;
  backgroundMode?: boolean;
  workspace?: WorkspaceScope;
  /** Reuse an upstream trace key instead of minting one */
  correlationId?: string;
}

/** Result of task intake. */
export interface TaskIntake {
  originalLanguage: string;
  normalizedInstruction: string;
  questionChecklist: string[];
  initialKnowledgeQueries: string[];
}

/** What callers get back once a plan has been finalized. */
export interface FinalizedOutcome {
  planId: string;
  correlationId: string;
  /** Status the plan reached before finalization */
  outcome: "COMPLETED" | "FAILED";
  failureReason?: string;
  answer: string;
  /** "Question: ...\nAnswer: ..." */
  message: string;
}
