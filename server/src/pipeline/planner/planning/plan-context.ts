/**
 * Plan Context Rendering
 *
 * Turns a Plan into the text blocks the planner, tool reasoning, finalizer
 * and legacy tools read. Everything here is pure string building.
 */

import { completedSteps, failedSteps, pendingSteps } from "../plan.js";
import type { Plan, PlanStep, WorkspaceScope } from "../types.js";

/** Max characters of a step's output carried into prompts */
const STEP_OUTPUT_LIMIT = 1_500;

/** Completed steps shown in the tool-reasoning progress summary */
const RECENT_COMPLETED = 3;

export function truncate(text: string, limit: number): string {
  return text.length > limit ? text.substring(0, limit) + "…" : text;
}

export function formatWorkspace(workspace: WorkspaceScope): string {
  const lines = [`Client: ${workspace.clientName}`];
  if (workspace.clientDescription) lines.push(`Client description: ${workspace.clientDescription}`);
  if (workspace.projectName) lines.push(`Project: ${workspace.projectName}`);
  if (workspace.projectDescription) lines.push(`Project description: ${workspace.projectDescription}`);
  return lines.join("\n");
}

export function formatChecklist(questions: readonly string[]): string {
  if (questions.length === 0) return "(none)";
  return questions.map(q => `- ${q}`).join("\n");
}

function firstLine(text: string): string {
  return text.split("\n", 1)[0];
}

/** "[2] KNOWLEDGE_SEARCH: find release notes" */
export function formatStepHeading(step: PlanStep): string {
  return `[${step.order}] ${step.stepToolName}: ${firstLine(step.stepInstruction)}`;
}

/**
 * COMPLETED / FAILED / PENDING sections for the planner.
 */
export function buildPlanContext(plan: Plan): string {
  if (plan.steps.length === 0) return "No steps yet.";

  const sections: string[] = [];
  const done = completedSteps(plan);
  const failed = failedSteps(plan);
  const open = plan.steps.filter(s => s.status === "PENDING" || s.status === "RUNNING");

  if (done.length > 0) {
    sections.push("COMPLETED:\n" + done.map(s => {
      const summary = s.toolResult?.summary ?? "";
      return `${formatStepHeading(s)}\n  → ${summary}`;
    }).join("\n"));
  }
  if (failed.length > 0) {
    sections.push("FAILED:\n" + failed.map(s => {
      const reason = s.toolResult?.errorMessage ?? s.toolResult?.summary ?? "unknown error";
      return `${formatStepHeading(s)}\n  ✗ ${reason}`;
    }).join("\n"));
  }
  if (open.length > 0) {
    sections.push("PENDING:\n" + open.map(formatStepHeading).join("\n"));
  }

  return sections.join("\n\n");
}

/**
 * Compact summary for tool reasoning: counts plus the last few completed steps.
 */
export function buildProgressSummary(plan: Plan): string {
  const total = plan.steps.length;
  const done = completedSteps(plan);
  const failed = failedSteps(plan).length;
  const pending = pendingSteps(plan).length;

  const lines = [`Progress: ${done.length}/${total} steps completed (${failed} failed, ${pending} pending)`];
  const recent = done.slice(-RECENT_COMPLETED);
  if (recent.length > 0) {
    lines.push("Recently completed:");
    for (const step of recent) {
      lines.push(`- ${step.stepToolName}: ${step.toolResult?.summary ?? ""}`);
    }
  }
  return lines.join("\n");
}

/**
 * Digest of finished steps handed to legacy tools and to the finalizer.
 */
export function buildCompletedTranscript(plan: Plan): string {
  const done = completedSteps(plan);
  if (done.length === 0) return "(none)";
  return done.map(s => {
    const output = s.toolResult?.content || s.toolResult?.summary || "";
    return `${formatStepHeading(s)}\n${truncate(output, STEP_OUTPUT_LIMIT)}`;
  }).join("\n\n");
}

export function buildFailedTranscript(plan: Plan): string {
  const failed = failedSteps(plan);
  if (failed.length === 0) return "(none)";
  return failed.map(s => {
    const error = s.toolResult?.errorMessage ?? s.toolResult?.summary ?? "unknown error";
    return `${formatStepHeading(s)}\nError: ${error}`;
  }).join("\n\n");
}

/**
 * Everything that goes into a planning prompt, used to estimate its size.
 */
export function renderPlanForEstimate(plan: Plan): string {
  return [
    plan.taskInstruction,
    plan.normalizedInstruction,
    formatWorkspace(plan.workspace),
    formatChecklist(plan.questionChecklist),
    buildPlanContext(plan),
    buildCompletedTranscript(plan),
  ].join("\n");
}
