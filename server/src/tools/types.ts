/**
 * Tool Types
 *
 * Core types for the tool registry: the closed identifier set, the uniform
 * result envelope and the two tool variants the dispatcher understands.
 */

import type { z } from "zod";
import type { ILogger } from "@planloom/shared/logging";
import type { Plan } from "../pipeline/planner/types.js";

// ============================================
// IDENTIFIERS
// ============================================

export const TOOL_IDENTIFIERS = [
  "KNOWLEDGE_SEARCH",
  "KNOWLEDGE_STORE",
  "DOCUMENT_FROM_WEB",
  "CODE_ANALYZE",
  "PROJECT_EXPLORE_STRUCTURE",
  "GIT_SYNC",
  "SYSTEM_EXECUTE_COMMAND",
  "ANALYSIS_REASONING",
  "SCHEDULE_TASK",
  "USER_TASK_CREATE",
  "CONSOLIDATE_STEPS",
] as const;

export type ToolIdentifier = typeof TOOL_IDENTIFIERS[number];

const IDENTIFIER_SET: ReadonlySet<string> = new Set(TOOL_IDENTIFIERS);

export function isToolIdentifier(value: string): value is ToolIdentifier {
  return IDENTIFIER_SET.has(value);
}

// ============================================
// RESULT ENVELOPE
// ============================================

export interface ToolResult {
  success: boolean;
  toolName: string;
  /** Short outcome line; never empty when success is false */
  summary: string;
  content: string;
  errorMessage?: string;
}

// ============================================
// EXECUTION CONTEXT
// ============================================

/** Fire-and-forget work that must not block the plan. */
export interface BackgroundScheduler {
  /** Returns false when the work was rejected (queue shut down) */
  enqueue(label: string, correlationId: string, work: () => Promise<void>): boolean;
}

export interface ToolExecutionContext {
  correlationId: string;
  quick: boolean;
  backgroundMode: boolean;
  /** Logger bound to the plan's correlation id */
  log: ILogger;
  background: BackgroundScheduler;
  signal?: AbortSignal;
}

/** What the dispatcher hands a tool for one step. */
export interface ToolRequest {
  instruction: string;
  parameters: Record<string, string>;
  /** Digest of earlier step results, for tools that read free text */
  stepContext: string;
}

// ============================================
// TOOL VARIANTS
// ============================================

interface ToolBase {
  name: ToolIdentifier;
  description: string;
  /** Catalog grouping */
  category: string;
}

/** Typed request, validated from the step's parameters before execute runs. */
export interface StructuredTool<T> extends ToolBase {
  kind: "structured";
  /** Example request shown to the model */
  descriptionObject: T;
  requestSchema: z.ZodType<T, z.ZodTypeDef, unknown>;
  execute(plan: Plan, request: T, ctx: ToolExecutionContext): Promise<ToolResult>;
}

/** Free-text request: the step instruction plus surrounding context. */
export interface LegacyTool extends ToolBase {
  kind: "legacy";
  /** Example parameters shown to the model */
  descriptionObject: Record<string, string>;
  execute(
    plan: Plan,
    taskDescription: string,
    stepContext: string,
    ctx: ToolExecutionContext,
  ): Promise<ToolResult>;
}

export type Tool = StructuredTool<unknown> | LegacyTool;

/** Catalog entry rendered into prompts. */
export interface ToolDescription {
  name: ToolIdentifier;
  description: string;
  category: string;
  exampleParameters: unknown;
}

/**
 * Identity helper that keeps the request type checked at the definition
 * site while the registry stores every tool under one union.
 */
export function defineStructuredTool<T>(tool: StructuredTool<T>): StructuredTool<T> {
  return tool;
}
