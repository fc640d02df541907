/**
 * ToolResult constructors. Failed results always carry a non-empty summary.
 */

import type { ToolResult } from "./types.js";

const DEFAULT_FAILURE_SUMMARY = "Tool execution failed";

export function toolSuccess(toolName: string, summary: string, content: string): ToolResult {
  return { success: true, toolName, summary, content };
}

export function toolError(toolName: string, errorMessage: string, summary?: string): ToolResult {
  const resolved = summary?.trim() || errorMessage.trim() || DEFAULT_FAILURE_SUMMARY;
  return {
    success: false,
    toolName,
    summary: resolved,
    content: "",
    errorMessage: errorMessage.trim() || DEFAULT_FAILURE_SUMMARY,
  };
}

/** Re-applies the failure-summary rule to results produced outside these helpers. */
export function normalizeToolResult(result: ToolResult): ToolResult {
  if (result.success || result.summary.trim() !== "") return result;
  return { ...result, summary: result.errorMessage?.trim() || DEFAULT_FAILURE_SUMMARY };
}
