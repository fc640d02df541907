/**
 * Error Taxonomy
 *
 * Every failure the plan engine raises on purpose carries a stable `code`
 * so callers (runner, HTTP routes, CLI) can branch without string matching.
 */

export type PlanloomErrorCode =
  | "VALIDATION"
  | "TOOL_EXECUTION"
  | "REASONING"
  | "BACKGROUND_TASK";

export class PlanloomError extends Error {
  public readonly code: PlanloomErrorCode;

  constructor(code: PlanloomErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PlanloomError";
    this.code = code;
  }
}

/** Rejected input: bad range, blank field, unknown tool, illegal transition, lease conflict. */
export class ValidationError extends PlanloomError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("VALIDATION", message, options);
    this.name = "ValidationError";
  }
}

/** A tool threw or reported failure. Recorded on the step, never aborts the plan. */
export class ToolExecutionError extends PlanloomError {
  public readonly toolName: string;

  constructor(toolName: string, message: string, options?: { cause?: unknown }) {
    super("TOOL_EXECUTION", message, options);
    this.name = "ToolExecutionError";
    this.toolName = toolName;
  }
}

/** An LLM phase failed or returned output that could not be used. Plan-level. */
export class ReasoningError extends PlanloomError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("REASONING", message, options);
    this.name = "ReasoningError";
  }
}

/** Failure inside fire-and-forget work. Logged at the queue, never rethrown. */
export class BackgroundTaskError extends PlanloomError {
  public readonly label: string;

  constructor(label: string, message: string, options?: { cause?: unknown }) {
    super("BACKGROUND_TASK", message, options);
    this.name = "BackgroundTaskError";
    this.label = label;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
