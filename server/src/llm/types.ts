/**
 * LLM Type Definitions
 *
 * Pure types and interfaces for the provider-agnostic LLM layer.
 * No runtime values; configuration constants live in ./config.ts.
 */

// ============================================
// CORE TYPES
// ============================================

export interface LLMMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

export interface LLMRequestOptions {
  model?: string;
  temperature?: number;
  maxTokens?: number;
  /** Force structured JSON output from the model */
  responseFormat?: "json_object" | "text";
  /** Cancels the in-flight HTTP request */
  signal?: AbortSignal;
}

export interface LLMResponse {
  content: string;
  model: string;
  usage?: {
    inputTokens: number;
    outputTokens: number;
  };
}

// ============================================
// MODEL ROLES
// ============================================

/**
 * Roles represent WHY a model is chosen, not just how capable it is.
 *
 * - planner:    planning, tool reasoning, compaction and final answers
 * - fast:       quick-mode tasks where latency beats depth
 * - background: work running outside the user's wait (scheduled, deferred)
 */
export type ModelRole = "planner" | "fast" | "background";

export interface ModelRoleConfig {
  role: ModelRole;
  model: string;
  temperature: number;
  maxTokens: number;
  /** Per-attempt timeout */
  timeoutMs: number;
}

// ============================================
// LLM CLIENT INTERFACE
// ============================================

export interface ILLMClient {
  /** Provider label used in logs */
  provider: string;

  chat(messages: LLMMessage[], options?: LLMRequestOptions): Promise<LLMResponse>;
}
