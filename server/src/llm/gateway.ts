/**
 * LLM Gateway
 *
 * The single `callLlm` entry point every plan phase uses. Renders the prompt
 * template for the requested prompt type, picks the model role, calls the
 * provider through the resilient client and validates the JSON reply
 * against the caller's zod schema.
 *
 * Provider failures and invalid replies both surface as ReasoningError.
 */

import type { z } from "zod";
import { createPlanLogger } from "../logging.js";
import { loadPrompt } from "../prompt-template.js";
import { ReasoningError, errorMessage } from "../errors.js";
import { ResilientLLMClient } from "./resilience/resilient-client.js";
import { selectModel, type ModelSelection } from "./selection/model-selector.js";
import { MODEL_ROLE_CONFIGS } from "./config.js";
import type { ILLMClient, LLMMessage, ModelRole, ModelRoleConfig } from "./types.js";
import type { ILogger } from "@planloom/shared/logging";

// ============================================
// PROMPT TYPES
// ============================================

export const PROMPT_TEMPLATES = {
  TASK_NORMALIZATION: "pipeline/planner/prompts/task-normalization.md",
  PLANNING_REQUIREMENTS: "pipeline/planner/prompts/planning-requirements.md",
  TOOL_REASONING: "pipeline/planner/prompts/tool-reasoning.md",
  CONTEXT_COMPACTION: "pipeline/planner/prompts/context-compaction.md",
  FINALIZER_ANSWER: "pipeline/planner/prompts/finalizer-answer.md",
  ANALYSIS_REASONING: "tools/builtin/analysis-reasoning.md",
} as const;

export type PromptType = keyof typeof PROMPT_TEMPLATES;

// ============================================
// CONTRACT
// ============================================

export interface LlmCallRequest<T> {
  promptType: PromptType;
  /** Validates the parsed JSON reply */
  responseSchema: z.ZodType<T, z.ZodTypeDef, unknown>;
  correlationId: string;
  quick: boolean;
  backgroundMode: boolean;
  /** Values for the template's |* Field *| placeholders */
  mappingValue: Record<string, string>;
  /** Language the user-facing text should be written in */
  outputLanguage?: string;
  signal?: AbortSignal;
}

export interface LlmCallResult<T> {
  result: T;
  model: string;
}

export interface LlmGateway {
  callLlm<T>(request: LlmCallRequest<T>): Promise<LlmCallResult<T>>;
}

export interface GatewayOptions {
  client: ILLMClient;
  maxRetries: number;
  roleConfigs?: Record<ModelRole, ModelRoleConfig>;
  /** Overridable for tests */
  sleep?: (ms: number) => Promise<void>;
}

// ============================================
// JSON EXTRACTION
// ============================================

/**
 * Pull the first JSON object out of a model reply (models sometimes wrap
 * JSON in prose or code fences). Returns undefined when nothing parses.
 */
export function extractJsonObject(content: string): unknown {
  const jsonMatch = content.match(/\{[\s\S]*\}/);
  if (!jsonMatch) return undefined;
  try {
    const parsed: unknown = JSON.parse(jsonMatch[0]);
    return parsed;
  } catch {
    return undefined;
  }
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .slice(0, 5)
    .map(issue => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

// ============================================
// GATEWAY
// ============================================

export class DefaultLlmGateway implements LlmGateway {
  private readonly options: GatewayOptions;
  private readonly roleConfigs: Record<ModelRole, ModelRoleConfig>;

  constructor(options: GatewayOptions) {
    this.options = options;
    this.roleConfigs = options.roleConfigs ?? MODEL_ROLE_CONFIGS;
  }

  async callLlm<T>(request: LlmCallRequest<T>): Promise<LlmCallResult<T>> {
    const log = createPlanLogger("llm.gateway", request.correlationId);
    const selection = selectModel(
      { quick: request.quick, backgroundMode: request.backgroundMode },
      this.roleConfigs,
    );

    const systemPrompt = await loadPrompt(PROMPT_TEMPLATES[request.promptType], {
      ...request.mappingValue,
      "Output Language": request.outputLanguage ?? "the language the task was written in",
    });

    const messages: LLMMessage[] = [
      { role: "system", content: systemPrompt },
      { role: "user", content: "Reply with a single JSON object exactly as described above." },
    ];

    log.debug("LLM call", {
      promptType: request.promptType,
      role: selection.role,
      model: selection.model,
      reason: selection.reason,
      promptChars: systemPrompt.length,
    });

    const content = await this.chat(messages, selection, request.promptType, request.signal, log);

    const raw = extractJsonObject(content);
    if (raw === undefined) {
      log.warn("LLM reply contained no JSON object", {
        promptType: request.promptType,
        raw: content.substring(0, 500),
      });
      throw new ReasoningError(`${request.promptType} reply contained no JSON object`);
    }

    const parsed = request.responseSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = describeIssues(parsed.error);
      log.warn("LLM reply failed schema validation", { promptType: request.promptType, issues });
      throw new ReasoningError(`${request.promptType} reply did not match the expected structure: ${issues}`);
    }

    return { result: parsed.data, model: selection.model };
  }

  private async chat(
    messages: LLMMessage[],
    selection: ModelSelection,
    promptType: PromptType,
    signal: AbortSignal | undefined,
    log: ILogger,
  ): Promise<string> {
    const client = new ResilientLLMClient(this.options.client, {
      maxRetries: this.options.maxRetries,
      timeoutMs: selection.timeoutMs,
      sleep: this.options.sleep,
      log,
    });

    const startedAt = Date.now();
    try {
      const response = await client.chat(messages, {
        model: selection.model,
        temperature: selection.temperature,
        maxTokens: selection.maxTokens,
        responseFormat: "json_object",
        signal,
      });
      log.info("LLM call complete", {
        promptType,
        model: response.model,
        durationMs: Date.now() - startedAt,
        inputTokens: response.usage?.inputTokens,
        outputTokens: response.usage?.outputTokens,
      });
      return response.content;
    } catch (error) {
      log.error("LLM call failed", error, { promptType, model: selection.model });
      throw new ReasoningError(`${promptType} call failed: ${errorMessage(error)}`, { cause: error });
    }
  }
}
