/**
 * OpenAI-Compatible LLM Client
 *
 * Works with any provider that implements the OpenAI chat completions API:
 * OpenAI, DeepSeek, xAI, LM Studio, vLLM, etc.
 */

import { z } from "zod";
import type { ILLMClient, LLMMessage, LLMRequestOptions, LLMResponse } from "./types.js";

const chatCompletionSchema = z.object({
  model: z.string().optional(),
  choices: z.array(z.object({
    message: z.object({
      content: z.string().nullable().optional(),
    }),
  })).min(1),
  usage: z.object({
    prompt_tokens: z.number().optional(),
    completion_tokens: z.number().optional(),
  }).optional(),
});

export class OpenAICompatibleClient implements ILLMClient {
  provider: string;
  private apiKey: string;
  private baseUrl: string;
  private defaultModel: string;

  constructor(provider: string, apiKey: string, baseUrl: string, defaultModel: string) {
    this.provider = provider;
    this.apiKey = apiKey;
    this.baseUrl = baseUrl.replace(/\/+$/, "");
    this.defaultModel = defaultModel;
  }

  async chat(messages: LLMMessage[], options?: LLMRequestOptions): Promise<LLMResponse> {
    const model = options?.model || this.defaultModel;

    const headers: Record<string, string> = {
      "Content-Type": "application/json",
    };

    if (this.apiKey) {
      headers["Authorization"] = `Bearer ${this.apiKey}`;
    }

    const body: Record<string, unknown> = {
      model,
      messages: messages.map(m => ({ role: m.role, content: m.content })),
      temperature: options?.temperature ?? 0.5,
      max_tokens: options?.maxTokens ?? 4096,
      stream: false,
    };

    if (options?.responseFormat === "json_object") {
      body.response_format = { type: "json_object" };
    }

    const response = await fetch(`${this.baseUrl}/chat/completions`, {
      method: "POST",
      headers,
      body: JSON.stringify(body),
      signal: options?.signal,
    });

    if (!response.ok) {
      const retryAfter = response.headers.get("retry-after");
      const hint = retryAfter ? ` retry-after: ${retryAfter}` : "";
      throw new Error(`${this.provider} API error: ${response.status}${hint} ${await response.text()}`);
    }

    const parsed = chatCompletionSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error(`${this.provider} returned an unexpected completion shape: ${parsed.error.message}`);
    }

    const data = parsed.data;
    return {
      content: data.choices[0].message.content ?? "",
      model: data.model ?? model,
      usage: {
        inputTokens: data.usage?.prompt_tokens ?? 0,
        outputTokens: data.usage?.completion_tokens ?? 0,
      },
    };
  }
}
