/**
 * Resilient LLM Client: Retries and Per-Attempt Timeouts
 *
 * Wraps an ILLMClient and retries transient failures (429, 5xx, network,
 * timeouts) with exponential backoff that honors Retry-After hints.
 * Every attempt is bounded by a timeout; a timed-out attempt surfaces as
 * an ordinary error and is retried like any other transient failure.
 */

import { createComponentLogger } from "../../logging.js";
import { errorMessage } from "../../errors.js";
import { isRetryableError, backoffDelayMs, BASE_BACKOFF_MS } from "./retry.js";
import type { ILLMClient, LLMMessage, LLMRequestOptions, LLMResponse } from "../types.js";
import type { ILogger } from "@planloom/shared/logging";

const defaultLog = createComponentLogger("llm.resilient");

export interface ResilienceOptions {
  maxRetries: number;
  timeoutMs: number;
  baseDelayMs?: number;
  /** Overridable for tests */
  sleep?: (ms: number) => Promise<void>;
  log?: ILogger;
}

const realSleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

/**
 * Run one attempt, rejecting once `timeoutMs` elapses. The attempt's own
 * signal is aborted on timeout so fetch-based clients stop the request.
 */
export async function withTimeout<T>(
  run: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  outer?: AbortSignal,
): Promise<T> {
  const controller = new AbortController();
  const onOuterAbort = () => controller.abort(outer?.reason);
  outer?.addEventListener("abort", onOuterAbort, { once: true });

  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new Error(`LLM call timed out after ${timeoutMs}ms`));
    }, timeoutMs);
  });

  try {
    return await Promise.race([run(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
    outer?.removeEventListener("abort", onOuterAbort);
  }
}

export class ResilientLLMClient implements ILLMClient {
  provider: string;
  private primary: ILLMClient;
  private options: ResilienceOptions;

  constructor(primary: ILLMClient, options: ResilienceOptions) {
    this.primary = primary;
    this.provider = primary.provider;
    this.options = options;
  }

  async chat(messages: LLMMessage[], options?: LLMRequestOptions): Promise<LLMResponse> {
    const { maxRetries, timeoutMs } = this.options;
    const sleep = this.options.sleep ?? realSleep;
    const log = this.options.log ?? defaultLog;

    for (let attempt = 0; ; attempt++) {
      try {
        return await withTimeout(
          signal => this.primary.chat(messages, { ...options, signal }),
          timeoutMs,
          options?.signal,
        );
      } catch (error) {
        if (options?.signal?.aborted) throw error;
        if (attempt >= maxRetries || !isRetryableError(error)) throw error;

        const delay = backoffDelayMs(attempt, error, this.options.baseDelayMs ?? BASE_BACKOFF_MS);
        log.warn("LLM call failed with retryable error, retrying", {
          provider: this.provider,
          attempt: attempt + 1,
          maxRetries,
          delayMs: delay,
          error: errorMessage(error).substring(0, 200),
        });
        await sleep(delay);
      }
    }
  }
}
