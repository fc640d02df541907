/**
 * ResilientLLMClient Tests: Retries and Timeouts
 *
 * Covers:
 * - Retryable error detection (429, 5xx, network errors, timeouts)
 * - Retry-After extraction and backoff growth
 * - Success on first attempt, no retry
 * - Transient failure then success
 * - Non-retryable errors pass through unchanged
 * - Retries exhausted → last error thrown
 * - Hung attempt times out and is retried
 */

import { describe, it, expect, vi } from "vitest";
import { ResilientLLMClient } from "./resilient-client.js";
import { isRetryableError, extractRetryAfterMs, backoffDelayMs } from "./retry.js";
import type { ILLMClient, LLMMessage, LLMResponse } from "../types.js";

// ============================================
// HELPERS
// ============================================

const OK_RESPONSE: LLMResponse = {
  content: "{\"ok\":true}",
  model: "test-model",
  usage: { inputTokens: 10, outputTokens: 5 },
};

const MESSAGES: LLMMessage[] = [{ role: "user", content: "Hi" }];

function makeMockClient(chatFn: ILLMClient["chat"]) {
  const chat = vi.fn(chatFn);
  const client: ILLMClient = { provider: "test", chat };
  return { client, chat };
}

function makeResilient(client: ILLMClient, maxRetries = 2, timeoutMs = 1_000) {
  const sleep = vi.fn(async (_ms: number) => {});
  const resilient = new ResilientLLMClient(client, { maxRetries, timeoutMs, sleep });
  return { resilient, sleep };
}

// ============================================
// ERROR DETECTION
// ============================================

describe("isRetryableError", () => {
  it("treats 429 and 5xx API errors as retryable", () => {
    expect(isRetryableError(new Error("openai API error: 429 slow down"))).toBe(true);
    expect(isRetryableError(new Error("openai API error: 503 unavailable"))).toBe(true);
  });

  it("treats network failures and timeouts as retryable", () => {
    expect(isRetryableError(new Error("fetch failed"))).toBe(true);
    expect(isRetryableError(new Error("LLM call timed out after 10ms"))).toBe(true);
  });

  it("does not retry client errors", () => {
    expect(isRetryableError(new Error("openai API error: 401 invalid key"))).toBe(false);
    expect(isRetryableError(new Error("openai API error: 400 bad request"))).toBe(false);
  });
});

describe("backoff", () => {
  it("extracts Retry-After seconds and ignores long waits", () => {
    expect(extractRetryAfterMs(new Error("openai API error: 429 retry-after: 3"))).toBe(3000);
    expect(extractRetryAfterMs(new Error("openai API error: 429 retry-after: 90"))).toBe(0);
    expect(extractRetryAfterMs(new Error("no hint"))).toBe(0);
  });

  it("grows exponentially and honors the hint when it is longer", () => {
    const plain = new Error("fetch failed");
    expect(backoffDelayMs(0, plain)).toBe(500);
    expect(backoffDelayMs(2, plain)).toBe(2000);
    expect(backoffDelayMs(10, plain)).toBe(8000);
    expect(backoffDelayMs(0, new Error("429 retry-after: 5"))).toBe(5000);
  });
});

// ============================================
// RETRY LOOP
// ============================================

describe("ResilientLLMClient", () => {
  it("returns the first successful response without retrying", async () => {
    const { client, chat } = makeMockClient(async () => OK_RESPONSE);
    const { resilient, sleep } = makeResilient(client);

    await expect(resilient.chat(MESSAGES)).resolves.toEqual(OK_RESPONSE);
    expect(chat).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it("retries a transient failure and then succeeds", async () => {
    let calls = 0;
    const { client, chat } = makeMockClient(async () => {
      calls++;
      if (calls === 1) throw new Error("openai API error: 502 bad gateway");
      return OK_RESPONSE;
    });
    const { resilient, sleep } = makeResilient(client);

    await expect(resilient.chat(MESSAGES)).resolves.toEqual(OK_RESPONSE);
    expect(chat).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(500);
  });

  it("passes non-retryable errors through unchanged", async () => {
    const failure = new Error("openai API error: 401 invalid key");
    const { client, chat } = makeMockClient(async () => { throw failure; });
    const { resilient } = makeResilient(client);

    await expect(resilient.chat(MESSAGES)).rejects.toBe(failure);
    expect(chat).toHaveBeenCalledTimes(1);
  });

  it("throws the last error once retries are exhausted", async () => {
    const { client, chat } = makeMockClient(async () => { throw new Error("fetch failed"); });
    const { resilient, sleep } = makeResilient(client, 2);

    await expect(resilient.chat(MESSAGES)).rejects.toThrow("fetch failed");
    expect(chat).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls.map(c => c[0])).toEqual([500, 1000]);
  });

  it("times out a hung attempt and retries it", async () => {
    let calls = 0;
    const { client } = makeMockClient(() => {
      calls++;
      if (calls === 1) return new Promise<LLMResponse>(() => {});
      return Promise.resolve(OK_RESPONSE);
    });
    const { resilient } = makeResilient(client, 1, 20);

    await expect(resilient.chat(MESSAGES)).resolves.toEqual(OK_RESPONSE);
    expect(calls).toBe(2);
  });

  it("passes an abort signal to each attempt", async () => {
    const { client, chat } = makeMockClient(async () => OK_RESPONSE);
    const { resilient } = makeResilient(client);

    await resilient.chat(MESSAGES, { model: "m-1" });

    const options = chat.mock.calls[0][1];
    expect(options?.model).toBe("m-1");
    expect(options?.signal).toBeInstanceOf(AbortSignal);
  });
});
