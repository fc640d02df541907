/**
 * Retry & Error Detection: Shared utilities for resilient clients
 *
 * Determines whether an error is transient (retryable), extracts
 * Retry-After hints from error messages and computes backoff delays.
 */

// ============================================
// RETRYABLE ERROR DETECTION
// ============================================

/** HTTP status codes that indicate a transient/retryable failure */
const RETRYABLE_STATUS_CODES = [429, 500, 502, 503, 504];

/** Error message patterns that indicate a transient/retryable failure */
const RETRYABLE_PATTERNS = [
  "rate limit",
  "too many requests",
  "fetch failed",
  "econnrefused",
  "econnreset",
  "enotfound",
  "network",
  "timeout",
  "timed out",
  "socket hang up",
];

/**
 * Check if an error is retryable (transient failure that a later attempt
 * might not have).
 */
export function isRetryableError(error: unknown): boolean {
  const msg = (error instanceof Error ? error.message : String(error)).toLowerCase();

  // Status codes appear as "<provider> API error: <status> ..."
  const status = msg.match(/api error: (\d{3})/);
  if (status && RETRYABLE_STATUS_CODES.includes(parseInt(status[1], 10))) return true;

  for (const pattern of RETRYABLE_PATTERNS) {
    if (msg.includes(pattern)) return true;
  }

  return false;
}

/**
 * Extract Retry-After delay from an error message (if the provider included it).
 * Returns delay in ms, or 0 if not found.
 */
export function extractRetryAfterMs(error: unknown): number {
  const msg = error instanceof Error ? error.message : String(error);
  const match = msg.match(/retry[- ]after:?\s*(\d+)/i);
  if (match) {
    const seconds = parseInt(match[1], 10);
    // Cap at 30 seconds; longer waits fail the attempt instead
    return seconds <= 30 ? seconds * 1000 : 0;
  }
  return 0;
}

// ============================================
// BACKOFF
// ============================================

export const BASE_BACKOFF_MS = 500;
export const MAX_BACKOFF_MS = 8_000;

/**
 * Delay before retry number `attempt` (0-based): exponential, capped,
 * and never shorter than the provider's Retry-After hint.
 */
export function backoffDelayMs(attempt: number, error: unknown, baseMs = BASE_BACKOFF_MS): number {
  const exponential = Math.min(baseMs * 2 ** attempt, MAX_BACKOFF_MS);
  return Math.max(exponential, extractRetryAfterMs(error));
}
