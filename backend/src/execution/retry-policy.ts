import type { RetryPolicy } from "@intentflow/shared";

// ─── Types ──────────────────────────────────────────────

export type ErrorClass = "TRANSIENT" | "PERMANENT";

export interface RetryDecision {
  shouldRetry: boolean;
  delayMs: number;
  nextAttempt: number;
}

// ─── Error Classifier ───────────────────────────────────

const TRANSIENT_PATTERNS = [
  /timeout/i,
  /timed out/i,
  /ECONNREFUSED/i,
  /ECONNRESET/i,
  /ETIMEDOUT/i,
  /EAI_AGAIN/i,
  /rate.?limit/i,
  /too many requests/i,
  /\b50[234]\b/,
  /EAGAIN/i,
  /temporar/i,
  /overloaded/i,
  /unavailable/i,
];

/** Classifies a thrown error message an executor did not classify itself. */
export function classifyError(error: string): ErrorClass {
  for (const pattern of TRANSIENT_PATTERNS) {
    if (pattern.test(error)) {
      return "TRANSIENT";
    }
  }
  return "PERMANENT";
}

// ─── Backoff ────────────────────────────────────────────

/** `backoffBaseMs × 2^(attempt−1)`, capped. `attempt` is the one that just failed. */
export function backoffDelayMs(
  policy: RetryPolicy,
  attempt: number,
  capMs: number,
): number {
  const exponent = Math.max(0, attempt - 1);
  return Math.min(capMs, policy.backoffBaseMs * 2 ** exponent);
}

export function decideRetry(
  policy: RetryPolicy,
  attempt: number,
  retryable: boolean,
  capMs: number,
): RetryDecision {
  if (!retryable || attempt >= policy.maxAttempts) {
    return { shouldRetry: false, delayMs: 0, nextAttempt: attempt };
  }
  return {
    shouldRetry: true,
    delayMs: backoffDelayMs(policy, attempt, capMs),
    nextAttempt: attempt + 1,
  };
}
