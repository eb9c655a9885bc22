/**
 * Retry Policy
 *
 * Bounded retry with capped exponential backoff, composed explicitly around
 * each external call site (LLM, transcriber, ticket tracker, wiki, store).
 *
 * delay(n) = min(baseDelayMs · 2^n, maxDelayMs), n = 0 for the first retry.
 * Errors rejected by `retryable` fail immediately.
 */

import { isRetryableError } from './errors';

// ============================================================
// TYPES
// ============================================================

export interface RetryPolicy {
  /** Total attempts including the first (>= 1) */
  maxAttempts: number;
  /** Delay before the first retry */
  baseDelayMs: number;
  /** Upper bound for any single delay */
  maxDelayMs: number;
  /** Whether a failure should be retried */
  retryable: (error: unknown) => boolean;
  /** Wait implementation; replaced in tests */
  sleep?: (ms: number) => Promise<void>;
  /** Called before each retry (logging hook) */
  onRetry?: (info: RetryInfo) => void;
}

export interface RetryInfo {
  operation: string;
  /** Attempt that just failed (1-based) */
  attempt: number;
  delayMs: number;
  error: unknown;
}

// ============================================================
// DEFAULTS
// ============================================================

export const RETRY_DEFAULTS = {
  MAX_ATTEMPTS: 3,
  BASE_DELAY_MS: 2000,
  MAX_DELAY_MS: 10000
} as const;

export function createRetryPolicy(overrides: Partial<RetryPolicy> = {}): RetryPolicy {
  return {
    maxAttempts: RETRY_DEFAULTS.MAX_ATTEMPTS,
    baseDelayMs: RETRY_DEFAULTS.BASE_DELAY_MS,
    maxDelayMs: RETRY_DEFAULTS.MAX_DELAY_MS,
    retryable: isRetryableError,
    ...overrides
  };
}

/**
 * Backoff before retry number `retryIndex` (0-based).
 */
export function backoffDelay(policy: RetryPolicy, retryIndex: number): number {
  return Math.min(policy.baseDelayMs * 2 ** retryIndex, policy.maxDelayMs);
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// ============================================================
// EXECUTION
// ============================================================

/**
 * Execute an operation under a retry policy.
 * The last error is rethrown unchanged once attempts are exhausted.
 */
export async function withRetry<T>(
  policy: RetryPolicy,
  operation: () => Promise<T>,
  operationName: string
): Promise<T> {
  const sleep = policy.sleep ?? defaultSleep;
  const attempts = Math.max(1, policy.maxAttempts);

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation();
    } catch (error) {
      if (attempt >= attempts || !policy.retryable(error)) {
        throw error;
      }

      const delayMs = backoffDelay(policy, attempt - 1);
      policy.onRetry?.({ operation: operationName, attempt, delayMs, error });
      await sleep(delayMs);
    }
  }
}
