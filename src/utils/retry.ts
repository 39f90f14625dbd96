/**
 * @fileoverview Retry wrapper for remote calls.
 *
 * Retries only failures that carry one of the policy's transient HTTP
 * statuses, with exponential backoff between attempts. Anything else
 * (auth, bad request, unreachable host) surfaces on the first attempt.
 */

import type { AppLogger } from './observability/index.js';

export interface RetryPolicy {
  /** Total attempts, including the first one. */
  maxAttempts: number;
  /** Delay before the second attempt; doubles for each one after. */
  baseDelayMs: number;
  retryableStatuses: readonly number[];
}

/**
 * Extract the HTTP status from an SDK/API error when available.
 */
export function getErrorStatus(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null || !('status' in error)) {
    return undefined;
  }
  const { status } = error;
  return typeof status === 'number' ? status : undefined;
}

/** Delay before the attempt that follows `attempt` (1-based). */
export function backoffDelayMs(attempt: number, baseDelayMs: number): number {
  return baseDelayMs * 2 ** (attempt - 1);
}

export async function sleep(ms: number): Promise<void> {
  await new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Run `fn` with retries for transient upstream statuses.
 *
 * @param operation Human-readable operation label for logs
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  operation: string,
  policy: RetryPolicy,
  log: AppLogger,
  wait: (ms: number) => Promise<void> = sleep
): Promise<T> {
  const totalAttempts = Math.max(1, policy.maxAttempts);

  for (let attempt = 1; attempt <= totalAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      const status = getErrorStatus(error);
      const canRetry = attempt < totalAttempts
        && status !== undefined
        && policy.retryableStatuses.includes(status);
      if (!canRetry) {
        throw error;
      }

      const waitMs = backoffDelayMs(attempt, policy.baseDelayMs);
      log.warn('remote_call_retry', {
        operation,
        status,
        attempt,
        totalAttempts,
        retryInMs: waitMs,
      });
      await wait(waitMs);
    }
  }

  throw new Error(`${operation} failed after retries`);
}
