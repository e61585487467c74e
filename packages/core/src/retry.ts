/**
 * Retry policy for failed transfers: fixed delay, bounded attempts
 */

import type { NetworkRequest } from "./request";

export interface RetryConfig {
  /** Delay before a failed transfer is resubmitted (default: 2000) */
  retryDelayMs: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  retryDelayMs: 2000,
};

/**
 * A failed transfer is retried only while budget remains and someone still
 * waits for it
 */
export function shouldRetry(
  failCount: number,
  retryLimit: number,
  hasWaiters: boolean,
): boolean {
  return failCount < retryLimit && hasWaiters;
}

/**
 * Copy of the request for its next attempt
 */
export function nextAttempt<T>(
  request: NetworkRequest<T>,
  now: number,
): NetworkRequest<T> {
  return {
    ...request,
    failCount: request.failCount + 1,
    submissionTime: now,
  };
}
