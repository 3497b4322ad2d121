/**
 * Recovery Strategies
 * @module errors/recovery
 *
 * Retry with exponential backoff for transient remote failures.
 */

import { isRetryableError } from './codes.js';
import { isBaseError } from './base.js';
import { systemClock } from '../utils/clock.js';

// ============================================================================
// Retry Strategy
// ============================================================================

/**
 * Retry configuration options
 */
export interface RetryOptions {
  /** Maximum number of attempts, including the first */
  maxAttempts: number;
  /** Initial delay in milliseconds */
  delayMs: number;
  /** Multiplier for exponential backoff */
  backoffMultiplier?: number;
  /** Maximum delay cap in milliseconds */
  maxDelayMs?: number;
  /** Optional jitter factor (0-1) to add randomness */
  jitterFactor?: number;
  /** Custom function to determine if error is retryable */
  retryIf?: (error: unknown, attempt: number) => boolean;
  /** Callback invoked before each retry */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  /** Callback invoked on final failure */
  onFinalFailure?: (error: unknown, totalAttempts: number) => void;
  /** Sleep implementation, replaced by a fake clock in tests */
  sleep?: (ms: number) => Promise<void>;
}

export const DEFAULT_RETRY_OPTIONS = {
  maxAttempts: 3,
  delayMs: 1000,
  backoffMultiplier: 2,
  maxDelayMs: 30000,
  jitterFactor: 0.1,
} as const;

/**
 * Delay before attempt `attempt + 1`, given `attempt` failures so far.
 * Without jitter: min(delayMs * multiplier^(attempt-1), maxDelayMs).
 */
export function computeBackoffDelay(
  attempt: number,
  delayMs: number,
  backoffMultiplier: number,
  maxDelayMs: number,
  jitterFactor = 0,
  random: () => number = Math.random
): number {
  const base = Math.min(delayMs * Math.pow(backoffMultiplier, attempt - 1), maxDelayMs);
  const jitter = jitterFactor ? base * jitterFactor * (random() * 2 - 1) : 0;
  return Math.max(0, Math.min(base + jitter, maxDelayMs));
}

/**
 * Execute an operation with retry logic
 *
 * @example
 * ```typescript
 * const state = await withRetry(
 *   () => executor.queryJobState(jobId),
 *   { maxAttempts: 3, delayMs: 1000, backoffMultiplier: 2 }
 * );
 * ```
 */
export async function withRetry<T>(
  operation: () => Promise<T>,
  options: Partial<RetryOptions> = {}
): Promise<T> {
  const {
    maxAttempts = DEFAULT_RETRY_OPTIONS.maxAttempts,
    delayMs = DEFAULT_RETRY_OPTIONS.delayMs,
    backoffMultiplier = DEFAULT_RETRY_OPTIONS.backoffMultiplier,
    maxDelayMs = DEFAULT_RETRY_OPTIONS.maxDelayMs,
    jitterFactor = DEFAULT_RETRY_OPTIONS.jitterFactor,
    retryIf = defaultRetryIf,
    onRetry,
    onFinalFailure,
    sleep = systemClock.sleep,
  } = options;

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation();
    } catch (error) {
      if (attempt >= maxAttempts || !retryIf(error, attempt)) {
        onFinalFailure?.(error, attempt);
        throw error;
      }

      const delay = computeBackoffDelay(
        attempt,
        delayMs,
        backoffMultiplier,
        maxDelayMs,
        jitterFactor
      );
      onRetry?.(error, attempt, delay);
      await sleep(delay);
    }
  }
}

/**
 * Default retry condition
 */
function defaultRetryIf(error: unknown): boolean {
  if (isBaseError(error)) {
    return isRetryableError(error.code);
  }
  if (!(error instanceof Error)) {
    return false;
  }

  const retryableMessages = [
    'ECONNREFUSED',
    'ECONNRESET',
    'ETIMEDOUT',
    'EHOSTUNREACH',
    'ENETUNREACH',
    'timeout',
  ];

  const message = error.message.toLowerCase();
  return retryableMessages.some((msg) => message.includes(msg.toLowerCase()));
}
