/**
 * Polling primitives
 * @module deployment/polling
 *
 * The backoff policy is a pure function of the attempt index; the loops
 * below only sequence probes and sleeps against an injected clock.
 */

import type { Clock } from '../utils/clock.js';

// ============================================================================
// Backoff Policy
// ============================================================================

export interface BackoffPolicy {
  initialDelayMs: number;
  multiplier: number;
  maxDelayMs: number;
}

/**
 * Delay after the `attempt`-th failed probe (0-based)
 */
export function backoffDelay(policy: BackoffPolicy, attempt: number): number {
  return Math.min(policy.initialDelayMs * Math.pow(policy.multiplier, attempt), policy.maxDelayMs);
}

// ============================================================================
// Poll Loops
// ============================================================================

export type PollDecision<T> =
  | { done: true; value: T }
  | { done: false };

/**
 * Probe at a fixed interval until the probe decides or the deadline passes.
 * The last probe starts before the deadline, so the loop returns within
 * `timeoutMs + intervalMs` of starting (plus probe latency).
 */
export async function pollAtInterval<T>(
  probe: () => Promise<PollDecision<T>>,
  options: { intervalMs: number; timeoutMs: number; clock: Clock }
): Promise<PollDecision<T>> {
  const { intervalMs, timeoutMs, clock } = options;
  const deadline = clock.now() + timeoutMs;

  for (;;) {
    const decision = await probe();
    if (decision.done) {
      return decision;
    }
    if (clock.now() >= deadline) {
      return { done: false };
    }
    await clock.sleep(intervalMs);
  }
}

/**
 * Probe with exponential backoff until it yields a non-null value or the
 * deadline passes. Sleeps never overshoot the deadline; one final probe
 * runs at the deadline.
 */
export async function pollWithBackoff<T>(
  probe: () => Promise<T | null>,
  options: {
    policy: BackoffPolicy;
    timeoutMs: number;
    clock: Clock;
    onWait?: (attempt: number, delayMs: number, elapsedMs: number) => void;
  }
): Promise<T | null> {
  const { policy, timeoutMs, clock, onWait } = options;
  const start = clock.now();

  for (let attempt = 0; ; attempt++) {
    const value = await probe();
    if (value !== null) {
      return value;
    }
    const elapsed = clock.now() - start;
    if (elapsed >= timeoutMs) {
      return null;
    }
    const delay = Math.min(backoffDelay(policy, attempt), timeoutMs - elapsed);
    onWait?.(attempt, delay, elapsed);
    await clock.sleep(delay);
  }
}
