/**
 * Clock abstraction
 * @module utils/clock
 *
 * Polling loops and retries read time through this interface so tests
 * can advance a fake clock instead of waiting.
 */

export interface Clock {
  /** Current time in epoch milliseconds */
  now(): number;
  /** Resolve after `ms` milliseconds */
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms: number) =>
    new Promise<void>((resolve) => {
      setTimeout(resolve, ms);
    }),
};
