/**
 * Fake Clock
 * @module tests/mocks/clock.mock
 *
 * `sleep` advances `now` instantly and records each requested delay.
 */

import type { Clock } from '../../src/utils/clock.js';

export class FakeClock implements Clock {
  readonly sleeps: number[] = [];

  constructor(private current = 1_700_000_000_000) {}

  now(): number {
    return this.current;
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.current += ms;
  }

  advance(ms: number): void {
    this.current += ms;
  }

  /** Total simulated time spent sleeping */
  get slept(): number {
    return this.sleeps.reduce((sum, ms) => sum + ms, 0);
  }
}
