/**
 * Job state normalization and tracking
 * @module deployment/job-state
 *
 * Maps raw scheduler state strings onto the orchestrator's state machine
 * and keeps per-handle observations monotonic.
 */

import { JobStates, type JobState, isTerminalState } from './types.js';

// ============================================================================
// Normalization
// ============================================================================

const STATE_ALIASES: Readonly<Record<string, JobState>> = {
  SUBMITTED: JobStates.SUBMITTED,
  PENDING: JobStates.PENDING,
  CONFIGURING: JobStates.PENDING,
  REQUEUED: JobStates.PENDING,
  REQUEUE_HOLD: JobStates.PENDING,
  RESIZING: JobStates.PENDING,
  SUSPENDED: JobStates.PENDING,
  RUNNING: JobStates.RUNNING,
  COMPLETING: JobStates.RUNNING,
  STAGE_OUT: JobStates.RUNNING,
  SIGNALING: JobStates.RUNNING,
  COMPLETED: JobStates.COMPLETED,
  FAILED: JobStates.FAILED,
  NODE_FAIL: JobStates.FAILED,
  OUT_OF_MEMORY: JobStates.FAILED,
  BOOT_FAIL: JobStates.FAILED,
  PREEMPTED: JobStates.FAILED,
  CANCELLED: JobStates.CANCELLED,
  TIMEOUT: JobStates.TIMEOUT,
  DEADLINE: JobStates.TIMEOUT,
};

/**
 * Normalize a scheduler state string. Accepts forms such as
 * `CANCELLED by 1234`, `COMPLETED+` or multi-line accounting output
 * (first line wins). Unrecognized input yields null.
 */
export function normalizeJobState(raw: string | null | undefined): JobState | null {
  if (!raw) {
    return null;
  }
  const firstLine = raw.trim().split(/\r?\n/)[0] ?? '';
  const token = (firstLine.trim().split(/\s+/)[0] ?? '').replace(/\+$/, '').toUpperCase();
  return STATE_ALIASES[token] ?? null;
}

// ============================================================================
// Ordering
// ============================================================================

const STATE_RANK: Readonly<Record<JobState, number>> = {
  SUBMITTED: 0,
  PENDING: 1,
  RUNNING: 2,
  COMPLETED: 3,
  FAILED: 3,
  CANCELLED: 3,
  TIMEOUT: 3,
};

export function stateRank(state: JobState): number {
  return STATE_RANK[state];
}

/**
 * Remembers the highest-ranked state observed per job handle so that
 * callers never see a job move backwards or leave a terminal state.
 */
export class JobStateTracker {
  private readonly observed = new Map<string, JobState>();

  /**
   * Merge a fresh observation and return the state to surface.
   * A null observation keeps a known terminal state, otherwise yields null.
   */
  observe(jobId: string, next: JobState | null): JobState | null {
    const previous = this.observed.get(jobId);

    if (next === null) {
      return previous !== undefined && isTerminalState(previous) ? previous : null;
    }
    if (previous === undefined) {
      this.observed.set(jobId, next);
      return next;
    }
    if (isTerminalState(previous)) {
      return previous;
    }
    if (stateRank(next) >= stateRank(previous)) {
      this.observed.set(jobId, next);
      return next;
    }
    return previous;
  }

  last(jobId: string): JobState | null {
    return this.observed.get(jobId) ?? null;
  }

  forget(jobId: string): void {
    this.observed.delete(jobId);
  }
}
