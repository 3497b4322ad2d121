/**
 * Descriptive statistics
 * @module analysis/statistics
 */

import type { LatencyStats } from './types.js';

/**
 * Percentile of a sorted sample by linear interpolation between the
 * closest ranks (rank = p/100 * (n - 1)). Empty input yields 0.
 */
export function percentileOfSorted(sorted: readonly number[], p: number): number {
  const n = sorted.length;
  if (n === 0) {
    return 0;
  }
  const rank = (Math.min(Math.max(p, 0), 100) / 100) * (n - 1);
  const lo = Math.floor(rank);
  const hi = Math.ceil(rank);
  const low = sorted[lo] ?? 0;
  const high = sorted[hi] ?? low;
  return low + (high - low) * (rank - lo);
}

export function percentile(values: readonly number[], p: number): number {
  return percentileOfSorted([...values].sort((a, b) => a - b), p);
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) {
    return 0;
  }
  let sum = 0;
  for (const v of values) sum += v;
  return sum / values.length;
}

/** Sample (n - 1) standard deviation */
export function sampleStdDev(values: readonly number[]): number {
  if (values.length < 2) {
    return 0;
  }
  const m = mean(values);
  let squares = 0;
  for (const v of values) squares += (v - m) ** 2;
  return Math.sqrt(squares / (values.length - 1));
}

export const ZERO_LATENCY: Readonly<LatencyStats> = {
  avg: 0,
  min: 0,
  max: 0,
  stddev: 0,
  p50: 0,
  p90: 0,
  p95: 0,
  p99: 0,
};

/**
 * Full latency distribution of a sample; all zeros when empty
 */
export function latencyStats(values: readonly number[]): LatencyStats {
  if (values.length === 0) {
    return { ...ZERO_LATENCY };
  }
  const sorted = [...values].sort((a, b) => a - b);
  return {
    avg: mean(sorted),
    min: sorted[0] ?? 0,
    max: sorted[sorted.length - 1] ?? 0,
    stddev: sampleStdDev(sorted),
    p50: percentileOfSorted(sorted, 50),
    p90: percentileOfSorted(sorted, 90),
    p95: percentileOfSorted(sorted, 95),
    p99: percentileOfSorted(sorted, 99),
  };
}
