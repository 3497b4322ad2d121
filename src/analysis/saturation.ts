/**
 * Saturation Analyzer
 * @module analysis/saturation
 *
 * Finds the latency knee, the throughput saturation point and the
 * SLO-bounded operating point of a parameter sweep.
 */

import type {
  KneePoint,
  ParametricFields,
  RecommendationBasis,
  SaturationReport,
  SloLimit,
  Summary,
  SweepPoint,
  ThroughputSaturation,
} from './types.js';
import { findKneeIndex } from './knee.js';
import { ConfigurationError, ConfigurationErrorCodes } from '../errors/index.js';
import { createModuleLogger } from '../logging/index.js';

const logger = createModuleLogger('saturation');

export const MIN_SWEEP_POINTS = 2;

export type NumericParameter = {
  [K in keyof ParametricFields]-?: NonNullable<ParametricFields[K]> extends number ? K : never;
}[keyof ParametricFields];

// ============================================================================
// Primitives
// ============================================================================

export function findKneePoint(xs: readonly number[], ys: readonly number[]): KneePoint | null {
  const knee = findKneeIndex(xs, ys);
  if (!knee) {
    return null;
  }
  return { index: knee.index, x: xs[knee.index] ?? 0, y: ys[knee.index] ?? 0, curvature: knee.curvature };
}

/**
 * Knee of p99 latency over the swept parameter
 */
export function findLatencyKnee(points: readonly SweepPoint[]): KneePoint | null {
  return findKneePoint(
    points.map((p) => p.x),
    points.map((p) => p.summary.latency.p99)
  );
}

/**
 * Knee of throughput over the swept parameter, plus per-point efficiency
 */
export function findThroughputSaturation(points: readonly SweepPoint[]): ThroughputSaturation {
  const xs = points.map((p) => p.x);
  const throughputs = points.map((p) => p.summary.throughput);

  let maxThroughput = 0;
  let maxThroughputX = xs[0] ?? 0;
  throughputs.forEach((t, i) => {
    if (t > maxThroughput) {
      maxThroughput = t;
      maxThroughputX = xs[i] ?? 0;
    }
  });

  return {
    knee: findKneePoint(xs, throughputs),
    efficiency: throughputs.map((t, i) => {
      const x = xs[i] ?? 0;
      return x > 0 ? t / x : 0;
    }),
    maxThroughput,
    maxThroughputX,
  };
}

/**
 * Largest x whose p99 is within the threshold (seconds)
 */
export function findSloLimit(xs: readonly number[], p99s: readonly number[], threshold: number): SloLimit {
  if (!Number.isFinite(threshold) || threshold <= 0) {
    throw new ConfigurationError(
      `SLO threshold must be a positive number, got ${threshold}`,
      ConfigurationErrorCodes.INVALID_THRESHOLDS
    );
  }

  let found: { x: number; p99: number } | null = null;
  for (let i = 0; i < xs.length; i++) {
    const x = xs[i];
    const p99 = p99s[i];
    if (x !== undefined && p99 !== undefined && p99 <= threshold && (!found || x > found.x)) {
      found = { x, p99 };
    }
  }

  if (!found) {
    return { met: false, threshold, reason: `No point meets SLO threshold of ${threshold}s` };
  }
  return {
    met: true,
    threshold,
    maxX: found.x,
    p99: found.p99,
    headroomPct: ((threshold - found.p99) / threshold) * 100,
  };
}

// ============================================================================
// Analysis
// ============================================================================

function recommend(
  latencyKnee: KneePoint | null,
  throughputKnee: KneePoint | null,
  sloLimit: SloLimit | null
): { recommendedX: number | null; recommendationBasis: RecommendationBasis } {
  if (sloLimit && sloLimit.met) {
    return { recommendedX: sloLimit.maxX, recommendationBasis: 'slo' };
  }
  if (latencyKnee && (!throughputKnee || latencyKnee.x <= throughputKnee.x)) {
    return { recommendedX: latencyKnee.x, recommendationBasis: 'latency_knee' };
  }
  if (throughputKnee) {
    return { recommendedX: throughputKnee.x, recommendationBasis: 'throughput_saturation' };
  }
  return { recommendedX: null, recommendationBasis: 'none' };
}

function reasoningFor(
  latencyKnee: KneePoint | null,
  throughputKnee: KneePoint | null,
  sloLimit: SloLimit | null
): string[] {
  const lines: string[] = [];
  if (sloLimit?.met) {
    lines.push(
      `SLO limit: x=${sloLimit.maxX} (P99=${(sloLimit.p99 * 1000).toFixed(1)}ms, headroom=${sloLimit.headroomPct.toFixed(1)}%)`
    );
  } else if (sloLimit) {
    lines.push(sloLimit.reason);
  }
  if (latencyKnee) {
    lines.push(`Latency knee: x=${latencyKnee.x} (P99=${(latencyKnee.y * 1000).toFixed(1)}ms)`);
  }
  if (throughputKnee) {
    lines.push(`Throughput saturation: x=${throughputKnee.x} (${throughputKnee.y.toFixed(1)} RPS)`);
  }
  return lines;
}

/**
 * Analyze a sweep. Points are ordered by x first. With an SLO threshold the
 * SLO-bounded x is recommended; otherwise the smaller of the two knees.
 */
export function analyzeSaturation(points: readonly SweepPoint[], sloThreshold?: number): SaturationReport {
  if (points.length < MIN_SWEEP_POINTS) {
    throw new ConfigurationError(
      `Saturation analysis needs at least ${MIN_SWEEP_POINTS} sweep points, got ${points.length}`,
      ConfigurationErrorCodes.INSUFFICIENT_DATA
    );
  }

  const sorted = [...points].sort((a, b) => a.x - b.x);
  const xs = sorted.map((p) => p.x);
  const latencyKnee = findLatencyKnee(sorted);
  const throughputSaturation = findThroughputSaturation(sorted);
  const sloLimit =
    sloThreshold === undefined
      ? null
      : findSloLimit(
          xs,
          sorted.map((p) => p.summary.latency.p99),
          sloThreshold
        );

  const report: SaturationReport = {
    xs,
    latencyKnee,
    throughputSaturation,
    sloLimit,
    ...recommend(latencyKnee, throughputSaturation.knee, sloLimit),
    reasoning: reasoningFor(latencyKnee, throughputSaturation.knee, sloLimit),
  };

  logger.debug(
    { points: xs.length, recommendedX: report.recommendedX, basis: report.recommendationBasis },
    'Saturation analysis complete'
  );
  return report;
}

/**
 * Sweep points from summaries, using one parametric field as x. Summaries
 * without that field are left out.
 */
export function toSweepPoints(summaries: readonly Summary[], parameter: NumericParameter = 'concurrency'): SweepPoint[] {
  const points: SweepPoint[] = [];
  for (const summary of summaries) {
    const x = summary.parametric[parameter];
    if (x === undefined) {
      logger.warn({ campaignId: summary.campaignId, parameter }, 'Summary has no sweep parameter; left out');
      continue;
    }
    points.push({ x, summary });
  }
  return points;
}
