/**
 * Regression Comparator
 * @module analysis/regression
 *
 * Compares a current summary against a baseline. Latency regresses when it
 * grows past its threshold; throughput and success rate regress when they
 * drop past theirs. Any regression fails the comparison.
 */

import type { MetricChange, MetricComparison, MetricType, RegressionVerdict, Summary } from './types.js';
import { RegressionThresholdsSchema, type RegressionThresholds } from '../config/index.js';
import { ConfigurationError, ConfigurationErrorCodes } from '../errors/index.js';
import { createModuleLogger, regressionsDetected } from '../logging/index.js';

const logger = createModuleLogger('regression');

interface TrackedMetric {
  path: string;
  label: string;
  type: MetricType;
  read(summary: Summary): number;
}

const TRACKED_METRICS: readonly TrackedMetric[] = [
  { path: 'successRate', label: 'Success Rate (%)', type: 'success_rate', read: (s) => s.successRate },
  { path: 'latency.avg', label: 'Avg Latency (s)', type: 'latency', read: (s) => s.latency.avg },
  { path: 'latency.p95', label: 'P95 Latency (s)', type: 'latency', read: (s) => s.latency.p95 },
  { path: 'latency.p99', label: 'P99 Latency (s)', type: 'latency', read: (s) => s.latency.p99 },
  { path: 'throughput', label: 'Throughput (RPS)', type: 'throughput', read: (s) => s.throughput },
];

/**
 * Merge caller thresholds over the defaults and validate them
 */
export function resolveThresholds(overrides: Partial<RegressionThresholds> = {}): RegressionThresholds {
  const parsed = RegressionThresholdsSchema.safeParse(overrides);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigurationError(
      `Invalid regression thresholds: ${issues.join('; ')}`,
      ConfigurationErrorCodes.INVALID_THRESHOLDS,
      issues
    );
  }
  return parsed.data;
}

export function percentChange(baseline: number, current: number): number {
  return baseline === 0 ? 0 : ((current - baseline) / baseline) * 100;
}

function thresholdFor(type: MetricType, thresholds: RegressionThresholds): number {
  switch (type) {
    case 'latency':
      return thresholds.latencyPct;
    case 'throughput':
      return thresholds.throughputPct;
    case 'success_rate':
      return thresholds.successRatePct;
  }
}

function formatChange(pct: number): string {
  return `${pct >= 0 ? '+' : ''}${pct.toFixed(1)}%`;
}

export function compareMetric(
  metric: Pick<TrackedMetric, 'label' | 'type'>,
  baseline: number,
  current: number,
  thresholds: RegressionThresholds
): MetricComparison {
  const pct = percentChange(baseline, current);
  const threshold = thresholdFor(metric.type, thresholds);
  // Latency is better when lower; the other metrics when higher.
  const worse = metric.type === 'latency' ? pct > threshold : pct < -threshold;
  const better = metric.type === 'latency' ? pct < -threshold : pct > threshold;

  return {
    label: metric.label,
    type: metric.type,
    baseline,
    current,
    delta: current - baseline,
    percentChange: pct,
    regression: worse,
    improvement: !worse && better,
    threshold,
  };
}

/**
 * Compare two summaries. Thresholds are percentages, merged over
 * {latency 10, throughput 10, success rate 1}.
 */
export function compare(
  baseline: Summary,
  current: Summary,
  thresholds: Partial<RegressionThresholds> = {}
): RegressionVerdict {
  const resolved = resolveThresholds(thresholds);
  const verdict: RegressionVerdict = {
    baselineId: baseline.campaignId,
    currentId: current.campaignId,
    thresholds: resolved,
    metrics: {},
    regressions: [],
    improvements: [],
    verdict: 'PASS',
  };

  for (const metric of TRACKED_METRICS) {
    const comparison = compareMetric(metric, metric.read(baseline), metric.read(current), resolved);
    verdict.metrics[metric.path] = comparison;

    const change: MetricChange = {
      metric: metric.label,
      change: formatChange(comparison.percentChange),
      threshold: comparison.threshold,
    };
    if (comparison.regression) {
      verdict.regressions.push(change);
      regressionsDetected.inc({ metric: metric.path });
      logger.regressionDetected(metric.label, comparison.percentChange, comparison.threshold);
    } else if (comparison.improvement) {
      verdict.improvements.push(change);
    }
  }

  verdict.verdict = verdict.regressions.length > 0 ? 'FAIL' : 'PASS';
  return verdict;
}
