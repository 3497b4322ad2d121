/**
 * Prometheus Metrics
 * @module logging/metrics
 *
 * Prometheus-compatible counters and histograms for job submission,
 * scheduler polling, remote retries and telemetry aggregation.
 */

import { Counter, Histogram, Gauge, Registry } from 'prom-client';

// ============================================================================
// Registry Setup
// ============================================================================

/**
 * Dedicated metrics registry for the orchestrator
 */
export const metricsRegistry = new Registry();

metricsRegistry.setDefaultLabels({
  service: process.env.SERVICE_NAME ?? 'hpc-bench-orchestrator',
});

// ============================================================================
// Deployment Metrics
// ============================================================================

export const jobsSubmitted = new Counter({
  name: 'bench_jobs_submitted_total',
  help: 'Total number of jobs submitted to the scheduler',
  labelNames: ['kind', 'outcome'],
  registers: [metricsRegistry],
});

export const jobStateTransitions = new Counter({
  name: 'bench_job_state_transitions_total',
  help: 'Observed job state transitions',
  labelNames: ['to'],
  registers: [metricsRegistry],
});

export const remoteRetries = new Counter({
  name: 'bench_remote_retries_total',
  help: 'Retries of remote executor operations',
  labelNames: ['operation'],
  registers: [metricsRegistry],
});

export const waitDuration = new Histogram({
  name: 'bench_wait_duration_seconds',
  help: 'Time spent waiting for jobs, endpoints and health checks',
  labelNames: ['phase', 'outcome'],
  buckets: [1, 5, 15, 30, 60, 120, 300, 600, 1800],
  registers: [metricsRegistry],
});

export const activeServices = new Gauge({
  name: 'bench_active_services',
  help: 'Service deployments believed to be running',
  registers: [metricsRegistry],
});

// ============================================================================
// Analysis Metrics
// ============================================================================

export const recordsProcessed = new Counter({
  name: 'bench_records_processed_total',
  help: 'Telemetry records read by the aggregator',
  labelNames: ['outcome'],
  registers: [metricsRegistry],
});

export const aggregationDuration = new Histogram({
  name: 'bench_aggregation_duration_seconds',
  help: 'Time spent aggregating campaign telemetry',
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 5, 10],
  registers: [metricsRegistry],
});

export const regressionsDetected = new Counter({
  name: 'bench_regressions_detected_total',
  help: 'Metrics flagged as regressed by the comparator',
  labelNames: ['metric'],
  registers: [metricsRegistry],
});

// ============================================================================
// Export Functions
// ============================================================================

export async function getMetrics(): Promise<string> {
  return metricsRegistry.metrics();
}

export function getMetricsContentType(): string {
  return metricsRegistry.contentType;
}

/**
 * Reset all metrics (primarily for testing)
 */
export function resetMetrics(): void {
  metricsRegistry.resetMetrics();
}
