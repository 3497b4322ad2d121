/**
 * Logging and Metrics Tests
 * @module tests/logging/logging
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import {
  createLogger,
  createModuleLogger,
  getMetrics,
  getLogger,
  getMetricsContentType,
  jobsSubmitted,
  regressionsDetected,
  resetLogger,
  resetMetrics,
  withLogging,
} from '../../src/logging/index.js';
import { compare } from '../../src/analysis/regression.js';
import { createSummary } from '../factories/index.js';

describe('logger', () => {
  it('takes its level from the environment', () => {
    expect(createLogger('test').level).toBe('silent');
  });

  it('shares one root logger until it is reset', () => {
    const root = getLogger();
    expect(getLogger()).toBe(root);

    resetLogger();
    expect(getLogger()).not.toBe(root);
  });

  it('binds the module name and added context', () => {
    const logger = createModuleLogger('collector').withContext({ campaignId: 'c-001' });

    expect(logger.bindings()).toMatchObject({ module: 'collector', campaignId: 'c-001' });
  });

  it('records the duration of wrapped operations', async () => {
    const logger = createModuleLogger('timing');
    const metric = vi.spyOn(logger, 'performanceMetric');

    await expect(withLogging(logger, 'work', async () => 42)).resolves.toBe(42);
    await expect(withLogging(logger, 'broken', async () => Promise.reject(new Error('boom')))).rejects.toThrow('boom');

    expect(metric.mock.calls.map(([operation, , metadata]) => [operation, metadata])).toEqual([
      ['work', { status: 'success' }],
      ['broken', { status: 'error' }],
    ]);
  });
});

describe('metrics', () => {
  beforeEach(() => {
    resetMetrics();
  });

  it('counts by label', async () => {
    jobsSubmitted.inc({ kind: 'service', outcome: 'accepted' });
    jobsSubmitted.inc({ kind: 'client', outcome: 'accepted' }, 2);

    const { values } = await jobsSubmitted.get();
    const clients = values.find((v) => v.labels.kind === 'client');
    expect(clients?.value).toBe(2);
  });

  it('counts detected regressions', async () => {
    const baseline = createSummary({ throughput: 100 });
    compare(baseline, { ...baseline, throughput: 50 });

    const { values } = await regressionsDetected.get();
    expect(values).toEqual([expect.objectContaining({ labels: expect.objectContaining({ metric: 'throughput' }), value: 1 })]);
  });

  it('exposes the registry in text format', async () => {
    jobsSubmitted.inc({ kind: 'service', outcome: 'rejected' });

    expect(await getMetrics()).toContain('bench_jobs_submitted_total');
    expect(getMetricsContentType()).toContain('text/plain');
  });
});
