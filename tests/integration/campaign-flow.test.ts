/**
 * Campaign Flow Integration Tests
 * @module tests/integration/campaign-flow
 *
 * Drives a whole campaign through the public entry point: deploy, wait for
 * the clients, collect, aggregate, classify and compare.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  OrchestratorConfigSchema,
  PostgresEntityStore,
  classifyBottleneck,
  createOrchestrator,
  listCampaignInfo,
  type ClientDeployment,
  type OrchestratorConfig,
} from '../../src/index.js';
import { FakeClock, FakeRemoteExecutor, InMemorySqlPool } from '../mocks/index.js';
import { createRecord, createSummary, createSweep, toJsonl } from '../factories/index.js';

const CAMPAIGN = 'c-100';
const WORK_DIR = '/home/tester/benchmark_c-100';

describe('campaign flow', () => {
  let root: string;
  let executor: FakeRemoteExecutor;
  let clock: FakeClock;
  let config: OrchestratorConfig;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'bench-flow-'));
    executor = new FakeRemoteExecutor();
    clock = new FakeClock();
    config = OrchestratorConfigSchema.parse({
      storage: { rootDir: join(root, 'state') },
      remote: { target: 'test-cluster' },
      polling: { jobPollIntervalMs: 1000 },
      analysis: { resultsDir: join(root, 'results') },
    });
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('runs a campaign from deployment to verdict', async () => {
    const orchestrator = await createOrchestrator(config, { executor, clock, scratchDir: join(root, 'scratch') });
    const { manager, repository } = orchestrator;

    executor.setJobStates('1000', 'PENDING', 'PENDING', 'RUNNING');
    executor.writeRemote(`${WORK_DIR}/vllm.hostname`, 'gpu-node-3\n');
    const service = await manager.deployService(CAMPAIGN, {
      name: 'vllm',
      image: 'vllm/vllm-openai:latest',
      command: 'vllm serve small-model',
      port: 8000,
      resources: { gpus: 1, timeLimit: '01:00:00' },
    });
    expect(service.ok && service.value.endpoint).toEqual({ host: 'gpu-node-3', port: 8000 });
    expect(clock.sleeps).toEqual([1000, 1000]);

    const outcomes = await manager.deployClients(CAMPAIGN, { command: 'bin/loadgen --rate 10' }, 2, 'vllm');
    const clients = outcomes.flatMap((o): ClientDeployment[] => (o.deployment ? [o.deployment] : []));
    expect(clients.map((c) => c.jobId)).toEqual(['1001', '1002']);

    await orchestrator.recordRun(CAMPAIGN, { service: 'vllm', clients: 2 });
    expect(await repository.readRunMetadata(CAMPAIGN)).toMatchObject({
      target: 'test-cluster',
      service: { name: 'vllm', jobId: '1000' },
      endedAt: null,
    });
    expect((await repository.readRunMetadata(CAMPAIGN))?.clients).toHaveLength(2);

    const lifecycle = orchestrator.lifecycle(CAMPAIGN);
    expect((await lifecycle.checkComplete()).complete).toBe(false);

    executor.setJobStates('1001', 'COMPLETED');
    executor.setJobStates('1002', 'COMPLETED');
    const check = await lifecycle.checkComplete();
    expect(check).toMatchObject({ complete: true, serviceState: 'RUNNING', clientsDone: 2, clientsTotal: 2 });

    executor.writeRemote(
      `${WORK_DIR}/metrics/requests_client-1.jsonl`,
      toJsonl([
        createRecord({ campaign_id: CAMPAIGN, timestamp_start: 100, latency_s: 0.1 }),
        createRecord({ campaign_id: CAMPAIGN, timestamp_start: 101, latency_s: 0.2 }),
        createRecord({ campaign_id: CAMPAIGN, timestamp_start: 102, latency_s: 0.3 }),
      ])
    );
    executor.writeRemote(
      `${WORK_DIR}/metrics/requests_client-2.jsonl`,
      toJsonl([
        createRecord({ campaign_id: CAMPAIGN, timestamp_start: 103, latency_s: 0.4 }),
        createRecord({ campaign_id: CAMPAIGN, timestamp_start: 104, latency_s: 5, success: false, error: 'Request timeout' }),
      ])
    );
    executor.writeRemote(`${WORK_DIR}/logs/vllm_1000.out`, 'ready\n');

    const completion = await lifecycle.complete();

    expect(completion).toMatchObject({ stopped: true, collected: true, aggregated: true, errors: [] });
    expect(completion.collection?.logFiles).toEqual([join(root, 'results', CAMPAIGN, 'logs', 'vllm_1000.out')]);

    const summary = completion.summary;
    expect(summary).toMatchObject({
      totalRequests: 5,
      successfulRequests: 4,
      failedRequests: 1,
      successRate: 80,
      startTime: 100,
      endTime: 109,
      durationS: 9,
      errorSummary: { 'Request timeout': 1 },
    });
    if (!summary) return;

    const bottleneck = classifyBottleneck(summary);
    expect(bottleneck.classification).toBe('queueing');
    expect(bottleneck.scores.queueing).toBe(4);

    const verdict = orchestrator.compare({ ...summary, campaignId: 'c-099', successRate: 99 }, summary);
    expect(verdict.verdict).toBe('FAIL');
    expect(verdict.regressions.map((r) => r.metric)).toEqual(['Success Rate (%)']);
    expect(await repository.writeComparison(verdict)).toBe(join(root, 'results', 'comparisons', 'c-099__c-100.json'));

    const [info] = await listCampaignInfo(orchestrator.store);
    expect(info).toMatchObject({ campaignId: CAMPAIGN, serviceName: 'vllm', serviceJobId: '1000', clientCount: 2 });
    expect((await repository.readRunMetadata(CAMPAIGN))?.endedAt).not.toBeNull();
  });

  it('applies the configured regression thresholds and SLO', async () => {
    const orchestrator = await createOrchestrator(
      OrchestratorConfigSchema.parse({
        ...config,
        analysis: { ...config.analysis, sloP99Seconds: 0.5, regression: { successRatePct: 25 } },
      }),
      { executor, clock, scratchDir: join(root, 'scratch') }
    );
    const baseline = createSummary({ successRate: 99 });

    const verdict = orchestrator.compare(baseline, { ...baseline, campaignId: 'c-101', successRate: 80 });
    expect(verdict.thresholds).toEqual({ latencyPct: 10, throughputPct: 10, successRatePct: 25 });
    expect(verdict.verdict).toBe('PASS');

    const report = orchestrator.analyzeSaturation(
      createSweep([1, 2, 4, 8, 16, 32], [0.1, 0.1, 0.12, 0.2, 0.9, 3.0], [10, 20, 38, 45, 47, 48])
    );
    expect(report.sloLimit).toMatchObject({ met: true, threshold: 0.5, maxX: 8 });
    expect(report.recommendationBasis).toBe('slo');
  });

  it('persists deployment records through the postgres store', async () => {
    const pool = new InMemorySqlPool();
    const store = new PostgresEntityStore(pool);
    const orchestrator = await createOrchestrator(
      { ...config, storage: { ...config.storage, backend: 'postgres' } },
      { executor, clock, store, scratchDir: join(root, 'scratch') }
    );

    const result = await orchestrator.manager.deployService(CAMPAIGN, {
      name: 'redis',
      image: 'redis:7',
      command: 'redis-server',
      port: 6379,
      waitForStart: false,
    });

    expect(result.ok).toBe(true);
    expect(pool.statements()).toContain('INSERT INTO');
    expect((await orchestrator.manager.loadService(CAMPAIGN, 'redis'))?.jobId).toBe('1000');
    expect(await store.listCampaigns()).toEqual([CAMPAIGN]);
  });
});
