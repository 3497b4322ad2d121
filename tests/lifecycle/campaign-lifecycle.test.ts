/**
 * Campaign Lifecycle Tests
 * @module tests/lifecycle/campaign-lifecycle
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { CampaignLifecycle } from '../../src/lifecycle/campaign-lifecycle.js';
import { DeploymentManager } from '../../src/deployment/deployment-manager.js';
import { ArtifactCollector } from '../../src/artifacts/collector.js';
import { ResultsRepository } from '../../src/artifacts/results-repository.js';
import { FileEntityStore } from '../../src/storage/file-entity-store.js';
import { CollectionLock } from '../../src/storage/collection-lock.js';
import { FakeClock, FakeRemoteExecutor } from '../mocks/index.js';
import { createRecord, toJsonl } from '../factories/index.js';

const CAMPAIGN = 'c-001';
const WORK_DIR = '/home/tester/benchmark_c-001';

describe('CampaignLifecycle', () => {
  let root: string;
  let executor: FakeRemoteExecutor;
  let manager: DeploymentManager;
  let repository: ResultsRepository;
  let lifecycle: CampaignLifecycle;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'bench-lifecycle-'));
    executor = new FakeRemoteExecutor();
    manager = new DeploymentManager({
      executor,
      store: new FileEntityStore(join(root, 'state')),
      clock: new FakeClock(),
      scratchDir: join(root, 'scratch'),
    });
    repository = new ResultsRepository(join(root, 'results'));
    lifecycle = new CampaignLifecycle(CAMPAIGN, {
      manager,
      collector: new ArtifactCollector(executor, repository),
      repository,
    });
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  async function deployCampaign(clients: number): Promise<void> {
    executor.setJobStates('1000', 'RUNNING');
    executor.writeRemote(`${WORK_DIR}/vllm.hostname`, 'node-17');
    const service = await manager.deployService(CAMPAIGN, { name: 'vllm', image: 'img', command: 'serve', port: 8000 });
    if (!service.ok) {
      throw service.error;
    }
    await manager.deployClients(CAMPAIGN, { command: 'run' }, clients, service.value);
  }

  function seedRequests(): void {
    executor.writeRemote(
      `${WORK_DIR}/metrics/requests_client-1.jsonl`,
      toJsonl([createRecord({ latency_s: 0.2 }), createRecord({ latency_s: 0.4, timestamp_start: 101 })])
    );
  }

  describe('checkComplete', () => {
    it('is incomplete while a client runs', async () => {
      await deployCampaign(2);
      executor.setJobStates('1001', 'COMPLETED');
      executor.setJobStates('1002', 'RUNNING');

      expect(await lifecycle.checkComplete()).toMatchObject({
        complete: false,
        serviceState: 'RUNNING',
        clientsDone: 1,
        clientsTotal: 2,
      });
    });

    it('is complete once every client is terminal', async () => {
      await deployCampaign(2);
      executor.setJobStates('1001', 'COMPLETED');
      executor.setJobStates('1002', 'FAILED');

      const check = await lifecycle.checkComplete();

      expect(check.complete).toBe(true);
      expect(check.clients.map((c) => c.state)).toEqual(['COMPLETED', 'FAILED']);
    });

    it('is never complete without clients and counts planned ones', async () => {
      await mkdir(join(repository.resultsDir, CAMPAIGN), { recursive: true });
      await writeFile(
        join(repository.resultsDir, CAMPAIGN, 'run.json'),
        JSON.stringify({
          campaignId: CAMPAIGN,
          createdAt: '2024-03-01T12:00:00.000Z',
          endedAt: null,
          target: 'cluster',
          recipeHash: 'abc',
          recipe: {},
          service: null,
          clients: [{ name: 'client-1' }, { name: 'client-2' }],
        })
      );

      const check = await lifecycle.checkComplete();

      expect(check).toMatchObject({ complete: false, serviceState: 'UNKNOWN', clientsDone: 0, clientsTotal: 2 });
    });
  });

  describe('complete', () => {
    it('stops, collects and aggregates', async () => {
      await deployCampaign(1);
      seedRequests();
      await repository.writeRunMetadata({ campaignId: CAMPAIGN, target: 'cluster', recipe: {}, service: null, clients: [] });

      const result = await lifecycle.complete();

      expect(result).toMatchObject({ stopped: true, collected: true, aggregated: true, errors: [] });
      expect(executor.cancelled).toEqual(['1000', '1001']);
      expect(result.summary?.totalRequests).toBe(2);
      expect(result.collection?.mergedLines).toBe(2);
      expect(await repository.readSummary(CAMPAIGN)).toEqual(result.summary);
      expect((await repository.readRunMetadata(CAMPAIGN))?.endedAt).not.toBeNull();
    });

    it('reports cancel failures and still collects', async () => {
      await deployCampaign(1);
      seedRequests();
      executor.rejectCancels = true;

      const result = await lifecycle.complete();

      expect(result.stopped).toBe(false);
      expect(result.aggregated).toBe(true);
      expect(result.errors).toEqual(['Failed to cancel service vllm (job 1000)', 'Failed to cancel client client-1 (job 1001)']);
    });

    it('skips aggregation when nothing was collected', async () => {
      const result = await lifecycle.complete();

      expect(result).toMatchObject({
        stopped: true,
        collected: false,
        aggregated: false,
        errors: ['No request records collected'],
      });
      expect(result.summary).toBeUndefined();
    });

    it('refuses to collect while another collection holds the lock', async () => {
      seedRequests();
      const lock = new CollectionLock(repository.resultsDir, CAMPAIGN);
      expect(await lock.acquire()).toBe(true);

      try {
        const result = await lifecycle.complete({ stop: false });
        expect(result.collected).toBe(false);
        expect(result.aggregated).toBe(false);
        expect(result.errors).toEqual(['Collection already in progress']);
      } finally {
        await lock.release();
      }
    });

    it('releases the lock after collecting', async () => {
      seedRequests();
      await lifecycle.complete({ stop: false, aggregate: false });

      expect(await new CollectionLock(repository.resultsDir, CAMPAIGN).isHeld()).toBe(false);
    });

    it('reports unreadable run metadata after finishing the other steps', async () => {
      await deployCampaign(1);
      seedRequests();
      const runFile = join(await repository.ensureCampaignDir(CAMPAIGN), 'run.json');
      await writeFile(runFile, JSON.stringify({ campaignId: CAMPAIGN }), 'utf-8');

      const result = await lifecycle.complete();

      expect(result).toMatchObject({ stopped: true, collected: true, aggregated: true });
      expect(result.errors).toEqual([`Marking run ended failed: Invalid run metadata in ${runFile}`]);
    });

    it('reports a results directory it cannot write to', async () => {
      const blocked = join(root, 'blocked');
      await writeFile(blocked, 'not a directory', 'utf-8');
      const blockedRepository = new ResultsRepository(blocked);
      const blockedLifecycle = new CampaignLifecycle(CAMPAIGN, {
        manager,
        collector: new ArtifactCollector(executor, blockedRepository),
        repository: blockedRepository,
      });

      const result = await blockedLifecycle.complete({ stop: false });

      expect(result).toMatchObject({ collected: false, aggregated: false });
      expect(result.errors).toEqual([
        expect.stringMatching(/^Collection lock failed: ENOTDIR/),
        expect.stringMatching(/^Marking run ended failed: ENOTDIR/),
      ]);
    });

    it('aggregates existing files without collecting', async () => {
      await repository.writeRequestLines(CAMPAIGN, [JSON.stringify(createRecord())]);

      const result = await lifecycle.complete({ stop: false, collect: false });

      expect(result).toMatchObject({ stopped: false, collected: false, aggregated: true, errors: [] });
      expect(result.summary?.totalRequests).toBe(1);
      expect(executor.commands).toEqual([]);
    });
  });
});
