/**
 * Artifact Collector Tests
 * @module tests/artifacts/collector
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ArtifactCollector, filterCampaignLines } from '../../src/artifacts/collector.js';
import { ResultsRepository } from '../../src/artifacts/results-repository.js';
import { FakeRemoteExecutor } from '../mocks/index.js';
import { createRecord, toJsonl } from '../factories/index.js';

const WORK_DIR = '/home/tester/benchmark_c-001';

describe('filterCampaignLines', () => {
  it('keeps the campaign, unidentified and unparsable lines', () => {
    const content = [
      'not json',
      '',
      '{"campaign_id":"c-001","request_id":"a"}',
      '{"benchmark_id":"c-002","request_id":"b"}',
      '{"request_id":"c"}',
      '42',
      '  {"campaign_id":"c-001","request_id":"d"}  ',
    ].join('\n');

    expect(filterCampaignLines('c-001', content)).toEqual({
      lines: [
        'not json',
        '{"campaign_id":"c-001","request_id":"a"}',
        '{"request_id":"c"}',
        '42',
        '{"campaign_id":"c-001","request_id":"d"}',
      ],
      dropped: 1,
    });
  });

  it('compares numeric ids as text', () => {
    expect(filterCampaignLines('7', '{"campaign_id":7}\n{"campaign_id":8}\n')).toEqual({
      lines: ['{"campaign_id":7}'],
      dropped: 1,
    });
  });
});

describe('ArtifactCollector', () => {
  let root: string;
  let executor: FakeRemoteExecutor;
  let repository: ResultsRepository;
  let collector: ArtifactCollector;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'bench-collect-'));
    executor = new FakeRemoteExecutor();
    repository = new ResultsRepository(root);
    collector = new ArtifactCollector(executor, repository);
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  function seedRemote(): void {
    executor.writeRemote(
      `${WORK_DIR}/metrics/requests_client-1.jsonl`,
      toJsonl([
        createRecord({ request_id: 'r1' }),
        createRecord({ request_id: 'r2' }),
        createRecord({ request_id: 'x1', campaign_id: 'c-002' }),
      ])
    );
    executor.writeRemote(`${WORK_DIR}/metrics/requests_client-2.jsonl`, `${JSON.stringify(createRecord({ request_id: 'r3' }))}\ngarbage\n`);
    executor.writeRemote(`${WORK_DIR}/logs/vllm_1000.out`, 'ready\n');
    executor.writeRemote(`${WORK_DIR}/logs/client-1_1001.err`, '');
    executor.writeRemote(`${WORK_DIR}/logs/notes.txt`, 'ignored');
  }

  it('downloads request files and logs and merges the requests', async () => {
    seedRemote();

    const result = await collector.collect('c-001', WORK_DIR);

    expect(result.metricsFiles).toEqual([
      join(root, 'c-001', 'metrics', 'requests_client-1.jsonl'),
      join(root, 'c-001', 'metrics', 'requests_client-2.jsonl'),
    ]);
    expect(result.logFiles).toEqual([
      join(root, 'c-001', 'logs', 'client-1_1001.err'),
      join(root, 'c-001', 'logs', 'vllm_1000.out'),
    ]);
    expect(result.requestsPath).toBe(join(root, 'c-001', 'requests.jsonl'));
    expect(result.mergedLines).toBe(4);
    expect(result.droppedLines).toBe(1);
    expect(result.errors).toEqual([]);
  });

  it('writes the merged records in file order', async () => {
    seedRemote();
    await collector.collect('c-001', WORK_DIR);

    const batch = await repository.readRequestRecords('c-001');

    expect(batch?.malformedLines).toBe(1);
    expect(batch?.records.map((r) => r.value)).toMatchObject([{ request_id: 'r1' }, { request_id: 'r2' }, { request_id: 'r3' }]);
  });

  it('collects nothing from an empty working directory', async () => {
    const result = await collector.collect('c-001', WORK_DIR);

    expect(result.requestsPath).toBeNull();
    expect(result.metricsFiles).toEqual([]);
    expect(result.errors).toEqual([]);
  });

  it('records failed downloads and keeps going', async () => {
    seedRemote();
    executor.failNext('download', 1);

    const result = await collector.collect('c-001', WORK_DIR);

    expect(result.errors).toEqual([
      `Failed to download ${WORK_DIR}/metrics/requests_client-1.jsonl: simulated download failure`,
    ]);
    expect(result.metricsFiles).toHaveLength(1);
    expect(result.mergedLines).toBe(2);
  });

  it('records an unreachable cluster', async () => {
    executor.failNext('execute', 1);

    const result = await collector.collect('c-001', WORK_DIR);

    expect(result.errors).toEqual(['Listing remote artifacts failed: simulated execute failure']);
    expect(result.requestsPath).toBeNull();
  });

  it('merges files that are already local', async () => {
    await collector.collect('c-001', WORK_DIR);
    const metricsDir = join(root, 'c-001', 'metrics');
    seedRemote();
    await executor.download(`${WORK_DIR}/metrics/requests_client-2.jsonl`, join(metricsDir, 'requests_client-2.jsonl'));

    const merged = await collector.mergeRequestFiles('c-001', metricsDir);

    expect(merged).toEqual({ path: join(root, 'c-001', 'requests.jsonl'), lines: 2, dropped: 0 });
    expect(await readFile(join(root, 'c-001', 'requests.jsonl'), 'utf-8')).toContain('"request_id":"r3"');
  });

  it('returns null when there is no local metrics directory', async () => {
    expect(await collector.mergeRequestFiles('c-001', join(root, 'missing'))).toBeNull();
  });
});
