/**
 * Configuration Loader Tests
 * @module tests/config/loader
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  ConfigLoader,
  EnvironmentConfigSource,
  FileConfigSource,
  getConfig,
  initConfig,
  isConfigInitialized,
  resetConfig,
  validateConfig,
} from '../../src/config/index.js';
import { ConfigurationError, ErrorCodes } from '../../src/errors/index.js';

describe('ConfigLoader', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'bench-config-'));
  });

  afterEach(async () => {
    resetConfig();
    await rm(dir, { recursive: true, force: true });
  });

  it('yields defaults without sources', async () => {
    const config = await new ConfigLoader({ sources: [] }).load();

    expect(config.storage).toEqual({ backend: 'file', rootDir: '.bench/state', table: 'entity_containers' });
    expect(config.remote.workDirTemplate).toBe('~/benchmark_{campaignId}');
    expect(config.polling.jobPollIntervalMs).toBe(5000);
    expect(config.polling.jobStartTimeoutMs).toBe(300_000);
    expect(config.polling.endpointInitialDelayMs).toBe(1000);
    expect(config.polling.endpointMaxDelayMs).toBe(10_000);
    expect(config.retry).toEqual({ maxAttempts: 3, delayMs: 1000, backoffMultiplier: 2, maxDelayMs: 10_000 });
    expect(config.analysis.regression).toEqual({ latencyPct: 10, throughputPct: 10, successRatePct: 1 });
    expect(config.analysis.sloP99Seconds).toBeUndefined();
  });

  it('lets the environment override the file', async () => {
    const path = join(dir, 'bench.config.yaml');
    await writeFile(
      path,
      ['remote:', '  target: cluster-a', 'polling:', '  jobPollIntervalMs: 1000', 'analysis:', '  sloP99Seconds: 0.5'].join(
        '\n'
      )
    );
    const loader = new ConfigLoader({
      sources: [
        new EnvironmentConfigSource({ BENCH_TARGET: 'cluster-b', BENCH_REGRESSION_LATENCY_PCT: '5' }),
        new FileConfigSource(path),
      ],
    });

    const config = await loader.load();

    expect(config.remote.target).toBe('cluster-b');
    expect(config.polling.jobPollIntervalMs).toBe(1000);
    expect(config.analysis.sloP99Seconds).toBe(0.5);
    expect(config.analysis.regression).toEqual({ latencyPct: 5, throughputPct: 10, successRatePct: 1 });
  });

  it('coerces numeric environment strings', async () => {
    const config = await new ConfigLoader({
      sources: [new EnvironmentConfigSource({ BENCH_JOB_POLL_INTERVAL_MS: '2500', BENCH_RETRY_ATTEMPTS: '5' })],
    }).load();

    expect(config.polling.jobPollIntervalMs).toBe(2500);
    expect(config.retry.maxAttempts).toBe(5);
  });

  it('rejects invalid values with the offending path', async () => {
    const loader = new ConfigLoader({
      sources: [new EnvironmentConfigSource({ BENCH_REGRESSION_LATENCY_PCT: '-5' })],
    });

    const error = await loader.load().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConfigurationError);
    if (error instanceof ConfigurationError) {
      expect(error.code).toBe(ErrorCodes.INVALID_CONFIG);
      expect(error.issues).toHaveLength(1);
      expect(error.issues[0]).toMatch(/^analysis\.regression\.latencyPct: /);
    }
  });

  it('rejects a file that is not a mapping', async () => {
    const path = join(dir, 'list.yaml');
    await writeFile(path, '- a\n- b\n');

    await expect(new ConfigLoader({ sources: [new FileConfigSource(path)] }).load()).rejects.toMatchObject({
      code: ErrorCodes.CONFIG_FILE_ERROR,
    });
  });

  it('skips a missing file', async () => {
    const source = new FileConfigSource(join(dir, 'absent.yaml'));

    expect(source.isAvailable()).toBe(false);
    await expect(source.load()).resolves.toEqual({});
  });

  it('caches until invalidated', async () => {
    const loader = new ConfigLoader({ sources: [] });
    const first = await loader.load();

    expect(await loader.load()).toBe(first);
    loader.invalidateCache();
    expect(loader.isLoaded()).toBe(false);
    expect(await loader.load()).not.toBe(first);
  });

  it('exposes the cached value through getConfig', async () => {
    expect(isConfigInitialized()).toBe(false);
    expect(() => getConfig()).toThrow(ConfigurationError);

    const config = await initConfig({ sources: [] });

    expect(getConfig()).toBe(config);
  });

  it('validates a value without loading', () => {
    expect(validateConfig({ storage: { backend: 'file' } }).success).toBe(true);
    expect(validateConfig({ storage: { backend: 'sqlite' } }).success).toBe(false);
  });
});
