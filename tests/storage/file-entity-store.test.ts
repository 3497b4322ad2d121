/**
 * File Entity Store Tests
 * @module tests/storage/file-entity-store
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { FileEntityStore } from '../../src/storage/file-entity-store.js';

describe('FileEntityStore', () => {
  let root: string;
  let store: FileEntityStore;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'bench-store-'));
    store = new FileEntityStore(root);
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('round-trips attributes including dates', async () => {
    const attrs = { name: 'vllm', submitTime: new Date('2024-05-01T10:00:00Z'), endpoint: { host: 'n1', port: 8000 } };

    expect(await store.save('c-001', 'service', 'vllm', attrs)).toBe(true);
    expect(await store.load('c-001', 'service', 'vllm')).toEqual(attrs);
  });

  it('upserts by id and keeps insertion order', async () => {
    await store.save('c-001', 'client', 'client-1', { n: 1 });
    await store.save('c-001', 'client', 'client-2', { n: 2 });
    await store.save('c-001', 'client', 'client-1', { n: 3 });

    expect(await store.loadAll('c-001', 'client')).toEqual([{ n: 3 }, { n: 2 }]);
  });

  it('writes one JSON container per campaign and kind', async () => {
    await store.save('c-001', 'service', 'vllm', { port: 8000 });

    const raw = JSON.parse(await readFile(join(root, 'c-001', 'service.json'), 'utf-8'));
    expect(raw).toEqual({ vllm: { port: 8000 } });
  });

  it('returns empty results for unknown entities', async () => {
    expect(await store.load('c-404', 'service', 'vllm')).toBeNull();
    expect(await store.loadAll('c-404', 'client')).toEqual([]);
    expect(await store.delete('c-404', 'client', 'client-1')).toBe(false);
  });

  it('deletes one entity', async () => {
    await store.save('c-001', 'client', 'client-1', { n: 1 });
    await store.save('c-001', 'client', 'client-2', { n: 2 });

    expect(await store.delete('c-001', 'client', 'client-1')).toBe(true);
    expect(await store.loadAll('c-001', 'client')).toEqual([{ n: 2 }]);
  });

  it('lists campaigns that own a container', async () => {
    await store.save('c-002', 'client', 'client-1', {});
    await store.save('c-001', 'service', 'vllm', {});
    await mkdir(join(root, 'stray'));

    expect(await store.listCampaigns()).toEqual(['c-001', 'c-002']);
  });

  it('lists nothing when the root does not exist', async () => {
    expect(await new FileEntityStore(join(root, 'missing')).listCampaigns()).toEqual([]);
  });

  it('reports corrupt containers instead of throwing', async () => {
    await mkdir(join(root, 'c-001'));
    await writeFile(join(root, 'c-001', 'service.json'), '{ not json');

    expect(await store.load('c-001', 'service', 'vllm')).toBeNull();
    expect(await store.loadAll('c-001', 'service')).toEqual([]);
    expect(await store.save('c-001', 'service', 'vllm', { a: 1 })).toBe(false);
  });

  it('rejects path-like campaign ids', async () => {
    expect(await store.save('../escape', 'service', 'vllm', {})).toBe(false);
    expect(await store.load('..', 'service', 'vllm')).toBeNull();
  });
});
