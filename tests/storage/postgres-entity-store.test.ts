/**
 * PostgreSQL Entity Store Tests
 * @module tests/storage/postgres-entity-store
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { PostgresEntityStore } from '../../src/storage/postgres-entity-store.js';
import { InMemorySqlPool } from '../mocks/index.js';

describe('PostgresEntityStore', () => {
  let pool: InMemorySqlPool;
  let store: PostgresEntityStore;

  beforeEach(() => {
    pool = new InMemorySqlPool();
    store = new PostgresEntityStore(pool, 'bench_entities');
  });

  it('creates its table', async () => {
    await store.ensureSchema();

    expect(pool.query.mock.calls[0]?.[0]).toContain('CREATE TABLE IF NOT EXISTS bench_entities');
  });

  it('saves inside a transaction with a row lock', async () => {
    const saved = await store.save('c-001', 'service', 'vllm', { port: 8000 });

    expect(saved).toBe(true);
    expect(pool.statements()).toEqual(['BEGIN', 'SELECT entities', 'INSERT INTO', 'COMMIT']);
    expect(pool.query.mock.calls[1]?.[0]).toContain('FOR UPDATE');
    expect(pool.released).toHaveBeenCalledTimes(1);
  });

  it('round-trips attributes and preserves order', async () => {
    const submitTime = new Date('2024-05-01T10:00:00Z');
    await store.save('c-001', 'client', 'client-2', { submitTime });
    await store.save('c-001', 'client', 'client-1', { n: 1 });

    expect(await store.load('c-001', 'client', 'client-2')).toEqual({ submitTime });
    expect(await store.loadAll('c-001', 'client')).toEqual([{ submitTime }, { n: 1 }]);
  });

  it('deletes and reports unknown ids', async () => {
    await store.save('c-001', 'client', 'client-1', { n: 1 });

    expect(await store.delete('c-001', 'client', 'client-9')).toBe(false);
    expect(await store.delete('c-001', 'client', 'client-1')).toBe(true);
    expect(await store.loadAll('c-001', 'client')).toEqual([]);
  });

  it('lists campaigns', async () => {
    await store.save('c-002', 'service', 'redis', {});
    await store.save('c-001', 'client', 'client-1', {});
    await store.save('c-001', 'service', 'vllm', {});

    expect(await store.listCampaigns()).toEqual(['c-001', 'c-002']);
  });

  it('rolls back and returns false when a write fails', async () => {
    pool.failOn = /^INSERT/;

    expect(await store.save('c-001', 'service', 'vllm', {})).toBe(false);
    expect(pool.statements()).toEqual(['BEGIN', 'SELECT entities', 'INSERT INTO', 'ROLLBACK']);
    expect(pool.released).toHaveBeenCalledTimes(1);
  });

  it('returns empty results when reads fail', async () => {
    pool.failOn = /^SELECT/;

    expect(await store.load('c-001', 'service', 'vllm')).toBeNull();
    expect(await store.loadAll('c-001', 'service')).toEqual([]);
    expect(await store.listCampaigns()).toEqual([]);
  });

  it('closes the pool', async () => {
    await store.close();

    expect(pool.ended).toHaveBeenCalledTimes(1);
  });
});
