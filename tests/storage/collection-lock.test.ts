/**
 * Collection Lock Tests
 * @module tests/storage/collection-lock
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { CollectionLock, LOCK_FILE_NAME } from '../../src/storage/collection-lock.js';
import { LockHeldError } from '../../src/errors/index.js';

describe('CollectionLock', () => {
  let resultsDir: string;

  beforeEach(async () => {
    resultsDir = await mkdtemp(join(tmpdir(), 'bench-lock-'));
  });

  afterEach(async () => {
    await rm(resultsDir, { recursive: true, force: true });
  });

  it('admits one holder at a time', async () => {
    const first = new CollectionLock(resultsDir, 'c-001');
    const second = new CollectionLock(resultsDir, 'c-001');

    expect(await first.acquire()).toBe(true);
    expect(await second.acquire()).toBe(false);
    expect(await second.isHeld()).toBe(true);

    expect(await first.release()).toBe(true);
    expect(await second.acquire()).toBe(true);
  });

  it('writes the marker file under the campaign directory', async () => {
    const lock = new CollectionLock(resultsDir, 'c-001');
    await lock.acquire();

    expect(lock.path).toBe(join(resultsDir, 'c-001', LOCK_FILE_NAME));
    expect((await readFile(lock.path, 'utf-8')).length).toBeGreaterThan(0);
  });

  it('does not release a lock it does not own', async () => {
    const lock = new CollectionLock(resultsDir, 'c-001');
    await lock.acquire();
    await writeFile(lock.path, 'another-owner');

    expect(await lock.release()).toBe(false);
    expect(await lock.isHeld()).toBe(true);
  });

  it('releases after the guarded work, even when it throws', async () => {
    const lock = new CollectionLock(resultsDir, 'c-001');

    await expect(
      lock.withLock(async () => {
        throw new Error('collection failed');
      })
    ).rejects.toThrow('collection failed');
    expect(await lock.isHeld()).toBe(false);
  });

  it('raises when the lock is taken', async () => {
    await new CollectionLock(resultsDir, 'c-001').acquire();

    await expect(new CollectionLock(resultsDir, 'c-001').withLock(async () => 1)).rejects.toBeInstanceOf(
      LockHeldError
    );
  });
});
