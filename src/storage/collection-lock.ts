/**
 * Advisory collection lock
 * @module storage/collection-lock
 *
 * Bounds artifact collection to one collector per campaign. The lock is a
 * marker file `{resultsDir}/{campaignId}/.collecting` created with O_EXCL
 * and holding the owner's token.
 */

import { mkdir, open, readFile, unlink } from 'node:fs/promises';
import { join } from 'node:path';
import { v4 as uuidv4 } from 'uuid';
import { createModuleLogger } from '../logging/index.js';
import { LockHeldError } from '../errors/index.js';

const logger = createModuleLogger('storage:lock');

export const LOCK_FILE_NAME = '.collecting';

function hasCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

export class CollectionLock {
  private token: string | null = null;
  readonly path: string;

  constructor(resultsDir: string, readonly campaignId: string) {
    this.path = join(resultsDir, campaignId, LOCK_FILE_NAME);
  }

  /**
   * Try to take the lock. Returns false when another owner holds it.
   */
  async acquire(): Promise<boolean> {
    if (this.token) {
      return true;
    }
    await mkdir(join(this.path, '..'), { recursive: true });
    const token = uuidv4();
    try {
      const handle = await open(this.path, 'wx');
      try {
        await handle.writeFile(token, 'utf-8');
      } finally {
        await handle.close();
      }
    } catch (error) {
      if (hasCode(error, 'EEXIST')) {
        logger.warn({ campaignId: this.campaignId, path: this.path }, 'Collection already in progress');
        return false;
      }
      throw error;
    }
    this.token = token;
    return true;
  }

  /**
   * Release the lock if this instance owns it
   */
  async release(): Promise<boolean> {
    if (!this.token) {
      return false;
    }
    const owner = await this.readOwner();
    if (owner !== this.token) {
      this.token = null;
      logger.warn({ campaignId: this.campaignId }, 'Lock owner changed, not releasing');
      return false;
    }
    try {
      await unlink(this.path);
    } catch (error) {
      if (!hasCode(error, 'ENOENT')) {
        throw error;
      }
    }
    this.token = null;
    return true;
  }

  async isHeld(): Promise<boolean> {
    return (await this.readOwner()) !== null;
  }

  /**
   * Run `fn` while holding the lock
   *
   * @throws LockHeldError when another collector owns the lock
   */
  async withLock<T>(fn: () => Promise<T>): Promise<T> {
    if (!(await this.acquire())) {
      throw new LockHeldError(this.path, { campaignId: this.campaignId });
    }
    try {
      return await fn();
    } finally {
      await this.release();
    }
  }

  private async readOwner(): Promise<string | null> {
    try {
      return (await readFile(this.path, 'utf-8')).trim();
    } catch (error) {
      if (hasCode(error, 'ENOENT')) {
        return null;
      }
      throw error;
    }
  }
}
