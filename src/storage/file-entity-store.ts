/**
 * File-backed Entity Store
 * @module storage/file-entity-store
 *
 * Stores each (campaign, kind) container as `{rootDir}/{campaignId}/{kind}.json`,
 * an object mapping entity id to encoded attributes. Writes go to a
 * temporary file that is renamed over the container.
 */

import { mkdir, readFile, readdir, rename, writeFile, stat } from 'node:fs/promises';
import { join } from 'node:path';
import { randomUUID } from 'node:crypto';
import type { EntityAttrs, EntityKind, EntityStore } from './entity-store.js';
import { decodeContainer, encodeContainer } from './codec.js';
import { createModuleLogger, type StructuredLogger } from '../logging/index.js';
import { DataIntegrityError, DataIntegrityErrorCodes, getErrorMessage } from '../errors/index.js';

const SAFE_SEGMENT = /^[A-Za-z0-9._-]+$/;

function isSafeSegment(segment: string): boolean {
  return SAFE_SEGMENT.test(segment) && segment !== '.' && segment !== '..';
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class FileEntityStore implements EntityStore {
  private readonly logger: StructuredLogger;

  constructor(private readonly rootDir: string) {
    this.logger = createModuleLogger('storage:file');
  }

  // ============================================================================
  // Container I/O
  // ============================================================================

  private containerPath(campaignId: string, kind: EntityKind): string {
    return join(this.rootDir, campaignId, `${kind}.json`);
  }

  /**
   * Read one container; a missing file is an empty container.
   * Throws on unreadable or corrupt files.
   */
  private async readContainer(campaignId: string, kind: EntityKind): Promise<Map<string, EntityAttrs>> {
    const path = this.containerPath(campaignId, kind);
    let content: string;
    try {
      content = await readFile(path, 'utf-8');
    } catch (error) {
      if (isMissing(error)) {
        return new Map();
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new DataIntegrityError(`Corrupt entity container ${path}`, DataIntegrityErrorCodes.INVALID_JSON, {
        cause: error,
        source: path,
      });
    }
    return decodeContainer(parsed);
  }

  private async writeContainer(
    campaignId: string,
    kind: EntityKind,
    container: Map<string, EntityAttrs>
  ): Promise<void> {
    const path = this.containerPath(campaignId, kind);
    await mkdir(join(this.rootDir, campaignId), { recursive: true });
    const tmp = `${path}.${randomUUID()}.tmp`;
    await writeFile(tmp, JSON.stringify(encodeContainer(container), null, 2), 'utf-8');
    await rename(tmp, path);
  }

  private validKeys(campaignId: string, id?: string): boolean {
    if (!isSafeSegment(campaignId) || (id !== undefined && id.length === 0)) {
      this.logger.warn({ campaignId, id }, 'Rejected unsafe entity key');
      return false;
    }
    return true;
  }

  // ============================================================================
  // EntityStore
  // ============================================================================

  async save(campaignId: string, kind: EntityKind, id: string, attrs: EntityAttrs): Promise<boolean> {
    if (!this.validKeys(campaignId, id)) {
      return false;
    }
    try {
      const container = await this.readContainer(campaignId, kind);
      container.set(id, attrs);
      await this.writeContainer(campaignId, kind, container);
      return true;
    } catch (error) {
      this.logger.error({ err: error, campaignId, kind, id }, `Failed to save entity: ${getErrorMessage(error)}`);
      return false;
    }
  }

  async load(campaignId: string, kind: EntityKind, id: string): Promise<EntityAttrs | null> {
    if (!this.validKeys(campaignId, id)) {
      return null;
    }
    try {
      const container = await this.readContainer(campaignId, kind);
      return container.get(id) ?? null;
    } catch (error) {
      this.logger.error({ err: error, campaignId, kind, id }, 'Failed to load entity');
      return null;
    }
  }

  async loadAll(campaignId: string, kind: EntityKind): Promise<EntityAttrs[]> {
    if (!this.validKeys(campaignId)) {
      return [];
    }
    try {
      const container = await this.readContainer(campaignId, kind);
      return [...container.values()];
    } catch (error) {
      this.logger.error({ err: error, campaignId, kind }, 'Failed to load entities');
      return [];
    }
  }

  async delete(campaignId: string, kind: EntityKind, id: string): Promise<boolean> {
    if (!this.validKeys(campaignId, id)) {
      return false;
    }
    try {
      const container = await this.readContainer(campaignId, kind);
      if (!container.delete(id)) {
        return false;
      }
      await this.writeContainer(campaignId, kind, container);
      return true;
    } catch (error) {
      this.logger.error({ err: error, campaignId, kind, id }, 'Failed to delete entity');
      return false;
    }
  }

  async listCampaigns(): Promise<string[]> {
    try {
      const entries = await readdir(this.rootDir, { withFileTypes: true });
      const campaigns: string[] = [];
      for (const entry of entries) {
        if (!entry.isDirectory()) {
          continue;
        }
        const hasContainer = await Promise.all(
          (['service', 'client'] as const).map((kind) =>
            stat(this.containerPath(entry.name, kind)).then(
              () => true,
              () => false
            )
          )
        );
        if (hasContainer.some(Boolean)) {
          campaigns.push(entry.name);
        }
      }
      return campaigns.sort();
    } catch (error) {
      if (!isMissing(error)) {
        this.logger.error({ err: error, rootDir: this.rootDir }, 'Failed to list campaigns');
      }
      return [];
    }
  }
}
