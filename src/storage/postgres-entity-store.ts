/**
 * PostgreSQL Entity Store
 * @module storage/postgres-entity-store
 *
 * One row per (campaign, kind) container. The `entities` column holds a
 * JSONB array of `{ id, attrs }` pairs so insertion order survives, and
 * each save rewrites it inside a transaction.
 */

import pg from 'pg';
import type { EntityAttrs, EntityKind, EntityStore } from './entity-store.js';
import { decodeAttrs, encodeAttrs } from './codec.js';
import { createModuleLogger, type StructuredLogger } from '../logging/index.js';

// ============================================================================
// Types
// ============================================================================

export type SqlRow = Record<string, unknown>;

export interface SqlResult {
  rows: SqlRow[];
  rowCount: number | null;
}

/**
 * Minimal query surface shared by a pool and a checked-out client
 */
export interface SqlClient {
  query(text: string, params?: unknown[]): Promise<SqlResult>;
}

export interface SqlPoolClient extends SqlClient {
  release(): void;
}

export interface SqlPool extends SqlClient {
  connect(): Promise<SqlPoolClient>;
  end(): Promise<void>;
}

/**
 * Adapt a `pg.Pool` to the store's query surface
 */
export function fromPgPool(pool: pg.Pool): SqlPool {
  return {
    query: (text: string, params?: unknown[]) => pool.query(text, params),
    connect: async () => {
      const client = await pool.connect();
      return {
        query: (text: string, params?: unknown[]) => client.query(text, params),
        release: () => client.release(),
      };
    },
    end: () => pool.end(),
  };
}

// ============================================================================
// Container Encoding
// ============================================================================

function decodeRow(entities: unknown): Map<string, EntityAttrs> {
  const container = new Map<string, EntityAttrs>();
  if (!Array.isArray(entities)) {
    return container;
  }
  for (const entry of entities) {
    if (entry === null || typeof entry !== 'object' || !('id' in entry) || !('attrs' in entry)) {
      continue;
    }
    const attrs = decodeAttrs(entry.attrs);
    if (typeof entry.id === 'string' && attrs) {
      container.set(entry.id, attrs);
    }
  }
  return container;
}

function encodeRow(container: Map<string, EntityAttrs>): string {
  return JSON.stringify([...container].map(([id, attrs]) => ({ id, attrs: encodeAttrs(attrs) })));
}

// ============================================================================
// Store
// ============================================================================

export class PostgresEntityStore implements EntityStore {
  private readonly logger: StructuredLogger;

  constructor(
    private readonly pool: SqlPool,
    private readonly tableName = 'entity_containers'
  ) {
    this.logger = createModuleLogger(`storage:${tableName}`);
  }

  static fromConnectionString(connectionString: string, tableName?: string): PostgresEntityStore {
    return new PostgresEntityStore(fromPgPool(new pg.Pool({ connectionString })), tableName);
  }

  /**
   * Create the container table if it does not exist
   */
  async ensureSchema(): Promise<void> {
    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS ${this.tableName} (
        campaign_id TEXT NOT NULL,
        kind TEXT NOT NULL,
        entities JSONB NOT NULL DEFAULT '[]'::jsonb,
        updated_at TIMESTAMPTZ NOT NULL DEFAULT now(),
        PRIMARY KEY (campaign_id, kind)
      )
    `);
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  // ============================================================================
  // Query Helpers
  // ============================================================================

  private async readContainer(
    client: SqlClient,
    campaignId: string,
    kind: EntityKind,
    forUpdate = false
  ): Promise<Map<string, EntityAttrs>> {
    const result = await client.query(
      `SELECT entities FROM ${this.tableName} WHERE campaign_id = $1 AND kind = $2${forUpdate ? ' FOR UPDATE' : ''}`,
      [campaignId, kind]
    );
    const row = result.rows[0];
    return row ? decodeRow(row.entities) : new Map();
  }

  private async writeContainer(
    client: SqlClient,
    campaignId: string,
    kind: EntityKind,
    container: Map<string, EntityAttrs>
  ): Promise<void> {
    await client.query(
      `INSERT INTO ${this.tableName} (campaign_id, kind, entities, updated_at)
       VALUES ($1, $2, $3::jsonb, now())
       ON CONFLICT (campaign_id, kind) DO UPDATE SET entities = EXCLUDED.entities, updated_at = now()`,
      [campaignId, kind, encodeRow(container)]
    );
  }

  /**
   * Execute operations in a transaction
   */
  private async withTransaction<T>(fn: (client: SqlClient) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      const result = await fn(client);
      await client.query('COMMIT');
      return result;
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }

  // ============================================================================
  // EntityStore
  // ============================================================================

  async save(campaignId: string, kind: EntityKind, id: string, attrs: EntityAttrs): Promise<boolean> {
    try {
      await this.withTransaction(async (client) => {
        const container = await this.readContainer(client, campaignId, kind, true);
        container.set(id, attrs);
        await this.writeContainer(client, campaignId, kind, container);
      });
      return true;
    } catch (error) {
      this.logger.error({ err: error, campaignId, kind, id }, 'Failed to save entity');
      return false;
    }
  }

  async load(campaignId: string, kind: EntityKind, id: string): Promise<EntityAttrs | null> {
    try {
      const container = await this.readContainer(this.pool, campaignId, kind);
      return container.get(id) ?? null;
    } catch (error) {
      this.logger.error({ err: error, campaignId, kind, id }, 'Failed to load entity');
      return null;
    }
  }

  async loadAll(campaignId: string, kind: EntityKind): Promise<EntityAttrs[]> {
    try {
      const container = await this.readContainer(this.pool, campaignId, kind);
      return [...container.values()];
    } catch (error) {
      this.logger.error({ err: error, campaignId, kind }, 'Failed to load entities');
      return [];
    }
  }

  async delete(campaignId: string, kind: EntityKind, id: string): Promise<boolean> {
    try {
      return await this.withTransaction(async (client) => {
        const container = await this.readContainer(client, campaignId, kind, true);
        if (!container.delete(id)) {
          return false;
        }
        await this.writeContainer(client, campaignId, kind, container);
        return true;
      });
    } catch (error) {
      this.logger.error({ err: error, campaignId, kind, id }, 'Failed to delete entity');
      return false;
    }
  }

  async listCampaigns(): Promise<string[]> {
    try {
      const result = await this.pool.query(
        `SELECT DISTINCT campaign_id FROM ${this.tableName} ORDER BY campaign_id`
      );
      return result.rows.flatMap((row) => (typeof row.campaign_id === 'string' ? [row.campaign_id] : []));
    } catch (error) {
      this.logger.error({ err: error }, 'Failed to list campaigns');
      return [];
    }
  }
}
