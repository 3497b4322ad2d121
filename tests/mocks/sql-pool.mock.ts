/**
 * In-memory SQL pool
 * @module tests/mocks/sql-pool.mock
 *
 * Understands the handful of statements the Postgres entity store issues
 * against its container table. Every statement is recorded on `query`
 * (a `vi.fn`) so tests can assert on the SQL sent.
 */

import { vi } from 'vitest';
import type { SqlPool, SqlPoolClient, SqlResult, SqlRow } from '../../src/storage/postgres-entity-store.js';

interface StoredRow {
  campaign_id: string;
  kind: string;
  entities: unknown;
}

export class InMemorySqlPool implements SqlPool {
  readonly table = new Map<string, StoredRow>();
  readonly released = vi.fn();
  readonly ended = vi.fn();
  /** When set, statements matching it reject */
  failOn: RegExp | null = null;

  readonly query = vi.fn(async (text: string, params: unknown[] = []): Promise<SqlResult> => this.run(text, params));

  async connect(): Promise<SqlPoolClient> {
    return {
      query: (text: string, params?: unknown[]) => this.query(text, params),
      release: () => this.released(),
    };
  }

  async end(): Promise<void> {
    this.ended();
  }

  statements(): string[] {
    return this.query.mock.calls.map(([text]) => text.trim().split(/\s+/).slice(0, 2).join(' '));
  }

  private run(text: string, params: unknown[]): SqlResult {
    const sql = text.trim();
    if (this.failOn?.test(sql)) {
      throw new Error(`simulated failure: ${sql.slice(0, 20)}`);
    }

    if (sql.startsWith('SELECT entities')) {
      const row = this.table.get(`${String(params[0])}/${String(params[1])}`);
      return result(row ? [{ entities: row.entities }] : []);
    }
    if (sql.startsWith('INSERT INTO')) {
      const [campaignId, kind, entities] = params.map(String);
      this.table.set(`${campaignId}/${kind}`, {
        campaign_id: campaignId ?? '',
        kind: kind ?? '',
        entities: JSON.parse(entities ?? '[]'),
      });
      return result([], 1);
    }
    if (sql.startsWith('SELECT DISTINCT campaign_id')) {
      const ids = [...new Set([...this.table.values()].map((row) => row.campaign_id))].sort();
      return result(ids.map((id) => ({ campaign_id: id })));
    }
    return result([]);
  }
}

function result(rows: SqlRow[], rowCount: number = rows.length): SqlResult {
  return { rows, rowCount };
}
