/**
 * Storage Module
 * @module storage
 *
 * Entity store backends and the advisory collection lock.
 */

import type { EntityStore } from './entity-store.js';
import { FileEntityStore } from './file-entity-store.js';
import { PostgresEntityStore } from './postgres-entity-store.js';
import type { StorageConfig } from '../config/index.js';
import { ConfigurationError, ConfigurationErrorCodes } from '../errors/index.js';

/**
 * Build the store selected by configuration. The Postgres backend has its
 * table created before it is returned.
 */
export async function createEntityStore(config: StorageConfig): Promise<EntityStore> {
  if (config.backend === 'postgres') {
    if (!config.connectionString) {
      throw new ConfigurationError(
        'storage.connectionString is required for the postgres backend',
        ConfigurationErrorCodes.MISSING_REQUIRED,
        ['storage.connectionString: Required']
      );
    }
    const store = PostgresEntityStore.fromConnectionString(config.connectionString, config.table);
    await store.ensureSchema();
    return store;
  }
  return new FileEntityStore(config.rootDir);
}

export type { EntityStore, EntityKind, EntityAttrs, AttrValue } from './entity-store.js';
export { FileEntityStore } from './file-entity-store.js';
export {
  PostgresEntityStore,
  fromPgPool,
  type SqlPool,
  type SqlPoolClient,
  type SqlClient,
  type SqlResult,
  type SqlRow,
} from './postgres-entity-store.js';
export { encodeValue, decodeValue, encodeAttrs, decodeAttrs } from './codec.js';
export { CollectionLock, LOCK_FILE_NAME } from './collection-lock.js';
