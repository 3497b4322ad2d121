/**
 * Entity Store Contract
 * @module storage/entity-store
 *
 * Keyed persistence for deployment-state records, partitioned by
 * (campaign id, entity kind). Each partition is one logical container
 * rewritten as a whole on every save.
 *
 * Implementations never throw: I/O failures are logged and surface as
 * `false`, `null` or an empty list.
 */

// ============================================================================
// Types
// ============================================================================

/** Deployment categories persisted by the orchestrator */
export type EntityKind = 'service' | 'client';

/**
 * Attribute values a store round-trips losslessly
 */
export type AttrValue =
  | string
  | number
  | boolean
  | null
  | Date
  | AttrValue[]
  | { [key: string]: AttrValue };

export type EntityAttrs = { [key: string]: AttrValue };

// ============================================================================
// Store Interface
// ============================================================================

export interface EntityStore {
  /**
   * Upsert `attrs` under `id` using a read-all/replace-all container write.
   * Concurrent writers to one container are not serialized.
   */
  save(campaignId: string, kind: EntityKind, id: string, attrs: EntityAttrs): Promise<boolean>;

  load(campaignId: string, kind: EntityKind, id: string): Promise<EntityAttrs | null>;

  /** All entities of one container, in insertion order */
  loadAll(campaignId: string, kind: EntityKind): Promise<EntityAttrs[]>;

  delete(campaignId: string, kind: EntityKind, id: string): Promise<boolean>;

  /** Campaign ids that own at least one container */
  listCampaigns(): Promise<string[]>;
}
