// =============================================================================
// Entity Map — Local record id ↔ remote ERP record id
// =============================================================================
// Remembers which remote record corresponds to which local record, per
// (tenant, module, entity type). Backed by the `entity_map` collection.
//
// Invariants:
//   • Bijection per (tenant, module, entityType): saving local → remote
//     overwrites the row for that local id and removes any other row that
//     held that remote id.
//   • `syncHash` fingerprints the last-synced content so unchanged records
//     can be skipped.
//
// Performance:
//   • LRU cache (5 000 entries, no time-based expiry) keyed by both sides
//   • Long-running workers call flushCache()/invalidate() explicitly
// =============================================================================
import { EntityMapping } from '../types';
import { EntityMapStore, MappingScope } from '../stores/types';
import { LRUCache } from '../utils/lruCache';
import logger from '../utils/logger';

/** Entries kept in the in-process cache */
export const ENTITY_MAP_CACHE_SIZE = 5000;

/** Upper bound for listMappings() */
const MAX_LIST = 50_000;

export class EntityMapRepository {
  /** "l:<module>:<entityType>:<localId>" / "r:<module>:<entityType>:<remoteId>" */
  private readonly cache: LRUCache<string, EntityMapping>;

  constructor(
    private readonly store: EntityMapStore,
    private readonly tenantId: string,
    cacheSize = ENTITY_MAP_CACHE_SIZE,
  ) {
    this.cache = new LRUCache<string, EntityMapping>(cacheSize);
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Lookups
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Remote id mapped to a local record, or null.
   *
   * @throws DatabaseError
   */
  async getRemoteId(module: string, entityType: string, localId: number): Promise<number | null> {
    const mapping = await this.getMapping(module, entityType, localId);
    return mapping ? mapping.remoteId : null;
  }

  /**
   * Local id mapped to a remote record, or null.
   *
   * @throws DatabaseError
   */
  async getLocalId(module: string, entityType: string, remoteId: number): Promise<number | null> {
    const cached = this.cache.get(remoteKey(module, entityType, remoteId));
    if (cached) return cached.localId;

    const mapping = await this.store.findByRemote(this.scope(module, entityType), remoteId);
    if (!mapping) return null;
    this.remember(mapping);
    return mapping.localId;
  }

  /** Full mapping row for a local record (hash included). */
  async getMapping(
    module: string,
    entityType: string,
    localId: number,
  ): Promise<EntityMapping | null> {
    const cached = this.cache.get(localKey(module, entityType, localId));
    if (cached) return cached;

    const mapping = await this.store.findByLocal(this.scope(module, entityType), localId);
    if (mapping) this.remember(mapping);
    return mapping;
  }

  /** Bulk local → remote lookup. Unmapped ids are absent from the result. */
  async getRemoteIds(
    module: string,
    entityType: string,
    localIds: number[],
  ): Promise<Map<number, number>> {
    const result = new Map<number, number>();
    const missing: number[] = [];

    for (const localId of localIds) {
      const cached = this.cache.get(localKey(module, entityType, localId));
      if (cached) result.set(localId, cached.remoteId);
      else missing.push(localId);
    }

    if (missing.length > 0) {
      const rows = await this.store.findManyByLocal(this.scope(module, entityType), missing);
      for (const row of rows) {
        this.remember(row);
        result.set(row.localId, row.remoteId);
      }
    }
    return result;
  }

  /** Bulk remote → local lookup. Unmapped ids are absent from the result. */
  async getLocalIds(
    module: string,
    entityType: string,
    remoteIds: number[],
  ): Promise<Map<number, number>> {
    const result = new Map<number, number>();
    const missing: number[] = [];

    for (const remoteId of remoteIds) {
      const cached = this.cache.get(remoteKey(module, entityType, remoteId));
      if (cached) result.set(remoteId, cached.localId);
      else missing.push(remoteId);
    }

    if (missing.length > 0) {
      const rows = await this.store.findManyByRemote(this.scope(module, entityType), missing);
      for (const row of rows) {
        this.remember(row);
        result.set(row.remoteId, row.localId);
      }
    }
    return result;
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Writes
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Create or overwrite the mapping for a local record.
   *
   * @param remoteModel — Remote schema name, e.g. "product.template"
   * @param syncHash    — Fingerprint of the content just synced
   * @throws DatabaseError
   */
  async save(
    module: string,
    entityType: string,
    localId: number,
    remoteId: number,
    remoteModel = '',
    syncHash = '',
  ): Promise<void> {
    const scope = this.scope(module, entityType);

    // Drop cache entries the write is about to displace
    const [byLocal, byRemote] = await Promise.all([
      this.store.findByLocal(scope, localId),
      this.store.findByRemote(scope, remoteId),
    ]);
    if (byLocal) this.forget(byLocal);
    if (byRemote) this.forget(byRemote);

    const mapping: EntityMapping = {
      ...scope,
      localId,
      remoteId,
      remoteModel,
      syncHash,
      lastSyncedAt: new Date(),
    };
    await this.store.upsert(mapping);
    this.remember(mapping);

    logger.debug('Entity mapping saved', {
      tenantId: this.tenantId,
      module,
      entityType,
      localId,
      remoteId,
    });
  }

  /**
   * Remove the mapping for a local record. Returns false if none existed.
   *
   * @throws DatabaseError
   */
  async remove(module: string, entityType: string, localId: number): Promise<boolean> {
    const removed = await this.store.deleteByLocal(this.scope(module, entityType), localId);
    this.cache.delete(localKey(module, entityType, localId));
    if (!removed) return false;
    this.forget(removed);
    return true;
  }

  async listMappings(module: string, entityType: string, limit = MAX_LIST): Promise<EntityMapping[]> {
    return this.store.list(this.scope(module, entityType), Math.min(Math.max(1, limit), MAX_LIST));
  }

  async count(module?: string, entityType?: string): Promise<number> {
    return this.store.count(this.tenantId, module, entityType);
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Cache control
  // ───────────────────────────────────────────────────────────────────────────

  flushCache(): void {
    this.cache.clear();
  }

  /** Drop both directions of one local record from the cache. */
  invalidate(module: string, entityType: string, localId: number): void {
    const key = localKey(module, entityType, localId);
    const cached = this.cache.get(key);
    this.cache.delete(key);
    if (cached) this.cache.delete(remoteKey(module, entityType, cached.remoteId));
  }

  get cacheSize(): number {
    return this.cache.size;
  }

  private scope(module: string, entityType: string): MappingScope {
    return { tenantId: this.tenantId, module, entityType };
  }

  private remember(mapping: EntityMapping): void {
    this.cache.set(localKey(mapping.module, mapping.entityType, mapping.localId), mapping);
    this.cache.set(remoteKey(mapping.module, mapping.entityType, mapping.remoteId), mapping);
  }

  private forget(mapping: EntityMapping): void {
    this.cache.delete(localKey(mapping.module, mapping.entityType, mapping.localId));
    this.cache.delete(remoteKey(mapping.module, mapping.entityType, mapping.remoteId));
  }
}

function localKey(module: string, entityType: string, localId: number): string {
  return `l:${module}:${entityType}:${localId}`;
}

function remoteKey(module: string, entityType: string, remoteId: number): string {
  return `r:${module}:${entityType}:${remoteId}`;
}
