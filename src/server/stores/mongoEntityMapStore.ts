// =============================================================================
// MongoEntityMapStore — EntityMapStore backed by the entity_map collection
// =============================================================================
import EntityMappingModel, { IEntityMapping } from '../models/EntityMapping';
import { EntityMapping } from '../types';
import { safeDbCall } from '../utils/DatabaseError';
import { EntityMapStore, MappingScope } from './types';

function toEntry(doc: IEntityMapping): EntityMapping {
  return {
    tenantId: doc.tenantId,
    module: doc.module,
    entityType: doc.entityType,
    localId: doc.localId,
    remoteId: doc.remoteId,
    remoteModel: doc.remoteModel,
    syncHash: doc.syncHash,
    lastSyncedAt: doc.lastSyncedAt,
  };
}

function scopeQuery(scope: MappingScope): MappingScope {
  return { tenantId: scope.tenantId, module: scope.module, entityType: scope.entityType };
}

export class MongoEntityMapStore implements EntityMapStore {
  async findByLocal(scope: MappingScope, localId: number): Promise<EntityMapping | null> {
    const doc = await safeDbCall('findMapping', () =>
      EntityMappingModel.findOne({ ...scopeQuery(scope), localId }).exec(),
    );
    return doc ? toEntry(doc) : null;
  }

  async findByRemote(scope: MappingScope, remoteId: number): Promise<EntityMapping | null> {
    const doc = await safeDbCall('findMapping', () =>
      EntityMappingModel.findOne({ ...scopeQuery(scope), remoteId }).exec(),
    );
    return doc ? toEntry(doc) : null;
  }

  async findManyByLocal(scope: MappingScope, localIds: number[]): Promise<EntityMapping[]> {
    if (localIds.length === 0) return [];
    const docs = await safeDbCall('findMapping', () =>
      EntityMappingModel.find({ ...scopeQuery(scope), localId: { $in: localIds } }).exec(),
    );
    return docs.map(toEntry);
  }

  async findManyByRemote(scope: MappingScope, remoteIds: number[]): Promise<EntityMapping[]> {
    if (remoteIds.length === 0) return [];
    const docs = await safeDbCall('findMapping', () =>
      EntityMappingModel.find({ ...scopeQuery(scope), remoteId: { $in: remoteIds } }).exec(),
    );
    return docs.map(toEntry);
  }

  async upsert(mapping: EntityMapping): Promise<void> {
    const scope = scopeQuery(mapping);
    await safeDbCall('upsertMapping', async () => {
      // Free the remote id first so the unique (scope, remoteId) index holds
      await EntityMappingModel.deleteMany({
        ...scope,
        remoteId: mapping.remoteId,
        localId: { $ne: mapping.localId },
      }).exec();
      await EntityMappingModel.updateOne(
        { ...scope, localId: mapping.localId },
        {
          $set: {
            remoteId: mapping.remoteId,
            remoteModel: mapping.remoteModel,
            syncHash: mapping.syncHash,
            lastSyncedAt: mapping.lastSyncedAt,
          },
        },
        { upsert: true },
      ).exec();
    });
  }

  async deleteByLocal(scope: MappingScope, localId: number): Promise<EntityMapping | null> {
    const doc = await safeDbCall('deleteMapping', () =>
      EntityMappingModel.findOneAndDelete({ ...scopeQuery(scope), localId }).exec(),
    );
    return doc ? toEntry(doc) : null;
  }

  async list(scope: MappingScope, limit: number): Promise<EntityMapping[]> {
    const docs = await safeDbCall('listMappings', () =>
      EntityMappingModel.find(scopeQuery(scope)).sort({ localId: 1 }).limit(limit).exec(),
    );
    return docs.map(toEntry);
  }

  async count(tenantId: string, module?: string, entityType?: string): Promise<number> {
    const filter: Partial<MappingScope> = { tenantId };
    if (module) filter.module = module;
    if (entityType) filter.entityType = entityType;
    return safeDbCall('count', () => EntityMappingModel.countDocuments(filter).exec());
  }
}
