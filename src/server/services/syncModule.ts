// =============================================================================
// Sync Module — Base ModuleHandler most integrations extend
// =============================================================================
// Implements push/pull against a RemoteClient and the Entity Map; a concrete
// module only supplies the local-side I/O and the field mapping:
//
//   loadLocal / saveLocal / deleteLocal — local content system
//   toRemote / fromRemote               — field mapping
//   remoteModelFor                      — remote schema per entity type
//
// push create  → update instead if already mapped; else create + map
// push update  → create if unmapped; skip if hash unchanged; else write
// push delete  → unlink + unmap (no-op when unmapped)
// pull         → runs under the Import Guard so the local write is not
//                enqueued straight back
// =============================================================================
import {
  BatchCreateItem,
  JsonPayload,
  ModuleHandler,
  SyncAction,
  SyncOutcome,
} from '../types';
import { EntityMapRepository } from './entityMap';
import { ImportGuard } from './importGuard';
import { computeSyncHash } from './syncHash';
import { failed, succeeded } from '../utils/syncOutcome';
import { classifyError } from '../utils/syncErrors';
import logger from '../utils/logger';

/** Remote-side record operations a module needs */
export interface RemoteClient {
  create(model: string, values: JsonPayload): Promise<number>;
  write(model: string, ids: number[], values: JsonPayload): Promise<void>;
  unlink(model: string, ids: number[]): Promise<void>;
  read(model: string, ids: number[]): Promise<JsonPayload[]>;
  /** Absent when the remote side has no bulk create */
  createMany?(model: string, valuesList: JsonPayload[]): Promise<number[]>;
}

export interface SyncModuleContext {
  client: RemoteClient;
  entityMap: EntityMapRepository;
  importGuard: ImportGuard;
}

function isEmpty(payload: JsonPayload): boolean {
  return Object.keys(payload).length === 0;
}

export abstract class SyncModule implements ModuleHandler {
  /** Present only when the client can create in bulk */
  readonly pushBatchCreates?: (
    entityType: string,
    items: BatchCreateItem[],
  ) => Promise<Map<number, SyncOutcome>>;

  constructor(
    readonly id: string,
    protected readonly ctx: SyncModuleContext,
  ) {
    if (ctx.client.createMany) {
      this.pushBatchCreates = (entityType, items) => this.batchCreate(entityType, items);
    }
  }

  /** Remote model for an entity type; '' when the module does not handle it */
  abstract remoteModelFor(entityType: string): string;

  /** Current local record, or null when it no longer exists */
  protected abstract loadLocal(entityType: string, localId: number): Promise<JsonPayload | null>;
  protected abstract toRemote(entityType: string, local: JsonPayload): JsonPayload;
  protected abstract fromRemote(entityType: string, remote: JsonPayload): JsonPayload;
  /**
   * Create (localId 0) or update a local record.
   * @returns — The local id, or 0 when nothing was saved
   */
  protected abstract saveLocal(entityType: string, data: JsonPayload, localId: number): Promise<number>;
  protected abstract deleteLocal(entityType: string, localId: number): Promise<void>;

  // ───────────────────────────────────────────────────────────────────────────
  // local → remote
  // ───────────────────────────────────────────────────────────────────────────

  async push(
    entityType: string,
    action: SyncAction,
    localId: number,
    remoteId: number,
    payload: JsonPayload,
  ): Promise<SyncOutcome> {
    const model = this.remoteModelFor(entityType);
    if (!model) return this.unsupported(entityType);
    const { client, entityMap } = this.ctx;

    if (action === 'delete') {
      const target = remoteId > 0 ? remoteId : (await entityMap.getRemoteId(this.id, entityType, localId)) ?? 0;
      if (target > 0) {
        await client.unlink(model, [target]);
        await entityMap.remove(this.id, entityType, localId);
        logger.info('Deleted remote record', { module: this.id, entityType, localId, remoteId: target });
      }
      return succeeded(target > 0 ? target : undefined);
    }

    const local = isEmpty(payload) ? await this.loadLocal(entityType, localId) : payload;
    if (!local) return failed('Local record not found.', 'permanent');

    const values = this.toRemote(entityType, local);
    if (isEmpty(values)) return failed('No data to push.', 'permanent');

    const hash = computeSyncHash(local);
    const mapping = await entityMap.getMapping(this.id, entityType, localId);
    const target = mapping ? mapping.remoteId : remoteId;

    if (target > 0) {
      if (mapping && mapping.syncHash === hash) {
        logger.debug('Push skipped: content unchanged', { module: this.id, entityType, localId });
        return succeeded(target);
      }
      await client.write(model, [target], values);
      return this.remember(entityType, localId, target, hash);
    }

    const created = await client.create(model, values);
    logger.info('Created remote record', { module: this.id, entityType, localId, remoteId: created });
    return this.remember(entityType, localId, created, hash);
  }

  /**
   * Bulk create. Already-mapped records succeed with their existing id;
   * mapping rows for new records are written by the caller.
   */
  protected async batchCreate(
    entityType: string,
    items: BatchCreateItem[],
  ): Promise<Map<number, SyncOutcome>> {
    const results = new Map<number, SyncOutcome>();
    const { client, entityMap } = this.ctx;
    if (!client.createMany) return results;

    const model = this.remoteModelFor(entityType);
    if (!model) {
      for (const item of items) results.set(item.localId, this.unsupported(entityType));
      return results;
    }
    const existing = await entityMap.getRemoteIds(
      this.id,
      entityType,
      items.map((item) => item.localId),
    );

    const pending: Array<{ localId: number; values: JsonPayload }> = [];
    for (const item of items) {
      const mapped = existing.get(item.localId);
      if (mapped !== undefined) {
        results.set(item.localId, succeeded(mapped));
        continue;
      }

      const local = isEmpty(item.payload) ? await this.loadLocal(entityType, item.localId) : item.payload;
      if (!local) {
        results.set(item.localId, failed('Local record not found.', 'permanent'));
        continue;
      }
      const values = this.toRemote(entityType, local);
      if (isEmpty(values)) {
        results.set(item.localId, failed('No data to push.', 'permanent'));
        continue;
      }
      pending.push({ localId: item.localId, values });
    }
    if (pending.length === 0) return results;

    const ids = await client.createMany(model, pending.map((p) => p.values));
    pending.forEach((entry, index) => {
      const id = ids[index];
      results.set(
        entry.localId,
        id !== undefined && id > 0 ? succeeded(id) : failed('No id returned for record.', 'transient'),
      );
    });
    return results;
  }

  // ───────────────────────────────────────────────────────────────────────────
  // remote → local
  // ───────────────────────────────────────────────────────────────────────────

  async pull(
    entityType: string,
    action: SyncAction,
    remoteId: number,
    localId: number,
    _payload: JsonPayload,
  ): Promise<SyncOutcome> {
    const model = this.remoteModelFor(entityType);
    if (!model) return this.unsupported(entityType);

    return this.ctx.importGuard.run(this.id, async () => {
      const { client, entityMap } = this.ctx;
      const existingLocal = localId > 0 ? localId : (await entityMap.getLocalId(this.id, entityType, remoteId)) ?? 0;

      if (action === 'delete') {
        if (existingLocal > 0) {
          await this.deleteLocal(entityType, existingLocal);
          await entityMap.remove(this.id, entityType, existingLocal);
          logger.info('Deleted local record from remote signal', {
            module: this.id,
            entityType,
            localId: existingLocal,
          });
        }
        return succeeded(existingLocal > 0 ? existingLocal : undefined);
      }

      // Always read the live remote record
      const [remote] = await client.read(model, [remoteId]);
      if (!remote) return failed('Remote record not found during pull.', 'permanent');

      const data = this.fromRemote(entityType, remote);
      const savedId = await this.saveLocal(entityType, data, existingLocal);
      if (savedId <= 0) return failed('Failed to save local data during pull.', 'permanent');

      try {
        await entityMap.save(
          this.id,
          entityType,
          savedId,
          remoteId,
          model,
          computeSyncHash(data),
        );
      } catch (err) {
        return failed(`Mapping save failed after local write: ${classifyError(err).message}`, 'transient', savedId);
      }

      logger.info('Pulled remote record', { module: this.id, entityType, localId: savedId, remoteId });
      return succeeded(savedId);
    });
  }

  private unsupported(entityType: string): SyncOutcome {
    return failed(`Module "${this.id}" does not handle entity type "${entityType}".`, 'permanent');
  }

  /** Persist the mapping after a remote write; a failure keeps the id for the retry. */
  private async remember(
    entityType: string,
    localId: number,
    remoteId: number,
    hash: string,
  ): Promise<SyncOutcome> {
    try {
      await this.ctx.entityMap.save(
        this.id,
        entityType,
        localId,
        remoteId,
        this.remoteModelFor(entityType),
        hash,
      );
    } catch (err) {
      logger.error('Mapping save failed after remote write', {
        module: this.id,
        entityType,
        localId,
        remoteId,
      });
      return failed(`Mapping save failed after remote write: ${classifyError(err).message}`, 'transient', remoteId);
    }
    return succeeded(remoteId);
  }
}
