// =============================================================================
// Change Triggers — Turn local saves and remote webhooks into queue jobs
// =============================================================================
// onLocalChange  — content-save hook → local_to_remote job (skipped while
//                  the module is importing, i.e. the save came from a pull)
// onRemoteChange — webhook → remote_to_local job, local id resolved from
//                  the Entity Map
//
// A "save" becomes `update` when the record is already mapped, `create`
// otherwise. A delete of a record the other side never saw is dropped.
// =============================================================================
import { JsonPayload, SyncAction } from '../types';
import { EntityMapRepository } from './entityMap';
import { ImportGuard } from './importGuard';
import { JobQueue } from './jobQueue';
import logger from '../utils/logger';

export type ChangeEvent = 'save' | 'delete';

export interface ChangeTriggerOptions {
  /** Debounce applied to local saves so rapid edits coalesce */
  localDebounceMs?: number;
  priority?: number;
}

export class ChangeTriggers {
  constructor(
    private readonly tenantId: string,
    private readonly queue: JobQueue,
    private readonly entityMap: EntityMapRepository,
    private readonly importGuard: ImportGuard,
    private readonly options: ChangeTriggerOptions = {},
  ) {}

  /**
   * A local record was saved or deleted.
   *
   * @returns — The job id, or null when nothing was enqueued
   */
  async onLocalChange(
    module: string,
    entityType: string,
    localId: number,
    event: ChangeEvent,
    payload?: JsonPayload,
  ): Promise<number | null> {
    if (this.importGuard.isImporting(module)) {
      logger.debug('Local change ignored during import', { module, entityType, localId });
      return null;
    }

    const remoteId = (await this.entityMap.getRemoteId(module, entityType, localId)) ?? 0;
    const action = resolveAction(event, remoteId);
    if (!action) return null;

    return this.queue.enqueue({
      tenantId: this.tenantId,
      module,
      entityType,
      action,
      direction: 'local_to_remote',
      localId,
      remoteId,
      payload: action === 'delete' ? undefined : payload,
      priority: this.options.priority,
      debounceMs: action === 'delete' ? 0 : this.options.localDebounceMs,
    });
  }

  /**
   * A remote record changed (webhook / notification).
   *
   * @returns — The job id, or null when nothing was enqueued
   */
  async onRemoteChange(
    module: string,
    entityType: string,
    remoteId: number,
    event: ChangeEvent,
    payload?: JsonPayload,
  ): Promise<number | null> {
    const localId = (await this.entityMap.getLocalId(module, entityType, remoteId)) ?? 0;
    const action = resolveAction(event, localId);
    if (!action) return null;

    return this.queue.enqueue({
      tenantId: this.tenantId,
      module,
      entityType,
      action,
      direction: 'remote_to_local',
      localId,
      remoteId,
      payload,
      priority: this.options.priority,
      debounceMs: 0,
    });
  }
}

/** save → create | update by whether the other side already has it */
function resolveAction(event: ChangeEvent, counterpartId: number): SyncAction | null {
  if (event === 'delete') return counterpartId > 0 ? 'delete' : null;
  return counterpartId > 0 ? 'update' : 'create';
}
