// =============================================================================
// Diff Scanner — Poll-based change detection for local records
// =============================================================================
// For systems without reliable save hooks: hash every current record, compare
// with the Entity Map's stored syncHash and enqueue what differs.
//
//   unmapped              → create
//   mapped, hash differs  → update
//   mapped, not in scan   → delete (when detectDeletes is on)
// =============================================================================
import { EntityMapping, JsonPayload, SyncAction } from '../types';
import { EntityMapRepository } from './entityMap';
import { JobQueue } from './jobQueue';
import { computeSyncHash } from './syncHash';
import logger from '../utils/logger';

export interface ScanRecord {
  localId: number;
  /** Local-side field values */
  content: JsonPayload;
}

export interface ScanOptions {
  /** Treat mapped records missing from `records` as deleted (default true) */
  detectDeletes?: boolean;
}

export interface ScanResult {
  created: number;
  updated: number;
  deleted: number;
  unchanged: number;
}

export class DiffScanner {
  constructor(
    private readonly tenantId: string,
    private readonly queue: JobQueue,
    private readonly entityMap: EntityMapRepository,
  ) {}

  /**
   * Compare `records` (the complete current set for one module/entity type)
   * with the Entity Map and enqueue the differences.
   */
  async scan(
    module: string,
    entityType: string,
    records: ScanRecord[],
    options: ScanOptions = {},
  ): Promise<ScanResult> {
    const result: ScanResult = { created: 0, updated: 0, deleted: 0, unchanged: 0 };
    const mappings = new Map<number, EntityMapping>();
    for (const mapping of await this.entityMap.listMappings(module, entityType)) {
      mappings.set(mapping.localId, mapping);
    }
    const seen = new Set<number>();

    for (const record of records) {
      seen.add(record.localId);
      const mapping = mappings.get(record.localId);

      if (!mapping) {
        await this.enqueue(module, entityType, 'create', record.localId, 0, record.content);
        result.created++;
      } else if (mapping.syncHash !== computeSyncHash(record.content)) {
        await this.enqueue(module, entityType, 'update', record.localId, mapping.remoteId, record.content);
        result.updated++;
      } else {
        result.unchanged++;
      }
    }

    if (options.detectDeletes ?? true) {
      for (const mapping of mappings.values()) {
        if (seen.has(mapping.localId)) continue;
        await this.enqueue(module, entityType, 'delete', mapping.localId, mapping.remoteId);
        result.deleted++;
      }
    }

    logger.info('Diff scan completed', { tenantId: this.tenantId, module, entityType, ...result });
    return result;
  }

  private async enqueue(
    module: string,
    entityType: string,
    action: SyncAction,
    localId: number,
    remoteId: number,
    payload?: JsonPayload,
  ): Promise<void> {
    await this.queue.enqueue({
      tenantId: this.tenantId,
      module,
      entityType,
      action,
      direction: 'local_to_remote',
      localId,
      remoteId,
      payload,
      debounceMs: 0,
    });
  }
}
