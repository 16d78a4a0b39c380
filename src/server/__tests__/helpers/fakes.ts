// =============================================================================
// Test doubles: module handler, remote client, contact store, job factory
// =============================================================================
import {
  BatchCreateItem,
  JsonPayload,
  ModuleHandler,
  QueueJob,
  SyncAction,
  SyncOutcome,
} from '../../types';
import { RemoteClient } from '../../services/syncModule';
import { ContactStore } from '../../services/contactsModule';
import { MemoryQueueStore } from './memoryStores';

export interface PushCall {
  entityType: string;
  action: SyncAction;
  localId: number;
  remoteId: number;
  payload: JsonPayload;
}

type BatchFn = (
  entityType: string,
  items: BatchCreateItem[],
) => Map<number, SyncOutcome> | Promise<Map<number, SyncOutcome>>;

export interface FakeHandlerOptions {
  push?: (call: PushCall) => SyncOutcome | Promise<SyncOutcome>;
  pull?: (call: PushCall) => SyncOutcome | Promise<SyncOutcome>;
  /** Giving a batch function makes the handler batch-capable */
  batch?: BatchFn;
  remoteModel?: string;
}

/** Records every call; answers with the configured functions (success by default). */
export class FakeHandler implements ModuleHandler {
  readonly pushCalls: PushCall[] = [];
  readonly pullCalls: PushCall[] = [];
  readonly batchCalls: Array<{ entityType: string; items: BatchCreateItem[] }> = [];
  readonly pushBatchCreates?: (
    entityType: string,
    items: BatchCreateItem[],
  ) => Promise<Map<number, SyncOutcome>>;

  constructor(
    readonly id: string,
    private readonly options: FakeHandlerOptions = {},
  ) {
    const batch = options.batch;
    if (batch) {
      this.pushBatchCreates = async (entityType, items) => {
        this.batchCalls.push({ entityType, items });
        return batch(entityType, items);
      };
    }
  }

  remoteModelFor(entityType: string): string {
    return this.options.remoteModel ?? `remote.${entityType}`;
  }

  async push(
    entityType: string,
    action: SyncAction,
    localId: number,
    remoteId: number,
    payload: JsonPayload,
  ): Promise<SyncOutcome> {
    const call = { entityType, action, localId, remoteId, payload };
    this.pushCalls.push(call);
    return this.options.push ? this.options.push(call) : { ok: true };
  }

  async pull(
    entityType: string,
    action: SyncAction,
    remoteId: number,
    localId: number,
    payload: JsonPayload,
  ): Promise<SyncOutcome> {
    const call = { entityType, action, localId, remoteId, payload };
    this.pullCalls.push(call);
    return this.options.pull ? this.options.pull(call) : { ok: true };
  }
}

/** Batch function that answers success with `localId + offset` for every item. */
export function batchSucceedsWith(offset: number): BatchFn {
  return (_entityType, items) => {
    const results = new Map<number, SyncOutcome>();
    for (const item of items) results.set(item.localId, { ok: true, entityId: item.localId + offset });
    return results;
  };
}

// ─────────────────────────────────────────────────────────────────────────────
// Remote client
// ─────────────────────────────────────────────────────────────────────────────

export class FakeRemoteClient implements RemoteClient {
  /** "<model>:<id>" → stored values */
  readonly records = new Map<string, JsonPayload>();
  readonly calls: Array<{ method: string; model: string; ids: number[]; values?: JsonPayload }> = [];
  readonly createMany?: (model: string, valuesList: JsonPayload[]) => Promise<number[]>;
  private nextId: number;

  constructor(options: { firstId?: number; bulk?: boolean } = {}) {
    this.nextId = options.firstId ?? 500;
    if (options.bulk) {
      this.createMany = async (model, valuesList) => {
        const ids: number[] = [];
        for (const values of valuesList) ids.push(this.store(model, values));
        this.calls.push({ method: 'createMany', model, ids });
        return ids;
      };
    }
  }

  async create(model: string, values: JsonPayload): Promise<number> {
    const id = this.store(model, values);
    this.calls.push({ method: 'create', model, ids: [id], values });
    return id;
  }

  async write(model: string, ids: number[], values: JsonPayload): Promise<void> {
    for (const id of ids) {
      this.records.set(`${model}:${id}`, { ...this.records.get(`${model}:${id}`), ...values });
    }
    this.calls.push({ method: 'write', model, ids, values });
  }

  async unlink(model: string, ids: number[]): Promise<void> {
    for (const id of ids) this.records.delete(`${model}:${id}`);
    this.calls.push({ method: 'unlink', model, ids });
  }

  async read(model: string, ids: number[]): Promise<JsonPayload[]> {
    this.calls.push({ method: 'read', model, ids });
    const found: JsonPayload[] = [];
    for (const id of ids) {
      const record = this.records.get(`${model}:${id}`);
      if (record) found.push({ id, ...record });
    }
    return found;
  }

  private store(model: string, values: JsonPayload): number {
    const id = this.nextId++;
    this.records.set(`${model}:${id}`, { ...values });
    return id;
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Local contacts
// ─────────────────────────────────────────────────────────────────────────────

export class MemoryContactStore implements ContactStore {
  readonly contacts = new Map<number, JsonPayload>();
  private seq = 0;

  async load(contactId: number): Promise<JsonPayload | null> {
    const contact = this.contacts.get(contactId);
    return contact ? { ...contact } : null;
  }

  async save(data: JsonPayload, contactId: number): Promise<number> {
    if (contactId > 0) {
      const existing = this.contacts.get(contactId);
      if (!existing) return 0;
      this.contacts.set(contactId, { ...existing, ...data });
      return contactId;
    }
    this.seq += 1;
    this.contacts.set(this.seq, { ...data });
    return this.seq;
  }

  async delete(contactId: number): Promise<void> {
    this.contacts.delete(contactId);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Jobs
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Insert a job straight into the store, bypassing enqueue() dedup — the only
 * way to get two pending jobs for the same record.
 */
export async function insertJob(
  store: MemoryQueueStore,
  overrides: Partial<QueueJob> & Pick<QueueJob, 'module' | 'entityType' | 'localId'>,
  createdAt = new Date('2026-01-01T00:00:00Z'),
): Promise<QueueJob> {
  const job: QueueJob = {
    id: await store.nextJobId(),
    tenantId: 't1',
    direction: 'local_to_remote',
    action: 'create',
    remoteId: 0,
    payload: '',
    priority: 5,
    status: 'pending',
    attempts: 0,
    maxAttempts: 3,
    createdAt,
    scheduledAt: createdAt,
    claimedAt: null,
    processedAt: null,
    lastError: '',
    lastErrorKind: null,
    ...overrides,
  };
  await store.insert(job);
  return job;
}
