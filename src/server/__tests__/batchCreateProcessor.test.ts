// =============================================================================
// Batch Create Processor Tests
// =============================================================================
jest.mock('../utils/logger', () => ({
  __esModule: true,
  default: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

import { BatchCreateProcessor, isBatchable } from '../services/batchCreateProcessor';
import { EntityMapRepository } from '../services/entityMap';
import { JobQueue } from '../services/jobQueue';
import { computeSyncHash } from '../services/syncHash';
import { EntityMapping, ModuleHandler, QueueJob, SyncOutcome } from '../types';
import { batchSucceedsWith, FakeHandler, insertJob } from './helpers/fakes';
import { MemoryEntityMapStore, MemoryQueueStore } from './helpers/memoryStores';

const T0 = new Date('2026-01-01T00:00:00Z');

class FailingUpsertStore extends MemoryEntityMapStore {
  async upsert(_mapping: EntityMapping): Promise<void> {
    throw new Error('write conflict');
  }
}

describe('BatchCreateProcessor', () => {
  let now: Date;
  let store: MemoryQueueStore;
  let queue: JobQueue;
  let mapStore: MemoryEntityMapStore;
  let entityMap: EntityMapRepository;
  let handlers: Map<string, ModuleHandler>;

  function createProcessor(): BatchCreateProcessor {
    return new BatchCreateProcessor(queue, entityMap, (module) => handlers.get(module));
  }

  function product(localId: number, payload: object | string = { name: `P${localId}` }): Promise<QueueJob> {
    return insertJob(store, {
      module: 'catalog',
      entityType: 'product',
      localId,
      payload: typeof payload === 'string' ? payload : JSON.stringify(payload),
      status: 'processing',
    });
  }

  beforeEach(() => {
    now = T0;
    store = new MemoryQueueStore();
    queue = new JobQueue(store, { now: () => now, random: () => 0 });
    mapStore = new MemoryEntityMapStore();
    entityMap = new EntityMapRepository(mapStore, 't1');
    handlers = new Map();
  });

  it('only batches local_to_remote creates with a local id', async () => {
    expect(isBatchable(await product(1))).toBe(true);
    expect(isBatchable({ ...(await product(2)), action: 'update' })).toBe(false);
    expect(isBatchable({ ...(await product(3)), direction: 'remote_to_local' })).toBe(false);
    expect(isBatchable({ ...(await product(4)), localId: 0 })).toBe(false);
    expect(isBatchable({ ...(await product(5)), remoteId: 1005 })).toBe(false);
  });

  it('groups creates per module and entity type, leaving others alone', async () => {
    handlers.set('catalog', new FakeHandler('catalog', { batch: batchSucceedsWith(1000) }));
    const jobs = [await product(1), await product(2), await product(3)];
    const update = await insertJob(store, {
      module: 'catalog',
      entityType: 'product',
      localId: 4,
      action: 'update',
    });

    const groups = createProcessor().planGroups([...jobs, update]);

    expect(groups).toHaveLength(1);
    expect(groups[0].jobs.map((job) => job.localId)).toEqual([1, 2, 3]);
  });

  it('skips modules without a batch capability', async () => {
    handlers.set('catalog', new FakeHandler('catalog'));

    expect(createProcessor().planGroups([await product(1), await product(2)])).toEqual([]);
  });

  it('keeps the latest job per local id in the first slot and closes the older one', async () => {
    const handler = new FakeHandler('catalog', { batch: batchSucceedsWith(1000) });
    handlers.set('catalog', handler);
    const older = await product(1, { name: 'old' });
    const other = await product(2);
    const newer = await product(1, { name: 'new' });

    const result = await createProcessor().process([older, other, newer]);

    expect(handler.batchCalls).toHaveLength(1);
    expect(handler.batchCalls[0].items).toEqual([
      { localId: 1, payload: { name: 'new' } },
      { localId: 2, payload: { name: 'P2' } },
    ]);
    expect(store.get(older.id)?.status).toBe('done');
    expect(result).toMatchObject({ processed: 2, successes: 2, failures: 0 });
    expect([...result.handledJobIds].sort()).toEqual([older.id, other.id, newer.id].sort());
  });

  it('leaves a group that dedups down to one job for single dispatch', async () => {
    const handler = new FakeHandler('catalog', { batch: batchSucceedsWith(1000) });
    handlers.set('catalog', handler);

    const result = await createProcessor().process([await product(1), await product(1)]);

    expect(handler.batchCalls).toHaveLength(0);
    expect(result.handledJobIds.size).toBe(0);
  });

  it('saves mappings with the payload hash and marks jobs done', async () => {
    handlers.set('catalog', new FakeHandler('catalog', { batch: batchSucceedsWith(1000), remoteModel: 'product.template' }));
    const jobs = [await product(1), await product(2)];

    await createProcessor().process(jobs);

    expect(await entityMap.getMapping('catalog', 'product', 1)).toMatchObject({
      remoteId: 1001,
      remoteModel: 'product.template',
      syncHash: computeSyncHash({ name: 'P1' }),
    });
    expect(store.get(jobs[1].id)?.status).toBe('done');
  });

  it('leaves the hash empty for jobs without a payload snapshot', async () => {
    handlers.set('catalog', new FakeHandler('catalog', { batch: batchSucceedsWith(1000) }));

    await createProcessor().process([await product(1, ''), await product(2, '')]);

    expect((await entityMap.getMapping('catalog', 'product', 1))?.syncHash).toBe('');
  });

  it('kills malformed payloads without sending them', async () => {
    const handler = new FakeHandler('catalog', { batch: batchSucceedsWith(1000) });
    handlers.set('catalog', handler);
    const broken = await product(1, '{not json');
    const jobs = [broken, await product(2), await product(3)];

    const result = await createProcessor().process(jobs);

    expect(handler.batchCalls[0].items.map((item) => item.localId)).toEqual([2, 3]);
    expect(store.get(broken.id)).toMatchObject({ status: 'dead', lastErrorKind: 'permanent' });
    expect(store.get(broken.id)?.lastError).toMatch(/^Batch job #1: Invalid JSON payload: /);
    expect(result).toMatchObject({ processed: 3, successes: 2, failures: 1 });
  });

  it('retries a job the batch returned no result for', async () => {
    handlers.set(
      'catalog',
      new FakeHandler('catalog', {
        batch: () => new Map<number, SyncOutcome>([[1, { ok: true, entityId: 1001 }]]),
      }),
    );
    const jobs = [await product(1), await product(2)];

    await createProcessor().process(jobs);

    expect(store.get(jobs[1].id)).toMatchObject({
      status: 'pending',
      attempts: 1,
      lastError: 'No result from batch.',
      lastErrorKind: 'transient',
    });
  });

  it('retries the whole group when the bulk call throws', async () => {
    handlers.set(
      'catalog',
      new FakeHandler('catalog', {
        batch: () => {
          throw new Error('Service unavailable');
        },
      }),
    );
    const jobs = [await product(1), await product(2)];

    const result = await createProcessor().process(jobs);

    for (const job of jobs) {
      expect(store.get(job.id)).toMatchObject({ status: 'pending', attempts: 1, lastError: 'Service unavailable' });
    }
    expect(result.moduleOutcomes.get('catalog')).toEqual({ successes: 0, failures: 2 });
  });

  it('keeps the created remote id when the mapping cannot be saved and never re-creates it', async () => {
    entityMap = new EntityMapRepository(new FailingUpsertStore(), 't1');
    const handler = new FakeHandler('catalog', { batch: batchSucceedsWith(1000) });
    handlers.set('catalog', handler);
    const jobs = [await product(1), await product(2)];

    await createProcessor().process(jobs);

    expect(store.get(jobs[0].id)).toMatchObject({
      status: 'pending',
      remoteId: 1001,
      lastError: 'Mapping save failed: write conflict',
    });

    now = new Date(T0.getTime() + 24 * 60 * 60 * 1000);
    const retried = await queue.claimDue('t1', 10);
    const result = await createProcessor().process(retried);

    expect(retried.map((job) => job.remoteId)).toEqual([1001, 1002]);
    expect(handler.batchCalls).toHaveLength(1);
    expect(result.handledJobIds.size).toBe(0);
  });

  it('records the other outcomes when one write-back fails', async () => {
    handlers.set('catalog', new FakeHandler('catalog', { batch: batchSucceedsWith(1000) }));
    const jobs = [await product(1), await product(2)];
    const transition = store.transition.bind(store);
    jest.spyOn(store, 'transition').mockImplementation(async (jobId, from, patch) => {
      if (jobId === jobs[0].id) throw new Error('connection reset');
      return transition(jobId, from, patch);
    });

    const result = await createProcessor().process(jobs);

    expect(store.get(jobs[0].id)?.status).toBe('processing');
    expect(store.get(jobs[1].id)?.status).toBe('done');
    expect(result).toMatchObject({ processed: 2, successes: 2, failures: 0 });
  });
});
