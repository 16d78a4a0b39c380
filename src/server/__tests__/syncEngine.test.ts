// =============================================================================
// Sync Engine Tests
// =============================================================================
// Drives the engine end to end over in-process stores:
//
//   1. Batch partitioning and dedup
//   2. Malformed payloads → dead, inside and outside a batch
//   3. Unroutable jobs, circuit isolation, breaker opening from engine runs
//   4. Dry run, run lock, time budget
//   5. Catalog scenario: 3 creates, 2 succeed, 1 permanent failure
//   6. Recovery: retried batch creates, failed outcome write-backs
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

import { ContactsModule } from '../services/contactsModule';
import { EntityMapRepository } from '../services/entityMap';
import { ImportGuard } from '../services/importGuard';
import { JobQueue } from '../services/jobQueue';
import { circuitStateKey, ModuleCircuitBreaker } from '../services/moduleCircuitBreaker';
import { ModuleRegistry } from '../services/moduleRegistry';
import { RunListener, SyncEngine, SyncEngineOptions } from '../services/syncEngine';
import { EnqueueInput, EntityMapping, QueueJob, SyncOutcome } from '../types';
import { batchSucceedsWith, FakeHandler, FakeRemoteClient, insertJob, MemoryContactStore } from './helpers/fakes';
import { MemoryEntityMapStore, MemoryKeyValueStore, MemoryQueueStore } from './helpers/memoryStores';

const T0 = Date.parse('2026-01-01T00:00:00Z');

/** Throws on the first `failures` upserts, then behaves */
class FlakyUpsertStore extends MemoryEntityMapStore {
  constructor(private failures: number) {
    super();
  }

  async upsert(mapping: EntityMapping): Promise<void> {
    if (this.failures > 0) {
      this.failures -= 1;
      throw new Error('write conflict');
    }
    return super.upsert(mapping);
  }
}

/** findById throws once for the armed job id */
class FlakyQueueStore extends MemoryQueueStore {
  failFindByIdFor = 0;

  async findById(jobId: number): Promise<QueueJob | null> {
    if (jobId === this.failFindByIdFor) {
      this.failFindByIdFor = 0;
      throw new Error('findById');
    }
    return super.findById(jobId);
  }
}

describe('SyncEngine', () => {
  let clock: number;
  let store: MemoryQueueStore;
  let queue: JobQueue;
  let kv: MemoryKeyValueStore;
  let breaker: ModuleCircuitBreaker;
  let entityMap: EntityMapRepository;
  let registry: ModuleRegistry;
  let runListener: { recordRun: jest.Mock<Promise<void>, [string, number, number]> };

  function createEngine(options: Partial<SyncEngineOptions> = {}): SyncEngine {
    const listener: RunListener = runListener;
    return new SyncEngine(
      { tenantId: 't1', queue, registry, breaker, entityMap, runListener: listener },
      { now: () => clock, ...options },
    );
  }

  function enqueue(input: Partial<EnqueueInput> & Pick<EnqueueInput, 'localId'>): Promise<number> {
    return queue.enqueue({
      tenantId: 't1',
      module: 'catalog',
      entityType: 'product',
      action: 'create',
      direction: 'local_to_remote',
      payload: { name: `P${input.localId}` },
      ...input,
    });
  }

  beforeEach(() => {
    clock = T0;
    store = new MemoryQueueStore();
    queue = new JobQueue(store, {
      now: () => new Date(clock),
      random: () => 0,
      retryBackoff: 'fixed',
      retryBaseDelayMs: 1_000,
    });
    kv = new MemoryKeyValueStore();
    breaker = new ModuleCircuitBreaker(kv, 't1', { now: () => clock });
    entityMap = new EntityMapRepository(new MemoryEntityMapStore(), 't1');
    registry = new ModuleRegistry();
    runListener = { recordRun: jest.fn().mockResolvedValue(undefined) };
  });

  // ───────────────────────────────────────────────────────────────────────────
  describe('partitioning', () => {
    it('sends 3 creates as one batch and the update on its own', async () => {
      const handler = new FakeHandler('catalog', { batch: batchSucceedsWith(1000) });
      registry.register(handler);
      await enqueue({ localId: 1 });
      await enqueue({ localId: 2 });
      await enqueue({ localId: 3 });
      await enqueue({ localId: 4, action: 'update', remoteId: 1004 });

      const completed = await createEngine().processQueue();

      expect(completed).toBe(4);
      expect(handler.batchCalls).toHaveLength(1);
      expect(handler.batchCalls[0].items.map((item) => item.localId)).toEqual([1, 2, 3]);
      expect(handler.pushCalls).toEqual([
        { entityType: 'product', action: 'update', localId: 4, remoteId: 1004, payload: { name: 'P4' } },
      ]);
    });

    it('dedups creates for the same local id inside a page', async () => {
      const handler = new FakeHandler('catalog', { batch: batchSucceedsWith(1000) });
      registry.register(handler);
      await insertJob(store, { module: 'catalog', entityType: 'product', localId: 1, payload: '{"v":1}' });
      await insertJob(store, { module: 'catalog', entityType: 'product', localId: 2, payload: '{"v":2}' });
      await insertJob(store, { module: 'catalog', entityType: 'product', localId: 1, payload: '{"v":3}' });

      const completed = await createEngine().processQueue();

      expect(handler.batchCalls[0].items).toEqual([
        { localId: 1, payload: { v: 3 } },
        { localId: 2, payload: { v: 2 } },
      ]);
      expect(completed).toBe(2);
      expect(store.all().every((job) => job.status === 'done')).toBe(true);
    });

    it('dispatches creates one by one when the handler cannot batch', async () => {
      const handler = new FakeHandler('catalog');
      registry.register(handler);
      await enqueue({ localId: 1 });
      await enqueue({ localId: 2 });

      expect(await createEngine().processQueue()).toBe(2);
      expect(handler.pushCalls.map((call) => call.localId)).toEqual([1, 2]);
    });

    it('routes remote_to_local jobs to pull', async () => {
      const handler = new FakeHandler('catalog');
      registry.register(handler);
      await enqueue({ localId: 0, remoteId: 77, direction: 'remote_to_local', action: 'update', payload: undefined });

      await createEngine().processQueue();

      expect(handler.pullCalls).toEqual([
        { entityType: 'product', action: 'update', localId: 0, remoteId: 77, payload: {} },
      ]);
    });
  });

  // ───────────────────────────────────────────────────────────────────────────
  describe('failures', () => {
    it('kills a malformed payload inside a batch', async () => {
      registry.register(new FakeHandler('catalog', { batch: batchSucceedsWith(1000) }));
      const broken = await insertJob(store, { module: 'catalog', entityType: 'product', localId: 1, payload: '[' });
      await insertJob(store, { module: 'catalog', entityType: 'product', localId: 2, payload: '{}' });
      await insertJob(store, { module: 'catalog', entityType: 'product', localId: 3, payload: '{}' });

      expect(await createEngine().processQueue()).toBe(2);
      expect(store.get(broken.id)).toMatchObject({ status: 'dead', attempts: 1, lastErrorKind: 'permanent' });
    });

    it('kills a malformed payload on single dispatch', async () => {
      const handler = new FakeHandler('catalog');
      registry.register(handler);
      const job = await insertJob(store, {
        module: 'catalog',
        entityType: 'product',
        localId: 1,
        action: 'update',
        payload: '"just a string"',
      });

      expect(await createEngine().processQueue()).toBe(0);
      expect(store.get(job.id)).toMatchObject({
        status: 'dead',
        lastError: 'Invalid JSON payload: expected an object',
      });
      expect(handler.pushCalls).toHaveLength(0);
    });

    it('retries a handler exception as transient', async () => {
      registry.register(
        new FakeHandler('catalog', {
          push: () => {
            throw new Error('socket hang up');
          },
        }),
      );
      const id = await enqueue({ localId: 1, action: 'update' });

      await createEngine().processQueue();

      expect(store.get(id)).toMatchObject({
        status: 'pending',
        attempts: 1,
        lastError: 'socket hang up',
        lastErrorKind: 'transient',
        scheduledAt: new Date(T0 + 1_000),
      });
    });

    it('fails jobs for modules nobody registered', async () => {
      const id = await enqueue({ localId: 1, module: 'ghost' });

      expect(await createEngine().processQueue()).toBe(0);
      expect(store.get(id)).toMatchObject({
        status: 'failed',
        lastError: 'No handler registered for module "ghost"',
      });
    });
  });

  // ───────────────────────────────────────────────────────────────────────────
  describe('circuit breaking', () => {
    it('skips a module whose circuit is open and keeps processing the others', async () => {
      const bad = new FakeHandler('bad');
      const good = new FakeHandler('good');
      registry.register(bad).register(good);
      await kv.set(circuitStateKey('t1'), JSON.stringify({ bad: { failures: 5, openedAt: T0 } }));
      const badJob = await enqueue({ localId: 1, module: 'bad', action: 'update' });
      await enqueue({ localId: 2, module: 'good', action: 'update' });

      expect(await createEngine().processQueue()).toBe(1);
      expect(bad.pushCalls).toHaveLength(0);
      expect(store.get(badJob)).toMatchObject({ status: 'pending', attempts: 0 });
    });

    it('opens the circuit after five failing runs', async () => {
      const failing: SyncOutcome = { ok: false, message: 'ERP timeout', kind: 'transient' };
      registry.register(new FakeHandler('bad', { push: () => failing }));
      const id = await enqueue({ localId: 1, module: 'bad', action: 'update', maxAttempts: 10 });
      const engine = createEngine();

      for (let run = 0; run < 5; run++) {
        await engine.processQueue();
        clock += 1_000;
      }

      expect(store.get(id)?.attempts).toBe(5);
      expect(await breaker.isModuleAvailable('bad')).toBe(false);
      expect(await engine.processQueue()).toBe(0);
      expect(store.get(id)?.attempts).toBe(5);
    });

    it('reports per-module totals to the breaker and run totals to the listener', async () => {
      registry.register(new FakeHandler('catalog', { push: ({ localId }) => (localId === 1 ? { ok: true } : { ok: false, message: 'no', kind: 'transient' }) }));
      await enqueue({ localId: 1, action: 'update' });
      await enqueue({ localId: 2, action: 'update' });
      const recordBatch = jest.spyOn(breaker, 'recordBatch');

      await createEngine().processQueue();

      expect(recordBatch).toHaveBeenCalledWith('catalog', 1, 1);
      expect(runListener.recordRun).toHaveBeenCalledWith('t1', 1, 1);
    });

    it('does not notify the listener for an empty run', async () => {
      expect(await createEngine().processQueue()).toBe(0);
      expect(runListener.recordRun).not.toHaveBeenCalled();
    });
  });

  // ───────────────────────────────────────────────────────────────────────────
  describe('run control', () => {
    it('dry run plans the page and changes nothing', async () => {
      const handler = new FakeHandler('catalog', { batch: batchSucceedsWith(1000) });
      registry.register(handler);
      await enqueue({ localId: 1 });
      await enqueue({ localId: 2 });
      await enqueue({ localId: 3, action: 'update' });
      await enqueue({ localId: 4, module: 'ghost' });

      const engine = createEngine({ dryRun: true });

      expect(await engine.processQueue()).toBe(0);
      expect(handler.batchCalls).toHaveLength(0);
      expect(handler.pushCalls).toHaveLength(0);
      expect(store.all().every((job) => job.status === 'pending' && job.attempts === 0)).toBe(true);
      expect(await engine.planQueue()).toEqual({
        batches: [{ module: 'catalog', entityType: 'product', jobIds: [1, 2], supersededJobIds: [] }],
        singles: [3],
        deferred: [],
        unroutable: [4],
      });
    });

    it('returns 0 while another run holds the tenant lock', async () => {
      let release: () => void = () => undefined;
      const gate = new Promise<void>((resolve) => {
        release = resolve;
      });
      registry.register(
        new FakeHandler('catalog', {
          push: async () => {
            await gate;
            return { ok: true };
          },
        }),
      );
      await enqueue({ localId: 1, action: 'update' });
      const engine = createEngine();

      const first = engine.processQueue();
      expect(engine.isRunning()).toBe(true);
      expect(await engine.processQueue()).toBe(0);
      expect(await engine.processModuleQueue('catalog')).toBe(0);

      release();
      expect(await first).toBe(1);
      expect(engine.isRunning()).toBe(false);
    });

    it('hands unstarted jobs back when the time budget runs out', async () => {
      registry.register(
        new FakeHandler('catalog', {
          push: () => {
            clock += 1_000;
            return { ok: true };
          },
        }),
      );
      const first = await enqueue({ localId: 1, action: 'update' });
      const second = await enqueue({ localId: 2, action: 'update' });

      expect(await createEngine({ timeBudgetMs: 1_000 }).processQueue()).toBe(1);
      expect(store.get(first)?.status).toBe('done');
      expect(store.get(second)).toMatchObject({ status: 'pending', attempts: 0, claimedAt: null });
    });

    it('processModuleQueue only touches the named module', async () => {
      const catalog = new FakeHandler('catalog');
      const crm = new FakeHandler('crm');
      registry.register(catalog).register(crm);
      await enqueue({ localId: 1, action: 'update' });
      await enqueue({ localId: 2, module: 'crm', action: 'update' });

      expect(await createEngine().processModuleQueue('crm')).toBe(1);
      expect(catalog.pushCalls).toHaveLength(0);
    });

    it('stops after maxPagesPerRun pages', async () => {
      const handler = new FakeHandler('catalog');
      registry.register(handler);
      for (let localId = 1; localId <= 5; localId++) {
        await enqueue({ localId, action: 'update' });
      }

      expect(await createEngine({ batchSize: 2, maxPagesPerRun: 2 }).processQueue()).toBe(4);
      expect((await queue.getStats('t1')).pending).toBe(1);
    });
  });

  // ───────────────────────────────────────────────────────────────────────────
  describe('catalog scenario', () => {
    it('creates 10 and 20, kills 30 and returns 2', async () => {
      registry.register(
        new FakeHandler('catalog', {
          remoteModel: 'product.template',
          batch: (_entityType, items) => {
            const results = new Map<number, SyncOutcome>();
            for (const { localId } of items) {
              results.set(
                localId,
                localId === 30
                  ? { ok: false, message: 'Price is required', kind: 'permanent' }
                  : { ok: true, entityId: localId + 1000 },
              );
            }
            return results;
          },
        }),
      );
      const ids = [await enqueue({ localId: 10 }), await enqueue({ localId: 20 }), await enqueue({ localId: 30 })];

      const completed = await createEngine().processQueue();

      expect(completed).toBe(2);
      expect(store.get(ids[0])?.status).toBe('done');
      expect(store.get(ids[1])?.status).toBe('done');
      expect(store.get(ids[2])).toMatchObject({ status: 'dead', lastError: 'Price is required' });
      expect(await entityMap.getRemoteId('catalog', 'product', 10)).toBe(1010);
      expect(await entityMap.getRemoteId('catalog', 'product', 20)).toBe(1020);
      expect(await entityMap.getRemoteId('catalog', 'product', 30)).toBeNull();
      expect(runListener.recordRun).toHaveBeenCalledWith('t1', 2, 1);
    });
  });

  // ───────────────────────────────────────────────────────────────────────────
  describe('recovery', () => {
    it('updates the created record on retry when its mapping could not be saved', async () => {
      entityMap = new EntityMapRepository(new FlakyUpsertStore(2), 't1');
      const client = new FakeRemoteClient({ bulk: true });
      registry.register(
        new ContactsModule({ client, entityMap, importGuard: new ImportGuard() }, new MemoryContactStore()),
      );
      const contact = (localId: number, firstName: string): Promise<number> =>
        enqueue({
          module: 'contacts',
          entityType: 'contact',
          localId,
          payload: { firstName, lastName: 'Test', email: `${firstName.toLowerCase()}@example.com` },
        });
      const ids = [await contact(1, 'Ada'), await contact(2, 'Grace')];

      expect(await createEngine().processQueue()).toBe(0);
      expect(store.get(ids[0])).toMatchObject({ status: 'pending', remoteId: 500 });
      expect(store.get(ids[1])).toMatchObject({ status: 'pending', remoteId: 501 });

      clock = T0 + 1_000;
      expect(await createEngine().processQueue()).toBe(2);

      expect(client.calls.map((call) => call.method)).toEqual(['createMany', 'write', 'write']);
      expect([...client.records.keys()]).toEqual(['res.partner:500', 'res.partner:501']);
      expect(await entityMap.getRemoteId('contacts', 'contact', 1)).toBe(500);
      expect(await entityMap.getRemoteId('contacts', 'contact', 2)).toBe(501);
      expect(store.get(ids[0])?.status).toBe('done');
    });

    it('keeps going when one batch outcome cannot be written back', async () => {
      const flaky = new FlakyQueueStore();
      store = flaky;
      queue = new JobQueue(store, { now: () => new Date(clock), random: () => 0 });
      const handler = new FakeHandler('catalog', {
        batch: (_entityType, items) => {
          const results = new Map<number, SyncOutcome>();
          for (const { localId } of items) {
            results.set(
              localId,
              localId === 10
                ? { ok: false, message: 'Service unavailable', kind: 'transient' }
                : { ok: true, entityId: localId + 1000 },
            );
          }
          return results;
        },
      });
      registry.register(handler);
      const recordBatch = jest.spyOn(breaker, 'recordBatch');
      const ids = [
        await enqueue({ localId: 10 }),
        await enqueue({ localId: 20 }),
        await enqueue({ localId: 30, action: 'update', remoteId: 1030 }),
      ];
      flaky.failFindByIdFor = ids[0];

      const completed = await createEngine().processQueue();

      expect(completed).toBe(2);
      expect(handler.pushCalls.map((call) => call.localId)).toEqual([30]);
      expect(ids.map((id) => store.get(id)?.status)).toEqual(['processing', 'done', 'done']);
      expect(recordBatch).toHaveBeenCalledWith('catalog', 2, 1);
      expect(runListener.recordRun).toHaveBeenCalledWith('t1', 2, 1);
    });
  });
});
