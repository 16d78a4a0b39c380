// =============================================================================
// Change Triggers & Import Guard Tests
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

import { ChangeTriggers } from '../services/changeTriggers';
import { EntityMapRepository } from '../services/entityMap';
import { ImportGuard } from '../services/importGuard';
import { JobQueue } from '../services/jobQueue';
import { MemoryEntityMapStore, MemoryQueueStore } from './helpers/memoryStores';

const T0 = new Date('2026-01-01T00:00:00Z');

describe('ImportGuard', () => {
  it('marks a module as importing only while the callback runs', async () => {
    const guard = new ImportGuard();
    let inside = false;

    await guard.run('contacts', async () => {
      inside = guard.isImporting('contacts');
    });

    expect(inside).toBe(true);
    expect(guard.isImporting('contacts')).toBe(false);
  });

  it('stays active until the outermost nested run settles', async () => {
    const guard = new ImportGuard();
    const seen: boolean[] = [];

    await guard.run('contacts', async () => {
      await guard.run('contacts', async () => undefined);
      seen.push(guard.isImporting('contacts'));
    });

    expect(seen).toEqual([true]);
    expect(guard.isImporting('contacts')).toBe(false);
  });

  it('clears the flag when the callback throws', async () => {
    const guard = new ImportGuard();

    await expect(
      guard.run('contacts', async () => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');
    expect(guard.isImporting('contacts')).toBe(false);
  });

  it('is scoped per module', async () => {
    const guard = new ImportGuard();

    await guard.run('contacts', async () => {
      expect(guard.isImporting('catalog')).toBe(false);
    });
  });
});

describe('ChangeTriggers', () => {
  let store: MemoryQueueStore;
  let entityMap: EntityMapRepository;
  let guard: ImportGuard;
  let triggers: ChangeTriggers;

  beforeEach(() => {
    store = new MemoryQueueStore();
    const queue = new JobQueue(store, { now: () => T0 });
    entityMap = new EntityMapRepository(new MemoryEntityMapStore(), 't1');
    guard = new ImportGuard();
    triggers = new ChangeTriggers('t1', queue, entityMap, guard, { localDebounceMs: 2_000 });
  });

  describe('onLocalChange', () => {
    it('queues a debounced create for an unmapped record', async () => {
      const jobId = await triggers.onLocalChange('contacts', 'contact', 5, 'save', { firstName: 'Ada' });

      expect(jobId).toBe(1);
      expect(store.get(1)).toMatchObject({
        tenantId: 't1',
        module: 'contacts',
        entityType: 'contact',
        action: 'create',
        direction: 'local_to_remote',
        localId: 5,
        remoteId: 0,
        payload: '{"firstName":"Ada"}',
        scheduledAt: new Date(T0.getTime() + 2_000),
      });
    });

    it('queues an update carrying the mapped remote id', async () => {
      await entityMap.save('contacts', 'contact', 5, 88);

      await triggers.onLocalChange('contacts', 'contact', 5, 'save');

      expect(store.get(1)).toMatchObject({ action: 'update', remoteId: 88, payload: '' });
    });

    it('queues an immediate delete without a payload', async () => {
      await entityMap.save('contacts', 'contact', 5, 88);

      await triggers.onLocalChange('contacts', 'contact', 5, 'delete', { firstName: 'Ada' });

      expect(store.get(1)).toMatchObject({ action: 'delete', remoteId: 88, payload: '', scheduledAt: T0 });
    });

    it('drops a delete for a record the remote side never saw', async () => {
      expect(await triggers.onLocalChange('contacts', 'contact', 5, 'delete')).toBeNull();
      expect(store.all()).toHaveLength(0);
    });

    it('ignores saves made while the module is importing', async () => {
      const jobId = await guard.run('contacts', () =>
        triggers.onLocalChange('contacts', 'contact', 5, 'save', { firstName: 'Ada' }),
      );

      expect(jobId).toBeNull();
      expect(store.all()).toHaveLength(0);
    });

    it('coalesces repeated saves into one pending job', async () => {
      await triggers.onLocalChange('contacts', 'contact', 5, 'save', { firstName: 'A' });
      const second = await triggers.onLocalChange('contacts', 'contact', 5, 'save', { firstName: 'Ada' });

      expect(second).toBe(1);
      expect(store.all()).toHaveLength(1);
      expect(store.get(1)?.payload).toBe('{"firstName":"Ada"}');
    });
  });

  describe('onRemoteChange', () => {
    it('queues a create for an unknown remote record', async () => {
      await triggers.onRemoteChange('contacts', 'contact', 77, 'save');

      expect(store.get(1)).toMatchObject({
        action: 'create',
        direction: 'remote_to_local',
        localId: 0,
        remoteId: 77,
        scheduledAt: T0,
      });
    });

    it('queues an update with the mapped local id', async () => {
      await entityMap.save('contacts', 'contact', 5, 77);

      await triggers.onRemoteChange('contacts', 'contact', 77, 'save', { name: 'Ada' });

      expect(store.get(1)).toMatchObject({ action: 'update', localId: 5, payload: '{"name":"Ada"}' });
    });

    it('drops a delete for a record never imported', async () => {
      expect(await triggers.onRemoteChange('contacts', 'contact', 77, 'delete')).toBeNull();
    });

    it('is not suppressed by the import guard', async () => {
      const jobId = await guard.run('contacts', () => triggers.onRemoteChange('contacts', 'contact', 77, 'save'));

      expect(jobId).toBe(1);
    });
  });
});
