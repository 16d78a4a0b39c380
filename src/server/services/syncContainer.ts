// =============================================================================
// Sync Container — Wires one tenant's sync services together
// =============================================================================
import { AppConfig } from '../config';
import { EntityMapStore, KeyValueStore, QueueStore } from '../stores/types';
import { MongoEntityMapStore } from '../stores/mongoEntityMapStore';
import { MongoKeyValueStore } from '../stores/mongoKeyValueStore';
import { MongoQueueStore } from '../stores/mongoQueueStore';
import { ChangeTriggers } from './changeTriggers';
import { DiffScanner } from './diffScanner';
import { EntityMapRepository } from './entityMap';
import { FailureNotifier } from './failureNotifier';
import { ImportGuard } from './importGuard';
import { JobQueue } from './jobQueue';
import { ModuleCircuitBreaker } from './moduleCircuitBreaker';
import { ModuleRegistry } from './moduleRegistry';
import { SyncEngine } from './syncEngine';
import { SyncScheduler } from './syncScheduler';

export interface SyncStores {
  queue: QueueStore;
  entityMap: EntityMapStore;
  kv: KeyValueStore;
}

export interface SyncServices {
  tenantId: string;
  queue: JobQueue;
  entityMap: EntityMapRepository;
  breaker: ModuleCircuitBreaker;
  importGuard: ImportGuard;
  registry: ModuleRegistry;
  notifier: FailureNotifier;
  engine: SyncEngine;
  triggers: ChangeTriggers;
  scanner: DiffScanner;
  scheduler: SyncScheduler;
}

export type SyncContainerConfig = Pick<AppConfig, 'sync' | 'alertWebhookUrl'>;

export function createMongoStores(): SyncStores {
  return {
    queue: new MongoQueueStore(),
    entityMap: new MongoEntityMapStore(),
    kv: new MongoKeyValueStore(),
  };
}

/** Build the full service graph for `tenantId`. Modules are registered by the caller. */
export function createSyncServices(
  tenantId: string,
  stores: SyncStores,
  config: SyncContainerConfig,
): SyncServices {
  const { sync } = config;

  const queue = new JobQueue(stores.queue, {
    maxAttempts: sync.maxAttempts,
    retryBackoff: sync.retryBackoff,
    retryBaseDelayMs: sync.retryBaseDelayMs,
  });
  const entityMap = new EntityMapRepository(stores.entityMap, tenantId);
  const notifier = new FailureNotifier(stores.kv, { webhookUrl: config.alertWebhookUrl });
  const breaker = new ModuleCircuitBreaker(stores.kv, tenantId);
  breaker.setOpenListener(notifier);

  const importGuard = new ImportGuard();
  const registry = new ModuleRegistry();

  const engine = new SyncEngine(
    { tenantId, queue, registry, breaker, entityMap, runListener: notifier },
    {
      batchSize: sync.batchSize,
      maxPagesPerRun: sync.maxPagesPerRun,
      timeBudgetMs: sync.timeBudgetMs,
      dryRun: sync.dryRun,
    },
  );

  return {
    tenantId,
    queue,
    entityMap,
    breaker,
    importGuard,
    registry,
    notifier,
    engine,
    triggers: new ChangeTriggers(tenantId, queue, entityMap, importGuard, {
      localDebounceMs: sync.enqueueDebounceMs,
    }),
    scanner: new DiffScanner(tenantId, queue, entityMap),
    scheduler: new SyncScheduler(engine, queue, {
      intervalMs: sync.intervalMs,
      staleTimeoutMs: sync.staleTimeoutMs,
      retentionDays: sync.retentionDays,
    }),
  };
}

/** Tenant id → that tenant's services */
export type ServiceResolver = (tenantId: string) => SyncServices;

/**
 * Memoise `build` per tenant so every request for a tenant shares one graph.
 * `onCreate` runs once for each graph, right after it is built.
 */
export function createServiceResolver(
  build: (tenantId: string) => SyncServices,
  onCreate?: (services: SyncServices) => void,
): ServiceResolver {
  const services = new Map<string, SyncServices>();
  return (tenantId) => {
    let tenantServices = services.get(tenantId);
    if (!tenantServices) {
      tenantServices = build(tenantId);
      services.set(tenantId, tenantServices);
      onCreate?.(tenantServices);
    }
    return tenantServices;
  };
}
