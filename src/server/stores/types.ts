// =============================================================================
// Store Interfaces — Persistence seams for the sync core
// =============================================================================
// Services never import Mongoose models directly; they are constructed with
// these stores. `mongo*Store.ts` implement them against MongoDB, tests use
// in-process implementations.
// =============================================================================
import {
  EntityMapping,
  JobStatus,
  QueueJob,
  SyncAction,
  SyncDirection,
} from '../types';

// ─────────────────────────────────────────────────────────────────────────────
// Queue
// ─────────────────────────────────────────────────────────────────────────────

/** Identity of a pending job for enqueue dedup */
export interface DedupKey {
  tenantId: string;
  module: string;
  entityType: string;
  action: SyncAction;
  direction: SyncDirection;
  /** When 0, `remoteId` identifies the record instead */
  localId: number;
  remoteId: number;
}

/** Module filter applied when selecting due jobs */
export interface DueFilter {
  /** Only this module */
  module?: string;
  /** Skip these modules (e.g. circuit open) */
  excludeModules?: string[];
}

/** Mutable job fields */
export type JobPatch = Partial<
  Pick<
    QueueJob,
    | 'status'
    | 'attempts'
    | 'scheduledAt'
    | 'claimedAt'
    | 'processedAt'
    | 'lastError'
    | 'localId'
    | 'remoteId'
    | 'payload'
    | 'priority'
    | 'lastErrorKind'
  >
>;

export interface QueueStore {
  /** Allocate the next monotonic job id */
  nextJobId(): Promise<number>;
  insert(job: QueueJob): Promise<void>;
  findPendingDuplicate(key: DedupKey): Promise<QueueJob | null>;
  findById(jobId: number): Promise<QueueJob | null>;
  /**
   * Atomically move the best due pending job to `processing` and return it.
   * Ordered by priority, then createdAt, then id.
   */
  claimNext(tenantId: string, now: Date, filter: DueFilter): Promise<QueueJob | null>;
  /** Read-only version of the claim selection */
  findDue(tenantId: string, now: Date, filter: DueFilter, limit: number): Promise<QueueJob[]>;
  /**
   * Apply `patch` only if the job is currently in one of `from`.
   * Returns false when the job is missing or in another status.
   */
  transition(jobId: number, from: JobStatus[], patch: JobPatch): Promise<boolean>;
  countByStatus(tenantId: string): Promise<Partial<Record<JobStatus, number>>>;
  /** failed + dead → pending, attempts 0. Returns the number reset. */
  resetTerminal(tenantId: string, now: Date): Promise<number>;
  deletePending(tenantId: string, jobId: number): Promise<boolean>;
  /** Delete done / dead / failed jobs last touched before `before` */
  deleteFinishedBefore(tenantId: string, before: Date): Promise<number>;
  /** processing jobs claimed before `claimedBefore` → pending */
  requeueStale(tenantId: string, claimedBefore: Date): Promise<number>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Entity map
// ─────────────────────────────────────────────────────────────────────────────

/** (tenant, module, entity type) a mapping lives under */
export interface MappingScope {
  tenantId: string;
  module: string;
  entityType: string;
}

export interface EntityMapStore {
  findByLocal(scope: MappingScope, localId: number): Promise<EntityMapping | null>;
  findByRemote(scope: MappingScope, remoteId: number): Promise<EntityMapping | null>;
  findManyByLocal(scope: MappingScope, localIds: number[]): Promise<EntityMapping[]>;
  findManyByRemote(scope: MappingScope, remoteIds: number[]): Promise<EntityMapping[]>;
  /**
   * Write `mapping`, replacing the row for its localId and removing any
   * other row that holds its remoteId.
   */
  upsert(mapping: EntityMapping): Promise<void>;
  /** Returns the removed row, if there was one */
  deleteByLocal(scope: MappingScope, localId: number): Promise<EntityMapping | null>;
  list(scope: MappingScope, limit: number): Promise<EntityMapping[]>;
  count(tenantId: string, module?: string, entityType?: string): Promise<number>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Key-value settings
// ─────────────────────────────────────────────────────────────────────────────

export interface KeyValueStore {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<void>;
  delete(key: string): Promise<void>;
}
