// =============================================================================
// Shared Type Definitions
// =============================================================================

/** Which way a job moves data */
export type SyncDirection = 'local_to_remote' | 'remote_to_local';

/** What a job does to the target record */
export type SyncAction = 'create' | 'update' | 'delete';

/** Queue job lifecycle: pending → processing → done | failed | dead */
export type JobStatus = 'pending' | 'processing' | 'done' | 'failed' | 'dead';

/** Error classification — decides whether a failed job is retried */
export type ErrorKind = 'transient' | 'permanent';

/** Delay strategy between retries of a transient failure */
export type RetryBackoff = 'exponential' | 'fixed';

/** Decoded job payload (a JSON object) */
export type JsonPayload = Record<string, unknown>;

/** One unit of sync work, as persisted in the queue */
export interface QueueJob {
  /** Monotonic id assigned at enqueue */
  id: number;
  tenantId: string;
  module: string;
  entityType: string;
  direction: SyncDirection;
  action: SyncAction;
  /** Local record id (0 until known) */
  localId: number;
  /** Remote record id (0 until known) */
  remoteId: number;
  /** Serialized JSON snapshot; empty means "re-fetch live" */
  payload: string;
  /** 1–10, lower runs first */
  priority: number;
  status: JobStatus;
  attempts: number;
  maxAttempts: number;
  createdAt: Date;
  /** Earliest time the job may be claimed */
  scheduledAt: Date;
  /** Soft-lock timestamp while processing */
  claimedAt: Date | null;
  processedAt: Date | null;
  lastError: string;
  lastErrorKind: ErrorKind | null;
}

/** Arguments accepted by JobQueue.enqueue */
export interface EnqueueInput {
  tenantId: string;
  module: string;
  entityType: string;
  action: SyncAction;
  direction: SyncDirection;
  localId?: number;
  remoteId?: number;
  /** Serialized snapshot, or an object to serialize */
  payload?: JsonPayload | string;
  priority?: number;
  maxAttempts?: number;
  /** Delay before the job becomes due, so bursts coalesce via dedup */
  debounceMs?: number;
}

/** Result of a handler call: success, or failure with a classification */
export type SyncOutcome =
  | { ok: true; entityId?: number }
  | { ok: false; message: string; kind: ErrorKind; entityId?: number };

/** One record handed to a bulk create */
export interface BatchCreateItem {
  localId: number;
  payload: JsonPayload;
}

/**
 * Capability every integration implements. The orchestration core only
 * ever talks to this interface.
 */
export interface ModuleHandler {
  readonly id: string;
  push(
    entityType: string,
    action: SyncAction,
    localId: number,
    remoteId: number,
    payload: JsonPayload,
  ): Promise<SyncOutcome>;
  pull(
    entityType: string,
    action: SyncAction,
    remoteId: number,
    localId: number,
    payload: JsonPayload,
  ): Promise<SyncOutcome>;
  /** Absent means the engine never batches this module */
  pushBatchCreates?(
    entityType: string,
    items: BatchCreateItem[],
  ): Promise<Map<number, SyncOutcome>>;
  /** Remote schema name stored alongside new mappings */
  remoteModelFor?(entityType: string): string;
}

/** (tenant, module, entityType, localId) ↔ remoteId */
export interface EntityMapping {
  tenantId: string;
  module: string;
  entityType: string;
  localId: number;
  remoteId: number;
  remoteModel: string;
  /** Fingerprint of the last-synced content */
  syncHash: string;
  lastSyncedAt: Date;
}

/** Persisted per-module breaker state */
export interface CircuitState {
  /** Consecutive unhealthy batches */
  failures: number;
  /** Epoch ms when the circuit opened, 0 while closed */
  openedAt: number;
}

/** Per-module success/failure tally for one engine run */
export interface ModuleOutcome {
  successes: number;
  failures: number;
}

/** Queue counts by status */
export type QueueStats = Record<JobStatus, number> & { total: number };
