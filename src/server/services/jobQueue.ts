// =============================================================================
// Job Queue — Persistent, ordered backlog of sync jobs
// =============================================================================
// Lifecycle: pending → processing → done | failed | dead
//
//   • enqueue      — dedups against a pending job for the same record/action
//   • claimDue     — atomic pending → processing, priority then age order
//   • markDone / markRetry / markDead / markFailed / release
//   • operator actions: retryFailed, cancel, getStats, cleanup, recoverStale
//
// Jobs in `done` or `dead` are never modified here except by retryFailed().
// =============================================================================
import {
  EnqueueInput,
  ErrorKind,
  JobStatus,
  QueueJob,
  QueueStats,
  RetryBackoff,
} from '../types';
import { JobPatch, QueueStore } from '../stores/types';
import { encodePayload } from '../utils/payload';
import { toStoredError } from '../utils/syncErrors';
import logger from '../utils/logger';

export interface JobQueueOptions {
  /** Default for jobs enqueued without maxAttempts */
  maxAttempts: number;
  retryBackoff: RetryBackoff;
  retryBaseDelayMs: number;
  /** Default debounce for enqueue() */
  debounceMs: number;
  now: () => Date;
  /** [0, 1) — jitter source */
  random: () => number;
}

export interface ClaimOptions {
  /** Only claim jobs of this module */
  module?: string;
  /** Never claim jobs of these modules */
  excludeModules?: string[];
}

const DEFAULT_OPTIONS: JobQueueOptions = {
  maxAttempts: 3,
  retryBackoff: 'exponential',
  retryBaseDelayMs: 60_000,
  debounceMs: 0,
  now: () => new Date(),
  random: Math.random,
};

const DEFAULT_PRIORITY = 5;
const JOB_STATUSES: JobStatus[] = ['pending', 'processing', 'done', 'failed', 'dead'];

/** Statuses a worker may still move a job out of */
const OPEN_STATUSES: JobStatus[] = ['pending', 'processing'];

const DAY_MS = 24 * 60 * 60 * 1000;

export class JobQueue {
  private readonly options: JobQueueOptions;

  constructor(
    private readonly store: QueueStore,
    options: Partial<JobQueueOptions> = {},
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Enqueue
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Add a job, or refresh the pending job already covering the same record.
   *
   * @returns — The new or existing job id
   * @throws DatabaseError
   */
  async enqueue(input: EnqueueInput): Promise<number> {
    if (!input.tenantId || !input.module || !input.entityType) {
      throw new Error('tenantId, module and entityType are required');
    }

    const localId = Math.max(0, input.localId ?? 0);
    const remoteId = Math.max(0, input.remoteId ?? 0);
    const payload = encodePayload(input.payload);
    const priority = clampPriority(input.priority);
    const debounceMs = Math.max(0, input.debounceMs ?? this.options.debounceMs);
    const now = this.options.now();
    const scheduledAt = new Date(now.getTime() + debounceMs);

    // A job with neither id cannot be matched to another one
    if (localId > 0 || remoteId > 0) {
      const existing = await this.store.findPendingDuplicate({
        tenantId: input.tenantId,
        module: input.module,
        entityType: input.entityType,
        action: input.action,
        direction: input.direction,
        localId,
        remoteId,
      });

      if (existing) {
        const patch: JobPatch = {
          payload,
          priority,
          remoteId: remoteId > 0 ? remoteId : existing.remoteId,
        };
        if (debounceMs > 0) patch.scheduledAt = scheduledAt;

        if (await this.store.transition(existing.id, ['pending'], patch)) {
          logger.debug('Enqueue deduplicated', {
            tenantId: input.tenantId,
            module: input.module,
            jobId: existing.id,
          });
          return existing.id;
        }
        // Claimed in the meantime — fall through and queue a fresh job
      }
    }

    const id = await this.store.nextJobId();
    await this.store.insert({
      id,
      tenantId: input.tenantId,
      module: input.module,
      entityType: input.entityType,
      direction: input.direction,
      action: input.action,
      localId,
      remoteId,
      payload,
      priority,
      status: 'pending',
      attempts: 0,
      maxAttempts: Math.max(1, input.maxAttempts ?? this.options.maxAttempts),
      createdAt: now,
      scheduledAt,
      claimedAt: null,
      processedAt: null,
      lastError: '',
      lastErrorKind: null,
    });

    logger.debug('Job enqueued', {
      tenantId: input.tenantId,
      module: input.module,
      entityType: input.entityType,
      action: input.action,
      jobId: id,
    });
    return id;
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Claim
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Atomically claim up to `limit` due jobs. Each claim is a single
   * compare-and-set on `status: 'pending'`.
   */
  async claimDue(tenantId: string, limit: number, options: ClaimOptions = {}): Promise<QueueJob[]> {
    if (limit <= 0 || isExcluded(options)) return [];

    const now = this.options.now();
    const claimed: QueueJob[] = [];
    while (claimed.length < limit) {
      const job = await this.store.claimNext(tenantId, now, options);
      if (!job) break;
      claimed.push(job);
    }
    return claimed;
  }

  /** Same selection as claimDue() without changing anything. */
  async peekDue(tenantId: string, limit: number, options: ClaimOptions = {}): Promise<QueueJob[]> {
    if (limit <= 0 || isExcluded(options)) return [];
    return this.store.findDue(tenantId, this.options.now(), options, limit);
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Outcomes
  // ───────────────────────────────────────────────────────────────────────────

  async markDone(jobId: number): Promise<boolean> {
    return this.store.transition(jobId, OPEN_STATUSES, {
      status: 'done',
      processedAt: this.options.now(),
      claimedAt: null,
      lastError: '',
      lastErrorKind: null,
    });
  }

  /**
   * Record a failed attempt. Permanent errors and exhausted attempts go to
   * `dead`; anything else returns to `pending` after a backoff delay.
   *
   * @param createdEntityId — Id the handler created on the target side
   *                          before failing, kept so the retry updates it
   * @returns — Resulting status (the job's current one when another writer
   *            moved it first), or null when the job no longer exists
   */
  async markRetry(
    jobId: number,
    error: string,
    kind: ErrorKind,
    createdEntityId?: number,
  ): Promise<JobStatus | null> {
    const job = await this.store.findById(jobId);
    if (!job) {
      logger.warn('markRetry on missing job', { jobId });
      return null;
    }
    if (!OPEN_STATUSES.includes(job.status)) return job.status;

    const now = this.options.now();
    const attempts = job.attempts + 1;
    const patch: JobPatch = {
      attempts,
      lastError: toStoredError(error),
      lastErrorKind: kind,
      claimedAt: null,
    };

    if (createdEntityId !== undefined && createdEntityId > 0) {
      if (job.direction === 'local_to_remote' && job.remoteId === 0) {
        patch.remoteId = createdEntityId;
      } else if (job.direction === 'remote_to_local' && job.localId === 0) {
        patch.localId = createdEntityId;
      }
    }

    if (kind === 'permanent' || attempts >= job.maxAttempts) {
      patch.status = 'dead';
      patch.processedAt = now;
    } else {
      patch.status = 'pending';
      patch.scheduledAt = new Date(now.getTime() + this.computeRetryDelay(attempts));
    }

    const applied = await this.store.transition(jobId, OPEN_STATUSES, patch);
    if (!applied) {
      // Lost the race to a concurrent release/cancel/retry
      const current = await this.store.findById(jobId);
      return current ? current.status : null;
    }

    if (patch.status === 'dead') {
      logger.warn('Job moved to dead letter', {
        tenantId: job.tenantId,
        module: job.module,
        jobId,
        attempts,
        kind,
      });
      return 'dead';
    }
    return 'pending';
  }

  async markDead(jobId: number, error: string, kind: ErrorKind = 'permanent'): Promise<boolean> {
    return this.store.transition(jobId, OPEN_STATUSES, {
      status: 'dead',
      processedAt: this.options.now(),
      claimedAt: null,
      lastError: toStoredError(error),
      lastErrorKind: kind,
    });
  }

  /** Terminal routing failure (no handler for the job's module). */
  async markFailed(jobId: number, error: string): Promise<boolean> {
    return this.store.transition(jobId, OPEN_STATUSES, {
      status: 'failed',
      processedAt: this.options.now(),
      claimedAt: null,
      lastError: toStoredError(error),
      lastErrorKind: 'permanent',
    });
  }

  /** Return a claimed job to `pending` without consuming an attempt. */
  async release(jobId: number): Promise<boolean> {
    return this.store.transition(jobId, ['processing'], {
      status: 'pending',
      claimedAt: null,
    });
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Operator actions & maintenance
  // ───────────────────────────────────────────────────────────────────────────

  /** failed + dead → pending with a fresh attempt budget. */
  async retryFailed(tenantId: string): Promise<number> {
    const reset = await this.store.resetTerminal(tenantId, this.options.now());
    if (reset > 0) logger.info('Failed jobs requeued', { tenantId, reset });
    return reset;
  }

  /** Delete a pending job. Returns false if it is not pending. */
  async cancel(tenantId: string, jobId: number): Promise<boolean> {
    return this.store.deletePending(tenantId, jobId);
  }

  async getStats(tenantId: string): Promise<QueueStats> {
    const counts = await this.store.countByStatus(tenantId);
    const stats: QueueStats = {
      pending: 0,
      processing: 0,
      done: 0,
      failed: 0,
      dead: 0,
      total: 0,
    };
    for (const status of JOB_STATUSES) {
      stats[status] = counts[status] ?? 0;
      stats.total += stats[status];
    }
    return stats;
  }

  /** Delete done / dead / failed jobs finished more than `olderThanDays` ago. */
  async cleanup(tenantId: string, olderThanDays: number): Promise<number> {
    const before = new Date(this.options.now().getTime() - Math.max(1, olderThanDays) * DAY_MS);
    const deleted = await this.store.deleteFinishedBefore(tenantId, before);
    if (deleted > 0) logger.info('Queue cleanup completed', { tenantId, deleted });
    return deleted;
  }

  /** Requeue jobs left `processing` for longer than `timeoutMs`. */
  async recoverStale(tenantId: string, timeoutMs: number): Promise<number> {
    const before = new Date(this.options.now().getTime() - timeoutMs);
    const recovered = await this.store.requeueStale(tenantId, before);
    if (recovered > 0) logger.warn('Stale jobs recovered', { tenantId, recovered });
    return recovered;
  }

  /**
   * Delay before retry number `attempts`.
   * exponential: 2^attempts × base + jitter(0..base); fixed: base.
   */
  computeRetryDelay(attempts: number): number {
    const base = this.options.retryBaseDelayMs;
    if (this.options.retryBackoff === 'fixed') return base;
    return 2 ** attempts * base + Math.floor(this.options.random() * base);
  }
}

function clampPriority(priority: number | undefined): number {
  if (priority === undefined || Number.isNaN(priority)) return DEFAULT_PRIORITY;
  return Math.min(10, Math.max(1, Math.round(priority)));
}

function isExcluded(options: ClaimOptions): boolean {
  return options.module !== undefined && (options.excludeModules ?? []).includes(options.module);
}
