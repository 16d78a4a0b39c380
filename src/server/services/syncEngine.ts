// =============================================================================
// Sync Engine — Drains a tenant's queue
// =============================================================================
// One invocation:
//
//   1. Take the in-process lock for the tenant (or tenant + module); a run
//      already holding it makes this call return 0.
//   2. Claim a page of due jobs, skipping modules whose circuit is open.
//   3. Jobs with no registered handler → failed. Jobs whose module turned
//      unavailable → released back to pending (no attempt consumed).
//   4. Batchable creates → BatchCreateProcessor; everything else one at a
//      time in queue order through push() / pull().
//   5. Repeat until the queue is drained, the page cap or the time budget
//      is hit.
//   6. Per-module totals → circuit breaker; run totals → failure notifier.
//
// Dry run: peek instead of claim, log the dispatch plan, change nothing.
// No job failure aborts a run.
// =============================================================================
import { ModuleHandler, ModuleOutcome, QueueJob, SyncOutcome } from '../types';
import { BatchCreateProcessor } from './batchCreateProcessor';
import { EntityMapRepository } from './entityMap';
import { JobQueue } from './jobQueue';
import { ModuleCircuitBreaker } from './moduleCircuitBreaker';
import { ModuleRegistry } from './moduleRegistry';
import { decodePayload } from '../utils/payload';
import { outcomeFromError } from '../utils/syncOutcome';
import logger from '../utils/logger';

export interface SyncEngineOptions {
  /** Jobs claimed per page */
  batchSize: number;
  maxPagesPerRun: number;
  /** Wall-clock budget for one run */
  timeBudgetMs: number;
  dryRun: boolean;
  /** Epoch ms */
  now: () => number;
}

/** Receives the aggregate of each completed run */
export interface RunListener {
  recordRun(tenantId: string, successes: number, failures: number): Promise<void>;
}

export interface SyncEngineDeps {
  tenantId: string;
  queue: JobQueue;
  registry: ModuleRegistry;
  breaker: ModuleCircuitBreaker;
  entityMap: EntityMapRepository;
  runListener?: RunListener;
}

/** What a run would do with the current first page */
export interface DispatchPlan {
  batches: Array<{ module: string; entityType: string; jobIds: number[]; supersededJobIds: number[] }>;
  singles: number[];
  /** Module circuit open */
  deferred: number[];
  /** No handler registered */
  unroutable: number[];
}

const DEFAULT_OPTIONS: SyncEngineOptions = {
  batchSize: 50,
  maxPagesPerRun: 20,
  timeBudgetMs: 55_000,
  dryRun: false,
  now: () => Date.now(),
};

/** Lock keys held by running engines in this process: "<tenant>" or "<tenant>:<module>" */
const runningLocks = new Set<string>();

function tryLock(tenantId: string, module?: string): string | null {
  const key = module ? `${tenantId}:${module}` : tenantId;
  for (const held of runningLocks) {
    if (held === tenantId || held === key) return null;
    if (!module && held.startsWith(`${tenantId}:`)) return null;
  }
  runningLocks.add(key);
  return key;
}

export class SyncEngine {
  private readonly options: SyncEngineOptions;
  private readonly batchProcessor: BatchCreateProcessor;

  constructor(
    private readonly deps: SyncEngineDeps,
    options: Partial<SyncEngineOptions> = {},
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
    this.batchProcessor = new BatchCreateProcessor(deps.queue, deps.entityMap, (module) =>
      deps.registry.get(module),
    );
  }

  get tenantId(): string {
    return this.deps.tenantId;
  }

  /**
   * Process due jobs for every module.
   *
   * @returns — Number of jobs completed successfully
   */
  async processQueue(): Promise<number> {
    return this.run();
  }

  /** Process due jobs for one module only. */
  async processModuleQueue(module: string): Promise<number> {
    return this.run(module);
  }

  isRunning(module?: string): boolean {
    return runningLocks.has(module ? `${this.tenantId}:${module}` : this.tenantId);
  }

  /**
   * Build the dispatch plan for the first page of due jobs. Read-only.
   */
  async planQueue(module?: string): Promise<DispatchPlan> {
    const unavailable = new Set(await this.deps.breaker.getUnavailableModules());
    const jobs = await this.deps.queue.peekDue(this.tenantId, this.options.batchSize, { module });

    const plan: DispatchPlan = { batches: [], singles: [], deferred: [], unroutable: [] };
    const routable: QueueJob[] = [];
    for (const job of jobs) {
      if (!this.deps.registry.has(job.module)) plan.unroutable.push(job.id);
      else if (unavailable.has(job.module)) plan.deferred.push(job.id);
      else routable.push(job);
    }

    const batched = new Set<number>();
    for (const group of this.batchProcessor.planGroups(routable)) {
      plan.batches.push({
        module: group.module,
        entityType: group.entityType,
        jobIds: group.jobs.map((job) => job.id),
        supersededJobIds: group.superseded.map((job) => job.id),
      });
      for (const job of [...group.jobs, ...group.superseded]) batched.add(job.id);
    }
    plan.singles = routable.filter((job) => !batched.has(job.id)).map((job) => job.id);
    return plan;
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Run loop
  // ───────────────────────────────────────────────────────────────────────────

  private async run(module?: string): Promise<number> {
    if (this.options.dryRun) {
      const plan = await this.planQueue(module);
      logger.info('Dry run: dispatch plan', {
        tenantId: this.tenantId,
        module,
        batches: plan.batches.map((b) => `${b.module}:${b.entityType}×${b.jobIds.length}`),
        singles: plan.singles.length,
        deferred: plan.deferred.length,
        unroutable: plan.unroutable.length,
      });
      return 0;
    }

    const lock = tryLock(this.tenantId, module);
    if (!lock) {
      logger.info('Sync run already in progress; skipping', { tenantId: this.tenantId, module });
      return 0;
    }

    const startedAt = this.options.now();
    const outcomes = new Map<string, ModuleOutcome>();
    let completed = 0;
    let pages = 0;

    try {
      while (pages < this.options.maxPagesPerRun && !this.budgetSpent(startedAt)) {
        const excludeModules = await this.deps.breaker.getUnavailableModules();
        const page = await this.deps.queue.claimDue(this.tenantId, this.options.batchSize, {
          module,
          excludeModules,
        });
        if (page.length === 0) break;

        pages++;
        completed += await this.processPage(page, outcomes, startedAt);
        if (page.length < this.options.batchSize) break;
      }

      await this.report(outcomes);
    } finally {
      runningLocks.delete(lock);
    }

    logger.info('Sync run finished', {
      tenantId: this.tenantId,
      module,
      pages,
      completed,
      durationMs: this.options.now() - startedAt,
    });
    return completed;
  }

  private async processPage(
    page: QueueJob[],
    outcomes: Map<string, ModuleOutcome>,
    startedAt: number,
  ): Promise<number> {
    const availability = new Map<string, boolean>();
    const routable: QueueJob[] = [];

    for (const job of page) {
      if (!this.deps.registry.has(job.module)) {
        logger.warn('No handler registered for job module', { jobId: job.id, module: job.module });
        await this.deps.queue.markFailed(job.id, `No handler registered for module "${job.module}"`);
        continue;
      }

      let available = availability.get(job.module);
      if (available === undefined) {
        available = await this.deps.breaker.isModuleAvailable(job.module);
        availability.set(job.module, available);
      }
      if (!available) {
        await this.deps.queue.release(job.id);
        continue;
      }
      routable.push(job);
    }

    const batch = await this.batchProcessor.process(routable);
    for (const [module, outcome] of batch.moduleOutcomes) {
      addOutcome(outcomes, module, outcome.successes, outcome.failures);
    }
    let completed = batch.successes;

    for (const job of routable) {
      if (batch.handledJobIds.has(job.id)) continue;

      // Out of time: hand the rest back untouched
      if (this.budgetSpent(startedAt)) {
        await this.deps.queue.release(job.id);
        continue;
      }

      const handler = this.deps.registry.get(job.module);
      if (!handler) continue;

      const ok = await this.dispatch(job, handler);
      addOutcome(outcomes, job.module, ok ? 1 : 0, ok ? 0 : 1);
      if (ok) completed++;
    }

    return completed;
  }

  /** Run one job through push()/pull() and write its outcome back. */
  private async dispatch(job: QueueJob, handler: ModuleHandler): Promise<boolean> {
    let outcome: SyncOutcome;
    try {
      const payload = decodePayload(job.payload);
      outcome =
        job.direction === 'local_to_remote'
          ? await handler.push(job.entityType, job.action, job.localId, job.remoteId, payload)
          : await handler.pull(job.entityType, job.action, job.remoteId, job.localId, payload);
    } catch (err) {
      outcome = outcomeFromError(err);
    }

    try {
      if (outcome.ok) {
        await this.deps.queue.markDone(job.id);
      } else {
        await this.deps.queue.markRetry(job.id, outcome.message, outcome.kind, outcome.entityId);
      }
    } catch (err) {
      logger.error('Failed to record job outcome', {
        tenantId: this.tenantId,
        jobId: job.id,
        module: job.module,
        error: err instanceof Error ? err.message : String(err),
      });
    }

    if (!outcome.ok) {
      logger.debug('Job attempt failed', {
        jobId: job.id,
        module: job.module,
        kind: outcome.kind,
      });
    }
    return outcome.ok;
  }

  private async report(outcomes: Map<string, ModuleOutcome>): Promise<void> {
    let successes = 0;
    let failures = 0;

    for (const [module, outcome] of outcomes) {
      successes += outcome.successes;
      failures += outcome.failures;
      try {
        await this.deps.breaker.recordBatch(module, outcome.successes, outcome.failures);
      } catch (err) {
        logger.error('Failed to record module batch', {
          tenantId: this.tenantId,
          module,
          error: err instanceof Error ? err.message : String(err),
        });
      }
    }

    if (!this.deps.runListener || successes + failures === 0) return;
    try {
      await this.deps.runListener.recordRun(this.tenantId, successes, failures);
    } catch (err) {
      logger.error('Failed to record run outcome', {
        tenantId: this.tenantId,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }

  private budgetSpent(startedAt: number): boolean {
    return this.options.now() - startedAt >= this.options.timeBudgetMs;
  }
}

function addOutcome(
  outcomes: Map<string, ModuleOutcome>,
  module: string,
  successes: number,
  failures: number,
): void {
  const current = outcomes.get(module) ?? { successes: 0, failures: 0 };
  current.successes += successes;
  current.failures += failures;
  outcomes.set(module, current);
}
