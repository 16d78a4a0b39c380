// =============================================================================
// Batch Create Processor — One bulk call per (module, entityType) of creates
// =============================================================================
// Takes the claimed page, picks out `local_to_remote` creates whose handler
// exposes pushBatchCreates(), and sends each group of two or more records in
// a single call.
//
//   1. Group by (module, entityType); dedup by localId (latest job wins, in
//      the slot of the first one). Groups under two records are left for
//      per-job dispatch.
//   2. Superseded duplicates are marked done.
//   3. Undecodable payloads are permanent failures and never sent.
//   4. Per job: success → entity map + done; failure → markRetry.
//      A missing result is a transient failure. The stored hash is left
//      empty for jobs without a payload snapshot.
//   5. If the bulk call throws, every job in the group is retried.
//
// A job that already carries a remoteId created an earlier record whose
// mapping could not be saved; it goes through per-job push() so the retry
// writes that record instead of creating another. A failed write-back of one
// job's outcome is logged and never stops the rest of the group.
// =============================================================================
import {
  BatchCreateItem,
  JsonPayload,
  ModuleHandler,
  ModuleOutcome,
  QueueJob,
  SyncOutcome,
} from '../types';
import { EntityMapRepository } from './entityMap';
import { JobQueue } from './jobQueue';
import { computeSyncHash } from './syncHash';
import { decodePayload } from '../utils/payload';
import { classifyError } from '../utils/syncErrors';
import logger from '../utils/logger';

export type HandlerResolver = (module: string) => ModuleHandler | undefined;

/** A group the processor will send as one bulk call */
export interface BatchGroup {
  module: string;
  entityType: string;
  /** Surviving jobs, one per localId, in queue order */
  jobs: QueueJob[];
  /** Earlier jobs for a localId that a later job replaced */
  superseded: QueueJob[];
}

export interface BatchResult {
  /** Jobs whose outcome was written back (superseded jobs excluded) */
  processed: number;
  successes: number;
  failures: number;
  /** Every job id this processor took responsibility for */
  handledJobIds: Set<number>;
  moduleOutcomes: Map<string, ModuleOutcome>;
}

interface PreparedJob {
  job: QueueJob;
  payload: JsonPayload;
}

/** Jobs that could ever be sent through a bulk create */
export function isBatchable(job: QueueJob): boolean {
  return (
    job.direction === 'local_to_remote' &&
    job.action === 'create' &&
    job.localId > 0 &&
    job.remoteId === 0
  );
}

export class BatchCreateProcessor {
  constructor(
    private readonly queue: JobQueue,
    private readonly entityMap: EntityMapRepository,
    private readonly resolveHandler: HandlerResolver,
  ) {}

  /**
   * Work out which jobs of a page would be batched, without side effects.
   * Used both by process() and by the engine's dry-run plan.
   */
  planGroups(jobs: QueueJob[]): BatchGroup[] {
    const groups = new Map<string, BatchGroup>();
    const slotByLocalId = new Map<string, Map<number, number>>();

    for (const job of jobs) {
      if (!isBatchable(job)) continue;
      if (!this.resolveHandler(job.module)?.pushBatchCreates) continue;

      const key = `${job.module}:${job.entityType}`;
      let group = groups.get(key);
      let slots = slotByLocalId.get(key);
      if (!group || !slots) {
        group = { module: job.module, entityType: job.entityType, jobs: [], superseded: [] };
        slots = new Map<number, number>();
        groups.set(key, group);
        slotByLocalId.set(key, slots);
      }

      const slot = slots.get(job.localId);
      if (slot !== undefined) {
        group.superseded.push(group.jobs[slot]);
        group.jobs[slot] = job;
      } else {
        slots.set(job.localId, group.jobs.length);
        group.jobs.push(job);
      }
    }

    return [...groups.values()].filter((group) => group.jobs.length > 1);
  }

  /**
   * Batch-create every eligible group in `jobs`. Jobs not in a returned
   * `handledJobIds` are left for the caller.
   */
  async process(jobs: QueueJob[]): Promise<BatchResult> {
    const result: BatchResult = {
      processed: 0,
      successes: 0,
      failures: 0,
      handledJobIds: new Set<number>(),
      moduleOutcomes: new Map<string, ModuleOutcome>(),
    };

    for (const group of this.planGroups(jobs)) {
      await this.processGroup(group, result);
    }

    if (result.processed > 0) {
      logger.info('Batch-created records', {
        processed: result.processed,
        successes: result.successes,
        failures: result.failures,
      });
    }
    return result;
  }

  private async processGroup(group: BatchGroup, result: BatchResult): Promise<void> {
    const handler = this.resolveHandler(group.module);
    const pushBatchCreates = handler?.pushBatchCreates;
    if (!handler || !pushBatchCreates) return;

    for (const job of group.superseded) {
      result.handledJobIds.add(job.id);
      await this.writeBack(job, () => this.queue.markDone(job.id));
    }

    // Decode; malformed payloads are dead on arrival
    const prepared: PreparedJob[] = [];
    for (const job of group.jobs) {
      result.handledJobIds.add(job.id);
      try {
        prepared.push({ job, payload: decodePayload(job.payload) });
      } catch (err) {
        const { message, kind } = classifyError(err);
        await this.writeBack(job, () => this.queue.markRetry(job.id, `Batch job #${job.id}: ${message}`, kind));
        this.tally(result, group.module, false);
      }
    }
    if (prepared.length === 0) return;

    const items: BatchCreateItem[] = prepared.map(({ job, payload }) => ({
      localId: job.localId,
      payload,
    }));

    let outcomes: Map<number, SyncOutcome>;
    try {
      outcomes = await pushBatchCreates.call(handler, group.entityType, items);
    } catch (err) {
      const { message } = classifyError(err);
      logger.warn('Bulk create call failed; retrying group', {
        module: group.module,
        entityType: group.entityType,
        jobs: prepared.length,
        error: message,
      });
      for (const { job } of prepared) {
        await this.writeBack(job, () => this.queue.markRetry(job.id, message, 'transient'));
        this.tally(result, group.module, false);
      }
      return;
    }

    const remoteModel = handler.remoteModelFor?.(group.entityType) ?? '';
    for (const { job, payload } of prepared) {
      const outcome: SyncOutcome = outcomes.get(job.localId) ?? {
        ok: false,
        message: 'No result from batch.',
        kind: 'transient',
      };
      const ok = await this.applyOutcome(job, payload, outcome, remoteModel);
      this.tally(result, group.module, ok);
    }
  }

  /** Write one job's outcome back. Returns true on success. */
  private async applyOutcome(
    job: QueueJob,
    payload: JsonPayload,
    outcome: SyncOutcome,
    remoteModel: string,
  ): Promise<boolean> {
    if (!outcome.ok) {
      await this.writeBack(job, () =>
        this.queue.markRetry(job.id, outcome.message, outcome.kind, outcome.entityId),
      );
      return false;
    }

    if (outcome.entityId !== undefined && outcome.entityId > 0) {
      try {
        await this.entityMap.save(
          job.module,
          job.entityType,
          job.localId,
          outcome.entityId,
          remoteModel,
          Object.keys(payload).length > 0 ? computeSyncHash(payload) : '',
        );
      } catch (err) {
        // Record exists remotely; keep its id on the job so the retry updates it
        const { message } = classifyError(err);
        await this.writeBack(job, () =>
          this.queue.markRetry(job.id, `Mapping save failed: ${message}`, 'transient', outcome.entityId),
        );
        return false;
      }
    } else {
      logger.warn('Bulk create reported success without a remote id', {
        module: job.module,
        jobId: job.id,
      });
    }

    await this.writeBack(job, () => this.queue.markDone(job.id));
    return true;
  }

  /** Record one job's outcome; a store failure leaves the job for stale recovery. */
  private async writeBack(job: QueueJob, write: () => Promise<unknown>): Promise<void> {
    try {
      await write();
    } catch (err) {
      logger.error('Failed to record job outcome', {
        tenantId: job.tenantId,
        jobId: job.id,
        module: job.module,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }

  private tally(result: BatchResult, module: string, ok: boolean): void {
    const outcome = result.moduleOutcomes.get(module) ?? { successes: 0, failures: 0 };
    if (ok) {
      outcome.successes += 1;
      result.successes += 1;
    } else {
      outcome.failures += 1;
      result.failures += 1;
    }
    result.processed += 1;
    result.moduleOutcomes.set(module, outcome);
  }
}
