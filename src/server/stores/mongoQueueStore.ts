// =============================================================================
// MongoQueueStore — QueueStore backed by the sync_queue collection
// =============================================================================
// Every claim is one `findOneAndUpdate` filtered on `status: 'pending'`, so
// two workers racing for the same row can never both win it.
// =============================================================================
import { FilterQuery, SortOrder } from 'mongoose';
import SyncQueueJob, { ISyncQueueJob } from '../models/SyncQueueJob';
import SyncCounter from '../models/SyncCounter';
import { JobStatus, QueueJob } from '../types';
import { safeDbCall } from '../utils/DatabaseError';
import { DedupKey, DueFilter, JobPatch, QueueStore } from './types';

const QUEUE_SEQUENCE = 'sync_queue';

const DUE_SORT: Record<string, SortOrder> = { priority: 1, createdAt: 1, jobId: 1 };

const FINISHED: JobStatus[] = ['done', 'dead', 'failed'];

function toQueueJob(doc: ISyncQueueJob): QueueJob {
  return {
    id: doc.jobId,
    tenantId: doc.tenantId,
    module: doc.module,
    entityType: doc.entityType,
    direction: doc.direction,
    action: doc.action,
    localId: doc.localId,
    remoteId: doc.remoteId,
    payload: doc.payload,
    priority: doc.priority,
    status: doc.status,
    attempts: doc.attempts,
    maxAttempts: doc.maxAttempts,
    createdAt: doc.createdAt,
    scheduledAt: doc.scheduledAt,
    claimedAt: doc.claimedAt,
    processedAt: doc.processedAt,
    lastError: doc.lastError,
    lastErrorKind: doc.lastErrorKind,
  };
}

function dueQuery(tenantId: string, now: Date, filter: DueFilter): FilterQuery<ISyncQueueJob> {
  const query: FilterQuery<ISyncQueueJob> = {
    tenantId,
    status: 'pending',
    scheduledAt: { $lte: now },
  };
  if (filter.module) {
    query.module = filter.module;
  } else if (filter.excludeModules && filter.excludeModules.length > 0) {
    query.module = { $nin: filter.excludeModules };
  }
  return query;
}

export class MongoQueueStore implements QueueStore {
  async nextJobId(): Promise<number> {
    const counter = await safeDbCall('nextId', () =>
      SyncCounter.findOneAndUpdate(
        { _id: QUEUE_SEQUENCE },
        { $inc: { seq: 1 } },
        { upsert: true, new: true },
      ).exec(),
    );
    if (!counter) {
      throw new Error('Job id sequence unavailable');
    }
    return counter.seq;
  }

  async insert(job: QueueJob): Promise<void> {
    const { id, ...fields } = job;
    await safeDbCall('insert', () => SyncQueueJob.create({ jobId: id, ...fields }));
  }

  async findPendingDuplicate(key: DedupKey): Promise<QueueJob | null> {
    const query: FilterQuery<ISyncQueueJob> = {
      tenantId: key.tenantId,
      module: key.module,
      entityType: key.entityType,
      action: key.action,
      direction: key.direction,
      status: 'pending',
    };
    if (key.localId > 0) {
      query.localId = key.localId;
    } else {
      query.localId = 0;
      query.remoteId = key.remoteId;
    }

    const doc = await safeDbCall('findDuplicate', () =>
      SyncQueueJob.findOne(query).sort({ jobId: 1 }).exec(),
    );
    return doc ? toQueueJob(doc) : null;
  }

  async findById(jobId: number): Promise<QueueJob | null> {
    const doc = await safeDbCall('findById', () => SyncQueueJob.findOne({ jobId }).exec());
    return doc ? toQueueJob(doc) : null;
  }

  async claimNext(tenantId: string, now: Date, filter: DueFilter): Promise<QueueJob | null> {
    const doc = await safeDbCall('claim', () =>
      SyncQueueJob.findOneAndUpdate(
        dueQuery(tenantId, now, filter),
        { $set: { status: 'processing', claimedAt: now } },
        { sort: DUE_SORT, new: true },
      ).exec(),
    );
    return doc ? toQueueJob(doc) : null;
  }

  async findDue(
    tenantId: string,
    now: Date,
    filter: DueFilter,
    limit: number,
  ): Promise<QueueJob[]> {
    const docs = await safeDbCall('findDue', () =>
      SyncQueueJob.find(dueQuery(tenantId, now, filter)).sort(DUE_SORT).limit(limit).exec(),
    );
    return docs.map(toQueueJob);
  }

  async transition(jobId: number, from: JobStatus[], patch: JobPatch): Promise<boolean> {
    const result = await safeDbCall('update', () =>
      SyncQueueJob.updateOne({ jobId, status: { $in: from } }, { $set: patch }).exec(),
    );
    return result.matchedCount > 0;
  }

  async countByStatus(tenantId: string): Promise<Partial<Record<JobStatus, number>>> {
    const rows = await safeDbCall('count', () =>
      SyncQueueJob.aggregate<{ _id: JobStatus; count: number }>([
        { $match: { tenantId } },
        { $group: { _id: '$status', count: { $sum: 1 } } },
      ]).exec(),
    );
    const counts: Partial<Record<JobStatus, number>> = {};
    for (const row of rows) {
      counts[row._id] = row.count;
    }
    return counts;
  }

  async resetTerminal(tenantId: string, now: Date): Promise<number> {
    const result = await safeDbCall('reset', () =>
      SyncQueueJob.updateMany(
        { tenantId, status: { $in: ['failed', 'dead'] } },
        {
          $set: {
            status: 'pending',
            attempts: 0,
            scheduledAt: now,
            claimedAt: null,
            processedAt: null,
            lastError: '',
            lastErrorKind: null,
          },
        },
      ).exec(),
    );
    return result.modifiedCount;
  }

  async deletePending(tenantId: string, jobId: number): Promise<boolean> {
    const result = await safeDbCall('delete', () =>
      SyncQueueJob.deleteOne({ tenantId, jobId, status: 'pending' }).exec(),
    );
    return result.deletedCount > 0;
  }

  async deleteFinishedBefore(tenantId: string, before: Date): Promise<number> {
    const result = await safeDbCall('cleanup', () =>
      SyncQueueJob.deleteMany({
        tenantId,
        status: { $in: FINISHED },
        processedAt: { $lt: before },
      }).exec(),
    );
    return result.deletedCount;
  }

  async requeueStale(tenantId: string, claimedBefore: Date): Promise<number> {
    const result = await safeDbCall('recoverStale', () =>
      SyncQueueJob.updateMany(
        { tenantId, status: 'processing', claimedAt: { $lt: claimedBefore } },
        { $set: { status: 'pending', claimedAt: null } },
      ).exec(),
    );
    return result.modifiedCount;
  }
}
