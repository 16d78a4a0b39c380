// =============================================================================
// SyncQueueJob Model — One unit of sync work
// =============================================================================
// Collection name: sync_queue
//
// `jobId` is the public, monotonic id (allocated from sync_counters). The
// engine claims jobs with a single findOneAndUpdate on `status: 'pending'`,
// so the (tenantId, status, scheduledAt, priority, createdAt) index is the
// hot path.
// =============================================================================
import mongoose, { Document, Schema, Model } from 'mongoose';
import { ErrorKind, JobStatus, SyncAction, SyncDirection } from '../types';

export interface ISyncQueueJob extends Document {
  jobId: number;
  tenantId: string;
  module: string;
  entityType: string;
  direction: SyncDirection;
  action: SyncAction;
  localId: number;
  remoteId: number;
  /** Serialized JSON snapshot, may be empty */
  payload: string;
  priority: number;
  status: JobStatus;
  attempts: number;
  maxAttempts: number;
  scheduledAt: Date;
  claimedAt: Date | null;
  processedAt: Date | null;
  lastError: string;
  lastErrorKind: ErrorKind | null;
  createdAt: Date;
  updatedAt: Date;
}

const syncQueueJobSchema = new Schema<ISyncQueueJob>(
  {
    jobId: { type: Number, required: true, unique: true },
    tenantId: { type: String, required: true },
    module: { type: String, required: true },
    entityType: { type: String, required: true },
    direction: {
      type: String,
      enum: ['local_to_remote', 'remote_to_local'],
      required: true,
    },
    action: { type: String, enum: ['create', 'update', 'delete'], required: true },
    localId: { type: Number, default: 0 },
    remoteId: { type: Number, default: 0 },
    payload: { type: String, default: '' },
    priority: { type: Number, default: 5, min: 1, max: 10 },
    status: {
      type: String,
      enum: ['pending', 'processing', 'done', 'failed', 'dead'],
      default: 'pending',
    },
    attempts: { type: Number, default: 0 },
    maxAttempts: { type: Number, default: 3 },
    scheduledAt: { type: Date, default: Date.now },
    claimedAt: { type: Date, default: null },
    processedAt: { type: Date, default: null },
    lastError: { type: String, default: '' },
    lastErrorKind: { type: String, default: null },
  },
  { timestamps: true, collection: 'sync_queue' },
);

// Claim / stats path
syncQueueJobSchema.index({ tenantId: 1, status: 1, scheduledAt: 1, priority: 1, createdAt: 1 });
// Dedup lookup on enqueue
syncQueueJobSchema.index({ tenantId: 1, module: 1, entityType: 1, action: 1, localId: 1, status: 1 });

const SyncQueueJob: Model<ISyncQueueJob> = mongoose.model<ISyncQueueJob>(
  'SyncQueueJob',
  syncQueueJobSchema,
);

export default SyncQueueJob;
