// =============================================================================
// SyncCounter Model — Named monotonic sequences
// =============================================================================
// Collection name: sync_counters. `{ _id: 'sync_queue', seq }` hands out job
// ids through an atomic `$inc` upsert.
// =============================================================================
import mongoose, { Schema, Model } from 'mongoose';

export interface ISyncCounter {
  _id: string;
  seq: number;
}

const syncCounterSchema = new Schema<ISyncCounter>(
  {
    _id: { type: String, required: true },
    seq: { type: Number, default: 0 },
  },
  { collection: 'sync_counters', versionKey: false },
);

const SyncCounter: Model<ISyncCounter> = mongoose.model<ISyncCounter>(
  'SyncCounter',
  syncCounterSchema,
);

export default SyncCounter;
