// =============================================================================
// SyncSetting Model — Small keyed JSON blobs
// =============================================================================
// Collection name: sync_settings. Holds per-tenant runtime state such as
// module circuit states and failure-notifier counters.
// =============================================================================
import mongoose, { Document, Schema, Model } from 'mongoose';

export interface ISyncSetting extends Document {
  key: string;
  /** Serialized JSON */
  value: string;
  updatedAt: Date;
}

const syncSettingSchema = new Schema<ISyncSetting>(
  {
    key: { type: String, required: true, unique: true },
    value: { type: String, default: '' },
  },
  { timestamps: true, collection: 'sync_settings' },
);

const SyncSetting: Model<ISyncSetting> = mongoose.model<ISyncSetting>(
  'SyncSetting',
  syncSettingSchema,
);

export default SyncSetting;
