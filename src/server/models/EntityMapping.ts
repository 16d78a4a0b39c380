// =============================================================================
// EntityMapping Model — Links a local record id ↔ remote ERP record id
// =============================================================================
// Collection name: entity_map
//
// One row per (tenantId, module, entityType, localId). The two unique
// indexes make the mapping a bijection inside each (tenant, module, type).
// =============================================================================
import mongoose, { Document, Schema, Model } from 'mongoose';

export interface IEntityMapping extends Document {
  tenantId: string;
  module: string;
  entityType: string;
  localId: number;
  remoteId: number;
  /** Remote schema name, e.g. "product.template" */
  remoteModel: string;
  /** SHA-256 of the last-synced content */
  syncHash: string;
  lastSyncedAt: Date;
  createdAt: Date;
  updatedAt: Date;
}

const entityMappingSchema = new Schema<IEntityMapping>(
  {
    tenantId: { type: String, required: true },
    module: { type: String, required: true },
    entityType: { type: String, required: true },
    localId: { type: Number, required: true },
    remoteId: { type: Number, required: true },
    remoteModel: { type: String, default: '' },
    syncHash: { type: String, default: '' },
    lastSyncedAt: { type: Date, default: Date.now },
  },
  { timestamps: true, collection: 'entity_map' },
);

entityMappingSchema.index(
  { tenantId: 1, module: 1, entityType: 1, localId: 1 },
  { unique: true },
);
entityMappingSchema.index(
  { tenantId: 1, module: 1, entityType: 1, remoteId: 1 },
  { unique: true },
);

const EntityMapping: Model<IEntityMapping> = mongoose.model<IEntityMapping>(
  'EntityMapping',
  entityMappingSchema,
);

export default EntityMapping;
