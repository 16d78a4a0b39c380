// =============================================================================
// LocalContact Model — Contacts owned by the local content system
// =============================================================================
// Collection name: local_contacts. `contactId` is the numeric local id the
// sync queue and entity map refer to; it is handed out per tenant from the
// sync_counters collection.
// =============================================================================
import mongoose, { Document, Schema, Model } from 'mongoose';

export interface ILocalContact extends Document {
  tenantId: string;
  contactId: number;
  firstName: string;
  lastName: string;
  email: string;
  phone: string;
  company: string;
  createdAt: Date;
  updatedAt: Date;
}

const localContactSchema = new Schema<ILocalContact>(
  {
    tenantId: { type: String, required: true },
    contactId: { type: Number, required: true },
    firstName: { type: String, default: '' },
    lastName: { type: String, default: '' },
    email: { type: String, default: '' },
    phone: { type: String, default: '' },
    company: { type: String, default: '' },
  },
  { timestamps: true, collection: 'local_contacts' },
);

localContactSchema.index({ tenantId: 1, contactId: 1 }, { unique: true });

const LocalContact: Model<ILocalContact> = mongoose.model<ILocalContact>(
  'LocalContact',
  localContactSchema,
);

export default LocalContact;
