// =============================================================================
// MongoContactStore — ContactStore backed by the local_contacts collection
// =============================================================================
import { JsonPayload } from '../types';
import LocalContact from '../models/LocalContact';
import SyncCounter from '../models/SyncCounter';
import { ContactStore } from '../services/contactsModule';
import { safeDbCall } from '../utils/DatabaseError';

const CONTACT_FIELDS = ['firstName', 'lastName', 'email', 'phone', 'company'] as const;

type ContactFields = Record<(typeof CONTACT_FIELDS)[number], string>;

function pickFields(data: JsonPayload): Partial<ContactFields> {
  const fields: Partial<ContactFields> = {};
  for (const key of CONTACT_FIELDS) {
    const value = data[key];
    if (typeof value === 'string') fields[key] = value;
  }
  return fields;
}

export class MongoContactStore implements ContactStore {
  constructor(private readonly tenantId: string) {}

  async load(contactId: number): Promise<JsonPayload | null> {
    const doc = await safeDbCall('findById', () =>
      LocalContact.findOne({ tenantId: this.tenantId, contactId }).exec(),
    );
    if (!doc) return null;
    return {
      firstName: doc.firstName,
      lastName: doc.lastName,
      email: doc.email,
      phone: doc.phone,
      company: doc.company,
    };
  }

  async save(data: JsonPayload, contactId: number): Promise<number> {
    const fields = pickFields(data);

    if (contactId > 0) {
      const result = await safeDbCall('update', () =>
        LocalContact.updateOne({ tenantId: this.tenantId, contactId }, { $set: fields }).exec(),
      );
      return result.matchedCount > 0 ? contactId : 0;
    }

    const counter = await safeDbCall('nextId', () =>
      SyncCounter.findOneAndUpdate(
        { _id: `local_contacts:${this.tenantId}` },
        { $inc: { seq: 1 } },
        { upsert: true, new: true },
      ).exec(),
    );
    if (!counter) return 0;

    await safeDbCall('insert', () =>
      LocalContact.create({ tenantId: this.tenantId, contactId: counter.seq, ...fields }),
    );
    return counter.seq;
  }

  async delete(contactId: number): Promise<void> {
    await safeDbCall('delete', () =>
      LocalContact.deleteOne({ tenantId: this.tenantId, contactId }).exec(),
    );
  }
}
