// =============================================================================
// Contacts Module — Local contacts ⇄ ERP partners
// =============================================================================
// Entity type `contact` maps to the ERP model `res.partner`.
//
//   firstName + lastName  ⇄  name  (split on the first space when pulling)
//   email                 ⇄  email         (lowercased on push)
//   phone                 ⇄  phone         (trimmed on push)
//   company               ⇄  company_name  (trimmed on push)
//
// Empty local values are not pushed, so they never blank a remote field.
// =============================================================================
import { JsonPayload } from '../types';
import { SyncModule, SyncModuleContext } from './syncModule';

export type FieldTransform = 'none' | 'trim' | 'lowercase' | 'uppercase' | 'phone_e164';

export interface FieldRule {
  local: string;
  remote: string;
  /** Applied on push only */
  transform: FieldTransform;
}

/** Local-side persistence the module reads and writes */
export interface ContactStore {
  load(contactId: number): Promise<JsonPayload | null>;
  /** Create when `contactId` is 0; returns the id, or 0 when nothing was saved */
  save(data: JsonPayload, contactId: number): Promise<number>;
  delete(contactId: number): Promise<void>;
}

export const CONTACTS_MODULE_ID = 'contacts';

const REMOTE_MODELS: Record<string, string> = {
  contact: 'res.partner',
};

export const CONTACT_FIELD_RULES: FieldRule[] = [
  { local: 'email', remote: 'email', transform: 'lowercase' },
  { local: 'phone', remote: 'phone', transform: 'trim' },
  { local: 'company', remote: 'company_name', transform: 'trim' },
];

export function applyTransform(value: string, transform: FieldTransform): string {
  if (value === '') return '';
  switch (transform) {
    case 'lowercase':
      return value.trim().toLowerCase();
    case 'uppercase':
      return value.trim().toUpperCase();
    case 'trim':
      return value.trim();
    case 'phone_e164': {
      const digits = value.replace(/\D/g, '');
      return digits.startsWith('1') ? `+${digits}` : `+1${digits}`;
    }
    case 'none':
    default:
      return value;
  }
}

function stringField(record: JsonPayload, key: string): string {
  const value = record[key];
  return typeof value === 'string' ? value : '';
}

export class ContactsModule extends SyncModule {
  constructor(
    ctx: SyncModuleContext,
    private readonly contacts: ContactStore,
    private readonly rules: FieldRule[] = CONTACT_FIELD_RULES,
  ) {
    super(CONTACTS_MODULE_ID, ctx);
  }

  remoteModelFor(entityType: string): string {
    return REMOTE_MODELS[entityType] ?? '';
  }

  protected loadLocal(_entityType: string, localId: number): Promise<JsonPayload | null> {
    return this.contacts.load(localId);
  }

  protected saveLocal(_entityType: string, data: JsonPayload, localId: number): Promise<number> {
    return this.contacts.save(data, localId);
  }

  protected deleteLocal(_entityType: string, localId: number): Promise<void> {
    return this.contacts.delete(localId);
  }

  protected toRemote(_entityType: string, local: JsonPayload): JsonPayload {
    const values: JsonPayload = {};

    const name = [stringField(local, 'firstName').trim(), stringField(local, 'lastName').trim()]
      .filter(Boolean)
      .join(' ');
    if (name) values.name = name;

    for (const rule of this.rules) {
      const value = applyTransform(stringField(local, rule.local), rule.transform);
      if (value) values[rule.remote] = value;
    }
    return values;
  }

  protected fromRemote(_entityType: string, remote: JsonPayload): JsonPayload {
    const name = stringField(remote, 'name').trim();
    const space = name.indexOf(' ');
    const data: JsonPayload = {
      firstName: space === -1 ? name : name.slice(0, space),
      lastName: space === -1 ? '' : name.slice(space + 1).trim(),
    };

    // The ERP reports unset char fields as `false`
    for (const rule of this.rules) {
      data[rule.local] = stringField(remote, rule.remote);
    }
    return data;
  }
}
