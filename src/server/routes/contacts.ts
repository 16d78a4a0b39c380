// =============================================================================
// Contact Routes — Local contact CRUD with change hooks
// =============================================================================
// Every successful write is reported to the Change Triggers, which enqueue
// the matching `local_to_remote` job for the contacts module.
//
//   GET    /api/contacts/:id
//   POST   /api/contacts
//   PUT    /api/contacts/:id
//   DELETE /api/contacts/:id
// =============================================================================
import { Router, Request, Response } from 'express';
import { z } from 'zod';
import authMiddleware from '../utils/authMiddleware';
import { CONTACTS_MODULE_ID, ContactStore } from '../services/contactsModule';
import { ServiceResolver } from '../services/syncContainer';
import logger from '../utils/logger';

export type ContactStoreResolver = (tenantId: string) => ContactStore;

const ContactBodySchema = z
  .object({
    firstName: z.string().max(255),
    lastName: z.string().max(255),
    email: z.union([z.string().email().max(255), z.literal('')]),
    phone: z.string().max(64),
    company: z.string().max(255),
  })
  .partial()
  .strict();

const ENTITY_TYPE = 'contact';

function parseContactId(raw: string): number | null {
  const id = Number(raw);
  return Number.isInteger(id) && id > 0 ? id : null;
}

export function createContactRouter(resolve: ServiceResolver, resolveContacts: ContactStoreResolver): Router {
  const router = Router();
  router.use(authMiddleware);

  router.get('/:id', async (req: Request, res: Response): Promise<void> => {
    const contactId = parseContactId(req.params.id);
    if (!req.tenantId || contactId === null) {
      res.status(400).json({ error: 'Invalid contact id' });
      return;
    }
    try {
      const contact = await resolveContacts(req.tenantId).load(contactId);
      if (!contact) {
        res.status(404).json({ error: 'Contact not found' });
        return;
      }
      res.json({ id: contactId, ...contact });
    } catch (err) {
      logger.error('Contact read error', { error: err instanceof Error ? err.message : String(err) });
      res.status(500).json({ error: 'Failed to read contact' });
    }
  });

  /** Create (`contactId` 0) or update, then enqueue the push. */
  async function write(req: Request, res: Response, contactId: number): Promise<void> {
    if (!req.tenantId) {
      res.status(401).json({ error: 'Could not resolve tenantId' });
      return;
    }
    const parsed = ContactBodySchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({
        error: 'Invalid contact',
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
      return;
    }

    try {
      const contacts = resolveContacts(req.tenantId);
      const savedId = await contacts.save(parsed.data, contactId);
      if (savedId === 0) {
        res.status(404).json({ error: 'Contact not found' });
        return;
      }

      const snapshot = (await contacts.load(savedId)) ?? parsed.data;
      const jobId = await resolve(req.tenantId).triggers.onLocalChange(
        CONTACTS_MODULE_ID,
        ENTITY_TYPE,
        savedId,
        'save',
        snapshot,
      );
      res.status(contactId === 0 ? 201 : 200).json({ id: savedId, jobId });
    } catch (err) {
      logger.error('Contact write error', { contactId, error: err instanceof Error ? err.message : String(err) });
      res.status(500).json({ error: 'Failed to save contact' });
    }
  }

  router.post('/', (req: Request, res: Response) => write(req, res, 0));

  router.put('/:id', async (req: Request, res: Response): Promise<void> => {
    const contactId = parseContactId(req.params.id);
    if (contactId === null) {
      res.status(400).json({ error: 'Invalid contact id' });
      return;
    }
    await write(req, res, contactId);
  });

  router.delete('/:id', async (req: Request, res: Response): Promise<void> => {
    const contactId = parseContactId(req.params.id);
    if (!req.tenantId || contactId === null) {
      res.status(400).json({ error: 'Invalid contact id' });
      return;
    }
    try {
      const contacts = resolveContacts(req.tenantId);
      if (!(await contacts.load(contactId))) {
        res.status(404).json({ error: 'Contact not found' });
        return;
      }
      await contacts.delete(contactId);
      const jobId = await resolve(req.tenantId).triggers.onLocalChange(
        CONTACTS_MODULE_ID,
        ENTITY_TYPE,
        contactId,
        'delete',
      );
      res.json({ deleted: true, jobId });
    } catch (err) {
      logger.error('Contact delete error', { contactId, error: err instanceof Error ? err.message : String(err) });
      res.status(500).json({ error: 'Failed to delete contact' });
    }
  });

  return router;
}
