// =============================================================================
// Inbound Remote-Change Webhook
// =============================================================================
// POST /api/webhooks/:module
//
// The ERP (or a relay in front of it) reports that a record changed. The
// request carries the shared token in `x-sync-token`; the body names the
// record. A valid event becomes a `remote_to_local` job — the pull itself
// happens later in the engine, so the response is immediate.
//
//   { entityType, remoteId, event?: 'save' | 'delete', payload?, tenantId? }
//
// The token is compared with `crypto.timingSafeEqual` and never logged.
// =============================================================================
import { Router, Request, Response } from 'express';
import crypto from 'crypto';
import { z } from 'zod';
import { ServiceResolver } from '../services/syncContainer';
import logger from '../utils/logger';

export interface WebhookRouterOptions {
  resolve: ServiceResolver;
  /** Shared secret; empty disables the endpoint */
  webhookToken: string;
  /** Tenant used when the event does not name one */
  defaultTenantId: string;
}

const RemoteChangeSchema = z.object({
  entityType: z.string().min(1).max(64),
  remoteId: z.number({ coerce: true }).int().positive(),
  event: z.enum(['save', 'delete']).default('save'),
  payload: z.record(z.unknown()).optional(),
  tenantId: z.string().min(1).max(128).optional(),
});

function verifyToken(received: string | undefined, expected: string): boolean {
  if (!received || !expected) return false;

  // Both must be the same length for timingSafeEqual
  const receivedBuf = Buffer.from(received, 'utf8');
  const expectedBuf = Buffer.from(expected, 'utf8');
  if (receivedBuf.length !== expectedBuf.length) return false;

  return crypto.timingSafeEqual(receivedBuf, expectedBuf);
}

export function createWebhookRouter(options: WebhookRouterOptions): Router {
  const router = Router();

  router.post('/:module', async (req: Request, res: Response): Promise<void> => {
    if (!options.webhookToken) {
      res.status(503).json({ error: 'Webhooks are not configured' });
      return;
    }
    if (!verifyToken(req.get('x-sync-token'), options.webhookToken)) {
      logger.warn('Rejected webhook: bad sync token', { module: req.params.module });
      res.status(401).json({ error: 'Invalid sync token' });
      return;
    }

    const parsed = RemoteChangeSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({
        error: 'Invalid webhook body',
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
      return;
    }

    const { entityType, remoteId, event, payload } = parsed.data;
    const tenantId = parsed.data.tenantId ?? options.defaultTenantId;
    const module = req.params.module;

    try {
      const services = options.resolve(tenantId);
      if (!services.registry.has(module)) {
        res.status(404).json({ error: `Unknown module "${module}"` });
        return;
      }

      const jobId = await services.triggers.onRemoteChange(module, entityType, remoteId, event, payload);
      res.status(202).json({ queued: jobId !== null, jobId });
    } catch (err) {
      logger.error('Webhook enqueue failed', {
        tenantId,
        module,
        error: err instanceof Error ? err.message : String(err),
      });
      res.status(500).json({ error: 'Failed to queue change' });
    }
  });

  return router;
}
