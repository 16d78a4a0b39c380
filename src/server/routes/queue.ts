// =============================================================================
// Queue Routes — Operator view and control of the tenant's sync queue
// =============================================================================
// All routes require `Authorization: Bearer <JWT with tenantId>`.
//
//   GET    /api/queue/stats                 → counts by status
//   POST   /api/queue/process[?dryRun=1]    → run the engine (or plan only)
//   POST   /api/queue/retry-failed          → failed + dead → pending
//   DELETE /api/queue/jobs/:id              → cancel a pending job
// =============================================================================
import { Router, Request, Response } from 'express';
import authMiddleware from '../utils/authMiddleware';
import { ServiceResolver, SyncServices } from '../services/syncContainer';
import logger from '../utils/logger';

function isTruthyFlag(value: unknown): boolean {
  return value === '1' || value === 'true';
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value !== '' ? value : undefined;
}

export function createQueueRouter(resolve: ServiceResolver): Router {
  const router = Router();
  router.use(authMiddleware);

  /** Resolve the caller's services, or answer 401 and return null. */
  function servicesFor(req: Request, res: Response): SyncServices | null {
    if (!req.tenantId) {
      res.status(401).json({ error: 'Could not resolve tenantId' });
      return null;
    }
    return resolve(req.tenantId);
  }

  /* ── Queue stats ── */
  router.get('/stats', async (req: Request, res: Response): Promise<void> => {
    const services = servicesFor(req, res);
    if (!services) return;
    try {
      const stats = await services.queue.getStats(services.tenantId);
      res.json({ tenantId: services.tenantId, stats });
    } catch (err) {
      logger.error('Queue stats error', { error: err instanceof Error ? err.message : String(err) });
      res.status(500).json({ error: 'Failed to fetch queue stats' });
    }
  });

  /* ── Run the engine now ── */
  router.post('/process', async (req: Request, res: Response): Promise<void> => {
    const services = servicesFor(req, res);
    if (!services) return;
    const module = optionalString(req.query.module);
    try {
      if (isTruthyFlag(req.query.dryRun)) {
        const plan = await services.engine.planQueue(module);
        res.json({ dryRun: true, plan });
        return;
      }

      const processed = module
        ? await services.engine.processModuleQueue(module)
        : await services.engine.processQueue();
      res.json({ dryRun: false, processed });
    } catch (err) {
      logger.error('Manual queue run failed', {
        tenantId: services.tenantId,
        module,
        error: err instanceof Error ? err.message : String(err),
      });
      res.status(500).json({ error: 'Queue run failed' });
    }
  });

  /* ── Requeue failed / dead jobs ── */
  router.post('/retry-failed', async (req: Request, res: Response): Promise<void> => {
    const services = servicesFor(req, res);
    if (!services) return;
    try {
      const reset = await services.queue.retryFailed(services.tenantId);
      res.json({ reset });
    } catch (err) {
      logger.error('Retry failed jobs error', { error: err instanceof Error ? err.message : String(err) });
      res.status(500).json({ error: 'Failed to requeue jobs' });
    }
  });

  /* ── Cancel a pending job ── */
  router.delete('/jobs/:id', async (req: Request, res: Response): Promise<void> => {
    const services = servicesFor(req, res);
    if (!services) return;

    const jobId = Number(req.params.id);
    if (!Number.isInteger(jobId) || jobId <= 0) {
      res.status(400).json({ error: 'Invalid job id' });
      return;
    }

    try {
      if (!(await services.queue.cancel(services.tenantId, jobId))) {
        res.status(404).json({ error: 'Pending job not found' });
        return;
      }
      res.json({ deleted: true, jobId });
    } catch (err) {
      logger.error('Cancel job error', { jobId, error: err instanceof Error ? err.message : String(err) });
      res.status(500).json({ error: 'Failed to cancel job' });
    }
  });

  return router;
}
