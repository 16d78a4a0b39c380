// =============================================================================
// Circuit Routes — Inspect and reset per-module circuit breakers
// =============================================================================
//   GET  /api/circuits                  → every module with breaker state
//   POST /api/circuits/:module/reset    → close the module's circuit now
// =============================================================================
import { Router, Request, Response } from 'express';
import authMiddleware from '../utils/authMiddleware';
import { ServiceResolver } from '../services/syncContainer';
import logger from '../utils/logger';

export function createCircuitRouter(resolve: ServiceResolver): Router {
  const router = Router();
  router.use(authMiddleware);

  router.get('/', async (req: Request, res: Response): Promise<void> => {
    if (!req.tenantId) {
      res.status(401).json({ error: 'Could not resolve tenantId' });
      return;
    }
    try {
      const circuits = await resolve(req.tenantId).breaker.snapshot();
      res.json({ circuits });
    } catch (err) {
      logger.error('Circuit listing error', { error: err instanceof Error ? err.message : String(err) });
      res.status(500).json({ error: 'Failed to fetch circuit states' });
    }
  });

  router.post('/:module/reset', async (req: Request, res: Response): Promise<void> => {
    if (!req.tenantId) {
      res.status(401).json({ error: 'Could not resolve tenantId' });
      return;
    }
    const module = req.params.module;
    try {
      const reset = await resolve(req.tenantId).breaker.resetModule(module);
      if (!reset) {
        res.status(404).json({ error: `No circuit state for module "${module}"` });
        return;
      }
      res.json({ module, reset });
    } catch (err) {
      logger.error('Circuit reset error', { module, error: err instanceof Error ? err.message : String(err) });
      res.status(500).json({ error: 'Failed to reset circuit' });
    }
  });

  return router;
}
