// =============================================================================
// Express Application — Routes and middleware, no I/O at import time
// =============================================================================
import express, { NextFunction, Request, Response } from 'express';
import cors from 'cors';

import logger from './utils/logger';
import { ServiceResolver } from './services/syncContainer';
import { createWebhookRouter } from './routes/webhooks';
import { createQueueRouter } from './routes/queue';
import { createCircuitRouter } from './routes/circuits';
import { ContactStoreResolver, createContactRouter } from './routes/contacts';

export interface AppDeps {
  resolve: ServiceResolver;
  resolveContacts: ContactStoreResolver;
  webhookToken: string;
  defaultTenantId: string;
}

export function createApp(deps: AppDeps): express.Express {
  const app = express();

  /* ── Global middleware ── */
  app.use(cors({ origin: true, credentials: true }));
  app.use(express.json({ limit: '1mb' }));

  // Request logging (non-PII)
  app.use((req, _res, next) => {
    logger.debug(`${req.method} ${req.path}`, {
      ip: req.ip,
      userAgent: req.get('user-agent')?.substring(0, 60),
    });
    next();
  });

  /* ── Health check ── */
  app.get('/api/health', (_req, res) => {
    res.json({
      status: 'ok',
      uptime: process.uptime(),
      timestamp: new Date().toISOString(),
    });
  });

  /* ── API routes ── */
  app.use(
    '/api/webhooks',
    createWebhookRouter({
      resolve: deps.resolve,
      webhookToken: deps.webhookToken,
      defaultTenantId: deps.defaultTenantId,
    }),
  );
  app.use('/api/queue', createQueueRouter(deps.resolve));
  app.use('/api/circuits', createCircuitRouter(deps.resolve));
  app.use('/api/contacts', createContactRouter(deps.resolve, deps.resolveContacts));

  /* ── 404 ── */
  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  /* ── Last-resort error handler (malformed JSON bodies land here) ── */
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status =
      typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number'
        ? err.status
        : 500;
    if (status >= 500) {
      logger.error('Unhandled request error', { error: err instanceof Error ? err.message : String(err) });
    }
    res.status(status).json({ error: status >= 500 ? 'Internal server error' : 'Bad request' });
  });

  return app;
}
