// =============================================================================
// Server Entry — Connects MongoDB, wires tenant services, starts HTTP + sync
// =============================================================================
import mongoose from 'mongoose';

import config from './config';
import logger from './utils/logger';
import { createApp } from './app';
import { ContactsModule } from './services/contactsModule';
import { ErpClient } from './services/erpClient';
import {
  createMongoStores,
  createServiceResolver,
  createSyncServices,
  SyncServices,
} from './services/syncContainer';
import { MongoContactStore } from './stores/mongoContactStore';

const erpClient = new ErpClient(config.erp);
const stores = createMongoStores();

const resolveContacts = (tenantId: string): MongoContactStore => new MongoContactStore(tenantId);

// Every tenant gets its own scheduler the first time anything resolves it
const tenants: SyncServices[] = [];

const resolve = createServiceResolver(
  (tenantId) => {
    const services = createSyncServices(tenantId, stores, config);
    services.registry.register(
      new ContactsModule(
        { client: erpClient, entityMap: services.entityMap, importGuard: services.importGuard },
        resolveContacts(tenantId),
      ),
    );
    return services;
  },
  (services) => {
    tenants.push(services);
    services.scheduler.start();
    logger.info('Sync scheduler started', { tenantId: services.tenantId });
  },
);

const app = createApp({
  resolve,
  resolveContacts,
  webhookToken: config.webhookToken,
  defaultTenantId: config.tenantId,
});

/* ── Start ── */
async function start(): Promise<void> {
  await mongoose.connect(config.mongodbUri);
  logger.info('Connected to MongoDB');

  const services = resolve(config.tenantId);

  const server = app.listen(config.port, () => {
    logger.info(`Server listening on port ${config.port}`, {
      tenantId: config.tenantId,
      modules: services.registry.ids(),
      dryRun: config.sync.dryRun,
    });
  });

  /* ── Graceful shutdown ── */
  const shutdown = (signal: string): void => {
    logger.info(`${signal} received — shutting down`);
    for (const tenant of tenants) tenant.scheduler.stop();
    server.close(() => {
      mongoose
        .disconnect()
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          logger.error('MongoDB disconnect failed', { error: err instanceof Error ? err.message : String(err) });
          process.exit(1);
        });
    });
  };
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

start().catch((err: unknown) => {
  logger.error('Failed to start server', { error: err instanceof Error ? err.message : String(err) });
  process.exit(1);
});

export default app;
