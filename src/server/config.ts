// =============================================================================
// Application Configuration — Centralised + Validated
// =============================================================================
import dotenv from 'dotenv';
import { RetryBackoff } from './types';
dotenv.config();

export interface SyncSettings {
  /** Jobs claimed per page */
  batchSize: number;
  maxAttempts: number;
  retryBackoff: RetryBackoff;
  retryBaseDelayMs: number;
  /** A `processing` job older than this is considered abandoned */
  staleTimeoutMs: number;
  /** done/dead/failed jobs older than this are deleted by maintenance */
  retentionDays: number;
  /** Scheduler tick */
  intervalMs: number;
  maxPagesPerRun: number;
  timeBudgetMs: number;
  dryRun: boolean;
  enqueueDebounceMs: number;
}

export interface ErpSettings {
  /** Base URL of the ERP instance */
  url: string;
  database: string;
  login: string;
  apiKey: string;
  timeoutMs: number;
}

export interface AppConfig {
  port: number;
  nodeEnv: string;
  mongodbUri: string;
  jwtSecret: string;
  webhookToken: string;
  /** Tenant the built-in scheduler drains */
  tenantId: string;
  alertWebhookUrl: string;
  sync: SyncSettings;
  erp: ErpSettings;
}

function intFromEnv(name: string, fallback: number, min?: number, max?: number): number {
  const parsed = parseInt(process.env[name] ?? '', 10);
  let value = Number.isNaN(parsed) ? fallback : parsed;
  if (min !== undefined) value = Math.max(min, value);
  if (max !== undefined) value = Math.min(max, value);
  return value;
}

function backoffFromEnv(): RetryBackoff {
  return process.env.SYNC_RETRY_BACKOFF === 'fixed' ? 'fixed' : 'exponential';
}

const config: AppConfig = {
  port: intFromEnv('PORT', 3000),
  nodeEnv: process.env.NODE_ENV ?? 'development',

  // MongoDB
  mongodbUri: process.env.MONGODB_URI ?? 'mongodb://localhost:27017/content-erp-sync',

  // Auth (admin API tokens and the inbound webhook shared token)
  jwtSecret: process.env.JWT_SECRET ?? 'dev-secret-change-me',
  webhookToken: process.env.WEBHOOK_TOKEN ?? '',

  tenantId: process.env.SYNC_TENANT_ID ?? 'default',
  alertWebhookUrl: process.env.ALERT_WEBHOOK_URL ?? '',

  // Sync engine
  sync: {
    batchSize: intFromEnv('SYNC_BATCH_SIZE', 50, 1, 500),
    maxAttempts: intFromEnv('SYNC_MAX_ATTEMPTS', 3, 1, 20),
    retryBackoff: backoffFromEnv(),
    retryBaseDelayMs: intFromEnv('SYNC_RETRY_BASE_DELAY_MS', 60_000, 1_000),
    staleTimeoutMs: intFromEnv('SYNC_STALE_TIMEOUT_MS', 600_000, 60_000, 3_600_000),
    retentionDays: intFromEnv('SYNC_RETENTION_DAYS', 7, 1),
    intervalMs: intFromEnv('SYNC_INTERVAL_MS', 60_000, 1_000),
    maxPagesPerRun: intFromEnv('SYNC_MAX_PAGES_PER_RUN', 20, 1),
    timeBudgetMs: intFromEnv('SYNC_TIME_BUDGET_MS', 55_000, 1_000),
    dryRun: process.env.SYNC_DRY_RUN === 'true',
    enqueueDebounceMs: intFromEnv('SYNC_ENQUEUE_DEBOUNCE_MS', 5_000, 0),
  },

  // Remote ERP (JSON-RPC)
  erp: {
    url: process.env.ERP_URL ?? 'http://localhost:8069',
    database: process.env.ERP_DATABASE ?? '',
    login: process.env.ERP_LOGIN ?? '',
    apiKey: process.env.ERP_API_KEY ?? '',
    timeoutMs: intFromEnv('ERP_TIMEOUT_MS', 30_000, 1_000),
  },
};

// Validate critical vars at startup
const REQUIRED_ENV = ['MONGODB_URI', 'JWT_SECRET', 'WEBHOOK_TOKEN', 'ERP_URL', 'ERP_DATABASE'];

for (const name of REQUIRED_ENV) {
  if (!process.env[name] && config.nodeEnv !== 'test') {
    const level = config.nodeEnv === 'production' ? 'error' : 'warn';
    console[level](`⚠️  Missing config: ${name}`);
  }
}

export default config;
