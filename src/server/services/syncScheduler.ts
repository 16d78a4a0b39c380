// =============================================================================
// Sync Scheduler — Periodic queue drain + maintenance
// =============================================================================
// Every tick:
//
//   1. Requeue jobs stuck in `processing` longer than the stale timeout
//      (a worker that died mid-run).
//   2. Drain the queue through the engine.
//   3. Every `maintenanceEveryTicks` ticks, delete finished jobs older than
//      the retention window.
//
// Ticks never overlap; a tick still running when the timer fires is left
// alone. Errors are logged and the next tick tries again.
// =============================================================================
import { JobQueue } from './jobQueue';
import { SyncEngine } from './syncEngine';
import logger from '../utils/logger';

export interface SyncSchedulerOptions {
  intervalMs: number;
  staleTimeoutMs: number;
  retentionDays: number;
  maintenanceEveryTicks: number;
}

const DEFAULT_OPTIONS: SyncSchedulerOptions = {
  intervalMs: 60_000,
  staleTimeoutMs: 600_000,
  retentionDays: 7,
  maintenanceEveryTicks: 60,
};

export class SyncScheduler {
  private readonly options: SyncSchedulerOptions;
  private intervalHandle: ReturnType<typeof setInterval> | null = null;
  private ticking = false;
  private ticks = 0;

  constructor(
    private readonly engine: SyncEngine,
    private readonly queue: JobQueue,
    options: Partial<SyncSchedulerOptions> = {},
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  /**
   * Start ticking. The first tick runs immediately. Calling start() on a
   * running scheduler does nothing.
   */
  start(): void {
    if (this.intervalHandle) {
      logger.debug('Sync scheduler already running — skipping start');
      return;
    }

    logger.info('Starting sync scheduler', {
      tenantId: this.engine.tenantId,
      intervalMs: this.options.intervalMs,
    });

    void this.tick();
    this.intervalHandle = setInterval(() => {
      void this.tick();
    }, this.options.intervalMs);

    // Allow the process to exit even if the timer is still scheduled
    this.intervalHandle.unref();
  }

  stop(): void {
    if (this.intervalHandle) {
      clearInterval(this.intervalHandle);
      this.intervalHandle = null;
      logger.info('Sync scheduler stopped', { tenantId: this.engine.tenantId });
    }
  }

  isRunning(): boolean {
    return this.intervalHandle !== null;
  }

  /**
   * One scheduler pass. Never throws.
   *
   * @returns — Jobs completed by the engine, or 0 when the tick was skipped
   */
  async tick(): Promise<number> {
    if (this.ticking) {
      logger.debug('Previous sync tick still running — skipping');
      return 0;
    }
    this.ticking = true;
    this.ticks++;
    const tenantId = this.engine.tenantId;

    try {
      await this.queue.recoverStale(tenantId, this.options.staleTimeoutMs);
      const completed = await this.engine.processQueue();

      if (this.ticks % this.options.maintenanceEveryTicks === 0) {
        await this.queue.cleanup(tenantId, this.options.retentionDays);
      }
      return completed;
    } catch (err) {
      logger.error('Sync tick failed', {
        tenantId,
        error: err instanceof Error ? err.message : String(err),
      });
      return 0;
    } finally {
      this.ticking = false;
    }
  }
}
