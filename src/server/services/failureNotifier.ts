// =============================================================================
// Failure Notifier — Alerts an operator when syncing keeps failing
// =============================================================================
// Counts failed jobs across consecutive runs that had no success at all.
// Once the count reaches the threshold (5) an alert goes out, at most once
// per cooldown (1 h). A module circuit opening triggers its own alert, with
// a cooldown per module.
//
// Alerts are always logged as warnings and, when ALERT_WEBHOOK_URL is set,
// POSTed there as JSON. Delivery failures are logged, never thrown.
// =============================================================================
import axios from 'axios';
import { z } from 'zod';
import { KeyValueStore } from '../stores/types';
import { CircuitOpenListener } from './moduleCircuitBreaker';
import { RunListener } from './syncEngine';
import logger from '../utils/logger';

export interface FailureNotifierOptions {
  threshold: number;
  cooldownMs: number;
  /** Empty → log only */
  webhookUrl: string;
  timeoutMs: number;
  /** Epoch ms */
  now: () => number;
}

export type SyncAlert =
  | { event: 'consecutive_failures'; tenantId: string; consecutiveFailures: number }
  | { event: 'module_circuit_open'; tenantId: string; module: string; failures: number };

const DEFAULT_OPTIONS: FailureNotifierOptions = {
  threshold: 5,
  cooldownMs: 60 * 60 * 1000,
  webhookUrl: '',
  timeoutMs: 10_000,
  now: () => Date.now(),
};

const notifierStateSchema = z.object({
  consecutiveFailures: z.number().int().nonnegative().default(0),
  lastAlertAt: z.number().nonnegative().default(0),
  circuitAlerts: z.record(z.number()).default({}),
});

type NotifierState = z.infer<typeof notifierStateSchema>;

export function notifierStateKey(tenantId: string): string {
  return `failure_notifier:${tenantId}`;
}

export class FailureNotifier implements RunListener, CircuitOpenListener {
  private readonly options: FailureNotifierOptions;

  constructor(
    private readonly kv: KeyValueStore,
    options: Partial<FailureNotifierOptions> = {},
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  /** Feed the totals of one engine run. */
  async recordRun(tenantId: string, successes: number, failures: number): Promise<void> {
    const state = await this.load(tenantId);

    if (successes > 0) {
      if (state.consecutiveFailures > 0) {
        state.consecutiveFailures = 0;
        await this.save(tenantId, state);
      }
      return;
    }
    if (failures <= 0) return;

    state.consecutiveFailures += failures;
    const now = this.options.now();
    if (
      state.consecutiveFailures >= this.options.threshold &&
      now - state.lastAlertAt >= this.options.cooldownMs
    ) {
      await this.send({
        event: 'consecutive_failures',
        tenantId,
        consecutiveFailures: state.consecutiveFailures,
      });
      state.lastAlertAt = now;
    }
    await this.save(tenantId, state);
  }

  async onCircuitOpen(tenantId: string, module: string, failures: number): Promise<void> {
    const state = await this.load(tenantId);
    const now = this.options.now();
    if (now - (state.circuitAlerts[module] ?? 0) < this.options.cooldownMs) return;

    await this.send({ event: 'module_circuit_open', tenantId, module, failures });
    state.circuitAlerts[module] = now;
    await this.save(tenantId, state);
  }

  /** Returns true when the webhook accepted the alert. */
  private async send(alert: SyncAlert): Promise<boolean> {
    logger.warn('Sync failure alert', alert);
    if (!this.options.webhookUrl) return false;

    try {
      await axios.post(
        this.options.webhookUrl,
        { ...alert, sentAt: new Date(this.options.now()).toISOString() },
        { timeout: this.options.timeoutMs, headers: { 'Content-Type': 'application/json' } },
      );
      return true;
    } catch (err) {
      logger.error('Failed to deliver sync alert', {
        event: alert.event,
        tenantId: alert.tenantId,
        error: err instanceof Error ? err.message : String(err),
      });
      return false;
    }
  }

  private async load(tenantId: string): Promise<NotifierState> {
    const raw = await this.kv.get(notifierStateKey(tenantId));
    let parsed: unknown = {};
    if (raw) {
      try {
        parsed = JSON.parse(raw);
      } catch {
        logger.warn('Ignoring malformed notifier state', { tenantId });
      }
    }
    const result = notifierStateSchema.safeParse(parsed);
    return result.success ? result.data : notifierStateSchema.parse({});
  }

  private async save(tenantId: string, state: NotifierState): Promise<void> {
    await this.kv.set(notifierStateKey(tenantId), JSON.stringify(state));
  }
}
