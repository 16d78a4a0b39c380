// =============================================================================
// Module Circuit Breaker — Per-module health gate for the sync engine
// =============================================================================
//   Closed ──(5 consecutive batches with ≥ 80 % failures)──▶ Open
//   Open ──(600 s elapsed)──▶ Half-open: the next batch is a probe
//   Probe healthy ──▶ Closed (state deleted)
//   Probe unhealthy ──▶ Open again, recovery timer restarted
//
// State lives in the key-value store under one key per tenant and is absent
// while every module is healthy. State opened more than 2 h ago is dropped
// on read so a stuck module cannot block its queue forever.
// =============================================================================
import { z } from 'zod';
import { CircuitState } from '../types';
import { KeyValueStore } from '../stores/types';
import logger from '../utils/logger';

export interface CircuitBreakerOptions {
  /** Consecutive unhealthy batches before opening */
  failureThreshold: number;
  /** Failure ratio at or above which a batch counts as unhealthy */
  failureRatio: number;
  recoveryDelayMs: number;
  /** Open state older than this is discarded */
  staleAfterMs: number;
  /** Epoch ms */
  now: () => number;
}

/** Notified when a module's circuit opens */
export interface CircuitOpenListener {
  onCircuitOpen(tenantId: string, module: string, failures: number): Promise<void>;
}

/** One row of the admin circuit listing */
export interface CircuitSnapshot extends CircuitState {
  module: string;
  available: boolean;
}

const DEFAULT_OPTIONS: CircuitBreakerOptions = {
  failureThreshold: 5,
  failureRatio: 0.8,
  recoveryDelayMs: 600_000,
  staleAfterMs: 2 * 60 * 60 * 1000,
  now: () => Date.now(),
};

const circuitStatesSchema = z.record(
  z.object({
    failures: z.number().int().nonnegative(),
    openedAt: z.number().nonnegative(),
  }),
);

export function circuitStateKey(tenantId: string): string {
  return `module_circuit_states:${tenantId}`;
}

export class ModuleCircuitBreaker {
  private readonly options: CircuitBreakerOptions;
  private states: Map<string, CircuitState> | null = null;
  private listener: CircuitOpenListener | null = null;

  constructor(
    private readonly kv: KeyValueStore,
    private readonly tenantId: string,
    options: Partial<CircuitBreakerOptions> = {},
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  setOpenListener(listener: CircuitOpenListener): void {
    this.listener = listener;
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────────

  /** True while closed, half-open, or once the state has gone stale. */
  async isModuleAvailable(module: string): Promise<boolean> {
    const states = await this.load();
    const state = states.get(module);
    if (!state || state.openedAt === 0) return true;

    const age = this.options.now() - state.openedAt;
    if (age > this.options.staleAfterMs) {
      await this.resetModule(module);
      return true;
    }
    return age >= this.options.recoveryDelayMs;
  }

  /** Modules with an open (or half-open) circuit that has not gone stale. */
  async getOpenModules(): Promise<Map<string, CircuitState>> {
    const states = await this.load();
    const now = this.options.now();
    const open = new Map<string, CircuitState>();
    for (const [module, state] of states) {
      if (state.openedAt > 0 && now - state.openedAt < this.options.staleAfterMs) {
        open.set(module, { ...state });
      }
    }
    return open;
  }

  /** Open modules still inside their recovery delay. */
  async getUnavailableModules(): Promise<string[]> {
    const unavailable: string[] = [];
    for (const module of (await this.getOpenModules()).keys()) {
      if (!(await this.isModuleAvailable(module))) unavailable.push(module);
    }
    return unavailable;
  }

  async snapshot(): Promise<CircuitSnapshot[]> {
    const states = await this.load();
    const rows: CircuitSnapshot[] = [];
    for (const [module, state] of states) {
      rows.push({ module, ...state, available: await this.isModuleAvailable(module) });
    }
    return rows;
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Transitions
  // ───────────────────────────────────────────────────────────────────────────

  /** Feed one batch result. Empty batches are ignored. */
  async recordBatch(module: string, successes: number, failures: number): Promise<void> {
    const total = successes + failures;
    if (total <= 0) return;

    if (failures / total < this.options.failureRatio) {
      await this.recordHealthy(module);
    } else {
      await this.recordUnhealthy(module);
    }
  }

  /** Admin override. Returns false when the module had no state. */
  async resetModule(module: string): Promise<boolean> {
    const states = await this.load();
    if (!states.delete(module)) return false;
    await this.save();
    logger.info('Module circuit breaker reset', { tenantId: this.tenantId, module });
    return true;
  }

  private async recordHealthy(module: string): Promise<void> {
    const states = await this.load();
    const state = states.get(module);
    if (!state) return;

    states.delete(module);
    await this.save();

    if (state.openedAt > 0) {
      logger.info('Module circuit breaker closed: module recovered', {
        tenantId: this.tenantId,
        module,
      });
    }
  }

  private async recordUnhealthy(module: string): Promise<void> {
    const states = await this.load();
    const state = states.get(module) ?? { failures: 0, openedAt: 0 };
    state.failures += 1;
    states.set(module, state);

    let opened = false;
    if (state.openedAt > 0) {
      state.openedAt = this.options.now();
      logger.warn('Module circuit breaker probe failed: staying open', {
        tenantId: this.tenantId,
        module,
        failures: state.failures,
      });
    } else if (state.failures >= this.options.failureThreshold) {
      state.openedAt = this.options.now();
      opened = true;
      logger.warn('Module circuit breaker opened: module has too many failures', {
        tenantId: this.tenantId,
        module,
        failures: state.failures,
        recoveryDelayMs: this.options.recoveryDelayMs,
      });
    }

    await this.save();

    if (opened && this.listener) {
      await this.listener.onCircuitOpen(this.tenantId, module, state.failures);
    }
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Persistence
  // ───────────────────────────────────────────────────────────────────────────

  private async load(): Promise<Map<string, CircuitState>> {
    if (this.states) return this.states;

    const states = new Map<string, CircuitState>();
    const raw = await this.kv.get(circuitStateKey(this.tenantId));
    if (raw) {
      const parsed = circuitStatesSchema.safeParse(safeJsonParse(raw));
      if (parsed.success) {
        for (const [module, state] of Object.entries(parsed.data)) {
          states.set(module, state);
        }
      } else {
        logger.warn('Ignoring malformed circuit breaker state', { tenantId: this.tenantId });
      }
    }

    // Drop stale open states
    const now = this.options.now();
    let pruned = false;
    for (const [module, state] of states) {
      if (state.openedAt > 0 && now - state.openedAt > this.options.staleAfterMs) {
        states.delete(module);
        pruned = true;
      }
    }

    this.states = states;
    if (pruned) await this.save();
    return states;
  }

  private async save(): Promise<void> {
    const states = this.states ?? new Map<string, CircuitState>();
    const key = circuitStateKey(this.tenantId);
    if (states.size === 0) {
      await this.kv.delete(key);
    } else {
      await this.kv.set(key, JSON.stringify(Object.fromEntries(states)));
    }
  }
}

function safeJsonParse(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return null;
  }
}
