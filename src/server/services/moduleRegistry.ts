// =============================================================================
// Module Registry — Resolves a job's module key to its handler
// =============================================================================
import { ModuleHandler } from '../types';
import logger from '../utils/logger';

export class ModuleRegistry {
  private readonly handlers = new Map<string, ModuleHandler>();

  /** Register (or replace) a handler under its own id. */
  register(handler: ModuleHandler): this {
    if (!handler.id) {
      throw new Error('Module handler id is required');
    }
    if (this.handlers.has(handler.id)) {
      logger.warn('Replacing registered module handler', { module: handler.id });
    }
    this.handlers.set(handler.id, handler);
    return this;
  }

  unregister(id: string): boolean {
    return this.handlers.delete(id);
  }

  get(id: string): ModuleHandler | undefined {
    return this.handlers.get(id);
  }

  has(id: string): boolean {
    return this.handlers.has(id);
  }

  ids(): string[] {
    return [...this.handlers.keys()];
  }
}
