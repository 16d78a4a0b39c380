// =============================================================================
// Import Guard — Suppresses change hooks during pull-triggered local writes
// =============================================================================
// When a remote change is written locally, the local content-save hook fires
// too. Without a guard that write would be enqueued straight back to the
// remote side. The guard is a per-module set of "currently importing" keys;
// each tenant/worker owns its own instance.
// =============================================================================

export class ImportGuard {
  /** module → nesting depth */
  private readonly active = new Map<string, number>();

  isImporting(module: string): boolean {
    return (this.active.get(module) ?? 0) > 0;
  }

  /**
   * Run `fn` with `module` marked as importing. Nested calls are counted,
   * so the flag clears only when the outermost call settles.
   */
  async run<T>(module: string, fn: () => Promise<T>): Promise<T> {
    this.active.set(module, (this.active.get(module) ?? 0) + 1);
    try {
      return await fn();
    } finally {
      const depth = (this.active.get(module) ?? 1) - 1;
      if (depth <= 0) this.active.delete(module);
      else this.active.set(module, depth);
    }
  }
}
