// =============================================================================
// LRU Cache — Bounded, recency-ordered in-memory map
// =============================================================================
// Backs the Entity Map's lookup cache. A Map keeps insertion order, so
// re-inserting on every hit keeps the least recently used entry first and
// eviction is a single delete of the first key.
// =============================================================================

export class LRUCache<K, V> {
  private readonly entries = new Map<K, V>();
  readonly capacity: number;

  /** @param capacity — Maximum number of entries, at least 1 */
  constructor(capacity: number) {
    this.capacity = Math.max(1, Math.floor(capacity));
  }

  /** Value for `key`, marking it most recently used. */
  get(key: K): V | undefined {
    if (!this.entries.has(key)) return undefined;
    const value = this.entries.get(key);
    this.entries.delete(key);
    if (value !== undefined) this.entries.set(key, value);
    return value;
  }

  set(key: K, value: V): void {
    this.entries.delete(key);
    while (this.entries.size >= this.capacity) {
      const eldest = this.entries.keys().next();
      if (eldest.done) break;
      this.entries.delete(eldest.value);
    }
    this.entries.set(key, value);
  }

  delete(key: K): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}
