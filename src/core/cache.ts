/**
 * Insert-if-absent cache
 * Used for interface method resolution, where every caller must observe the same instance
 */

/**
 * Map-backed cache whose entries are computed at most once per key
 * Population is synchronous, so interleaved async callers can never race a second computation
 */
export class ResolutionCache<K, V extends object> {
  private readonly entries = new Map<K, V>();

  /**
   * Return the cached value for `key`, computing and storing it on first use
   * A throwing `create` leaves nothing behind, so a later call retries
   */
  getOrCreate(key: K, create: (key: K) => V): V {
    const existing = this.entries.get(key);
    if (existing !== undefined) {
      return existing;
    }

    const created = create(key);
    this.entries.set(key, created);
    return created;
  }

  get(key: K): V | undefined {
    return this.entries.get(key);
  }

  has(key: K): boolean {
    return this.entries.has(key);
  }

  get size(): number {
    return this.entries.size;
  }
}
