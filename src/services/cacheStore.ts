type CacheEntry<T> = { value: T; expiresAt: number };

/**
 * In-process memo table keyed by search inputs.
 * A ttl of 0 keeps entries until they are pushed out by `maxEntries`.
 */
export class CacheStore<T> {
  private map = new Map<string, CacheEntry<T>>();

  constructor(
    private readonly ttlMs: number = 0,
    private readonly maxEntries: number = 1000
  ) {}

  static key(...parts: Array<string | number | undefined>): string {
    return JSON.stringify(parts.map((part) => (typeof part === "string" ? part.trim() : part ?? null)));
  }

  get(key: string): T | undefined {
    const hit = this.map.get(key);
    if (!hit) return undefined;
    if (Date.now() > hit.expiresAt) {
      this.map.delete(key);
      return undefined;
    }
    return hit.value;
  }

  set(key: string, value: T): void {
    this.pruneExpired();
    this.map.delete(key);
    if (this.map.size >= this.maxEntries) {
      const oldestKey = this.map.keys().next().value;
      if (oldestKey !== undefined) {
        this.map.delete(oldestKey);
      }
    }

    const expiresAt = this.ttlMs > 0 ? Date.now() + this.ttlMs : Number.POSITIVE_INFINITY;
    this.map.set(key, { value, expiresAt });
  }

  size(): number {
    this.pruneExpired();
    return this.map.size;
  }

  clear(): void {
    this.map.clear();
  }

  private pruneExpired(): void {
    const now = Date.now();
    for (const [key, entry] of this.map.entries()) {
      if (entry.expiresAt <= now) {
        this.map.delete(key);
      }
    }
  }
}
