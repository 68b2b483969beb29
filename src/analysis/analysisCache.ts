export interface CacheEntry<T> {
  value: T;
  expiresAt: number;
}

export class AnalysisCache<T> {
  private readonly store = new Map<string, CacheEntry<T>>();

  constructor(private readonly now: () => number = Date.now) {}

  get(cacheKey: string): T | null {
    const entry = this.store.get(cacheKey);
    if (!entry) return null;

    if (this.now() > entry.expiresAt) {
      this.store.delete(cacheKey);
      return null;
    }

    return entry.value;
  }

  set(cacheKey: string, value: T, ttlMs: number): void {
    const ttl = Math.max(0, ttlMs);
    this.store.set(cacheKey, { value, expiresAt: this.now() + ttl });
  }

  invalidate(prefix: string): void {
    for (const key of this.store.keys()) {
      if (key.startsWith(prefix)) {
        this.store.delete(key);
      }
    }
  }

  clear(): void {
    this.store.clear();
  }

  get size(): number {
    return this.store.size;
  }
}
