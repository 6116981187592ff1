interface CacheEntry<T> {
  data: T;
  expiry: number;
}

/**
 * Small TTL cache. One instance per repository, never module-wide,
 * so separate contexts do not share entries.
 */
export class TtlCache<T> {
  private readonly entries = new Map<string, CacheEntry<T>>();

  constructor(
    private readonly ttlMs: number,
    private readonly now: () => number = Date.now,
  ) {}

  has(key: string): boolean {
    return this.read(key) !== undefined;
  }

  get(key: string): T | undefined {
    return this.read(key)?.data;
  }

  set(key: string, data: T): void {
    if (this.ttlMs <= 0) return;
    this.entries.set(key, { data, expiry: this.now() + this.ttlMs });
  }

  /** Drop every entry whose key starts with the prefix; returns how many went */
  clear(prefix = ''): number {
    let count = 0;
    for (const key of [...this.entries.keys()]) {
      if (key.startsWith(prefix)) {
        this.entries.delete(key);
        count++;
      }
    }
    return count;
  }

  private read(key: string): CacheEntry<T> | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (this.now() > entry.expiry) {
      this.entries.delete(key);
      return undefined;
    }
    return entry;
  }
}
