import { logLine } from "../log";

export type CacheEntry = {
  key: string;
  resolvedUrl: string;
  /** Page link the URL was extracted from. */
  sourceLink: string;
  createdAt: number;
};

export type StreamCacheOptions = {
  ttlMs: number;
  capacity: number;
  now?: () => number;
};

/**
 * Resolved audio URLs keyed by normalized query. Every operation is
 * synchronous, so concurrent requests on the event loop never interleave
 * inside one.
 */
export class StreamCache {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly now: () => number;

  constructor(private readonly options: StreamCacheOptions) {
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.entries.size;
  }

  get ttlMs(): number {
    return this.options.ttlMs;
  }

  get capacity(): number {
    return this.options.capacity;
  }

  private isExpired(entry: CacheEntry, at: number): boolean {
    return at - entry.createdAt >= this.options.ttlMs;
  }

  lookup(key: string): CacheEntry | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (this.isExpired(entry, this.now())) {
      this.entries.delete(key);
      return undefined;
    }
    return entry;
  }

  insert(key: string, resolvedUrl: string, sourceLink: string): CacheEntry {
    // Delete first so the Map order follows creation time.
    this.entries.delete(key);
    const entry: CacheEntry = { key, resolvedUrl, sourceLink, createdAt: this.now() };
    this.entries.set(key, entry);
    return entry;
  }

  sweep(): number {
    const at = this.now();
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (this.isExpired(entry, at)) {
        this.entries.delete(key);
        removed++;
      }
    }
    if (removed) logLine("[cache]", "expired_removed", { removed });
    return removed;
  }

  enforceCapacity(): number {
    const excess = this.entries.size - this.options.capacity;
    if (excess <= 0) return 0;
    const oldest = [...this.entries.values()].sort((a, b) => a.createdAt - b.createdAt).slice(0, excess);
    for (const entry of oldest) this.entries.delete(entry.key);
    logLine("[cache]", "capacity_evicted", { evicted: oldest.length, capacity: this.options.capacity });
    return oldest.length;
  }

  clear(): number {
    const count = this.entries.size;
    this.entries.clear();
    return count;
  }

  keys(): string[] {
    return [...this.entries.keys()];
  }
}
