import { createHash } from "node:crypto";
import { log } from "./logger.js";

export type CacheEntry<T> = {
  value: T;
  expiresAt: number;
};

export type CacheOptions = {
  /** Time-to-live in milliseconds (default: 5 minutes) */
  ttlMs?: number;
  /** Maximum number of entries (default: 1000) */
  maxEntries?: number;
};

export type CacheStats = {
  size: number;
  hits: number;
  misses: number;
  evictions: number;
  /** Loads that joined one already in flight for the same key. */
  shared: number;
};

/**
 * In-memory LRU cache with a fixed TTL, keyed by normalised request parts.
 * `load()` runs at most one loader per key at a time; a failed load is not
 * cached.
 */
export class Cache<T> {
  private entries = new Map<string, CacheEntry<T>>();
  private inflight = new Map<string, Promise<T>>();
  private ttlMs: number;
  private maxEntries: number;
  private stats = { hits: 0, misses: 0, evictions: 0, shared: 0 };

  constructor(opts: CacheOptions = {}) {
    this.ttlMs = opts.ttlMs ?? 5 * 60 * 1000;
    this.maxEntries = Math.max(1, opts.maxEntries ?? 1000);
  }

  /**
   * Short key from request parts. Strings are trimmed, lower-cased and have
   * inner whitespace collapsed, so `"USB  hub"` and `"usb hub"` share a key.
   */
  static key(...parts: Array<string | number>): string {
    const normalised = parts.map((p) => (typeof p === "string" ? p.trim().replace(/\s+/g, " ").toLowerCase() : String(p)));
    return createHash("sha256").update(normalised.join("\u0000")).digest("hex").slice(0, 16);
  }

  get(key: string): T | undefined {
    const entry = this.entries.get(key);
    if (!entry || Date.now() > entry.expiresAt) {
      if (entry) this.entries.delete(key);
      this.stats.misses++;
      return undefined;
    }
    this.stats.hits++;
    // re-insert: Map order is recency order
    this.entries.delete(key);
    this.entries.set(key, entry);
    return entry.value;
  }

  set(key: string, value: T): void {
    this.entries.delete(key);
    while (this.entries.size >= this.maxEntries) {
      const oldest = this.entries.keys().next().value;
      if (oldest === undefined) break;
      this.entries.delete(oldest);
      this.stats.evictions++;
    }
    this.entries.set(key, { value, expiresAt: Date.now() + this.ttlMs });
  }

  /** Cached value for `key`, else the result of `loader`, stored on success. */
  async load(key: string, loader: () => Promise<T>): Promise<T> {
    const cached = this.get(key);
    if (cached !== undefined) return cached;

    const pending = this.inflight.get(key);
    if (pending) {
      this.stats.shared++;
      return pending;
    }

    const promise = loader()
      .then((value) => {
        this.set(key, value);
        return value;
      })
      .finally(() => {
        this.inflight.delete(key);
      });
    this.inflight.set(key, promise);
    log.debug("Cache miss, loading", { key: key.slice(0, 8) });
    return promise;
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  getStats(): CacheStats {
    return { size: this.entries.size, ...this.stats };
  }

  get size(): number {
    return this.entries.size;
  }
}
