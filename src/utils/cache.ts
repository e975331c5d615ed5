import { getConfig } from "../config.js";
import type { CacheWriter } from "../persistence/types.js";
import { log } from "./logger.js";

const logger = log.child("cache");

type CacheEntry = {
  taskName: string;
  expiresAt: number;
  hits: number;
};

export type MemoryCacheOptions = {
  /** Time-to-live in milliseconds */
  ttlMs?: number;
  /** Maximum number of fingerprints kept */
  maxEntries?: number;
};

/**
 * In-memory LRU of successful fingerprints with TTL. Useful for watch-style
 * callers that re-run the same graph within one process, and in tests.
 */
export class MemoryCache implements CacheWriter {
  private entries = new Map<string, CacheEntry>();
  private ttlMs: number;
  private maxEntries: number;
  private stats = { hits: 0, misses: 0, evictions: 0 };

  constructor(opts: MemoryCacheOptions = {}) {
    const { memoryTtlMs, memoryMaxEntries } = getConfig().cache;
    this.ttlMs = opts.ttlMs ?? memoryTtlMs;
    this.maxEntries = opts.maxEntries ?? memoryMaxEntries;
  }

  lookup(fingerprint: string): boolean {
    const entry = this.entries.get(fingerprint);
    if (!entry) {
      this.stats.misses++;
      return false;
    }

    if (Date.now() > entry.expiresAt) {
      this.entries.delete(fingerprint);
      this.stats.misses++;
      logger.debug("Fingerprint expired", { fingerprint, task: entry.taskName });
      return false;
    }

    this.stats.hits++;
    entry.hits++;
    // Move to end (most recently used)
    this.entries.delete(fingerprint);
    this.entries.set(fingerprint, entry);
    return true;
  }

  record(taskName: string, fingerprint: string): void {
    this.entries.delete(fingerprint);
    while (this.entries.size >= this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
      this.stats.evictions++;
    }
    this.entries.set(fingerprint, { taskName, expiresAt: Date.now() + this.ttlMs, hits: 0 });
  }

  delete(fingerprint: string): boolean {
    return this.entries.delete(fingerprint);
  }

  clear(): void {
    this.entries.clear();
  }

  getStats(): { size: number; hits: number; misses: number; evictions: number; hitRate: number } {
    const total = this.stats.hits + this.stats.misses;
    return {
      size: this.entries.size,
      hits: this.stats.hits,
      misses: this.stats.misses,
      evictions: this.stats.evictions,
      hitRate: total > 0 ? this.stats.hits / total : 0,
    };
  }

  get size(): number {
    return this.entries.size;
  }
}
