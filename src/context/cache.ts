/**
 * Context Cache
 *
 * LRU cache of frozen selections keyed by (project, task, strategy, budget).
 * A hit returns the stored object itself; nothing is rescored.
 *
 * Map insertion order doubles as recency order: a hit re-inserts the key, so
 * the first key is always the least recently used.
 */

import { z } from 'zod';
import { ConfigurationError } from '../lib/errors.js';
import { fingerprintParts } from '../lib/fingerprint.js';
import type { SelectedContext, SelectionStrategy } from './types.js';

export interface CacheKey {
  projectFingerprint: string;
  taskFingerprint: string;
  strategy: SelectionStrategy;
  /** Fingerprint of every constraint value that shapes the selection */
  budgetFingerprint: string;
}

export interface CacheEntryInfo {
  createdAt: number;
  lastAccessedAt: number;
  accessCount: number;
}

interface CacheEntry extends CacheEntryInfo {
  value: SelectedContext;
  projectFingerprint: string;
}

export interface CacheStats {
  hits: number;
  misses: number;
  evictions: number;
  invalidations: number;
  size: number;
  maxEntries: number;
  /** hits / (hits + misses), 0 before any lookup */
  hitRatio: number;
}

const cacheConfigSchema = z.object({
  maxEntries: z.number().int().positive(),
  /** 0 disables expiry */
  ttlMs: z.number().int().min(0),
});

export type CacheConfig = z.infer<typeof cacheConfigSchema>;

export const DEFAULT_CACHE_CONFIG: CacheConfig = {
  maxEntries: 1000,
  ttlMs: 30 * 60 * 1000,
};

export function cacheKeyToString(key: CacheKey): string {
  return fingerprintParts([key.projectFingerprint, key.taskFingerprint, key.strategy, key.budgetFingerprint]);
}

export class ContextCache {
  readonly config: CacheConfig;
  private readonly entries = new Map<string, CacheEntry>();
  private readonly clock: () => number;
  private hits = 0;
  private misses = 0;
  private evictions = 0;
  private invalidations = 0;

  /**
   * @throws ConfigurationError for a non-positive size or negative TTL
   */
  constructor(config: Partial<CacheConfig> = {}, clock: () => number = Date.now) {
    const parsed = cacheConfigSchema.safeParse({ ...DEFAULT_CACHE_CONFIG, ...config });
    if (!parsed.success) {
      throw ConfigurationError.fromZod('cache config', parsed.error);
    }
    this.config = parsed.data;
    this.clock = clock;
  }

  get(key: CacheKey): SelectedContext | undefined {
    const id = cacheKeyToString(key);
    const entry = this.entries.get(id);
    if (!entry || this.isExpired(entry)) {
      if (entry) this.entries.delete(id);
      this.misses++;
      return undefined;
    }

    this.entries.delete(id);
    this.entries.set(id, entry);
    entry.accessCount++;
    entry.lastAccessedAt = this.clock();
    this.hits++;
    return entry.value;
  }

  /**
   * Store a selection. A second write for the same key replaces the first.
   */
  put(key: CacheKey, value: SelectedContext): void {
    const id = cacheKeyToString(key);
    const now = this.clock();
    this.entries.delete(id);

    while (this.entries.size >= this.config.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
      this.evictions++;
    }

    this.entries.set(id, {
      value,
      projectFingerprint: key.projectFingerprint,
      createdAt: now,
      lastAccessedAt: now,
      accessCount: 0,
    });
  }

  /**
   * Entry metadata without touching recency or the hit counters.
   */
  peek(key: CacheKey): CacheEntryInfo | undefined {
    const entry = this.entries.get(cacheKeyToString(key));
    if (!entry || this.isExpired(entry)) return undefined;
    return { createdAt: entry.createdAt, lastAccessedAt: entry.lastAccessedAt, accessCount: entry.accessCount };
  }

  has(key: CacheKey): boolean {
    return this.peek(key) !== undefined;
  }

  /**
   * Drop every entry computed against a project fingerprint.
   * Returns the number of entries removed.
   */
  invalidateProject(projectFingerprint: string): number {
    let removed = 0;
    for (const [id, entry] of this.entries) {
      if (entry.projectFingerprint === projectFingerprint) {
        this.entries.delete(id);
        removed++;
      }
    }
    this.invalidations += removed;
    return removed;
  }

  clear(): void {
    this.invalidations += this.entries.size;
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }

  stats(): CacheStats {
    const lookups = this.hits + this.misses;
    return {
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
      invalidations: this.invalidations,
      size: this.entries.size,
      maxEntries: this.config.maxEntries,
      hitRatio: lookups > 0 ? this.hits / lookups : 0,
    };
  }

  private isExpired(entry: CacheEntry): boolean {
    return this.config.ttlMs > 0 && this.clock() - entry.createdAt >= this.config.ttlMs;
  }
}
