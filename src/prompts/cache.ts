/**
 * Prompt Cache
 *
 * In-memory TTL cache of resolved prompt versions, owned by the
 * PromptVersionStore. Entries are keyed by (name, version) and
 * (name, state); every key is also indexed by prompt name so that a
 * mutation can drop all of a name's entries at once.
 *
 * Entries are copied on the way in and out; callers never share the
 * cached object.
 *
 * Optional per-name hit/miss counters back the cache-stats endpoint.
 */

import type { CacheStats, PromptState, PromptVersion } from './types.js';

export interface PromptCacheOptions {
  /** Entry lifetime in seconds. 0 disables caching. */
  ttlSeconds: number;
  namespace: string;
  monitoring: boolean;
  /** Clock override for tests (ms since epoch). */
  now?: () => number;
}

interface CacheEntry {
  prompt: PromptVersion;
  expiresAt: number;
}

export type PromptCacheKey =
  | { name: string; version: number }
  | { name: string; state: PromptState };

export class PromptCache {
  private entries = new Map<string, CacheEntry>();
  private keysByName = new Map<string, Set<string>>();
  private stats = new Map<string, { hits: number; misses: number }>();
  private readonly ttlMs: number;
  private readonly namespace: string;
  private readonly monitoring: boolean;
  private readonly now: () => number;

  constructor(options: PromptCacheOptions) {
    this.ttlMs = Math.max(0, options.ttlSeconds) * 1000;
    this.namespace = options.namespace;
    this.monitoring = options.monitoring;
    this.now = options.now ?? Date.now;
  }

  get enabled(): boolean {
    return this.ttlMs > 0;
  }

  buildKey(key: PromptCacheKey): string {
    return 'version' in key
      ? `${this.namespace}:${key.name}:version:${key.version}`
      : `${this.namespace}:${key.name}:state:${key.state}`;
  }

  get(key: PromptCacheKey): PromptVersion | undefined {
    if (!this.enabled) return undefined;

    const cacheKey = this.buildKey(key);
    const entry = this.entries.get(cacheKey);
    if (entry && entry.expiresAt > this.now()) {
      this.record(key.name, 'hits');
      return structuredClone(entry.prompt);
    }

    if (entry) {
      this.entries.delete(cacheKey);
    }
    this.record(key.name, 'misses');
    return undefined;
  }

  set(key: PromptCacheKey, prompt: PromptVersion): void {
    if (!this.enabled) return;

    const cacheKey = this.buildKey(key);
    this.entries.set(cacheKey, { prompt: structuredClone(prompt), expiresAt: this.now() + this.ttlMs });

    let keys = this.keysByName.get(key.name);
    if (!keys) {
      keys = new Set();
      this.keysByName.set(key.name, keys);
    }
    keys.add(cacheKey);
  }

  /**
   * Drop every cached lookup for `name`. Returns the number of entries removed.
   */
  invalidate(name: string): number {
    const keys = this.keysByName.get(name);
    if (!keys) return 0;

    let removed = 0;
    for (const key of keys) {
      if (this.entries.delete(key)) removed++;
    }
    this.keysByName.delete(name);
    return removed;
  }

  clear(): void {
    this.entries.clear();
    this.keysByName.clear();
  }

  get size(): number {
    return this.entries.size;
  }

  getStats(name: string): CacheStats {
    const counts = this.stats.get(name) ?? { hits: 0, misses: 0 };
    const total = counts.hits + counts.misses;
    return {
      name,
      hits: counts.hits,
      misses: counts.misses,
      total,
      hitRate: total > 0 ? Math.round((counts.hits / total) * 10_000) / 100 : 0,
    };
  }

  clearStats(): void {
    this.stats.clear();
  }

  private record(name: string, outcome: 'hits' | 'misses'): void {
    if (!this.monitoring) return;
    const counts = this.stats.get(name) ?? { hits: 0, misses: 0 };
    counts[outcome]++;
    this.stats.set(name, counts);
  }
}
