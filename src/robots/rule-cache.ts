/**
 * Two bounded, time-evicting caches of resolved rules: one for confirmed
 * policies and one for transient failures, which expire sooner.
 */
import { LRUCache } from 'lru-cache';
import type { RuleSet } from './rule-set.js';

export type CacheTierName = 'success' | 'error';

export interface CacheTierConfig {
  /** Maximum number of origins kept; least recently used go first. */
  capacity: number;
  /** Lifetime of an entry, fixed when it is written. */
  ttlMs: number;
}

export interface DualTierCacheConfig {
  success: CacheTierConfig;
  error: CacheTierConfig;
}

export const DEFAULT_SUCCESS_CACHE: CacheTierConfig = { capacity: 10_000, ttlMs: 6 * 60 * 60 * 1000 };
export const DEFAULT_ERROR_CACHE: CacheTierConfig = { capacity: 10_000, ttlMs: 60 * 60 * 1000 };

export class RuleSetCache {
  readonly name: CacheTierName;
  private readonly entries: LRUCache<string, RuleSet>;

  constructor(name: CacheTierName, config: CacheTierConfig) {
    this.name = name;
    this.entries = new LRUCache<string, RuleSet>({
      max: config.capacity,
      ttl: config.ttlMs,
      updateAgeOnGet: false,
      updateAgeOnHas: false,
    });
  }

  get(key: string): RuleSet | undefined {
    return this.entries.get(key);
  }

  /** Replace any entry under `key` and restart its TTL. */
  put(key: string, ruleSet: RuleSet): void {
    this.entries.set(key, ruleSet);
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}

export class DualTierCache {
  readonly success: RuleSetCache;
  readonly error: RuleSetCache;

  constructor(config: Partial<DualTierCacheConfig> = {}) {
    this.success = new RuleSetCache('success', config.success ?? DEFAULT_SUCCESS_CACHE);
    this.error = new RuleSetCache('error', config.error ?? DEFAULT_ERROR_CACHE);
  }

  /**
   * Error tier first: a recent failure wins over a still-live success entry
   * for the same origin.
   */
  lookup(key: string): RuleSet | undefined {
    return this.error.get(key) ?? this.success.get(key);
  }

  tierFor(cacheable: boolean): RuleSetCache {
    return cacheable ? this.success : this.error;
  }

  clear(): void {
    this.success.clear();
    this.error.clear();
  }
}
