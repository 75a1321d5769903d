/**
 * Public entry point: resolve the robots rules that apply to a URL, using the
 * two cache tiers before going to the network.
 */
import type { ResolverConfig } from '../config/resolver-config.js';
import { logger } from '../logger.js';
import { deriveKey, sameHost } from './origin-key.js';
import { fetchRobots } from './robots-fetch.js';
import { RobotsTxtParser } from './robots-parser.js';
import { DualTierCache } from './rule-cache.js';
import type { DualTierCacheConfig } from './rule-cache.js';
import { EMPTY_RULES, RuleSet } from './rule-set.js';
import type { Fetcher, PolicyParser } from './types.js';

export interface RobotsResolverOptions {
  /** Treat HTTP 403 on robots.txt as "no rules" (default: true). */
  allowForbidden?: boolean;
  /** Agent names to match in robots.txt, most specific first (default: ['*']). */
  agentNames?: readonly string[];
  /** Share one fetch between concurrent misses for the same origin (default: false). */
  coalesceInFlight?: boolean;
  parser?: PolicyParser;
  /** Pre-built caches; takes precedence over `cache`. */
  caches?: DualTierCache;
  cache?: Partial<DualTierCacheConfig>;
}

export class RobotsResolver {
  readonly agentNames: readonly string[];
  readonly caches: DualTierCache;
  private readonly allowForbidden: boolean;
  private readonly coalesceInFlight: boolean;
  private readonly parser: PolicyParser;
  private readonly inFlight = new Map<string, Promise<RuleSet>>();

  constructor(options: RobotsResolverOptions = {}) {
    this.allowForbidden = options.allowForbidden ?? true;
    this.agentNames = Object.freeze([...(options.agentNames ?? ['*'])]);
    this.coalesceInFlight = options.coalesceInFlight ?? false;
    this.parser = options.parser ?? new RobotsTxtParser();
    this.caches = options.caches ?? new DualTierCache(options.cache);
  }

  /** Build a resolver from validated configuration. */
  static fromConfig(
    config: ResolverConfig,
    overrides: Pick<RobotsResolverOptions, 'parser' | 'caches'> = {}
  ): RobotsResolver {
    return new RobotsResolver({
      allowForbidden: config.allowForbidden,
      agentNames: config.agentNames,
      coalesceInFlight: config.coalesceInFlight,
      cache: { success: config.successCache, error: config.errorCache },
      ...overrides,
    });
  }

  /**
   * Rules for the origin of `url`. Cached values come back as stored
   * (`fromCache: true`); a fresh resolution comes back with `fromCache: false`.
   * Never rejects.
   */
  async resolve(fetcher: Fetcher, url: URL | string): Promise<RuleSet> {
    let target: URL;
    try {
      target = typeof url === 'string' ? new URL(url) : url;
    } catch (error) {
      logger.debug({ url, error: String(error) }, 'Unparsable URL, using empty robots rules');
      return new RuleSet(EMPTY_RULES, false);
    }
    // mailto:, data: and other opaque URLs have no /robots.txt
    if (!URL.canParse('/robots.txt', target.href)) {
      logger.debug({ url: target.href }, 'URL has no robots.txt location, using empty robots rules');
      return new RuleSet(EMPTY_RULES, false);
    }

    const key = deriveKey(target);
    const cached = this.caches.lookup(key);
    if (cached) return cached;

    if (!this.coalesceInFlight) return this.fetchAndStore(fetcher, target, key);

    const pending = this.inFlight.get(key);
    if (pending) return pending;

    const promise = this.fetchAndStore(fetcher, target, key).finally(() => {
      this.inFlight.delete(key);
    });
    this.inFlight.set(key, promise);
    return promise;
  }

  /** Drop every cached entry in both tiers. */
  clearCaches(): void {
    this.caches.clear();
  }

  private async fetchAndStore(fetcher: Fetcher, url: URL, key: string): Promise<RuleSet> {
    logger.debug({ key, url: url.href }, 'Cache miss');

    const { policy, cacheable, redirect } = await fetchRobots(fetcher, url, {
      allowForbidden: this.allowForbidden,
      agentNames: this.agentNames,
      parser: this.parser,
    });

    const tier = this.caches.tierFor(cacheable);
    const stored = new RuleSet(policy, true);

    logger.debug({ url: url.href, key, cache: tier.name }, 'Caching robots');
    tier.put(key, stored);

    // Also cache under the redirect's origin so that host is not fetched again
    if (redirect && !sameHost(redirect, url)) {
      const redirectKey = deriveKey(redirect);
      logger.debug({ url: redirect.href, key: redirectKey, cache: tier.name }, 'Caching robots');
      tier.put(redirectKey, stored);
    }

    return stored.withFromCache(false);
  }
}
