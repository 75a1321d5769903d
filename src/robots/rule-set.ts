/**
 * Resolved robots rules for one origin, plus the sentinel policies used when
 * no robots.txt content is available.
 */
import type { PolicyKind, RobotsPolicy } from './types.js';

const NO_SITEMAPS: readonly string[] = Object.freeze([]);

function sentinel(kind: PolicyKind, allowed: boolean): RobotsPolicy {
  return Object.freeze({
    kind,
    allowsAll: allowed,
    allowsNone: !allowed,
    crawlDelayMs: null,
    sitemaps: NO_SITEMAPS,
    isAllowed: () => allowed,
  });
}

/** Everything may be fetched. */
export const ALLOW_ALL = sentinel('allow-all', true);

/** Nothing may be fetched (HTTP 403 when forbidden responses are honoured). */
export const FORBID_ALL = sentinel('forbid-all', false);

/** Permissive default: no rules were found or they could not be obtained. */
export const EMPTY_RULES = sentinel('empty', true);

/**
 * Immutable wrapper around a policy. `fromCache` tells a caller whether the
 * value came out of a cache tier or was just resolved.
 */
export class RuleSet {
  readonly policy: RobotsPolicy;
  readonly fromCache: boolean;

  constructor(policy: RobotsPolicy, fromCache: boolean) {
    this.policy = policy;
    this.fromCache = fromCache;
    Object.freeze(this);
  }

  /** Copy with a different freshness flag. */
  withFromCache(fromCache: boolean): RuleSet {
    return fromCache === this.fromCache ? this : new RuleSet(this.policy, fromCache);
  }

  isAllowed(url: string): boolean {
    return this.policy.isAllowed(url);
  }

  isAllowAll(): boolean {
    return this.policy.allowsAll;
  }

  isAllowNone(): boolean {
    return this.policy.allowsNone;
  }

  get crawlDelayMs(): number | null {
    return this.policy.crawlDelayMs;
  }

  get sitemaps(): readonly string[] {
    return this.policy.sitemaps;
  }
}
