/**
 * robots-resolver - resolve, fetch and cache robots.txt rules per origin.
 *
 * @module robots-resolver
 */
export { RobotsResolver } from './robots/resolver.js';
export { deriveKey, defaultPort, sameHost } from './robots/origin-key.js';
export { RuleSet, ALLOW_ALL, FORBID_ALL, EMPTY_RULES } from './robots/rule-set.js';
export {
  DualTierCache,
  RuleSetCache,
  DEFAULT_SUCCESS_CACHE,
  DEFAULT_ERROR_CACHE,
} from './robots/rule-cache.js';
export { fetchRobots, EMPTY_METADATA } from './robots/robots-fetch.js';
export {
  RobotsTxtParser,
  parseRobotsTxt,
  isAllowedByRobots,
  createRobotsPolicy,
} from './robots/robots-parser.js';
export { TransportError } from './robots/faults.js';
export { HttpFetcher, normalizeHeaders } from './fetch/http-fetcher.js';
export {
  ResolverConfigSchema,
  parseResolverConfig,
  loadResolverConfig,
  loadResolverConfigFile,
  normalizeAgentNames,
} from './config/resolver-config.js';
export type { RobotsResolverOptions } from './robots/resolver.js';
export type {
  CacheTierConfig,
  CacheTierName,
  DualTierCacheConfig,
} from './robots/rule-cache.js';
export type { RobotsFetchOptions, RobotsFetchResult } from './robots/robots-fetch.js';
export type { RobotsRule, RobotsTxt } from './robots/robots-parser.js';
export type { FaultKind, FetchOutcome, RobotsFault } from './robots/faults.js';
export type {
  FetchMetadata,
  Fetcher,
  PolicyKind,
  PolicyParser,
  ProtocolResponse,
  RobotsPolicy,
} from './robots/types.js';
export type {
  HttpFetcherOptions,
  HttpRequestFn,
  HttpRequestOptions,
  HttpResponseData,
} from './fetch/http-fetcher.js';
export type { ResolverConfig } from './config/resolver-config.js';
