/**
 * Parse robots.txt into Allow/Disallow rules for the configured agents,
 * plus Crawl-delay and Sitemap directives.
 */
import { logger } from '../logger.js';
import { ALLOW_ALL } from './rule-set.js';
import type { PolicyParser, RobotsPolicy } from './types.js';

export interface RobotsRule {
  path: string;
  allow: boolean;
}

export interface RobotsTxt {
  rules: RobotsRule[];
  crawlDelayMs: number | null;
  sitemapUrls: string[];
}

interface AgentGroup {
  agents: string[];
  rules: RobotsRule[];
  crawlDelayMs: number | null;
}

/**
 * Split robots.txt into user-agent groups. Consecutive User-agent lines share
 * one group; the first rule line closes the agent list.
 */
function readGroups(content: string): { groups: AgentGroup[]; sitemapUrls: string[] } {
  const groups: AgentGroup[] = [];
  const sitemapUrls: string[] = [];
  let current: AgentGroup | null = null;
  let collectingAgents = false;

  for (const rawLine of content.split(/\r\n|\r|\n/)) {
    const hashIdx = rawLine.indexOf('#');
    const line = (hashIdx === -1 ? rawLine : rawLine.slice(0, hashIdx)).trim();
    if (!line) continue;

    const colonIdx = line.indexOf(':');
    if (colonIdx === -1) continue;

    const field = line.slice(0, colonIdx).trim().toLowerCase();
    const value = line.slice(colonIdx + 1).trim();

    if (field === 'sitemap') {
      if (value) sitemapUrls.push(value);
      continue;
    }

    if (field === 'user-agent') {
      if (!current || !collectingAgents) {
        current = { agents: [], rules: [], crawlDelayMs: null };
        groups.push(current);
        collectingAgents = true;
      }
      current.agents.push(value.toLowerCase());
      continue;
    }

    // Rules before any User-agent line belong to no group
    if (!current) continue;
    collectingAgents = false;

    if (field === 'disallow' || field === 'allow') {
      // An empty Disallow allows everything, which is the default anyway
      if (value) current.rules.push({ path: value, allow: field === 'allow' });
    } else if (field === 'crawl-delay') {
      const seconds = parseFloat(value);
      if (!isNaN(seconds) && seconds >= 0) current.crawlDelayMs = Math.round(seconds * 1000);
    }
  }

  return { groups, sitemapUrls };
}

function groupsFor(groups: AgentGroup[], agent: string): AgentGroup[] {
  return groups.filter((group) => group.agents.includes(agent));
}

/**
 * Parse robots.txt content for an ordered list of agent names.
 * The first name with a group of its own wins; otherwise the `*` group applies.
 * Groups naming the same agent are merged.
 */
export function parseRobotsTxt(content: string, agentNames: readonly string[] = ['*']): RobotsTxt {
  const { groups, sitemapUrls } = readGroups(content);

  let selected: AgentGroup[] = [];
  for (const name of agentNames) {
    const agent = name.trim().toLowerCase();
    if (!agent || agent === '*') continue;
    selected = groupsFor(groups, agent);
    if (selected.length > 0) break;
  }
  if (selected.length === 0) selected = groupsFor(groups, '*');

  const rules = selected.flatMap((group) => group.rules);
  const delays = selected
    .map((group) => group.crawlDelayMs)
    .filter((delay): delay is number => delay !== null);

  return {
    rules,
    crawlDelayMs: delays.length > 0 ? delays[0] : null,
    sitemapUrls,
  };
}

interface PathPattern {
  /** Literal pieces between `*` wildcards. */
  segments: string[];
  /** A trailing `$` pins the last segment to the end of the path. */
  anchored: boolean;
}

function compilePattern(pattern: string): PathPattern {
  const anchored = pattern.endsWith('$');
  const body = anchored ? pattern.slice(0, -1) : pattern;
  return { segments: body.split('*'), anchored };
}

/**
 * Match a path against a compiled pattern. Each segment is taken at its
 * leftmost position after the previous one, so the scan is linear in the
 * path length for each segment and never backtracks.
 */
function matchesPattern(urlPath: string, { segments, anchored }: PathPattern): boolean {
  const first = segments[0];
  if (!urlPath.startsWith(first)) return false;
  if (segments.length === 1) return anchored ? urlPath.length === first.length : true;

  let pos = first.length;
  const lastIdx = segments.length - 1;
  for (let i = 1; i < lastIdx; i++) {
    const found = urlPath.indexOf(segments[i], pos);
    if (found === -1) return false;
    pos = found + segments[i].length;
  }

  const last = segments[lastIdx];
  if (!anchored) return urlPath.indexOf(last, pos) !== -1;
  return urlPath.length - last.length >= pos && urlPath.endsWith(last);
}

/** Path plus query of a URL, or the input itself when it is already a path. */
function pathOf(url: string): string {
  if (url.startsWith('/')) return url;
  try {
    const parsed = new URL(url);
    return `${parsed.pathname}${parsed.search}`;
  } catch {
    return `/${url}`;
  }
}

interface CompiledRule extends RobotsRule {
  pattern: PathPattern;
}

/**
 * Check a path against rules. The longest matching pattern decides and Allow
 * wins a tie. /robots.txt itself is always allowed.
 */
export function isAllowedByRobots(urlPath: string, rules: readonly RobotsRule[]): boolean {
  return decide(
    urlPath,
    rules.map((rule) => ({ ...rule, pattern: compilePattern(rule.path) }))
  );
}

function decide(urlPath: string, rules: readonly CompiledRule[]): boolean {
  if (urlPath === '/robots.txt') return true;

  let best: CompiledRule | null = null;
  for (const rule of rules) {
    if (!matchesPattern(urlPath, rule.pattern)) continue;
    if (
      !best ||
      rule.path.length > best.path.length ||
      (rule.path.length === best.path.length && rule.allow)
    ) {
      best = rule;
    }
  }
  return best ? best.allow : true;
}

class ParsedRobotsPolicy implements RobotsPolicy {
  readonly kind = 'parsed';
  readonly allowsAll: boolean;
  readonly allowsNone: boolean;
  readonly crawlDelayMs: number | null;
  readonly sitemaps: readonly string[];
  private readonly rules: readonly CompiledRule[];

  constructor(parsed: RobotsTxt) {
    this.rules = parsed.rules.map((rule) => ({ ...rule, pattern: compilePattern(rule.path) }));
    this.allowsAll = !parsed.rules.some((rule) => !rule.allow);
    this.allowsNone =
      !parsed.rules.some((rule) => rule.allow) &&
      parsed.rules.some((rule) => rule.path === '/' || rule.path === '/*');
    this.crawlDelayMs = parsed.crawlDelayMs;
    this.sitemaps = Object.freeze([...parsed.sitemapUrls]);
    Object.freeze(this);
  }

  isAllowed(url: string): boolean {
    return decide(pathOf(url), this.rules);
  }
}

/** Create a policy from already-decoded robots.txt content. */
export function createRobotsPolicy(content: string, agentNames: readonly string[]): RobotsPolicy {
  return new ParsedRobotsPolicy(parseRobotsTxt(content, agentNames));
}

/**
 * Default parser. Bodies must be UTF-8 (a BOM is dropped); anything else
 * throws. An HTML page served in place of robots.txt grants everything.
 */
export class RobotsTxtParser implements PolicyParser {
  private readonly decoder = new TextDecoder('utf-8', { fatal: true });

  parse(
    url: string,
    body: Uint8Array,
    contentType: string,
    agentNames: readonly string[]
  ): RobotsPolicy {
    const content = this.decoder.decode(body);

    if (contentType.toLowerCase().startsWith('text/html') && content.trimStart().startsWith('<')) {
      logger.debug({ url, contentType }, 'robots.txt served as HTML, allowing all');
      return ALLOW_ALL;
    }

    const policy = createRobotsPolicy(content, agentNames);
    logger.debug(
      { url, allowsAll: policy.allowsAll, sitemapCount: policy.sitemaps.length },
      'Parsed robots.txt'
    );
    return policy;
  }
}
