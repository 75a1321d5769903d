/**
 * Fetch /robots.txt for an origin, follow at most one redirect and map the
 * HTTP outcome to a policy and a cacheability verdict.
 */
import { z } from 'zod';
import { logger } from '../logger.js';
import { describeError, faultFromRejection } from './faults.js';
import type { FetchOutcome, RobotsFault } from './faults.js';
import { EMPTY_RULES, FORBID_ALL } from './rule-set.js';
import type { FetchMetadata, Fetcher, PolicyParser, ProtocolResponse, RobotsPolicy } from './types.js';

export const EMPTY_METADATA: FetchMetadata = Object.freeze({});

const REDIRECT_CODES = new Set([301, 302, 307, 308]);
const SCHEME_PREFIX = /^[a-z][a-z0-9+.-]*:/i;

export interface RobotsFetchOptions {
  /** Treat HTTP 403 as "no rules" instead of "forbid all". */
  allowForbidden: boolean;
  agentNames: readonly string[];
  parser: PolicyParser;
}

export interface RobotsFetchResult {
  policy: RobotsPolicy;
  /** False for transient failures, which belong in the error tier. */
  cacheable: boolean;
  /** Target of the redirect that was followed, if any. */
  redirect: URL | null;
}

/** Shape a fetcher must resolve with; header names come out lower-cased. */
const ProtocolResponseSchema = z.object({
  statusCode: z.number().int(),
  headers: z
    .record(z.string())
    .transform((headers) =>
      Object.fromEntries(
        Object.entries(headers).map(([name, value]): [string, string] => [name.toLowerCase(), value])
      )
    ),
  body: z.instanceof(Uint8Array),
});

type Parsed = { ok: true; policy: RobotsPolicy } | { ok: false; fault: RobotsFault };
type RedirectTarget = { ok: true; url: URL } | { ok: false; fault: RobotsFault };

async function attempt(fetcher: Fetcher, url: string): Promise<FetchOutcome> {
  try {
    const response: unknown = await fetcher.getResponse(url, EMPTY_METADATA);
    const checked = ProtocolResponseSchema.safeParse(response);
    if (!checked.success) {
      const issues = checked.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      return {
        ok: false,
        fault: { kind: 'protocol', url, message: `Malformed response: ${issues}` },
      };
    }
    return { ok: true, response: checked.data };
  } catch (error) {
    return { ok: false, fault: faultFromRejection(url, error) };
  }
}

/** Resolve a Location value; one without a scheme is relative to the original URL. */
function resolveRedirectTarget(location: string, base: URL): RedirectTarget {
  try {
    const url = SCHEME_PREFIX.test(location) ? new URL(location) : new URL(location, base);
    return { ok: true, url };
  } catch (error) {
    return {
      ok: false,
      fault: {
        kind: 'protocol',
        url: base.href,
        message: `Malformed redirect location "${location}": ${describeError(error)}`,
      },
    };
  }
}

function parsePolicy(
  url: URL,
  response: ProtocolResponse,
  options: RobotsFetchOptions
): Parsed {
  const contentType = response.headers['content-type'] ?? '';
  try {
    const policy = options.parser.parse(url.href, response.body, contentType, options.agentNames);
    return { ok: true, policy };
  } catch (error) {
    return { ok: false, fault: { kind: 'parse', url: url.href, message: describeError(error) } };
  }
}

function degrade(fault: RobotsFault, redirect: URL | null): RobotsFetchResult {
  logger.info(
    { url: fault.url, fault: fault.kind, error: fault.message },
    "Couldn't get robots.txt"
  );
  return { policy: EMPTY_RULES, cacheable: false, redirect };
}

function classify(
  url: URL,
  response: ProtocolResponse,
  redirect: URL | null,
  options: RobotsFetchOptions
): RobotsFetchResult {
  const { statusCode } = response;

  if (statusCode === 200) {
    const parsed = parsePolicy(url, response, options);
    if (!parsed.ok) return degrade(parsed.fault, redirect);
    return { policy: parsed.policy, cacheable: true, redirect };
  }
  if (statusCode === 403 && !options.allowForbidden) {
    return { policy: FORBID_ALL, cacheable: true, redirect };
  }
  if (statusCode >= 500) {
    logger.debug({ url: url.href, statusCode }, 'Server error on robots.txt, not caching');
    return { policy: EMPTY_RULES, cacheable: false, redirect };
  }
  // 404, 403 under allowForbidden, unfollowed 3xx and the rest: no rules
  return { policy: EMPTY_RULES, cacheable: true, redirect };
}

/**
 * Retrieve robots.txt for the origin of `url`. Never rejects: faults become a
 * non-cacheable permissive policy.
 */
export async function fetchRobots(
  fetcher: Fetcher,
  url: URL,
  options: RobotsFetchOptions
): Promise<RobotsFetchResult> {
  let robotsUrl: string;
  try {
    robotsUrl = new URL('/robots.txt', url).href;
  } catch (error) {
    return degrade(
      { kind: 'protocol', url: url.href, message: `No robots.txt location: ${describeError(error)}` },
      null
    );
  }
  let redirect: URL | null = null;
  let outcome = await attempt(fetcher, robotsUrl);

  // One hop only; a second redirect is classified like any other status
  if (outcome.ok && REDIRECT_CODES.has(outcome.response.statusCode)) {
    const location = (outcome.response.headers['location'] ?? '').trim();
    if (location) {
      const target = resolveRedirectTarget(location, url);
      if (!target.ok) return degrade(target.fault, null);
      redirect = target.url;
      logger.debug({ from: robotsUrl, to: redirect.href }, 'Following robots.txt redirect');
      outcome = await attempt(fetcher, redirect.href);
    }
  }

  if (!outcome.ok) return degrade(outcome.fault, redirect);
  return classify(url, outcome.response, redirect, options);
}
