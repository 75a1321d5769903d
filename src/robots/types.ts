/**
 * Types shared by the robots.txt resolution pipeline
 */

/** Per-request metadata handed to a fetcher. The resolver always sends none. */
export type FetchMetadata = Readonly<Record<string, readonly string[]>>;

export interface ProtocolResponse {
  statusCode: number;
  /** Header names are lower-case; repeated headers keep their first value. */
  headers: Readonly<Record<string, string>>;
  body: Uint8Array;
}

/**
 * Transport capability. Implementations reject on network or protocol
 * failures (timeouts included); the resolver never lets that escape.
 */
export interface Fetcher {
  getResponse(url: string, metadata: FetchMetadata): Promise<ProtocolResponse>;
}

export type PolicyKind = 'parsed' | 'allow-all' | 'forbid-all' | 'empty';

export interface RobotsPolicy {
  readonly kind: PolicyKind;
  /** True when no path of the origin is disallowed. */
  readonly allowsAll: boolean;
  /** True when every path of the origin is disallowed. */
  readonly allowsNone: boolean;
  readonly crawlDelayMs: number | null;
  readonly sitemaps: readonly string[];
  /** Accepts an absolute URL or a path on the policy's origin. */
  isAllowed(url: string): boolean;
}

/** robots.txt grammar. May throw on a body it cannot read. */
export interface PolicyParser {
  parse(
    url: string,
    body: Uint8Array,
    contentType: string,
    agentNames: readonly string[]
  ): RobotsPolicy;
}
