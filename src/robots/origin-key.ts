/**
 * Origin cache keys: robots.txt rules apply per scheme, host and port.
 */

const DEFAULT_PORTS = new Map<string, number>([
  ['http', 80],
  ['https', 443],
  ['ftp', 21],
  ['ws', 80],
  ['wss', 443],
]);

/** Default port for a scheme, or -1 when the scheme has none. */
export function defaultPort(scheme: string): number {
  return DEFAULT_PORTS.get(scheme) ?? -1;
}

/**
 * Derive `scheme:host:port` for a URL. Path, query and fragment are ignored;
 * scheme and host are lower-cased and a missing port becomes the default one.
 * Throws a TypeError for a string that is not a URL.
 */
export function deriveKey(url: URL | string): string {
  const parsed = typeof url === 'string' ? new URL(url) : url;
  const scheme = parsed.protocol.replace(/:$/, '').toLowerCase();
  const host = parsed.hostname.toLowerCase();
  const port = parsed.port ? parseInt(parsed.port, 10) : defaultPort(scheme);
  return `${scheme}:${host}:${port}`;
}

/** Case-insensitive host comparison, as used for redirect bookkeeping. */
export function sameHost(a: URL, b: URL): boolean {
  return a.hostname.toLowerCase() === b.hostname.toLowerCase();
}
