/**
 * Shared test helpers: response builders and a scripted in-process fetcher.
 */
import type { FetchMetadata, Fetcher, ProtocolResponse } from '../robots/types.js';

// ---------------------------------------------------------------------------
// Response builders
// ---------------------------------------------------------------------------

/** Build a response with a UTF-8 text body. */
export function makeResponse(
  statusCode: number,
  body = '',
  headers: Record<string, string> = {}
): ProtocolResponse {
  return { statusCode, headers, body: new TextEncoder().encode(body) };
}

/** Build a plain-text robots.txt 200 response. */
export function makeRobotsResponse(content: string): ProtocolResponse {
  return makeResponse(200, content, { 'content-type': 'text/plain' });
}

/** Build a redirect response pointing at `location`. */
export function makeRedirect(location: string, statusCode = 301): ProtocolResponse {
  return makeResponse(statusCode, '', { location });
}

// ---------------------------------------------------------------------------
// Fetcher
// ---------------------------------------------------------------------------

type Reply = ProtocolResponse | Error | (() => Promise<ProtocolResponse>);

/**
 * Fetcher answering from a URL -> reply table. Unknown URLs get a 404;
 * an Error reply is thrown. Every call is recorded.
 */
export class ScriptedFetcher implements Fetcher {
  readonly calls: Array<{ url: string; metadata: FetchMetadata }> = [];
  private readonly replies = new Map<string, Reply>();

  constructor(replies: Record<string, Reply> = {}) {
    for (const [url, reply] of Object.entries(replies)) {
      this.replies.set(url, reply);
    }
  }

  on(url: string, reply: Reply): this {
    this.replies.set(url, reply);
    return this;
  }

  get urls(): string[] {
    return this.calls.map((call) => call.url);
  }

  async getResponse(url: string, metadata: FetchMetadata): Promise<ProtocolResponse> {
    this.calls.push({ url, metadata });
    const reply = this.replies.get(url);
    if (reply === undefined) return makeResponse(404);
    if (reply instanceof Error) throw reply;
    if (typeof reply === 'function') return reply();
    return reply;
  }
}
