/**
 * Fetcher over undici. Redirects are not followed here: the resolver
 * decides how many hops to take.
 */
import { request } from 'undici';
import { logger } from '../logger.js';
import { TransportError, describeError } from '../robots/faults.js';
import type { FetchMetadata, Fetcher, ProtocolResponse } from '../robots/types.js';

export const DEFAULT_USER_AGENT = 'robots-resolver/0.1';
export const DEFAULT_TIMEOUT_MS = 10_000;
/** Larger robots.txt files are rejected rather than truncated. */
export const DEFAULT_MAX_BODY_BYTES = 512 * 1024;

type RawHeaders = Record<string, string | string[] | undefined>;

export interface HttpRequestOptions {
  method: 'GET';
  headers: Record<string, string>;
  headersTimeout: number;
  bodyTimeout: number;
}

export interface HttpResponseData {
  statusCode: number;
  headers: RawHeaders;
  body: AsyncIterable<Uint8Array> & { destroy(error?: Error): unknown };
}

export type HttpRequestFn = (url: string, options: HttpRequestOptions) => Promise<HttpResponseData>;

export interface HttpFetcherOptions {
  userAgent?: string;
  timeoutMs?: number;
  maxBodyBytes?: number;
  /** Replaces undici's request, e.g. to route through a custom dispatcher. */
  request?: HttpRequestFn;
}

/** Lower-case header names and keep the first value of repeated headers. */
export function normalizeHeaders(headers: RawHeaders): Record<string, string> {
  const normalized: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    const first = Array.isArray(value) ? value[0] : value;
    if (first !== undefined) normalized[name.toLowerCase()] = first;
  }
  return normalized;
}

export class HttpFetcher implements Fetcher {
  private readonly userAgent: string;
  private readonly timeoutMs: number;
  private readonly maxBodyBytes: number;
  private readonly send: HttpRequestFn;

  constructor(options: HttpFetcherOptions = {}) {
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.maxBodyBytes = options.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES;
    this.send = options.request ?? request;
  }

  async getResponse(url: string, metadata: FetchMetadata): Promise<ProtocolResponse> {
    const headers: Record<string, string> = {
      'user-agent': this.userAgent,
      accept: 'text/plain,*/*;q=0.8',
    };
    for (const [name, values] of Object.entries(metadata)) {
      headers[name.toLowerCase()] = values.join(', ');
    }

    let response: HttpResponseData;
    try {
      response = await this.send(url, {
        method: 'GET',
        headers,
        headersTimeout: this.timeoutMs,
        bodyTimeout: this.timeoutMs,
      });
    } catch (error) {
      throw new TransportError('network', `Request to ${url} failed: ${describeError(error)}`, {
        cause: error,
      });
    }

    const responseHeaders = normalizeHeaders(response.headers);
    const contentLength = parseInt(responseHeaders['content-length'] ?? '', 10);
    if (!isNaN(contentLength) && contentLength > this.maxBodyBytes) {
      response.body.destroy();
      throw new TransportError(
        'protocol',
        `Content-Length ${contentLength} of ${url} exceeds ${this.maxBodyBytes} bytes`
      );
    }

    const body = await this.readBody(url, response.body);
    logger.debug(
      { url, statusCode: response.statusCode, bodyLength: body.byteLength },
      'HTTP request complete'
    );

    return { statusCode: response.statusCode, headers: responseHeaders, body };
  }

  private async readBody(url: string, body: HttpResponseData['body']): Promise<Uint8Array> {
    const chunks: Uint8Array[] = [];
    let size = 0;

    try {
      for await (const chunk of body) {
        size += chunk.byteLength;
        if (size > this.maxBodyBytes) {
          body.destroy();
          throw new TransportError('protocol', `Body of ${url} exceeds ${this.maxBodyBytes} bytes`);
        }
        chunks.push(chunk);
      }
    } catch (error) {
      if (error instanceof TransportError) throw error;
      throw new TransportError('network', `Reading ${url} failed: ${describeError(error)}`, {
        cause: error,
      });
    }

    return Buffer.concat(chunks);
  }
}
