/**
 * Fault values for the robots fetch path. Failures are carried as data and
 * matched on their kind instead of being rethrown.
 */
import type { ProtocolResponse } from './types.js';

export type FaultKind = 'network' | 'protocol' | 'parse';

export interface RobotsFault {
  kind: FaultKind;
  url: string;
  message: string;
}

export type FetchOutcome =
  | { ok: true; response: ProtocolResponse }
  | { ok: false; fault: RobotsFault };

/**
 * Error a fetcher may reject with to classify its own failure. Any other
 * rejection counts as a network fault.
 */
export class TransportError extends Error {
  readonly kind: Exclude<FaultKind, 'parse'>;

  constructor(kind: Exclude<FaultKind, 'parse'>, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransportError';
    this.kind = kind;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function faultFromRejection(url: string, error: unknown): RobotsFault {
  const kind = error instanceof TransportError ? error.kind : 'network';
  return { kind, url, message: describeError(error) };
}
