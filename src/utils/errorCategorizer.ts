/**
 * Classifies faults raised by the outbound HTTP clients (image search and
 * generative ranking) so retry decisions key off a type instead of
 * matching on error-message text.
 */
import { isAxiosError } from 'axios';

export type TransientReason = 'rate_limited' | 'unavailable';

export type TransportFault =
  | { kind: 'transient'; reason: TransientReason; status?: number }
  | { kind: 'permanent'; status?: number };

const UNAVAILABLE_STATUSES = new Set([500, 502, 503, 504]);
const UNAVAILABLE_CODES = new Set([
  'ECONNABORTED',
  'ECONNRESET',
  'ECONNREFUSED',
  'ENOTFOUND',
  'EAI_AGAIN',
  'ETIMEDOUT',
  'ERR_NETWORK',
]);

export function classifyHttpStatus(status: number): TransportFault {
  if (status === 429) {
    return { kind: 'transient', reason: 'rate_limited', status };
  }
  if (UNAVAILABLE_STATUSES.has(status)) {
    return { kind: 'transient', reason: 'unavailable', status };
  }
  return { kind: 'permanent', status };
}

export function classifyTransportError(error: unknown): TransportFault {
  if (error instanceof HttpStatusError) {
    return classifyHttpStatus(error.status);
  }

  if (isAxiosError(error)) {
    if (error.response) {
      return classifyHttpStatus(error.response.status);
    }
    if (error.code && UNAVAILABLE_CODES.has(error.code)) {
      return { kind: 'transient', reason: 'unavailable' };
    }
  }

  return { kind: 'permanent' };
}

/**
 * Raised by clients that accept every status code and then reject the
 * ones they cannot use.
 */
export class HttpStatusError extends Error {
  constructor(public status: number, message?: string) {
    super(message ?? `Unexpected HTTP status ${status}`);
    this.name = 'HttpStatusError';
  }
}
