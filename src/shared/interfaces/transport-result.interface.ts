import type { Readable } from 'stream';

export enum TransportErrorCode {
  NETWORK_ERROR = 'NETWORK_ERROR',
  HTTP_STATUS = 'HTTP_STATUS',
  INVALID_BODY = 'INVALID_BODY',
}

export interface TransportFailure {
  code: TransportErrorCode;
  message: string;
  url: string;
  statusCode?: number;
}

/**
 * Outcome of one request. Callers decide retry, skip or propagate from
 * `error.code`; the transport never retries on its own.
 */
export type TransportResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: TransportFailure };

export interface StreamResponse {
  statusCode: number;
  headers: Record<string, string | string[] | undefined>;
  body: Readable;
}

export function transportSuccess<T>(value: T): TransportResult<T> {
  return { ok: true, value };
}

export function transportFailure<T>(error: TransportFailure): TransportResult<T> {
  return { ok: false, error };
}

export function describeFailure(failure: TransportFailure): string {
  return failure.code === TransportErrorCode.HTTP_STATUS
    ? `HTTP ${failure.statusCode ?? '?'} from ${failure.url}`
    : `${failure.message} (${failure.url})`;
}
