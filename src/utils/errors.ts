import type { ErrorCode } from '../types/common.js';

export interface ListErrorDetails {
  status?: number;
  url?: string;
  cause?: unknown;
}

/**
 * Single error type for every failure of a list export. Callers switch on
 * `code`; `status` is set for HTTP_ERROR.
 */
export class ListError extends Error {
  readonly code: ErrorCode;
  readonly status?: number;
  readonly url?: string;

  constructor(code: ErrorCode, message: string, details: ListErrorDetails = {}) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.name = 'ListError';
    this.code = code;
    this.status = details.status;
    this.url = details.url;
  }
}

export function isListError(error: unknown): error is ListError {
  return error instanceof ListError;
}

export function invalidArgument(message: string): ListError {
  return new ListError('INVALID_ARGUMENT', message);
}

export function httpError(status: number, url: string): ListError {
  return new ListError('HTTP_ERROR', `HTTP Error ${status} for ${url}`, { status, url });
}

export function transportError(url: string, cause: unknown): ListError {
  const reason = cause instanceof Error ? cause.message : String(cause);
  return new ListError('TRANSPORT_ERROR', `Request to ${url} failed: ${reason}`, { url, cause });
}
