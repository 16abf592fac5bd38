import { ERROR_CODES, type ErrorCode, type ErrorDomain, type ErrorHttpStatus } from './error-codes.js';

export interface RelayErrorBody {
  error: string;
  status_code?: number;
  details?: unknown;
}

export class RelayError extends Error {
  readonly code: ErrorCode;
  readonly domain: ErrorDomain;
  readonly httpStatus: ErrorHttpStatus;
  /** Status returned by QuickBooks or the token endpoint, when there was one. */
  readonly upstreamStatus?: number;
  readonly details?: unknown;

  constructor(
    code: ErrorCode,
    options?: {
      message?: string;
      upstreamStatus?: number;
      details?: unknown;
      cause?: Error;
    },
  ) {
    const entry = ERROR_CODES[code];
    super(options?.message ?? entry.message);
    this.name = 'RelayError';
    this.code = code;
    this.domain = entry.domain;
    this.httpStatus = entry.httpStatus;
    this.upstreamStatus = options?.upstreamStatus;
    this.details = options?.details;
    if (options?.cause) this.cause = options.cause;
  }

  toJSON(): RelayErrorBody {
    return {
      error: this.message,
      ...(this.upstreamStatus !== undefined && { status_code: this.upstreamStatus }),
      ...(this.details !== undefined && { details: this.details }),
    };
  }
}

export function isRelayError(err: unknown): err is RelayError {
  return err instanceof RelayError;
}
