export type ErrorDomain = 'AUTH' | 'REQUEST' | 'UPSTREAM' | 'TRANSPORT' | 'SYSTEM';

export interface ErrorCodeEntry {
  code: string;
  domain: ErrorDomain;
  httpStatus: number;
  message: string;
}

/**
 * Relay error code matrix.
 *
 * `httpStatus` is the status the relay answers with, not the upstream one;
 * the upstream status travels separately on the error as `upstreamStatus`.
 */
export const ERROR_CODES = {
  // --- AUTH domain ---
  UNAUTHENTICATED: {
    code: 'UNAUTHENTICATED',
    domain: 'AUTH',
    httpStatus: 401,
    message: 'Not authenticated',
  },

  // --- REQUEST domain ---
  MISSING_CALLBACK_PARAMS: {
    code: 'MISSING_CALLBACK_PARAMS',
    domain: 'REQUEST',
    httpStatus: 400,
    message: 'Missing code or state parameter',
  },
  INVALID_REQUEST: {
    code: 'INVALID_REQUEST',
    domain: 'REQUEST',
    httpStatus: 400,
    message: 'Invalid request',
  },

  // --- UPSTREAM domain ---
  TOKEN_REQUEST_FAILED: {
    code: 'TOKEN_REQUEST_FAILED',
    domain: 'UPSTREAM',
    httpStatus: 502,
    message: 'Token request failed',
  },
  UPSTREAM_ERROR: {
    code: 'UPSTREAM_ERROR',
    domain: 'UPSTREAM',
    httpStatus: 502,
    message: 'QuickBooks request failed',
  },
  UPSTREAM_INVALID_RESPONSE: {
    code: 'UPSTREAM_INVALID_RESPONSE',
    domain: 'UPSTREAM',
    httpStatus: 502,
    message: 'Unexpected response from QuickBooks',
  },

  // --- TRANSPORT domain ---
  UPSTREAM_UNREACHABLE: {
    code: 'UPSTREAM_UNREACHABLE',
    domain: 'TRANSPORT',
    httpStatus: 502,
    message: 'Could not reach QuickBooks',
  },
  UPSTREAM_TIMEOUT: {
    code: 'UPSTREAM_TIMEOUT',
    domain: 'TRANSPORT',
    httpStatus: 504,
    message: 'QuickBooks request timed out',
  },

  // --- SYSTEM domain ---
  OAUTH_NOT_CONFIGURED: {
    code: 'OAUTH_NOT_CONFIGURED',
    domain: 'SYSTEM',
    httpStatus: 500,
    message: 'OAuth client is not configured',
  },
  SESSION_PERSIST_FAILED: {
    code: 'SESSION_PERSIST_FAILED',
    domain: 'SYSTEM',
    httpStatus: 500,
    message: 'Failed to persist session',
  },
} as const satisfies Record<string, ErrorCodeEntry>;

export type ErrorCode = keyof typeof ERROR_CODES;

/** Outer HTTP statuses the relay can answer an error with. */
export type ErrorHttpStatus = (typeof ERROR_CODES)[ErrorCode]['httpStatus'];
