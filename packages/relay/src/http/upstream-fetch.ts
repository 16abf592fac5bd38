import { RelayError } from '@qbo-relay/core';

export const DEFAULT_TIMEOUT_MS = 30_000;

/**
 * fetch() with a timeout, converting transport failures into RelayError.
 *
 * HTTP error statuses are returned as-is; classifying them is the caller's job.
 */
export async function fetchUpstream(
  url: string,
  init: RequestInit,
  timeoutMs: number = DEFAULT_TIMEOUT_MS,
): Promise<Response> {
  try {
    return await fetch(url, { ...init, signal: AbortSignal.timeout(timeoutMs) });
  } catch (err) {
    const cause = err instanceof Error ? err : undefined;
    // AbortSignal.timeout() rejects with a DOMException named TimeoutError
    if (isTimeout(err)) {
      throw new RelayError('UPSTREAM_TIMEOUT', { cause });
    }
    throw new RelayError('UPSTREAM_UNREACHABLE', { cause });
  }
}

function isTimeout(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'name' in err && err.name === 'TimeoutError';
}

/**
 * Race a promise against a timer. Rejects with UPSTREAM_TIMEOUT when the timer
 * fires first; the underlying call is not cancelled.
 */
export function withTimeout<T>(promise: Promise<T>, ms: number = DEFAULT_TIMEOUT_MS): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new RelayError('UPSTREAM_TIMEOUT', { message: `QuickBooks request timed out after ${ms}ms` }));
    }, ms);

    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (err: unknown) => {
        clearTimeout(timer);
        reject(err);
      },
    );
  });
}

/** Parse a response body as JSON, treating a malformed body as an upstream fault. */
export async function readJson(res: Response): Promise<unknown> {
  try {
    const body: unknown = await res.json();
    return body;
  } catch (err) {
    throw new RelayError('UPSTREAM_INVALID_RESPONSE', {
      cause: err instanceof Error ? err : undefined,
    });
  }
}
