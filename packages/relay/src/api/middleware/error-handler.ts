/**
 * Error handler: Hono onError handler converting errors to `{ error, ... }` JSON.
 *
 * - RelayError: responds with error.httpStatus and error.toJSON()
 * - ZodError: responds with 400 and the validation issues
 * - Anything else: responds with 500
 *
 * Every converted error is logged with the request id.
 */

import type { ErrorHandler } from 'hono';
import { ZodError } from 'zod';
import { RelayError } from '@qbo-relay/core';
import type { AppEnv } from '../app-env.js';

const LOG_PREFIX = '[qbo-relay]';

export const errorHandler: ErrorHandler<AppEnv> = (err, c) => {
  const requestId = c.get('requestId');

  if (err instanceof RelayError) {
    const upstream = err.upstreamStatus !== undefined ? ` (upstream ${err.upstreamStatus})` : '';
    const line = `${LOG_PREFIX} ${err.code}: ${err.message}${upstream} [${requestId}]`;
    if (err.httpStatus >= 500) {
      console.error(line, err.cause ?? '');
    } else {
      console.warn(line);
    }
    return c.json(err.toJSON(), err.httpStatus);
  }

  if (err instanceof ZodError) {
    console.warn(`${LOG_PREFIX} Validation error [${requestId}]`);
    return c.json({ error: 'Invalid request', details: err.issues }, 400);
  }

  console.error(`${LOG_PREFIX} Unhandled error [${requestId}]:`, err);
  return c.json({ error: 'Internal server error' }, 500);
};
