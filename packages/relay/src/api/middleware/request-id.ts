/**
 * Request ID middleware: attaches a UUID v7 to every request.
 *
 * - Uses the client's X-Request-Id header when present
 * - Sets X-Request-Id on the response
 * - Stores the id in c.set('requestId', id) for the logger and error handler
 */

import { createMiddleware } from 'hono/factory';
import { uuidv7 } from 'uuidv7';
import type { AppEnv } from '../app-env.js';

export const requestId = createMiddleware<AppEnv>(async (c, next) => {
  const clientId = c.req.header('X-Request-Id');
  const id = clientId || uuidv7();

  c.set('requestId', id);
  c.header('X-Request-Id', id);

  await next();
});
