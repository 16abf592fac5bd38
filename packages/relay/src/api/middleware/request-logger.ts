/**
 * Request logger middleware: logs method, path, status, duration and request id.
 *
 * Format: [REQ] GET /customers 200 12ms 0192...
 */

import { createMiddleware } from 'hono/factory';
import type { AppEnv } from '../app-env.js';

export const requestLogger = createMiddleware<AppEnv>(async (c, next) => {
  const start = Date.now();

  await next();

  const duration = Date.now() - start;
  console.log(`[REQ] ${c.req.method} ${c.req.path} ${c.res.status} ${duration}ms ${c.get('requestId')}`);
});
