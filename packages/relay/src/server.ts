import { Hono } from 'hono';
import { requestId, requestLogger, errorHandler } from './api/middleware/index.js';
import { createAuthRoutes } from './api/routes/auth.js';
import { createStatusRoutes } from './api/routes/status.js';
import { createAccountingRoutes } from './api/routes/accounting.js';
import type { AppEnv } from './api/app-env.js';
import type { SessionStore } from './session/session-store.js';
import type { IOAuthProvider } from './oauth/oauth-provider.js';
import type { QboClient, QboCredentials } from './quickbooks/qbo-client.js';

export interface ServerOpts {
  store: SessionStore;
  /** Builds a provider from the current environment; called once per request. */
  oauthProvider: () => IOAuthProvider;
  qboClient: (credentials: QboCredentials) => QboClient;
}

export function createServer(opts: ServerOpts): Hono<AppEnv> {
  const app = new Hono<AppEnv>();
  const { store, oauthProvider, qboClient } = opts;

  app.use('*', requestId);
  app.use('*', requestLogger);
  app.onError(errorHandler);
  app.notFound((c) => c.json({ error: 'Not found' }, 404));

  app.route('/', createStatusRoutes({ store, oauthProvider, qboClient }));
  app.route('/', createAuthRoutes({ store, oauthProvider }));
  app.route('/', createAccountingRoutes({ store, qboClient }));

  return app;
}
