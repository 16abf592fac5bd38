/**
 * Status routes.
 *
 * GET /        - welcome message with the authorized company's name. When a
 *                session exists but the company lookup fails, one token
 *                refresh is attempted so the next call can succeed.
 * GET /health  - liveness plus whether a session is held. No upstream call.
 */

import { Hono } from 'hono';
import { isRelayError } from '@qbo-relay/core';
import type { AppEnv } from '../app-env.js';
import type { SessionStore } from '../../session/session-store.js';
import type { IOAuthProvider } from '../../oauth/oauth-provider.js';
import type { QboClient, QboCredentials } from '../../quickbooks/qbo-client.js';
import { requireCredentials } from '../helpers/credentials.js';

const LOG_PREFIX = '[qbo-relay]';

export interface StatusRoutesOpts {
  store: SessionStore;
  oauthProvider: () => IOAuthProvider;
  qboClient: (credentials: QboCredentials) => QboClient;
}

export function createStatusRoutes(opts: StatusRoutesOpts): Hono<AppEnv> {
  const app = new Hono<AppEnv>();
  const { store, oauthProvider, qboClient } = opts;

  async function lookupCompanyName(): Promise<string | null> {
    try {
      const info = await qboClient(requireCredentials(store)).getCompanyInfo();
      const name = info['CompanyName'];
      return typeof name === 'string' ? name : null;
    } catch (err) {
      if (!isRelayError(err)) throw err;
      console.warn(`${LOG_PREFIX} Company lookup failed: ${err.message}`);
      return null;
    }
  }

  app.get('/', async (c) => {
    let company: string | null = null;

    if (store.isAuthenticated()) {
      company = await lookupCompanyName();
      if (company === null) {
        try {
          const provider = oauthProvider();
          await store.refresh(provider);
          console.log(`${LOG_PREFIX} Access token refreshed via ${provider.name}`);
        } catch (err) {
          if (!isRelayError(err)) throw err;
          console.error(`${LOG_PREFIX} Token refresh failed: ${err.message}`);
        }
      }
    }

    return c.json({
      message: 'Welcome to QuickBooks API',
      Company: company ?? 'No company authenticated',
    });
  });

  app.get('/health', (c) => {
    return c.json({ status: 'ok', authenticated: store.isAuthenticated() });
  });

  return app;
}
