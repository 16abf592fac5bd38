/**
 * OAuth authorization routes.
 *
 * GET /auth      - 303 redirect to the Intuit consent page (accounting scope)
 * GET /callback  - exchanges ?code for tokens and stores a new session
 *
 * /auth keeps no local state: the provider echoes `state` back on the callback,
 * where it is stored with the session.
 */

import { randomBytes } from 'node:crypto';
import { Hono } from 'hono';
import { RelayError } from '@qbo-relay/core';
import type { AppEnv } from '../app-env.js';
import type { SessionStore } from '../../session/session-store.js';
import { ACCOUNTING_SCOPE, type IOAuthProvider } from '../../oauth/oauth-provider.js';

export interface AuthRoutesOpts {
  store: SessionStore;
  oauthProvider: () => IOAuthProvider;
}

function generateState(): string {
  return randomBytes(24).toString('base64url');
}

export function createAuthRoutes(opts: AuthRoutesOpts): Hono<AppEnv> {
  const app = new Hono<AppEnv>();
  const { store, oauthProvider } = opts;

  app.get('/auth', (c) => {
    const url = oauthProvider().authorizationUrl([ACCOUNTING_SCOPE], generateState());
    return c.redirect(url, 303);
  });

  app.get('/callback', async (c) => {
    const code = c.req.query('code');
    const state = c.req.query('state');
    const realmId = c.req.query('realmId');

    if (!code || !state) {
      throw new RelayError('MISSING_CALLBACK_PARAMS');
    }

    const tokens = await oauthProvider().exchangeCode(code, realmId);
    await store.save({
      state,
      access_token: tokens.accessToken,
      refresh_token: tokens.refreshToken,
      realm_id: realmId || null,
      token_expiry: tokens.expiresIn,
    });
    console.log(`[qbo-relay] Authorized company ${realmId ?? '(no realm)'}`);

    return c.json({ message: 'Authorization successful' });
  });

  return app;
}
