#!/usr/bin/env tsx

import 'dotenv/config';
import { serve } from '@hono/node-server';
import { resolve } from 'node:path';
import { apiBaseUrl, loadConfig, loadOAuthConfig, resolveEnvironment } from './config.js';
import { FileSessionStorage } from './session/session-storage.js';
import { SessionStore } from './session/session-store.js';
import { IntuitOAuthProvider } from './oauth/intuit-oauth-provider.js';
import { QboClient } from './quickbooks/qbo-client.js';
import { createServer } from './server.js';

const CONFIG_PATH = process.env['RELAY_CONFIG'] ?? resolve(process.cwd(), 'config.toml');

async function main(): Promise<void> {
  console.log('[qbo-relay] Loading config from', CONFIG_PATH);
  const config = loadConfig(CONFIG_PATH);
  const { server: serverConfig, session: sessionConfig, quickbooks } = config.relay;

  const sessionPath = process.env['RELAY_SESSION'] ?? resolve(process.cwd(), sessionConfig.path);
  const store = new SessionStore(new FileSessionStorage(sessionPath));
  await store.load();
  console.log(
    `[qbo-relay] Session loaded from ${sessionPath} (${store.isAuthenticated() ? 'authenticated' : 'empty'})`,
  );

  const app = createServer({
    store,
    // OAuth settings are re-read from the environment on every request
    oauthProvider: () => new IntuitOAuthProvider(loadOAuthConfig(), quickbooks.timeout_ms),
    qboClient: (credentials) =>
      new QboClient({
        ...credentials,
        baseUrl: apiBaseUrl(resolveEnvironment(), quickbooks.api_base_url),
        timeoutMs: quickbooks.timeout_ms,
      }),
  });

  const server = serve({
    fetch: app.fetch,
    port: serverConfig.port,
    hostname: serverConfig.host,
  });

  console.log(`[qbo-relay] Server listening on ${serverConfig.host}:${serverConfig.port}`);

  // Graceful shutdown
  const SHUTDOWN_TIMEOUT_MS = 10_000;

  function shutdown(signal: string): void {
    console.log(`[qbo-relay] ${signal} received, shutting down...`);

    const shutdownTimer = setTimeout(() => {
      console.error('[qbo-relay] Shutdown timeout, forcing exit');
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);
    shutdownTimer.unref();

    server.close(() => {
      console.log('[qbo-relay] Shutdown complete');
      process.exit(0);
    });
  }

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch((err: unknown) => {
  console.error('[qbo-relay] Failed to start:', err);
  process.exit(1);
});
