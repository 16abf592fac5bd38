/**
 * QuickBooks relay routes. Each call requires an authenticated session and
 * passes the upstream payload through unchanged.
 *
 * GET  /company          - CompanyInfo object
 * GET  /customers        - QueryResponse.Customer array
 * POST /invoices/create  - created Invoice response
 * GET  /transactions     - TransactionList report
 */

import { Hono } from 'hono';
import { CreateInvoiceRequestSchema, RelayError } from '@qbo-relay/core';
import type { AppEnv } from '../app-env.js';
import type { SessionStore } from '../../session/session-store.js';
import type { QboClient, QboCredentials } from '../../quickbooks/qbo-client.js';
import { requireCredentials } from '../helpers/credentials.js';

export interface AccountingRoutesOpts {
  store: SessionStore;
  qboClient: (credentials: QboCredentials) => QboClient;
}

export function createAccountingRoutes(opts: AccountingRoutesOpts): Hono<AppEnv> {
  const app = new Hono<AppEnv>();
  const { store, qboClient } = opts;

  const client = (): QboClient => qboClient(requireCredentials(store));

  app.get('/company', async (c) => {
    return c.json(await client().getCompanyInfo());
  });

  app.get('/customers', async (c) => {
    return c.json(await client().queryCustomers());
  });

  app.post('/invoices/create', async (c) => {
    const credentials = requireCredentials(store);

    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      throw new RelayError('INVALID_REQUEST', { message: 'Request body must be JSON' });
    }

    const parsed = CreateInvoiceRequestSchema.safeParse(body);
    if (!parsed.success) {
      throw new RelayError('INVALID_REQUEST', {
        message: 'Invalid invoice',
        details: parsed.error.issues,
      });
    }

    return c.json(await qboClient(credentials).createInvoice(parsed.data));
  });

  app.get('/transactions', async (c) => {
    return c.json(await client().getTransactionList());
  });

  return app;
}
