import { RelayError, isAuthenticated } from '@qbo-relay/core';
import type { SessionStore } from '../../session/session-store.js';
import type { QboCredentials } from '../../quickbooks/qbo-client.js';

/**
 * Bearer token and company id for an upstream call, read from the current session.
 *
 * @throws RelayError UNAUTHENTICATED when either token or the realm id is missing.
 */
export function requireCredentials(store: SessionStore): QboCredentials {
  const session = store.current();
  if (!isAuthenticated(session)) {
    throw new RelayError('UNAUTHENTICATED');
  }
  if (!session.realm_id) {
    throw new RelayError('UNAUTHENTICATED', { message: 'No company authorized' });
  }
  return { accessToken: session.access_token, realmId: session.realm_id };
}
