import { z } from 'zod';

/**
 * Persisted OAuth session. Field names are the on-disk record's keys.
 *
 * An empty object is the unauthenticated state. `token_expiry` is the
 * seconds-to-live reported at issuance, not an absolute timestamp.
 */
export const SessionSchema = z.object({
  state: z.string().optional(),
  access_token: z.string().optional(),
  refresh_token: z.string().optional(),
  realm_id: z.string().nullable().optional(),
  token_expiry: z.number().optional(),
});
export type Session = z.infer<typeof SessionSchema>;

export const EMPTY_SESSION: Readonly<Session> = Object.freeze({});

export function hasAccessToken(session: Session): session is Session & { access_token: string } {
  return typeof session.access_token === 'string' && session.access_token.length > 0;
}

export function hasRefreshToken(session: Session): session is Session & { refresh_token: string } {
  return typeof session.refresh_token === 'string' && session.refresh_token.length > 0;
}

/** Authenticated means both tokens are held; one without the other counts as no session. */
export function isAuthenticated(
  session: Session,
): session is Session & { access_token: string; refresh_token: string } {
  return hasAccessToken(session) && hasRefreshToken(session);
}
