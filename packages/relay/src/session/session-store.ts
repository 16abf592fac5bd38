import {
  EMPTY_SESSION,
  RelayError,
  hasRefreshToken,
  isAuthenticated,
  type Session,
} from '@qbo-relay/core';
import type { ISessionStorage } from './session-storage.js';
import type { IOAuthProvider } from '../oauth/oauth-provider.js';

const LOG_PREFIX = '[qbo-relay]';

/**
 * Process-wide holder of the single OAuth session.
 *
 * The current session is an immutable value: every change produces a new
 * frozen object and persists it before it becomes visible. Writes go through
 * one queue so two saves never interleave on the storage backend.
 *
 * A refresh only commits if the session it started from is still current.
 * If an authorization callback replaced the session while the token call was
 * in flight, the refreshed tokens belong to the old grant and are dropped.
 */
export class SessionStore {
  private session: Readonly<Session> = EMPTY_SESSION;
  /** Last session handed to the write queue; equals `session` once writes settle. */
  private head: Readonly<Session> = EMPTY_SESSION;
  private writeQueue: Promise<void> = Promise.resolve();
  private inflightRefresh: Promise<Readonly<Session>> | null = null;

  constructor(private readonly storage: ISessionStorage) {}

  /**
   * Load the persisted session. A missing record is the empty state and is
   * written back immediately; an unreadable one is logged and replaced.
   */
  async load(): Promise<Readonly<Session>> {
    let stored: Session | null;
    try {
      stored = await this.storage.load();
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      console.warn(`${LOG_PREFIX} Stored session (${this.storage.name}) is unreadable, starting empty: ${reason}`);
      stored = null;
    }

    if (stored === null) {
      return this.save(EMPTY_SESSION);
    }
    this.session = Object.freeze({ ...stored });
    this.head = this.session;
    return this.session;
  }

  current(): Readonly<Session> {
    return this.session;
  }

  isAuthenticated(): boolean {
    return isAuthenticated(this.session);
  }

  /** Overwrite the stored session wholesale. */
  async save(session: Session): Promise<Readonly<Session>> {
    const next = Object.freeze({ ...session });
    this.head = next;
    try {
      await this.enqueueWrite(next);
    } catch (err) {
      if (this.head === next) this.head = this.session;
      throw err;
    }
    this.session = next;
    return next;
  }

  /**
   * Mint a new access token from the stored refresh token.
   *
   * Replaces access_token, refresh_token and token_expiry; state and realm_id
   * are carried over. Concurrent callers share one token request.
   */
  async refresh(provider: IOAuthProvider): Promise<Readonly<Session>> {
    if (this.inflightRefresh) return this.inflightRefresh;

    const snapshot = this.head;
    if (!hasRefreshToken(snapshot)) {
      throw new RelayError('UNAUTHENTICATED', { message: 'No refresh token available' });
    }

    const promise = this.performRefresh(provider, snapshot, snapshot.refresh_token).finally(() => {
      this.inflightRefresh = null;
    });
    this.inflightRefresh = promise;
    return promise;
  }

  private async performRefresh(
    provider: IOAuthProvider,
    snapshot: Readonly<Session>,
    refreshToken: string,
  ): Promise<Readonly<Session>> {
    const tokens = await provider.refresh(refreshToken);

    if (this.head !== snapshot) {
      console.warn(`${LOG_PREFIX} Session replaced during token refresh, discarding refreshed tokens`);
      return this.head;
    }

    return this.save({
      ...snapshot,
      access_token: tokens.accessToken,
      refresh_token: tokens.refreshToken,
      token_expiry: tokens.expiresIn,
    });
  }

  private async enqueueWrite(session: Readonly<Session>): Promise<void> {
    const write = this.writeQueue.then(() => this.storage.save(session));
    // The queue only orders writes; each caller observes its own failure through `write`.
    this.writeQueue = write.catch(() => undefined);
    try {
      await write;
    } catch (err) {
      throw new RelayError('SESSION_PERSIST_FAILED', {
        cause: err instanceof Error ? err : undefined,
      });
    }
  }
}
