import OAuthClient from 'intuit-oauth';
import { z } from 'zod';
import { RelayError, isRelayError } from '@qbo-relay/core';
import type { IOAuthProvider, OAuthTokenSet } from './oauth-provider.js';
import type { OAuthClientConfig } from '../config.js';
import { withTimeout, DEFAULT_TIMEOUT_MS } from '../http/upstream-fetch.js';

const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().min(1),
  expires_in: z.number(),
  token_type: z.string().optional(),
  x_refresh_token_expires_in: z.number().optional(),
});

interface TokenResponse {
  getJson(): unknown;
}

function numberAt(value: unknown, path: readonly string[]): number | undefined {
  let current: unknown = value;
  for (const key of path) {
    if (typeof current !== 'object' || current === null) return undefined;
    current = Reflect.get(current, key);
  }
  return typeof current === 'number' ? current : undefined;
}

/** HTTP status of a failed token call, wherever intuit-oauth put it on the error. */
function upstreamStatusOf(err: unknown): number | undefined {
  return (
    numberAt(err, ['authResponse', 'response', 'status']) ??
    numberAt(err, ['response', 'status'])
  );
}

/**
 * Intuit OAuth2 authorization-code client backed by `intuit-oauth`.
 *
 * A new OAuthClient is built per provider, and providers are built per request,
 * so the client never carries a token between calls.
 */
export class IntuitOAuthProvider implements IOAuthProvider {
  readonly name = 'intuit';
  private readonly client: OAuthClient;
  private readonly redirectUri: string;
  private readonly timeoutMs: number;

  constructor(config: OAuthClientConfig, timeoutMs: number = DEFAULT_TIMEOUT_MS) {
    this.client = new OAuthClient({
      clientId: config.clientId,
      clientSecret: config.clientSecret,
      environment: config.environment,
      redirectUri: config.redirectUri,
    });
    this.redirectUri = config.redirectUri;
    this.timeoutMs = timeoutMs;
  }

  authorizationUrl(scopes: readonly string[], state: string): string {
    return this.client.authorizeUri({ scope: [...scopes], state });
  }

  async exchangeCode(code: string, realmId?: string): Promise<OAuthTokenSet> {
    // createToken reads code and realmId back out of the callback URL
    const url = new URL(this.redirectUri);
    url.searchParams.set('code', code);
    if (realmId) url.searchParams.set('realmId', realmId);
    return this.requestToken(() => this.client.createToken(url.toString()));
  }

  async refresh(refreshToken: string): Promise<OAuthTokenSet> {
    return this.requestToken(() => this.client.refreshUsingToken(refreshToken));
  }

  private async requestToken(call: () => Promise<TokenResponse>): Promise<OAuthTokenSet> {
    let response: TokenResponse;
    try {
      response = await withTimeout(call(), this.timeoutMs);
    } catch (err) {
      if (isRelayError(err)) throw err;
      const cause = err instanceof Error ? err : undefined;
      const status = upstreamStatusOf(err);
      if (status === undefined) {
        throw new RelayError('UPSTREAM_UNREACHABLE', { cause });
      }
      throw new RelayError('TOKEN_REQUEST_FAILED', {
        message: `Token request failed: HTTP ${status}`,
        upstreamStatus: status,
        cause,
      });
    }

    let body: unknown;
    try {
      body = response.getJson();
    } catch (err) {
      throw new RelayError('UPSTREAM_INVALID_RESPONSE', {
        cause: err instanceof Error ? err : undefined,
      });
    }

    const parsed = TokenResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new RelayError('TOKEN_REQUEST_FAILED', {
        message: 'Token response is missing required fields',
      });
    }

    return {
      accessToken: parsed.data.access_token,
      refreshToken: parsed.data.refresh_token,
      expiresIn: parsed.data.expires_in,
    };
  }
}
