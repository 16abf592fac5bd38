export interface OAuthTokenSet {
  accessToken: string;
  refreshToken: string;
  /** Access token lifetime in seconds, as reported by the provider. */
  expiresIn: number;
}

export interface IOAuthProvider {
  readonly name: string;
  authorizationUrl(scopes: readonly string[], state: string): string;
  /** `realmId` is the company id Intuit appends to the callback, when present. */
  exchangeCode(code: string, realmId?: string): Promise<OAuthTokenSet>;
  refresh(refreshToken: string): Promise<OAuthTokenSet>;
}

export const ACCOUNTING_SCOPE = 'com.intuit.quickbooks.accounting';
