export { createServer, type ServerOpts } from './server.js';
export {
  loadConfig,
  loadOAuthConfig,
  resolveEnvironment,
  apiBaseUrl,
  ConfigSchema,
  QBO_ENVIRONMENTS,
  type RelayConfig,
  type OAuthClientConfig,
  type QboEnvironment,
} from './config.js';
export { SessionStore } from './session/session-store.js';
export {
  FileSessionStorage,
  MemorySessionStorage,
  type ISessionStorage,
} from './session/session-storage.js';
export { ACCOUNTING_SCOPE, type IOAuthProvider, type OAuthTokenSet } from './oauth/oauth-provider.js';
export { IntuitOAuthProvider } from './oauth/intuit-oauth-provider.js';
export { QboClient, type QboClientOpts, type QboCredentials, type QboObject } from './quickbooks/qbo-client.js';
