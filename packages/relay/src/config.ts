import { existsSync, readFileSync } from 'node:fs';
import { z } from 'zod';
import { parse as parseToml } from 'smol-toml';
import { RelayError } from '@qbo-relay/core';

const ServerConfigSchema = z.object({
  port: z.number().int().min(1).max(65535).default(8000),
  host: z.string().default('0.0.0.0'),
});

const SessionConfigSchema = z.object({
  path: z.string().min(1).default('oauth_session.json'),
});

const QuickBooksConfigSchema = z.object({
  api_base_url: z.string().url().optional(),
  timeout_ms: z.number().int().positive().default(30_000),
});

const RelayConfigSchema = z.object({
  server: ServerConfigSchema.default({}),
  session: SessionConfigSchema.default({}),
  quickbooks: QuickBooksConfigSchema.default({}),
});

export const ConfigSchema = z.object({
  relay: RelayConfigSchema.default({}),
});

export type RelayConfig = z.infer<typeof ConfigSchema>;

/**
 * Load server settings from a TOML file. A missing file means all defaults.
 */
export function loadConfig(path: string): RelayConfig {
  if (!existsSync(path)) {
    return ConfigSchema.parse({});
  }
  const raw = readFileSync(path, 'utf-8');
  const parsed: unknown = parseToml(raw);
  return ConfigSchema.parse(parsed);
}

// ---------------------------------------------------------------------------
// OAuth client settings (environment)
// ---------------------------------------------------------------------------

export const QBO_ENVIRONMENTS = ['sandbox', 'production'] as const;
export type QboEnvironment = (typeof QBO_ENVIRONMENTS)[number];

const OAuthEnvSchema = z.object({
  CLIENT_ID: z.string().min(1),
  CLIENT_SECRET: z.string().min(1),
  REDIRECT_URI: z.string().url(),
  ENVIRONMENT: z.enum(QBO_ENVIRONMENTS).default('sandbox'),
});

export interface OAuthClientConfig {
  clientId: string;
  clientSecret: string;
  redirectUri: string;
  environment: QboEnvironment;
}

/**
 * Read the OAuth client settings from the environment.
 *
 * Called every time a provider is built; the values are never cached.
 */
export function loadOAuthConfig(env: NodeJS.ProcessEnv = process.env): OAuthClientConfig {
  const parsed = OAuthEnvSchema.safeParse({
    CLIENT_ID: env['CLIENT_ID'],
    CLIENT_SECRET: env['CLIENT_SECRET'],
    REDIRECT_URI: env['REDIRECT_URI'],
    ENVIRONMENT: env['ENVIRONMENT'] || undefined,
  });
  if (!parsed.success) {
    const fields = [...new Set(parsed.error.issues.map((issue) => issue.path.join('.')))];
    throw new RelayError('OAUTH_NOT_CONFIGURED', {
      message: `OAuth client is not configured: check ${fields.join(', ')}`,
    });
  }
  return {
    clientId: parsed.data.CLIENT_ID,
    clientSecret: parsed.data.CLIENT_SECRET,
    redirectUri: parsed.data.REDIRECT_URI,
    environment: parsed.data.ENVIRONMENT,
  };
}

const API_BASE_URLS: Record<QboEnvironment, string> = {
  sandbox: 'https://sandbox-quickbooks.api.intuit.com',
  production: 'https://quickbooks.api.intuit.com',
};

/** The validated `ENVIRONMENT` selector, on its own for building the API base URL. */
export function resolveEnvironment(env: NodeJS.ProcessEnv = process.env): QboEnvironment {
  const parsed = OAuthEnvSchema.shape.ENVIRONMENT.safeParse(env['ENVIRONMENT'] || undefined);
  if (!parsed.success) {
    throw new RelayError('OAUTH_NOT_CONFIGURED', {
      message: 'OAuth client is not configured: check ENVIRONMENT',
    });
  }
  return parsed.data;
}

export function apiBaseUrl(environment: QboEnvironment, override?: string): string {
  return (override ?? API_BASE_URLS[environment]).replace(/\/+$/, '');
}
