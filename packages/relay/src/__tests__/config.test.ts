import { describe, it, expect } from 'vitest';
import { writeFileSync, mkdirSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { RelayError } from '@qbo-relay/core';
import { apiBaseUrl, loadConfig, loadOAuthConfig, resolveEnvironment } from '../config.js';

function tmpDir(): string {
  const dir = join(tmpdir(), `qbo-relay-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
  mkdirSync(dir, { recursive: true });
  return dir;
}

const OAUTH_ENV = {
  CLIENT_ID: 'test-client',
  CLIENT_SECRET: 'test-secret',
  REDIRECT_URI: 'http://localhost:8000/callback',
};

describe('loadConfig', () => {
  it('loads a full config file', () => {
    const dir = tmpDir();
    const path = join(dir, 'config.toml');
    writeFileSync(
      path,
      `
[relay.server]
port = 9100
host = "127.0.0.1"

[relay.session]
path = "/var/lib/qbo/session.json"

[relay.quickbooks]
api_base_url = "https://qbo.example.test"
timeout_ms = 5000
`,
    );

    const config = loadConfig(path);
    expect(config.relay.server.port).toBe(9100);
    expect(config.relay.server.host).toBe('127.0.0.1');
    expect(config.relay.session.path).toBe('/var/lib/qbo/session.json');
    expect(config.relay.quickbooks.api_base_url).toBe('https://qbo.example.test');
    expect(config.relay.quickbooks.timeout_ms).toBe(5000);

    rmSync(dir, { recursive: true });
  });

  it('applies defaults when the file is missing', () => {
    const config = loadConfig(join(tmpdir(), 'qbo-relay-does-not-exist.toml'));
    expect(config.relay.server.port).toBe(8000);
    expect(config.relay.server.host).toBe('0.0.0.0');
    expect(config.relay.session.path).toBe('oauth_session.json');
    expect(config.relay.quickbooks.api_base_url).toBeUndefined();
    expect(config.relay.quickbooks.timeout_ms).toBe(30_000);
  });

  it('applies defaults for omitted sections', () => {
    const dir = tmpDir();
    const path = join(dir, 'config.toml');
    writeFileSync(path, '[relay.server]\nport = 8080\n');

    const config = loadConfig(path);
    expect(config.relay.server.port).toBe(8080);
    expect(config.relay.server.host).toBe('0.0.0.0');
    expect(config.relay.session.path).toBe('oauth_session.json');

    rmSync(dir, { recursive: true });
  });

  it('throws on an out-of-range port', () => {
    const dir = tmpDir();
    const path = join(dir, 'config.toml');
    writeFileSync(path, '[relay.server]\nport = 70000\n');

    expect(() => loadConfig(path)).toThrow();
    rmSync(dir, { recursive: true });
  });

  it('throws on an invalid api_base_url', () => {
    const dir = tmpDir();
    const path = join(dir, 'config.toml');
    writeFileSync(path, '[relay.quickbooks]\napi_base_url = "not a url"\n');

    expect(() => loadConfig(path)).toThrow();
    rmSync(dir, { recursive: true });
  });
});

describe('loadOAuthConfig', () => {
  it('reads client settings and defaults to sandbox', () => {
    expect(loadOAuthConfig(OAUTH_ENV)).toEqual({
      clientId: 'test-client',
      clientSecret: 'test-secret',
      redirectUri: 'http://localhost:8000/callback',
      environment: 'sandbox',
    });
  });

  it('accepts production', () => {
    expect(loadOAuthConfig({ ...OAUTH_ENV, ENVIRONMENT: 'production' }).environment).toBe('production');
  });

  it('treats an empty ENVIRONMENT as the default', () => {
    expect(loadOAuthConfig({ ...OAUTH_ENV, ENVIRONMENT: '' }).environment).toBe('sandbox');
  });

  it('throws OAUTH_NOT_CONFIGURED naming the missing variables', () => {
    let caught: unknown;
    try {
      loadOAuthConfig({ REDIRECT_URI: 'http://localhost:8000/callback' });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(RelayError);
    if (caught instanceof RelayError) {
      expect(caught.code).toBe('OAUTH_NOT_CONFIGURED');
      expect(caught.message).toBe('OAuth client is not configured: check CLIENT_ID, CLIENT_SECRET');
    }
  });

  it('rejects an unknown environment', () => {
    expect(() => loadOAuthConfig({ ...OAUTH_ENV, ENVIRONMENT: 'staging' })).toThrow('ENVIRONMENT');
  });
});

describe('apiBaseUrl', () => {
  it('selects the host for the environment', () => {
    expect(apiBaseUrl('sandbox')).toBe('https://sandbox-quickbooks.api.intuit.com');
    expect(apiBaseUrl('production')).toBe('https://quickbooks.api.intuit.com');
  });

  it('prefers the override and strips trailing slashes', () => {
    expect(apiBaseUrl('sandbox', 'https://qbo.example.test/')).toBe('https://qbo.example.test');
  });

  it('resolveEnvironment falls back to sandbox', () => {
    expect(resolveEnvironment({})).toBe('sandbox');
    expect(resolveEnvironment({ ENVIRONMENT: 'production' })).toBe('production');
  });

  it('resolveEnvironment rejects an unknown environment like loadOAuthConfig does', () => {
    expect(() => resolveEnvironment({ ENVIRONMENT: 'prod' })).toThrow(
      'OAuth client is not configured: check ENVIRONMENT',
    );
  });
});
