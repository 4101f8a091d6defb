import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { getConfig, resetConfig } from '../../src/config/config-manager.js';

const VARS = [
  'OAUTH_AUTHORIZATION_URL',
  'OAUTH_TOKEN_URL',
  'OAUTH_CLIENT_ID',
  'OAUTH_CLIENT_SECRET',
  'OAUTH_REDIRECT_URI',
  'OAUTH_SCOPE',
  'MCP_SERVER_URL',
  'OAUTH_CALLBACK_TIMEOUT_MS',
  'OPEN_BROWSER',
];

describe('Config Manager', () => {
  const saved: Record<string, string | undefined> = {};

  beforeEach(() => {
    for (const name of VARS) {
      saved[name] = process.env[name];
      delete process.env[name];
    }
    resetConfig();
  });

  afterEach(() => {
    for (const name of VARS) {
      if (saved[name] === undefined) delete process.env[name];
      else process.env[name] = saved[name];
    }
    resetConfig();
  });

  it('reads config from environment variables', () => {
    process.env.OAUTH_AUTHORIZATION_URL = 'https://auth.example.com/authorize';
    process.env.OAUTH_TOKEN_URL = 'https://auth.example.com/token';
    process.env.OAUTH_CLIENT_ID = 'cid';
    process.env.OAUTH_CLIENT_SECRET = 'csecret';
    process.env.OAUTH_REDIRECT_URI = 'http://127.0.0.1:9000/cb';
    process.env.OAUTH_SCOPE = 'repo';
    process.env.MCP_SERVER_URL = 'https://mcp.example.com';
    process.env.OAUTH_CALLBACK_TIMEOUT_MS = '60000';
    process.env.OPEN_BROWSER = 'false';

    const config = getConfig();
    expect(config.oauth).toEqual({
      authorizationUrl: 'https://auth.example.com/authorize',
      tokenUrl: 'https://auth.example.com/token',
      clientId: 'cid',
      clientSecret: 'csecret',
      redirectUri: 'http://127.0.0.1:9000/cb',
      scope: 'repo',
    });
    expect(config.serverUrl).toBe('https://mcp.example.com');
    expect(config.callbackTimeoutMs).toBe(60000);
    expect(config.openBrowser).toBe(false);
  });

  it('falls back to defaults', () => {
    const config = getConfig();
    expect(config.oauth.authorizationUrl).toBe('https://github.com/login/oauth/authorize');
    expect(config.oauth.tokenUrl).toBe('https://github.com/login/oauth/access_token');
    expect(config.oauth.redirectUri).toBe('http://localhost:8080/callback');
    expect(config.oauth.scope).toBe('read:user user:email');
    expect(config.callbackTimeoutMs).toBeUndefined();
    expect(config.openBrowser).toBe(true);
  });

  it('returns cached config on second call', () => {
    const first = getConfig();
    const second = getConfig();
    expect(first).toBe(second);
  });

  it('resets cache with resetConfig', () => {
    const first = getConfig();
    resetConfig();
    process.env.MCP_SERVER_URL = 'https://other.example.com';
    const second = getConfig();
    expect(second.serverUrl).toBe('https://other.example.com');
    expect(first).not.toBe(second);
  });
});
