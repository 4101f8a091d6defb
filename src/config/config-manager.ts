import { DEFAULT_REDIRECT_URI, type OAuthConfig } from '../oauth/types.js';

export interface AppConfig {
  oauth: OAuthConfig;

  // Streaming JSON-RPC service
  serverUrl: string;

  // Behavior
  callbackTimeoutMs: number | undefined;
  openBrowser: boolean;
  logLevel: string;
  nodeEnv: string;
}

let config: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (config) return config;

  config = {
    oauth: {
      authorizationUrl:
        process.env.OAUTH_AUTHORIZATION_URL ?? 'https://github.com/login/oauth/authorize',
      tokenUrl: process.env.OAUTH_TOKEN_URL ?? 'https://github.com/login/oauth/access_token',
      clientId: process.env.OAUTH_CLIENT_ID ?? '',
      clientSecret: process.env.OAUTH_CLIENT_SECRET ?? '',
      redirectUri: process.env.OAUTH_REDIRECT_URI ?? DEFAULT_REDIRECT_URI,
      scope: process.env.OAUTH_SCOPE ?? 'read:user user:email',
    },
    serverUrl: process.env.MCP_SERVER_URL ?? '',
    callbackTimeoutMs: process.env.OAUTH_CALLBACK_TIMEOUT_MS
      ? parseInt(process.env.OAUTH_CALLBACK_TIMEOUT_MS, 10)
      : undefined,
    openBrowser: process.env.OPEN_BROWSER !== 'false',
    logLevel: process.env.LOG_LEVEL ?? 'info',
    nodeEnv: process.env.NODE_ENV ?? 'development',
  };

  return config;
}

/** Reset config (for testing) */
export function resetConfig(): void {
  config = null;
}
