// ─── OAuth2 authorization-code flow ──────────────────────────────────────────

export const DEFAULT_REDIRECT_URI = 'http://localhost:8080/callback';

export type OAuthConfig = Readonly<{
  authorizationUrl: string;
  tokenUrl: string;
  clientId: string;
  clientSecret: string;
  redirectUri: string;
  scope: string;
}>;

/** Query parameters captured from the single redirect request. */
export interface AuthorizationResult {
  code?: string;
  state?: string;
  error?: string;
  errorDescription?: string;
}

export interface TokenResult {
  accessToken: string;
}

export type AuthorizationPhase =
  | 'idle'
  | 'listener-armed'
  | 'browser-launched'
  | 'awaiting-callback'
  | 'authorized'
  | 'denied'
  | 'mismatched';

export interface CallbackWaitOptions {
  /** Give up after this many ms. Unset means wait indefinitely. */
  timeoutMs?: number;
  signal?: AbortSignal;
}
