import { componentLogger, type Logger } from '../shared/logger.js';
import { TokenExchangeHttpError, TokenParseError } from '../shared/errors.js';
import type { OAuthConfig, TokenResult } from './types.js';

const DEFAULT_TIMEOUT_MS = 30_000;

/**
 * Exchanges an authorization code for a bearer token.
 * One POST per call; nothing is cached or retried.
 */
export class TokenExchangeClient {
  private readonly config: OAuthConfig;
  private readonly timeoutMs: number;
  private readonly log: Logger;

  constructor(config: OAuthConfig, opts?: { timeoutMs?: number; logger?: Logger }) {
    this.config = config;
    this.timeoutMs = opts?.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.log = opts?.logger ?? componentLogger('token-exchange');
  }

  /** `redirectUri` overrides the configured one, e.g. once a port 0 has been bound. */
  async exchange(code: string, redirectUri = this.config.redirectUri): Promise<TokenResult> {
    const { tokenUrl } = this.config;

    const body = new URLSearchParams({
      grant_type: 'authorization_code',
      client_id: this.config.clientId,
      client_secret: this.config.clientSecret,
      redirect_uri: redirectUri,
      code,
    });

    this.log.debug({ tokenUrl }, 'Exchanging authorization code for token');

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    let res: Response;
    let text: string;
    try {
      res = await fetch(tokenUrl, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded',
          Accept: 'application/json',
        },
        body: body.toString(),
        signal: controller.signal,
      });
      text = await res.text();
    } catch (err) {
      if (err instanceof Error && err.name === 'AbortError') {
        throw new TokenExchangeHttpError(0, `timed out after ${this.timeoutMs}ms`);
      }
      throw new TokenExchangeHttpError(0, err instanceof Error ? err.message : String(err));
    } finally {
      clearTimeout(timer);
    }

    if (!res.ok) {
      this.log.error({ status: res.status, body: text }, 'Token exchange failed');
      throw new TokenExchangeHttpError(res.status, text);
    }

    const accessToken = readAccessToken(text);
    this.log.info({ tokenLength: accessToken.length }, 'Access token acquired');
    return { accessToken };
  }
}

/** Pull a string `access_token` out of a JSON token endpoint body. */
export function readAccessToken(body: string): string {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    throw new TokenParseError(body, 'body is not valid JSON');
  }

  if (
    typeof parsed !== 'object' ||
    parsed === null ||
    !('access_token' in parsed) ||
    typeof parsed.access_token !== 'string'
  ) {
    throw new TokenParseError(body);
  }
  return parsed.access_token;
}
