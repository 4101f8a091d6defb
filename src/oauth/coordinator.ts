import { randomBytes } from 'node:crypto';
import { componentLogger, type Logger } from '../shared/logger.js';
import {
  BrowserLaunchWarning,
  CallbackError,
  MissingCodeError,
  StateMismatchError,
} from '../shared/errors.js';
import { CallbackReceiver, type CallbackListener } from './callback-receiver.js';
import { SystemBrowserLauncher, type UserAgentLauncher } from './launcher.js';
import { TokenExchangeClient } from './token-exchange.js';
import type {
  AuthorizationPhase,
  AuthorizationResult,
  CallbackWaitOptions,
  OAuthConfig,
  TokenResult,
} from './types.js';

/**
 * Used when the caller supplies no state. It is a fixed literal, so it offers
 * no CSRF protection; callers that want some pass `generateState()`.
 */
export const DEFAULT_STATE = 'random_state';

export interface AuthorizeOptions extends CallbackWaitOptions {
  state?: string;
}

export interface TokenExchanger {
  exchange(code: string, redirectUri?: string): Promise<TokenResult>;
}

export interface CoordinatorDeps {
  receiver?: CallbackListener;
  launcher?: UserAgentLauncher;
  tokenClient?: TokenExchanger;
  logger?: Logger;
}

/** 32 random bytes, base64url. */
export function generateState(): string {
  return randomBytes(32).toString('base64url');
}

/**
 * `client_id`, `response_type` and `state` go in as given;
 * `redirect_uri` and `scope` are percent-encoded.
 */
export function buildAuthorizationUrl(config: OAuthConfig, state: string): string {
  return (
    `${config.authorizationUrl}?client_id=${config.clientId}` +
    `&redirect_uri=${encodeURIComponent(config.redirectUri)}` +
    `&response_type=code&state=${state}` +
    `&scope=${encodeURIComponent(config.scope)}`
  );
}

/**
 * Drives one OAuth2 authorization-code flow:
 *
 *   idle → listener-armed → browser-launched → awaiting-callback
 *        → authorized | denied | mismatched
 *
 * Any failure is terminal for the attempt; the token endpoint is only
 * contacted after the callback passes every check.
 */
export class AuthorizationCodeCoordinator {
  private readonly config: OAuthConfig;
  private readonly receiver: CallbackListener;
  private readonly launcher: UserAgentLauncher;
  private readonly tokenClient: TokenExchanger;
  private readonly log: Logger;
  private currentPhase: AuthorizationPhase = 'idle';

  constructor(config: OAuthConfig, deps: CoordinatorDeps = {}) {
    this.config = config;
    this.log = deps.logger ?? componentLogger('oauth');
    this.receiver = deps.receiver ?? new CallbackReceiver({ logger: this.log });
    this.launcher = deps.launcher ?? new SystemBrowserLauncher();
    this.tokenClient = deps.tokenClient ?? new TokenExchangeClient(config, { logger: this.log });
  }

  get phase(): AuthorizationPhase {
    return this.currentPhase;
  }

  /** Full flow: authorize, then exchange the code for a token. */
  async run(opts: AuthorizeOptions = {}): Promise<TokenResult> {
    const { code, redirectUri } = await this.obtainCode(opts);
    this.log.info('Authorization code received, exchanging for token');
    return this.tokenClient.exchange(code, redirectUri);
  }

  /** Obtain a validated authorization code. */
  async authorize(opts: AuthorizeOptions = {}): Promise<string> {
    const { code } = await this.obtainCode(opts);
    return code;
  }

  /**
   * The redirect URI comes back from the armed listener, so a configured
   * port 0 is replaced by the port actually bound.
   */
  private async obtainCode(
    opts: AuthorizeOptions,
  ): Promise<{ code: string; redirectUri: string }> {
    const state = opts.state ?? DEFAULT_STATE;
    this.currentPhase = 'idle';

    const armed = await this.receiver.arm(this.config.redirectUri);
    let result: AuthorizationResult;
    try {
      this.currentPhase = 'listener-armed';
      this.log.info({ redirectUri: armed.redirectUri }, 'Starting OAuth flow');

      const authUrl = buildAuthorizationUrl(
        { ...this.config, redirectUri: armed.redirectUri },
        state,
      );
      await this.launch(authUrl);
      this.currentPhase = 'browser-launched';

      this.currentPhase = 'awaiting-callback';
      result = await armed.wait({ timeoutMs: opts.timeoutMs, signal: opts.signal });
    } finally {
      await armed.close();
    }

    return { code: this.settle(result, state), redirectUri: armed.redirectUri };
  }

  private async launch(url: string): Promise<void> {
    this.log.info({ url }, 'Opening browser to authorization URL');
    try {
      await this.launcher.open(url);
    } catch (err) {
      const warning = new BrowserLaunchWarning(
        `Could not open browser automatically: ${err instanceof Error ? err.message : String(err)}`,
        url,
      );
      this.log.warn(
        { code: warning.code, url },
        `${warning.message}. Please open this URL manually.`,
      );
    }
  }

  private settle(result: AuthorizationResult, expectedState: string): string {
    if (result.error !== undefined) {
      this.currentPhase = 'denied';
      this.log.error({ error: result.error }, 'OAuth error');
      throw new CallbackError(result.error, result.errorDescription);
    }

    if (result.code === undefined) {
      this.currentPhase = 'denied';
      this.log.error('No authorization code received');
      throw new MissingCodeError();
    }

    if (result.state !== expectedState) {
      this.currentPhase = 'mismatched';
      this.log.error(
        { received: result.state },
        'State parameter mismatch - possible CSRF attack',
      );
      throw new StateMismatchError(expectedState, result.state);
    }

    this.currentPhase = 'authorized';
    return result.code;
  }
}
