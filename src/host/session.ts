import { componentLogger, type Logger } from '../shared/logger.js';
import { AppError } from '../shared/errors.js';
import { AuthorizationCodeCoordinator, type AuthorizeOptions } from '../oauth/coordinator.js';
import type { OAuthConfig, TokenResult } from '../oauth/types.js';
import { RequestDispatcher } from '../rpc/dispatcher.js';
import { MessageRouter } from '../rpc/router.js';
import { StreamingProtocolClient, type StreamStats } from '../stream/streaming-client.js';
import type { JsonRpcParams } from '../jsonrpc/types.js';

// ─── Types ──────────────────────────────────────────────────────────────────

/** An RPC sent before the stream loop starts. */
export interface OutboundMessage {
  method: string;
  params?: JsonRpcParams;
  /** Send as a notification (no id). */
  notification?: boolean;
}

export interface HostSessionConfig {
  oauth: OAuthConfig;
  serverUrl: string;
  callbackTimeoutMs?: number;
}

export interface TokenSource {
  run(opts?: AuthorizeOptions): Promise<TokenResult>;
}

export interface HostSessionDeps {
  coordinator?: TokenSource;
  dispatcher?: RequestDispatcher;
  streamClient?: StreamingProtocolClient;
  logger?: Logger;
}

export interface StartOptions {
  initialMessages?: OutboundMessage[];
  signal?: AbortSignal;
}

export const CLIENT_INFO = { name: 'mcp-oauth-host', version: '0.1.0' } as const;

export const DEFAULT_INITIAL_MESSAGES: readonly OutboundMessage[] = [
  {
    method: 'initialize',
    params: {
      protocolVersion: '2024-11-05',
      capabilities: {},
      clientInfo: CLIENT_INFO,
    },
  },
  { method: 'notifications/initialized', notification: true },
];

// ─── Session ────────────────────────────────────────────────────────────────

/**
 * One authenticated run against one server: authorize, send the initial
 * RPCs in order, then read the event stream until it ends.
 */
export class HostSession {
  private readonly config: HostSessionConfig;
  private readonly coordinator: TokenSource;
  private readonly dispatcher: RequestDispatcher;
  private readonly streamClient: StreamingProtocolClient;
  private readonly log: Logger;

  private token: string | null = null;
  private messageRouter: MessageRouter | null = null;
  private started = false;

  constructor(config: HostSessionConfig, deps: HostSessionDeps = {}) {
    this.config = config;
    this.log = deps.logger ?? componentLogger('session');
    this.coordinator = deps.coordinator ?? new AuthorizationCodeCoordinator(config.oauth);
    this.dispatcher = deps.dispatcher ?? new RequestDispatcher();
    this.streamClient = deps.streamClient ?? new StreamingProtocolClient();
  }

  /** Router for inbound messages; available once authenticated. */
  get router(): MessageRouter {
    if (!this.messageRouter) {
      throw new AppError('Session is not authenticated', 401, 'NOT_AUTHENTICATED');
    }
    return this.messageRouter;
  }

  async authenticate(opts: AuthorizeOptions = {}): Promise<TokenResult> {
    const result = await this.coordinator.run({
      timeoutMs: this.config.callbackTimeoutMs,
      ...opts,
    });

    this.token = result.accessToken;
    this.messageRouter = new MessageRouter({
      dispatcher: this.dispatcher,
      serverUrl: this.config.serverUrl,
      token: result.accessToken,
    });

    this.log.info('OAuth flow successful');
    return result;
  }

  async start(opts: StartOptions = {}): Promise<StreamStats> {
    if (this.started) {
      throw new AppError('Session already started', 409, 'SESSION_ALREADY_STARTED');
    }
    const token = this.token;
    if (token === null) {
      throw new AppError('Session is not authenticated', 401, 'NOT_AUTHENTICATED');
    }
    this.started = true;

    const { serverUrl } = this.config;

    for (const message of opts.initialMessages ?? DEFAULT_INITIAL_MESSAGES) {
      if (message.notification) {
        await this.dispatcher.notify(serverUrl, token, message.method, message.params);
      } else {
        const { id } = await this.dispatcher.request(
          serverUrl,
          token,
          message.method,
          message.params,
        );
        this.log.info({ id, method: message.method }, 'Request sent, reply expected on stream');
      }
    }

    return this.streamClient.listen(serverUrl, token, this.router, { signal: opts.signal });
  }
}
