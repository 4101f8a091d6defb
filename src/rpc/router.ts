import { EventEmitter } from 'node:events';
import { componentLogger, type Logger } from '../shared/logger.js';
import type {
  JsonRpcErrorResponse,
  JsonRpcMessage,
  JsonRpcNotification,
  JsonRpcRequest,
  JsonRpcResponse,
} from '../jsonrpc/types.js';
import type { MessageSender } from './dispatcher.js';

// ─── Types ──────────────────────────────────────────────────────────────────

export interface RouterEvents {
  response: JsonRpcResponse;
  'error-response': JsonRpcErrorResponse;
  notification: JsonRpcNotification;
  'unhandled-request': JsonRpcRequest;
}

export type RouteOutcome = 'replied' | 'reply-failed' | 'surfaced' | 'unhandled';

export interface MessageRouterOptions {
  dispatcher: MessageSender;
  serverUrl: string;
  token: string;
  logger?: Logger;
}

// ─── Router ─────────────────────────────────────────────────────────────────

/**
 * Classifies inbound envelopes from the event stream.
 *
 * `ping` requests are answered with an empty result under the same id.
 * Responses, error responses and notifications are logged and emitted to
 * subscribers. Any other request method is logged and left unanswered.
 */
export class MessageRouter {
  private readonly dispatcher: MessageSender;
  private readonly serverUrl: string;
  private readonly token: string;
  private readonly log: Logger;
  private readonly events = new EventEmitter();

  constructor(opts: MessageRouterOptions) {
    this.dispatcher = opts.dispatcher;
    this.serverUrl = opts.serverUrl;
    this.token = opts.token;
    this.log = opts.logger ?? componentLogger('message-router');
  }

  /** Subscribe to surfaced messages. Returns an unsubscribe function. */
  on<K extends keyof RouterEvents>(
    event: K,
    listener: (message: RouterEvents[K]) => void,
  ): () => void {
    this.events.on(event, listener);
    return () => {
      this.events.off(event, listener);
    };
  }

  async route(message: JsonRpcMessage): Promise<RouteOutcome> {
    switch (message.kind) {
      case 'request':
        if (message.method === 'ping') {
          return this.replyToPing(message);
        }
        this.log.warn(
          { id: message.id, method: message.method },
          'Unhandled JSON-RPC request method, no reply sent',
        );
        this.emit('unhandled-request', message);
        return 'unhandled';

      case 'response':
        this.log.info({ id: message.id, result: message.result }, 'JSON-RPC response received');
        this.emit('response', message);
        return 'surfaced';

      case 'error':
        this.log.warn(
          { id: message.id, code: message.error.code, error: message.error.message },
          'JSON-RPC error response received',
        );
        this.emit('error-response', message);
        return 'surfaced';

      case 'notification':
        this.log.info({ method: message.method }, 'JSON-RPC notification received');
        this.emit('notification', message);
        return 'surfaced';
    }
  }

  private async replyToPing(request: JsonRpcRequest): Promise<RouteOutcome> {
    const reply: JsonRpcResponse = { kind: 'response', id: request.id, result: {} };

    try {
      await this.dispatcher.send(this.serverUrl, this.token, reply);
    } catch (err) {
      this.log.error({ err, id: request.id }, 'Failed to reply to ping');
      return 'reply-failed';
    }

    this.log.debug({ id: request.id }, 'Replied to ping');
    return 'replied';
  }

  private emit<K extends keyof RouterEvents>(event: K, message: RouterEvents[K]): void {
    this.events.emit(event, message);
  }
}
