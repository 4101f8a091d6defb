import { componentLogger, type Logger } from '../shared/logger.js';
import { RpcSendError } from '../shared/errors.js';
import { serializeMessage } from '../jsonrpc/codec.js';
import type {
  JsonRpcMessage,
  JsonRpcNotification,
  JsonRpcParams,
  JsonRpcRequest,
} from '../jsonrpc/types.js';

const DEFAULT_TIMEOUT_MS = 30_000;

/** What the RPC endpoint said to a POST. Kept for diagnostics only. */
export interface DispatchReceipt {
  status: number;
  ok: boolean;
  body: string;
}

export interface MessageSender {
  send(serverUrl: string, token: string, message: JsonRpcMessage): Promise<DispatchReceipt>;
}

export function rpcEndpoint(serverUrl: string): string {
  return `${serverUrl.replace(/\/+$/, '')}/rpc`;
}

/**
 * Outbound half of the split channel: POSTs one JSON-RPC envelope per call to
 * `<serverUrl>/rpc`. Replies arrive later on the event stream, never in the
 * POST response, so nothing here waits for or correlates a reply.
 */
export class RequestDispatcher implements MessageSender {
  private nextId = 1;
  private readonly timeoutMs: number;
  private readonly log: Logger;

  constructor(opts?: { timeoutMs?: number; logger?: Logger }) {
    this.timeoutMs = opts?.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.log = opts?.logger ?? componentLogger('rpc-dispatcher');
  }

  /** Send a request under the next request id. */
  async request(
    serverUrl: string,
    token: string,
    method: string,
    params?: JsonRpcParams,
  ): Promise<{ id: number; receipt: DispatchReceipt }> {
    const id = this.nextId++;
    const message: JsonRpcRequest = { kind: 'request', id, method, params };
    const receipt = await this.send(serverUrl, token, message);
    return { id, receipt };
  }

  async notify(
    serverUrl: string,
    token: string,
    method: string,
    params?: JsonRpcParams,
  ): Promise<DispatchReceipt> {
    const message: JsonRpcNotification = { kind: 'notification', method, params };
    return this.send(serverUrl, token, message);
  }

  async send(serverUrl: string, token: string, message: JsonRpcMessage): Promise<DispatchReceipt> {
    const endpoint = rpcEndpoint(serverUrl);
    const body = serializeMessage(message);

    this.log.debug({ endpoint, kind: message.kind, body }, 'Sending JSON-RPC message');

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    let res: Response;
    let text: string;
    try {
      res = await fetch(endpoint, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${token}`,
          'Content-Type': 'application/json',
        },
        body,
        signal: controller.signal,
      });
      text = await res.text().catch(() => '');
    } catch (err) {
      if (err instanceof Error && err.name === 'AbortError') {
        throw new RpcSendError(`RPC send timed out after ${this.timeoutMs}ms`, endpoint);
      }
      throw new RpcSendError(
        `RPC send failed: ${err instanceof Error ? err.message : String(err)}`,
        endpoint,
      );
    } finally {
      clearTimeout(timer);
    }

    if (!res.ok) {
      this.log.warn({ endpoint, status: res.status, body: text }, 'RPC endpoint rejected message');
    } else {
      this.log.debug({ endpoint, status: res.status }, 'RPC message accepted');
    }

    return { status: res.status, ok: res.ok, body: text };
  }
}
