import { componentLogger, type Logger } from '../shared/logger.js';
import { MessageParseError, StreamConnectError, StreamReadError } from '../shared/errors.js';
import { streamSSEEvents, type SseEvent } from '../shared/sse.js';
import { parseMessage } from '../jsonrpc/codec.js';
import type { JsonRpcMessage } from '../jsonrpc/types.js';
import type { RouteOutcome } from '../rpc/router.js';

export interface InboundRouter {
  route(message: JsonRpcMessage): Promise<RouteOutcome>;
}

export interface StreamOptions {
  /** Aborting ends the stream quietly and closes the connection. */
  signal?: AbortSignal;
}

export interface StreamStats {
  events: number;
  routed: number;
  dropped: number;
}

export function sseEndpoint(serverUrl: string): string {
  return `${serverUrl.replace(/\/+$/, '')}/sse`;
}

/**
 * Inbound half of the split channel: holds one authenticated GET on
 * `<serverUrl>/sse` open and turns its body into events.
 *
 * Each `connect` is a fresh connection; nothing reconnects on its own.
 */
export class StreamingProtocolClient {
  private readonly log: Logger;

  constructor(opts?: { logger?: Logger }) {
    this.log = opts?.logger ?? componentLogger('stream');
  }

  async *connect(
    serverUrl: string,
    token: string,
    opts: StreamOptions = {},
  ): AsyncGenerator<SseEvent> {
    const url = sseEndpoint(serverUrl);
    const { signal } = opts;

    this.log.info({ url }, 'Connecting to event stream');

    let response: Response;
    try {
      response = await fetch(url, {
        method: 'GET',
        headers: {
          Authorization: `Bearer ${token}`,
          Accept: 'text/event-stream',
          'Cache-Control': 'no-cache',
        },
        signal,
      });
    } catch (err) {
      if (signal?.aborted) {
        this.log.info({ url }, 'Event stream connect aborted');
        return;
      }
      throw new StreamConnectError(0, err instanceof Error ? err.message : String(err));
    }

    if (!response.ok) {
      const text = await response.text().catch(() => '');
      this.log.error({ url, status: response.status, body: text }, 'Event stream rejected');
      throw new StreamConnectError(response.status, text);
    }

    const body = response.body;
    if (!body) {
      throw new StreamConnectError(response.status, 'No response body from stream endpoint');
    }

    this.log.info({ url }, 'Connected to event stream');

    try {
      for await (const event of streamSSEEvents(body)) {
        this.log.debug({ eventType: event.eventType }, 'Stream event');
        yield event;
      }
      this.log.info({ url }, 'Event stream closed by server');
    } catch (err) {
      if (signal?.aborted) {
        this.log.info({ url }, 'Event stream aborted');
        return;
      }
      throw new StreamReadError(err instanceof Error ? err.message : String(err));
    } finally {
      await body.cancel().catch((err: unknown) => {
        this.log.debug({ err }, 'Stream body already released');
      });
    }
  }

  /**
   * Read the stream to its end, handing every well-formed JSON-RPC envelope
   * to `router`. Malformed payloads are logged and dropped.
   */
  async listen(
    serverUrl: string,
    token: string,
    router: InboundRouter,
    opts: StreamOptions = {},
  ): Promise<StreamStats> {
    const stats: StreamStats = { events: 0, routed: 0, dropped: 0 };

    for await (const event of this.connect(serverUrl, token, opts)) {
      stats.events++;

      let message: JsonRpcMessage;
      try {
        message = parseMessage(event.data);
      } catch (err) {
        if (!(err instanceof MessageParseError)) throw err;
        stats.dropped++;
        this.log.warn(
          { eventType: event.eventType, reason: err.message, raw: event.data },
          'Dropping malformed JSON-RPC message',
        );
        continue;
      }

      await router.route(message);
      stats.routed++;
    }

    this.log.info(stats, 'Event stream finished');
    return stats;
  }
}
