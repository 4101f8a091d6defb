import { createServer, type Server } from 'node:http';
import type { AddressInfo } from 'node:net';
import express from 'express';
import type { Request, Response, NextFunction } from 'express';
import { componentLogger, type Logger } from '../shared/logger.js';
import {
  CallbackAbortedError,
  CallbackTimeoutError,
  ListenerBindError,
} from '../shared/errors.js';
import type { AuthorizationResult, CallbackWaitOptions } from './types.js';

// ─── Types ──────────────────────────────────────────────────────────────────

/** A bound, single-use redirect listener. */
export interface ArmedCallback {
  /** The redirect URI actually being served (port resolved when 0 was asked for). */
  readonly redirectUri: string;
  /** Wait for the one callback request, then release the listener. */
  wait(opts?: CallbackWaitOptions): Promise<AuthorizationResult>;
  /** Release the listener. Safe to call more than once. */
  close(): Promise<void>;
}

export interface CallbackListener {
  arm(redirectUri: string): Promise<ArmedCallback>;
}

// ─── HTML ───────────────────────────────────────────────────────────────────

const SUCCESS_HTML =
  '<html><body><h1>Authorization Successful!</h1>' +
  '<p>You can close this window and return to the application.</p></body></html>';

const MISSING_CODE_HTML =
  '<html><body><h1>OAuth Error</h1><p>No authorization code received.</p>' +
  '<p>You can close this window.</p></body></html>';

function errorHtml(error: string): string {
  return (
    `<html><body><h1>OAuth Error</h1><p>Error: ${escapeHtml(error)}</p>` +
    '<p>You can close this window.</p></body></html>'
  );
}

export function escapeHtml(str: string): string {
  return str
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#039;');
}

// ─── Receiver ───────────────────────────────────────────────────────────────

/**
 * One-shot local redirect receiver.
 *
 * Binds the exact host, port and path of the redirect URI, answers the first
 * request on that path with a terminal HTML page, and releases the listener.
 * Requests to any other path get a 404 and are not counted.
 */
export class CallbackReceiver implements CallbackListener {
  private readonly log: Logger;

  constructor(opts?: { logger?: Logger }) {
    this.log = opts?.logger ?? componentLogger('callback-receiver');
  }

  /** Bind, wait for exactly one callback, release. */
  async listen(redirectUri: string, opts?: CallbackWaitOptions): Promise<AuthorizationResult> {
    const armed = await this.arm(redirectUri);
    try {
      return await armed.wait(opts);
    } finally {
      await armed.close();
    }
  }

  async arm(redirectUri: string): Promise<ArmedCallback> {
    const target = parseRedirectUri(redirectUri);

    let deliver: (result: AuthorizationResult) => void = () => undefined;
    const received = new Promise<AuthorizationResult>((resolve) => {
      deliver = resolve;
    });
    let served = false;

    const app = express();
    app.disable('x-powered-by');
    // The redirect path matches exactly: no case folding, no trailing slash.
    app.set('case sensitive routing', true);
    app.set('strict routing', true);

    app.get(target.pathname, (req: Request, res: Response, next: NextFunction) => {
      // app.get also routes HEAD; only a GET is the callback.
      if (served || req.method !== 'GET') {
        next();
        return;
      }
      served = true;

      const result = extractResult(req.originalUrl);
      const ok = result.code !== undefined && result.error === undefined;
      const html =
        result.error !== undefined
          ? errorHtml(result.error)
          : result.code !== undefined
            ? SUCCESS_HTML
            : MISSING_CODE_HTML;

      this.log.info(
        { hasCode: result.code !== undefined, error: result.error, status: ok ? 200 : 400 },
        'Authorization callback received',
      );

      res.set('Connection', 'close');
      res.status(ok ? 200 : 400).type('html').send(html);
      deliver(result);
    });

    app.use((_req: Request, res: Response) => {
      res.status(404).type('text/plain').send('Not Found');
    });

    const server = createServer(app);
    await bind(server, target.port, target.hostname, redirectUri);

    const actual = new URL(redirectUri);
    actual.port = String(boundPort(server.address(), target.port));

    this.log.info({ redirectUri: actual.toString() }, 'Listening for authorization callback');

    return new OneShotCallback(actual.toString(), server, received, this.log);
  }
}

class OneShotCallback implements ArmedCallback {
  private closing: Promise<void> | null = null;

  constructor(
    readonly redirectUri: string,
    private readonly server: Server,
    private readonly received: Promise<AuthorizationResult>,
    private readonly log: Logger,
  ) {}

  async wait(opts: CallbackWaitOptions = {}): Promise<AuthorizationResult> {
    try {
      return await this.race(opts);
    } finally {
      await this.close();
    }
  }

  close(): Promise<void> {
    if (!this.closing) {
      this.closing = new Promise<void>((resolve) => {
        this.server.close((err) => {
          if (err) {
            this.log.debug({ err }, 'Callback listener was not running');
          }
          resolve();
        });
        this.server.closeAllConnections();
      });
      this.log.debug({ redirectUri: this.redirectUri }, 'Callback listener released');
    }
    return this.closing;
  }

  private race({ timeoutMs, signal }: CallbackWaitOptions): Promise<AuthorizationResult> {
    return new Promise<AuthorizationResult>((resolve, reject) => {
      if (signal?.aborted) {
        reject(new CallbackAbortedError());
        return;
      }

      let timer: NodeJS.Timeout | undefined;

      const cleanup = () => {
        if (timer) clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
      };

      const onAbort = () => {
        cleanup();
        reject(new CallbackAbortedError());
      };

      if (timeoutMs !== undefined) {
        timer = setTimeout(() => {
          cleanup();
          reject(new CallbackTimeoutError(timeoutMs));
        }, timeoutMs);
      }
      signal?.addEventListener('abort', onAbort, { once: true });

      this.received.then((result) => {
        cleanup();
        resolve(result);
      }, reject);
    });
  }
}

// ─── Helpers ────────────────────────────────────────────────────────────────

interface RedirectTarget {
  hostname: string;
  port: number;
  pathname: string;
}

function parseRedirectUri(redirectUri: string): RedirectTarget {
  let url: URL;
  try {
    url = new URL(redirectUri);
  } catch {
    throw new ListenerBindError(`Invalid redirect URI: ${redirectUri}`, redirectUri);
  }

  if (url.protocol !== 'http:') {
    throw new ListenerBindError(
      `Redirect URI must use http: to be served locally, got ${url.protocol}`,
      redirectUri,
    );
  }

  return {
    // URL keeps IPv6 literals bracketed; listen() wants them bare
    hostname: url.hostname.replace(/^\[(.*)\]$/, '$1'),
    port: url.port === '' ? 80 : Number(url.port),
    pathname: url.pathname,
  };
}

function bind(server: Server, port: number, hostname: string, redirectUri: string): Promise<void> {
  return new Promise((resolve, reject) => {
    const onError = (err: Error) => {
      reject(
        new ListenerBindError(
          `Could not listen on ${hostname}:${port}: ${err.message}`,
          redirectUri,
        ),
      );
    };
    server.once('error', onError);
    server.listen(port, hostname, () => {
      server.off('error', onError);
      resolve();
    });
  });
}

function boundPort(address: AddressInfo | string | null, requested: number): number {
  return typeof address === 'object' && address !== null ? address.port : requested;
}

function extractResult(originalUrl: string): AuthorizationResult {
  const params = new URL(originalUrl, 'http://localhost').searchParams;
  const result: AuthorizationResult = {};

  const code = params.get('code');
  const state = params.get('state');
  const error = params.get('error');
  const errorDescription = params.get('error_description');

  if (code) result.code = code;
  if (state) result.state = state;
  if (error) result.error = error;
  if (errorDescription) result.errorDescription = errorDescription;

  return result;
}
