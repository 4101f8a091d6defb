export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: string;

  constructor(message: string, statusCode: number, code: string) {
    super(message);
    this.name = 'AppError';
    this.statusCode = statusCode;
    this.code = code;
  }
}

export class ConfigError extends AppError {
  constructor(message = 'Invalid configuration') {
    super(message, 500, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}

// ─── Authorization ──────────────────────────────────────────────────────────

export class ListenerBindError extends AppError {
  constructor(message: string, public readonly redirectUri: string) {
    super(message, 500, 'LISTENER_BIND_ERROR');
    this.name = 'ListenerBindError';
  }
}

/** Logged when the user agent cannot be opened. Never thrown. */
export class BrowserLaunchWarning extends AppError {
  constructor(message: string, public readonly url: string) {
    super(message, 0, 'BROWSER_LAUNCH_WARNING');
    this.name = 'BrowserLaunchWarning';
  }
}

export class CallbackError extends AppError {
  constructor(public readonly error: string, public readonly errorDescription?: string) {
    super(
      `Authorization server returned error: ${error}${errorDescription ? ` (${errorDescription})` : ''}`,
      400,
      'CALLBACK_ERROR',
    );
    this.name = 'CallbackError';
  }
}

export class MissingCodeError extends AppError {
  constructor(message = 'No authorization code received') {
    super(message, 400, 'MISSING_CODE');
    this.name = 'MissingCodeError';
  }
}

export class StateMismatchError extends AppError {
  constructor(
    public readonly expected: string,
    public readonly received: string | undefined,
  ) {
    super('State parameter mismatch - possible CSRF attack', 400, 'STATE_MISMATCH');
    this.name = 'StateMismatchError';
  }
}

export class CallbackTimeoutError extends AppError {
  constructor(public readonly timeoutMs: number) {
    super(`No authorization callback received within ${timeoutMs}ms`, 408, 'CALLBACK_TIMEOUT');
    this.name = 'CallbackTimeoutError';
  }
}

export class CallbackAbortedError extends AppError {
  constructor(message = 'Authorization callback wait was aborted') {
    super(message, 499, 'CALLBACK_ABORTED');
    this.name = 'CallbackAbortedError';
  }
}

// ─── Token exchange ─────────────────────────────────────────────────────────

export class TokenExchangeHttpError extends AppError {
  constructor(public readonly status: number, public readonly body: string) {
    super(
      status === 0
        ? `Token exchange request failed: ${body}`
        : `Token exchange failed (${status}): ${body}`,
      502,
      'TOKEN_EXCHANGE_HTTP_ERROR',
    );
    this.name = 'TokenExchangeHttpError';
  }
}

export class TokenParseError extends AppError {
  constructor(public readonly body: string, reason = 'missing access_token') {
    super(`Failed to parse token response: ${reason}`, 502, 'TOKEN_PARSE_ERROR');
    this.name = 'TokenParseError';
  }
}

// ─── Stream and RPC ─────────────────────────────────────────────────────────

export class StreamConnectError extends AppError {
  constructor(public readonly status: number, public readonly body: string) {
    super(
      status === 0
        ? `Stream connection failed: ${body}`
        : `Stream connection failed (${status}): ${body}`,
      502,
      'STREAM_CONNECT_ERROR',
    );
    this.name = 'StreamConnectError';
  }
}

export class StreamReadError extends AppError {
  constructor(message: string) {
    super(`Stream read failed: ${message}`, 502, 'STREAM_READ_ERROR');
    this.name = 'StreamReadError';
  }
}

export class MessageParseError extends AppError {
  constructor(message: string, public readonly raw: string) {
    super(message, 400, 'MESSAGE_PARSE_ERROR');
    this.name = 'MessageParseError';
  }
}

export class RpcSendError extends AppError {
  constructor(message: string, public readonly endpoint: string) {
    super(message, 502, 'RPC_SEND_ERROR');
    this.name = 'RpcSendError';
  }
}
