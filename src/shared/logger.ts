import pino from 'pino';

const isDev = process.env.NODE_ENV !== 'production';

export const logger = pino({
  level: process.env.LOG_LEVEL ?? 'info',
  ...(isDev
    ? {
        transport: {
          target: 'pino/file',
          options: { destination: 2 }, // stderr, stdout stays free for the CLI
        },
      }
    : {}),
  redact: {
    paths: [
      'headers.authorization',
      'headers.Authorization',
      'token',
      '*.access_token',
      '*.client_secret',
      '*.accessToken',
    ],
    censor: '[REDACTED]',
  },
});

interface LogFn {
  (obj: object, msg?: string): void;
  (msg: string): void;
}

/**
 * Level-tagged logging capability injected into every component.
 * The pino root logger satisfies it; tests hand in `vi.fn()` doubles.
 */
export interface Logger {
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
}

/** Child logger scoped to one component. */
export function componentLogger(component: string): Logger {
  return logger.child({ component });
}
