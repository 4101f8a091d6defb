#!/usr/bin/env node
import 'dotenv/config';

import { logger } from './shared/logger.js';
import { AppError } from './shared/errors.js';
import { validateEnv } from './config/env-validator.js';
import { getConfig } from './config/config-manager.js';
import { AuthorizationCodeCoordinator, generateState } from './oauth/coordinator.js';
import { ManualLauncher, SystemBrowserLauncher } from './oauth/launcher.js';
import { HostSession } from './host/session.js';

// ─── Unhandled Rejection Handler ─────────────────────────────────────────────

process.on('unhandledRejection', (reason) => {
  logger.error({ reason }, 'Unhandled promise rejection');
});

// ─── Main ───────────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  validateEnv();
  const config = getConfig();

  const coordinator = new AuthorizationCodeCoordinator(config.oauth, {
    launcher: config.openBrowser ? new SystemBrowserLauncher() : new ManualLauncher(),
  });
  const session = new HostSession(config, { coordinator });

  const controller = new AbortController();
  const stop = (signal: string) => {
    logger.info({ signal }, 'Shutdown signal received, closing stream');
    controller.abort();
  };
  process.once('SIGINT', () => stop('SIGINT'));
  process.once('SIGTERM', () => stop('SIGTERM'));

  const { accessToken } = await session.authenticate({
    state: generateState(),
    signal: controller.signal,
  });
  logger.info(
    { tokenLength: accessToken.length, obtainedAt: new Date().toISOString() },
    'Access token obtained',
  );

  session.router.on('response', (message) => {
    process.stdout.write(`${JSON.stringify({ id: message.id, result: message.result })}\n`);
  });
  session.router.on('error-response', (message) => {
    process.stdout.write(`${JSON.stringify({ id: message.id, error: message.error })}\n`);
  });
  session.router.on('notification', (message) => {
    process.stdout.write(`${JSON.stringify({ method: message.method, params: message.params })}\n`);
  });

  const stats = await session.start({ signal: controller.signal });
  logger.info(stats, 'Session finished');
}

main().then(
  () => process.exit(0),
  (err: unknown) => {
    if (err instanceof AppError) {
      logger.error({ code: err.code }, err.message);
    } else {
      logger.fatal({ err }, 'Unexpected failure');
    }
    process.exit(1);
  },
);
