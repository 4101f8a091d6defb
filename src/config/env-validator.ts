import { logger } from '../shared/logger.js';
import { ConfigError } from '../shared/errors.js';

/** Env vars the host cannot run without. Everything else has a default. */
const REQUIRED_VARS = ['OAUTH_CLIENT_ID', 'OAUTH_CLIENT_SECRET', 'MCP_SERVER_URL'];

/** Env vars that must parse as a positive integer when set. */
const NUMERIC_VARS = ['OAUTH_CALLBACK_TIMEOUT_MS'];

/**
 * Validate environment variables. Throws ConfigError listing every problem
 * found, after logging them.
 */
export function validateEnv(env: NodeJS.ProcessEnv = process.env): void {
  const missing = REQUIRED_VARS.filter((varName) => !env[varName]);
  const invalid = NUMERIC_VARS.filter((varName) => {
    const value = env[varName];
    return value !== undefined && value !== '' && !/^[1-9]\d*$/.test(value);
  });

  if (missing.length > 0) {
    logger.error(
      { missing },
      `Missing required environment variables: ${missing.join(', ')}`,
    );
  }
  if (invalid.length > 0) {
    logger.error({ invalid }, `Environment variables must be positive integers: ${invalid.join(', ')}`);
  }

  if (missing.length > 0 || invalid.length > 0) {
    throw new ConfigError(
      [
        missing.length > 0 ? `missing ${missing.join(', ')}` : '',
        invalid.length > 0 ? `invalid ${invalid.join(', ')}` : '',
      ]
        .filter(Boolean)
        .join('; '),
    );
  }

  logger.info('Environment validation passed');
}
