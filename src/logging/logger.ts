/**
 * Base Logger Configuration
 *
 * Pino logger setup with environment-based configuration for bili-follow-sync.
 * Structured JSON lines go to stderr so that stdout stays free for the
 * human-readable progress the CLI programs print.
 */

import pino from 'pino';

/**
 * Log level mapping by environment
 */
const LOG_LEVELS = {
  development: 'debug',
  production: 'info',
  test: 'silent',
} as const;

type KnownEnv = keyof typeof LOG_LEVELS;

function isKnownEnv(env: string): env is KnownEnv {
  return env in LOG_LEVELS;
}

/**
 * Get environment variables with defaults
 */
const NODE_ENV = process.env.NODE_ENV || 'production';
const LOG_LEVEL =
  process.env.LOG_LEVEL || (isKnownEnv(NODE_ENV) ? LOG_LEVELS[NODE_ENV] : 'info');

/**
 * Base logger configuration
 */
const loggerConfig: pino.LoggerOptions = {
  name: 'bili-follow-sync',
  level: LOG_LEVEL,
  timestamp: pino.stdTimeFunctions.isoTime,
  formatters: {
    level(label) {
      return { level: label };
    },
  },
};

/**
 * Singleton base logger. Service loggers are children created through
 * createServiceLogger() in logger-factory.ts.
 */
export const logger = pino(loggerConfig, pino.destination(2));

export type Logger = typeof logger;

export { LOG_LEVEL, NODE_ENV };
