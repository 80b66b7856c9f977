/**
 * Logger Factory
 *
 * Creates service-specific Pino child loggers with consistent patterns.
 * Provides utility functions for common logging scenarios.
 */

import type { Logger as PinoLogger } from 'pino';
import { logger as baseLogger } from './logger.js';

/**
 * Service logger: a Pino child logger bound to a `service` field
 */
export type ServiceLogger = PinoLogger;

/**
 * Create a service-specific logger with structured context
 *
 * @param serviceName - Name of the service (e.g., 'BilibiliClient', 'FollowDriver')
 *
 * @example
 * ```typescript
 * const logger = createServiceLogger('BilibiliClient');
 * logger.info('Fetching followings page');
 * // Output: {"level":"info","service":"BilibiliClient","msg":"Fetching followings page"}
 * ```
 */
export function createServiceLogger(serviceName: string): ServiceLogger {
  return baseLogger.child({
    service: serviceName,
  });
}

/**
 * Normalize a thrown value into an Error instance
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Common logging patterns for services
 *
 * Use these patterns to keep the log format uniform across services.
 */
export const LogPatterns = {
  /**
   * Log service method entry (debug level)
   *
   * @example
   * ```typescript
   * LogPatterns.methodEntry(logger, 'getFollowings', { mid: 42, page: 1 });
   * // Output: {"level":"debug","service":"...","method":"getFollowings","params":{"mid":42,"page":1},"msg":"Entering getFollowings"}
   * ```
   */
  methodEntry: (
    logger: ServiceLogger,
    method: string,
    params: Record<string, unknown> = {}
  ) => {
    logger.debug({ method, params }, `Entering ${method}`);
  },

  /**
   * Log service method exit (debug level)
   *
   * @param result - Optional result summary (avoid logging large objects)
   */
  methodExit: (
    logger: ServiceLogger,
    method: string,
    result?: Record<string, unknown>
  ) => {
    logger.debug({ method, result }, `Exiting ${method}`);
  },

  /**
   * Log service method error (error level)
   *
   * Accepts any thrown value; non-Error values are wrapped first.
   *
   * @example
   * ```typescript
   * LogPatterns.methodError(logger, 'subscribe', error, { mid: 42 });
   * // Output: {"level":"error","service":"...","method":"subscribe","error":"...","errorName":"BilibiliApiError","mid":42,"msg":"Error in subscribe"}
   * ```
   */
  methodError: (
    logger: ServiceLogger,
    method: string,
    error: unknown,
    context: Record<string, unknown> = {}
  ) => {
    const err = toError(error);
    logger.error(
      {
        method,
        error: err.message,
        errorName: err.name,
        stack: err.stack,
        ...context,
      },
      `Error in ${method}`
    );
  },

  /**
   * Log external API call (debug level)
   *
   * @example
   * ```typescript
   * LogPatterns.externalApiCall(logger, 'bilibili', '/x/relation', { fid: 42 });
   * // Output: {"level":"debug","service":"...","api":"bilibili","endpoint":"/x/relation","params":{"fid":42},"msg":"External API call: bilibili"}
   * ```
   */
  externalApiCall: (
    logger: ServiceLogger,
    api: string,
    endpoint: string,
    params: Record<string, unknown> = {}
  ) => {
    logger.debug({ api, endpoint, params }, `External API call: ${api}`);
  },
};

/**
 * Alias for LogPatterns for more concise usage
 *
 * @example
 * ```typescript
 * log.methodEntry(logger, 'run', { targets: 12 });
 * log.methodExit(logger, 'run');
 * ```
 */
export const log = LogPatterns;
