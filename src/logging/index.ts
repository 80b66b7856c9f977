/**
 * Logging Module
 *
 * Centralized logging utilities for bili-follow-sync.
 * Provides structured logging with Pino.
 */

export { logger, LOG_LEVEL, NODE_ENV } from './logger.js';
export type { Logger } from './logger.js';
export { createServiceLogger, LogPatterns, log, toError } from './logger-factory.js';
export type { ServiceLogger } from './logger-factory.js';
