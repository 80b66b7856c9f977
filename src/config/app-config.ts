/**
 * Application Config
 *
 * File locations used by both programs.
 *
 * Environment Variables (optional):
 * - BILI_CONFIG_FILE      - TOML config with the credentials (default: config.toml)
 * - BILI_FOLLOWINGS_FILE  - exported following list (default: followings.json)
 * - LOG_LEVEL             - pino log level (see src/logging/logger.ts)
 */

import { resolve } from 'path';

export const DEFAULT_CONFIG_FILE = 'config.toml';
export const DEFAULT_FOLLOWINGS_FILE = 'followings.json';

export interface AppConfig {
  /** Absolute path of the TOML config file */
  configFile: string;
  /** Absolute path of followings.json */
  followingsFile: string;
}

export function getAppConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): AppConfig {
  return {
    configFile: resolve(cwd, env['BILI_CONFIG_FILE'] || DEFAULT_CONFIG_FILE),
    followingsFile: resolve(cwd, env['BILI_FOLLOWINGS_FILE'] || DEFAULT_FOLLOWINGS_FILE),
  };
}
