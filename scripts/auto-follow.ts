#!/usr/bin/env node
/**
 * Follow every account listed in the followings file with the
 * [auto_follow_credential] account
 *
 * Usage:
 *   npm run follow
 *
 * Environment (optional):
 *   BILI_CONFIG_FILE, BILI_FOLLOWINGS_FILE, LOG_LEVEL
 */

import { runAutoFollow } from '../src/cli/index.js';
import { getAppConfig } from '../src/config/index.js';
import { logger } from '../src/logging/index.js';

async function main(): Promise<void> {
  const { configFile, followingsFile } = getAppConfig();

  const result = await runAutoFollow({ configPath: configFile, followingsPath: followingsFile });

  if (result.status === 'aborted') {
    process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  logger.fatal({ error: error instanceof Error ? error.message : String(error) }, 'Unexpected failure');
  console.error('\n❌ Unexpected error:', error);
  process.exitCode = 1;
});
