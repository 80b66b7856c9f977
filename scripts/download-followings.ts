#!/usr/bin/env node
/**
 * Export the following list of the [download_credential] account
 *
 * Usage:
 *   npm run download
 *
 * Environment (optional):
 *   BILI_CONFIG_FILE, BILI_FOLLOWINGS_FILE, LOG_LEVEL
 */

import { runDownloadFollowings } from '../src/cli/index.js';
import { getAppConfig } from '../src/config/index.js';
import { logger } from '../src/logging/index.js';

async function main(): Promise<void> {
  const { configFile, followingsFile } = getAppConfig();

  const result = await runDownloadFollowings({ configPath: configFile, outputPath: followingsFile });

  if (result.status === 'aborted' || result.status === 'write-failed') {
    process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  logger.fatal({ error: error instanceof Error ? error.message : String(error) }, 'Unexpected failure');
  console.error('\n❌ Unexpected error:', error);
  process.exitCode = 1;
});
