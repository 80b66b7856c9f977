/**
 * Follow Settings
 *
 * Pacing and retry parameters of the follow driver. The optional
 * `[auto_follow_settings]` section overrides the defaults (values in seconds):
 *
 * ```toml
 * [auto_follow_settings]
 * follow_interval = 3
 * max_retries = 10
 * retry_interval = 10
 * skip_interval = 0.5
 * ```
 */

import { z } from 'zod';
import { secondsToMs } from '../utils/pacing/index.js';
import { configError, isTable } from './config-file.js';
import type { ConfigDocument, ConfigResult } from './config-file.js';

export const FOLLOW_SETTINGS_SECTION = 'auto_follow_settings';

export interface FollowSettings {
  /** Additional attempts after the first failed follow call */
  maxRetries: number;
  /** Pause before retrying a transient failure */
  retryIntervalMs: number;
  /** Pause after every target that went through the follow attempts */
  followIntervalMs: number;
  /** Pause after a target settled by the relationship pre-check */
  skipIntervalMs: number;
}

export const DEFAULT_FOLLOW_SETTINGS: Readonly<FollowSettings> = {
  maxRetries: 10,
  retryIntervalMs: 10_000,
  followIntervalMs: 3_000,
  skipIntervalMs: 500,
};

const seconds = z.number().nonnegative().finite();

const followSettingsSchema = z
  .object({
    follow_interval: seconds.optional(),
    max_retries: z.number().int().nonnegative().optional(),
    retry_interval: seconds.optional(),
    skip_interval: seconds.optional(),
  })
  .strict();

/**
 * Read `[auto_follow_settings]`; an absent section yields the defaults
 */
export function extractFollowSettings(document: ConfigDocument): ConfigResult<FollowSettings> {
  const table = document[FOLLOW_SETTINGS_SECTION];
  if (table === undefined) {
    return { ok: true, value: { ...DEFAULT_FOLLOW_SETTINGS } };
  }
  if (!isTable(table)) {
    return configError('invalid-field', `[${FOLLOW_SETTINGS_SECTION}] must be a table.`);
  }

  const parsed = followSettingsSchema.safeParse(table);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')} ${issue.message}` : issue.message))
      .join('; ');
    return configError('invalid-field', `[${FOLLOW_SETTINGS_SECTION}] has invalid values: ${details}.`);
  }

  const settings = parsed.data;
  return {
    ok: true,
    value: {
      maxRetries: settings.max_retries ?? DEFAULT_FOLLOW_SETTINGS.maxRetries,
      retryIntervalMs:
        settings.retry_interval !== undefined
          ? secondsToMs(settings.retry_interval)
          : DEFAULT_FOLLOW_SETTINGS.retryIntervalMs,
      followIntervalMs:
        settings.follow_interval !== undefined
          ? secondsToMs(settings.follow_interval)
          : DEFAULT_FOLLOW_SETTINGS.followIntervalMs,
      skipIntervalMs:
        settings.skip_interval !== undefined
          ? secondsToMs(settings.skip_interval)
          : DEFAULT_FOLLOW_SETTINGS.skipIntervalMs,
    },
  };
}
