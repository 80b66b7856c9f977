/**
 * auto-follow program
 *
 * Follows every account listed in followings.json with the
 * `[auto_follow_credential]` account.
 */

import { resolve } from 'path';
import {
  extractCredential,
  extractFollowSettings,
  formatConfigError,
  readConfigDocument,
} from '../config/index.js';
import type { FollowSettings } from '../config/index.js';
import { createServiceLogger } from '../logging/index.js';
import {
  FollowDriver,
  describeOutcome,
  describeProgressEvent,
  formatFollowSummary,
} from '../services/auto-follow/index.js';
import type { FollowTally } from '../services/auto-follow/index.js';
import { extractTargetMids, readFollowingsFile } from '../services/following-store/index.js';
import type { SkippedEntry, SkipReason } from '../services/following-store/index.js';
import { confirmCredential, defaultClientFactory, defaultPrint } from './shared.js';
import type { ClientFactory, PrintFn } from './shared.js';

const logger = createServiceLogger('AutoFollowCli');

export interface AutoFollowOptions {
  configPath: string;
  followingsPath: string;
  print?: PrintFn;
  createClient?: ClientFactory;
  /** Applied on top of `[auto_follow_settings]` */
  settings?: Partial<FollowSettings>;
}

export type AutoFollowAbortReason = 'config' | 'credential' | 'followings-file' | 'no-targets';

export type AutoFollowResult =
  | { status: 'aborted'; reason: AutoFollowAbortReason }
  | { status: 'completed'; tally: FollowTally; skipped: SkippedEntry[] };

const SKIP_REASON_TEXT: Record<SkipReason, string> = {
  'not-an-object': 'malformed entry',
  'missing-mid': 'entry has no mid',
  'invalid-mid': 'invalid UID',
};

export async function runAutoFollow(options: AutoFollowOptions): Promise<AutoFollowResult> {
  const print = options.print ?? defaultPrint;
  const createClient = options.createClient ?? defaultClientFactory;

  print('Welcome to the bilibili auto-follow tool!');
  print('Accounts listed in the followings file will be followed.');

  const document = await readConfigDocument(options.configPath);
  if (!document.ok) {
    print(formatConfigError(document.error));
    return { status: 'aborted', reason: 'config' };
  }
  const credential = extractCredential(document.value, 'auto_follow_credential');
  if (!credential.ok) {
    print(formatConfigError(credential.error));
    return { status: 'aborted', reason: 'config' };
  }
  const settings = extractFollowSettings(document.value);
  if (!settings.ok) {
    print(formatConfigError(settings.error));
    return { status: 'aborted', reason: 'config' };
  }
  print(`Loaded configuration from ${resolve(options.configPath)}.`);

  const client = createClient(credential.value);
  const account = await confirmCredential(
    client,
    credential.value,
    print,
    'Check that sessdata, bili_jct, buvid3 and uid are correct and not expired.'
  );
  if (!account) {
    return { status: 'aborted', reason: 'credential' };
  }

  const file = await readFollowingsFile(options.followingsPath);
  if (!file.ok) {
    print(`Error: ${file.message}`);
    print('Could not load the following list, exiting.');
    return { status: 'aborted', reason: 'followings-file' };
  }

  const { targets, skipped } = extractTargetMids(file.entries);
  for (const entry of skipped) {
    print(`Warning: skipping entry ${entry.index} (${SKIP_REASON_TEXT[entry.reason]}): ${JSON.stringify(entry.entry)}`);
  }
  if (targets.length === 0) {
    print('No valid UIDs to follow.');
    return { status: 'aborted', reason: 'no-targets' };
  }

  print(`About to follow ${targets.length} users...`);
  logger.info({ targets: targets.length, skipped: skipped.length, uid: account.uid }, 'Starting follow run');

  const driver = new FollowDriver({
    client,
    settings: { ...settings.value, ...options.settings },
    onTarget: ({ position, total, outcome }) =>
      print(`[${position}/${total}] ${describeOutcome(outcome)}`),
    onProgress: (event) => print(describeProgressEvent(event)),
  });
  const tally = await driver.run(targets);

  print('');
  for (const line of formatFollowSummary(tally)) {
    print(line);
  }
  return { status: 'completed', tally, skipped };
}
