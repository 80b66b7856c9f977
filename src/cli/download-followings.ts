/**
 * download-followings program
 *
 * Exports the following list of the `[download_credential]` account to
 * followings.json.
 */

import { loadCredential } from '../config/index.js';
import { FollowingExportService } from '../services/following-export/index.js';
import { writeFollowingsFile } from '../services/following-store/index.js';
import { confirmCredential, defaultClientFactory, defaultPrint } from './shared.js';
import type { ClientFactory, PrintFn } from './shared.js';

export interface DownloadFollowingsOptions {
  configPath: string;
  outputPath: string;
  print?: PrintFn;
  createClient?: ClientFactory;
  /** Pause between page requests */
  pageDelayMs?: number;
}

export type DownloadFollowingsResult =
  | { status: 'aborted'; reason: 'config' | 'credential' }
  | { status: 'empty'; complete: boolean }
  | { status: 'write-failed'; count: number; message: string }
  | { status: 'exported'; count: number; path: string; complete: boolean };

export async function runDownloadFollowings(
  options: DownloadFollowingsOptions
): Promise<DownloadFollowingsResult> {
  const print = options.print ?? defaultPrint;
  const createClient = options.createClient ?? defaultClientFactory;

  print('Welcome to the bilibili following list exporter!');

  const credential = await loadCredential(options.configPath, 'download_credential', print);
  if (!credential) {
    return { status: 'aborted', reason: 'config' };
  }

  const client = createClient(credential);
  const account = await confirmCredential(
    client,
    credential,
    print,
    'Check that sessdata and bili_jct are correct and not expired.'
  );
  if (!account) {
    return { status: 'aborted', reason: 'credential' };
  }

  print('Fetching the following list...');
  const exporter = new FollowingExportService({
    client,
    pageDelayMs: options.pageDelayMs,
    onPage: ({ page, pageCount, accumulated, total }) =>
      print(`Fetched page ${page}: ${pageCount} users (${accumulated}/${total}).`),
  });
  const result = await exporter.fetchAllFollowings(credential.uid);

  if (result.error) {
    print(`Error while fetching the following list: ${result.error.message}`);
  }

  if (result.records.length === 0) {
    print('No followings were fetched, or the following list is empty.');
    return { status: 'empty', complete: result.complete };
  }

  print(`Fetched ${result.records.length} followings in total.`);

  const written = await writeFollowingsFile(options.outputPath, result.records);
  if (!written.ok) {
    print(`Error: ${written.message}`);
    return { status: 'write-failed', count: result.records.length, message: written.message };
  }

  print(`Following list exported to ${written.path}.`);
  return { status: 'exported', count: written.count, path: written.path, complete: result.complete };
}
