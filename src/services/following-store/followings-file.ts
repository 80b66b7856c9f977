/**
 * Followings File
 *
 * Reads and writes followings.json, the JSON array exported by
 * download-followings and consumed by auto-follow.
 *
 * Only the `mid` field of each entry is interpreted. It may be a number or a
 * string of digits; anything else is reported as a skipped entry.
 */

import { readFile, writeFile } from 'fs/promises';
import { resolve } from 'path';
import { createServiceLogger } from '../../logging/index.js';
import type { FollowingRecord } from '../../shared/types/index.js';

const logger = createServiceLogger('FollowingsFile');

export type ReadFollowingsErrorReason = 'not-found' | 'read-error' | 'invalid-json' | 'not-an-array';

export type ReadFollowingsResult =
  | { ok: true; path: string; entries: unknown[] }
  | { ok: false; path: string; reason: ReadFollowingsErrorReason; message: string };

export type WriteFollowingsResult =
  | { ok: true; path: string; count: number }
  | { ok: false; path: string; message: string };

export type SkipReason = 'not-an-object' | 'missing-mid' | 'invalid-mid';

export type ParsedFollowingEntry =
  | { kind: 'target'; mid: number }
  | { kind: 'skipped'; reason: SkipReason; entry: unknown };

export interface SkippedEntry {
  index: number;
  reason: SkipReason;
  entry: unknown;
}

export interface ExtractedTargets {
  /** mids in file order, duplicates kept */
  targets: number[];
  skipped: SkippedEntry[];
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Write the records as a 4-space indented JSON array in UTF-8
 */
export async function writeFollowingsFile(
  path: string,
  records: readonly FollowingRecord[]
): Promise<WriteFollowingsResult> {
  const absolutePath = resolve(path);
  try {
    await writeFile(absolutePath, JSON.stringify(records, null, 4), 'utf-8');
    logger.info({ path: absolutePath, count: records.length }, 'Followings file written');
    return { ok: true, path: absolutePath, count: records.length };
  } catch (error) {
    logger.error({ path: absolutePath, error: String(error) }, 'Failed to write followings file');
    return { ok: false, path: absolutePath, message: `failed to save ${absolutePath}: ${String(error)}` };
  }
}

/**
 * Read followings.json and check that it holds a JSON array
 */
export async function readFollowingsFile(path: string): Promise<ReadFollowingsResult> {
  const absolutePath = resolve(path);

  let text: string;
  try {
    text = await readFile(absolutePath, 'utf-8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return {
        ok: false,
        path: absolutePath,
        reason: 'not-found',
        message: `file ${absolutePath} does not exist. Run the download program first to export a following list.`,
      };
    }
    return {
      ok: false,
      path: absolutePath,
      reason: 'read-error',
      message: `failed to read ${absolutePath}: ${String(error)}`,
    };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    return {
      ok: false,
      path: absolutePath,
      reason: 'invalid-json',
      message: `failed to parse ${absolutePath}: ${error instanceof Error ? error.message : String(error)}`,
    };
  }

  if (!Array.isArray(parsed)) {
    return {
      ok: false,
      path: absolutePath,
      reason: 'not-an-array',
      message: `${absolutePath} must contain a JSON array.`,
    };
  }

  return { ok: true, path: absolutePath, entries: parsed };
}

/**
 * Coerce a `mid` value: positive safe integers, or strings of digits
 */
export function coerceMid(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isSafeInteger(value) && value > 0 ? value : null;
  }
  if (typeof value === 'string' && /^\s*\d+\s*$/.test(value)) {
    const mid = Number(value.trim());
    return Number.isSafeInteger(mid) && mid > 0 ? mid : null;
  }
  return null;
}

export function parseFollowingEntry(entry: unknown): ParsedFollowingEntry {
  if (!isRecord(entry)) {
    return { kind: 'skipped', reason: 'not-an-object', entry };
  }
  if (!('mid' in entry)) {
    return { kind: 'skipped', reason: 'missing-mid', entry };
  }
  const mid = coerceMid(entry['mid']);
  if (mid === null) {
    return { kind: 'skipped', reason: 'invalid-mid', entry };
  }
  return { kind: 'target', mid };
}

/**
 * Collect the target mids of a followings file, logging every skipped entry
 */
export function extractTargetMids(entries: readonly unknown[]): ExtractedTargets {
  const targets: number[] = [];
  const skipped: SkippedEntry[] = [];

  entries.forEach((entry, index) => {
    const parsed = parseFollowingEntry(entry);
    switch (parsed.kind) {
      case 'target':
        targets.push(parsed.mid);
        break;
      case 'skipped':
        logger.warn({ index, reason: parsed.reason, entry }, 'Skipping invalid followings entry');
        skipped.push({ index, reason: parsed.reason, entry });
        break;
    }
  });

  return { targets, skipped };
}
