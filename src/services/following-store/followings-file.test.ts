/**
 * Tests for followings.json reading and writing
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  coerceMid,
  extractTargetMids,
  parseFollowingEntry,
  readFollowingsFile,
  writeFollowingsFile,
} from './followings-file.js';
import { ALICE_RECORD, BOB_RECORD } from './test-fixtures.js';

describe('followings file', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'bili-followings-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe('writeFollowingsFile()', () => {
    it('should write a 4-space indented array and keep non-ASCII text', async () => {
      const path = join(dir, 'followings.json');

      const result = await writeFollowingsFile(path, [ALICE_RECORD]);

      expect(result).toEqual({ ok: true, path, count: 1 });
      const written = await readFile(path, 'utf-8');
      expect(written).toBe(
        [
          '[',
          '    {',
          '        "mid": 111,',
          '        "uname": "小明",',
          '        "sign": "hello",',
          '        "face": "https://example.com/111.png"',
          '    }',
          ']',
        ].join('\n')
      );
    });

    it('should report a failed write without throwing', async () => {
      const path = join(dir, 'missing-dir', 'followings.json');

      const result = await writeFollowingsFile(path, [ALICE_RECORD]);

      expect(result.ok).toBe(false);
      expect(result.path).toBe(path);
    });
  });

  describe('readFollowingsFile()', () => {
    it('should read back what was written', async () => {
      const path = join(dir, 'followings.json');
      await writeFollowingsFile(path, [ALICE_RECORD, BOB_RECORD]);

      const result = await readFollowingsFile(path);

      expect(result).toEqual({ ok: true, path, entries: [ALICE_RECORD, BOB_RECORD] });
    });

    it('should report a missing file', async () => {
      const result = await readFollowingsFile(join(dir, 'followings.json'));

      expect(result).toMatchObject({ ok: false, reason: 'not-found' });
    });

    it('should report malformed JSON', async () => {
      const path = join(dir, 'followings.json');
      await writeFile(path, '[{"mid": 1},', 'utf-8');

      const result = await readFollowingsFile(path);

      expect(result).toMatchObject({ ok: false, reason: 'invalid-json' });
    });

    it('should reject a JSON object at the top level', async () => {
      const path = join(dir, 'followings.json');
      await writeFile(path, '{"mid": 1}', 'utf-8');

      const result = await readFollowingsFile(path);

      expect(result).toEqual({
        ok: false,
        path,
        reason: 'not-an-array',
        message: `${path} must contain a JSON array.`,
      });
    });
  });

  describe('coerceMid()', () => {
    it.each<[unknown, number | null]>([
      [111, 111],
      ['222', 222],
      [' 333 ', 333],
      [0, null],
      [-5, null],
      [12.5, null],
      ['12a', null],
      ['', null],
      [true, null],
      [null, null],
    ])('should map %j to %j', (value, expected) => {
      expect(coerceMid(value)).toBe(expected);
    });
  });

  describe('parseFollowingEntry()', () => {
    it('should accept an entry with a numeric mid', () => {
      expect(parseFollowingEntry({ mid: 111, uname: 'x' })).toEqual({ kind: 'target', mid: 111 });
    });

    it('should skip non-object entries', () => {
      expect(parseFollowingEntry(42)).toEqual({ kind: 'skipped', reason: 'not-an-object', entry: 42 });
      expect(parseFollowingEntry([1])).toEqual({ kind: 'skipped', reason: 'not-an-object', entry: [1] });
    });

    it('should skip entries without mid', () => {
      expect(parseFollowingEntry({ uname: 'x' })).toEqual({
        kind: 'skipped',
        reason: 'missing-mid',
        entry: { uname: 'x' },
      });
    });

    it('should skip entries with an unusable mid', () => {
      expect(parseFollowingEntry({ mid: 'abc' })).toEqual({
        kind: 'skipped',
        reason: 'invalid-mid',
        entry: { mid: 'abc' },
      });
    });
  });

  describe('extractTargetMids()', () => {
    it('should keep order and duplicates and list skipped entries', () => {
      const entries = [{ mid: 111 }, 'junk', { mid: '222' }, { name: 'no mid' }, { mid: 111 }];

      const result = extractTargetMids(entries);

      expect(result.targets).toEqual([111, 222, 111]);
      expect(result.skipped).toEqual([
        { index: 1, reason: 'not-an-object', entry: 'junk' },
        { index: 3, reason: 'missing-mid', entry: { name: 'no mid' } },
      ]);
    });
  });
});
