/**
 * Following Record Test Fixtures
 *
 * Records shaped like entries of the followings endpoint.
 */

import type { FollowingRecord } from '../../shared/types/index.js';

export const ALICE_RECORD: FollowingRecord = {
  mid: 111,
  uname: '小明',
  sign: 'hello',
  face: 'https://example.com/111.png',
};

export const BOB_RECORD: FollowingRecord = {
  mid: 222,
  uname: 'bob',
  sign: '',
  face: 'https://example.com/222.png',
};

export const CAROL_RECORD: FollowingRecord = {
  mid: 333,
  uname: 'carol',
  sign: 'ciao',
  face: 'https://example.com/333.png',
};

/**
 * Build `count` records with consecutive mids starting at `firstMid`
 */
export function createFollowingRecords(count: number, firstMid = 1000): FollowingRecord[] {
  return Array.from({ length: count }, (_, i) => ({
    mid: firstMid + i,
    uname: `user-${firstMid + i}`,
  }));
}
