/**
 * Test fixtures for the follow driver
 */

import { BilibiliApiError, BilibiliHttpError } from '../../clients/bilibili/index.js';
import type { BilibiliRelation } from '../../clients/bilibili/index.js';
import type { FollowSettings } from '../../config/index.js';
import { RELATION_ATTRIBUTES } from './relation-state.js';

export const NOT_FOLLOWING: BilibiliRelation = { attribute: RELATION_ATTRIBUTES.NOT_FOLLOWING };
export const FOLLOWING: BilibiliRelation = { attribute: RELATION_ATTRIBUTES.FOLLOWING };
export const MUTUAL: BilibiliRelation = { attribute: RELATION_ATTRIBUTES.MUTUAL };

/**
 * Short intervals with distinct magnitudes so elapsed time identifies which
 * pauses ran
 */
export const FAST_SETTINGS: FollowSettings = {
  maxRetries: 2,
  retryIntervalMs: 100,
  followIntervalMs: 30,
  skipIntervalMs: 5,
};

export function alreadyFollowingError(): BilibiliApiError {
  return new BilibiliApiError('已经关注用户，无法重复关注', 22014, '/x/relation/modify');
}

export function notFoundError(endpoint = '/x/relation/modify'): BilibiliApiError {
  return new BilibiliApiError('啥都木有', -404, endpoint);
}

export function rateLimitedError(): BilibiliApiError {
  return new BilibiliApiError('请求过于频繁，请稍后再试', 22015, '/x/relation/modify');
}

export function blockedHttpError(): BilibiliHttpError {
  return new BilibiliHttpError('HTTP 412 Precondition Failed', 412, '/x/relation/modify');
}
