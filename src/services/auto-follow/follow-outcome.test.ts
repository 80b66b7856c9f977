/**
 * Tests for follow outcome classification and tallying
 */

import { describe, it, expect } from 'vitest';
import {
  classifyFollowError,
  describeOutcome,
  describeProgressEvent,
  emptyTally,
  formatFollowSummary,
  isSuccessfulOutcome,
  recordOutcome,
} from './follow-outcome.js';
import type { TargetOutcome } from './follow-outcome.js';
import { relationStateFromAttribute } from './relation-state.js';
import {
  alreadyFollowingError,
  blockedHttpError,
  notFoundError,
  rateLimitedError,
} from './test-fixtures.js';

describe('relationStateFromAttribute()', () => {
  it.each<[number, string]>([
    [0, 'not-following'],
    [1, 'not-following'],
    [2, 'following'],
    [6, 'mutual'],
    [128, 'not-following'],
  ])('should map attribute %i to %s', (attribute, state) => {
    expect(relationStateFromAttribute(attribute)).toBe(state);
  });
});

describe('classifyFollowError()', () => {
  it('should treat code 22014 as already following', () => {
    expect(classifyFollowError(alreadyFollowingError())).toEqual({
      kind: 'already-following',
      code: 22014,
    });
  });

  it('should treat code -404 as not found', () => {
    expect(classifyFollowError(notFoundError())).toEqual({ kind: 'not-found', code: -404 });
  });

  it('should treat other API codes as transient', () => {
    expect(classifyFollowError(rateLimitedError())).toEqual({
      kind: 'transient-failure',
      code: 22015,
      message: '请求过于频繁，请稍后再试',
    });
  });

  it('should treat HTTP and network errors as transient', () => {
    expect(classifyFollowError(blockedHttpError())).toEqual({
      kind: 'transient-failure',
      message: 'HTTP 412 Precondition Failed',
    });
    expect(classifyFollowError('socket hang up')).toEqual({
      kind: 'transient-failure',
      message: 'socket hang up',
    });
  });
});

describe('recordOutcome()', () => {
  const outcomes: TargetOutcome[] = [
    { kind: 'already-following', mid: 1, state: 'mutual', attempts: 0 },
    { kind: 'followed', mid: 2, attempts: 3 },
    { kind: 'not-found', mid: 3, attempts: 0 },
    { kind: 'exhausted', mid: 4, attempts: 11, lastError: 'HTTP 412' },
  ];

  it('should count successes and failures', () => {
    expect(outcomes.map(isSuccessfulOutcome)).toEqual([true, true, false, false]);
  });

  it('should increment exactly one counter per outcome', () => {
    const tally = outcomes.reduce(recordOutcome, emptyTally());

    expect(tally.successfulFollows).toBe(2);
    expect(tally.failedFollows).toBe(2);
    expect(tally.outcomes).toEqual(outcomes);
  });

  it('should not mutate the previous tally', () => {
    const before = emptyTally();

    const after = recordOutcome(before, { kind: 'followed', mid: 2, attempts: 1 });

    expect(before).toEqual({ successfulFollows: 0, failedFollows: 0, outcomes: [] });
    expect(after.successfulFollows).toBe(1);
  });
});

describe('describeOutcome()', () => {
  it('should describe each kind of outcome', () => {
    expect(describeOutcome({ kind: 'already-following', mid: 1, state: 'mutual', attempts: 0 })).toBe(
      'UID 1: already following (mutual), skipped.'
    );
    expect(describeOutcome({ kind: 'already-following', mid: 1, state: 'following', attempts: 0 })).toBe(
      'UID 1: already following, skipped.'
    );
    expect(describeOutcome({ kind: 'already-following', mid: 1, state: 'following', attempts: 2 })).toBe(
      'UID 1: already following.'
    );
    expect(describeOutcome({ kind: 'followed', mid: 2, attempts: 3 })).toBe(
      'UID 2: followed (attempt 3).'
    );
    expect(describeOutcome({ kind: 'not-found', mid: 3, attempts: 1 })).toBe(
      'UID 3: user does not exist, skipped.'
    );
    expect(describeOutcome({ kind: 'exhausted', mid: 4, attempts: 11, lastError: 'HTTP 412' })).toBe(
      'UID 4: still failing after 11 attempts, giving up. Last error: HTTP 412'
    );
  });
});

describe('describeProgressEvent()', () => {
  it('should describe attempts, failures and pre-check errors', () => {
    expect(describeProgressEvent({ kind: 'attempt', mid: 5, attempt: 2, maxAttempts: 11 })).toBe(
      'UID 5: follow attempt 2/11...'
    );
    expect(
      describeProgressEvent({
        kind: 'attempt-failed',
        mid: 5,
        attempt: 2,
        maxAttempts: 11,
        message: 'HTTP 412',
        retryInMs: 10_000,
      })
    ).toBe('UID 5: attempt 2/11 failed: HTTP 412. Retrying in 10s.');
    expect(
      describeProgressEvent({
        kind: 'attempt-failed',
        mid: 5,
        attempt: 11,
        maxAttempts: 11,
        message: 'HTTP 412',
        retryInMs: null,
      })
    ).toBe('UID 5: attempt 11/11 failed: HTTP 412.');
    expect(describeProgressEvent({ kind: 'precheck-failed', mid: 5, message: 'fetch failed' })).toBe(
      'UID 5: could not check the relationship (fetch failed), trying to follow anyway.'
    );
  });
});

describe('formatFollowSummary()', () => {
  it('should list both counters', () => {
    expect(
      formatFollowSummary({ successfulFollows: 2, failedFollows: 1, outcomes: [] })
    ).toEqual(['Follow run finished.', 'Successful follows: 2', 'Failed follows: 1']);
  });
});
