/**
 * Follow Outcomes
 *
 * Tagged results of a single follow call and of a whole target, plus the
 * tally that accumulates them over a run.
 */

import { BilibiliApiError } from '../../clients/bilibili/index.js';
import { toError } from '../../logging/index.js';
import type { RelationState } from './relation-state.js';

/**
 * Result of one subscribe call
 */
export type FollowAttemptResult =
  | { kind: 'followed' }
  | { kind: 'already-following'; code: number }
  | { kind: 'not-found'; code: number }
  | { kind: 'transient-failure'; code?: number; message: string };

/**
 * Final result for one target mid
 *
 * `attempts` counts subscribe calls; 0 means the relationship pre-check
 * settled the target on its own.
 */
export type TargetOutcome =
  | { kind: 'already-following'; mid: number; state: RelationState; attempts: number }
  | { kind: 'followed'; mid: number; attempts: number }
  | { kind: 'not-found'; mid: number; attempts: number }
  | { kind: 'exhausted'; mid: number; attempts: number; lastError: string };

/**
 * Intermediate steps of a target, reported while it is being processed
 */
export type FollowProgressEvent =
  | { kind: 'precheck-failed'; mid: number; message: string }
  | { kind: 'attempt'; mid: number; attempt: number; maxAttempts: number }
  | {
      kind: 'attempt-failed';
      mid: number;
      attempt: number;
      maxAttempts: number;
      message: string;
      /** Pause before the next attempt; null after the last one */
      retryInMs: number | null;
    };

export interface FollowTally {
  successfulFollows: number;
  failedFollows: number;
  outcomes: readonly TargetOutcome[];
}

function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(value)}`);
}

/**
 * Classify an error raised by the subscribe call
 *
 * 22014 (already following) and -404 (no such user) are final; every other
 * API code, HTTP error or network failure is worth another attempt.
 */
export function classifyFollowError(error: unknown): FollowAttemptResult {
  if (error instanceof BilibiliApiError) {
    if (error.isAlreadyFollowing) {
      return { kind: 'already-following', code: error.code };
    }
    if (error.isNotFound) {
      return { kind: 'not-found', code: error.code };
    }
    return { kind: 'transient-failure', code: error.code, message: error.message };
  }
  return { kind: 'transient-failure', message: toError(error).message };
}

export function isSuccessfulOutcome(outcome: TargetOutcome): boolean {
  switch (outcome.kind) {
    case 'already-following':
    case 'followed':
      return true;
    case 'not-found':
    case 'exhausted':
      return false;
    default:
      return assertNever(outcome);
  }
}

export function emptyTally(): FollowTally {
  return { successfulFollows: 0, failedFollows: 0, outcomes: [] };
}

/**
 * Return a new tally with `outcome` counted exactly once
 */
export function recordOutcome(tally: FollowTally, outcome: TargetOutcome): FollowTally {
  const successful = isSuccessfulOutcome(outcome);
  return {
    successfulFollows: tally.successfulFollows + (successful ? 1 : 0),
    failedFollows: tally.failedFollows + (successful ? 0 : 1),
    outcomes: [...tally.outcomes, outcome],
  };
}

/**
 * One-line, human-readable description of a target outcome
 */
export function describeOutcome(outcome: TargetOutcome): string {
  const { mid } = outcome;
  switch (outcome.kind) {
    case 'already-following':
      return outcome.attempts === 0
        ? `UID ${mid}: already following${outcome.state === 'mutual' ? ' (mutual)' : ''}, skipped.`
        : `UID ${mid}: already following.`;
    case 'followed':
      return `UID ${mid}: followed (attempt ${outcome.attempts}).`;
    case 'not-found':
      return `UID ${mid}: user does not exist, skipped.`;
    case 'exhausted':
      return `UID ${mid}: still failing after ${outcome.attempts} attempts, giving up. Last error: ${outcome.lastError}`;
    default:
      return assertNever(outcome);
  }
}

export function describeProgressEvent(event: FollowProgressEvent): string {
  const { mid } = event;
  switch (event.kind) {
    case 'precheck-failed':
      return `UID ${mid}: could not check the relationship (${event.message}), trying to follow anyway.`;
    case 'attempt':
      return `UID ${mid}: follow attempt ${event.attempt}/${event.maxAttempts}...`;
    case 'attempt-failed': {
      const failed = `UID ${mid}: attempt ${event.attempt}/${event.maxAttempts} failed: ${event.message}`;
      return event.retryInMs === null
        ? `${failed}.`
        : `${failed}. Retrying in ${event.retryInMs / 1000}s.`;
    }
    default:
      return assertNever(event);
  }
}

/**
 * Console summary printed at the end of a follow run
 */
export function formatFollowSummary(tally: FollowTally): string[] {
  return [
    'Follow run finished.',
    `Successful follows: ${tally.successfulFollows}`,
    `Failed follows: ${tally.failedFollows}`,
  ];
}
