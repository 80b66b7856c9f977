/**
 * FollowDriver
 *
 * Follows every target mid in order. Each target is first checked against
 * the current relationship; targets that still need a follow get up to
 * `maxRetries + 1` subscribe calls. Pauses between targets and between
 * attempts keep the account under the API's rate limits.
 */

import { BilibiliApiError } from '../../clients/bilibili/index.js';
import type { BilibiliClient } from '../../clients/bilibili/index.js';
import { DEFAULT_FOLLOW_SETTINGS } from '../../config/index.js';
import type { FollowSettings } from '../../config/index.js';
import { createServiceLogger, log, toError } from '../../logging/index.js';
import type { ServiceLogger } from '../../logging/index.js';
import { sleep } from '../../utils/pacing/index.js';
import {
  classifyFollowError,
  emptyTally,
  recordOutcome,
} from './follow-outcome.js';
import type {
  FollowAttemptResult,
  FollowProgressEvent,
  FollowTally,
  TargetOutcome,
} from './follow-outcome.js';
import { isFollowingState, relationStateFromAttribute } from './relation-state.js';
import type { RelationState } from './relation-state.js';

type PrecheckResult =
  | { kind: 'settled'; outcome: TargetOutcome }
  | { kind: 'proceed'; state: RelationState };

export interface TargetProgress {
  /** 1-based position of the target in the run */
  position: number;
  total: number;
  outcome: TargetOutcome;
}

export interface FollowDriverDependencies {
  client: BilibiliClient;
  /** Overrides for DEFAULT_FOLLOW_SETTINGS */
  settings?: Partial<FollowSettings>;
  /** Called once per target, before the pause that follows it */
  onTarget?: (progress: TargetProgress) => void;
  /** Called for each follow attempt, failed attempt and failed pre-check */
  onProgress?: (event: FollowProgressEvent) => void;
}

export class FollowDriver {
  private readonly client: BilibiliClient;
  private readonly settings: FollowSettings;
  private readonly onTarget: ((progress: TargetProgress) => void) | undefined;
  private readonly onProgress: ((event: FollowProgressEvent) => void) | undefined;
  private readonly logger: ServiceLogger;

  constructor(dependencies: FollowDriverDependencies) {
    this.client = dependencies.client;
    this.settings = { ...DEFAULT_FOLLOW_SETTINGS, ...dependencies.settings };
    this.onTarget = dependencies.onTarget;
    this.onProgress = dependencies.onProgress;
    this.logger = createServiceLogger('FollowDriver');
  }

  getSettings(): Readonly<FollowSettings> {
    return this.settings;
  }

  /**
   * Process `targets` in order and tally the outcomes
   *
   * Duplicated mids are processed once per occurrence.
   */
  async run(targets: readonly number[]): Promise<FollowTally> {
    log.methodEntry(this.logger, 'run', { targetCount: targets.length });

    let tally = emptyTally();
    for (const [index, mid] of targets.entries()) {
      const outcome = await this.followTarget(mid);
      tally = recordOutcome(tally, outcome);
      this.onTarget?.({ position: index + 1, total: targets.length, outcome });
      await sleep(this.pauseAfter(outcome));
    }

    log.methodExit(this.logger, 'run', {
      successfulFollows: tally.successfulFollows,
      failedFollows: tally.failedFollows,
    });
    return tally;
  }

  /**
   * Settle a single target, including retry pauses but not the pause that
   * separates it from the next target
   */
  async followTarget(mid: number): Promise<TargetOutcome> {
    const precheck = await this.precheck(mid);
    if (precheck.kind === 'settled') {
      return precheck.outcome;
    }
    return this.followWithRetries(mid, precheck.state);
  }

  /**
   * Targets settled by the pre-check made no subscribe call and wait the
   * short skip interval
   */
  private pauseAfter(outcome: TargetOutcome): number {
    return outcome.attempts === 0 ? this.settings.skipIntervalMs : this.settings.followIntervalMs;
  }

  private async precheck(mid: number): Promise<PrecheckResult> {
    try {
      const relation = await this.client.getRelation(mid);
      const state = relationStateFromAttribute(relation.attribute);
      if (isFollowingState(state)) {
        this.logger.info({ mid, state }, 'Already following, skipping');
        return { kind: 'settled', outcome: { kind: 'already-following', mid, state, attempts: 0 } };
      }
      return { kind: 'proceed', state };
    } catch (error) {
      if (error instanceof BilibiliApiError && error.isNotFound) {
        this.logger.warn({ mid, code: error.code }, 'User does not exist, skipping');
        return { kind: 'settled', outcome: { kind: 'not-found', mid, attempts: 0 } };
      }
      log.methodError(this.logger, 'precheck', error, { mid });
      this.onProgress?.({ kind: 'precheck-failed', mid, message: toError(error).message });
      return { kind: 'proceed', state: 'unknown' };
    }
  }

  private async followWithRetries(mid: number, state: RelationState): Promise<TargetOutcome> {
    const maxAttempts = this.settings.maxRetries + 1;
    let lastError = '';

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      this.onProgress?.({ kind: 'attempt', mid, attempt, maxAttempts });
      const result = await this.attemptFollow(mid);

      switch (result.kind) {
        case 'followed':
          this.logger.info({ mid, attempt, previousState: state }, 'Followed');
          return { kind: 'followed', mid, attempts: attempt };
        case 'already-following':
          this.logger.info({ mid, attempt }, 'Follow call reports already following');
          return { kind: 'already-following', mid, state: 'following', attempts: attempt };
        case 'not-found':
          this.logger.warn({ mid, attempt }, 'Follow call reports user does not exist');
          return { kind: 'not-found', mid, attempts: attempt };
        case 'transient-failure':
          lastError = result.message;
          this.logger.warn(
            { mid, attempt, maxAttempts, code: result.code, error: result.message },
            'Follow attempt failed'
          );
          this.onProgress?.({
            kind: 'attempt-failed',
            mid,
            attempt,
            maxAttempts,
            message: result.message,
            retryInMs: attempt < maxAttempts ? this.settings.retryIntervalMs : null,
          });
          if (attempt < maxAttempts) {
            await sleep(this.settings.retryIntervalMs);
          }
          break;
      }
    }

    this.logger.error({ mid, attempts: maxAttempts, error: lastError }, 'Giving up on target');
    return { kind: 'exhausted', mid, attempts: maxAttempts, lastError };
  }

  private async attemptFollow(mid: number): Promise<FollowAttemptResult> {
    try {
      await this.client.subscribe(mid);
      return { kind: 'followed' };
    } catch (error) {
      return classifyFollowError(error);
    }
  }
}
