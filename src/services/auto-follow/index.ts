/**
 * Auto-follow exports
 */

export { FollowDriver } from './follow-driver.js';
export type { FollowDriverDependencies, TargetProgress } from './follow-driver.js';

export {
  classifyFollowError,
  describeOutcome,
  describeProgressEvent,
  emptyTally,
  formatFollowSummary,
  isSuccessfulOutcome,
  recordOutcome,
} from './follow-outcome.js';
export type {
  FollowAttemptResult,
  FollowProgressEvent,
  FollowTally,
  TargetOutcome,
} from './follow-outcome.js';

export {
  RELATION_ATTRIBUTES,
  isFollowingState,
  relationStateFromAttribute,
} from './relation-state.js';
export type { RelationState } from './relation-state.js';
