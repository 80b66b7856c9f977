/**
 * Relation State
 *
 * Maps the `attribute` code of the relation endpoint to the states the
 * follow driver branches on.
 */

export type RelationState = 'not-following' | 'following' | 'mutual' | 'unknown';

/**
 * `attribute` values of /x/relation
 */
export const RELATION_ATTRIBUTES = {
  NOT_FOLLOWING: 0,
  FOLLOWING: 2,
  MUTUAL: 6,
  BLOCKED: 128,
} as const;

/**
 * 2 is following, 6 is mutual; every other code counts as not following
 */
export function relationStateFromAttribute(attribute: number): RelationState {
  switch (attribute) {
    case RELATION_ATTRIBUTES.FOLLOWING:
      return 'following';
    case RELATION_ATTRIBUTES.MUTUAL:
      return 'mutual';
    default:
      return 'not-following';
  }
}

export function isFollowingState(state: RelationState): state is 'following' | 'mutual' {
  return state === 'following' || state === 'mutual';
}
