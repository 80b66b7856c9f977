/**
 * Following Types
 *
 * Records of the "following" relationship as exported to followings.json.
 */

/**
 * One followed account as returned by the followings endpoint
 *
 * Only `mid` is relied on; every other profile field (uname, face, sign,
 * mtime, ...) is passed through to the export file untouched.
 */
export interface FollowingRecord {
  /** Member id of the followed account */
  mid: number;
  /** Display name */
  uname?: string;
  [field: string]: unknown;
}
