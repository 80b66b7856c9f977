/**
 * Followings File Store
 *
 * Barrel export for followings.json reading and writing.
 */

export {
  readFollowingsFile,
  writeFollowingsFile,
  parseFollowingEntry,
  extractTargetMids,
  coerceMid,
} from './followings-file.js';
export type {
  ReadFollowingsResult,
  ReadFollowingsErrorReason,
  WriteFollowingsResult,
  ParsedFollowingEntry,
  SkipReason,
  SkippedEntry,
  ExtractedTargets,
} from './followings-file.js';
