/**
 * Command-line program exports
 */

export {
  runDownloadFollowings,
  type DownloadFollowingsOptions,
  type DownloadFollowingsResult,
} from './download-followings.js';

export {
  runAutoFollow,
  type AutoFollowAbortReason,
  type AutoFollowOptions,
  type AutoFollowResult,
} from './auto-follow.js';

export { type ClientFactory, type PrintFn } from './shared.js';
