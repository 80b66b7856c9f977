/**
 * bilibili Client Exports
 */

export {
  BilibiliClient,
  BilibiliApiError,
  BilibiliHttpError,
  BilibiliResponseFormatError,
  BILIBILI_RESPONSE_CODES,
  DEFAULT_FOLLOWINGS_PAGE_SIZE,
  type BilibiliClientDependencies,
} from './bilibili-client.js';

export type {
  BilibiliNavInfo,
  BilibiliFollowingsPage,
  BilibiliRelation,
  BilibiliRequest,
  HttpMethod,
} from './types.js';
