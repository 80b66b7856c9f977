/**
 * bilibili API Type Definitions
 *
 * Types for the subset of the bilibili web API used to export and re-create
 * a following list.
 */

import type { z } from 'zod';
import type {
  navInfoSchema,
  followingsPageSchema,
  relationSchema,
} from './schemas.js';

/**
 * Logged-in account summary from the nav endpoint
 */
export type BilibiliNavInfo = z.infer<typeof navInfoSchema>;

/**
 * One page of the followings list
 *
 * `total` is the server-side count of all followings, not of this page.
 */
export type BilibiliFollowingsPage = z.infer<typeof followingsPageSchema>;

/**
 * Relationship from the credential's account towards another account.
 * `attribute`: 0 not following, 2 following, 6 mutual, 128 blocked.
 */
export type BilibiliRelation = z.infer<typeof relationSchema>;

export type HttpMethod = 'GET' | 'POST';

/**
 * Request description handed to the client's transport
 */
export interface BilibiliRequest {
  method: HttpMethod;
  endpoint: string;
  /** Query string parameters */
  query?: Record<string, string | number>;
  /** Form-encoded body parameters (POST only) */
  form?: Record<string, string | number>;
}
