/**
 * Zod schemas for bilibili web API responses
 */

import { z } from 'zod';

/**
 * Common response envelope: `code` 0 means success, anything else is an
 * API-level error described by `message`.
 */
export const envelopeSchema = z.object({
  code: z.number().int(),
  message: z.string().optional().default(''),
  data: z.unknown().optional(),
});

/** `GET /x/web-interface/nav` */
export const navInfoSchema = z.object({
  isLogin: z.boolean(),
  mid: z.number().int().optional(),
  uname: z.string().optional(),
});

/** One entry of `GET /x/relation/followings`; extra profile fields are kept */
export const followingItemSchema = z
  .object({
    mid: z.number().int(),
    uname: z.string().optional(),
  })
  .passthrough();

export const followingsPageSchema = z.object({
  list: z
    .array(followingItemSchema)
    .nullish()
    .transform((list) => list ?? []),
  total: z.number().int().nonnegative(),
});

/** `GET /x/relation` */
export const relationSchema = z.object({
  mid: z.number().int().optional(),
  attribute: z.number().int(),
  mtime: z.number().int().optional(),
});

/** Write endpoints return no payload worth keeping */
export const emptyDataSchema = z.unknown();
