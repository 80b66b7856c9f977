/**
 * bilibili API Client
 *
 * Cookie-authenticated client for the relationship endpoints of the bilibili
 * web API: own account info, paginated followings, pairwise relation and
 * subscribing to an account.
 *
 * Features:
 * - Credential cookies (SESSDATA, bili_jct, DedeUserID, buvid3) on every call
 * - One request in flight at a time through RequestScheduler
 * - Envelope and payload validation with zod
 * - Typed errors carrying the API's numeric response code
 */

import type { z } from 'zod';
import { createServiceLogger, log } from '../../logging/index.js';
import type { ServiceLogger } from '../../logging/index.js';
import { RequestScheduler } from '../../utils/request-scheduler/index.js';
import type { Credential } from '../../shared/types/index.js';
import {
  envelopeSchema,
  navInfoSchema,
  followingsPageSchema,
  relationSchema,
  emptyDataSchema,
} from './schemas.js';
import type {
  BilibiliNavInfo,
  BilibiliFollowingsPage,
  BilibiliRelation,
  BilibiliRequest,
} from './types.js';

const API_BASE_URL = 'https://api.bilibili.com';

const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 ' +
  '(KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36';

const REFERER = 'https://www.bilibili.com/';

/**
 * Response codes the callers branch on
 */
export const BILIBILI_RESPONSE_CODES = {
  OK: 0,
  NOT_LOGGED_IN: -101,
  NOT_FOUND: -404,
  ALREADY_FOLLOWING: 22014,
} as const;

/**
 * Largest page size the followings endpoint accepts
 */
export const DEFAULT_FOLLOWINGS_PAGE_SIZE = 50;

/** `act` values of /x/relation/modify */
const RELATION_ACT_SUBSCRIBE = 1;
/** `re_src` 11: action taken from a user's space page */
const RELATION_SOURCE_SPACE = 11;

/**
 * Error thrown when the API answers with a non-zero response code
 */
export class BilibiliApiError extends Error {
  constructor(
    message: string,
    public readonly code: number,
    public readonly endpoint: string
  ) {
    super(message);
    this.name = 'BilibiliApiError';
  }

  get isNotFound(): boolean {
    return this.code === BILIBILI_RESPONSE_CODES.NOT_FOUND;
  }

  get isAlreadyFollowing(): boolean {
    return this.code === BILIBILI_RESPONSE_CODES.ALREADY_FOLLOWING;
  }

  get isNotLoggedIn(): boolean {
    return this.code === BILIBILI_RESPONSE_CODES.NOT_LOGGED_IN;
  }
}

/**
 * Error thrown when the HTTP request itself fails (non-2xx status)
 */
export class BilibiliHttpError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly endpoint: string
  ) {
    super(message);
    this.name = 'BilibiliHttpError';
  }
}

/**
 * Error thrown when a response body does not have the expected shape
 */
export class BilibiliResponseFormatError extends Error {
  constructor(message: string, public readonly endpoint: string) {
    super(message);
    this.name = 'BilibiliResponseFormatError';
  }
}

/**
 * Dependencies for BilibiliClient
 */
export interface BilibiliClientDependencies {
  /**
   * Request scheduler serializing all calls
   * @default new RequestScheduler({ minSpacingMs: 250, name: 'BilibiliScheduler' })
   */
  requestScheduler?: RequestScheduler;

  /**
   * API base URL
   * @default 'https://api.bilibili.com'
   */
  baseUrl?: string;

  /**
   * User-Agent header; the API rejects requests without a browser-like one
   */
  userAgent?: string;
}

export class BilibiliClient {
  private readonly credential: Credential;
  private readonly requestScheduler: RequestScheduler;
  private readonly baseUrl: string;
  private readonly userAgent: string;
  private readonly logger: ServiceLogger;

  constructor(credential: Credential, dependencies: BilibiliClientDependencies = {}) {
    this.logger = createServiceLogger('BilibiliClient');
    this.credential = credential;
    this.baseUrl = dependencies.baseUrl ?? API_BASE_URL;
    this.userAgent = dependencies.userAgent ?? DEFAULT_USER_AGENT;
    this.requestScheduler =
      dependencies.requestScheduler ??
      new RequestScheduler({
        minSpacingMs: 250,
        name: 'BilibiliScheduler',
      });
  }

  /**
   * Get the account the credential is logged in as
   *
   * @throws BilibiliApiError with code -101 when the cookies are not accepted
   */
  async getSelfInfo(): Promise<BilibiliNavInfo> {
    return this.request(
      { method: 'GET', endpoint: '/x/web-interface/nav' },
      navInfoSchema
    );
  }

  /**
   * Get one page of the accounts `mid` follows, newest first
   *
   * @param page - 1-based page number
   */
  async getFollowings(
    mid: number,
    page: number,
    pageSize: number = DEFAULT_FOLLOWINGS_PAGE_SIZE
  ): Promise<BilibiliFollowingsPage> {
    return this.request(
      {
        method: 'GET',
        endpoint: '/x/relation/followings',
        query: { vmid: mid, pn: page, ps: pageSize, order: 'desc' },
      },
      followingsPageSchema
    );
  }

  /**
   * Get the relationship from the credential's account towards `mid`
   */
  async getRelation(mid: number): Promise<BilibiliRelation> {
    return this.request(
      { method: 'GET', endpoint: '/x/relation', query: { fid: mid } },
      relationSchema
    );
  }

  /**
   * Follow `mid`
   *
   * @throws BilibiliApiError with code 22014 when already following,
   *   -404 when the account does not exist
   */
  async subscribe(mid: number): Promise<void> {
    await this.request(
      {
        method: 'POST',
        endpoint: '/x/relation/modify',
        form: {
          fid: mid,
          act: RELATION_ACT_SUBSCRIBE,
          re_src: RELATION_SOURCE_SPACE,
          csrf: this.credential.biliJct,
        },
      },
      emptyDataSchema
    );
  }

  private buildCookieHeader(): string {
    const cookies = [
      `SESSDATA=${this.credential.sessdata}`,
      `bili_jct=${this.credential.biliJct}`,
      `DedeUserID=${this.credential.uid}`,
    ];
    if (this.credential.buvid3) {
      cookies.push(`buvid3=${this.credential.buvid3}`);
    }
    return cookies.join('; ');
  }

  private buildUrl(request: BilibiliRequest): string {
    const url = new URL(request.endpoint, this.baseUrl);
    for (const [key, value] of Object.entries(request.query ?? {})) {
      url.searchParams.set(key, String(value));
    }
    return url.toString();
  }

  private buildInit(request: BilibiliRequest): RequestInit {
    const headers: Record<string, string> = {
      Cookie: this.buildCookieHeader(),
      'User-Agent': this.userAgent,
      Referer: REFERER,
      Accept: 'application/json',
    };

    if (request.form) {
      headers['Content-Type'] = 'application/x-www-form-urlencoded';
      const body = new URLSearchParams();
      for (const [key, value] of Object.entries(request.form)) {
        body.set(key, String(value));
      }
      return { method: request.method, headers, body: body.toString() };
    }

    return { method: request.method, headers };
  }

  /**
   * Send a request through the scheduler, unwrap the envelope and validate
   * the payload against `schema`
   */
  private async request<S extends z.ZodTypeAny>(
    request: BilibiliRequest,
    schema: S
  ): Promise<z.infer<S>> {
    const { endpoint } = request;
    log.externalApiCall(this.logger, 'bilibili', endpoint, {
      method: request.method,
      query: request.query,
    });

    const body = await this.requestScheduler.schedule(async (): Promise<unknown> => {
      const response = await fetch(this.buildUrl(request), this.buildInit(request));

      if (!response.ok) {
        const text = await response.text().catch(() => '');
        throw new BilibiliHttpError(
          `HTTP ${response.status} ${response.statusText}${text ? `: ${text}` : ''}`,
          response.status,
          endpoint
        );
      }

      try {
        return await response.json();
      } catch (error) {
        throw new BilibiliResponseFormatError(
          `Response body is not JSON: ${String(error)}`,
          endpoint
        );
      }
    });

    const envelope = envelopeSchema.safeParse(body);
    if (!envelope.success) {
      throw new BilibiliResponseFormatError(
        `Unexpected response envelope: ${envelope.error.message}`,
        endpoint
      );
    }

    const { code, message, data } = envelope.data;
    if (code !== BILIBILI_RESPONSE_CODES.OK) {
      this.logger.debug({ endpoint, code, message }, 'API returned error code');
      throw new BilibiliApiError(message || `API error code ${code}`, code, endpoint);
    }

    const payload = schema.safeParse(data);
    if (!payload.success) {
      throw new BilibiliResponseFormatError(
        `Unexpected response data: ${payload.error.message}`,
        endpoint
      );
    }

    return payload.data;
  }
}
