/**
 * Tests for BilibiliClient
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { Mock } from 'vitest';
import { mockDeep } from 'vitest-mock-extended';
import type { DeepMockProxy } from 'vitest-mock-extended';
import {
  BilibiliClient,
  BilibiliApiError,
  BilibiliHttpError,
  BilibiliResponseFormatError,
  BILIBILI_RESPONSE_CODES,
} from './bilibili-client.js';
import { RequestScheduler } from '../../utils/request-scheduler/index.js';
import type { Credential } from '../../shared/types/index.js';

const CREDENTIAL: Credential = {
  sessdata: 'test-sessdata',
  biliJct: 'test-csrf',
  uid: 10001,
};

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

async function captureApiError(promise: Promise<unknown>): Promise<BilibiliApiError> {
  const error = await promise.then(
    () => undefined,
    (e: unknown) => e
  );
  if (!(error instanceof BilibiliApiError)) {
    throw new Error(`Expected BilibiliApiError, got ${String(error)}`);
  }
  return error;
}

describe('BilibiliClient', () => {
  let client: BilibiliClient;
  let fetchMock: Mock<typeof fetch>;
  let requestSchedulerMock: DeepMockProxy<RequestScheduler>;

  beforeEach(() => {
    // Mock RequestScheduler to execute tasks immediately
    requestSchedulerMock = mockDeep<RequestScheduler>();
    requestSchedulerMock.schedule.mockImplementation(async (task) => {
      return await task();
    });

    client = new BilibiliClient(CREDENTIAL, { requestScheduler: requestSchedulerMock });

    fetchMock = vi.fn<typeof fetch>();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  function lastRequest(): { url: URL; init: RequestInit | undefined } {
    const call = fetchMock.mock.calls.at(-1);
    if (!call) {
      throw new Error('fetch was not called');
    }
    const [input, init] = call;
    return { url: new URL(String(input)), init };
  }

  function lastHeaders(): Headers {
    return new Headers(lastRequest().init?.headers);
  }

  describe('request headers', () => {
    it('should send the credential cookies', async () => {
      fetchMock.mockResolvedValue(
        jsonResponse({ code: 0, message: '0', data: { isLogin: true, mid: 10001, uname: 'alice' } })
      );

      await client.getSelfInfo();

      expect(lastHeaders().get('cookie')).toBe(
        'SESSDATA=test-sessdata; bili_jct=test-csrf; DedeUserID=10001'
      );
      expect(lastHeaders().get('referer')).toBe('https://www.bilibili.com/');
    });

    it('should append buvid3 when the credential has one', async () => {
      client = new BilibiliClient(
        { ...CREDENTIAL, buvid3: 'test-device' },
        { requestScheduler: requestSchedulerMock }
      );
      fetchMock.mockResolvedValue(
        jsonResponse({ code: 0, data: { isLogin: true, mid: 10001, uname: 'alice' } })
      );

      await client.getSelfInfo();

      expect(lastHeaders().get('cookie')).toBe(
        'SESSDATA=test-sessdata; bili_jct=test-csrf; DedeUserID=10001; buvid3=test-device'
      );
    });

    it('should route every request through the scheduler', async () => {
      fetchMock.mockImplementation(async () => jsonResponse({ code: 0, data: { attribute: 0 } }));

      await client.getRelation(1);
      await client.getRelation(2);

      expect(requestSchedulerMock.schedule).toHaveBeenCalledTimes(2);
    });
  });

  describe('getSelfInfo()', () => {
    it('should return the logged-in account', async () => {
      fetchMock.mockResolvedValue(
        jsonResponse({
          code: 0,
          message: '0',
          data: { isLogin: true, mid: 10001, uname: 'alice', face: 'https://example.com/a.png' },
        })
      );

      const info = await client.getSelfInfo();

      expect(info).toEqual({ isLogin: true, mid: 10001, uname: 'alice' });
      expect(lastRequest().url.pathname).toBe('/x/web-interface/nav');
    });

    it('should throw BilibiliApiError with code -101 when not logged in', async () => {
      fetchMock.mockResolvedValue(
        jsonResponse({ code: -101, message: '账号未登录', data: { isLogin: false } })
      );

      const error = await captureApiError(client.getSelfInfo());

      expect(error.code).toBe(BILIBILI_RESPONSE_CODES.NOT_LOGGED_IN);
      expect(error.message).toBe('账号未登录');
      expect(error.endpoint).toBe('/x/web-interface/nav');
      expect(error.isNotLoggedIn).toBe(true);
    });
  });

  describe('getFollowings()', () => {
    it('should request the page with vmid, pn, ps and order', async () => {
      fetchMock.mockResolvedValue(
        jsonResponse({ code: 0, data: { list: [], total: 0 } })
      );

      await client.getFollowings(10001, 3);

      const { url, init } = lastRequest();
      expect(url.pathname).toBe('/x/relation/followings');
      expect(url.searchParams.get('vmid')).toBe('10001');
      expect(url.searchParams.get('pn')).toBe('3');
      expect(url.searchParams.get('ps')).toBe('50');
      expect(url.searchParams.get('order')).toBe('desc');
      expect(init?.method).toBe('GET');
    });

    it('should keep every profile field of the records', async () => {
      const record = { mid: 222, uname: 'bob', face: 'https://example.com/b.png', sign: 'hi', mtime: 1700000000 };
      fetchMock.mockResolvedValue(
        jsonResponse({ code: 0, data: { list: [record], re_version: 0, total: 1 } })
      );

      const page = await client.getFollowings(10001, 1);

      expect(page).toEqual({ list: [record], total: 1 });
    });

    it('should treat a null list as an empty page', async () => {
      fetchMock.mockResolvedValue(
        jsonResponse({ code: 0, data: { list: null, total: 0 } })
      );

      const page = await client.getFollowings(10001, 1);

      expect(page.list).toEqual([]);
    });

    it('should throw BilibiliResponseFormatError when records lack mid', async () => {
      fetchMock.mockResolvedValue(
        jsonResponse({ code: 0, data: { list: [{ uname: 'no-mid' }], total: 1 } })
      );

      await expect(client.getFollowings(10001, 1)).rejects.toThrow(BilibiliResponseFormatError);
    });
  });

  describe('getRelation()', () => {
    it('should return the relation attribute', async () => {
      fetchMock.mockResolvedValue(
        jsonResponse({ code: 0, data: { mid: 222, attribute: 6, mtime: 1700000000, tag: null, special: 0 } })
      );

      const relation = await client.getRelation(222);

      expect(relation).toEqual({ mid: 222, attribute: 6, mtime: 1700000000 });
      expect(lastRequest().url.searchParams.get('fid')).toBe('222');
    });

    it('should throw BilibiliApiError for unknown users', async () => {
      fetchMock.mockResolvedValue(jsonResponse({ code: -404, message: '啥都木有' }));

      const error = await captureApiError(client.getRelation(999));

      expect(error.code).toBe(-404);
      expect(error.isNotFound).toBe(true);
      expect(error.isAlreadyFollowing).toBe(false);
    });
  });

  describe('subscribe()', () => {
    it('should post the follow action with the csrf token', async () => {
      fetchMock.mockResolvedValue(jsonResponse({ code: 0, message: '0', ttl: 1 }));

      await client.subscribe(222);

      const { url, init } = lastRequest();
      expect(url.pathname).toBe('/x/relation/modify');
      expect(init?.method).toBe('POST');
      expect(lastHeaders().get('content-type')).toBe('application/x-www-form-urlencoded');
      expect(init?.body).toBe('fid=222&act=1&re_src=11&csrf=test-csrf');
    });

    it('should surface the already-following code', async () => {
      fetchMock.mockResolvedValue(jsonResponse({ code: 22014, message: '已经关注用户，无法重复关注' }));

      const error = await captureApiError(client.subscribe(222));

      expect(error.code).toBe(22014);
      expect(error.isAlreadyFollowing).toBe(true);
    });

    it('should use a generic message when the API sends none', async () => {
      fetchMock.mockResolvedValue(jsonResponse({ code: 22009 }));

      await expect(client.subscribe(222)).rejects.toThrow('API error code 22009');
    });
  });

  describe('transport errors', () => {
    it('should throw BilibiliHttpError on non-2xx status', async () => {
      fetchMock.mockResolvedValue(new Response('blocked', { status: 412, statusText: 'Precondition Failed' }));

      const error = await client.getRelation(222).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(BilibiliHttpError);
      expect(error).toMatchObject({
        statusCode: 412,
        message: 'HTTP 412 Precondition Failed: blocked',
      });
    });

    it('should throw BilibiliResponseFormatError on a non-JSON body', async () => {
      fetchMock.mockResolvedValue(new Response('<html></html>', { status: 200 }));

      await expect(client.getRelation(222)).rejects.toThrow(BilibiliResponseFormatError);
    });

    it('should throw BilibiliResponseFormatError on a body without code', async () => {
      fetchMock.mockResolvedValue(jsonResponse({ data: { attribute: 2 } }));

      await expect(client.getRelation(222)).rejects.toThrow('Unexpected response envelope');
    });

    it('should propagate network errors', async () => {
      fetchMock.mockRejectedValue(new TypeError('fetch failed'));

      await expect(client.getRelation(222)).rejects.toThrow('fetch failed');
    });
  });
});
