/**
 * Following Export Service
 *
 * Pages through the "following" list of an account and accumulates every
 * record in server order. Pagination is best effort: an error on any page
 * ends the loop and the records gathered so far are returned.
 */

import { createServiceLogger, log, toError } from '../../logging/index.js';
import type { ServiceLogger } from '../../logging/index.js';
import { BilibiliClient } from '../../clients/bilibili/index.js';
import type { FollowingRecord } from '../../shared/types/index.js';
import { sleep } from '../../utils/pacing/index.js';

/**
 * Pause between two page requests
 */
export const DEFAULT_PAGE_DELAY_MS = 1_000;

export interface FollowingExportServiceDependencies {
  client: BilibiliClient;

  /**
   * @default DEFAULT_PAGE_DELAY_MS
   */
  pageDelayMs?: number;

  /**
   * Called after each page with the page number and running total
   */
  onPage?: (progress: ExportPageProgress) => void;
}

export interface ExportPageProgress {
  page: number;
  pageCount: number;
  accumulated: number;
  total: number;
}

export interface FollowingExportResult {
  records: FollowingRecord[];
  pagesFetched: number;
  /** Server-reported total from the last successful page, if any */
  total: number | null;
  /** False when a page request failed and pagination stopped early */
  complete: boolean;
  error?: Error;
}

export class FollowingExportService {
  private readonly client: BilibiliClient;
  private readonly pageDelayMs: number;
  private readonly onPage?: (progress: ExportPageProgress) => void;
  private readonly logger: ServiceLogger;

  constructor(dependencies: FollowingExportServiceDependencies) {
    this.client = dependencies.client;
    this.pageDelayMs = dependencies.pageDelayMs ?? DEFAULT_PAGE_DELAY_MS;
    this.onPage = dependencies.onPage;
    this.logger = createServiceLogger('FollowingExportService');
  }

  /**
   * Fetch every page of the accounts `uid` follows
   *
   * Stops on an empty page or once the accumulated count reaches the
   * server-reported total.
   */
  async fetchAllFollowings(uid: number): Promise<FollowingExportResult> {
    log.methodEntry(this.logger, 'fetchAllFollowings', { uid });

    const records: FollowingRecord[] = [];
    let total: number | null = null;
    let pagesFetched = 0;
    let page = 1;

    for (;;) {
      let pageList: FollowingRecord[];
      let pageTotal: number;
      try {
        const result = await this.client.getFollowings(uid, page);
        pageList = result.list;
        pageTotal = result.total;
      } catch (error) {
        log.methodError(this.logger, 'fetchAllFollowings', error, { uid, page });
        return { records, pagesFetched, total, complete: false, error: toError(error) };
      }

      pagesFetched++;
      total = pageTotal;

      if (pageList.length === 0) {
        break;
      }

      records.push(...pageList);
      this.onPage?.({ page, pageCount: pageList.length, accumulated: records.length, total: pageTotal });
      this.logger.info(
        { page, pageCount: pageList.length, accumulated: records.length, total: pageTotal },
        'Fetched followings page'
      );

      if (records.length >= pageTotal) {
        break;
      }

      page++;
      await sleep(this.pageDelayMs);
    }

    log.methodExit(this.logger, 'fetchAllFollowings', { count: records.length, pagesFetched });
    return { records, pagesFetched, total, complete: true };
  }
}
