/**
 * RequestScheduler
 *
 * Serializes async tasks so that exactly one runs at a time, with a minimum
 * spacing between the end of one task and the start of the next.
 * Uses promise chaining to keep submission order.
 *
 * @example
 * ```typescript
 * const scheduler = new RequestScheduler({ minSpacingMs: 250, name: 'BilibiliScheduler' });
 *
 * const body = await scheduler.schedule(async () => {
 *   const response = await fetch('https://api.bilibili.com/x/web-interface/nav');
 *   return response.json();
 * });
 * ```
 */

import { createServiceLogger, log } from '../../logging/index.js';
import type { ServiceLogger } from '../../logging/index.js';
import { sleep } from '../pacing/index.js';

export interface RequestSchedulerOptions {
  /**
   * Minimum spacing between requests in milliseconds
   */
  minSpacingMs: number;

  /**
   * Optional name for logging purposes
   * @default 'RequestScheduler'
   */
  name?: string;
}

export class RequestScheduler {
  private chain: Promise<unknown> = Promise.resolve();
  private lastExecutionTime = 0;
  private readonly minSpacingMs: number;
  private readonly name: string;
  private readonly logger: ServiceLogger;

  constructor(options: RequestSchedulerOptions) {
    this.minSpacingMs = options.minSpacingMs;
    this.name = options.name || 'RequestScheduler';

    this.logger = createServiceLogger(this.name);
    this.logger.debug(
      { minSpacingMs: this.minSpacingMs },
      'RequestScheduler initialized'
    );
  }

  /**
   * Schedule a task for execution with minimum spacing
   *
   * Tasks queued concurrently run one after another in submission order.
   * A failing task rejects its own promise and does not break the chain.
   */
  schedule<T>(task: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.chain = this.chain.then(async () => {
        const waitTime = this.getTimeUntilNextExecution();

        if (waitTime > 0) {
          this.logger.debug({ waitMs: waitTime }, 'Waiting before executing request');
          await sleep(waitTime);
        }

        try {
          log.methodEntry(this.logger, 'schedule', { waitedMs: waitTime });
          const result = await task();
          log.methodExit(this.logger, 'schedule', { success: true });
          resolve(result);
        } catch (error) {
          log.methodError(this.logger, 'schedule', error);
          reject(error);
        } finally {
          this.lastExecutionTime = Date.now();
        }
      });
    });
  }

  /**
   * Milliseconds until the next task may start, or 0 if ready now
   */
  getTimeUntilNextExecution(): number {
    if (this.lastExecutionTime === 0) {
      return 0;
    }
    const timeSinceLastExecution = Date.now() - this.lastExecutionTime;
    return Math.max(0, this.minSpacingMs - timeSinceLastExecution);
  }
}
