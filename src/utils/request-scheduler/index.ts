/**
 * Request Scheduler Module
 *
 * Serializes outgoing API calls with a minimum spacing between them.
 */

export { RequestScheduler } from './request-scheduler.js';
export type { RequestSchedulerOptions } from './request-scheduler.js';
