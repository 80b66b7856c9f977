/**
 * Pacing helpers shared by the exporter, the follow driver and the scheduler
 */

export { sleep, secondsToMs } from './sleep.js';
