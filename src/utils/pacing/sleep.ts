/**
 * Resolve after `ms` milliseconds.
 *
 * All pacing pauses (page delay, skip delay, retry and follow intervals) go
 * through this function, which keeps them visible to fake timers in tests.
 */
export function sleep(ms: number): Promise<void> {
  if (ms <= 0) {
    return Promise.resolve();
  }
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Convert a duration in seconds (as written in config files) to milliseconds
 */
export function secondsToMs(seconds: number): number {
  return Math.round(seconds * 1000);
}
