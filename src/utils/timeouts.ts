/**
 * Central Timeout Configuration
 *
 * All timeout and pacing values live here so strategies, discovery and the
 * oracles agree on them.
 */

/**
 * Default timeout values in milliseconds
 */
export const TIMEOUTS = {
  /**
   * Single GET issued by the plain and rotated request strategies
   */
  STRATEGY_REQUEST: 15000,

  /**
   * robots.txt, sitemap and base-page fetches during discovery
   */
  DISCOVERY_FETCH: 10000,

  /**
   * Browser navigation (waits for network idle)
   */
  PAGE_LOAD: 30000,

  /**
   * Bound on one oracle round trip
   */
  ORACLE_CALL: 60000,
} as const;

/**
 * Randomized pacing windows, [min, max) in milliseconds
 */
export const DELAYS = {
  /**
   * Pre-request pause for the rotated request strategy
   */
  ROTATED_REQUEST: [2000, 4000],

  /**
   * Post-navigation settle time for the hardened browser
   */
  HARDENED_SETTLE: [3000, 6000],
} as const satisfies Record<string, readonly [number, number]>;

/**
 * Pick a delay uniformly inside a window. `random` must return [0, 1).
 */
export function randomDelay(window: readonly [number, number], random: () => number = Math.random): number {
  const [min, max] = window;
  return Math.floor(min + random() * (max - min));
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
