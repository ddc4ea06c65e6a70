import type { FetchResult, StrategyId } from '../../types/index.js';

/**
 * One way of retrieving a URL. Failures throw (usually a CrawlError);
 * success returns rendered content or finished items.
 */
export interface FetchStrategy {
  readonly id: StrategyId;
  fetch(url: string): Promise<FetchResult>;
}

/**
 * Exactly one implementation per strategy id
 */
export type StrategyRegistry = { readonly [K in StrategyId]: FetchStrategy & { readonly id: K } };

/**
 * Pacing hooks shared by the strategies that wait on purpose
 */
export interface PacingOptions {
  sleep?: (ms: number) => Promise<void>;
  /** Returns [0, 1) */
  random?: () => number;
}
