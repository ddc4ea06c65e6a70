/**
 * Core types for the adaptive crawler
 */

// Re-export error taxonomy types
export * from './errors.js';

/**
 * Fetch strategies, in ascending order of cost and stealth.
 */
export const STRATEGY_ORDER = [
  'plain_request',
  'rotated_request',
  'rendered_browser',
  'hardened_browser',
] as const;

export type StrategyId = (typeof STRATEGY_ORDER)[number];

export function isStrategyId(value: unknown): value is StrategyId {
  return STRATEGY_ORDER.some((id) => id === value);
}

/**
 * Output unit handed back to the caller. Field names follow the persisted
 * wire shape.
 */
export interface ContentItem {
  title: string;
  content: string;
  content_type: string;
  source_url: string;
  author: string;
  user_id: string;
}

/**
 * One failed try inside a single URL's escalation loop.
 */
export interface Attempt {
  strategy: StrategyId;
  succeeded: false;
  ordinal: number;
  // Failure category, kept for logging only
  reason?: string;
}

/**
 * What a strategy hands back on success: either rendered content for the
 * extraction oracle, or finished items from a surgical extraction path.
 */
export type FetchResult =
  | { kind: 'content'; rawContent: string; finalUrl: string }
  | { kind: 'items'; items: ContentItem[]; finalUrl: string };

export type CrawlStatus =
  | 'crawl_completed'
  | 'no_urls_found'
  | 'fallback_failed'
  | 'all_strategies_failed';

export type DiscoverySource = 'sitemap' | 'links';

export interface CrawlStats {
  discovered: number;
  duplicatesRemoved: number;
  attempted: number;
  succeeded: number;
  exhausted: number;
  skippedOffDomain: number;
  abortedByDeadline: number;
  source?: DiscoverySource;
  durationMs: number;
}

export interface CrawlResult {
  team_id: string;
  items: ContentItem[];
  status: CrawlStatus;
  stats?: CrawlStats;
}
