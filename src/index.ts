/**
 * adaptive-crawl
 *
 * Discovers the pages of a site, fetches each one with the cheapest
 * strategy likely to get past its defenses, and extracts structured
 * content items. Which strategies work is remembered per domain.
 */

export * from './types/index.js';

// SDK
export { createCrawler, CrawlerClient, type CrawlerConfig } from './sdk.js';

// Core
export { SiteCrawler, DEFAULT_TEAM_ID, type SiteCrawlerOptions } from './core/site-crawler.js';
export {
  SiteDiscovery,
  parseSitemap,
  findSitemapDirective,
  DEFAULT_MAX_SITEMAP_DEPTH,
  type DiscoveryResult,
  type ParsedSitemap,
  type SiteDiscoveryOptions,
} from './core/site-discovery.js';
export {
  OrchestratedFetch,
  DEFAULT_MAX_ATTEMPTS,
  type OrchestratedFetchOptions,
  type UrlOutcome,
} from './core/orchestrated-fetch.js';
export {
  DomainMemory,
  memorySnapshotSchema,
  type DomainMemoryView,
  type DomainMemoryOptions,
  type MemorySnapshot,
} from './core/domain-memory.js';
export {
  HeuristicStrategyPolicy,
  OracleStrategyPolicy,
  LlmStrategyOracle,
  FALLBACK_STRATEGY,
  untriedStrategies,
  type StrategyPolicy,
  type StrategyOracle,
  type StrategyOracleContext,
  type StrategyChoice,
} from './core/strategy-policy.js';
export {
  LlmExtractionOracle,
  extractItems,
  type ExtractionOracle,
  type ExtractedRecord,
} from './core/extraction-oracle.js';
export { createAnthropicCompletion, parseJsonReply, type TextCompletion, type CompletionRequest } from './core/oracle-client.js';
export {
  PlaywrightLauncher,
  withSession,
  type BrowserLauncher,
  type BrowserSession,
  type SessionOptions,
} from './core/browser-manager.js';
export * from './core/strategies/index.js';

// Utils
export { RateLimiter, type HostLimitConfig } from './utils/rate-limiter.js';
export { ConfigValidationError } from './utils/config-schemas.js';
export { parseCrawlConfig, parseOracleConfig, parseLogConfig, validateAllConfigs } from './utils/env-parser.js';
export { configureLogger, logger } from './utils/logger.js';
export type { FetchFn } from './utils/http-client.js';
