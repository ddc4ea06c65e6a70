/**
 * Adaptive Crawl SDK
 *
 * Wires discovery, strategies, policy, memory and oracles into a
 * SiteCrawler from environment config plus explicit overrides.
 *
 * @example
 * ```typescript
 * const crawler = await createCrawler({ apiKey: 'test-secret' });
 * const result = await crawler.crawl('https://example.com/blog');
 * console.log(result.status, result.items.length);
 * await crawler.close();
 * ```
 */

import type { CrawlResult } from './types/index.js';
import { getCrawlConfig, getLogConfig, getOracleConfig } from './utils/env-parser.js';
import { configureLogger } from './utils/logger.js';
import type { FetchFn } from './utils/http-client.js';
import { RateLimiter } from './utils/rate-limiter.js';
import { PlaywrightLauncher, type BrowserLauncher } from './core/browser-manager.js';
import { DomainMemory } from './core/domain-memory.js';
import { LlmExtractionOracle, type ExtractionOracle } from './core/extraction-oracle.js';
import { createAnthropicCompletion, type TextCompletion } from './core/oracle-client.js';
import { OrchestratedFetch } from './core/orchestrated-fetch.js';
import { SiteCrawler } from './core/site-crawler.js';
import { SiteDiscovery } from './core/site-discovery.js';
import { createStrategies } from './core/strategies/index.js';
import {
  HeuristicStrategyPolicy,
  LlmStrategyOracle,
  OracleStrategyPolicy,
  type StrategyPolicy,
} from './core/strategy-policy.js';

// =============================================================================
// SDK CONFIGURATION
// =============================================================================

export interface CrawlerConfig {
  /** Anthropic API key (default: ANTHROPIC_API_KEY) */
  apiKey?: string;
  /** Replaces the Claude-backed completion entirely */
  completion?: TextCompletion;
  /** Replaces the extraction oracle entirely */
  extractionOracle?: ExtractionOracle;
  /** Replaces the strategy policy entirely */
  policy?: StrategyPolicy;
  /** Ask the strategy oracle instead of the heuristic (default: STRATEGY_ORACLE) */
  useStrategyOracle?: boolean;
  launcher?: BrowserLauncher;
  fetchFn?: FetchFn;
  /** Existing memory to share between crawlers */
  memory?: DomainMemory;
  /** JSON file for domain memory (default: CRAWL_MEMORY_PATH) */
  memoryPath?: string;
  teamId?: string;
  concurrency?: number;
  deadlineMs?: number;
  maxAttempts?: number;
  minHostDelayMs?: number;
  sitemapMaxDepth?: number;
}

// =============================================================================
// SDK CLIENT
// =============================================================================

export class CrawlerClient {
  constructor(
    private readonly crawler: Pick<SiteCrawler, 'crawl' | 'scrape'>,
    readonly memory: DomainMemory
  ) {}

  crawl(baseUrl: string): Promise<CrawlResult> {
    return this.crawler.crawl(baseUrl);
  }

  scrape(url: string): Promise<CrawlResult> {
    return this.crawler.scrape(url);
  }

  /**
   * Flush pending domain-memory writes
   */
  async close(): Promise<void> {
    await this.memory.flush();
  }
}

function resolveCompletion(config: CrawlerConfig): TextCompletion {
  if (config.completion) return config.completion;

  const oracleConfig = getOracleConfig();
  const apiKey = config.apiKey ?? oracleConfig.apiKey;
  if (!apiKey) {
    throw new Error('An Anthropic API key is required: set ANTHROPIC_API_KEY or pass apiKey');
  }
  return createAnthropicCompletion({ apiKey, model: oracleConfig.model, timeoutMs: oracleConfig.timeoutMs });
}

/**
 * Build a ready crawler. Throws ConfigValidationError on invalid
 * environment configuration.
 */
export async function createCrawler(config: CrawlerConfig = {}): Promise<CrawlerClient> {
  configureLogger(getLogConfig());
  const crawlConfig = getCrawlConfig();

  const needsCompletion =
    !config.extractionOracle ||
    (!config.policy && (config.useStrategyOracle ?? getOracleConfig().useStrategyOracle));
  const completion = needsCompletion ? resolveCompletion(config) : undefined;

  const extractionOracle =
    config.extractionOracle ?? (completion ? new LlmExtractionOracle(completion) : undefined);
  if (!extractionOracle) {
    throw new Error('No extraction oracle configured');
  }

  let policy: StrategyPolicy;
  if (config.policy) {
    policy = config.policy;
  } else if (completion && (config.useStrategyOracle ?? getOracleConfig().useStrategyOracle)) {
    policy = new OracleStrategyPolicy(new LlmStrategyOracle(completion));
  } else {
    policy = new HeuristicStrategyPolicy();
  }

  const memoryPath = config.memoryPath ?? crawlConfig.memoryPath;
  const memory = config.memory ?? (memoryPath ? await DomainMemory.load(memoryPath) : new DomainMemory());

  const strategies = createStrategies({
    launcher: config.launcher ?? new PlaywrightLauncher(),
    fetchFn: config.fetchFn,
  });

  const fetcher = new OrchestratedFetch({
    strategies,
    policy,
    memory,
    oracle: extractionOracle,
    rateLimiter: new RateLimiter({
      defaults: { minDelayMs: config.minHostDelayMs ?? crawlConfig.minHostDelayMs },
    }),
    maxAttempts: config.maxAttempts ?? crawlConfig.maxAttempts,
  });

  const discovery = new SiteDiscovery({
    fetchFn: config.fetchFn,
    maxSitemapDepth: config.sitemapMaxDepth ?? crawlConfig.sitemapMaxDepth,
  });

  const crawler = new SiteCrawler({
    discovery,
    fetcher,
    teamId: config.teamId ?? crawlConfig.teamId,
    concurrency: config.concurrency ?? crawlConfig.concurrency,
    deadlineMs: config.deadlineMs ?? crawlConfig.deadlineMs,
  });

  return new CrawlerClient(crawler, memory);
}
