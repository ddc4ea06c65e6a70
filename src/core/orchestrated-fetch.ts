/**
 * Orchestrated Fetch - the retry/escalation loop for a single URL
 *
 *   selecting -> executing -> succeeded
 *                          -> retrying -> selecting ... -> exhausted
 *
 * At most `maxAttempts` tries (default 3). Transport errors, extraction
 * errors and empty extractions are all plain attempt failures; the category
 * only shows up in logs and on the attempt record. Each outcome is written
 * to domain memory under that domain's lock.
 */

import type { Attempt, ContentItem, StrategyId } from '../types/index.js';
import { describeFailure } from '../types/errors.js';
import { RateLimiter } from '../utils/rate-limiter.js';
import { hostOf } from '../utils/url-scope.js';
import { logger } from '../utils/logger.js';
import type { DomainMemory } from './domain-memory.js';
import { extractItems, type ExtractionOracle } from './extraction-oracle.js';
import type { StrategyPolicy } from './strategy-policy.js';
import type { StrategyRegistry } from './strategies/index.js';

const log = logger.orchestrator;

export const DEFAULT_MAX_ATTEMPTS = 3;

export type UrlOutcome =
  | { status: 'succeeded'; items: ContentItem[]; strategy: StrategyId; attempts: Attempt[] }
  | { status: 'all_strategies_failed'; items: []; attempts: Attempt[] };

export interface OrchestratedFetchOptions {
  strategies: StrategyRegistry;
  policy: StrategyPolicy;
  memory: DomainMemory;
  oracle: ExtractionOracle;
  rateLimiter?: RateLimiter;
  maxAttempts?: number;
}

export class OrchestratedFetch {
  private readonly strategies: StrategyRegistry;
  private readonly policy: StrategyPolicy;
  private readonly memory: DomainMemory;
  private readonly oracle: ExtractionOracle;
  private readonly rateLimiter: RateLimiter;
  private readonly maxAttempts: number;

  constructor(options: OrchestratedFetchOptions) {
    this.strategies = options.strategies;
    this.policy = options.policy;
    this.memory = options.memory;
    this.oracle = options.oracle;
    this.rateLimiter = options.rateLimiter ?? new RateLimiter();
    this.maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
  }

  async run(url: string): Promise<UrlOutcome> {
    const domain = hostOf(url) ?? url;
    const attempts: Attempt[] = [];
    const startTime = Date.now();

    for (let i = 0; i < this.maxAttempts; i++) {
      const strategy = await this.policy.choose(url, this.memory, attempts);
      const ordinal = attempts.length + 1;
      const attemptLog = log.child({ url, strategy, attempt: ordinal });
      attemptLog.info('Trying strategy');

      try {
        const items = await this.execute(strategy, url);
        if (items.length > 0) {
          await this.memory.recordSafely(domain, strategy, true);
          attemptLog.timed('Strategy succeeded', startTime, { items: items.length });
          return { status: 'succeeded', items, strategy, attempts };
        }
        attempts.push({ strategy, succeeded: false, ordinal, reason: 'extraction/EXTRACTION_EMPTY' });
        attemptLog.warn('Strategy produced no items');
      } catch (error) {
        const reason = describeFailure(error);
        attempts.push({ strategy, succeeded: false, ordinal, reason });
        attemptLog.warn('Strategy failed', {
          reason,
          error: error instanceof Error ? error.message : String(error),
        });
      }
      await this.memory.recordSafely(domain, strategy, false);
    }

    log.warn('All strategies failed', { url, attempts: attempts.length });
    return { status: 'all_strategies_failed', items: [], attempts };
  }

  private async execute(strategy: StrategyId, url: string): Promise<ContentItem[]> {
    const result = await this.rateLimiter.throttle(url, () => this.strategies[strategy].fetch(url));
    if (result.kind === 'items') {
      return result.items;
    }
    return extractItems(this.oracle, result.rawContent, url);
  }
}
