/**
 * Site Crawler - discovery followed by one orchestrated fetch per URL
 *
 * Off-domain URLs are skipped before any attempt and never touch domain
 * memory. Per-URL failures never abort the crawl; the only whole-crawl
 * failures come from discovery. `all_strategies_failed` is reserved for
 * single-URL scrapes.
 */

import pLimit from 'p-limit';
import type { ContentItem, CrawlResult, CrawlStats, CrawlStatus } from '../types/index.js';
import { hostOf } from '../utils/url-scope.js';
import { logger } from '../utils/logger.js';
import type { OrchestratedFetch } from './orchestrated-fetch.js';
import type { SiteDiscovery } from './site-discovery.js';

const log = logger.crawler;

export const DEFAULT_TEAM_ID = 'default';

export interface SiteCrawlerOptions {
  discovery: SiteDiscovery;
  fetcher: OrchestratedFetch;
  teamId?: string;
  /** URLs processed at once (default 1, sequential) */
  concurrency?: number;
  /** Stop starting new URLs once this many ms have passed */
  deadlineMs?: number;
  now?: () => number;
}

type UrlRun =
  | { kind: 'skipped_off_domain' }
  | { kind: 'aborted_by_deadline' }
  | { kind: 'succeeded'; items: ContentItem[] }
  | { kind: 'exhausted' };

function emptyStats(): CrawlStats {
  return {
    discovered: 0,
    duplicatesRemoved: 0,
    attempted: 0,
    succeeded: 0,
    exhausted: 0,
    skippedOffDomain: 0,
    abortedByDeadline: 0,
    durationMs: 0,
  };
}

export class SiteCrawler {
  private readonly discovery: SiteDiscovery;
  private readonly fetcher: OrchestratedFetch;
  private readonly teamId: string;
  private readonly concurrency: number;
  private readonly deadlineMs?: number;
  private readonly now: () => number;

  constructor(options: SiteCrawlerOptions) {
    this.discovery = options.discovery;
    this.fetcher = options.fetcher;
    this.teamId = options.teamId ?? DEFAULT_TEAM_ID;
    this.concurrency = Math.max(1, options.concurrency ?? 1);
    this.deadlineMs = options.deadlineMs;
    this.now = options.now ?? Date.now;
  }

  async crawl(baseUrl: string): Promise<CrawlResult> {
    const startTime = this.now();
    const stats = emptyStats();
    log.info('Starting crawl', { url: baseUrl, concurrency: this.concurrency });

    const discovered = await this.discovery.discover(baseUrl);
    if (!discovered.ok) {
      stats.source = discovered.source;
      stats.durationMs = this.now() - startTime;
      log.error('Discovery failed', { url: baseUrl, status: discovered.status });
      return { team_id: this.teamId, items: [], status: discovered.status, stats };
    }

    stats.discovered = discovered.urls.size;
    stats.duplicatesRemoved = discovered.duplicatesRemoved;
    stats.source = discovered.source;

    const baseHost = hostOf(baseUrl);
    const deadline = this.deadlineMs !== undefined ? startTime + this.deadlineMs : undefined;
    const limit = pLimit(this.concurrency);

    const runs = await Promise.all(
      Array.from(discovered.urls, (url) => limit(() => this.processUrl(url, baseHost, deadline)))
    );

    // Items keep discovery order regardless of completion order
    const items: ContentItem[] = [];
    for (const run of runs) {
      switch (run.kind) {
        case 'skipped_off_domain':
          stats.skippedOffDomain++;
          break;
        case 'aborted_by_deadline':
          stats.abortedByDeadline++;
          break;
        case 'succeeded':
          stats.attempted++;
          stats.succeeded++;
          items.push(...run.items);
          break;
        case 'exhausted':
          stats.attempted++;
          stats.exhausted++;
          break;
      }
    }

    stats.durationMs = this.now() - startTime;

    // Exhausted URLs show up in the stats, not in the status
    log.info('Crawl finished', { url: baseUrl, items: items.length, ...stats });
    return { team_id: this.teamId, items, status: 'crawl_completed', stats };
  }

  /**
   * Single-URL mode: no discovery, one orchestrated fetch
   */
  async scrape(url: string): Promise<CrawlResult> {
    const outcome = await this.fetcher.run(url);
    const status: CrawlStatus = outcome.status === 'succeeded' ? 'crawl_completed' : 'all_strategies_failed';
    log.info('Scrape finished', { url, status, items: outcome.items.length });
    return { team_id: this.teamId, items: outcome.items, status };
  }

  private async processUrl(url: string, baseHost: string | null, deadline: number | undefined): Promise<UrlRun> {
    if (baseHost === null || hostOf(url) !== baseHost) {
      log.info('Skipping off-domain URL', { url });
      return { kind: 'skipped_off_domain' };
    }
    if (deadline !== undefined && this.now() >= deadline) {
      log.warn('Crawl deadline reached, not starting URL', { url });
      return { kind: 'aborted_by_deadline' };
    }

    try {
      const outcome = await this.fetcher.run(url);
      return outcome.status === 'succeeded' ? { kind: 'succeeded', items: outcome.items } : { kind: 'exhausted' };
    } catch (error) {
      log.error('Unexpected failure while processing URL', { url, error });
      return { kind: 'exhausted' };
    }
  }
}
