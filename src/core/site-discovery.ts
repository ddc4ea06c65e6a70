/**
 * Site Discovery - the set of URLs worth crawling for a site
 *
 * 1. robots.txt at the origin; the first `sitemap:` line names the sitemap
 * 2. sitemap found: resolve it (recursing through sitemap indexes) and take
 *    every page URL, with no path scoping
 * 3. no sitemap: fetch the base page, keep same-host links inside the
 *    inferred scope prefix, and always include the base URL
 *
 * URLs are collected into a Set; the duplicate count is logged and returned.
 */

import { ParseError } from '../types/errors.js';
import type { DiscoverySource } from '../types/index.js';
import { extractHrefs } from '../utils/content-extractor.js';
import { httpGetOk, type FetchFn } from '../utils/http-client.js';
import { TIMEOUTS } from '../utils/timeouts.js';
import {
  inferScopePrefix,
  isAbsoluteHttpUrl,
  isSameHost,
  isWithinScope,
  tryParseUrl,
} from '../utils/url-scope.js';
import { logger } from '../utils/logger.js';
import { DESKTOP_USER_AGENT } from './stealth-fetch.js';

const discoveryLogger = logger.discovery;

// ============================================
// TYPES
// ============================================

export type DiscoveryResult =
  | {
      ok: true;
      urls: Set<string>;
      source: DiscoverySource;
      sitemapUrl?: string;
      /** Null for sitemap discovery and for root-level fallback crawls */
      scopePrefix: string | null;
      duplicatesRemoved: number;
    }
  | { ok: false; status: 'fallback_failed' | 'no_urls_found'; source?: DiscoverySource };

export interface ParsedSitemap {
  type: 'sitemap' | 'sitemapindex';
  /** Page URLs (plain sitemap) */
  pageUrls: string[];
  /** Child sitemap URLs (sitemap index) */
  sitemapUrls: string[];
}

export interface SiteDiscoveryOptions {
  /** Custom fetch function (for testing) */
  fetchFn?: FetchFn;
  /** Per-request timeout in ms */
  timeoutMs?: number;
  /** How many sitemap-index levels to follow below the root sitemap */
  maxSitemapDepth?: number;
  headers?: Record<string, string>;
}

// ============================================
// CONSTANTS
// ============================================

export const DEFAULT_MAX_SITEMAP_DEPTH = 5;

const DEFAULT_HEADERS: Record<string, string> = {
  'User-Agent': DESKTOP_USER_AGENT,
};

// ============================================
// ROBOTS.TXT PARSING
// ============================================

/**
 * First `sitemap:` directive in a robots.txt, matched case-insensitively
 * at the start of a line. Null when there is none.
 */
export function findSitemapDirective(robotsTxt: string): string | null {
  for (const rawLine of robotsTxt.split(/\r?\n/)) {
    if (rawLine.toLowerCase().startsWith('sitemap:')) {
      const value = rawLine.slice('sitemap:'.length).trim();
      if (value) return value;
    }
  }
  return null;
}

// ============================================
// SITEMAP PARSING
// ============================================

function decodeXmlEntities(str: string): string {
  return str
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&apos;/g, "'")
    .replace(/&amp;/g, '&');
}

function stripCdata(str: string): string {
  return str.replace(/^<!\[CDATA\[([\s\S]*)\]\]>$/, '$1');
}

function collectLocs(content: string, container: 'url' | 'sitemap'): string[] {
  const blockPattern = new RegExp(`<(?:\\w+:)?${container}\\b[^>]*>([\\s\\S]*?)</(?:\\w+:)?${container}>`, 'gi');
  const locs: string[] = [];
  for (const block of content.matchAll(blockPattern)) {
    const loc = /<(?:\w+:)?loc>([\s\S]*?)<\/(?:\w+:)?loc>/i.exec(block[1]);
    if (loc) {
      locs.push(decodeXmlEntities(stripCdata(loc[1].trim())));
    }
  }
  return locs;
}

/**
 * Parse sitemap XML. Throws ParseError when the document is neither a
 * urlset nor a sitemap index.
 */
export function parseSitemap(content: string): ParsedSitemap {
  if (/<(?:\w+:)?sitemapindex\b/i.test(content)) {
    return { type: 'sitemapindex', pageUrls: [], sitemapUrls: collectLocs(content, 'sitemap') };
  }
  if (/<(?:\w+:)?urlset\b/i.test(content)) {
    return { type: 'sitemap', pageUrls: collectLocs(content, 'url'), sitemapUrls: [] };
  }
  throw new ParseError('Document is not a sitemap', 'PARSE_INVALID_XML');
}

// ============================================
// DISCOVERY
// ============================================

export class SiteDiscovery {
  private readonly fetchFn?: FetchFn;
  private readonly timeoutMs: number;
  private readonly maxSitemapDepth: number;
  private readonly headers: Record<string, string>;

  constructor(options: SiteDiscoveryOptions = {}) {
    this.fetchFn = options.fetchFn;
    this.timeoutMs = options.timeoutMs ?? TIMEOUTS.DISCOVERY_FETCH;
    this.maxSitemapDepth = options.maxSitemapDepth ?? DEFAULT_MAX_SITEMAP_DEPTH;
    this.headers = { ...DEFAULT_HEADERS, ...options.headers };
  }

  async discover(baseUrl: string): Promise<DiscoveryResult> {
    const startTime = Date.now();
    const base = tryParseUrl(baseUrl);
    if (!base || !isAbsoluteHttpUrl(baseUrl)) {
      discoveryLogger.error('Base URL is not an absolute http(s) URL', { url: baseUrl });
      return { ok: false, status: 'fallback_failed' };
    }

    const sitemapUrl = await this.findSitemapUrl(base.origin);
    let collected: string[];
    let source: DiscoverySource;
    let scopePrefix: string | null = null;

    if (sitemapUrl) {
      discoveryLogger.info('Found sitemap', { url: baseUrl, sitemapUrl });
      source = 'sitemap';
      collected = await this.resolveSitemap(sitemapUrl, 0, new Set());
      discoveryLogger.info('Collected sitemap URLs', { url: baseUrl, count: collected.length });
    } else {
      discoveryLogger.warn('No sitemap found, falling back to page links', { url: baseUrl });
      source = 'links';
      scopePrefix = inferScopePrefix(baseUrl);
      const links = await this.collectScopedLinks(baseUrl, scopePrefix);
      if (links === null) {
        return { ok: false, status: 'fallback_failed', source };
      }
      collected = [baseUrl, ...links];
    }

    const urls = new Set(collected);
    const duplicatesRemoved = collected.length - urls.size;
    if (duplicatesRemoved > 0) {
      discoveryLogger.info('Removed duplicate URLs', { url: baseUrl, duplicatesRemoved, unique: urls.size });
    }

    if (urls.size === 0) {
      discoveryLogger.error('No URLs found', { url: baseUrl, source });
      return { ok: false, status: 'no_urls_found', source };
    }

    discoveryLogger.timed('Discovery complete', startTime, { url: baseUrl, source, count: urls.size, scopePrefix });
    return { ok: true, urls, source, sitemapUrl: sitemapUrl ?? undefined, scopePrefix, duplicatesRemoved };
  }

  /**
   * Sitemap URL named in robots.txt; null on absence or any fetch failure
   */
  async findSitemapUrl(origin: string): Promise<string | null> {
    const robotsUrl = `${origin}/robots.txt`;
    try {
      const response = await this.get(robotsUrl);
      const directive = findSitemapDirective(response.body);
      if (!directive) return null;
      // Relative sitemap paths resolve against the origin
      return tryParseUrl(directive, origin)?.href ?? null;
    } catch (error) {
      discoveryLogger.warn('Could not fetch robots.txt', {
        url: robotsUrl,
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }

  /**
   * Page URLs reachable from a sitemap. A sub-sitemap that fails to fetch
   * or parse contributes nothing.
   */
  async resolveSitemap(sitemapUrl: string, depth: number, visited: Set<string>): Promise<string[]> {
    if (visited.has(sitemapUrl)) {
      discoveryLogger.debug('Skipping already visited sitemap', { sitemapUrl });
      return [];
    }
    visited.add(sitemapUrl);

    let parsed: ParsedSitemap;
    try {
      const response = await this.get(sitemapUrl);
      parsed = parseSitemap(response.body);
    } catch (error) {
      discoveryLogger.warn('Could not fetch or parse sitemap', {
        sitemapUrl,
        error: error instanceof Error ? error.message : String(error),
      });
      return [];
    }

    if (parsed.type === 'sitemap') {
      return parsed.pageUrls.filter((loc) => {
        const valid = isAbsoluteHttpUrl(loc);
        if (!valid) discoveryLogger.debug('Skipping invalid sitemap entry', { sitemapUrl, loc });
        return valid;
      });
    }

    if (depth >= this.maxSitemapDepth) {
      discoveryLogger.warn('Sitemap index depth limit reached', { sitemapUrl, depth });
      return [];
    }

    const pages: string[] = [];
    for (const child of parsed.sitemapUrls) {
      pages.push(...(await this.resolveSitemap(child, depth + 1, visited)));
    }
    return pages;
  }

  /**
   * Same-host links on the base page inside the scope prefix, or null when
   * the base page cannot be fetched
   */
  async collectScopedLinks(baseUrl: string, scopePrefix: string | null): Promise<string[] | null> {
    let html: string;
    try {
      html = (await this.get(baseUrl)).body;
    } catch (error) {
      discoveryLogger.error('Could not fetch the base URL for link extraction', { url: baseUrl, error });
      return null;
    }

    if (scopePrefix) {
      discoveryLogger.info('Link crawl scoped to prefix', { url: baseUrl, scopePrefix });
    }

    const links: string[] = [];
    for (const href of extractHrefs(html)) {
      const resolved = tryParseUrl(href, baseUrl);
      if (!resolved) continue;
      const absolute = resolved.href;
      if (isSameHost(absolute, baseUrl) && isWithinScope(absolute, scopePrefix)) {
        links.push(absolute);
      }
    }
    return links;
  }

  private get(url: string) {
    return httpGetOk(url, { timeoutMs: this.timeoutMs, headers: this.headers, fetchFn: this.fetchFn });
  }
}
