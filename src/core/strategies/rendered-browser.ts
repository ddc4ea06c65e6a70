/**
 * Rendered browser: a disposable headless Chromium session, network-idle
 * wait, then the rendered document.
 *
 * Company-guide listing pages (`topics#companies`) hide their guides behind
 * client-side rendering that generic text extraction flattens. For those,
 * the strategy walks the anchors following the "Company-specific guides"
 * heading in the live DOM and returns finished items instead of content.
 */

import type { ContentItem, FetchResult } from '../../types/index.js';
import { TIMEOUTS } from '../../utils/timeouts.js';
import { logger } from '../../utils/logger.js';
import { withSession, type BrowserLauncher, type BrowserSession } from '../browser-manager.js';
import type { FetchStrategy } from './types.js';

const log = logger.strategies;

// Truncated identity, sent as a request header rather than a context UA
const RENDERED_USER_AGENT = 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36';

export const COMPANY_GUIDES_URL_PATTERN = 'topics#companies';
export const COMPANY_GUIDES_HEADING = 'Company-specific guides';

export interface GuideLink {
  title: string;
  href: string;
}

export function isCompanyGuidesUrl(url: string): boolean {
  return url.includes(COMPANY_GUIDES_URL_PATTERN);
}

/**
 * Runs inside the page; must stay self-contained.
 */
export function collectGuideLinks(heading: string): GuideLink[] {
  const links: { title: string; href: string }[] = [];
  document.querySelectorAll('h3').forEach((h3) => {
    if (!(h3.textContent ?? '').includes(heading)) return;
    let current = h3.nextElementSibling;
    while (current instanceof HTMLAnchorElement) {
      links.push({ title: (current.textContent ?? '').trim(), href: current.href });
      current = current.nextElementSibling;
    }
  });
  return links;
}

export function guideLinksToItems(links: GuideLink[]): ContentItem[] {
  return links.map((link) => ({
    title: link.title,
    content: `A company-specific interview guide for ${link.title}.`,
    content_type: 'blog',
    source_url: link.href,
    author: 'Unknown',
    user_id: '',
  }));
}

export interface RenderedBrowserOptions {
  launcher: BrowserLauncher;
  navigationTimeoutMs?: number;
}

export class RenderedBrowserStrategy implements FetchStrategy {
  readonly id = 'rendered_browser';

  constructor(private readonly options: RenderedBrowserOptions) {}

  async fetch(url: string): Promise<FetchResult> {
    return withSession(
      this.options.launcher,
      { headless: true, extraHeaders: { 'User-Agent': RENDERED_USER_AGENT } },
      (session) => this.render(session, url)
    );
  }

  private async render(session: BrowserSession, url: string): Promise<FetchResult> {
    await session.goto(url, {
      waitUntil: 'networkidle',
      timeoutMs: this.options.navigationTimeoutMs ?? TIMEOUTS.PAGE_LOAD,
    });

    if (isCompanyGuidesUrl(url)) {
      log.info('Applying surgical extraction for company guides', { url });
      const links = await session.evaluate(collectGuideLinks, COMPANY_GUIDES_HEADING);
      return { kind: 'items', items: guideLinksToItems(links), finalUrl: session.url() };
    }

    return { kind: 'content', rawContent: await session.content(), finalUrl: session.url() };
  }
}
