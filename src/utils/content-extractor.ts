/**
 * Content Extractor - visible text and links out of fetched HTML
 */

import * as cheerio from 'cheerio';

// Page chrome that never belongs to the main content
const NOISE_SELECTORS = 'script, style, nav, footer, header';

/**
 * Minimum visible text, in characters, worth sending to the extraction oracle
 */
export const MIN_VISIBLE_TEXT_LENGTH = 100;

/**
 * Strip page chrome, collapse whitespace and drop non-printable characters.
 */
export function extractVisibleText(html: string): string {
  const $ = cheerio.load(html);
  $(NOISE_SELECTORS).remove();

  return $.root()
    .text()
    .split(/\s+/)
    .filter(Boolean)
    .join(' ')
    .replace(/[\p{C}\p{Zl}\p{Zp}]/gu, '');
}

/**
 * Every `<a href>` on the page, in document order, as written.
 */
export function extractHrefs(html: string): string[] {
  const $ = cheerio.load(html);
  const hrefs: string[] = [];
  $('a[href]').each((_, el) => {
    const href = $(el).attr('href');
    if (href !== undefined && href.trim() !== '') {
      hrefs.push(href.trim());
    }
  });
  return hrefs;
}
