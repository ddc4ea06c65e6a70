/**
 * Stealth Fetch Module
 *
 * Browser identities and header sets used to make plain HTTP requests look
 * like a desktop browser. The request strategies pick from these; the
 * hardened browser reuses the fixed desktop identity.
 */

import { httpGetOk, type FetchFn, type HttpResponse } from '../utils/http-client.js';
import { logger } from '../utils/logger.js';

const log = logger.strategies;

/**
 * Fixed desktop identity for the plain request strategy and browsers
 */
export const DESKTOP_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/91.0.4472.124 Safari/537.36';

/**
 * Identity pool for the rotated request strategy, one per desktop platform
 */
export const ROTATING_USER_AGENTS = [
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/91.0.4472.124 Safari/537.36',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/91.0.4472.124 Safari/537.36',
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/91.0.4472.124 Safari/537.36',
] as const;

/**
 * Header set sent alongside a rotated identity
 */
export function browserLikeHeaders(userAgent: string): Record<string, string> {
  return {
    'User-Agent': userAgent,
    Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,image/webp,*/*;q=0.8',
    'Accept-Language': 'en-US,en;q=0.5',
    'Accept-Encoding': 'gzip, deflate',
    Connection: 'keep-alive',
    'Upgrade-Insecure-Requests': '1',
  };
}

/**
 * Uniform pick from a non-empty list. `random` must return [0, 1).
 */
export function pickRandom<T>(items: readonly [T, ...T[]], random: () => number = Math.random): T {
  const index = Math.min(items.length - 1, Math.floor(random() * items.length));
  return items[index] ?? items[0];
}

export interface StealthFetchOptions {
  userAgent?: string;
  headers?: Record<string, string>;
  timeoutMs: number;
  fetchFn?: FetchFn;
}

/**
 * GET with a browser identity; non-2xx throws TransportError
 */
export async function stealthFetch(url: string, options: StealthFetchOptions): Promise<HttpResponse> {
  const headers = {
    ...(options.userAgent ? { 'User-Agent': options.userAgent } : {}),
    ...options.headers,
  };
  log.debug('Stealth fetch', { url, userAgent: headers['User-Agent'] });
  return httpGetOk(url, { timeoutMs: options.timeoutMs, headers, fetchFn: options.fetchFn });
}
