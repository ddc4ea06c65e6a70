/**
 * URL scoping helpers shared by discovery and the crawler.
 *
 * Hosts are compared on `URL.host` (hostname plus any explicit port),
 * lower-cased by the URL parser.
 */

export function tryParseUrl(value: string, base?: string): URL | null {
  try {
    return new URL(value, base);
  } catch {
    return null;
  }
}

export function isAbsoluteHttpUrl(value: string): boolean {
  const parsed = tryParseUrl(value);
  return parsed !== null && (parsed.protocol === 'http:' || parsed.protocol === 'https:');
}

/**
 * Host key for a URL, or null when it does not parse
 */
export function hostOf(url: string): string | null {
  return tryParseUrl(url)?.host ?? null;
}

export function isSameHost(url: string, baseUrl: string): boolean {
  const host = hostOf(url);
  return host !== null && host === hostOf(baseUrl);
}

/**
 * Scope prefix for link-crawl fallback: `/<first path segment>/`, or null
 * for a root URL. Deeper segments are ignored, so `/blog/category/dsa`
 * scopes to `/blog/`.
 */
export function inferScopePrefix(baseUrl: string): string | null {
  const parsed = tryParseUrl(baseUrl);
  if (!parsed) return null;

  const firstSegment = parsed.pathname.replace(/^\/+|\/+$/g, '').split('/')[0];
  return firstSegment ? `/${firstSegment}/` : null;
}

export function isWithinScope(url: string, scopePrefix: string | null): boolean {
  if (scopePrefix === null) return true;
  const parsed = tryParseUrl(url);
  return parsed !== null && parsed.pathname.startsWith(scopePrefix);
}
