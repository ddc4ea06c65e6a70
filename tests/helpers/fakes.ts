/**
 * In-process stand-ins for the network, the browser and the oracles
 */

import type { FetchFn } from '../../src/utils/http-client.js';
import type { BrowserLauncher, SessionOptions } from '../../src/core/browser-manager.js';
import type { ExtractedRecord, ExtractionOracle } from '../../src/core/extraction-oracle.js';
import type { FetchStrategy, StrategyRegistry } from '../../src/core/strategies/index.js';
import { TransportError, type FetchResult, type StrategyId } from '../../src/types/index.js';

// ============================================
// HTTP
// ============================================

export type FakeRoute = string | { status?: number; body?: string; error?: string };

export interface FetchCall {
  url: string;
  headers: Headers;
}

/**
 * fetch over a fixed route table. Unknown URLs answer 404.
 */
export function createFakeFetch(routes: Record<string, FakeRoute>) {
  const calls: FetchCall[] = [];
  const fetchFn: FetchFn = async (url, init) => {
    calls.push({ url, headers: new Headers(init?.headers) });
    const route = routes[url];
    if (route === undefined) {
      return new Response('not found', { status: 404 });
    }
    if (typeof route === 'string') {
      return new Response(route, { status: 200 });
    }
    if (route.error) {
      throw new TypeError(route.error);
    }
    return new Response(route.body ?? '', { status: route.status ?? 200 });
  };
  return { fetchFn, calls };
}

// ============================================
// BROWSER
// ============================================

export interface FakePage {
  html?: string;
  finalUrl?: string;
  gotoError?: string;
}

export function createFakeLauncher(pages: Record<string, FakePage>) {
  const opened: SessionOptions[] = [];
  const visited: string[] = [];
  let closed = 0;

  const launcher: BrowserLauncher = {
    async open(options = {}) {
      opened.push(options);
      let current = '';
      return {
        goto: async (url) => {
          current = url;
          visited.push(url);
          const page = pages[url];
          if (!page) throw new Error(`net::ERR_NAME_NOT_RESOLVED at ${url}`);
          if (page.gotoError) throw new Error(page.gotoError);
        },
        content: async () => pages[current]?.html ?? '',
        url: () => pages[current]?.finalUrl ?? current,
        evaluate: async (fn, arg) => fn(arg),
        close: async () => {
          closed++;
        },
      };
    },
  };

  return {
    launcher,
    opened,
    visited,
    closedCount: () => closed,
  };
}

// ============================================
// STRATEGIES AND ORACLES
// ============================================

export type ScriptedOutcome = FetchResult | Error;

/**
 * Strategy registry whose strategies replay scripted outcomes per URL.
 * A URL with no script fails with HTTP 403.
 */
export function createScriptedStrategies(script: Partial<Record<StrategyId, Record<string, ScriptedOutcome>>>) {
  const calls: { strategy: StrategyId; url: string }[] = [];

  function make<K extends StrategyId>(id: K): FetchStrategy & { readonly id: K } {
    return {
      id,
      async fetch(url: string): Promise<FetchResult> {
        calls.push({ strategy: id, url });
        const outcome = script[id]?.[url];
        if (outcome === undefined) {
          throw new TransportError(`GET ${url} returned HTTP 403`, { url, httpStatus: 403 });
        }
        if (outcome instanceof Error) throw outcome;
        return outcome;
      },
    };
  }

  const strategies: StrategyRegistry = {
    plain_request: make('plain_request'),
    rotated_request: make('rotated_request'),
    rendered_browser: make('rendered_browser'),
    hardened_browser: make('hardened_browser'),
  };
  return { strategies, calls };
}

export function content(rawContent: string, finalUrl = 'https://example.com/'): FetchResult {
  return { kind: 'content', rawContent, finalUrl };
}

/**
 * HTML whose visible text clears the extraction length gate
 */
export function articleHtml(heading: string): string {
  const body = `${heading} is explained step by step in this article with enough words to count as real content for extraction.`;
  return `<html><body><article><h1>${heading}</h1><p>${body}</p></article></body></html>`;
}

export class StubExtractionOracle implements ExtractionOracle {
  readonly calls: { visibleText: string; sourceUrl: string }[] = [];

  constructor(private readonly reply: (sourceUrl: string) => ExtractedRecord | Promise<ExtractedRecord> = (url) => ({
    title: `Title for ${url}`,
    content: 'Body',
    author: 'Ada',
  })) {}

  async extract(visibleText: string, sourceUrl: string): Promise<ExtractedRecord> {
    this.calls.push({ visibleText, sourceUrl });
    return this.reply(sourceUrl);
  }
}

export const noSleep = async (): Promise<void> => undefined;
