/**
 * Browser Manager - disposable Playwright sessions
 *
 * Playwright is loaded lazily on the first browser fetch, so the request
 * strategies and discovery work without it. Each session owns its own
 * browser process and is closed after a single fetch; nothing is shared
 * between attempts or URLs.
 */

import type { Browser } from 'playwright';
import { TIMEOUTS } from '../utils/timeouts.js';
import { logger } from '../utils/logger.js';

const log = logger.browser;

export interface Viewport {
  width: number;
  height: number;
}

export interface SessionOptions {
  headless?: boolean;
  /** Extra Chromium command-line flags */
  args?: string[];
  userAgent?: string;
  viewport?: Viewport;
  extraHeaders?: Record<string, string>;
  /** Script source run in every frame before page scripts */
  initScript?: string;
}

export interface GotoOptions {
  waitUntil: 'load' | 'domcontentloaded' | 'networkidle';
  timeoutMs?: number;
}

/**
 * One isolated page in one browser. close() disposes everything.
 */
export interface BrowserSession {
  goto(url: string, options: GotoOptions): Promise<void>;
  content(): Promise<string>;
  url(): string;
  /** Run a self-contained function in the page with one string argument */
  evaluate<R>(fn: (arg: string) => R, arg: string): Promise<R>;
  close(): Promise<void>;
}

export interface BrowserLauncher {
  open(options?: SessionOptions): Promise<BrowserSession>;
}

// Lazy-loaded Playwright reference
let playwrightModule: typeof import('playwright') | null = null;

async function loadPlaywright(): Promise<typeof import('playwright')> {
  if (playwrightModule) {
    return playwrightModule;
  }
  try {
    playwrightModule = await import('playwright');
    return playwrightModule;
  } catch (error) {
    const reason = error instanceof Error ? error.message : 'Failed to load Playwright';
    log.error('Playwright not available', { error });
    throw new Error(
      `Playwright is not installed (${reason}). ` +
      'Install a browser with: npx playwright install chromium'
    );
  }
}

/**
 * Launcher backed by a locally installed Chromium
 */
export class PlaywrightLauncher implements BrowserLauncher {
  async open(options: SessionOptions = {}): Promise<BrowserSession> {
    const pw = await loadPlaywright();
    const browser = await pw.chromium.launch({
      headless: options.headless ?? true,
      args: options.args,
    });

    try {
      const context = await browser.newContext({
        userAgent: options.userAgent,
        viewport: options.viewport,
        extraHTTPHeaders: options.extraHeaders,
      });
      if (options.initScript) {
        await context.addInitScript(options.initScript);
      }
      const page = await context.newPage();
      log.debug('Browser session opened', { args: options.args, viewport: options.viewport });

      return {
        goto: async (url, gotoOptions) => {
          await page.goto(url, {
            waitUntil: gotoOptions.waitUntil,
            timeout: gotoOptions.timeoutMs ?? TIMEOUTS.PAGE_LOAD,
          });
        },
        content: () => page.content(),
        url: () => page.url(),
        evaluate: (fn, arg) => page.evaluate(fn, arg),
        close: () => closeBrowser(browser),
      };
    } catch (error) {
      await closeBrowser(browser);
      throw error;
    }
  }
}

async function closeBrowser(browser: Browser): Promise<void> {
  try {
    await browser.close();
  } catch (error) {
    log.warn('Failed to close browser', { error: error instanceof Error ? error.message : String(error) });
  }
}

/**
 * Open a session, run fn, and always dispose the session
 */
export async function withSession<T>(
  launcher: BrowserLauncher,
  options: SessionOptions,
  fn: (session: BrowserSession) => Promise<T>
): Promise<T> {
  const session = await launcher.open(options);
  try {
    return await fn(session);
  } finally {
    await session.close();
  }
}
