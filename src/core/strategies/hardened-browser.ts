/**
 * Hardened browser: the last-resort escalation. Anti-automation launch
 * flags, a large fixed viewport, `navigator.webdriver` hidden before any
 * page script runs, and a 3-6s settle after network idle.
 */

import type { FetchResult } from '../../types/index.js';
import { DELAYS, TIMEOUTS, randomDelay, sleep as defaultSleep } from '../../utils/timeouts.js';
import { logger } from '../../utils/logger.js';
import { withSession, type BrowserLauncher, type SessionOptions } from '../browser-manager.js';
import { DESKTOP_USER_AGENT } from '../stealth-fetch.js';
import type { FetchStrategy, PacingOptions } from './types.js';

const log = logger.strategies;

export const HARDENED_LAUNCH_ARGS = [
  '--no-first-run',
  '--disable-blink-features=AutomationControlled',
  '--disable-features=VizDisplayCompositor',
];

export const HIDE_WEBDRIVER_SCRIPT = `
Object.defineProperty(navigator, 'webdriver', {
  get: () => undefined,
});
`;

export const HARDENED_SESSION: SessionOptions = {
  headless: true,
  args: HARDENED_LAUNCH_ARGS,
  viewport: { width: 1920, height: 1080 },
  userAgent: DESKTOP_USER_AGENT,
  initScript: HIDE_WEBDRIVER_SCRIPT,
};

export interface HardenedBrowserOptions extends PacingOptions {
  launcher: BrowserLauncher;
  navigationTimeoutMs?: number;
}

export class HardenedBrowserStrategy implements FetchStrategy {
  readonly id = 'hardened_browser';

  constructor(private readonly options: HardenedBrowserOptions) {}

  async fetch(url: string): Promise<FetchResult> {
    const sleep = this.options.sleep ?? defaultSleep;
    const settleMs = randomDelay(DELAYS.HARDENED_SETTLE, this.options.random);

    return withSession<FetchResult>(this.options.launcher, HARDENED_SESSION, async (session) => {
      await session.goto(url, {
        waitUntil: 'networkidle',
        timeoutMs: this.options.navigationTimeoutMs ?? TIMEOUTS.PAGE_LOAD,
      });
      log.debug('Settling after navigation', { url, settleMs });
      await sleep(settleMs);
      return { kind: 'content', rawContent: await session.content(), finalUrl: session.url() };
    });
  }
}
