/**
 * Rotated request: a random identity from the pool, a browser-like header
 * set, and a 2-4s pause before the request.
 */

import type { FetchResult } from '../../types/index.js';
import type { FetchFn } from '../../utils/http-client.js';
import { DELAYS, TIMEOUTS, randomDelay, sleep as defaultSleep } from '../../utils/timeouts.js';
import { logger } from '../../utils/logger.js';
import { ROTATING_USER_AGENTS, browserLikeHeaders, pickRandom, stealthFetch } from '../stealth-fetch.js';
import type { FetchStrategy, PacingOptions } from './types.js';

const log = logger.strategies;

export interface RotatedRequestOptions extends PacingOptions {
  fetchFn?: FetchFn;
  timeoutMs?: number;
}

export class RotatedRequestStrategy implements FetchStrategy {
  readonly id = 'rotated_request';

  constructor(private readonly options: RotatedRequestOptions = {}) {}

  async fetch(url: string): Promise<FetchResult> {
    const random = this.options.random ?? Math.random;
    const sleep = this.options.sleep ?? defaultSleep;

    const userAgent = pickRandom(ROTATING_USER_AGENTS, random);
    const delayMs = randomDelay(DELAYS.ROTATED_REQUEST, random);
    log.debug('Pausing before rotated request', { url, delayMs });
    await sleep(delayMs);

    const response = await stealthFetch(url, {
      headers: browserLikeHeaders(userAgent),
      timeoutMs: this.options.timeoutMs ?? TIMEOUTS.STRATEGY_REQUEST,
      fetchFn: this.options.fetchFn,
    });
    return { kind: 'content', rawContent: response.body, finalUrl: response.url };
  }
}
