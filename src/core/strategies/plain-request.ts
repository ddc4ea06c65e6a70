/**
 * Plain request: one GET with a fixed desktop identity.
 */

import type { FetchResult } from '../../types/index.js';
import type { FetchFn } from '../../utils/http-client.js';
import { TIMEOUTS } from '../../utils/timeouts.js';
import { DESKTOP_USER_AGENT, stealthFetch } from '../stealth-fetch.js';
import type { FetchStrategy } from './types.js';

export interface PlainRequestOptions {
  fetchFn?: FetchFn;
  timeoutMs?: number;
}

export class PlainRequestStrategy implements FetchStrategy {
  readonly id = 'plain_request';

  constructor(private readonly options: PlainRequestOptions = {}) {}

  async fetch(url: string): Promise<FetchResult> {
    const response = await stealthFetch(url, {
      userAgent: DESKTOP_USER_AGENT,
      timeoutMs: this.options.timeoutMs ?? TIMEOUTS.STRATEGY_REQUEST,
      fetchFn: this.options.fetchFn,
    });
    return { kind: 'content', rawContent: response.body, finalUrl: response.url };
  }
}
