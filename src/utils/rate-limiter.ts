/**
 * Rate Limiter - Per-host request throttling
 *
 * Spaces out requests to the same host so parallel crawls still arrive at a
 * human pace. Limits are per host, never global.
 */

import { logger } from './logger.js';
import { hostOf } from './url-scope.js';
import { sleep as defaultSleep } from './timeouts.js';

export interface HostLimitConfig {
  requestsPerMinute: number;
  minDelayMs: number;
}

export interface RateLimiterOptions {
  defaults?: Partial<HostLimitConfig>;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

const DEFAULT_LIMITS: HostLimitConfig = { requestsPerMinute: 60, minDelayMs: 0 };

export class RateLimiter {
  private requestHistory: Map<string, number[]> = new Map();
  private hostLocks: Map<string, Promise<void>> = new Map();
  private hostConfigs: Map<string, HostLimitConfig> = new Map();
  private defaults: HostLimitConfig;
  private sleep: (ms: number) => Promise<void>;
  private now: () => number;

  constructor(options: RateLimiterOptions = {}) {
    this.defaults = { ...DEFAULT_LIMITS, ...options.defaults };
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
  }

  // Same host key as domain memory and the crawler's host filter
  private getHost(url: string): string {
    return hostOf(url) ?? 'unknown';
  }

  /**
   * Exact host match first, then the closest configured parent domain
   */
  private getConfig(host: string): HostLimitConfig {
    const exact = this.hostConfigs.get(host);
    if (exact) return exact;

    for (const [configHost, config] of this.hostConfigs) {
      if (host.endsWith(`.${configHost}`)) {
        return config;
      }
    }
    return this.defaults;
  }

  private recentHistory(host: string): number[] {
    const oneMinuteAgo = this.now() - 60000;
    const history = (this.requestHistory.get(host) ?? []).filter((t) => t > oneMinuteAgo);
    this.requestHistory.set(host, history);
    return history;
  }

  private calculateDelay(host: string): number {
    const config = this.getConfig(host);
    const history = this.recentHistory(host);
    const now = this.now();

    if (history.length >= config.requestsPerMinute) {
      return Math.max(0, history[0] + 60000 - now);
    }

    const last = history[history.length - 1];
    if (last !== undefined && now - last < config.minDelayMs) {
      return config.minDelayMs - (now - last);
    }
    return 0;
  }

  /**
   * Wait out the host's delay, then record the request.
   *
   * Does not serialize callers; use throttle() for one-at-a-time access.
   */
  async acquire(url: string): Promise<void> {
    const host = this.getHost(url);
    const delay = this.calculateDelay(host);
    if (delay > 0) {
      logger.rateLimiter.debug('Waiting before request', { domain: host, delayMs: delay });
      await this.sleep(delay);
    }
    const history = this.requestHistory.get(host) ?? [];
    history.push(this.now());
    this.requestHistory.set(host, history);
  }

  /**
   * Run fn once every earlier throttled call for the same host has started
   * its request and the host's spacing has elapsed.
   */
  async throttle<T>(url: string, fn: () => Promise<T>): Promise<T> {
    const host = this.getHost(url);
    const previous = this.hostLocks.get(host) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.hostLocks.set(host, tail);

    await previous;
    try {
      await this.acquire(url);
    } finally {
      release();
      if (this.hostLocks.get(host) === tail) {
        this.hostLocks.delete(host);
      }
    }
    return fn();
  }

  getStatus(url: string): {
    domain: string;
    requestsInLastMinute: number;
    limit: number;
    canRequest: boolean;
  } {
    const host = this.getHost(url);
    const config = this.getConfig(host);
    const history = this.recentHistory(host);
    return {
      domain: host,
      requestsInLastMinute: history.length,
      limit: config.requestsPerMinute,
      canRequest: history.length < config.requestsPerMinute,
    };
  }

  /**
   * Add or update the limit for one host
   */
  setHostConfig(host: string, config: HostLimitConfig): void {
    this.hostConfigs.set(host.toLowerCase(), config);
  }
}
