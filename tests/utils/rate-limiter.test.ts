import { describe, it, expect, beforeEach } from 'vitest';
import { RateLimiter } from '../../src/utils/rate-limiter.js';

describe('RateLimiter', () => {
  let clock: number;
  let sleeps: number[];
  let rateLimiter: RateLimiter;

  const fakeSleep = async (ms: number) => {
    sleeps.push(ms);
    clock += ms;
  };

  beforeEach(() => {
    clock = 1_000_000;
    sleeps = [];
    rateLimiter = new RateLimiter({ defaults: { minDelayMs: 1000 }, sleep: fakeSleep, now: () => clock });
  });

  describe('getStatus', () => {
    it('should key hosts the same way as domain memory', () => {
      expect(rateLimiter.getStatus('https://www.example.com/page').domain).toBe('www.example.com');
      expect(rateLimiter.getStatus('http://Example.com:8080/page').domain).toBe('example.com:8080');
    });

    it('should keep www and bare hosts in separate buckets', async () => {
      await rateLimiter.acquire('https://example.com/a');
      expect(rateLimiter.getStatus('https://www.example.com/b').requestsInLastMinute).toBe(0);
      expect(rateLimiter.getStatus('https://example.com/b').requestsInLastMinute).toBe(1);
    });

    it('should report unknown for invalid URLs', () => {
      expect(rateLimiter.getStatus('not-a-url').domain).toBe('unknown');
    });

    it('should start with an empty history and the default limit', () => {
      expect(rateLimiter.getStatus('https://example.com')).toEqual({
        domain: 'example.com',
        requestsInLastMinute: 0,
        limit: 60,
        canRequest: true,
      });
    });
  });

  describe('acquire', () => {
    it('should not wait for the first request', async () => {
      await rateLimiter.acquire('https://example.com/a');
      expect(sleeps).toEqual([]);
      expect(rateLimiter.getStatus('https://example.com').requestsInLastMinute).toBe(1);
    });

    it('should space requests to the same host by the minimum delay', async () => {
      await rateLimiter.acquire('https://example.com/a');
      clock += 200;
      await rateLimiter.acquire('https://example.com/b');
      expect(sleeps).toEqual([800]);
    });

    it('should not delay requests to other hosts', async () => {
      await rateLimiter.acquire('https://example.com/a');
      await rateLimiter.acquire('https://other.example.org/a');
      expect(sleeps).toEqual([]);
    });

    it('should wait out the per-minute window when the limit is reached', async () => {
      rateLimiter.setHostConfig('example.com', { requestsPerMinute: 2, minDelayMs: 0 });
      await rateLimiter.acquire('https://example.com/1');
      await rateLimiter.acquire('https://example.com/2');
      await rateLimiter.acquire('https://example.com/3');
      expect(sleeps).toEqual([60000]);
    });

    it('should apply a parent domain config to subdomains', () => {
      rateLimiter.setHostConfig('example.com', { requestsPerMinute: 5, minDelayMs: 0 });
      expect(rateLimiter.getStatus('https://docs.example.com/').limit).toBe(5);
    });
  });

  describe('throttle', () => {
    it('should start same-host calls one at a time with spacing', async () => {
      const started: string[] = [];
      const run = (path: string) =>
        rateLimiter.throttle(`https://example.com${path}`, async () => {
          started.push(`${path}@${clock}`);
          return path;
        });

      const results = await Promise.all([run('/a'), run('/b'), run('/c')]);

      expect(results).toEqual(['/a', '/b', '/c']);
      expect(started).toEqual(['/a@1000000', '/b@1001000', '/c@1002000']);
      expect(sleeps).toEqual([1000, 1000]);
    });

    it('should propagate errors from the wrapped call', async () => {
      await expect(
        rateLimiter.throttle('https://example.com/', async () => {
          throw new Error('boom');
        })
      ).rejects.toThrow('boom');
    });
  });
});
