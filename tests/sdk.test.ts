/**
 * Tests for createCrawler wiring
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createCrawler } from '../src/sdk.js';
import { DomainMemory } from '../src/core/domain-memory.js';
import type { CompletionRequest } from '../src/core/oracle-client.js';
import { clearConfigCache } from '../src/utils/env-parser.js';
import { ConfigValidationError } from '../src/utils/config-schemas.js';
import { StubExtractionOracle, articleHtml, createFakeFetch, createFakeLauncher } from './helpers/fakes.js';

const PAGE = 'https://example.com/blog/heaps';

const siteRoutes = {
  'https://example.com/robots.txt': 'Sitemap: https://example.com/sitemap.xml',
  'https://example.com/sitemap.xml': `<urlset><url><loc>${PAGE}</loc></url></urlset>`,
  [PAGE]: articleHtml('Heaps'),
};

describe('createCrawler', () => {
  beforeEach(() => {
    vi.stubEnv('ANTHROPIC_API_KEY', '');
    vi.stubEnv('CRAWL_MEMORY_PATH', '');
    vi.stubEnv('STRATEGY_ORACLE', '');
    clearConfigCache();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    clearConfigCache();
  });

  it('should crawl a site with injected transports and oracle', async () => {
    const { fetchFn } = createFakeFetch(siteRoutes);
    const { launcher, opened } = createFakeLauncher({});
    const memory = new DomainMemory();

    const client = await createCrawler({
      extractionOracle: new StubExtractionOracle(),
      fetchFn,
      launcher,
      memory,
      teamId: 'team-a',
    });
    const result = await client.crawl('https://example.com/');
    await client.close();

    expect(result.status).toBe('crawl_completed');
    expect(result.team_id).toBe('team-a');
    expect(result.items).toEqual([
      {
        title: `Title for ${PAGE}`,
        content: 'Body',
        content_type: 'blog',
        source_url: PAGE,
        author: 'Ada',
        user_id: '',
      },
    ]);
    expect(opened).toEqual([]);
    expect(client.memory).toBe(memory);
    expect(memory.snapshot()).toEqual({ 'example.com': { successful: ['plain_request'], failed: [] } });
  });

  it('should build the extraction oracle from a completion function', async () => {
    const requests: CompletionRequest[] = [];
    const { fetchFn } = createFakeFetch(siteRoutes);

    const client = await createCrawler({
      completion: async (request) => {
        requests.push(request);
        return '{"title": "Heaps", "content": "# Heaps", "author": "Ada"}';
      },
      fetchFn,
      launcher: createFakeLauncher({}).launcher,
    });
    const result = await client.scrape(PAGE);

    expect(result.items[0]).toMatchObject({ title: 'Heaps', content: '# Heaps', author: 'Ada' });
    expect(result.team_id).toBe('default');
    expect(requests).toHaveLength(1);
    expect(requests[0].prompt.startsWith(`URL: ${PAGE}\n\nContent:\n`)).toBe(true);
  });

  it('should require an API key when no oracle is injected', async () => {
    await expect(createCrawler()).rejects.toThrow('An Anthropic API key is required');
  });

  it('should reject an unknown log level before building anything', async () => {
    vi.stubEnv('LOG_LEVEL', 'verbose');
    clearConfigCache();

    const error = await createCrawler({
      extractionOracle: new StubExtractionOracle(),
      policy: { choose: async () => 'plain_request' },
      launcher: createFakeLauncher({}).launcher,
    }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConfigValidationError);
    if (error instanceof ConfigValidationError) {
      expect(error.section).toBe('logging');
      expect(error.message).toContain('level');
    }
  });

  it('should not need an API key when the oracle and policy are injected', async () => {
    vi.stubEnv('STRATEGY_ORACLE', 'true');
    clearConfigCache();

    const client = await createCrawler({
      extractionOracle: new StubExtractionOracle(),
      policy: { choose: async () => 'plain_request' },
      launcher: createFakeLauncher({}).launcher,
    });

    expect(client.memory.domains()).toEqual([]);
  });
});
