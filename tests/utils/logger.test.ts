/**
 * Tests for the structured logger
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

describe('Logger', () => {
  let logOutput: string[];
  let originalStderr: typeof process.stderr.write;

  const entries = (): Array<Record<string, unknown>> =>
    logOutput
      .join('')
      .split('\n')
      .filter((line) => line.trim() !== '')
      .map((line): Record<string, unknown> => JSON.parse(line));

  beforeEach(() => {
    vi.resetModules();

    logOutput = [];
    originalStderr = process.stderr.write;
    process.stderr.write = ((chunk: string | Uint8Array) => {
      logOutput.push(typeof chunk === 'string' ? chunk : Buffer.from(chunk).toString());
      return true;
    }) as typeof process.stderr.write;
  });

  afterEach(() => {
    process.stderr.write = originalStderr;
  });

  it('should tag lines with the component and service', async () => {
    const { logger, configureLogger } = await import('../../src/utils/logger.js');
    configureLogger({ level: 'info' });

    logger.discovery.info('Found sitemap', { url: 'https://example.com' });

    const [entry] = entries();
    expect(entry).toMatchObject({
      level: 'info',
      component: 'SiteDiscovery',
      service: 'adaptive-crawl',
      url: 'https://example.com',
      msg: 'Found sitemap',
    });
  });

  it('should respect the configured level', async () => {
    const { logger, configureLogger } = await import('../../src/utils/logger.js');
    configureLogger({ level: 'warn' });

    logger.memory.info('hidden');
    logger.memory.warn('shown');

    expect(entries().map((e) => e.msg)).toEqual(['shown']);
  });

  it('should redact API keys', async () => {
    const { logger, configureLogger } = await import('../../src/utils/logger.js');
    configureLogger({ level: 'info' });

    logger.oracle.info('Calling oracle', { apiKey: 'test-secret' });

    expect(entries()[0].apiKey).toBe('[REDACTED]');
  });

  it('should carry child bindings on every line', async () => {
    const { logger, configureLogger } = await import('../../src/utils/logger.js');
    configureLogger({ level: 'info' });

    const attemptLog = logger.orchestrator.child({ strategy: 'plain_request', attempt: 2 });
    attemptLog.info('Trying strategy');

    expect(entries()[0]).toMatchObject({ strategy: 'plain_request', attempt: 2, component: 'OrchestratedFetch' });
  });

  it('should serialize caught errors under err', async () => {
    const { logger, configureLogger } = await import('../../src/utils/logger.js');
    configureLogger({ level: 'info' });

    logger.crawler.error('Unexpected failure', { url: 'https://example.com/a', error: new Error('boom') });

    const [entry] = entries();
    expect(entry.level).toBe('error');
    expect(entry.err).toMatchObject({ message: 'boom', name: 'Error' });
    expect(entry.error).toBeUndefined();
  });
});
