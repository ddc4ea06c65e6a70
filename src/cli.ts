#!/usr/bin/env node
/**
 * adaptive-crawl command line
 *
 * Usage:
 *   adaptive-crawl crawl <base-url> [--output=crawled_data.json]
 *   adaptive-crawl scrape <url> [--output=crawled_data.json]
 *
 * Writes the crawl result as JSON and exits 1 when discovery finds nothing
 * to crawl.
 */

import * as fs from 'node:fs/promises';
import { realpathSync } from 'node:fs';
import { pathToFileURL } from 'node:url';
import type { CrawlResult } from './types/index.js';
import { isAbsoluteHttpUrl } from './utils/url-scope.js';
import { logger } from './utils/logger.js';
import { createCrawler, type CrawlerClient } from './sdk.js';

const log = logger.cli;

export const DEFAULT_OUTPUT_FILE = 'crawled_data.json';

const USAGE = `Usage:
  adaptive-crawl crawl <base-url> [--output=<file>]
  adaptive-crawl scrape <url> [--output=<file>]

Environment:
  ANTHROPIC_API_KEY        required for content extraction
  CRAWL_CONCURRENCY        URLs processed at once (default 1)
  CRAWL_MEMORY_PATH        JSON file that keeps domain memory between runs
  STRATEGY_ORACLE=true     let Claude pick fetch strategies`;

export interface CliArgs {
  command: 'crawl' | 'scrape';
  url: string;
  output: string;
}

export type ParsedArgs = { ok: true; args: CliArgs } | { ok: false; message: string };

export function parseArgs(argv: readonly string[]): ParsedArgs {
  const positional: string[] = [];
  let output = DEFAULT_OUTPUT_FILE;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg.startsWith('--output=')) {
      output = arg.slice('--output='.length);
    } else if (arg === '--output' || arg === '-o') {
      const value = argv[i + 1];
      if (value === undefined) return { ok: false, message: `${arg} needs a file name` };
      output = value;
      i++;
    } else if (arg.startsWith('-')) {
      return { ok: false, message: `Unknown option: ${arg}` };
    } else {
      positional.push(arg);
    }
  }

  const [command, url] = positional;
  if (command !== 'crawl' && command !== 'scrape') {
    return { ok: false, message: command ? `Unknown command: ${command}` : 'Missing command' };
  }
  if (!url || !isAbsoluteHttpUrl(url)) {
    return { ok: false, message: 'Expected an absolute http(s) URL' };
  }
  if (!output) {
    return { ok: false, message: 'Output file name is empty' };
  }
  return { ok: true, args: { command, url, output } };
}

export function exitCodeFor(result: CrawlResult): number {
  return result.status === 'no_urls_found' || result.status === 'fallback_failed' ? 1 : 0;
}

export interface CliDependencies {
  createClient?: () => Promise<CrawlerClient>;
  writeFile?: (path: string, data: string) => Promise<void>;
  print?: (line: string) => void;
}

/**
 * Run one CLI invocation and return the process exit code
 */
export async function runCli(argv: readonly string[], deps: CliDependencies = {}): Promise<number> {
  const print = deps.print ?? ((line: string) => console.error(line));
  const parsed = parseArgs(argv);
  if (!parsed.ok) {
    print(`${parsed.message}\n\n${USAGE}`);
    return 2;
  }

  const { command, url, output } = parsed.args;
  const client = await (deps.createClient ?? (() => createCrawler()))();
  let result: CrawlResult;
  try {
    result = command === 'crawl' ? await client.crawl(url) : await client.scrape(url);
  } finally {
    await client.close();
  }

  const writeFile = deps.writeFile ?? ((path: string, data: string) => fs.writeFile(path, data, 'utf-8'));
  await writeFile(output, JSON.stringify(result, null, 2));
  log.info('Wrote crawl result', { path: output, status: result.status, items: result.items.length });
  print(`${result.status}: ${result.items.length} item(s) written to ${output}`);

  return exitCodeFor(result);
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return import.meta.url === pathToFileURL(realpathSync(entry)).href;
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  runCli(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      log.error('Crawl failed', { error });
      console.error(error instanceof Error ? error.message : String(error));
      process.exit(1);
    });
}
