/**
 * Environment Variable Parser
 *
 * Maps environment variables onto the zod schemas in config-schemas.ts and
 * caches the parsed result. Call clearConfigCache() after changing
 * process.env in tests.
 */

import type { z } from 'zod';
import {
  logConfigSchema,
  crawlConfigSchema,
  oracleConfigSchema,
  ConfigValidationError,
  type LogConfig,
  type CrawlConfig,
  type OracleConfig,
} from './config-schemas.js';

type Env = Record<string, string | undefined>;

// ============================================
// ENVIRONMENT VARIABLE MAPPING
// ============================================

function mapEnvToLogConfig(env: Env) {
  return {
    level: env.LOG_LEVEL,
    prettyPrint: env.LOG_PRETTY,
  };
}

function mapEnvToCrawlConfig(env: Env) {
  return {
    maxAttempts: env.CRAWL_MAX_ATTEMPTS,
    concurrency: env.CRAWL_CONCURRENCY,
    deadlineMs: env.CRAWL_DEADLINE_MS,
    minHostDelayMs: env.CRAWL_MIN_HOST_DELAY_MS,
    sitemapMaxDepth: env.CRAWL_SITEMAP_MAX_DEPTH,
    teamId: env.CRAWL_TEAM_ID,
    memoryPath: env.CRAWL_MEMORY_PATH,
  };
}

function mapEnvToOracleConfig(env: Env) {
  return {
    apiKey: env.ANTHROPIC_API_KEY,
    model: env.ORACLE_MODEL,
    timeoutMs: env.ORACLE_TIMEOUT_MS,
    useStrategyOracle: env.STRATEGY_ORACLE,
  };
}

function parseSection<S extends z.ZodTypeAny>(section: string, schema: S, input: unknown): z.infer<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ConfigValidationError(section, result.error);
  }
  return result.data;
}

// ============================================
// INDIVIDUAL CONFIG PARSERS
// ============================================

export function parseLogConfig(env: Env = process.env): LogConfig {
  return parseSection('logging', logConfigSchema, mapEnvToLogConfig(env));
}

export function parseCrawlConfig(env: Env = process.env): CrawlConfig {
  return parseSection('crawl', crawlConfigSchema, mapEnvToCrawlConfig(env));
}

export function parseOracleConfig(env: Env = process.env): OracleConfig {
  return parseSection('oracle', oracleConfigSchema, mapEnvToOracleConfig(env));
}

// ============================================
// CONFIG CACHING
// ============================================

let cachedLogConfig: LogConfig | null = null;
let cachedCrawlConfig: CrawlConfig | null = null;
let cachedOracleConfig: OracleConfig | null = null;

/**
 * Get cached log configuration (parses once on first call).
 */
export function getLogConfig(): LogConfig {
  if (!cachedLogConfig) {
    cachedLogConfig = parseLogConfig();
  }
  return cachedLogConfig;
}

/**
 * Get cached crawl configuration (parses once on first call).
 */
export function getCrawlConfig(): CrawlConfig {
  if (!cachedCrawlConfig) {
    cachedCrawlConfig = parseCrawlConfig();
  }
  return cachedCrawlConfig;
}

/**
 * Get cached oracle configuration (parses once on first call).
 */
export function getOracleConfig(): OracleConfig {
  if (!cachedOracleConfig) {
    cachedOracleConfig = parseOracleConfig();
  }
  return cachedOracleConfig;
}

export function clearConfigCache(): void {
  cachedLogConfig = null;
  cachedCrawlConfig = null;
  cachedOracleConfig = null;
}

/**
 * Validate every section at once, collecting the failures instead of
 * stopping at the first.
 */
export function validateAllConfigs(env: Env = process.env): ConfigValidationError[] {
  const errors: ConfigValidationError[] = [];
  for (const parse of [parseLogConfig, parseCrawlConfig, parseOracleConfig]) {
    try {
      parse(env);
    } catch (error) {
      if (!(error instanceof ConfigValidationError)) throw error;
      errors.push(error);
    }
  }
  return errors;
}
