/**
 * Configuration Schemas
 *
 * Zod schemas for every environment-driven setting. All env parsing goes
 * through these so a bad value fails at startup with a readable message.
 */

import { z } from 'zod';

// ============================================
// HELPER SCHEMAS
// ============================================

/**
 * Schema for parsing a string as a boolean.
 * Recognizes 'true', '1', 'yes' as true; everything else as false.
 */
export const booleanStringSchema = z
  .string()
  .optional()
  .transform((val) => {
    if (!val) return false;
    return ['true', '1', 'yes'].includes(val.toLowerCase());
  });

/**
 * Schema for parsing a string as an integer with bounds.
 */
export function integerStringSchema(options: { min?: number; max?: number; default: number }) {
  let schema = z.coerce.number().int();
  if (options.min !== undefined) schema = schema.min(options.min);
  if (options.max !== undefined) schema = schema.max(options.max);
  return schema.default(options.default);
}

/**
 * Optional integer: an unset or empty variable stays undefined.
 */
export function optionalIntegerStringSchema(options: { min?: number; max?: number } = {}) {
  let schema = z.coerce.number().int();
  if (options.min !== undefined) schema = schema.min(options.min);
  if (options.max !== undefined) schema = schema.max(options.max);
  return z.preprocess((val) => (val === '' ? undefined : val), schema.optional());
}

const optionalStringSchema = z.preprocess(
  (val) => (typeof val === 'string' && val.trim() === '' ? undefined : val),
  z.string().optional()
);

// ============================================
// LOG CONFIGURATION
// ============================================

export const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);
export type LogLevel = z.infer<typeof logLevelSchema>;

export const logConfigSchema = z.object({
  level: logLevelSchema.default('info'),
  prettyPrint: booleanStringSchema,
});

export type LogConfig = z.infer<typeof logConfigSchema>;

// ============================================
// CRAWL CONFIGURATION
// ============================================

export const crawlConfigSchema = z.object({
  maxAttempts: integerStringSchema({ min: 1, max: 10, default: 3 }),
  concurrency: integerStringSchema({ min: 1, max: 16, default: 1 }),
  deadlineMs: optionalIntegerStringSchema({ min: 1 }),
  minHostDelayMs: integerStringSchema({ min: 0, max: 60000, default: 0 }),
  sitemapMaxDepth: integerStringSchema({ min: 0, max: 20, default: 5 }),
  teamId: z.string().min(1).default('default'),
  memoryPath: optionalStringSchema,
});

export type CrawlConfig = z.infer<typeof crawlConfigSchema>;

// ============================================
// ORACLE CONFIGURATION
// ============================================

export const oracleConfigSchema = z.object({
  apiKey: optionalStringSchema,
  model: z.string().min(1).default('claude-sonnet-4-20250514'),
  timeoutMs: integerStringSchema({ min: 1000, max: 600000, default: 60000 }),
  useStrategyOracle: booleanStringSchema,
});

export type OracleConfig = z.infer<typeof oracleConfigSchema>;

// ============================================
// ERROR FORMATTING
// ============================================

/**
 * Format Zod validation errors into readable messages.
 */
export function formatConfigErrors(error: z.ZodError<unknown>): string {
  return error.issues
    .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
    .join('\n');
}

export class ConfigValidationError extends Error {
  constructor(
    public readonly section: string,
    public readonly zodError: z.ZodError
  ) {
    super(
      `Configuration validation failed for ${section}:\n${formatConfigErrors(zodError)}\n\n` +
      `Please check your environment variables.`
    );
    this.name = 'ConfigValidationError';
  }
}
