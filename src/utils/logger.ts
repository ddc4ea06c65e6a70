/**
 * Structured Logger using Pino
 *
 * JSON lines on stderr, one child logger per component. stdout stays free
 * for the CLI's own output.
 */

import pino, { type Logger as PinoLogger, type LoggerOptions } from 'pino';
import { logLevelSchema, type LogLevel } from './config-schemas.js';

export type { LogLevel };

/**
 * Log context metadata
 */
export interface LogContext {
  component?: string;
  domain?: string;
  url?: string;
  strategy?: string;
  attempt?: number;
  durationMs?: number;
  [key: string]: unknown;
}

export interface LoggerConfig {
  level: LogLevel;
  prettyPrint: boolean;
  destination: 'stderr' | 'stdout';
}

const DEFAULT_CONFIG: LoggerConfig = {
  level: logLevelSchema.catch('info').parse(process.env.LOG_LEVEL ?? 'info'),
  prettyPrint: process.env.LOG_PRETTY === 'true',
  destination: 'stderr',
};

/**
 * Paths to redact so API keys and cookies never reach the log stream.
 *
 * See: https://getpino.io/#/docs/redaction
 */
const REDACT_PATHS = [
  'headers.authorization',
  'headers.Authorization',
  'headers.cookie',
  'headers.Cookie',
  '*.authorization',
  '*.Authorization',
  '*.cookie',
  '*.Cookie',
  '*.set-cookie',
  'apiKey',
  '*.apiKey',
  '*.api_key',
  '*.token',
  '*.secret',
  '*.password',
];

function createBaseLogger(config: LoggerConfig = DEFAULT_CONFIG): PinoLogger {
  const options: LoggerOptions = {
    level: config.level,
    base: {
      pid: process.pid,
      service: 'adaptive-crawl',
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
    redact: {
      paths: REDACT_PATHS,
      censor: '[REDACTED]',
    },
  };

  if (config.prettyPrint) {
    return pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname,service',
          destination: config.destination === 'stderr' ? 2 : 1,
        },
      },
    });
  }

  return pino(options, config.destination === 'stderr' ? process.stderr : process.stdout);
}

let baseLogger = createBaseLogger();

/**
 * Reconfigure the logger. createCrawler applies the validated LOG_LEVEL
 * and LOG_PRETTY through this; the import-time default only falls back
 * to info so that importing never throws.
 */
export function configureLogger(config: Partial<LoggerConfig>): void {
  baseLogger = createBaseLogger({ ...DEFAULT_CONFIG, ...config });
}

function serializeError(error: unknown): { message: string; name?: string; stack?: string } {
  if (error instanceof Error) {
    return { message: error.message, name: error.name, stack: error.stack };
  }
  return { message: String(error) };
}

/**
 * Component logger. Resolves the base logger lazily so configureLogger()
 * applies to loggers created at import time.
 */
export class Logger {
  private readonly component: string;
  private readonly bindings: LogContext;

  constructor(component: string, bindings: LogContext = {}) {
    this.component = component;
    this.bindings = bindings;
  }

  private get pino(): PinoLogger {
    return baseLogger.child({ component: this.component, ...this.bindings });
  }

  /**
   * Create a child logger carrying extra bindings on every line
   */
  child(context: LogContext): Logger {
    return new Logger(this.component, { ...this.bindings, ...context });
  }

  debug(message: string, context?: LogContext): void {
    this.pino.debug(context ?? {}, message);
  }

  info(message: string, context?: LogContext): void {
    this.pino.info(context ?? {}, message);
  }

  warn(message: string, context?: LogContext): void {
    this.pino.warn(context ?? {}, message);
  }

  /**
   * Error level. `error` accepts whatever a catch block caught.
   */
  error(message: string, context?: LogContext & { error?: unknown }): void {
    if (context?.error !== undefined) {
      const { error, ...rest } = context;
      this.pino.error({ ...rest, err: serializeError(error) }, message);
      return;
    }
    this.pino.error(context ?? {}, message);
  }

  timed(message: string, startTime: number, context?: LogContext): void {
    this.info(message, { ...context, durationMs: Date.now() - startTime });
  }
}

/**
 * Pre-configured loggers for each component
 */
export const logger = {
  // Core components
  discovery: new Logger('SiteDiscovery'),
  orchestrator: new Logger('OrchestratedFetch'),
  strategies: new Logger('FetchStrategy'),
  browser: new Logger('BrowserManager'),
  policy: new Logger('StrategyPolicy'),
  memory: new Logger('DomainMemory'),
  crawler: new Logger('SiteCrawler'),
  oracle: new Logger('Oracle'),

  // Utils
  rateLimiter: new Logger('RateLimiter'),
  store: new Logger('PersistentStore'),

  // CLI
  cli: new Logger('CLI'),
};

export default logger;
