/**
 * Error Taxonomy and Classification
 *
 * Every per-URL failure surfaces as one of these categories:
 * - transport: network failure or non-2xx HTTP status
 * - parse: malformed robots.txt, sitemap or HTML
 * - extraction: oracle failure, malformed oracle output or empty result
 * - browser: headless browser unavailable or crashed
 * - config: invalid configuration
 *
 * Off-domain URLs (scope violations) and exhausted URLs are outcomes, not
 * thrown errors, so they have no class here.
 */

export type ErrorCategory =
  | 'transport'    // Connection failures, timeouts, DNS issues, HTTP status
  | 'parse'        // Unreadable robots.txt, sitemap or page
  | 'extraction'   // Oracle failures and empty extractions
  | 'browser'      // Playwright missing or crashed
  | 'config'       // Configuration errors
  | 'internal';

export type ErrorCode =
  // Transport
  | 'NETWORK_TIMEOUT'
  | 'NETWORK_CONNECTION_REFUSED'
  | 'NETWORK_DNS_FAILURE'
  | 'NETWORK_SOCKET_ERROR'
  | 'HTTP_FORBIDDEN'             // 403
  | 'HTTP_NOT_FOUND'             // 404
  | 'HTTP_TOO_MANY_REQUESTS'     // 429
  | 'HTTP_CLIENT_ERROR'          // other 4xx
  | 'HTTP_SERVER_ERROR'          // 5xx
  | 'HTTP_UNEXPECTED_STATUS'
  // Parse
  | 'PARSE_INVALID_XML'
  | 'PARSE_INVALID_URL'
  // Extraction
  | 'EXTRACTION_CONTENT_TOO_SHORT'
  | 'EXTRACTION_EMPTY'
  | 'EXTRACTION_MALFORMED_RESPONSE'
  | 'EXTRACTION_ORACLE_FAILED'
  // Browser
  | 'BROWSER_NOT_INSTALLED'
  | 'BROWSER_NAVIGATION_FAILED'
  // Config
  | 'CONFIG_INVALID'
  // Fallback
  | 'INTERNAL_ERROR';

export interface ErrorClassification {
  category: ErrorCategory;
  code: ErrorCode;
  httpStatus?: number;
}

export interface CrawlErrorContext {
  url?: string;
  domain?: string;
  httpStatus?: number;
  [key: string]: unknown;
}

/**
 * Base class for errors raised while discovering or fetching a URL.
 */
export class CrawlError extends Error {
  readonly category: ErrorCategory;
  readonly code: ErrorCode;
  readonly context: CrawlErrorContext;

  constructor(
    message: string,
    classification: ErrorClassification,
    context: CrawlErrorContext = {},
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'CrawlError';
    this.category = classification.category;
    this.code = classification.code;
    this.context = classification.httpStatus !== undefined
      ? { ...context, httpStatus: classification.httpStatus }
      : context;
  }

  get retryable(): boolean {
    return isRetryable(this.category, this.code);
  }
}

export class TransportError extends CrawlError {
  readonly httpStatus?: number;

  constructor(message: string, options: { url?: string; httpStatus?: number; cause?: unknown } = {}) {
    const classification = options.httpStatus !== undefined
      ? classifyHttpStatus(options.httpStatus)
      : classifyTransportFailure(message, options.cause);
    super(
      message,
      { ...classification, category: 'transport' },
      { url: options.url },
      { cause: options.cause }
    );
    this.name = 'TransportError';
    this.httpStatus = options.httpStatus;
  }
}

export class ParseError extends CrawlError {
  constructor(message: string, code: 'PARSE_INVALID_XML' | 'PARSE_INVALID_URL', context: CrawlErrorContext = {}) {
    super(message, { category: 'parse', code }, context);
    this.name = 'ParseError';
  }
}

export class ExtractionError extends CrawlError {
  constructor(
    message: string,
    code: 'EXTRACTION_CONTENT_TOO_SHORT' | 'EXTRACTION_EMPTY' | 'EXTRACTION_MALFORMED_RESPONSE' | 'EXTRACTION_ORACLE_FAILED',
    context: CrawlErrorContext = {},
    options?: { cause?: unknown }
  ) {
    super(message, { category: 'extraction', code }, context, options);
    this.name = 'ExtractionError';
  }
}

/**
 * Classify an HTTP status code into category and code
 */
export function classifyHttpStatus(status: number): ErrorClassification {
  switch (status) {
    case 403: return { category: 'transport', code: 'HTTP_FORBIDDEN', httpStatus: status };
    case 404: return { category: 'transport', code: 'HTTP_NOT_FOUND', httpStatus: status };
    case 429: return { category: 'transport', code: 'HTTP_TOO_MANY_REQUESTS', httpStatus: status };
    default:
      if (status >= 400 && status < 500) return { category: 'transport', code: 'HTTP_CLIENT_ERROR', httpStatus: status };
      if (status >= 500) return { category: 'transport', code: 'HTTP_SERVER_ERROR', httpStatus: status };
      return { category: 'transport', code: 'HTTP_UNEXPECTED_STATUS', httpStatus: status };
  }
}

/**
 * Classify any thrown value into category and code based on its type and
 * message patterns.
 */
export function classifyError(error: unknown): ErrorClassification {
  if (error instanceof CrawlError) {
    const httpStatus = error.context.httpStatus;
    return httpStatus !== undefined
      ? { category: error.category, code: error.code, httpStatus }
      : { category: error.category, code: error.code };
  }

  if (error instanceof Error && error.name === 'ConfigValidationError') {
    return { category: 'config', code: 'CONFIG_INVALID' };
  }

  const message = (error instanceof Error ? `${error.name} ${error.message}` : String(error)).toLowerCase();

  if (message.includes('aborterror') || message.includes('timeout') || message.includes('timed out')) {
    return { category: 'transport', code: 'NETWORK_TIMEOUT' };
  }
  if (message.includes('econnrefused') || message.includes('connection refused')) {
    return { category: 'transport', code: 'NETWORK_CONNECTION_REFUSED' };
  }
  if (message.includes('getaddrinfo') || message.includes('enotfound') || message.includes('dns')) {
    return { category: 'transport', code: 'NETWORK_DNS_FAILURE' };
  }
  if (message.includes('econnreset') || message.includes('socket') || message.includes('fetch failed')) {
    return { category: 'transport', code: 'NETWORK_SOCKET_ERROR' };
  }

  if (message.includes('playwright') && (message.includes('not installed') || message.includes('executable doesn'))) {
    return { category: 'browser', code: 'BROWSER_NOT_INSTALLED' };
  }
  if (message.includes('net::') || message.includes('navigation failed') || message.includes('page crashed')) {
    return { category: 'browser', code: 'BROWSER_NAVIGATION_FAILED' };
  }

  if (message.includes('json')) {
    return { category: 'extraction', code: 'EXTRACTION_MALFORMED_RESPONSE' };
  }

  return { category: 'internal', code: 'INTERNAL_ERROR' };
}

// The cause knows more than our wrapper message, unless it is unrecognized
function classifyTransportFailure(message: string, cause: unknown): ErrorClassification {
  if (cause !== undefined) {
    const fromCause = classifyError(cause);
    if (fromCause.code !== 'INTERNAL_ERROR') return fromCause;
  }
  return classifyError(message);
}

/**
 * Whether the same strategy could reasonably succeed on a later run.
 */
export function isRetryable(category: ErrorCategory, code: ErrorCode): boolean {
  switch (category) {
    case 'transport':
      return code !== 'HTTP_NOT_FOUND' && code !== 'HTTP_CLIENT_ERROR';
    case 'extraction':
      return code === 'EXTRACTION_ORACLE_FAILED' || code === 'EXTRACTION_MALFORMED_RESPONSE';
    case 'browser':
      return code === 'BROWSER_NAVIGATION_FAILED';
    default:
      return false;
  }
}

/**
 * Short `category/code` label for log lines and attempt records.
 */
export function describeFailure(error: unknown): string {
  const { category, code } = classifyError(error);
  return `${category}/${code}`;
}
