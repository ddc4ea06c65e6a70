/**
 * Tests for the crawl error taxonomy
 */

import { describe, it, expect } from 'vitest';
import {
  classifyError,
  classifyHttpStatus,
  describeFailure,
  isRetryable,
  ExtractionError,
  ParseError,
  TransportError,
} from '../../src/types/errors.js';

describe('errors', () => {
  describe('classifyHttpStatus', () => {
    it('should map well-known statuses to specific codes', () => {
      expect(classifyHttpStatus(403).code).toBe('HTTP_FORBIDDEN');
      expect(classifyHttpStatus(404).code).toBe('HTTP_NOT_FOUND');
      expect(classifyHttpStatus(429).code).toBe('HTTP_TOO_MANY_REQUESTS');
    });

    it('should group other statuses by class', () => {
      expect(classifyHttpStatus(410).code).toBe('HTTP_CLIENT_ERROR');
      expect(classifyHttpStatus(503).code).toBe('HTTP_SERVER_ERROR');
      expect(classifyHttpStatus(302).code).toBe('HTTP_UNEXPECTED_STATUS');
    });
  });

  describe('classifyError', () => {
    it('should classify timeouts', () => {
      expect(classifyError('Request timed out after 30000ms')).toEqual({ category: 'transport', code: 'NETWORK_TIMEOUT' });
    });

    it('should classify DNS failures', () => {
      expect(classifyError(new Error('getaddrinfo ENOTFOUND example.invalid')).code).toBe('NETWORK_DNS_FAILURE');
    });

    it('should classify a missing browser', () => {
      expect(classifyError(new Error('Playwright is not installed (missing)'))).toEqual({
        category: 'browser',
        code: 'BROWSER_NOT_INSTALLED',
      });
    });

    it('should classify navigation failures', () => {
      expect(classifyError(new Error('net::ERR_CONNECTION_RESET at https://example.com')).code).toBe(
        'BROWSER_NAVIGATION_FAILED'
      );
    });

    it('should classify JSON errors as malformed oracle output', () => {
      expect(classifyError(new SyntaxError('Unexpected token < in JSON at position 0')).code).toBe(
        'EXTRACTION_MALFORMED_RESPONSE'
      );
    });

    it('should read the classification straight off crawl errors', () => {
      const error = new TransportError('GET x returned HTTP 429', { httpStatus: 429 });
      expect(classifyError(error)).toEqual({ category: 'transport', code: 'HTTP_TOO_MANY_REQUESTS', httpStatus: 429 });
    });

    it('should fall back to internal', () => {
      expect(classifyError({ weird: true })).toEqual({ category: 'internal', code: 'INTERNAL_ERROR' });
    });
  });

  describe('error classes', () => {
    it('should keep transport errors in the transport category', () => {
      const error = new TransportError('GET https://example.com failed: getaddrinfo ENOTFOUND', {
        url: 'https://example.com',
      });
      expect(error.category).toBe('transport');
      expect(error.code).toBe('NETWORK_DNS_FAILURE');
      expect(error.context.url).toBe('https://example.com');
      expect(error.retryable).toBe(true);
    });

    it('should mark 404s as not retryable', () => {
      expect(new TransportError('missing', { httpStatus: 404 }).retryable).toBe(false);
    });

    it('should carry parse codes', () => {
      const error = new ParseError('Document is not a sitemap', 'PARSE_INVALID_XML');
      expect(error.name).toBe('ParseError');
      expect(describeFailure(error)).toBe('parse/PARSE_INVALID_XML');
    });

    it('should keep the cause on extraction errors', () => {
      const cause = new Error('upstream');
      const error = new ExtractionError('failed', 'EXTRACTION_ORACLE_FAILED', {}, { cause });
      expect(error.cause).toBe(cause);
      expect(error.retryable).toBe(true);
    });
  });

  describe('isRetryable', () => {
    it('should never retry config or internal errors', () => {
      expect(isRetryable('config', 'CONFIG_INVALID')).toBe(false);
      expect(isRetryable('internal', 'INTERNAL_ERROR')).toBe(false);
    });

    it('should not retry content that is too short', () => {
      expect(isRetryable('extraction', 'EXTRACTION_CONTENT_TOO_SHORT')).toBe(false);
    });
  });

  describe('describeFailure', () => {
    it('should format category and code', () => {
      expect(describeFailure(new Error('connect ECONNREFUSED 127.0.0.1:80'))).toBe(
        'transport/NETWORK_CONNECTION_REFUSED'
      );
    });
  });
});
