import { describe, it, expect } from 'vitest';
import {
  hostOf,
  inferScopePrefix,
  isAbsoluteHttpUrl,
  isSameHost,
  isWithinScope,
  tryParseUrl,
} from '../../src/utils/url-scope.js';

describe('url-scope', () => {
  describe('tryParseUrl', () => {
    it('should resolve relative references against a base', () => {
      expect(tryParseUrl('../a', 'https://example.com/blog/post')?.href).toBe('https://example.com/a');
    });

    it('should return null for unparseable input', () => {
      expect(tryParseUrl('not a url')).toBeNull();
    });
  });

  describe('isAbsoluteHttpUrl', () => {
    it('should accept http and https', () => {
      expect(isAbsoluteHttpUrl('http://example.com')).toBe(true);
      expect(isAbsoluteHttpUrl('https://example.com/x')).toBe(true);
    });

    it('should reject other schemes and relative paths', () => {
      expect(isAbsoluteHttpUrl('mailto:someone@example.com')).toBe(false);
      expect(isAbsoluteHttpUrl('/relative/path')).toBe(false);
    });
  });

  describe('hostOf / isSameHost', () => {
    it('should include an explicit port in the host', () => {
      expect(hostOf('http://example.com:8080/a')).toBe('example.com:8080');
      expect(isSameHost('http://example.com:8080/a', 'http://example.com/b')).toBe(false);
    });

    it('should lower-case hosts', () => {
      expect(isSameHost('https://EXAMPLE.com/a', 'https://example.com/')).toBe(true);
    });

    it('should treat subdomains as different hosts', () => {
      expect(isSameHost('https://blog.example.com/', 'https://example.com/')).toBe(false);
    });

    it('should return null for invalid URLs', () => {
      expect(hostOf('::::')).toBeNull();
    });
  });

  describe('inferScopePrefix', () => {
    it('should return null for a root URL', () => {
      expect(inferScopePrefix('https://example.com')).toBeNull();
      expect(inferScopePrefix('https://example.com/')).toBeNull();
    });

    it('should use only the first path segment', () => {
      expect(inferScopePrefix('https://example.com/blog')).toBe('/blog/');
      expect(inferScopePrefix('https://example.com/blog/x')).toBe('/blog/');
      expect(inferScopePrefix('https://example.com/blog/category/dsa')).toBe('/blog/');
    });
  });

  describe('isWithinScope', () => {
    it('should accept everything without a prefix', () => {
      expect(isWithinScope('https://example.com/about', null)).toBe(true);
    });

    it('should match on the path prefix', () => {
      expect(isWithinScope('https://example.com/blog/a', '/blog/')).toBe(true);
      expect(isWithinScope('https://example.com/blog', '/blog/')).toBe(false);
      expect(isWithinScope('https://example.com/about', '/blog/')).toBe(false);
    });
  });
});
