import { describe, it, expect } from 'vitest';
import { extractHrefs, extractVisibleText, MIN_VISIBLE_TEXT_LENGTH } from '../../src/utils/content-extractor.js';

describe('extractVisibleText', () => {
  it('should drop scripts, styles and page chrome', () => {
    const html = `<html><body>
      <header>Site header</header>
      <nav>Home | Blog</nav>
      <script>var tracking = 1;</script>
      <style>p { color: red; }</style>
      <main><p>Main   text</p>
      <p>second
      line</p></main>
      <footer>Copyright</footer>
    </body></html>`;

    expect(extractVisibleText(html)).toBe('Main text second line');
  });

  it('should strip non-printable characters', () => {
    expect(extractVisibleText('<p>a\u0007b\u200Bc</p>')).toBe('abc');
  });

  it('should return an empty string for markup without text', () => {
    expect(extractVisibleText('<div><script>x()</script></div>')).toBe('');
  });

  it('should use a 100 character gate', () => {
    expect(MIN_VISIBLE_TEXT_LENGTH).toBe(100);
  });
});

describe('extractHrefs', () => {
  it('should return trimmed hrefs in document order', () => {
    const html = '<a href=" /a ">A</a><a>no href</a><a href="">empty</a><a href="https://x.test/b">B</a>';
    expect(extractHrefs(html)).toEqual(['/a', 'https://x.test/b']);
  });
});
