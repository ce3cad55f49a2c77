/**
 * Unit tests for the HTML digest page
 */

import { escapeHtml, previewSummary, renderDigest, safeHref } from '../htmlDigest';
import { createArticle } from '../../__tests__/setup';
import type { CurationResult } from '../../types/feed';

const result = (overrides: Partial<CurationResult> = {}): CurationResult => ({
  featured: [],
  regular: [],
  totalAnalyzed: 0,
  feedsProcessed: 0,
  feedsFailed: [],
  ...overrides
});

describe('htmlDigest', () => {
  describe('escapeHtml', () => {
    it('should escape markup characters', () => {
      expect(escapeHtml('<a href="x">Tom & \'Jerry\'</a>')).toBe(
        '&lt;a href=&quot;x&quot;&gt;Tom &amp; &#39;Jerry&#39;&lt;/a&gt;'
      );
    });
  });

  describe('previewSummary', () => {
    it('should keep short summaries whole', () => {
      expect(previewSummary('Short one.')).toBe('Short one.');
    });

    it('should cut long summaries at 300 characters', () => {
      expect(previewSummary('a'.repeat(301))).toBe(`${'a'.repeat(300)}...`);
    });
  });

  describe('renderDigest', () => {
    const generatedAt = new Date('2024-03-05T09:30:00Z');

    it('should render the header, topics and footer counts', () => {
      const html = renderDigest(
        result({
          regular: [createArticle({ title: 'First' }), createArticle({ title: 'Second' })],
          totalAnalyzed: 5
        }),
        { title: 'Daily & Co', topics: ['AI', 'Space <exploration>'], generatedAt }
      );

      expect(html.startsWith('<!DOCTYPE html>')).toBe(true);
      expect(html).toContain('<title>Daily &amp; Co</title>');
      expect(html).toContain('<div class="edition">2024-03-05</div>');
      expect(html).toContain('          <li>AI</li>\n          <li>Space &lt;exploration&gt;</li>');
      expect(html).toContain('<footer>2 of 5 articles analyzed</footer>');
      expect(html).not.toContain('<section class="featured">');
    });

    it('should render article cards with escaped fields and images', () => {
      const html = renderDigest(
        result({
          featured: [
            createArticle({
              title: 'Rates & "markets"',
              link: 'https://news.example.com/rates?a=1&b=2',
              imageUrl: 'https://cdn.example.com/rates.jpg'
            })
          ],
          totalAnalyzed: 1
        }),
        { title: 'Digest', topics: [], generatedAt }
      );

      expect(html).toContain('<section class="featured">');
      expect(html).toContain('<img src="https://cdn.example.com/rates.jpg" alt="" loading="lazy">');
      expect(html).toContain(
        '<h2><a href="https://news.example.com/rates?a=1&amp;b=2">Rates &amp; &quot;markets&quot;</a></h2>'
      );
      expect(html).toContain('<div class="meta">Example News · 2024-01-01T00:00:00.000Z</div>');
      expect(html).toContain('<p>A short summary.</p>');
    });

    it('should not render script links as clickable', () => {
      const html = renderDigest(
        result({ regular: [createArticle({ title: 'Bad', link: 'javascript:alert(1)' })], totalAnalyzed: 1 }),
        { title: 'Digest', topics: [], generatedAt }
      );

      expect(html).toContain('<h2><a href="#">Bad</a></h2>');
    });
  });

  describe('safeHref', () => {
    it('should keep http and https links', () => {
      expect(safeHref('https://news.example.com/a?b=1')).toBe('https://news.example.com/a?b=1');
      expect(safeHref('http://news.example.com/a')).toBe('http://news.example.com/a');
    });

    it('should replace other schemes and unparseable links with #', () => {
      expect(safeHref('javascript:alert(1)')).toBe('#');
      expect(safeHref(' JavaScript:alert(1)')).toBe('#');
      expect(safeHref('data:text/html,hi')).toBe('#');
      expect(safeHref('#')).toBe('#');
      expect(safeHref('/relative/path')).toBe('#');
    });
  });
});
