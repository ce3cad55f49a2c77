/**
 * Newspaper-style HTML page for a curation result
 */

import type { Article, CurationResult } from '../types/feed';

export interface DigestOptions {
  title: string;
  topics: readonly string[];
  generatedAt?: Date;
}

const SUMMARY_PREVIEW_CHARS = 300;

const STYLES = `
    body { font-family: Georgia, serif; background-color: #f4f4f4; color: #333; margin: 0; padding: 20px; }
    header { text-align: center; margin-bottom: 20px; border-bottom: 2px solid #000; padding-bottom: 10px; }
    header h1 { font-size: 3em; margin: 0; font-weight: bold; letter-spacing: 2px; }
    .edition { font-size: 0.9em; color: #666; font-style: italic; }
    .topics { font-size: 0.8em; color: #666; margin-top: 10px; }
    .topics details { display: inline-block; }
    .topics summary { cursor: pointer; font-style: italic; }
    .topics ul { list-style-type: none; padding: 0; margin: 5px 0 0 0; }
    .featured { max-width: 1200px; margin: 0 auto 30px; display: grid; grid-template-columns: repeat(auto-fit, minmax(260px, 1fr)); gap: 24px; border-bottom: 2px solid #000; padding-bottom: 20px; }
    .featured .article h2 { font-size: 1.8em; }
    .featured img { width: 100%; max-height: 220px; object-fit: cover; margin-bottom: 10px; }
    .container { max-width: 1200px; margin: 0 auto; column-count: 3; column-gap: 40px; column-rule: 1px solid #ccc; }
    .article { break-inside: avoid-column; margin-bottom: 30px; }
    .article h2 { font-size: 1.4em; margin: 0 0 5px; line-height: 1.2; font-weight: bold; }
    .article h2 a { color: #000; text-decoration: none; }
    .article h2 a:hover { text-decoration: underline; }
    .article .meta { font-size: 0.8em; color: #666; margin-bottom: 10px; font-style: italic; }
    .article p { font-size: 1em; line-height: 1.5; margin: 0; }
    .article img { max-width: 100%; margin-bottom: 8px; }
    footer { text-align: center; font-size: 0.8em; color: #666; margin-top: 20px; border-top: 1px solid #ccc; padding-top: 10px; }
    @media (max-width: 768px) { .container { column-count: 1; } }`;

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

export function previewSummary(summary: string, maxChars: number = SUMMARY_PREVIEW_CHARS): string {
  if (summary.length <= maxChars) return summary;
  return `${summary.slice(0, maxChars).trimEnd()}...`;
}

const LINK_PROTOCOLS = new Set(['http:', 'https:']);

// Links come straight from feeds; anything but http(s) is not made clickable
export function safeHref(link: string): string {
  try {
    return LINK_PROTOCOLS.has(new URL(link).protocol) ? link : '#';
  } catch {
    return '#';
  }
}

function renderArticle(article: Article): string {
  const image = article.imageUrl
    ? `\n      <img src="${escapeHtml(article.imageUrl)}" alt="" loading="lazy">`
    : '';

  return `
    <div class="article">${image}
      <h2><a href="${escapeHtml(safeHref(article.link))}">${escapeHtml(article.title)}</a></h2>
      <div class="meta">${escapeHtml(article.sourceName)} · ${article.publishedAt.toISOString()}</div>
      <p>${escapeHtml(previewSummary(article.summary))}</p>
    </div>`;
}

export function renderDigest(result: CurationResult, options: DigestOptions): string {
  const generatedAt = options.generatedAt ?? new Date();
  const shown = result.featured.length + result.regular.length;

  const topics = options.topics.map(topic => `          <li>${escapeHtml(topic)}</li>`).join('\n');

  const featured = result.featured.length > 0
    ? `
  <section class="featured">${result.featured.map(article => renderArticle(article)).join('')}
  </section>`
    : '';

  const regular = result.regular.map(article => renderArticle(article)).join('');

  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>${escapeHtml(options.title)}</title>
  <style>${STYLES}
  </style>
</head>
<body>
  <header>
    <h1>${escapeHtml(options.title)}</h1>
    <div class="edition">${generatedAt.toISOString().split('T')[0]}</div>
    <div class="topics">
      <details>
        <summary>Topics Followed</summary>
        <ul>
${topics}
        </ul>
      </details>
    </div>
  </header>${featured}
  <div class="container">${regular}
  </div>
  <footer>${shown} of ${result.totalAnalyzed} articles analyzed</footer>
</body>
</html>
`;
}
