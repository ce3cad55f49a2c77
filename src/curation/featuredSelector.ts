/**
 * Asks the model to rank the most newsworthy stories and keeps at most four.
 * When the answer cannot be used at all the first three articles are featured.
 */

import type { Article, CompletionService } from '../types/feed';
import { logger } from '../utils/logger';

export const MAX_PROMPT_ARTICLES = 20;
export const MAX_FEATURED = 4;
export const FALLBACK_FEATURED = 3;
const SUMMARY_PREVIEW_CHARS = 200;

export class FeaturedParseError extends Error {
  constructor(response: string) {
    super(`No article numbers found in response: "${response.slice(0, 100)}"`);
    this.name = 'FeaturedParseError';
  }
}

export function buildFeaturedPrompt(articles: readonly Article[]): string {
  const listing = articles
    .slice(0, MAX_PROMPT_ARTICLES)
    .map((article, index) => `${index + 1}. ${article.title}\n   ${article.summary.slice(0, SUMMARY_PREVIEW_CHARS)}`)
    .join('\n\n');

  return (
    `You are the front-page editor of a news digest. From the articles below, pick the 3 or 4 most newsworthy stories.\n` +
    `Rank them by impact, breaking-news character, public interest and overall significance.\n\n` +
    `${listing}\n\n` +
    `Respond with ONLY the article numbers, most important first, separated by commas (for example: 3, 1, 7).`
  );
}

/**
 * Every decimal integer in the response, first four kept, converted to
 * 0-based and bounded by the article count.
 * @throws FeaturedParseError when the response holds no number at all
 */
export function parseFeaturedIndices(response: string, articleCount: number): number[] {
  const numbers = response.match(/\d+/g);
  if (!numbers) {
    throw new FeaturedParseError(response);
  }

  const indices: number[] = [];
  for (const value of numbers.slice(0, MAX_FEATURED)) {
    const index = parseInt(value, 10) - 1;
    if (index >= 0 && index < articleCount && !indices.includes(index)) {
      indices.push(index);
    }
  }
  return indices;
}

export function fallbackFeaturedIndices(articleCount: number): number[] {
  return Array.from({ length: Math.min(FALLBACK_FEATURED, articleCount) }, (_, index) => index);
}

export async function selectFeatured(
  articles: readonly Article[],
  model: string,
  service: CompletionService
): Promise<number[]> {
  if (articles.length === 0) return [];

  try {
    const response = await service.complete(buildFeaturedPrompt(articles), model);
    const indices = parseFeaturedIndices(response, articles.length);
    logger.info(`Featured selection: ${indices.map(index => index + 1).join(', ') || 'none'}`);
    return indices;
  } catch (error) {
    const fallback = fallbackFeaturedIndices(articles.length);
    logger.warn(
      `Featured selection failed, falling back to the first ${fallback.length} articles`,
      error instanceof Error ? error.message : error
    );
    return fallback;
  }
}
