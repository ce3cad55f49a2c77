/**
 * Yes/no topic gate. Fail-closed: a thrown error or empty answer from the
 * completion service means "not relevant".
 */

import type { CompletionService } from '../types/feed';
import { logger } from '../utils/logger';

export const SUMMARY_PROMPT_CHARS = 500;

export interface ArticleDraft {
  title: string;
  summary: string;
}

export function buildRelevancePrompt(draft: ArticleDraft, topics: readonly string[]): string {
  return (
    `Topics of interest: ${topics.join(', ')}\n` +
    `Article title: ${draft.title}\n` +
    `Article summary: ${draft.summary.slice(0, SUMMARY_PROMPT_CHARS)}...\n` +
    `Does this article relate to any of the topics? Answer only 'yes' or 'no'.`
  );
}

export function isAffirmative(response: string): boolean {
  return response.toLowerCase().includes('yes');
}

export async function isRelevant(
  draft: ArticleDraft,
  topics: readonly string[],
  model: string,
  service: CompletionService
): Promise<boolean> {
  let response: string;
  try {
    response = await service.complete(buildRelevancePrompt(draft, topics), model);
  } catch (error) {
    logger.warn(`Relevance check failed for "${draft.title}", treating as not relevant`, error);
    return false;
  }

  if (!response) {
    logger.debug(`Empty relevance answer for "${draft.title}"`);
    return false;
  }

  const relevant = isAffirmative(response);
  logger.debug(`Relevance for "${draft.title}": ${relevant ? 'yes' : 'no'}`);
  return relevant;
}
