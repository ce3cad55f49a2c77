/**
 * CurationPipeline - Orchestrates one digest run
 *
 * Strictly sequential workflow:
 * 1. Fetches each configured feed (a failing feed is logged and skipped)
 * 2. For each entry, cleans the summary and extracts an image
 * 3. Keeps entries the relevance classifier accepts
 * 4. Sorts accepted articles newest first
 * 5. Splits them into featured and regular stories
 *
 * Nothing carries over between runs.
 */

import type {
  Article,
  CompletionService,
  CurationConfig,
  CurationResult,
  FeedEntry,
  FeedSource
} from '../types/feed';
import { logger } from '../utils/logger';
import { cleanText } from './textCleaner';
import { extractBestImage } from './imageExtractor';
import { isRelevant } from './relevanceClassifier';
import { selectFeatured } from './featuredSelector';

export interface CurationPipelineOptions {
  feedSource: FeedSource;
  completionService: CompletionService;
  config: CurationConfig;
  now?: () => Date;
}

interface CurationStats {
  totalAnalyzed: number;
  accepted: number;
  feedsProcessed: number;
  feedsFailed: string[];
  startTime: number;
}

/**
 * Sort newest first. Array.prototype.sort is stable, so equal timestamps
 * keep encounter order.
 */
export function sortByPublishedDesc(articles: readonly Article[]): Article[] {
  return [...articles].sort((a, b) => b.publishedAt.getTime() - a.publishedAt.getTime());
}

/**
 * Featured follow the selector's ranking; regular keep date order
 */
export function partitionArticles(
  articles: readonly Article[],
  featuredIndices: readonly number[]
): { featured: Article[]; regular: Article[] } {
  const featuredSet = new Set(featuredIndices);
  return {
    featured: featuredIndices.map(index => articles[index]).filter((article): article is Article => article !== undefined),
    regular: articles.filter((_, index) => !featuredSet.has(index))
  };
}

function sourceNameFor(sourceTitle: string, feedUrl: string): string {
  const title = cleanText(sourceTitle);
  if (title) return title;
  try {
    return new URL(feedUrl).hostname;
  } catch {
    return feedUrl;
  }
}

export class CurationPipeline {
  private readonly feedSource: FeedSource;
  private readonly completionService: CompletionService;
  private readonly config: CurationConfig;
  private readonly now: () => Date;

  constructor(options: CurationPipelineOptions) {
    this.feedSource = options.feedSource;
    this.completionService = options.completionService;
    this.config = options.config;
    this.now = options.now ?? (() => new Date());
  }

  async run(): Promise<CurationResult> {
    const stats: CurationStats = {
      totalAnalyzed: 0,
      accepted: 0,
      feedsProcessed: 0,
      feedsFailed: [],
      startTime: Date.now()
    };
    const accepted: Article[] = [];

    logger.info(`Starting curation run over ${this.config.feeds.length} feeds`, {
      topics: this.config.topics,
      model: this.config.model
    });

    for (const feedUrl of this.config.feeds) {
      let sourceTitle: string;
      let entries: FeedEntry[];
      try {
        const document = await this.feedSource.fetch(feedUrl);
        sourceTitle = document.sourceTitle;
        entries = document.entries;
      } catch (error) {
        logger.error(`Error fetching feed ${feedUrl}:`, error instanceof Error ? error.message : error);
        stats.feedsFailed.push(feedUrl);
        continue;
      }

      const sourceName = sourceNameFor(sourceTitle, feedUrl);
      logger.info(`Fetched ${entries.length} entries from ${sourceName}`);

      for (const entry of entries) {
        const article = await this.curateEntry(entry, sourceName);
        stats.totalAnalyzed++;
        if (article) {
          accepted.push(article);
          stats.accepted++;
        }
      }

      stats.feedsProcessed++;
    }

    const sorted = sortByPublishedDesc(accepted);
    const featuredIndices = this.config.featuredEnabled
      ? await selectFeatured(sorted, this.config.model, this.completionService)
      : [];
    const { featured, regular } = partitionArticles(sorted, featuredIndices);

    logger.info('Curation run completed', {
      analyzed: stats.totalAnalyzed,
      accepted: stats.accepted,
      featured: featured.length,
      feedsFailed: stats.feedsFailed.length,
      duration: `${Date.now() - stats.startTime}ms`
    });

    return {
      featured,
      regular,
      totalAnalyzed: stats.totalAnalyzed,
      feedsProcessed: stats.feedsProcessed,
      feedsFailed: stats.feedsFailed
    };
  }

  /**
   * Clean, extract and classify one entry; undefined when it is rejected
   */
  private async curateEntry(entry: FeedEntry, sourceName: string): Promise<Article | undefined> {
    // Missing dates count as "now", so undated entries sort to the top
    const publishedAt = entry.publishedAt ?? this.now();
    const title = cleanText(entry.title) || 'Untitled';
    const summary = cleanText(entry.summary);
    const imageUrl = this.config.imagesEnabled ? extractBestImage(entry) : undefined;

    const relevant = await isRelevant({ title, summary }, this.config.topics, this.config.model, this.completionService);
    if (!relevant) {
      logger.debug(`Rejected: ${title}`);
      return undefined;
    }

    logger.debug(`Accepted: ${title}`);
    return {
      title,
      summary,
      link: entry.link || '#',
      publishedAt,
      sourceName,
      ...(imageUrl ? { imageUrl } : {})
    };
  }
}
