// RSS/Atom feed source built on rss-parser
// Maps parsed items to FeedEntry, keeping the raw media metadata for image extraction
import Parser from 'rss-parser';
import { z } from 'zod';
import type { Enclosure, FeedDocument, FeedEntry, FeedSource, MediaNode } from '../types/feed';
import { logger } from '../utils/logger';

interface CustomItem {
  'content:encoded'?: string;
  summary?: string;
  // Set by rss-parser for Atom entries only; RSS items carry `guid`
  id?: string;
  mediaContent?: unknown;
  mediaThumbnail?: unknown;
}

type RssItem = CustomItem & Parser.Item;

export type FeedKind = 'rss' | 'atom';

// xml2js puts element attributes under `$`
const mediaNodeSchema = z.object({
  $: z.object({
    url: z.string().optional(),
    type: z.string().optional(),
    medium: z.string().optional(),
    width: z.string().optional(),
    height: z.string().optional()
  })
});

const enclosureSchema = z.object({
  url: z.string().optional(),
  type: z.string().optional()
});

export interface RssFeedSourceOptions {
  timeoutMs?: number;
  userAgent?: string;
}

function toMediaNodes(raw: unknown): MediaNode[] {
  const nodes = Array.isArray(raw) ? raw : raw === undefined || raw === null ? [] : [raw];
  return nodes.flatMap((node): MediaNode[] => {
    const parsed = mediaNodeSchema.safeParse(node);
    if (!parsed.success) return [];
    const { url, type, medium, width, height } = parsed.data.$;
    return [{ url, type, medium, width, height }];
  });
}

function toEnclosures(raw: unknown): Enclosure[] {
  const parsed = enclosureSchema.safeParse(raw);
  if (!parsed.success) return [];
  return [{ url: parsed.data.url, type: parsed.data.type }];
}

function normalizeDate(item: RssItem): Date | undefined {
  for (const value of [item.isoDate, item.pubDate]) {
    if (!value) continue;
    const date = new Date(value);
    if (!isNaN(date.getTime())) {
      return date;
    }
  }
  return undefined;
}

export function detectFeedKind(item: RssItem): FeedKind {
  return item.id !== undefined ? 'atom' : 'rss';
}

export function normalizeItem(item: RssItem, kind: FeedKind = detectFeedKind(item)): FeedEntry {
  // rss-parser puts the RSS <description> in `content`; for Atom it is the <content> block
  const contentHtml = item['content:encoded'] || (kind === 'atom' ? item.content : undefined) || undefined;
  return {
    title: item.title?.trim() || 'Untitled',
    summary: item.summary || item.content || '',
    link: item.link?.trim() || '',
    publishedAt: normalizeDate(item),
    contentHtml,
    mediaContent: toMediaNodes(item.mediaContent),
    mediaThumbnails: toMediaNodes(item.mediaThumbnail),
    enclosures: toEnclosures(item.enclosure)
  };
}

export class RssFeedSource implements FeedSource {
  private readonly parser: Parser<Record<string, unknown>, CustomItem>;

  constructor(options: RssFeedSourceOptions = {}) {
    this.parser = new Parser<Record<string, unknown>, CustomItem>({
      timeout: options.timeoutMs ?? 20000,
      headers: { 'User-Agent': options.userAgent ?? 'news-curator/0.1 (+rss digest)' },
      customFields: {
        item: [
          'content:encoded',
          ['media:content', 'mediaContent', { keepArray: true }],
          ['media:thumbnail', 'mediaThumbnail', { keepArray: true }]
        ]
      }
    });
  }

  async fetch(feedUrl: string): Promise<FeedDocument> {
    logger.debug(`Fetching feed ${feedUrl}`);
    const feed = await this.parser.parseURL(feedUrl);
    return this.toDocument(feed.title, feed.items);
  }

  async parseXml(xml: string): Promise<FeedDocument> {
    const feed = await this.parser.parseString(xml);
    return this.toDocument(feed.title, feed.items);
  }

  private toDocument(title: string | undefined, items: RssItem[]): FeedDocument {
    return {
      sourceTitle: title?.trim() ?? '',
      entries: items.map(item => normalizeItem(item))
    };
  }
}
