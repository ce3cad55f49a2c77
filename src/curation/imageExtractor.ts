/**
 * Picks one representative image per feed entry.
 *
 * Candidates are gathered from the entry's media metadata and markup, each
 * with a priority, and the highest priority wins. Search order is
 * media:content → media:thumbnail → image enclosures → first image in the
 * content block → first image in the summary (only when nothing else was found).
 * Ties keep the earlier candidate.
 */

import * as cheerio from 'cheerio';
import type { FeedEntry, ImageCandidate, MediaNode } from '../types/feed';
import { isValidNewsImage } from './imageValidator';

export const IMAGE_PRIORITY = {
  mediaContent: 100000,
  thumbnail: 50000,
  enclosure: 75000,
  contentImage: 60000,
  summaryImage: 40000
} as const;

// Icons and tracking pixels declare themselves with tiny dimensions
const MIN_IMAGE_DIMENSION = 50;

const SKIPPED_ALT_WORDS = ['logo', 'icon', 'avatar', 'profile', 'share', 'twitter', 'facebook'];

function parseDimension(value?: string): number | undefined {
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  if (!/^[+-]?\d+$/.test(trimmed)) return undefined;
  return parseInt(trimmed, 10);
}

function areaOr(node: MediaNode, fallback: number): number {
  const width = parseDimension(node.width);
  const height = parseDimension(node.height);
  if (width === undefined || height === undefined) return fallback;
  return width * height;
}

/**
 * Only fires when both attributes are present and numeric; anything else
 * is left to the URL heuristics.
 */
export function isTinyImage(width?: string, height?: string): boolean {
  const w = parseDimension(width);
  const h = parseDimension(height);
  if (w === undefined || h === undefined) return false;
  return w < MIN_IMAGE_DIMENSION || h < MIN_IMAGE_DIMENSION;
}

function isImageMedia(node: MediaNode): boolean {
  const type = node.type?.trim().toLowerCase() ?? '';
  const medium = node.medium?.trim().toLowerCase() ?? '';
  return type.startsWith('image/') || medium === 'image';
}

/**
 * First <img> in a markup fragment that survives the alt-text, size and
 * URL checks
 */
export function findFirstMarkupImage(html?: string): string | undefined {
  if (!html || !html.includes('<')) return undefined;

  const $ = cheerio.load(html);
  for (const element of $('img').toArray()) {
    const img = $(element);
    const src = img.attr('src')?.trim();
    if (!src) continue;

    const alt = (img.attr('alt') ?? '').toLowerCase();
    if (SKIPPED_ALT_WORDS.some(word => alt.includes(word))) continue;

    if (isTinyImage(img.attr('width'), img.attr('height'))) continue;

    if (isValidNewsImage(src)) {
      return src;
    }
  }

  return undefined;
}

/**
 * All admitted candidates for an entry, in search order
 */
export function collectImageCandidates(entry: FeedEntry): ImageCandidate[] {
  const candidates: ImageCandidate[] = [];

  const admit = (url: string | undefined, priority: number) => {
    const trimmed = url?.trim();
    if (trimmed && isValidNewsImage(trimmed)) {
      candidates.push({ url: trimmed, priority });
    }
  };

  for (const media of entry.mediaContent) {
    if (isImageMedia(media)) {
      admit(media.url, areaOr(media, IMAGE_PRIORITY.mediaContent));
    }
  }

  for (const thumbnail of entry.mediaThumbnails) {
    admit(thumbnail.url, areaOr(thumbnail, IMAGE_PRIORITY.thumbnail));
  }

  for (const enclosure of entry.enclosures) {
    if (enclosure.type?.trim().toLowerCase().startsWith('image/')) {
      admit(enclosure.url, IMAGE_PRIORITY.enclosure);
    }
  }

  admit(findFirstMarkupImage(entry.contentHtml), IMAGE_PRIORITY.contentImage);

  if (candidates.length === 0) {
    admit(findFirstMarkupImage(entry.summary), IMAGE_PRIORITY.summaryImage);
  }

  return candidates;
}

export function pickBestCandidate(candidates: ImageCandidate[]): ImageCandidate | undefined {
  let best: ImageCandidate | undefined;
  for (const candidate of candidates) {
    if (!best || candidate.priority > best.priority) {
      best = candidate;
    }
  }
  return best;
}

function isAbsoluteUrl(url: string): boolean {
  return /^[a-z][a-z0-9+.-]*:/i.test(url);
}

export function resolveImageUrl(url: string, articleLink: string): string {
  if (isAbsoluteUrl(url)) return url;
  try {
    return new URL(url, articleLink).toString();
  } catch {
    // No usable base: keep the reference as the feed gave it
    return url;
  }
}

export function extractBestImage(entry: FeedEntry): string | undefined {
  const best = pickBestCandidate(collectImageCandidates(entry));
  if (!best) return undefined;
  return resolveImageUrl(best.url, entry.link);
}
