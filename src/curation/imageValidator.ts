/**
 * URL heuristics for telling article images apart from tracking pixels,
 * social widgets, ads and site chrome.
 */

const BLOCKED_SUBSTRINGS = [
  // Social media
  'facebook.com',
  'fbcdn.net',
  'twitter.com',
  'twimg.com',
  'instagram.com',
  'linkedin.com',
  'pinterest.com',
  'reddit.com',
  'tiktok.com',
  'gravatar.com',
  // Ads, tracking and analytics
  'doubleclick.net',
  'googlesyndication.com',
  'googleadservices.com',
  'google-analytics.com',
  'googletagmanager.com',
  'amazon-adsystem.com',
  'scorecardresearch.com',
  'quantserve.com',
  'outbrain.com',
  'taboola.com',
  'feedburner.com',
  // Words that mark non-article imagery
  'pixel',
  'tracking',
  'beacon',
  'avatar',
  'logo',
  'icon',
  'badge',
  'button',
  'share',
  'social',
  'comment',
  'rss',
  'ad.',
  'ads.',
  // Blank and 1x1 placeholders
  'spacer.gif',
  'blank.gif',
  'clear.gif',
  'transparent.gif',
  'transparent.png',
  '1x1.gif',
  '1x1.png'
];

const IMAGE_EXTENSIONS = ['.jpg', '.jpeg', '.png', '.webp', '.gif', '.bmp'];

// Extensionless URLs are only trusted when served from an image host path
const IMAGE_HOST_HINTS = ['cdn', 'images', 'media', 'static', 'assets', 'upload'];

export function isValidNewsImage(url?: string | null): boolean {
  if (!url || !url.trim()) return false;

  const normalized = url.trim().toLowerCase();

  if (BLOCKED_SUBSTRINGS.some(blocked => normalized.includes(blocked))) {
    return false;
  }

  const hasImageExtension = IMAGE_EXTENSIONS.some(ext => normalized.includes(ext));
  if (!hasImageExtension && !IMAGE_HOST_HINTS.some(hint => normalized.includes(hint))) {
    return false;
  }

  return true;
}
