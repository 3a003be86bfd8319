import { MediaReference, SupportedPlatform } from '../../types/media.js';
import { ValidationError } from '../../errors/index.js';

/**
 * URL patterns per platform, checked in this order. Each pattern matches the
 * URL inside arbitrary text so a chat message like "look at this <url>!"
 * still resolves.
 */
const PLATFORM_PATTERNS: ReadonlyArray<{ platform: SupportedPlatform; pattern: RegExp }> = [
  {
    platform: 'youtube',
    pattern:
      /(?:https?:\/\/)?(?:(?:www|m|music)\.)?(?:youtube\.com\/(?:watch\?\S*?v=|shorts\/|live\/|embed\/)|youtu\.be\/)[\w-]+\S*/i,
  },
  {
    platform: 'tiktok',
    pattern: /(?:https?:\/\/)?(?:(?:www|m|vm|vt)\.)?tiktok\.com\/\S+/i,
  },
  {
    platform: 'instagram',
    pattern: /(?:https?:\/\/)?(?:www\.)?instagram\.com\/(?:p|reels?|tv)\/[\w-]+\S*/i,
  },
];

/**
 * Find the first supported media URL in free text
 */
export function detectPlatform(text: string): MediaReference {
  for (const { platform, pattern } of PLATFORM_PATTERNS) {
    const match = pattern.exec(text);
    if (match) {
      return { platform, url: match[0] };
    }
  }
  return { platform: 'unknown', url: '' };
}

/**
 * Validate that input is an absolute http(s) URL
 *
 * @throws ValidationError when it is not
 */
export function parseHttpUrl(input: string): URL {
  let parsed: URL;
  try {
    parsed = new URL(input.trim());
  } catch {
    throw new ValidationError('Invalid URL', { metadata: { url: input } });
  }

  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new ValidationError('URL must use http or https', { metadata: { url: input } });
  }
  return parsed;
}
