import { z } from 'zod';
import type { SearchCandidate } from '../../types/scrape';

export const BING_PAGE_SIZE = 35;

const IMAGE_EXTENSIONS = ['.jpg', '.jpeg', '.png', '.gif', '.webp', '.bmp'];

// Hosts whose results are almost never the standalone image we want
const EXCLUDED_DOMAINS = [
  'gamespot.com',
  'steam.com',
  'steampowered.com',
  'gog.com',
  'epicgames.com',
  'twitch.tv',
  'youtube.com',
  'facebook.com',
  'twitter.com',
  'x.com',
  'instagram.com',
  'reddit.com',
  'imgur.com',
  'pinterest.com',
  'flickr.com',
  'deviantart.com',
  'tumblr.com',
  '9gag.com',
  'memegenerator.net',
];

const GAMING_TERMS = [
  'game',
  'gaming',
  'gamer',
  'video game',
  'pc game',
  'console',
  'playstation',
  'xbox',
  'nintendo',
  'esports',
  'twitch',
  'stream',
  'livestream',
  'esport',
];

const bingMetadataSchema = z.object({
  murl: z.string().min(1),
  t: z.string().optional(),
  desc: z.string().optional(),
  purl: z.string().optional(),
});

export type BingImageMetadata = z.infer<typeof bingMetadataSchema>;

export function buildBingImagesUrl(keyword: string, offset: number): string {
  const params = new URLSearchParams({
    q: keyword,
    first: String(offset),
    count: String(BING_PAGE_SIZE),
    adlt: 'off',
  });
  return `https://www.bing.com/images/async?${params.toString()}`;
}

export function pageOffsets(maxResults: number): number[] {
  const pages = Math.max(1, Math.ceil(maxResults / BING_PAGE_SIZE));
  return Array.from({ length: pages }, (_, index) => index * BING_PAGE_SIZE);
}

/** Parses the JSON blob Bing stores in the `m` attribute of each `a.iusc` result. */
export function parseBingMetadata(raw: string | undefined): BingImageMetadata | null {
  if (!raw) return null;
  try {
    const result = bingMetadataSchema.safeParse(JSON.parse(raw));
    return result.success ? result.data : null;
  } catch {
    return null;
  }
}

function hostOf(url: string): string | null {
  try {
    return new URL(url).hostname.toLowerCase();
  } catch {
    return null;
  }
}

function isExcludedHost(host: string | null): boolean {
  if (!host) return false;
  return EXCLUDED_DOMAINS.some((domain) => host === domain || host.endsWith(`.${domain}`));
}

export function hasImageExtension(url: string): boolean {
  const pathname = (hostOf(url) ? new URL(url).pathname : url).toLowerCase();
  return IMAGE_EXTENSIONS.some((extension) => pathname.endsWith(extension));
}

function mentionsGaming(text: string): boolean {
  return GAMING_TERMS.some((term) => new RegExp(`\\b${term}\\b`).test(text));
}

/**
 * Applies the relevance filters to raw Bing results and maps them to
 * candidates. Source page titles must share enough terms with the keyword
 * once more than two results are requested.
 */
export function selectImageCandidates(
  results: BingImageMetadata[],
  keyword: string,
  maxResults: number,
): SearchCandidate[] {
  const keywordLower = keyword.toLowerCase();
  const keywordMentionsGaming = mentionsGaming(keywordLower);
  const terms = keywordLower.split(/\s+/).filter((term) => term.length > 2);
  const minMatches = terms.length > 2 ? 2 : 1;

  const seen = new Set<string>();
  const candidates: SearchCandidate[] = [];

  for (const result of results) {
    if (candidates.length >= maxResults) break;

    const url = result.murl.trim();
    if (!url.startsWith('http') || seen.has(url) || !hasImageExtension(url)) continue;
    if (isExcludedHost(hostOf(url)) || isExcludedHost(result.purl ? hostOf(result.purl) : null)) {
      continue;
    }

    const title = result.t?.trim() ?? '';
    const titleLower = title.toLowerCase();
    if (!keywordMentionsGaming && titleLower && mentionsGaming(titleLower)) continue;

    if (maxResults > 2 && titleLower && terms.length > 0) {
      const matches = terms.filter((term) => titleLower.includes(term)).length;
      if (matches < minMatches) continue;
    }

    seen.add(url);
    candidates.push({
      url,
      title: title || keyword,
      description: result.desc?.trim() || undefined,
      sourcePageUrl: result.purl,
    });
  }

  return candidates;
}
