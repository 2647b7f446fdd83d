import { createHash } from 'crypto';
import type { ContentType } from '../types/scrape';

const KEY_PREFIX: Record<ContentType, string> = {
  document: 'documents',
  image: 'images',
  video: 'videos',
};

const IMAGE_TYPES: Array<{ extension: string; mediaType: string }> = [
  { extension: '.png', mediaType: 'image/png' },
  { extension: '.gif', mediaType: 'image/gif' },
  { extension: '.webp', mediaType: 'image/webp' },
];

export function safeKeyword(keyword: string): string {
  return Array.from(keyword)
    .slice(0, 50)
    .join('')
    .replace(/[^\p{L}\p{N} _-]/gu, '_')
    .replace(/ /g, '_');
}

function urlPath(url: string): string {
  try {
    return new URL(url).pathname.toLowerCase();
  } catch {
    return url.toLowerCase();
  }
}

export function fileExtension(contentType: ContentType, url: string): string {
  if (contentType === 'document') return '.pdf';
  if (contentType === 'video') return '.mp4';
  const pathname = urlPath(url);
  return IMAGE_TYPES.find((entry) => pathname.endsWith(entry.extension))?.extension ?? '.jpg';
}

export function mediaType(contentType: ContentType, url: string): string {
  if (contentType === 'document') return 'application/pdf';
  if (contentType === 'video') return 'video/mp4';
  const pathname = urlPath(url);
  return IMAGE_TYPES.find((entry) => pathname.endsWith(entry.extension))?.mediaType ?? 'image/jpeg';
}

export interface ObjectKeyInput {
  keyword: string;
  contentType: ContentType;
  url: string;
  itemId?: number;
}

/**
 * `videos/item_12_cats.mp4` when the item id is known,
 * `images/cats_image_1a2b3c4d.png` otherwise.
 */
export function buildObjectKey(input: ObjectKeyInput): string {
  const prefix = KEY_PREFIX[input.contentType];
  const keyword = safeKeyword(input.keyword);
  const extension = fileExtension(input.contentType, input.url);

  if (input.itemId !== undefined) {
    return `${prefix}/item_${input.itemId}_${keyword}${extension}`;
  }

  const urlHash = createHash('md5').update(input.url).digest('hex').slice(0, 8);
  return `${prefix}/${keyword}_${input.contentType}_${urlHash}${extension}`;
}

export function downloadFilename(itemId: number, keyword: string, contentType: ContentType, url: string): string {
  return `${itemId}_${safeKeyword(keyword)}${fileExtension(contentType, url)}`;
}

export function attachmentDisposition(filename: string): string {
  const fallback = filename.replace(/[^\x20-\x7e]/g, '_').replace(/"/g, '_');
  return `attachment; filename="${fallback}"; filename*=UTF-8''${encodeURIComponent(filename)}`;
}
