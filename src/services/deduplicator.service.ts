import type { ItemRepository } from '../repositories/item.repository';
import type { ContentType } from '../types/scrape';

export type DedupVerdict = 'accepted' | 'empty-url' | 'already-stored' | 'repeated-in-keyword';

/**
 * URL filter for a single keyword. Starts from every URL already stored for
 * the enabled content types and also rejects repeats across the keyword's
 * own search calls.
 */
export class KeywordDeduplicator {
  private readonly seenInKeyword = new Set<string>();

  constructor(private readonly stored: Map<ContentType, Set<string>>) {}

  check(contentType: ContentType, url: string): DedupVerdict {
    const normalized = url.trim();
    if (!normalized) return 'empty-url';
    if (this.stored.get(contentType)?.has(normalized)) return 'already-stored';
    if (this.seenInKeyword.has(normalized)) return 'repeated-in-keyword';
    return 'accepted';
  }

  /** Checks the URL and, when accepted, reserves it for the rest of the keyword. */
  accept(contentType: ContentType, url: string): DedupVerdict {
    const verdict = this.check(contentType, url);
    if (verdict !== 'accepted') return verdict;

    const normalized = url.trim();
    this.seenInKeyword.add(normalized);
    let stored = this.stored.get(contentType);
    if (!stored) {
      stored = new Set<string>();
      this.stored.set(contentType, stored);
    }
    stored.add(normalized);
    return verdict;
  }
}

export class Deduplicator {
  constructor(private readonly repository: ItemRepository) {}

  async forKeyword(contentTypes: ContentType[]): Promise<KeywordDeduplicator> {
    const stored = new Map<ContentType, Set<string>>();
    for (const contentType of contentTypes) {
      stored.set(contentType, await this.repository.findUrlsByContentType(contentType));
    }
    return new KeywordDeduplicator(stored);
  }
}
