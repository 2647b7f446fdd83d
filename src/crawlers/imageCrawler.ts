import { BaseCrawler } from './baseCrawler';
import type { SearchCandidate } from '../types/scrape';
import {
  type BingImageMetadata,
  buildBingImagesUrl,
  pageOffsets,
  parseBingMetadata,
  selectImageCandidates,
} from '../sites/images/bing.site';

export class ImageCrawler extends BaseCrawler {
  readonly contentType = 'image' as const;

  protected async fetchCandidates(keyword: string, maxResults: number): Promise<SearchCandidate[]> {
    const urls = pageOffsets(maxResults).map((offset) => buildBingImagesUrl(keyword, offset));
    const collected: BingImageMetadata[] = [];

    await this.crawlPages(urls, ({ $ }) => {
      $('a.iusc').each((_, element) => {
        const metadata = parseBingMetadata($(element).attr('m'));
        if (metadata) collected.push(metadata);
      });
    });

    return selectImageCandidates(collected, keyword, maxResults);
  }
}
