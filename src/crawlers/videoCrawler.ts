import { BaseCrawler, type CrawlerOptions } from './baseCrawler';
import type { SearchCandidate } from '../types/scrape';
import { searchYouTube } from '../sites/videos/youtube.site';

export interface VideoCrawlerOptions extends CrawlerOptions {
  ytDlpPath: string;
}

export class VideoCrawler extends BaseCrawler {
  readonly contentType = 'video' as const;

  constructor(private readonly videoOptions: VideoCrawlerOptions) {
    super(videoOptions);
  }

  protected fetchCandidates(keyword: string, maxResults: number): Promise<SearchCandidate[]> {
    return searchYouTube(keyword, maxResults, {
      binaryPath: this.videoOptions.ytDlpPath,
      timeoutMs: this.videoOptions.timeoutMs,
    });
  }
}
