import type { ContentSource } from './baseCrawler';
import { DocumentCrawler } from './documentCrawler';
import { ImageCrawler } from './imageCrawler';
import { VideoCrawler } from './videoCrawler';
import { CONTENT_TYPES, type ContentType } from '../types/scrape';
import type { AppConfig } from '../utils/env';

export type ContentSourceFactory = () => ContentSource;

/** Maps each content type to a factory; a run opens its own adapters and closes them when done. */
export class ContentSourceRegistry {
  constructor(private readonly factories: Partial<Record<ContentType, ContentSourceFactory>>) {}

  getSupportedContentTypes(): ContentType[] {
    return CONTENT_TYPES.filter((type) => this.factories[type] !== undefined);
  }

  supports(contentType: ContentType): boolean {
    return this.factories[contentType] !== undefined;
  }

  open(contentType: ContentType): ContentSource {
    const factory = this.factories[contentType];
    if (!factory) {
      throw new Error(`Unsupported content type '${contentType}'`);
    }
    return factory();
  }
}

export function createDefaultSourceRegistry(config: AppConfig): ContentSourceRegistry {
  return new ContentSourceRegistry({
    video: () => new VideoCrawler({ timeoutMs: config.requestTimeoutMs, ytDlpPath: config.ytDlpPath }),
    image: () => new ImageCrawler({ timeoutMs: config.requestTimeoutMs }),
    document: () =>
      new DocumentCrawler({
        timeoutMs: config.requestTimeoutMs,
        apiKey: config.exa.apiKey,
        baseUrl: config.exa.baseUrl,
      }),
  });
}
