import type { ObjectStore } from './objectStore.service';
import type { ItemRecord, MirrorOutcome } from '../types/scrape';
import { buildObjectKey, downloadFilename, mediaType } from '../utils/object-keys';
import type { DownloadedVideo } from '../sites/videos/youtube.site';
import { describeError } from '../utils/logger';

export type VideoDownloader = (url: string) => Promise<DownloadedVideo>;

/** Copies an item's content into the object store. Never rejects. */
export class MirrorService {
  constructor(
    private readonly store: ObjectStore,
    private readonly downloadVideo: VideoDownloader,
  ) {}

  isEnabled(): boolean {
    return this.store.isAvailable();
  }

  async mirror(item: ItemRecord): Promise<MirrorOutcome> {
    if (!this.store.isAvailable()) {
      return { ok: false, reason: 'Object store is not configured' };
    }

    const metadata = {
      'original-url': encodeURIComponent(item.url),
      keyword: encodeURIComponent(item.keyword),
      'task-id': item.taskId ?? '',
    };
    const filename = downloadFilename(item.id, item.keyword, item.contentType, item.url);

    if (item.contentType !== 'video') {
      return this.store.upload({
        key: buildObjectKey({ keyword: item.keyword, contentType: item.contentType, url: item.url }),
        source: { kind: 'url', url: item.url },
        mediaType: mediaType(item.contentType, item.url),
        filename,
        metadata,
      });
    }

    let video: DownloadedVideo;
    try {
      video = await this.downloadVideo(item.url);
    } catch (error) {
      return { ok: false, reason: `Video download failed: ${describeError(error)}` };
    }

    try {
      return await this.store.upload({
        key: buildObjectKey({
          keyword: item.keyword,
          contentType: 'video',
          url: item.url,
          itemId: item.id,
        }),
        source: { kind: 'file', path: video.filePath },
        mediaType: mediaType('video', item.url),
        filename,
        metadata,
      });
    } finally {
      await video.cleanup();
    }
  }
}
