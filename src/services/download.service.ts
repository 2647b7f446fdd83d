import archiver from 'archiver';
import { isAxiosError, type AxiosInstance } from 'axios';
import { pipeline, Transform, type Readable, type Writable } from 'stream';
import type { ItemRepository } from '../repositories/item.repository';
import type { ObjectStore } from './objectStore.service';
import { HttpError } from '../errors/http-error';
import type { ContentType, ItemRecord } from '../types/scrape';
import { downloadFilename, mediaType } from '../utils/object-keys';
import { describeError, logger } from '../utils/logger';

export interface DownloadedFile {
  filename: string;
  mediaType: string;
  body: Readable;
}

export interface ArchivePlan {
  filename: string;
  items: ItemRecord[];
}

export interface ArchiveSummary {
  added: number;
  skipped: number;
}

export class DownloadService {
  constructor(
    private readonly repository: ItemRepository,
    private readonly store: ObjectStore,
    private readonly http: AxiosInstance,
    private readonly maxBytes: number,
  ) {}

  async downloadItem(itemId: number): Promise<DownloadedFile> {
    const item = await this.repository.findById(itemId);
    if (!item) {
      throw HttpError.notFound(`Item ${itemId} not found`);
    }
    if (item.contentType === 'video' && !item.storageKey) {
      throw HttpError.badRequest('Video has not been mirrored to storage and cannot be downloaded');
    }

    const body = await this.openContent(item);
    return {
      filename: downloadFilename(item.id, item.keyword, item.contentType, item.url),
      mediaType: mediaType(item.contentType, item.url),
      body,
    };
  }

  async planArchive(taskId: string, contentType: ContentType): Promise<ArchivePlan> {
    const { items } = await this.repository.list({ taskId, contentType }, undefined, 'asc');
    if (items.length === 0) {
      throw HttpError.notFound(`No ${contentType} items found for task ${taskId}`);
    }
    return { filename: `${contentType}_${taskId}_${items.length}files.zip`, items };
  }

  /** Streams a ZIP of the planned items into `output`; items that cannot be fetched are skipped. */
  async writeArchive(plan: ArchivePlan, output: Writable): Promise<ArchiveSummary> {
    const archive = archiver('zip', { zlib: { level: 6 } });
    let failure: Error | undefined;
    const fail = (error: Error) => {
      if (!failure) failure = error;
    };
    archive.on('error', fail);
    output.on('error', fail);
    archive.on('warning', (warning) => {
      logger.warn('Archive warning', { error: warning.message });
    });
    const written = new Promise<void>((resolve) => {
      output.once('close', resolve);
      output.once('finish', resolve);
    });
    archive.pipe(output);

    let added = 0;
    let skipped = 0;
    for (const item of plan.items) {
      if (failure) break;
      if (item.contentType === 'video' && !item.storageKey) {
        skipped += 1;
        continue;
      }
      try {
        const body = await this.fetchContent(item);
        archive.append(body, {
          name: downloadFilename(item.id, item.keyword, item.contentType, item.url),
        });
        added += 1;
      } catch (error) {
        skipped += 1;
        logger.warn('Skipping item in archive', { itemId: item.id, error: describeError(error) });
      }
    }

    if (!failure) {
      await archive.finalize();
    }
    if (failure) {
      archive.abort();
      throw failure;
    }
    await written;
    return { added, skipped };
  }

  private async resolveSourceUrl(item: ItemRecord): Promise<string> {
    if (item.storageKey) {
      const url = await this.store.resolveDownloadUrl(item.storageKey, 3600);
      if (url) return url;
    }
    return item.storageUrl ?? item.url;
  }

  /** Opens the item for streaming; the body errors with 413 once it passes the byte limit. */
  private async openContent(item: ItemRecord): Promise<Readable> {
    const url = await this.resolveSourceUrl(item);
    let source: Readable;
    let declaredLength: number;
    try {
      const response = await this.http.get<Readable>(url, { responseType: 'stream' });
      source = response.data;
      declaredLength = Number(response.headers['content-length']);
    } catch (error) {
      throw this.toFetchError(error);
    }

    if (declaredLength > this.maxBytes) {
      source.destroy();
      throw this.tooLarge();
    }

    let received = 0;
    const limiter = new Transform({
      transform: (chunk: Buffer, _encoding, callback) => {
        received += chunk.length;
        if (received > this.maxBytes) {
          callback(this.tooLarge());
          return;
        }
        callback(null, chunk);
      },
    });

    pipeline(source, limiter, (error) => {
      if (error) {
        logger.warn('Item download stream ended early', { itemId: item.id, error: describeError(error) });
      }
    });
    return limiter;
  }

  private async fetchContent(item: ItemRecord): Promise<Buffer> {
    const url = await this.resolveSourceUrl(item);
    try {
      const response = await this.http.get<ArrayBuffer>(url, {
        responseType: 'arraybuffer',
        maxContentLength: this.maxBytes,
      });
      const body = Buffer.from(response.data);
      if (body.length > this.maxBytes) {
        throw this.tooLarge();
      }
      return body;
    } catch (error) {
      throw this.toFetchError(error);
    }
  }

  private tooLarge(): HttpError {
    return new HttpError(`File exceeds the ${this.maxBytes} byte download limit`, 413);
  }

  private toFetchError(error: unknown): unknown {
    if (error instanceof HttpError || !isAxiosError(error)) return error;
    if (error.message.includes('maxContentLength')) {
      return this.tooLarge();
    }
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return new HttpError('Timed out fetching the file', 504);
    }
    return new HttpError(`Failed to fetch the file: ${error.message}`, 502, {
      status: error.response?.status,
    });
  }
}
