import fs from 'fs';
import axios, { type AxiosInstance } from 'axios';
import { DeleteObjectCommand, GetObjectCommand, S3Client } from '@aws-sdk/client-s3';
import { Upload } from '@aws-sdk/lib-storage';
import { getSignedUrl } from '@aws-sdk/s3-request-presigner';
import type { Readable } from 'stream';
import type { StorageConfig } from '../utils/env';
import type { MirrorOutcome } from '../types/scrape';
import { attachmentDisposition } from '../utils/object-keys';
import { describeError, logger } from '../utils/logger';

export const PRESIGNED_URL_TTL_SECONDS = 7 * 24 * 60 * 60;

export type ObjectSource = { kind: 'url'; url: string } | { kind: 'file'; path: string };

export interface PutObjectRequest {
  key: string;
  source: ObjectSource;
  mediaType: string;
  filename: string;
  metadata: Record<string, string>;
}

export interface ObjectStore {
  isAvailable(): boolean;
  /** Never rejects; failures come back as `{ ok: false }`. */
  upload(request: PutObjectRequest): Promise<MirrorOutcome>;
  resolveDownloadUrl(key: string, expiresInSeconds?: number): Promise<string | null>;
  deleteObject(key: string): Promise<void>;
}

export class SizeLimitError extends Error {
  constructor(readonly size: number, readonly limit: number) {
    super(`Object of ${size} bytes exceeds the ${limit} byte limit`);
    this.name = 'SizeLimitError';
  }
}

/** Cloudflare R2 (or any S3 compatible endpoint) backed object store. */
export class R2ObjectStore implements ObjectStore {
  private readonly client: S3Client | null;
  private readonly http: AxiosInstance;

  constructor(private readonly config: StorageConfig, http?: AxiosInstance) {
    this.client = R2ObjectStore.isConfigured(config)
      ? new S3Client({
          region: 'auto',
          endpoint: config.endpoint,
          forcePathStyle: true,
          credentials: {
            accessKeyId: config.accessKeyId,
            secretAccessKey: config.secretAccessKey,
          },
        })
      : null;

    this.http =
      http ??
      axios.create({
        timeout: config.requestTimeoutMs,
        maxRedirects: 5,
        headers: { 'User-Agent': 'Mozilla/5.0 (compatible; keyword-scrape-service/1.0)' },
      });

    if (!this.client) {
      logger.warn('Object store credentials missing, mirroring disabled');
    }
  }

  static isConfigured(config: StorageConfig): boolean {
    return Boolean(config.endpoint && config.accessKeyId && config.secretAccessKey && config.bucket);
  }

  isAvailable(): boolean {
    return this.client !== null;
  }

  async upload(request: PutObjectRequest): Promise<MirrorOutcome> {
    if (!this.client) {
      return { ok: false, reason: 'Object store is not configured' };
    }

    try {
      const body = await this.openSource(request.source);
      const upload = new Upload({
        client: this.client,
        params: {
          Bucket: this.config.bucket,
          Key: request.key,
          Body: body,
          ContentType: request.mediaType,
          ContentDisposition: attachmentDisposition(request.filename),
          CacheControl: 'public, max-age=31536000',
          Metadata: request.metadata,
        },
      });
      await upload.done();

      logger.debug('Uploaded object', { key: request.key });
      return { ok: true, storageKey: request.key, storageUrl: this.publicUrl(request.key) };
    } catch (error) {
      logger.warn('Object upload failed', { key: request.key, error: describeError(error) });
      return { ok: false, reason: describeError(error) };
    }
  }

  async resolveDownloadUrl(
    key: string,
    expiresInSeconds: number = PRESIGNED_URL_TTL_SECONDS,
  ): Promise<string | null> {
    const publicUrl = this.publicUrl(key);
    if (publicUrl) return publicUrl;
    if (!this.client) return null;

    return getSignedUrl(
      this.client,
      new GetObjectCommand({ Bucket: this.config.bucket, Key: key }),
      { expiresIn: expiresInSeconds },
    );
  }

  async deleteObject(key: string): Promise<void> {
    if (!this.client) return;
    await this.client.send(new DeleteObjectCommand({ Bucket: this.config.bucket, Key: key }));
  }

  private publicUrl(key: string): string | null {
    return this.config.publicUrl ? `${this.config.publicUrl}/${key}` : null;
  }

  private async openSource(source: ObjectSource): Promise<Buffer | Readable> {
    const limit = this.config.maxUploadBytes;

    if (source.kind === 'file') {
      const stats = await fs.promises.stat(source.path);
      if (stats.size > limit) {
        throw new SizeLimitError(stats.size, limit);
      }
      return fs.createReadStream(source.path);
    }

    const response = await this.http.get<ArrayBuffer>(source.url, {
      responseType: 'arraybuffer',
      maxContentLength: limit,
    });
    const buffer = Buffer.from(response.data);
    if (buffer.length > limit) {
      throw new SizeLimitError(buffer.length, limit);
    }
    return buffer;
  }
}
