import { PassThrough, Readable } from 'stream';
import axios from 'axios';
import nock from 'nock';
import { afterAll, afterEach, beforeAll, describe, it, expect } from 'vitest';
import { DownloadService } from '../src/services/download.service';
import { FakeObjectStore, InMemoryItemRepository } from './support/fakes';

async function readAll(stream: Readable): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(Buffer.from(chunk));
  }
  return Buffer.concat(chunks).toString();
}

function setup(maxBytes = 1024) {
  const repository = new InMemoryItemRepository();
  const service = new DownloadService(repository, new FakeObjectStore(), axios.create({ timeout: 2000 }), maxBytes);
  return { repository, service };
}

describe('DownloadService', () => {
  beforeAll(() => {
    nock.disableNetConnect();
  });

  afterEach(() => {
    nock.cleanAll();
  });

  afterAll(() => {
    nock.enableNetConnect();
  });

  it('should fetch unmirrored items from their original URL', async () => {
    const { repository, service } = setup();
    repository.seed({ keyword: 'red fox', url: 'https://files.test/fox.png', contentType: 'image' });
    nock('https://files.test').get('/fox.png').reply(200, 'png-bytes');

    const file = await service.downloadItem(1);

    expect(file.filename).toBe('1_red_fox.png');
    expect(file.mediaType).toBe('image/png');
    await expect(readAll(file.body)).resolves.toBe('png-bytes');
  });

  it('should fetch mirrored items through a short lived URL', async () => {
    const { repository, service } = setup();
    repository.seed({
      keyword: 'alpha',
      url: 'https://files.test/a.pdf',
      contentType: 'document',
      storageKey: 'documents/a.pdf',
    });
    const scope = nock('https://signed.test').get('/documents/a.pdf').query({ expires: '3600' }).reply(200, 'pdf');

    const file = await service.downloadItem(1);

    expect(scope.isDone()).toBe(true);
    await expect(readAll(file.body)).resolves.toBe('pdf');
  });

  it('should reject unknown items and unmirrored videos', async () => {
    const { repository, service } = setup();
    repository.seed({ keyword: 'alpha', url: 'https://youtube.com/watch?v=1', contentType: 'video' });

    await expect(service.downloadItem(99)).rejects.toMatchObject({ status: 404, message: 'Item 99 not found' });
    await expect(service.downloadItem(1)).rejects.toMatchObject({ status: 400 });
  });

  it('should map oversized and failed fetches to HTTP errors', async () => {
    const { repository, service } = setup(4);
    repository.seed({ keyword: 'alpha', url: 'https://files.test/big.jpg', contentType: 'image' });
    repository.seed({ keyword: 'alpha', url: 'https://files.test/gone.jpg', contentType: 'image' });
    nock('https://files.test').get('/big.jpg').reply(200, 'too large', { 'Content-Length': '9' });
    nock('https://files.test').get('/gone.jpg').reply(404, 'missing');

    await expect(service.downloadItem(1)).rejects.toMatchObject({
      status: 413,
      message: 'File exceeds the 4 byte download limit',
    });
    await expect(service.downloadItem(2)).rejects.toMatchObject({
      status: 502,
      message: 'Failed to fetch the file: Request failed with status code 404',
      data: { status: 404 },
    });
  });

  it('should stop streaming a body without a declared length at the byte limit', async () => {
    const { repository, service } = setup(6);
    repository.seed({ keyword: 'alpha', url: 'https://files.test/chunked.jpg', contentType: 'image' });
    nock('https://files.test')
      .get('/chunked.jpg')
      .reply(200, () => Readable.from([Buffer.from('four'), Buffer.from('more')]));

    const file = await service.downloadItem(1);

    await expect(readAll(file.body)).rejects.toMatchObject({
      status: 413,
      message: 'File exceeds the 6 byte download limit',
    });
  });

  it('should plan archives in insertion order', async () => {
    const { repository, service } = setup();
    repository.seed({ keyword: 'alpha', url: 'https://files.test/1.jpg', contentType: 'image', taskId: 'task_1' });
    repository.seed({ keyword: 'beta', url: 'https://files.test/2.jpg', contentType: 'image', taskId: 'task_1' });
    repository.seed({ keyword: 'beta', url: 'https://files.test/3.pdf', contentType: 'document', taskId: 'task_1' });

    const plan = await service.planArchive('task_1', 'image');

    expect(plan.filename).toBe('image_task_1_2files.zip');
    expect(plan.items.map((item) => item.id)).toEqual([1, 2]);
    await expect(service.planArchive('task_1', 'video')).rejects.toMatchObject({ status: 404 });
  });

  it('should stream a zip and skip items that cannot be fetched', async () => {
    const { repository, service } = setup();
    repository.seed({ keyword: 'alpha', url: 'https://files.test/1.jpg', contentType: 'image', taskId: 'task_1' });
    repository.seed({ keyword: 'beta', url: 'https://files.test/2.jpg', contentType: 'image', taskId: 'task_1' });
    nock('https://files.test').get('/1.jpg').reply(200, 'first');
    nock('https://files.test').get('/2.jpg').reply(500, 'error');

    const plan = await service.planArchive('task_1', 'image');
    const output = new PassThrough();
    const chunks: Buffer[] = [];
    output.on('data', (chunk: Buffer) => chunks.push(chunk));

    const summary = await service.writeArchive(plan, output);

    expect(summary).toEqual({ added: 1, skipped: 1 });
    const zip = Buffer.concat(chunks);
    expect(zip.subarray(0, 2).toString()).toBe('PK');
    expect(zip.includes(Buffer.from('1_alpha.jpg'))).toBe(true);
    expect(zip.includes(Buffer.from('2_beta.jpg'))).toBe(false);
  });
});
