import { describe, it, expect } from 'vitest';
import { MirrorService } from '../src/services/mirror.service';
import type { ItemRecord } from '../src/types/scrape';
import { FakeObjectStore } from './support/fakes';

function item(overrides: Partial<ItemRecord>): ItemRecord {
  return {
    id: 5,
    keyword: 'red fox',
    url: 'https://example.com/fox.png',
    contentType: 'image',
    title: null,
    description: null,
    fileSize: null,
    contentHash: null,
    storageKey: null,
    storageUrl: null,
    taskId: 'task_1',
    sourceFile: 'keywords.csv',
    createdAt: new Date('2026-01-01T00:00:00.000Z'),
    ...overrides,
  };
}

describe('MirrorService', () => {
  it('should upload images straight from their URL', async () => {
    const store = new FakeObjectStore();
    const mirror = new MirrorService(store, async () => {
      throw new Error('not expected');
    });

    const outcome = await mirror.mirror(item({}));

    expect(outcome.ok).toBe(true);
    expect(store.uploads).toHaveLength(1);
    const [upload] = store.uploads;
    expect(upload?.source).toEqual({ kind: 'url', url: 'https://example.com/fox.png' });
    expect(upload?.key).toMatch(/^images\/red_fox_image_[0-9a-f]{8}\.png$/);
    expect(upload?.mediaType).toBe('image/png');
    expect(upload?.filename).toBe('5_red_fox.png');
    expect(upload?.metadata).toEqual({
      'original-url': 'https%3A%2F%2Fexample.com%2Ffox.png',
      keyword: 'red%20fox',
      'task-id': 'task_1',
    });
  });

  it('should download videos to a file and clean up afterwards', async () => {
    const store = new FakeObjectStore();
    const cleaned: string[] = [];
    const mirror = new MirrorService(store, async (url) => ({
      filePath: '/tmp/video.mp4',
      cleanup: async () => {
        cleaned.push(url);
      },
    }));

    const outcome = await mirror.mirror(
      item({ contentType: 'video', url: 'https://youtube.com/watch?v=abc' }),
    );

    expect(outcome).toEqual({ ok: true, storageKey: 'videos/item_5_red_fox.mp4', storageUrl: null });
    expect(store.uploads[0]?.source).toEqual({ kind: 'file', path: '/tmp/video.mp4' });
    expect(cleaned).toEqual(['https://youtube.com/watch?v=abc']);
  });

  it('should report a failed video download', async () => {
    const mirror = new MirrorService(new FakeObjectStore(), async () => {
      throw new Error('yt-dlp exited with code 1');
    });

    const outcome = await mirror.mirror(item({ contentType: 'video' }));

    expect(outcome).toEqual({ ok: false, reason: 'Video download failed: yt-dlp exited with code 1' });
  });

  it('should skip mirroring when the store is unavailable', async () => {
    const store = new FakeObjectStore();
    store.available = false;
    const mirror = new MirrorService(store, async () => {
      throw new Error('not expected');
    });

    expect(mirror.isEnabled()).toBe(false);
    expect(await mirror.mirror(item({}))).toEqual({ ok: false, reason: 'Object store is not configured' });
    expect(store.uploads).toEqual([]);
  });
});
