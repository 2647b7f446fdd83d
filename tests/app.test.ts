import type { Server } from 'http';
import axios, { type AxiosInstance } from 'axios';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { createServer } from '../src/app';
import { DownloadService } from '../src/services/download.service';
import { ExportService } from '../src/services/export.service';
import { ItemQueryService } from '../src/services/itemQuery.service';
import { createHarness, type Harness } from './support/harness';

function csvForm(fields: Record<string, string>, files: Array<{ name: string; content: string }>): FormData {
  const form = new FormData();
  for (const [key, value] of Object.entries(fields)) {
    form.append(key, value);
  }
  for (const file of files) {
    form.append('files', new Blob([file.content], { type: 'text/csv' }), file.name);
  }
  return form;
}

describe('HTTP API', () => {
  let harness: Harness;
  let server: Server;
  let client: AxiosInstance;

  beforeEach(async () => {
    harness = createHarness();
    const itemQueryService = new ItemQueryService(harness.repository, harness.store, harness.registry);
    const app = createServer(
      {
        scrapeJobService: harness.scrapeJobs,
        itemQueryService,
        downloadService: new DownloadService(harness.repository, harness.store, axios.create(), 1024),
        exportService: new ExportService(harness.repository, itemQueryService),
      },
      { corsOrigins: [] },
    );

    server = await new Promise<Server>((resolve) => {
      const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
    });
    const address = server.address();
    if (!address || typeof address === 'string') {
      throw new Error('Test server is not listening on a TCP port');
    }
    client = axios.create({ baseURL: `http://127.0.0.1:${address.port}`, validateStatus: () => true });
  });

  afterEach(async () => {
    await harness.scrapeJobs.whenIdle();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  async function startRun(fields: Record<string, string>) {
    return client.post('/api/scraping/runs', csvForm(fields, [{ name: 'keywords.csv', content: 'alpha\nbeta\n' }]));
  }

  it('should describe the service at the root', async () => {
    const response = await client.get('/');

    expect(response.status).toBe(200);
    expect(response.data).toEqual({ service: 'keyword-scrape-service', status: 'running' });
  });

  it('should accept a run and report its progress', async () => {
    const response = await startRun({ scrapeImage: 'true' });

    expect(response.status).toBe(202);
    expect(response.data).toMatchObject({
      success: true,
      message: 'Scraping started, poll the task for progress',
      totalKeywords: 2,
      filesProcessed: 1,
      resumableMode: false,
      allKeywordsScraped: false,
    });

    await harness.scrapeJobs.whenIdle();
    const task = await client.get(`/api/scraping/tasks/${response.data.taskId}`);

    expect(task.status).toBe(200);
    expect(task.data).toMatchObject({
      taskId: response.data.taskId,
      status: 'completed',
      currentIndex: 2,
      totalKeywords: 2,
      counts: { video: 0, image: 4, document: 0 },
      files: ['keywords.csv'],
      contentTypes: ['image'],
      errorMessage: null,
    });
  });

  it('should report a repeated upload as already scraped', async () => {
    await startRun({ scrapeImage: 'true' });
    await harness.scrapeJobs.whenIdle();

    const response = await startRun({ scrapeImage: 'true' });

    expect(response.status).toBe(202);
    expect(response.data).toMatchObject({
      message: 'All keywords were already scraped',
      newKeywordCount: 0,
      skippedKeywordCount: 2,
      allKeywordsScraped: true,
    });
  });

  it('should reject runs without content types or files', async () => {
    const noTypes = await startRun({ scrapeImage: 'false' });
    const noFiles = await client.post('/api/scraping/runs', csvForm({ scrapeImage: 'true' }, []));

    expect(noTypes.status).toBe(400);
    expect(noTypes.data).toEqual({ success: false, error: 'Select at least one content type to scrape' });
    expect(noFiles.status).toBe(400);
    expect(noFiles.data).toEqual({ success: false, error: 'At least one CSV file is required' });
  });

  it('should answer 404 and 409 for task lookups and cancellation', async () => {
    const missing = await client.get('/api/scraping/tasks/task_missing');
    const cancelMissing = await client.post('/api/scraping/tasks/task_missing/cancel');

    const run = await startRun({ scrapeDocument: 'on' });
    await harness.scrapeJobs.whenIdle();
    const cancelDone = await client.post(`/api/scraping/tasks/${run.data.taskId}/cancel`);

    expect(missing.status).toBe(404);
    expect(missing.data).toEqual({ success: false, error: 'Task not found' });
    expect(cancelMissing.status).toBe(404);
    expect(cancelDone.status).toBe(409);
    expect(cancelDone.data).toEqual({ success: false, error: 'Task already completed', status: 'completed' });
  });

  it('should list items of a task and all items on request', async () => {
    const run = await startRun({ scrapeImage: 'yes', scrapeDocument: '1' });
    await harness.scrapeJobs.whenIdle();

    const byTask = await client.get('/api/scraping/items', { params: { taskId: run.data.taskId, limit: 3 } });
    const none = await client.get('/api/scraping/items');

    expect(byTask.status).toBe(200);
    expect(byTask.data.total).toBe(8);
    expect(byTask.data.items).toHaveLength(3);
    expect(byTask.data.items[0].downloadUrl).toMatch(/^https:\/\/signed\.test\//);
    expect(none.data).toEqual({ items: [], total: 0, limit: 50, offset: 0 });
  });

  it('should validate route parameters', async () => {
    const badItem = await client.get('/api/scraping/items/abc/download');
    const badType = await client.get('/api/scraping/tasks/task_1/archive/audio');

    expect(badItem.status).toBe(400);
    expect(badItem.data.error).toBe('Invalid request payload');
    expect(badType.status).toBe(400);
    expect(badType.data.error).toBe('Invalid request payload');
  });

  it('should export a content type as CSV', async () => {
    const run = await startRun({ scrapeImage: 'true' });
    await harness.scrapeJobs.whenIdle();
    const taskId: string = run.data.taskId;

    const response = await client.get(`/api/scraping/tasks/${taskId}/exports/image`, { responseType: 'text' });

    expect(response.status).toBe(200);
    expect(response.headers['content-type']).toBe('text/csv; charset=utf-8');
    expect(response.headers['content-disposition']).toBe(`attachment; filename="image_${taskId}_4items.csv"`);
    expect(response.data).toBe(
      [
        'ID,Keyword,URL',
        '1,alpha,https://example.com/image/alpha/1',
        '2,alpha,https://example.com/image/alpha/2',
        '3,beta,https://example.com/image/beta/1',
        '4,beta,https://example.com/image/beta/2',
        '',
      ].join('\n'),
    );
  });

  it('should list source files and clear all data', async () => {
    const run = await startRun({ scrapeVideo: 'true' });
    await harness.scrapeJobs.whenIdle();

    const files = await client.get(`/api/scraping/tasks/${run.data.taskId}/source-files`);
    const cleared = await client.post('/api/scraping/clear');

    expect(files.data).toEqual({ taskId: run.data.taskId, sourceFiles: ['keywords.csv'] });
    expect(cleared.status).toBe(200);
    expect(cleared.data).toEqual({
      success: true,
      message: 'Deleted 4 items',
      deletedCount: 4,
      cancelledTasks: [],
      deletedObjects: 4,
    });
    expect(harness.repository.items).toEqual([]);
  });
});
