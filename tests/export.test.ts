import { describe, it, expect } from 'vitest';
import { ExportService } from '../src/services/export.service';
import { ItemQueryService } from '../src/services/itemQuery.service';
import { TaskRegistry } from '../src/services/taskRegistry.service';
import { FakeObjectStore, InMemoryItemRepository } from './support/fakes';

function setup() {
  const repository = new InMemoryItemRepository();
  repository.seed({
    keyword: 'alpha',
    url: 'https://example.com/old.jpg',
    contentType: 'image',
    taskId: 'task_old',
    sourceFile: 'animals.csv',
  });
  repository.seed({
    keyword: 'alpha',
    url: 'https://example.com/a.jpg',
    contentType: 'image',
    title: 'Alpha, red',
    taskId: 'task_new',
    sourceFile: 'animals.csv',
    storageKey: 'images/a.jpg',
  });
  repository.seed({
    keyword: 'beta',
    url: 'https://example.com/b.pdf',
    contentType: 'document',
    taskId: 'task_new',
    sourceFile: 'animals.csv',
  });
  repository.seed({
    keyword: 'gamma',
    url: 'https://example.com/c.pdf',
    contentType: 'document',
    taskId: 'task_new',
    sourceFile: 'other.csv',
  });
  const itemQuery = new ItemQueryService(repository, new FakeObjectStore(), new TaskRegistry());
  return new ExportService(repository, itemQuery);
}

describe('ExportService', () => {
  it('should export the latest task of a source file', async () => {
    const exports = setup();

    const result = await exports.exportSourceFile('animals.csv');

    expect(result.filename).toBe('animals_scraped_data.csv');
    expect(result.rowCount).toBe(2);
    expect(result.content).toBe(
      [
        'id,keyword,scraped_url,content_type,title,task_id,source_file,created_at,storage_download_url,storage_key',
        '2,alpha,https://example.com/a.jpg,image,"Alpha, red",task_new,animals.csv,2026-01-01T00:00:02.000Z,https://signed.test/images/a.jpg?expires=604800,images/a.jpg',
        '3,beta,https://example.com/b.pdf,document,,task_new,animals.csv,2026-01-01T00:00:03.000Z,,',
        '',
      ].join('\n'),
    );
  });

  it('should export an explicit task of a source file', async () => {
    const exports = setup();

    const result = await exports.exportSourceFile('animals.csv', 'task_old');

    expect(result.rowCount).toBe(1);
    expect(result.content.split('\n')[1]).toBe(
      '1,alpha,https://example.com/old.jpg,image,,task_old,animals.csv,2026-01-01T00:00:01.000Z,,',
    );
  });

  it('should fail for unknown source files', async () => {
    const exports = setup();

    await expect(exports.exportSourceFile('missing.csv')).rejects.toMatchObject({
      status: 404,
      message: "No items found for source file 'missing.csv'",
    });
  });

  it('should export one content type of a task', async () => {
    const exports = setup();

    const result = await exports.exportContentType('task_new', 'document');

    expect(result.filename).toBe('document_task_new_2items.csv');
    expect(result.content).toBe(
      'ID,Keyword,URL\n3,beta,https://example.com/b.pdf\n4,gamma,https://example.com/c.pdf\n',
    );
  });

  it('should fail when the task has no items of the type', async () => {
    const exports = setup();

    await expect(exports.exportContentType('task_new', 'video')).rejects.toMatchObject({
      status: 404,
      message: 'No video items found for task task_new',
    });
  });
});
