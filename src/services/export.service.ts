import { stringify } from 'csv-stringify/sync';
import type { ItemRepository } from '../repositories/item.repository';
import type { ItemQueryService } from './itemQuery.service';
import { HttpError } from '../errors/http-error';
import type { ContentType } from '../types/scrape';

export interface CsvExport {
  filename: string;
  content: string;
  rowCount: number;
}

const SOURCE_FILE_COLUMNS = [
  'id',
  'keyword',
  'scraped_url',
  'content_type',
  'title',
  'task_id',
  'source_file',
  'created_at',
  'storage_download_url',
  'storage_key',
];

export class ExportService {
  constructor(
    private readonly repository: ItemRepository,
    private readonly itemQuery: ItemQueryService,
  ) {}

  /**
   * Items scraped from one uploaded file. Without a task id the most recent
   * task that used the file is exported.
   */
  async exportSourceFile(sourceFile: string, taskId?: string): Promise<CsvExport> {
    const targetTask = taskId ?? (await this.repository.findLatestTaskForSourceFile(sourceFile));
    if (!targetTask) {
      throw HttpError.notFound(`No items found for source file '${sourceFile}'`);
    }

    const keywords = await this.repository.findKeywordsForSourceFile(sourceFile, targetTask);
    const { items } = await this.repository.list(
      { sourceFile, taskId: targetTask, keywords },
      undefined,
      'asc',
    );
    if (items.length === 0) {
      throw HttpError.notFound(`No items found for source file '${sourceFile}'`);
    }

    const rows: string[][] = [SOURCE_FILE_COLUMNS];
    for (const item of items) {
      rows.push([
        String(item.id),
        item.keyword,
        item.url,
        item.contentType,
        item.title ?? '',
        item.taskId ?? '',
        item.sourceFile ?? '',
        item.createdAt.toISOString(),
        (await this.itemQuery.resolveDownloadUrl(item)) ?? '',
        item.storageKey ?? '',
      ]);
    }

    return {
      filename: `${sourceFile.replace(/\.csv$/i, '')}_scraped_data.csv`,
      content: stringify(rows),
      rowCount: items.length,
    };
  }

  async exportContentType(taskId: string, contentType: ContentType): Promise<CsvExport> {
    const { items } = await this.repository.list({ taskId, contentType }, undefined, 'asc');
    if (items.length === 0) {
      throw HttpError.notFound(`No ${contentType} items found for task ${taskId}`);
    }

    const rows = [['ID', 'Keyword', 'URL'], ...items.map((item) => [String(item.id), item.keyword, item.url])];
    return {
      filename: `${contentType}_${taskId}_${items.length}items.csv`,
      content: stringify(rows),
      rowCount: items.length,
    };
  }
}
