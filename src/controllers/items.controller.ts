import type { Request, Response } from 'express';
import { pipeline } from 'stream';
import { z } from 'zod';
import type { ItemQueryService } from '../services/itemQuery.service';
import type { ArchivePlan, DownloadService } from '../services/download.service';
import type { ExportService } from '../services/export.service';
import { CONTENT_TYPES } from '../types/scrape';
import { sendError } from './error-response';
import { describeError, logger } from '../utils/logger';

const listQuerySchema = z.object({
  taskId: z.string().min(1).optional(),
  all: z
    .enum(['true', 'false', '1', '0'])
    .optional()
    .transform((value) => value === 'true' || value === '1'),
  limit: z.coerce.number().int().default(50),
  offset: z.coerce.number().int().min(0).default(0),
});

const itemParamsSchema = z.object({
  itemId: z.coerce.number().int().positive(),
});

const taskContentParamsSchema = z.object({
  taskId: z.string().min(1),
  contentType: z.enum(CONTENT_TYPES),
});

const sourceFileQuerySchema = z.object({
  sourceFile: z.string().min(1),
  taskId: z.string().min(1).optional(),
});

export class ItemsController {
  constructor(
    private readonly itemQueryService: ItemQueryService,
    private readonly downloadService: DownloadService,
    private readonly exportService: ExportService,
  ) {}

  async listItems(req: Request, res: Response) {
    try {
      const query = listQuerySchema.parse(req.query);
      const page = await this.itemQueryService.listItems(query);
      return res.json(page);
    } catch (error) {
      return sendError(res, error, 'Failed to list items');
    }
  }

  async downloadItem(req: Request, res: Response) {
    try {
      const { itemId } = itemParamsSchema.parse(req.params);
      const file = await this.downloadService.downloadItem(itemId);

      res.attachment(file.filename);
      res.type(file.mediaType);
      pipeline(file.body, res, (error) => {
        if (error) {
          logger.error('Item stream failed', { itemId, error: describeError(error) });
        }
      });
    } catch (error) {
      return sendError(res, error, 'Failed to download item');
    }
  }

  async downloadArchive(req: Request, res: Response) {
    let plan: ArchivePlan;
    try {
      const { taskId, contentType } = taskContentParamsSchema.parse(req.params);
      plan = await this.downloadService.planArchive(taskId, contentType);
    } catch (error) {
      return sendError(res, error, 'Failed to prepare archive');
    }

    res.attachment(plan.filename);
    res.type('application/zip');
    try {
      const summary = await this.downloadService.writeArchive(plan, res);
      logger.info('Archive sent', { filename: plan.filename, ...summary });
    } catch (error) {
      logger.error('Archive stream failed', { filename: plan.filename, error });
      res.destroy(error instanceof Error ? error : undefined);
    }
  }

  async exportSourceFile(req: Request, res: Response) {
    try {
      const { sourceFile, taskId } = sourceFileQuerySchema.parse(req.query);
      const csv = await this.exportService.exportSourceFile(sourceFile, taskId);
      return this.sendCsv(res, csv.filename, csv.content);
    } catch (error) {
      return sendError(res, error, 'Failed to export source file');
    }
  }

  async exportContentType(req: Request, res: Response) {
    try {
      const { taskId, contentType } = taskContentParamsSchema.parse(req.params);
      const csv = await this.exportService.exportContentType(taskId, contentType);
      return this.sendCsv(res, csv.filename, csv.content);
    } catch (error) {
      return sendError(res, error, 'Failed to export items');
    }
  }

  private sendCsv(res: Response, filename: string, content: string) {
    res.attachment(filename);
    res.type('text/csv; charset=utf-8');
    return res.send(content);
  }
}
