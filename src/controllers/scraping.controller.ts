import type { Request, Response } from 'express';
import { z } from 'zod';
import type { ScrapeJobService } from '../services/scrapeJob.service';
import type { ItemQueryService } from '../services/itemQuery.service';
import { toTaskView } from '../services/taskRegistry.service';
import { CONTENT_TYPES, type ContentType } from '../types/scrape';
import { sendError } from './error-response';
import { logger } from '../utils/logger';

const TRUTHY = new Set(['true', '1', 'yes', 'on']);

const flag = z
  .union([z.boolean(), z.string()])
  .optional()
  .transform((value) =>
    typeof value === 'boolean' ? value : TRUTHY.has((value ?? '').trim().toLowerCase()),
  );

const submitSchema = z.object({
  scrapeDocument: flag,
  scrapeImage: flag,
  scrapeVideo: flag,
});

const taskParamsSchema = z.object({
  taskId: z.string().min(1),
});

export class ScrapingController {
  constructor(
    private readonly scrapeJobService: ScrapeJobService,
    private readonly itemQueryService: ItemQueryService,
  ) {}

  async handleSubmitRun(req: Request, res: Response) {
    try {
      const parsed = submitSchema.parse(req.body ?? {});
      const enabled: Record<ContentType, boolean> = {
        video: parsed.scrapeVideo,
        image: parsed.scrapeImage,
        document: parsed.scrapeDocument,
      };
      const uploads = Array.isArray(req.files) ? req.files : [];

      const result = await this.scrapeJobService.submit({
        files: uploads.map((file) => ({ originalName: file.originalname, buffer: file.buffer })),
        contentTypes: CONTENT_TYPES.filter((type) => enabled[type]),
      });

      logger.info('Scrape run accepted', { taskId: result.taskId, files: result.filesProcessed });

      return res.status(202).json({
        success: true,
        message: result.allKeywordsScraped
          ? 'All keywords were already scraped'
          : 'Scraping started, poll the task for progress',
        ...result,
      });
    } catch (error) {
      return sendError(res, error, 'Failed to start scrape run');
    }
  }

  async getTask(req: Request, res: Response) {
    try {
      const { taskId } = taskParamsSchema.parse(req.params);
      const task = this.scrapeJobService.getTask(taskId);
      if (!task) {
        return res.status(404).json({ success: false, error: 'Task not found' });
      }

      return res.json(toTaskView(task));
    } catch (error) {
      return sendError(res, error, 'Failed to read task');
    }
  }

  async cancelTask(req: Request, res: Response) {
    try {
      const { taskId } = taskParamsSchema.parse(req.params);
      const result = this.scrapeJobService.cancel(taskId);

      switch (result.outcome) {
        case 'not-found':
          return res.status(404).json({ success: false, error: 'Task not found' });
        case 'already-terminal':
          return res.status(409).json({
            success: false,
            error: `Task already ${result.status}`,
            status: result.status,
          });
        case 'cancelled':
          return res.json({ success: true, taskId, message: 'Cancellation requested' });
      }
    } catch (error) {
      return sendError(res, error, 'Failed to cancel task');
    }
  }

  listTasks(_req: Request, res: Response) {
    const tasks = this.scrapeJobService.listTasks().map(toTaskView);
    return res.json({ tasks, total: tasks.length });
  }

  async getSourceFiles(req: Request, res: Response) {
    try {
      const { taskId } = taskParamsSchema.parse(req.params);
      const sourceFiles = await this.scrapeJobService.getSourceFiles(taskId);
      return res.json({ taskId, sourceFiles });
    } catch (error) {
      return sendError(res, error, 'Failed to list source files');
    }
  }

  async clearAll(_req: Request, res: Response) {
    try {
      const result = await this.itemQueryService.clearAll();
      return res.json({ success: true, ...result });
    } catch (error) {
      return sendError(res, error, 'Failed to clear data');
    }
  }
}
