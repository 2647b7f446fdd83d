import express, { Request, Response, NextFunction } from 'express';
import cors from 'cors';
import multer from 'multer';
import { createScrapingRouter } from './routes/scraping.route';
import { ScrapingController } from './controllers/scraping.controller';
import { ItemsController } from './controllers/items.controller';
import type { ScrapeJobService } from './services/scrapeJob.service';
import type { ItemQueryService } from './services/itemQuery.service';
import type { DownloadService } from './services/download.service';
import type { ExportService } from './services/export.service';
import { getErrorStatus } from './errors/http-error';
import { describeError, logger } from './utils/logger';

export interface AppServices {
  scrapeJobService: ScrapeJobService;
  itemQueryService: ItemQueryService;
  downloadService: DownloadService;
  exportService: ExportService;
}

export interface ServerOptions {
  corsOrigins: string[];
}

export function createServer(services: AppServices, options: ServerOptions) {
  const app = express();

  app.use(cors({
    origin: options.corsOrigins.length > 0 ? options.corsOrigins : true,
    credentials: true,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization'],
  }));

  app.use(express.json({ limit: '1mb' }));

  app.get('/', (_req, res) => {
    res.json({ service: 'keyword-scrape-service', status: 'running' });
  });

  app.get('/api/health', (_req, res) => {
    res.json({ status: 'ok', uptime: process.uptime() });
  });

  const scrapingController = new ScrapingController(services.scrapeJobService, services.itemQueryService);
  const itemsController = new ItemsController(
    services.itemQueryService,
    services.downloadService,
    services.exportService,
  );
  app.use('/api/scraping', createScrapingRouter(scrapingController, itemsController));

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof multer.MulterError) {
      res.status(400).json({ success: false, error: err.message, code: err.code });
      return;
    }

    const status = getErrorStatus(err);
    if (status !== undefined && status < 500) {
      res.status(status).json({ success: false, error: describeError(err) });
      return;
    }

    logger.error('Unhandled error', err);
    res.status(500).json({ success: false, error: 'Internal server error' });
  });

  return app;
}
