import { Router } from 'express';
import multer from 'multer';
import type { ScrapingController } from '../controllers/scraping.controller';
import type { ItemsController } from '../controllers/items.controller';

const MAX_UPLOAD_BYTES = 10 * 1024 * 1024;
const MAX_UPLOAD_FILES = 20;

export function createScrapingRouter(scraping: ScrapingController, items: ItemsController): Router {
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: MAX_UPLOAD_BYTES, files: MAX_UPLOAD_FILES },
  });

  const router = Router();

  router.post('/runs', upload.array('files', MAX_UPLOAD_FILES), scraping.handleSubmitRun.bind(scraping));
  router.get('/tasks', scraping.listTasks.bind(scraping));
  router.get('/tasks/:taskId', scraping.getTask.bind(scraping));
  router.post('/tasks/:taskId/cancel', scraping.cancelTask.bind(scraping));
  router.get('/tasks/:taskId/source-files', scraping.getSourceFiles.bind(scraping));
  router.get('/tasks/:taskId/archive/:contentType', items.downloadArchive.bind(items));
  router.get('/tasks/:taskId/exports/:contentType', items.exportContentType.bind(items));
  router.post('/clear', scraping.clearAll.bind(scraping));
  router.get('/items', items.listItems.bind(items));
  router.get('/items/:itemId/download', items.downloadItem.bind(items));
  router.get('/exports/source-file', items.exportSourceFile.bind(items));

  return router;
}
