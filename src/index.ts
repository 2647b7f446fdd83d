import axios from 'axios';
import type { Server } from 'http';
import { createServer, type AppServices } from './app';
import { loadEnv, getConfig, type AppConfig } from './utils/env';
import { describeError, logger } from './utils/logger';
import { createDatabase, ensureSchema, type DatabaseHandle } from './db/client';
import { DrizzleItemRepository } from './repositories/item.repository';
import { createDefaultSourceRegistry } from './crawlers/registry';
import { R2ObjectStore } from './services/objectStore.service';
import { MirrorService } from './services/mirror.service';
import { PersistenceService } from './services/persistence.service';
import { Deduplicator } from './services/deduplicator.service';
import { ResumabilityPlanner } from './services/resumability.service';
import { TaskRegistry } from './services/taskRegistry.service';
import { ScrapeOrchestrator } from './services/orchestrator.service';
import { ScrapeJobService } from './services/scrapeJob.service';
import { ItemQueryService } from './services/itemQuery.service';
import { DownloadService } from './services/download.service';
import { ExportService } from './services/export.service';
import { downloadYouTubeVideo } from './sites/videos/youtube.site';

function buildServices(config: AppConfig, database: DatabaseHandle): AppServices {
  const repository = new DrizzleItemRepository(database.db);
  const store = new R2ObjectStore(config.storage);
  const registry = new TaskRegistry();

  const mirrorService = new MirrorService(store, (url) =>
    downloadYouTubeVideo(url, {
      binaryPath: config.ytDlpPath,
      // video downloads are allowed ten times the request timeout
      timeoutMs: config.requestTimeoutMs * 10,
      maxFileSizeBytes: config.maxDownloadBytes,
    }),
  );

  const orchestrator = new ScrapeOrchestrator(
    registry,
    createDefaultSourceRegistry(config),
    new Deduplicator(repository),
    new PersistenceService(repository, mirrorService),
    { caps: config.caps, searchOversample: config.searchOversample },
  );

  const itemQueryService = new ItemQueryService(repository, store, registry);
  const downloadHttp = axios.create({ timeout: config.requestTimeoutMs, maxRedirects: 5 });

  return {
    scrapeJobService: new ScrapeJobService(
      registry,
      new ResumabilityPlanner(repository),
      orchestrator,
      repository,
    ),
    itemQueryService,
    downloadService: new DownloadService(repository, store, downloadHttp, config.maxDownloadBytes),
    exportService: new ExportService(repository, itemQueryService),
  };
}

async function bootstrap() {
  loadEnv();
  const config = getConfig();
  logger.setLevel(config.logLevel);

  const database = createDatabase(config.databaseUrl);
  await ensureSchema(database.pool);

  const services = buildServices(config, database);
  const app = createServer(services, { corsOrigins: config.corsOrigins });

  const server: Server = app.listen(config.port, () => {
    logger.info(`Keyword scrape service listening on port ${config.port}`);
  });

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info('Shutting down', { signal });

    const cancelled = services.scrapeJobService.cancelAll('Service shutting down');
    if (cancelled.length > 0) {
      logger.info('Waiting for running tasks to stop', { cancelled });
      await services.scrapeJobService.whenIdle();
    }

    await new Promise<void>((resolve) => server.close(() => resolve()));
    await database.pool.end();
    process.exit(0);
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((error) => {
        logger.error('Failed to shut down cleanly', { error: describeError(error) });
        process.exit(1);
      });
    });
  }
}

bootstrap().catch((error) => {
  logger.error('Failed to bootstrap application', { error });
  process.exit(1);
});
