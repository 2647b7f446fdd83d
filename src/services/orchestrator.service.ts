import type { ContentSource } from '../crawlers/baseCrawler';
import type { ContentSourceRegistry } from '../crawlers/registry';
import type { ScrapeTaskRecord, ScrapeTaskStatus } from '../types/jobs';
import {
  CONTENT_TYPES,
  emptyCounts,
  type ContentCounts,
  type ContentType,
  type SearchOutcome,
} from '../types/scrape';
import type { TaskRegistry } from './taskRegistry.service';
import type { Deduplicator } from './deduplicator.service';
import type { PersistenceService } from './persistence.service';
import { classifySourceError } from '../crawlers/baseCrawler';
import { describeError, logger } from '../utils/logger';

export interface OrchestratorOptions {
  caps: ContentCounts;
  searchOversample: number;
}

type OpenSources = Map<ContentType, ContentSource>;

/**
 * Drives one task through its keywords. Cancellation is observed between
 * keywords only; counts are published once a keyword has finished.
 */
export class ScrapeOrchestrator {
  constructor(
    private readonly registry: TaskRegistry,
    private readonly sources: ContentSourceRegistry,
    private readonly deduplicator: Deduplicator,
    private readonly persistence: PersistenceService,
    private readonly options: OrchestratorOptions,
  ) {}

  async run(taskId: string): Promise<ScrapeTaskStatus | undefined> {
    const task = this.registry.get(taskId);
    const token = this.registry.tokenFor(taskId);
    if (!task || !token) {
      logger.warn('Orchestrator asked to run an unknown task', { taskId });
      return undefined;
    }

    const opened: OpenSources = new Map();
    const startTime = Date.now();

    try {
      for (const contentType of CONTENT_TYPES) {
        if (task.contentTypes.includes(contentType) && this.sources.supports(contentType)) {
          opened.set(contentType, this.sources.open(contentType));
        }
      }

      for (const [index, raw] of task.keywordsToProcess.entries()) {
        if (token.isCancellationRequested) {
          return this.finish(taskId, 'cancelled');
        }

        const keyword = raw.trim();
        if (!keyword || !task.allowedKeywords.has(keyword)) {
          logger.warn('Skipping keyword outside the allow-list', { taskId, keyword: raw });
          continue;
        }

        this.registry.update(taskId, (draft) => {
          draft.currentKeyword = keyword;
          draft.currentIndex = index + 1;
        });

        const added = await this.processKeyword(task, keyword, opened);

        this.registry.update(taskId, (draft) => {
          for (const contentType of CONTENT_TYPES) {
            draft.counts[contentType] += added[contentType];
          }
        });

        logger.info('Keyword processed', { taskId, keyword, added });
      }

      if (token.isCancellationRequested) {
        return this.finish(taskId, 'cancelled');
      }

      logger.info('Scrape task completed', { taskId, duration: Date.now() - startTime });
      return this.finish(taskId, 'completed');
    } catch (error) {
      const errorMessage = describeError(error);
      logger.error('Scrape task failed', { taskId, error: errorMessage });
      return this.finish(taskId, 'error', errorMessage);
    } finally {
      await this.closeSources(taskId, opened);
    }
  }

  private finish(taskId: string, status: ScrapeTaskStatus, errorMessage?: string): ScrapeTaskStatus {
    this.registry.update(taskId, (draft) => {
      draft.status = status;
      if (errorMessage) draft.errorMessage = errorMessage;
    });
    return status;
  }

  private async processKeyword(
    task: ScrapeTaskRecord,
    keyword: string,
    opened: OpenSources,
  ): Promise<ContentCounts> {
    const added = emptyCounts();
    const sourceFile = task.keywordToSourceFile.get(keyword) ?? 'unknown';
    const dedup = await this.deduplicator.forKeyword([...opened.keys()]);

    for (const [contentType, source] of opened) {
      const cap = this.options.caps[contentType];
      if (cap <= 0) continue;

      const outcome = await this.search(source, keyword, cap * this.options.searchOversample);
      if (!outcome.ok) {
        logger.warn('Content source failed, continuing with next type', {
          taskId: task.taskId,
          keyword,
          contentType,
          kind: outcome.error.kind,
          error: outcome.error.message,
        });
        continue;
      }

      for (const candidate of outcome.items) {
        if (added[contentType] >= cap) break;
        if (dedup.accept(contentType, candidate.url) !== 'accepted') continue;

        const result = await this.persistence.persistCandidate({
          keyword,
          contentType,
          taskId: task.taskId,
          sourceFile,
          candidate,
          allowedKeywords: task.allowedKeywords,
        });
        if (result.status === 'stored') {
          added[contentType] += 1;
        }
      }
    }

    return added;
  }

  private async search(source: ContentSource, keyword: string, limit: number): Promise<SearchOutcome> {
    try {
      return await source.search(keyword, limit);
    } catch (error) {
      return { ok: false, error: classifySourceError(error) };
    }
  }

  private async closeSources(taskId: string, opened: OpenSources): Promise<void> {
    for (const [contentType, source] of opened) {
      try {
        await source.close();
      } catch (error) {
        logger.warn('Failed to close content source', {
          taskId,
          contentType,
          error: describeError(error),
        });
      }
    }
  }
}
