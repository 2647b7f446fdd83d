import type { ContentType } from '../types/scrape';
import type { CancelResult, ScrapeTaskRecord } from '../types/jobs';
import { HttpError } from '../errors/http-error';
import { extractKeywords, type UploadedKeywordFile } from './keywordFile.service';
import type { ResumabilityPlanner } from './resumability.service';
import type { ScrapeOrchestrator } from './orchestrator.service';
import type { TaskRegistry } from './taskRegistry.service';
import type { ItemRepository } from '../repositories/item.repository';
import { describeError, logger } from '../utils/logger';

export interface SubmitRunRequest {
  files: UploadedKeywordFile[];
  contentTypes: ContentType[];
}

export interface SubmitRunResult {
  taskId: string;
  totalKeywords: number;
  filesProcessed: number;
  resumableMode: boolean;
  newKeywordCount: number;
  skippedKeywordCount: number;
  allKeywordsScraped: boolean;
}

export type Scheduler = (work: () => void) => void;

const defaultScheduler: Scheduler = (work) => {
  setImmediate(work);
};

/** Accepts keyword uploads, registers tasks and runs them in the background. */
export class ScrapeJobService {
  private readonly running = new Map<string, Promise<void>>();

  constructor(
    private readonly registry: TaskRegistry,
    private readonly planner: ResumabilityPlanner,
    private readonly orchestrator: ScrapeOrchestrator,
    private readonly repository: ItemRepository,
    private readonly schedule: Scheduler = defaultScheduler,
  ) {}

  async submit(request: SubmitRunRequest): Promise<SubmitRunResult> {
    if (request.contentTypes.length === 0) {
      throw HttpError.badRequest('Select at least one content type to scrape');
    }

    const extraction = extractKeywords(request.files);
    const plan = await this.planner.plan(extraction.keywords, extraction.keywordToSourceFile);

    const task = this.registry.create({
      keywordsToProcess: plan.keywordsToProcess,
      allowedKeywords: plan.allowedKeywords,
      keywordToSourceFile: extraction.keywordToSourceFile,
      files: extraction.files,
      contentTypes: request.contentTypes,
      resumableMode: plan.resumableMode,
      newKeywordCount: plan.keywordsToProcess.length,
      skippedKeywordCount: plan.alreadyScraped.length,
      allKeywordsScraped: plan.allKeywordsScraped,
    });

    if (task.keywordsToProcess.length === 0) {
      this.registry.update(task.taskId, (draft) => {
        draft.status = 'completed';
      });
      logger.info('Nothing left to scrape, task completed immediately', { taskId: task.taskId });
    } else {
      this.start(task.taskId);
    }

    return {
      taskId: task.taskId,
      totalKeywords: task.totalKeywords,
      filesProcessed: extraction.files.length,
      resumableMode: plan.resumableMode,
      newKeywordCount: plan.keywordsToProcess.length,
      skippedKeywordCount: plan.alreadyScraped.length,
      allKeywordsScraped: plan.allKeywordsScraped,
    };
  }

  getTask(taskId: string): ScrapeTaskRecord | undefined {
    return this.registry.get(taskId);
  }

  listTasks(): ScrapeTaskRecord[] {
    return this.registry.list();
  }

  cancel(taskId: string): CancelResult {
    return this.registry.cancel(taskId);
  }

  cancelAll(reason: string): string[] {
    return this.registry.cancelAll(reason);
  }

  async getSourceFiles(taskId: string): Promise<string[]> {
    const task = this.registry.get(taskId);
    if (task && task.files.length > 0) {
      return task.files;
    }
    return this.repository.findSourceFiles(taskId);
  }

  /** Resolves once every background run started so far has settled. */
  async whenIdle(): Promise<void> {
    while (this.running.size > 0) {
      await Promise.allSettled([...this.running.values()]);
    }
  }

  private start(taskId: string): void {
    // Superseded runs finish their current keyword first; the new run must see what they stored.
    const superseded = [...this.running.values()];
    const run = new Promise<void>((resolve) => {
      this.schedule(() => {
        void Promise.allSettled(superseded)
          .then(() => this.orchestrator.run(taskId))
          .catch((error: unknown) => {
            logger.error('Background scrape run crashed', { taskId, error: describeError(error) });
          })
          .finally(() => {
            this.running.delete(taskId);
            resolve();
          });
      });
    });
    this.running.set(taskId, run);
  }
}
