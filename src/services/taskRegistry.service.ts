import { randomUUID } from 'crypto';
import {
  isTerminalStatus,
  type CancelResult,
  type NewScrapeTask,
  type ScrapeTaskRecord,
  type ScrapeTaskView,
} from '../types/jobs';
import { emptyCounts } from '../types/scrape';
import { CancellationToken } from '../utils/cancellation';
import { logger } from '../utils/logger';

interface TaskEntry {
  record: ScrapeTaskRecord;
  token: CancellationToken;
}

function cloneRecord(record: ScrapeTaskRecord): ScrapeTaskRecord {
  // allowedKeywords and keywordToSourceFile are never mutated after creation, so both are shared
  return {
    ...record,
    keywordsToProcess: [...record.keywordsToProcess],
    files: [...record.files],
    contentTypes: [...record.contentTypes],
    counts: { ...record.counts },
  };
}

export function toTaskView(record: ScrapeTaskRecord): ScrapeTaskView {
  return {
    taskId: record.taskId,
    status: record.status,
    errorMessage: record.errorMessage ?? null,
    currentKeyword: record.currentKeyword,
    currentIndex: record.currentIndex,
    totalKeywords: record.totalKeywords,
    counts: { ...record.counts },
    files: [...record.files],
    contentTypes: [...record.contentTypes],
    resumableMode: record.resumableMode,
    newKeywordCount: record.newKeywordCount,
    skippedKeywordCount: record.skippedKeywordCount,
    allKeywordsScraped: record.allKeywordsScraped,
    cancelRequested: record.cancelRequested,
    createdAt: record.createdAt,
    finishedAt: record.finishedAt ?? null,
  };
}

/**
 * Owns every task record of the process. Readers only ever receive copies and
 * each update publishes a fresh record, so a poll never observes a half
 * applied change. Records that reached a terminal status are frozen.
 */
export class TaskRegistry {
  private readonly tasks = new Map<string, TaskEntry>();

  create(input: NewScrapeTask): ScrapeTaskRecord {
    const superseded = this.cancelAll('Superseded by a newer run');
    if (superseded.length > 0) {
      logger.info('Cancelled running tasks before starting a new run', { superseded });
    }

    const taskId = input.taskId ?? `task_${randomUUID()}`;
    const record: ScrapeTaskRecord = {
      taskId,
      status: 'processing',
      keywordsToProcess: [...input.keywordsToProcess],
      allowedKeywords: input.allowedKeywords,
      keywordToSourceFile: new Map(input.keywordToSourceFile),
      files: [...input.files],
      contentTypes: [...input.contentTypes],
      counts: emptyCounts(),
      currentKeyword: '',
      currentIndex: 0,
      totalKeywords: input.keywordsToProcess.length,
      resumableMode: input.resumableMode,
      newKeywordCount: input.newKeywordCount,
      skippedKeywordCount: input.skippedKeywordCount,
      allKeywordsScraped: input.allKeywordsScraped,
      cancelRequested: false,
      createdAt: new Date().toISOString(),
    };

    this.tasks.set(taskId, { record, token: new CancellationToken() });
    logger.info('Scrape task registered', { taskId, totalKeywords: record.totalKeywords });

    return cloneRecord(record);
  }

  get(taskId: string): ScrapeTaskRecord | undefined {
    const entry = this.tasks.get(taskId);
    return entry ? cloneRecord(entry.record) : undefined;
  }

  /**
   * Applies `mutator` to a copy of the record and publishes it. Returns false
   * when the task is unknown or already terminal.
   */
  update(taskId: string, mutator: (draft: ScrapeTaskRecord) => void): boolean {
    const entry = this.tasks.get(taskId);
    if (!entry) {
      return false;
    }

    if (isTerminalStatus(entry.record.status)) {
      logger.warn('Ignoring update of a finished task', {
        taskId,
        status: entry.record.status,
      });
      return false;
    }

    const draft = cloneRecord(entry.record);
    mutator(draft);
    draft.taskId = taskId;
    draft.cancelRequested = entry.record.cancelRequested || draft.cancelRequested;
    if (isTerminalStatus(draft.status) && !draft.finishedAt) {
      draft.finishedAt = new Date().toISOString();
    }

    entry.record = draft;
    return true;
  }

  cancel(taskId: string, reason?: string): CancelResult {
    const entry = this.tasks.get(taskId);
    if (!entry) {
      return { outcome: 'not-found', taskId };
    }

    if (isTerminalStatus(entry.record.status)) {
      return { outcome: 'already-terminal', taskId, status: entry.record.status };
    }

    entry.token.cancel(reason);
    entry.record = { ...cloneRecord(entry.record), cancelRequested: true };
    logger.info('Cancellation requested', { taskId });

    return { outcome: 'cancelled', taskId };
  }

  cancelAll(reason?: string): string[] {
    const cancelled: string[] = [];
    for (const taskId of this.tasks.keys()) {
      const result = this.cancel(taskId, reason);
      if (result.outcome === 'cancelled') {
        cancelled.push(taskId);
      }
    }
    return cancelled;
  }

  tokenFor(taskId: string): CancellationToken | undefined {
    return this.tasks.get(taskId)?.token;
  }

  list(): ScrapeTaskRecord[] {
    return [...this.tasks.values()]
      .map((entry) => cloneRecord(entry.record))
      .sort((a, b) => b.createdAt.localeCompare(a.createdAt));
  }

  hasLiveTasks(): boolean {
    return [...this.tasks.values()].some((entry) => !isTerminalStatus(entry.record.status));
  }
}
