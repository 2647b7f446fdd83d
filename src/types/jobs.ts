import type { ContentCounts, ContentType } from './scrape';

export type ScrapeTaskStatus = 'processing' | 'completed' | 'cancelled' | 'error';

export const TERMINAL_STATUSES: ReadonlySet<ScrapeTaskStatus> = new Set([
  'completed',
  'cancelled',
  'error',
]);

export function isTerminalStatus(status: ScrapeTaskStatus): boolean {
  return TERMINAL_STATUSES.has(status);
}

export interface ScrapeTaskRecord {
  taskId: string;
  status: ScrapeTaskStatus;
  errorMessage?: string;
  keywordsToProcess: string[];
  allowedKeywords: ReadonlySet<string>;
  keywordToSourceFile: ReadonlyMap<string, string>;
  files: string[];
  contentTypes: ContentType[];
  counts: ContentCounts;
  currentKeyword: string;
  currentIndex: number;
  totalKeywords: number;
  resumableMode: boolean;
  newKeywordCount: number;
  skippedKeywordCount: number;
  allKeywordsScraped: boolean;
  cancelRequested: boolean;
  createdAt: string;
  finishedAt?: string;
}

export type NewScrapeTask = Pick<
  ScrapeTaskRecord,
  | 'keywordsToProcess'
  | 'allowedKeywords'
  | 'keywordToSourceFile'
  | 'files'
  | 'contentTypes'
  | 'resumableMode'
  | 'newKeywordCount'
  | 'skippedKeywordCount'
  | 'allKeywordsScraped'
> & { taskId?: string };

/** JSON-friendly projection returned by the progress endpoint. */
export interface ScrapeTaskView {
  taskId: string;
  status: ScrapeTaskStatus;
  errorMessage: string | null;
  currentKeyword: string;
  currentIndex: number;
  totalKeywords: number;
  counts: ContentCounts;
  files: string[];
  contentTypes: ContentType[];
  resumableMode: boolean;
  newKeywordCount: number;
  skippedKeywordCount: number;
  allKeywordsScraped: boolean;
  cancelRequested: boolean;
  createdAt: string;
  finishedAt: string | null;
}

export type CancelResult =
  | { outcome: 'cancelled'; taskId: string }
  | { outcome: 'already-terminal'; taskId: string; status: ScrapeTaskStatus }
  | { outcome: 'not-found'; taskId: string };
