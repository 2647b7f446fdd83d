import { createHash } from 'crypto';
import type { ContentType, ItemRecord, NewItem, SearchCandidate } from '../../types/scrape';
import type { NewScrapedItemRow, ScrapedItemRow } from '../../db/schema';

export const MAX_TITLE_LENGTH = 500;
export const MAX_DESCRIPTION_LENGTH = 1000;

export interface CandidateContext {
  keyword: string;
  contentType: ContentType;
  taskId: string;
  sourceFile: string;
}

function clip(value: string | undefined, max: number): string | null {
  const trimmed = value?.trim();
  if (!trimmed) return null;
  return trimmed.length > max ? trimmed.slice(0, max) : trimmed;
}

export function mapCandidateToItem(candidate: SearchCandidate, context: CandidateContext): NewItem {
  const url = candidate.url.trim();
  const fileSize =
    typeof candidate.fileSize === 'number' && Number.isFinite(candidate.fileSize)
      ? Math.round(candidate.fileSize)
      : null;

  return {
    keyword: context.keyword,
    url,
    contentType: context.contentType,
    title: clip(candidate.title, MAX_TITLE_LENGTH),
    description: clip(candidate.description, MAX_DESCRIPTION_LENGTH),
    fileSize,
    // Videos carry a stable fingerprint of their page URL
    contentHash:
      context.contentType === 'video' ? createHash('sha256').update(url).digest('hex') : null,
    taskId: context.taskId,
    sourceFile: context.sourceFile,
  };
}

export function mapItemToRow(item: NewItem): NewScrapedItemRow {
  return {
    keyword: item.keyword,
    url: item.url,
    contentType: item.contentType,
    title: item.title,
    description: item.description,
    fileSize: item.fileSize,
    contentHash: item.contentHash,
    taskId: item.taskId,
    sourceFile: item.sourceFile,
  };
}

export function mapRowToItem(row: ScrapedItemRow): ItemRecord {
  return {
    id: row.id,
    keyword: row.keyword,
    url: row.url,
    contentType: row.contentType,
    title: row.title,
    description: row.description,
    fileSize: row.fileSize,
    contentHash: row.contentHash,
    storageKey: row.storageKey,
    storageUrl: row.storageUrl,
    taskId: row.taskId,
    sourceFile: row.sourceFile,
    createdAt: row.createdAt,
  };
}
