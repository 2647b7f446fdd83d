/** Processing order of content types within one keyword. */
export const CONTENT_TYPES = ['video', 'image', 'document'] as const;

export type ContentType = (typeof CONTENT_TYPES)[number];

export type ContentCounts = Record<ContentType, number>;

export function isContentType(value: string): value is ContentType {
  return CONTENT_TYPES.some((type) => type === value);
}

export function emptyCounts(): ContentCounts {
  return { video: 0, image: 0, document: 0 };
}

/** One search hit returned by a content source, before deduplication. */
export interface SearchCandidate {
  url: string;
  title?: string;
  description?: string;
  fileSize?: number;
  sourcePageUrl?: string;
  thumbnailUrl?: string;
  durationSeconds?: number;
}

export type SourceErrorKind = 'timeout' | 'unavailable' | 'transport' | 'parse';

export interface SourceError {
  kind: SourceErrorKind;
  message: string;
}

export type SearchOutcome =
  | { ok: true; items: SearchCandidate[] }
  | { ok: false; error: SourceError };

export type MirrorOutcome =
  | { ok: true; storageKey: string; storageUrl: string | null }
  | { ok: false; reason: string };

export interface ItemRecord {
  id: number;
  keyword: string;
  url: string;
  contentType: ContentType;
  title: string | null;
  description: string | null;
  fileSize: number | null;
  contentHash: string | null;
  storageKey: string | null;
  storageUrl: string | null;
  taskId: string | null;
  sourceFile: string | null;
  createdAt: Date;
}

export type NewItem = Omit<ItemRecord, 'id' | 'createdAt' | 'storageKey' | 'storageUrl'>;
