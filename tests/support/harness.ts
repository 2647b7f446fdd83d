import { ContentSourceRegistry } from '../../src/crawlers/registry';
import { Deduplicator } from '../../src/services/deduplicator.service';
import { MirrorService } from '../../src/services/mirror.service';
import { PersistenceService } from '../../src/services/persistence.service';
import { ResumabilityPlanner } from '../../src/services/resumability.service';
import { ScrapeOrchestrator } from '../../src/services/orchestrator.service';
import { ScrapeJobService, type Scheduler } from '../../src/services/scrapeJob.service';
import { TaskRegistry } from '../../src/services/taskRegistry.service';
import type { UploadedKeywordFile } from '../../src/services/keywordFile.service';
import type { NewScrapeTask, ScrapeTaskRecord } from '../../src/types/jobs';
import { CONTENT_TYPES, type ContentCounts, type ContentType } from '../../src/types/scrape';
import {
  FakeContentSource,
  FakeObjectStore,
  InMemoryItemRepository,
  respondWith,
  type SearchScript,
} from './fakes';

export interface HarnessOptions {
  caps?: Partial<ContentCounts>;
  searchOversample?: number;
  scripts?: Partial<Record<ContentType, SearchScript>>;
  schedule?: Scheduler;
}

export function createHarness(options: HarnessOptions = {}) {
  const repository = new InMemoryItemRepository();
  const store = new FakeObjectStore();
  const registry = new TaskRegistry();
  const opened: FakeContentSource[] = [];
  const videoDownloads: string[] = [];

  const scripts: Record<ContentType, SearchScript> = {
    video: options.scripts?.video ?? respondWith('video', 10),
    image: options.scripts?.image ?? respondWith('image', 10),
    document: options.scripts?.document ?? respondWith('document', 10),
  };

  const open = (contentType: ContentType) => () => {
    const source = new FakeContentSource(contentType, scripts[contentType]);
    opened.push(source);
    return source;
  };

  const sources = new ContentSourceRegistry({
    video: open('video'),
    image: open('image'),
    document: open('document'),
  });

  const mirror = new MirrorService(store, async (url) => {
    videoDownloads.push(url);
    return { filePath: '/tmp/downloaded-video.mp4', cleanup: async () => {} };
  });

  const orchestrator = new ScrapeOrchestrator(
    registry,
    sources,
    new Deduplicator(repository),
    new PersistenceService(repository, mirror),
    {
      caps: { video: 2, image: 2, document: 2, ...options.caps },
      searchOversample: options.searchOversample ?? 3,
    },
  );

  const scrapeJobs = new ScrapeJobService(
    registry,
    new ResumabilityPlanner(repository),
    orchestrator,
    repository,
    options.schedule,
  );

  const sourcesFor = (contentType: ContentType) =>
    opened.filter((source) => source.contentType === contentType);

  return { repository, store, registry, orchestrator, scrapeJobs, opened, sourcesFor, videoDownloads };
}

export function createTask(
  registry: TaskRegistry,
  keywords: string[],
  overrides: Partial<NewScrapeTask> = {},
): ScrapeTaskRecord {
  const allowed = keywords.map((keyword) => keyword.trim()).filter(Boolean);
  return registry.create({
    keywordsToProcess: keywords,
    allowedKeywords: new Set(allowed),
    keywordToSourceFile: new Map(allowed.map((keyword): [string, string] => [keyword, 'keywords.csv'])),
    files: ['keywords.csv'],
    contentTypes: [...CONTENT_TYPES],
    resumableMode: false,
    newKeywordCount: keywords.length,
    skippedKeywordCount: 0,
    allKeywordsScraped: false,
    ...overrides,
  });
}

export function csvFile(originalName: string, content: string): UploadedKeywordFile {
  return { originalName, buffer: Buffer.from(content, 'utf8') };
}

export type Harness = ReturnType<typeof createHarness>;
