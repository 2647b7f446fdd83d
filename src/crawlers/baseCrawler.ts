import { CheerioCrawler, Configuration } from 'crawlee';
import type { CheerioCrawlingContext } from 'crawlee';
import { randomUUID } from 'crypto';
import { isAxiosError } from 'axios';
import { ZodError } from 'zod';
import type {
  ContentType,
  SearchCandidate,
  SearchOutcome,
  SourceError,
} from '../types/scrape';
import { describeError, logger } from '../utils/logger';

export interface ContentSource {
  readonly contentType: ContentType;
  /** Resolves to a failure outcome instead of rejecting. */
  search(keyword: string, maxResults: number): Promise<SearchOutcome>;
  close(): Promise<void>;
}

export interface CrawlerOptions {
  timeoutMs: number;
}

export type PageHandler = (context: {
  $: CheerioCrawlingContext['$'];
  url: string;
}) => void | Promise<void>;

export class SourceUnavailableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SourceUnavailableError';
  }
}

function readField(error: unknown, field: string): unknown {
  if (typeof error === 'object' && error !== null && field in error) {
    return Reflect.get(error, field);
  }
  return undefined;
}

export function classifySourceError(error: unknown): SourceError {
  const message = describeError(error);

  if (error instanceof SourceUnavailableError || readField(error, 'code') === 'ENOENT') {
    return { kind: 'unavailable', message };
  }
  if (error instanceof ZodError || error instanceof SyntaxError) {
    return { kind: 'parse', message };
  }

  const code = readField(error, 'code');
  if (
    readField(error, 'killed') === true ||
    code === 'ETIMEDOUT' ||
    code === 'ECONNABORTED' ||
    /timed? ?out/i.test(message)
  ) {
    return { kind: 'timeout', message };
  }

  if (isAxiosError(error) && error.response) {
    const status = error.response.status;
    if (status === 401 || status === 403 || status === 429 || status >= 500) {
      return { kind: 'unavailable', message: `Upstream responded with ${status}` };
    }
  }

  return { kind: 'transport', message };
}

export abstract class BaseCrawler implements ContentSource {
  abstract readonly contentType: ContentType;

  constructor(protected readonly options: CrawlerOptions) {}

  protected abstract fetchCandidates(keyword: string, maxResults: number): Promise<SearchCandidate[]>;

  async search(keyword: string, maxResults: number): Promise<SearchOutcome> {
    if (maxResults <= 0) {
      return { ok: true, items: [] };
    }

    const requestId = randomUUID();
    const startTime = Date.now();
    logger.info(`Starting ${this.contentType} search ${requestId}`, { keyword, maxResults });

    try {
      const items = (await this.fetchCandidates(keyword, maxResults)).slice(0, maxResults);
      logger.info(`Finished ${this.contentType} search ${requestId}`, {
        keyword,
        found: items.length,
        duration: Date.now() - startTime,
      });
      return { ok: true, items };
    } catch (error) {
      const sourceError = classifySourceError(error);
      logger.error(`Error in ${this.contentType} search ${requestId}`, {
        keyword,
        kind: sourceError.kind,
        error: sourceError.message,
      });
      return { ok: false, error: sourceError };
    }
  }

  async close(): Promise<void> {}

  /**
   * Fetches every url with a throwaway in-memory crawler and hands each parsed
   * page to `handler`. Rejects only when no page could be processed.
   */
  protected async crawlPages(urls: string[], handler: PageHandler): Promise<void> {
    const failures: Error[] = [];
    let handled = 0;

    const crawler = new CheerioCrawler(
      {
        minConcurrency: 1,
        maxConcurrency: 1,
        maxRequestRetries: 1,
        navigationTimeoutSecs: Math.ceil(this.options.timeoutMs / 1000),
        requestHandlerTimeoutSecs: Math.ceil(this.options.timeoutMs / 1000),
        requestHandler: async ({ $, request }) => {
          await handler({ $, url: request.url });
          handled += 1;
        },
        failedRequestHandler: ({ request }, error) => {
          logger.warn(`Request failed for ${this.contentType} source`, {
            url: request.url,
            error: error.message,
          });
          failures.push(error);
        },
      },
      new Configuration({ persistStorage: false }),
    );

    await crawler.run(urls.map((url) => ({ url, uniqueKey: `${randomUUID()}:${url}` })));

    const [firstFailure] = failures;
    if (handled === 0 && firstFailure) {
      throw firstFailure;
    }
  }
}
