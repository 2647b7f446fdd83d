import https from 'https';
import type { AxiosInstance } from 'axios';
import { BaseCrawler, SourceUnavailableError, type CrawlerOptions } from './baseCrawler';
import type { SearchCandidate } from '../types/scrape';
import {
  buildDocumentQueries,
  createExaClient,
  normalizePdfUrl,
  searchExa,
  type ExaResult,
} from '../sites/documents/exa.site';
import { describeError, logger } from '../utils/logger';

export interface DocumentCrawlerOptions extends CrawlerOptions {
  apiKey: string;
  baseUrl: string;
  queryDelayMs?: number;
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export class DocumentCrawler extends BaseCrawler {
  readonly contentType = 'document' as const;

  private readonly agent = new https.Agent({ keepAlive: true });
  private readonly client: AxiosInstance;

  constructor(private readonly documentOptions: DocumentCrawlerOptions) {
    super(documentOptions);
    this.client = createExaClient({
      apiKey: documentOptions.apiKey,
      baseUrl: documentOptions.baseUrl,
      timeoutMs: documentOptions.timeoutMs,
      httpsAgent: this.agent,
    });
  }

  protected async fetchCandidates(keyword: string, maxResults: number): Promise<SearchCandidate[]> {
    if (!this.documentOptions.apiKey) {
      throw new SourceUnavailableError('EXA_API_KEY is not configured');
    }

    const queries = buildDocumentQueries(keyword);
    const delayMs = this.documentOptions.queryDelayMs ?? 1000;
    const seen = new Set<string>();
    const items: SearchCandidate[] = [];
    let lastError: unknown;

    for (const [index, query] of queries.entries()) {
      if (items.length >= maxResults) break;
      if (index > 0 && delayMs > 0) await sleep(delayMs);

      let results: ExaResult[];
      try {
        results = await searchExa(this.client, query, maxResults * 3);
      } catch (error) {
        lastError = error;
        logger.warn('Document query failed', { query, error: describeError(error) });
        continue;
      }

      for (const result of results) {
        if (items.length >= maxResults) break;
        const url = normalizePdfUrl(result.url);
        if (!url || seen.has(url)) continue;

        seen.add(url);
        items.push({
          url,
          title: (result.title?.trim() || url.split('/').pop() || keyword).slice(0, 200),
          description: result.text?.slice(0, 500) || `PDF document for: ${keyword}`,
        });
      }
    }

    if (items.length === 0 && lastError !== undefined) {
      throw lastError;
    }
    return items;
  }

  async close(): Promise<void> {
    this.agent.destroy();
  }
}
