import type { ItemRepository } from '../repositories/item.repository';
import { logger } from '../utils/logger';

export interface ResumePlan {
  keywordsToProcess: string[];
  allowedKeywords: Set<string>;
  alreadyScraped: string[];
  resumableMode: boolean;
  allKeywordsScraped: boolean;
}

export class ResumabilityPlanner {
  constructor(private readonly repository: ItemRepository) {}

  /**
   * Splits the uploaded keywords into those that still need work and those
   * that already have at least one item stored under the same source file.
   * Blank keywords never enter the allow-list.
   */
  async plan(keywords: string[], keywordToSourceFile: ReadonlyMap<string, string>): Promise<ResumePlan> {
    const allowedKeywords = new Set<string>();
    const unique: string[] = [];

    for (const raw of keywords) {
      const keyword = raw.trim();
      if (!keyword) {
        logger.warn('Dropping blank keyword from upload');
        continue;
      }
      if (allowedKeywords.has(keyword)) continue;
      allowedKeywords.add(keyword);
      unique.push(keyword);
    }

    const keywordsToProcess: string[] = [];
    const alreadyScraped: string[] = [];

    for (const keyword of unique) {
      const sourceFile = keywordToSourceFile.get(keyword) ?? 'unknown';
      if (await this.repository.existsForKeywordInFile(keyword, sourceFile)) {
        alreadyScraped.push(keyword);
      } else {
        keywordsToProcess.push(keyword);
      }
    }

    const plan: ResumePlan = {
      keywordsToProcess,
      allowedKeywords,
      alreadyScraped,
      resumableMode: alreadyScraped.length > 0,
      allKeywordsScraped: unique.length > 0 && keywordsToProcess.length === 0,
    };

    logger.info('Resumability plan computed', {
      total: unique.length,
      toProcess: keywordsToProcess.length,
      skipped: alreadyScraped.length,
    });

    return plan;
  }
}
