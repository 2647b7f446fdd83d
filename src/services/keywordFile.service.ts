import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { HttpError } from '../errors/http-error';
import { describeError, logger } from '../utils/logger';

export interface UploadedKeywordFile {
  originalName: string;
  buffer: Buffer;
}

export interface KeywordExtraction {
  keywords: string[];
  keywordToSourceFile: Map<string, string>;
  files: string[];
}

const rowsSchema = z.array(z.array(z.string()));

function readRows(file: UploadedKeywordFile): string[][] {
  try {
    const records: unknown = parse(file.buffer, {
      bom: true,
      relax_column_count: true,
      relax_quotes: true,
      skip_empty_lines: true,
    });
    return rowsSchema.parse(records);
  } catch (error) {
    logger.warn('Failed to parse keyword file', {
      file: file.originalName,
      error: describeError(error),
    });
    throw HttpError.badRequest(`Could not parse CSV file '${file.originalName}'`);
  }
}

/**
 * Collects the first column of every row across the uploaded CSV files.
 * A keyword listed in several files belongs to the first one.
 */
export function extractKeywords(files: UploadedKeywordFile[]): KeywordExtraction {
  if (files.length === 0) {
    throw HttpError.badRequest('At least one CSV file is required');
  }

  const keywords: string[] = [];
  const keywordToSourceFile = new Map<string, string>();

  for (const file of files) {
    if (!file.originalName.toLowerCase().endsWith('.csv')) {
      throw HttpError.badRequest(`File '${file.originalName}' is not a CSV file`);
    }

    for (const row of readRows(file)) {
      const keyword = row[0]?.trim();
      if (!keyword) continue;
      keywords.push(keyword);
      if (!keywordToSourceFile.has(keyword)) {
        keywordToSourceFile.set(keyword, file.originalName);
      }
    }
  }

  if (keywords.length === 0) {
    throw HttpError.badRequest('No keywords found in the uploaded files');
  }

  return { keywords, keywordToSourceFile, files: files.map((file) => file.originalName) };
}
