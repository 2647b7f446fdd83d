import axios, { type AxiosInstance } from 'axios';
import https from 'https';
import { z } from 'zod';

const exaResultSchema = z.object({
  url: z.string(),
  title: z.string().nullish(),
  text: z.string().nullish(),
});

const exaResponseSchema = z.object({
  results: z.array(exaResultSchema).default([]),
});

export type ExaResult = z.infer<typeof exaResultSchema>;

export interface ExaClientOptions {
  apiKey: string;
  baseUrl: string;
  timeoutMs: number;
  httpsAgent?: https.Agent;
}

export function createExaClient(options: ExaClientOptions): AxiosInstance {
  return axios.create({
    baseURL: options.baseUrl,
    timeout: options.timeoutMs,
    httpsAgent: options.httpsAgent,
    headers: {
      'Content-Type': 'application/json',
      'x-api-key': options.apiKey,
    },
  });
}

export function buildDocumentQueries(keyword: string): string[] {
  return [`${keyword} filetype:pdf`, `${keyword} PDF`, `${keyword} PDF document`];
}

/** Strips query string and fragment; returns null unless the result is a direct PDF link. */
export function normalizePdfUrl(url: string): string | null {
  const clean = url.trim().split('?')[0]?.split('#')[0] ?? '';
  if (!clean.startsWith('http') || !clean.toLowerCase().endsWith('.pdf')) {
    return null;
  }
  return clean;
}

export async function searchExa(
  client: AxiosInstance,
  query: string,
  numResults: number,
): Promise<ExaResult[]> {
  const response = await client.post('/search', {
    query,
    numResults,
    contents: { text: { maxCharacters: 500 } },
  });
  return exaResponseSchema.parse(response.data).results;
}
