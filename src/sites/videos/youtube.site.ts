import { execFile } from 'child_process';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { promisify } from 'util';
import { z } from 'zod';
import type { SearchCandidate } from '../../types/scrape';
import { logger } from '../../utils/logger';

const execFileAsync = promisify(execFile);

const MAX_BUFFER = 32 * 1024 * 1024;

const ytDlpEntrySchema = z.object({
  webpage_url: z.string().optional(),
  url: z.string().optional(),
  id: z.string().optional(),
  title: z.string().nullish(),
  description: z.string().nullish(),
  thumbnail: z.string().nullish(),
  duration: z.number().nullish(),
  filesize: z.number().nullish(),
  filesize_approx: z.number().nullish(),
});

export interface YtDlpOptions {
  binaryPath: string;
  timeoutMs: number;
}

function entryUrl(entry: z.infer<typeof ytDlpEntrySchema>): string | null {
  if (entry.webpage_url) return entry.webpage_url;
  if (entry.url?.startsWith('http')) return entry.url;
  if (entry.id) return `https://www.youtube.com/watch?v=${entry.id}`;
  return null;
}

/** yt-dlp prints one JSON document per line with `--dump-json`. */
export function parseYtDlpLines(stdout: string, keyword: string): SearchCandidate[] {
  const candidates: SearchCandidate[] = [];

  for (const line of stdout.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed) continue;

    let parsed: unknown;
    try {
      parsed = JSON.parse(trimmed);
    } catch {
      logger.debug('Skipping non JSON yt-dlp output line', { line: trimmed.slice(0, 120) });
      continue;
    }

    const entry = ytDlpEntrySchema.safeParse(parsed);
    if (!entry.success) continue;

    const url = entryUrl(entry.data);
    if (!url) continue;

    candidates.push({
      url,
      title: entry.data.title ?? keyword,
      description: entry.data.description?.slice(0, 500) || undefined,
      thumbnailUrl: entry.data.thumbnail ?? undefined,
      durationSeconds: entry.data.duration ?? undefined,
      fileSize: entry.data.filesize ?? entry.data.filesize_approx ?? undefined,
    });
  }

  return candidates;
}

export async function searchYouTube(
  keyword: string,
  maxResults: number,
  options: YtDlpOptions,
): Promise<SearchCandidate[]> {
  const { stdout } = await execFileAsync(
    options.binaryPath,
    [
      `ytsearch${maxResults}:${keyword}`,
      '--dump-json',
      '--no-playlist',
      '--default-search',
      'ytsearch',
      '--quiet',
      '--no-warnings',
    ],
    { timeout: options.timeoutMs, maxBuffer: MAX_BUFFER },
  );
  return parseYtDlpLines(stdout, keyword);
}

export interface DownloadedVideo {
  filePath: string;
  cleanup: () => Promise<void>;
}

export interface VideoDownloadOptions extends YtDlpOptions {
  maxFileSizeBytes: number;
}

export async function downloadYouTubeVideo(
  url: string,
  options: VideoDownloadOptions,
): Promise<DownloadedVideo> {
  const directory = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'keyword-scrape-video-'));
  const cleanup = () => fs.promises.rm(directory, { recursive: true, force: true });

  try {
    await execFileAsync(
      options.binaryPath,
      [
        url,
        '--format',
        'mp4/best',
        '--output',
        path.join(directory, '%(id)s.%(ext)s'),
        '--no-playlist',
        '--max-filesize',
        String(options.maxFileSizeBytes),
        '--quiet',
        '--no-warnings',
      ],
      { timeout: options.timeoutMs, maxBuffer: MAX_BUFFER },
    );

    const [file] = await fs.promises.readdir(directory);
    if (!file) {
      throw new Error(`yt-dlp produced no file for ${url}`);
    }
    return { filePath: path.join(directory, file), cleanup };
  } catch (error) {
    await cleanup();
    throw error;
  }
}
