import { describe, it, expect } from 'vitest';
import { parseConfig } from '../src/utils/env';

describe('parseConfig', () => {
  it('should apply defaults', () => {
    const config = parseConfig({});

    expect(config.port).toBe(8001);
    expect(config.caps).toEqual({ video: 2, image: 2, document: 2 });
    expect(config.searchOversample).toBe(3);
    expect(config.corsOrigins).toEqual(['http://localhost:3000', 'http://localhost:5173']);
    expect(config.maxDownloadBytes).toBe(500 * 1024 * 1024);
    expect(config.storage.endpoint).toBe('');
    expect(config.logLevel).toBe('info');
  });

  it('should read per type caps and derive the R2 endpoint', () => {
    const config = parseConfig({
      PORT: '9000',
      MAX_RESULTS_PER_KEYWORD: '4',
      MAX_VIDEO_RESULTS_PER_KEYWORD: '0',
      R2_ACCOUNT_ID: 'acct',
      R2_PUBLIC_URL: 'https://cdn.test/',
      CORS_ORIGINS: ' https://a.test , ,https://b.test',
      MAX_DOWNLOAD_SIZE_MB: '1.5',
    });

    expect(config.port).toBe(9000);
    expect(config.caps).toEqual({ video: 0, image: 4, document: 4 });
    expect(config.storage.endpoint).toBe('https://acct.r2.cloudflarestorage.com');
    expect(config.storage.publicUrl).toBe('https://cdn.test');
    expect(config.corsOrigins).toEqual(['https://a.test', 'https://b.test']);
    expect(config.maxDownloadBytes).toBe(1572864);
  });

  it('should reject invalid values', () => {
    expect(() => parseConfig({ LOG_LEVEL: 'verbose' })).toThrow();
    expect(() => parseConfig({ MAX_RESULTS_PER_KEYWORD: '-1' })).toThrow();
  });
});
