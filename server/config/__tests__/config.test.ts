import path from 'node:path';
import { describe, expect, it } from 'vitest';
import { buildConfig } from '../config';

describe('buildConfig', () => {
  it('applies defaults', () => {
    const config = buildConfig({ OUTPUT_DIR: '/tmp/scraper-out' });

    expect(config.site).toEqual({
      sourceName: 'alcalorpolitico',
      baseUrl: 'https://www.alcalorpolitico.com',
      archivePath: '/informacion/notasarchivo.php',
      articlePathPrefix: '/informacion/',
      encoding: 'latin1',
    });
    expect(config.http).toMatchObject({
      requestTimeoutMs: 30_000,
      maxAttempts: 3,
      retryBaseDelayMs: 2_000,
      retryMaxDelayMs: 10_000,
      requestDelayMs: 1_500,
      maxConnections: 50,
      proxy: null,
    });
    expect(config.scrape).toEqual({ concurrency: 10, rescrapeDays: 3 });
    expect(config.persistence.articlesDir).toBe(path.resolve('/tmp/scraper-out', 'articles'));
    expect(config.observability).toEqual({ logLevel: 'info', logsDir: path.resolve('/tmp/scraper-out', 'logs') });
    expect(config.backfill).toEqual({ startDate: null, floorDate: '2003-01-01', batchSize: 10, probeDelayMs: 500 });
  });

  it('reads overrides and converts seconds to milliseconds', () => {
    const config = buildConfig({
      BASE_URL: 'https://news.example.test/',
      REQUEST_DELAY: '0.5',
      REQUEST_TIMEOUT: '12',
      MAX_CONCURRENT: '35',
      BACKFILL_START_DATE: '2015-06-01',
      LOG_LEVEL: 'DEBUG',
    });

    expect(config.site.baseUrl).toBe('https://news.example.test');
    expect(config.http.requestDelayMs).toBe(500);
    expect(config.http.requestTimeoutMs).toBe(12_000);
    expect(config.scrape.concurrency).toBe(20);
    expect(config.backfill.startDate).toBe('2015-06-01');
    expect(config.observability.logLevel).toBe('debug');
  });

  it('turns the log file off with LOG_TO_FILE', () => {
    expect(buildConfig({ LOG_TO_FILE: 'false' }).observability.logsDir).toBeNull();
    expect(buildConfig({ LOG_TO_FILE: 'off' }).observability.logsDir).toBeNull();
    expect(buildConfig({ OUTPUT_DIR: '/tmp/scraper-out', LOG_TO_FILE: 'yes' }).observability.logsDir).toBe(
      path.resolve('/tmp/scraper-out', 'logs'),
    );
  });

  it('falls back to defaults for malformed numbers', () => {
    const config = buildConfig({ MAX_RETRIES: 'three', DB_POOL_MAX: '' });

    expect(config.http.maxAttempts).toBe(3);
    expect(config.database.poolMax).toBe(10);
  });

  it('keeps proxy credentials apart from the URL', () => {
    const config = buildConfig({
      PROXY_URL: 'http://proxy.example.test:3128',
      PROXY_USERNAME: 'test-user',
      PROXY_PASSWORD: 'test-secret',
    });

    expect(config.http.proxy).toEqual({
      url: 'http://proxy.example.test:3128',
      username: 'test-user',
      password: 'test-secret',
    });
  });

  it('rejects invalid values', () => {
    expect(() => buildConfig({ LOG_LEVEL: 'loud' })).toThrow();
    expect(() => buildConfig({ BACKFILL_START_DATE: '2015/06/01' })).toThrow();
  });
});
