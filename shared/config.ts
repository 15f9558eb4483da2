import { z } from 'zod';

export const MIN_CONCURRENCY = 1;
export const MAX_CONCURRENCY = 20;

const isoDate = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected a YYYY-MM-DD date');

export const ConfigSchema = z.object({
  site: z.object({
    sourceName: z.string().min(1),
    baseUrl: z.string().url(),
    archivePath: z.string().startsWith('/'),
    articlePathPrefix: z.string().startsWith('/'),
    encoding: z.string().min(1),
  }),
  http: z.object({
    userAgent: z.string().min(1),
    requestTimeoutMs: z.number().int().positive(),
    maxAttempts: z.number().int().positive().max(10),
    retryBaseDelayMs: z.number().int().nonnegative(),
    retryMaxDelayMs: z.number().int().nonnegative(),
    requestDelayMs: z.number().nonnegative(),
    maxConnections: z.number().int().positive(),
    keepAliveTimeoutMs: z.number().int().positive(),
    proxy: z
      .object({
        url: z.string().url(),
        username: z.string().optional(),
        password: z.string().optional(),
      })
      .nullable(),
  }),
  scrape: z.object({
    concurrency: z.number().int().min(MIN_CONCURRENCY).max(MAX_CONCURRENCY),
    rescrapeDays: z.number().int().nonnegative(),
  }),
  persistence: z.object({
    rootDir: z.string().min(1),
    articlesDir: z.string().min(1),
    metadataDir: z.string().min(1),
  }),
  database: z.object({
    url: z.string().min(1),
    poolMin: z.number().int().nonnegative(),
    poolMax: z.number().int().positive(),
    idleTimeoutMs: z.number().int().positive(),
    statementTimeoutMs: z.number().int().positive(),
  }),
  backfill: z.object({
    startDate: isoDate.nullable(),
    floorDate: isoDate,
    batchSize: z.number().int().positive(),
    probeDelayMs: z.number().int().nonnegative(),
  }),
  observability: z.object({
    logLevel: z.enum(['debug', 'info', 'warn', 'error']),
    /** Daily log files go here; null keeps logging on the console only. */
    logsDir: z.string().min(1).nullable(),
  }),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

export const clampConcurrency = (value: number): number => {
  if (!Number.isFinite(value)) {
    return MIN_CONCURRENCY;
  }
  return Math.max(MIN_CONCURRENCY, Math.min(MAX_CONCURRENCY, Math.round(value)));
};

/**
 * Builds the proxy URL handed to the HTTP dispatcher. Credentials are only
 * merged in when both parts are present and the URL carries a scheme.
 */
export const buildProxyUrl = (proxy: AppConfig['http']['proxy']): string | null => {
  if (!proxy) {
    return null;
  }
  if (!proxy.username || !proxy.password) {
    return proxy.url;
  }
  const separator = proxy.url.indexOf('://');
  if (separator < 0) {
    return proxy.url;
  }
  const scheme = proxy.url.slice(0, separator);
  const rest = proxy.url.slice(separator + 3);
  return `${scheme}://${encodeURIComponent(proxy.username)}:${encodeURIComponent(proxy.password)}@${rest}`;
};

/** Hides credentials so the proxy can be logged. */
export const maskProxyUrl = (proxyUrl: string): string => {
  const at = proxyUrl.lastIndexOf('@');
  if (at < 0) {
    return proxyUrl;
  }
  const separator = proxyUrl.indexOf('://');
  const scheme = separator >= 0 ? proxyUrl.slice(0, separator + 3) : '';
  return `${scheme}***@${proxyUrl.slice(at + 1)}`;
};
