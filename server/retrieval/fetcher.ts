import { Agent, ProxyAgent, fetch as undiciFetch, type Dispatcher } from 'undici';
import { buildProxyUrl, clampConcurrency, maskProxyUrl, type AppConfig } from '../../shared/config';
import { errorMessage, type Logger } from '../obs/logger';
import { backoffDelayMs, sleep as defaultSleep, type Sleep } from '../utils/async';
import { Semaphore } from '../utils/concurrency';

export type FetchErrorKind = 'transient' | 'permanent';

export class FetchError extends Error {
  readonly kind: FetchErrorKind;
  readonly url: string;
  readonly status: number | null;
  readonly attempts: number;

  constructor(
    message: string,
    details: { kind: FetchErrorKind; url: string; status?: number | null; attempts: number; cause?: unknown },
  ) {
    super(message, { cause: details.cause });
    this.name = 'FetchError';
    this.kind = details.kind;
    this.url = details.url;
    this.status = details.status ?? null;
    this.attempts = details.attempts;
  }
}

export interface FetchResponse {
  ok: boolean;
  status: number;
  statusText: string;
  arrayBuffer(): Promise<ArrayBuffer>;
}

export interface FetchRequest {
  method: 'GET';
  headers: Record<string, string>;
  redirect: 'follow';
  signal: AbortSignal;
  dispatcher: Dispatcher;
}

export type FetchFn = (url: string, init: FetchRequest) => Promise<FetchResponse>;

export interface FetcherOptions {
  config: Pick<AppConfig, 'site' | 'http'>;
  concurrency: number;
  logger: Logger;
  fetchFn?: FetchFn;
  sleep?: Sleep;
}

export interface Fetcher {
  readonly concurrency: number;
  readonly proxyUsed: boolean;
  /** GET `url` and decode the body with the site encoding. */
  fetchText: (url: string) => Promise<string>;
  /** Runs `task` in one of the `concurrency` shared slots. */
  runLimited: <T>(task: () => Promise<T>) => Promise<T>;
  close: () => Promise<void>;
}

const defaultFetch: FetchFn = (url, init) => undiciFetch(url, init);

const createDispatcher = (http: AppConfig['http'], proxyUrl: string | null): Dispatcher => {
  const poolOptions = {
    connections: http.maxConnections,
    keepAliveTimeout: http.keepAliveTimeoutMs,
  };
  if (proxyUrl) {
    return new ProxyAgent({ uri: proxyUrl, ...poolOptions });
  }
  return new Agent(poolOptions);
};

export const createFetcher = ({
  config,
  concurrency,
  logger,
  fetchFn = defaultFetch,
  sleep = defaultSleep,
}: FetcherOptions): Fetcher => {
  const { http, site } = config;
  const proxyUrl = buildProxyUrl(http.proxy);
  const dispatcher = createDispatcher(http, proxyUrl);
  const decoder = new TextDecoder(site.encoding);
  const cap = clampConcurrency(concurrency);
  const limiter = new Semaphore(cap);
  const maxAttempts = Math.max(1, http.maxAttempts);

  if (proxyUrl) {
    logger.info('Using proxy', { proxy: maskProxyUrl(proxyUrl) });
  }
  logger.info('HTTP client ready', { concurrency: cap, maxConnections: http.maxConnections });

  const attemptOnce = async (url: string): Promise<string> => {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), http.requestTimeoutMs);
    try {
      const response = await fetchFn(url, {
        method: 'GET',
        headers: {
          'User-Agent': http.userAgent,
          Accept: 'text/html,application/xhtml+xml',
        },
        redirect: 'follow',
        signal: controller.signal,
        dispatcher,
      });
      if (!response.ok) {
        throw new FetchError(`HTTP ${response.status} ${response.statusText}`.trim(), {
          kind: 'permanent',
          url,
          status: response.status,
          attempts: 1,
        });
      }
      const body = await response.arrayBuffer();
      return decoder.decode(new Uint8Array(body));
    } catch (error) {
      if (error instanceof FetchError) {
        throw error;
      }
      const message = controller.signal.aborted
        ? `Request timed out after ${http.requestTimeoutMs}ms`
        : errorMessage(error);
      throw new FetchError(message, { kind: 'transient', url, attempts: 1, cause: error });
    } finally {
      clearTimeout(timer);
    }
  };

  const fetchText = async (url: string): Promise<string> => {
    for (let attempt = 1; ; attempt += 1) {
      logger.debug('Fetching', { url, attempt });
      try {
        return await attemptOnce(url);
      } catch (error) {
        if (!(error instanceof FetchError) || error.kind === 'permanent') {
          throw error;
        }
        if (attempt >= maxAttempts) {
          throw new FetchError(`${error.message} (gave up after ${attempt} attempts)`, {
            kind: 'permanent',
            url,
            attempts: attempt,
            cause: error,
          });
        }
        const delayMs = backoffDelayMs(attempt, http.retryBaseDelayMs, http.retryMaxDelayMs);
        logger.warn('Transient fetch failure, retrying', { url, attempt, delayMs, error: error.message });
        await sleep(delayMs);
      }
    }
  };

  return {
    concurrency: cap,
    proxyUsed: proxyUrl !== null,
    fetchText,
    runLimited: (task) => limiter.run(task),
    close: () => dispatcher.close(),
  };
};
