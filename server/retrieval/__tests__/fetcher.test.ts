import { afterEach, describe, expect, it, vi } from 'vitest';
import { createTestLogger, htmlResponse, latin1Bytes, testConfig } from '../../__tests__/helpers';
import { FetchError, createFetcher, type FetchFn, type Fetcher } from '../fetcher';

const URL_UNDER_TEST = 'https://www.alcalorpolitico.com/informacion/nota-1.html';

let fetcher: Fetcher | null = null;

const setup = (fetchFn: FetchFn, env: Record<string, string> = {}) => {
  const sleep = vi.fn(async (_ms: number) => {});
  const config = testConfig(env);
  const logger = createTestLogger();
  fetcher = createFetcher({ config, concurrency: 4, logger, fetchFn, sleep });
  return { fetcher, sleep, config, logger };
};

afterEach(async () => {
  await fetcher?.close();
  fetcher = null;
});

describe('createFetcher', () => {
  it('decodes single-byte bodies regardless of the advertised charset', async () => {
    const fetchFn = vi.fn<FetchFn>(async () => ({
      ok: true,
      status: 200,
      statusText: 'OK',
      arrayBuffer: async () => latin1Bytes('Política y ñu'),
    }));
    const { fetcher } = setup(fetchFn);

    await expect(fetcher.fetchText(URL_UNDER_TEST)).resolves.toBe('Política y ñu');
  });

  it('sends the configured user agent', async () => {
    const fetchFn = vi.fn<FetchFn>(async () => htmlResponse('<html></html>'));
    const { fetcher, config } = setup(fetchFn, { USER_AGENT: 'test-agent/1.0' });

    await fetcher.fetchText(URL_UNDER_TEST);

    expect(fetchFn).toHaveBeenCalledTimes(1);
    const [url, init] = fetchFn.mock.calls[0];
    expect(url).toBe(URL_UNDER_TEST);
    expect(init.headers['User-Agent']).toBe('test-agent/1.0');
    expect(config.http.userAgent).toBe('test-agent/1.0');
  });

  it('does not retry HTTP error statuses', async () => {
    const fetchFn = vi.fn<FetchFn>(async () => htmlResponse('missing', 404, 'Not Found'));
    const { fetcher, sleep } = setup(fetchFn);

    const error = await fetcher.fetchText(URL_UNDER_TEST).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(FetchError);
    expect(error).toMatchObject({ kind: 'permanent', status: 404, attempts: 1, message: 'HTTP 404 Not Found' });
    expect(fetchFn).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('retries transport failures with exponential backoff', async () => {
    const fetchFn = vi
      .fn<FetchFn>()
      .mockRejectedValueOnce(new TypeError('fetch failed'))
      .mockRejectedValueOnce(new TypeError('fetch failed'))
      .mockResolvedValueOnce(htmlResponse('<html>ok</html>'));
    const { fetcher, sleep } = setup(fetchFn);

    await expect(fetcher.fetchText(URL_UNDER_TEST)).resolves.toBe('<html>ok</html>');
    expect(fetchFn).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls.map((call) => call[0])).toEqual([2000, 4000]);
  });

  it('caps the backoff delay', async () => {
    const fetchFn = vi.fn<FetchFn>(async () => {
      throw new TypeError('fetch failed');
    });
    const { fetcher, sleep } = setup(fetchFn, { MAX_RETRIES: '5' });

    await expect(fetcher.fetchText(URL_UNDER_TEST)).rejects.toBeInstanceOf(FetchError);
    expect(sleep.mock.calls.map((call) => call[0])).toEqual([2000, 4000, 8000, 10000]);
  });

  it('reports exhausted retries as a permanent failure', async () => {
    const fetchFn = vi.fn<FetchFn>(async () => {
      throw new TypeError('fetch failed');
    });
    const { fetcher } = setup(fetchFn);

    const error = await fetcher.fetchText(URL_UNDER_TEST).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(FetchError);
    expect(error).toMatchObject({
      kind: 'permanent',
      attempts: 3,
      message: 'fetch failed (gave up after 3 attempts)',
    });
    expect(fetchFn).toHaveBeenCalledTimes(3);
  });

  it('treats a timeout as a transient failure', async () => {
    const fetchFn = vi.fn<FetchFn>(
      (_url, init) =>
        new Promise((_resolve, reject) => {
          init.signal.addEventListener('abort', () => reject(new Error('aborted')));
        }),
    );
    const { fetcher } = setup(fetchFn, { REQUEST_TIMEOUT: '0.01', MAX_RETRIES: '1' });

    await expect(fetcher.fetchText(URL_UNDER_TEST)).rejects.toThrow(
      'Request timed out after 10ms (gave up after 1 attempts)',
    );
  });

  it('reports no proxy by default', () => {
    const { fetcher } = setup(vi.fn<FetchFn>());
    expect(fetcher.concurrency).toBe(4);
    expect(fetcher.proxyUsed).toBe(false);
  });

  it('routes through the proxy and logs it without credentials', () => {
    const { fetcher, logger } = setup(vi.fn<FetchFn>(), {
      PROXY_URL: 'http://proxy.example.test:8080',
      PROXY_USERNAME: 'test-user',
      PROXY_PASSWORD: 'test-secret',
    });

    expect(fetcher.proxyUsed).toBe(true);
    expect(logger.info).toHaveBeenCalledWith('Using proxy', { proxy: 'http://***@proxy.example.test:8080' });
  });
});
