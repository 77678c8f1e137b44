import { HttpClient } from './client.js';
import { parseConfig } from '../config.js';

type FetchMock = jest.Mock<Promise<Response>, Parameters<typeof fetch>>;

function createClient(fetchImpl: FetchMock, http: Record<string, unknown> = {}) {
  const sleep = jest.fn<Promise<void>, [number]>().mockResolvedValue(undefined);
  const client = new HttpClient({
    config: parseConfig({ http: { userAgent: 'test-agent', ...http } }).http,
    fetchImpl,
    sleep,
  });
  return { client, sleep };
}

describe('HttpClient', () => {
  it('should return the body with browser-like headers', async () => {
    const fetchImpl: FetchMock = jest.fn<Promise<Response>, Parameters<typeof fetch>>()
      .mockResolvedValue(new Response('<html>ok</html>', { status: 200 }));
    const { client } = createClient(fetchImpl);

    const result = await client.send({
      method: 'POST',
      url: 'https://example.com/list',
      referer: 'https://example.com/',
      form: { json: '{}' },
    });

    expect(result).toEqual({ ok: true, value: { status: 200, url: 'https://example.com/list', body: '<html>ok</html>' } });
    expect(fetchImpl).toHaveBeenCalledWith(
      'https://example.com/list',
      expect.objectContaining({
        method: 'POST',
        body: 'json=%7B%7D',
        headers: expect.objectContaining({
          'User-Agent': 'test-agent',
          'Referer': 'https://example.com/',
          'Content-Type': 'application/x-www-form-urlencoded; charset=UTF-8',
        }),
      }),
    );
  });

  it('should retry server errors with backoff', async () => {
    const fetchImpl: FetchMock = jest.fn<Promise<Response>, Parameters<typeof fetch>>()
      .mockResolvedValueOnce(new Response('busy', { status: 503 }))
      .mockResolvedValueOnce(new Response('<html>ok</html>', { status: 200 }));
    const { client, sleep } = createClient(fetchImpl);

    const result = await client.send({ method: 'GET', url: 'https://example.com/list' });

    expect(result.ok).toBe(true);
    expect(fetchImpl).toHaveBeenCalledTimes(2);
    expect(sleep.mock.calls).toEqual([[700]]);
  });

  it('should not retry a client error', async () => {
    const fetchImpl: FetchMock = jest.fn<Promise<Response>, Parameters<typeof fetch>>()
      .mockResolvedValue(new Response('missing', { status: 404 }));
    const { client, sleep } = createClient(fetchImpl);

    const result = await client.send({ method: 'GET', url: 'https://example.com/list' });

    expect(result).toEqual({ ok: false, error: { kind: 'http', status: 404, message: 'HTTP 404' } });
    expect(fetchImpl).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('should report network failures after the last retry', async () => {
    const fetchImpl: FetchMock = jest.fn<Promise<Response>, Parameters<typeof fetch>>()
      .mockRejectedValue(new TypeError('fetch failed'));
    const { client, sleep } = createClient(fetchImpl, { retries: 3, retryDelayMs: 100 });

    const result = await client.send({ method: 'GET', url: 'https://example.com/list' });

    expect(result).toEqual({ ok: false, error: { kind: 'network', status: null, message: 'fetch failed' } });
    expect(fetchImpl).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls).toEqual([[100], [200]]);
  });

  it('should map an aborted request to a timeout', async () => {
    const fetchImpl: FetchMock = jest.fn<Promise<Response>, Parameters<typeof fetch>>(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(new Error('This operation was aborted')));
        }),
    );
    const { client } = createClient(fetchImpl, { timeoutMs: 10, retries: 1 });

    const result = await client.send({ method: 'GET', url: 'https://example.com/slow' });

    expect(result).toEqual({ ok: false, error: { kind: 'timeout', status: null, message: 'Timed out after 10ms' } });
  });
});
