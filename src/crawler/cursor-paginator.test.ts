import { CursorPaginator, numericId, type CursorPaginatorOptions } from './cursor-paginator.js';
import { emptyListing, type Extractor } from '../extractors/base.js';
import type { HttpRequest, HttpResponse, HttpTransport } from '../http/client.js';
import type { CursorEndpoint, CursorParams } from '../sites/types.js';
import { err, ok, type FetchError, type Result, type TransportVariant } from '../types.js';

const fakeExtractor: Extractor = {
  siteId: 'immokh',
  itemMarkers: ['data-id='],
  emptyMarkers: ['no-results'],
  extract(payload) {
    const ids = [...payload.matchAll(/data-id="([^"]+)"/g)].map(match => match[1]);
    return [...new Set(ids)].map(id => emptyListing(id, `https://catalog.test/item/${id}`));
  },
};

const endpoint: CursorEndpoint = {
  url: 'https://catalog.test/more',
  buildRequest(params: CursorParams, transport: TransportVariant): HttpRequest {
    const query = `first=${params.isFirstPage}&bound=${params.cursorId ?? ''}&size=${params.pageSize}&sort=${params.sortMode}`;
    return transport === 'query'
      ? { method: 'GET', url: `${this.url}?${query}` }
      : { method: 'POST', url: this.url, form: { query } };
  },
};

interface ParsedRequest {
  first: boolean;
  bound: number | null;
  size: number;
  transport: TransportVariant;
}

function parseRequest(request: HttpRequest): ParsedRequest {
  const query = request.method === 'GET' ? new URL(request.url).search.slice(1) : request.form?.query ?? '';
  const params = new URLSearchParams(query);
  const bound = params.get('bound');
  return {
    first: params.get('first') === 'true',
    bound: bound ? Number(bound) : null,
    size: Number(params.get('size')),
    transport: request.method === 'GET' ? 'query' : 'body',
  };
}

function page(ids: Array<string | number>): string {
  if (ids.length === 0) return '<div class="no-results"></div>';
  return ids.map(id => `<a data-id="${id}"></a>`).join('');
}

type Handler = (request: ParsedRequest) => Result<HttpResponse, FetchError>;

class FakeCatalog implements HttpTransport {
  readonly requests: ParsedRequest[] = [];

  constructor(private readonly handler: Handler) {}

  async send(request: HttpRequest): Promise<Result<HttpResponse, FetchError>> {
    const parsed = parseRequest(request);
    this.requests.push(parsed);
    return this.handler(parsed);
  }
}

function respond(body: string): Result<HttpResponse, FetchError> {
  return ok({ status: 200, url: endpoint.url, body });
}

/** Newest-first catalog answering "ids at or below bound". */
function descendingCatalog(ids: number[]): Handler {
  return request => {
    const eligible = request.bound === null ? ids : ids.filter(id => id <= (request.bound ?? 0));
    return respond(page(eligible.slice(0, request.size)));
  };
}

const TEN_IDS = [110, 109, 108, 107, 106, 105, 104, 103, 102, 101];

describe('CursorPaginator', () => {
  let sleep: jest.Mock<Promise<void>, [number]>;

  beforeEach(() => {
    sleep = jest.fn<Promise<void>, [number]>().mockResolvedValue(undefined);
  });

  function createPaginator(http: HttpTransport, overrides: Partial<CursorPaginatorOptions> = {}) {
    return new CursorPaginator({
      http,
      extractor: fakeExtractor,
      sortMode: 5,
      pageSizes: [3],
      transports: ['query', 'body'],
      maxSteps: 10,
      politeDelayMs: 1000,
      sleep,
      ...overrides,
    });
  }

  it('should walk the catalog with a strictly decreasing cursor', async () => {
    const catalog = new FakeCatalog(descendingCatalog(TEN_IDS));
    const result = await createPaginator(catalog).crawl(endpoint);

    expect(result.items.map(item => item.id)).toEqual(TEN_IDS.map(String));
    expect(result.steps).toBe(5);
    expect(result.cursorTrail).toEqual([108, 105, 102, 101]);
    expect(result.terminalReason).toBe('exhausted');

    expect(catalog.requests.map(request => request.bound)).toEqual([null, 107, 104, 101, 100, 100]);
    expect(catalog.requests[0].first).toBe(true);
    expect(catalog.requests[1].first).toBe(false);
  });

  it('should sleep only between successful steps', async () => {
    const catalog = new FakeCatalog(descendingCatalog(TEN_IDS));
    await createPaginator(catalog).crawl(endpoint);

    expect(sleep).toHaveBeenCalledTimes(4);
    expect(sleep).toHaveBeenCalledWith(1000);
  });

  it('should try page sizes then transports in order until one succeeds', async () => {
    const catalog = new FakeCatalog(request => {
      if (request.size === 48 && request.transport === 'body') return respond(page([300, 299]));
      if (request.transport === 'query') return err({ kind: 'network', status: null, message: 'ECONNRESET' });
      return err({ kind: 'http', status: 500, message: 'HTTP 500' });
    });
    const paginator = createPaginator(catalog, { pageSizes: [12, 48], maxSteps: 1 });

    const state = paginator.initialState();
    const step = await paginator.step(endpoint, state);

    expect(catalog.requests.map(r => `${r.size}/${r.transport}`)).toEqual(['12/query', '12/body', '48/query', '48/body']);
    expect(step.transportUsed).toBe('body');
    expect(step.terminal).toBe(false);
    expect(step.items.map(item => item.id)).toEqual(['300', '299']);
    expect(state.cursorId).toBe(299);
  });

  it('should stop at the step budget', async () => {
    const catalog = new FakeCatalog(descendingCatalog(TEN_IDS));
    const result = await createPaginator(catalog, { maxSteps: 2 }).crawl(endpoint);

    expect(result.steps).toBe(2);
    expect(result.terminalReason).toBe('budget');
    expect(result.items.map(item => item.id)).toEqual(['110', '109', '108', '107', '106', '105']);
  });

  it('should treat a page with nothing below the cursor as a miss', async () => {
    const catalog = new FakeCatalog(() => respond(page([110, 109, 108])));
    const result = await createPaginator(catalog).crawl(endpoint);

    expect(result.items.map(item => item.id)).toEqual(['110', '109', '108']);
    expect(result.cursorTrail).toEqual([108]);
    expect(result.terminalReason).toBe('exhausted');
    expect(catalog.requests).toHaveLength(3);
  });

  it('should only count unseen ids below the cursor as progress', async () => {
    const catalog = new FakeCatalog(request =>
      request.first ? respond(page([110, 109, 108])) : respond(page([112, 109, 107, 'promo'])));
    const paginator = createPaginator(catalog);
    const state = paginator.initialState();

    await paginator.step(endpoint, state);
    const second = await paginator.step(endpoint, state);

    expect(second.items.map(item => item.id)).toEqual(['107', 'promo']);
    expect(state.cursorId).toBe(107);
  });

  it('should miss on the no-results marker', async () => {
    const catalog = new FakeCatalog(() => respond('<a data-id="1"></a><p class="no-results"></p>'));
    const result = await createPaginator(catalog).crawl(endpoint);

    expect(result.items).toEqual([]);
    expect(result.steps).toBe(1);
    expect(result.terminalReason).toBe('first-page-miss');
  });

  it('should keep a first page without numeric ids and stop', async () => {
    const catalog = new FakeCatalog(() => respond(page(['villa-a', 'villa-b'])));
    const result = await createPaginator(catalog).crawl(endpoint);

    expect(result.items.map(item => item.id)).toEqual(['villa-a', 'villa-b']);
    expect(result.terminalReason).toBe('no-cursor');
    expect(result.cursorTrail).toEqual([]);
  });

  it('should always pass the configured sort mode', async () => {
    const requests: HttpRequest[] = [];
    const http: HttpTransport = {
      async send(request) {
        requests.push(request);
        return respond(page([]));
      },
    };
    await createPaginator(http, { sortMode: 7 }).crawl(endpoint);

    expect(requests[0].url).toBe('https://catalog.test/more?first=true&bound=&size=3&sort=7');
  });

  it('should read numeric ids', () => {
    expect(numericId('12345')).toBe(12345);
    expect(numericId('12a')).toBeNull();
    expect(numericId('')).toBeNull();
    expect(numericId('99999999999999999999')).toBeNull();
  });
});
