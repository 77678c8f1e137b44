import { PagedPaginator } from './paged-paginator.js';
import type { HttpRequest, HttpResponse, HttpTransport } from '../http/client.js';
import { immowebAdapter } from '../sites/immoweb.js';
import { marjorietomeAdapter } from '../sites/marjorietome.js';
import type { SiteAdapter } from '../sites/types.js';
import { err, ok, type FetchError, type Result } from '../types.js';

class FakeSite implements HttpTransport {
  readonly requests: HttpRequest[] = [];

  constructor(private readonly handler: (url: URL) => Result<HttpResponse, FetchError>) {}

  async send(request: HttpRequest): Promise<Result<HttpResponse, FetchError>> {
    this.requests.push(request);
    return this.handler(new URL(request.url));
  }
}

function html(body: string): Result<HttpResponse, FetchError> {
  return ok({ status: 200, url: 'https://example.test', body: `<html><body>${body}</body></html>` });
}

const notFound: Result<HttpResponse, FetchError> = err({ kind: 'http', status: 404, message: 'HTTP 404' });

function wordpressPage(slugs: string[]): Result<HttpResponse, FetchError> {
  return html(slugs.map(slug => `<div><a href="https://immotoma.be/property/${slug}/">${slug}</a></div>`).join(''));
}

const SEARCH_URL = 'https://immotoma.be/a-vendre/';

describe('PagedPaginator', () => {
  let sleep: jest.Mock<Promise<void>, [number]>;

  beforeEach(() => {
    sleep = jest.fn<Promise<void>, [number]>().mockResolvedValue(undefined);
  });

  function createPaginator(http: HttpTransport, adapter: SiteAdapter, maxPages: number) {
    return new PagedPaginator({ http, adapter, maxPages, politeDelayMs: 500, sleep });
  }

  it('should follow page numbers until a page misses', async () => {
    const pages: Record<string, string[]> = {
      '1': ['villa-a', 'villa-b'],
      '2': ['villa-c', 'villa-d'],
    };
    const site = new FakeSite(url => {
      const slugs = pages[url.searchParams.get('paged') ?? ''];
      return slugs ? wordpressPage(slugs) : notFound;
    });

    const result = await createPaginator(site, marjorietomeAdapter, 5).crawl(SEARCH_URL);

    expect(result.items.map(item => item.id)).toEqual(['villa-a', 'villa-b', 'villa-c', 'villa-d']);
    expect(result.pages).toBe(3);
    expect(result.terminalReason).toBe('exhausted');
    expect(site.requests.map(request => request.url)).toEqual([
      'https://immotoma.be/a-vendre/?paged=1',
      'https://immotoma.be/a-vendre/?paged=2',
      'https://immotoma.be/a-vendre/?paged=3',
    ]);
    expect(site.requests[0].referer).toBe(SEARCH_URL);
    expect(sleep).toHaveBeenCalledTimes(2);
  });

  it('should stop at the page budget', async () => {
    const site = new FakeSite(url => wordpressPage([`villa-${url.searchParams.get('paged')}`]));
    const result = await createPaginator(site, marjorietomeAdapter, 2).crawl(SEARCH_URL);

    expect(result.items.map(item => item.id)).toEqual(['villa-1', 'villa-2']);
    expect(result.terminalReason).toBe('budget');
  });

  it('should end when a page only repeats collected listings', async () => {
    const site = new FakeSite(() => wordpressPage(['villa-a', 'villa-b']));
    const result = await createPaginator(site, marjorietomeAdapter, 5).crawl(SEARCH_URL);

    expect(result.items.map(item => item.id)).toEqual(['villa-a', 'villa-b']);
    expect(result.pages).toBe(2);
    expect(result.terminalReason).toBe('exhausted');
  });

  it('should report a first page without listings', async () => {
    const site = new FakeSite(() => html('<p>Aucun bien</p>'));
    const result = await createPaginator(site, marjorietomeAdapter, 5).crawl(SEARCH_URL);

    expect(result.items).toEqual([]);
    expect(result.terminalReason).toBe('first-page-miss');
  });

  it('should fall back through the site variants of a page', async () => {
    const canonical = 'https://www.immoweb.be/fr/recherche/maison/a-vendre?orderBy=newest';
    const site = new FakeSite(url => {
      if (url.searchParams.get('orderBy') !== 'most_recent') return err({ kind: 'http', status: 403, message: 'HTTP 403' });
      return html('<div><a href="https://www.immoweb.be/fr/annonce/maison/a-vendre/liege/4000/11223344">Maison</a></div>');
    });

    const result = await createPaginator(site, immowebAdapter, 1).crawl(canonical);

    expect(result.items.map(item => item.id)).toEqual(['11223344']);
    expect(site.requests.map(request => request.url)).toEqual([
      'https://www.immoweb.be/fr/recherche/maison/a-vendre?orderBy=newest&page=1',
      'https://www.immoweb.be/fr/recherche-avancee/maison/a-vendre?orderBy=newest&page=1',
      'https://www.immoweb.be/fr/recherche/maison/a-vendre?orderBy=most_recent&page=1',
    ]);
    expect(site.requests[2].referer).toBe('https://www.immoweb.be/fr/recherche/maison/a-vendre?orderBy=most_recent');
  });
});
