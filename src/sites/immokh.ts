import { load } from 'cheerio';
import { absoluteUrl } from '../extractors/base.js';
import { IMMOKH_ORIGIN, immokhExtractor } from '../extractors/immokh.js';
import type { HttpRequest } from '../http/client.js';
import type { TransportVariant } from '../types.js';
import type { CursorEndpoint, CursorParams, SiteAdapter, SiteProfile } from './types.js';

export const IMMOKH_LIST_PATH = '/fr/2/chercher-bien/a-vendre';
export const IMMOKH_LIST_URL = `${IMMOKH_ORIGIN}${IMMOKH_LIST_PATH}`;

const INFINITE_SCROLL_SELECTOR = "div.infinite-scroll a[href*='/fr/List/InfiniteScroll']";
const NEWEST_SORT = 5;

const AJAX_HEADERS: Record<string, string> = {
  'X-Requested-With': 'XMLHttpRequest',
  'Accept': 'text/html, */*; q=0.01',
};

type ScrollPayload = Record<string, unknown>;

function isPayload(value: unknown): value is ScrollPayload {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parsePayload(raw: string): ScrollPayload | null {
  for (const candidate of [raw, safeDecode(raw)]) {
    if (candidate === null) continue;
    try {
      const parsed: unknown = JSON.parse(candidate);
      if (isPayload(parsed)) return parsed;
    } catch {
      continue;
    }
  }
  return null;
}

function safeDecode(raw: string): string | null {
  try {
    return decodeURIComponent(raw);
  } catch {
    return null;
  }
}

/**
 * The list page's InfiniteScroll endpoint. Its `json` query parameter holds
 * the search payload; each request re-encodes it with cursor fields.
 */
export class InfiniteScrollEndpoint implements CursorEndpoint {
  readonly url: string;

  constructor(
    private readonly basePayload: ScrollPayload,
    endpointUrl: string,
    private readonly referer: string,
  ) {
    this.url = endpointUrl;
  }

  static fromHref(href: string, referer: string): InfiniteScrollEndpoint | null {
    let parsed: URL;
    try {
      parsed = new URL(href);
    } catch {
      return null;
    }
    const raw = parsed.searchParams.get('json');
    const payload = raw === null ? {} : parsePayload(raw);
    if (!payload) return null;
    return new InfiniteScrollEndpoint(payload, `${parsed.origin}${parsed.pathname}`, referer);
  }

  payloadFor(params: CursorParams): ScrollPayload {
    const payload: ScrollPayload = {
      ...this.basePayload,
      SortParameter: params.sortMode,
      MaxItemsPerPage: params.pageSize,
      FirstPage: params.isFirstPage,
      CanGetNextPage: params.canAdvance,
    };

    if (params.isFirstPage) {
      payload.PageNumber = 0;
      payload.BaseEstateID = typeof this.basePayload.BaseEstateID === 'number' ? this.basePayload.BaseEstateID : 0;
    } else {
      delete payload.PageNumber;
      payload.BaseEstateID = params.cursorId ?? 0;
    }
    return payload;
  }

  buildRequest(params: CursorParams, transport: TransportVariant): HttpRequest {
    const json = JSON.stringify(this.payloadFor(params));

    if (transport === 'query') {
      const url = new URL(this.url);
      url.searchParams.set('json', json);
      return { method: 'GET', url: url.toString(), headers: AJAX_HEADERS, referer: this.referer };
    }

    return { method: 'POST', url: this.url, headers: AJAX_HEADERS, referer: this.referer, form: { json } };
  }
}

export function locateInfiniteScroll(listHtml: string, listUrl: string): InfiniteScrollEndpoint | null {
  const $ = load(listHtml);
  const href = $(INFINITE_SCROLL_SELECTOR).first().attr('href');
  if (!href) return null;
  const absolute = absoluteUrl(href, IMMOKH_ORIGIN);
  return absolute ? InfiniteScrollEndpoint.fromHref(absolute, listUrl) : null;
}

export const immokhProfile: SiteProfile = {
  id: 'immokh',
  label: 'Immo-KH',
  hosts: ['www.immo-kh.be', 'immo-kh.be'],
  defaultUrl: IMMOKH_LIST_URL,
  fixedPath: IMMOKH_LIST_PATH,
  pathAliases: [],
  paginationParams: ['page'],
  defaultMode: 'cursor',
};

export const immokhAdapter: SiteAdapter = {
  profile: immokhProfile,
  extractor: immokhExtractor,
  cursor: {
    sortMode: NEWEST_SORT,
    locateEndpoint: locateInfiniteScroll,
  },
  scroll: {
    itemSelector: 'a.estate-card[href*="/fr/bien/"]',
    loadMoreSelector: INFINITE_SCROLL_SELECTOR,
    responseUrlPart: '/List/InfiniteScroll',
  },
};
