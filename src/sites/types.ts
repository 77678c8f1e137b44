import type { Extractor } from '../extractors/base.js';
import type { HttpRequest } from '../http/client.js';
import type { CrawlMode, SiteId, TransportVariant } from '../types.js';

export interface SortRule {
  param: string;
  value: string;
  /** Other accepted sort values, tried as fallbacks when fetching. */
  alternates: string[];
}

export interface SiteProfile {
  id: SiteId;
  label: string;
  /** Accepted hosts; the first one is canonical. */
  hosts: string[];
  defaultUrl?: string;
  /** Every target of the site lives on this path; the query is dropped. */
  fixedPath?: string;
  pathAliases: Array<[from: string, to: string]>;
  paginationParams: string[];
  sort?: SortRule;
  defaultMode: CrawlMode;
}

export interface PageVariant {
  name: string;
  url: string;
  referer: string;
}

/** Wire parameters of one cursor attempt. */
export interface CursorParams {
  sortMode: number;
  pageSize: number;
  cursorId: number | null;
  isFirstPage: boolean;
  canAdvance: boolean;
}

export interface CursorEndpoint {
  readonly url: string;
  buildRequest(params: CursorParams, transport: TransportVariant): HttpRequest;
}

export interface CursorSupport {
  sortMode: number;
  locateEndpoint(listHtml: string, listUrl: string): CursorEndpoint | null;
}

export interface ScrollSelectors {
  itemSelector: string;
  loadMoreSelector: string;
  /** Substring of the URL of the exchange a load-more click triggers. */
  responseUrlPart: string;
}

export interface SiteAdapter {
  profile: SiteProfile;
  extractor: Extractor;
  pageVariants?(canonicalUrl: string, page: number): PageVariant[];
  cursor?: CursorSupport;
  scroll?: ScrollSelectors;
}
