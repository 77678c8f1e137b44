import { isListingPayload } from '../extractors/base.js';
import { sleep, type HttpTransport } from '../http/client.js';
import { createLogger, type Logger } from '../logger.js';
import type { SiteAdapter } from '../sites/types.js';
import type { ListingItem } from '../types.js';

export type PagedTerminalReason = 'exhausted' | 'budget' | 'first-page-miss';

export interface PagedCrawlResult {
  items: ListingItem[];
  pages: number;
  terminalReason: PagedTerminalReason;
}

export interface PagedPaginatorOptions {
  http: HttpTransport;
  adapter: SiteAdapter;
  maxPages: number;
  politeDelayMs: number;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

/**
 * Page-number pagination. Each page tries the site's URL variants in order;
 * a page where every variant misses, or that only repeats listings already
 * collected, ends the crawl.
 */
export class PagedPaginator {
  private options: PagedPaginatorOptions;
  private sleep: (ms: number) => Promise<void>;
  private logger: Logger;

  constructor(options: PagedPaginatorOptions) {
    this.options = options;
    this.sleep = options.sleep ?? sleep;
    this.logger = options.logger ?? createLogger('Paged');
  }

  async crawl(canonicalUrl: string): Promise<PagedCrawlResult> {
    const { adapter } = this.options;
    const maxPages = Math.max(1, this.options.maxPages);
    const items: ListingItem[] = [];
    const seen = new Set<string>();

    for (let page = 1; page <= maxPages; page++) {
      if (page > 1) await this.sleep(this.options.politeDelayMs);

      const pageItems = await this.fetchPage(canonicalUrl, page);
      const fresh = pageItems.filter(item => !seen.has(item.id));

      if (fresh.length === 0) {
        if (page === 1) {
          this.logger.warn(`${adapter.profile.label}: no listings on page 1`);
          return { items, pages: page, terminalReason: 'first-page-miss' };
        }
        this.logger.info(`PAGE_MISS page ${page}: no new listings, pagination complete`);
        return { items, pages: page, terminalReason: 'exhausted' };
      }

      for (const item of fresh) {
        seen.add(item.id);
        items.push(item);
      }
      this.logger.info(`Page ${page}: +${fresh.length} (total=${items.length})`);
    }

    this.logger.info(`BUDGET_EXHAUSTED after ${maxPages} pages (${items.length} listings)`);
    return { items, pages: maxPages, terminalReason: 'budget' };
  }

  private async fetchPage(canonicalUrl: string, page: number): Promise<ListingItem[]> {
    const { adapter, http } = this.options;
    const variants = adapter.pageVariants?.(canonicalUrl, page) ?? [];

    for (const variant of variants) {
      const response = await http.send({ method: 'GET', url: variant.url, referer: variant.referer });
      if (!response.ok) {
        this.logger.debug(`TRANSPORT_MISS variant ${variant.name}: ${response.error.message}`);
        continue;
      }
      if (!isListingPayload(response.value.body, adapter.extractor)) {
        this.logger.debug(`TRANSPORT_MISS variant ${variant.name}: no listing markers`);
        continue;
      }

      const extracted = adapter.extractor.extract(response.value.body);
      if (extracted.length) {
        this.logger.debug(`Page ${page} via ${variant.name}: ${extracted.length} listings`);
        return extracted;
      }
    }
    return [];
  }
}
