import { openScrollSession } from '../browser/playwright-surface.js';
import type { Config } from '../config.js';
import { CrawlError, InvalidTargetError, describeError, type ErrorCode } from '../errors.js';
import { hasItemMarker } from '../extractors/base.js';
import { applyFilters } from '../filters/filter-engine.js';
import { sleep, type HttpTransport } from '../http/client.js';
import { createLogger, type Logger } from '../logger.js';
import type { Notifier } from '../notify/notifier.js';
import { getSiteAdapter, type ScrollSelectors, type SiteAdapter } from '../sites/index.js';
import { AlertStateStore, stateFilePath, type DiffResult } from '../state/alert-store.js';
import { canonicalize } from '../targets/canonicalize.js';
import type { CrawlMode, CrawlTarget, CrawlTargetDescriptor, ListingItem, SiteId } from '../types.js';
import { CursorPaginator } from './cursor-paginator.js';
import { PagedPaginator } from './paged-paginator.js';
import { ScrollExhaustionDetector, cycleBudget, type ScrollSurface } from './scroll-detector.js';

export type TargetStatus = 'seeded' | 'notified' | 'unchanged' | 'empty' | 'invalid' | 'failed';

export interface TargetOutcome {
  label: string;
  siteId: string;
  identityKey: string | null;
  canonicalUrl: string | null;
  status: TargetStatus;
  mode: CrawlMode | null;
  terminalReason: string | null;
  collected: number;
  matched: number;
  newItems: ListingItem[];
  republished: number;
  error: { code: ErrorCode | null; message: string } | null;
  durationMs: number;
}

export interface BatchSummary {
  outcomes: TargetOutcome[];
  counts: Record<TargetStatus, number>;
  /** True when stopOnError cut the batch short. */
  stopped: boolean;
}

export interface BatchOptions {
  stopOnError?: boolean;
}

export interface ScrollSessionRequest {
  listUrl: string;
  selectors: ScrollSelectors;
}

export type ScrollSessionOpener = <T>(
  request: ScrollSessionRequest,
  work: (surface: ScrollSurface) => Promise<T>,
) => Promise<T>;

export interface CrawlOrchestratorOptions {
  config: Config;
  http: HttpTransport;
  notifier: Notifier;
  storeFor?: (siteId: SiteId) => AlertStateStore;
  openScroll?: ScrollSessionOpener;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
  logger?: Logger;
}

interface Collected {
  items: ListingItem[];
  mode: CrawlMode;
  terminalReason: string;
}

function emptyCounts(): Record<TargetStatus, number> {
  return { seeded: 0, notified: 0, unchanged: 0, empty: 0, invalid: 0, failed: 0 };
}

/**
 * Runs targets one after another: canonicalize, collect, filter, diff,
 * notify. A failure stays with its target, and a target that fails before
 * the diff leaves its state untouched.
 */
export class CrawlOrchestrator {
  private config: Config;
  private http: HttpTransport;
  private notifier: Notifier;
  private storeFor: (siteId: SiteId) => AlertStateStore;
  private openScroll: ScrollSessionOpener;
  private sleep: (ms: number) => Promise<void>;
  private logger: Logger;
  private stores = new Map<SiteId, AlertStateStore>();

  constructor(options: CrawlOrchestratorOptions) {
    this.config = options.config;
    this.http = options.http;
    this.notifier = options.notifier;
    this.sleep = options.sleep ?? sleep;
    this.logger = options.logger ?? createLogger('Crawl');

    const now = options.now;
    this.storeFor = options.storeFor ?? (siteId => this.defaultStore(siteId, now));
    this.openScroll = options.openScroll ?? ((request, work) =>
      openScrollSession(
        {
          listUrl: request.listUrl,
          selectors: request.selectors,
          config: this.config.scroll,
          userAgent: this.config.http.userAgent,
        },
        work,
      ));
  }

  private defaultStore(siteId: SiteId, now?: () => Date): AlertStateStore {
    let store = this.stores.get(siteId);
    if (!store) {
      store = new AlertStateStore({ filePath: stateFilePath(this.config.stateDir, siteId), now });
      this.stores.set(siteId, store);
    }
    return store;
  }

  async runBatch(descriptors: CrawlTargetDescriptor[], options: BatchOptions = {}): Promise<BatchSummary> {
    const outcomes: TargetOutcome[] = [];
    const counts = emptyCounts();
    let stopped = false;

    for (const [index, descriptor] of descriptors.entries()) {
      this.logger.info(`[${index + 1}/${descriptors.length}] ${descriptor.site} ${descriptor.url ?? '(default URL)'} → ${descriptor.email}`);
      const outcome = await this.runTarget(descriptor);
      outcomes.push(outcome);
      counts[outcome.status]++;

      if (options.stopOnError && (outcome.status === 'failed' || outcome.status === 'invalid')) {
        this.logger.warn(`Stopping batch after ${outcome.label} (${outcome.status})`);
        stopped = index < descriptors.length - 1;
        break;
      }
    }

    this.logger.info(
      `Batch done: ${Object.entries(counts).filter(([, n]) => n > 0).map(([status, n]) => `${status}=${n}`).join(' ') || 'nothing to run'}`,
    );
    return { outcomes, counts, stopped };
  }

  async runTarget(descriptor: CrawlTargetDescriptor): Promise<TargetOutcome> {
    const started = Date.now();
    const outcome: TargetOutcome = {
      label: descriptor.label ?? `${descriptor.site}:${descriptor.url ?? 'default'}`,
      siteId: descriptor.site,
      identityKey: null,
      canonicalUrl: null,
      status: 'failed',
      mode: null,
      terminalReason: null,
      collected: 0,
      matched: 0,
      newItems: [],
      republished: 0,
      error: null,
      durationMs: 0,
    };
    const finish = (status: TargetStatus): TargetOutcome => {
      outcome.status = status;
      outcome.durationMs = Date.now() - started;
      return outcome;
    };

    let target: CrawlTarget;
    let adapter: SiteAdapter;
    try {
      adapter = getSiteAdapter(descriptor.site);
      target = canonicalize(descriptor.site, descriptor.url, descriptor.filters ?? {}).target;
    } catch (error) {
      if (!(error instanceof InvalidTargetError)) {
        this.recordFailure(outcome, error);
        return finish('failed');
      }
      this.logger.error(`${outcome.label}: ${describeError(error)}`);
      outcome.error = { code: error.code, message: error.message };
      return finish('invalid');
    }
    outcome.identityKey = target.identityKey;
    outcome.canonicalUrl = target.canonicalUrl;
    this.logger.info(`${target.canonicalUrl} (key ${target.identityKey})`);

    let matched: ListingItem[];
    try {
      const collected = await this.collect(target, adapter, descriptor);
      outcome.mode = collected.mode;
      outcome.terminalReason = collected.terminalReason;
      outcome.collected = collected.items.length;

      if (collected.items.length === 0) {
        this.logger.warn(`${outcome.label}: no listings found, state left as is`);
        return finish('empty');
      }

      matched = applyFilters(collected.items, target.filterSet);
      outcome.matched = matched.length;
      this.logger.info(`${collected.items.length} listings collected, ${matched.length} match the filters`);
    } catch (error) {
      this.recordFailure(outcome, error);
      return finish('failed');
    }

    let diff: DiffResult;
    try {
      diff = this.storeFor(target.siteId).recordOrDiff(target.identityKey, descriptor.email, matched);
    } catch (error) {
      this.recordFailure(outcome, error);
      return finish('failed');
    }
    if (diff.isSeedEvent) {
      this.logger.info(`${outcome.label}: first run, ${matched.length} listings recorded without notification`);
      return finish('seeded');
    }

    outcome.newItems = diff.newItems;
    outcome.republished = diff.republished.length;
    if (diff.newItems.length === 0) {
      this.logger.info(`${outcome.label}: no new listings`);
      return finish('unchanged');
    }

    try {
      await this.notifier.notify(descriptor.email, target, diff.newItems);
    } catch (error) {
      this.recordFailure(outcome, error);
      return finish('failed');
    }
    this.logger.info(`${outcome.label}: ${diff.newItems.length} new listing(s) sent to ${descriptor.email}`);
    return finish('notified');
  }

  private recordFailure(outcome: TargetOutcome, error: unknown): void {
    this.logger.error(`${outcome.label} failed`, error);
    outcome.error = {
      code: error instanceof CrawlError ? error.code : null,
      message: describeError(error),
    };
  }

  private selectMode(adapter: SiteAdapter, descriptor: CrawlTargetDescriptor): CrawlMode {
    if (descriptor.useInteractiveMode) {
      if (adapter.scroll) return 'scroll';
      this.logger.warn(`${adapter.profile.label} has no interactive mode, using ${adapter.profile.defaultMode}`);
    }
    if (adapter.profile.defaultMode === 'cursor' && adapter.cursor) return 'cursor';
    return 'paged';
  }

  private async collect(target: CrawlTarget, adapter: SiteAdapter, descriptor: CrawlTargetDescriptor): Promise<Collected> {
    const pages = Math.max(1, descriptor.pages);
    const mode = this.selectMode(adapter, descriptor);

    switch (mode) {
      case 'scroll':
        return this.collectByScroll(target, adapter, pages);
      case 'cursor':
        return this.collectByCursor(target, adapter, pages);
      case 'paged': {
        const result = await new PagedPaginator({
          http: this.http,
          adapter,
          maxPages: pages,
          politeDelayMs: this.config.politeness.delayMs,
          sleep: this.sleep,
        }).crawl(target.canonicalUrl);
        return { items: result.items, mode, terminalReason: result.terminalReason };
      }
    }
  }

  private async collectByCursor(target: CrawlTarget, adapter: SiteAdapter, pages: number): Promise<Collected> {
    const cursor = adapter.cursor;
    if (!cursor) throw new CrawlError('INVALID_TARGET', `${adapter.profile.label} has no cursor endpoint`);

    const list = await this.http.send({ method: 'GET', url: target.canonicalUrl, referer: target.canonicalUrl });
    if (!list.ok) {
      throw new CrawlError('PAGE_MISS', `List page ${target.canonicalUrl} unavailable: ${list.error.message}`);
    }

    const endpoint = cursor.locateEndpoint(list.value.body, target.canonicalUrl);
    if (!endpoint) {
      this.logger.info('No load-more endpoint on the list page, using its listings only');
      return { items: adapter.extractor.extract(list.value.body), mode: 'cursor', terminalReason: 'no-endpoint' };
    }

    await this.sleep(this.config.politeness.delayMs);
    const result = await new CursorPaginator({
      http: this.http,
      extractor: adapter.extractor,
      sortMode: cursor.sortMode,
      pageSizes: this.config.cursor.pageSizes,
      transports: this.config.cursor.transports,
      maxSteps: pages,
      politeDelayMs: this.config.politeness.delayMs,
      sleep: this.sleep,
    }).crawl(endpoint);
    this.logger.info(`Cursor crawl: ${result.steps} steps, trail ${result.cursorTrail.join(' > ') || '-'}, ${result.terminalReason}`);
    return { items: result.items, mode: 'cursor', terminalReason: result.terminalReason };
  }

  private async collectByScroll(target: CrawlTarget, adapter: SiteAdapter, pages: number): Promise<Collected> {
    const selectors = adapter.scroll;
    if (!selectors) throw new CrawlError('INVALID_TARGET', `${adapter.profile.label} has no interactive mode`);

    const scroll = this.config.scroll;
    const detector = new ScrollExhaustionDetector({
      stableThreshold: scroll.stableThreshold,
      cycleBudget: cycleBudget(scroll.minCycles, pages),
      clickTimeoutMs: scroll.clickTimeoutMs,
      quietTimeoutMs: scroll.quietTimeoutMs,
      settleMs: scroll.settleMs,
      scrollRetries: scroll.scrollRetries,
      sweepRetries: scroll.sweepRetries,
      hasItems: payload => hasItemMarker(payload, adapter.extractor),
      sleep: this.sleep,
    });

    return this.openScroll({ listUrl: target.canonicalUrl, selectors }, async surface => {
      const result = await detector.run(surface);
      const items = adapter.extractor.extract(await surface.content());
      return { items, mode: 'scroll', terminalReason: result.terminalReason };
    });
  }
}
