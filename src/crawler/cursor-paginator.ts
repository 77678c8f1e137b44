import { isListingPayload, type Extractor } from '../extractors/base.js';
import { sleep, type HttpTransport } from '../http/client.js';
import { createLogger, type Logger } from '../logger.js';
import type { CursorEndpoint, CursorParams } from '../sites/types.js';
import type { ListingItem, PageFetchResult, TransportVariant } from '../types.js';

export type CursorTerminalReason = 'exhausted' | 'budget' | 'no-cursor' | 'first-page-miss';

export interface CursorState {
  cursorId: number | null;
  pageIndex: number;
  seenIds: Set<string>;
  budgetRemaining: number;
}

export interface CursorStep extends PageFetchResult {
  terminalReason: CursorTerminalReason | null;
}

export interface CursorCrawlResult {
  items: ListingItem[];
  steps: number;
  /** Cursor after each successful step; strictly decreasing. */
  cursorTrail: number[];
  terminalReason: CursorTerminalReason;
}

export interface CursorPaginatorOptions {
  http: HttpTransport;
  extractor: Extractor;
  sortMode: number;
  pageSizes: number[];
  transports: TransportVariant[];
  maxSteps: number;
  politeDelayMs: number;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

interface Attempt {
  pageSize: number;
  transport: TransportVariant;
}

export function numericId(id: string): number | null {
  if (!/^\d+$/.test(id)) return null;
  const value = Number(id);
  return Number.isSafeInteger(value) ? value : null;
}

function minNumericId(items: ListingItem[]): number | null {
  let min: number | null = null;
  for (const item of items) {
    const value = numericId(item.id);
    if (value !== null && (min === null || value < min)) min = value;
  }
  return min;
}

/**
 * Walks a catalog backwards by listing id. Each step asks for items older
 * than the current cursor, trying every page size and transport in order;
 * a step counts only when it yields ids below the cursor that were not seen
 * yet. Stops when a whole step misses or the step budget is spent.
 */
export class CursorPaginator {
  private options: CursorPaginatorOptions;
  private attempts: Attempt[];
  private sleep: (ms: number) => Promise<void>;
  private logger: Logger;

  constructor(options: CursorPaginatorOptions) {
    this.options = options;
    this.attempts = options.pageSizes.flatMap(pageSize =>
      options.transports.map(transport => ({ pageSize, transport })));
    this.sleep = options.sleep ?? sleep;
    this.logger = options.logger ?? createLogger('Cursor');
  }

  initialState(): CursorState {
    return {
      cursorId: null,
      pageIndex: 0,
      seenIds: new Set(),
      budgetRemaining: Math.max(1, this.options.maxSteps),
    };
  }

  async crawl(endpoint: CursorEndpoint): Promise<CursorCrawlResult> {
    const state = this.initialState();
    const items: ListingItem[] = [];
    const cursorTrail: number[] = [];
    let steps = 0;

    while (state.budgetRemaining > 0) {
      if (steps > 0) await this.sleep(this.options.politeDelayMs);

      const result = await this.step(endpoint, state);
      steps++;
      items.push(...result.items);
      if (result.terminalReason) {
        return { items, steps, cursorTrail, terminalReason: result.terminalReason };
      }
      if (state.cursorId !== null) cursorTrail.push(state.cursorId);
    }

    this.logger.info(`BUDGET_EXHAUSTED after ${steps} steps (${items.length} listings, cursor=${state.cursorId})`);
    return { items, steps, cursorTrail, terminalReason: 'budget' };
  }

  /**
   * One page step. On success the state's cursor, seen set and budget move;
   * on a miss only the budget does.
   */
  async step(endpoint: CursorEndpoint, state: CursorState): Promise<CursorStep> {
    const isFirstPage = state.cursorId === null;
    state.pageIndex++;
    state.budgetRemaining--;

    for (const attempt of this.attempts) {
      const params: CursorParams = {
        sortMode: this.options.sortMode,
        pageSize: attempt.pageSize,
        cursorId: state.cursorId === null ? null : state.cursorId - 1,
        isFirstPage,
        canAdvance: !isFirstPage,
      };
      const label = `p${state.pageIndex} size=${attempt.pageSize} ${attempt.transport}`;

      const response = await this.options.http.send(endpoint.buildRequest(params, attempt.transport));
      if (!response.ok) {
        this.logger.debug(`TRANSPORT_MISS ${label}: ${response.error.message}`);
        continue;
      }
      if (!isListingPayload(response.value.body, this.options.extractor)) {
        this.logger.debug(`TRANSPORT_MISS ${label}: no listing markers`);
        continue;
      }

      const extracted = this.options.extractor.extract(response.value.body);
      const accepted = isFirstPage ? this.acceptFirstPage(extracted, state) : this.acceptNextPage(extracted, state);
      if (!accepted) {
        this.logger.debug(`TRANSPORT_MISS ${label}: nothing below cursor ${state.cursorId}`);
        continue;
      }

      this.logger.info(`${label} → +${accepted.length} (cursor=${state.cursorId ?? 'none'})`);
      const terminalReason = state.cursorId === null ? 'no-cursor' : null;
      if (terminalReason) this.logger.info(`First page carries no numeric ids; cannot continue by cursor`);
      return { items: accepted, transportUsed: attempt.transport, terminal: terminalReason !== null, terminalReason };
    }

    this.logger.info(`PAGE_MISS p${state.pageIndex}: every attempt missed, pagination complete`);
    return {
      items: [],
      transportUsed: null,
      terminal: true,
      terminalReason: isFirstPage ? 'first-page-miss' : 'exhausted',
    };
  }

  private acceptFirstPage(extracted: ListingItem[], state: CursorState): ListingItem[] | null {
    const fresh = extracted.filter(item => !state.seenIds.has(item.id));
    if (fresh.length === 0) return null;

    for (const item of fresh) state.seenIds.add(item.id);
    state.cursorId = minNumericId(fresh);
    return fresh;
  }

  private acceptNextPage(extracted: ListingItem[], state: CursorState): ListingItem[] | null {
    const cursor = state.cursorId;
    if (cursor === null) return null;

    const advancing = extracted.filter(item => {
      const value = numericId(item.id);
      return value !== null && value < cursor && !state.seenIds.has(item.id);
    });
    if (advancing.length === 0) return null;

    // Ids without a number never move the cursor but are kept.
    const unnumbered = extracted.filter(item => numericId(item.id) === null && !state.seenIds.has(item.id));
    const accepted = extracted.filter(item => advancing.includes(item) || unnumbered.includes(item));

    for (const item of accepted) state.seenIds.add(item.id);
    state.cursorId = minNumericId(advancing);
    return accepted;
  }
}
