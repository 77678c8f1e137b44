import { sleep } from '../http/client.js';
import { createLogger, type Logger } from '../logger.js';

export interface LoadMoreOutcome {
  clicked: boolean;
  /** Body of the exchange the click triggered, or null when none was observed in time. */
  payload: string | null;
}

/**
 * What the detector needs from a rendered page. Implementations bound
 * every wait and report "nothing happened" instead of throwing on timeouts.
 */
export interface ScrollSurface {
  clickLoadMore(timeoutMs: number): Promise<LoadMoreOutcome>;
  hasLoadMore(): Promise<boolean>;
  scrollToEnd(): Promise<void>;
  waitForQuiet(timeoutMs: number): Promise<void>;
  countItems(): Promise<number>;
  scrollHeight(): Promise<number>;
  content(): Promise<string>;
}

export type ScrollPhase = 'progressing' | 'stable' | 'terminal';

export interface ScrollDetectionResult {
  cycles: number;
  phase: ScrollPhase;
  terminalReason: 'stable' | 'budget';
  backendExhausted: boolean;
  itemCount: number;
  sweeps: number;
}

export interface ScrollDetectorOptions {
  stableThreshold: number;
  cycleBudget: number;
  clickTimeoutMs: number;
  quietTimeoutMs: number;
  settleMs: number;
  scrollRetries: number;
  sweepRetries: number;
  /** True when a load-more response still carries listings. */
  hasItems(payload: string): boolean;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

export function cycleBudget(minCycles: number, pages: number): number {
  return Math.max(minCycles, pages);
}

interface Signals {
  count: number;
  height: number;
}

/**
 * Drives a "load more" page until it can show nothing else is coming:
 * a run of cycles without growth, no load-more control left, and a final
 * sweep that adds nothing.
 */
export class ScrollExhaustionDetector {
  private options: ScrollDetectorOptions;
  private sleep: (ms: number) => Promise<void>;
  private logger: Logger;

  constructor(options: ScrollDetectorOptions) {
    this.options = options;
    this.sleep = options.sleep ?? sleep;
    this.logger = options.logger ?? createLogger('Scroll');
  }

  async run(surface: ScrollSurface): Promise<ScrollDetectionResult> {
    const { stableThreshold, cycleBudget: budget } = this.options;
    let last = await this.measure(surface);
    let phase: ScrollPhase = 'progressing';
    let stableCycles = 0;
    let backendExhausted = false;
    let sweeps = 0;
    let cycles = 0;

    while (cycles < budget) {
      cycles++;

      const outcome = await surface.clickLoadMore(this.options.clickTimeoutMs);
      if (outcome.payload !== null && !this.options.hasItems(outcome.payload)) {
        if (!backendExhausted) this.logger.info('Load-more response carried no listings; backend looks exhausted');
        backendExhausted = true;
      }

      await this.scrollDown(surface, this.options.scrollRetries);
      const current = await this.measure(surface);

      if (grew(last, current)) {
        last = current;
        stableCycles = 0;
        phase = 'progressing';
        continue;
      }

      stableCycles++;
      phase = 'stable';
      const loadMore = await surface.hasLoadMore();
      const threshold = backendExhausted ? 1 : stableThreshold;
      this.logger.info(
        `No progress (${stableCycles}/${threshold}) items=${current.count} height=${current.height} load_more=${loadMore ? 'yes' : 'no'}`,
      );

      if (stableCycles >= threshold && !loadMore) {
        sweeps++;
        await this.scrollDown(surface, this.options.sweepRetries);
        const swept = await this.measure(surface);

        if (grew(current, swept)) {
          this.logger.info(`Final sweep found ${swept.count - current.count} more items; resuming`);
          last = swept;
          stableCycles = 0;
          phase = 'progressing';
          continue;
        }

        this.logger.info(
          `Scroll exhausted: items=${swept.count} load_more=no backend_empty=${backendExhausted ? 'yes' : 'no'}`,
        );
        return { cycles, phase: 'terminal', terminalReason: 'stable', backendExhausted, itemCount: swept.count, sweeps };
      }

      await this.sleep(this.options.settleMs);
    }

    this.logger.info(`BUDGET_EXHAUSTED after ${cycles} cycles (phase was ${phase}, items=${last.count})`);
    const final = await this.measure(surface);
    return { cycles, phase: 'terminal', terminalReason: 'budget', backendExhausted, itemCount: final.count, sweeps };
  }

  private async scrollDown(surface: ScrollSurface, times: number): Promise<void> {
    for (let i = 0; i < times; i++) {
      await surface.scrollToEnd();
      await surface.waitForQuiet(this.options.quietTimeoutMs);
      await this.sleep(this.options.settleMs);
    }
  }

  private async measure(surface: ScrollSurface): Promise<Signals> {
    return { count: await surface.countItems(), height: await surface.scrollHeight() };
  }
}

function grew(before: Signals, after: Signals): boolean {
  return after.count > before.count || after.height > before.height;
}
