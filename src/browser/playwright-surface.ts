import { chromium, errors, type BrowserContext, type Page } from 'playwright';
import type { ScrollConfig } from '../config.js';
import type { LoadMoreOutcome, ScrollSurface } from '../crawler/scroll-detector.js';
import { sleep } from '../http/client.js';
import { createLogger, type Logger } from '../logger.js';
import type { ScrollSelectors } from '../sites/types.js';

const NOT_CLICKED: LoadMoreOutcome = { clicked: false, payload: null };
const VISIBLE_TIMEOUT_MS = 2000;
const NAVIGATION_TIMEOUT_MS = 60000;

function isTimeout(error: unknown): boolean {
  return error instanceof errors.TimeoutError;
}

/**
 * ScrollSurface over a live Chromium page. Page-side checks are passed as
 * expression strings so they run in the browser untouched.
 */
export class PlaywrightScrollSurface implements ScrollSurface {
  constructor(
    private readonly page: Page,
    private readonly selectors: ScrollSelectors,
    private readonly logger: Logger,
  ) {}

  async clickLoadMore(timeoutMs: number): Promise<LoadMoreOutcome> {
    const locator = this.page.locator(this.selectors.loadMoreSelector).first();
    if ((await locator.count()) === 0) return NOT_CLICKED;

    try {
      await locator.waitFor({ state: 'visible', timeout: VISIBLE_TIMEOUT_MS });
    } catch (error) {
      if (isTimeout(error)) return NOT_CLICKED;
      throw error;
    }

    const urlPart = this.selectors.responseUrlPart;
    try {
      const [response] = await Promise.all([
        this.page.waitForResponse(res => res.url().includes(urlPart) && res.ok(), { timeout: timeoutMs }),
        locator.click(),
      ]);
      return { clicked: true, payload: await response.text() };
    } catch (error) {
      if (!isTimeout(error)) throw error;
      this.logger.debug(`No ${urlPart} response within ${timeoutMs}ms`);
      return { clicked: true, payload: null };
    }
  }

  async hasLoadMore(): Promise<boolean> {
    const selector = JSON.stringify(this.selectors.loadMoreSelector);
    const visible: unknown = await this.page.evaluate(`(() => {
      const el = document.querySelector(${selector});
      if (!el) return false;
      const rect = el.getBoundingClientRect();
      const style = window.getComputedStyle(el);
      return !!(rect.width || rect.height) && style.display !== 'none'
        && style.visibility !== 'hidden' && !el.classList.contains('disabled');
    })()`);
    return visible === true;
  }

  async scrollToEnd(): Promise<void> {
    await this.page.evaluate('window.scrollTo(0, document.body.scrollHeight)');
  }

  async waitForQuiet(timeoutMs: number): Promise<void> {
    try {
      await this.page.waitForLoadState('networkidle', { timeout: timeoutMs });
    } catch (error) {
      if (!isTimeout(error)) throw error;
    }
  }

  async countItems(): Promise<number> {
    return this.evaluateNumber(`document.querySelectorAll(${JSON.stringify(this.selectors.itemSelector)}).length`);
  }

  async scrollHeight(): Promise<number> {
    return this.evaluateNumber('document.body.scrollHeight');
  }

  async content(): Promise<string> {
    return this.page.content();
  }

  private async evaluateNumber(expression: string): Promise<number> {
    const value: unknown = await this.page.evaluate(expression);
    return typeof value === 'number' ? value : 0;
  }
}

export interface ScrollSessionOptions {
  listUrl: string;
  selectors: ScrollSelectors;
  config: ScrollConfig;
  userAgent: string;
  logger?: Logger;
}

async function addStealthMeasures(context: BrowserContext): Promise<void> {
  await context.addInitScript(`
    Object.defineProperty(navigator, 'webdriver', { get: () => undefined });
    Object.defineProperty(navigator, 'languages', { get: () => ['fr-BE', 'fr', 'en'] });
    window.chrome = { runtime: {} };
  `);
}

/**
 * Opens the list page in Chromium, hands the surface to `work`, and closes
 * the browser whatever happens.
 */
export async function openScrollSession<T>(
  options: ScrollSessionOptions,
  work: (surface: PlaywrightScrollSurface) => Promise<T>,
): Promise<T> {
  const logger = options.logger ?? createLogger('Browser');
  const browser = await chromium.launch({
    headless: options.config.headless,
    slowMo: options.config.slowMo,
    args: ['--disable-blink-features=AutomationControlled'],
  });

  try {
    const context = await browser.newContext({
      userAgent: options.userAgent,
      viewport: { width: 1280, height: 900 },
      locale: 'fr-BE',
      timezoneId: 'Europe/Brussels',
    });
    await addStealthMeasures(context);

    const page = await context.newPage();
    logger.info(`Opening ${options.listUrl}`);
    await page.goto(options.listUrl, { waitUntil: 'networkidle', timeout: NAVIGATION_TIMEOUT_MS });

    // Nudge lazy loaders before the first measurement
    await page.evaluate('window.scrollTo(0, document.body.scrollHeight / 3)');
    await sleep(300);
    await page.evaluate('window.scrollTo(0, 0)');

    return await work(new PlaywrightScrollSurface(page, options.selectors, logger));
  } finally {
    await browser.close();
  }
}
