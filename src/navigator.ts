import { buildBlockRules, classifyBlock, type BlockRule } from './block-detector';
import type { RetryPolicy, RunConfig } from './config';
import type { DebugCapturer, ScreenshotTarget } from './debug-capture';
import type { Logger } from './logger';
import { dismissCookieBanner, moveMouse, type InteractivePage } from './page-actions';
import { visibleText } from './text';
import { delay, type Sleep } from './timing';
import type { Navigation, PageOutcome, PageStatus } from './types';

/**
 * The slice of a Playwright `Page` the navigator drives. A real page
 * satisfies it structurally; tests hand in fakes.
 */
export interface ScrapePage extends ScreenshotTarget, InteractivePage {
  goto(
    url: string,
    options?: { timeout?: number; waitUntil?: 'load' | 'domcontentloaded' | 'networkidle' | 'commit' }
  ): Promise<{ status(): number } | null>;
  waitForSelector(selector: string, options?: { timeout?: number }): Promise<unknown>;
  content(): Promise<string>;
  title(): Promise<string>;
  url(): string;
  close(): Promise<void>;
}

export interface PageSource {
  newPage(): Promise<ScrapePage>;
}

export interface NavigatorOptions {
  maxRetries: number;
  navTimeoutMs: number;
  waitSelectorMs: number;
  readySelector: string;
  retry: RetryPolicy;
  dumpHtml: boolean;
  /** Mouse move before reading the page (ENABLE_STEALTH). */
  humanize: boolean;
  blockRules: readonly BlockRule[];
}

class AttemptTimeoutError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TimeoutError';
  }
}

export function isTimeoutError(error: unknown): boolean {
  return error instanceof Error && error.name === 'TimeoutError';
}

/** Wait before the next attempt after `attempt` (1-based) failed. */
export function backoffDelay(attempt: number, policy: RetryPolicy): number {
  const raw = policy.baseDelayMs * Math.pow(policy.factor, Math.max(0, attempt - 1));
  return Math.min(policy.maxDelayMs, Math.round(raw));
}

function errorMessage(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  return message.replace(/\s+/g, ' ').trim().slice(0, 200);
}

export function navigatorOptionsFromConfig(config: RunConfig): NavigatorOptions {
  return {
    maxRetries: config.maxRetries,
    navTimeoutMs: config.navTimeoutMs,
    waitSelectorMs: config.waitSelectorMs,
    readySelector: config.readySelector,
    retry: config.retry,
    dumpHtml: config.dumpHtml,
    humanize: config.enableStealth,
    blockRules: buildBlockRules(config.blockPatterns),
  };
}

export class Navigator {
  constructor(
    private source: PageSource,
    private options: NavigatorOptions,
    private capturer: DebugCapturer | null,
    private logger: Logger,
    private sleep: Sleep = delay
  ) {}

  /**
   * Loads `url` until it is OK, blocked, or out of attempts. BLOCK is never
   * retried; TIMEOUT and ERROR are retried with exponential backoff.
   */
  async navigate(url: string): Promise<Navigation> {
    const { maxRetries } = this.options;
    let last: Navigation | null = null;

    for (let attempt = 1; attempt <= maxRetries; attempt++) {
      last = await this.attempt(url, attempt);
      const { status } = last.outcome;

      if (status === 'OK' || status === 'BLOCK') {
        return last;
      }
      if (attempt < maxRetries) {
        const wait = backoffDelay(attempt, this.options.retry);
        this.logger.info(`Retrying ${url} in ${wait}ms`, { attempt, status });
        await this.sleep(wait);
      }
    }

    if (!last) {
      throw new Error('maxRetries must be at least 1');
    }
    return last;
  }

  private async attempt(url: string, attempt: number): Promise<Navigation> {
    const started = Date.now();
    let page: ScrapePage | null = null;
    let failure: unknown = null;
    let httpStatus: number | null = null;
    let finalUrl = url;
    let html = '';
    let title = '';

    try {
      page = await this.source.newPage();
      try {
        const response = await page.goto(url, { timeout: this.options.navTimeoutMs, waitUntil: 'domcontentloaded' });
        httpStatus = response ? response.status() : null;
        await this.waitUntilReady(page, started);
      } catch (error) {
        failure = error;
      }
      if (!failure) {
        await this.prepare(page);
      }
      const current = page.url();
      finalUrl = current && current !== 'about:blank' ? current : url;
      html = await this.read(page, 'content');
      title = await this.read(page, 'title');
    } catch (error) {
      failure = error;
    }

    const elapsedMs = Date.now() - started;
    const rule = classifyBlock(visibleText(html), title, this.options.blockRules);
    const status: PageStatus = rule ? 'BLOCK' : failure ? (isTimeoutError(failure) ? 'TIMEOUT' : 'ERROR') : 'OK';

    const outcome: PageOutcome = {
      url,
      finalUrl,
      status,
      attempt,
      elapsedMs,
      httpStatus,
      blockLabel: rule ? rule.label : null,
      error: rule ? `Blocked (${rule.label})` : failure ? errorMessage(failure) : null,
      htmlPath: null,
      screenshotPath: null,
    };

    try {
      const terminal = status === 'OK' || status === 'BLOCK' || attempt >= this.options.maxRetries;
      if (this.capturer && (this.options.dumpHtml || (terminal && status !== 'OK'))) {
        const artifacts = await this.capturer.capture(page, {
          url,
          status,
          attempt,
          html,
          terminal,
          forceHtml: this.options.dumpHtml,
        });
        outcome.htmlPath = artifacts.htmlPath;
        outcome.screenshotPath = artifacts.screenshotPath;
      }
    } finally {
      if (page) await this.closePage(page, url);
    }

    const log = status === 'OK' ? this.logger.info.bind(this.logger) : this.logger.warn.bind(this.logger);
    log(`${status === 'OK' ? '✓' : '✗'} attempt ${attempt}/${this.options.maxRetries} ${status} ${url}`, {
      attempt,
      status,
      elapsedMs,
      httpStatus,
      blockLabel: outcome.blockLabel,
      error: outcome.error,
    });

    return { outcome, html };
  }

  private async prepare(page: ScrapePage): Promise<void> {
    if (this.options.humanize) {
      await moveMouse(page, this.logger);
    }
    await dismissCookieBanner(page, this.logger);
  }

  private async waitUntilReady(page: ScrapePage, started: number): Promise<void> {
    const remaining = this.options.navTimeoutMs - (Date.now() - started);
    if (remaining <= 0) {
      throw new AttemptTimeoutError(`Navigation used the whole ${this.options.navTimeoutMs}ms budget`);
    }
    await page.waitForSelector(this.options.readySelector, {
      timeout: Math.min(this.options.waitSelectorMs, remaining),
    });
  }

  private async read(page: ScrapePage, what: 'content' | 'title'): Promise<string> {
    try {
      return what === 'content' ? await page.content() : await page.title();
    } catch (error) {
      this.logger.debug(`Could not read page ${what}`, { url: page.url(), error });
      return '';
    }
  }

  private async closePage(page: ScrapePage, url: string): Promise<void> {
    try {
      await page.close();
    } catch (error) {
      this.logger.debug('Page close failed', { url, error });
    }
  }
}
