import * as fs from 'fs/promises';
import {
  chromium,
  firefox,
  webkit,
  type Browser,
  type BrowserContext,
  type BrowserContextOptions,
  type BrowserType,
  type LaunchOptions,
  type Page,
} from 'playwright';
import { addExtra } from 'playwright-extra';
import StealthPlugin from 'puppeteer-extra-plugin-stealth';
import type { RunConfig } from './config';
import type { Logger } from './logger';
import type { PageSource } from './navigator';
import { dismissCookieBanner } from './page-actions';
import { buildStealthPlan, type StealthPlan } from './stealth';
import type { BrowserKind } from './types';

const ENGINES: Record<BrowserKind, BrowserType> = { chromium, firefox, webkit };

const BLOCKED_RESOURCES = new Set(['image', 'media', 'font']);

export type Launcher = Pick<BrowserType, 'launch' | 'launchPersistentContext'>;

/** Picks the engine once per run; chromium goes through playwright-extra when the plan asks for it. */
export function resolveLauncher(kind: BrowserKind, plan: StealthPlan): Launcher {
  const engine = ENGINES[kind];
  if (!plan.usePlugin) return engine;
  return addExtra(engine).use(StealthPlugin());
}

export function launchOptions(config: RunConfig, plan: StealthPlan): LaunchOptions {
  return {
    headless: config.headless,
    slowMo: config.slowMoMs > 0 ? config.slowMoMs : undefined,
    args: plan.launchArgs,
    ignoreDefaultArgs: plan.ignoreDefaultArgs.length > 0 ? plan.ignoreDefaultArgs : undefined,
  };
}

export function contextOptions(config: RunConfig): BrowserContextOptions {
  return {
    userAgent: config.userAgent,
    locale: config.locale,
    timezoneId: config.timezone,
    viewport: { width: 1366, height: 768 },
    javaScriptEnabled: true,
  };
}

export class BrowserSession implements PageSource {
  private closed = false;

  private constructor(
    private context: BrowserContext,
    private browser: Browser | null,
    private logger: Logger
  ) {}

  static async open(config: RunConfig, logger: Logger): Promise<BrowserSession> {
    const log = logger.child({ name: 'session' });
    const plan = buildStealthPlan(config);
    const launcher = resolveLauncher(config.browser, plan);

    log.info(`Launching ${config.browser}`, {
      headless: config.headless,
      persistent: config.persistentContext,
      stealth: config.enableStealth,
      automationFlagsDisabled: plan.launchArgs.length > 0,
    });

    let browser: Browser | null = null;
    let context: BrowserContext;
    if (config.persistentContext) {
      await fs.mkdir(config.persistentContextDir, { recursive: true });
      context = await launcher.launchPersistentContext(config.persistentContextDir, {
        ...launchOptions(config, plan),
        ...contextOptions(config),
      });
    } else {
      browser = await launcher.launch(launchOptions(config, plan));
      context = await browser.newContext(contextOptions(config));
    }

    const session = new BrowserSession(context, browser, log);
    try {
      await session.configure(config, plan);
    } catch (error) {
      await session.close();
      throw error;
    }
    return session;
  }

  private async configure(config: RunConfig, plan: StealthPlan): Promise<void> {
    this.context.setDefaultTimeout(config.waitSelectorMs);
    this.context.setDefaultNavigationTimeout(config.navTimeoutMs);
    await this.context.setExtraHTTPHeaders({ 'Accept-Language': config.locale, ...config.extraHeaders });

    if (plan.initScript) {
      await this.context.addInitScript({ content: plan.initScript });
    }
    if (config.blockImages) {
      await this.context.route('**/*', route =>
        BLOCKED_RESOURCES.has(route.request().resourceType()) ? route.abort() : route.continue()
      );
    }
  }

  async newPage(): Promise<Page> {
    if (this.closed) {
      throw new Error('Browser session is closed');
    }
    return this.context.newPage();
  }

  /** Visits `url` once to pick up cookies. Failures are logged and ignored. */
  async warmup(url: string): Promise<void> {
    let page: Page | null = null;
    try {
      page = await this.newPage();
      await page.goto(url, { waitUntil: 'domcontentloaded' });
      await page.waitForTimeout(1000);
      await dismissCookieBanner(page, this.logger);
      this.logger.info(`Warmup done: ${url}`);
    } catch (error) {
      this.logger.warn(`Warmup failed: ${url}`, error);
    } finally {
      if (page) await page.close().catch(error => this.logger.debug('Warmup page close failed', error));
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    try {
      await this.context.close();
    } catch (error) {
      this.logger.warn('Context close failed', error);
    }
    if (this.browser) {
      try {
        await this.browser.close();
      } catch (error) {
        this.logger.warn('Browser close failed', error);
      }
    }
    this.logger.info('Browser session closed');
  }

  get isClosed(): boolean {
    return this.closed;
  }
}

export interface ClosableSession {
  close(): Promise<void>;
}

/** Opens a session, hands it to `work`, and closes it on every exit path. */
export async function withSession<S extends ClosableSession, T>(
  open: () => Promise<S>,
  work: (session: S) => Promise<T>
): Promise<T> {
  const session = await open();
  try {
    return await work(session);
  } finally {
    await session.close();
  }
}
