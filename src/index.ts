#!/usr/bin/env node
import * as path from 'path';
import dotenv from 'dotenv';
import { BrowserSession, withSession, type ClosableSession } from './browser-session';
import { ConfigError, loadConfig, type RunConfig } from './config';
import { DebugCapturer } from './debug-capture';
import { DataExporter, toRows, type ExportPaths } from './exporter';
import { Logger } from './logger';
import { Navigator, navigatorOptionsFromConfig, type PageSource } from './navigator';
import { Notifier } from './notifier';
import { ProductScraper } from './scraper';
import type { RunResult } from './types';
import { capUrls, readUrlFile } from './url-list';

export interface RunOutput {
  result: RunResult;
  paths: ExportPaths;
  emailed: boolean;
}

export type RunSession = PageSource & ClosableSession & { warmup?(url: string): Promise<void> };

export interface RunDependencies {
  openSession?: () => Promise<RunSession>;
  notifier?: Notifier;
}

async function loadPdpUrls(config: RunConfig, logger: Logger): Promise<string[]> {
  const urls = await readUrlFile(config.urlsFile);
  if (urls === null) {
    logger.error(`URLs file not found: ${config.urlsFile}`);
    return [];
  }
  const capped = capUrls(urls, config.maxUrls);
  logger.info(`Loaded ${capped.length} URLs`, { file: config.urlsFile, total: urls.length, maxUrls: config.maxUrls });
  return capped;
}

/**
 * One full run: browser session → PDP or PLP loop → export → email.
 * The session is closed before anything is exported.
 */
export async function runScraper(config: RunConfig, logger: Logger, deps: RunDependencies = {}): Promise<RunOutput> {
  const debugDir = path.join(config.outputDir, 'debug');
  const urls = config.mode === 'pdp' ? await loadPdpUrls(config, logger) : [];
  if (config.mode === 'plp') {
    logger.info(`PLP URL: ${config.plpUrl}`);
  }

  const openSession: () => Promise<RunSession> = deps.openSession ?? (() => BrowserSession.open(config, logger));
  const result = await withSession(openSession, async session => {
    if (config.warmupUrl && session.warmup) {
      await session.warmup(config.warmupUrl);
    }
    const capturer = new DebugCapturer(
      { directory: debugDir, saveHtml: config.debugSaveHtml, saveScreenshot: config.debugSaveScreenshot },
      logger.child({ name: 'debug' })
    );
    const navigator = new Navigator(session, navigatorOptionsFromConfig(config), capturer, logger.child({ name: 'navigator' }));
    const scraper = new ProductScraper(navigator, config, logger);

    return config.mode === 'pdp' ? scraper.scrapeProducts(urls) : scraper.scrapeListing(config.plpUrl);
  });

  const exporter = new DataExporter(config.outputDir, logger.child({ name: 'exporter' }));
  const paths = await exporter.exportAll(result);

  const notifier = deps.notifier ?? new Notifier(config.email, logger.child({ name: 'notifier' }));
  const attachments = [paths.xlsx, paths.csv, logger.logFile(), paths.summary].filter(
    (file): file is string => file !== null
  );
  const emailed = await notifier.notify(result.summary, toRows(result).length, attachments);

  return { result, paths, emailed };
}

/** CLI entry: exit code 0 when at least one page loaded OK. */
export async function main(env: NodeJS.ProcessEnv = process.env): Promise<number> {
  dotenv.config();

  let config: RunConfig;
  let warnings: string[];
  try {
    ({ config, warnings } = loadConfig(env));
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(error.message);
      return 1;
    }
    throw error;
  }

  const logger = new Logger({ level: config.logLevel, file: path.join(config.outputDir, 'run.log') });
  warnings.forEach(warning => logger.warn(warning));
  logger.info(`Starting scraper with mode=${config.mode}`, {
    maxUrls: config.maxUrls,
    maxPages: config.maxPages,
    headless: config.headless,
    retries: config.maxRetries,
    stealth: config.enableStealth,
    persistent: config.persistentContext,
    browser: config.browser,
  });

  try {
    const { result } = await runScraper(config, logger);
    return result.summary.succeeded > 0 ? 0 : 1;
  } catch (error) {
    logger.error('Scraper run failed', error);
    return 1;
  }
}

export { BrowserSession, withSession } from './browser-session';
export { buildBlockRules, classifyBlock, DEFAULT_BLOCK_RULES } from './block-detector';
export type { BlockRule } from './block-detector';
export { ConfigError, loadConfig } from './config';
export type { RunConfig } from './config';
export { DataExporter } from './exporter';
export { extract, extractListing, extractProduct } from './extractor';
export { Logger } from './logger';
export { Navigator } from './navigator';
export type { PageSource, ScrapePage } from './navigator';
export { Notifier } from './notifier';
export { Paginator } from './paginator';
export { RunAccumulator } from './run-accumulator';
export { ProductScraper } from './scraper';
export { buildStealthPlan } from './stealth';
export * from './types';

if (require.main === module) {
  main()
    .then(code => {
      process.exitCode = code;
    })
    .catch(error => {
      console.error('Scraper failed:', error);
      process.exitCode = 1;
    });
}
