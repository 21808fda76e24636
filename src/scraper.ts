import Bluebird from 'bluebird';
import type { RunConfig } from './config';
import { extractProduct } from './extractor';
import type { Logger } from './logger';
import type { Navigator } from './navigator';
import { Paginator, paginatorOptionsFromConfig } from './paginator';
import { RunAccumulator } from './run-accumulator';
import { delay, randomDelayMs, type Sleep } from './timing';
import type { Navigation, PageVisit, ProductRecord, RunResult } from './types';

export type ScrapeSettings = Pick<
  RunConfig,
  'maxRuntimeSec' | 'minDelayMs' | 'maxDelayMs' | 'currency' | 'maxPages' | 'nextPageSelector'
>;

export class ProductScraper {
  constructor(
    private navigator: Pick<Navigator, 'navigate'>,
    private settings: ScrapeSettings,
    private logger: Logger,
    private sleep: Sleep = delay,
    private now: () => number = Date.now
  ) {}

  /** PDP mode: one visit per URL, strictly in input order. */
  async scrapeProducts(urls: string[]): Promise<RunResult> {
    const run = new RunAccumulator('pdp');
    const startedAt = this.now();
    this.logger.info(`Starting to scrape ${urls.length} product pages`);

    await Bluebird.mapSeries(urls, async (url, index) => {
      if (run.stopped) return;
      if (this.runtimeExceeded(startedAt)) {
        this.logger.warn('Max runtime reached. Stopping.', { remaining: urls.length - index });
        run.stop({ reason: 'max-runtime', pageIndex: index, url, remaining: urls.length - index });
        return;
      }

      this.logger.info(`Scraping product ${index + 1}/${urls.length}: ${url}`);
      const visit = this.toProductVisit(index + 1, await this.navigator.navigate(url));
      run.add(visit);

      if (visit.outcome.status === 'OK') {
        this.logger.info(`✓ Successfully scraped: ${visit.records[0]?.title || url}`);
      } else {
        this.logger.warn(`✗ Failed to scrape ${url}: ${visit.outcome.status}`, { error: visit.outcome.error });
      }

      if (index < urls.length - 1) {
        await this.sleep(randomDelayMs(this.settings.minDelayMs, this.settings.maxDelayMs));
      }
    });

    const result = run.finish();
    this.logger.info(`Completed scraping. Success: ${result.summary.succeeded}/${urls.length}`, result.summary);
    return result;
  }

  /** PLP mode: follows the listing until the paginator stops. */
  async scrapeListing(startUrl: string): Promise<RunResult> {
    const run = new RunAccumulator('plp');
    const paginator = new Paginator(
      this.navigator,
      paginatorOptionsFromConfig(this.settings),
      this.logger.child({ name: 'paginator' }),
      this.sleep,
      this.now
    );

    for await (const visit of paginator.paginate(startUrl)) {
      run.add(visit);
      this.logger.info(`Page ${visit.pageIndex}: ${visit.outcome.status}, ${visit.records.length} products`);
    }
    if (paginator.stopReason) {
      run.stop(paginator.stopReason);
    }

    const result = run.finish();
    this.logger.info(`Completed listing. Pages: ${result.summary.attempted}, products: ${result.summary.records}`, result.summary);
    return result;
  }

  private toProductVisit(pageIndex: number, navigation: Navigation): PageVisit {
    const { outcome, html } = navigation;
    if (outcome.status !== 'OK') {
      return { pageIndex, outcome, records: [] };
    }

    let record: ProductRecord;
    try {
      record = extractProduct(html, {
        mode: 'pdp',
        sourceUrl: outcome.url,
        finalUrl: outcome.finalUrl,
        currency: this.settings.currency,
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Extraction failed for ${outcome.url}`, error);
      return { pageIndex, outcome: { ...outcome, status: 'ERROR', error: `Extraction failed: ${message}` }, records: [] };
    }

    if (record.partial) {
      this.logger.warn(`Partial record for ${outcome.url}: no product fields found`);
    }
    return { pageIndex, outcome, records: [record] };
  }

  private runtimeExceeded(startedAt: number): boolean {
    const { maxRuntimeSec } = this.settings;
    return maxRuntimeSec > 0 && this.now() - startedAt > maxRuntimeSec * 1000;
  }
}
