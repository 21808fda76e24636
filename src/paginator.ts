import type { RunConfig } from './config';
import { extractListing, findNextPageUrl } from './extractor';
import type { Logger } from './logger';
import type { Navigator } from './navigator';
import { delay, randomDelayMs, type Sleep } from './timing';
import type { PageVisit, ProductRecord, StopReason, StopReasonKind } from './types';

export interface PaginatorOptions {
  maxPages: number;
  nextPageSelector: string;
  maxRuntimeSec: number;
  minDelayMs: number;
  maxDelayMs: number;
  currency: string;
}

export function paginatorOptionsFromConfig(
  config: Pick<RunConfig, 'maxPages' | 'nextPageSelector' | 'maxRuntimeSec' | 'minDelayMs' | 'maxDelayMs' | 'currency'>
): PaginatorOptions {
  return {
    maxPages: config.maxPages,
    nextPageSelector: config.nextPageSelector,
    maxRuntimeSec: config.maxRuntimeSec,
    minDelayMs: config.minDelayMs,
    maxDelayMs: config.maxDelayMs,
    currency: config.currency,
  };
}

/**
 * Walks a listing page by page, following the next-page control. Single
 * use: `paginate()` can be iterated once, and `stopReason` is set by the
 * time the iteration ends.
 */
export class Paginator {
  stopReason: StopReason | null = null;
  private used = false;

  constructor(
    private navigator: Pick<Navigator, 'navigate'>,
    private options: PaginatorOptions,
    private logger: Logger,
    private sleep: Sleep = delay,
    private now: () => number = Date.now
  ) {}

  async *paginate(startUrl: string): AsyncGenerator<PageVisit, void, undefined> {
    if (this.used) {
      throw new Error('Paginator has already been iterated');
    }
    this.used = true;

    const startedAt = this.now();
    const visitedPages = new Set<string>();
    const seenProducts = new Set<string>();
    let url = startUrl;
    let pageIndex = 0;

    while (true) {
      if (pageIndex >= this.options.maxPages) {
        this.stop('max-pages', pageIndex, url);
        return;
      }
      if (this.options.maxRuntimeSec > 0 && this.now() - startedAt > this.options.maxRuntimeSec * 1000) {
        this.stop('max-runtime', pageIndex, url);
        return;
      }
      if (pageIndex > 0) {
        await this.sleep(randomDelayMs(this.options.minDelayMs, this.options.maxDelayMs));
      }

      pageIndex++;
      visitedPages.add(url);
      this.logger.info(`Listing page ${pageIndex}/${this.options.maxPages}: ${url}`);

      const { outcome, html } = await this.navigator.navigate(url);
      if (outcome.status !== 'OK') {
        this.stop(outcome.status, pageIndex, url);
        yield { pageIndex, outcome, records: [] };
        return;
      }

      let records: ProductRecord[];
      let next: string | null;
      try {
        records = extractListing(html, {
          mode: 'plp',
          sourceUrl: url,
          finalUrl: outcome.finalUrl,
          currency: this.options.currency,
          pageIndex,
        });
        next = findNextPageUrl(html, outcome.finalUrl, this.options.nextPageSelector);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        this.logger.error(`Extraction failed for ${url}`, error);
        this.stop('ERROR', pageIndex, url);
        yield { pageIndex, outcome: { ...outcome, status: 'ERROR', error: `Extraction failed: ${message}` }, records: [] };
        return;
      }

      records = records.filter(record => {
        if (!record.productUrl) return true;
        if (seenProducts.has(record.productUrl)) return false;
        seenProducts.add(record.productUrl);
        return true;
      });

      visitedPages.add(outcome.finalUrl);
      if (!next || visitedPages.has(next)) {
        this.stop('no-next-page', pageIndex, url);
        yield { pageIndex, outcome, records };
        return;
      }

      yield { pageIndex, outcome, records };
      url = next;
    }
  }

  private stop(reason: StopReasonKind, pageIndex: number, url: string) {
    this.stopReason = { reason, pageIndex, url };
    const log = reason === 'max-pages' || reason === 'no-next-page' ? this.logger.info : this.logger.warn;
    log.call(this.logger, `Pagination stopped: ${reason}`, { pageIndex, url });
  }
}
