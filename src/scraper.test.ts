import { describe, it, expect, vi } from 'vitest';
import { buildBlockRules } from './block-detector';
import { DEFAULT_NEXT_PAGE_SELECTOR } from './config';
import { extractProduct } from './extractor';
import { silentLogger } from './logger';
import { Navigator } from './navigator';
import { ProductScraper, type ScrapeSettings } from './scraper';
import { FakeBrowser, noSleep, outcomeFor, productHtml } from './test-support';
import type { Navigation } from './types';

vi.mock('./extractor', async importOriginal => {
  const actual = await importOriginal<typeof import('./extractor')>();
  return { ...actual, extractProduct: vi.fn(actual.extractProduct) };
});

const SETTINGS: ScrapeSettings = {
  maxRuntimeSec: 0,
  minDelayMs: 0,
  maxDelayMs: 0,
  currency: 'MXN',
  maxPages: 10,
  nextPageSelector: DEFAULT_NEXT_PAGE_SELECTOR,
};

function navigatorOver(browser: FakeBrowser, maxRetries: number): Navigator {
  return new Navigator(
    browser,
    {
      maxRetries,
      navTimeoutMs: 5000,
      waitSelectorMs: 1000,
      readySelector: 'body',
      retry: { baseDelayMs: 0, factor: 2, maxDelayMs: 0 },
      dumpHtml: false,
      humanize: false,
      blockRules: buildBlockRules(),
    },
    null,
    silentLogger,
    noSleep
  );
}

describe('ProductScraper.scrapeProducts', () => {
  const urls = ['https://shop.test/p/a', 'https://shop.test/p/b', 'https://shop.test/p/c'];

  it('should keep going past a page that times out', async () => {
    const browser = new FakeBrowser(url => {
      if (url.endsWith('/b')) return { fail: 'timeout' };
      const id = url.slice(-1).toUpperCase();
      return { html: productHtml(`Widget ${id}`, '$1,299.00', `SKU-${id}`) };
    });
    const scraper = new ProductScraper(navigatorOver(browser, 2), SETTINGS, silentLogger, noSleep);

    const { summary, visits } = await scraper.scrapeProducts(urls);

    expect(visits.map(visit => visit.outcome.status)).toEqual(['OK', 'TIMEOUT', 'OK']);
    expect(visits[1].outcome.attempt).toBe(2);
    expect(visits.flatMap(visit => visit.records).map(record => record.title)).toEqual(['Widget A', 'Widget C']);
    expect(visits[0].records[0].priceRegular).toBe(1299);
    expect(visits[0].records[0].sku).toBe('SKU-A');
    expect(summary).toMatchObject({
      mode: 'pdp',
      attempted: 3,
      succeeded: 2,
      timedOut: 1,
      blocked: 0,
      errored: 0,
      records: 2,
      navigationAttempts: 4,
      stopReason: null,
    });
  });

  it('should visit URLs in input order', async () => {
    const browser = new FakeBrowser(() => ({ html: productHtml('Widget', '$10', 'W') }));
    const navigator = navigatorOver(browser, 1);
    const navigate = vi.spyOn(navigator, 'navigate');

    await new ProductScraper(navigator, SETTINGS, silentLogger, noSleep).scrapeProducts(urls);

    expect(navigate.mock.calls.map(([url]) => url)).toEqual(urls);
  });

  it('should count pages without product fields as partial', async () => {
    const browser = new FakeBrowser(() => ({ html: '<html><body><p>Coming soon</p></body></html>' }));
    const scraper = new ProductScraper(navigatorOver(browser, 1), SETTINGS, silentLogger, noSleep);

    const { summary, visits } = await scraper.scrapeProducts(['https://shop.test/p/soon']);

    expect(visits[0].outcome.status).toBe('OK');
    expect(visits[0].records[0].partial).toBe(true);
    expect(summary.partial).toBe(1);
    expect(summary.succeeded).toBe(1);
  });

  it('should pause between URLs but not after the last', async () => {
    const browser = new FakeBrowser(() => ({ html: productHtml('Widget', '$10', 'W') }));
    const sleep = vi.fn(async (_ms: number) => {});
    const scraper = new ProductScraper(navigatorOver(browser, 1), { ...SETTINGS, minDelayMs: 100, maxDelayMs: 100 }, silentLogger, sleep);

    await scraper.scrapeProducts(urls);

    expect(sleep).toHaveBeenCalledTimes(2);
  });

  it('should stop when the runtime budget is spent', async () => {
    let clock = 0;
    const navigator = {
      navigate: vi.fn(async (url: string): Promise<Navigation> => {
        clock += 5000;
        return { outcome: outcomeFor(url), html: productHtml('Widget', '$10', 'W') };
      }),
    };
    const scraper = new ProductScraper(navigator, { ...SETTINGS, maxRuntimeSec: 8 }, silentLogger, noSleep, () => clock);

    const { summary, visits } = await scraper.scrapeProducts(urls);

    expect(visits).toHaveLength(2);
    expect(navigator.navigate).toHaveBeenCalledTimes(2);
    expect(summary.stopReason).toEqual({ reason: 'max-runtime', pageIndex: 2, url: urls[2], remaining: 1 });
  });

  it('should record an ERROR when a page cannot be extracted', async () => {
    const browser = new FakeBrowser(() => ({ html: productHtml('Widget', '$10', 'W') }));
    vi.mocked(extractProduct).mockImplementationOnce(() => {
      throw new Error('bad markup');
    });
    const scraper = new ProductScraper(navigatorOver(browser, 3), SETTINGS, silentLogger, noSleep);

    const { summary, visits } = await scraper.scrapeProducts(urls.slice(0, 2));

    expect(visits[0].outcome).toMatchObject({ status: 'ERROR', attempt: 1, error: 'Extraction failed: bad markup' });
    expect(visits[0].records).toEqual([]);
    expect(browser.gotoCount(urls[0])).toBe(1);
    expect(visits[1].outcome.status).toBe('OK');
    expect(visits[1].records).toHaveLength(1);
    expect(summary).toMatchObject({ attempted: 2, succeeded: 1, errored: 1, records: 1 });
  });

  it('should return an empty run for an empty URL list', async () => {
    const browser = new FakeBrowser(() => ({}));
    const { summary, visits } = await new ProductScraper(navigatorOver(browser, 1), SETTINGS, silentLogger, noSleep).scrapeProducts([]);

    expect(visits).toEqual([]);
    expect(summary.attempted).toBe(0);
    expect(browser.pages).toHaveLength(0);
  });
});

describe('ProductScraper.scrapeListing', () => {
  it('should collect every page and the reason it stopped', async () => {
    const listing = (page: number, next: string) =>
      `<html><body><div class="product-card"><a href="/p/${page}"><h3>Item ${page}</h3></a><span class="price">$${page}0</span></div>${next}</body></html>`;
    const browser = new FakeBrowser(url =>
      url.endsWith('page=2')
        ? { html: listing(2, '') }
        : { html: listing(1, '<a rel="next" href="/c?page=2">Siguiente</a>') }
    );
    const scraper = new ProductScraper(navigatorOver(browser, 1), SETTINGS, silentLogger, noSleep);

    const { summary, visits } = await scraper.scrapeListing('https://shop.test/c');

    expect(visits).toHaveLength(2);
    expect(visits.flatMap(visit => visit.records).map(record => record.productUrl)).toEqual([
      'https://shop.test/p/1',
      'https://shop.test/p/2',
    ]);
    expect(summary).toMatchObject({ mode: 'plp', attempted: 2, succeeded: 2, records: 2, navigationAttempts: 2 });
    expect(summary.stopReason).toEqual({ reason: 'no-next-page', pageIndex: 2, url: 'https://shop.test/c?page=2' });
  });
});
