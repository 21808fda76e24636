import { describe, it, expect, vi } from 'vitest';
import { DEFAULT_NEXT_PAGE_SELECTOR } from './config';
import { silentLogger } from './logger';
import { Paginator, type PaginatorOptions } from './paginator';
import { noSleep, outcomeFor } from './test-support';
import type { Navigation, PageStatus, PageVisit } from './types';

const BASE = 'https://shop.test/c';

function pageUrl(n: number): string {
  return `${BASE}?page=${n}`;
}

function listingHtml(n: number, next: number | null, products = [`${n}-a`, `${n}-b`]): string {
  const cards = products
    .map(id => `<li class="product"><a href="/p/${id}"><h3>Item ${id}</h3></a><span class="price">$1,${n}00</span></li>`)
    .join('');
  const link = next === null ? '' : `<a rel="next" href="/c?page=${next}">Siguiente</a>`;
  return `<html><body><ul>${cards}</ul>${link}</body></html>`;
}

function options(overrides: Partial<PaginatorOptions> = {}): PaginatorOptions {
  return {
    maxPages: 50,
    nextPageSelector: DEFAULT_NEXT_PAGE_SELECTOR,
    maxRuntimeSec: 0,
    minDelayMs: 0,
    maxDelayMs: 0,
    currency: 'MXN',
    ...overrides,
  };
}

/** Serves listing pages by number; `statusOf` can fail any of them. */
function fakeNavigator(html: (n: number) => string, statusOf: (n: number) => PageStatus = () => 'OK') {
  return {
    navigate: vi.fn(async (url: string): Promise<Navigation> => {
      const n = Number(new URL(url).searchParams.get('page'));
      const status = statusOf(n);
      return { outcome: outcomeFor(url, status), html: status === 'OK' ? html(n) : '' };
    }),
  };
}

async function collect(paginator: Paginator, startUrl: string): Promise<PageVisit[]> {
  const visits: PageVisit[] = [];
  for await (const visit of paginator.paginate(startUrl)) {
    visits.push(visit);
  }
  return visits;
}

describe('Paginator', () => {
  it('should stop at maxPages on an endless listing', async () => {
    const navigator = fakeNavigator(n => listingHtml(n, n + 1));
    const paginator = new Paginator(navigator, options({ maxPages: 3 }), silentLogger, noSleep);

    const visits = await collect(paginator, pageUrl(1));

    expect(visits.map(visit => visit.pageIndex)).toEqual([1, 2, 3]);
    expect(visits.flatMap(visit => visit.records)).toHaveLength(6);
    expect(navigator.navigate).toHaveBeenCalledTimes(3);
    expect(paginator.stopReason).toEqual({ reason: 'max-pages', pageIndex: 3, url: pageUrl(4) });
  });

  it('should read the products of every page', async () => {
    const paginator = new Paginator(fakeNavigator(n => listingHtml(n, n < 2 ? n + 1 : null)), options(), silentLogger, noSleep);

    const visits = await collect(paginator, pageUrl(1));
    const records = visits.flatMap(visit => visit.records);

    expect(records.map(record => record.productUrl)).toEqual([
      'https://shop.test/p/1-a',
      'https://shop.test/p/1-b',
      'https://shop.test/p/2-a',
      'https://shop.test/p/2-b',
    ]);
    expect(records.map(record => record.priceRegular)).toEqual([1100, 1100, 1200, 1200]);
    expect(records.map(record => record.pageIndex)).toEqual([1, 1, 2, 2]);
    expect(records[0].title).toBe('Item 1-a');
  });

  it('should stop when there is no next page', async () => {
    const paginator = new Paginator(fakeNavigator(n => listingHtml(n, n < 2 ? n + 1 : null)), options(), silentLogger, noSleep);

    const visits = await collect(paginator, pageUrl(1));

    expect(visits).toHaveLength(2);
    expect(paginator.stopReason).toEqual({ reason: 'no-next-page', pageIndex: 2, url: pageUrl(2) });
  });

  it('should stop on a blocked page and keep what came before', async () => {
    const navigator = fakeNavigator(
      n => listingHtml(n, n < 5 ? n + 1 : null),
      n => (n === 2 ? 'BLOCK' : 'OK')
    );
    const paginator = new Paginator(navigator, options(), silentLogger, noSleep);

    const visits = await collect(paginator, pageUrl(1));

    expect(visits.map(visit => visit.outcome.status)).toEqual(['OK', 'BLOCK']);
    expect(visits[0].records).toHaveLength(2);
    expect(visits[1].records).toEqual([]);
    expect(paginator.stopReason).toEqual({ reason: 'BLOCK', pageIndex: 2, url: pageUrl(2) });
  });

  it('should stop when the first page times out', async () => {
    const paginator = new Paginator(fakeNavigator(n => listingHtml(n, n + 1), () => 'TIMEOUT'), options(), silentLogger, noSleep);

    const visits = await collect(paginator, pageUrl(1));

    expect(visits).toHaveLength(1);
    expect(visits[0].outcome.status).toBe('TIMEOUT');
    expect(paginator.stopReason).toEqual({ reason: 'TIMEOUT', pageIndex: 1, url: pageUrl(1) });
  });

  it('should stop with an ERROR when a page cannot be extracted', async () => {
    const navigator = fakeNavigator(n => listingHtml(n, n + 1));
    const paginator = new Paginator(navigator, options({ nextPageSelector: 'a[rel=' }), silentLogger, noSleep);

    const visits = await collect(paginator, pageUrl(1));

    expect(visits).toHaveLength(1);
    expect(visits[0].outcome.status).toBe('ERROR');
    expect(visits[0].outcome.error).toMatch(/^Extraction failed: /);
    expect(visits[0].records).toEqual([]);
    expect(navigator.navigate).toHaveBeenCalledTimes(1);
    expect(paginator.stopReason).toEqual({ reason: 'ERROR', pageIndex: 1, url: pageUrl(1) });
  });

  it('should not follow a next link back to a visited page', async () => {
    const paginator = new Paginator(fakeNavigator(n => listingHtml(n, n === 1 ? 2 : 1)), options(), silentLogger, noSleep);

    const visits = await collect(paginator, pageUrl(1));

    expect(visits).toHaveLength(2);
    expect(paginator.stopReason?.reason).toBe('no-next-page');
  });

  it('should drop products already seen on an earlier page', async () => {
    const navigator = fakeNavigator(n => (n === 1 ? listingHtml(1, 2) : listingHtml(2, null, ['1-a', '2-a'])));
    const paginator = new Paginator(navigator, options(), silentLogger, noSleep);

    const visits = await collect(paginator, pageUrl(1));

    expect(visits[1].records.map(record => record.productUrl)).toEqual(['https://shop.test/p/2-a']);
  });

  it('should stop once the runtime budget is spent', async () => {
    let clock = 0;
    const navigator = fakeNavigator(n => {
      clock += 2000;
      return listingHtml(n, n + 1);
    });
    const paginator = new Paginator(navigator, options({ maxRuntimeSec: 3 }), silentLogger, noSleep, () => clock);

    const visits = await collect(paginator, pageUrl(1));

    expect(visits).toHaveLength(2);
    expect(paginator.stopReason).toEqual({ reason: 'max-runtime', pageIndex: 2, url: pageUrl(3) });
  });

  it('should pause between pages but not before the first', async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const paginator = new Paginator(
      fakeNavigator(n => listingHtml(n, n < 3 ? n + 1 : null)),
      options({ minDelayMs: 250, maxDelayMs: 250 }),
      silentLogger,
      sleep
    );

    await collect(paginator, pageUrl(1));

    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([250, 250]);
  });

  it('should only be iterated once', async () => {
    const paginator = new Paginator(fakeNavigator(n => listingHtml(n, null)), options(), silentLogger, noSleep);
    await collect(paginator, pageUrl(1));

    await expect(collect(paginator, pageUrl(1))).rejects.toThrow('Paginator has already been iterated');
  });
});
