import * as fs from 'fs/promises';
import type { PageSource, ScrapePage } from './navigator';
import type { PageOutcome, PageStatus } from './types';

/** What a fake page serves for one `goto`. */
export interface FakeResponse {
  html?: string;
  title?: string;
  status?: number;
  finalUrl?: string;
  fail?: 'timeout' | 'error';
  /** A visible cookie consent button; `banner.html` is served until it is clicked. */
  banner?: { html: string };
}

export type FakeScript = (url: string, call: number) => FakeResponse;

class FakeTimeoutError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TimeoutError';
  }
}

export class FakePage implements ScrapePage {
  closed = false;
  bannerClicks = 0;
  readonly mouseMoves: Array<[number, number]> = [];
  readonly mouse = {
    move: async (x: number, y: number) => {
      this.mouseMoves.push([x, y]);
    },
  };
  private current = 'about:blank';
  private response: FakeResponse = {};

  constructor(private script: FakeScript, private calls: Map<string, number>) {}

  async goto(url: string) {
    const call = (this.calls.get(url) ?? 0) + 1;
    this.calls.set(url, call);
    this.response = this.script(url, call);
    this.current = this.response.finalUrl ?? url;

    if (this.response.fail === 'timeout') throw new FakeTimeoutError('Timeout 1000ms exceeded');
    if (this.response.fail === 'error') throw new Error('net::ERR_CONNECTION_RESET');
    const status = this.response.status ?? 200;
    return { status: () => status };
  }

  async waitForSelector() {
    return null;
  }

  async content() {
    if (this.response.banner && this.bannerClicks === 0) return this.response.banner.html;
    return this.response.html ?? '<html><body></body></html>';
  }

  locator(_selector: string) {
    const visible = Boolean(this.response.banner) && this.bannerClicks === 0;
    return {
      count: async () => (visible ? 1 : 0),
      first: () => ({
        isVisible: async () => visible,
        click: async () => {
          this.bannerClicks++;
        },
      }),
    };
  }

  async waitForTimeout(_ms: number) {}

  async title() {
    return this.response.title ?? '';
  }

  url() {
    return this.current;
  }

  async close() {
    this.closed = true;
  }

  async screenshot(options?: { path?: string }) {
    if (options?.path) await fs.writeFile(options.path, 'png');
    return Buffer.from('png');
  }
}

/** In-process stand-in for a browser context. */
export class FakeBrowser implements PageSource {
  readonly calls = new Map<string, number>();
  readonly pages: FakePage[] = [];
  closed = false;

  constructor(private script: FakeScript) {}

  async newPage(): Promise<FakePage> {
    const page = new FakePage(this.script, this.calls);
    this.pages.push(page);
    return page;
  }

  async close() {
    this.closed = true;
  }

  gotoCount(url: string): number {
    return this.calls.get(url) ?? 0;
  }
}

export function productHtml(title: string, price: string, sku: string): string {
  return `<html><head><title>${title}</title></head><body><h1>${title}</h1><span class="price">${price}</span><span itemprop="sku">${sku}</span></body></html>`;
}

export function outcomeFor(url: string, status: PageStatus = 'OK', attempt = 1): PageOutcome {
  return {
    url,
    finalUrl: url,
    status,
    attempt,
    elapsedMs: 10,
    httpStatus: status === 'OK' ? 200 : null,
    blockLabel: status === 'BLOCK' ? 'captcha' : null,
    error: status === 'OK' ? null : status === 'BLOCK' ? 'Blocked (captcha)' : 'Timeout 1000ms exceeded',
    htmlPath: null,
    screenshotPath: null,
  };
}

export const noSleep = async (): Promise<void> => {};
