export type ScrapeMode = 'pdp' | 'plp';

export type BrowserKind = 'chromium' | 'firefox' | 'webkit';

export type PageStatus = 'OK' | 'BLOCK' | 'TIMEOUT' | 'ERROR';

export interface PageOutcome {
  url: string;
  finalUrl: string;
  status: PageStatus;
  attempt: number;
  elapsedMs: number;
  httpStatus: number | null;
  blockLabel: string | null;
  error: string | null;
  htmlPath: string | null;
  screenshotPath: string | null;
}

export interface Navigation {
  outcome: PageOutcome;
  html: string;
}

export interface ProductRecord {
  mode: ScrapeMode;
  sourceUrl: string;
  finalUrl: string;
  productUrl: string;
  title: string;
  priceRegular: number | null;
  pricePromo: number | null;
  currency: string;
  availability: string;
  seller: string;
  brand: string;
  model: string;
  sku: string;
  category: string;
  descriptionShort: string;
  descriptionFull: string;
  images: string[];
  rating: string;
  reviewsCount: string;
  pageIndex: number | null;
  partial: boolean;
  scrapedAt: string;
}

export interface PageVisit {
  pageIndex: number;
  outcome: PageOutcome;
  records: ProductRecord[];
}

export type StopReasonKind = 'max-pages' | 'no-next-page' | 'max-runtime' | Exclude<PageStatus, 'OK'>;

export interface StopReason {
  reason: StopReasonKind;
  pageIndex: number;
  url: string;
  /** PDP runtime cap: URLs never visited, starting with `url`. */
  remaining?: number;
}

export interface RunSummary {
  mode: ScrapeMode;
  attempted: number;
  succeeded: number;
  blocked: number;
  timedOut: number;
  errored: number;
  partial: number;
  records: number;
  navigationAttempts: number;
  stopReason: StopReason | null;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
}

export interface RunResult {
  summary: RunSummary;
  visits: PageVisit[];
}
