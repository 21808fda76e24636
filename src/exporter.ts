import * as fs from 'fs/promises';
import * as path from 'path';
import * as XLSX from 'xlsx';
import type { Logger } from './logger';
import type { PageVisit, ProductRecord, RunResult } from './types';

export const RESULT_COLUMNS = [
  'timestamp_utc',
  'mode',
  'page_index',
  'source_url',
  'final_url',
  'product_url',
  'title',
  'price_regular',
  'price_promo',
  'currency',
  'availability',
  'seller',
  'brand',
  'model',
  'sku',
  'category',
  'description_short',
  'description_full',
  'images',
  'rating',
  'reviews_count',
  'http_status',
  'status',
  'block_label',
  'error',
  'attempts',
  'elapsed_ms',
  'html_path',
  'screenshot_path',
] as const;

export type ResultColumn = (typeof RESULT_COLUMNS)[number];
export type ResultRow = Record<ResultColumn, string | number>;

export interface ExportPaths {
  csv: string;
  xlsx: string;
  summary: string;
}

function outcomeColumns(visit: PageVisit) {
  const { outcome } = visit;
  return {
    page_index: visit.pageIndex,
    final_url: outcome.finalUrl,
    http_status: outcome.httpStatus ?? '',
    block_label: outcome.blockLabel ?? '',
    error: outcome.error ?? '',
    attempts: outcome.attempt,
    elapsed_ms: outcome.elapsedMs,
    html_path: outcome.htmlPath ?? '',
    screenshot_path: outcome.screenshotPath ?? '',
  };
}

function recordRow(visit: PageVisit, record: ProductRecord): ResultRow {
  return {
    ...outcomeColumns(visit),
    timestamp_utc: record.scrapedAt,
    mode: record.mode,
    source_url: record.sourceUrl,
    final_url: record.finalUrl,
    product_url: record.productUrl,
    title: record.title,
    price_regular: record.priceRegular ?? '',
    price_promo: record.pricePromo ?? '',
    currency: record.currency,
    availability: record.availability,
    seller: record.seller,
    brand: record.brand,
    model: record.model,
    sku: record.sku,
    category: record.category,
    description_short: record.descriptionShort,
    description_full: record.descriptionFull,
    images: record.images.length > 0 ? JSON.stringify(record.images) : '',
    rating: record.rating,
    reviews_count: record.reviewsCount,
    status: record.partial ? 'PARTIAL' : 'OK',
  };
}

function failureRow(visit: PageVisit, mode: string, at: string): ResultRow {
  return {
    ...outcomeColumns(visit),
    timestamp_utc: at,
    mode,
    source_url: visit.outcome.url,
    product_url: '',
    title: '',
    price_regular: '',
    price_promo: '',
    currency: '',
    availability: '',
    seller: '',
    brand: '',
    model: '',
    sku: '',
    category: '',
    description_short: '',
    description_full: '',
    images: '',
    rating: '',
    reviews_count: '',
    status: visit.outcome.status,
  };
}

/**
 * Flattens a run into export rows, in run order: every record of an OK
 * page, and a single row for each page that ended BLOCK/TIMEOUT/ERROR.
 */
export function toRows(result: RunResult): ResultRow[] {
  const rows: ResultRow[] = [];
  for (const visit of result.visits) {
    if (visit.outcome.status === 'OK') {
      rows.push(...visit.records.map(record => recordRow(visit, record)));
    } else {
      rows.push(failureRow(visit, result.summary.mode, result.summary.finishedAt));
    }
  }
  return rows;
}

export function escapeCsvField(field: string | number): string {
  const value = String(field);
  if (value.includes(',') || value.includes('\n') || value.includes('\r') || value.includes('"')) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function toCsv(rows: ResultRow[]): string {
  const lines = [RESULT_COLUMNS.join(',')];
  for (const row of rows) {
    lines.push(RESULT_COLUMNS.map(column => escapeCsvField(row[column])).join(','));
  }
  return lines.join('\n') + '\n';
}

export class DataExporter {
  constructor(private outputDir: string, private logger: Logger) {}

  async ensureOutputDir(): Promise<void> {
    await fs.mkdir(this.outputDir, { recursive: true });
  }

  async exportToCSV(rows: ResultRow[], filename = 'results.csv'): Promise<string> {
    await this.ensureOutputDir();
    const filePath = path.join(this.outputDir, filename);
    await fs.writeFile(filePath, toCsv(rows), 'utf-8');
    this.logger.info(`✓ Exported ${rows.length} rows to ${filePath}`);
    return filePath;
  }

  async exportToXLSX(rows: ResultRow[], filename = 'results.xlsx'): Promise<string> {
    await this.ensureOutputDir();
    const filePath = path.join(this.outputDir, filename);
    const sheet = XLSX.utils.aoa_to_sheet([
      [...RESULT_COLUMNS],
      ...rows.map(row => RESULT_COLUMNS.map(column => row[column])),
    ]);
    const workbook = XLSX.utils.book_new();
    XLSX.utils.book_append_sheet(workbook, sheet, 'results');
    XLSX.writeFile(workbook, filePath);
    this.logger.info(`✓ Exported ${rows.length} rows to ${filePath}`);
    return filePath;
  }

  async exportSummary(result: RunResult, filename = 'summary.json'): Promise<string> {
    await this.ensureOutputDir();
    const filePath = path.join(this.outputDir, filename);
    const exportData = {
      summary: result.summary,
      outcomes: result.visits.map(visit => ({
        pageIndex: visit.pageIndex,
        records: visit.records.length,
        ...visit.outcome,
      })),
    };
    await fs.writeFile(filePath, JSON.stringify(exportData, null, 2) + '\n', 'utf-8');
    this.logger.info(`✓ Wrote run summary to ${filePath}`);
    return filePath;
  }

  async exportAll(result: RunResult): Promise<ExportPaths> {
    const rows = toRows(result);
    return {
      csv: await this.exportToCSV(rows),
      xlsx: await this.exportToXLSX(rows),
      summary: await this.exportSummary(result),
    };
  }
}
