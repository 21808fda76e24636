import { load } from 'cheerio';

export function cleanText(value: string | null | undefined): string {
  if (!value) return '';
  return value.replace(/\u00a0/g, ' ').replace(/\s+/g, ' ').trim();
}

/**
 * Reads a price out of free text ("$12,345.67", "12.345,67", "MXN 1,299").
 * Returns null when no number can be recovered.
 */
export function parsePrice(value: string | null | undefined): number | null {
  if (!value) return null;
  let raw = value.replace(/[^0-9,.]/g, '');
  if (!raw) return null;

  const commas = (raw.match(/,/g) ?? []).length;
  const dots = (raw.match(/\./g) ?? []).length;

  if (commas > 1 && dots === 0) raw = raw.replace(/,/g, '');
  if (dots > 1 && commas === 0) raw = raw.replace(/\./g, '');

  if (raw.includes(',') && raw.includes('.')) {
    raw = raw.lastIndexOf(',') > raw.lastIndexOf('.')
      ? raw.replace(/\./g, '').replace(',', '.')
      : raw.replace(/,/g, '');
  } else if (raw.includes(',')) {
    const decimals = raw.split(',').pop() ?? '';
    raw = decimals.length === 2 ? raw.replace(',', '.') : raw.replace(/,/g, '');
  }

  const price = Number(raw);
  return raw !== '' && Number.isFinite(price) ? price : null;
}

export function slugify(value: string, maxLength = 60): string {
  return value
    .toLowerCase()
    .replace(/^https?:\/\//, '')
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '')
    .slice(0, maxLength)
    .replace(/-+$/, '');
}

/** Title-less visible text of an HTML document: scripts, styles and noscript dropped. */
export function visibleText(html: string): string {
  if (!html) return '';
  const $ = load(html);
  $('script, style, noscript, template').remove();
  const body = $('body');
  return cleanText(body.length > 0 ? body.text() : $.root().text());
}
