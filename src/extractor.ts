import { load, type CheerioAPI } from 'cheerio';
import { z } from 'zod';
import { cleanText, parsePrice } from './text';
import type { ProductRecord, ScrapeMode } from './types';

export const PDP_SELECTORS = {
  title: ['h1', "[data-testid='product-title']", '.product-title'],
  titleMeta: ["meta[property='og:title']", "meta[name='title']"],
  price: ["[data-testid='price']", '.price', '.product-price', "meta[property='product:price:amount']"],
  promoPrice: ['.price--promo', '.price-promo', "[data-testid='price-promo']"],
  brand: ["[itemprop='brand']", '.product-brand', "[data-testid='brand']"],
  model: ["[itemprop='model']", '.product-model', "[data-testid='model']"],
  sku: ["[itemprop='sku']", '.product-sku', "[data-testid='sku']", "meta[itemprop='sku']"],
  shortDescription: ["[data-testid='short-description']", '.product-short-description', "meta[name='description']"],
  fullDescription: ["[data-testid='description']", '.product-description', '#descripcion'],
  availability: ["[data-testid='availability']", '.availability'],
  seller: ["[data-testid='seller']", '.seller'],
  rating: ["[data-testid='rating']", '.rating'],
  reviews: ["[data-testid='reviews']", '.reviews'],
  category: ['.breadcrumb', "[data-testid='breadcrumb']"],
};

export const PLP_CARD_SELECTORS = ["[data-testid*='product-card']", '.product-card', '.product-item', 'li.product'];

const SHORT_DESCRIPTION_LIMIT = 2000;
const FULL_DESCRIPTION_LIMIT = 8000;

const OfferSchema = z.object({
  price: z.union([z.string(), z.number()]).optional(),
  priceCurrency: z.string().optional(),
  availability: z.string().optional(),
});

const LdProductSchema = z.object({
  '@type': z.union([z.string(), z.array(z.string())]).optional(),
  name: z.string().optional(),
  url: z.string().optional(),
  sku: z.union([z.string(), z.number()]).optional(),
  brand: z.union([z.string(), z.object({ name: z.string().optional() })]).optional(),
  image: z.union([z.string(), z.array(z.string())]).optional(),
  offers: z.union([OfferSchema, z.array(OfferSchema)]).optional(),
});

const LdItemListSchema = z.object({
  '@type': z.literal('ItemList'),
  itemListElement: z.array(z.object({ item: z.union([z.string(), LdProductSchema]).optional() }).merge(LdProductSchema)),
});

type LdProduct = z.infer<typeof LdProductSchema>;
type LdOffer = z.infer<typeof OfferSchema>;

export interface ExtractContext {
  mode: ScrapeMode;
  sourceUrl: string;
  finalUrl: string;
  currency: string;
  pageIndex?: number | null;
}

function hasType(node: LdProduct, type: string): boolean {
  const declared = node['@type'];
  return Array.isArray(declared) ? declared.includes(type) : declared === type;
}

/** Every JSON-LD node on the page, `@graph` and top-level arrays flattened. */
function jsonLdNodes($: CheerioAPI): unknown[] {
  const nodes: unknown[] = [];
  $("script[type='application/ld+json']").each((_, script) => {
    let data: unknown;
    try {
      data = JSON.parse($(script).text());
    } catch {
      return; // malformed block
    }
    const list = Array.isArray(data) ? data : [data];
    for (const entry of list) {
      nodes.push(entry);
      if (entry !== null && typeof entry === 'object' && '@graph' in entry && Array.isArray(entry['@graph'])) {
        nodes.push(...entry['@graph']);
      }
    }
  });
  return nodes;
}

function findLdProduct($: CheerioAPI): LdProduct | null {
  for (const node of jsonLdNodes($)) {
    const parsed = LdProductSchema.safeParse(node);
    if (parsed.success && hasType(parsed.data, 'Product')) return parsed.data;
  }
  return null;
}

function findLdItemList($: CheerioAPI): LdProduct[] {
  for (const node of jsonLdNodes($)) {
    const parsed = LdItemListSchema.safeParse(node);
    if (parsed.success) {
      return parsed.data.itemListElement.map(({ item, ...entry }) =>
        typeof item === 'string' ? { ...entry, url: item } : item ?? entry
      );
    }
  }
  return [];
}

function firstOffer(product: LdProduct | null): LdOffer | null {
  if (!product?.offers) return null;
  return Array.isArray(product.offers) ? product.offers[0] ?? null : product.offers;
}

function firstText($: CheerioAPI, selectors: string[]): string {
  for (const selector of selectors) {
    const element = $(selector).first();
    if (element.length === 0) continue;
    const value = element.is('meta') ? cleanText(element.attr('content')) : cleanText(element.text());
    if (value) return value;
  }
  return '';
}

function resolveUrl(href: string, base: string): string {
  if (!href) return '';
  try {
    return new URL(href, base).toString();
  } catch {
    return href;
  }
}

function priceCandidates($: CheerioAPI): string[] {
  const candidates: string[] = [];
  for (const selector of PDP_SELECTORS.price) {
    const element = $(selector).first();
    if (element.length === 0) continue;
    candidates.push(element.is('meta') ? element.attr('content') ?? '' : element.text());
  }
  return candidates;
}

/** Regular price is the first candidate; promo comes from a promo selector, else the second candidate. */
function extractPrices($: CheerioAPI): { regular: number | null; promo: number | null } {
  const candidates = priceCandidates($);
  const regular = candidates.length > 0 ? parsePrice(candidates[0]) : null;
  const promoText = firstText($, PDP_SELECTORS.promoPrice);
  let promo = promoText ? parsePrice(promoText) : null;
  if (promo === null && candidates.length > 1) {
    promo = parsePrice(candidates[1]);
  }
  return { regular, promo };
}

function extractImages($: CheerioAPI, product: LdProduct | null): string[] {
  const urls: string[] = [];
  $('img').each((_, img) => {
    const src = $(img).attr('src') || $(img).attr('data-src');
    if (src && src.startsWith('http')) urls.push(src);
  });
  if (urls.length === 0 && product?.image) {
    urls.push(...(Array.isArray(product.image) ? product.image : [product.image]));
  }
  return Array.from(new Set(urls));
}

function availabilityFromLd(offer: LdOffer | null): string {
  if (!offer?.availability) return '';
  return offer.availability.replace(/^https?:\/\/schema\.org\//, '');
}

type RecordFields = Partial<Omit<ProductRecord, 'partial' | 'scrapedAt' | 'mode' | 'sourceUrl' | 'finalUrl'>>;

/** A record is partial when none of its core product fields could be read. */
export function isPartial(record: Pick<ProductRecord, 'title' | 'priceRegular' | 'pricePromo' | 'sku' | 'availability'>): boolean {
  return !record.title && record.priceRegular === null && record.pricePromo === null && !record.sku && !record.availability;
}

export function buildRecord(context: ExtractContext, fields: RecordFields): ProductRecord {
  const base = {
    mode: context.mode,
    sourceUrl: context.sourceUrl,
    finalUrl: context.finalUrl,
    productUrl: fields.productUrl ?? '',
    title: fields.title ?? '',
    priceRegular: fields.priceRegular ?? null,
    pricePromo: fields.pricePromo ?? null,
    currency: fields.currency || context.currency,
    availability: fields.availability ?? '',
    seller: fields.seller ?? '',
    brand: fields.brand ?? '',
    model: fields.model ?? '',
    sku: fields.sku ?? '',
    category: fields.category ?? '',
    descriptionShort: fields.descriptionShort ?? '',
    descriptionFull: fields.descriptionFull ?? '',
    images: fields.images ?? [],
    rating: fields.rating ?? '',
    reviewsCount: fields.reviewsCount ?? '',
    pageIndex: context.pageIndex ?? null,
    scrapedAt: new Date().toISOString(),
  };
  return Object.freeze({ ...base, partial: isPartial(base) });
}

export function extractProduct(html: string, context: ExtractContext): ProductRecord {
  const $ = load(html);
  const product = findLdProduct($);
  const offer = firstOffer(product);
  const { regular, promo } = extractPrices($);
  const reviews = firstText($, PDP_SELECTORS.reviews);
  const brand = firstText($, PDP_SELECTORS.brand) || (typeof product?.brand === 'string' ? product.brand : product?.brand?.name ?? '');

  return buildRecord(context, {
    productUrl: context.finalUrl,
    title: firstText($, PDP_SELECTORS.title) || firstText($, PDP_SELECTORS.titleMeta) || cleanText(product?.name),
    priceRegular: regular ?? parsePrice(offer?.price === undefined ? '' : String(offer.price)),
    pricePromo: promo,
    currency: offer?.priceCurrency ?? '',
    availability: firstText($, PDP_SELECTORS.availability) || availabilityFromLd(offer),
    seller: firstText($, PDP_SELECTORS.seller),
    brand: cleanText(brand),
    model: firstText($, PDP_SELECTORS.model),
    sku: firstText($, PDP_SELECTORS.sku) || (product?.sku === undefined ? '' : String(product.sku)),
    category: firstText($, PDP_SELECTORS.category),
    descriptionShort: firstText($, PDP_SELECTORS.shortDescription).slice(0, SHORT_DESCRIPTION_LIMIT),
    descriptionFull: firstText($, PDP_SELECTORS.fullDescription).slice(0, FULL_DESCRIPTION_LIMIT),
    images: extractImages($, product),
    rating: firstText($, PDP_SELECTORS.rating),
    reviewsCount: reviews.replace(/\D/g, ''),
  });
}

/**
 * One record per listing entry: JSON-LD ItemList entries first, then product
 * cards. Entries sharing a product URL are kept once.
 */
export function extractListing(html: string, context: ExtractContext): ProductRecord[] {
  const $ = load(html);
  const category = firstText($, PDP_SELECTORS.category);
  const records: ProductRecord[] = [];
  const seen = new Set<string>();

  const push = (record: ProductRecord) => {
    if (record.productUrl) {
      if (seen.has(record.productUrl)) return;
      seen.add(record.productUrl);
    }
    records.push(record);
  };

  for (const item of findLdItemList($)) {
    const offer = firstOffer(item);
    push(
      buildRecord(context, {
        title: cleanText(item.name),
        priceRegular: parsePrice(offer?.price === undefined ? '' : String(offer.price)),
        currency: offer?.priceCurrency ?? '',
        productUrl: resolveUrl(item.url ?? '', context.finalUrl),
        category,
      })
    );
  }

  const cardSelector = PLP_CARD_SELECTORS.find(selector => $(selector).length > 0);
  if (cardSelector) {
    $(cardSelector).each((_, element) => {
      const card = load($.html(element));
      const link = card('a[href]').first();
      const { regular, promo } = extractPrices(card);
      push(
        buildRecord(context, {
          title: cleanText(card('h2, h3').first().text()) || cleanText(link.text()),
          priceRegular: regular,
          pricePromo: promo,
          productUrl: resolveUrl(link.attr('href') ?? '', context.finalUrl),
          category,
        })
      );
    });
  }

  return records;
}

/** Locates the next-page control and returns its absolute target, or null. */
export function findNextPageUrl(html: string, pageUrl: string, selector: string): string | null {
  const $ = load(html);
  const next = $(selector)
    .filter((_, element) => {
      const control = $(element);
      return Boolean(control.attr('href')) && control.attr('aria-disabled') !== 'true' && control.attr('disabled') === undefined;
    })
    .first();
  const href = next.attr('href');
  if (!href || href.startsWith('#') || href.startsWith('javascript:')) return null;
  return resolveUrl(href, pageUrl);
}

export function extract(html: string, context: ExtractContext): ProductRecord[] {
  return context.mode === 'pdp' ? [extractProduct(html, context)] : extractListing(html, context);
}
