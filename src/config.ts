import * as path from 'path';
import { load } from 'cheerio';
import { z } from 'zod';
import type { LogLevel } from './logger';
import type { BrowserKind, ScrapeMode } from './types';

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/122.0.0.0 Safari/537.36';

export const DEFAULT_NEXT_PAGE_SELECTOR = [
  'a[rel="next"]',
  'a[aria-label*="Siguiente"]',
  'a[aria-label*="Next"]',
  '.pagination .next a',
  'a:contains("Siguiente")',
  'a:contains("Next")',
].join(', ');

export interface RetryPolicy {
  baseDelayMs: number;
  factor: number;
  maxDelayMs: number;
}

export interface EmailSettings {
  sender: string;
  password: string;
  to: string;
  subject: string;
  smtpHost: string;
  smtpPort: number;
}

export interface RunConfig {
  mode: ScrapeMode;
  plpUrl: string;
  urlsFile: string;
  maxUrls: number;
  maxPages: number;
  maxRuntimeSec: number;
  navTimeoutMs: number;
  waitSelectorMs: number;
  readySelector: string;
  nextPageSelector: string;
  maxRetries: number;
  retry: RetryPolicy;
  minDelayMs: number;
  maxDelayMs: number;
  headless: boolean;
  slowMoMs: number;
  browser: BrowserKind;
  userAgent: string;
  locale: string;
  timezone: string;
  enableStealth: boolean;
  disableAutomationFlags: boolean;
  persistentContext: boolean;
  persistentContextDir: string;
  blockImages: boolean;
  warmupUrl: string;
  dumpHtml: boolean;
  debugSaveHtml: boolean;
  debugSaveScreenshot: boolean;
  extraHeaders: Readonly<Record<string, string>>;
  blockPatterns: readonly string[];
  currency: string;
  outputDir: string;
  logLevel: LogLevel;
  email: EmailSettings;
}

export interface LoadedConfig {
  config: Readonly<RunConfig>;
  warnings: string[];
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

const TRUTHY = new Set(['1', 'true', 'yes', 'y']);

const emptyAsMissing = (value: unknown) => (typeof value === 'string' && value.trim() === '' ? undefined : value);

const flag = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform(value => (value === undefined || value.trim() === '' ? fallback : TRUTHY.has(value.trim().toLowerCase())));

const count = (fallback: number, min = 0) =>
  z.preprocess(emptyAsMissing, z.coerce.number().int().min(min).default(fallback));

const decimal = (fallback: number, min = 0) =>
  z.preprocess(emptyAsMissing, z.coerce.number().min(min).default(fallback));

const text = (fallback: string) => z.preprocess(emptyAsMissing, z.string().trim().default(fallback));

const envSchema = z.object({
  MODE: z.preprocess(
    value => (typeof value === 'string' ? emptyAsMissing(value.toLowerCase()) : value),
    z.enum(['pdp', 'plp']).default('pdp')
  ),
  PLP_URL: text(''),
  URLS_FILE: text('urls.txt'),
  MAX_URLS: count(0),
  MAX_PAGES: count(50, 1),
  MAX_RUNTIME_SEC: count(0),
  NAV_TIMEOUT_MS: count(45000, 1),
  WAIT_SELECTOR_MS: count(20000, 1),
  READY_SELECTOR: text('body'),
  NEXT_PAGE_SELECTOR: text(DEFAULT_NEXT_PAGE_SELECTOR),
  MAX_RETRIES: count(3, 1),
  RETRY_BASE_DELAY_MS: count(1000),
  RETRY_BACKOFF_FACTOR: decimal(2, 1),
  RETRY_MAX_DELAY_MS: count(15000),
  MIN_DELAY_MS: count(1500),
  MAX_DELAY_MS: count(3500),
  HEADLESS: flag(true),
  SLOW_MO_MS: count(0),
  BROWSER: z.preprocess(
    value => (typeof value === 'string' ? emptyAsMissing(value.toLowerCase()) : value),
    z.enum(['chromium', 'firefox', 'webkit']).default('chromium')
  ),
  USER_AGENT: text(DEFAULT_USER_AGENT),
  LOCALE: text('es-MX'),
  TIMEZONE: text('America/Mexico_City'),
  ENABLE_STEALTH: flag(true),
  DISABLE_AUTOMATION_FLAGS: flag(true),
  PERSISTENT_CONTEXT: flag(false),
  PERSISTENT_CONTEXT_DIR: text(path.join('outputs', 'session')),
  BLOCK_IMAGES: flag(false),
  WARMUP_URL: text(''),
  DUMP_HTML: flag(false),
  DEBUG_SAVE_HTML: flag(true),
  DEBUG_SAVE_SCREENSHOT: flag(true),
  EXTRA_HEADERS_JSON: text(''),
  BLOCK_PATTERNS: text(''),
  CURRENCY: text('MXN'),
  OUTPUT_DIR: text('outputs'),
  LOG_LEVEL: z.preprocess(
    value => (typeof value === 'string' ? emptyAsMissing(value.toLowerCase()) : value),
    z.enum(['debug', 'info', 'warn', 'error']).default('info')
  ),
  EMAIL_SENDER: text(''),
  EMAIL_PASSWORD: text(''),
  EMAIL_TO: text(''),
  EMAIL_SUBJECT: text('Scraping report'),
  SMTP_HOST: text('smtp.gmail.com'),
  SMTP_PORT: count(587, 1),
});

type EnvSettings = z.infer<typeof envSchema>;

/**
 * Parses `EXTRA_HEADERS_JSON`. Anything that is not a JSON object is
 * ignored and reported back as a warning.
 */
export function parseHeadersJson(raw: string): { headers: Record<string, string>; warning: string | null } {
  if (!raw) return { headers: {}, warning: null };

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return { headers: {}, warning: 'Invalid EXTRA_HEADERS_JSON, ignoring it' };
  }

  if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) {
    return { headers: {}, warning: 'EXTRA_HEADERS_JSON is not a JSON object, ignoring it' };
  }

  const headers: Record<string, string> = {};
  for (const [key, value] of Object.entries(parsed)) {
    headers[key] = String(value);
  }
  return { headers, warning: null };
}

/** The parse error of a CSS selector run against listing HTML, or null. */
function selectorIssue(selector: string): string | null {
  try {
    load('')(selector);
    return null;
  } catch (error) {
    return error instanceof Error ? error.message : String(error);
  }
}

function crossCheck(env: EnvSettings): string[] {
  const issues: string[] = [];
  if (env.MODE === 'plp' && !env.PLP_URL) {
    issues.push('PLP_URL: required when MODE=plp');
  }
  if (env.MAX_DELAY_MS < env.MIN_DELAY_MS) {
    issues.push('MAX_DELAY_MS: must not be lower than MIN_DELAY_MS');
  }
  if (env.RETRY_MAX_DELAY_MS < env.RETRY_BASE_DELAY_MS) {
    issues.push('RETRY_MAX_DELAY_MS: must not be lower than RETRY_BASE_DELAY_MS');
  }
  const selectorProblem = selectorIssue(env.NEXT_PAGE_SELECTOR);
  if (selectorProblem) {
    issues.push(`NEXT_PAGE_SELECTOR: ${selectorProblem}`);
  }
  return issues;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): LoadedConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`));
  }

  const settings = parsed.data;
  const issues = crossCheck(settings);
  if (issues.length > 0) {
    throw new ConfigError(issues);
  }

  const warnings: string[] = [];
  const { headers, warning } = parseHeadersJson(settings.EXTRA_HEADERS_JSON);
  if (warning) warnings.push(warning);

  const blockPatterns = settings.BLOCK_PATTERNS.split(',')
    .map(pattern => pattern.trim())
    .filter(pattern => pattern.length > 0);

  const config: RunConfig = {
    mode: settings.MODE,
    plpUrl: settings.PLP_URL,
    urlsFile: settings.URLS_FILE,
    maxUrls: settings.MAX_URLS,
    maxPages: settings.MAX_PAGES,
    maxRuntimeSec: settings.MAX_RUNTIME_SEC,
    navTimeoutMs: settings.NAV_TIMEOUT_MS,
    waitSelectorMs: settings.WAIT_SELECTOR_MS,
    readySelector: settings.READY_SELECTOR,
    nextPageSelector: settings.NEXT_PAGE_SELECTOR,
    maxRetries: settings.MAX_RETRIES,
    retry: Object.freeze({
      baseDelayMs: settings.RETRY_BASE_DELAY_MS,
      factor: settings.RETRY_BACKOFF_FACTOR,
      maxDelayMs: settings.RETRY_MAX_DELAY_MS,
    }),
    minDelayMs: settings.MIN_DELAY_MS,
    maxDelayMs: settings.MAX_DELAY_MS,
    headless: settings.HEADLESS,
    slowMoMs: settings.SLOW_MO_MS,
    browser: settings.BROWSER,
    userAgent: settings.USER_AGENT,
    locale: settings.LOCALE,
    timezone: settings.TIMEZONE,
    enableStealth: settings.ENABLE_STEALTH,
    disableAutomationFlags: settings.DISABLE_AUTOMATION_FLAGS,
    persistentContext: settings.PERSISTENT_CONTEXT,
    persistentContextDir: settings.PERSISTENT_CONTEXT_DIR,
    blockImages: settings.BLOCK_IMAGES,
    warmupUrl: settings.WARMUP_URL,
    dumpHtml: settings.DUMP_HTML,
    debugSaveHtml: settings.DEBUG_SAVE_HTML,
    debugSaveScreenshot: settings.DEBUG_SAVE_SCREENSHOT,
    extraHeaders: Object.freeze(headers),
    blockPatterns: Object.freeze(blockPatterns),
    currency: settings.CURRENCY,
    outputDir: settings.OUTPUT_DIR,
    logLevel: settings.LOG_LEVEL,
    email: Object.freeze({
      sender: settings.EMAIL_SENDER,
      password: settings.EMAIL_PASSWORD,
      to: settings.EMAIL_TO,
      subject: settings.EMAIL_SUBJECT,
      smtpHost: settings.SMTP_HOST,
      smtpPort: settings.SMTP_PORT,
    }),
  };

  return { config: Object.freeze(config), warnings };
}
