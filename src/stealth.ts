import type { RunConfig } from './config';
import type { BrowserKind } from './types';

export interface StealthPlan {
  /** Extra launch flags (chromium only). */
  launchArgs: string[];
  /** Playwright defaults to drop from the launch command line. */
  ignoreDefaultArgs: string[];
  /** Script run in every document before page scripts, or null. */
  initScript: string | null;
  /** Route the launch through playwright-extra with the stealth plugin. */
  usePlugin: boolean;
}

export type StealthSettings = Pick<RunConfig, 'browser' | 'enableStealth' | 'disableAutomationFlags' | 'locale'>;

export const AUTOMATION_FLAG_ARGS = ['--disable-blink-features=AutomationControlled', '--disable-infobars'];

export function navigatorLanguages(locale: string): string[] {
  const primary = locale.split('-')[0];
  return Array.from(new Set([locale, primary, 'en-US', 'en'].filter(Boolean)));
}

export function stealthInitScript(locale: string, browser: BrowserKind): string {
  const lines = [
    "Object.defineProperty(navigator, 'webdriver', { get: () => undefined });",
    `Object.defineProperty(navigator, 'languages', { get: () => ${JSON.stringify(navigatorLanguages(locale))} });`,
    "Object.defineProperty(navigator, 'plugins', { get: () => [1, 2, 3, 4, 5] });",
  ];
  if (browser === 'chromium') {
    lines.push('window.chrome = window.chrome || { runtime: {} };');
  }
  return lines.join('\n');
}

export function buildStealthPlan(settings: StealthSettings): StealthPlan {
  const chromium = settings.browser === 'chromium';
  const suppressFlags = chromium && settings.disableAutomationFlags;

  return {
    launchArgs: suppressFlags ? [...AUTOMATION_FLAG_ARGS] : [],
    ignoreDefaultArgs: suppressFlags ? ['--enable-automation'] : [],
    initScript: settings.enableStealth ? stealthInitScript(settings.locale, settings.browser) : null,
    usePlugin: settings.enableStealth && chromium,
  };
}
