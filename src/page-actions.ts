import type { Logger } from './logger';

export const COOKIE_BUTTON_SELECTOR =
  "xpath=//button[contains(., 'Aceptar') or contains(., 'Acepto') or contains(., 'Aceptar todo') or contains(., 'Allow all')]";

const SETTLE_MS = 500;

export interface BannerButton {
  isVisible(): Promise<boolean>;
  click(): Promise<void>;
}

export interface BannerLocator {
  count(): Promise<number>;
  first(): BannerButton;
}

/**
 * Optional page capabilities used after navigation. Playwright's `Page` has
 * all of them; fakes may leave any out.
 */
export interface InteractivePage {
  locator?(selector: string): BannerLocator;
  mouse?: { move(x: number, y: number): Promise<void> };
  waitForTimeout?(ms: number): Promise<void>;
}

async function settle(page: InteractivePage): Promise<void> {
  if (page.waitForTimeout) await page.waitForTimeout(SETTLE_MS);
}

/** Clicks a visible cookie consent button, if there is one. Returns true when clicked. */
export async function dismissCookieBanner(page: InteractivePage, logger: Logger): Promise<boolean> {
  if (!page.locator) return false;
  try {
    const buttons = page.locator(COOKIE_BUTTON_SELECTOR);
    if ((await buttons.count()) === 0) return false;
    const button = buttons.first();
    if (!(await button.isVisible())) return false;
    await button.click();
    await settle(page);
    logger.debug('Cookie banner dismissed');
    return true;
  } catch (error) {
    logger.debug('Cookie banner could not be dismissed', error);
    return false;
  }
}

/** Moves the mouse once and waits briefly, as a person landing on the page would. */
export async function moveMouse(page: InteractivePage, logger: Logger, x = 200, y = 200): Promise<void> {
  if (!page.mouse) return;
  try {
    await page.mouse.move(x, y);
    await settle(page);
  } catch (error) {
    logger.debug('Mouse move failed', error);
  }
}
